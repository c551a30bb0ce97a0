// Unit tests for the picks and board command handlers

import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ProbabilityAdjuster } from '../src/adjust/injuries.js';
import { cmdBoard, cmdPicks } from '../src/cli/commands.js';
import { BOARD_COLUMNS } from '../src/cli/board.js';
import { loadConfig } from '../src/config/index.js';
import { ConstantModel } from '../src/model/win-prob.js';
import { OddsApiError } from '../src/odds/client.js';
import type { GameSource, PipelineDeps } from '../src/pipeline/index.js';
import { TeamFeatureCache } from '../src/stats/team-features.js';
import { markets, MemoryStore, noSleep, sampleLog, testTeams } from './helpers.js';

const config = loadConfig({ SKIP_STATS: '1' });
const FAILURE = 'Odds API error: 500 Internal Server Error';

function fakeDeps(odds: GameSource): PipelineDeps {
  const teams = testTeams();
  return {
    config,
    odds,
    features: new TeamFeatureCache({
      teams,
      source: { fetchTeamGameLog: async () => sampleLog() },
      store: new MemoryStore(() => 0),
      now: () => 0,
      sleep: noSleep,
    }),
    teams,
    model: new ConstantModel(0.5),
    adjuster: new ProbabilityAdjuster(new Map([['Boston Celtics', 0.15]])),
  };
}

const failingOdds: GameSource = {
  fetchGames: async () => {
    throw new OddsApiError(FAILURE, 500);
  },
};

const oneGame: GameSource = {
  fetchGames: async () => [
    {
      id: 'celtics-knicks',
      homeTeam: 'Boston Celtics',
      awayTeam: 'New York Knicks',
      markets: markets({ h2h: { home: -150, away: 130 } }),
    },
  ],
};

function printed(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map(([first]) => String(first));
}

function spyOnOutput() {
  return {
    exit: vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    }),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
  };
}

describe('command handlers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('picks exits 1 and prints the upstream message when odds fail', async () => {
    const { exit, error } = spyOnOutput();
    await expect(cmdPicks(config, 10, false, () => fakeDeps(failingOdds))).rejects.toThrow('process.exit(1)');

    expect(exit).toHaveBeenCalledWith(1);
    expect(printed(error).some((line) => line.includes(FAILURE))).toBe(true);
  });

  test('board exits 1 and prints the message without a stack trace', async () => {
    const { exit, error } = spyOnOutput();
    await expect(
      cmdBoard(config, { minEv: 0, minKelly: 0 }, undefined, () => fakeDeps(failingOdds)),
    ).rejects.toThrow('process.exit(1)');

    expect(exit).toHaveBeenCalledWith(1);
    const lines = printed(error);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain(`Error while running the prediction pipeline: ${FAILURE}`);
    expect(lines[0]).not.toContain('    at ');
  });

  test('picks names the model and counts recommendations', async () => {
    const { exit, log } = spyOnOutput();
    await cmdPicks(config, 10, false, () => fakeDeps(oneGame));

    const lines = printed(log);
    expect(exit).not.toHaveBeenCalled();
    expect(lines.some((line) => line.includes('model: constant'))).toBe(true);
    expect(lines.some((line) => line.includes('total recommendations: 1'))).toBe(true);
    expect(lines.some((line) => line.includes('RECOMMEND: bet_home  by EV=0.0833'))).toBe(true);
  });

  test('board writes the filtered rows to CSV', async () => {
    spyOnOutput();
    const dir = mkdtempSync(join(tmpdir(), 'courtside-board-'));
    const csvPath = join(dir, 'out', 'board.csv');
    try {
      await cmdBoard(config, { minEv: 0, minKelly: 0 }, csvPath, () => fakeDeps(oneGame));

      expect(existsSync(csvPath)).toBe(true);
      const [header, row] = readFileSync(csvPath, 'utf-8').split('\n');
      expect(header).toBe(BOARD_COLUMNS.join(','));
      expect(row).toContain('Boston Celtics (HOME),EV,0.0833');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
