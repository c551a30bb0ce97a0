import type { GameLogStore, CachedGameLog } from "../src/cache/index.js";
import type { GameLog, MarketSet, Recommendation, ScoredGame, SidePair } from "../src/models/types.js";
import { TeamDirectory } from "../src/stats/teams.js";

export const CELTICS = 1610612738;
export const KNICKS = 1610612752;
export const HEAT = 1610612748;
export const MAGIC = 1610612753;

export function testTeams(): TeamDirectory {
  return new TeamDirectory([
    { id: CELTICS, fullName: "Boston Celtics", abbreviation: "BOS" },
    { id: KNICKS, fullName: "New York Knicks", abbreviation: "NYK" },
    { id: HEAT, fullName: "Miami Heat", abbreviation: "MIA" },
    { id: MAGIC, fullName: "Orlando Magic", abbreviation: "ORL" },
  ]);
}

export const GAME_LOG_HEADERS = ["GAME_DATE", "MATCHUP", "PTS", "REB", "AST", "TOV", "FGA", "FTA", "PLUS_MINUS"];

export function sampleLog(): GameLog {
  return {
    headers: GAME_LOG_HEADERS,
    rowSet: [
      ["2025-10-28", "BOS vs. MIA", 120, 40, 27, 14, 90, 25, -3],
      ["2025-10-26", "BOS @ PHI", 100, 48, 20, 10, 86, 15, 10],
    ],
  };
}

export class MemoryStore implements GameLogStore {
  readonly entries = new Map<number, CachedGameLog>();
  writes = 0;

  constructor(private readonly clock: () => number) {}

  read(teamId: number): CachedGameLog | undefined {
    return this.entries.get(teamId);
  }

  write(teamId: number, log: GameLog): void {
    this.writes++;
    this.entries.set(teamId, { log, savedAt: this.clock() });
  }
}

export function markets(overrides: Partial<MarketSet> = {}): MarketSet {
  return {
    h2h: {},
    spreads: { home: {}, away: {} },
    totals: { over: {}, under: {} },
    ...overrides,
  };
}

const none: SidePair<number | undefined> = { home: undefined, away: undefined };

export function scored(id: string, values: Partial<Pick<ScoredGame, "ev" | "edge" | "kelly">> = {}): ScoredGame {
  return {
    gameId: id,
    home: `${id} Home`,
    away: `${id} Away`,
    moneyline: none,
    spreads: { home: {}, away: {} },
    totals: { over: {}, under: {} },
    features: { home: {}, away: {} },
    model: { homeWinProb: 0.5, awayWinProb: 0.5 },
    marketImplied: none,
    edge: values.edge ?? none,
    ev: values.ev ?? none,
    kelly: values.kelly ?? none,
  };
}

export function recommendation(overrides: Partial<Recommendation> = {}): Recommendation {
  return {
    ...scored("g1"),
    bestSide: "home",
    bestMetric: undefined,
    metricName: "edge",
    ...overrides,
  };
}

export async function noSleep(_ms: number): Promise<void> {}
