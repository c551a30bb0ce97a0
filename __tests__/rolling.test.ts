// Unit tests for rolling team features

import { computeRollingFeatures, sortByDateDescending } from '../src/stats/rolling.js';
import type { GameLog } from '../src/models/types.js';

const HEADERS = [
  'GAME_DATE', 'MATCHUP', 'PTS', 'REB', 'AST', 'STL', 'BLK', 'TOV',
  'FG_PCT', 'FG3_PCT', 'FT_PCT', 'FGA', 'FTA', 'PLUS_MINUS',
];

function fullLog(): GameLog {
  return {
    headers: HEADERS,
    rowSet: [
      ['2025-10-24', 'BOS @ NYK', 110, 44, 25, 8, 5, 12, 0.45, 0.35, 0.8, 88, 20, 5],
      ['2025-10-28', 'BOS vs. MIA', 120, 40, 27, 6, 4, 14, 0.5, 0.4, 0.75, 90, 25, -3],
      ['2025-10-26', 'BOS vs. PHI', 100, 48, 20, 10, 6, 10, 0.4, 0.3, 0.9, 86, 15, 10],
    ],
  };
}

describe('sortByDateDescending', () => {
  test('newest first', () => {
    expect(sortByDateDescending(fullLog()).map((r) => r[0])).toEqual(['2025-10-28', '2025-10-26', '2025-10-24']);
  });

  test('unparseable dates go last', () => {
    const log: GameLog = {
      headers: ['GAME_DATE', 'PTS'],
      rowSet: [['not a date', 1], ['2025-10-20', 2], [null, 3], ['2025-10-22', 4]],
    };
    expect(sortByDateDescending(log).map((r) => r[1])).toEqual([4, 2, 1, 3]);
  });
});

describe('computeRollingFeatures', () => {
  test('window of the two most recent games', () => {
    const f = computeRollingFeatures(fullLog(), 2);

    expect(f.ptsAvg).toBeCloseTo(110, 10);
    expect(f.rebAvg).toBeCloseTo(44, 10);
    expect(f.astAvg).toBeCloseTo(23.5, 10);
    expect(f.stlAvg).toBeCloseTo(8, 10);
    expect(f.blkAvg).toBeCloseTo(5, 10);
    expect(f.tovAvg).toBeCloseTo(12, 10);
    expect(f.fgPctAvg).toBeCloseTo(0.45, 10);
    expect(f.fg3PctAvg).toBeCloseTo(0.35, 10);
    expect(f.ftPctAvg).toBeCloseTo(0.825, 10);
    expect(f.plusMinusAvg).toBeCloseTo(3.5, 10);
    // 88 + 0.44 * 20 + 12
    expect(f.paceProxyAvg).toBeCloseTo(108.8, 10);
    expect(f.lastGamePts).toBe(120);
    // mean(120 - -3, 100 - 10)
    expect(f.oppPtsAvg).toBeCloseTo(106.5, 10);
    expect(f.homeRate).toBe(1);
    expect(f.awayRate).toBe(0);
  });

  test('window larger than the log uses every game', () => {
    const f = computeRollingFeatures(fullLog(), 10);
    expect(f.ptsAvg).toBeCloseTo(110, 10);
    expect(f.homeRate).toBeCloseTo(2 / 3, 10);
    expect(f.awayRate).toBeCloseTo(1 / 3, 10);
  });

  test('empty log yields an empty snapshot', () => {
    expect(computeRollingFeatures({ headers: HEADERS, rowSet: [] })).toEqual({});
  });

  test('absent columns fall back to defaults', () => {
    const f = computeRollingFeatures({
      headers: ['GAME_DATE', 'PTS'],
      rowSet: [['2025-10-28', 101], ['2025-10-26', 99]],
    });
    expect(f.ptsAvg).toBe(100);
    expect(f.rebAvg).toBe(0);
    expect(f.plusMinusAvg).toBe(0);
    expect(f.oppPtsAvg).toBe(0);
    expect(f.paceProxyAvg).toBe(0);
    expect(f.homeRate).toBe(0.5);
    expect(f.awayRate).toBe(0.5);
  });

  test('null cells are skipped in averages', () => {
    const f = computeRollingFeatures({
      headers: ['GAME_DATE', 'PTS', 'FG_PCT'],
      rowSet: [['2025-10-28', 100, null], ['2025-10-26', 90, 0.5]],
    });
    expect(f.fgPctAvg).toBe(0.5);
  });

  test('numeric MATCHUP column is not parsed for venue', () => {
    const f = computeRollingFeatures({
      headers: ['GAME_DATE', 'MATCHUP', 'PTS'],
      rowSet: [['2025-10-28', 1, 100]],
    });
    expect(f.homeRate).toBe(0.5);
    expect(f.awayRate).toBe(0.5);
  });
});
