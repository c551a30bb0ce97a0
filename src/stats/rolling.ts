/**
 * Rolling team statistics over the most recent N games of a game log
 */

import type { GameLog, TeamFeatureSnapshot, TeamFeatures } from "../models/types.js";

type Cell = string | number | null;

function toNumber(value: Cell | undefined): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function mean(values: number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

class Window {
  constructor(
    private readonly headers: string[],
    readonly rows: Cell[][],
  ) {}

  has(column: string): boolean {
    return this.headers.includes(column);
  }

  values(column: string): Array<Cell | undefined> {
    const idx = this.headers.indexOf(column);
    if (idx < 0) return [];
    return this.rows.map((row) => row[idx]);
  }

  /** Mean of the present values; 0 when the column is absent or has none */
  safeMean(column: string, fallback: number = 0): number {
    const nums = this.values(column)
      .map(toNumber)
      .filter((v): v is number => v !== undefined);
    return mean(nums) ?? fallback;
  }

  /** Value from the newest row */
  safeLatest(column: string, fallback: number = 0): number {
    if (!this.has(column) || this.rows.length === 0) return fallback;
    return toNumber(this.values(column)[0]) ?? fallback;
  }
}

/**
 * Sort rows newest first by GAME_DATE. Unparseable dates go last; order is otherwise stable.
 */
export function sortByDateDescending(log: GameLog): Cell[][] {
  const idx = log.headers.indexOf("GAME_DATE");
  if (idx < 0) return [...log.rowSet];

  const keyed = log.rowSet.map((row) => {
    const cell = row[idx];
    const time = cell === null || cell === undefined ? NaN : Date.parse(String(cell));
    return { row, time };
  });

  keyed.sort((a, b) => {
    const aMissing = Number.isNaN(a.time);
    const bMissing = Number.isNaN(b.time);
    if (aMissing || bMissing) return Number(aMissing) - Number(bMissing);
    return b.time - a.time;
  });

  return keyed.map((k) => k.row);
}

function opponentPoints(window: Window): number {
  if (!window.has("PLUS_MINUS")) return 0;
  const pts = window.values("PTS");
  const plusMinus = window.values("PLUS_MINUS");
  const diffs: number[] = [];
  for (let i = 0; i < window.rows.length; i++) {
    const p = toNumber(pts[i]);
    const pm = toNumber(plusMinus[i]);
    if (p !== undefined && pm !== undefined) diffs.push(p - pm);
  }
  return mean(diffs) ?? 0;
}

function venueRates(window: Window): { homeRate: number; awayRate: number } {
  const matchups = window.values("MATCHUP");
  const textual = window.has("MATCHUP") && matchups.every((m) => m === null || m === undefined || typeof m === "string");
  if (!textual || window.rows.length === 0) {
    return { homeRate: 0.5, awayRate: 0.5 };
  }
  const n = window.rows.length;
  const home = matchups.filter((m) => typeof m === "string" && m.includes(" vs. ")).length;
  const away = matchups.filter((m) => typeof m === "string" && m.includes(" @ ")).length;
  return { homeRate: home / n, awayRate: away / n };
}

/**
 * Derive the rolling feature snapshot from the lastN most recent games.
 * Returns an empty snapshot when the log has no rows.
 */
export function computeRollingFeatures(log: GameLog, lastN: number = 10): TeamFeatureSnapshot {
  const recent = sortByDateDescending(log).slice(0, Math.max(0, lastN));
  if (recent.length === 0) return {};

  const w = new Window(log.headers, recent);

  const features: TeamFeatures = {
    ptsAvg: w.safeMean("PTS"),
    rebAvg: w.safeMean("REB"),
    astAvg: w.safeMean("AST"),
    stlAvg: w.safeMean("STL"),
    blkAvg: w.safeMean("BLK"),
    tovAvg: w.safeMean("TOV"),
    fgPctAvg: w.safeMean("FG_PCT"),
    fg3PctAvg: w.safeMean("FG3_PCT"),
    ftPctAvg: w.safeMean("FT_PCT"),
    plusMinusAvg: w.safeMean("PLUS_MINUS"),
    // possessions-style proxy: FGA + 0.44 * FTA + TOV
    paceProxyAvg: w.safeMean("FGA") + 0.44 * w.safeMean("FTA") + w.safeMean("TOV"),
    lastGamePts: w.safeLatest("PTS"),
    oppPtsAvg: opponentPoints(w),
    ...venueRates(w),
  };

  return features;
}
