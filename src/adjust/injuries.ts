/**
 * Manual injury/absence adjustments to the model's home-win probability
 */

import { readFileSync } from "fs";
import { clamp } from "../models/probability.js";

export const MIN_PROBABILITY = 0.01;
export const MAX_PROBABILITY = 0.99;

/**
 * Read a JSON object of team full name -> signed probability offset.
 * A missing or unreadable file means no adjustments; entries that are not finite numbers are skipped.
 *
 * @example
 * {
 *   "Boston Celtics": -0.06,
 *   "Memphis Grizzlies": 0.03
 * }
 */
export function loadAdjustments(path: string): Map<string, number> {
  const adjustments = new Map<string, number>();
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    return adjustments;
  }

  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return adjustments;
  }

  const entries: Array<[string, unknown]> = Object.entries(data);
  for (const [team, value] of entries) {
    const offset = typeof value === "string" ? Number(value) : value;
    if (typeof offset === "number" && Number.isFinite(offset)) {
      adjustments.set(team, offset);
    }
  }
  return adjustments;
}

export class ProbabilityAdjuster {
  constructor(private readonly offsets: ReadonlyMap<string, number> = new Map()) {}

  static fromFile(path: string): ProbabilityAdjuster {
    return new ProbabilityAdjuster(loadAdjustments(path));
  }

  offset(team: string): number {
    return this.offsets.get(team) ?? 0;
  }

  /**
   * Linear shift: a positive offset favors that team by that many probability points.
   * Output is clamped to [0.01, 0.99] so EV/Kelly never see a certain outcome.
   */
  adjustHomeProb(homeTeam: string, awayTeam: string, pHome: number): number {
    return clamp(pHome + this.offset(homeTeam) - this.offset(awayTeam), MIN_PROBABILITY, MAX_PROBABILITY);
  }
}
