/**
 * Home-win probability models
 */

import { readFileSync } from "fs";
import chalk from "chalk";
import type { FeatureRow } from "../models/types.js";

export interface WinProbModel {
  readonly name: string;
  readonly trained: boolean;
  predictHomeWin(row: FeatureRow): number;
}

export const MODEL_TYPE = "team-rating-logistic";

export interface TeamRatingArtifact {
  type: typeof MODEL_TYPE;
  intercept: number;
  ratings: Record<string, number>;
  trainedAt: string;
  sampleSize: number;
}

export function sigmoid(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

/**
 * Logistic model over team ids: sigmoid(intercept + rating[home] - rating[away]).
 * The intercept carries home-court advantage; unknown ids rate 0.
 */
export class TeamRatingModel implements WinProbModel {
  readonly name = "team-rating";
  readonly trained = true;

  constructor(
    readonly intercept: number,
    private readonly ratings: ReadonlyMap<number, number>,
  ) {}

  static fromArtifact(artifact: TeamRatingArtifact): TeamRatingModel {
    const ratings = new Map<number, number>();
    for (const [id, rating] of Object.entries(artifact.ratings)) {
      ratings.set(Number(id), rating);
    }
    return new TeamRatingModel(artifact.intercept, ratings);
  }

  rating(teamId: number): number {
    return this.ratings.get(teamId) ?? 0;
  }

  predictHomeWin(row: FeatureRow): number {
    return sigmoid(this.intercept + this.rating(row.homeTeamId) - this.rating(row.awayTeamId));
  }
}

/**
 * Fallback when no trained artifact is available: a coin flip for every game
 */
export class ConstantModel implements WinProbModel {
  readonly name = "constant";
  readonly trained = false;

  constructor(private readonly probability: number = 0.5) {}

  predictHomeWin(_row: FeatureRow): number {
    return this.probability;
  }
}

export function isTeamRatingArtifact(value: unknown): value is TeamRatingArtifact {
  if (typeof value !== "object" || value === null) return false;
  if (!("type" in value) || value.type !== MODEL_TYPE) return false;
  if (!("intercept" in value) || typeof value.intercept !== "number" || !Number.isFinite(value.intercept)) return false;
  if (!("sampleSize" in value) || typeof value.sampleSize !== "number") return false;
  if (!("trainedAt" in value) || typeof value.trainedAt !== "string") return false;
  if (!("ratings" in value) || typeof value.ratings !== "object" || value.ratings === null) return false;
  const ratings: Array<[string, unknown]> = Object.entries(value.ratings);
  return ratings.every(([id, r]) => Number.isInteger(Number(id)) && typeof r === "number" && Number.isFinite(r));
}

/**
 * Load the trained model, or fall back to the constant model with a warning
 */
export function loadWinProbModel(path: string): WinProbModel {
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (!isTeamRatingArtifact(parsed)) {
      throw new Error(`unrecognized model artifact (expected type "${MODEL_TYPE}")`);
    }
    console.log(chalk.green(`[model] Loaded trained model from ${path} (${parsed.sampleSize} games)`));
    return TeamRatingModel.fromArtifact(parsed);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(chalk.yellow(`[model] WARNING: could not load trained model, using 0.5 fallback: ${reason}`));
    return new ConstantModel();
  }
}
