/**
 * Offline training of the team-rating win-probability model
 */

import type { HistoricalGame } from "../data/games.js";
import { MODEL_TYPE, sigmoid, TeamRatingModel, type TeamRatingArtifact } from "./win-prob.js";

export interface TrainOptions {
  learningRate?: number;
  iterations?: number;
  lambda?: number;
  validationFraction?: number;
}

export interface TrainMetrics {
  trainSize: number;
  validationSize: number;
  validationAccuracy: number | undefined;
  brierScore: number | undefined;
}

export interface TrainResult {
  artifact: TeamRatingArtifact;
  metrics: TrainMetrics;
}

interface Sample {
  home: number; // index into the weight vector
  away: number;
  label: number; // 1 if home won
}

/**
 * Logistic regression over x = [1, onehot(home) - onehot(away)], gradient descent with L2 penalty.
 * Weight 0 is the intercept (home-court advantage), weight i is team i's rating.
 */
function trainLogisticRegression(
  samples: Sample[],
  numWeights: number,
  learningRate: number,
  iterations: number,
  lambda: number,
): number[] {
  const weights = new Array<number>(numWeights).fill(0);
  const n = samples.length;
  if (n === 0) return weights;

  for (let iter = 0; iter < iterations; iter++) {
    const gradient = new Array<number>(numWeights).fill(0);

    for (const s of samples) {
      const error = sigmoid(weights[0] + weights[s.home] - weights[s.away]) - s.label;
      gradient[0] += error;
      gradient[s.home] += error;
      gradient[s.away] -= error;
    }

    for (let j = 0; j < numWeights; j++) {
      weights[j] -= (learningRate / n) * (gradient[j] + lambda * weights[j]);
    }
  }

  return weights;
}

function toArtifact(teamIds: number[], weights: number[], sampleSize: number): TeamRatingArtifact {
  const ratings: Record<string, number> = {};
  teamIds.forEach((id, i) => {
    ratings[String(id)] = weights[i + 1];
  });
  return {
    type: MODEL_TYPE,
    intercept: weights[0],
    ratings,
    trainedAt: new Date().toISOString(),
    sampleSize,
  };
}

/**
 * Fit on the oldest games, report accuracy and Brier score on the most recent slice,
 * then refit on everything for the saved artifact.
 */
export function trainTeamRatingModel(games: readonly HistoricalGame[], options: TrainOptions = {}): TrainResult {
  const learningRate = options.learningRate ?? 1.0;
  const iterations = options.iterations ?? 500;
  const lambda = options.lambda ?? 0.01;
  const validationFraction = options.validationFraction ?? 0.2;

  const decided = [...games]
    .filter((g) => g.homePoints !== g.awayPoints)
    .sort((a, b) => a.gameDate.localeCompare(b.gameDate));

  const teamIds = [...new Set(decided.flatMap((g) => [g.homeTeamId, g.awayTeamId]))].sort((a, b) => a - b);
  const index = new Map(teamIds.map((id, i) => [id, i + 1]));
  const numWeights = teamIds.length + 1;

  const samples: Sample[] = decided.map((g) => ({
    home: index.get(g.homeTeamId) ?? 0,
    away: index.get(g.awayTeamId) ?? 0,
    label: g.homePoints > g.awayPoints ? 1 : 0,
  }));

  const cut = Math.floor(samples.length * (1 - validationFraction));
  const trainSet = samples.slice(0, cut);
  const validationSet = samples.slice(cut);

  let validationAccuracy: number | undefined;
  let brierScore: number | undefined;
  if (trainSet.length > 0 && validationSet.length > 0) {
    const w = trainLogisticRegression(trainSet, numWeights, learningRate, iterations, lambda);
    const heldOut = TeamRatingModel.fromArtifact(toArtifact(teamIds, w, trainSet.length));
    let correct = 0;
    let squaredError = 0;
    for (const s of validationSet) {
      const p = heldOut.predictHomeWin({ homeTeamId: teamIds[s.home - 1], awayTeamId: teamIds[s.away - 1] });
      if ((p >= 0.5 ? 1 : 0) === s.label) correct++;
      squaredError += (p - s.label) ** 2;
    }
    validationAccuracy = correct / validationSet.length;
    brierScore = squaredError / validationSet.length;
  }

  const weights = trainLogisticRegression(samples, numWeights, learningRate, iterations, lambda);

  return {
    artifact: toArtifact(teamIds, weights, samples.length),
    metrics: {
      trainSize: trainSet.length,
      validationSize: validationSet.length,
      validationAccuracy,
      brierScore,
    },
  };
}
