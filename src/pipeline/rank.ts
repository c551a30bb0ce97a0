/**
 * Pick the better side of each game and order games by best bettable opportunity
 */

import type { RankMetric, Recommendation, ScoredGame, SidePair, TeamSide } from "../models/types.js";

// Comparison-only stand-in for a side without a value; never surfaced
const MISSING = Number.NEGATIVE_INFINITY;

function pickSide(values: SidePair<number | undefined>): { side: TeamSide; value: number | undefined } {
  const home = values.home ?? MISSING;
  const away = values.away ?? MISSING;
  return home >= away ? { side: "home", value: values.home } : { side: "away", value: values.away };
}

/**
 * EV decides when either side has a price; otherwise fall back to raw edge for this game alone
 */
export function chooseBestSide(game: ScoredGame): Recommendation {
  const hasEv = game.ev.home !== undefined || game.ev.away !== undefined;
  const metricName: RankMetric = hasEv ? "EV" : "edge";
  const { side, value } = pickSide(hasEv ? game.ev : game.edge);
  return { ...game, bestSide: side, bestMetric: value, metricName };
}

/**
 * EV and edge are different units, so EV-ranked games always precede edge-ranked ones,
 * and games with no metric come last.
 */
function tier(rec: Recommendation): number {
  if (rec.bestMetric === undefined) return 2;
  return rec.metricName === "EV" ? 0 : 1;
}

/**
 * Total order: tier, then descending metric. Array.prototype.sort is stable, so ties keep input order.
 */
export function compareRecommendations(a: Recommendation, b: Recommendation): number {
  const byTier = tier(a) - tier(b);
  if (byTier !== 0) return byTier;
  if (a.bestMetric === undefined || b.bestMetric === undefined) return 0;
  return b.bestMetric - a.bestMetric;
}

export function rankRecommendations(scored: readonly ScoredGame[]): Recommendation[] {
  return scored.map(chooseBestSide).sort(compareRecommendations);
}
