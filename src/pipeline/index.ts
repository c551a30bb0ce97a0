/**
 * Recommendation pipeline: odds -> team features -> score -> rank.
 * Every step runs sequentially; one network call at a time.
 */

import type { AppConfig } from "../config/index.js";
import type { ProbabilityAdjuster } from "../adjust/injuries.js";
import { buildFeatureRow } from "../model/feature-row.js";
import type { WinProbModel } from "../model/win-prob.js";
import { ALL_MARKETS, type Game, type GameWithFeatures, type MarketKey, type Recommendation, type ScoredGame } from "../models/types.js";
import type { TeamFeatureCache } from "../stats/team-features.js";
import type { TeamDirectory } from "../stats/teams.js";
import { rankRecommendations } from "./rank.js";
import { scoreGame } from "./score.js";

export interface GameSource {
  fetchGames(markets?: readonly MarketKey[]): Promise<Game[]>;
}

export interface PipelineDeps {
  config: AppConfig;
  odds: GameSource;
  features: TeamFeatureCache;
  teams: TeamDirectory;
  model: WinProbModel;
  adjuster: ProbabilityAdjuster;
}

export async function addTeamFeatures(
  games: readonly Game[],
  features: TeamFeatureCache,
  config: AppConfig,
): Promise<GameWithFeatures[]> {
  if (config.skipLiveStats) {
    return games.map((g) => ({ ...g, homeFeatures: {}, awayFeatures: {} }));
  }

  const out: GameWithFeatures[] = [];
  for (const g of games) {
    const homeFeatures = await features.getFeatures(g.homeTeam, config.recentGames);
    const awayFeatures = await features.getFeatures(g.awayTeam, config.recentGames);
    out.push({ ...g, homeFeatures, awayFeatures });
  }
  return out;
}

export function scoreGames(
  games: readonly GameWithFeatures[],
  deps: Pick<PipelineDeps, "teams" | "model" | "adjuster">,
): ScoredGame[] {
  return games.map((g) => {
    const row = buildFeatureRow(deps.teams, g.homeTeam, g.awayTeam);
    const pModel = deps.model.predictHomeWin(row);
    const pHome = deps.adjuster.adjustHomeProb(g.homeTeam, g.awayTeam, pModel);
    return scoreGame(g, pHome);
  });
}

/**
 * Run one full pass. Odds API failures propagate to the caller; nothing partial is returned.
 */
export async function runPipeline(deps: PipelineDeps): Promise<Recommendation[]> {
  const games = await deps.odds.fetchGames(ALL_MARKETS);
  const withFeatures = await addTeamFeatures(games, deps.features, deps.config);
  const scored = scoreGames(withFeatures, deps);
  return rankRecommendations(scored);
}
