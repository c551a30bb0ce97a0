/**
 * Wire production components from an AppConfig
 */

import { ProbabilityAdjuster } from "../adjust/injuries.js";
import { DiskGameLogStore } from "../cache/index.js";
import type { AppConfig } from "../config/index.js";
import { loadWinProbModel } from "../model/win-prob.js";
import { OddsClient } from "../odds/client.js";
import type { PipelineDeps } from "../pipeline/index.js";
import { StatsClient } from "../stats/client.js";
import { TeamFeatureCache } from "../stats/team-features.js";
import { TeamDirectory } from "../stats/teams.js";

export function createFeatureCache(config: AppConfig, teams: TeamDirectory): TeamFeatureCache {
  return new TeamFeatureCache({
    teams,
    source: new StatsClient({ proxy: config.statsProxy }),
    store: new DiskGameLogStore(config.statsCacheDir),
    maxAgeHours: config.statsCacheHours,
    attempts: config.statsAttempts,
    season: config.season,
  });
}

export function createPipelineDeps(config: AppConfig): PipelineDeps {
  const teams = TeamDirectory.fromFile(config.teamsFile);
  return {
    config,
    odds: new OddsClient(config),
    features: createFeatureCache(config, teams),
    teams,
    model: loadWinProbModel(config.modelPath),
    adjuster: ProbabilityAdjuster.fromFile(config.injuriesFile),
  };
}
