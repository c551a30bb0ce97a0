/**
 * Feature row for the win-probability model
 */

import type { FeatureRow } from "../models/types.js";
import type { TeamDirectory } from "../stats/teams.js";

// Placeholder ids so an unknown team name never stops scoring
export const UNKNOWN_HOME_TEAM_ID = -1;
export const UNKNOWN_AWAY_TEAM_ID = -2;

export function buildFeatureRow(teams: TeamDirectory, homeTeam: string, awayTeam: string): FeatureRow {
  return {
    homeTeamId: teams.resolveId(homeTeam) ?? UNKNOWN_HOME_TEAM_ID,
    awayTeamId: teams.resolveId(awayTeam) ?? UNKNOWN_AWAY_TEAM_ID,
  };
}
