/**
 * Pre-fetch team game logs for every team on today's slate
 */

import chalk from "chalk";
import type { GameSource } from "../pipeline/index.js";
import type { TeamFeatureCache } from "../stats/team-features.js";
import { sleep } from "../stats/team-features.js";

export const WARM_PAUSE_MS = 200;

export interface WarmSummary {
  teams: string[];
  ok: number;
  fail: number;
}

export async function warmCache(
  odds: GameSource,
  features: TeamFeatureCache,
  options: { lastN?: number; pause?: (ms: number) => Promise<void> } = {},
): Promise<WarmSummary> {
  const pause = options.pause ?? sleep;
  const games = await odds.fetchGames(["h2h"]);

  const names = new Set<string>();
  for (const g of games) {
    names.add(g.homeTeam);
    names.add(g.awayTeam);
  }
  const teams = [...names].sort();
  console.log(chalk.cyan(`warming cache for ${teams.length} teams...`));

  let ok = 0;
  let fail = 0;
  for (const team of teams) {
    const { outcome } = await features.lookup(team, options.lastN);
    if (outcome === "fresh" || outcome === "live" || outcome === "stale") {
      ok++;
    } else {
      fail++;
      console.warn(chalk.yellow(`[warn] warm failed for ${team} (${outcome})`));
    }
    await pause(WARM_PAUSE_MS);
  }

  return { teams, ok, fail };
}
