/**
 * Per-team rolling features with a cache that survives stats.nba.com flakiness
 */

import chalk from "chalk";
import type { GameLogStore, CachedGameLog } from "../cache/index.js";
import type { GameLog, TeamFeatureSnapshot } from "../models/types.js";
import type { GameLogSource } from "./client.js";
import { hoursToMs, resolveLookup, type LookupOutcome } from "./lookup.js";
import { computeRollingFeatures } from "./rolling.js";
import type { TeamDirectory } from "./teams.js";

export const POLITENESS_DELAY_MS = 600;
export const BACKOFF_BASE_MS = 1000;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface TeamFeatureCacheOptions {
  teams: TeamDirectory;
  source: GameLogSource;
  store: GameLogStore;
  maxAgeHours?: number;
  attempts?: number;
  season?: string;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface TeamLookup {
  outcome: LookupOutcome | "unresolved";
  features: TeamFeatureSnapshot;
}

export class TeamFeatureCache {
  private readonly teams: TeamDirectory;
  private readonly source: GameLogSource;
  private readonly store: GameLogStore;
  private readonly maxAgeMs: number;
  private readonly attempts: number;
  private readonly season: string | undefined;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: TeamFeatureCacheOptions) {
    this.teams = options.teams;
    this.source = options.source;
    this.store = options.store;
    this.maxAgeMs = hoursToMs(options.maxAgeHours ?? 6);
    this.attempts = Math.max(1, options.attempts ?? 2);
    this.season = options.season;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Rolling features for a team's last N games. Never throws; degrades to an empty snapshot.
   */
  async getFeatures(teamName: string, lastN: number = 10): Promise<TeamFeatureSnapshot> {
    const { features } = await this.lookup(teamName, lastN);
    return features;
  }

  async lookup(teamName: string, lastN: number = 10): Promise<TeamLookup> {
    const teamId = this.teams.resolveId(teamName);
    if (teamId === undefined) {
      return { outcome: "unresolved", features: {} };
    }

    try {
      const { outcome, log } = await this.loadGameLog(teamId);
      return { outcome, features: log ? computeRollingFeatures(log, lastN) : {} };
    } catch (err) {
      console.warn(chalk.yellow(`[stats] feature lookup failed for ${teamName}: ${describe(err)}`));
      return { outcome: "empty", features: {} };
    }
  }

  private async loadGameLog(teamId: number): Promise<{ outcome: LookupOutcome; log?: GameLog }> {
    const cached = this.readCache(teamId);
    const first = resolveLookup({ cached, now: this.now(), maxAgeMs: this.maxAgeMs });
    if (first === "fresh" && cached) {
      return { outcome: "fresh", log: cached.log };
    }

    const fetched = await this.fetchWithRetry(teamId);
    const outcome = resolveLookup({
      cached,
      now: this.now(),
      maxAgeMs: this.maxAgeMs,
      live: fetched.log ? "succeeded" : "failed",
    });

    switch (outcome) {
      case "live":
        return { outcome, log: fetched.log };
      case "stale":
        console.warn(chalk.yellow(`[warn] using stale cache for team_id=${teamId} due to fetch error: ${fetched.error}`));
        return { outcome, log: cached?.log };
      default:
        console.warn(chalk.yellow(`[warn] stats fetch failed for team_id=${teamId}: ${fetched.error}`));
        return { outcome: "empty" };
    }
  }

  private readCache(teamId: number): CachedGameLog | undefined {
    try {
      return this.store.read(teamId);
    } catch (err) {
      console.warn(chalk.yellow(`[cache] unreadable cache for team_id=${teamId}: ${describe(err)}`));
      return undefined;
    }
  }

  /**
   * Live fetch with a politeness delay before every attempt and growing backoff between attempts.
   * A successful fetch overwrites the cached copy.
   */
  private async fetchWithRetry(teamId: number): Promise<{ log?: GameLog; error?: string }> {
    let lastError = "no attempts made";

    for (let i = 0; i < this.attempts; i++) {
      try {
        await this.sleep(POLITENESS_DELAY_MS);
        const log = await this.source.fetchTeamGameLog(teamId, this.season);
        if (log.rowSet.length === 0) {
          throw new Error("empty game log");
        }
        this.writeCache(teamId, log);
        return { log };
      } catch (err) {
        lastError = describe(err);
        if (i < this.attempts - 1) {
          await this.sleep(BACKOFF_BASE_MS * (i + 1));
        }
      }
    }

    return { error: lastError };
  }

  private writeCache(teamId: number, log: GameLog): void {
    try {
      this.store.write(teamId, log);
    } catch (err) {
      console.warn(chalk.yellow(`[cache] could not persist game log for team_id=${teamId}: ${describe(err)}`));
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
