/**
 * Disk cache for team game logs, one JSON file per TEAM_ID
 */

import { writeFileSync, readFileSync, existsSync, mkdirSync, statSync } from "fs";
import { join } from "path";
import type { GameLog } from "../models/types.js";

export interface CachedGameLog {
  log: GameLog;
  savedAt: number; // epoch ms
}

export interface GameLogStore {
  read(teamId: number): CachedGameLog | undefined;
  write(teamId: number, log: GameLog): void;
}

function isGameLog(value: unknown): value is GameLog {
  return (
    typeof value === "object" &&
    value !== null &&
    "headers" in value &&
    Array.isArray(value.headers) &&
    "rowSet" in value &&
    Array.isArray(value.rowSet)
  );
}

export class DiskGameLogStore implements GameLogStore {
  constructor(private readonly cacheDir: string) {}

  /**
   * Initialize cache directory
   */
  private ensureCacheDir(): void {
    if (!existsSync(this.cacheDir)) {
      mkdirSync(this.cacheDir, { recursive: true });
    }
  }

  pathFor(teamId: number): string {
    return join(this.cacheDir, `team_gamelog_${teamId}.json`);
  }

  /**
   * Cached log of any age, with its file modification time
   */
  read(teamId: number): CachedGameLog | undefined {
    const cachePath = this.pathFor(teamId);
    if (!existsSync(cachePath)) {
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(cachePath, "utf-8"));
      if (!isGameLog(parsed)) return undefined;
      return { log: parsed, savedAt: statSync(cachePath).mtimeMs };
    } catch {
      // Invalid cache file
      return undefined;
    }
  }

  /**
   * Overwrite the cached log for a team
   */
  write(teamId: number, log: GameLog): void {
    this.ensureCacheDir();
    writeFileSync(this.pathFor(teamId), JSON.stringify(log));
  }
}
