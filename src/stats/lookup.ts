/**
 * Tiered read path for team game logs: fresh cache -> live fetch -> stale cache -> empty.
 * Pure decision logic; the I/O lives in TeamFeatureCache.
 */

export interface CacheMeta {
  savedAt: number; // epoch ms (file mtime)
}

export type LiveResult = "succeeded" | "failed";

export type LookupOutcome = "fresh" | "fetch" | "live" | "stale" | "empty";

export interface LookupInput {
  cached: CacheMeta | undefined;
  now: number;
  maxAgeMs: number;
  /** Result of the live fetch, undefined until it has been attempted */
  live?: LiveResult;
}

export function isFresh(cached: CacheMeta | undefined, now: number, maxAgeMs: number): boolean {
  return cached !== undefined && now - cached.savedAt <= maxAgeMs;
}

/**
 * Decide the next step of a lookup. "fetch" is the only non-terminal outcome.
 */
export function resolveLookup({ cached, now, maxAgeMs, live }: LookupInput): LookupOutcome {
  if (live === undefined) {
    return isFresh(cached, now, maxAgeMs) ? "fresh" : "fetch";
  }
  if (live === "succeeded") return "live";
  return cached !== undefined ? "stale" : "empty";
}

export function hoursToMs(hours: number): number {
  return hours * 60 * 60 * 1000;
}
