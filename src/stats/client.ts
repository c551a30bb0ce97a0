/**
 * stats.nba.com team game log client
 */

import { HttpsProxyAgent } from "https-proxy-agent";
import type { GameLog } from "../models/types.js";
import { buildUrl, defaultFetch, type FetchLike } from "../net/index.js";

const BASE_URL = "https://stats.nba.com/stats";
const REQUEST_TIMEOUT_MS = 20_000;

// Browser-like headers help avoid CDN blocks
const DEFAULT_HEADERS: Record<string, string> = {
  Host: "stats.nba.com",
  Connection: "keep-alive",
  Accept: "application/json, text/plain, */*",
  "x-nba-stats-token": "true",
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "x-nba-stats-origin": "stats",
  Referer: "https://www.nba.com/",
  "Accept-Language": "en-US,en;q=0.9",
  Origin: "https://www.nba.com",
};

type Cell = string | number | null;

function isCell(value: unknown): value is Cell {
  return value === null || typeof value === "string" || typeof value === "number";
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

function isRow(value: unknown): value is Cell[] {
  if (!Array.isArray(value)) return false;
  const cells: unknown[] = value;
  return cells.every(isCell);
}

/**
 * First result set of a stats response as a GameLog; undefined when the shape is wrong.
 * A response without any result set is an empty log.
 */
export function toGameLog(data: unknown): GameLog | undefined {
  if (typeof data !== "object" || data === null) return undefined;
  if (!("resultSets" in data) || data.resultSets === undefined) return { headers: [], rowSet: [] };
  if (!Array.isArray(data.resultSets)) return undefined;

  const resultSets: unknown[] = data.resultSets;
  const first = resultSets[0];
  if (first === undefined) return { headers: [], rowSet: [] };
  if (typeof first !== "object" || first === null) return undefined;

  const headers: unknown = "headers" in first ? first.headers : [];
  const rowSet: unknown = "rowSet" in first ? first.rowSet : [];
  if (!Array.isArray(headers) || !Array.isArray(rowSet)) return undefined;
  const headerCells: unknown[] = headers;
  const rows: unknown[] = rowSet;
  if (!headerCells.every(isString) || !rows.every(isRow)) return undefined;
  return { headers: headerCells, rowSet: rows };
}

export interface GameLogSource {
  fetchTeamGameLog(teamId: number, season?: string): Promise<GameLog>;
}

/**
 * Season label for a date, e.g. 2025-26. The season rolls over in October.
 */
export function currentSeason(date: Date = new Date()): string {
  const year = date.getFullYear();
  const start = date.getMonth() + 1 >= 10 ? year : year - 1;
  return `${start}-${String((start + 1) % 100).padStart(2, "0")}`;
}

export interface StatsClientOptions {
  proxy?: string;
  fetch?: FetchLike;
  timeoutMs?: number;
}

export class StatsClient implements GameLogSource {
  private readonly fetchImpl: FetchLike;
  private readonly agent: HttpsProxyAgent<string> | undefined;
  private readonly timeoutMs: number;

  constructor(options: StatsClientOptions = {}) {
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.agent = options.proxy ? new HttpsProxyAgent(options.proxy) : undefined;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async fetchTeamGameLog(teamId: number, season: string = currentSeason()): Promise<GameLog> {
    const url = buildUrl(BASE_URL, "/teamgamelog", {
      TeamID: teamId,
      Season: season,
      SeasonType: "Regular Season",
      LeagueID: "00",
    });

    const response = await this.fetchImpl(url, {
      headers: DEFAULT_HEADERS,
      agent: this.agent,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`NBA stats error: ${response.status} ${response.statusText}`);
    }

    const log = toGameLog(await response.json());
    if (!log) {
      throw new Error("NBA stats error: unexpected response shape");
    }
    return log;
  }
}
