/**
 * The Odds API client: fetch listed games and reduce them to best prices
 */

import type { Response } from "node-fetch";
import type { AppConfig } from "../config/index.js";
import { requireOddsApiKey } from "../config/index.js";
import { ALL_MARKETS, type Game, type MarketKey } from "../models/types.js";
import { buildUrl, defaultFetch, type FetchLike } from "../net/index.js";
import { aggregateEvents } from "./aggregate.js";
import type { OddsApiEvent } from "./types.js";

const REQUEST_TIMEOUT_MS = 30_000;

export class OddsApiError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "OddsApiError";
  }
}

export interface OddsClientOptions {
  fetch?: FetchLike;
  timeoutMs?: number;
}

export class OddsClient {
  private readonly base: string;
  private readonly apiKey: string;
  private readonly sportKey: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(config: AppConfig, options: OddsClientOptions = {}) {
    this.base = config.oddsApiBase;
    this.apiKey = requireOddsApiKey(config);
    this.sportKey = config.sportKey;
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  /**
   * Raw events for the configured sport. Any non-2xx response is fatal.
   */
  async fetchEvents(markets: readonly MarketKey[] = ALL_MARKETS): Promise<OddsApiEvent[]> {
    const url = buildUrl(this.base, `/sports/${this.sportKey}/odds`, {
      apiKey: this.apiKey,
      regions: "us",
      markets: markets.join(","),
      oddsFormat: "american",
      dateFormat: "iso",
    });

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new OddsApiError(`Odds API request failed: ${reason}`);
    }

    if (!response.ok) {
      throw new OddsApiError(`Odds API error: ${response.status} ${response.statusText}`, response.status);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new OddsApiError(`Odds API error: invalid JSON body: ${reason}`, response.status);
    }
    if (!Array.isArray(data)) {
      throw new OddsApiError("Odds API error: expected a list of games");
    }
    return data as OddsApiEvent[];
  }

  /**
   * Today's listed games with the best available price per side across books
   */
  async fetchGames(markets: readonly MarketKey[] = ALL_MARKETS): Promise<Game[]> {
    const events = await this.fetchEvents(markets);
    const games = aggregateEvents(events, markets);
    console.log(`Fetched ${events.length} events, ${games.length} with both teams`);
    return games;
  }
}
