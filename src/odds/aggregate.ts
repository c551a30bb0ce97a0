/**
 * Best-price reduction of bookmaker quotes into one record per game
 */

import type { Game, MarketKey, MarketSet, PricedLine } from "../models/types.js";
import { payoutPerDollar } from "../models/probability.js";
import type { OddsApiEvent, OddsApiOutcome } from "./types.js";

function isPrice(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value !== 0;
}

/**
 * Pick the price with the higher payout for the bettor. Ties keep the incumbent.
 */
export function chooseBetterPrice(current: number | undefined, candidate: number | undefined): number | undefined {
  if (!isPrice(candidate)) return current;
  if (current === undefined) return candidate;
  return payoutPerDollar(candidate) > payoutPerDollar(current) ? candidate : current;
}

/**
 * Same comparison as chooseBetterPrice; the winning quote's point travels with its price.
 */
export function chooseBetterLine(current: PricedLine, candidate: PricedLine): PricedLine {
  const better = chooseBetterPrice(current.price, candidate.price);
  if (better === current.price) return current;
  return { price: better, point: candidate.point };
}

export function emptyMarketSet(): MarketSet {
  return {
    h2h: { home: undefined, away: undefined },
    spreads: { home: {}, away: {} },
    totals: { over: {}, under: {} },
  };
}

/**
 * Home comes from the explicit field; away falls back to "the other name" of a two-team list.
 */
export function resolveTeams(event: OddsApiEvent): { home?: string; away?: string } {
  const home = event.home_team || event.homeTeam || undefined;
  let away = event.away_team || event.awayTeam || undefined;

  if (!away) {
    const teams = event.teams ?? [];
    if (home && teams.length === 2) {
      const other = teams[0] !== home ? teams[0] : teams[1];
      away = other !== home ? other : undefined;
    }
  }

  return { home, away };
}

function outcomeLine(outcome: OddsApiOutcome): PricedLine {
  return {
    price: isPrice(outcome.price) ? outcome.price : undefined,
    point: typeof outcome.point === "number" ? outcome.point : undefined,
  };
}

/**
 * Fold a single outcome into the running market set
 */
export function foldOutcome(
  markets: MarketSet,
  key: MarketKey,
  outcome: OddsApiOutcome,
  home: string,
  away: string,
): MarketSet {
  const name = outcome.name;

  switch (key) {
    case "h2h": {
      if (name === home) {
        return { ...markets, h2h: { ...markets.h2h, home: chooseBetterPrice(markets.h2h.home, outcome.price) } };
      }
      if (name === away) {
        return { ...markets, h2h: { ...markets.h2h, away: chooseBetterPrice(markets.h2h.away, outcome.price) } };
      }
      return markets;
    }
    case "spreads": {
      if (name === home) {
        return { ...markets, spreads: { ...markets.spreads, home: chooseBetterLine(markets.spreads.home, outcomeLine(outcome)) } };
      }
      if (name === away) {
        return { ...markets, spreads: { ...markets.spreads, away: chooseBetterLine(markets.spreads.away, outcomeLine(outcome)) } };
      }
      return markets;
    }
    case "totals": {
      const desc = (name ?? "").toLowerCase();
      if (desc.includes("over")) {
        return { ...markets, totals: { ...markets.totals, over: chooseBetterLine(markets.totals.over, outcomeLine(outcome)) } };
      }
      if (desc.includes("under")) {
        return { ...markets, totals: { ...markets.totals, under: chooseBetterLine(markets.totals.under, outcomeLine(outcome)) } };
      }
      return markets;
    }
  }
}

function isRequested(key: string | undefined, requested: ReadonlySet<string>): key is MarketKey {
  return key !== undefined && requested.has(key);
}

/**
 * Reduce every bookmaker's quotes for one event. Returns undefined when either team is missing.
 */
export function aggregateEvent(event: OddsApiEvent, markets: readonly MarketKey[]): Game | undefined {
  const { home, away } = resolveTeams(event);
  if (!home || !away) return undefined;

  const requested: ReadonlySet<string> = new Set(markets);

  const best = (event.bookmakers ?? []).reduce(
    (acc, bookmaker) =>
      (bookmaker.markets ?? []).reduce((inner, market) => {
        const key = market.key;
        if (!isRequested(key, requested)) return inner;
        return (market.outcomes ?? []).reduce((set, outcome) => foldOutcome(set, key, outcome, home, away), inner);
      }, acc),
    emptyMarketSet(),
  );

  return {
    id: event.id ?? `${away}@${home}`,
    commenceTime: event.commence_time,
    homeTeam: home,
    awayTeam: away,
    markets: best,
  };
}

/**
 * Aggregate a full odds payload; games without both team names are dropped
 */
export function aggregateEvents(events: OddsApiEvent[], markets: readonly MarketKey[]): Game[] {
  const games: Game[] = [];
  for (const event of events) {
    const game = aggregateEvent(event, markets);
    if (game) games.push(game);
  }
  return games;
}
