/**
 * Score a game against the market: implied probability, edge, EV and Kelly per side
 */

import type { GameWithFeatures, ScoredGame, SidePair } from "../models/types.js";
import { americanToImplied, expectedValue, kellyFraction, roundTo } from "../models/probability.js";
import { toEastern } from "../util/dates.js";

interface SideScore {
  implied: number | undefined;
  edge: number | undefined;
  ev: number | undefined;
  kelly: number | undefined;
}

function round4(x: number | undefined): number | undefined {
  return x === undefined ? undefined : roundTo(x, 4);
}

/**
 * Full-precision metrics for one side; everything is undefined when there is no price
 */
export function scoreSide(probability: number, price: number | undefined): SideScore {
  const implied = americanToImplied(price);
  if (price === undefined || implied === undefined) {
    return { implied: undefined, edge: undefined, ev: undefined, kelly: undefined };
  }
  return {
    implied,
    edge: probability - implied,
    ev: expectedValue(probability, price),
    kelly: kellyFraction(probability, price),
  };
}

function pair<K extends keyof SideScore>(home: SideScore, away: SideScore, key: K): SidePair<number | undefined> {
  return { home: round4(home[key]), away: round4(away[key]) };
}

/**
 * @param pHome adjusted model probability that the home team wins
 */
export function scoreGame(game: GameWithFeatures, pHome: number): ScoredGame {
  const pAway = 1 - pHome;
  const homeMl = game.markets.h2h.home;
  const awayMl = game.markets.h2h.away;

  const home = scoreSide(pHome, homeMl);
  const away = scoreSide(pAway, awayMl);

  return {
    gameId: game.id,
    commenceTime: game.commenceTime,
    tipOff: toEastern(game.commenceTime),
    home: game.homeTeam,
    away: game.awayTeam,
    moneyline: { home: homeMl, away: awayMl },
    spreads: game.markets.spreads,
    totals: game.markets.totals,
    features: { home: game.homeFeatures, away: game.awayFeatures },
    model: { homeWinProb: roundTo(pHome, 4), awayWinProb: roundTo(pAway, 4) },
    marketImplied: pair(home, away, "implied"),
    edge: pair(home, away, "edge"),
    ev: pair(home, away, "ev"),
    kelly: pair(home, away, "kelly"),
  };
}
