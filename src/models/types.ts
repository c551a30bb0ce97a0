/**
 * Core types for courtside
 */

export type MarketKey = "h2h" | "spreads" | "totals";

export const ALL_MARKETS: readonly MarketKey[] = ["h2h", "spreads", "totals"];

export type TeamSide = "home" | "away";

export interface SidePair<T> {
  home: T;
  away: T;
}

/**
 * A price with the line it was quoted at. Both always come from the same bookmaker quote.
 */
export interface PricedLine {
  price?: number; // American odds
  point?: number; // spread or total line
}

export interface MarketSet {
  h2h: { home?: number; away?: number };
  spreads: { home: PricedLine; away: PricedLine };
  totals: { over: PricedLine; under: PricedLine };
}

export interface Game {
  id: string;
  commenceTime?: string; // ISO-8601 UTC as received
  homeTeam: string;
  awayTeam: string;
  markets: MarketSet;
}

export interface Team {
  id: number;
  fullName: string;
  abbreviation: string;
}

export type TeamFeatureName =
  | "ptsAvg"
  | "rebAvg"
  | "astAvg"
  | "stlAvg"
  | "blkAvg"
  | "tovAvg"
  | "fgPctAvg"
  | "fg3PctAvg"
  | "ftPctAvg"
  | "plusMinusAvg"
  | "paceProxyAvg"
  | "lastGamePts"
  | "oppPtsAvg"
  | "homeRate"
  | "awayRate";

export type TeamFeatures = Record<TeamFeatureName, number>;

/**
 * Rolling statistics for one team. Empty when the team is unknown or no data was available.
 */
export type TeamFeatureSnapshot = Partial<TeamFeatures>;

/**
 * Game-log table as served by the stats endpoint (one result set).
 */
export interface GameLog {
  headers: string[];
  rowSet: Array<Array<string | number | null>>;
}

export interface FeatureRow {
  homeTeamId: number;
  awayTeamId: number;
}

export interface GameWithFeatures extends Game {
  homeFeatures: TeamFeatureSnapshot;
  awayFeatures: TeamFeatureSnapshot;
}

export interface ScoredGame {
  gameId: string;
  commenceTime?: string;
  tipOff?: string; // display time, America/New_York
  home: string;
  away: string;
  moneyline: SidePair<number | undefined>;
  spreads: MarketSet["spreads"];
  totals: MarketSet["totals"];
  features: SidePair<TeamFeatureSnapshot>;
  model: { homeWinProb: number; awayWinProb: number };
  marketImplied: SidePair<number | undefined>;
  edge: SidePair<number | undefined>;
  ev: SidePair<number | undefined>;
  kelly: SidePair<number | undefined>;
}

export type RankMetric = "EV" | "edge";

export interface Recommendation extends ScoredGame {
  bestSide: TeamSide;
  bestMetric: number | undefined;
  metricName: RankMetric;
}
