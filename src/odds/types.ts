/**
 * Wire types for The Odds API v4 (/sports/{sport}/odds)
 */

export interface OddsApiOutcome {
  name?: string;
  price?: number;
  point?: number;
}

export interface OddsApiMarket {
  key?: string;
  last_update?: string;
  outcomes?: OddsApiOutcome[];
}

export interface OddsApiBookmaker {
  key?: string;
  title?: string;
  last_update?: string;
  markets?: OddsApiMarket[];
}

export interface OddsApiEvent {
  id?: string;
  sport_key?: string;
  commence_time?: string;
  home_team?: string;
  away_team?: string;
  // older payloads
  homeTeam?: string;
  awayTeam?: string;
  teams?: string[];
  bookmakers?: OddsApiBookmaker[];
}
