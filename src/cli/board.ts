/**
 * Board view: EV/Kelly filters, dollar stake sizing and CSV export
 */

import Papa from "papaparse";
import type { Recommendation } from "../models/types.js";
import { roundTo } from "../models/probability.js";

export interface BoardFilters {
  minEv: number;
  minKelly: number;
}

export interface Staking {
  bankroll: number;
  halfKelly: boolean;
}

/**
 * Keep a game when its better EV clears minEv and its larger Kelly fraction clears minKelly
 */
export function passesFilters(rec: Recommendation, { minEv, minKelly }: BoardFilters): boolean {
  const evHome = rec.ev.home ?? -999;
  const evAway = rec.ev.away ?? -999;
  const kHome = rec.kelly.home ?? 0;
  const kAway = rec.kelly.away ?? 0;
  return Math.max(evHome, evAway) >= minEv && Math.max(kHome, kAway) >= minKelly;
}

/**
 * bankroll x kelly x (0.5 with half Kelly), rounded to cents
 */
export function stakeFor(kelly: number | undefined, { bankroll, halfKelly }: Staking): number {
  if (!bankroll) return 0;
  const factor = halfKelly ? 0.5 : 1.0;
  return roundTo(bankroll * (kelly ?? 0) * factor, 2);
}

export interface BoardRow {
  "Tip (ET)": string;
  Away: string;
  Home: string;
  "ML home": number | undefined;
  "ML away": number | undefined;
  "P(home)": number;
  "P(away)": number;
  "EV home": number | undefined;
  "EV away": number | undefined;
  "Kelly home": number | undefined;
  "Kelly away": number | undefined;
  "Stake home ($)": number;
  "Stake away ($)": number;
  "Recommended pick": string;
  "Rec metric": string;
  "Rec value": number | undefined;
}

export const BOARD_COLUMNS: ReadonlyArray<keyof BoardRow> = [
  "Tip (ET)",
  "Away",
  "Home",
  "ML home",
  "ML away",
  "P(home)",
  "P(away)",
  "EV home",
  "EV away",
  "Kelly home",
  "Kelly away",
  "Stake home ($)",
  "Stake away ($)",
  "Recommended pick",
  "Rec metric",
  "Rec value",
];

export function toBoardRow(rec: Recommendation, staking: Staking): BoardRow {
  return {
    "Tip (ET)": rec.tipOff ?? "",
    Away: rec.away,
    Home: rec.home,
    "ML home": rec.moneyline.home,
    "ML away": rec.moneyline.away,
    "P(home)": rec.model.homeWinProb,
    "P(away)": rec.model.awayWinProb,
    "EV home": rec.ev.home,
    "EV away": rec.ev.away,
    "Kelly home": rec.kelly.home,
    "Kelly away": rec.kelly.away,
    "Stake home ($)": stakeFor(rec.kelly.home, staking),
    "Stake away ($)": stakeFor(rec.kelly.away, staking),
    "Recommended pick": rec.bestSide === "home" ? `${rec.home} (HOME)` : `${rec.away} (AWAY)`,
    "Rec metric": rec.metricName,
    "Rec value": rec.bestMetric,
  };
}

export function buildBoard(recs: readonly Recommendation[], filters: BoardFilters, staking: Staking): BoardRow[] {
  return recs.filter((r) => passesFilters(r, filters)).map((r) => toBoardRow(r, staking));
}

/**
 * CSV with a fixed column order; missing values are empty cells
 */
export function boardToCsv(rows: readonly BoardRow[]): string {
  const data = rows.map((row) => BOARD_COLUMNS.map((col) => row[col] ?? ""));
  return Papa.unparse({ fields: [...BOARD_COLUMNS], data }, { newline: "\n" });
}
