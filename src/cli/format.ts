/**
 * Plain-text rendering of recommendations
 */

import type { PricedLine, Recommendation, TeamFeatureSnapshot } from "../models/types.js";
import { formatAmericanOdds } from "../models/probability.js";

function fmt(value: number | undefined): string {
  return value === undefined ? "n/a" : String(value);
}

function fmtLine(line: PricedLine, signed: boolean = true): string {
  if (line.price === undefined) return "n/a";
  const sign = signed && line.point !== undefined && line.point > 0 ? "+" : "";
  const point = line.point === undefined ? "" : `${sign}${line.point} `;
  return `${point}(${formatAmericanOdds(line.price)})`;
}

function fmtForm(features: TeamFeatureSnapshot): string {
  if (features.ptsAvg === undefined) return "no data";
  return `pts ${features.ptsAvg.toFixed(1)}, opp ${(features.oppPtsAvg ?? 0).toFixed(1)}, last ${features.lastGamePts ?? 0}`;
}

export function formatRecommendation(r: Recommendation): string[] {
  return [
    `${r.away} at ${r.home}  tip=${r.tipOff ?? "n/a"}`,
    `moneyline: home=${formatAmericanOdds(r.moneyline.home)}  away=${formatAmericanOdds(r.moneyline.away)}`,
    `spreads:   home=${fmtLine(r.spreads.home)}  away=${fmtLine(r.spreads.away)}`,
    `totals:    over=${fmtLine(r.totals.over, false)}  under=${fmtLine(r.totals.under, false)}`,
    `form:      home ${fmtForm(r.features.home)} | away ${fmtForm(r.features.away)}`,
    `model:     home_win_prob=${r.model.homeWinProb.toFixed(3)}  away_win_prob=${r.model.awayWinProb.toFixed(3)}`,
    `implied:   home=${fmt(r.marketImplied.home)}  away=${fmt(r.marketImplied.away)}`,
    `edge:      home=${fmt(r.edge.home)}  away=${fmt(r.edge.away)}`,
    `EV:        home=${fmt(r.ev.home)}  away=${fmt(r.ev.away)}`,
    `KELLY:     home=${fmt(r.kelly.home)}  away=${fmt(r.kelly.away)}`,
    `RECOMMEND: bet_${r.bestSide}  by ${r.metricName}=${fmt(r.bestMetric)}`,
  ];
}
