/**
 * Historical game results (games.csv) used to train the team-rating model
 */

import { readFileSync } from "fs";
import Papa from "papaparse";

export interface HistoricalGame {
  gameId: string;
  gameDate: string; // YYYY-MM-DD
  season: number | null;
  homeTeamId: number;
  awayTeamId: number;
  homePoints: number;
  awayPoints: number;
}

function toInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? Math.trunc(n) : undefined;
}

/**
 * Parse rows with GAME_DATE_EST, HOME_TEAM_ID, VISITOR_TEAM_ID, PTS_home, PTS_away
 * (GAME_ID and SEASON optional). Rows without both scores are future games and are skipped.
 */
export function parseGamesCsv(csvText: string): { games: HistoricalGame[]; skipped: number } {
  const result = Papa.parse<Record<string, string>>(csvText, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
    transformHeader: (h: string) => h.trim(),
  });

  const games: HistoricalGame[] = [];
  let skipped = 0;

  for (const row of result.data) {
    const gameDate = (row.GAME_DATE_EST ?? "").trim().slice(0, 10);
    const homeTeamId = toInt(row.HOME_TEAM_ID);
    const awayTeamId = toInt(row.VISITOR_TEAM_ID);
    const homePoints = toInt(row.PTS_home);
    const awayPoints = toInt(row.PTS_away);

    if (!gameDate || homeTeamId === undefined || awayTeamId === undefined || homePoints === undefined || awayPoints === undefined) {
      skipped++;
      continue;
    }

    games.push({
      gameId: row.GAME_ID?.trim() || `${gameDate}-${homeTeamId}-${awayTeamId}`,
      gameDate,
      season: toInt(row.SEASON) ?? null,
      homeTeamId,
      awayTeamId,
      homePoints,
      awayPoints,
    });
  }

  return { games, skipped };
}

/**
 * Read a games CSV from disk, oldest game first
 */
export function loadGamesCsv(path: string): { games: HistoricalGame[]; skipped: number } {
  const { games, skipped } = parseGamesCsv(readFileSync(path, "utf-8"));
  games.sort((a, b) => a.gameDate.localeCompare(b.gameDate) || a.gameId.localeCompare(b.gameId));
  return { games, skipped };
}
