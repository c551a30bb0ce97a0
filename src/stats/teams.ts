/**
 * Static team name -> TEAM_ID table
 */

import { readFileSync } from "fs";
import chalk from "chalk";
import type { Team } from "../models/types.js";

function isTeam(entry: unknown): entry is Team {
  return (
    typeof entry === "object" &&
    entry !== null &&
    "id" in entry &&
    typeof entry.id === "number" &&
    "fullName" in entry &&
    typeof entry.fullName === "string" &&
    "abbreviation" in entry &&
    typeof entry.abbreviation === "string"
  );
}

export class TeamDirectory {
  private readonly byName: Map<string, Team>;

  constructor(teams: readonly Team[]) {
    this.byName = new Map(teams.map((t) => [t.fullName, t]));
  }

  /**
   * Load the table from a JSON array of { id, fullName, abbreviation }
   */
  static fromFile(path: string): TeamDirectory {
    const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (!Array.isArray(raw)) {
      throw new Error(`Team table ${path} must be a JSON array`);
    }
    const entries: unknown[] = raw;
    return new TeamDirectory(entries.filter(isTeam));
  }

  get size(): number {
    return this.byName.size;
  }

  /**
   * Map an odds-feed team name (e.g. "New Orleans Pelicans") to its TEAM_ID
   */
  resolveId(teamName: string | undefined): number | undefined {
    if (!teamName) return undefined;
    const team = this.byName.get(teamName.trim());
    if (!team) {
      console.warn(chalk.yellow(`[teams] no TEAM_ID found for '${teamName}'`));
      return undefined;
    }
    return team.id;
  }
}
