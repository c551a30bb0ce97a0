#!/usr/bin/env node

/**
 * courtside CLI entry point
 */

import * as dotenv from "dotenv";
import { Command } from "commander";
import { loadConfig } from "./config/index.js";
import { cmdBoard, cmdModelTrain, cmdPicks, cmdWarmCache } from "./cli/commands.js";

dotenv.config();

function parseNumberOption(value: string, fallback: number): number {
  const n = Number(value);
  return Number.isFinite(n) ? n : fallback;
}

const config = loadConfig();
const program = new Command();

program
  .name("courtside")
  .description("NBA betting CLI: best-price odds, rolling team form, EV/Kelly ranking")
  .version("0.1.0");

program
  .command("picks")
  .description("Rank today's games by EV (or edge when no price exists)")
  .option("-n, --top <number>", "Show top N recommendations", "10")
  .option("--json", "Print recommendations as JSON", false)
  .action(async (options) => {
    await cmdPicks(config, parseInt(options.top, 10) || 10, Boolean(options.json));
  });

program
  .command("board")
  .description("Filtered picks with bankroll stake sizes (BANKROLL, HALF_KELLY)")
  .option("--min-ev <number>", "Minimum EV on the better side", "0")
  .option("--min-kelly <number>", "Minimum Kelly fraction on either side", "0")
  .option("--csv <path>", "Also write the board to a CSV file")
  .action(async (options) => {
    await cmdBoard(
      config,
      {
        minEv: parseNumberOption(options.minEv, 0),
        minKelly: parseNumberOption(options.minKelly, 0),
      },
      options.csv,
    );
  });

const cache = program.command("cache").description("Team stats cache commands");

cache
  .command("warm")
  .description("Fetch game logs for every team with listed odds")
  .action(async () => {
    await cmdWarmCache(config);
  });

const model = program.command("model").description("Win-probability model commands");

model
  .command("train")
  .description("Train the team-rating model from a games CSV (GAME_DATE_EST, HOME_TEAM_ID, VISITOR_TEAM_ID, PTS_home, PTS_away)")
  .requiredOption("-f, --file <path>", "Path to games CSV")
  .option("--iterations <number>", "Gradient descent iterations", "500")
  .option("--lambda <number>", "L2 regularization strength", "0.01")
  .action((options) => {
    cmdModelTrain(config, options.file, {
      iterations: parseNumberOption(options.iterations, 500),
      lambda: parseNumberOption(options.lambda, 0.01),
    });
  });

await program.parseAsync();
