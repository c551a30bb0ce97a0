/**
 * CLI command handlers
 */

import chalk from "chalk";
import { writeFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import type { AppConfig } from "../config/index.js";
import { loadGamesCsv } from "../data/games.js";
import { warmCache } from "../ingest/warm.js";
import { trainTeamRatingModel } from "../model/train.js";
import type { Recommendation } from "../models/types.js";
import { OddsClient } from "../odds/client.js";
import { runPipeline, type PipelineDeps } from "../pipeline/index.js";
import { TeamDirectory } from "../stats/teams.js";
import { boardToCsv, buildBoard, type BoardFilters } from "./board.js";
import { formatRecommendation } from "./format.js";
import { createFeatureCache, createPipelineDeps } from "./runtime.js";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

type DepsBuilder = (config: AppConfig) => PipelineDeps;

/**
 * Run the pipeline and print the top N recommendations
 */
export async function cmdPicks(
  config: AppConfig,
  top: number,
  asJson: boolean = false,
  buildDeps: DepsBuilder = createPipelineDeps,
): Promise<void> {
  let recs: Recommendation[];
  let modelName: string;
  try {
    const deps = buildDeps(config);
    modelName = deps.model.name;
    recs = await runPipeline(deps);
  } catch (err) {
    console.error(chalk.red("ERROR while running pipeline:"));
    console.error(err instanceof Error && err.stack ? err.stack : errorMessage(err));
    process.exit(1);
  }

  if (asJson) {
    console.log(JSON.stringify(recs.slice(0, top), null, 2));
    return;
  }

  console.log(chalk.dim(`model: ${modelName}`));
  console.log(chalk.bold(`total recommendations: ${recs.length}`));
  if (recs.length === 0) {
    console.log(chalk.yellow("No games returned (could be API limits, no NBA games at this time, or key issue)."));
    return;
  }

  for (const r of recs.slice(0, top)) {
    console.log("=".repeat(70));
    const [header, ...rest] = formatRecommendation(r);
    console.log(chalk.bold(header));
    for (const line of rest) {
      if (line.startsWith("RECOMMEND")) {
        const color = r.bestMetric !== undefined && r.bestMetric > 0 ? chalk.green : chalk.dim;
        console.log(color(line));
      } else {
        console.log(line);
      }
    }
  }
  console.log("=".repeat(70));
}

/**
 * Filtered board with stake sizes; optionally written to CSV
 */
export async function cmdBoard(
  config: AppConfig,
  filters: BoardFilters,
  csvPath?: string,
  buildDeps: DepsBuilder = createPipelineDeps,
): Promise<void> {
  let recs: Recommendation[];
  try {
    recs = await runPipeline(buildDeps(config));
  } catch (err) {
    console.error(chalk.red(`Error while running the prediction pipeline: ${errorMessage(err)}`));
    process.exit(1);
  }

  const rows = buildBoard(recs, filters, { bankroll: config.bankroll, halfKelly: config.halfKelly });
  console.log(chalk.bold.cyan(`\nTotal recommendations: ${rows.length}\n`));

  if (rows.length === 0) {
    console.log(chalk.yellow("No bets passed the filters. Try lowering min EV or min Kelly."));
    return;
  }

  console.log(chalk.dim(`Bankroll $${config.bankroll.toFixed(2)} | ${config.halfKelly ? "half" : "full"} Kelly\n`));
  for (const row of rows) {
    const value = row["Rec value"];
    const color = value === undefined ? chalk.white : value > 0 ? chalk.green : value < 0 ? chalk.red : chalk.white;
    console.log(color(`${row["Tip (ET)"]}  ${row.Away} @ ${row.Home}`));
    console.log(
      `  pick ${row["Recommended pick"]} by ${row["Rec metric"]}=${value ?? "n/a"}` +
        `  stake home $${row["Stake home ($)"].toFixed(2)} / away $${row["Stake away ($)"].toFixed(2)}`,
    );
  }

  if (csvPath) {
    mkdirSync(dirname(csvPath), { recursive: true });
    writeFileSync(csvPath, boardToCsv(rows), "utf-8");
    console.log(chalk.green(`\n✓ Wrote ${rows.length} rows to ${csvPath}`));
  }
}

/**
 * Fetch game logs for every team on today's slate so later runs hit the cache
 */
export async function cmdWarmCache(config: AppConfig): Promise<void> {
  try {
    const teams = TeamDirectory.fromFile(config.teamsFile);
    const summary = await warmCache(new OddsClient(config), createFeatureCache(config, teams), {
      lastN: config.recentGames,
    });
    console.log(`done. ok=${summary.ok} fail=${summary.fail} (some fails are normal; rerun once).`);
  } catch (err) {
    console.error(chalk.red(`Error warming cache: ${errorMessage(err)}`));
    process.exit(1);
  }
}

/**
 * Train the team-rating model straight from a games CSV and save the artifact
 */
export function cmdModelTrain(config: AppConfig, file: string, options: { iterations?: number; lambda?: number }): void {
  try {
    const { games, skipped } = loadGamesCsv(file);
    if (games.length === 0) {
      console.log(chalk.yellow(`No finished games in ${file}.`));
      return;
    }
    if (skipped > 0) {
      console.log(chalk.dim(`skipped ${skipped} rows without final scores`));
    }

    console.log(chalk.bold.cyan(`\nTraining team-rating model on ${games.length} games...\n`));
    const { artifact, metrics } = trainTeamRatingModel(games, options);

    if (metrics.validationAccuracy !== undefined && metrics.brierScore !== undefined) {
      console.log(chalk.green(`Validation accuracy: ${(metrics.validationAccuracy * 100).toFixed(1)}%`));
      console.log(chalk.cyan(`Brier score: ${metrics.brierScore.toFixed(4)} (lower is better, 0.25 = random)`));
    }

    mkdirSync(dirname(config.modelPath), { recursive: true });
    writeFileSync(config.modelPath, JSON.stringify(artifact, null, 2));
    console.log(chalk.green(`✓ Saved model to ${config.modelPath} (home edge ${artifact.intercept.toFixed(3)})`));
  } catch (err) {
    console.error(chalk.red(`Error training model: ${errorMessage(err)}`));
    process.exit(1);
  }
}
