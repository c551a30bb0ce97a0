/**
 * Process configuration, read once from the environment and threaded into each component
 */

export interface AppConfig {
  readonly oddsApiBase: string;
  readonly oddsApiKey: string | undefined;
  readonly sportKey: string;
  readonly bankroll: number;
  readonly halfKelly: boolean;
  readonly statsCacheHours: number;
  readonly skipLiveStats: boolean;
  readonly statsProxy: string | undefined;
  readonly season: string | undefined;
  readonly recentGames: number;
  readonly statsAttempts: number;
  readonly statsCacheDir: string;
  readonly injuriesFile: string;
  readonly modelPath: string;
  readonly teamsFile: string;
}

export const DEFAULT_CONFIG: AppConfig = Object.freeze({
  oddsApiBase: "https://api.the-odds-api.com/v4",
  oddsApiKey: undefined,
  sportKey: "basketball_nba",
  bankroll: 1000,
  halfKelly: true,
  statsCacheHours: 6,
  skipLiveStats: false,
  statsProxy: undefined,
  season: undefined,
  recentGames: 10,
  statsAttempts: 2,
  statsCacheDir: ".cache/nba",
  injuriesFile: "injuries.json",
  modelPath: "models/win_model.json",
  teamsFile: "data/nba-teams.json",
});

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseNumber(value: string | undefined, fallback: number): number {
  const raw = nonEmpty(value);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

/**
 * Build an immutable config from an environment map (process.env by default)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return Object.freeze({
    ...DEFAULT_CONFIG,
    oddsApiBase: nonEmpty(env.ODDS_API_BASE) ?? DEFAULT_CONFIG.oddsApiBase,
    oddsApiKey: nonEmpty(env.ODDS_API_KEY),
    bankroll: parseNumber(env.BANKROLL, DEFAULT_CONFIG.bankroll),
    halfKelly: (nonEmpty(env.HALF_KELLY) ?? "1") === "1",
    statsCacheHours: parseNumber(env.NBA_CACHE_HOURS, DEFAULT_CONFIG.statsCacheHours),
    skipLiveStats: env.SKIP_STATS === "1",
    statsProxy: nonEmpty(env.NBA_PROXY),
    season: nonEmpty(env.NBA_SEASON),
    statsCacheDir: nonEmpty(env.STATS_CACHE_DIR) ?? DEFAULT_CONFIG.statsCacheDir,
    injuriesFile: nonEmpty(env.INJURIES_FILE) ?? DEFAULT_CONFIG.injuriesFile,
    modelPath: nonEmpty(env.WIN_MODEL_PATH) ?? DEFAULT_CONFIG.modelPath,
  });
}

/**
 * The odds API key is only needed by commands that fetch odds
 */
export function requireOddsApiKey(config: AppConfig): string {
  if (!config.oddsApiKey) {
    throw new Error("Missing env var: ODDS_API_KEY");
  }
  return config.oddsApiKey;
}
