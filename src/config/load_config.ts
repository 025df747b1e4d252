import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { DEFAULT_BREAK_EVEN_TABLE } from "../strategy/slips";
import { buildAliasTable } from "../matching/names";
import type { MatchOptions } from "../matching/prop_matcher";
import type { ScanContext } from "../scan/engine";
import type { BreakEvenTable } from "../types";

function isValidTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const BreakEvenEntrySchema = z.object({
  type: z.string().min(1),
  legs: z.number().int().min(2),
  kind: z.enum(["power", "flex"]),
  breakEven: z.number().gt(0).lt(1),
  category: z.enum(["preferred", "normal", "discouraged"]),
  payoutMultiplier: z.number().positive(),
});

const BreakEvenTableSchema = z.object({
  version: z.string().min(1),
  entries: z.array(BreakEvenEntrySchema).min(1),
});

const ConfigSchema = z.object({
  odds_api: z
    .object({
      base_url: z.string().url().default("https://api.the-odds-api.com/v4"),
      api_key: z.string().default(""),
      regions: z.string().default("us"),
      sports: z
        .array(z.string())
        .default(["basketball_nba", "basketball_ncaab", "americanfootball_nfl", "americanfootball_ncaaf", "baseball_mlb", "icehockey_nhl"]),
      markets: z.array(z.string()).min(1).default(["player_points", "player_rebounds", "player_assists", "player_threes"]),
      bookmakers: z.array(z.string()).min(1).default(["fanduel"]),
      timeout_ms: z.number().int().positive().default(30_000),
    })
    .default({}),
  matching: z
    .object({
      /** Sharp reference book. null = no preference. */
      priority_bookmaker: z.string().nullable().default("fanduel"),
      default_tolerance: z.number().min(0).default(0.5),
      tolerance_by_stat: z.record(z.number().min(0)).default({}),
      max_edit_distance: z.number().int().min(0).max(2).default(2),
      /** alias -> canonical player name */
      aliases: z.record(z.string()).default({}),
    })
    .default({}),
  slips: z
    .object({
      break_even_table: BreakEvenTableSchema.default(DEFAULT_BREAK_EVEN_TABLE),
    })
    .default({}),
  filter: z
    .object({
      min_ev_percent: z.number().default(0),
      dedup_window_hours: z.number().positive().default(24),
      timezone: z.string().refine(isValidTimeZone, "unknown IANA time zone").default("America/New_York"),
    })
    .default({}),
  scan: z
    .object({
      max_hours_until_game: z.number().positive().default(12),
      optimal_hours: z.number().min(0).default(2),
      max_plays_per_section: z.number().int().positive().default(10),
    })
    .default({}),
  store: z
    .object({
      path: z.string().min(1).default("data/alert_records.json"),
      lock_stale_ms: z.number().int().positive().default(600_000),
      lock_retries: z.number().int().min(0).default(20),
      lock_retry_delay_ms: z.number().int().min(0).default(250),
    })
    .default({}),
  alerts: z
    .object({
      webhook_url: z.string().default(""),
      timeout_ms: z.number().int().positive().default(30_000),
    })
    .default({}),
  props: z
    .object({
      /** JSON file of slip-product props. null = derive props from the priority book. */
      path: z.string().nullable().default(null),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

function findConfigPath(): string {
  const cwd = process.cwd();
  const candidates = [
    join(cwd, "config.json"),
    join(cwd, "src", "config", "config.json"),
    join(cwd, "src", "config", "config.example.json"),
    join(__dirname, "config.json"),
    join(__dirname, "config.example.json"),
  ];
  for (const p of candidates) {
    if (existsSync(p)) return p;
  }
  throw new Error(
    `Config file not found. Copy src/config/config.example.json to config.json (in project root or src/config). Tried: ${candidates.join(", ")}`
  );
}

/** Returns the path to the config file that would be loaded (first existing from project root or src/config). */
export function getConfigPath(): string {
  return findConfigPath();
}

/**
 * Validate raw config data. Collaborator credentials come from the environment
 * when set there (ODDS_API_KEY, DISCORD_WEBHOOK_URL).
 */
export function parseConfig(data: unknown, env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues;
    const msg = issues.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
    throw new Error(`Config validation failed: ${msg}`);
  }
  const config = result.data;
  if (env.ODDS_API_KEY) config.odds_api.api_key = env.ODDS_API_KEY;
  if (env.DISCORD_WEBHOOK_URL) config.alerts.webhook_url = env.DISCORD_WEBHOOK_URL;
  return config;
}

export function loadConfig(configPath: string = findConfigPath()): Config {
  const raw = readFileSync(configPath, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid JSON in config at ${configPath}: ${String(e)}`);
  }
  return parseConfig(data);
}

export function matchOptionsFrom(config: Config): MatchOptions {
  return {
    priorityBookmaker: config.matching.priority_bookmaker,
    defaultTolerance: config.matching.default_tolerance,
    toleranceByStat: config.matching.tolerance_by_stat,
    aliases: buildAliasTable(config.matching.aliases),
    maxEditDistance: config.matching.max_edit_distance,
  };
}

export function breakEvenTableFrom(config: Config): BreakEvenTable {
  return config.slips.break_even_table;
}

export function scanContextFrom(config: Config): ScanContext {
  return {
    matchOptions: matchOptionsFrom(config),
    breakEvenTable: breakEvenTableFrom(config),
    filter: {
      minEvPercent: config.filter.min_ev_percent,
      dedupWindowHours: config.filter.dedup_window_hours,
      timeZone: config.filter.timezone,
      optimalHours: config.scan.optimal_hours,
    },
    maxHoursUntilGame: config.scan.max_hours_until_game,
  };
}
