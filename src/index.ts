#!/usr/bin/env node
/**
 * Prop +EV scanner: compares fantasy-slip prop lines against sharp sportsbook
 * lines, removes the vig and alerts on even-money legs with positive EV.
 * Read-only; no bets are placed.
 */

import {
  breakEvenTableFrom,
  getConfigPath,
  loadConfig,
  parseConfig,
  scanContextFrom,
  type Config,
} from "./config/load_config";
import { parseCliArgs, USAGE, UsageError, type CliCommand } from "./cli/args";
import { InvalidOddsError } from "./errors";
import { formatReport, postToDiscord } from "./alerts/discord";
import { loadDemoSnapshot } from "./markets/demo";
import { fetchOddsSnapshot, OddsApiClient } from "./markets/odds_api";
import { derivePropsFromQuotes, loadPropsFile } from "./markets/prop_source";
import { formatManualCheck, formatRecommendationsText, formatScanSummary } from "./report/scan_report";
import { runScan, type ScanInput } from "./scan/engine";
import { manualCheck } from "./scan/manual";
import { FileAlertStore, InMemoryAlertStore, type AlertRecordStore } from "./state/alert_store";

type ScanCommand = Extract<CliCommand, { mode: "scan" }>;

function readConfig(): Config {
  let path: string;
  try {
    path = getConfigPath();
  } catch (e) {
    console.warn("[config] No config file found, using defaults.", e instanceof Error ? e.message : String(e));
    return parseConfig({});
  }
  console.log(`[config] Loaded ${path}`);
  return loadConfig(path);
}

function applyOverrides(config: Config, cmd: ScanCommand): Config {
  if (cmd.apiKey) config.odds_api.api_key = cmd.apiKey;
  if (cmd.webhook) config.alerts.webhook_url = cmd.webhook;
  if (cmd.sport) config.odds_api.sports = [cmd.sport];
  if (cmd.propsPath) config.props.path = cmd.propsPath;
  return config;
}

function runManual(overOdds: number, underOdds: number, config: Config): void {
  try {
    console.log(formatManualCheck(manualCheck(overOdds, underOdds, breakEvenTableFrom(config))));
  } catch (e) {
    if (!(e instanceof InvalidOddsError)) throw e;
    console.error(`[manual] ${e.message}`);
    console.error(USAGE);
    process.exitCode = 1;
  }
}

async function fetchLiveInput(config: Config, now: Date): Promise<ScanInput> {
  const client = new OddsApiClient({
    baseUrl: config.odds_api.base_url,
    apiKey: config.odds_api.api_key,
    regions: config.odds_api.regions,
    markets: config.odds_api.markets,
    bookmakers: config.odds_api.bookmakers,
    timeoutMs: config.odds_api.timeout_ms,
  });
  const snapshot = await fetchOddsSnapshot(client, config.odds_api.sports, {
    now,
    maxHoursUntilGame: config.scan.max_hours_until_game,
  });
  if (config.props.path) {
    return { props: loadPropsFile(config.props.path), quotes: snapshot.quotes };
  }
  const sharpBook = config.matching.priority_bookmaker ?? config.odds_api.bookmakers[0];
  const props = derivePropsFromQuotes(snapshot.quotes, snapshot.events, sharpBook);
  console.log(`[props] Derived ${props.length} props from ${sharpBook} lines`);
  return { props, quotes: snapshot.quotes };
}

async function runScanCommand(cmd: ScanCommand, config: Config): Promise<void> {
  const now = new Date();
  let demo = cmd.demo;
  if (!demo && !config.odds_api.api_key) {
    console.warn("[scan] No Odds API key (set ODDS_API_KEY or --api-key). Running in demo mode.");
    demo = true;
  }

  console.log(`[scan] ${demo ? "Demo" : "Live"} scan at ${now.toISOString()}`);
  let input: ScanInput;
  let store: AlertRecordStore;
  if (demo) {
    input = loadDemoSnapshot(now);
    store = new InMemoryAlertStore();
  } else {
    input = await fetchLiveInput(config, now);
    store = new FileAlertStore(config.store.path, {
      lockStaleMs: config.store.lock_stale_ms,
      lockRetries: config.store.lock_retries,
      lockRetryDelayMs: config.store.lock_retry_delay_ms,
    });
  }

  const { recommendations, summary } = await runScan(input, store, scanContextFrom(config), now);
  console.log(formatScanSummary(summary));

  const webhook = config.alerts.webhook_url;
  if (webhook && cmd.post) {
    const payload = formatReport(recommendations, {
      now,
      maxPerSection: config.scan.max_plays_per_section,
      optimalHours: config.scan.optimal_hours,
      sharpBook: config.matching.priority_bookmaker,
    });
    if (await postToDiscord(webhook, payload, config.alerts.timeout_ms)) return;
  } else if (!webhook) {
    console.log("[alerts] No Discord webhook set (DISCORD_WEBHOOK_URL or --webhook); printing results.");
  }
  console.log(formatRecommendationsText(recommendations));
}

async function main(): Promise<void> {
  let cmd: CliCommand;
  try {
    cmd = parseCliArgs(process.argv.slice(2));
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    console.error(`${e.message}\n${USAGE}`);
    process.exitCode = 1;
    return;
  }

  if (cmd.mode === "help") {
    console.log(USAGE);
    return;
  }
  const config = readConfig();
  if (cmd.mode === "manual") {
    runManual(cmd.overOdds, cmd.underOdds, config);
    return;
  }
  await runScanCommand(cmd, applyOverrides(config, cmd));
}

main().catch((e) => {
  console.error("[fatal]", e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
