/**
 * One scan: props + quote snapshot -> ranked recommendations.
 * Pure computation except for the alert store, which is locked, loaded once
 * and saved once. A scan that throws before the save commits nothing.
 */

import { AlertStoreError, InvalidOddsError } from "../errors";
import { match, type MatchOptions } from "../matching/prop_matcher";
import { removeVig } from "../odds/no_vig";
import { evaluate } from "../strategy/ev";
import { filterAndRank, hoursUntil, type FilterOptions, type FilterOutcome } from "../strategy/result_filter";
import { recommend } from "../strategy/slips";
import { AlertLedger, type AlertRecordStore } from "../state/alert_store";
import type { BreakEvenTable, EVResult, FairProbability, OddsQuote, Prop, Recommendation, ScanSummary } from "../types";

export interface ScanContext {
  matchOptions: MatchOptions;
  breakEvenTable: BreakEvenTable;
  filter: Omit<FilterOptions, "now">;
  maxHoursUntilGame: number;
}

export interface ScanInput {
  props: readonly Prop[];
  quotes: readonly OddsQuote[];
}

export interface EvaluatedProps {
  results: EVResult[];
  outOfWindow: number;
  matched: number;
  unmatched: number;
  invalidOdds: number;
}

export interface ScanResult {
  recommendations: Recommendation[];
  summary: ScanSummary;
}

function describeProp(prop: Prop): string {
  return `${prop.player} ${prop.statCategory} ${prop.line}`;
}

/**
 * Match, de-vig, evaluate and recommend every prop inside the game window.
 * Invalid odds skip the prop; an invalid probability is fatal.
 */
export function evaluateProps(
  props: readonly Prop[],
  quotes: readonly OddsQuote[],
  ctx: ScanContext,
  now: Date
): EvaluatedProps {
  const results: EVResult[] = [];
  let outOfWindow = 0;
  let matched = 0;
  let unmatched = 0;
  let invalidOdds = 0;

  for (const prop of props) {
    const hours = hoursUntil(prop.gameStartTime, now);
    if (hours < 0 || hours > ctx.maxHoursUntilGame) {
      outOfWindow++;
      continue;
    }

    const outcome = match(prop, quotes, ctx.matchOptions);
    if (!outcome.matched) {
      unmatched++;
      continue;
    }
    matched++;
    const m = outcome.value;

    let fair: FairProbability;
    try {
      fair = removeVig(m.quotes[0].americanOdds, m.quotes[1].americanOdds);
    } catch (e) {
      if (!(e instanceof InvalidOddsError)) throw e;
      invalidOdds++;
      console.warn(`[scan] Skipping ${describeProp(prop)} (${m.bookmaker}): ${e.message}`);
      continue;
    }

    const evaluation = evaluate(fair.probA, fair.probB, m.sides);
    const slips = recommend(evaluation.favoredProbability, ctx.breakEvenTable);
    results.push({ matched: m, fair, evaluation, slips });
  }

  if (unmatched > 0) {
    console.log(`[matcher] ${unmatched}/${props.length - outOfWindow} props had no sportsbook line within tolerance`);
  }
  return { results, outOfWindow, matched, unmatched, invalidOdds };
}

function summarize(
  input: ScanInput,
  evaluated: EvaluatedProps,
  outcome: FilterOutcome,
  storeMode: ScanSummary["storeMode"]
): ScanSummary {
  return {
    propsIn: input.props.length,
    quotesIn: input.quotes.length,
    outOfWindow: evaluated.outOfWindow,
    matched: evaluated.matched,
    unmatched: evaluated.unmatched,
    invalidOdds: evaluated.invalidOdds,
    belowMinEv: outcome.belowMinEv,
    noQualifyingSlip: outcome.noQualifyingSlip,
    suppressed: outcome.suppressed,
    recommended: outcome.recommendations.length,
    purgedRecords: outcome.purgedRecords,
    storeMode,
  };
}

/**
 * Full scan. Store failures (lock, read, write) degrade to no suppression
 * with a warning; recommendations are still produced.
 */
export async function runScan(
  input: ScanInput,
  store: AlertRecordStore,
  ctx: ScanContext,
  now: Date = new Date()
): Promise<ScanResult> {
  const evaluated = evaluateProps(input.props, input.quotes, ctx, now);
  const filterOptions: FilterOptions = { ...ctx.filter, now };

  const degraded = (e: AlertStoreError): ScanResult => {
    console.warn(`[store] degraded mode, repeat alerts not suppressed: ${e.message}`);
    const outcome = filterAndRank(evaluated.results, null, filterOptions);
    return { recommendations: outcome.recommendations, summary: summarize(input, evaluated, outcome, "degraded") };
  };

  try {
    return await store.withLock(async () => {
      let ledger: AlertLedger;
      try {
        ledger = new AlertLedger(store.load());
      } catch (e) {
        if (e instanceof AlertStoreError) return degraded(e);
        throw e;
      }

      const outcome = filterAndRank(evaluated.results, ledger, filterOptions);
      let storeMode: ScanSummary["storeMode"] = "normal";
      try {
        store.save(ledger.records());
      } catch (e) {
        if (!(e instanceof AlertStoreError)) throw e;
        storeMode = "degraded";
        console.warn(`[store] degraded mode, alert records not saved: ${e.message}`);
      }
      return { recommendations: outcome.recommendations, summary: summarize(input, evaluated, outcome, storeMode) };
    });
  } catch (e) {
    if (e instanceof AlertStoreError) return degraded(e);
    throw e;
  }
}
