/**
 * Minimum-EV cutoff, repeat-alert suppression and ranking.
 * The ledger is mutated once per included result; discarded results never touch it.
 */

import { computeDedupKey } from "../dedup/keys";
import type { AlertLedger } from "../state/alert_store";
import type { EVResult, Recommendation } from "../types";

const HOUR_MS = 60 * 60 * 1000;

export interface FilterOptions {
  now: Date;
  /** Results with ev <= minEvPercent are dropped. */
  minEvPercent: number;
  dedupWindowHours: number;
  timeZone: string;
  optimalHours: number;
}

export interface FilterOutcome {
  recommendations: Recommendation[];
  belowMinEv: number;
  noQualifyingSlip: number;
  suppressed: number;
  purgedRecords: number;
}

export function hoursUntil(gameStart: Date, now: Date): number {
  return (gameStart.getTime() - now.getTime()) / HOUR_MS;
}

/** Descending EV, then the game that starts soonest. */
export function compareRecommendations(a: Recommendation, b: Recommendation): number {
  if (a.ev !== b.ev) return b.ev - a.ev;
  return a.hoursUntilGame - b.hoursUntilGame;
}

function toRecommendation(result: EVResult, dedupKey: string, options: FilterOptions): Recommendation {
  const { matched, evaluation, slips, fair } = result;
  const hoursUntilGame = hoursUntil(matched.prop.gameStartTime, options.now);
  return {
    prop: matched.prop,
    bookmaker: matched.bookmaker,
    line: matched.line,
    lineDelta: matched.lineDelta,
    favoredSide: evaluation.favoredSide,
    favoredProbability: evaluation.favoredProbability,
    fair,
    ev: evaluation.ev,
    qualifyingSlipTypes: slips.qualifying.map((s) => s.type),
    discouragedFlags: slips.qualifying.map((s) => s.discouraged),
    discouraged: slips.discouraged,
    hoursUntilGame,
    optimalWindow: hoursUntilGame <= options.optimalHours,
    dedupKey,
  };
}

/**
 * Pass `ledger = null` to run without suppression (degraded store).
 */
export function filterAndRank(
  results: readonly EVResult[],
  ledger: AlertLedger | null,
  options: FilterOptions
): FilterOutcome {
  const purgedRecords = ledger
    ? ledger.purgeOlderThan(new Date(options.now.getTime() - options.dedupWindowHours * HOUR_MS))
    : 0;

  const recommendations: Recommendation[] = [];
  let belowMinEv = 0;
  let noQualifyingSlip = 0;
  let suppressed = 0;

  for (const result of results) {
    if (result.evaluation.ev <= options.minEvPercent) {
      belowMinEv++;
      continue;
    }
    if (result.slips.qualifying.length === 0) {
      noQualifyingSlip++;
      continue;
    }
    const key = computeDedupKey(result.matched.prop, result.evaluation.favoredSide, options.timeZone);
    if (ledger) {
      if (ledger.has(key)) {
        suppressed++;
        continue;
      }
      ledger.upsert(key, options.now);
    }
    recommendations.push(toRecommendation(result, key, options));
  }

  recommendations.sort(compareRecommendations);
  return { recommendations, belowMinEv, noQualifyingSlip, suppressed, purgedRecords };
}
