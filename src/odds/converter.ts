import { InvalidOddsError } from "../errors";

/**
 * Reject anything that is not a signed American quotation: non-integers,
 * zero, and magnitudes below 100 (e.g. -50 or +99).
 */
export function assertAmericanOdds(odds: number): void {
  if (!Number.isInteger(odds)) {
    throw new InvalidOddsError(odds, "must be an integer");
  }
  if (odds === 0) {
    throw new InvalidOddsError(odds, "zero is not a quotation");
  }
  if (Math.abs(odds) < 100) {
    throw new InvalidOddsError(odds, "magnitude must be at least 100");
  }
}

/**
 * Implied probability of a single American quotation, in (0, 1).
 * Negative (favorite): |odds| / (|odds| + 100). Positive (underdog): 100 / (odds + 100).
 */
export function toProbability(odds: number): number {
  assertAmericanOdds(odds);
  if (odds < 0) {
    const risk = Math.abs(odds);
    return risk / (risk + 100);
  }
  return 100 / (odds + 100);
}

/**
 * Probability back to American odds, rounded. 0 when p is not in (0, 1).
 */
export function probabilityToAmerican(probability: number): number {
  if (!(probability > 0 && probability < 1)) return 0;
  if (probability >= 0.5) {
    return -Math.round((100 * probability) / (1 - probability));
  }
  return Math.round((100 * (1 - probability)) / probability);
}

/** "+110" / "-118" for display. */
export function formatAmerican(odds: number): string {
  return odds > 0 ? `+${odds}` : String(odds);
}
