/**
 * Error types raised by the scanner core and the alert store.
 */

/** Odds of zero or with magnitude below 100. Fails one calculation, not the scan. */
export class InvalidOddsError extends Error {
  readonly odds: number;

  constructor(odds: number, detail?: string) {
    super(`Invalid American odds ${odds}${detail ? `: ${detail}` : ""}`);
    this.name = "InvalidOddsError";
    this.odds = odds;
  }
}

/** A probability outside [0, 1] reached the evaluator. Always an upstream bug. */
export class InvalidProbabilityError extends Error {
  readonly probability: number;

  constructor(probability: number) {
    super(`Probability ${probability} is outside [0, 1]`);
    this.name = "InvalidProbabilityError";
    this.probability = probability;
  }
}

/** Alert store could not be locked, read or written. */
export class AlertStoreError extends Error {
  readonly storePath: string;

  constructor(storePath: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${storePath})`, options);
    this.name = "AlertStoreError";
    this.storePath = storePath;
  }
}
