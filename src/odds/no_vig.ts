import { InvalidOddsError } from "../errors";
import type { FairProbability } from "../types";
import { toProbability } from "./converter";

/**
 * Remove the bookmaker margin from a two-sided quotation.
 * Raw implied probabilities are normalized by their sum, so probA + probB = 1.
 * Negative vig (a sub-100% book) is normalized the same way.
 */
export function removeVig(oddsA: number, oddsB: number): FairProbability {
  const rawA = toProbability(oddsA);
  const rawB = toProbability(oddsB);
  const rawSum = rawA + rawB;
  if (!(rawSum > 0)) {
    throw new InvalidOddsError(oddsA, `implied probabilities sum to ${rawSum}`);
  }
  return {
    probA: rawA / rawSum,
    probB: rawB / rawSum,
    vig: rawSum - 1,
  };
}

