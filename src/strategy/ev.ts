import { InvalidProbabilityError } from "../errors";
import { OVER_UNDER, type Evaluation, type SidePair } from "../types";

function assertProbability(p: number): void {
  if (!(p >= 0 && p <= 1)) {
    throw new InvalidProbabilityError(p);
  }
}

/**
 * Expected value of one even-money (1:1) leg, in percent.
 * EV = p * 1 - (1 - p) * 1 = 2p - 1.
 */
export function evPercent(probability: number): number {
  assertProbability(probability);
  return (2 * probability - 1) * 100;
}

/**
 * Pick the favored side of a de-vigged pair and its even-money EV.
 * Side A is favored only when strictly more likely; an exact tie goes to side B.
 */
export function evaluate(probA: number, probB: number, sides: SidePair = OVER_UNDER): Evaluation {
  assertProbability(probA);
  assertProbability(probB);
  const aFavored = probA > probB;
  const favoredProbability = aFavored ? probA : probB;
  return {
    favoredSide: aFavored ? sides[0] : sides[1],
    favoredProbability,
    ev: evPercent(favoredProbability),
  };
}
