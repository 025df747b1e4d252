/**
 * Single over/under check: both odds in, fair line and slip advice out.
 */

import { removeVig } from "../odds/no_vig";
import { evaluate, evPercent } from "../strategy/ev";
import { DEFAULT_BREAK_EVEN_TABLE, recommend } from "../strategy/slips";
import type { BreakEvenTable, Evaluation, FairProbability, SlipRecommendation } from "../types";

export interface ManualCheck {
  overOdds: number;
  underOdds: number;
  fair: FairProbability;
  overEv: number;
  underEv: number;
  evaluation: Evaluation;
  slips: SlipRecommendation;
}

/** Throws InvalidOddsError for either side. */
export function manualCheck(
  overOdds: number,
  underOdds: number,
  table: BreakEvenTable = DEFAULT_BREAK_EVEN_TABLE
): ManualCheck {
  const fair = removeVig(overOdds, underOdds);
  const evaluation = evaluate(fair.probA, fair.probB);
  return {
    overOdds,
    underOdds,
    fair,
    overEv: evPercent(fair.probA),
    underEv: evPercent(fair.probB),
    evaluation,
    slips: recommend(evaluation.favoredProbability, table),
  };
}
