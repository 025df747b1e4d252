/**
 * Break-even table for even-money fantasy slips and the slip recommender.
 * The table is data: it is versioned, validated by the config schema and
 * passed in, so a threshold change never needs a code change.
 */

import type {
  BreakEvenEntry,
  BreakEvenTable,
  QualifyingSlip,
  SlipCategory,
  SlipRecommendation,
} from "../types";

export const DEFAULT_BREAK_EVEN_TABLE: BreakEvenTable = {
  version: "2024.1",
  entries: [
    { type: "2 Power", legs: 2, kind: "power", breakEven: 0.5774, category: "normal", payoutMultiplier: 2.0 },
    { type: "3 Power", legs: 3, kind: "power", breakEven: 0.5848, category: "discouraged", payoutMultiplier: 3.0 },
    { type: "3 Flex", legs: 3, kind: "flex", breakEven: 0.598, category: "discouraged", payoutMultiplier: 2.25 },
    { type: "4 Power", legs: 4, kind: "power", breakEven: 0.5623, category: "normal", payoutMultiplier: 5.0 },
    { type: "4 Flex", legs: 4, kind: "flex", breakEven: 0.5689, category: "normal", payoutMultiplier: 3.0 },
    { type: "5 Flex", legs: 5, kind: "flex", breakEven: 0.5434, category: "preferred", payoutMultiplier: 5.0 },
    { type: "6 Flex", legs: 6, kind: "flex", breakEven: 0.5434, category: "preferred", payoutMultiplier: 10.0 },
  ],
};

/** Static unit-size guidance shown with alerts. Not a bankroll model. */
export const UNIT_POLICY: ReadonlyArray<{ slips: string; units: string }> = [
  { slips: "5/6 Flex", units: "0.25-0.5 units per slip" },
  { slips: "3-man", units: "0.25-0.5 units per slip" },
  { slips: "3-man Power", units: "avoid" },
];

const CATEGORY_RANK: Record<SlipCategory, number> = {
  preferred: 0,
  normal: 1,
  discouraged: 2,
};

/** Display order. Stable, so equal break-evens keep table order. */
export function compareSlips(a: QualifyingSlip, b: QualifyingSlip): number {
  const tier = CATEGORY_RANK[a.category] - CATEGORY_RANK[b.category];
  if (tier !== 0) return tier;
  return a.breakEven - b.breakEven;
}

function toQualifying(entry: BreakEvenEntry): QualifyingSlip {
  return {
    type: entry.type,
    breakEven: entry.breakEven,
    category: entry.category,
    discouraged: entry.category === "discouraged",
  };
}

/**
 * All slip types whose break-even the favored probability meets (inclusive).
 * Compares the full-precision probability, never a rounded display value.
 * Empty result means skip the prop.
 */
export function recommend(
  favoredProbability: number,
  table: BreakEvenTable = DEFAULT_BREAK_EVEN_TABLE
): SlipRecommendation {
  const qualifying = table.entries
    .filter((e) => favoredProbability >= e.breakEven)
    .map(toQualifying)
    .sort(compareSlips);
  return {
    qualifying,
    discouraged: qualifying.some((s) => s.discouraged),
  };
}

/**
 * Short headline for alerts, e.g. "5/6 Flex" or "2-Man Power only". Names only
 * slip types that qualified. Expects display order.
 */
export function slipHeadline(types: readonly string[]): string {
  const set = new Set(types);
  if (set.has("5 Flex") || set.has("6 Flex")) return "5/6 Flex";
  if (set.has("4 Flex")) return "4+ Flex";
  if (types.length === 1 && set.has("2 Power")) return "2-Man Power only";
  if (types.length > 0) return types[0];
  return "Below threshold";
}
