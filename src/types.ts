/**
 * Shared types for the prop EV scanner (read-only, alerts only).
 */

/** Over/under for player props; favorite/underdog for two-way sides. */
export type QuoteSide = "over" | "under" | "favorite" | "underdog";

/** The two sides of one market, in the order fair probabilities are reported. */
export type SidePair = readonly ["over", "under"] | readonly ["favorite", "underdog"];

export const OVER_UNDER: SidePair = ["over", "under"] as const;
export const FAVORITE_UNDERDOG: SidePair = ["favorite", "underdog"] as const;

/** One side of a sportsbook market, as fetched. */
export interface OddsQuote {
  readonly bookmaker: string;
  readonly statCategory: string;
  readonly player: string;
  readonly line: number;
  readonly side: QuoteSide;
  /** Signed American odds; validated by the converter, not here. */
  readonly americanOdds: number;
  readonly timestamp: Date;
  readonly eventId?: string;
}

/** A slip-product prop. */
export interface Prop {
  readonly player: string;
  readonly matchup: string;
  readonly statCategory: string;
  readonly line: number;
  readonly gameStartTime: Date;
  readonly sport?: string;
  readonly eventId?: string;
}

export type PlayerMatchLevel = "exact" | "alias" | "fuzzy";

export interface MatchedProp {
  prop: Prop;
  bookmaker: string;
  /** Sportsbook line both quotes share. */
  line: number;
  lineDelta: number;
  playerMatch: PlayerMatchLevel;
  /** [sideA, sideB], ordered as `sides`. */
  quotes: readonly [OddsQuote, OddsQuote];
  sides: SidePair;
}

export type MatchOutcome =
  | { matched: true; value: MatchedProp }
  | { matched: false; reason: string };

export interface FairProbability {
  probA: number;
  probB: number;
  /** Sum of raw implied probabilities minus 1. */
  vig: number;
}

export interface Evaluation {
  favoredSide: QuoteSide;
  favoredProbability: number;
  /** Expected value in percent, even-money payout (0.565 -> 13.0). */
  ev: number;
}

export type SlipCategory = "preferred" | "normal" | "discouraged";

export interface BreakEvenEntry {
  type: string;
  legs: number;
  kind: "power" | "flex";
  breakEven: number;
  category: SlipCategory;
  payoutMultiplier: number;
}

export interface BreakEvenTable {
  version: string;
  entries: BreakEvenEntry[];
}

export interface QualifyingSlip {
  type: string;
  breakEven: number;
  category: SlipCategory;
  discouraged: boolean;
}

export interface SlipRecommendation {
  /** Display order: preferred > normal > discouraged, lower break-even first. */
  qualifying: QualifyingSlip[];
  /** True when any qualifying slip type is marked discouraged. */
  discouraged: boolean;
}

export interface EVResult {
  matched: MatchedProp;
  fair: FairProbability;
  evaluation: Evaluation;
  slips: SlipRecommendation;
}

export interface AlertRecord {
  key: string;
  lastAlertedAt: string;
}

/** Ranked output handed to alert delivery. */
export interface Recommendation {
  prop: Prop;
  bookmaker: string;
  line: number;
  lineDelta: number;
  favoredSide: QuoteSide;
  favoredProbability: number;
  fair: FairProbability;
  ev: number;
  qualifyingSlipTypes: string[];
  discouragedFlags: boolean[];
  discouraged: boolean;
  hoursUntilGame: number;
  optimalWindow: boolean;
  dedupKey: string;
}

export interface ScanSummary {
  propsIn: number;
  quotesIn: number;
  outOfWindow: number;
  matched: number;
  unmatched: number;
  invalidOdds: number;
  belowMinEv: number;
  noQualifyingSlip: number;
  suppressed: number;
  recommended: number;
  purgedRecords: number;
  storeMode: "normal" | "degraded";
}
