/**
 * Align a slip-product prop with a two-sided sportsbook quotation.
 * NoMatch is an expected outcome, returned as a value and counted by the scan.
 */

import {
  FAVORITE_UNDERDOG,
  OVER_UNDER,
  type MatchOutcome,
  type MatchedProp,
  type OddsQuote,
  type PlayerMatchLevel,
  type Prop,
  type QuoteSide,
  type SidePair,
} from "../types";
import { compareMatchLevel, matchPlayerName, normalizeName, type AliasTable } from "./names";

const LINE_EPSILON = 1e-9;

export interface MatchOptions {
  /** The sharp reference book; wins over any other valid match. */
  priorityBookmaker: string | null;
  defaultTolerance: number;
  toleranceByStat: Record<string, number>;
  aliases: AliasTable;
  maxEditDistance: number;
}

export function toleranceFor(statCategory: string, options: MatchOptions): number {
  return options.toleranceByStat[statCategory] ?? options.defaultTolerance;
}

interface Candidate extends MatchedProp {
  timestampMs: number;
}

function pairAt(bySide: Map<QuoteSide, OddsQuote>): { quotes: [OddsQuote, OddsQuote]; sides: SidePair } | null {
  for (const sides of [OVER_UNDER, FAVORITE_UNDERDOG]) {
    const a = bySide.get(sides[0]);
    const b = bySide.get(sides[1]);
    if (a && b) return { quotes: [a, b], sides };
  }
  return null;
}

/** Best pair from one bookmaker, using only quotes at the strongest name-match level. */
function bestInBook(
  prop: Prop,
  bookmaker: string,
  quotes: OddsQuote[],
  options: MatchOptions
): Candidate | { reason: string } {
  const levels = new Map<string, PlayerMatchLevel | null>();
  const leveled: Array<{ quote: OddsQuote; level: PlayerMatchLevel }> = [];
  for (const quote of quotes) {
    let level = levels.get(quote.player);
    if (level === undefined) {
      level = matchPlayerName(prop.player, quote.player, options);
      levels.set(quote.player, level);
    }
    if (level) leveled.push({ quote, level });
  }
  if (leveled.length === 0) return { reason: "player not found" };

  const best = leveled.reduce((acc, x) => (compareMatchLevel(x.level, acc) < 0 ? x.level : acc), leveled[0].level);
  const atBest = leveled.filter((x) => x.level === best).map((x) => x.quote);
  if (best === "fuzzy" && new Set(atBest.map((q) => normalizeName(q.player))).size > 1) {
    return { reason: "ambiguous fuzzy player match" };
  }

  const byLine = new Map<number, Map<QuoteSide, OddsQuote>>();
  for (const quote of atBest) {
    let bySide = byLine.get(quote.line);
    if (!bySide) {
      bySide = new Map();
      byLine.set(quote.line, bySide);
    }
    const existing = bySide.get(quote.side);
    if (!existing || quote.timestamp.getTime() > existing.timestamp.getTime()) {
      bySide.set(quote.side, quote);
    }
  }

  const tolerance = toleranceFor(prop.statCategory, options);
  let chosen: Candidate | null = null;
  let sawPair = false;
  for (const [line, bySide] of byLine) {
    const pair = pairAt(bySide);
    if (!pair) continue;
    sawPair = true;
    const lineDelta = Math.abs(line - prop.line);
    if (lineDelta > tolerance + LINE_EPSILON) continue;
    const timestampMs = Math.max(pair.quotes[0].timestamp.getTime(), pair.quotes[1].timestamp.getTime());
    const candidate: Candidate = {
      prop,
      bookmaker,
      line,
      lineDelta,
      playerMatch: best,
      quotes: pair.quotes,
      sides: pair.sides,
      timestampMs,
    };
    if (
      !chosen ||
      lineDelta < chosen.lineDelta ||
      (lineDelta === chosen.lineDelta && timestampMs > chosen.timestampMs)
    ) {
      chosen = candidate;
    }
  }
  if (chosen) return chosen;
  return { reason: sawPair ? `no line within ${tolerance}` : "no two-sided quote" };
}

function compareCandidates(a: Candidate, b: Candidate, priority: string | null): number {
  if (priority) {
    const pa = a.bookmaker === priority ? 0 : 1;
    const pb = b.bookmaker === priority ? 0 : 1;
    if (pa !== pb) return pa - pb;
  }
  if (a.lineDelta !== b.lineDelta) return a.lineDelta - b.lineDelta;
  return b.timestampMs - a.timestampMs;
}

/**
 * Match a prop against a quote snapshot. Stat category must match exactly; the
 * player goes through name normalization; the sportsbook line must be within
 * the stat's tolerance. Across bookmakers: priority book, then smaller line
 * delta, then most recent quote.
 */
export function match(prop: Prop, quotes: readonly OddsQuote[], options: MatchOptions): MatchOutcome {
  const byBook = new Map<string, OddsQuote[]>();
  for (const quote of quotes) {
    if (quote.statCategory !== prop.statCategory) continue;
    if (prop.eventId && quote.eventId && prop.eventId !== quote.eventId) continue;
    const list = byBook.get(quote.bookmaker);
    if (list) list.push(quote);
    else byBook.set(quote.bookmaker, [quote]);
  }
  if (byBook.size === 0) return { matched: false, reason: "no quotes for stat category" };

  const candidates: Candidate[] = [];
  const reasons: string[] = [];
  for (const [bookmaker, bookQuotes] of byBook) {
    const result = bestInBook(prop, bookmaker, bookQuotes, options);
    if ("reason" in result) reasons.push(`${bookmaker}: ${result.reason}`);
    else candidates.push(result);
  }
  if (candidates.length === 0) return { matched: false, reason: reasons.join("; ") };

  candidates.sort((a, b) => compareCandidates(a, b, options.priorityBookmaker));
  const { timestampMs: _ts, ...value } = candidates[0];
  return { matched: true, value };
}
