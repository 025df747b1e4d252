/**
 * Slip-product props: from a JSON file, or mirrored from the sharp book's
 * two-sided lines when no prop feed is configured.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import type { OddsQuote, Prop } from "../types";
import type { GameEvent } from "./odds_api";

const PropRecordSchema = z.object({
  player: z.string().min(1),
  matchup: z.string().default(""),
  statCategory: z.string().min(1),
  line: z.number().finite(),
  gameStartTime: z.string().datetime({ offset: true }),
  sport: z.string().optional(),
  eventId: z.string().optional(),
});

const PropFileSchema = z.array(PropRecordSchema);

export function parseProps(data: unknown): Prop[] {
  const result = PropFileSchema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
    throw new Error(`Prop list validation failed: ${msg}`);
  }
  return result.data.map((r) => ({ ...r, gameStartTime: new Date(r.gameStartTime) }));
}

export function loadPropsFile(path: string): Prop[] {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e) {
    throw new Error(`Cannot read props file ${path}: ${String(e)}`);
  }
  return parseProps(data);
}

export function matchupOf(ev: GameEvent): string {
  return `${ev.awayTeam} @ ${ev.homeTeam}`;
}

/**
 * One prop per (event, player, stat, line) the bookmaker quotes on both sides.
 * Quotes whose event is unknown are ignored.
 */
export function derivePropsFromQuotes(
  quotes: readonly OddsQuote[],
  events: readonly GameEvent[],
  bookmaker: string
): Prop[] {
  const eventsById = new Map(events.map((ev) => [ev.eventId, ev]));
  const sidesByKey = new Map<string, { quote: OddsQuote; sides: Set<string> }>();
  for (const q of quotes) {
    if (q.bookmaker !== bookmaker || !q.eventId) continue;
    const key = [q.eventId, q.player, q.statCategory, q.line].join("|");
    const entry = sidesByKey.get(key);
    if (entry) entry.sides.add(q.side);
    else sidesByKey.set(key, { quote: q, sides: new Set([q.side]) });
  }

  const props: Prop[] = [];
  for (const { quote, sides } of sidesByKey.values()) {
    if (!(sides.has("over") && sides.has("under"))) continue;
    const ev = quote.eventId ? eventsById.get(quote.eventId) : undefined;
    if (!ev) continue;
    props.push({
      player: quote.player,
      matchup: matchupOf(ev),
      statCategory: quote.statCategory,
      line: quote.line,
      gameStartTime: ev.commenceTime,
      sport: ev.sport,
      eventId: ev.eventId,
    });
  }
  return props;
}
