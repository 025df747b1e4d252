/**
 * Offline snapshot for --demo and for runs without an Odds API key.
 * Game times are relative to `now` so the fixture never ages out of the window.
 */

import { z } from "zod";
import demoData from "../fixtures/demo.json";
import type { OddsQuote, Prop } from "../types";

const DemoSchema = z.object({
  props: z.array(
    z.object({
      player: z.string(),
      matchup: z.string(),
      sport: z.string().optional(),
      statCategory: z.string(),
      line: z.number(),
      hoursFromNow: z.number(),
    })
  ),
  quotes: z.array(
    z.object({
      bookmaker: z.string(),
      player: z.string(),
      statCategory: z.string(),
      line: z.number(),
      eventId: z.string().optional(),
      over: z.number(),
      under: z.number(),
    })
  ),
});

export interface DemoSnapshot {
  props: Prop[];
  quotes: OddsQuote[];
}

export function loadDemoSnapshot(now: Date = new Date(), data: unknown = demoData): DemoSnapshot {
  const demo = DemoSchema.parse(data);
  const props: Prop[] = demo.props.map(({ hoursFromNow, ...p }) => ({
    ...p,
    gameStartTime: new Date(now.getTime() + hoursFromNow * 60 * 60 * 1000),
  }));
  const quotes: OddsQuote[] = demo.quotes.flatMap(({ over, under, ...q }) => [
    { ...q, side: "over" as const, americanOdds: over, timestamp: now },
    { ...q, side: "under" as const, americanOdds: under, timestamp: now },
  ]);
  return { props, quotes };
}
