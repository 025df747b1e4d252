/**
 * The Odds API v4 client (read-only). Lists events per sport, then pulls
 * player-prop markets per event and flattens outcomes into OddsQuote records.
 */

import { request } from "undici";
import type { OddsQuote, QuoteSide } from "../types";

/** Event shape (subset we use). */
interface OddsApiEvent {
  id?: string;
  sport_key?: string;
  commence_time?: string;
  home_team?: string;
  away_team?: string;
  bookmakers?: OddsApiBookmaker[];
  [k: string]: unknown;
}

interface OddsApiBookmaker {
  key?: string;
  title?: string;
  last_update?: string;
  markets?: OddsApiMarket[];
}

interface OddsApiMarket {
  key?: string;
  last_update?: string;
  outcomes?: OddsApiOutcome[];
}

interface OddsApiOutcome {
  /** "Over" / "Under" for props. */
  name?: string;
  /** Player name for props. */
  description?: string;
  price?: number;
  point?: number;
}

export interface GameEvent {
  eventId: string;
  sport: string;
  homeTeam: string;
  awayTeam: string;
  commenceTime: Date;
}

export interface OddsApiOptions {
  baseUrl: string;
  apiKey: string;
  regions: string;
  markets: string[];
  bookmakers: string[];
  timeoutMs: number;
}

export interface OddsSnapshot {
  events: GameEvent[];
  quotes: OddsQuote[];
}

/** "player_points" -> "points", "pitcher_strikeouts" -> "strikeouts". */
export function statCategoryFromMarket(marketKey: string): string {
  return marketKey.replace(/^(player|pitcher|batter)_/, "");
}

function parseSide(name: string | undefined): QuoteSide | null {
  const lower = (name ?? "").trim().toLowerCase();
  if (lower === "over" || lower === "under") return lower;
  return null;
}

function parseDate(value: string | undefined): Date | null {
  if (!value) return null;
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? null : d;
}

function toGameEvent(ev: OddsApiEvent, sport: string): GameEvent | null {
  const commenceTime = parseDate(ev.commence_time);
  if (!ev.id || !commenceTime) return null;
  return {
    eventId: ev.id,
    sport: ev.sport_key ?? sport,
    homeTeam: ev.home_team ?? "",
    awayTeam: ev.away_team ?? "",
    commenceTime,
  };
}

/**
 * Flatten one event-odds payload. Outcomes without a player, side, numeric
 * line or numeric price are dropped; odds validity is left to the converter.
 */
export function eventOddsToQuotes(ev: OddsApiEvent, fetchedAt: Date): OddsQuote[] {
  const quotes: OddsQuote[] = [];
  for (const book of ev.bookmakers ?? []) {
    if (!book.key) continue;
    for (const market of book.markets ?? []) {
      if (!market.key) continue;
      const statCategory = statCategoryFromMarket(market.key);
      const timestamp = parseDate(market.last_update) ?? parseDate(book.last_update) ?? fetchedAt;
      for (const outcome of market.outcomes ?? []) {
        const side = parseSide(outcome.name);
        const player = outcome.description?.trim();
        if (!side || !player) continue;
        if (typeof outcome.point !== "number" || typeof outcome.price !== "number") continue;
        quotes.push({
          bookmaker: book.key,
          statCategory,
          player,
          line: outcome.point,
          side,
          americanOdds: outcome.price,
          timestamp,
          eventId: ev.id,
        });
      }
    }
  }
  return quotes;
}

export class OddsApiClient {
  /** Last seen x-requests-remaining header. */
  requestsRemaining: string | null = null;

  constructor(private readonly options: OddsApiOptions) {}

  private url(path: string, params: Record<string, string>): string {
    const url = new URL(`${this.options.baseUrl.replace(/\/$/, "")}${path}`);
    url.searchParams.set("apiKey", this.options.apiKey);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
    return url.toString();
  }

  private async getJson(path: string, params: Record<string, string> = {}): Promise<unknown> {
    const { statusCode, headers, body } = await request(this.url(path, params), {
      method: "GET",
      headersTimeout: this.options.timeoutMs,
      bodyTimeout: this.options.timeoutMs,
    });
    const remaining = headers["x-requests-remaining"];
    if (typeof remaining === "string") this.requestsRemaining = remaining;
    if (statusCode !== 200) {
      await body.dump();
      throw new Error(`Odds API returned ${statusCode} for ${path}`);
    }
    return body.json();
  }

  async listEvents(sport: string): Promise<GameEvent[]> {
    const json = await this.getJson(`/sports/${encodeURIComponent(sport)}/events`);
    if (!Array.isArray(json)) return [];
    const events: GameEvent[] = [];
    for (const raw of json as OddsApiEvent[]) {
      const ev = toGameEvent(raw, sport);
      if (ev) events.push(ev);
    }
    return events;
  }

  async fetchEventQuotes(sport: string, eventId: string, fetchedAt: Date = new Date()): Promise<OddsQuote[]> {
    const json = await this.getJson(
      `/sports/${encodeURIComponent(sport)}/events/${encodeURIComponent(eventId)}/odds`,
      {
        regions: this.options.regions,
        markets: this.options.markets.join(","),
        bookmakers: this.options.bookmakers.join(","),
        oddsFormat: "american",
      }
    );
    if (!json || typeof json !== "object" || Array.isArray(json)) return [];
    return eventOddsToQuotes(json as OddsApiEvent, fetchedAt);
  }
}

/**
 * Fetch every sport's upcoming events (inside the game window) and their prop quotes.
 * Failures are logged and skipped; an empty snapshot is a valid result.
 */
export async function fetchOddsSnapshot(
  client: OddsApiClient,
  sports: string[],
  window: { now: Date; maxHoursUntilGame: number }
): Promise<OddsSnapshot> {
  const events: GameEvent[] = [];
  const quotes: OddsQuote[] = [];
  const maxMs = window.maxHoursUntilGame * 60 * 60 * 1000;

  for (const sport of sports) {
    let sportEvents: GameEvent[];
    try {
      sportEvents = await client.listEvents(sport);
    } catch (e) {
      console.warn(`[odds_api] Events fetch failed for ${sport}:`, e instanceof Error ? e.message : String(e));
      continue;
    }
    const upcoming = sportEvents.filter((ev) => {
      const ms = ev.commenceTime.getTime() - window.now.getTime();
      return ms >= 0 && ms <= maxMs;
    });
    console.log(`[odds_api] ${sport}: ${upcoming.length}/${sportEvents.length} events inside window`);

    for (const ev of upcoming) {
      try {
        const eventQuotes = await client.fetchEventQuotes(sport, ev.eventId, window.now);
        events.push(ev);
        quotes.push(...eventQuotes);
      } catch (e) {
        console.warn(`[odds_api] Odds fetch failed for ${sport}/${ev.eventId}:`, e instanceof Error ? e.message : String(e));
      }
    }
  }

  if (client.requestsRemaining != null) {
    console.log(`[odds_api] Requests remaining: ${client.requestsRemaining}`);
  }
  return { events, quotes };
}
