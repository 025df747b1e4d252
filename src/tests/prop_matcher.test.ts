/**
 * Tests for prop-to-quote matching: tolerance, bookmaker preference, names.
 */
import { describe, it } from "node:test";
import assert from "node:assert";
import { match, type MatchOptions } from "../matching/prop_matcher";
import { buildAliasTable } from "../matching/names";
import type { MatchOutcome, MatchedProp, OddsQuote, Prop, QuoteSide } from "../types";

const T0 = Date.parse("2024-11-05T18:00:00.000Z");

function prop(overrides: Partial<Prop> = {}): Prop {
  return {
    player: "LeBron James",
    matchup: "Lakers vs Celtics",
    statCategory: "points",
    line: 25.5,
    gameStartTime: new Date(T0 + 2 * 60 * 60 * 1000),
    ...overrides,
  };
}

function quote(
  bookmaker: string,
  line: number,
  side: QuoteSide,
  americanOdds: number,
  extra: Partial<OddsQuote> = {}
): OddsQuote {
  return {
    bookmaker,
    statCategory: "points",
    player: "LeBron James",
    line,
    side,
    americanOdds,
    timestamp: new Date(T0),
    ...extra,
  };
}

function twoSided(bookmaker: string, line: number, over: number, under: number, extra: Partial<OddsQuote> = {}): OddsQuote[] {
  return [quote(bookmaker, line, "over", over, extra), quote(bookmaker, line, "under", under, extra)];
}

const options: MatchOptions = {
  priorityBookmaker: "fanduel",
  defaultTolerance: 0.5,
  toleranceByStat: { reception_yds: 1.0 },
  aliases: buildAliasTable({ "Nic Claxton": "Nicolas Claxton" }),
  maxEditDistance: 2,
};

function matched(outcome: MatchOutcome): MatchedProp {
  if (!outcome.matched) throw new Error(`expected a match, got: ${outcome.reason}`);
  return outcome.value;
}

function reason(outcome: MatchOutcome): string {
  if (outcome.matched) throw new Error("expected NoMatch");
  return outcome.reason;
}

describe("match", () => {
  it("matches a line within tolerance", () => {
    const m = matched(match(prop({ line: 25.0 }), twoSided("fanduel", 25.5, -145, 120), options));
    assert.strictEqual(m.bookmaker, "fanduel");
    assert.strictEqual(m.line, 25.5);
    assert.strictEqual(m.lineDelta, 0.5);
    assert.strictEqual(m.playerMatch, "exact");
    assert.deepStrictEqual(m.sides, ["over", "under"]);
    assert.deepStrictEqual(m.quotes.map((q) => q.americanOdds), [-145, 120]);
  });

  it("returns NoMatch when the line is outside tolerance", () => {
    const r = reason(match(prop({ line: 26.5 }), twoSided("fanduel", 25.5, -145, 120), options));
    assert.strictEqual(r, "fanduel: no line within 0.5");
  });

  it("uses the per-stat tolerance", () => {
    const quotes = twoSided("fanduel", 73.5, -135, 110, { statCategory: "reception_yds", player: "Tyreek Hill" });
    const m = matched(match(prop({ player: "Tyreek Hill", statCategory: "reception_yds", line: 72.5 }), quotes, options));
    assert.strictEqual(m.lineDelta, 1);
  });

  it("prefers the priority bookmaker over a closer line elsewhere", () => {
    const quotes = [...twoSided("draftkings", 25.0, -120, 100), ...twoSided("fanduel", 25.5, -145, 120)];
    const m = matched(match(prop({ line: 25.0 }), quotes, options));
    assert.strictEqual(m.bookmaker, "fanduel");
  });

  it("without a priority book takes the smaller line delta", () => {
    const quotes = [...twoSided("fanduel", 25.5, -145, 120), ...twoSided("draftkings", 25.0, -120, 100)];
    const m = matched(match(prop({ line: 25.0 }), quotes, { ...options, priorityBookmaker: null }));
    assert.strictEqual(m.bookmaker, "draftkings");
    assert.strictEqual(m.lineDelta, 0);
  });

  it("breaks an equal-delta tie by the most recent quote", () => {
    const later = { timestamp: new Date(T0 + 60_000) };
    const quotes = [...twoSided("fanduel", 25.5, -145, 120), ...twoSided("draftkings", 25.5, -130, 105, later)];
    const m = matched(match(prop(), quotes, { ...options, priorityBookmaker: null }));
    assert.strictEqual(m.bookmaker, "draftkings");
  });

  it("uses the most recent quote for the same line and side", () => {
    const quotes = [
      ...twoSided("fanduel", 25.5, -145, 120),
      quote("fanduel", 25.5, "over", -150, { timestamp: new Date(T0 + 60_000) }),
    ];
    const m = matched(match(prop(), quotes, options));
    assert.deepStrictEqual(m.quotes.map((q) => q.americanOdds), [-150, 120]);
  });

  it("matches through an alias", () => {
    const quotes = twoSided("fanduel", 8.5, -160, 130, { player: "Nicolas Claxton", statCategory: "rebounds" });
    const m = matched(match(prop({ player: "Nic Claxton", statCategory: "rebounds", line: 8.5 }), quotes, options));
    assert.strictEqual(m.playerMatch, "alias");
  });

  it("ignores fuzzy candidates when an exact name is quoted", () => {
    const quotes = [
      ...twoSided("fanduel", 2.5, -140, 115, { player: "Jaylen Williams" }),
      ...twoSided("fanduel", 2.5, -110, -110, { player: "Jalen Williams" }),
    ];
    const m = matched(match(prop({ player: "Jalen Williams", line: 2.5 }), quotes, options));
    assert.strictEqual(m.playerMatch, "exact");
    assert.deepStrictEqual(m.quotes.map((q) => q.player), ["Jalen Williams", "Jalen Williams"]);
  });

  it("returns NoMatch for an ambiguous fuzzy name", () => {
    const quotes = [
      ...twoSided("fanduel", 2.5, -140, 115, { player: "Jaylen Williams" }),
      ...twoSided("fanduel", 2.5, -110, -110, { player: "Jalen Williams" }),
    ];
    const r = reason(match(prop({ player: "Jalen Willams", line: 2.5 }), quotes, options));
    assert.strictEqual(r, "fanduel: ambiguous fuzzy player match");
  });

  it("requires both sides", () => {
    const r = reason(match(prop(), [quote("fanduel", 25.5, "over", -145)], options));
    assert.strictEqual(r, "fanduel: no two-sided quote");
  });

  it("requires the same stat category", () => {
    const quotes = twoSided("fanduel", 25.5, -145, 120, { statCategory: "rebounds" });
    assert.strictEqual(reason(match(prop(), quotes, options)), "no quotes for stat category");
  });

  it("reports an unknown player", () => {
    const quotes = twoSided("fanduel", 25.5, -145, 120, { player: "Jayson Tatum" });
    assert.strictEqual(reason(match(prop(), quotes, options)), "fanduel: player not found");
  });

  it("skips quotes from a different event", () => {
    const quotes = twoSided("fanduel", 25.5, -145, 120, { eventId: "evt-2" });
    assert.strictEqual(reason(match(prop({ eventId: "evt-1" }), quotes, options)), "no quotes for stat category");
    assert.ok(match(prop({ eventId: "evt-2" }), quotes, options).matched);
  });

  it("pairs favorite/underdog sides", () => {
    const quotes = [quote("fanduel", 0.5, "favorite", -150), quote("fanduel", 0.5, "underdog", 130)];
    const m = matched(match(prop({ line: 0.5 }), quotes, options));
    assert.deepStrictEqual(m.sides, ["favorite", "underdog"]);
  });
});
