/**
 * Tests for the EV cutoff, repeat-alert suppression and ranking.
 */
import { describe, it } from "node:test";
import assert from "node:assert";
import { filterAndRank, type FilterOptions } from "../strategy/result_filter";
import { AlertLedger } from "../state/alert_store";
import { evaluate } from "../strategy/ev";
import { recommend } from "../strategy/slips";
import { OVER_UNDER, type EVResult, type OddsQuote, type Prop } from "../types";

const HOUR = 60 * 60 * 1000;
const NOW = Date.parse("2024-11-05T20:00:00.000Z");

function result(player: string, overProbability: number, hoursAhead: number): EVResult {
  const prop: Prop = {
    player,
    matchup: "Lakers vs Celtics",
    statCategory: "points",
    line: 25.5,
    gameStartTime: new Date(NOW + hoursAhead * HOUR),
  };
  const q = (side: "over" | "under", americanOdds: number): OddsQuote => ({
    bookmaker: "fanduel",
    statCategory: "points",
    player,
    line: 25.5,
    side,
    americanOdds,
    timestamp: new Date(NOW),
  });
  const evaluation = evaluate(overProbability, 1 - overProbability);
  return {
    matched: {
      prop,
      bookmaker: "fanduel",
      line: 25.5,
      lineDelta: 0,
      playerMatch: "exact",
      quotes: [q("over", -145), q("under", 120)],
      sides: OVER_UNDER,
    },
    fair: { probA: overProbability, probB: 1 - overProbability, vig: 0.046 },
    evaluation,
    slips: recommend(evaluation.favoredProbability),
  };
}

function options(now: number = NOW): FilterOptions {
  return { now: new Date(now), minEvPercent: 0, dedupWindowHours: 24, timeZone: "America/New_York", optimalHours: 2 };
}

describe("filterAndRank", () => {
  it("drops results at or below the minimum EV", () => {
    const out = filterAndRank([result("A", 0.5, 1)], null, options());
    assert.strictEqual(out.belowMinEv, 1);
    assert.strictEqual(out.recommendations.length, 0);
  });

  it("drops results with no qualifying slip", () => {
    const out = filterAndRank([result("A", 0.53, 1)], null, options());
    assert.strictEqual(out.noQualifyingSlip, 1);
    assert.strictEqual(out.recommendations.length, 0);
  });

  it("ranks by EV, then by the sooner game", () => {
    const out = filterAndRank(
      [result("Later", 0.56, 3), result("Best", 0.58, 5), result("Sooner", 0.56, 1)],
      null,
      options()
    );
    assert.deepStrictEqual(out.recommendations.map((r) => r.prop.player), ["Best", "Sooner", "Later"]);
  });

  it("builds recommendations with slip types and window flag", () => {
    const [rec] = filterAndRank([result("LeBron James", 0.565, 1.5)], null, options()).recommendations;
    assert.strictEqual(rec.favoredSide, "over");
    assert.deepStrictEqual(rec.qualifyingSlipTypes, ["5 Flex", "6 Flex", "4 Power"]);
    assert.deepStrictEqual(rec.discouragedFlags, [false, false, false]);
    assert.strictEqual(rec.hoursUntilGame, 1.5);
    assert.strictEqual(rec.optimalWindow, true);
    assert.strictEqual(rec.dedupKey, "lebron james|points|25.5|over|2024-11-05");
  });

  it("flags plays outside the optimal window", () => {
    const [rec] = filterAndRank([result("A", 0.565, 3)], null, options()).recommendations;
    assert.strictEqual(rec.optimalWindow, false);
  });

  it("suppresses a repeat within the window and alerts again after it", () => {
    const ledger = new AlertLedger();
    const play = [result("LeBron James", 0.565, 6)];

    const first = filterAndRank(play, ledger, options());
    assert.strictEqual(first.recommendations.length, 1);
    assert.strictEqual(ledger.size, 1);

    const repeat = filterAndRank(play, ledger, options(NOW + 1 * HOUR));
    assert.strictEqual(repeat.recommendations.length, 0);
    assert.strictEqual(repeat.suppressed, 1);

    const atBoundary = filterAndRank(play, ledger, options(NOW + 24 * HOUR));
    assert.strictEqual(atBoundary.suppressed, 1);
    assert.strictEqual(atBoundary.purgedRecords, 0);

    const after = filterAndRank(play, ledger, options(NOW + 25 * HOUR));
    assert.strictEqual(after.purgedRecords, 1);
    assert.strictEqual(after.recommendations.length, 1);
  });

  it("does not record discarded results", () => {
    const ledger = new AlertLedger();
    filterAndRank([result("A", 0.5, 1), result("B", 0.53, 1)], ledger, options());
    assert.strictEqual(ledger.size, 0);
  });

  it("without a ledger never suppresses", () => {
    const play = [result("A", 0.565, 1)];
    assert.strictEqual(filterAndRank(play, null, options()).recommendations.length, 1);
    assert.strictEqual(filterAndRank(play, null, options()).recommendations.length, 1);
  });
});
