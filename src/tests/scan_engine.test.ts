/**
 * End-to-end scan tests over in-process stores (no network, no disk).
 */
import { describe, it } from "node:test";
import assert from "node:assert";
import { runScan, type ScanInput } from "../scan/engine";
import { parseConfig, scanContextFrom } from "../config/load_config";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { FileAlertStore, InMemoryAlertStore, type AlertRecordStore } from "../state/alert_store";
import { AlertStoreError } from "../errors";
import type { AlertRecord, OddsQuote, Prop } from "../types";

const HOUR = 60 * 60 * 1000;
const NOW = new Date("2024-11-05T20:00:00.000Z");
const ctx = scanContextFrom(parseConfig({}, {}));

function lebron(hoursAhead = 1.5): Prop {
  return {
    player: "LeBron James",
    matchup: "Lakers vs Celtics",
    statCategory: "points",
    line: 25.5,
    gameStartTime: new Date(NOW.getTime() + hoursAhead * HOUR),
    sport: "basketball_nba",
  };
}

function quotes(over: number, under: number, bookmaker = "fanduel"): OddsQuote[] {
  const base = { bookmaker, statCategory: "points", player: "LeBron James", line: 25.5, timestamp: NOW };
  return [
    { ...base, side: "over", americanOdds: over },
    { ...base, side: "under", americanOdds: under },
  ];
}

class BrokenStore implements AlertRecordStore {
  saved: AlertRecord[] | null = null;

  constructor(private readonly failAt: "lock" | "load" | "save") {}

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    if (this.failAt === "lock") throw new AlertStoreError("test-store", "store is locked by another scan");
    return fn();
  }

  load(): AlertRecord[] {
    if (this.failAt === "load") throw new AlertStoreError("test-store", "cannot read alert store");
    return [];
  }

  save(records: AlertRecord[]): void {
    if (this.failAt === "save") throw new AlertStoreError("test-store", "cannot write alert store");
    this.saved = records;
  }
}

describe("runScan", () => {
  const input: ScanInput = { props: [lebron()], quotes: quotes(-145, 120) };

  it("recommends LeBron over 25.5 from -145/+120", async () => {
    const store = new InMemoryAlertStore();
    const { recommendations, summary } = await runScan(input, store, ctx, NOW);
    assert.strictEqual(recommendations.length, 1);
    const rec = recommendations[0];
    assert.strictEqual(rec.favoredSide, "over");
    assert.ok(Math.abs(rec.favoredProbability - 0.5656) < 0.0001, `p ${rec.favoredProbability}`);
    assert.ok(Math.abs(rec.ev - 13.12) < 0.01, `ev ${rec.ev}`);
    assert.deepStrictEqual(rec.qualifyingSlipTypes, ["5 Flex", "6 Flex", "4 Power"]);
    assert.strictEqual(rec.optimalWindow, true);
    assert.deepStrictEqual(summary, {
      propsIn: 1,
      quotesIn: 2,
      outOfWindow: 0,
      matched: 1,
      unmatched: 0,
      invalidOdds: 0,
      belowMinEv: 0,
      noQualifyingSlip: 0,
      suppressed: 0,
      recommended: 1,
      purgedRecords: 0,
      storeMode: "normal",
    });
    assert.strictEqual(store.saveCount, 1);
    assert.deepStrictEqual(store.load(), [
      { key: "lebron james|points|25.5|over|2024-11-05", lastAlertedAt: NOW.toISOString() },
    ]);
  });

  it("suppresses the same play on the next scan", async () => {
    const store = new InMemoryAlertStore();
    await runScan(input, store, ctx, NOW);
    const second = await runScan(input, store, ctx, new Date(NOW.getTime() + HOUR));
    assert.strictEqual(second.recommendations.length, 0);
    assert.strictEqual(second.summary.suppressed, 1);
  });

  it("skips props outside the game window", async () => {
    const props = [lebron(-0.5), lebron(12.5)];
    const { summary } = await runScan({ props, quotes: quotes(-145, 120) }, new InMemoryAlertStore(), ctx, NOW);
    assert.strictEqual(summary.outOfWindow, 2);
    assert.strictEqual(summary.matched, 0);
  });

  it("skips a prop with invalid odds and continues", async () => {
    const props = [lebron(), { ...lebron(), player: "Jayson Tatum" }];
    const tatum = quotes(-145, 120).map((q) => ({ ...q, player: "Jayson Tatum" }));
    const { recommendations, summary } = await runScan(
      { props, quotes: [...quotes(50, -110), ...tatum] },
      new InMemoryAlertStore(),
      ctx,
      NOW
    );
    assert.strictEqual(summary.invalidOdds, 1);
    assert.deepStrictEqual(recommendations.map((r) => r.prop.player), ["Jayson Tatum"]);
  });

  it("counts unmatched props", async () => {
    const { summary } = await runScan({ props: [lebron()], quotes: [] }, new InMemoryAlertStore(), ctx, NOW);
    assert.strictEqual(summary.unmatched, 1);
    assert.strictEqual(summary.recommended, 0);
  });

  it("handles an empty scan", async () => {
    const store = new InMemoryAlertStore();
    const { recommendations, summary } = await runScan({ props: [], quotes: [] }, store, ctx, NOW);
    assert.deepStrictEqual(recommendations, []);
    assert.strictEqual(summary.propsIn, 0);
    assert.strictEqual(store.saveCount, 1);
  });

  for (const failAt of ["lock", "load"] as const) {
    it(`degrades without suppression when the store fails to ${failAt}`, async () => {
      const { recommendations, summary } = await runScan(input, new BrokenStore(failAt), ctx, NOW);
      assert.strictEqual(summary.storeMode, "degraded");
      assert.strictEqual(recommendations.length, 1);
    });
  }

  it("degrades when the store directory cannot be created", async () => {
    const dir = mkdtempSync(join(tmpdir(), "scan-store-"));
    try {
      writeFileSync(join(dir, "blocker"), "", "utf-8");
      const store = new FileAlertStore(join(dir, "blocker", "sub", "alert_records.json"));
      const { recommendations, summary } = await runScan(input, store, ctx, NOW);
      assert.strictEqual(summary.storeMode, "degraded");
      assert.strictEqual(recommendations.length, 1);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("still returns recommendations when the save fails", async () => {
    const store = new BrokenStore("save");
    const { recommendations, summary } = await runScan(input, store, ctx, NOW);
    assert.strictEqual(summary.storeMode, "degraded");
    assert.strictEqual(recommendations.length, 1);
    assert.strictEqual(store.saved, null);
  });

  it("propagates errors that are not store failures", async () => {
    const store: AlertRecordStore = {
      withLock: async () => {
        throw new Error("unexpected");
      },
      load: () => [],
      save: () => undefined,
    };
    await assert.rejects(runScan(input, store, ctx, NOW), /unexpected/);
  });
});
