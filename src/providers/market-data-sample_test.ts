import { test } from "node:test";
import assert from "node:assert/strict";
import { Effect, Either } from "effect";
import { MarketData } from "../market-data.ts";
import {
  MarketDataSampleLive,
  SAMPLE_END,
  sampleHistory,
} from "./market-data-sample.ts";

function getHistory(ticker: string) {
  return Effect.runPromise(
    Effect.gen(function* () {
      const api = yield* MarketData;
      return yield* Effect.either(api.getHistory(ticker, "3mo"));
    }).pipe(Effect.provide(MarketDataSampleLive)),
  );
}

test("sampleHistory: one bar per trading day, ending on the last session", () => {
  const series = sampleHistory("BHP.AX", "3mo");
  assert.equal(series.length, 63);
  assert.equal(series[series.length - 1].date, SAMPLE_END);
  for (let i = 1; i < series.length; i++) {
    assert.equal(series[i].date > series[i - 1].date, true);
  }
});

test("sampleHistory: deterministic", () => {
  assert.deepEqual(sampleHistory("RIO.AX", "1y"), sampleHistory("RIO.AX", "1y"));
});

test("sampleHistory: skips weekends", () => {
  const days = sampleHistory("S32.AX", "1mo").map((b) => new Date(b.date).getUTCDay());
  assert.equal(days.includes(0), false);
  assert.equal(days.includes(6), false);
});

test("sampleHistory: high and low bracket open and close", () => {
  for (const bar of sampleHistory("PLS.AX", "6mo")) {
    const { open, high, low, close } = bar;
    if (open == null || high == null || low == null || close == null) {
      throw new Error("sample bars are complete");
    }
    assert.equal(high >= Math.max(open, close), true);
    assert.equal(low <= Math.min(open, close), true);
  }
});

test("MarketDataSampleLive: delisted ticker has an empty series", async () => {
  const result = await getHistory("NCM.AX");
  assert.equal(Either.isRight(result) && result.right.length, 0);
});

test("MarketDataSampleLive: ticker lookup ignores case", async () => {
  const result = await getHistory("bhp.ax");
  assert.equal(Either.isRight(result) && result.right.length === 63, true);
});

test("MarketDataSampleLive: unknown ticker is SymbolNotFound", async () => {
  const result = await getHistory("AAPL");
  assert.equal(Either.isLeft(result) && result.left._tag, "SymbolNotFound");
});
