// Tests for the dashboard shell:
// - loadInstrument: how provider results and errors become outcomes
// - loadDashboard: sequential loading and the all-unavailable notice
// - buildDashboard: panels, notices and metrics

import { test } from "node:test";
import assert from "node:assert/strict";
import { Effect, Layer, Option } from "effect";
import {
  buildDashboard,
  Failed,
  Loaded,
  loadDashboard,
  loadInstrument,
  NO_DATA_MESSAGE,
  Unavailable,
} from "./dashboard.ts";
import {
  HttpError,
  MarketData,
  NetworkError,
  SymbolNotFound,
  type MarketDataError,
} from "./market-data.ts";
import { DEFAULT_SELECTION } from "./catalog.ts";
import { MarketDataSampleLive } from "./providers/market-data-sample.ts";
import type { Instrument, LookbackPeriod, TimeSeries } from "./domain.ts";

// --- Helpers ---

const bhp: Instrument = { name: "BHP Group", ticker: "BHP.AX" };
const rio: Instrument = { name: "Rio Tinto", ticker: "RIO.AX" };
const fmg: Instrument = { name: "Fortescue Metals", ticker: "FMG.AX" };

const bars: TimeSeries = [
  { date: 1, open: 99, high: 102, low: 97, close: 100, volume: 5000 },
  { date: 2, open: 100, high: 111, low: 99, close: 110, volume: 6000 },
];

function marketData(
  getHistory: (
    ticker: string,
    period: LookbackPeriod,
  ) => Effect.Effect<TimeSeries, MarketDataError>,
) {
  return Layer.succeed(MarketData, MarketData.of({ getHistory }));
}

function run<A>(
  effect: Effect.Effect<A, never, MarketData>,
  layer: Layer.Layer<MarketData>,
): Promise<A> {
  return Effect.runPromise(Effect.provide(effect, layer));
}

// --- loadInstrument ---

test("loadInstrument: non-empty series is Loaded", async () => {
  const outcome = await run(
    loadInstrument(bhp, "1y"),
    marketData(() => Effect.succeed(bars)),
  );
  assert.deepEqual(outcome, Loaded(bhp, bars));
});

test("loadInstrument: empty series is Unavailable", async () => {
  const outcome = await run(
    loadInstrument(bhp, "1y"),
    marketData(() => Effect.succeed([])),
  );
  assert.deepEqual(outcome, Unavailable(bhp));
});

test("loadInstrument: SymbolNotFound is Unavailable", async () => {
  const outcome = await run(
    loadInstrument(bhp, "1y"),
    marketData((ticker) => Effect.fail(new SymbolNotFound({ symbol: ticker }))),
  );
  assert.deepEqual(outcome, Unavailable(bhp));
});

test("loadInstrument: provider faults are Failed with a description", async () => {
  const network = await run(
    loadInstrument(bhp, "1y"),
    marketData(() => Effect.fail(new NetworkError({ message: "offline" }))),
  );
  assert.deepEqual(network, Failed(bhp, "Network error (offline)"));

  const http = await run(
    loadInstrument(bhp, "1y"),
    marketData(() => Effect.fail(new HttpError({ status: 502 }))),
  );
  assert.deepEqual(http, Failed(bhp, "Server error (HTTP 502)"));
});

test("loadInstrument: a defect inside the provider is Failed", async () => {
  const outcome = await run(
    loadInstrument(bhp, "1y"),
    marketData(() => Effect.die(new Error("kaboom"))),
  );
  assert.deepEqual(outcome, Failed(bhp, "kaboom"));
});

test("loadInstrument: passes ticker and period through", async () => {
  const calls: string[] = [];
  await run(
    loadInstrument(rio, "6mo"),
    marketData((ticker, period) =>
      Effect.sync(() => {
        calls.push(`${ticker}:${period}`);
        return bars;
      }),
    ),
  );
  assert.deepEqual(calls, ["RIO.AX:6mo"]);
});

// --- loadDashboard ---

test("loadDashboard: fetches each instrument once, in selection order", async () => {
  const calls: string[] = [];
  const view = await run(
    loadDashboard([bhp, rio, fmg], "1mo"),
    marketData((ticker) =>
      Effect.sync(() => {
        calls.push(ticker);
        return ticker === "RIO.AX" ? [] : bars;
      }),
    ),
  );

  assert.deepEqual(calls, ["BHP.AX", "RIO.AX", "FMG.AX"]);
  assert.deepEqual(
    view.panels.map((p) => p.instrument.ticker),
    ["BHP.AX", "FMG.AX"],
  );
  assert.deepEqual(view.notices, [
    { level: "warning", message: "No data available for Rio Tinto (RIO.AX)" },
  ]);
  assert.equal(Option.isNone(view.emptyNotice), true);
});

test("loadDashboard: every instrument empty gives the no-data notice", async () => {
  const view = await run(
    loadDashboard([bhp, rio], "1y"),
    marketData(() => Effect.succeed([])),
  );

  assert.equal(view.panels.length, 0);
  assert.deepEqual(
    Option.getOrUndefined(view.emptyNotice),
    { level: "warning", message: NO_DATA_MESSAGE },
  );
});

test("loadDashboard: sample provider loads the default selection", async () => {
  const view = await run(loadDashboard(DEFAULT_SELECTION, "1mo"), MarketDataSampleLive);

  assert.deepEqual(
    view.panels.map((p) => p.instrument.name),
    ["BHP Group", "Rio Tinto", "Fortescue Metals"],
  );
  assert.deepEqual(view.panels.map((p) => p.series.length), [21, 21, 21]);
  assert.equal(view.notices.length, 0);
});

// --- buildDashboard ---

test("buildDashboard: panels carry metrics for their series", () => {
  const view = buildDashboard([Loaded(bhp, bars)]);
  const { metrics } = view.panels[0];

  assert.equal(Option.getOrUndefined(metrics.currentPrice), 110);
  assert.equal(Option.getOrUndefined(metrics.dailyChangePercent), 10);
  assert.equal(Option.getOrUndefined(metrics.volume), 6000);
  assert.equal(Option.getOrUndefined(metrics.periodHigh), 111);
  assert.equal(Option.getOrUndefined(metrics.periodLow), 97);
});

test("buildDashboard: notices keep outcome order", () => {
  const view = buildDashboard([
    Failed(bhp, "Rate limited"),
    Loaded(fmg, bars),
    Unavailable(rio),
  ]);

  assert.deepEqual(view.notices, [
    { level: "error", message: "Error loading BHP Group (BHP.AX): Rate limited" },
    { level: "warning", message: "No data available for Rio Tinto (RIO.AX)" },
  ]);
  assert.equal(view.panels.length, 1);
});

test("buildDashboard: no outcomes gives the no-data notice", () => {
  const view = buildDashboard([]);
  assert.equal(view.panels.length, 0);
  assert.equal(Option.isSome(view.emptyNotice), true);
});
