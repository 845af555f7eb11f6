// MarketDataSample — generated history for development and tests.
//
// Deterministic: the same ticker and period always give the same bars.

import { Effect, Layer } from "effect";
import type { Bar, LookbackPeriod, TimeSeries } from "../domain.ts";
import { MarketData, SymbolNotFound } from "../market-data.ts";

// --- Sample data ---

const basePrices: Record<string, number> = {
  "BHP.AX": 42.5,
  "RIO.AX": 118.2,
  "FMG.AX": 19.8,
  "NST.AX": 15.6,
  "EVN.AX": 6.4,
  "MIN.AX": 38.9,
  "S32.AX": 3.2,
  "NCM.AX": 0, // delisted: known to the provider, no bars
  "PLS.AX": 1.6,
  "LYC.AX": 7.1,
};

const TRADING_DAYS: Record<LookbackPeriod, number> = {
  "1mo": 21,
  "3mo": 63,
  "6mo": 126,
  "1y": 252,
  "2y": 504,
  "5y": 1260,
};

/** Last session of every generated series. */
export const SAMPLE_END = Date.parse("2025-06-13T00:00:00Z");

const DAY_MS = 86_400_000;

/** Small LCG so the walk is reproducible without a seedable RNG. */
function makeRandom(seed: string): () => number {
  let state = 0;
  for (const ch of seed) state = (state * 31 + ch.charCodeAt(0)) >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
}

function tradingDays(count: number): number[] {
  const days: number[] = [];
  let day = SAMPLE_END;
  while (days.length < count) {
    const weekday = new Date(day).getUTCDay();
    if (weekday !== 0 && weekday !== 6) days.push(day);
    day -= DAY_MS;
  }
  return days.reverse();
}

export function sampleHistory(
  ticker: string,
  period: LookbackPeriod,
): TimeSeries {
  const base = basePrices[ticker] ?? 0;
  if (base === 0) return [];

  const random = makeRandom(`${ticker}:${period}`);
  let close = base;
  return tradingDays(TRADING_DAYS[period]).map((date): Bar => {
    const open = close;
    close = Math.max(0.01, open * (1 + (random() - 0.5) * 0.04));
    const high = Math.max(open, close) * (1 + random() * 0.01);
    const low = Math.min(open, close) * (1 - random() * 0.01);
    return {
      date,
      open: round2(open),
      high: round2(high),
      low: round2(low),
      close: round2(close),
      volume: Math.round(1_000_000 + random() * 9_000_000),
    };
  });
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// --- Sample layer ---

export const MarketDataSampleLive = Layer.succeed(
  MarketData,
  MarketData.of({
    getHistory: (ticker: string, period: LookbackPeriod) => {
      const symbol = ticker.toUpperCase();
      return symbol in basePrices
        ? Effect.succeed(sampleHistory(symbol, period))
        : Effect.fail(new SymbolNotFound({ symbol: ticker }));
    },
  }),
);
