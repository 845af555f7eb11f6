// Pure domain types — no framework dependency, no I/O.

import type { Option } from "effect";

export interface Instrument {
  readonly name: string;
  readonly ticker: string;
}

export const LOOKBACK_PERIODS = ["1mo", "3mo", "6mo", "1y", "2y", "5y"] as const;

export type LookbackPeriod = (typeof LOOKBACK_PERIODS)[number];

export const DEFAULT_PERIOD: LookbackPeriod = "1y";

/** One trading day. Price and volume fields are missing when the provider
 *  sent a partial record. */
export interface Bar {
  readonly date: number; // epoch ms
  readonly open?: number | null;
  readonly high?: number | null;
  readonly low?: number | null;
  readonly close?: number | null;
  readonly volume?: number | null;
}

export type BarField = "open" | "high" | "low" | "close" | "volume";

/** Bars in strictly increasing date order. Empty when the provider has no data. */
export type TimeSeries = ReadonlyArray<Bar>;

export interface DisplayMetrics {
  readonly currentPrice: Option.Option<number>;
  readonly dailyChangePercent: Option.Option<number>;
  readonly volume: Option.Option<number>;
  readonly periodHigh: Option.Option<number>;
  readonly periodLow: Option.Option<number>;
}
