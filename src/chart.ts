// Candlestick chart — pure text rendering of a time series.
//
// Layout (top to bottom):
//   title
//   axis label
//   `height` plot rows, price gutter on the left (high on top, low at bottom)
//   x axis
//   first and last date

import type { TimeSeries } from "./domain.ts";
import { fieldValue } from "./series.ts";

// --- Types ---

export interface ChartOptions {
  readonly title: string;
  readonly yAxisLabel?: string;
  readonly height?: number;
  readonly width?: number;
  readonly color?: boolean;
}

export interface Candle {
  readonly start: number;
  readonly end: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
}

const DEFAULT_HEIGHT = 12;
const DEFAULT_WIDTH = 60;

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const RESET = "\x1b[0m";

const BODY = "█";
const WICK = "│";

// --- Resampling ---

/** Merge consecutive bars so the series fits in `width` columns. A candle is
 *  null when its bars never carry a usable open, high, low and close. */
export function resampleCandles(
  series: TimeSeries,
  width: number,
): ReadonlyArray<Candle | null> {
  if (series.length === 0) return [];
  const size = Math.max(1, Math.ceil(series.length / Math.max(1, width)));
  const candles: Array<Candle | null> = [];

  for (let i = 0; i < series.length; i += size) {
    const chunk = series.slice(i, i + size);
    let open: number | undefined;
    let close: number | undefined;
    let high: number | undefined;
    let low: number | undefined;

    for (const bar of chunk) {
      const o = fieldValue(bar, "open");
      const h = fieldValue(bar, "high");
      const l = fieldValue(bar, "low");
      const c = fieldValue(bar, "close");
      if (open === undefined && o !== undefined) open = o;
      if (c !== undefined) close = c;
      if (h !== undefined && (high === undefined || h > high)) high = h;
      if (l !== undefined && (low === undefined || l < low)) low = l;
    }

    if (
      open === undefined ||
      close === undefined ||
      high === undefined ||
      low === undefined
    ) {
      candles.push(null);
      continue;
    }

    candles.push({
      start: chunk[0].date,
      end: chunk[chunk.length - 1].date,
      open,
      close,
      // Malformed rows can put open/close outside the reported range.
      high: Math.max(high, open, close),
      low: Math.min(low, open, close),
    });
  }

  return candles;
}

// --- Rendering ---

/** Render a candlestick chart. Returns no lines for an absent or empty
 *  series, or one without a single complete candle. */
export function renderCandlestickChart(
  series: TimeSeries | null | undefined,
  options: ChartOptions,
): ReadonlyArray<string> {
  if (series == null || series.length === 0) return [];

  const height = Math.max(2, options.height ?? DEFAULT_HEIGHT);
  const candles = resampleCandles(series, options.width ?? DEFAULT_WIDTH);
  const complete = candles.filter((c): c is Candle => c !== null);
  if (complete.length === 0) return [];

  const hi = Math.max(...complete.map((c) => c.high));
  const lo = Math.min(...complete.map((c) => c.low));
  const rowOf = (value: number): number =>
    hi === lo
      ? Math.floor((height - 1) / 2)
      : Math.round(((value - lo) / (hi - lo)) * (height - 1));

  const hiLabel = hi.toFixed(2);
  const loLabel = lo.toFixed(2);
  const gutter = Math.max(hiLabel.length, loLabel.length);

  const plot: string[] = [];
  for (let row = height - 1; row >= 0; row--) {
    const label = row === height - 1 ? hiLabel : row === 0 ? loLabel : "";
    const cells = candles
      .map((candle) => cellAt(candle, row, rowOf, options.color ?? false))
      .join("");
    plot.push(`${label.padStart(gutter)} ┤${cells}`);
  }

  const first = complete[0];
  const last = complete[complete.length - 1];

  return [
    options.title,
    options.yAxisLabel ?? "Price (AUD)",
    ...plot,
    `${" ".repeat(gutter)} └${"─".repeat(candles.length)}`,
    `${" ".repeat(gutter + 2)}${isoDate(first.start)} to ${isoDate(last.end)}`,
  ];
}

function cellAt(
  candle: Candle | null,
  row: number,
  rowOf: (value: number) => number,
  color: boolean,
): string {
  if (candle === null) return " ";

  const bodyTop = rowOf(Math.max(candle.open, candle.close));
  const bodyBottom = rowOf(Math.min(candle.open, candle.close));
  let mark = " ";
  if (row >= bodyBottom && row <= bodyTop) {
    mark = BODY;
  } else if (row >= rowOf(candle.low) && row <= rowOf(candle.high)) {
    mark = WICK;
  }

  if (!color || mark === " ") return mark;
  return `${candle.close >= candle.open ? GREEN : RED}${mark}${RESET}`;
}

function isoDate(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}
