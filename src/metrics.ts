// Safe metrics — derived display values that degrade to None on missing data.
//
// Every function here is total: null, undefined, empty and partial series
// all produce a result. Option.none() is the "unavailable" marker.

import { Option } from "effect";
import type { BarField, DisplayMetrics, TimeSeries } from "./domain.ts";
import { fieldValue } from "./series.ts";

export type Extremum = "max" | "min";

type MaybeSeries = TimeSeries | null | undefined;

/** Value of `field` on the most recent bar. */
export function extractLatest(
  series: MaybeSeries,
  field: BarField,
): Option.Option<number> {
  if (series == null || series.length === 0) return Option.none();
  return Option.fromNullable(fieldValue(series[series.length - 1], field));
}

/** Close-to-close change of the last two bars, in percent, rounded to 2 decimals.
 *  None when there are fewer than two bars, either close is unusable, or the
 *  previous close is zero. */
export function dailyChangePercent(series: MaybeSeries): Option.Option<number> {
  if (series == null || series.length < 2) return Option.none();

  const latest = fieldValue(series[series.length - 1], "close");
  const previous = fieldValue(series[series.length - 2], "close");
  if (latest === undefined || previous === undefined || previous === 0) {
    return Option.none();
  }

  return Option.some(roundTo2(((latest - previous) / previous) * 100));
}

/** Largest or smallest usable value of `field` across the whole series. */
export function periodExtremum(
  series: MaybeSeries,
  field: BarField,
  which: Extremum,
): Option.Option<number> {
  if (series == null) return Option.none();

  let best: number | undefined;
  for (const bar of series) {
    const value = fieldValue(bar, field);
    if (value === undefined) continue;
    if (
      best === undefined ||
      (which === "max" ? value > best : value < best)
    ) {
      best = value;
    }
  }
  return Option.fromNullable(best);
}

export function toDisplayMetrics(series: MaybeSeries): DisplayMetrics {
  return {
    currentPrice: extractLatest(series, "close"),
    dailyChangePercent: dailyChangePercent(series),
    volume: extractLatest(series, "volume"),
    periodHigh: periodExtremum(series, "high", "max"),
    periodLow: periodExtremum(series, "low", "min"),
  };
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}
