// Time series normalization — pure, used by providers before handing bars out.

import type { Bar, BarField, TimeSeries } from "./domain.ts";

/** A usable price or volume: a finite, non-negative number. */
export function usableValue(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

/** Read `field` from a bar, or undefined when it is not usable. */
export function fieldValue(bar: Bar, field: BarField): number | undefined {
  const value = bar[field];
  return usableValue(value) ? value : undefined;
}

/** Drop bars without a finite date, sort by date, and keep the last bar for
 *  a repeated date. */
export function normalizeSeries(bars: ReadonlyArray<Bar>): TimeSeries {
  const byDate = new Map<number, Bar>();
  for (const bar of bars) {
    if (Number.isFinite(bar.date)) byDate.set(bar.date, bar);
  }
  return [...byDate.values()].sort((a, b) => a.date - b.date);
}
