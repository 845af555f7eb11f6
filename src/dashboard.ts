// Dashboard — loads one series per selected instrument and builds the view.
//
// Loading is the only effectful step. Each instrument ends in one of three
// outcomes, and buildDashboard turns the outcomes into a plain view model:
//   Loaded      → chart panel + summary row
//   Unavailable → skipped, warning notice
//   Failed      → skipped, error notice

import { Effect, Option } from "effect";
import type {
  DisplayMetrics,
  Instrument,
  LookbackPeriod,
  TimeSeries,
} from "./domain.ts";
import { describeError } from "./format.ts";
import { MarketData } from "./market-data.ts";
import { toDisplayMetrics } from "./metrics.ts";

// --- Outcomes ---

export type Loaded = {
  readonly _tag: "Loaded";
  readonly instrument: Instrument;
  readonly series: TimeSeries;
};
export type Unavailable = {
  readonly _tag: "Unavailable";
  readonly instrument: Instrument;
};
export type Failed = {
  readonly _tag: "Failed";
  readonly instrument: Instrument;
  readonly reason: string;
};

export type InstrumentOutcome = Loaded | Unavailable | Failed;

export const Loaded = (instrument: Instrument, series: TimeSeries): Loaded => ({
  _tag: "Loaded",
  instrument,
  series,
});

export const Unavailable = (instrument: Instrument): Unavailable => ({
  _tag: "Unavailable",
  instrument,
});

export const Failed = (instrument: Instrument, reason: string): Failed => ({
  _tag: "Failed",
  instrument,
  reason,
});

// --- View model ---

export interface Notice {
  readonly level: "warning" | "error";
  readonly message: string;
}

export interface InstrumentPanel {
  readonly instrument: Instrument;
  readonly series: TimeSeries;
  readonly metrics: DisplayMetrics;
}

export interface DashboardView {
  readonly panels: ReadonlyArray<InstrumentPanel>;
  readonly notices: ReadonlyArray<Notice>;
  /** Set when no selected instrument produced any data. */
  readonly emptyNotice: Option.Option<Notice>;
}

export const NO_DATA_MESSAGE = "No data available for the selected stocks.";

// --- Loading ---

/** Fetch one instrument. Never fails: provider errors, and defects raised
 *  inside the provider, become outcomes. */
export function loadInstrument(
  instrument: Instrument,
  period: LookbackPeriod,
): Effect.Effect<InstrumentOutcome, never, MarketData> {
  return Effect.gen(function* () {
    const api = yield* MarketData;
    return yield* api.getHistory(instrument.ticker, period).pipe(
      Effect.map((series): InstrumentOutcome =>
        series.length === 0 ? Unavailable(instrument) : Loaded(instrument, series),
      ),
      Effect.catchAll((error) =>
        Effect.succeed<InstrumentOutcome>(
          error._tag === "SymbolNotFound"
            ? Unavailable(instrument)
            : Failed(instrument, describeError(error)),
        ),
      ),
      Effect.catchAllDefect((defect) =>
        Effect.succeed<InstrumentOutcome>(
          Failed(
            instrument,
            defect instanceof Error ? defect.message : String(defect),
          ),
        ),
      ),
    );
  });
}

/** Load every selected instrument, one after another, and build the view. */
export function loadDashboard(
  selection: ReadonlyArray<Instrument>,
  period: LookbackPeriod,
): Effect.Effect<DashboardView, never, MarketData> {
  return Effect.forEach(selection, (instrument) =>
    loadInstrument(instrument, period),
  ).pipe(Effect.map(buildDashboard));
}

// --- View building ---

export function buildDashboard(
  outcomes: ReadonlyArray<InstrumentOutcome>,
): DashboardView {
  const panels: InstrumentPanel[] = [];
  const notices: Notice[] = [];

  for (const outcome of outcomes) {
    const { name, ticker } = outcome.instrument;
    switch (outcome._tag) {
      case "Loaded":
        panels.push({
          instrument: outcome.instrument,
          series: outcome.series,
          metrics: toDisplayMetrics(outcome.series),
        });
        break;
      case "Unavailable":
        notices.push({
          level: "warning",
          message: `No data available for ${name} (${ticker})`,
        });
        break;
      case "Failed":
        notices.push({
          level: "error",
          message: `Error loading ${name} (${ticker}): ${outcome.reason}`,
        });
        break;
    }
  }

  return {
    panels,
    notices,
    emptyNotice:
      panels.length === 0
        ? Option.some<Notice>({ level: "warning", message: NO_DATA_MESSAGE })
        : Option.none(),
  };
}
