// Pure formatting functions — no I/O.

import { Option } from "effect";
import { MINING_STOCKS } from "./catalog.ts";
import { renderCandlestickChart } from "./chart.ts";
import type { DashboardView, InstrumentPanel, Notice } from "./dashboard.ts";
import type { DisplayMetrics, LookbackPeriod } from "./domain.ts";
import type { HttpError, MarketDataError } from "./market-data.ts";

// --- ANSI escape codes ---

const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Metric formatting ---

export const UNAVAILABLE = "N/A";

const volumeFormat = new Intl.NumberFormat("en-US", {
  maximumFractionDigits: 0,
});

export function formatCurrency(value: Option.Option<number>): string {
  return Option.match(value, {
    onNone: () => UNAVAILABLE,
    onSome: (v) => `$${v.toFixed(2)}`,
  });
}

export function formatPercent(value: Option.Option<number>): string {
  return Option.match(value, {
    onNone: () => UNAVAILABLE,
    onSome: (v) => `${v.toFixed(2)}%`,
  });
}

export function formatVolume(value: Option.Option<number>): string {
  return Option.match(value, {
    onNone: () => UNAVAILABLE,
    onSome: (v) => volumeFormat.format(Math.round(v)),
  });
}

export interface FormattedMetrics {
  readonly currentPrice: string;
  readonly dailyChangePercent: string;
  readonly volume: string;
  readonly periodHigh: string;
  readonly periodLow: string;
}

export function formatMetrics(metrics: DisplayMetrics): FormattedMetrics {
  return {
    currentPrice: formatCurrency(metrics.currentPrice),
    dailyChangePercent: formatPercent(metrics.dailyChangePercent),
    volume: formatVolume(metrics.volume),
    periodHigh: formatCurrency(metrics.periodHigh),
    periodLow: formatCurrency(metrics.periodLow),
  };
}

// --- Error description ---

/** One-line description of a provider error, for notices. */
export function describeError(error: MarketDataError): string {
  switch (error._tag) {
    case "NetworkError":
      return `Network error (${error.message})`;
    case "HttpError":
      return describeHttpError(error);
    case "SymbolNotFound":
      return `Symbol not found (${error.symbol})`;
    case "ParseError":
      return `Unexpected response (${error.message})`;
  }
}

function describeHttpError(error: HttpError): string {
  if (error.status === 404) return "Symbol not found";
  if (error.status === 429) return "Rate limited";
  if (error.status >= 500 && error.status < 600) {
    return `Server error (HTTP ${error.status})`;
  }
  return `HTTP ${error.status}`;
}

// --- Columns ---

/** Left-align cells into columns two spaces apart. */
export function alignColumns(
  rows: ReadonlyArray<ReadonlyArray<string>>,
): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, i) => cell.padEnd(widths[i]))
      .join("  ")
      .trimEnd(),
  );
}

// --- Dashboard ---

export const DASHBOARD_SECTIONS = ["charts", "summary", "all"] as const;

export type DashboardSection = (typeof DASHBOARD_SECTIONS)[number];

export interface DashboardFormatOptions {
  readonly period: LookbackPeriod;
  readonly section?: DashboardSection;
  readonly color?: boolean;
  readonly chartHeight?: number;
  readonly chartWidth?: number;
}

export const SUMMARY_COLUMNS = [
  "Company",
  "Ticker",
  "Current Price",
  "Daily Change %",
  "Volume",
  "Year High",
  "Year Low",
] as const;

/** One summary row per panel, in panel order. */
export function summaryRows(
  view: DashboardView,
): ReadonlyArray<ReadonlyArray<string>> {
  return view.panels.map(({ instrument, metrics }) => {
    const m = formatMetrics(metrics);
    return [
      instrument.name,
      instrument.ticker,
      m.currentPrice,
      m.dailyChangePercent,
      m.volume,
      m.periodHigh,
      m.periodLow,
    ];
  });
}

export function formatMetricTiles(metrics: DisplayMetrics): string[] {
  const m = formatMetrics(metrics);
  return alignColumns([
    ["Current Price", "Daily Change", "Volume", "Period High"],
    [m.currentPrice, m.dailyChangePercent, m.volume, m.periodHigh],
  ]);
}

export function formatNotice(notice: Notice, color = false): string {
  const icon = notice.level === "error" ? "✗" : "!";
  const line = `${icon} ${notice.message}`;
  if (!color) return line;
  return `${notice.level === "error" ? RED : YELLOW}${line}${RESET}`;
}

export function formatDashboard(
  view: DashboardView,
  options: DashboardFormatOptions,
): string {
  const section = options.section ?? "all";
  const color = options.color ?? false;
  const heading = (text: string) => (color ? `${BOLD}${text}${RESET}` : text);
  const dim = (text: string) => (color ? `${DIM}${text}${RESET}` : text);

  const lines: string[] = [
    heading("ASX Mining Stocks Tracker"),
    dim(`Lookback period: ${options.period}`),
    "",
    ...view.notices.map((n) => formatNotice(n, color)),
  ];
  if (view.notices.length > 0) lines.push("");

  if (section !== "summary") {
    lines.push(heading("== Charts =="), "");
    for (const panel of view.panels) {
      lines.push(...formatPanel(panel, options, color), "");
    }
  }

  if (section !== "charts") {
    lines.push(heading("== Summary =="), "");
    lines.push(...formatSummary(view, color), "");
  }

  return lines.join("\n");
}

function formatPanel(
  panel: InstrumentPanel,
  options: DashboardFormatOptions,
  color: boolean,
): string[] {
  return [
    ...renderCandlestickChart(panel.series, {
      title: `${panel.instrument.name} Stock Price`,
      height: options.chartHeight,
      width: options.chartWidth,
      color,
    }),
    "",
    ...formatMetricTiles(panel.metrics),
  ];
}

export function formatSummary(view: DashboardView, color = false): string[] {
  return Option.match(view.emptyNotice, {
    onSome: (notice) => [formatNotice(notice, color)],
    onNone: () => {
      const [header, ...rows] = alignColumns([
        SUMMARY_COLUMNS,
        ...summaryRows(view),
      ]);
      return [header, "─".repeat(header.length), ...rows];
    },
  });
}

export function formatUnknownStocks(unknown: ReadonlyArray<string>): string {
  return [
    `Unknown stock: ${unknown.join(", ")}`,
    "Choose from:",
    ...MINING_STOCKS.map((i) => `  ${i.name} (${i.ticker})`),
  ].join("\n");
}
