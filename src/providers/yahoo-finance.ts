// Yahoo Finance — implementation of MarketData.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Config, Effect, Layer, Schema } from "effect";
import type { Bar, LookbackPeriod, TimeSeries } from "../domain.ts";
import {
  HttpError,
  MarketData,
  NetworkError,
  ParseError,
  SymbolNotFound,
} from "../market-data.ts";
import { normalizeSeries } from "../series.ts";

// --- Yahoo response schema ---

// Yahoo pads missing sessions with null inside the indicator arrays.
const Indicator = Schema.optional(Schema.Array(Schema.NullOr(Schema.Number)));

const YahooQuote = Schema.Struct({
  open: Indicator,
  high: Indicator,
  low: Indicator,
  close: Indicator,
  volume: Indicator,
});

const YahooResult = Schema.Struct({
  timestamp: Schema.optional(Schema.Array(Schema.Number)),
  indicators: Schema.optional(
    Schema.Struct({ quote: Schema.optional(Schema.Array(YahooQuote)) }),
  ),
});

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(YahooResult)),
    error: Schema.NullOr(
      Schema.Struct({
        description: Schema.optional(Schema.String),
      }),
    ),
  }),
});

type YahooChartResponseType = typeof YahooChartResponse.Type;

// --- Decode Yahoo response into TimeSeries ---

export function decodeYahooHistory(
  json: unknown,
  symbol: string,
): Effect.Effect<TimeSeries, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap((response) => interpretYahooHistory(response, symbol)),
  );
}

function interpretYahooHistory(
  response: YahooChartResponseType,
  symbol: string,
): Effect.Effect<TimeSeries, SymbolNotFound> {
  const { chart } = response;

  if (chart.error !== null) {
    return Effect.fail(new SymbolNotFound({ symbol }));
  }

  if (chart.result === null || chart.result.length === 0) {
    return Effect.fail(new SymbolNotFound({ symbol }));
  }

  const { timestamp, indicators } = chart.result[0];
  const quote = indicators?.quote?.[0];

  // A known symbol with nothing traded in the range comes back bare.
  if (timestamp === undefined || quote === undefined) {
    return Effect.succeed([]);
  }

  const bars: Bar[] = timestamp.map((seconds, i) => ({
    date: seconds * 1000,
    open: quote.open?.[i] ?? null,
    high: quote.high?.[i] ?? null,
    low: quote.low?.[i] ?? null,
    close: quote.close?.[i] ?? null,
    volume: quote.volume?.[i] ?? null,
  }));

  return Effect.succeed(normalizeSeries(bars));
}

// --- Yahoo Finance layer ---

const REQUEST_TIMEOUT = "10 seconds";

export function historyUrl(
  baseUrl: string,
  symbol: string,
  period: LookbackPeriod,
): string {
  const params = new URLSearchParams({ range: period, interval: "1d" });
  return `${baseUrl}/${encodeURIComponent(symbol)}?${params.toString()}`;
}

export const YahooFinanceLive = Layer.effect(
  MarketData,
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(
        HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
      ),
    );
    const baseUrl = yield* Config.string("YAHOO_BASE_URL").pipe(
      Config.withDefault("https://query1.finance.yahoo.com/v8/finance/chart"),
    );

    return MarketData.of({
      getHistory: (symbol: string, period: LookbackPeriod) =>
        Effect.gen(function* () {
          const response = yield* client.get(
            historyUrl(baseUrl, symbol, period),
          );
          const json = yield* response.json;
          return yield* decodeYahooHistory(json, symbol);
        }).pipe(
          Effect.catchTags({
            RequestError: (e) =>
              Effect.fail(new NetworkError({ message: e.message })),
            // Yahoo answers an unknown or delisted ticker with a 404.
            ResponseError: (e) =>
              e.reason !== "StatusCode"
                ? Effect.fail(
                    new ParseError({
                      message: `JSON parse failed: ${e.message}`,
                    }),
                  )
                : e.response.status === 404
                ? Effect.fail(new SymbolNotFound({ symbol }))
                : Effect.fail(new HttpError({ status: e.response.status })),
          }),
          Effect.timeoutFail({
            duration: REQUEST_TIMEOUT,
            onTimeout: () =>
              new NetworkError({ message: "Request timed out" }),
          }),
        ),
    });
  }),
);
