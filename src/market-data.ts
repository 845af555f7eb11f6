// Market data — service definition and domain errors.

import { Context, Data, Effect } from "effect";
import type { LookbackPeriod, TimeSeries } from "./domain.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export type MarketDataError =
  | NetworkError
  | HttpError
  | ParseError
  | SymbolNotFound;

// --- Service ---

export class MarketData extends Context.Tag("MarketData")<
  MarketData,
  {
    /** Daily bars for `ticker` over `period`. An empty series means the
     *  provider knows the symbol but has no bars for it. */
    readonly getHistory: (
      ticker: string,
      period: LookbackPeriod,
    ) => Effect.Effect<TimeSeries, MarketDataError>;
  }
>() {}
