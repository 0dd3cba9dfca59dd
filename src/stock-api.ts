// Stock API — service definition and upstream errors.

import { Context, Data, Effect } from "effect";
import type {
  ChartResult,
  Interval,
  PriceResult,
  Range,
  SymbolMatch,
} from "./domain.ts";

// --- Errors ---

export type UpstreamFailure = "Network" | "Status" | "Parse" | "Service";

/** The provider could not be reached, answered with a non-2xx status,
 *  returned a payload that does not match its schema, or reported an error
 *  in an otherwise valid payload. */
export class UpstreamError extends Data.TaggedError("UpstreamError")<{
  readonly reason: UpstreamFailure;
  readonly message: string;
  readonly status?: number;
}> {}

export class SymbolNotFoundError extends Data.TaggedError("SymbolNotFoundError")<{
  readonly symbol: string;
}> {}

export type StockApiError = UpstreamError | SymbolNotFoundError;

// --- Service ---

export class StockApi extends Context.Tag("StockApi")<
  StockApi,
  {
    readonly searchSymbols: (
      query: string,
    ) => Effect.Effect<ReadonlyArray<SymbolMatch>, UpstreamError>;
    readonly getQuote: (
      symbol: string,
    ) => Effect.Effect<PriceResult, StockApiError>;
    readonly getChart: (
      symbol: string,
      range: Range,
      interval: Interval,
    ) => Effect.Effect<ChartResult, StockApiError>;
  }
>() {}

export type StockApiService = Context.Tag.Service<typeof StockApi>;
