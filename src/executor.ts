// Resolves the subject to a ticker and performs exactly
// one lookup per operation against the StockApi service. No retries.

import { Effect } from "effect";
import {
  type ChartPoint,
  type ChartResult,
  type ClassifiedRequest,
  type Interval,
  looksLikeTicker,
  type Outcome,
  type PriceResult,
  type Range,
} from "./domain.ts";
import {
  StockApi,
  type StockApiError,
  SymbolNotFoundError,
  type UpstreamError,
} from "./stock-api.ts";

// --- Normalization ---

export function sortByTimestamp(
  points: ReadonlyArray<ChartPoint>,
): ReadonlyArray<ChartPoint> {
  return [...points].sort((a, b) => a.timestamp - b.timestamp);
}

// --- Operations ---

export function resolveSymbol(
  name: string,
): Effect.Effect<string, SymbolNotFoundError | UpstreamError, StockApi> {
  const trimmed = name.trim();
  if (looksLikeTicker(trimmed)) return Effect.succeed(trimmed);

  return Effect.gen(function* () {
    const api = yield* StockApi;
    const matches = yield* api.searchSymbols(trimmed);
    if (matches.length === 0) {
      return yield* Effect.fail(new SymbolNotFoundError({ symbol: trimmed }));
    }
    const symbol = matches[0].symbol;
    yield* Effect.logDebug("resolved symbol").pipe(
      Effect.annotateLogs({ name: trimmed, symbol }),
    );
    return symbol;
  });
}

export function fetchPrice(
  symbol: string,
): Effect.Effect<PriceResult, StockApiError, StockApi> {
  return Effect.flatMap(StockApi, (api) => api.getQuote(symbol));
}

export function fetchChart(
  symbol: string,
  range: Range,
  interval: Interval,
): Effect.Effect<ChartResult, StockApiError, StockApi> {
  return Effect.flatMap(StockApi, (api) => api.getChart(symbol, range, interval)).pipe(
    Effect.map((chart) => ({ ...chart, points: sortByTimestamp(chart.points) })),
  );
}

export function execute(
  request: ClassifiedRequest,
): Effect.Effect<Outcome, StockApiError, StockApi> {
  return Effect.gen(function* () {
    const symbol = yield* resolveSymbol(request.symbolOrName);
    switch (request._tag) {
      case "PriceRequest": {
        const price = yield* fetchPrice(symbol);
        return { _tag: "PriceOutcome", request, symbol, price } as const;
      }
      case "ChartRequest": {
        const chart = yield* fetchChart(symbol, request.range, request.interval);
        return { _tag: "ChartOutcome", request, symbol, chart } as const;
      }
    }
  });
}
