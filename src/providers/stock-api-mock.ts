// StockApiTest — in-memory StockApi for development (STOCK_PROVIDER=test).

import { Effect, Layer } from "effect";
import type {
  ChartPoint,
  Interval,
  PriceResult,
  SymbolMatch,
} from "../domain.ts";
import { StockApi, SymbolNotFoundError } from "../stock-api.ts";

// --- Sample data ---

const quotes: Record<string, PriceResult> = {
  AAPL: {
    symbol: "AAPL",
    name: "Apple Inc.",
    currency: "USD",
    currentPrice: 225.3,
    marketCap: 3.42e12,
    fiftyTwoWeekLow: 164.08,
    fiftyTwoWeekHigh: 237.23,
    peRatio: 34.2,
    dividendYield: 0.44,
  },
  MSFT: {
    symbol: "MSFT",
    name: "Microsoft Corporation",
    currency: "USD",
    currentPrice: 415.1,
    marketCap: 3.09e12,
    fiftyTwoWeekLow: 309.45,
    fiftyTwoWeekHigh: 468.35,
    peRatio: 35.8,
    dividendYield: 0.72,
  },
  TSLA: {
    symbol: "TSLA",
    name: "Tesla, Inc.",
    currency: "USD",
    currentPrice: 385.2,
    marketCap: 1.23e12,
    fiftyTwoWeekLow: 138.8,
    fiftyTwoWeekHigh: 488.54,
    peRatio: 98.1,
    dividendYield: null,
  },
};

const STEP_MS: Record<Interval, number> = {
  daily: 86_400_000,
  weekly: 7 * 86_400_000,
  monthly: 30 * 86_400_000,
};

const POINTS: Record<Interval, number> = { daily: 30, weekly: 26, monthly: 12 };

const SERIES_END = Date.parse("2025-06-13T20:00:00Z");

/** Deterministic wave around the quote's current price. */
export function sampleSeries(
  base: number,
  interval: Interval,
): ReadonlyArray<ChartPoint> {
  const count = POINTS[interval];
  return Array.from({ length: count }, (_, i) => ({
    timestamp: SERIES_END - (count - 1 - i) * STEP_MS[interval],
    close: Math.round(base * (1 + 0.05 * Math.sin(i / 3)) * 100) / 100,
  }));
}

const lookup = (symbol: string): PriceResult | undefined => {
  const key = symbol.toUpperCase();
  return Object.hasOwn(quotes, key) ? quotes[key] : undefined;
};

// --- Mock layer ---

export const StockApiTestLive = Layer.succeed(
  StockApi,
  StockApi.of({
    searchSymbols: (query: string) => {
      const needle = query.trim().toLowerCase();
      const matches: ReadonlyArray<SymbolMatch> = Object.values(quotes)
        .filter((q) =>
          needle.length > 0 &&
          (q.symbol.toLowerCase() === needle ||
            (q.name ?? "").toLowerCase().includes(needle))
        )
        .map((q) => ({
          symbol: q.symbol,
          name: q.name,
          exchange: "NASDAQ",
          quoteType: "EQUITY",
        }));
      return Effect.succeed(matches);
    },
    getQuote: (symbol: string) => {
      const quote = lookup(symbol);
      return quote !== undefined
        ? Effect.succeed(quote)
        : Effect.fail(new SymbolNotFoundError({ symbol }));
    },
    getChart: (symbol, range, interval) => {
      const quote = lookup(symbol);
      return quote !== undefined && quote.currentPrice !== null
        ? Effect.succeed({
          symbol: quote.symbol,
          range,
          interval,
          currency: quote.currency,
          points: sampleSeries(quote.currentPrice, interval),
        })
        : Effect.fail(new SymbolNotFoundError({ symbol }));
    },
  }),
);
