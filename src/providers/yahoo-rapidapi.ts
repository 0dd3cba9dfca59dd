// Yahoo Finance via RapidAPI — implementation of StockApi.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Config, Effect, Layer, Redacted, Schema } from "effect";
import type {
  ChartPoint,
  ChartResult,
  Interval,
  PriceResult,
  Range,
  SymbolMatch,
} from "../domain.ts";
import { requestJson } from "../http.ts";
import {
  StockApi,
  type StockApiService,
  SymbolNotFoundError,
  UpstreamError,
} from "../stock-api.ts";

// --- Config ---

export const DEFAULT_RAPIDAPI_HOST = "apidojo-yahoo-finance-v1.p.rapidapi.com";

export interface RapidApiConfig {
  readonly apiKey: Redacted.Redacted;
  readonly host: string;
  readonly baseUrl: string;
  readonly region: string;
}

export const rapidApiConfig = Effect.gen(function* () {
  const apiKey = yield* Config.redacted("RAPIDAPI_KEY");
  const host = yield* Config.string("RAPIDAPI_HOST").pipe(
    Config.withDefault(DEFAULT_RAPIDAPI_HOST),
  );
  const baseUrl = yield* Config.string("RAPIDAPI_BASE_URL").pipe(
    Config.withDefault(`https://${host}`),
  );
  const region = yield* Config.string("RAPIDAPI_REGION").pipe(
    Config.withDefault("US"),
  );
  return { apiKey, host, baseUrl, region } satisfies RapidApiConfig;
});

// --- Response schemas ---

const OptionalString = Schema.optional(Schema.NullOr(Schema.String));
const OptionalNumber = Schema.optional(Schema.NullOr(Schema.Number));

const SearchResponse = Schema.Struct({
  quotes: Schema.optional(
    Schema.Array(
      Schema.Struct({
        symbol: Schema.String,
        shortname: OptionalString,
        longname: OptionalString,
        exchange: OptionalString,
        quoteType: OptionalString,
      }),
    ),
  ),
});

const QuoteEntry = Schema.Struct({
  symbol: Schema.String,
  longName: OptionalString,
  shortName: OptionalString,
  currency: OptionalString,
  regularMarketPrice: OptionalNumber,
  marketCap: OptionalNumber,
  fiftyTwoWeekLow: OptionalNumber,
  fiftyTwoWeekHigh: OptionalNumber,
  trailingPE: OptionalNumber,
  dividendYield: OptionalNumber,
});

type QuoteEntryType = typeof QuoteEntry.Type;

const QuoteResponse = Schema.Struct({
  quoteResponse: Schema.Struct({
    result: Schema.Array(QuoteEntry),
  }),
});

const ChartEntry = Schema.Struct({
  meta: Schema.Struct({
    symbol: Schema.String,
    currency: OptionalString,
  }),
  timestamp: Schema.optional(Schema.Array(Schema.Number)),
  indicators: Schema.Struct({
    quote: Schema.Array(
      Schema.Struct({
        close: Schema.optional(Schema.Array(Schema.NullOr(Schema.Number))),
      }),
    ),
  }),
});

type ChartEntryType = typeof ChartEntry.Type;

const ChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(ChartEntry)),
    error: Schema.NullOr(
      Schema.Struct({
        code: Schema.optional(Schema.String),
        description: OptionalString,
      }),
    ),
  }),
});

const decodeWith = <A, I>(schema: Schema.Schema<A, I>, label: string) =>
  (json: unknown): Effect.Effect<A, UpstreamError> =>
    Schema.decodeUnknown(schema)(json).pipe(
      Effect.mapError(
        (e) =>
          new UpstreamError({
            reason: "Parse",
            message: `Invalid ${label} response: ${e.message}`,
          }),
      ),
    );

// --- Decoders ---

export function decodeSearchResponse(
  json: unknown,
): Effect.Effect<ReadonlyArray<SymbolMatch>, UpstreamError> {
  return decodeWith(SearchResponse, "search")(json).pipe(
    Effect.map((response) =>
      (response.quotes ?? []).map((q) => ({
        symbol: q.symbol,
        name: q.longname ?? q.shortname ?? null,
        exchange: q.exchange ?? null,
        quoteType: q.quoteType ?? null,
      })),
    ),
  );
}

export function decodeQuoteResponse(
  json: unknown,
  symbol: string,
): Effect.Effect<PriceResult, UpstreamError | SymbolNotFoundError> {
  return decodeWith(QuoteResponse, "quote")(json).pipe(
    Effect.flatMap(({ quoteResponse }) =>
      quoteResponse.result.length === 0
        ? Effect.fail(new SymbolNotFoundError({ symbol }))
        : Effect.succeed(toPriceResult(quoteResponse.result[0])),
    ),
  );
}

function toPriceResult(q: QuoteEntryType): PriceResult {
  return {
    symbol: q.symbol,
    name: q.longName ?? q.shortName ?? null,
    currency: q.currency ?? null,
    currentPrice: q.regularMarketPrice ?? null,
    marketCap: q.marketCap ?? null,
    fiftyTwoWeekLow: q.fiftyTwoWeekLow ?? null,
    fiftyTwoWeekHigh: q.fiftyTwoWeekHigh ?? null,
    peRatio: q.trailingPE ?? null,
    dividendYield: q.dividendYield ?? null,
  };
}

export interface ChartQuery {
  readonly symbol: string;
  readonly range: Range;
  readonly interval: Interval;
}

/** Points keep upstream order; sorting is the executor's job. */
export function decodeChartResponse(
  json: unknown,
  query: ChartQuery,
): Effect.Effect<ChartResult, UpstreamError | SymbolNotFoundError> {
  return decodeWith(ChartResponse, "chart")(json).pipe(
    Effect.flatMap(({ chart }): Effect.Effect<
      ChartResult,
      UpstreamError | SymbolNotFoundError
    > => {
      if (chart.error !== null) {
        return chart.error.code === "Not Found"
          ? Effect.fail(new SymbolNotFoundError({ symbol: query.symbol }))
          : Effect.fail(
              new UpstreamError({
                reason: "Service",
                message:
                  chart.error.description ?? chart.error.code ?? "Chart lookup failed",
              }),
            );
      }
      if (chart.result === null || chart.result.length === 0) {
        return Effect.succeed({ ...query, currency: null, points: [] });
      }
      const entry = chart.result[0];
      return toPoints(entry).pipe(
        Effect.map((points): ChartResult => ({
          ...query,
          currency: entry.meta.currency ?? null,
          points,
        })),
      );
    }),
  );
}

function toPoints(
  entry: ChartEntryType,
): Effect.Effect<ReadonlyArray<ChartPoint>, UpstreamError> {
  const timestamps = entry.timestamp ?? [];
  if (timestamps.length === 0) return Effect.succeed([]);

  const closes = entry.indicators.quote.length > 0
    ? entry.indicators.quote[0].close ?? []
    : [];
  if (closes.length !== timestamps.length) {
    return Effect.fail(
      new UpstreamError({
        reason: "Parse",
        message:
          `Chart has ${timestamps.length} timestamps but ${closes.length} closes`,
      }),
    );
  }

  const points: ChartPoint[] = [];
  timestamps.forEach((seconds, i) => {
    const close = closes[i];
    // null marks a slot without trades
    if (close !== null) points.push({ timestamp: seconds * 1000, close });
  });
  return Effect.succeed(points);
}

// --- Interval codes ---

const INTERVAL_CODES: Record<Interval, string> = {
  daily: "1d",
  weekly: "1wk",
  monthly: "1mo",
};

// --- Service ---

export function makeYahooRapidApi(
  config: RapidApiConfig,
): Effect.Effect<StockApiService, never, HttpClient.HttpClient> {
  return Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(
        HttpClientRequest.setHeaders({
          "X-RapidAPI-Key": Redacted.value(config.apiKey),
          "X-RapidAPI-Host": config.host,
          Accept: "application/json",
        }),
      ),
    );

    const get = (path: string, params: Record<string, string>) =>
      requestJson(
        client,
        HttpClientRequest.get(`${config.baseUrl}${path}`, {
          urlParams: { ...params, region: config.region },
        }),
      );

    return StockApi.of({
      searchSymbols: (query: string) =>
        get("/auto-complete", { q: query }).pipe(
          Effect.flatMap(decodeSearchResponse),
          Effect.tap((matches) =>
            Effect.logDebug("symbol search").pipe(
              Effect.annotateLogs({ query, candidates: matches.length }),
            ),
          ),
        ),

      getQuote: (symbol: string) =>
        get("/market/v2/get-quotes", { symbols: symbol }).pipe(
          Effect.flatMap((json) => decodeQuoteResponse(json, symbol)),
        ),

      getChart: (symbol: string, range: Range, interval: Interval) =>
        get("/stock/v3/get-chart", {
          symbol,
          range,
          interval: INTERVAL_CODES[interval],
        }).pipe(
          Effect.flatMap((json) =>
            decodeChartResponse(json, { symbol, range, interval }),
          ),
        ),
    });
  });
}

// --- Layer ---

export const YahooRapidApiLive = Layer.effect(
  StockApi,
  Effect.flatMap(rapidApiConfig, makeYahooRapidApi),
);
