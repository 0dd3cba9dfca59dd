// Pure domain types — no framework dependency, no I/O.

// --- Request parameters ---

export const RANGES = ["1d", "5d", "1mo", "3mo", "6mo", "1y", "5y", "max"] as const;
export type Range = (typeof RANGES)[number];

export const INTERVALS = ["daily", "weekly", "monthly"] as const;
export type Interval = (typeof INTERVALS)[number];

export const DEFAULT_RANGE: Range = "6mo";
export const DEFAULT_INTERVAL: Interval = "daily";

export const isRange = (value: string): value is Range =>
  RANGES.some((range) => range === value);

const INTERVAL_ALIASES: Record<string, Interval> = {
  daily: "daily",
  "1d": "daily",
  weekly: "weekly",
  "1wk": "weekly",
  monthly: "monthly",
  "1mo": "monthly",
};

/** Accepts interval names and the upstream codes (1d, 1wk, 1mo). */
export const parseInterval = (value: string): Interval | undefined => {
  const key = value.trim().toLowerCase();
  return Object.hasOwn(INTERVAL_ALIASES, key) ? INTERVAL_ALIASES[key] : undefined;
};

// --- Tickers ---

const TICKER = /^[A-Z]{1,5}$/;

/** Short all-uppercase words are taken as tickers as written. This
 *  misreads names like "3M" or "IBM Research"; those go through search. */
export function looksLikeTicker(value: string): boolean {
  return TICKER.test(value.trim());
}

// --- Classified requests ---

export type PriceRequest = {
  readonly _tag: "PriceRequest";
  readonly symbolOrName: string;
};

export type ChartRequest = {
  readonly _tag: "ChartRequest";
  readonly symbolOrName: string;
  readonly range: Range;
  readonly interval: Interval;
};

export type ClassifiedRequest = PriceRequest | ChartRequest;

export const PriceRequest = (symbolOrName: string): PriceRequest => ({
  _tag: "PriceRequest",
  symbolOrName,
});

export const ChartRequest = (
  symbolOrName: string,
  range: Range = DEFAULT_RANGE,
  interval: Interval = DEFAULT_INTERVAL,
): ChartRequest => ({
  _tag: "ChartRequest",
  symbolOrName,
  range,
  interval,
});

// --- Lookup results ---

export interface SymbolMatch {
  readonly symbol: string;
  readonly name: string | null;
  readonly exchange: string | null;
  readonly quoteType: string | null;
}

/** Every key is always present; absent upstream values are null. */
export interface PriceResult {
  readonly symbol: string;
  readonly name: string | null;
  readonly currency: string | null;
  readonly currentPrice: number | null;
  readonly marketCap: number | null;
  readonly fiftyTwoWeekLow: number | null;
  readonly fiftyTwoWeekHigh: number | null;
  readonly peRatio: number | null;
  readonly dividendYield: number | null; // percent
}

export interface ChartPoint {
  readonly timestamp: number; // epoch ms
  readonly close: number;
}

export interface ChartResult {
  readonly symbol: string;
  readonly range: Range;
  readonly interval: Interval;
  readonly currency: string | null;
  readonly points: ReadonlyArray<ChartPoint>;
}

// --- Pipeline outcome ---

export type PriceOutcome = {
  readonly _tag: "PriceOutcome";
  readonly request: PriceRequest;
  readonly symbol: string;
  readonly price: PriceResult;
};

export type ChartOutcome = {
  readonly _tag: "ChartOutcome";
  readonly request: ChartRequest;
  readonly symbol: string;
  readonly chart: ChartResult;
};

export type Outcome = PriceOutcome | ChartOutcome;
