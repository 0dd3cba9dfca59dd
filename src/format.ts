// Pure formatting functions — no I/O.

import type { AgentError } from "./agent.ts";
import type { ChartResult, Outcome, PriceResult } from "./domain.ts";
import type { UpstreamError } from "./stock-api.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Numbers ---

export function formatNumber(value: number | null, digits = 2): string {
  return value === null ? "n/a" : value.toFixed(digits);
}

export function formatCompact(value: number | null): string {
  if (value === null) return "n/a";
  const abs = Math.abs(value);
  if (abs >= 1e12) return `${(value / 1e12).toFixed(2)}T`;
  if (abs >= 1e9) return `${(value / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `${(value / 1e6).toFixed(2)}M`;
  return value.toFixed(0);
}

const isoDate = (epochMs: number) => new Date(epochMs).toISOString().slice(0, 10);

// --- Price ---

/** Label → value rows, in display order. */
export function priceFields(
  result: PriceResult,
): ReadonlyArray<readonly [string, string]> {
  const currency = result.currency !== null ? ` ${result.currency}` : "";
  const { fiftyTwoWeekLow: low, fiftyTwoWeekHigh: high } = result;

  return [
    [
      "Current Price",
      result.currentPrice === null
        ? "n/a"
        : `${result.currentPrice.toFixed(2)}${currency}`,
    ],
    ["Market Cap", formatCompact(result.marketCap)],
    [
      "52 Week Range",
      low === null && high === null
        ? "n/a"
        : `${formatNumber(low)} - ${formatNumber(high)}`,
    ],
    ["P/E Ratio", formatNumber(result.peRatio)],
    [
      "Dividend Yield",
      result.dividendYield === null ? "n/a" : `${result.dividendYield.toFixed(2)}%`,
    ],
  ];
}

export function formatPrice(result: PriceResult): string {
  const rows = priceFields(result);
  const width = Math.max(...rows.map(([label]) => label.length));
  const title = result.name !== null
    ? `${result.symbol} · ${result.name}`
    : result.symbol;

  return [
    "",
    `${BOLD}  ${title}${RESET}`,
    ...rows.map(([label, value]) => `  ${DIM}${label.padEnd(width)}${RESET}  ${value}`),
    "",
  ].join("\n");
}

// --- Chart ---

export interface ChartSummary {
  readonly count: number;
  readonly start: number; // epoch ms
  readonly end: number; // epoch ms
  readonly first: number;
  readonly last: number;
  readonly low: number;
  readonly high: number;
  readonly change: number;
  readonly changePercent: number;
}

export function summarizeChart(chart: ChartResult): ChartSummary | null {
  const { points } = chart;
  if (points.length === 0) return null;

  const closes = points.map((p) => p.close);
  const first = closes[0];
  const last = closes[closes.length - 1];
  const change = last - first;

  return {
    count: points.length,
    start: points[0].timestamp,
    end: points[points.length - 1].timestamp,
    first,
    last,
    low: Math.min(...closes),
    high: Math.max(...closes),
    change,
    changePercent: first === 0 ? 0 : (change / first) * 100,
  };
}

const BLOCKS = Array.from("▁▂▃▄▅▆▇█");

/** One-line plot of `values`, downsampled to at most `width` cells. */
export function sparkline(values: ReadonlyArray<number>, width = 48): string {
  if (values.length === 0 || width <= 0) return "";

  const sampled = values.length > width
    ? Array.from({ length: width }, (_, i) => values[Math.floor((i * values.length) / width)])
    : values;
  const min = Math.min(...sampled);
  const max = Math.max(...sampled);
  const span = max - min;
  const top = BLOCKS.length - 1;

  return sampled
    .map((v) => BLOCKS[span === 0 ? 3 : Math.round(((v - min) / span) * top)])
    .join("");
}

export function formatChart(chart: ChartResult): string {
  const header = `${BOLD}  ${chart.symbol}${RESET}  ${DIM}${chart.range} · ${chart.interval}${RESET}`;
  const summary = summarizeChart(chart);

  if (summary === null) {
    return ["", header, `  ${DIM}No data points in this range${RESET}`, ""].join("\n");
  }

  const color = summary.change >= 0 ? GREEN : RED;
  const sign = summary.change >= 0 ? "+" : "";
  const currency = chart.currency !== null ? ` ${chart.currency}` : "";

  return [
    "",
    header,
    `  ${summary.count} points, ${isoDate(summary.start)} → ${isoDate(summary.end)}`,
    `  ${BOLD}${summary.first.toFixed(2)} → ${summary.last.toFixed(2)}${currency}${RESET}  ${color}${sign}${summary.change.toFixed(2)} (${sign}${summary.changePercent.toFixed(2)}%)${RESET}`,
    `  ${DIM}low ${summary.low.toFixed(2)} · high ${summary.high.toFixed(2)}${RESET}`,
    `  ${sparkline(chart.points.map((p) => p.close))}`,
    "",
  ].join("\n");
}

export function formatOutcome(outcome: Outcome): string {
  switch (outcome._tag) {
    case "PriceOutcome":
      return formatPrice(outcome.price);
    case "ChartOutcome":
      return formatChart(outcome.chart);
  }
}

// --- Error formatting ---

export function formatError(error: AgentError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

export function classifyError(error: AgentError): ClassifiedError {
  switch (error._tag) {
    case "ExtractionError":
      return {
        title: "Couldn't tell which company you mean",
        hint: `Name a company or ticker, e.g. "price of Apple" or "chart TSLA over the last year".`,
      };
    case "ClassificationError":
      return {
        title: "Couldn't understand the query",
        hint: "The classifier gave an unusable answer. Rephrase, or set QUERY_CLASSIFIER=keyword.",
      };
    case "SymbolNotFoundError":
      return {
        title: "Symbol not found",
        hint: `Nothing matches "${error.symbol}". Check the name or use a ticker (e.g. AAPL, MSFT, TSLA).`,
      };
    case "UpstreamError":
      return classifyUpstreamError(error);
  }
}

function classifyUpstreamError(error: UpstreamError): ClassifiedError {
  switch (error.reason) {
    case "Network":
      return {
        title: "Network error",
        hint: "Could not reach the data provider. Check your internet connection.",
      };
    case "Status":
      return classifyHttpStatus(error.status ?? 0);
    case "Parse":
      return {
        title: "Unexpected response",
        hint: "The provider returned data in an unexpected format.",
      };
    case "Service":
      return {
        title: "Service error",
        hint: error.message,
      };
  }
}

function classifyHttpStatus(status: number): ClassifiedError {
  if (status === 401 || status === 403) {
    return {
      title: "Not authorized",
      hint: "Check RAPIDAPI_KEY (and LLM_API_KEY when QUERY_CLASSIFIER=llm).",
    };
  }
  if (status === 429) {
    return {
      title: "Rate limited",
      hint: "Too many requests. Wait a moment and try again.",
    };
  }
  if (status >= 500 && status < 600) {
    return {
      title: "Server error",
      hint: "The data provider is having issues. Try again in a few minutes.",
    };
  }
  return {
    title: "HTTP error",
    hint: `HTTP ${status}`,
  };
}
