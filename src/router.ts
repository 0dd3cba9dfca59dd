// Query router: free text to ClassifiedRequest by keyword and phrase matching.
//
// Pure functions plus one Effect entry point (routeQuery). Nothing here
// performs I/O.

import { Data, Effect } from "effect";
import {
  ChartRequest,
  type ClassifiedRequest,
  DEFAULT_INTERVAL,
  DEFAULT_RANGE,
  type Interval,
  isRange,
  looksLikeTicker,
  parseInterval,
  PriceRequest,
  type Range,
} from "./domain.ts";

// --- Error ---

export class ExtractionError extends Data.TaggedError("ExtractionError")<{
  readonly query: string;
  readonly message: string;
}> {}

// --- Phrase tables ---

const CHART_KEYWORDS =
  /\b(?:charts?|graph|plot|history|historical|performance|trends?)\b/i;

const CHART_PHRASES = /\b(?:over|in) the (?:last|past)\b/i;

/** Ordered: the first entry whose pattern matches decides the range. */
const RANGE_PHRASES: ReadonlyArray<readonly [Range, RegExp]> = [
  ["max", /\b(?:all[\s-]+time|max(?:imum)?|since\s+(?:ipo|inception|listing))\b/gi],
  ["5y", /\b(?:5|five)[\s-]*(?:years?|yrs?)\b/gi],
  [
    "1y",
    /\b(?:(?<!half[\s-]+)(?:1|one|a)[\s-]*(?:years?|yr)|12[\s-]*months?|(?:last|past|this)\s+year)\b/gi,
  ],
  ["6mo", /\b(?:(?:6|six)[\s-]*(?:months?|mos?)|half[\s-]+(?:a[\s-]+)?year)\b/gi],
  ["3mo", /\b(?:(?:3|three)[\s-]*(?:months?|mos?)|(?:last|past)\s+quarter)\b/gi],
  ["1mo", /\b(?:(?:1|one|a)[\s-]*months?|(?:last|past|this)\s+month)\b/gi],
  [
    "5d",
    /\b(?:(?:5|five)[\s-]*(?:trading[\s-]+)?days?|(?:1|one|a)[\s-]*weeks?|(?:last|past|this)\s+week)\b/gi,
  ],
  ["1d", /\b(?:(?:1|one|a)[\s-]*days?|intraday)\b/gi],
];

const INTERVAL_PHRASES: ReadonlyArray<readonly [Interval, RegExp]> = [
  ["weekly", /\b(?:weekly|(?:per|each|every|by)\s+week)\b/gi],
  ["monthly", /\b(?:monthly|(?:per|each|every|by)\s+month)\b/gi],
  ["daily", /\b(?:daily|(?:per|each|every|by)\s+day)\b/gi],
];

// range:6mo / interval:1wk
const RANGE_DIRECTIVE = /\brange:\s*([a-z0-9]+)/gi;
const INTERVAL_DIRECTIVE = /\binterval:\s*([a-z0-9]+)/gi;

const STOP_WORDS = new Set([
  // chart triggers
  "chart", "charts", "graph", "plot", "history", "historical", "performance",
  "trend", "trends",
  // price triggers
  "price", "prices", "quote", "quotes", "stock", "stocks", "share", "shares",
  "ticker", "symbol", "value", "valuation", "trading", "cost", "worth",
  "info", "information", "data", "details", "market", "cap",
  // price figures
  "dividend", "dividends", "yield", "p/e", "pe", "ratio", "52", "52-week",
  "week", "high", "low", "range", "figures",
  // time words left behind by phrase removal
  "current", "currently", "latest", "today", "now", "over", "last", "past",
  "during", "since", "recent", "recently", "this",
  // filler
  "show", "me", "give", "get", "display", "draw", "see", "tell", "look",
  "let", "let's", "lets", "want", "need", "like", "please", "can", "could",
  "would", "you", "i", "my", "what", "what's", "whats", "how", "how's",
  "is", "are", "was", "were", "be", "been", "did", "does", "do", "doing",
  "has", "have", "had", "much", "the", "a", "an", "of", "for", "on", "in",
  "at", "to", "from", "by", "with", "about", "and", "&", "its", "it's",
  "it", "that", "up", "company", "corp",
]);

/** Kept when they sit between two subject tokens ("Bank of America"). */
const CONNECTORS = new Set(["of", "and", "&"]);

// --- Classification ---

export function hasChartIntent(text: string): boolean {
  return (
    CHART_KEYWORDS.test(text) ||
    CHART_PHRASES.test(text) ||
    /\b(?:range|interval):/i.test(text) ||
    RANGE_PHRASES.some(([, pattern]) => matches(pattern, text))
  );
}

export function extractRange(text: string): Range {
  const directive = lastCapture(RANGE_DIRECTIVE, text);
  if (directive !== undefined && isRange(directive)) return directive;
  const hit = RANGE_PHRASES.find(([, pattern]) => matches(pattern, text));
  return hit !== undefined ? hit[0] : DEFAULT_RANGE;
}

export function extractInterval(text: string): Interval {
  const directive = lastCapture(INTERVAL_DIRECTIVE, text);
  const coded = directive !== undefined ? parseInterval(directive) : undefined;
  if (coded !== undefined) return coded;
  const hit = INTERVAL_PHRASES.find(([, pattern]) => matches(pattern, text));
  return hit !== undefined ? hit[0] : DEFAULT_INTERVAL;
}

// --- Subject extraction ---

export function extractSubject(text: string): string {
  let remaining = text.replace(/[‘’]/g, "'");
  remaining = remaining
    .replace(RANGE_DIRECTIVE, " ")
    .replace(INTERVAL_DIRECTIVE, " ");
  for (const [, pattern] of [...RANGE_PHRASES, ...INTERVAL_PHRASES]) {
    remaining = remaining.replace(pattern, " ");
  }

  const tokens = remaining
    .split(/\s+/)
    .map(cleanToken)
    .filter((token) => token.length > 0);

  // In mixed-case text an uppercase ticker survives even when it spells a
  // stop word (NOW, ON, IT). A shouted query gets no such exception.
  const mixedCase = text !== text.toUpperCase();
  const kept = tokens.map((token, i) =>
    (mixedCase && isTickerToken(token, i)) || !isStopWord(token)
  );
  const first = kept.indexOf(true);
  const last = kept.lastIndexOf(true);
  if (first === -1) return "";

  const subject: string[] = [];
  for (let i = first; i <= last; i++) {
    const token = tokens[i];
    if (kept[i]) subject.push(stripPossessive(token));
    else if (CONNECTORS.has(token.toLowerCase())) subject.push(token);
  }
  return subject.join(" ");
}

function cleanToken(raw: string): string {
  // keep inner punctuation such as BRK.B, AT&T, Coca-Cola
  return raw.replace(/^[^\p{L}\p{N}&]+|[^\p{L}\p{N}&]+$/gu, "");
}

function isStopWord(token: string): boolean {
  const lower = token.toLowerCase();
  return STOP_WORDS.has(lower) || STOP_WORDS.has(stripPossessive(lower));
}

function isTickerToken(token: string, index: number): boolean {
  if (token === "I" || (token === "A" && index === 0)) return false;
  return looksLikeTicker(token);
}

function stripPossessive(token: string): string {
  return token.replace(/'s$/i, "");
}

// --- Entry point ---

/** Trimmed symbol or company name given directly, e.g. on the command line. */
export function requireSubject(
  value: string,
): Effect.Effect<string, ExtractionError> {
  const subject = value.trim();
  return subject.length > 0
    ? Effect.succeed(subject)
    : Effect.fail(
        new ExtractionError({
          query: value,
          message: "No company name or ticker was given",
        }),
      );
}

export function routeQuery(
  query: string,
): Effect.Effect<ClassifiedRequest, ExtractionError> {
  const text = query.trim();
  const subject = extractSubject(text);

  if (subject.length === 0) {
    return Effect.fail(
      new ExtractionError({
        query,
        message: "No company name or ticker could be identified",
      }),
    );
  }

  return Effect.succeed(
    hasChartIntent(text)
      ? ChartRequest(subject, extractRange(text), extractInterval(text))
      : PriceRequest(subject),
  );
}

// --- Regex helpers ---

function matches(pattern: RegExp, text: string): boolean {
  pattern.lastIndex = 0;
  const result = pattern.test(text);
  pattern.lastIndex = 0;
  return result;
}

function lastCapture(pattern: RegExp, text: string): string | undefined {
  let value: string | undefined;
  for (const match of text.matchAll(pattern)) {
    value = match[1]?.toLowerCase();
  }
  return value;
}
