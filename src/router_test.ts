import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";
import type { ClassifiedRequest } from "./domain.ts";
import {
  type ExtractionError,
  extractInterval,
  extractRange,
  extractSubject,
  hasChartIntent,
  requireSubject,
  routeQuery,
} from "./router.ts";

// --- Helpers ---

function route(query: string): Either.Either<ClassifiedRequest, ExtractionError> {
  return Effect.runSync(Effect.either(routeQuery(query)));
}

function routeSuccess(query: string): ClassifiedRequest {
  const result = route(query);
  if (Either.isLeft(result)) throw new Error(`Expected success, got: ${result.left.message}`);
  return result.right;
}

function routeFailure(query: string): ExtractionError {
  const result = route(query);
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  return result.left;
}

// --- routeQuery ---

describe("routeQuery", () => {
  it("routes a chart question with a spoken range", () => {
    expect(routeSuccess("Show me a chart for Tesla over the last 6 months")).toEqual({
      _tag: "ChartRequest",
      symbolOrName: "Tesla",
      range: "6mo",
      interval: "daily",
    });
  });

  it("routes a price question to the company name", () => {
    expect(routeSuccess("What's the current price of Apple?")).toEqual({
      _tag: "PriceRequest",
      symbolOrName: "Apple",
    });
  });

  it("keeps connectors inside a multi-word name", () => {
    expect(routeSuccess("Bank of America stock price")).toEqual({
      _tag: "PriceRequest",
      symbolOrName: "Bank of America",
    });
  });

  it("reads range and interval directives", () => {
    expect(routeSuccess("Chart AAPL range:1y interval:weekly")).toEqual({
      _tag: "ChartRequest",
      symbolOrName: "AAPL",
      range: "1y",
      interval: "weekly",
    });
  });

  it("reads spoken range and interval together", () => {
    expect(routeSuccess("Plot Tesla weekly for the last 5 years")).toEqual({
      _tag: "ChartRequest",
      symbolOrName: "Tesla",
      range: "5y",
      interval: "weekly",
    });
  });

  it.each(["chart", "graph", "plot", "history", "historical", "performance", "trend"])(
    "'%s' makes a chart request",
    (keyword) => {
      const request = routeSuccess(`${keyword} of NVDA`);
      expect(request._tag).toBe("ChartRequest");
      expect(request.symbolOrName).toBe("NVDA");
    },
  );

  it("defaults a chart without range or interval to 6mo daily", () => {
    expect(routeSuccess("chart MSFT")).toEqual({
      _tag: "ChartRequest",
      symbolOrName: "MSFT",
      range: "6mo",
      interval: "daily",
    });
  });

  it("fails with ExtractionError when no subject remains", () => {
    const error = routeFailure("show me the price");
    expect(error._tag).toBe("ExtractionError");
    expect(error.query).toBe("show me the price");
    expect(error.message).toBe("No company name or ticker could be identified");
  });

  it("fails with ExtractionError on an empty query", () => {
    expect(routeFailure("   ")._tag).toBe("ExtractionError");
  });

  it.each([
    ["What's Apple's P/E ratio?", "Apple"],
    ["What is the dividend yield of Apple?", "Apple"],
    ["What's Apple's 52 week high?", "Apple"],
    ["52-week low of Microsoft", "Microsoft"],
  ])("drops price figure words from %s", (query, subject) => {
    expect(routeSuccess(query)).toEqual({ _tag: "PriceRequest", symbolOrName: subject });
  });

  it.each([
    ["price of NOW", "NOW"],
    ["quote for ON", "ON"],
    ["I want the price of IT", "IT"],
  ])("keeps the uppercase ticker in %s", (query, subject) => {
    expect(routeSuccess(query)).toEqual({ _tag: "PriceRequest", symbolOrName: subject });
  });

  it("does not take a leading article for a ticker", () => {
    expect(routeSuccess("A chart of Tesla").symbolOrName).toBe("Tesla");
  });

  it("applies stop words to a query typed in capitals", () => {
    expect(routeSuccess("PRICE OF AAPL")).toEqual({ _tag: "PriceRequest", symbolOrName: "AAPL" });
  });
});

// --- requireSubject ---

describe("requireSubject", () => {
  it("trims the given name", () => {
    expect(Effect.runSync(requireSubject("  Bank of America "))).toBe("Bank of America");
  });

  it("fails with ExtractionError on a blank value", () => {
    const result = Effect.runSync(Effect.either(requireSubject("  ")));
    if (Either.isRight(result)) throw new Error("Expected failure but got success");
    expect(result.left).toMatchObject({
      _tag: "ExtractionError",
      message: "No company name or ticker was given",
    });
  });
});

// --- extractRange / extractInterval ---

describe("extractRange", () => {
  it("lets a valid directive win over a phrase", () => {
    expect(extractRange("chart AAPL over the last 5 years range:1mo")).toBe("1mo");
  });

  it("ignores an unknown directive code", () => {
    expect(extractRange("chart AAPL range:2w")).toBe("6mo");
  });

  it("maps month and week phrases", () => {
    expect(extractRange("Apple over the past month")).toBe("1mo");
    expect(extractRange("Apple this week")).toBe("5d");
    expect(extractRange("Apple all time")).toBe("max");
    expect(extractRange("Apple over half a year")).toBe("6mo");
  });
});

describe("extractInterval", () => {
  it("accepts upstream codes in a directive", () => {
    expect(extractInterval("chart AAPL interval:1wk")).toBe("weekly");
  });

  it("reads interval phrases", () => {
    expect(extractInterval("Tesla by month")).toBe("monthly");
  });

  it("defaults to daily", () => {
    expect(extractInterval("Tesla chart")).toBe("daily");
  });
});

// --- extractSubject / hasChartIntent ---

describe("extractSubject", () => {
  it("strips possessives", () => {
    expect(extractSubject("Show Apple's chart for the past month")).toBe("Apple");
  });

  it("keeps inner punctuation of tickers and names", () => {
    expect(extractSubject("AT&T stock price")).toBe("AT&T");
    expect(extractSubject("quote for BRK.B")).toBe("BRK.B");
  });
});

describe("hasChartIntent", () => {
  it("is false for a plain price question", () => {
    expect(hasChartIntent("What's the current price of Apple?")).toBe(false);
  });

  it("is true for a time span phrase alone", () => {
    expect(hasChartIntent("Amazon over the past 3 months")).toBe(true);
  });
});
