import { HttpClient, HttpClientResponse } from "@effect/platform";
import { Effect, Either, Layer, Redacted } from "effect";
import { describe, expect, it } from "vitest";
import {
  type ClassificationError,
  type ClassifierError,
  decodeClassification,
  extractJsonObject,
  makeLlmClassifier,
} from "./classifier.ts";
import type { ClassifiedRequest } from "./domain.ts";
import type { ExtractionError } from "./router.ts";

// --- Helpers ---

function decode(
  reply: string,
): Either.Either<ClassifiedRequest, ClassificationError | ExtractionError> {
  return Effect.runSync(Effect.either(decodeClassification("test query", reply)));
}

function decodeSuccess(reply: string): ClassifiedRequest {
  const result = decode(reply);
  if (Either.isLeft(result)) throw new Error(`Expected success, got: ${result.left.message}`);
  return result.right;
}

function decodeFailure(reply: string): ClassificationError | ExtractionError {
  const result = decode(reply);
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  return result.left;
}

// --- extractJsonObject ---

describe("extractJsonObject", () => {
  it("strips code fences", () => {
    expect(extractJsonObject("```json\n{\"a\":1}\n```")).toBe("{\"a\":1}");
  });

  it("slices the object out of surrounding prose", () => {
    expect(extractJsonObject("Sure! {\"a\":{\"b\":2}} Hope that helps.")).toBe(
      "{\"a\":{\"b\":2}}",
    );
  });

  it("returns undefined when there is no object", () => {
    expect(extractJsonObject("no json here")).toBeUndefined();
  });
});

// --- decodeClassification ---

describe("decodeClassification", () => {
  it("builds a chart request from upstream codes", () => {
    expect(
      decodeSuccess(
        "{\"request_type\":\"chart\",\"ticker\":\"TSLA\",\"time_range\":\"1y\",\"interval\":\"1wk\"}",
      ),
    ).toEqual({
      _tag: "ChartRequest",
      symbolOrName: "TSLA",
      range: "1y",
      interval: "weekly",
    });
  });

  it("falls back to 6mo daily for unknown or missing codes", () => {
    expect(
      decodeSuccess(
        "{\"request_type\":\"chart\",\"ticker\":\"Tesla\",\"time_range\":\"2w\",\"interval\":null}",
      ),
    ).toEqual({
      _tag: "ChartRequest",
      symbolOrName: "Tesla",
      range: "6mo",
      interval: "daily",
    });
  });

  it("builds a price request", () => {
    expect(
      decodeSuccess("```json\n{\"request_type\":\"price\",\"ticker\":\" Apple \"}\n```"),
    ).toEqual({ _tag: "PriceRequest", symbolOrName: "Apple" });
  });

  it("fails with ExtractionError on a blank ticker", () => {
    const error = decodeFailure("{\"request_type\":\"price\",\"ticker\":\"  \"}");
    expect(error._tag).toBe("ExtractionError");
  });

  it("fails with ClassificationError when the reply has no JSON", () => {
    const error = decodeFailure("sorry, I can't help with that");
    expect(error._tag).toBe("ClassificationError");
    expect(error.message).toBe("Classifier reply contains no JSON object");
  });

  it("fails with ClassificationError on an unknown request type", () => {
    const error = decodeFailure("{\"request_type\":\"news\",\"ticker\":\"AAPL\"}");
    expect(error._tag).toBe("ClassificationError");
  });
});

// --- makeLlmClassifier ---

const config = {
  apiKey: Redacted.make("test-secret"),
  baseUrl: "https://llm.test/v1",
  model: "test-model",
};

function completion(content: string): unknown {
  return { choices: [{ message: { content } }] };
}

function runClassifier(query: string, body: unknown, status = 200) {
  const calls: Array<{ url: string; authorization: string | undefined }> = [];
  const client = HttpClient.make((request, url) => {
    calls.push({ url: url.toString(), authorization: request.headers["authorization"] });
    return Effect.succeed(
      HttpClientResponse.fromWeb(
        request,
        new Response(JSON.stringify(body), {
          status,
          headers: { "content-type": "application/json" },
        }),
      ),
    );
  });

  const program = Effect.gen(function* () {
    const classifier = yield* makeLlmClassifier(config);
    return yield* classifier.classify(query);
  }).pipe(
    Effect.either,
    Effect.provide(Layer.succeed(HttpClient.HttpClient, client)),
  );

  return Effect.runPromise(program).then(
    (result): { result: Either.Either<ClassifiedRequest, ClassifierError>; calls: typeof calls } => ({
      result,
      calls,
    }),
  );
}

describe("makeLlmClassifier", () => {
  it("posts to chat completions with the bearer key and decodes the reply", async () => {
    const { result, calls } = await runClassifier(
      "How did Nvidia do this year?",
      completion("{\"request_type\":\"chart\",\"ticker\":\"Nvidia\",\"time_range\":\"1y\",\"interval\":\"monthly\"}"),
    );

    expect(calls).toEqual([
      { url: "https://llm.test/v1/chat/completions", authorization: "Bearer test-secret" },
    ]);
    if (Either.isLeft(result)) throw new Error(`Expected success, got: ${result.left.message}`);
    expect(result.right).toEqual({
      _tag: "ChartRequest",
      symbolOrName: "Nvidia",
      range: "1y",
      interval: "monthly",
    });
  });

  it("makes no call for an empty query", async () => {
    const { result, calls } = await runClassifier("  ", completion("{}"));

    expect(calls).toHaveLength(0);
    if (Either.isRight(result)) throw new Error("Expected failure but got success");
    expect(result.left._tag).toBe("ExtractionError");
  });

  it("maps a non-2xx answer to UpstreamError Status", async () => {
    const { result, calls } = await runClassifier("price of Apple", { error: "nope" }, 401);

    expect(calls).toHaveLength(1);
    if (Either.isRight(result)) throw new Error("Expected failure but got success");
    expect(result.left).toMatchObject({ _tag: "UpstreamError", reason: "Status", status: 401 });
  });

  it("maps an unexpected completion body to UpstreamError Parse", async () => {
    const { result } = await runClassifier("price of Apple", { id: "x" });

    if (Either.isRight(result)) throw new Error("Expected failure but got success");
    expect(result.left).toMatchObject({ _tag: "UpstreamError", reason: "Parse" });
  });
});
