// Query classifier: a keyword implementation and an
// LLM-backed implementation that share the same output contract.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import {
  Config,
  Context,
  Data,
  Effect,
  Layer,
  Redacted,
  Schema,
} from "effect";
import {
  ChartRequest,
  type ClassifiedRequest,
  DEFAULT_INTERVAL,
  DEFAULT_RANGE,
  isRange,
  parseInterval,
  PriceRequest,
} from "./domain.ts";
import { requestJson } from "./http.ts";
import { classifierPrompt } from "./prompts.ts";
import { ExtractionError, routeQuery } from "./router.ts";
import { UpstreamError } from "./stock-api.ts";

// --- Errors ---

export class ClassificationError extends Data.TaggedError("ClassificationError")<{
  readonly message: string;
}> {}

export type ClassifierError =
  | ExtractionError
  | ClassificationError
  | UpstreamError;

// --- Service ---

export class QueryClassifier extends Context.Tag("QueryClassifier")<
  QueryClassifier,
  {
    readonly classify: (
      query: string,
    ) => Effect.Effect<ClassifiedRequest, ClassifierError>;
  }
>() {}

export const KeywordClassifierLive = Layer.succeed(
  QueryClassifier,
  QueryClassifier.of({ classify: routeQuery }),
);

// --- Classifier reply ---

const ClassifierReply = Schema.Struct({
  request_type: Schema.Literal("price", "chart"),
  ticker: Schema.String,
  time_range: Schema.optional(Schema.NullOr(Schema.String)),
  interval: Schema.optional(Schema.NullOr(Schema.String)),
});

type ClassifierReplyType = typeof ClassifierReply.Type;

/** Models often wrap JSON in prose or code fences. */
export function extractJsonObject(text: string): string | undefined {
  const unfenced = text.replace(/```(?:json)?/gi, "");
  const start = unfenced.indexOf("{");
  const end = unfenced.lastIndexOf("}");
  return start !== -1 && end > start ? unfenced.slice(start, end + 1) : undefined;
}

export function decodeClassification(
  query: string,
  reply: string,
): Effect.Effect<ClassifiedRequest, ClassificationError | ExtractionError> {
  const json = extractJsonObject(reply);
  if (json === undefined) {
    return Effect.fail(
      new ClassificationError({ message: "Classifier reply contains no JSON object" }),
    );
  }

  return Schema.decodeUnknown(Schema.parseJson(ClassifierReply))(json).pipe(
    Effect.mapError(
      (e) =>
        new ClassificationError({
          message: `Malformed classifier reply: ${e.message}`,
        }),
    ),
    Effect.flatMap((parsed) => toRequest(query, parsed)),
  );
}

function toRequest(
  query: string,
  reply: ClassifierReplyType,
): Effect.Effect<ClassifiedRequest, ExtractionError> {
  const subject = reply.ticker.trim();
  if (subject.length === 0) {
    return Effect.fail(
      new ExtractionError({
        query,
        message: "Classifier returned no company name or ticker",
      }),
    );
  }
  if (reply.request_type === "price") {
    return Effect.succeed(PriceRequest(subject));
  }

  // Unknown codes fall back to the defaults, as the keyword router does.
  const rangeCode = (reply.time_range ?? "").trim().toLowerCase();
  const range = isRange(rangeCode) ? rangeCode : DEFAULT_RANGE;
  const interval = parseInterval(reply.interval ?? "") ?? DEFAULT_INTERVAL;
  return Effect.succeed(ChartRequest(subject, range, interval));
}

// --- Chat completions ---

const ChatCompletion = Schema.Struct({
  choices: Schema.Array(
    Schema.Struct({
      message: Schema.Struct({ content: Schema.NullOr(Schema.String) }),
    }),
  ),
});

export interface LlmConfig {
  readonly apiKey: Redacted.Redacted;
  readonly baseUrl: string;
  readonly model: string;
}

export const llmConfig = Effect.gen(function* () {
  const apiKey = yield* Config.redacted("LLM_API_KEY");
  const baseUrl = yield* Config.string("LLM_BASE_URL").pipe(
    Config.withDefault("https://api.openai.com/v1"),
  );
  const model = yield* Config.string("LLM_MODEL").pipe(
    Config.withDefault("gpt-4o-mini"),
  );
  return { apiKey, baseUrl, model } satisfies LlmConfig;
});

export function makeLlmClassifier(
  config: LlmConfig,
): Effect.Effect<Context.Tag.Service<typeof QueryClassifier>, never, HttpClient.HttpClient> {
  return Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk);

    const complete = (query: string) =>
      requestJson(
        client,
        HttpClientRequest.post(`${config.baseUrl}/chat/completions`).pipe(
          HttpClientRequest.bearerToken(Redacted.value(config.apiKey)),
          HttpClientRequest.bodyUnsafeJson({
            model: config.model,
            temperature: 0,
            messages: [
              { role: "system", content: classifierPrompt },
              { role: "user", content: query },
            ],
          }),
        ),
      ).pipe(
        Effect.flatMap(Schema.decodeUnknown(ChatCompletion)),
        Effect.mapError((e) =>
          e._tag === "UpstreamError"
            ? e
            : new UpstreamError({
                reason: "Parse",
                message: `Invalid chat completion: ${e.message}`,
              }),
        ),
        Effect.map(({ choices }) =>
          choices.length > 0 ? choices[0].message.content ?? "" : "",
        ),
      );

    return QueryClassifier.of({
      classify: (query: string) =>
        Effect.gen(function* () {
          if (query.trim().length === 0) {
            return yield* Effect.fail(
              new ExtractionError({ query, message: "Query is empty" }),
            );
          }
          const reply = yield* complete(query);
          yield* Effect.logDebug("classifier reply").pipe(
            Effect.annotateLogs({ model: config.model, reply }),
          );
          return yield* decodeClassification(query, reply);
        }),
    });
  });
}

export const LlmClassifierLive = Layer.effect(
  QueryClassifier,
  Effect.flatMap(llmConfig, makeLlmClassifier),
);
