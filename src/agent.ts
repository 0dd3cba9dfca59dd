// Classify free text, then execute the classified request.

import { Effect } from "effect";
import type { Outcome } from "./domain.ts";
import {
  type ClassificationError,
  QueryClassifier,
} from "./classifier.ts";
import { execute } from "./executor.ts";
import type { ExtractionError } from "./router.ts";
import type {
  StockApi,
  SymbolNotFoundError,
  UpstreamError,
} from "./stock-api.ts";

export type AgentError =
  | ExtractionError
  | ClassificationError
  | SymbolNotFoundError
  | UpstreamError;

export function answer(
  query: string,
): Effect.Effect<Outcome, AgentError, QueryClassifier | StockApi> {
  return Effect.gen(function* () {
    const classifier = yield* QueryClassifier;
    const request = yield* classifier.classify(query);
    yield* Effect.logDebug("classified query").pipe(
      Effect.annotateLogs({ query, request: request._tag, subject: request.symbolOrName }),
    );
    return yield* execute(request);
  });
}
