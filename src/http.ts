// Runs a request and maps platform client errors to UpstreamError.

import type {
  HttpClient,
  HttpClientError,
  HttpClientRequest,
} from "@effect/platform";
import { Effect } from "effect";
import { UpstreamError } from "./stock-api.ts";

export function toUpstreamError(
  e: HttpClientError.HttpClientError,
): UpstreamError {
  if (e._tag === "RequestError") {
    return new UpstreamError({ reason: "Network", message: e.message });
  }
  if (e.reason === "StatusCode") {
    return new UpstreamError({
      reason: "Status",
      status: e.response.status,
      message: `HTTP ${e.response.status}`,
    });
  }
  return new UpstreamError({
    reason: "Parse",
    message: `Response body could not be decoded: ${e.message}`,
  });
}

/** Execute `request` once and read the body as JSON. The client is expected
 *  to reject non-2xx responses (HttpClient.filterStatusOk). */
export function requestJson(
  client: HttpClient.HttpClient,
  request: HttpClientRequest.HttpClientRequest,
): Effect.Effect<unknown, UpstreamError> {
  return Effect.gen(function* () {
    const started = Date.now();
    const response = yield* client.execute(request);
    yield* Effect.logDebug("upstream response").pipe(
      Effect.annotateLogs({
        method: request.method,
        url: request.url,
        status: response.status,
        durationMs: Date.now() - started,
      }),
    );
    return yield* response.json;
  }).pipe(Effect.mapError(toUpstreamError));
}
