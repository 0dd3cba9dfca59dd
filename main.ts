import { Args, Command, Options, Prompt } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import {
  Config,
  ConfigError,
  Console,
  Duration,
  Effect,
  Layer,
  Logger,
  LogLevel,
} from "effect";
import { type AgentError, answer } from "./src/agent.ts";
import {
  KeywordClassifierLive,
  LlmClassifierLive,
} from "./src/classifier.ts";
import {
  ChartRequest,
  DEFAULT_INTERVAL,
  DEFAULT_RANGE,
  INTERVALS,
  type Outcome,
  PriceRequest,
  RANGES,
} from "./src/domain.ts";
import { execute } from "./src/executor.ts";
import { formatError, formatOutcome } from "./src/format.ts";
import { requireSubject } from "./src/router.ts";
import { StockApiTestLive } from "./src/providers/stock-api-mock.ts";
import { YahooRapidApiLive } from "./src/providers/yahoo-rapidapi.ts";
import { type StockApi, UpstreamError } from "./src/stock-api.ts";

// --- Layers ---
// STOCK_PROVIDER: "rapidapi" (default) or "test".
// QUERY_CLASSIFIER: "keyword" (default) or "llm".

const StockApiLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("STOCK_PROVIDER").pipe(
      Config.withDefault("rapidapi"),
    );
    switch (provider) {
      case "test":
        return StockApiTestLive;
      default:
        return YahooRapidApiLive;
    }
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

const QueryClassifierLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const kind = yield* Config.literal("keyword", "llm")("QUERY_CLASSIFIER").pipe(
      Config.withDefault("keyword"),
    );
    return kind === "llm" ? LlmClassifierLive : KeywordClassifierLive;
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

const LoggerLive = Layer.unwrapEffect(
  Config.logLevel("LOG_LEVEL").pipe(
    Config.withDefault(LogLevel.Info),
    Effect.catchAll(() =>
      Effect.as(Effect.logWarning("Ignoring invalid LOG_LEVEL"), LogLevel.Info)
    ),
    Effect.map(Logger.minimumLogLevel),
  ),
);

// --- Lookup ---

const requestTimeout = Config.duration("REQUEST_TIMEOUT").pipe(
  Config.withDefault(Duration.seconds(10)),
);

const report = (e: AgentError | ConfigError.ConfigError) =>
  ConfigError.isConfigError(e)
    ? Console.error(`\n  Configuration error: ${String(e)}\n`)
    : Console.error(formatError(e));

function lookup(
  outcome: Effect.Effect<Outcome, AgentError | ConfigError.ConfigError, StockApi>,
  json: boolean,
) {
  return Effect.gen(function* () {
    const duration = yield* requestTimeout;
    const result = yield* outcome.pipe(
      Effect.timeoutFail({
        duration,
        onTimeout: () =>
          new UpstreamError({ reason: "Network", message: "Request timed out" }),
      }),
    );
    yield* Console.log(
      json ? JSON.stringify(result, null, 2) : formatOutcome(result),
    );
  }).pipe(
    Effect.provide(StockApiLive),
    Effect.tapError(report),
  );
}

// --- CLI ---

const json = Options.boolean("json").pipe(
  Options.withDescription("Print the result as JSON"),
);

const range = Options.choice("range", RANGES).pipe(
  Options.withDefault(DEFAULT_RANGE),
  Options.withDescription("Time span of the chart"),
);

const interval = Options.choice("interval", INTERVALS).pipe(
  Options.withDefault(DEFAULT_INTERVAL),
  Options.withDescription("Spacing between chart points"),
);

const symbolOrName = Args.text({ name: "symbol" }).pipe(
  Args.withDescription("Ticker (e.g. AAPL) or company name (e.g. \"Bank of America\")"),
);

const queryWords = Args.text({ name: "query" }).pipe(
  Args.repeated,
  Args.withDescription("Question in plain English"),
);

const queryPrompt = Prompt.text({
  message: "What would you like to know?",
  validate: (value) =>
    value.trim().length === 0
      ? Effect.fail("Question cannot be empty")
      : Effect.succeed(value.trim()),
});

const ask = Command.make(
  "ask",
  { query: queryWords, json },
  ({ query, json }) =>
    Effect.gen(function* () {
      const text = query.length > 0 ? query.join(" ") : yield* queryPrompt;
      yield* lookup(
        answer(text).pipe(Effect.provide(QueryClassifierLive)),
        json,
      );
    }),
).pipe(Command.withDescription("Answer a free-text question about a stock"));

const price = Command.make(
  "price",
  { symbol: symbolOrName, json },
  ({ symbol, json }) =>
    lookup(
      requireSubject(symbol).pipe(
        Effect.flatMap((subject) => execute(PriceRequest(subject))),
      ),
      json,
    ),
).pipe(Command.withDescription("Show current price and key figures"));

const chart = Command.make(
  "chart",
  { symbol: symbolOrName, range, interval, json },
  ({ symbol, range, interval, json }) =>
    lookup(
      requireSubject(symbol).pipe(
        Effect.flatMap((subject) => execute(ChartRequest(subject, range, interval))),
      ),
      json,
    ),
).pipe(Command.withDescription("Show historical closing prices"));

const command = Command.make("stock-agent").pipe(
  Command.withSubcommands([ask, price, chart]),
);

// --- Run ---

const cli = Command.run(command, {
  name: "stock-agent",
  version: "0.1.0",
});

// Handlers print their own errors; a failure still exits with code 1.
const program = cli(process.argv).pipe(
  Effect.provide(LoggerLive),
  Effect.provide(NodeContext.layer),
);

NodeRuntime.runMain(program, { disableErrorReporting: true });
