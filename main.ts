import { Command, Options } from "@effect/cli";
import {
  FetchHttpClient,
  type HttpClient,
  HttpMiddleware,
  HttpServer,
} from "@effect/platform";
import {
  NodeContext,
  NodeHttpServer,
  NodeRuntime,
} from "@effect/platform-node";
import { createServer } from "node:http";
import process from "node:process";
import {
  Config,
  type ConfigError,
  Console,
  Effect,
  Layer,
  Logger,
  LogLevel,
  Option,
} from "effect";
import { CacheStoreLive } from "./src/cache-store.ts";
import {
  ApiSettingsLive,
  MarketSessionLive,
  readMarketClock,
} from "./src/config.ts";
import { formatError, formatSnapshot } from "./src/format.ts";
import { httpApp } from "./src/http-api.ts";
import type { MarketData } from "./src/market-data.ts";
import { MarketDataTestLive } from "./src/providers/market-data-mock.ts";
import { YahooFinanceLive } from "./src/providers/yahoo-finance.ts";
import { getSnapshot } from "./src/snapshot-service.ts";
import { parseTargetDate } from "./src/target-date.ts";
import { UniverseLive } from "./src/universe.ts";

// --- CLI ---

const port = Options.integer("port").pipe(
  Options.withDescription("Port to listen on"),
  Options.withFallbackConfig(
    Config.integer("PORT").pipe(Config.withDefault(5001)),
  ),
);

const host = Options.text("host").pipe(
  Options.withDescription("Interface to bind"),
  Options.withFallbackConfig(
    Config.string("HOST").pipe(Config.withDefault("0.0.0.0")),
  ),
);

const date = Options.text("date").pipe(
  Options.withDescription("Trading day, YYYY-MM-DD (default: today)"),
  Options.optional,
);

const serve = Command.make("serve", { port, host }, ({ port, host }) =>
  Layer.launch(
    httpApp.pipe(
      HttpServer.serve(HttpMiddleware.logger),
      HttpServer.withLogAddress,
      Layer.provide(NodeHttpServer.layer(createServer, { port, host })),
    ),
  ),
).pipe(Command.withDescription("Serve the JSON API"));

const snapshot = Command.make("snapshot", { date }, ({ date }) =>
  Effect.gen(function* () {
    const target = Option.isSome(date)
      ? yield* parseTargetDate(date.value)
      : (yield* readMarketClock).today;
    const rows = yield* getSnapshot(target);
    yield* Console.log(
      formatSnapshot(target, Option.getOrElse(rows, () => [])),
    );
  }).pipe(
    Effect.catchTags({
      InvalidDate: (e) => Console.error(formatError(e)),
      SourceNotFound: (e) => Console.error(formatError(e)),
      MalformedSource: (e) => Console.error(formatError(e)),
      FetchFailure: (e) => Console.error(formatError(e)),
    }),
  ),
).pipe(Command.withDescription("Print the movers for one trading day"));

const command = Command.make("market-movers").pipe(
  Command.withSubcommands([serve, snapshot]),
);

// --- Layers ---
// Set MARKET_DATA_PROVIDER to "yahoo" (default) or "test".

const selectProvider = (
  provider: string,
): Layer.Layer<MarketData, ConfigError.ConfigError, HttpClient.HttpClient> =>
  provider === "test" ? MarketDataTestLive : YahooFinanceLive;

const MarketDataLive = Layer.unwrapEffect(
  Config.string("MARKET_DATA_PROVIDER").pipe(
    Config.withDefault("yahoo"),
    Effect.map(selectProvider),
  ),
).pipe(Layer.provide(FetchHttpClient.layer));

const AppLive = Layer.mergeAll(
  MarketDataLive,
  CacheStoreLive,
  UniverseLive,
  ApiSettingsLive,
).pipe(
  Layer.provideMerge(MarketSessionLive),
  Layer.provide(NodeContext.layer),
);

const LoggerLive = Layer.unwrapEffect(
  Config.logLevel("LOG_LEVEL").pipe(
    Config.withDefault(LogLevel.Info),
    Effect.map(Logger.minimumLogLevel),
  ),
);

// --- Run ---

const cli = Command.run(command, {
  name: "market-movers",
  version: "0.1.0",
});

cli(process.argv).pipe(
  Effect.provide(AppLive),
  Effect.provide(LoggerLive),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
