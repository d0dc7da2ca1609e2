// JSON routes over the snapshot service and the quote pass-through.

import {
  HttpMiddleware,
  HttpRouter,
  HttpServerRequest,
  HttpServerResponse,
} from "@effect/platform";
import { Effect, Option, Schema } from "effect";
import type { PriceSeries, Snapshot } from "./domain.ts";
import { ApiSettings, readMarketClock } from "./config.ts";
import { getDetails, getHistory } from "./quotes.ts";
import { getSnapshot } from "./snapshot-service.ts";
import { parseTargetDate } from "./target-date.ts";

// --- Wire shapes ---

const SnapshotRecord = Schema.Struct({
  symbol: Schema.propertySignature(Schema.String).pipe(Schema.fromKey("Symbol")),
  latest: Schema.propertySignature(Schema.Number).pipe(Schema.fromKey("Latest")),
  previous: Schema.propertySignature(Schema.Number).pipe(
    Schema.fromKey("Previous"),
  ),
  difference: Schema.propertySignature(Schema.Number).pipe(
    Schema.fromKey("Difference"),
  ),
  change: Schema.propertySignature(Schema.Number).pipe(Schema.fromKey("Change")),
});

const encodeSnapshot = Schema.encodeSync(Schema.Array(SnapshotRecord));

const encodeHistory = (series: PriceSeries) =>
  series.map(({ date, close }) => ({ Date: date, Close: close }));

const StocksQuery = Schema.Struct({ date: Schema.optional(Schema.String) });

const QuoteQuery = Schema.Struct({
  symbol: Schema.optional(Schema.String),
  period: Schema.optional(Schema.String),
});

// --- Helpers ---

const json = (body: unknown, status = 200) =>
  HttpServerResponse.unsafeJson(body, { status });

const NO_DATA = { data: [], message: "No data found" } as const;

/** Any failure a handler did not map becomes a 500 instead of escaping. */
const guarded = <E, R>(
  handler: Effect.Effect<HttpServerResponse.HttpServerResponse, E, R>,
) =>
  handler.pipe(
    Effect.catchAllCause((cause) =>
      Effect.logError("[api] unhandled failure", cause).pipe(
        Effect.as(json({ error: "Internal server error" }, 500)),
      ),
    ),
  );

// --- Handlers ---

const stocks = Effect.gen(function* () {
  const query = yield* HttpServerRequest.schemaSearchParams(StocksQuery);
  const date =
    query.date === undefined
      ? (yield* readMarketClock).today
      : yield* parseTargetDate(query.date);
  const snapshot: Option.Option<Snapshot> = yield* getSnapshot(date);
  // A stored header-only file reads back as an empty snapshot.
  return Option.match(Option.filter(snapshot, (rows) => rows.length > 0), {
    onNone: () => json(NO_DATA),
    onSome: (rows) => json({ data: encodeSnapshot(rows) }),
  });
}).pipe(
  Effect.catchTags({
    ParseError: (e) => Effect.succeed(json({ error: e.message }, 400)),
    InvalidDate: (e) =>
      Effect.succeed(json({ error: `Invalid date: ${e.input}` }, 400)),
    SourceNotFound: () =>
      Effect.succeed(json({ error: "CSV file missing" }, 404)),
    MalformedSource: (e) => Effect.succeed(json({ error: e.message }, 500)),
    FetchFailure: (e) =>
      Effect.gen(function* () {
        yield* Effect.logWarning(`[api] download failed: ${e.message}`);
        const { surfaceFetchFailures } = yield* ApiSettings;
        return surfaceFetchFailures
          ? json({ error: e.message }, 502)
          : json(NO_DATA);
      }),
  }),
);

const details = Effect.gen(function* () {
  const { symbol } = yield* HttpServerRequest.schemaSearchParams(QuoteQuery);
  return json(yield* getDetails(symbol));
}).pipe(
  Effect.catchTags({
    ParseError: (e) => Effect.succeed(json({ error: e.message }, 400)),
    SymbolRequired: () =>
      Effect.succeed(json({ error: "Symbol required" }, 400)),
    ProviderError: (e) => Effect.succeed(json({ error: e.message }, 500)),
  }),
);

const history = Effect.gen(function* () {
  const { symbol, period } =
    yield* HttpServerRequest.schemaSearchParams(QuoteQuery);
  return json(encodeHistory(yield* getHistory(symbol, period)));
}).pipe(
  Effect.catchTags({
    ParseError: (e) => Effect.succeed(json({ error: e.message }, 400)),
    SymbolRequired: () =>
      Effect.succeed(json({ error: "Symbol required" }, 400)),
    InvalidPeriod: (e) =>
      Effect.succeed(json({ error: `Invalid period: ${e.period}` }, 400)),
    ProviderError: (e) => Effect.succeed(json({ error: e.message }, 500)),
  }),
);

// --- Router ---

export const router = HttpRouter.empty.pipe(
  HttpRouter.get("/api/stocks", guarded(stocks)),
  HttpRouter.get("/api/stock_details", guarded(details)),
  HttpRouter.get("/api/stock_history", guarded(history)),
);

/** Browser front ends on any origin call this API. */
export const httpApp = router.pipe(HttpMiddleware.cors());
