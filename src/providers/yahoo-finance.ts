import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Array as Arr, Config, Effect, Layer, Schema } from "effect";
import {
  type BatchResult,
  PerTicker,
  type PriceSeries,
  type RawBar,
  Single,
  type Ticker,
} from "../domain.ts";
import {
  describeMarketDataError,
  type DownloadWindow,
  HttpError,
  MarketData,
  NetworkError,
  ParseError,
  type ProviderInfo,
  ServiceError,
  SymbolNotFound,
} from "../market-data.ts";
import { toEpochSeconds } from "../target-date.ts";

// --- Yahoo response schemas ---

const ChartSeries = Schema.Struct({
  meta: Schema.Struct({
    symbol: Schema.String,
    gmtoffset: Schema.optional(Schema.Number),
  }),
  timestamp: Schema.optional(Schema.Array(Schema.Number)),
  indicators: Schema.optional(
    Schema.Struct({
      quote: Schema.Array(
        Schema.Struct({
          close: Schema.optional(Schema.Array(Schema.NullOr(Schema.Number))),
        }),
      ),
    }),
  ),
});

type ChartSeriesType = typeof ChartSeries.Type;

const YahooError = Schema.NullOr(
  Schema.Struct({ description: Schema.optional(Schema.String) }),
);

const SparkResponse = Schema.Struct({
  spark: Schema.Struct({
    result: Schema.NullOr(
      Schema.Array(
        Schema.Struct({
          symbol: Schema.String,
          response: Schema.Array(ChartSeries),
        }),
      ),
    ),
    error: YahooError,
  }),
});

const ChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(ChartSeries)),
    error: YahooError,
  }),
});

const MetaResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(
      Schema.Array(
        Schema.Struct({
          meta: Schema.Record({ key: Schema.String, value: Schema.Unknown }),
        }),
      ),
    ),
    error: YahooError,
  }),
});

// --- Decoding ---

/** Trading day of a bar, in the exchange's own offset from UTC. */
export function exchangeDate(timestamp: number, gmtoffset: number): string {
  return new Date((timestamp + gmtoffset) * 1000).toISOString().slice(0, 10);
}

function toBars(series: ChartSeriesType): RawBar[] {
  const offset = series.meta.gmtoffset ?? 0;
  const closes = series.indicators?.quote[0]?.close ?? [];
  return (series.timestamp ?? []).map((t, i) => ({
    date: exchangeDate(t, offset),
    close: closes[i] ?? null,
  }));
}

const invalidResponse = (e: { readonly message: string }) =>
  new ParseError({ message: `Invalid response: ${e.message}` });

/** Bars per symbol. Symbols Yahoo has no series for are left out. */
export function decodeSparkResponse(
  json: unknown,
): Effect.Effect<Map<Ticker, RawBar[]>, ParseError | ServiceError> {
  return Schema.decodeUnknown(SparkResponse)(json).pipe(
    Effect.mapError(invalidResponse),
    Effect.flatMap(({ spark }) => {
      if (spark.error !== null) {
        return Effect.fail(
          new ServiceError({
            message: spark.error.description ?? "Yahoo spark request failed",
          }),
        );
      }
      const bars = new Map<Ticker, RawBar[]>();
      for (const item of spark.result ?? []) {
        const [series] = item.response;
        if (series === undefined || series.timestamp === undefined) continue;
        bars.set(item.symbol, toBars(series));
      }
      return Effect.succeed(bars);
    }),
  );
}

/** One requested ticker comes back as a flat series, several as a keyed map. */
export function toBatchResult(
  tickers: ReadonlyArray<Ticker>,
  bars: ReadonlyMap<Ticker, ReadonlyArray<RawBar>>,
): BatchResult {
  if (tickers.length === 1) return Single(bars.get(tickers[0]) ?? []);
  return PerTicker(bars);
}

function firstChartSeries(
  json: unknown,
  symbol: string,
): Effect.Effect<ChartSeriesType, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(ChartResponse)(json).pipe(
    Effect.mapError(invalidResponse),
    Effect.flatMap(({ chart }) => {
      if (chart.error !== null || chart.result === null) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }
      const [series] = chart.result;
      return series === undefined
        ? Effect.fail(new SymbolNotFound({ symbol }))
        : Effect.succeed(series);
    }),
  );
}

export function decodeChartHistory(
  json: unknown,
  symbol: string,
): Effect.Effect<PriceSeries, ParseError | SymbolNotFound> {
  return firstChartSeries(json, symbol).pipe(
    Effect.map((series) =>
      toBars(series).flatMap(({ date, close }) =>
        close === null ? [] : [{ date, close }],
      ),
    ),
  );
}

export function decodeChartMeta(
  json: unknown,
  symbol: string,
): Effect.Effect<ProviderInfo, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(MetaResponse)(json).pipe(
    Effect.mapError(invalidResponse),
    Effect.flatMap(({ chart }) => {
      const [first] = chart.result ?? [];
      return chart.error !== null || first === undefined
        ? Effect.fail(new SymbolNotFound({ symbol }))
        : Effect.succeed(first.meta);
    }),
  );
}

// --- Yahoo Finance layer ---

const REQUEST_TIMEOUT = "10 seconds";

export const makeYahooFinanceApi = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
    HttpClient.mapRequest(
      HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
    ),
  );
  const baseUrl = yield* Config.string("YAHOO_BASE_URL").pipe(
    Config.withDefault("https://query1.finance.yahoo.com"),
  );
  const batchSize = yield* Config.integer("YAHOO_BATCH_SIZE").pipe(
    Config.withDefault(20),
    Config.validate({
      message: "YAHOO_BATCH_SIZE must be positive",
      validation: (n) => n > 0,
    }),
  );

  const getJson = (url: string, urlParams: Record<string, string>) =>
    Effect.gen(function* () {
      const response = yield* client.get(url, { urlParams });
      return yield* response.json;
    }).pipe(
      Effect.timeoutFail({
        duration: REQUEST_TIMEOUT,
        onTimeout: () => new NetworkError({ message: "Request timed out" }),
      }),
      Effect.catchTags({
        RequestError: (e) =>
          Effect.fail(new NetworkError({ message: e.message })),
        ResponseError: (e) =>
          e.reason === "StatusCode"
            ? Effect.fail(new HttpError({ status: e.response.status }))
            : Effect.fail(
                new ParseError({
                  message: `JSON parse failed: ${e.message}`,
                }),
              ),
      }),
    );

  const chart = (ticker: Ticker, range: string) =>
    getJson(`${baseUrl}/v8/finance/chart/${encodeURIComponent(ticker)}`, {
      range,
      interval: "1d",
    });

  const spark = (chunk: ReadonlyArray<Ticker>, window: DownloadWindow) =>
    getJson(`${baseUrl}/v7/finance/spark`, {
      symbols: chunk.join(","),
      period1: String(toEpochSeconds(window.start)),
      period2: String(toEpochSeconds(window.end)),
      interval: "1d",
    }).pipe(Effect.flatMap(decodeSparkResponse));

  return MarketData.of({
    download: (tickers, window) =>
      // Sequential: the endpoint caps symbols per request and throttles bursts.
      // A failed batch only drops its own tickers; every batch failing is an
      // outage.
      Effect.forEach(Arr.chunksOf(tickers, batchSize), (chunk) =>
        spark(chunk, window).pipe(
          Effect.tapError((e) =>
            Effect.logWarning(
              `[yahoo] batch ${chunk[0]}..${chunk[chunk.length - 1]} (${chunk.length}) failed: ${describeMarketDataError(e)}`,
            ),
          ),
          Effect.either,
        ),
      ).pipe(
        Effect.flatMap((results) => {
          const parts = Arr.getRights(results);
          const [firstFailure] = Arr.getLefts(results);
          return parts.length === 0 && firstFailure !== undefined
            ? Effect.fail(firstFailure)
            : Effect.succeed(
                toBatchResult(tickers, new Map(parts.flatMap((part) => [...part]))),
              );
        }),
        Effect.tap(() =>
          Effect.logDebug(
            `[yahoo] downloaded ${tickers.length} ticker(s) ${window.start}..${window.end}`,
          ),
        ),
      ),
    details: (ticker) =>
      chart(ticker, "1d").pipe(
        Effect.flatMap((json) => decodeChartMeta(json, ticker)),
      ),
    history: (ticker, period) =>
      chart(ticker, period).pipe(
        Effect.flatMap((json) => decodeChartHistory(json, ticker)),
      ),
  });
});

export const YahooFinanceLive = Layer.effect(MarketData, makeYahooFinanceApi);
