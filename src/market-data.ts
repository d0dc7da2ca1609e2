import { Context, Data, Effect, Schema } from "effect";
import type {
  BatchResult,
  PriceSeries,
  TargetDate,
  Ticker,
} from "./domain.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export class ServiceError extends Data.TaggedError("ServiceError")<{
  readonly message: string;
}> {}

export type MarketDataError =
  | NetworkError
  | HttpError
  | ParseError
  | SymbolNotFound
  | ServiceError;

export function describeMarketDataError(error: MarketDataError): string {
  switch (error._tag) {
    case "HttpError":
      return `HTTP ${error.status}`;
    case "SymbolNotFound":
      return `No data found for symbol ${error.symbol}`;
    case "NetworkError":
    case "ParseError":
    case "ServiceError":
      return error.message;
  }
}

// --- Request shapes ---

/** Download window; `end` is exclusive. */
export interface DownloadWindow {
  readonly start: TargetDate;
  readonly end: TargetDate;
}

export const HistoryPeriod = Schema.Literal(
  "1d",
  "5d",
  "1mo",
  "3mo",
  "6mo",
  "1y",
  "2y",
  "5y",
  "10y",
  "ytd",
  "max",
);
export type HistoryPeriod = typeof HistoryPeriod.Type;

export const DEFAULT_HISTORY_PERIOD: HistoryPeriod = "1mo";

/** Whatever metadata the provider publishes for a symbol, passed through as-is. */
export type ProviderInfo = { readonly [key: string]: unknown };

// --- Service ---

export class MarketData extends Context.Tag("MarketData")<
  MarketData,
  {
    /** Daily closes for every ticker over `window`, in one logical request. */
    readonly download: (
      tickers: ReadonlyArray<Ticker>,
      window: DownloadWindow,
    ) => Effect.Effect<BatchResult, MarketDataError>;
    readonly details: (
      ticker: Ticker,
    ) => Effect.Effect<ProviderInfo, MarketDataError>;
    readonly history: (
      ticker: Ticker,
      period: HistoryPeriod,
    ) => Effect.Effect<PriceSeries, MarketDataError>;
  }
>() {}
