// Per-symbol details and history. Never cached.

import { Data, Effect, Schema } from "effect";
import type { PriceSeries, Ticker } from "./domain.ts";
import { MarketSession } from "./config.ts";
import {
  DEFAULT_HISTORY_PERIOD,
  describeMarketDataError,
  HistoryPeriod,
  MarketData,
  type MarketDataError,
  type ProviderInfo,
} from "./market-data.ts";

// --- Errors ---

export class SymbolRequired extends Data.TaggedError("SymbolRequired")<{}> {}

export class InvalidPeriod extends Data.TaggedError("InvalidPeriod")<{
  readonly period: string;
}> {}

export class ProviderError extends Data.TaggedError("ProviderError")<{
  readonly message: string;
}> {}

export type QuoteError = SymbolRequired | InvalidPeriod | ProviderError;

// --- Symbol qualification ---

export function qualifySymbol(
  symbol: string,
  defaultSuffix: string,
  knownSuffixes: ReadonlyArray<string>,
): Ticker {
  return knownSuffixes.some((suffix) => symbol.endsWith(suffix))
    ? symbol
    : `${symbol}${defaultSuffix}`;
}

const requireTicker = (symbol: string | undefined) =>
  Effect.gen(function* () {
    if (symbol === undefined || symbol.length === 0) {
      return yield* Effect.fail(new SymbolRequired());
    }
    const session = yield* MarketSession;
    return qualifySymbol(symbol, session.suffix, session.knownSuffixes);
  });

const toProviderError = (e: MarketDataError) =>
  new ProviderError({ message: describeMarketDataError(e) });

// --- Operations ---

export function getDetails(
  symbol: string | undefined,
): Effect.Effect<
  ProviderInfo,
  SymbolRequired | ProviderError,
  MarketData | MarketSession
> {
  return Effect.gen(function* () {
    const ticker = yield* requireTicker(symbol);
    const api = yield* MarketData;
    return yield* api.details(ticker).pipe(Effect.mapError(toProviderError));
  });
}

export function getHistory(
  symbol: string | undefined,
  period: string | undefined,
): Effect.Effect<PriceSeries, QuoteError, MarketData | MarketSession> {
  return Effect.gen(function* () {
    const ticker = yield* requireTicker(symbol);
    const range = yield* Schema.decodeUnknown(HistoryPeriod)(
      period ?? DEFAULT_HISTORY_PERIOD,
    ).pipe(
      Effect.mapError(() => new InvalidPeriod({ period: period ?? "" })),
    );
    const api = yield* MarketData;
    return yield* api.history(ticker, range).pipe(
      Effect.mapError(toProviderError),
    );
  });
}
