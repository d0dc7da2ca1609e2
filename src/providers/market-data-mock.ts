// In-memory MarketData for development and tests.

import { Effect, Layer } from "effect";
import { PerTicker, type RawBar, Single, type Ticker } from "../domain.ts";
import { MarketData, SymbolNotFound } from "../market-data.ts";

// --- Sample data ---

const closes: Record<Ticker, ReadonlyArray<RawBar>> = {
  "RELIANCE.NS": [
    { date: "2025-06-10", close: 1440.6 },
    { date: "2025-06-11", close: 1447.2 },
    { date: "2025-06-12", close: 1439.1 },
    { date: "2025-06-13", close: 1452.8 },
  ],
  "TCS.NS": [
    { date: "2025-06-10", close: 3461 },
    { date: "2025-06-11", close: 3455.5 },
    { date: "2025-06-12", close: 3448.9 },
    { date: "2025-06-13", close: 3421.3 },
  ],
  "INFY.NS": [
    { date: "2025-06-10", close: 1571.4 },
    { date: "2025-06-11", close: null },
    { date: "2025-06-12", close: 1580.2 },
    { date: "2025-06-13", close: 1583.7 },
  ],
};

const within = (from: string, to: string) => (bar: RawBar) =>
  bar.date >= from && bar.date < to;

// --- Mock layer ---

export const MarketDataTestLive = Layer.succeed(
  MarketData,
  MarketData.of({
    download: (tickers, window) => {
      const series = new Map<Ticker, ReadonlyArray<RawBar>>();
      for (const ticker of tickers) {
        const bars = closes[ticker];
        if (bars !== undefined) {
          series.set(ticker, bars.filter(within(window.start, window.end)));
        }
      }
      return Effect.succeed(
        tickers.length === 1
          ? Single(series.get(tickers[0]) ?? [])
          : PerTicker(series),
      );
    },
    details: (ticker) =>
      closes[ticker] !== undefined
        ? Effect.succeed({
            symbol: ticker,
            currency: "INR",
            exchangeName: "NSI",
            instrumentType: "EQUITY",
          })
        : Effect.fail(new SymbolNotFound({ symbol: ticker })),
    history: (ticker) => {
      const bars = closes[ticker];
      if (bars === undefined) {
        return Effect.fail(new SymbolNotFound({ symbol: ticker }));
      }
      return Effect.succeed(
        bars.flatMap(({ date, close }) =>
          close === null ? [] : [{ date, close }],
        ),
      );
    },
  }),
);
