import { Data, Effect, Either, Option } from "effect";
import type {
  BatchResult,
  PriceSeries,
  RawBar,
  Snapshot,
  SnapshotRow,
  TargetDate,
  Ticker,
} from "./domain.ts";
import {
  describeMarketDataError,
  type DownloadWindow,
  MarketData,
} from "./market-data.ts";
import { shiftDays } from "./target-date.ts";

// --- Errors ---

/** The batch download itself failed; distinct from "no data for this date". */
export class FetchFailure extends Data.TaggedError("FetchFailure")<{
  readonly message: string;
}> {}

// --- Skip reasons ---

export type SkipReason =
  | { readonly _tag: "Missing" }
  | { readonly _tag: "TooShort"; readonly observations: number }
  | { readonly _tag: "Stale"; readonly lastDate: TargetDate }
  | { readonly _tag: "Malformed"; readonly message: string };

export const Missing: SkipReason = { _tag: "Missing" };
export const TooShort = (observations: number): SkipReason => ({
  _tag: "TooShort",
  observations,
});
export const Stale = (lastDate: TargetDate): SkipReason => ({
  _tag: "Stale",
  lastDate,
});
export const Malformed = (message: string): SkipReason => ({
  _tag: "Malformed",
  message,
});

export function describeSkip(reason: SkipReason): string {
  switch (reason._tag) {
    case "Missing":
      return "no series in response";
    case "TooShort":
      return `${reason.observations} observation(s), need 2`;
    case "Stale":
      return `last session ${reason.lastDate}`;
    case "Malformed":
      return reason.message;
  }
}

// --- Pure steps ---

/** A week back covers weekends and exchange holidays. */
export const LOOKBACK_DAYS = 7;

export function fetchWindow(target: TargetDate): DownloadWindow {
  return {
    start: shiftDays(target, -LOOKBACK_DAYS),
    end: shiftDays(target, 1),
  };
}

/**
 * Two decimals on the exact binary value, ties to even.
 *
 * A tie at the second decimal is only representable as an odd multiple of
 * 1/8 (0.125, 0.375, ...); `x * 8` and `x * 100` are exact for those.
 */
export function round2(value: number): number {
  const eighths = value * 8;
  const tie = Number.isInteger(eighths) && Math.abs(eighths) % 2 === 1;
  let rounded: number;
  if (tie) {
    const lower = Math.floor(value * 100);
    rounded = (lower % 2 === 0 ? lower : lower + 1) / 100;
  } else {
    rounded = Number(value.toFixed(2));
  }
  return rounded === 0 ? 0 : rounded;
}

export function cleanSeries(bars: ReadonlyArray<RawBar>): PriceSeries {
  const points = bars.flatMap((bar) =>
    bar.close !== null && Number.isFinite(bar.close)
      ? [{ date: bar.date, close: bar.close }]
      : [],
  );
  // Stable: same-day bars keep provider order.
  return points.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

export function seriesFor(
  batch: BatchResult,
  ticker: Ticker,
): ReadonlyArray<RawBar> | undefined {
  switch (batch._tag) {
    case "PerTicker":
      return batch.series.get(ticker);
    case "Single":
      return batch.series;
  }
}

export function unqualify(ticker: Ticker, suffix: string): string {
  return suffix.length > 0 && ticker.endsWith(suffix)
    ? ticker.slice(0, -suffix.length)
    : ticker;
}

export function evaluateTicker(
  ticker: Ticker,
  bars: ReadonlyArray<RawBar> | undefined,
  target: TargetDate,
  suffix: string,
): Either.Either<SnapshotRow, SkipReason> {
  if (bars === undefined) return Either.left(Missing);

  const series = cleanSeries(bars);
  if (series.length < 2) {
    return Either.left(TooShort(series.length));
  }

  const latest = series[series.length - 1];
  const previous = series[series.length - 2];

  if (latest.date !== target) {
    return Either.left(Stale(latest.date));
  }
  if (previous.close === 0) {
    return Either.left(Malformed("previous close is zero"));
  }

  const difference = round2(latest.close - previous.close);
  return Either.right({
    symbol: unqualify(ticker, suffix),
    latest: round2(latest.close),
    previous: round2(previous.close),
    difference,
    change: round2((difference / previous.close) * 100),
  });
}

/** Largest gain first; equal differences keep their input order. */
export function rankRows(rows: ReadonlyArray<SnapshotRow>): Snapshot {
  return [...rows].sort((a, b) => b.difference - a.difference);
}

export interface Assembled {
  readonly rows: Snapshot;
  readonly skipped: ReadonlyArray<readonly [Ticker, SkipReason]>;
}

export function assemble(
  batch: BatchResult,
  tickers: ReadonlyArray<Ticker>,
  target: TargetDate,
  suffix: string,
): Assembled {
  const rows: SnapshotRow[] = [];
  const skipped: Array<readonly [Ticker, SkipReason]> = [];

  for (const ticker of tickers) {
    Either.match(evaluateTicker(ticker, seriesFor(batch, ticker), target, suffix), {
      onLeft: (reason) => skipped.push([ticker, reason]),
      onRight: (row) => rows.push(row),
    });
  }

  return { rows: rankRows(rows), skipped };
}

// --- Effect shell ---

/** `None` when no ticker traded on `target`. */
export function buildSnapshot(
  target: TargetDate,
  tickers: ReadonlyArray<Ticker>,
  suffix: string,
): Effect.Effect<Option.Option<Snapshot>, FetchFailure, MarketData> {
  return Effect.gen(function* () {
    if (tickers.length === 0) return Option.none();

    const api = yield* MarketData;
    const batch = yield* api.download(tickers, fetchWindow(target)).pipe(
      Effect.mapError(
        (e) => new FetchFailure({ message: describeMarketDataError(e) }),
      ),
    );

    const { rows, skipped } = assemble(batch, tickers, target, suffix);

    yield* Effect.forEach(skipped, ([ticker, reason]) =>
      Effect.logDebug(`[snapshot] skipped ${ticker}: ${describeSkip(reason)}`),
      { discard: true },
    );
    yield* Effect.logInfo(
      `[snapshot] ${target}: ${rows.length} row(s), ${skipped.length} skipped`,
    );

    return rows.length === 0 ? Option.none() : Option.some(rows);
  });
}
