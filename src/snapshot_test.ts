// Tests for the snapshot builder:
// - pure steps: window, rounding, cleaning, per-ticker evaluation, ranking
// - buildSnapshot: provider wiring, FetchFailure, empty results

import { Effect, Either, Layer, Option } from "effect";
import { expect, test } from "vitest";
import {
  type BatchResult,
  PerTicker,
  type RawBar,
  Single,
  type SnapshotRow,
} from "./domain.ts";
import { MarketData, NetworkError } from "./market-data.ts";
import {
  assemble,
  buildSnapshot,
  cleanSeries,
  evaluateTicker,
  fetchWindow,
  Malformed,
  Missing,
  rankRows,
  round2,
  type SkipReason,
  Stale,
  TooShort,
} from "./snapshot.ts";

// --- Helpers ---

const TARGET = "2025-06-13";

const bars = (...points: Array<[string, number | null]>): RawBar[] =>
  points.map(([date, close]) => ({ date, close }));

const skipReason = (result: Either.Either<SnapshotRow, SkipReason>) =>
  Either.isLeft(result) ? result.left : undefined;

const row = (symbol: string, difference: number): SnapshotRow => ({
  symbol,
  latest: 100,
  previous: 100 - difference,
  difference,
  change: 0,
});

function marketData(
  download: (tickers: ReadonlyArray<string>) => Effect.Effect<BatchResult, NetworkError>,
) {
  return Layer.succeed(
    MarketData,
    MarketData.of({
      download,
      details: () => Effect.die("not used"),
      history: () => Effect.die("not used"),
    }),
  );
}

// --- fetchWindow ---

test("fetchWindow: one week back, end exclusive the day after", () => {
  expect(fetchWindow(TARGET)).toEqual({ start: "2025-06-06", end: "2025-06-14" });
});

// --- round2 ---

test("round2: two decimals", () => {
  expect(round2(5.263157894736842)).toBe(5.26);
  expect(round2(-27.59999999999991)).toBe(-27.6);
});

test("round2: exact ties round to the even neighbour", () => {
  expect(round2(0.125)).toBe(0.12);
  expect(round2(-0.125)).toBe(-0.12);
  expect(round2(0.375)).toBe(0.38);
  expect(round2(100.125)).toBe(100.12);
  expect(round2(-0.625)).toBe(-0.62);
});

test("round2: quarters and halves are not ties", () => {
  expect(round2(0.25)).toBe(0.25);
  expect(round2(2.5)).toBe(2.5);
});

test("round2: rounds the binary value, so 1.005 stays 1.00", () => {
  expect(round2(1.005)).toBe(1);
});

test("round2: never returns negative zero", () => {
  expect(round2(-0.004)).toBe(0);
});

// --- cleanSeries ---

test("cleanSeries: drops missing and non-finite closes and orders by date", () => {
  const series = cleanSeries(
    bars(
      ["2025-06-13", 101],
      ["2025-06-11", null],
      ["2025-06-10", 99],
      ["2025-06-12", Number.NaN],
    ),
  );
  expect(series).toEqual([
    { date: "2025-06-10", close: 99 },
    { date: "2025-06-13", close: 101 },
  ]);
});

// --- evaluateTicker ---

test("evaluateTicker: last two closes give the row", () => {
  const result = evaluateTicker(
    "AAA.NS",
    bars(["2025-06-11", 90], ["2025-06-12", 95], ["2025-06-13", 100]),
    TARGET,
    ".NS",
  );
  expect(Either.getOrNull(result)).toEqual({
    symbol: "AAA",
    latest: 100,
    previous: 95,
    difference: 5,
    change: 5.26,
  });
});

test("evaluateTicker: difference and change are derived from the closes", () => {
  const result = evaluateTicker(
    "XYZ.NS",
    bars(["2025-06-12", 99.8], ["2025-06-13", 101.37]),
    TARGET,
    ".NS",
  );
  expect(Either.getOrNull(result)).toEqual({
    symbol: "XYZ",
    latest: 101.37,
    previous: 99.8,
    difference: 1.57,
    change: 1.57,
  });
});

test("evaluateTicker: a close on an exact tie rounds to even", () => {
  const result = evaluateTicker(
    "TIE.NS",
    bars(["2025-06-12", 100], ["2025-06-13", 100.125]),
    TARGET,
    ".NS",
  );
  expect(Either.getOrNull(result)).toEqual({
    symbol: "TIE",
    latest: 100.12,
    previous: 100,
    difference: 0.12,
    change: 0.12,
  });
});

test("evaluateTicker: a falling close gives negative values", () => {
  const result = evaluateTicker(
    "DOWN.NS",
    bars(["2025-06-12", 100], ["2025-06-13", 95]),
    TARGET,
    ".NS",
  );
  expect(Either.getOrNull(result)).toEqual({
    symbol: "DOWN",
    latest: 95,
    previous: 100,
    difference: -5,
    change: -5,
  });
});

test("evaluateTicker: a gap in the series falls back to the last real close", () => {
  const result = evaluateTicker(
    "GAP.NS",
    bars(["2025-06-11", 90], ["2025-06-12", null], ["2025-06-13", 99]),
    TARGET,
    ".NS",
  );
  expect(Either.getOrNull(result)).toEqual({
    symbol: "GAP",
    latest: 99,
    previous: 90,
    difference: 9,
    change: 10,
  });
});

test("evaluateTicker: absent series is Missing", () => {
  expect(skipReason(evaluateTicker("AAA.NS", undefined, TARGET, ".NS"))).toEqual(
    Missing,
  );
});

test("evaluateTicker: fewer than two observations is TooShort", () => {
  expect(skipReason(evaluateTicker("AAA.NS", [], TARGET, ".NS"))).toEqual(TooShort(0));
  expect(
    skipReason(
      evaluateTicker("AAA.NS", bars(["2025-06-13", 100]), TARGET, ".NS"),
    ),
  ).toEqual(TooShort(1));
  expect(
    skipReason(
      evaluateTicker(
        "AAA.NS",
        bars(["2025-06-12", null], ["2025-06-13", 100]),
        TARGET,
        ".NS",
      ),
    ),
  ).toEqual(TooShort(1));
});

test("evaluateTicker: last session before the target date is Stale", () => {
  const result = evaluateTicker(
    "AAA.NS",
    bars(["2025-06-11", 95], ["2025-06-12", 100]),
    TARGET,
    ".NS",
  );
  expect(skipReason(result)).toEqual(Stale("2025-06-12"));
});

test("evaluateTicker: zero previous close is Malformed", () => {
  const result = evaluateTicker(
    "AAA.NS",
    bars(["2025-06-12", 0], ["2025-06-13", 1]),
    TARGET,
    ".NS",
  );
  expect(skipReason(result)).toEqual(Malformed("previous close is zero"));
});

// --- rankRows ---

test("rankRows: largest difference first, ties keep input order", () => {
  const ranked = rankRows([row("A", 1), row("B", 3), row("C", 1), row("D", -2)]);
  expect(ranked.map((r) => r.symbol)).toEqual(["B", "A", "C", "D"]);
});

// --- assemble ---

test("assemble: ticker with one observation is excluded, the rest ranked", () => {
  const batch = PerTicker(
    new Map([
      ["AAA.NS", bars(["2025-06-12", 95], ["2025-06-13", 100])],
      ["BBB.NS", bars(["2025-06-13", 50])],
    ]),
  );

  const { rows, skipped } = assemble(batch, ["AAA.NS", "BBB.NS"], TARGET, ".NS");

  expect(rows).toEqual([
    { symbol: "AAA", latest: 100, previous: 95, difference: 5, change: 5.26 },
  ]);
  expect(skipped).toEqual([["BBB.NS", TooShort(1)]]);
});

test("assemble: a bad ticker does not affect the others", () => {
  const batch = PerTicker(
    new Map([
      ["ZERO.NS", bars(["2025-06-12", 0], ["2025-06-13", 4])],
      ["UP.NS", bars(["2025-06-12", 10], ["2025-06-13", 12])],
    ]),
  );

  const { rows, skipped } = assemble(
    batch,
    ["ZERO.NS", "MISSING.NS", "UP.NS"],
    TARGET,
    ".NS",
  );

  expect(rows.map((r) => r.symbol)).toEqual(["UP"]);
  expect(skipped.map(([ticker, reason]) => [ticker, reason._tag])).toEqual([
    ["ZERO.NS", "Malformed"],
    ["MISSING.NS", "Missing"],
  ]);
});

test("assemble: a flat series answers for the single requested ticker", () => {
  const batch = Single(bars(["2025-06-12", 20], ["2025-06-13", 21]));

  const { rows } = assemble(batch, ["ONE.NS"], TARGET, ".NS");

  expect(rows).toEqual([
    { symbol: "ONE", latest: 21, previous: 20, difference: 1, change: 5 },
  ]);
});

// --- buildSnapshot ---

test("buildSnapshot: downloads the window once for all tickers", async () => {
  const calls: Array<ReadonlyArray<string>> = [];
  const layer = marketData((tickers) => {
    calls.push(tickers);
    return Effect.succeed(
      PerTicker(
        new Map([
          ["AAA.NS", bars(["2025-06-12", 95], ["2025-06-13", 100])],
          ["BBB.NS", bars(["2025-06-12", 10], ["2025-06-13", 12])],
        ]),
      ),
    );
  });

  const result = await Effect.runPromise(
    buildSnapshot(TARGET, ["AAA.NS", "BBB.NS"], ".NS").pipe(Effect.provide(layer)),
  );

  expect(calls).toEqual([["AAA.NS", "BBB.NS"]]);
  expect(Option.getOrThrow(result).map((r) => r.symbol)).toEqual(["AAA", "BBB"]);
});

test("buildSnapshot: no ticker traded on the date gives None", async () => {
  const layer = marketData(() =>
    Effect.succeed(
      PerTicker(new Map([["AAA.NS", bars(["2025-06-11", 95], ["2025-06-12", 100])]])),
    ),
  );

  const result = await Effect.runPromise(
    buildSnapshot(TARGET, ["AAA.NS"], ".NS").pipe(Effect.provide(layer)),
  );

  expect(Option.isNone(result)).toBe(true);
});

test("buildSnapshot: empty universe gives None without calling the provider", async () => {
  let calls = 0;
  const layer = marketData(() => {
    calls += 1;
    return Effect.succeed(PerTicker(new Map()));
  });

  const result = await Effect.runPromise(
    buildSnapshot(TARGET, [], ".NS").pipe(Effect.provide(layer)),
  );

  expect(Option.isNone(result)).toBe(true);
  expect(calls).toBe(0);
});

test("buildSnapshot: provider failure is a FetchFailure, not an empty result", async () => {
  const layer = marketData(() =>
    Effect.fail(new NetworkError({ message: "connection reset" })),
  );

  const result = await Effect.runPromise(
    Effect.either(buildSnapshot(TARGET, ["AAA.NS"], ".NS")).pipe(
      Effect.provide(layer),
    ),
  );

  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result)) {
    expect(result.left._tag).toBe("FetchFailure");
    expect(result.left.message).toBe("connection reset");
  }
});
