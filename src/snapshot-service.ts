import { Effect, Option } from "effect";
import type { Snapshot, TargetDate } from "./domain.ts";
import { canReadCache, canWriteCache, classify } from "./cache-policy.ts";
import { CacheStore } from "./cache-store.ts";
import { MarketSession, readMarketClock } from "./config.ts";
import type { MarketData } from "./market-data.ts";
import { buildSnapshot, type FetchFailure } from "./snapshot.ts";
import { Universe, type UniverseError } from "./universe.ts";

export type SnapshotError = UniverseError | FetchFailure;

/** Cached snapshot if the policy allows one; a cache that cannot be read
 *  counts as a miss. */
function readCached(
  date: TargetDate,
): Effect.Effect<Option.Option<Snapshot>, never, CacheStore> {
  return Effect.gen(function* () {
    const cache = yield* CacheStore;
    if (!(yield* cache.exists(date))) return Option.none();
    const rows = yield* cache.read(date);
    yield* Effect.logDebug(`[cache] hit ${date}`);
    return Option.some(rows);
  }).pipe(
    Effect.catchTags({
      CorruptCache: (e) =>
        Effect.logWarning(`[cache] ignoring ${e.date}: ${e.message}`).pipe(
          Effect.as(Option.none()),
        ),
      IOFailure: (e) =>
        Effect.logWarning(`[cache] cannot read ${e.date}: ${e.message}`).pipe(
          Effect.as(Option.none()),
        ),
    }),
  );
}

export function getSnapshot(
  date: TargetDate,
): Effect.Effect<
  Option.Option<Snapshot>,
  SnapshotError,
  CacheStore | MarketData | MarketSession | Universe
> {
  return Effect.gen(function* () {
    const clock = yield* readMarketClock;
    const state = classify(date, clock);

    if (canReadCache(state)) {
      const cached = yield* readCached(date);
      if (Option.isSome(cached)) return cached;
    }

    const { suffix } = yield* MarketSession;
    const tickers = yield* (yield* Universe).load;
    const built = yield* buildSnapshot(date, tickers, suffix);

    if (Option.isSome(built) && canWriteCache(state)) {
      const cache = yield* CacheStore;
      yield* cache.write(date, built.value).pipe(
        Effect.tap(() => Effect.logDebug(`[cache] stored ${date}`)),
        Effect.catchTag("IOFailure", (e) =>
          Effect.logWarning(`[cache] cannot write ${e.date}: ${e.message}`),
        ),
      );
    } else if (Option.isSome(built)) {
      yield* Effect.logDebug(`[cache] ${date} is intraday, not stored`);
    }

    return built;
  });
}
