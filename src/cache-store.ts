// One CSV file per target date.

import { FileSystem, Path } from "@effect/platform";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { Config, Context, Data, Effect, Layer, Schema } from "effect";
import type { Snapshot, TargetDate } from "./domain.ts";

// --- Errors ---

export class CorruptCache extends Data.TaggedError("CorruptCache")<{
  readonly date: TargetDate;
  readonly message: string;
}> {}

export class IOFailure extends Data.TaggedError("IOFailure")<{
  readonly date: TargetDate;
  readonly message: string;
}> {}

// --- Service ---

export class CacheStore extends Context.Tag("CacheStore")<
  CacheStore,
  {
    readonly exists: (date: TargetDate) => Effect.Effect<boolean, IOFailure>;
    readonly read: (
      date: TargetDate,
    ) => Effect.Effect<Snapshot, CorruptCache | IOFailure>;
    /** Replaces whatever is stored for `date`. */
    readonly write: (
      date: TargetDate,
      snapshot: Snapshot,
    ) => Effect.Effect<void, IOFailure>;
  }
>() {}

// --- File format ---

export const CACHE_COLUMNS = [
  "Symbol",
  "Latest",
  "Previous",
  "Difference",
  "Change",
] as const;

const CsvRow = Schema.Struct({
  symbol: Schema.propertySignature(Schema.String).pipe(
    Schema.fromKey("Symbol"),
  ),
  latest: Schema.propertySignature(Schema.NumberFromString).pipe(
    Schema.fromKey("Latest"),
  ),
  previous: Schema.propertySignature(Schema.NumberFromString).pipe(
    Schema.fromKey("Previous"),
  ),
  difference: Schema.propertySignature(Schema.NumberFromString).pipe(
    Schema.fromKey("Difference"),
  ),
  change: Schema.propertySignature(Schema.NumberFromString).pipe(
    Schema.fromKey("Change"),
  ),
});

const CsvRows = Schema.Array(CsvRow);

export function encodeCacheFile(snapshot: Snapshot): string {
  const records = Schema.encodeSync(CsvRows)(snapshot);
  return stringify([...records], {
    header: true,
    columns: [...CACHE_COLUMNS],
  });
}

/** Rows come back in file order; the stored ranking is trusted. */
export function decodeCacheFile(
  date: TargetDate,
  text: string,
): Effect.Effect<Snapshot, CorruptCache> {
  return Effect.try({
    try: (): unknown => parse(text, { columns: true, skip_empty_lines: true }),
    catch: (e) =>
      new CorruptCache({
        date,
        message: e instanceof Error ? e.message : String(e),
      }),
  }).pipe(
    Effect.flatMap((records) =>
      Schema.decodeUnknown(CsvRows)(records).pipe(
        Effect.mapError((e) => new CorruptCache({ date, message: e.message })),
      ),
    ),
  );
}

// --- File-backed store ---

export const makeFileCacheStore = (directory: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    yield* fs.makeDirectory(directory, { recursive: true });

    const fileFor = (date: TargetDate) => path.join(directory, `${date}.csv`);

    return CacheStore.of({
      exists: (date) =>
        fs.exists(fileFor(date)).pipe(
          Effect.mapError((e) => new IOFailure({ date, message: e.message })),
        ),
      read: (date) =>
        fs.readFileString(fileFor(date)).pipe(
          Effect.mapError((e) => new IOFailure({ date, message: e.message })),
          Effect.flatMap((text) => decodeCacheFile(date, text)),
        ),
      write: (date, snapshot) =>
        fs.writeFileString(fileFor(date), encodeCacheFile(snapshot)).pipe(
          Effect.mapError((e) => new IOFailure({ date, message: e.message })),
        ),
    });
  });

export const CacheStoreLive = Layer.effect(
  CacheStore,
  Config.string("CACHE_DIR").pipe(
    Config.withDefault("history_store"),
    Effect.flatMap(makeFileCacheStore),
  ),
);
