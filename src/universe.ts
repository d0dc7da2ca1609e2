// Symbol list CSV, qualified for the provider.

import { FileSystem } from "@effect/platform";
import { parse } from "csv-parse/sync";
import { Config, Context, Data, Effect, Layer, Schema } from "effect";
import type { Ticker } from "./domain.ts";
import { MarketSession } from "./config.ts";

// --- Errors ---

export class SourceNotFound extends Data.TaggedError("SourceNotFound")<{
  readonly path: string;
}> {}

export class MalformedSource extends Data.TaggedError("MalformedSource")<{
  readonly path: string;
  readonly message: string;
}> {}

export type UniverseError = SourceNotFound | MalformedSource;

// --- Service ---

export class Universe extends Context.Tag("Universe")<
  Universe,
  {
    /** Re-reads the source on every call so edits apply without a restart. */
    readonly load: Effect.Effect<ReadonlyArray<Ticker>, UniverseError>;
  }
>() {}

// --- Parsing ---

/** Accepted symbol headers, in lookup order. */
export const SYMBOL_COLUMNS = ["SYMBOL", "Symbol"] as const;

const Rows = Schema.Array(Schema.Array(Schema.String));

export function parseUniverse(
  path: string,
  csv: string,
  suffix: string,
): Effect.Effect<ReadonlyArray<Ticker>, MalformedSource> {
  return Effect.try({
    try: (): unknown =>
      parse(csv, {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      }),
    catch: (e) =>
      new MalformedSource({
        path,
        message: e instanceof Error ? e.message : String(e),
      }),
  }).pipe(
    Effect.flatMap((records) =>
      Schema.decodeUnknown(Rows)(records).pipe(
        Effect.mapError((e) => new MalformedSource({ path, message: e.message })),
      ),
    ),
    Effect.flatMap(([header = [], ...rows]) => {
      const column = SYMBOL_COLUMNS.map((name) => header.indexOf(name)).find(
        (index) => index >= 0,
      );
      if (column === undefined) {
        return Effect.fail(
          new MalformedSource({
            path,
            message: `No ${SYMBOL_COLUMNS.join(" or ")} column`,
          }),
        );
      }

      const tickers: Ticker[] = [];
      for (const row of rows) {
        const symbol = row[column]?.trim() ?? "";
        if (symbol.length > 0) tickers.push(`${symbol}${suffix}`);
      }
      return Effect.succeed(tickers);
    }),
  );
}

// --- File-backed universe ---

export const makeFileUniverse = (path: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const { suffix } = yield* MarketSession;

    const load = Effect.gen(function* () {
      const present = yield* fs.exists(path);
      if (!present) return yield* Effect.fail(new SourceNotFound({ path }));
      const csv = yield* fs.readFileString(path);
      return yield* parseUniverse(path, csv, suffix);
    }).pipe(
      Effect.catchTag("SystemError", (e): Effect.Effect<never, UniverseError> =>
        e.reason === "NotFound"
          ? Effect.fail(new SourceNotFound({ path }))
          : Effect.fail(new MalformedSource({ path, message: e.message })),
      ),
      Effect.catchTag("BadArgument", (e) =>
        Effect.fail(new MalformedSource({ path, message: e.message })),
      ),
    );

    return Universe.of({ load });
  });

export const UniverseLive = Layer.effect(
  Universe,
  Config.string("SYMBOLS_CSV_PATH").pipe(
    Config.withDefault("UI/EQUITY_L.csv"),
    Effect.flatMap(makeFileUniverse),
  ),
);
