// Runtime settings read from the environment.

import {
  Clock,
  Config,
  ConfigError,
  Context,
  DateTime,
  Effect,
  Either,
  Layer,
  Option,
} from "effect";
import {
  type MarketClock,
  type MarketClose,
  marketClock,
  parseMarketClose,
} from "./cache-policy.ts";

// --- Market session ---

export class MarketSession extends Context.Tag("MarketSession")<
  MarketSession,
  {
    readonly timeZone: DateTime.TimeZone;
    readonly close: MarketClose;
    /** Appended to raw symbols from the universe and to unqualified lookups. */
    readonly suffix: string;
    readonly knownSuffixes: ReadonlyArray<string>;
  }
>() {}

const timeZone = Config.string("MARKET_TIMEZONE").pipe(
  Config.withDefault("Asia/Kolkata"),
  Config.mapOrFail(
    (zone): Either.Either<DateTime.TimeZone, ConfigError.ConfigError> =>
      Option.match(DateTime.zoneMakeNamed(zone), {
        onNone: () =>
          Either.left(
            ConfigError.InvalidData(
              ["MARKET_TIMEZONE"],
              `Unknown time zone: ${zone}`,
            ),
          ),
        onSome: (tz) => Either.right(tz),
      }),
  ),
);

const close = Config.string("MARKET_CLOSE").pipe(
  Config.withDefault("15:30"),
  Config.mapOrFail(
    (value): Either.Either<MarketClose, ConfigError.ConfigError> => {
      const parsed = parseMarketClose(value);
      return parsed === undefined
        ? Either.left(
            ConfigError.InvalidData(
              ["MARKET_CLOSE"],
              `Expected HH:MM, got "${value}"`,
            ),
          )
        : Either.right(parsed);
    },
  ),
);

export const MarketSessionLive = Layer.effect(
  MarketSession,
  Effect.gen(function* () {
    return MarketSession.of({
      timeZone: yield* timeZone,
      close: yield* close,
      suffix: yield* Config.string("EXCHANGE_SUFFIX").pipe(
        Config.withDefault(".NS"),
      ),
      knownSuffixes: yield* Config.array(
        Config.string(),
        "KNOWN_SUFFIXES",
      ).pipe(Config.withDefault([".NS", ".BO"])),
    });
  }),
);

/** Exchange-local "today" and close status, from the ambient Clock. */
export const readMarketClock: Effect.Effect<MarketClock, never, MarketSession> =
  Effect.gen(function* () {
    const session = yield* MarketSession;
    const now = yield* Clock.currentTimeMillis;
    return marketClock(now, session.timeZone, session.close);
  });

// --- HTTP API ---

export class ApiSettings extends Context.Tag("ApiSettings")<
  ApiSettings,
  {
    /** Report provider outages as 502 instead of an empty snapshot. */
    readonly surfaceFetchFailures: boolean;
  }
>() {}

export const ApiSettingsLive = Layer.effect(
  ApiSettings,
  Effect.gen(function* () {
    return ApiSettings.of({
      surfaceFetchFailures: yield* Config.boolean(
        "SURFACE_FETCH_FAILURES",
      ).pipe(Config.withDefault(false)),
    });
  }),
);
