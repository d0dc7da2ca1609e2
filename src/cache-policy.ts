// States:
//   Historical    → target is not today; the session is final, cache freely
//   Intraday      → target is today and the market is open; never touch the cache
//   SessionClosed → target is today and the market has closed; cache like a past date
//
// This module contains only types and pure functions. The current time comes
// in as a number so callers decide where "now" is read.

import { DateTime } from "effect";
import type { TargetDate } from "./domain.ts";

// --- Market clock ---

export interface MarketClose {
  readonly hours: number;
  readonly minutes: number;
}

export interface MarketClock {
  readonly today: TargetDate;
  readonly pastClose: boolean;
}

const CLOSE_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/** Parse `HH:MM` (24h); undefined when malformed. */
export function parseMarketClose(input: string): MarketClose | undefined {
  const match = CLOSE_PATTERN.exec(input);
  if (match === null) return undefined;
  return { hours: Number(match[1]), minutes: Number(match[2]) };
}

const pad = (n: number): string => String(n).padStart(2, "0");

/** Exchange-local date and close status at `nowMillis`. */
export function marketClock(
  nowMillis: number,
  timeZone: DateTime.TimeZone,
  close: MarketClose,
): MarketClock {
  const parts = DateTime.toParts(
    DateTime.unsafeMakeZoned(nowMillis, { timeZone }),
  );
  const minuteOfDay = parts.hours * 60 + parts.minutes;
  return {
    today: `${parts.year}-${pad(parts.month)}-${pad(parts.day)}`,
    pastClose: minuteOfDay >= close.hours * 60 + close.minutes,
  };
}

// --- State ---

export type Historical = { readonly _tag: "Historical" };
export type Intraday = { readonly _tag: "Intraday" };
export type SessionClosed = { readonly _tag: "SessionClosed" };

export type CacheState = Historical | Intraday | SessionClosed;

export const Historical: Historical = { _tag: "Historical" };
export const Intraday: Intraday = { _tag: "Intraday" };
export const SessionClosed: SessionClosed = { _tag: "SessionClosed" };

export function classify(target: TargetDate, clock: MarketClock): CacheState {
  if (target !== clock.today) return Historical;
  return clock.pastClose ? SessionClosed : Intraday;
}

// --- Decisions ---

export function canReadCache(state: CacheState): boolean {
  switch (state._tag) {
    case "Historical":
    case "SessionClosed":
      return true;
    case "Intraday":
      return false;
  }
}

/** Prices are still moving intraday, so nothing built then is persisted. */
export function canWriteCache(state: CacheState): boolean {
  switch (state._tag) {
    case "Historical":
    case "SessionClosed":
      return true;
    case "Intraday":
      return false;
  }
}
