// Calendar-date parsing and arithmetic on `YYYY-MM-DD` strings.

import { Data, DateTime, Effect } from "effect";
import type { TargetDate } from "./domain.ts";

export class InvalidDate extends Data.TaggedError("InvalidDate")<{
  readonly input: string;
}> {}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseTargetDate(
  input: string,
): Effect.Effect<TargetDate, InvalidDate> {
  const match = ISO_DATE.exec(input);
  if (match === null) return Effect.fail(new InvalidDate({ input }));

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  // Date.UTC rolls 2024-02-30 over into March; reject anything that moved.
  const valid =
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day;

  return valid ? Effect.succeed(input) : Effect.fail(new InvalidDate({ input }));
}

export function shiftDays(date: TargetDate, days: number): TargetDate {
  return DateTime.unsafeMake(`${date}T00:00:00Z`).pipe(
    DateTime.add({ days }),
    DateTime.formatIsoDateUtc,
  );
}

/** Midnight UTC of `date`, in epoch seconds. */
export function toEpochSeconds(date: TargetDate): number {
  return Math.floor(Date.parse(`${date}T00:00:00Z`) / 1000);
}
