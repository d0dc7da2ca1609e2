// Pure formatting functions, no I/O.

import type { Snapshot, SnapshotRow, TargetDate } from "./domain.ts";
import type { FetchFailure } from "./snapshot.ts";
import type { InvalidDate } from "./target-date.ts";
import type { UniverseError } from "./universe.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Snapshot formatting ---

const signed = (n: number): string => `${n >= 0 ? "+" : ""}${n.toFixed(2)}`;

function formatRow(row: SnapshotRow, symbolWidth: number): string {
  const color = row.difference >= 0 ? GREEN : RED;
  const direction = row.difference >= 0 ? "▲" : "▼";
  return [
    `  ${row.symbol.padEnd(symbolWidth)}`,
    row.latest.toFixed(2).padStart(10),
    `${DIM}${row.previous.toFixed(2).padStart(10)}${RESET}`,
    `${color}${direction} ${signed(row.difference).padStart(9)} (${signed(row.change)}%)${RESET}`,
  ].join("  ");
}

export function formatSnapshot(date: TargetDate, snapshot: Snapshot): string {
  if (snapshot.length === 0) {
    return ["", `${BOLD}  ${date}${RESET}`, `  ${DIM}No data found${RESET}`, ""].join("\n");
  }

  const width = Math.max(6, ...snapshot.map((row) => row.symbol.length));
  return [
    "",
    `${BOLD}  ${date}${RESET}  ${DIM}${snapshot.length} symbols${RESET}`,
    "",
    ...snapshot.map((row) => formatRow(row, width)),
    "",
  ].join("\n");
}

// --- Error formatting ---

export type SnapshotCommandError = InvalidDate | UniverseError | FetchFailure;

export function formatError(error: SnapshotCommandError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: SnapshotCommandError): ClassifiedError {
  switch (error._tag) {
    case "InvalidDate":
      return {
        title: "Invalid date",
        hint: `Expected YYYY-MM-DD, got "${error.input}".`,
      };
    case "SourceNotFound":
      return {
        title: "Symbol list missing",
        hint: `No file at ${error.path}. Set SYMBOLS_CSV_PATH to the symbol list.`,
      };
    case "MalformedSource":
      return {
        title: "Unreadable symbol list",
        hint: `${error.path}: ${error.message}`,
      };
    case "FetchFailure":
      return {
        title: "Download failed",
        hint: error.message,
      };
  }
}
