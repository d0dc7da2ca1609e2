// Pure domain types: no framework dependency, no I/O.

/** Calendar date, `YYYY-MM-DD`. */
export type TargetDate = string;

/** Provider-qualified symbol, e.g. `RELIANCE.NS`. */
export type Ticker = string;

/** One daily bar as the provider reports it. */
export interface RawBar {
  readonly date: TargetDate; // exchange-local trading day
  readonly close: number | null;
}

export interface PricePoint {
  readonly date: TargetDate;
  readonly close: number;
}

export type PriceSeries = ReadonlyArray<PricePoint>;

// --- Batch download result ---

export type PerTicker = {
  readonly _tag: "PerTicker";
  readonly series: ReadonlyMap<Ticker, ReadonlyArray<RawBar>>;
};
export type Single = {
  readonly _tag: "Single";
  readonly series: ReadonlyArray<RawBar>;
};

export type BatchResult = PerTicker | Single;

export const PerTicker = (
  series: ReadonlyMap<Ticker, ReadonlyArray<RawBar>>,
): PerTicker => ({ _tag: "PerTicker", series });

export const Single = (series: ReadonlyArray<RawBar>): Single => ({
  _tag: "Single",
  series,
});

// --- Snapshot ---

export interface SnapshotRow {
  readonly symbol: string;
  readonly latest: number;
  readonly previous: number;
  readonly difference: number;
  readonly change: number; // percent
}

/** Rows ranked by `difference`, largest gain first. */
export type Snapshot = ReadonlyArray<SnapshotRow>;
