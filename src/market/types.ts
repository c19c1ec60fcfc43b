/**
* Minimum number of usable daily bars a ticker needs before it is scored.
*/
export const MIN_USABLE_BARS = 50;

/**
* Number of rows rendered into the inline email preview.
*/
export const DEFAULT_PREVIEW_ROWS = 10;

export const LOOKBACK_UNITS = ["d", "wk", "mo", "y"] as const;

export type LookbackUnit = (typeof LOOKBACK_UNITS)[number];

/**
* History window requested from the data source, e.g. `{ amount: 6, unit: "mo" }`.
*/
export type LookbackPeriod = {
  amount: number;
  unit: LookbackUnit;
};

export type PriceBar = {
  /** Trading day, YYYY-MM-DD in the exchange's time zone. */
  date: string;
  close: number;
  volume: number;
};

export type TickerSeries = {
  ticker: string;
  bars: PriceBar[];
};

/**
* Per-field columns for one ticker, aligned by index. Missing observations are `null`.
*/
export type TickerColumns = {
  dates: string[];
  close: Array<number | null>;
  volume: Array<number | null>;
};

/**
* Raw dataset as returned by a data source.
*
* A request for one symbol comes back in the `single` shape; anything larger comes back as
* `multi`, keyed by symbol. `toTickerColumns()` flattens both into the same mapping.
*/
export type FetchedDataset =
  | { shape: "single"; symbol: string; columns: TickerColumns }
  | { shape: "multi"; columns: Record<string, TickerColumns> };

export type FetchResult = {
  dataset: FetchedDataset;
  /** Symbols whose fetch failed; they are absent from `dataset`. */
  failedSymbols: string[];
};

export interface MarketDataSource {
  fetchDataset(symbols: readonly string[], opts: { lookback: LookbackPeriod; end?: Date }): Promise<FetchResult>;
}

export type SignalRecord = {
  ticker: string;
  date: string;
  price: number;
  dayChangePct: number | null;
  goldenCross5_20: boolean;
  volSpikeVs20d: boolean;
  aboveMa60Pct: number | null;
};

export type RankedTable = readonly Readonly<SignalRecord>[];

export type PrepareOutcome =
  | { status: "ok"; ticker: string; series: TickerSeries }
  | { status: "insufficient_history"; ticker: string; usableBars: number; requiredBars: number }
  | { status: "invalid"; ticker: string; reason: string };

/**
* Report columns in output order. `key` is the record field, `header` the column name.
*/
export const SIGNAL_COLUMNS = [
  { key: "ticker", header: "ticker" },
  { key: "date", header: "date" },
  { key: "price", header: "price" },
  { key: "dayChangePct", header: "day_change_pct" },
  { key: "goldenCross5_20", header: "golden_cross_5_20" },
  { key: "volSpikeVs20d", header: "vol_spike_vs_20d" },
  { key: "aboveMa60Pct", header: "above_ma60_pct" }
] as const satisfies ReadonlyArray<{ key: keyof SignalRecord; header: string }>;
