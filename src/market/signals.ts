import { findSeriesViolation } from "./prepare";
import { pctChange, roundHalfAwayFromZero, sma, valueAt } from "./indicators";
import type { RankedTable, SignalRecord, TickerSeries } from "./types";

export const SIGNAL_WINDOWS = {
  fastMa: 5,
  slowMa: 20,
  trendMa: 60,
  volumeMa: 20
} as const;

/**
* Latest volume must exceed this multiple of its trailing average to count as a spike.
*/
export const VOLUME_SPIKE_MULTIPLE = 1.5;

export const PRICE_DECIMALS = 4;
export const PCT_DECIMALS = 2;

export class SeriesValidationError extends Error {
  readonly ticker: string;

  constructor(ticker: string, reason: string) {
    super(`[scan:signals] Invalid series for ${ticker}: ${reason}`);
    this.name = "SeriesValidationError";
    this.ticker = ticker;
  }
}

function roundPct(value: number | null): number | null {
  return value === null ? null : roundHalfAwayFromZero(value, PCT_DECIMALS);
}

function isGoldenCross(fast: Array<number | null>, slow: Array<number | null>): boolean {
  const prevFast = valueAt(fast, -2);
  const prevSlow = valueAt(slow, -2);
  const currFast = valueAt(fast, -1);
  const currSlow = valueAt(slow, -1);

  if (prevFast === null || prevSlow === null || currFast === null || currSlow === null) {
    return false;
  }

  return prevFast < prevSlow && currFast >= currSlow;
}

/**
* Computes the signal row for one cleaned series.
*
* Throws `SeriesValidationError` when the series is empty or malformed; callers are expected to
* pass series that went through `prepareSeries()`.
*/
export function computeSignalRecord(series: TickerSeries): SignalRecord {
  const { ticker, bars } = series;
  if (bars.length === 0) {
    throw new SeriesValidationError(ticker, "series has no bars");
  }

  const violation = findSeriesViolation(bars);
  if (violation !== null) {
    throw new SeriesValidationError(ticker, violation);
  }

  const close = bars.map((b) => b.close);
  const volume = bars.map((b) => b.volume);

  const maFast = sma(close, SIGNAL_WINDOWS.fastMa);
  const maSlow = sma(close, SIGNAL_WINDOWS.slowMa);
  const maTrend = sma(close, SIGNAL_WINDOWS.trendMa);
  const volAvg = sma(volume, SIGNAL_WINDOWS.volumeMa);

  const last = bars[bars.length - 1];
  const prevClose = bars.length > 1 ? bars[bars.length - 2].close : null;

  const latestVolAvg = valueAt(volAvg, -1);
  const latestTrend = valueAt(maTrend, -1);

  return {
    ticker,
    date: last.date,
    price: roundHalfAwayFromZero(last.close, PRICE_DECIMALS),
    dayChangePct: prevClose === null ? null : roundPct(pctChange(last.close, prevClose)),
    goldenCross5_20: isGoldenCross(maFast, maSlow),
    volSpikeVs20d: latestVolAvg !== null && last.volume > VOLUME_SPIKE_MULTIPLE * latestVolAvg,
    aboveMa60Pct: latestTrend === null ? null : roundPct(pctChange(last.close, latestTrend))
  };
}

function compareFlagDesc(a: boolean, b: boolean): number {
  return Number(b) - Number(a);
}

// Descending, with `null` below every number.
function compareNullableDesc(a: number | null, b: number | null): number {
  if (a === null || b === null) {
    return a === b ? 0 : a === null ? 1 : -1;
  }
  return b - a;
}

export function compareSignalRecords(a: SignalRecord, b: SignalRecord): number {
  return (
    compareFlagDesc(a.goldenCross5_20, b.goldenCross5_20) ||
    compareFlagDesc(a.volSpikeVs20d, b.volSpikeVs20d) ||
    compareNullableDesc(a.aboveMa60Pct, b.aboveMa60Pct) ||
    compareNullableDesc(a.dayChangePct, b.dayChangePct) ||
    (a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0)
  );
}

/**
* Orders records by golden cross, volume spike, distance above the 60-day average, then day
* change (all descending), falling back to ascending ticker. Returns a frozen copy.
*/
export function rankSignalRecords(records: readonly SignalRecord[]): RankedTable {
  const ranked = records.map((r) => Object.freeze({ ...r })).sort(compareSignalRecords);
  return Object.freeze(ranked);
}

export function computeRankedTable(series: readonly TickerSeries[]): RankedTable {
  return rankSignalRecords(series.map(computeSignalRecord));
}
