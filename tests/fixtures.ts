import type { SignalRecord, TickerColumns, TickerSeries } from "../src/market/types";

export function makeDates(count: number, start = "2026-01-01"): string[] {
  const [y, m, d] = start.split("-").map(Number);
  return Array.from({ length: count }, (_, i) => new Date(Date.UTC(y, m - 1, d + i)).toISOString().slice(0, 10));
}

export function repeat<T>(value: T, count: number): T[] {
  return new Array<T>(count).fill(value);
}

export function columnsFrom(close: Array<number | null>, volume: Array<number | null> | number = 1000): TickerColumns {
  return {
    dates: makeDates(close.length),
    close: [...close],
    volume: Array.isArray(volume) ? [...volume] : repeat(volume, close.length)
  };
}

export function seriesFrom(ticker: string, close: number[], volume: number[] | number = 1000): TickerSeries {
  const dates = makeDates(close.length);
  const vols = Array.isArray(volume) ? volume : repeat(volume, close.length);
  return {
    ticker,
    bars: close.map((c, i) => ({ date: dates[i], close: c, volume: vols[i] }))
  };
}

/**
* 60 bars: flat at 100, a four-day dip to 96, then a jump to `lastClose`. With the default 120 the
* 5-day average crosses the 20-day average on the last bar (96.8 < 99.2, then 100.8 >= 100.2).
*/
export function crossingCloses(lastClose = 120): number[] {
  return [...repeat(100, 55), ...repeat(96, 4), lastClose];
}

/** 59 bars at volume 1000, then a 2x spike. */
export function spikingVolumes(): number[] {
  return [...repeat(1000, 59), 2000];
}

/** 59 flat bars at 100, then 111: no cross, about 10.8% above the 60-day average. */
export function trendingCloses(): number[] {
  return [...repeat(100, 59), 111];
}

export function record(overrides: Partial<SignalRecord> & Pick<SignalRecord, "ticker">): SignalRecord {
  return {
    date: "2026-03-01",
    price: 100,
    dayChangePct: 0,
    goldenCross5_20: false,
    volSpikeVs20d: false,
    aboveMa60Pct: 0,
    ...overrides
  };
}
