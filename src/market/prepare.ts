import { isFiniteNumber } from "./indicators";
import { MIN_USABLE_BARS } from "./types";
import type { PrepareOutcome, PriceBar, TickerColumns } from "./types";

function toCleanBars(columns: TickerColumns): PriceBar[] {
  const bars: PriceBar[] = [];

  for (let i = 0; i < columns.dates.length; i += 1) {
    const date = columns.dates[i];
    const close = columns.close[i];
    const volume = columns.volume[i];
    if (typeof date !== "string" || !isFiniteNumber(close) || !isFiniteNumber(volume)) {
      continue;
    }

    bars.push({ date, close, volume });
  }

  return bars;
}

function findMisalignment(columns: TickerColumns): string | null {
  const n = columns.dates.length;
  if (columns.close.length === n && columns.volume.length === n) {
    return null;
  }
  return `misaligned columns: dates=${n}, close=${columns.close.length}, volume=${columns.volume.length}`;
}

/**
* Returns a description of the first malformed bar, or `null` when the series is well-formed.
*/
export function findSeriesViolation(bars: readonly PriceBar[]): string | null {
  for (let i = 0; i < bars.length; i += 1) {
    const bar = bars[i];
    if (!/^\d{4}-\d{2}-\d{2}$/.test(bar.date)) {
      return `bar ${i} has invalid date '${bar.date}' (expected YYYY-MM-DD)`;
    }
    if (!(bar.close > 0)) {
      return `bar ${i} (${bar.date}) has non-positive close ${bar.close}`;
    }
    if (bar.volume < 0) {
      return `bar ${i} (${bar.date}) has negative volume ${bar.volume}`;
    }

    const prev = bars[i - 1];
    if (prev && prev.date >= bar.date) {
      return prev.date === bar.date
        ? `duplicate date ${bar.date} at bar ${i}`
        : `dates not increasing at bar ${i} (${prev.date} then ${bar.date})`;
    }
  }

  return null;
}

/**
* Cleans and filters the per-ticker columns.
*
* Columns of different lengths are reported as `invalid`. Bars with a missing close or volume
* are dropped; a malformed remainder is reported as
* `invalid` and a remainder shorter than `minBars` as `insufficient_history`. One outcome is
* returned per ticker, in ascending symbol order.
*/
export function prepareSeries(
  columnsByTicker: ReadonlyMap<string, TickerColumns>,
  minBars = MIN_USABLE_BARS
): PrepareOutcome[] {
  const tickers = Array.from(columnsByTicker.keys()).sort();
  const out: PrepareOutcome[] = [];

  for (const ticker of tickers) {
    const columns = columnsByTicker.get(ticker);
    const misalignment = columns ? findMisalignment(columns) : null;
    if (misalignment !== null) {
      out.push({ status: "invalid", ticker, reason: misalignment });
      continue;
    }

    const bars = columns ? toCleanBars(columns) : [];
    const violation = findSeriesViolation(bars);
    if (violation !== null) {
      out.push({ status: "invalid", ticker, reason: violation });
      continue;
    }

    if (bars.length < minBars) {
      out.push({ status: "insufficient_history", ticker, usableBars: bars.length, requiredBars: minBars });
      continue;
    }

    out.push({ status: "ok", ticker, series: { ticker, bars } });
  }

  return out;
}
