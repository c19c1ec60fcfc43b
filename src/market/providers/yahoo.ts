import YahooFinance from "yahoo-finance2";

import { formatDateYYYYMMDD } from "../../lib/date";
import { errorMessage } from "../../lib/fsErrors";
import { mapWithConcurrency } from "../concurrency";
import { formatLookback, lookbackStart } from "../config";
import type { FetchResult, LookbackPeriod, MarketDataSource, TickerColumns } from "../types";

export type YahooQuoteRow = {
  date: Date;
  close?: number | null;
  volume?: number | null;
};

function toNullableNumber(value: number | null | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

/**
* Converts chart rows into aligned columns, one row per exchange-local day. Rows keep their
* position even when close or volume is missing (`null`); dropping them is the preparer's job.
*
* During a session `chart()` can return the day's bar plus a live bar stamped later the same day;
* the later row wins.
*/
export function quotesToColumns(quotes: readonly YahooQuoteRow[], timeZone: string): TickerColumns {
  const rows = quotes
    .filter((q) => q.date instanceof Date && Number.isFinite(q.date.getTime()))
    .sort((a, b) => a.date.getTime() - b.date.getTime());

  const columns: TickerColumns = { dates: [], close: [], volume: [] };
  for (const q of rows) {
    const date = formatDateYYYYMMDD(q.date, timeZone);
    const last = columns.dates.length - 1;
    if (last >= 0 && columns.dates[last] === date) {
      columns.close[last] = toNullableNumber(q.close);
      columns.volume[last] = toNullableNumber(q.volume);
      continue;
    }

    columns.dates.push(date);
    columns.close.push(toNullableNumber(q.close));
    columns.volume.push(toNullableNumber(q.volume));
  }

  return columns;
}

export type YahooMarketDataOptions = {
  concurrency?: number;
};

export class YahooMarketDataProvider implements MarketDataSource {
  readonly #yf: InstanceType<typeof YahooFinance>;
  readonly #concurrency: number;

  constructor(opts: YahooMarketDataOptions = {}) {
    this.#yf = new YahooFinance();
    this.#concurrency = opts.concurrency ?? 4;
  }

  async fetchColumns(symbol: string, lookback: LookbackPeriod, end: Date): Promise<TickerColumns> {
    const period1 = lookbackStart(end, lookback);
    const res = await this.#yf.chart(symbol, { interval: "1d", period1, period2: end });
    if (!Array.isArray(res.quotes) || res.quotes.length === 0) {
      return { dates: [], close: [], volume: [] };
    }

    // Daily bars are stamped at the session open; the exchange zone keeps them on the right day.
    const timeZone = res.meta.exchangeTimezoneName || "America/New_York";
    return quotesToColumns(res.quotes, timeZone);
  }

  async fetchDataset(
    symbols: readonly string[],
    opts: { lookback: LookbackPeriod; end?: Date }
  ): Promise<FetchResult> {
    const unique = Array.from(new Set(symbols));
    const end = opts.end ?? new Date();

    const results = await mapWithConcurrency(unique, this.#concurrency, async (symbol) => {
      try {
        const columns = await this.fetchColumns(symbol, opts.lookback, end);
        return { symbol, status: "ok" as const, columns };
      } catch (error) {
        console.error(
          `[scan:data] failed for ${symbol} (lookback=${formatLookback(opts.lookback)}): ${errorMessage(error)}`
        );
        return { symbol, status: "failed" as const };
      }
    });

    const failedSymbols = results
      .filter((r) => r.status === "failed")
      .map((r) => r.symbol)
      .sort();

    const first = results[0];
    if (unique.length === 1 && first) {
      return {
        dataset: {
          shape: "single",
          symbol: first.symbol,
          columns: first.status === "ok" ? first.columns : { dates: [], close: [], volume: [] }
        },
        failedSymbols
      };
    }

    const columns: Record<string, TickerColumns> = {};
    for (const r of results) {
      if (r.status === "ok") {
        columns[r.symbol] = r.columns;
      }
    }

    return { dataset: { shape: "multi", columns }, failedSymbols };
  }
}
