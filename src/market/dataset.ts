import type { FetchedDataset, TickerColumns } from "./types";

function emptyColumns(): TickerColumns {
  return { dates: [], close: [], volume: [] };
}

/**
* Flattens either dataset shape into one column set per ticker.
*
* For the `multi` shape, tickers are discovered from the requested universe (deduplicated);
* a requested ticker missing from the dataset maps to empty columns. Symbols present in the
* dataset but never requested are ignored. Columns are passed through as-is; their alignment is
* checked per ticker by `prepareSeries()`.
*/
export function toTickerColumns(
  dataset: FetchedDataset,
  universe: readonly string[]
): Map<string, TickerColumns> {
  const out = new Map<string, TickerColumns>();

  if (dataset.shape === "single") {
    out.set(dataset.symbol, dataset.columns);
    return out;
  }

  for (const symbol of universe) {
    if (out.has(symbol)) {
      continue;
    }

    const columns = Object.prototype.hasOwnProperty.call(dataset.columns, symbol)
      ? dataset.columns[symbol]
      : undefined;
    out.set(symbol, columns ?? emptyColumns());
  }

  return out;
}
