import { formatFileStamp, formatLocalDateTime } from "../lib/date";
import { errorMessage } from "../lib/fsErrors";

import { formatLookback, loadNotifierConfig, loadScanConfig, loadTickers } from "./config";
import type { ScanConfig } from "./config";
import { toTickerColumns } from "./dataset";
import { EmailNotifier } from "./notify";
import type { EmailMessage, NotificationResult } from "./notify";
import { prepareSeries } from "./prepare";
import { YahooMarketDataProvider } from "./providers/yahoo";
import { buildEmailBody, buildEmailSubject, renderCsv, renderHtmlReport } from "./report";
import { computeRankedTable } from "./signals";
import { writeScanReports } from "./storage";
import type { ScanReportPaths } from "./storage";
import type { FetchResult, MarketDataSource, RankedTable, TickerSeries } from "./types";

export type ScanNotifier = {
  send(message: EmailMessage): Promise<NotificationResult>;
};

export type RunScanOptions = {
  rootDir?: string;
  /** Overrides applied on top of `config/scan.yml`. */
  overrides?: Partial<ScanConfig>;
  provider?: MarketDataSource;
  /** `null` disables email for this run. */
  notifier?: ScanNotifier | null;
  now?: Date;
};

export type ScanNotificationStatus = NotificationResult | { status: "failed"; reason: string };

export type ScanRunSummary = {
  generatedAt: string;
  lookback: string;
  tickers: number;
  ranked: number;
  excluded: {
    insufficientHistory: string[];
    invalid: Array<{ ticker: string; reason: string }>;
  };
  failedSymbols: string[];
  reports: ScanReportPaths | null;
  reportError: string | null;
  notification: ScanNotificationStatus;
  table: RankedTable;
};

async function fetchBestEffort(
  provider: MarketDataSource,
  tickers: readonly string[],
  cfg: ScanConfig,
  end: Date
): Promise<FetchResult> {
  try {
    return await provider.fetchDataset(tickers, { lookback: cfg.lookback, end });
  } catch (error) {
    console.error(`[scan:data] fetch failed for all tickers: ${errorMessage(error)}`);
    return {
      dataset: { shape: "multi", columns: {} },
      failedSymbols: Array.from(new Set(tickers)).sort()
    };
  }
}

async function notifyBestEffort(
  notifier: ScanNotifier | null | undefined,
  message: EmailMessage
): Promise<ScanNotificationStatus> {
  if (notifier === null) {
    return { status: "skipped", reason: "email disabled for this run" };
  }

  try {
    const target = notifier ?? new EmailNotifier(loadNotifierConfig());
    return await target.send(message);
  } catch (error) {
    const reason = errorMessage(error);
    console.error(`[scan:notify] failed: ${reason}`);
    return { status: "failed", reason };
  }
}

/**
* Runs one scan end to end: tickers → fetch → prepare → signals/rank → reports → email.
*
* Only a missing or unreadable ticker list aborts the run. Fetch, export and notification
* failures are logged and reported in the summary.
*/
export async function runScan(opts: RunScanOptions = {}): Promise<ScanRunSummary> {
  const now = opts.now ?? new Date();
  const cfg: ScanConfig = { ...(await loadScanConfig(opts.rootDir)), ...opts.overrides };

  const tickers = await loadTickers(cfg.tickersFile);
  console.log(`[scan:run] loaded ${tickers.length} tickers from ${cfg.tickersFile}`);

  const provider = opts.provider ?? new YahooMarketDataProvider({ concurrency: cfg.concurrency });
  const fetched = await fetchBestEffort(provider, tickers, cfg, now);
  if (fetched.failedSymbols.length > 0) {
    console.warn(`[scan:data] ${fetched.failedSymbols.length} ticker(s) failed: ${fetched.failedSymbols.join(", ")}`);
  }

  const outcomes = prepareSeries(toTickerColumns(fetched.dataset, tickers));
  const usable: TickerSeries[] = [];
  const insufficientHistory: string[] = [];
  const invalid: Array<{ ticker: string; reason: string }> = [];

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case "ok":
        usable.push(outcome.series);
        break;
      case "insufficient_history":
        insufficientHistory.push(outcome.ticker);
        break;
      case "invalid":
        console.warn(`[scan:prepare] ${outcome.ticker} rejected: ${outcome.reason}`);
        invalid.push({ ticker: outcome.ticker, reason: outcome.reason });
        break;
    }
  }

  const table = computeRankedTable(usable);
  console.log(
    `[scan:run] ranked ${table.length} ticker(s); ${insufficientHistory.length} short, ${invalid.length} invalid`
  );

  const generatedAt = now.toISOString();
  let reports: ScanReportPaths | null = null;
  let reportError: string | null = null;
  try {
    reports = await writeScanReports(cfg.outputDir, formatFileStamp(now, cfg.timeZone), {
      csv: renderCsv(table),
      html: renderHtmlReport(table, { generatedAt })
    });
    console.log(`[scan:run] wrote ${reports.csvPath} and ${reports.htmlPath}`);
  } catch (error) {
    reportError = errorMessage(error);
    console.error(`[scan:run] report export failed: ${reportError}`);
  }

  const notification = await notifyBestEffort(opts.notifier, {
    subject: buildEmailSubject(formatLocalDateTime(now, cfg.timeZone), cfg.timeZone),
    html: buildEmailBody(table, cfg.previewRows),
    attachments: reports ? [reports.csvPath, reports.htmlPath] : []
  });

  return {
    generatedAt,
    lookback: formatLookback(cfg.lookback),
    tickers: tickers.length,
    ranked: table.length,
    excluded: { insufficientHistory, invalid },
    failedSymbols: fetched.failedSymbols,
    reports,
    reportError,
    notification,
    table
  };
}
