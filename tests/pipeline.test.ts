import { mkdtemp, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { EmailMessage, NotificationResult } from "../src/market/notify";
import { runScan } from "../src/market/pipeline";
import type { FetchResult, LookbackPeriod, MarketDataSource } from "../src/market/types";

import { columnsFrom, crossingCloses, repeat, spikingVolumes, trendingCloses } from "./fixtures";

const NOW = new Date("2026-03-01T00:30:00Z");

class FakeDataSource implements MarketDataSource {
  readonly calls: Array<{ symbols: readonly string[]; lookback: LookbackPeriod; end?: Date }> = [];

  constructor(private readonly result: FetchResult | Error) {}

  async fetchDataset(symbols: readonly string[], opts: { lookback: LookbackPeriod; end?: Date }): Promise<FetchResult> {
    this.calls.push({ symbols, ...opts });
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

function threeTickerResult(): FetchResult {
  return {
    dataset: {
      shape: "multi",
      columns: {
        A: columnsFrom(crossingCloses(), spikingVolumes()),
        B: columnsFrom(trendingCloses()),
        C: columnsFrom([...repeat(null, 15), ...repeat(100, 45)])
      }
    },
    failedSymbols: []
  };
}

function fakeNotifier(impl?: (message: EmailMessage) => Promise<NotificationResult>) {
  return {
    send: vi.fn(
      impl ??
        (async (message: EmailMessage): Promise<NotificationResult> => ({
          status: "sent",
          recipients: ["ops@example.com"],
          attachments: message.attachments?.length ?? 0
        }))
    )
  };
}

describe("runScan", () => {
  let root: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});

    root = await mkdtemp(path.join(os.tmpdir(), "scan-run-"));
    await mkdir(path.join(root, "config"));
    await writeFile(path.join(root, "config", "tickers.txt"), "# universe\nC\nB\nA\n", "utf8");
    await writeFile(
      path.join(root, "config", "scan.yml"),
      "outputDir: out\nlookback: 3mo\ntimeZone: Asia/Taipei\npreviewRows: 1\n",
      "utf8"
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("ranks, writes both reports and emails them", async () => {
    const provider = new FakeDataSource(threeTickerResult());
    const notifier = fakeNotifier();

    const summary = await runScan({ rootDir: root, provider, notifier, now: NOW });

    expect(provider.calls).toEqual([{ symbols: ["C", "B", "A"], lookback: { amount: 3, unit: "mo" }, end: NOW }]);
    expect(summary.table.map((r) => r.ticker)).toEqual(["A", "B"]);
    expect(summary.ranked).toBe(2);
    expect(summary.tickers).toBe(3);
    expect(summary.lookback).toBe("3mo");
    expect(summary.excluded).toEqual({ insufficientHistory: ["C"], invalid: [] });

    const csvPath = path.join(root, "out", "scan_20260301_0830.csv");
    const htmlPath = path.join(root, "out", "scan_20260301_0830.html");
    expect(summary.reports).toEqual({ csvPath, htmlPath });
    expect(summary.reportError).toBeNull();

    expect(await readFile(csvPath, "utf8")).toBe(
      [
        "\uFEFFticker,date,price,day_change_pct,golden_cross_5_20,vol_spike_vs_20d,above_ma60_pct",
        "A,2026-03-01,120,25,True,True,19.92",
        "B,2026-03-01,111,11,False,False,10.8",
        ""
      ].join("\r\n")
    );
    expect(await readFile(htmlPath, "utf8")).toContain("Generated at: 2026-03-01T00:30:00.000Z");

    expect(notifier.send).toHaveBeenCalledTimes(1);
    const message = notifier.send.mock.calls[0][0];
    expect(message.subject).toBe("Daily Stock Scan (Asia/Taipei 2026-03-01 08:30)");
    expect(message.attachments).toEqual([csvPath, htmlPath]);
    expect(message.html).toContain("<p>Top 1 of 2:</p>");
    expect(summary.notification).toEqual({ status: "sent", recipients: ["ops@example.com"], attachments: 2 });
  });

  it("keeps the reports when the email fails", async () => {
    const notifier = fakeNotifier(async () => {
      throw new Error("smtp down");
    });

    const summary = await runScan({
      rootDir: root,
      provider: new FakeDataSource(threeTickerResult()),
      notifier,
      now: NOW
    });

    expect(summary.notification).toEqual({ status: "failed", reason: "smtp down" });
    expect(summary.reports).not.toBeNull();
    await expect(readFile(path.join(root, "out", "scan_20260301_0830.csv"), "utf8")).resolves.toContain("A,2026-03-01");
  });

  it("still emails, without attachments, when the reports cannot be written", async () => {
    await writeFile(path.join(root, "blocked"), "not a directory", "utf8");
    const notifier = fakeNotifier();

    const summary = await runScan({
      rootDir: root,
      overrides: { outputDir: path.join(root, "blocked", "out") },
      provider: new FakeDataSource(threeTickerResult()),
      notifier,
      now: NOW
    });

    expect(summary.reports).toBeNull();
    expect(summary.reportError).toMatch(/^\[scan:storage\] Failed writing reports to /);
    expect(notifier.send.mock.calls[0][0].attachments).toEqual([]);
    expect(summary.notification).toEqual({ status: "sent", recipients: ["ops@example.com"], attachments: 0 });
  });

  it("produces an empty, well-formed report when the fetch fails outright", async () => {
    const summary = await runScan({
      rootDir: root,
      provider: new FakeDataSource(new Error("network unreachable")),
      notifier: fakeNotifier(),
      now: NOW
    });

    expect(summary.table).toEqual([]);
    expect(summary.failedSymbols).toEqual(["A", "B", "C"]);
    expect(summary.excluded.insufficientHistory).toEqual(["A", "B", "C"]);
    expect(await readFile(path.join(root, "out", "scan_20260301_0830.csv"), "utf8")).toBe(
      "\uFEFFticker,date,price,day_change_pct,golden_cross_5_20,vol_spike_vs_20d,above_ma60_pct\r\n"
    );
    expect(summary.notification.status).toBe("sent");
  });

  it("reports rejected series and skips email when disabled", async () => {
    const bad = columnsFrom(repeat(10, 55));
    bad.dates[10] = bad.dates[9];
    const provider = new FakeDataSource({
      dataset: { shape: "multi", columns: { A: bad, B: columnsFrom(trendingCloses()) } },
      failedSymbols: ["C"]
    });

    const summary = await runScan({ rootDir: root, provider, notifier: null, now: NOW });

    expect(summary.table.map((r) => r.ticker)).toEqual(["B"]);
    expect(summary.excluded).toEqual({
      insufficientHistory: ["C"],
      invalid: [{ ticker: "A", reason: "duplicate date 2026-01-10 at bar 10" }]
    });
    expect(summary.failedSymbols).toEqual(["C"]);
    expect(summary.notification).toEqual({ status: "skipped", reason: "email disabled for this run" });
  });

  it("excludes a ticker with misaligned columns and ranks the rest", async () => {
    const misaligned = columnsFrom(crossingCloses(), spikingVolumes());
    misaligned.volume.pop();
    const provider = new FakeDataSource({
      dataset: { shape: "multi", columns: { A: misaligned, B: columnsFrom(trendingCloses()) } },
      failedSymbols: ["C"]
    });

    const summary = await runScan({ rootDir: root, provider, notifier: null, now: NOW });

    expect(summary.table.map((r) => r.ticker)).toEqual(["B"]);
    expect(summary.excluded.invalid).toEqual([
      { ticker: "A", reason: "misaligned columns: dates=60, close=60, volume=59" }
    ]);
    expect(summary.reports).not.toBeNull();
  });

  it("fails when the ticker list is missing", async () => {
    await rm(path.join(root, "config", "tickers.txt"));
    await expect(
      runScan({ rootDir: root, provider: new FakeDataSource(threeTickerResult()), notifier: null, now: NOW })
    ).rejects.toThrow("[scan:config] Ticker list not found");
  });
});
