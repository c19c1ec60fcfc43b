import path from "node:path";

import { getArg, getIntegerArg, hasFlag } from "./lib/args";
import { MAX_CONCURRENCY, parseLookback } from "../src/market/config";
import type { ScanConfig } from "../src/market/config";
import { runScan } from "../src/market/pipeline";

const argv = process.argv.slice(2);

const overrides: Partial<ScanConfig> = {};
const tickers = getArg(argv, "tickers");
if (tickers) {
  overrides.tickersFile = path.resolve(tickers);
}
const out = getArg(argv, "out");
if (out) {
  overrides.outputDir = path.resolve(out);
}
const lookback = getArg(argv, "lookback");
if (lookback) {
  overrides.lookback = parseLookback(lookback);
}
const concurrency = getIntegerArg(argv, "concurrency", { min: 1, max: MAX_CONCURRENCY });
if (concurrency !== undefined) {
  overrides.concurrency = concurrency;
}

try {
  const { table, ...summary } = await runScan({
    overrides,
    notifier: hasFlag(argv, "no-email") ? null : undefined
  });
  console.log(JSON.stringify({ stage: "scan", ...summary, top: table.slice(0, 5) }, null, 2));
} catch (error) {
  console.error(error);
  process.exitCode = 1;
}
