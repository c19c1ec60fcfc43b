import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { errorMessage } from "../lib/fsErrors";

// Prefixed to the CSV so spreadsheet apps open it as UTF-8.
const UTF8_BOM = "\uFEFF";

export type ScanReportPaths = {
  csvPath: string;
  htmlPath: string;
};

export function getScanReportPaths(outputDir: string, stamp: string): ScanReportPaths {
  if (!/^\d{8}_\d{4}$/.test(stamp)) {
    throw new Error(`Invalid report stamp: ${stamp}. Expected YYYYMMDD_HHMM.`);
  }

  return {
    csvPath: path.join(outputDir, `scan_${stamp}.csv`),
    htmlPath: path.join(outputDir, `scan_${stamp}.html`)
  };
}

export async function ensureOutputDir(outputDir: string): Promise<void> {
  await mkdir(outputDir, { recursive: true });
}

/**
* Writes the CSV and HTML reports via temp files + rename. Each file swap is atomic; if either
* write fails, both temp files are removed and the error is rethrown.
*/
export async function writeScanReports(
  outputDir: string,
  stamp: string,
  content: { csv: string; html: string }
): Promise<ScanReportPaths> {
  const paths = getScanReportPaths(outputDir, stamp);
  const csvTmp = `${paths.csvPath}.tmp`;
  const htmlTmp = `${paths.htmlPath}.tmp`;

  try {
    await ensureOutputDir(outputDir);
    await writeFile(csvTmp, `${UTF8_BOM}${content.csv}`, "utf8");
    await writeFile(htmlTmp, content.html, "utf8");
    await rename(csvTmp, paths.csvPath);
    await rename(htmlTmp, paths.htmlPath);
  } catch (error) {
    await Promise.allSettled([rm(csvTmp, { force: true }), rm(htmlTmp, { force: true })]);
    throw new Error(`[scan:storage] Failed writing reports to ${outputDir}: ${errorMessage(error)}`);
  }

  return paths;
}
