import { SIGNAL_COLUMNS } from "./types";
import type { RankedTable, SignalRecord } from "./types";

type CellValue = SignalRecord[keyof SignalRecord];

function formatCell(value: CellValue): string {
  if (value === null) {
    return "";
  }
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  return String(value);
}

function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
* One header line plus one line per record, CRLF-terminated, in table order.
*/
export function renderCsv(table: RankedTable): string {
  const lines = [SIGNAL_COLUMNS.map((c) => escapeCsv(c.header)).join(",")];
  for (const record of table) {
    lines.push(SIGNAL_COLUMNS.map((c) => escapeCsv(formatCell(record[c.key]))).join(","));
  }

  return `${lines.join("\r\n")}\r\n`;
}

/**
* HTML table fragment for the first `limit` rows (all rows when `limit` is omitted).
*/
export function renderPreviewTable(table: RankedTable, limit?: number): string {
  const rows = limit === undefined ? table : table.slice(0, Math.max(0, limit));

  const head = SIGNAL_COLUMNS.map((c) => `<th>${escapeHtml(c.header)}</th>`).join("");
  const body = rows
    .map((record) => {
      const cells = SIGNAL_COLUMNS.map((c) => `<td>${escapeHtml(formatCell(record[c.key]))}</td>`).join("");
      return `<tr>${cells}</tr>`;
    })
    .join("\n");

  return [
    `<table border="1" class="dataframe">`,
    `<thead><tr style="text-align: center;">${head}</tr></thead>`,
    `<tbody>${body.length > 0 ? `\n${body}\n` : ""}</tbody>`,
    `</table>`
  ].join("\n");
}

export function renderHtmlReport(table: RankedTable, opts: { generatedAt: string }): string {
  return [
    `<html><head><meta charset="utf-8"><title>Daily Scan</title></head><body>`,
    `<h2>Daily Stock Scan</h2>`,
    renderPreviewTable(table),
    `<p style="color:#666">Generated at: ${escapeHtml(opts.generatedAt)}</p>`,
    `</body></html>`,
    ""
  ].join("\n");
}

export function buildEmailSubject(localTime: string, timeZone: string): string {
  return `Daily Stock Scan (${timeZone} ${localTime})`;
}

export function buildEmailBody(table: RankedTable, previewRows: number): string {
  const intro =
    table.length === 0
      ? `<p>No tickers qualified in today's scan.</p>`
      : `<p>Top ${Math.min(previewRows, table.length)} of ${table.length}:</p>`;

  return [
    `<p>Hello, this is the automated daily stock scan.</p>`,
    intro,
    renderPreviewTable(table, previewRows),
    `<p>Full results are attached (CSV/HTML).</p>`
  ].join("\n");
}
