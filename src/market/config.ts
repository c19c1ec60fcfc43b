import { readFile } from "node:fs/promises";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { assertTimeZone } from "../lib/date";
import { isEnoent } from "../lib/fsErrors";
import { DEFAULT_PREVIEW_ROWS, LOOKBACK_UNITS } from "./types";
import type { LookbackPeriod } from "./types";

export const MAX_CONCURRENCY = 32;

export type ScanConfig = {
  /** Absolute path to the newline-delimited ticker list. */
  tickersFile: string;
  /** Absolute path of the directory receiving CSV/HTML reports. */
  outputDir: string;
  lookback: LookbackPeriod;
  previewRows: number;
  timeZone: string;
  concurrency: number;
};

export type NotifierConfig = {
  user: string | null;
  pass: string | null;
  recipients: string[];
  host: string;
  port: number;
};

export const DEFAULT_SMTP_HOST = "smtp.gmail.com";
export const DEFAULT_SMTP_PORT = 587;

const SCAN_CONFIG_KEYS = ["tickersFile", "outputDir", "lookback", "previewRows", "timeZone", "concurrency"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertString(value: unknown, name: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new Error(`${name} must be a non-empty string`);
  }
  return value.trim();
}

function assertPositiveInteger(value: unknown, name: string, max?: number): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got ${String(value)}`);
  }
  if (max !== undefined && value > max) {
    throw new Error(`${name} must be <= ${max}, got ${value}`);
  }
  return value;
}

export function parseLookback(value: string): LookbackPeriod {
  const match = /^(\d+)(d|wk|mo|y)$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid lookback '${value}'. Expected <n>d, <n>wk, <n>mo or <n>y (e.g. 6mo).`);
  }

  const amount = Number(match[1]);
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new Error(`Invalid lookback '${value}': amount must be a positive integer`);
  }

  const unit = LOOKBACK_UNITS.find((u) => u === match[2]);
  if (!unit) {
    throw new Error(`Invalid lookback unit in '${value}'`);
  }

  return { amount, unit };
}

export function formatLookback(lookback: LookbackPeriod): string {
  return `${lookback.amount}${lookback.unit}`;
}

/**
* Start of the lookback window ending at `end`, computed in UTC calendar terms.
*/
export function lookbackStart(end: Date, lookback: LookbackPeriod): Date {
  const start = new Date(end.getTime());
  switch (lookback.unit) {
    case "d":
      start.setUTCDate(start.getUTCDate() - lookback.amount);
      break;
    case "wk":
      start.setUTCDate(start.getUTCDate() - lookback.amount * 7);
      break;
    case "mo":
      start.setUTCMonth(start.getUTCMonth() - lookback.amount);
      break;
    case "y":
      start.setUTCFullYear(start.getUTCFullYear() - lookback.amount);
      break;
  }
  return start;
}

export function defaultScanConfig(rootDir = process.cwd()): ScanConfig {
  return {
    tickersFile: path.resolve(rootDir, "config", "tickers.txt"),
    outputDir: path.resolve(rootDir, "output"),
    lookback: { amount: 6, unit: "mo" },
    previewRows: DEFAULT_PREVIEW_ROWS,
    timeZone: "Asia/Taipei",
    concurrency: 4
  };
}

export function validateScanConfig(raw: unknown, rootDir = process.cwd()): ScanConfig {
  const cfg = defaultScanConfig(rootDir);
  if (raw === null || raw === undefined) {
    return cfg;
  }
  if (!isRecord(raw)) {
    throw new Error("scan.yml must contain a mapping");
  }

  for (const key of Object.keys(raw)) {
    if (!SCAN_CONFIG_KEYS.includes(key)) {
      throw new Error(`Unknown key in scan.yml: ${key}`);
    }
  }

  if (raw.tickersFile !== undefined) {
    cfg.tickersFile = path.resolve(rootDir, assertString(raw.tickersFile, "tickersFile"));
  }
  if (raw.outputDir !== undefined) {
    cfg.outputDir = path.resolve(rootDir, assertString(raw.outputDir, "outputDir"));
  }
  if (raw.lookback !== undefined) {
    cfg.lookback = parseLookback(assertString(raw.lookback, "lookback"));
  }
  if (raw.previewRows !== undefined) {
    cfg.previewRows = assertPositiveInteger(raw.previewRows, "previewRows");
  }
  if (raw.timeZone !== undefined) {
    cfg.timeZone = assertTimeZone(assertString(raw.timeZone, "timeZone"));
  }
  if (raw.concurrency !== undefined) {
    cfg.concurrency = assertPositiveInteger(raw.concurrency, "concurrency", MAX_CONCURRENCY);
  }

  return cfg;
}

/**
* Reads `config/scan.yml` under `rootDir`. A missing file yields the defaults.
*/
export async function loadScanConfig(rootDir = process.cwd()): Promise<ScanConfig> {
  const filePath = path.join(rootDir, "config", "scan.yml");
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isEnoent(error)) {
      return defaultScanConfig(rootDir);
    }
    throw error;
  }

  try {
    return validateScanConfig(parseYaml(raw), rootDir);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[scan:config] ${filePath}: ${message}`);
  }
}

export function parseTickerList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/**
* Reads a newline-delimited ticker list. Blank lines and `#` comments are skipped; duplicates
* are kept.
*/
export async function loadTickers(filePath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isEnoent(error)) {
      throw new Error(`[scan:config] Ticker list not found: ${filePath}`);
    }
    throw error;
  }

  return parseTickerList(raw.replace(/^\uFEFF/, ""));
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

/**
* Builds the notifier settings from SMTP_USER, SMTP_PASS, SMTP_TO (comma-separated),
* SMTP_HOST (default smtp.gmail.com) and SMTP_PORT (default 587).
*/
export function loadNotifierConfig(env: NodeJS.ProcessEnv = process.env): NotifierConfig {
  const portRaw = envValue(env, "SMTP_PORT");
  let port = DEFAULT_SMTP_PORT;
  if (portRaw !== null) {
    const parsed = Number(portRaw);
    if (!Number.isInteger(parsed) || parsed <= 0 || parsed > 65535) {
      throw new Error(`[scan:config] SMTP_PORT must be a TCP port number, got '${portRaw}'`);
    }
    port = parsed;
  }

  const recipients = (envValue(env, "SMTP_TO") ?? "")
    .split(",")
    .map((r) => r.trim())
    .filter((r) => r.length > 0);

  return {
    user: envValue(env, "SMTP_USER"),
    pass: envValue(env, "SMTP_PASS"),
    recipients,
    host: envValue(env, "SMTP_HOST") ?? DEFAULT_SMTP_HOST,
    port
  };
}
