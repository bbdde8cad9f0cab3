/**
 * Result sink — renders open (host, port) pairs as CSV, JSON or plain
 * console lines, and writes them to the requested destination.
 */

import { writeFileSync } from "node:fs";
import { extname } from "node:path";
import { ScanError } from "../errors.js";
import type { OpenPair } from "../scanner.js";

export type OutputFormat = "csv" | "json";

const FORMAT_BY_EXTENSION: Record<string, OutputFormat> = {
  ".csv": "csv",
  ".json": "json",
};

/** Pick the file format from the destination's extension (case-insensitive). */
export function detectOutputFormat(path: string): OutputFormat {
  const ext = extname(path).toLowerCase();
  const format = FORMAT_BY_EXTENSION[ext];
  if (!format) {
    throw new ScanError(
      "unsupported_output_format",
      `unsupported output file '${path}': use a .csv or .json extension`,
      { path },
    );
  }
  return format;
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsv(pairs: readonly OpenPair[]): string {
  const rows = pairs.map((p) => `${csvField(p.host)},${p.port}`);
  return ["host,port", ...rows].join("\n") + "\n";
}

export function formatJson(pairs: readonly OpenPair[]): string {
  const records = pairs.map((p) => ({ host: p.host, port: p.port }));
  return JSON.stringify(records, null, 2) + "\n";
}

/** One `host:port` line per pair. */
export function formatConsole(pairs: readonly OpenPair[]): string {
  if (pairs.length === 0) return "No open ports found.\n";
  return pairs.map((p) => `${p.host}:${p.port}`).join("\n") + "\n";
}

/**
 * Write pairs to `path` in the format its extension selects.
 * Returns the format used.
 */
export function writeResults(pairs: readonly OpenPair[], path: string): OutputFormat {
  const format = detectOutputFormat(path);
  const body = format === "csv" ? formatCsv(pairs) : formatJson(pairs);

  try {
    writeFileSync(path, body, "utf-8");
  } catch (err) {
    throw new ScanError(
      "output_write_failed",
      `could not write to ${path} — ${(err as Error).message}`,
      { path },
    );
  }
  return format;
}
