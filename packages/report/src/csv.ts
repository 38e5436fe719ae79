import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

import type { AnomalyRecord } from "./types.js";

export const REPORT_HEADER = ["State", "Issue", "Metric", "Details"] as const;

export function anomalyToCells(r: AnomalyRecord): string[] {
  return [r.state, r.issue, r.metric, r.details];
}

/** Serialize the anomaly sequence as the report CSV (header first, `\n` endings). */
export function anomaliesToCsv(records: readonly AnomalyRecord[]): string {
  return stringify([[...REPORT_HEADER], ...records.map(anomalyToCells)], {
    record_delimiter: "unix",
  });
}

function isStringRow(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((c) => typeof c === "string");
}

/** Parse CSV text into rows of cells, without header handling. */
export function parseCsvRows(text: string): string[][] {
  const parsed: unknown = parse(text, {
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
  });
  if (!Array.isArray(parsed) || !parsed.every(isStringRow)) {
    throw new TypeError("CSV parser returned non-string rows");
  }
  return parsed;
}

/**
 * Parse report CSV text back into cells: header row first, every row padded
 * to the header width with empty strings.
 */
export function parseReportCsv(text: string): string[][] {
  const rows = parseCsvRows(text);
  if (!rows.length) return [[...REPORT_HEADER]];

  const width = rows[0]?.length ?? REPORT_HEADER.length;
  return rows.map((r) => (r.length >= width ? r : [...r, ...Array<string>(width - r.length).fill("")]));
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Report tab title for a run on the given local date: `YYYY-MM-DD-temp`. */
export function reportTabTitle(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}-temp`;
}
