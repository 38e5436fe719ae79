import * as fs from "node:fs/promises";
import * as path from "node:path";
import axios, { type AxiosInstance } from "axios";

import type { CellValue, Dataset, DatasetRow } from "../../dataset/src/types.js";
import { MISSING, numberCell, rawCell } from "../../dataset/src/types.js";
import { SourceError, errorMessage } from "../../dataset/src/errors.js";
import { parseCsvRows } from "../../report/src/csv.js";
import { parseDecimal } from "../../compute/src/normalize.js";
import type { DatasetProvider } from "./providers.js";

export type CsvDatasetOptions = {
  // true: empty and NA tokens -> missing, all-numeric columns -> numbers (reference CSV)
  // false: every cell kept as raw text (spreadsheet export)
  inferTypes: boolean;
};

/** Header names as spreadsheet exports produce them: blanks and repeats are renamed. */
export function dedupeHeader(header: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return header.map((h, i) => {
    const name = h.trim().length ? h : `Unnamed: ${i}`;
    const n = seen.get(name) ?? 0;
    seen.set(name, n + 1);
    return n === 0 ? name : `${name}.${n}`;
  });
}

// Tokens the reference CSV uses for "no value", on top of the empty cell.
export const READ_CSV_NA_TOKENS: ReadonlySet<string> = new Set([
  "#N/A",
  "#N/A N/A",
  "#NA",
  "-1.#IND",
  "-1.#QNAN",
  "-NaN",
  "-nan",
  "1.#IND",
  "1.#QNAN",
  "<NA>",
  "N/A",
  "NA",
  "NULL",
  "NaN",
  "None",
  "n/a",
  "nan",
  "null",
]);

function isNaToken(t: string): boolean {
  return t === "" || READ_CSV_NA_TOKENS.has(t);
}

function inferColumn(values: readonly string[]): CellValue[] {
  const numeric = values.every((v) => {
    const t = v.trim();
    return isNaToken(t) || parseDecimal(t) !== null;
  });
  return values.map((v) => {
    const t = v.trim();
    if (isNaToken(t)) return MISSING;
    if (numeric) {
      const n = parseDecimal(t);
      return n === null ? MISSING : numberCell(n);
    }
    return rawCell(v);
  });
}

export function datasetFromMatrix(matrix: readonly string[][], opts: CsvDatasetOptions): Dataset {
  const [header, ...body] = matrix;
  if (!header) return { columns: [], rows: [] };

  const columns = dedupeHeader(header);
  const cellsOf = (r: readonly string[], i: number) => r[i] ?? "";

  const byColumn: CellValue[][] = columns.map((_, i) => {
    const values = body.map((r) => cellsOf(r, i));
    return opts.inferTypes ? inferColumn(values) : values.map((v) => rawCell(v));
  });

  const rows: DatasetRow[] = body.map((_, ri) => {
    const row: DatasetRow = {};
    columns.forEach((c, ci) => {
      row[c] = byColumn[ci]?.[ri] ?? MISSING;
    });
    return row;
  });

  return { columns, rows };
}

export function parseCsvDataset(text: string, opts: CsvDatasetOptions): Dataset {
  return datasetFromMatrix(parseCsvRows(text), opts);
}

export class CsvFileDatasetProvider implements DatasetProvider {
  readonly name: string;

  constructor(private readonly filePath: string, private readonly opts: CsvDatasetOptions) {
    this.name = `file:${filePath}`;
  }

  async load(): Promise<Dataset> {
    const abs = path.resolve(process.cwd(), this.filePath);
    let text: string;
    try {
      text = await fs.readFile(abs, "utf8");
    } catch (e) {
      throw new SourceError(this.name, `cannot read ${abs}: ${errorMessage(e)}`, e);
    }
    return parseCsvDataset(text, this.opts);
  }
}

export class HttpCsvDatasetProvider implements DatasetProvider {
  readonly name: string;

  constructor(
    private readonly url: string,
    private readonly opts: CsvDatasetOptions,
    private readonly http: AxiosInstance = axios.create({ timeout: 30_000 })
  ) {
    this.name = `http:${url}`;
  }

  async load(): Promise<Dataset> {
    let body: unknown;
    try {
      const res = await this.http.get<string>(this.url, { responseType: "text" });
      body = res.data;
    } catch (e) {
      throw new SourceError(this.name, `request failed: ${errorMessage(e)}`, e);
    }
    if (typeof body !== "string") {
      throw new SourceError(this.name, "response body is not text");
    }
    return parseCsvDataset(body, this.opts);
  }
}
