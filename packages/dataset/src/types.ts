// Tabular snapshot contract shared by every package.
// Providers produce CellValue; the normalizer narrows metric columns to NormalizedCell.

export type MissingCell = { kind: "missing" };
export type NumberCell = { kind: "number"; value: number };
export type RawCell = { kind: "raw"; text: string };

export type CellValue = MissingCell | NumberCell | RawCell;
export type NormalizedCell = MissingCell | NumberCell;

export type DatasetRow = Record<string, CellValue>;

export type Dataset = {
  // column order as exported by the source
  columns: string[];
  rows: DatasetRow[];
};

export const MISSING: MissingCell = Object.freeze({ kind: "missing" });

export function numberCell(value: number): NumberCell {
  return { kind: "number", value };
}

export function rawCell(text: string): RawCell {
  return { kind: "raw", text };
}

export function hasColumn(d: Dataset, column: string): boolean {
  return d.columns.includes(column);
}

export function cellAt(row: DatasetRow | undefined, column: string): CellValue {
  return row?.[column] ?? MISSING;
}

/** True when at least one cell of the column is still a raw string. */
export function isStringTyped(d: Dataset, column: string): boolean {
  return d.rows.some((r) => r[column]?.kind === "raw");
}

/**
 * Resolve a state identifier from its cell. Raw text is trimmed; an empty
 * string or a missing cell yields null.
 */
export function stateIdOf(cell: CellValue): string | null {
  if (cell.kind === "missing") return null;
  if (cell.kind === "number") return String(cell.value);
  const t = cell.text.trim();
  return t.length ? t : null;
}

export function mapColumn(
  d: Dataset,
  column: string,
  fn: (cell: CellValue, row: DatasetRow) => CellValue
): Dataset {
  return {
    columns: [...d.columns],
    rows: d.rows.map((r) => ({ ...r, [column]: fn(cellAt(r, column), r) })),
  };
}
