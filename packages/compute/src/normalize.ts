import type { CellValue, Dataset, NormalizedCell } from "../../dataset/src/types.js";
import {
  MISSING,
  cellAt,
  hasColumn,
  isStringTyped,
  mapColumn,
  numberCell,
  stateIdOf,
} from "../../dataset/src/types.js";
import type { QaConfig } from "../../dataset/src/schema.js";
import { DataFormatError } from "../../dataset/src/errors.js";
import { assertDatasetInvariants } from "../../dataset/src/invariants.js";
import { classifyColumns, type ColumnClassification } from "./classify.js";

const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

// blanks and NaN spellings read as missing, as the source exports them
const MISSING_TOKENS = new Set(["", "nan", "NaN", "NAN"]);

// "X" marks a suppressed small count in the source sheets
const PLACEHOLDER = /X/g;

export function parseDecimal(text: string): number | null {
  if (!DECIMAL.test(text)) return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

export type CellContext = { column: string; state: string | null };

/**
 * Numeric-metric cell: drop `,` separators, `X` -> `1`, parse.
 * A leftover token that is not a number is a DataFormatError.
 */
export function normalizeNumericCell(cell: CellValue, ctx: CellContext): NormalizedCell {
  if (cell.kind !== "raw") return cell;

  const text = cell.text.replace(/,/g, "").replace(PLACEHOLDER, "1").trim();
  if (MISSING_TOKENS.has(text)) return MISSING;

  const n = parseDecimal(text);
  if (n === null) {
    throw new DataFormatError({ column: ctx.column, state: ctx.state, value: cell.text });
  }
  return numberCell(n);
}

/**
 * Percent-metric cell. Total: every failure maps to missing.
 *
 * | input                              | result            |
 * |------------------------------------|-------------------|
 * | missing                            | missing           |
 * | raw "45.5%" (after `X` -> `1`)     | number 0.455      |
 * | raw text that is not a number      | missing           |
 * | number inside a string-typed column| missing           |
 */
export function normalizePercentCell(cell: CellValue): NormalizedCell {
  if (cell.kind !== "raw") return MISSING;

  const text = cell.text
    .replace(PLACEHOLDER, "1")
    .trim()
    .replace(/^%+|%+$/g, "")
    .trim();

  const n = parseDecimal(text);
  if (n === null) return MISSING;

  const fraction = n / 100;
  return Number.isFinite(fraction) ? numberCell(fraction) : MISSING;
}

export function normalizeDataset(
  d: Dataset,
  numericColumns: readonly string[],
  percentColumns: readonly string[],
  cfg: Pick<QaConfig, "state_column">
): Dataset {
  let out = d;

  for (const column of numericColumns) {
    // skip absent columns and columns that are already numeric
    if (!hasColumn(out, column) || !isStringTyped(out, column)) continue;
    out = mapColumn(out, column, (cell, row) =>
      normalizeNumericCell(cell, { column, state: stateIdOf(cellAt(row, cfg.state_column)) })
    );
  }

  for (const column of percentColumns) {
    if (!hasColumn(out, column) || !isStringTyped(out, column)) continue;
    out = mapColumn(out, column, normalizePercentCell);
  }

  return out;
}

export type NormalizedSnapshots = {
  newDataset: Dataset;
  existingDataset: Dataset;
  numericColumns: string[];
  percentColumns: string[];
  classification: ColumnClassification;
};

/** Classify the metric columns, then normalize both datasets. Inputs are not mutated. */
export function classifyAndNormalize(
  next: Dataset,
  existing: Dataset,
  cfg: QaConfig
): NormalizedSnapshots {
  const classification = classifyColumns(next, existing, cfg);
  const { numericColumns, percentColumns } = classification;

  assertDatasetInvariants(next, "new", cfg);
  assertDatasetInvariants(existing, "existing", cfg);

  return {
    newDataset: normalizeDataset(next, numericColumns, percentColumns, cfg),
    existingDataset: normalizeDataset(existing, numericColumns, percentColumns, cfg),
    numericColumns: [...numericColumns],
    percentColumns: [...percentColumns],
    classification,
  };
}
