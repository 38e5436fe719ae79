import type { Dataset } from "../../dataset/src/types.js";
import type { QaConfig } from "../../dataset/src/schema.js";
import { ConfigurationError } from "../../dataset/src/errors.js";

export type ColumnKind = "identifier" | "numeric-metric" | "percent-metric" | "other";

export type ColumnClassification = {
  // keyed by column name, covering the columns of both datasets
  kinds: Record<string, ColumnKind>;
  numericColumns: string[];
  percentColumns: string[];
};

export function isPercentColumn(name: string): boolean {
  return name.includes("percent");
}

/**
 * Tag every column. The metric span is positional: first..last boundary
 * inclusive, taken from the new dataset's column order.
 */
export function classifyColumns(
  next: Dataset,
  existing: Dataset,
  cfg: Pick<QaConfig, "first_numeric_column" | "last_numeric_column" | "state_column">
): ColumnClassification {
  const first = next.columns.indexOf(cfg.first_numeric_column);
  const last = next.columns.indexOf(cfg.last_numeric_column);

  if (first < 0) {
    throw new ConfigurationError(
      `First numeric column "${cfg.first_numeric_column}" not found in new dataset`
    );
  }
  if (last < 0) {
    throw new ConfigurationError(
      `Last numeric column "${cfg.last_numeric_column}" not found in new dataset`
    );
  }
  if (first > last) {
    throw new ConfigurationError(
      `First numeric column "${cfg.first_numeric_column}" comes after last numeric column "${cfg.last_numeric_column}"`
    );
  }

  const span = next.columns
    .slice(first, last + 1)
    .filter((c) => c !== cfg.state_column);

  const percentColumns = span.filter(isPercentColumn);
  const numericColumns = span.filter((c) => !isPercentColumn(c));

  const kinds: Record<string, ColumnKind> = {};
  for (const c of [...next.columns, ...existing.columns]) kinds[c] = "other";
  for (const c of numericColumns) kinds[c] = "numeric-metric";
  for (const c of percentColumns) kinds[c] = "percent-metric";
  kinds[cfg.state_column] = "identifier";

  return { kinds, numericColumns, percentColumns };
}
