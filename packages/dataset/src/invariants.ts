import type { QaConfig } from "./schema.js";
import type { Dataset } from "./types.js";
import { cellAt, hasColumn, stateIdOf } from "./types.js";
import { ConfigurationError, DataFormatError } from "./errors.js";

export type DatasetLabel = "new" | "existing";

export type InvariantViolationCode = "MISSING_STATE_COLUMN" | "DUPLICATE_STATE";

export type InvariantViolation = {
  code: InvariantViolationCode;
  dataset: DatasetLabel;
  message: string;
  state?: string;
};

export function checkDatasetInvariants(
  d: Dataset,
  label: DatasetLabel,
  cfg: Pick<QaConfig, "state_column">
): InvariantViolation[] {
  const col = cfg.state_column;
  if (!hasColumn(d, col)) {
    return [
      {
        code: "MISSING_STATE_COLUMN",
        dataset: label,
        message: `${label} dataset has no "${col}" column`,
      },
    ];
  }

  const v: InvariantViolation[] = [];
  const seen = new Set<string>();
  const reported = new Set<string>();

  for (const row of d.rows) {
    const id = stateIdOf(cellAt(row, col));
    if (id === null) continue;
    if (seen.has(id) && !reported.has(id)) {
      reported.add(id);
      v.push({
        code: "DUPLICATE_STATE",
        dataset: label,
        state: id,
        message: `${label} dataset repeats state "${id}" in column "${col}"`,
      });
    }
    seen.add(id);
  }

  return v;
}

/** Throws the first violation as the matching QaError. */
export function assertDatasetInvariants(
  d: Dataset,
  label: DatasetLabel,
  cfg: Pick<QaConfig, "state_column">
): void {
  const [first] = checkDatasetInvariants(d, label, cfg);
  if (!first) return;

  if (first.code === "MISSING_STATE_COLUMN") {
    throw new ConfigurationError(first.message);
  }
  throw new DataFormatError({
    column: cfg.state_column,
    state: first.state ?? null,
    value: first.state ?? "",
    reason: `duplicate state identifier in ${label} dataset`,
  });
}
