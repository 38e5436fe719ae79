import type { CellValue, Dataset, DatasetRow, NormalizedCell } from "../../dataset/src/types.js";
import { MISSING, cellAt, hasColumn, stateIdOf } from "../../dataset/src/types.js";
import type { QaConfig } from "../../dataset/src/schema.js";
import { InternalInvariantError } from "../../dataset/src/errors.js";
import type { AnomalyRecord } from "../../report/src/types.js";
import { ALL_STATES } from "../../report/src/types.js";
import { formatInteger, formatPercentFraction } from "../../report/src/format.js";

type DetectConfig = Pick<
  QaConfig,
  "state_column" | "decrease_whitelist" | "increase_threshold_multiplier" | "ignored_column_prefix"
>;

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function sortedDifference(a: Iterable<string>, b: ReadonlySet<string>): string[] {
  return [...new Set(a)].filter((x) => !b.has(x)).sort(byCodeUnit);
}

function indexByState(d: Dataset, stateColumn: string): Map<string, DatasetRow> {
  const m = new Map<string, DatasetRow>();
  for (const row of d.rows) {
    const id = stateIdOf(cellAt(row, stateColumn));
    if (id !== null && !m.has(id)) m.set(id, row);
  }
  return m;
}

function metricCell(row: DatasetRow | undefined, column: string, state: string): NormalizedCell {
  const cell: CellValue = row ? cellAt(row, column) : MISSING;
  if (cell.kind === "raw") {
    throw new InternalInvariantError(
      `Column "${column}" for state ${state} still holds raw text "${cell.text}" after normalization`
    );
  }
  return cell;
}

export function multiplierLabel(m: number): `>${string}x increase` {
  return `>${String(m)}x increase`;
}

/* ------------------------------------------------------------------ */
/*                          Structural checks                         */
/* ------------------------------------------------------------------ */

export function diffStates(next: Dataset, existing: Dataset, cfg: Pick<QaConfig, "state_column">) {
  const newStates = new Set(indexByState(next, cfg.state_column).keys());
  const oldStates = new Set(indexByState(existing, cfg.state_column).keys());
  return {
    removed: sortedDifference(oldStates, newStates),
    added: sortedDifference(newStates, oldStates),
  };
}

export function diffColumns(
  next: Dataset,
  existing: Dataset,
  cfg: Pick<QaConfig, "ignored_column_prefix">
) {
  const keep = (c: string) => !c.startsWith(cfg.ignored_column_prefix);
  const newCols = new Set(next.columns.filter(keep));
  const oldCols = new Set(existing.columns.filter(keep));
  return {
    added: sortedDifference(newCols, oldCols),
    removed: sortedDifference(oldCols, newCols),
  };
}

/* ------------------------------------------------------------------ */
/*                             Row checks                             */
/* ------------------------------------------------------------------ */

type PresenceFormat = (v: number) => string;

function presenceChecks(
  state: string,
  column: string,
  oldCell: NormalizedCell,
  newCell: NormalizedCell,
  fmt: PresenceFormat,
  out: AnomalyRecord[]
): void {
  if (oldCell.kind === "number" && newCell.kind === "missing") {
    out.push({ state, issue: "Lost metric", metric: column, details: `Old value ${fmt(oldCell.value)}` });
  }
  if (oldCell.kind === "missing" && newCell.kind === "number") {
    out.push({ state, issue: "New metric", metric: column, details: `New value ${fmt(newCell.value)}` });
  }
}

function magnitudeChecks(
  state: string,
  column: string,
  oldValue: number,
  newValue: number,
  cfg: DetectConfig,
  out: AnomalyRecord[]
): void {
  const transition = `${formatInteger(oldValue)} -> ${formatInteger(newValue)}`;

  if (newValue < oldValue && !cfg.decrease_whitelist.includes(column)) {
    out.push({ state, issue: "Cumulative decrease", metric: column, details: transition });
  }

  // independent of the decrease check
  if (newValue > cfg.increase_threshold_multiplier * oldValue) {
    out.push({
      state,
      issue: multiplierLabel(cfg.increase_threshold_multiplier),
      metric: column,
      details: transition,
    });
  }
}

/**
 * Run the QA battery over two normalized datasets. Record order:
 * removed states, added states, added columns, removed columns, then per
 * existing state (in existing row order) its numeric and percent checks.
 */
export function detectAnomalies(
  next: Dataset,
  existing: Dataset,
  numericColumns: readonly string[],
  percentColumns: readonly string[],
  cfg: DetectConfig
): AnomalyRecord[] {
  const out: AnomalyRecord[] = [];

  // ---- states
  const states = diffStates(next, existing, cfg);
  for (const s of states.removed) out.push({ state: s, issue: "State removed", metric: "", details: "" });
  for (const s of states.added) out.push({ state: s, issue: "State added", metric: "", details: "" });

  // ---- columns
  const cols = diffColumns(next, existing, cfg);
  for (const c of cols.added) out.push({ state: ALL_STATES, issue: "New column added", metric: "", details: c });
  for (const c of cols.removed) out.push({ state: ALL_STATES, issue: "Column removed", metric: "", details: c });

  // ---- per state
  const newByState = indexByState(next, cfg.state_column);
  const numericShared = numericColumns.filter((c) => hasColumn(next, c) && hasColumn(existing, c));
  const percentShared = percentColumns.filter((c) => hasColumn(next, c) && hasColumn(existing, c));

  for (const [state, oldRow] of indexByState(existing, cfg.state_column)) {
    // a state dropped from the new dataset reads as all-missing
    const newRow = newByState.get(state);

    for (const column of numericShared) {
      const o = metricCell(oldRow, column, state);
      const n = metricCell(newRow, column, state);

      presenceChecks(state, column, o, n, formatInteger, out);
      if (o.kind === "missing" || n.kind === "missing") continue;

      magnitudeChecks(state, column, o.value, n.value, cfg, out);
    }

    for (const column of percentShared) {
      presenceChecks(
        state,
        column,
        metricCell(oldRow, column, state),
        metricCell(newRow, column, state),
        formatPercentFraction,
        out
      );
    }
  }

  return out;
}
