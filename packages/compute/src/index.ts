// ---------- Classification + normalization (stable public API) ----------
export {
  classifyColumns,
  isPercentColumn,
} from "./classify.js";

export type {
  ColumnClassification,
  ColumnKind,
} from "./classify.js";

export {
  classifyAndNormalize,
  normalizeDataset,
  normalizeNumericCell,
  normalizePercentCell,
  parseDecimal,
} from "./normalize.js";

export type {
  CellContext,
  NormalizedSnapshots,
} from "./normalize.js";

// ---------- Detection (stable public API) ----------
export {
  detectAnomalies,
  diffColumns,
  diffStates,
  multiplierLabel,
} from "./detect.js";
