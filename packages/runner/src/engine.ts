import type { Dataset } from "../../dataset/src/types.js";
import type { QaConfig } from "../../dataset/src/schema.js";
import { errorMessage, isQaError, type QaErrorCode } from "../../dataset/src/errors.js";
import { classifyAndNormalize, type NormalizedSnapshots } from "../../compute/src/normalize.js";
import { detectAnomalies } from "../../compute/src/detect.js";
import type { AnomalyRecord } from "../../report/src/types.js";
import { anomaliesToCsv, reportTabTitle } from "../../report/src/csv.js";
import type { Logger } from "./logger.js";
import type { DatasetProvider, ReportSink } from "./providers.js";

export type ReportStage = "load" | "classification" | "detection" | "delivery";

export type CheckResult = {
  anomalies: AnomalyRecord[];
  csv: string;
  numericColumns: string[];
  percentColumns: string[];
};

export type ReportRunResult =
  | {
      ok: true;
      title: string;
      location: string;
      summary: string;
      anomalies: AnomalyRecord[];
      csv: string;
    }
  | {
      ok: false;
      stage: ReportStage;
      code: QaErrorCode;
      error: string;
    };

/** Error raised by checkDatasets, tagged with the stage it came from. */
export class StageError extends Error {
  constructor(readonly stage: ReportStage, readonly inner: unknown) {
    super(`${stage} failed: ${errorMessage(inner)}`);
    this.name = "StageError";
  }
}

function atStage<T>(stage: ReportStage, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    throw new StageError(stage, e);
  }
}

/**
 * The synchronous core: classify + normalize, detect, serialize.
 * Throws StageError("classification" | "detection").
 */
export function checkDatasets(next: Dataset, existing: Dataset, cfg: QaConfig): CheckResult {
  const n: NormalizedSnapshots = atStage("classification", () =>
    classifyAndNormalize(next, existing, cfg)
  );

  const anomalies = atStage("detection", () =>
    detectAnomalies(n.newDataset, n.existingDataset, n.numericColumns, n.percentColumns, cfg)
  );

  return {
    anomalies,
    csv: anomaliesToCsv(anomalies),
    numericColumns: n.numericColumns,
    percentColumns: n.percentColumns,
  };
}

export type RunReportInput = {
  newProvider: DatasetProvider;
  existingProvider: DatasetProvider;
  sink: ReportSink;
  config: QaConfig;
  logger: Logger;
  now?: () => Date;
};

const FALLBACK_CODE: Record<ReportStage, QaErrorCode> = {
  load: "SOURCE_ERROR",
  classification: "INTERNAL_INVARIANT",
  detection: "INTERNAL_INVARIANT",
  delivery: "DELIVERY_ERROR",
};

function failure(stage: ReportStage, e: unknown, logger: Logger): ReportRunResult {
  const cause = e instanceof StageError ? e.inner : e;
  const code = isQaError(cause) ? cause.code : FALLBACK_CODE[stage];
  const error = `${stage} failed: ${errorMessage(cause)}`;
  logger.error({ stage, code, err: cause }, "report_run_failed");
  return { ok: false, stage, code, error };
}

export async function runReport(input: RunReportInput): Promise<ReportRunResult> {
  const { newProvider, existingProvider, sink, config, logger } = input;
  const now = input.now ?? (() => new Date());

  logger.info({ new: newProvider.name, existing: existingProvider.name }, "report_run_started");

  let next: Dataset;
  let existing: Dataset;
  try {
    [next, existing] = await Promise.all([newProvider.load(), existingProvider.load()]);
  } catch (e) {
    return failure("load", e, logger);
  }

  logger.info(
    {
      new_rows: next.rows.length,
      new_columns: next.columns.length,
      existing_rows: existing.rows.length,
      existing_columns: existing.columns.length,
    },
    "datasets_loaded"
  );

  let checked: CheckResult;
  try {
    checked = checkDatasets(next, existing, config);
  } catch (e) {
    return failure(e instanceof StageError ? e.stage : "detection", e, logger);
  }

  logger.info(
    {
      anomalies: checked.anomalies.length,
      numeric_columns: checked.numericColumns.length,
      percent_columns: checked.percentColumns.length,
    },
    "anomalies_detected"
  );

  const title = reportTabTitle(now());
  let location: string;
  try {
    ({ location } = await sink.deliver({ title, csv: checked.csv }));
  } catch (e) {
    return failure("delivery", e, logger);
  }

  logger.info({ location }, "report_delivered");

  return {
    ok: true,
    title,
    location,
    summary: `Done: ${location} created`,
    anomalies: checked.anomalies,
    csv: checked.csv,
  };
}
