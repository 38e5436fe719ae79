import type { Dataset } from "../../dataset/src/types.js";

export interface DatasetProvider {
  // shown in logs and load-stage errors
  readonly name: string;
  load(): Promise<Dataset>;
}

export type ReportPayload = {
  title: string;
  csv: string;
};

export type ReportDelivery = {
  location: string;
};

export interface ReportSink {
  deliver(report: ReportPayload): Promise<ReportDelivery>;
}

export class StdoutReportSink implements ReportSink {
  constructor(private readonly write: (chunk: string) => void) {}

  async deliver(report: ReportPayload): Promise<ReportDelivery> {
    this.write(report.csv);
    return { location: "stdout" };
  }
}

/** Provider over an already materialized dataset. */
export class StaticDatasetProvider implements DatasetProvider {
  constructor(readonly name: string, private readonly dataset: Dataset) {}

  async load(): Promise<Dataset> {
    return this.dataset;
  }
}
