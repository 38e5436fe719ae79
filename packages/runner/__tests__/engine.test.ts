import { describe, it, expect } from "vitest";
import { checkDatasets, runReport, StageError } from "../src/engine.js";
import { StaticDatasetProvider, StdoutReportSink, type DatasetProvider, type ReportSink } from "../src/providers.js";
import { silentLogger } from "../src/logger.js";
import { parseCsvDataset } from "../src/csv-dataset.js";
import { DEFAULT_QA_CONFIG } from "../../dataset/src/schema.js";
import { DeliveryError, SourceError } from "../../dataset/src/errors.js";

const HEADER = "State,Abbr,BI cases,BI percent of cases,Total Individuals not fully vaccinated";

const NEW = parseCsvDataset(
  [HEADER, 'California,CA,"1,250",45.50%,900', "New York,NY,40,,"].join("\n"),
  { inferTypes: false }
);
const EXISTING = parseCsvDataset(
  [HEADER, "California,CA,500,,1000", "Texas,TX,3,,", "New York,NY,100,0.3%,"].join("\n"),
  { inferTypes: true }
);

const EXPECTED_CSV = [
  "State,Issue,Metric,Details",
  "TX,State removed,,",
  "CA,>2x increase,BI cases,500 -> 1250",
  "CA,New metric,BI percent of cases,New value 0.46",
  "TX,Lost metric,BI cases,Old value 3",
  "NY,Cumulative decrease,BI cases,100 -> 40",
  "NY,Lost metric,BI percent of cases,Old value 0.00",
  "",
].join("\n");

const fixedNow = () => new Date(2021, 8, 1, 9, 0);

function capture(): { sink: ReportSink; chunks: string[] } {
  const chunks: string[] = [];
  return { sink: new StdoutReportSink((c) => chunks.push(c)), chunks };
}

describe("checkDatasets", () => {
  it("runs classify, detect and serialize", () => {
    const r = checkDatasets(NEW, EXISTING, DEFAULT_QA_CONFIG);
    expect(r.numericColumns).toEqual(["BI cases", "Total Individuals not fully vaccinated"]);
    expect(r.percentColumns).toEqual(["BI percent of cases"]);
    expect(r.csv).toBe(EXPECTED_CSV);
    expect(r.anomalies).toHaveLength(6);
  });

  it("reads NA tokens in the reference CSV as missing values", () => {
    const cols = "Abbr,BI cases,Total Individuals not fully vaccinated";
    const next = parseCsvDataset([cols, "NY,3,4"].join("\n"), { inferTypes: false });
    const existing = parseCsvDataset(["\uFEFF" + cols, "NY,N/A,4"].join("\n"), { inferTypes: true });

    const r = checkDatasets(next, existing, DEFAULT_QA_CONFIG);
    expect(r.csv).toBe("State,Issue,Metric,Details\nNY,New metric,BI cases,New value 3\n");
  });

  it("tags failures with the classification stage", () => {
    const bad = parseCsvDataset("Abbr,BI cases\nCA,1\n", { inferTypes: false });
    let caught: unknown;
    try {
      checkDatasets(bad, EXISTING, DEFAULT_QA_CONFIG);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(StageError);
    if (caught instanceof StageError) expect(caught.stage).toBe("classification");
  });
});

describe("runReport", () => {
  it("delivers the report and summarizes the location", async () => {
    const { sink, chunks } = capture();
    const r = await runReport({
      newProvider: new StaticDatasetProvider("new", NEW),
      existingProvider: new StaticDatasetProvider("existing", EXISTING),
      sink,
      config: DEFAULT_QA_CONFIG,
      logger: silentLogger(),
      now: fixedNow,
    });

    expect(r).toEqual({
      ok: true,
      title: "2021-09-01-temp",
      location: "stdout",
      summary: "Done: stdout created",
      anomalies: expect.any(Array),
      csv: EXPECTED_CSV,
    });
    expect(chunks).toEqual([EXPECTED_CSV]);
  });

  it("reports a data format error from the classification stage without delivering", async () => {
    const broken = parseCsvDataset([HEADER, "California,CA,12?,,"].join("\n"), { inferTypes: false });
    const { sink, chunks } = capture();
    const r = await runReport({
      newProvider: new StaticDatasetProvider("new", broken),
      existingProvider: new StaticDatasetProvider("existing", EXISTING),
      sink,
      config: DEFAULT_QA_CONFIG,
      logger: silentLogger(),
    });

    expect(r).toEqual({
      ok: false,
      stage: "classification",
      code: "DATA_FORMAT_ERROR",
      error: 'classification failed: unparseable numeric value in column "BI cases" (state CA): "12?"',
    });
    expect(chunks).toEqual([]);
  });

  it("reports provider failures from the load stage", async () => {
    const failing: DatasetProvider = {
      name: "sheet:x/Snapshot",
      load: async () => {
        throw new SourceError("sheet:x/Snapshot", "quota exceeded");
      },
    };
    const r = await runReport({
      newProvider: failing,
      existingProvider: new StaticDatasetProvider("existing", EXISTING),
      sink: capture().sink,
      config: DEFAULT_QA_CONFIG,
      logger: silentLogger(),
    });
    expect(r).toEqual({
      ok: false,
      stage: "load",
      code: "SOURCE_ERROR",
      error: "load failed: sheet:x/Snapshot: quota exceeded",
    });
  });

  it("reports sink failures from the delivery stage", async () => {
    const sink: ReportSink = {
      deliver: async () => {
        throw new DeliveryError("REPORT_TAB_EXISTS", "sheet tab 2021-09-01-temp already exists");
      },
    };
    const r = await runReport({
      newProvider: new StaticDatasetProvider("new", NEW),
      existingProvider: new StaticDatasetProvider("existing", EXISTING),
      sink,
      config: DEFAULT_QA_CONFIG,
      logger: silentLogger(),
      now: fixedNow,
    });
    expect(r).toEqual({
      ok: false,
      stage: "delivery",
      code: "REPORT_TAB_EXISTS",
      error: "delivery failed: sheet tab 2021-09-01-temp already exists",
    });
  });
});
