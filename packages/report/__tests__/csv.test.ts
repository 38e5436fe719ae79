import { describe, it, expect } from "vitest";
import { anomaliesToCsv, parseCsvRows, parseReportCsv, reportTabTitle } from "../src/csv.js";
import type { AnomalyRecord } from "../src/types.js";

const records: AnomalyRecord[] = [
  { state: "TX", issue: "State removed", metric: "", details: "" },
  { state: "All", issue: "New column added", metric: "", details: "Cases, 7-day" },
  { state: "CA", issue: ">2x increase", metric: "BI cases", details: "100 -> 250" },
];

describe("report csv", () => {
  it("serializes the header and one line per record", () => {
    expect(anomaliesToCsv(records)).toBe(
      [
        "State,Issue,Metric,Details",
        "TX,State removed,,",
        'All,New column added,,"Cases, 7-day"',
        "CA,>2x increase,BI cases,100 -> 250",
        "",
      ].join("\n")
    );
  });

  it("serializes an empty report as the header alone", () => {
    expect(anomaliesToCsv([])).toBe("State,Issue,Metric,Details\n");
  });

  it("parses report text back into padded cells", () => {
    expect(parseReportCsv(anomaliesToCsv(records))).toEqual([
      ["State", "Issue", "Metric", "Details"],
      ["TX", "State removed", "", ""],
      ["All", "New column added", "", "Cases, 7-day"],
      ["CA", ">2x increase", "BI cases", "100 -> 250"],
    ]);
    expect(parseReportCsv("State,Issue,Metric,Details\nTX,State removed\n")).toEqual([
      ["State", "Issue", "Metric", "Details"],
      ["TX", "State removed", "", ""],
    ]);
  });

  it("titles a report tab by local date", () => {
    expect(reportTabTitle(new Date(2021, 8, 1, 15, 30))).toBe("2021-09-01-temp");
  });

  it("strips a leading byte order mark", () => {
    expect(parseCsvRows("\uFEFFAbbr,BI cases\nCA,1\n")).toEqual([
      ["Abbr", "BI cases"],
      ["CA", "1"],
    ]);
  });
});
