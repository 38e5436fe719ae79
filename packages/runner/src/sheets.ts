import { google, type sheets_v4 } from "googleapis";

import type { Dataset } from "../../dataset/src/types.js";
import { DeliveryError, SourceError, errorMessage } from "../../dataset/src/errors.js";
import { parseReportCsv, REPORT_HEADER } from "../../report/src/csv.js";
import { datasetFromMatrix } from "./csv-dataset.js";
import type { DatasetProvider, ReportDelivery, ReportPayload, ReportSink } from "./providers.js";

export const SHEETS_SCOPES = [
  "https://spreadsheets.google.com/feeds",
  "https://www.googleapis.com/auth/spreadsheets",
  "https://www.googleapis.com/auth/drive.file",
  "https://www.googleapis.com/auth/drive",
];

/** The spreadsheet calls the runner makes; tests substitute an in-memory fake. */
export interface SheetsApi {
  getValues(spreadsheetId: string, range: string): Promise<string[][]>;
  // returns the new tab's sheetId
  addSheet(spreadsheetId: string, title: string, rowCount: number, columnCount: number): Promise<number>;
  updateValues(spreadsheetId: string, range: string, values: string[][]): Promise<void>;
  boldRange(
    spreadsheetId: string,
    sheetId: number,
    range: { rows: number; columns: number }
  ): Promise<void>;
}

export function a1Range(sheetTitle: string, cell = "A1"): string {
  return `'${sheetTitle.replace(/'/g, "''")}'!${cell}`;
}

class GoogleSheetsApi implements SheetsApi {
  constructor(private readonly sheets: sheets_v4.Sheets) {}

  async getValues(spreadsheetId: string, range: string): Promise<string[][]> {
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId,
      range,
      valueRenderOption: "FORMATTED_VALUE",
    });
    const values = res.data.values ?? [];
    return values.map((r) => r.map((c) => (c === null || c === undefined ? "" : String(c))));
  }

  async addSheet(
    spreadsheetId: string,
    title: string,
    rowCount: number,
    columnCount: number
  ): Promise<number> {
    const res = await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId,
      requestBody: {
        requests: [{ addSheet: { properties: { title, gridProperties: { rowCount, columnCount } } } }],
      },
    });
    const sheetId = res.data.replies?.[0]?.addSheet?.properties?.sheetId;
    if (sheetId === null || sheetId === undefined) {
      throw new DeliveryError("DELIVERY_ERROR", `addSheet returned no sheetId for "${title}"`);
    }
    return sheetId;
  }

  async updateValues(spreadsheetId: string, range: string, values: string[][]): Promise<void> {
    await this.sheets.spreadsheets.values.update({
      spreadsheetId,
      range,
      valueInputOption: "RAW",
      requestBody: { values },
    });
  }

  async boldRange(
    spreadsheetId: string,
    sheetId: number,
    range: { rows: number; columns: number }
  ): Promise<void> {
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId,
      requestBody: {
        requests: [
          {
            repeatCell: {
              range: {
                sheetId,
                startRowIndex: 0,
                endRowIndex: range.rows,
                startColumnIndex: 0,
                endColumnIndex: range.columns,
              },
              cell: { userEnteredFormat: { textFormat: { bold: true } } },
              fields: "userEnteredFormat.textFormat.bold",
            },
          },
        ],
      },
    });
  }
}

/** Service-account client for the Sheets v4 API. */
export function createGoogleSheetsApi(credentialsPath: string): SheetsApi {
  const auth = new google.auth.GoogleAuth({ keyFile: credentialsPath, scopes: SHEETS_SCOPES });
  return new GoogleSheetsApi(google.sheets({ version: "v4", auth }));
}

function isBlankRow(r: readonly string[]): boolean {
  return r.every((c) => c.trim() === "");
}

/** Worksheet read as raw strings: header row first, blank rows dropped. */
export class GoogleSheetDatasetProvider implements DatasetProvider {
  readonly name: string;

  constructor(
    private readonly api: SheetsApi,
    private readonly spreadsheetId: string,
    private readonly worksheet = "Snapshot"
  ) {
    this.name = `sheet:${spreadsheetId}/${worksheet}`;
  }

  async load(): Promise<Dataset> {
    let values: string[][];
    try {
      values = await this.api.getValues(this.spreadsheetId, a1Range(this.worksheet, "A:ZZ"));
    } catch (e) {
      throw new SourceError(this.name, errorMessage(e), e);
    }
    const [header, ...body] = values;
    if (!header) throw new SourceError(this.name, "worksheet is empty");

    return datasetFromMatrix([header, ...body.filter((r) => !isBlankRow(r))], { inferTypes: false });
  }
}

export const REPORT_TAB_COLUMNS = 10;

export class GoogleSheetReportSink implements ReportSink {
  constructor(private readonly api: SheetsApi, private readonly spreadsheetId: string) {}

  async deliver(report: ReportPayload): Promise<ReportDelivery> {
    const cells = parseReportCsv(report.csv);
    const rowCount = Math.max(1, cells.length);

    let sheetId: number;
    try {
      sheetId = await this.api.addSheet(this.spreadsheetId, report.title, rowCount, REPORT_TAB_COLUMNS);
    } catch (e) {
      if (e instanceof DeliveryError) throw e;
      const msg = errorMessage(e);
      if (/already exists/i.test(msg)) {
        throw new DeliveryError("REPORT_TAB_EXISTS", `sheet tab ${report.title} already exists`, e);
      }
      throw new DeliveryError("DELIVERY_ERROR", `cannot add sheet tab ${report.title}: ${msg}`, e);
    }

    try {
      await this.api.updateValues(this.spreadsheetId, a1Range(report.title), cells);
      await this.api.boldRange(this.spreadsheetId, sheetId, { rows: 1, columns: REPORT_HEADER.length });
    } catch (e) {
      throw new DeliveryError("DELIVERY_ERROR", `cannot write sheet tab ${report.title}: ${errorMessage(e)}`, e);
    }

    return { location: `sheet tab ${report.title}` };
  }
}
