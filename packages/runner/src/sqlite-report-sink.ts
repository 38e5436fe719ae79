import Database from "better-sqlite3";

import { DeliveryError } from "../../dataset/src/errors.js";
import { parseReportCsv } from "../../report/src/csv.js";
import type { ReportDelivery, ReportPayload, ReportSink } from "./providers.js";

export type StoredReportTab = {
  title: string;
  created_at: string;
  csv: string;
};

export type StoredReportRow = {
  row_index: number;
  state: string;
  issue: string;
  metric: string;
  details: string;
};

/**
 * Local stand-in for the checks spreadsheet: one "tab" per report run.
 * Titles are unique, like worksheet names.
 */
export class SqliteReportSink implements ReportSink {
  private db: Database.Database;

  constructor(
    filename = "bi-qa-reports.sqlite",
    private readonly now: () => string = () => new Date().toISOString()
  ) {
    this.db = new Database(filename);
    this.db.pragma("journal_mode = WAL");
    this.migrate();
  }

  private migrate() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS report_tabs (
        title       TEXT PRIMARY KEY,
        created_at  TEXT NOT NULL,
        csv         TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS report_rows (
        title       TEXT NOT NULL,
        row_index   INTEGER NOT NULL,
        state       TEXT NOT NULL,
        issue       TEXT NOT NULL,
        metric      TEXT NOT NULL,
        details     TEXT NOT NULL,
        PRIMARY KEY (title, row_index)
      );
    `);
  }

  async deliver(report: ReportPayload): Promise<ReportDelivery> {
    const [, ...rows] = parseReportCsv(report.csv);

    const exists = this.db
      .prepare(`SELECT 1 AS n FROM report_tabs WHERE title = ? LIMIT 1`)
      .get(report.title);
    if (exists) {
      throw new DeliveryError("REPORT_TAB_EXISTS", `sqlite tab ${report.title} already exists`);
    }

    const insertTab = this.db.prepare(
      `INSERT INTO report_tabs(title, created_at, csv) VALUES (?, ?, ?)`
    );
    const insertRow = this.db.prepare(
      `INSERT INTO report_rows(title, row_index, state, issue, metric, details)
       VALUES (?, ?, ?, ?, ?, ?)`
    );

    const write = this.db.transaction(() => {
      insertTab.run(report.title, this.now(), report.csv);
      rows.forEach((r, i) => {
        insertRow.run(report.title, i, r[0] ?? "", r[1] ?? "", r[2] ?? "", r[3] ?? "");
      });
    });
    write();

    return { location: `sqlite tab ${report.title}` };
  }

  getTab(title: string): StoredReportTab | null {
    const row = this.db
      .prepare(`SELECT title, created_at, csv FROM report_tabs WHERE title = ? LIMIT 1`)
      .get(title) as StoredReportTab | undefined;
    return row ?? null;
  }

  listRows(title: string): StoredReportRow[] {
    return this.db
      .prepare(
        `SELECT row_index, state, issue, metric, details
         FROM report_rows WHERE title = ? ORDER BY row_index ASC`
      )
      .all(title) as StoredReportRow[];
  }

  listTitles(): string[] {
    const rows = this.db
      .prepare(`SELECT title FROM report_tabs ORDER BY created_at ASC, title ASC`)
      .all() as Array<{ title: string }>;
    return rows.map((r) => r.title);
  }

  close(): void {
    this.db.close();
  }
}
