import type { AxiosInstance } from "axios";

import { errorMessage, isQaError } from "../../../dataset/src/errors.js";
import { loadEnvConfig, requireSetting, type Env } from "../config.js";
import { createLogger, type Logger } from "../logger.js";
import { CsvFileDatasetProvider, HttpCsvDatasetProvider } from "../csv-dataset.js";
import {
  GoogleSheetDatasetProvider,
  GoogleSheetReportSink,
  createGoogleSheetsApi,
  type SheetsApi,
} from "../sheets.js";
import { SqliteReportSink } from "../sqlite-report-sink.js";
import { StdoutReportSink, type DatasetProvider, type ReportSink } from "../providers.js";
import { runReport, type ReportRunResult } from "../engine.js";

export type CliIo = {
  stdout: (chunk: string) => void;
  stderr: (chunk: string) => void;
  env: Env;
  // overridable for tests
  logger?: Logger;
  sheetsApi?: (credentialsPath: string) => SheetsApi;
  http?: AxiosInstance;
  now?: () => Date;
};

function usage(): string {
  return `bi-qa - breakthrough-infection snapshot QA checks

Usage:
  bi-qa --help
  bi-qa version

  bi-qa check --new <file.csv> --existing <file.csv|url> [--json]
  bi-qa report [--db <path>] [--json]
  bi-qa health

Environment (a .env file is read when present):
  SNAPSHOT_SHEET_ID   spreadsheet holding the "Snapshot" worksheet (new data)
  CHECKS_SHEET_ID     spreadsheet that receives report tabs
  CREDENTIALS_PATH    service-account key file
  EXISTING_CSV_URL    reference snapshot CSV
  LOG_LEVEL           fatal|error|warn|info|debug|trace|silent

Examples:
  bi-qa check --new new.csv --existing snapshot.csv
  bi-qa report
  bi-qa report --db ./reports.sqlite --json
`;
}

// -------------------- argv parsing --------------------

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

function isUrl(s: string): boolean {
  return /^https?:\/\//i.test(s);
}

function printResult(io: CliIo, result: ReportRunResult, asJson: boolean, printCsv: boolean): number {
  if (asJson) {
    io.stdout(JSON.stringify(result, null, 2) + "\n");
    return result.ok ? 0 : 1;
  }
  if (!result.ok) {
    io.stderr(`[bi-qa] ${result.error}\n`);
    return 1;
  }
  if (!printCsv) io.stdout(`${result.summary}\n`);
  return 0;
}

// -------------------- commands --------------------

async function cmdCheck(io: CliIo, args: string[]): Promise<number> {
  const newPath = getFlagValue(args, "--new");
  const existingRef = getFlagValue(args, "--existing");
  const asJson = args.includes("--json");

  if (!newPath) {
    io.stderr("Missing --new <file.csv>\n\n" + usage());
    return 1;
  }
  if (!existingRef) {
    io.stderr("Missing --existing <file.csv|url>\n\n" + usage());
    return 1;
  }

  const env = loadEnvConfig(io.env);
  const logger = io.logger ?? createLogger(env.logLevel);

  const existingProvider: DatasetProvider = isUrl(existingRef)
    ? new HttpCsvDatasetProvider(existingRef, { inferTypes: true }, io.http)
    : new CsvFileDatasetProvider(existingRef, { inferTypes: true });

  // with --json the CSV travels inside the result instead
  const sink = new StdoutReportSink(asJson ? () => undefined : io.stdout);

  const result = await runReport({
    newProvider: new CsvFileDatasetProvider(newPath, { inferTypes: false }),
    existingProvider,
    sink,
    config: env.qa,
    logger,
    now: io.now,
  });
  return printResult(io, result, asJson, true);
}

async function cmdReport(io: CliIo, args: string[]): Promise<number> {
  const dbPath = getFlagValue(args, "--db");
  const asJson = args.includes("--json");

  const env = loadEnvConfig(io.env);
  const logger = io.logger ?? createLogger(env.logLevel);

  const makeApi = io.sheetsApi ?? createGoogleSheetsApi;
  const api = makeApi(requireSetting(env.credentialsPath, "CREDENTIALS_PATH"));

  const newProvider = new GoogleSheetDatasetProvider(
    api,
    requireSetting(env.snapshotSheetId, "SNAPSHOT_SHEET_ID")
  );
  const existingProvider = new HttpCsvDatasetProvider(env.existingCsvUrl, { inferTypes: true }, io.http);

  const sqlite = dbPath ? new SqliteReportSink(dbPath) : null;
  const sink: ReportSink =
    sqlite ?? new GoogleSheetReportSink(api, requireSetting(env.checksSheetId, "CHECKS_SHEET_ID"));

  try {
    const result = await runReport({
      newProvider,
      existingProvider,
      sink,
      config: env.qa,
      logger,
      now: io.now,
    });
    return printResult(io, result, asJson, false);
  } finally {
    sqlite?.close();
  }
}

function cmdHealth(io: CliIo): number {
  const env = loadEnvConfig(io.env);
  const logger = io.logger ?? createLogger(env.logLevel);
  logger.info("health_check");
  io.stdout(JSON.stringify({ all: "is well" }) + "\n");
  return 0;
}

export async function run(argv: string[], io: CliIo): Promise<number> {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.stdout(usage());
    return 0;
  }

  const cmd = args[0];

  try {
    if (cmd === "version") {
      io.stdout("bi-qa cli v1\n");
      return 0;
    }
    if (cmd === "check") return await cmdCheck(io, args);
    if (cmd === "report") return await cmdReport(io, args);
    if (cmd === "health") return cmdHealth(io);
  } catch (e) {
    // configuration problems surface before a run starts
    const prefix = isQaError(e) ? e.code : "ERROR";
    io.stderr(`[bi-qa] ${prefix}: ${errorMessage(e)}\n`);
    return 1;
  }

  io.stderr(`Unknown command: ${cmd}\n\n` + usage());
  return 1;
}
