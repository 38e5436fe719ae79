import { z } from "zod";
import { ConfigurationError } from "../../dataset/src/errors.js";
import { parseQaConfig, type QaConfig } from "../../dataset/src/schema.js";

export const DEFAULT_EXISTING_CSV_URL =
  "https://raw.githubusercontent.com/pandemic-tracking/bi/main/US%20states%20breakthrough%20reporting%20-%20Snapshot.csv";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const Optional = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length ? v.trim() : undefined));

const EnvSchema = z.object({
  SNAPSHOT_SHEET_ID: z.string().default(""),
  CHECKS_SHEET_ID: z.string().default(""),
  CREDENTIALS_PATH: z.string().default(""),
  EXISTING_CSV_URL: z.string().url().default(DEFAULT_EXISTING_CSV_URL),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),

  FIRST_NUMERIC_COLUMN: Optional,
  LAST_NUMERIC_COLUMN: Optional,
  // ";"-separated: column names may contain commas
  DECREASE_WHITELIST: Optional,
  INCREASE_THRESHOLD_MULTIPLIER: Optional,
});

export type EnvConfig = {
  snapshotSheetId: string;
  checksSheetId: string;
  credentialsPath: string;
  existingCsvUrl: string;
  logLevel: LogLevel;
  qa: QaConfig;
};

export type Env = Record<string, string | undefined>;

export function loadEnvConfig(env: Env = process.env): EnvConfig {
  const r = EnvSchema.safeParse(env);
  if (!r.success) {
    const issues = r.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  const e = r.data;

  const qaInput: Record<string, unknown> = {};
  if (e.FIRST_NUMERIC_COLUMN) qaInput.first_numeric_column = e.FIRST_NUMERIC_COLUMN;
  if (e.LAST_NUMERIC_COLUMN) qaInput.last_numeric_column = e.LAST_NUMERIC_COLUMN;
  if (e.DECREASE_WHITELIST) {
    qaInput.decrease_whitelist = e.DECREASE_WHITELIST.split(";")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }
  if (e.INCREASE_THRESHOLD_MULTIPLIER) {
    qaInput.increase_threshold_multiplier = Number(e.INCREASE_THRESHOLD_MULTIPLIER);
  }

  return {
    snapshotSheetId: e.SNAPSHOT_SHEET_ID,
    checksSheetId: e.CHECKS_SHEET_ID,
    credentialsPath: e.CREDENTIALS_PATH,
    existingCsvUrl: e.EXISTING_CSV_URL,
    logLevel: e.LOG_LEVEL,
    qa: parseQaConfig(qaInput),
  };
}

export function requireSetting(value: string, name: string): string {
  if (!value) throw new ConfigurationError(`${name} is not set`);
  return value;
}
