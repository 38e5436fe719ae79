import { z } from "zod";
import { ConfigurationError } from "./errors.js";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const ColumnName = z.string().min(1, "Column name must not be empty");

const Multiplier = z
  .number()
  .refine(Number.isFinite, "Must be a finite number")
  .refine((v) => v > 0, "Must be positive");

/* ------------------------------------------------------------------ */
/*                              QA config                             */
/* ------------------------------------------------------------------ */

export const DEFAULT_FIRST_NUMERIC_COLUMN = "BI cases";
export const DEFAULT_LAST_NUMERIC_COLUMN = "Total Individuals not fully vaccinated";

export const QaConfigSchema = z.object({
  first_numeric_column: ColumnName.default(DEFAULT_FIRST_NUMERIC_COLUMN),
  last_numeric_column: ColumnName.default(DEFAULT_LAST_NUMERIC_COLUMN),

  // numeric columns exempt from the cumulative-decrease check
  decrease_whitelist: z.array(ColumnName).default([DEFAULT_LAST_NUMERIC_COLUMN]),

  increase_threshold_multiplier: Multiplier.default(2),

  state_column: ColumnName.default("Abbr"),

  // spreadsheet exports name blank headers "Unnamed: <n>"
  ignored_column_prefix: ColumnName.default("Unnamed"),
});

export type QaConfig = z.infer<typeof QaConfigSchema>;

export function parseQaConfig(input: unknown = {}): QaConfig {
  const r = QaConfigSchema.safeParse(input);
  if (!r.success) {
    const issues = r.error.issues
      .map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid QA config: ${issues}`);
  }
  return r.data;
}

export const DEFAULT_QA_CONFIG: QaConfig = parseQaConfig();
