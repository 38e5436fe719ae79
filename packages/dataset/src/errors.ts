export type QaErrorCode =
  | "CONFIGURATION_ERROR"
  | "DATA_FORMAT_ERROR"
  | "INTERNAL_INVARIANT"
  | "SOURCE_ERROR"
  | "DELIVERY_ERROR"
  | "REPORT_TAB_EXISTS";

export class QaError extends Error {
  readonly code: QaErrorCode;

  constructor(code: QaErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Boundary or identifier columns cannot be resolved, or the QA config is invalid. */
export class ConfigurationError extends QaError {
  constructor(message: string) {
    super("CONFIGURATION_ERROR", message);
  }
}

export class DataFormatError extends QaError {
  readonly column: string;
  readonly state: string | null;
  readonly value: string;

  constructor(input: { column: string; state: string | null; value: string; reason?: string }) {
    const where = input.state ? ` (state ${input.state})` : "";
    const reason = input.reason ?? "unparseable numeric value";
    super(
      "DATA_FORMAT_ERROR",
      `${reason} in column "${input.column}"${where}: "${input.value}"`
    );
    this.column = input.column;
    this.state = input.state;
    this.value = input.value;
  }
}

// Raised only when normalized data breaks an invariant the detector relies on.
export class InternalInvariantError extends QaError {
  constructor(message: string) {
    super("INTERNAL_INVARIANT", message);
  }
}

export class SourceError extends QaError {
  readonly source: string;

  constructor(source: string, message: string, cause?: unknown) {
    super("SOURCE_ERROR", `${source}: ${message}`, { cause });
    this.source = source;
  }
}

export class DeliveryError extends QaError {
  constructor(code: "DELIVERY_ERROR" | "REPORT_TAB_EXISTS", message: string, cause?: unknown) {
    super(code, message, { cause });
  }
}

export function isQaError(e: unknown): e is QaError {
  return e instanceof QaError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
