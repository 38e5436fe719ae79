export * from "./config.js";
export * from "./logger.js";
export * from "./providers.js";
export * from "./csv-dataset.js";
export * from "./sheets.js";
export * from "./sqlite-report-sink.js";
export * from "./engine.js";
export { run } from "./cli/bi-qa.js";
export type { CliIo } from "./cli/bi-qa.js";
