import { pino, destination, type Logger } from "pino";
import type { LogLevel } from "./config.js";

export type { Logger };

// stdout carries report output, so logs go to stderr
export function createLogger(level: LogLevel = "info"): Logger {
  return pino({ name: "bi-qa", level }, destination(2));
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
