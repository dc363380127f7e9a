import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

// stdout belongs to the operator console; diagnostics go to stderr.
export function createLogger(level: LogLevel): Logger {
  return pino({ level, base: { app: "record-doctor" } }, pino.destination(2));
}
