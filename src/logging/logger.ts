import pino, { type DestinationStream, type Logger } from "pino";
import type { LogLevel } from "../config/config.js";

export type { Logger } from "pino";

export interface LoggerOptions {
  level: LogLevel;
  /** Append-only log file. Ignored when `destination` is given. */
  file?: string;
  destination?: DestinationStream;
}

const REDACTED_PATHS = [
  "sourceSecret",
  "destToken",
  "password",
  "token",
  "*.sourceSecret",
  "*.destToken",
  "*.password",
  "*.token",
];

/**
 * One JSON line per event: `time` (ISO), `level` (label) and `msg`, plus
 * whatever context the call site attaches.
 */
export function createLogger(options: LoggerOptions): Logger {
  const destination =
    options.destination ??
    pino.destination({
      dest: options.file ?? "repo_migration.log",
      append: true,
      mkdir: true,
      sync: true,
    });

  return pino(
    {
      level: options.level,
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
      redact: { paths: REDACTED_PATHS, censor: "***" },
    },
    destination
  );
}
