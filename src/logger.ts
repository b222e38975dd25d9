// Structured logging
// stdout carries command output and the MCP stdio transport, so logs go to stderr.

import pino from "pino";
import type { DestinationStream, LevelWithSilent, Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  destination?: DestinationStream;
}

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function parseLevel(value: string | undefined): LevelWithSilent | undefined {
  if (value === undefined) return undefined;
  const lower = value.toLowerCase();
  return LEVELS.find((level) => level === lower);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? parseLevel(process.env["LOG_LEVEL"]) ?? "info";
  return pino(
    {
      name: "citation-ledger",
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    options.destination ?? pino.destination(2)
  );
}

/** A logger that drops everything; the default for library callers that pass none. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
