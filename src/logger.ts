// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Configuration options for creating a pino logger instance.
 *
 * @property level - Log severity threshold. Messages below this level are suppressed.
 * @property name - Logger name included in every log entry.
 * @property pretty - Enable pino-pretty for human-readable output. Defaults to true in non-production.
 */
export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

const REDACT_PATHS = [
  "*.password",
  "*.token",
  "*.secret",
  "*.apiKey",
  "*.authorization",
  "*.headers.Authorization",
];

/**
 * Create a new pino logger with the given options.
 *
 * Tracker credentials (password, token, authorization headers) are
 * automatically redacted. Output goes to stderr so that command results
 * printed on stdout stay machine-readable.
 *
 * @param options - Logger configuration. Defaults to info level with pretty output in non-production.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = "info",
    name = "delivery-metrics",
    pretty = process.env["NODE_ENV"] !== "production",
  } = options;

  const transport = pretty
    ? { target: "pino-pretty", options: { colorize: true, destination: 2 } }
    : undefined;

  const pinoOptions = {
    name,
    level,
    transport,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
  };

  return transport ? pino(pinoOptions) : pino(pinoOptions, pino.destination(2));
}

/** Default logger instance for convenience. */
export const logger = createLogger({
  level: process.env["LOG_LEVEL"] === "debug" ? "debug" : "info",
});

// Pino children copy the parent's level when created, so module loggers
// made at import time are kept here and re-levelled by setLogLevel.
const moduleLoggers = new Map<string, Logger>();

/**
 * Child of the default logger for one module, created once per module name.
 * Follows every later {@link setLogLevel} call.
 */
export function moduleLogger(module: string): Logger {
  let log = moduleLoggers.get(module);
  if (!log) {
    log = logger.child({ module });
    moduleLoggers.set(module, log);
  }
  return log;
}

/** Apply the configured level to the default logger and every module logger. */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const log of moduleLoggers.values()) {
    log.level = level;
  }
}
