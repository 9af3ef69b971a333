/**
 * Shared CLI helper functions — config loading, context factory, argument parsers.
 */

import { InvalidArgumentError } from "commander";
import { createContext, type MetricsContext } from "../api.js";
import { loadConfig, type ConfigFile } from "../config.js";
import { InvalidParametersError, errorMessage } from "../errors.js";
import { logger, setLogLevel } from "../logger.js";
import { parseSprintReference } from "../sprints/resolver.js";
import type { SprintReference } from "../types.js";

/** Load config from the global --config option and apply its log level. */
export function loadConfigFromOpts(configPath?: string): ConfigFile {
  const config = loadConfig(configPath);
  setLogLevel(config.log.level);
  return config;
}

export function createContextFromOpts(configPath?: string): MetricsContext {
  return createContext(loadConfigFromOpts(configPath));
}

/** Parse a --sprint value: current, last, before-last or a sprint id. */
export function parseSprintOption(value: string): SprintReference {
  const reference = parseSprintReference(value);
  if (!reference) {
    throw new InvalidArgumentError(
      'Sprint must be "current", "last", "before-last" or a positive sprint id.',
    );
  }
  return reference;
}

/** Parse and validate a --limit value. */
export function parseLimit(value: string): number {
  const num = parseInt(value, 10);
  if (isNaN(num) || num < 1) {
    throw new InvalidArgumentError("Limit must be a positive integer.");
  }
  return num;
}

/** Print a command result as indented JSON on stdout. */
export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/** Exit code for a failed command: 2 for bad requests, 1 otherwise. */
export function exitCodeFor(err: unknown): number {
  return err instanceof InvalidParametersError ? 2 : 1;
}

/** Log a failed command and exit. */
export function failCommand(what: string, err: unknown): never {
  logger.error({ err }, `${what} failed`);
  console.error(`❌ ${what} failed:`, errorMessage(err));
  process.exit(exitCodeFor(err));
}
