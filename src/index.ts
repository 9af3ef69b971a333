#!/usr/bin/env node
// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.

/**
 * delivery-metrics CLI — sprint metrics from the issue tracker as JSON.
 *
 * Usage:
 *   delivery-metrics teams
 *   delivery-metrics sprints --team <id> [--limit <N>]
 *   delivery-metrics sprint --team <id> [--sprint current|last|before-last|<id>]
 *   delivery-metrics history --team <id>
 *   delivery-metrics update-current
 */

import { Command } from "commander";
import { registerCommands } from "./cli/commands.js";
import { logger } from "./logger.js";

const program = new Command();

// Graceful shutdown on SIGINT (Ctrl+C)
process.on("SIGINT", () => {
  console.error("\n🛑 Received SIGINT, shutting down...");
  process.exit(130);
});

program
  .name("delivery-metrics")
  .description("Sprint, defect and staffing metrics pulled from the issue tracker")
  .version("0.1.0")
  .option("--config <path>", "Path to config file")
  .option("--force", "Ignore cached sprint records and refetch from the tracker", false);

registerCommands(program);

program.parseAsync().catch((err: unknown) => {
  logger.error({ err }, "Command failed");
  process.exit(1);
});
