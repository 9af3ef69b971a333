/**
 * CLI command definitions registered on the Commander program.
 */

import type { Command } from "commander";
import {
  getAbridgedSprintListForTeam,
  getHistoricSprintStats,
  getSprintInfo,
  updateCurrentSprintStats,
} from "../api.js";
import { logger } from "../logger.js";
import { formatDuration } from "../metrics.js";
import { SPRINT_LAST_COMPLETED, type SprintReference } from "../types.js";
import {
  createContextFromOpts,
  failCommand,
  loadConfigFromOpts,
  parseLimit,
  parseSprintOption,
  printJson,
} from "./helpers.js";

type GlobalOptions = {
  config?: string;
  force?: boolean;
};

function globals(program: Command): GlobalOptions {
  return program.opts<GlobalOptions>();
}

/** Register all CLI commands on the given Commander program. */
export function registerCommands(program: Command): void {
  registerTeams(program);
  registerSprints(program);
  registerSprint(program);
  registerHistory(program);
  registerUpdateCurrent(program);
}

// --- teams ---
function registerTeams(program: Command): void {
  program
    .command("teams")
    .description("List configured teams")
    .action(() => {
      try {
        const config = loadConfigFromOpts(globals(program).config);
        printJson(config.teams);
      } catch (err: unknown) {
        failCommand("Team listing", err);
      }
    });
}

// --- sprints ---
function registerSprints(program: Command): void {
  program
    .command("sprints")
    .description("List a team's sprints, oldest first")
    .requiredOption("--team <id>", "Team id")
    .option("--limit <number>", "Only the most recent N sprints", parseLimit)
    .action(async (opts: { team: string; limit?: number }) => {
      try {
        const ctx = createContextFromOpts(globals(program).config);
        logger.info({ team: opts.team, limit: opts.limit }, "Listing sprints");
        printJson(await getAbridgedSprintListForTeam(ctx, opts.team, opts.limit));
      } catch (err: unknown) {
        failCommand("Sprint listing", err);
      }
    });
}

// --- sprint ---
function registerSprint(program: Command): void {
  program
    .command("sprint")
    .description("Show one sprint of a team")
    .requiredOption("--team <id>", "Team id")
    .option(
      "--sprint <ref>",
      'Sprint: "current", "last", "before-last" or a sprint id',
      parseSprintOption,
      SPRINT_LAST_COMPLETED,
    )
    .action(async (opts: { team: string; sprint: SprintReference }) => {
      try {
        const { config, force } = globals(program);
        const ctx = createContextFromOpts(config);
        logger.info({ team: opts.team, sprint: opts.sprint.kind, force }, "Fetching sprint");

        const info = await getSprintInfo(ctx, opts.team, opts.sprint, { forceUpdate: force });
        if (!info) {
          printJson(null);
          return;
        }
        printJson({
          ...info.record,
          actualLength: formatDuration(info.record.actualLengthMs),
          timeLeftMs: info.timeLeftMs,
          timeLeft: info.timeLeftMs === null ? null : formatDuration(info.timeLeftMs),
        });
      } catch (err: unknown) {
        failCommand("Sprint fetch", err);
      }
    });
}

// --- history ---
function registerHistory(program: Command): void {
  program
    .command("history")
    .description("Show every sprint of a team with running totals and averages")
    .requiredOption("--team <id>", "Team id")
    .action(async (opts: { team: string }) => {
      try {
        const { config, force } = globals(program);
        const ctx = createContextFromOpts(config);
        logger.info({ team: opts.team, force }, "Fetching sprint history");
        printJson(await getHistoricSprintStats(ctx, opts.team, { forceUpdate: force }));
      } catch (err: unknown) {
        failCommand("Sprint history", err);
      }
    });
}

// --- update-current ---
function registerUpdateCurrent(program: Command): void {
  program
    .command("update-current")
    .description("Refresh the current sprint of every team")
    .action(async () => {
      try {
        const { config, force } = globals(program);
        const ctx = createContextFromOpts(config);
        const summaries = await updateCurrentSprintStats(ctx, { forceUpdate: force });
        logger.info(
          { teams: summaries.length, updated: summaries.filter((s) => s.success).length },
          "Current sprints updated",
        );
        printJson(summaries);
      } catch (err: unknown) {
        failCommand("Current sprint update", err);
      }
    });
}
