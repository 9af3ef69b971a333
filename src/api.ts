/**
 * Reporting API.
 *
 * Plain functions over a {@link MetricsContext}; every result is a plain
 * object that serializes to JSON as-is.
 */

import { FileSprintCacheStore, type SprintCacheStore } from "./cache/store.js";
import type { ConfigFile } from "./config.js";
import {
  SprintDataFetcher,
  type SprintFetchParams,
  type SprintFetchResult,
} from "./fetchers/sprint-fetcher.js";
import { TeamRoster } from "./roster.js";
import { RestTrackerClient, type TrackerClient } from "./tracker/client.js";
import {
  SPRINT_CURRENT,
  SPRINT_LAST_COMPLETED,
  type AbridgedSprint,
  type DetailedSprintRecord,
  type SprintHistory,
  type SprintInfo,
  type SprintReference,
  type TeamSprintSummary,
} from "./types.js";

export interface MetricsContext {
  config: ConfigFile;
  tracker: TrackerClient;
  store: SprintCacheStore;
  roster: TeamRoster;
  now?: () => Date;
}

export interface RequestOptions {
  /** Ignore cached sprint records and ask the tracker again. */
  forceUpdate?: boolean;
}

export interface SprintTiming {
  sprint: SprintInfo;
  /** Until the sprint's planned end; negative once past it, null without an end date. */
  timeLeftMs: number | null;
  record: DetailedSprintRecord;
}

/** Wire up the tracker client, file cache and roster described by `config`. */
export function createContext(config: ConfigFile): MetricsContext {
  return {
    config,
    tracker: new RestTrackerClient({
      baseUrl: config.tracker.base_url,
      user: config.tracker.user,
      token: config.tracker.token,
      maxRetries: config.tracker.max_retries,
      retryBaseDelayMs: config.tracker.retry_base_delay_ms,
      maxResults: config.tracker.max_results,
    }),
    store: new FileSprintCacheStore(config.cache.dir),
    roster: new TeamRoster(config.teams),
  };
}

/** One fetcher per request: sprint listings are memoized on the fetcher. */
export function createSprintFetcher(ctx: MetricsContext, options: RequestOptions = {}): SprintDataFetcher {
  return new SprintDataFetcher({
    tracker: ctx.tracker,
    store: ctx.store,
    roster: ctx.roster,
    forceUpdate: options.forceUpdate,
    closedGraceDays: ctx.config.cache.closed_grace_days,
    overdueAfterDays: ctx.config.sprint.overdue_after_days,
    pointsField: ctx.config.tracker.points_field,
    workflow: {
      doneStatuses: ctx.config.workflow.done_statuses,
      abandonedResolutions: ctx.config.workflow.abandoned_resolutions,
    },
    now: ctx.now,
  });
}

async function fetchSprintData(
  ctx: MetricsContext,
  params: SprintFetchParams,
  options: RequestOptions,
): Promise<SprintFetchResult> {
  return createSprintFetcher(ctx, options).fetch(params);
}

function unexpected(result: SprintFetchResult): never {
  throw new Error(`Unexpected sprint fetch result: ${result.kind}`);
}

/** Detailed record for one team's sprint, or null when no sprint matches. */
export async function getSprintInfoForTeam(
  ctx: MetricsContext,
  teamId: string,
  sprint: SprintReference = SPRINT_LAST_COMPLETED,
  options: RequestOptions = {},
): Promise<DetailedSprintRecord | null> {
  const result = await fetchSprintData(ctx, { teamId, sprint }, options);
  return result.kind === "sprint" ? result.record : unexpected(result);
}

/** A team's sprint with the time left until its planned end. */
export async function getSprintInfo(
  ctx: MetricsContext,
  teamId: string,
  sprint: SprintReference = SPRINT_CURRENT,
  options: RequestOptions = {},
): Promise<SprintTiming | null> {
  const record = await getSprintInfoForTeam(ctx, teamId, sprint, options);
  if (!record) return null;

  const now = ctx.now?.() ?? new Date();
  const end = record.sprint.endDate;
  return {
    sprint: record.sprint,
    timeLeftMs: end ? end.getTime() - now.getTime() : null,
    record,
  };
}

/** Every sprint of a team, newest first, with running aggregates. */
export async function getHistoricSprintStats(
  ctx: MetricsContext,
  teamId: string,
  options: RequestOptions = {},
): Promise<SprintHistory> {
  const result = await fetchSprintData(ctx, { teamId, history: true }, options);
  return result.kind === "history" ? result.history : unexpected(result);
}

/** Refresh the current sprint of every team. */
export async function updateCurrentSprintStats(
  ctx: MetricsContext,
  options: RequestOptions = {},
): Promise<TeamSprintSummary[]> {
  const result = await fetchSprintData(ctx, { sprint: SPRINT_CURRENT }, options);
  return result.kind === "team-summaries" ? result.teams : unexpected(result);
}

/** A team's sprints in sequence order, oldest first; the last `limit` when given. */
export async function getAbridgedSprintListForTeam(
  ctx: MetricsContext,
  teamId: string,
  limit?: number,
): Promise<AbridgedSprint[]> {
  return createSprintFetcher(ctx).listSprints(teamId, limit);
}
