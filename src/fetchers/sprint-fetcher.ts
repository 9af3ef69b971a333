// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
/**
 * Sprint Data Fetcher
 *
 * Fetches one team's sprint, a team's full sprint history, or a summary of
 * the current / last sprint of every team.
 */

import type { SprintCacheStore } from "../cache/store.js";
import { InvalidParametersError } from "../errors.js";
import { moduleLogger } from "../logger.js";
import type { TeamRoster } from "../roster.js";
import { DEFAULT_CLOSED_GRACE_DAYS, shouldUseCachedSprint } from "../sprints/cache-policy.js";
import { buildDetailedSprintRecord, DEFAULT_OVERDUE_AFTER_DAYS } from "../sprints/detail.js";
import { aggregateSprintHistory, summarizeVelocity } from "../sprints/history.js";
import { analyzePoints, DEFAULT_WORKFLOW, type IssueWorkflow } from "../sprints/points.js";
import { SprintLister } from "../sprints/resolver.js";
import type { TrackerClient } from "../tracker/client.js";
import { buildKeyQuery, cleanIssue } from "../tracker/issues.js";
import {
  SPRINT_LAST_COMPLETED,
  type AbridgedSprint,
  type DetailedSprintRecord,
  type SprintHistory,
  type SprintReference,
  type SymbolicSprintReference,
  type Team,
  type TeamSprintSummary,
  type TrackerIssue,
} from "../types.js";
import { DataFetcher } from "./fetcher.js";

export interface SprintFetchParams {
  /** Short team id. Without it, every team's current or last sprint is summarized. */
  teamId?: string;
  /** Defaults to the last completed sprint. */
  sprint?: SprintReference;
  /** Return every sprint of the team plus running aggregates. */
  history?: boolean;
}

export type SprintQuery =
  | { mode: "all-teams"; reference: SymbolicSprintReference }
  | { mode: "history"; team: Team }
  | { mode: "single"; team: Team; reference: SprintReference };

export type SprintFetchResult =
  | { kind: "team-summaries"; teams: TeamSprintSummary[] }
  | { kind: "history"; history: SprintHistory }
  | { kind: "sprint"; record: DetailedSprintRecord | null };

export interface SprintDataFetcherOptions {
  tracker: TrackerClient;
  store: SprintCacheStore;
  roster: TeamRoster;
  forceUpdate?: boolean;
  closedGraceDays?: number;
  overdueAfterDays?: number;
  pointsField?: string;
  /** Statuses and resolutions used to classify incomplete issues. */
  workflow?: IssueWorkflow;
  now?: () => Date;
}

const DEFAULT_POINTS_FIELD = "customfield_10002";

function endTime(record: DetailedSprintRecord): number {
  return record.sprint.endDate?.getTime() ?? 0;
}

export class SprintDataFetcher extends DataFetcher<SprintFetchParams, SprintQuery, SprintFetchResult> {
  private readonly tracker: TrackerClient;
  private readonly store: SprintCacheStore;
  private readonly roster: TeamRoster;
  private readonly lister: SprintLister;
  private readonly closedGraceDays: number;
  private readonly overdueAfterDays: number;
  private readonly pointsField: string;
  private readonly workflow: IssueWorkflow;
  private readonly now: () => Date;

  constructor(options: SprintDataFetcherOptions) {
    super({ forceUpdate: options.forceUpdate, log: moduleLogger("sprint-fetcher") });
    this.tracker = options.tracker;
    this.store = options.store;
    this.roster = options.roster;
    this.closedGraceDays = options.closedGraceDays ?? DEFAULT_CLOSED_GRACE_DAYS;
    this.overdueAfterDays = options.overdueAfterDays ?? DEFAULT_OVERDUE_AFTER_DAYS;
    this.pointsField = options.pointsField ?? DEFAULT_POINTS_FIELD;
    this.workflow = options.workflow ?? DEFAULT_WORKFLOW;
    this.now = options.now ?? (() => new Date());
    this.lister = new SprintLister(this.tracker, {
      overdueAfterDays: this.overdueAfterDays,
      now: this.now,
    });
  }

  protected validateInput(params: SprintFetchParams): SprintQuery {
    const sprint: SprintReference = params.sprint ?? SPRINT_LAST_COMPLETED;

    if (params.history && params.sprint !== undefined) {
      throw new InvalidParametersError(
        "You specified that you want sprint history but also specified a specific sprint to retrieve.",
      );
    }

    if (!params.teamId) {
      if (params.history) {
        throw new InvalidParametersError(
          "You specified that you want sprint history but didn't specify a team to retrieve the history for.",
        );
      }
      if (sprint.kind === "id" || sprint.kind === "literal") {
        throw new InvalidParametersError(
          "You cannot request a specific sprint if you do not specify a team.",
        );
      }
      return { mode: "all-teams", reference: sprint };
    }

    const team = this.roster.require(params.teamId);
    return params.history ? { mode: "history", team } : { mode: "single", team, reference: sprint };
  }

  protected async getCachedData(query: SprintQuery): Promise<SprintFetchResult | null> {
    // History and summaries are derived on every call; their records are cached one by one.
    if (query.mode !== "single") return null;

    const sprint = await this.lister.resolve(query.team, query.reference);
    if (!sprint) return null;

    const record = await this.loadUsableRecord(sprint);
    return record ? { kind: "sprint", record } : null;
  }

  protected async retrieve(query: SprintQuery, forceUpdate: boolean): Promise<SprintFetchResult> {
    switch (query.mode) {
      case "single": {
        const sprint = await this.lister.resolve(query.team, query.reference);
        if (!sprint) {
          this.log.info({ team: query.team.id, reference: query.reference.kind }, "No matching sprint");
          return { kind: "sprint", record: null };
        }
        return { kind: "sprint", record: await this.fetchDetailedRecord(query.team, sprint) };
      }

      case "history":
        return { kind: "history", history: await this.getHistory(query.team, forceUpdate) };

      case "all-teams":
        return { kind: "team-summaries", teams: await this.summarizeTeams(query.reference, forceUpdate) };
    }
  }

  protected async cacheData(query: SprintQuery, result: SprintFetchResult): Promise<void> {
    if (query.mode === "single" && result.kind === "sprint" && result.record) {
      await this.store.update(result.record);
    }
  }

  /** Sprints of a team listed on its board, oldest first. */
  async listSprints(teamId: string, limit?: number): Promise<AbridgedSprint[]> {
    return this.lister.listAscending(this.roster.require(teamId), limit);
  }

  private async loadUsableRecord(sprint: AbridgedSprint): Promise<DetailedSprintRecord | null> {
    const record = await this.store.loadSprint(sprint.id);
    const usable = shouldUseCachedSprint(record, {
      now: this.now(),
      closedGraceDays: this.closedGraceDays,
    });
    this.log.debug({ sprint: sprint.id, cached: record !== null, usable }, "Checked sprint cache");
    return usable ? record : null;
  }

  /** Cached record when the policy allows, otherwise fetched and stored. */
  private async getDetailedRecord(
    team: Team,
    sprint: AbridgedSprint,
    forceUpdate: boolean,
  ): Promise<DetailedSprintRecord | null> {
    if (!forceUpdate) {
      const cached = await this.loadUsableRecord(sprint);
      if (cached) return cached;
    }
    const record = await this.fetchDetailedRecord(team, sprint);
    if (record) {
      await this.store.update(record);
    }
    return record;
  }

  private async fetchDetailedRecord(team: Team, sprint: AbridgedSprint): Promise<DetailedSprintRecord | null> {
    const log = this.log.child({ team: team.id, sprint: sprint.id });
    const report = await this.tracker.getSprintReport(team.boardId, sprint.id);
    if (!report) {
      log.info("Tracker has no report for sprint");
      return null;
    }

    const record = buildDetailedSprintRecord(team, report, {
      now: this.now(),
      overdueAfterDays: this.overdueAfterDays,
    });

    const { contents } = record;
    contents.addedIssuesFullDetail = await this.queryIssues(contents.issueKeysAddedDuringSprint);
    contents.incompleteIssuesFullDetail = await this.queryIssues(
      contents.issuesNotCompletedInCurrentSprint.map((i) => i.key),
    );
    contents.incompleteIssuesAnalysis = analyzePoints(contents.incompleteIssuesFullDetail, this.workflow);

    log.debug({ state: record.sprint.state, points: record.totalCompletedPoints }, "Fetched sprint report");
    return record;
  }

  private async queryIssues(keys: string[]): Promise<TrackerIssue[]> {
    if (keys.length === 0) return [];
    const issues = await this.tracker.executeQuery(buildKeyQuery(keys));
    return issues.map((i) => cleanIssue(i, this.pointsField));
  }

  private async getHistory(team: Team, forceUpdate: boolean): Promise<SprintHistory> {
    const sprints = await this.lister.listForTeam(team);
    const records: DetailedSprintRecord[] = [];
    for (const sprint of sprints) {
      const record = await this.getDetailedRecord(team, sprint, forceUpdate);
      if (record) records.push(record);
    }

    records.sort((a, b) => endTime(b) - endTime(a));
    return {
      sprints: records,
      aggregate: aggregateSprintHistory(records),
      velocity: summarizeVelocity(records),
    };
  }

  private async summarizeTeams(
    reference: SymbolicSprintReference,
    forceUpdate: boolean,
  ): Promise<TeamSprintSummary[]> {
    const summaries: TeamSprintSummary[] = [];
    for (const team of this.roster.all()) {
      const sprint = await this.lister.resolve(team, reference);
      const record = sprint ? await this.getDetailedRecord(team, sprint, forceUpdate) : null;
      const numIssues = record
        ? record.contents.completedIssues.length +
          record.contents.issuesNotCompletedInCurrentSprint.length +
          record.contents.puntedIssues.length
        : 0;
      summaries.push({ teamId: team.id, sprintId: sprint?.id ?? null, numIssues, success: record !== null });
    }
    return summaries;
  }
}
