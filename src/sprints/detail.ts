import { moduleLogger } from "../logger.js";
import { standardDeviation } from "../metrics.js";
import {
  parseTrackerDate,
  type RawEstimateSum,
  type RawReportIssue,
  type RawSprintReport,
} from "../tracker/schemas.js";
import type {
  DetailedSprintRecord,
  EstimateSum,
  SprintReportIssue,
  SprintState,
  Team,
} from "../types.js";
import { DAY_MS } from "./cache-policy.js";
import { emptyPointAnalysis } from "./points.js";

const log = moduleLogger("sprint-detail");

/** An active sprint running longer than this is considered overdue. */
export const DEFAULT_OVERDUE_AFTER_DAYS = 16;

export function isOverdue(
  state: SprintState,
  startDate: Date | null,
  now: Date,
  overdueAfterDays: number = DEFAULT_OVERDUE_AFTER_DAYS,
): boolean {
  if (state !== "active" || !startDate) return false;
  return now.getTime() - startDate.getTime() > overdueAfterDays * DAY_MS;
}

export function toReportIssue(raw: RawReportIssue): SprintReportIssue {
  return {
    key: raw.key,
    summary: raw.summary ?? "",
    assignee: raw.assignee ?? raw.assigneeName ?? null,
    points: raw.currentEstimateStatistic?.statFieldValue?.value ?? 0,
  };
}

/** Trackers report an empty estimate total as the text "null". */
export function normalizeEstimateSum(raw: RawEstimateSum | null | undefined): EstimateSum {
  const value = raw?.value ?? null;
  const text = raw?.text;
  if (text === undefined || text === null || text === "null" || text.trim() === "") {
    return { value, text: value === null ? "0" : String(value) };
  }
  return { value, text };
}

export interface BuildRecordOptions {
  now?: Date;
  overdueAfterDays?: number;
}

/**
 * Turn a sprint report into the record that gets cached. Full issue details
 * for added and incomplete issues are left empty; the fetcher fills them.
 */
export function buildDetailedSprintRecord(
  team: Team,
  report: RawSprintReport,
  options: BuildRecordOptions = {},
): DetailedSprintRecord {
  const now = options.now ?? new Date();
  const { sprint: rawSprint, contents } = report;

  const sprint = {
    id: rawSprint.id,
    name: rawSprint.name,
    state: rawSprint.state,
    startDate: parseTrackerDate(rawSprint.startDate),
    endDate: parseTrackerDate(rawSprint.endDate),
    completeDate: parseTrackerDate(rawSprint.completeDate),
  };

  let actualLengthMs = 0;
  if (sprint.startDate) {
    if (sprint.state === "active") {
      actualLengthMs = now.getTime() - sprint.startDate.getTime();
    } else if (sprint.state === "closed" && sprint.completeDate) {
      actualLengthMs = sprint.completeDate.getTime() - sprint.startDate.getTime();
    }
  }

  const completedIssues = contents.completedIssues.map(toReportIssue);

  // Point spread across developers
  const pointsByAssignee = new Map<string, number>();
  let totalCompletedPoints = 0;
  for (const issue of completedIssues) {
    totalCompletedPoints += issue.points;
    if (issue.assignee) {
      pointsByAssignee.set(issue.assignee, (pointsByAssignee.get(issue.assignee) ?? 0) + issue.points);
    } else {
      log.warn(
        { team: team.id, sprint: sprint.id, issue: issue.key },
        "Found a completed issue without an assignee",
      );
    }
  }

  return {
    teamId: team.id,
    teamName: team.name,
    sprintId: sprint.id,
    boardId: team.boardId,
    sprint,
    actualLengthMs,
    overdue: isOverdue(sprint.state, sprint.startDate, now, options.overdueAfterDays),
    stdDev: standardDeviation([...pointsByAssignee.values()]),
    contributingDevs: [...pointsByAssignee.keys()],
    totalCompletedPoints,
    contents: {
      completedIssues,
      issuesNotCompletedInCurrentSprint: contents.issuesNotCompletedInCurrentSprint.map(toReportIssue),
      puntedIssues: contents.puntedIssues.map(toReportIssue),
      issueKeysAddedDuringSprint: Object.keys(contents.issueKeysAddedDuringSprint),
      completedIssuesEstimateSum: normalizeEstimateSum(contents.completedIssuesEstimateSum),
      issuesNotCompletedEstimateSum: normalizeEstimateSum(contents.issuesNotCompletedEstimateSum),
      puntedIssuesEstimateSum: normalizeEstimateSum(contents.puntedIssuesEstimateSum),
      addedIssuesFullDetail: [],
      incompleteIssuesFullDetail: [],
      incompleteIssuesAnalysis: emptyPointAnalysis(),
    },
    fetchedAt: now,
  };
}
