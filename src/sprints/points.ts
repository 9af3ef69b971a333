import { percent } from "../metrics.js";
import type { DeveloperPoints, PointAnalysis, TrackerIssue } from "../types.js";

/** Which statuses and resolutions end an issue's life. */
export interface IssueWorkflow {
  doneStatuses: readonly string[];
  abandonedResolutions: readonly string[];
}

export const DEFAULT_WORKFLOW: IssueWorkflow = {
  doneStatuses: ["done", "closed", "resolved"],
  abandonedResolutions: ["won't fix", "won't do", "duplicate", "cannot reproduce", "abandoned"],
};

export type IssueOutcome = "complete" | "abandoned" | "incomplete";

function includesIgnoringCase(values: readonly string[], value: string): boolean {
  const needle = value.toLowerCase();
  return needle !== "" && values.some((v) => v.toLowerCase() === needle);
}

/** Abandoned wins over done: a closed "won't fix" issue delivered nothing. */
export function classifyIssue(issue: TrackerIssue, workflow: IssueWorkflow = DEFAULT_WORKFLOW): IssueOutcome {
  if (includesIgnoringCase(workflow.abandonedResolutions, issue.resolution)) return "abandoned";
  if (includesIgnoringCase(workflow.doneStatuses, issue.status)) return "complete";
  return "incomplete";
}

export function emptyPointAnalysis(): PointAnalysis {
  return {
    ticketCount: 0,
    incompleteTicketCount: 0,
    unpointedTicketCount: 0,
    statusCounts: {},
    completePoints: 0,
    incompletePoints: 0,
    abandonedPoints: 0,
    totalPoints: 0,
    percentComplete: 0,
    developers: {},
  };
}

function developerEntry(analysis: PointAnalysis, assignee: string): DeveloperPoints {
  let dev = analysis.developers[assignee];
  if (!dev) {
    dev = {
      assignee,
      issues: [],
      completePoints: 0,
      incompletePoints: 0,
      abandonedPoints: 0,
      totalPoints: 0,
      percentComplete: 0,
    };
    analysis.developers[assignee] = dev;
  }
  return dev;
}

/**
 * Complete, incomplete and abandoned points over a set of issues, in total
 * and per assignee, with ticket counts by status.
 */
export function analyzePoints(
  issues: readonly TrackerIssue[],
  workflow: IssueWorkflow = DEFAULT_WORKFLOW,
): PointAnalysis {
  const analysis = emptyPointAnalysis();
  analysis.ticketCount = issues.length;

  for (const issue of issues) {
    const status = issue.status || "unknown";
    analysis.statusCounts[status] = (analysis.statusCounts[status] ?? 0) + 1;

    const dev = developerEntry(analysis, issue.assignee);
    dev.issues.push(issue.key);

    const outcome = classifyIssue(issue, workflow);
    switch (outcome) {
      case "complete":
        analysis.completePoints += issue.points;
        dev.completePoints += issue.points;
        break;
      case "abandoned":
        analysis.abandonedPoints += issue.points;
        dev.abandonedPoints += issue.points;
        break;
      case "incomplete":
        analysis.incompleteTicketCount++;
        analysis.incompletePoints += issue.points;
        dev.incompletePoints += issue.points;
        break;
    }

    if (issue.points === 0 && outcome !== "abandoned") {
      analysis.unpointedTicketCount++;
    }
  }

  analysis.totalPoints = analysis.completePoints + analysis.incompletePoints + analysis.abandonedPoints;
  analysis.percentComplete = percent(analysis.completePoints, analysis.totalPoints);
  for (const dev of Object.values(analysis.developers)) {
    dev.totalPoints = dev.completePoints + dev.incompletePoints + dev.abandonedPoints;
    dev.percentComplete = percent(dev.completePoints, dev.totalPoints);
  }

  return analysis;
}
