// Shared type definitions for delivery-metrics

// --- Teams ---

export interface Team {
  id: string;
  name: string;
  boardId: number;
}

// --- Sprints ---

export type SprintState = "future" | "active" | "closed";

/** Summary record from a board's sprint listing. Never cached. */
export interface AbridgedSprint {
  id: number;
  name: string;
  state: SprintState;
  /** Chronological order on the board; higher is more recent. */
  sequence: number;
  startDate: Date | null;
  endDate: Date | null;
  completeDate: Date | null;
  /** Active and running longer than the configured sprint length. */
  overdue: boolean;
}

/** Which sprint of a team a request is about. */
export type SprintReference =
  | { kind: "current" }
  | { kind: "last-completed" }
  | { kind: "before-last-completed" }
  | { kind: "id"; id: number }
  | { kind: "literal"; sprint: AbridgedSprint };

export type SymbolicSprintReference = Extract<
  SprintReference,
  { kind: "current" | "last-completed" | "before-last-completed" }
>;

export const SPRINT_CURRENT: SymbolicSprintReference = { kind: "current" };
export const SPRINT_LAST_COMPLETED: SymbolicSprintReference = { kind: "last-completed" };
export const SPRINT_BEFORE_LAST_COMPLETED: SymbolicSprintReference = { kind: "before-last-completed" };

export interface SprintInfo {
  id: number;
  name: string;
  state: SprintState;
  startDate: Date | null;
  endDate: Date | null;
  completeDate: Date | null;
}

/** An issue as it appears in a sprint report. */
export interface SprintReportIssue {
  key: string;
  summary: string;
  assignee: string | null;
  points: number;
}

/** A tracker estimate total; `text` is "0" when the tracker reported none. */
export interface EstimateSum {
  value: number | null;
  text: string;
}

/** An issue returned by a tracker query, flattened. */
export interface TrackerIssue {
  key: string;
  summary: string;
  assignee: string;
  status: string;
  resolution: string;
  points: number;
  fields: Record<string, unknown>;
}

// --- Point analysis ---

export interface DeveloperPoints {
  assignee: string;
  issues: string[];
  completePoints: number;
  incompletePoints: number;
  abandonedPoints: number;
  totalPoints: number;
  percentComplete: number;
}

/** Point and ticket totals over a set of issues, overall and per developer. */
export interface PointAnalysis {
  ticketCount: number;
  incompleteTicketCount: number;
  /** Zero-point issues that were not abandoned. */
  unpointedTicketCount: number;
  statusCounts: Record<string, number>;
  completePoints: number;
  incompletePoints: number;
  abandonedPoints: number;
  totalPoints: number;
  percentComplete: number;
  developers: Record<string, DeveloperPoints>;
}

export interface SprintContents {
  completedIssues: SprintReportIssue[];
  issuesNotCompletedInCurrentSprint: SprintReportIssue[];
  puntedIssues: SprintReportIssue[];
  issueKeysAddedDuringSprint: string[];
  completedIssuesEstimateSum: EstimateSum;
  issuesNotCompletedEstimateSum: EstimateSum;
  puntedIssuesEstimateSum: EstimateSum;
  addedIssuesFullDetail: TrackerIssue[];
  incompleteIssuesFullDetail: TrackerIssue[];
  incompleteIssuesAnalysis: PointAnalysis;
}

/**
 * One team's sprint with derived statistics. This is what the cache stores,
 * keyed by `sprintId`.
 */
export interface DetailedSprintRecord {
  teamId: string;
  teamName: string;
  sprintId: number;
  boardId: number;
  sprint: SprintInfo;
  /** completeDate - startDate once closed, now - startDate while active. */
  actualLengthMs: number;
  /** Always false unless the sprint is active. */
  overdue: boolean;
  stdDev: number;
  contributingDevs: string[];
  totalCompletedPoints: number;
  contents: SprintContents;
  fetchedAt: Date;
}

// --- History ---

export const POINT_METRIC_KEYS = [
  "completedIssuesEstimateSum",
  "issuesNotCompletedEstimateSum",
  "puntedIssuesEstimateSum",
] as const;

export const COUNT_METRIC_KEYS = [
  "completedIssues",
  "issuesNotCompletedInCurrentSprint",
  "puntedIssues",
  "issueKeysAddedDuringSprint",
] as const;

export type PointMetricKey = (typeof POINT_METRIC_KEYS)[number];
export type CountMetricKey = (typeof COUNT_METRIC_KEYS)[number];
export type MetricKey = PointMetricKey | CountMetricKey;

export interface RunningStat {
  actual: number;
  runningSum: number;
  runningAvg: number;
}

export interface SprintAggregate {
  info: SprintInfo;
  metrics: Record<MetricKey, RunningStat>;
}

export interface AggregateSprintHistory {
  /** Sprint ids, oldest first. */
  ascendingOrder: number[];
  perSprint: Record<number, SprintAggregate>;
}

/** Velocity across a team's sprints; null fields when there are no sprints. */
export interface VelocitySummary {
  sprintCount: number;
  avgVelocity: number | null;
  lowVelocity: number | null;
  highVelocity: number | null;
  avgPointSize: number | null;
  lowestAvgPointSize: number | null;
  highestAvgPointSize: number | null;
}

export interface SprintHistory {
  /** Newest first. */
  sprints: DetailedSprintRecord[];
  aggregate: AggregateSprintHistory;
  velocity: VelocitySummary;
}

export interface TeamSprintSummary {
  teamId: string;
  sprintId: number | null;
  numIssues: number;
  success: boolean;
}
