// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
/**
 * Sprint History
 *
 * Running totals and averages over a team's sprints, oldest to newest.
 */

import type {
  AggregateSprintHistory,
  DetailedSprintRecord,
  EstimateSum,
  MetricKey,
  RunningStat,
  VelocitySummary,
} from "../types.js";

/** Numeric value of an estimate total; missing, "null" and garbage count as 0. */
export function estimateValue(sum: EstimateSum | null | undefined): number {
  const text = sum?.text;
  if (text === undefined || text === null || text === "null") return 0;
  const value = Number(text);
  return Number.isFinite(value) ? value : 0;
}

function actualValues(record: DetailedSprintRecord): Record<MetricKey, number> {
  const { contents } = record;
  return {
    completedIssuesEstimateSum: estimateValue(contents.completedIssuesEstimateSum),
    issuesNotCompletedEstimateSum: estimateValue(contents.issuesNotCompletedEstimateSum),
    puntedIssuesEstimateSum: estimateValue(contents.puntedIssuesEstimateSum),
    completedIssues: contents.completedIssues.length,
    issuesNotCompletedInCurrentSprint: contents.issuesNotCompletedInCurrentSprint.length,
    puntedIssues: contents.puntedIssues.length,
    issueKeysAddedDuringSprint: contents.issueKeysAddedDuringSprint.length,
  };
}

function runningStats(
  actual: Record<MetricKey, number>,
  previous: Record<MetricKey, RunningStat> | null,
  count: number,
): Record<MetricKey, RunningStat> {
  const stat = (key: MetricKey): RunningStat => {
    const runningSum = previous ? previous[key].runningSum + actual[key] : actual[key];
    return { actual: actual[key], runningSum, runningAvg: runningSum / count };
  };
  return {
    completedIssuesEstimateSum: stat("completedIssuesEstimateSum"),
    issuesNotCompletedEstimateSum: stat("issuesNotCompletedEstimateSum"),
    puntedIssuesEstimateSum: stat("puntedIssuesEstimateSum"),
    completedIssues: stat("completedIssues"),
    issuesNotCompletedInCurrentSprint: stat("issuesNotCompletedInCurrentSprint"),
    puntedIssues: stat("puntedIssues"),
    issueKeysAddedDuringSprint: stat("issueKeysAddedDuringSprint"),
  };
}

/**
 * Aggregate a team's sprint history.
 *
 * @param recordsDescending - detailed records, newest first (listing order)
 */
export function aggregateSprintHistory(
  recordsDescending: readonly DetailedSprintRecord[],
): AggregateSprintHistory {
  const ascending = [...recordsDescending].reverse();
  const history: AggregateSprintHistory = { ascendingOrder: [], perSprint: {} };

  let previous: Record<MetricKey, RunningStat> | null = null;
  for (const [idx, record] of ascending.entries()) {
    const metrics = runningStats(actualValues(record), previous, idx + 1);
    history.ascendingOrder.push(record.sprintId);
    history.perSprint[record.sprintId] = { info: record.sprint, metrics };
    previous = metrics;
  }

  return history;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Average, lowest and highest velocity (completed points) across sprints,
 * and the same for the average size of a completed issue.
 */
export function summarizeVelocity(records: readonly DetailedSprintRecord[]): VelocitySummary {
  if (records.length === 0) {
    return {
      sprintCount: 0,
      avgVelocity: null,
      lowVelocity: null,
      highVelocity: null,
      avgPointSize: null,
      lowestAvgPointSize: null,
      highestAvgPointSize: null,
    };
  }

  const velocities = records.map((r) => estimateValue(r.contents.completedIssuesEstimateSum));
  const pointSizes = records.map((r) =>
    r.contents.completedIssues.length === 0 ? 0 : r.totalCompletedPoints / r.contents.completedIssues.length,
  );

  return {
    sprintCount: records.length,
    avgVelocity: mean(velocities),
    lowVelocity: Math.min(...velocities),
    highVelocity: Math.max(...velocities),
    avgPointSize: mean(pointSizes),
    lowestAvgPointSize: Math.min(...pointSizes),
    highestAvgPointSize: Math.max(...pointSizes),
  };
}
