import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  buildDetailedSprintRecord,
  isOverdue,
  normalizeEstimateSum,
  toReportIssue,
} from "../../src/sprints/detail.js";
import type { Team } from "../../src/types.js";
import { DAY, daysBefore, makeReport, reportIssue } from "../fixtures/tracker.js";

const { warn } = vi.hoisted(() => ({ warn: vi.fn() }));

vi.mock("../../src/logger.js", () => {
  const child = { warn, debug: vi.fn(), info: vi.fn(), error: vi.fn() };
  return { moduleLogger: vi.fn(() => child) };
});

const NOW = new Date("2024-06-20T12:00:00Z");
const HOVERBOARD: Team = { id: "hb", name: "Team Hoverboard", boardId: 12 };

beforeEach(() => {
  warn.mockClear();
});

describe("isOverdue", () => {
  it("is true only for active sprints running past the threshold", () => {
    const start = new Date(NOW.getTime() - 17 * DAY);
    expect(isOverdue("active", start, NOW)).toBe(true);
    expect(isOverdue("closed", start, NOW)).toBe(false);
    expect(isOverdue("active", null, NOW)).toBe(false);
    expect(isOverdue("active", new Date(NOW.getTime() - 16 * DAY), NOW)).toBe(false);
  });
});

describe("normalizeEstimateSum", () => {
  it("replaces a \"null\" or missing text", () => {
    expect(normalizeEstimateSum({ value: null, text: "null" })).toEqual({ value: null, text: "0" });
    expect(normalizeEstimateSum(undefined)).toEqual({ value: null, text: "0" });
    expect(normalizeEstimateSum({ value: 7, text: null })).toEqual({ value: 7, text: "7" });
  });

  it("keeps a reported text", () => {
    expect(normalizeEstimateSum({ value: 12, text: "12" })).toEqual({ value: 12, text: "12" });
  });
});

describe("toReportIssue", () => {
  it("falls back to the assignee name and zero points", () => {
    expect(toReportIssue({ key: "HB-1", assigneeName: "carol" })).toEqual({
      key: "HB-1",
      summary: "",
      assignee: "carol",
      points: 0,
    });
  });
});

describe("buildDetailedSprintRecord", () => {
  const closedReport = makeReport(
    {
      id: 101,
      name: "Sprint 40 - Hoverboard",
      state: "closed",
      startDate: "2024-03-01T00:00:00Z",
      endDate: "2024-03-14T00:00:00Z",
      completeDate: "2024-03-15T00:00:00Z",
    },
    {
      completedIssues: [
        reportIssue("HB-1", 3, "alice"),
        reportIssue("HB-2", 5, "alice"),
        reportIssue("HB-3", 2, "bob"),
        reportIssue("HB-4", 4),
      ],
      issuesNotCompletedInCurrentSprint: [reportIssue("HB-5", 1, "bob")],
      issueKeysAddedDuringSprint: { "HB-3": true, "HB-5": true },
      completedIssuesEstimateSum: { value: 14, text: "14" },
    },
  );

  it("spreads completed points across developers", () => {
    const record = buildDetailedSprintRecord(HOVERBOARD, closedReport, { now: NOW });
    // alice 8, bob 2
    expect(record.stdDev).toBe(3);
    expect(record.contributingDevs).toEqual(["alice", "bob"]);
    expect(record.totalCompletedPoints).toBe(14);
  });

  it("warns about a completed issue without an assignee", () => {
    buildDetailedSprintRecord(HOVERBOARD, closedReport, { now: NOW });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      { team: "hb", sprint: 101, issue: "HB-4" },
      "Found a completed issue without an assignee",
    );
  });

  it("measures a closed sprint from start to completion", () => {
    const record = buildDetailedSprintRecord(HOVERBOARD, closedReport, { now: NOW });
    expect(record.actualLengthMs).toBe(14 * DAY);
    expect(record.overdue).toBe(false);
  });

  it("copies team identity and report contents", () => {
    const record = buildDetailedSprintRecord(HOVERBOARD, closedReport, { now: NOW });
    expect(record).toMatchObject({
      teamId: "hb",
      teamName: "Team Hoverboard",
      sprintId: 101,
      boardId: 12,
      fetchedAt: NOW,
    });
    expect(record.sprint.completeDate).toEqual(new Date("2024-03-15T00:00:00Z"));
    expect(record.contents.issueKeysAddedDuringSprint).toEqual(["HB-3", "HB-5"]);
    expect(record.contents.issuesNotCompletedInCurrentSprint).toEqual([
      { key: "HB-5", summary: "Summary of HB-5", assignee: "bob", points: 1 },
    ]);
    expect(record.contents.completedIssuesEstimateSum).toEqual({ value: 14, text: "14" });
    expect(record.contents.puntedIssuesEstimateSum).toEqual({ value: null, text: "0" });
    expect(record.contents.addedIssuesFullDetail).toEqual([]);
  });

  it("measures an active sprint up to now and flags it when overdue", () => {
    const report = makeReport({
      id: 103,
      name: "Sprint 42 - Hoverboard",
      state: "active",
      startDate: daysBefore(NOW, 20),
    });
    const record = buildDetailedSprintRecord(HOVERBOARD, report, { now: NOW });
    expect(record.actualLengthMs).toBe(20 * DAY);
    expect(record.overdue).toBe(true);
    expect(record.stdDev).toBe(0);
    expect(record.contributingDevs).toEqual([]);
  });

  it("gives a future sprint no length", () => {
    const report = makeReport({
      id: 104,
      name: "Sprint 43 - Hoverboard",
      state: "future",
      startDate: "2024-07-01T00:00:00Z",
    });
    expect(buildDetailedSprintRecord(HOVERBOARD, report, { now: NOW }).actualLengthMs).toBe(0);
  });
});
