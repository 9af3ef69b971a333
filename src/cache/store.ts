// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
/**
 * Sprint Record Cache
 *
 * Stores {@link DetailedSprintRecord}s keyed by sprint id. Whether a stored
 * record may be served is decided by the cache policy, not by the store.
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import { moduleLogger } from "../logger.js";
import type { DetailedSprintRecord } from "../types.js";

const log = moduleLogger("sprint-cache");

export const CACHE_VERSION = "2";

export interface SprintCacheStore {
  /** Store a record; an existing record for the same sprint is replaced. */
  save(record: DetailedSprintRecord): Promise<void>;
  /** Overwrite the record for the same sprint identity. */
  update(record: DetailedSprintRecord): Promise<void>;
  loadSprint(sprintId: number): Promise<DetailedSprintRecord | null>;
}

const DateSchema = z.coerce.date();

const SprintInfoSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  state: z.enum(["future", "active", "closed"]),
  startDate: DateSchema.nullable(),
  endDate: DateSchema.nullable(),
  completeDate: DateSchema.nullable(),
});

const ReportIssueSchema = z.object({
  key: z.string(),
  summary: z.string(),
  assignee: z.string().nullable(),
  points: z.number(),
});

const EstimateSumSchema = z.object({
  value: z.number().nullable(),
  text: z.string(),
});

const TrackerIssueSchema = z.object({
  key: z.string(),
  summary: z.string(),
  assignee: z.string(),
  status: z.string(),
  resolution: z.string(),
  points: z.number(),
  fields: z.record(z.string(), z.unknown()),
});

const DeveloperPointsSchema = z.object({
  assignee: z.string(),
  issues: z.array(z.string()),
  completePoints: z.number(),
  incompletePoints: z.number(),
  abandonedPoints: z.number(),
  totalPoints: z.number(),
  percentComplete: z.number(),
});

const PointAnalysisSchema = z.object({
  ticketCount: z.number().int(),
  incompleteTicketCount: z.number().int(),
  unpointedTicketCount: z.number().int(),
  statusCounts: z.record(z.string(), z.number().int()),
  completePoints: z.number(),
  incompletePoints: z.number(),
  abandonedPoints: z.number(),
  totalPoints: z.number(),
  percentComplete: z.number(),
  developers: z.record(z.string(), DeveloperPointsSchema),
});

export const DetailedSprintRecordSchema = z.object({
  teamId: z.string(),
  teamName: z.string(),
  sprintId: z.number().int(),
  boardId: z.number().int(),
  sprint: SprintInfoSchema,
  actualLengthMs: z.number(),
  overdue: z.boolean(),
  stdDev: z.number(),
  contributingDevs: z.array(z.string()),
  totalCompletedPoints: z.number(),
  contents: z.object({
    completedIssues: z.array(ReportIssueSchema),
    issuesNotCompletedInCurrentSprint: z.array(ReportIssueSchema),
    puntedIssues: z.array(ReportIssueSchema),
    issueKeysAddedDuringSprint: z.array(z.string()),
    completedIssuesEstimateSum: EstimateSumSchema,
    issuesNotCompletedEstimateSum: EstimateSumSchema,
    puntedIssuesEstimateSum: EstimateSumSchema,
    addedIssuesFullDetail: z.array(TrackerIssueSchema).default([]),
    incompleteIssuesFullDetail: z.array(TrackerIssueSchema).default([]),
    incompleteIssuesAnalysis: PointAnalysisSchema,
  }),
  fetchedAt: DateSchema,
});

const CacheEntrySchema = z.object({
  version: z.string(),
  record: DetailedSprintRecordSchema,
});

/**
 * One JSON file per sprint under `dir`. Writes go through a temp file and
 * a rename so a reader never sees a half-written record; when writers
 * race on the same sprint, the last rename wins.
 */
export class FileSprintCacheStore implements SprintCacheStore {
  constructor(private readonly dir: string) {}

  pathFor(sprintId: number): string {
    return path.join(this.dir, `sprint-${sprintId}.json`);
  }

  async save(record: DetailedSprintRecord): Promise<void> {
    const filePath = this.pathFor(record.sprintId);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    // one temp file per write; concurrent writers race on the rename only
    const tmpPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
    const data = JSON.stringify({ version: CACHE_VERSION, record }, null, 2);
    const handle = await fs.open(tmpPath, "w");
    try {
      await handle.writeFile(data, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmpPath, filePath);
    log.debug({ sprint: record.sprintId, team: record.teamId }, "Cached sprint record");
  }

  async update(record: DetailedSprintRecord): Promise<void> {
    await this.save(record);
  }

  async loadSprint(sprintId: number): Promise<DetailedSprintRecord | null> {
    const filePath = this.pathFor(sprintId);

    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (err: unknown) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      log.warn({ filePath, error: errorMessage(err) }, "Failed to parse cached sprint JSON");
      return null;
    }

    const result = CacheEntrySchema.safeParse(json);
    if (!result.success) {
      log.warn({ filePath, issues: result.error.issues }, "Cached sprint failed validation");
      return null;
    }
    if (result.data.version !== CACHE_VERSION) {
      log.warn(
        { filePath, version: result.data.version, expected: CACHE_VERSION },
        "Ignoring cached sprint written by another cache version",
      );
      return null;
    }
    return result.data.record;
  }
}

/**
 * Records kept in a map owned by the store instance. Lives exactly as long
 * as its owner; `clear()` drops everything.
 */
export class MemorySprintCacheStore implements SprintCacheStore {
  private readonly records = new Map<number, DetailedSprintRecord>();

  async save(record: DetailedSprintRecord): Promise<void> {
    this.records.set(record.sprintId, structuredClone(record));
  }

  async update(record: DetailedSprintRecord): Promise<void> {
    await this.save(record);
  }

  async loadSprint(sprintId: number): Promise<DetailedSprintRecord | null> {
    const record = this.records.get(sprintId);
    return record ? structuredClone(record) : null;
  }

  get size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
  }
}
