import { z } from "zod";

// --- Zod Response Schemas (for validating tracker payloads) ---

const RawSprintStateSchema = z
  .string()
  .transform((s) => s.toLowerCase())
  .pipe(z.enum(["future", "active", "closed"]));

const RawDateSchema = z.string().nullish();

export const RawAbridgedSprintSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  state: RawSprintStateSchema,
  sequence: z.number().int().optional(),
  startDate: RawDateSchema,
  endDate: RawDateSchema,
  completeDate: RawDateSchema,
});

export const SprintListResponseSchema = z.object({
  sprints: z.array(RawAbridgedSprintSchema),
});

const RawEstimateSumSchema = z.object({
  value: z.number().nullish(),
  text: z.string().nullish(),
});

const RawReportIssueSchema = z.object({
  key: z.string().min(1),
  summary: z.string().nullish(),
  assignee: z.string().nullish(),
  assigneeName: z.string().nullish(),
  currentEstimateStatistic: z
    .object({
      statFieldValue: z.object({ value: z.number().nullish() }).nullish(),
    })
    .nullish(),
});

export const SprintReportResponseSchema = z.object({
  sprint: RawAbridgedSprintSchema.omit({ sequence: true }),
  contents: z.object({
    completedIssues: z.array(RawReportIssueSchema).default([]),
    issuesNotCompletedInCurrentSprint: z.array(RawReportIssueSchema).default([]),
    puntedIssues: z.array(RawReportIssueSchema).default([]),
    issueKeysAddedDuringSprint: z.record(z.string(), z.unknown()).default({}),
    completedIssuesEstimateSum: RawEstimateSumSchema.nullish(),
    issuesNotCompletedEstimateSum: RawEstimateSumSchema.nullish(),
    puntedIssuesEstimateSum: RawEstimateSumSchema.nullish(),
  }),
});

export const RawIssueSchema = z.object({
  key: z.string().min(1),
  fields: z.record(z.string(), z.unknown()).default({}),
});

export const SearchResponseSchema = z.object({
  issues: z.array(RawIssueSchema),
});

export type RawAbridgedSprint = z.infer<typeof RawAbridgedSprintSchema>;
export type RawSprintReport = z.infer<typeof SprintReportResponseSchema>;
export type RawReportIssue = z.infer<typeof RawReportIssueSchema>;
export type RawEstimateSum = z.infer<typeof RawEstimateSumSchema>;
export type RawIssue = z.infer<typeof RawIssueSchema>;

/** Parse a tracker date string; missing or unparseable values become null. */
export function parseTrackerDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
}
