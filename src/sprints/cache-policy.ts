import type { DetailedSprintRecord } from "../types.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Days after close during which a sprint is still refetched. */
export const DEFAULT_CLOSED_GRACE_DAYS = 6;

export interface CachePolicyOptions {
  now?: Date;
  closedGraceDays?: number;
}

/**
 * Whether a cached sprint can be returned without asking the tracker.
 *
 * Only sprints that closed more than `closedGraceDays` ago qualify: active
 * sprints change continuously, and trackers still accept edits to a sprint
 * for a little while after it closes.
 */
export function shouldUseCachedSprint(
  record: DetailedSprintRecord | null,
  options: CachePolicyOptions = {},
): boolean {
  if (!record) return false;

  const { now = new Date(), closedGraceDays = DEFAULT_CLOSED_GRACE_DAYS } = options;
  const { state, completeDate } = record.sprint;
  if (state !== "closed" || !completeDate) return false;

  return completeDate.getTime() < now.getTime() - closedGraceDays * DAY_MS;
}
