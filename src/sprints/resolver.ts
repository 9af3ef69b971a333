/**
 * Sprint Resolver
 *
 * Turns a team plus a {@link SprintReference} into one concrete sprint from
 * the team's board listing.
 */

import { moduleLogger } from "../logger.js";
import type { TrackerClient } from "../tracker/client.js";
import { parseTrackerDate, type RawAbridgedSprint } from "../tracker/schemas.js";
import type { AbridgedSprint, SprintReference, Team } from "../types.js";
import { DEFAULT_OVERDUE_AFTER_DAYS, isOverdue } from "./detail.js";

const log = moduleLogger("sprint-resolver");

function normalizeTeamName(name: string): string {
  return name.replace(/team/gi, "").trim().toLowerCase();
}

/**
 * Boards list every sprint any of their issues ever sat in, so a board's
 * listing includes other teams' sprints. Sprints are named
 * "<prefix> - <team>"; the team part may be an abbreviation of the team's
 * name or the other way around.
 */
export function sprintBelongsToTeam(sprint: Pick<AbridgedSprint, "name">, team: Team): boolean {
  const parts = sprint.name.split("-");
  const fromSprint = (parts[1] ?? "").trim().toLowerCase();
  const fromTeam = normalizeTeamName(team.name);
  if (!fromSprint || !fromTeam) return false;
  return fromSprint.includes(fromTeam) || fromTeam.includes(fromSprint);
}

export function toAbridgedSprint(
  raw: RawAbridgedSprint,
  now: Date,
  overdueAfterDays: number = DEFAULT_OVERDUE_AFTER_DAYS,
): AbridgedSprint {
  const startDate = parseTrackerDate(raw.startDate);
  return {
    id: raw.id,
    name: raw.name,
    state: raw.state,
    sequence: raw.sequence ?? raw.id,
    startDate,
    endDate: parseTrackerDate(raw.endDate),
    completeDate: parseTrackerDate(raw.completeDate),
    overdue: isOverdue(raw.state, startDate, now, overdueAfterDays),
  };
}

/** Most recent first. Equal sequences keep their listing order. */
export function sortBySequenceDescending(sprints: readonly AbridgedSprint[]): AbridgedSprint[] {
  return [...sprints].sort((a, b) => b.sequence - a.sequence);
}

/**
 * Pick the sprint a reference points at.
 * @param sprints - the team's sprints, most recent first
 * @returns the matching sprint, or null when there is none
 */
export function resolveSprint(
  sprints: readonly AbridgedSprint[],
  reference: SprintReference,
): AbridgedSprint | null {
  switch (reference.kind) {
    case "literal":
      return reference.sprint;

    case "id":
      return sprints.find((s) => s.id === reference.id) ?? null;

    case "current":
      return sprints.find((s) => s.state === "active") ?? null;

    case "last-completed":
      for (const s of sprints) {
        if (s.state === "future") continue;
        if (s.state === "active") {
          // should have been closed already; the tracker just hasn't caught up
          if (s.overdue) return s;
          continue;
        }
        return s;
      }
      return null;

    case "before-last-completed": {
      let seenLast = false;
      for (const s of sprints) {
        if (s.state !== "closed") continue;
        if (seenLast) return s;
        seenLast = true;
      }
      return null;
    }
  }
}

/** Parse "current", "last", "before-last" or a numeric sprint id. */
export function parseSprintReference(text: string): SprintReference | null {
  const value = text.trim().toLowerCase();
  switch (value) {
    case "current":
      return { kind: "current" };
    case "last":
    case "last-completed":
      return { kind: "last-completed" };
    case "before-last":
    case "before-last-completed":
      return { kind: "before-last-completed" };
  }
  if (!/^\d+$/.test(value)) return null;
  const id = Number(value);
  return id > 0 ? { kind: "id", id } : null;
}

export interface SprintListerOptions {
  overdueAfterDays?: number;
  now?: () => Date;
}

/**
 * Lists a team's sprints from its board. Listings are kept for the
 * lifetime of the lister, which is meant to be one request.
 */
export class SprintLister {
  private readonly listings = new Map<string, AbridgedSprint[]>();
  private readonly overdueAfterDays: number;
  private readonly now: () => Date;

  constructor(
    private readonly tracker: TrackerClient,
    options: SprintListerOptions = {},
  ) {
    this.overdueAfterDays = options.overdueAfterDays ?? DEFAULT_OVERDUE_AFTER_DAYS;
    this.now = options.now ?? (() => new Date());
  }

  /** The team's own sprints, in board listing order. */
  async listForTeam(team: Team): Promise<AbridgedSprint[]> {
    const cached = this.listings.get(team.id);
    if (cached) return cached;

    const raw = await this.tracker.listSprints(team.boardId);
    const now = this.now();
    const sprints = raw
      .map((r) => toAbridgedSprint(r, now, this.overdueAfterDays))
      .filter((s) => sprintBelongsToTeam(s, team));

    log.debug(
      { team: team.id, listed: raw.length, kept: sprints.length },
      "Listed team sprints",
    );
    this.listings.set(team.id, sprints);
    return sprints;
  }

  /** Resolve a reference against the team's listing. */
  async resolve(team: Team, reference: SprintReference): Promise<AbridgedSprint | null> {
    if (reference.kind === "literal") return reference.sprint;
    const sprints = sortBySequenceDescending(await this.listForTeam(team));
    return resolveSprint(sprints, reference);
  }

  /** Oldest first; only the last `limit` when given. */
  async listAscending(team: Team, limit?: number): Promise<AbridgedSprint[]> {
    const ascending = [...(await this.listForTeam(team))].sort((a, b) => a.sequence - b.sequence);
    return limit !== undefined && limit > 0 ? ascending.slice(-limit) : ascending;
  }
}
