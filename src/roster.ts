import type { TeamConfig } from "./config.js";
import { InvalidParametersError } from "./errors.js";
import type { Team } from "./types.js";

/**
 * Teams known to the system. The id index is built on first lookup and
 * kept for the roster's lifetime; the configured teams are not re-read.
 */
export class TeamRoster {
  private index: Map<string, Team> | null = null;

  constructor(private readonly teams: readonly TeamConfig[]) {}

  private load(): Map<string, Team> {
    if (!this.index) {
      this.index = new Map(
        this.teams.map((t) => [t.id, { id: t.id, name: t.name, boardId: t.board_id }]),
      );
    }
    return this.index;
  }

  all(): Team[] {
    return [...this.load().values()];
  }

  get(teamId: string): Team | null {
    return this.load().get(teamId) ?? null;
  }

  /** Like {@link get}, but an unknown team is a caller error. */
  require(teamId: string): Team {
    const team = this.get(teamId);
    if (!team) {
      throw new InvalidParametersError(`Unknown team: ${teamId}`);
    }
    return team;
  }
}
