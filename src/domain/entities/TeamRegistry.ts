import type { ModeConfig } from "../MatchConfig.js";
import type { PlayerId, TeamKey } from "../typedefs.js";

/** Teams in formation order. Members are non-owning references into the roster. */
export type TeamSet = ReadonlyMap<TeamKey, readonly PlayerId[]>;

export const EMPTY_TEAMS: TeamSet = new Map();

export function teamKeyFor(index: number): TeamKey {
  return `team_${index}`;
}

/**
 * Partitions the roster into teams. Solo teams are keyed by the player's own
 * id; grouped modes pack players consecutively in roster order.
 */
export function formTeams(mode: ModeConfig, roster: readonly PlayerId[]): TeamSet {
  if (mode.teamSize <= 1) {
    return new Map(roster.map((playerId) => [playerId, [playerId]] as const));
  }

  const teams = new Map<TeamKey, PlayerId[]>();
  roster.forEach((playerId, index) => {
    const key = teamKeyFor(Math.floor(index / mode.teamSize) + 1);
    const members = teams.get(key);
    if (members) {
      members.push(playerId);
    } else {
      teams.set(key, [playerId]);
    }
  });
  return teams;
}

export function findTeamOf(teams: TeamSet, playerId: PlayerId): TeamKey | undefined {
  for (const [key, members] of teams) {
    if (members.includes(playerId)) {
      return key;
    }
  }
  return undefined;
}
