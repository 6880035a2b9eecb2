import type { ModeConfig } from "../MatchConfig.js";
import type { PlayerId, TeamKey } from "../typedefs.js";
import { findTeamOf, type TeamSet } from "./TeamRegistry.js";

export interface AliveCounts {
  readonly players: number;
  readonly teams: number;
}

export type Winner =
  | { readonly kind: "player"; readonly playerId: PlayerId }
  | {
      readonly kind: "team";
      readonly teamKey: TeamKey;
      readonly members: readonly PlayerId[];
    };

export type AliveMap = ReadonlyMap<PlayerId, boolean>;

export function countAlive(teams: TeamSet, alive: AliveMap): AliveCounts {
  let players = 0;
  for (const isAlive of alive.values()) {
    if (isAlive) players += 1;
  }

  let teamsAlive = 0;
  for (const members of teams.values()) {
    if (members.some((member) => alive.get(member) === true)) teamsAlive += 1;
  }

  return { players, teams: teamsAlive };
}

/**
 * Returns the winner once exactly one player (solo) or one team (grouped modes)
 * has survivors. Simultaneous wipes leave no winner; the match then ends by timeout.
 */
export function evaluateVictory(
  mode: ModeConfig,
  counts: AliveCounts,
  teams: TeamSet,
  alive: AliveMap,
): Winner | undefined {
  if (mode.teamSize <= 1) {
    if (counts.players !== 1) return undefined;
    for (const [playerId, isAlive] of alive) {
      if (isAlive) return { kind: "player", playerId };
    }
    return undefined;
  }

  if (counts.teams !== 1) return undefined;
  for (const [teamKey, members] of teams) {
    if (members.some((member) => alive.get(member) === true)) {
      return { kind: "team", teamKey, members: [...members] };
    }
  }
  return undefined;
}

/** Key of the player's team once it has no living member left; undefined otherwise. */
export function isTeamEliminated(
  teams: TeamSet,
  alive: AliveMap,
  playerId: PlayerId,
): TeamKey | undefined {
  const teamKey = findTeamOf(teams, playerId);
  if (teamKey === undefined) return undefined;
  const members = teams.get(teamKey) ?? [];
  return members.some((member) => alive.get(member) === true) ? undefined : teamKey;
}
