import type { Winner } from "./entities/VictoryEvaluator.js";
import type { MatchPhase, PlayerId, Position, TimePoint } from "./typedefs.js";

/** Channel every observer is subscribed to */
export const MATCH_CHANNEL = "match";

/** Channel for events addressed to one player */
export function playerChannel(playerId: PlayerId): string {
  return `player:${playerId}`;
}

export type MatchEvent =
  | {
      readonly type: "PhaseChanged";
      readonly phase: MatchPhase;
      readonly previous: MatchPhase;
      readonly at: TimePoint;
    }
  | {
      readonly type: "LobbyStatus";
      readonly currentPlayers: number;
      readonly requiredPlayers: number;
      /** Whole seconds until the match starts */
      readonly timeRemaining: number;
      readonly canStart: boolean;
      readonly at: TimePoint;
    }
  | {
      readonly type: "Countdown";
      readonly secondsRemaining: number;
      readonly at: TimePoint;
    }
  | {
      readonly type: "AliveCountUpdate";
      readonly players: number;
      readonly teams: number;
      readonly at: TimePoint;
    }
  | {
      readonly type: "ZoneWarning";
      readonly delaySeconds: number;
      /** Zone phase about to shrink; 0 announces the end of the grace period */
      readonly upcomingPhase: number;
      readonly at: TimePoint;
    }
  | {
      readonly type: "ZoneUpdate";
      readonly phase: number;
      readonly targetRadius: number;
      readonly targetCenter: Position;
      readonly damage: number;
      readonly at: TimePoint;
    }
  | {
      readonly type: "ZoneDamage";
      readonly playerId: PlayerId;
      readonly amount: number;
      readonly at: TimePoint;
    }
  | {
      readonly type: "VictoryDeclared";
      readonly winner: Winner;
      readonly at: TimePoint;
    }
  | {
      readonly type: "PlayerEliminated";
      readonly victimId: PlayerId;
      readonly killerId: PlayerId | null;
      readonly at: TimePoint;
    }
  | {
      readonly type: "SpectatorModeEnabled";
      readonly playerId: PlayerId;
      readonly at: TimePoint;
    };

export type MatchEventType = MatchEvent["type"];

export type MatchEventOf<T extends MatchEventType> = Extract<MatchEvent, { readonly type: T }>;
