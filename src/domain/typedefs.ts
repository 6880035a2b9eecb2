/**
 * Core domain typedefs used throughout the match core.
 * These are simple aliases for now; they can later evolve into
 * branded types for stronger compile-time safety.
 */

/** Unique identifier of a connected player */
export type PlayerId = string;

/** Key of a team: the player's own id in solo, `team_<n>` in grouped modes */
export type TeamKey = string;

/** Key of a configured game mode (e.g. "solo", "duos", "trios") */
export type ModeId = string;

/** Time point in milliseconds, as reported by the active {@link Scheduler} */
export type TimePoint = number;

/** Match lifecycle phase; the cycle order lives in entities/MatchPhases */
export type MatchPhase =
  | "Lobby"
  | "Starting"
  | "Dropping"
  | "Match"
  | "Ending"
  | "Cleanup";

/** World-space position. The ground plane is x/z; y is height. */
export interface Position {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}
