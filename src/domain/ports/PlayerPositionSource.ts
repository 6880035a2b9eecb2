import type { PlayerId, Position } from "../typedefs.js";

export interface PlayerPositionSource {
  /** Current position of the player's active body, or undefined when they have none. */
  getPosition(playerId: PlayerId): Position | undefined;
}
