import type { PlayerId, Position } from "../typedefs.js";

/** Moves a player's body, used for drops and the return to the lobby. */
export interface PlayerPlacement {
  placePlayer(playerId: PlayerId, position: Position): void;
}
