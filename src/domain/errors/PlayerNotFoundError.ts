import type { PlayerId } from "../typedefs.js";

export class PlayerNotFoundError extends Error {
  constructor(public readonly playerId: PlayerId) {
    super(`Player not found: ${playerId}`);
    this.name = "PlayerNotFoundError";
  }
}
