import type { PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidPlayerId } from "./playerIds.js";

/**
 * Reports a death. Reports for players who already died or are no longer
 * connected, such as a late kill for someone who left, are ignored.
 */
export class EliminatePlayer extends Command {
  readonly type = "EliminatePlayer" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
    public readonly killerId?: PlayerId | undefined,
  ) {
    super();
    assertValidPlayerId(playerId);
    if (killerId !== undefined) {
      assertValidPlayerId(killerId, "Killer");
    }
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { match, logger } = ctx;

    if (!match.isConnected(this.playerId)) {
      logger?.debug?.("Elimination ignored; player not connected", {
        type: this.type,
        playerId: this.playerId,
        at: this.at,
      });
      return;
    }

    await match.eliminatePlayer(this.playerId, this.killerId);
  }
}
