import type { PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidPlayerId } from "./playerIds.js";

export class JoinMatch extends Command {
  readonly type = "JoinMatch" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
    assertValidPlayerId(playerId);
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { match, logger } = ctx;

    const joined = await match.joinPlayer(this.playerId);
    if (!joined) {
      logger?.info?.("Join ignored; player already connected", {
        type: this.type,
        playerId: this.playerId,
        at: this.at,
      });
    }
  }
}
