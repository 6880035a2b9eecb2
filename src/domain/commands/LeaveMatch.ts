import { PlayerNotFoundError } from "../errors/PlayerNotFoundError.js";
import type { PlayerId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { assertValidPlayerId } from "./playerIds.js";

export class LeaveMatch extends Command {
  readonly type = "LeaveMatch" as const;

  constructor(
    public readonly playerId: PlayerId,
    public readonly at: TimePoint,
  ) {
    super();
    assertValidPlayerId(playerId);
  }

  async execute(ctx: CommandContext): Promise<void> {
    const left = await ctx.match.leavePlayer(this.playerId);
    if (!left) {
      throw new PlayerNotFoundError(this.playerId);
    }
  }
}
