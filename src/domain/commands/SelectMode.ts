import { MatchCommandInputError } from "../errors/MatchCommandInputError.js";
import type { ModeId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

export class SelectMode extends Command {
  readonly type = "SelectMode" as const;

  constructor(
    public readonly mode: ModeId,
    public readonly at: TimePoint,
  ) {
    super();

    if (typeof mode !== "string" || mode.trim().length === 0) {
      throw MatchCommandInputError.because(["Mode must be a non-empty string"]);
    }
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { match } = ctx;

    if (!match.requestModeChange(this.mode)) {
      throw MatchCommandInputError.because([
        `Mode "${this.mode}" cannot be selected during ${match.getPhase()}`,
      ]);
    }
  }
}
