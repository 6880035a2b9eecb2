import type { Logger } from "../ports/Logger.js";
import type { MatchCoordinator } from "../services/MatchCoordinator.js";
import type { TimePoint } from "../typedefs.js";

/** The coordinator operations commands are allowed to drive. */
export type MatchInputs = Pick<
  MatchCoordinator,
  | "getPhase"
  | "isConnected"
  | "joinPlayer"
  | "leavePlayer"
  | "requestModeChange"
  | "eliminatePlayer"
>;

export interface CommandContext {
  readonly match: MatchInputs;
  readonly logger?: Logger | undefined;
}

export abstract class Command {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<void>;
}
