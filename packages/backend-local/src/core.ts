export type {
  Command,
  CommandContext,
  MatchInputs,
} from "../../../src/domain/commands/Command.js";
export { dispatchCommand } from "../../../src/domain/commands/dispatchCommand.js";
export { EliminatePlayer } from "../../../src/domain/commands/EliminatePlayer.js";
export { JoinMatch } from "../../../src/domain/commands/JoinMatch.js";
export { LeaveMatch } from "../../../src/domain/commands/LeaveMatch.js";
export { SelectMode } from "../../../src/domain/commands/SelectMode.js";
export { Roster } from "../../../src/domain/entities/Roster.js";
export { MatchCommandInputError } from "../../../src/domain/errors/MatchCommandInputError.js";
export { MatchConfigError } from "../../../src/domain/errors/MatchConfigError.js";
export { PlayerNotFoundError } from "../../../src/domain/errors/PlayerNotFoundError.js";
export { MATCH_CHANNEL, playerChannel } from "../../../src/domain/events.js";
export type { MatchEvent } from "../../../src/domain/events.js";
export type {
  MatchConfig,
  MatchConfigOverrides,
  MatchTimings,
} from "../../../src/domain/MatchConfig.js";
export {
  createMatchConfig,
  effectiveZoneConfig,
} from "../../../src/domain/MatchConfig.js";
export type { BroadcastChannel } from "../../../src/domain/ports/BroadcastChannel.js";
export type { Logger } from "../../../src/domain/ports/Logger.js";
export type {
  ScheduledTask,
  Scheduler,
  TimerHandle,
} from "../../../src/domain/ports/Scheduler.js";
export { startTicker, type Ticker } from "../../../src/domain/scheduling/Ticker.js";
export {
  MatchCoordinator,
  type MatchSnapshot,
} from "../../../src/domain/services/MatchCoordinator.js";
export {
  ZoneController,
  type ZoneState,
} from "../../../src/domain/services/ZoneController.js";
export type {
  ModeId,
  PlayerId,
  Position,
  TimePoint,
} from "../../../src/domain/typedefs.js";
export { InMemoryScheduler } from "../../../src/adapters/in-memory/InMemoryScheduler.js";
export { InMemoryMap } from "../../../src/adapters/in-memory/InMemoryMap.js";
export { InMemoryPlayerWorld } from "../../../src/adapters/in-memory/InMemoryPlayerWorld.js";
