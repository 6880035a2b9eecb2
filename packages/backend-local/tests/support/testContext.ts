import { vi } from "vitest";

import {
  createMatchConfig,
  effectiveZoneConfig,
  InMemoryPlayerWorld,
  InMemoryScheduler,
  MatchCoordinator,
  Roster,
  ZoneController,
  type BroadcastChannel,
  type CommandContext,
  type Logger,
  type MatchConfig,
  type MatchEvent,
} from "../../src/core.js";

export interface RecordedEvent {
  readonly channel: string;
  readonly event: MatchEvent;
}

/** Broadcast channel that records every published event in order. */
export class FakeBus implements BroadcastChannel {
  readonly events: RecordedEvent[] = [];

  async publish(channel: string, event: MatchEvent): Promise<void> {
    this.events.push({ channel, event });
  }
}

export function createLoggerMock(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } satisfies Logger;
}

export interface BackendTestContext {
  readonly scheduler: InMemoryScheduler;
  readonly bus: FakeBus;
  readonly world: InMemoryPlayerWorld;
  readonly coordinator: MatchCoordinator;
  readonly config: MatchConfig;
  readonly logger: Logger;
}

export interface TestContextOverrides {
  readonly config?: MatchConfig;
  readonly logger?: Logger;
}

export function createTestContext(overrides: TestContextOverrides = {}): BackendTestContext {
  const config =
    overrides.config ??
    createMatchConfig({
      match: { minPlayersToStart: 2, lobbyWaitMs: 5_000 },
      zone: { gracePeriodMs: 0 },
    });
  const logger = overrides.logger ?? createLoggerMock();
  const scheduler = new InMemoryScheduler();
  const bus = new FakeBus();
  const roster = new Roster();
  const world = new InMemoryPlayerWorld();

  const zone = new ZoneController({
    config: effectiveZoneConfig(config),
    scheduler,
    bus,
    roster,
    positions: world,
    damageSink: world,
    logger,
  });
  const coordinator = new MatchCoordinator({
    config,
    scheduler,
    bus,
    roster,
    zone,
    placement: world,
    logger,
  });

  return { scheduler, bus, world, coordinator, config, logger };
}

export function createCommandContextFactory(
  context: BackendTestContext,
): () => CommandContext {
  return (): CommandContext => ({
    match: context.coordinator,
    logger: context.logger,
  });
}
