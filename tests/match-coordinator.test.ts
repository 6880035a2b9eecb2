import { describe, expect, it, vi } from "vitest";

import {
  createCreatureSpawnerMock,
  createLoggerMock,
  createLootControllerMock,
  createPlayerPlacementMock,
  RecordingChannel,
} from "./support/mocks.js";
import { InMemoryMap } from "../src/adapters/in-memory/InMemoryMap.js";
import { InMemoryPlayerWorld } from "../src/adapters/in-memory/InMemoryPlayerWorld.js";
import { InMemoryScheduler } from "../src/adapters/in-memory/InMemoryScheduler.js";
import type { MatchEvent } from "../src/domain/events.js";
import { createMatchConfig, type MatchConfigOverrides } from "../src/domain/MatchConfig.js";
import type { BroadcastChannel } from "../src/domain/ports/BroadcastChannel.js";
import {
  MatchCoordinator,
  type MatchCoordinatorOptions,
} from "../src/domain/services/MatchCoordinator.js";
import type { ZoneControl, ZoneState } from "../src/domain/services/ZoneController.js";

type Collaborators = Partial<Omit<MatchCoordinatorOptions, "config" | "scheduler">>;

/** Lobby opens immediately and every hold is short, so a full cycle fits in a few seconds. */
const QUICK_MATCH: MatchConfigOverrides = {
  match: {
    minPlayersToStart: 1,
    lobbyWaitMs: 0,
    countdownSeconds: 0,
    dropSettleMs: 0,
    resultsDisplayMs: 1_000,
    intermissionMs: 1_000,
  },
  zoneEnabled: false,
  creaturesEnabled: false,
};

function setup(overrides: MatchConfigOverrides = {}, collaborators: Collaborators = {}) {
  const scheduler = new InMemoryScheduler();
  const channel = new RecordingChannel();
  const logger = createLoggerMock();
  const coordinator = new MatchCoordinator({
    config: createMatchConfig(overrides),
    scheduler,
    bus: channel,
    logger,
    ...collaborators,
  });
  return { scheduler, channel, logger, coordinator };
}

function createZoneMock() {
  const state: ZoneState = {
    active: false,
    phase: 0,
    currentRadius: 500,
    targetRadius: 500,
    currentCenter: { x: 0, y: 0, z: 0 },
    targetCenter: { x: 0, y: 0, z: 0 },
    damage: 0,
    inGracePeriod: false,
    graceSecondsRemaining: 0,
  };
  return {
    start: vi.fn<ZoneControl["start"]>().mockResolvedValue(undefined),
    stop: vi.fn<ZoneControl["stop"]>(),
    reset: vi.fn<ZoneControl["reset"]>(),
    getState: vi.fn<ZoneControl["getState"]>().mockReturnValue(state),
  } satisfies ZoneControl;
}

function phaseChanges(channel: RecordingChannel): Array<[string, string, number]> {
  return channel
    .ofType("PhaseChanged")
    .map((event): [string, string, number] => [event.previous, event.phase, event.at]);
}

/** Brings a quick match with the given players into the Match phase (entered at t=200). */
async function enterQuickMatch(
  players: readonly string[],
  overrides: MatchConfigOverrides = {},
  collaborators: Collaborators = {},
) {
  const context = setup({ ...QUICK_MATCH, ...overrides }, collaborators);
  for (const playerId of players) {
    await context.coordinator.joinPlayer(playerId);
  }
  context.coordinator.start();
  await context.scheduler.runFor(200);
  expect(context.coordinator.getPhase()).toBe("Match");
  return context;
}

describe("MatchCoordinator", () => {
  describe("lobby", () => {
    const lobbyRules: MatchConfigOverrides = {
      match: { minPlayersToStart: 2, lobbyWaitMs: 5_000 },
    };

    it("waits with a full timer while below the threshold", async () => {
      const { scheduler, channel, coordinator } = setup(lobbyRules);
      await coordinator.joinPlayer("ann");
      coordinator.start();

      await scheduler.runFor(10_000);

      expect(coordinator.getPhase()).toBe("Lobby");
      expect(channel.ofType("LobbyStatus").at(-1)).toEqual({
        type: "LobbyStatus",
        currentPlayers: 1,
        requiredPlayers: 2,
        timeRemaining: 5,
        canStart: false,
        at: 10_000,
      });
    });

    it("counts down once the threshold is met and starts when the timer expires", async () => {
      const { scheduler, channel, coordinator } = setup(lobbyRules);
      await coordinator.joinPlayer("ann");
      await coordinator.joinPlayer("bo");
      coordinator.start();

      await scheduler.runFor(2_500);
      expect(channel.ofType("LobbyStatus").at(-1)).toMatchObject({
        timeRemaining: 3,
        canStart: true,
        at: 2_500,
      });

      await scheduler.runFor(2_400);
      expect(coordinator.getPhase()).toBe("Lobby");

      await scheduler.runFor(100);
      expect(coordinator.getPhase()).toBe("Starting");
      expect(channel.ofType("LobbyStatus").at(-1)).toEqual({
        type: "LobbyStatus",
        currentPlayers: 2,
        requiredPlayers: 2,
        timeRemaining: 0,
        canStart: true,
        at: 5_000,
      });
      expect(phaseChanges(channel)).toEqual([["Lobby", "Starting", 5_000]]);
    });

    it("resets the timer to its full value when the count drops below the threshold", async () => {
      const { scheduler, channel, coordinator } = setup(lobbyRules);
      await coordinator.joinPlayer("ann");
      await coordinator.joinPlayer("bo");
      coordinator.start();

      await scheduler.runFor(2_000);
      await coordinator.leavePlayer("bo");
      await scheduler.runFor(100);

      expect(channel.ofType("LobbyStatus").at(-1)).toEqual({
        type: "LobbyStatus",
        currentPlayers: 1,
        requiredPlayers: 2,
        timeRemaining: 5,
        canStart: false,
        at: 2_100,
      });

      await coordinator.joinPlayer("bo");
      await scheduler.runFor(5_000);
      expect(coordinator.getPhase()).toBe("Lobby");

      await scheduler.runFor(100);
      expect(coordinator.getPhase()).toBe("Starting");
      expect(phaseChanges(channel)).toEqual([["Lobby", "Starting", 7_200]]);
    });

    it("reports a lobby snapshot", async () => {
      const { coordinator } = setup();
      await coordinator.joinPlayer("ann");

      expect(coordinator.getSnapshot()).toEqual({
        phase: "Lobby",
        mode: "solo",
        practice: false,
        connectedPlayers: ["ann"],
        alive: { players: 0, teams: 0 },
        matchStartedAt: null,
      });
    });
  });

  describe("full cycle", () => {
    it("walks every phase in order and returns to the lobby", async () => {
      const zone = createZoneMock();
      const creatures = createCreatureSpawnerMock();
      const loot = createLootControllerMock();
      const placement = createPlayerPlacementMock();
      const { scheduler, channel, coordinator } = setup(
        {
          match: {
            minPlayersToStart: 1,
            lobbyWaitMs: 0,
            countdownSeconds: 3,
            dropSettleMs: 1_000,
            matchMaxDurationMs: 5_000,
            resultsDisplayMs: 2_000,
            intermissionMs: 1_000,
          },
        },
        { zone, creatures, loot, placement },
      );

      await coordinator.joinPlayer("ann");
      await coordinator.joinPlayer("bo");
      coordinator.start();

      await scheduler.runFor(4_300);
      expect(coordinator.getPhase()).toBe("Match");
      expect(coordinator.getTeams()).toEqual(
        new Map([
          ["ann", ["ann"]],
          ["bo", ["bo"]],
        ]),
      );
      expect(coordinator.getAliveCounts()).toEqual({ players: 2, teams: 2 });
      expect(coordinator.getSnapshot().matchStartedAt).toBe(4_200);

      await coordinator.eliminatePlayer("bo", "ann");
      await scheduler.runFor(3_300);

      expect(phaseChanges(channel)).toEqual([
        ["Lobby", "Starting", 0],
        ["Starting", "Dropping", 3_100],
        ["Dropping", "Match", 4_200],
        ["Match", "Ending", 4_400],
        ["Ending", "Cleanup", 6_500],
        ["Cleanup", "Lobby", 7_600],
      ]);
      expect(channel.ofType("Countdown").map((event) => [event.secondsRemaining, event.at])).toEqual([
        [3, 100],
        [2, 1_100],
        [1, 2_100],
      ]);
      expect(channel.ofType("AliveCountUpdate")).toEqual([
        { type: "AliveCountUpdate", players: 2, teams: 2, at: 4_300 },
      ]);
      expect(channel.ofType("PlayerEliminated")).toEqual([
        { type: "PlayerEliminated", victimId: "bo", killerId: "ann", at: 4_300 },
      ]);
      expect(channel.ofType("VictoryDeclared")).toEqual([
        { type: "VictoryDeclared", winner: { kind: "player", playerId: "ann" }, at: 4_400 },
      ]);

      expect(zone.start).toHaveBeenCalledTimes(1);
      expect(zone.stop).toHaveBeenCalledTimes(1);
      expect(zone.reset).toHaveBeenCalledTimes(1);
      expect(creatures.startSpawning).toHaveBeenCalledTimes(1);
      expect(creatures.stopSpawning).toHaveBeenCalledTimes(1);
      expect(creatures.despawnAll).toHaveBeenCalledTimes(1);
      expect(loot.spawnAllLoot).toHaveBeenCalledTimes(1);
      expect(loot.resetLoot).toHaveBeenCalledTimes(1);

      expect(coordinator.getTeams().size).toBe(0);
      expect(coordinator.getAliveCounts()).toEqual({ players: 0, teams: 0 });
      expect(coordinator.getSnapshot().matchStartedAt).toBeNull();
      expect(placement.placePlayer).toHaveBeenCalledWith("ann", { x: 0, y: 10, z: 0 });
      expect(placement.placePlayer).toHaveBeenCalledWith("bo", { x: 0, y: 10, z: 0 });
    });

    it("ends with no winner once the maximum duration elapses", async () => {
      const { scheduler, channel, logger, coordinator } = await enterQuickMatch(["ann", "bo"], {
        match: { ...QUICK_MATCH.match, matchMaxDurationMs: 600_000 },
      });

      await scheduler.runFor(599_900);
      expect(coordinator.getPhase()).toBe("Match");

      await scheduler.runFor(100);
      expect(coordinator.getPhase()).toBe("Ending");
      expect(phaseChanges(channel).at(-1)).toEqual(["Match", "Ending", 600_200]);
      expect(channel.ofType("VictoryDeclared")).toEqual([]);
      expect(logger.info).toHaveBeenCalledWith(
        "Match timed out without a winner",
        expect.objectContaining({ elapsedMs: 600_000 }),
      );
    });

    it("drops players on provided spawn points, lifted to the drop height", async () => {
      const world = new InMemoryPlayerWorld();
      const map = new InMemoryMap({
        spawnPoints: [
          { x: 1, y: 0, z: 1 },
          { x: 2, y: 0, z: 2 },
        ],
        lobbySpawn: { x: 5, y: 20, z: 5 },
      });
      const { scheduler, coordinator } = await enterQuickMatch(["ann", "bo", "cy"], {}, {
        spawnPoints: map,
        placement: world,
      });

      expect(world.getPosition("ann")).toEqual({ x: 1, y: 500, z: 1 });
      expect(world.getPosition("bo")).toEqual({ x: 2, y: 500, z: 2 });
      expect(world.getPosition("cy")).toEqual({ x: 1, y: 500, z: 1 });

      await coordinator.eliminatePlayer("bo");
      await coordinator.eliminatePlayer("cy");
      await scheduler.runFor(1_300);

      expect(coordinator.getPhase()).toBe("Cleanup");
      expect(world.getPosition("ann")).toEqual({ x: 5, y: 20, z: 5 });
    });

    it("falls back to a ring around the map center without spawn points", async () => {
      const placement = createPlayerPlacementMock();
      const { logger } = await enterQuickMatch(["ann"], {}, { placement });

      const radius = 2048 * 0.15;
      const [call] = placement.placePlayer.mock.calls;
      expect(call?.[0]).toBe("ann");
      expect(call?.[1].x).toBeCloseTo(Math.cos(Math.PI / 10) * radius);
      expect(call?.[1].z).toBeCloseTo(Math.sin(Math.PI / 10) * radius);
      expect(call?.[1].y).toBe(500);
      expect(logger.warn).toHaveBeenCalledWith(
        "Spawn point provider unavailable; using fallback ring",
      );
    });
  });

  describe("eliminatePlayer", () => {
    it("is idempotent", async () => {
      const { channel, coordinator } = await enterQuickMatch(["ann", "bo", "cy"]);

      await coordinator.eliminatePlayer("bo");
      await coordinator.eliminatePlayer("bo");

      expect(channel.ofType("PlayerEliminated")).toEqual([
        { type: "PlayerEliminated", victimId: "bo", killerId: null, at: 200 },
      ]);
      expect(coordinator.isAlive("bo")).toBe(false);
      expect(coordinator.getAliveCounts()).toEqual({ players: 2, teams: 2 });
    });

    it("ignores players that are not in the match", async () => {
      const { channel, coordinator } = await enterQuickMatch(["ann", "bo"]);

      await coordinator.eliminatePlayer("ghost");

      expect(channel.ofType("PlayerEliminated")).toEqual([]);
    });

    it("logs a team elimination and declares the surviving team", async () => {
      const { scheduler, channel, logger, coordinator } = await enterQuickMatch(
        ["a", "b", "c", "d"],
        { defaultMode: "duos" },
      );

      await coordinator.eliminatePlayer("c");
      expect(logger.info).not.toHaveBeenCalledWith("Team eliminated", expect.anything());

      await coordinator.eliminatePlayer("d");
      expect(logger.info).toHaveBeenCalledWith("Team eliminated", { teamKey: "team_2" });

      await scheduler.runFor(100);
      expect(channel.ofType("VictoryDeclared")).toEqual([
        {
          type: "VictoryDeclared",
          winner: { kind: "team", teamKey: "team_1", members: ["a", "b"] },
          at: 300,
        },
      ]);
      expect(coordinator.getPhase()).toBe("Ending");
    });
  });

  describe("requestModeChange", () => {
    it("accepts a known mode in the lobby", () => {
      const { coordinator } = setup();

      expect(coordinator.requestModeChange("duos")).toBe(true);
      expect(coordinator.getMode()).toBe("duos");
    });

    it("rejects unknown modes", () => {
      const { coordinator } = setup();

      expect(coordinator.requestModeChange("squads")).toBe(false);
      expect(coordinator.requestModeChange("hasOwnProperty")).toBe(false);
      expect(coordinator.getMode()).toBe("solo");
    });

    it("rejects changes outside the lobby", async () => {
      const { coordinator } = await enterQuickMatch(["ann", "bo"]);

      expect(coordinator.requestModeChange("trios")).toBe(false);
      expect(coordinator.getMode()).toBe("solo");
    });
  });

  describe("players", () => {
    it("sends a late joiner to spectator mode without entering the match", async () => {
      const { channel, coordinator } = await enterQuickMatch(["ann", "bo"]);

      expect(await coordinator.joinPlayer("late")).toBe(true);

      expect(channel.on("player:late")).toEqual([
        { type: "SpectatorModeEnabled", playerId: "late", at: 200 },
      ]);
      expect(coordinator.isAlive("late")).toBe(false);
      expect(coordinator.getAliveCounts()).toEqual({ players: 2, teams: 2 });
    });

    it("ignores a duplicate join", async () => {
      const { coordinator } = setup();

      expect(await coordinator.joinPlayer("ann")).toBe(true);
      expect(await coordinator.joinPlayer("ann")).toBe(false);
      expect(coordinator.getSnapshot().connectedPlayers).toEqual(["ann"]);
    });

    it("eliminates a living player who leaves", async () => {
      const { channel, coordinator } = await enterQuickMatch(["ann", "bo", "cy"]);

      expect(await coordinator.leavePlayer("bo")).toBe(true);
      expect(await coordinator.leavePlayer("bo")).toBe(false);

      expect(channel.ofType("PlayerEliminated")).toEqual([
        { type: "PlayerEliminated", victimId: "bo", killerId: null, at: 200 },
      ]);
      expect(coordinator.isConnected("bo")).toBe(false);
    });
  });

  describe("collaborators", () => {
    it("logs a failing collaborator and keeps progressing", async () => {
      const loot = createLootControllerMock();
      const failure = new Error("loot table missing");
      loot.spawnAllLoot.mockImplementation(() => {
        throw failure;
      });

      const { logger } = await enterQuickMatch(["ann", "bo"], {}, { loot });

      expect(logger.error).toHaveBeenCalledWith("Loot controller failed; continuing", {
        phase: "Dropping",
        error: failure,
      });
    });

    it("keeps progressing when broadcasting fails", async () => {
      const failure = new Error("socket closed");
      const bus: BroadcastChannel = {
        publish: async (_channel: string, _event: MatchEvent) => {
          throw failure;
        },
      };
      const { logger } = await enterQuickMatch(["ann"], {}, { bus });

      expect(logger.warn).toHaveBeenCalledWith("Failed to broadcast event", {
        channel: "match",
        type: "LobbyStatus",
        error: failure,
      });
    });

    it("continues when the zone fails to start", async () => {
      const zone = createZoneMock();
      const failure = new Error("no terrain");
      zone.start.mockRejectedValue(failure);

      const { scheduler, logger, coordinator } = await enterQuickMatch(
        ["ann", "bo"],
        { zoneEnabled: true },
        { zone },
      );
      await scheduler.runFor(100);

      expect(logger.error).toHaveBeenCalledWith("Zone controller failed to start; continuing", {
        error: failure,
      });
      expect(coordinator.getPhase()).toBe("Match");
      expect(coordinator.getZoneState()).toMatchObject({ currentRadius: 500 });
    });

    it("skips the zone and creatures when they are disabled", async () => {
      const zone = createZoneMock();
      const creatures = createCreatureSpawnerMock();

      const { scheduler } = await enterQuickMatch(["ann", "bo"], {}, { zone, creatures });
      await scheduler.runFor(100);

      expect(zone.start).not.toHaveBeenCalled();
      expect(creatures.startSpawning).not.toHaveBeenCalled();
    });
  });

  describe("practice profile", () => {
    it("starts with one player after the short delay and never declares a winner", async () => {
      const { scheduler, channel, coordinator } = setup({
        ...QUICK_MATCH,
        match: { countdownSeconds: 0, dropSettleMs: 0 },
        practice: { enabled: true },
      });
      await coordinator.joinPlayer("solo-runner");
      coordinator.start();

      await scheduler.runFor(0);
      expect(channel.ofType("LobbyStatus")).toEqual([
        {
          type: "LobbyStatus",
          currentPlayers: 1,
          requiredPlayers: 1,
          timeRemaining: 3,
          canStart: true,
          at: 0,
        },
      ]);

      await scheduler.runFor(5_000);
      expect(phaseChanges(channel)).toEqual([
        ["Lobby", "Starting", 3_000],
        ["Starting", "Dropping", 3_100],
        ["Dropping", "Match", 3_200],
      ]);
      expect(coordinator.getPhase()).toBe("Match");
      expect(channel.ofType("VictoryDeclared")).toEqual([]);
      expect(coordinator.getSnapshot().practice).toBe(true);
    });
  });

  it("warns when started twice", async () => {
    const { logger, coordinator } = setup();

    coordinator.start();
    coordinator.start();

    expect(logger.warn).toHaveBeenCalledWith("Match driver already running");
  });
});
