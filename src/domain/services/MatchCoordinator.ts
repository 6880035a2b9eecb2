/* eslint-disable functional/immutable-data */
import { MatchConfigError } from "../errors/MatchConfigError.js";
import { nextPhase } from "../entities/MatchPhases.js";
import { Roster } from "../entities/Roster.js";
import { EMPTY_TEAMS, formTeams, type TeamSet } from "../entities/TeamRegistry.js";
import {
  countAlive,
  evaluateVictory,
  isTeamEliminated,
  type AliveCounts,
} from "../entities/VictoryEvaluator.js";
import { ringPositions } from "../entities/ZoneGeometry.js";
import { MATCH_CHANNEL, playerChannel, type MatchEvent } from "../events.js";
import {
  isKnownMode,
  lobbyRules,
  type MatchConfig,
  type ModeConfig,
} from "../MatchConfig.js";
import type { BroadcastChannel } from "../ports/BroadcastChannel.js";
import type { CreatureSpawner } from "../ports/CreatureSpawner.js";
import type { Logger } from "../ports/Logger.js";
import type { LootController } from "../ports/LootController.js";
import type { PlayerPlacement } from "../ports/PlayerPlacement.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { SpawnPointProvider } from "../ports/SpawnPointProvider.js";
import { startTicker, type Ticker } from "../scheduling/Ticker.js";
import type {
  MatchPhase,
  ModeId,
  PlayerId,
  Position,
  TimePoint,
} from "../typedefs.js";
import type { ZoneControl, ZoneState } from "./ZoneController.js";

const SECOND_MS = 1_000;
const FALLBACK_MAP_SIZE = 2048;
const FALLBACK_DROP_COUNT = 20;
const FALLBACK_DROP_SPREAD = 0.15;
const ORIGIN: Position = { x: 0, y: 0, z: 0 };

export interface MatchCoordinatorOptions {
  readonly config: MatchConfig;
  readonly scheduler: Scheduler;
  readonly bus: BroadcastChannel;
  readonly roster?: Roster | undefined;
  readonly zone?: ZoneControl | undefined;
  readonly spawnPoints?: SpawnPointProvider | undefined;
  readonly creatures?: CreatureSpawner | undefined;
  readonly loot?: LootController | undefined;
  readonly placement?: PlayerPlacement | undefined;
  readonly logger?: Logger | undefined;
}

export interface MatchSnapshot {
  readonly phase: MatchPhase;
  readonly mode: ModeId;
  readonly practice: boolean;
  readonly connectedPlayers: readonly PlayerId[];
  readonly alive: AliveCounts;
  readonly matchStartedAt: TimePoint | null;
}

/** Phase-local bookkeeping; absent until the phase's entry action has run. */
type PhaseProgress =
  | { readonly phase: "Lobby"; remainingMs: number; quorum: boolean; lastTickAt: TimePoint }
  | { readonly phase: "Starting"; nextCount: number; nextCountAt: TimePoint }
  | { readonly phase: "Dropping"; readonly settledAt: TimePoint }
  | { readonly phase: "Match" }
  | { readonly phase: "Ending"; readonly until: TimePoint }
  | { readonly phase: "Cleanup"; readonly until: TimePoint };

/**
 * Authoritative match lifecycle. A driver ticker runs exactly one phase handler
 * per tick; handlers do bounded work and never wait inside a tick, so joins,
 * mode changes and eliminations are observed on the next tick.
 */
export class MatchCoordinator {
  readonly #config: MatchConfig;
  readonly #scheduler: Scheduler;
  readonly #bus: BroadcastChannel;
  readonly #roster: Roster;
  readonly #zone: ZoneControl | undefined;
  readonly #spawnPoints: SpawnPointProvider | undefined;
  readonly #creatures: CreatureSpawner | undefined;
  readonly #loot: LootController | undefined;
  readonly #placement: PlayerPlacement | undefined;
  readonly #logger: Logger | undefined;

  #phase: MatchPhase = "Lobby";
  #progress: PhaseProgress | undefined;
  #mode: ModeId;
  #teams: TeamSet = EMPTY_TEAMS;
  #matchStartedAt: TimePoint | undefined;
  #driver: Ticker | undefined;

  constructor(options: MatchCoordinatorOptions) {
    this.#config = options.config;
    this.#scheduler = options.scheduler;
    this.#bus = options.bus;
    this.#roster = options.roster ?? new Roster();
    this.#zone = options.zone;
    this.#spawnPoints = options.spawnPoints;
    this.#creatures = options.creatures;
    this.#loot = options.loot;
    this.#placement = options.placement;
    this.#logger = options.logger;
    this.#mode = options.config.defaultMode;
  }

  /** Starts the driver loop. The coordinator then runs for the life of the process. */
  start(): void {
    if (this.#driver?.running) {
      this.#logger?.warn?.("Match driver already running");
      return;
    }

    this.#driver = startTicker(
      this.#scheduler,
      {
        name: "match-driver",
        intervalMs: this.#config.match.driverTickMs,
        initialDelayMs: 0,
        logger: this.#logger,
      },
      (now) => this.#tick(now),
    );
    this.#logger?.info?.("Match driver started", {
      phase: this.#phase,
      mode: this.#mode,
      practice: this.#config.practice.enabled,
    });
  }

  // ---------------------------------------------------------------------------
  //  Queries
  // ---------------------------------------------------------------------------

  getPhase(): MatchPhase {
    return this.#phase;
  }

  getMode(): ModeId {
    return this.#mode;
  }

  getZoneState(): ZoneState | undefined {
    return this.#zone?.getState();
  }

  getTeams(): TeamSet {
    return this.#teams;
  }

  getAliveCounts(): AliveCounts {
    return countAlive(this.#teams, this.#roster.aliveMap());
  }

  getSnapshot(): MatchSnapshot {
    return {
      phase: this.#phase,
      mode: this.#mode,
      practice: this.#config.practice.enabled,
      connectedPlayers: this.#roster.connectedPlayers(),
      alive: this.getAliveCounts(),
      matchStartedAt: this.#matchStartedAt ?? null,
    };
  }

  isConnected(playerId: PlayerId): boolean {
    return this.#roster.has(playerId);
  }

  isAlive(playerId: PlayerId): boolean {
    return this.#roster.isAlive(playerId);
  }

  // ---------------------------------------------------------------------------
  //  Inputs
  // ---------------------------------------------------------------------------

  requestModeChange(mode: ModeId): boolean {
    if (this.#phase !== "Lobby") {
      this.#logger?.info?.("Mode change rejected outside the lobby", {
        mode,
        phase: this.#phase,
      });
      return false;
    }

    if (!isKnownMode(this.#config, mode)) {
      this.#logger?.warn?.("Mode change rejected; unknown mode", { mode });
      return false;
    }

    this.#mode = mode;
    this.#logger?.info?.("Game mode changed", { mode });
    return true;
  }

  async joinPlayer(playerId: PlayerId): Promise<boolean> {
    const now = this.#scheduler.now();
    if (!this.#roster.join(playerId, now)) {
      this.#logger?.info?.("Join ignored; player already connected", { playerId });
      return false;
    }

    this.#logger?.info?.("Player joined", { playerId, phase: this.#phase });

    if (this.#phase === "Match") {
      this.#logger?.info?.("Player joined mid-match; enabling spectator mode", { playerId });
      await this.#broadcast(playerChannel(playerId), {
        type: "SpectatorModeEnabled",
        playerId,
        at: now,
      });
    }
    return true;
  }

  async leavePlayer(playerId: PlayerId): Promise<boolean> {
    if (!this.#roster.has(playerId)) {
      return false;
    }

    if (this.#roster.isAlive(playerId)) {
      await this.eliminatePlayer(playerId);
    }
    this.#roster.leave(playerId);
    this.#logger?.info?.("Player left", { playerId, phase: this.#phase });
    return true;
  }

  async eliminatePlayer(playerId: PlayerId, killerId?: PlayerId): Promise<void> {
    if (!this.#roster.markEliminated(playerId)) {
      this.#logger?.debug?.("Elimination ignored; player not alive", { playerId });
      return;
    }

    this.#logger?.info?.("Player eliminated", { playerId, killerId });

    await this.#broadcast(MATCH_CHANNEL, {
      type: "PlayerEliminated",
      victimId: playerId,
      killerId: killerId ?? null,
      at: this.#scheduler.now(),
    });

    if (this.#currentModeConfig().teamSize > 1) {
      const teamKey = isTeamEliminated(this.#teams, this.#roster.aliveMap(), playerId);
      if (teamKey !== undefined) {
        this.#logger?.info?.("Team eliminated", { teamKey });
      }
    }
  }

  // ---------------------------------------------------------------------------
  //  Driver
  // ---------------------------------------------------------------------------

  async #tick(now: TimePoint): Promise<void> {
    switch (this.#phase) {
      case "Lobby":
        return this.#lobby(now);
      case "Starting":
        return this.#starting(now);
      case "Dropping":
        return this.#dropping(now);
      case "Match":
        return this.#match(now);
      case "Ending":
        return this.#ending(now);
      case "Cleanup":
        return this.#cleanup(now);
    }
  }

  async #lobby(now: TimePoint): Promise<void> {
    const rules = lobbyRules(this.#config);
    let progress = this.#progress;
    if (progress?.phase !== "Lobby") {
      progress = { phase: "Lobby", remainingMs: rules.waitMs, quorum: false, lastTickAt: now };
      this.#progress = progress;
      this.#logger?.info?.("Lobby open; waiting for players", {
        required: rules.minPlayersToStart,
      });
    }

    const currentPlayers = this.#roster.size;
    const canStart = currentPlayers >= rules.minPlayersToStart;

    if (!canStart) {
      progress.remainingMs = rules.waitMs;
    } else if (progress.quorum) {
      progress.remainingMs -= now - progress.lastTickAt;
    } else {
      progress.remainingMs = rules.waitMs;
    }
    progress.quorum = canStart;
    progress.lastTickAt = now;

    await this.#broadcast(MATCH_CHANNEL, {
      type: "LobbyStatus",
      currentPlayers,
      requiredPlayers: rules.minPlayersToStart,
      timeRemaining: Math.ceil(Math.max(0, progress.remainingMs) / SECOND_MS),
      canStart,
      at: now,
    });

    if (canStart && progress.remainingMs <= 0) {
      await this.#advance(now);
    }
  }

  async #starting(now: TimePoint): Promise<void> {
    let progress = this.#progress;
    if (progress?.phase !== "Starting") {
      const mode = this.#currentModeConfig();
      this.#teams = formTeams(mode, this.#roster.connectedPlayers());
      this.#logger?.info?.("Teams formed", { mode: this.#mode, teams: this.#teams.size });
      progress = {
        phase: "Starting",
        nextCount: this.#config.match.countdownSeconds,
        nextCountAt: now,
      };
      this.#progress = progress;
    }

    if (now < progress.nextCountAt) {
      return;
    }

    if (progress.nextCount > 0) {
      const secondsRemaining = progress.nextCount;
      progress.nextCount -= 1;
      progress.nextCountAt += SECOND_MS;
      await this.#broadcast(MATCH_CHANNEL, { type: "Countdown", secondsRemaining, at: now });
      return;
    }

    this.#roster.markAllAlive();
    await this.#advance(now);
  }

  async #dropping(now: TimePoint): Promise<void> {
    let progress = this.#progress;
    if (progress?.phase !== "Dropping") {
      this.#useCollaborator("Loot controller", this.#loot, (loot) => loot.spawnAllLoot());
      this.#dropPlayers();
      progress = { phase: "Dropping", settledAt: now + this.#config.match.dropSettleMs };
      this.#progress = progress;
    }

    if (now >= progress.settledAt) {
      this.#matchStartedAt = now;
      await this.#advance(now);
    }
  }

  async #match(now: TimePoint): Promise<void> {
    if (this.#progress?.phase !== "Match") {
      this.#progress = { phase: "Match" };
      this.#logger?.info?.("Match started", {
        mode: this.#mode,
        players: this.#roster.livingPlayers().length,
      });
      await this.#startZone();
      if (this.#config.creaturesEnabled) {
        this.#useCollaborator("Creature spawner", this.#creatures, (creatures) =>
          creatures.startSpawning(),
        );
      }
    }

    const alive = this.#roster.aliveMap();
    const counts = countAlive(this.#teams, alive);

    if (!this.#config.practice.enabled) {
      const winner = evaluateVictory(this.#currentModeConfig(), counts, this.#teams, alive);
      if (winner) {
        this.#logger?.info?.("Victory declared", { winner });
        await this.#broadcast(MATCH_CHANNEL, { type: "VictoryDeclared", winner, at: now });
        await this.#advance(now);
        return;
      }
    }

    const startedAt = this.#matchStartedAt ?? now;
    if (now - startedAt >= this.#config.match.matchMaxDurationMs) {
      this.#logger?.info?.("Match timed out without a winner", {
        elapsedMs: now - startedAt,
        alive: counts,
      });
      await this.#advance(now);
      return;
    }

    await this.#broadcast(MATCH_CHANNEL, {
      type: "AliveCountUpdate",
      players: counts.players,
      teams: counts.teams,
      at: now,
    });
  }

  async #ending(now: TimePoint): Promise<void> {
    let progress = this.#progress;
    if (progress?.phase !== "Ending") {
      this.#logger?.info?.("Match ending");
      this.#useCollaborator("Zone controller", this.#zone, (zone) => zone.stop());
      this.#useCollaborator("Creature spawner", this.#creatures, (creatures) =>
        creatures.stopSpawning(),
      );
      progress = { phase: "Ending", until: now + this.#config.match.resultsDisplayMs };
      this.#progress = progress;
    }

    if (now >= progress.until) {
      await this.#advance(now);
    }
  }

  async #cleanup(now: TimePoint): Promise<void> {
    let progress = this.#progress;
    if (progress?.phase !== "Cleanup") {
      this.#logger?.info?.("Cleaning up match");
      this.#useCollaborator("Creature spawner", this.#creatures, (creatures) =>
        creatures.despawnAll(),
      );
      this.#useCollaborator("Loot controller", this.#loot, (loot) => loot.resetLoot());
      this.#returnPlayersToLobby();

      this.#roster.clearAlive();
      this.#teams = EMPTY_TEAMS;
      this.#matchStartedAt = undefined;
      this.#useCollaborator("Zone controller", this.#zone, (zone) => zone.reset());

      progress = { phase: "Cleanup", until: now + this.#config.match.intermissionMs };
      this.#progress = progress;
    }

    if (now >= progress.until) {
      await this.#advance(now);
    }
  }

  async #advance(now: TimePoint): Promise<void> {
    const previous = this.#phase;
    const phase = nextPhase(previous);
    this.#phase = phase;
    this.#progress = undefined;

    this.#logger?.info?.("Phase changed", { previous, phase, at: now });
    await this.#broadcast(MATCH_CHANNEL, { type: "PhaseChanged", phase, previous, at: now });
  }

  // ---------------------------------------------------------------------------
  //  Collaborators
  // ---------------------------------------------------------------------------

  async #startZone(): Promise<void> {
    if (!this.#config.zoneEnabled) {
      this.#logger?.info?.("Zone disabled by configuration");
      return;
    }
    if (!this.#zone) {
      this.#logger?.warn?.("Zone controller unavailable; skipping");
      return;
    }
    try {
      await this.#zone.start();
    } catch (error) {
      this.#logger?.error?.("Zone controller failed to start; continuing", { error });
    }
  }

  #dropPlayers(): void {
    const positions = this.#dropPositions();
    const players = this.#roster.connectedPlayers();
    this.#useCollaborator("Player placement", this.#placement, (placement) => {
      players.forEach((playerId, index) => {
        const position = positions[index % positions.length];
        if (position) {
          placement.placePlayer(playerId, position);
        }
      });
    });
    this.#logger?.info?.("Players dropped", {
      players: players.length,
      positions: positions.length,
    });
  }

  #dropPositions(): Position[] {
    const height = this.#config.match.dropHeight;
    const provider = this.#spawnPoints;

    if (provider) {
      try {
        const points = provider.getPlayerSpawnPoints();
        if (points.length > 0) {
          return points.map((point) => ({ x: point.x, y: height, z: point.z }));
        }
      } catch (error) {
        this.#logger?.warn?.("Spawn points unavailable; using fallback ring", { error });
      }
    }

    let center = ORIGIN;
    let mapSize = FALLBACK_MAP_SIZE;
    if (provider) {
      try {
        center = provider.getMapCenter();
        mapSize = provider.getMapSize();
      } catch (error) {
        this.#logger?.warn?.("Map bounds unavailable; using defaults", { error });
      }
    } else {
      this.#logger?.warn?.("Spawn point provider unavailable; using fallback ring");
    }

    return ringPositions(center, mapSize * FALLBACK_DROP_SPREAD, FALLBACK_DROP_COUNT, height);
  }

  #returnPlayersToLobby(): void {
    const spawn = this.#lobbySpawn();
    this.#useCollaborator("Player placement", this.#placement, (placement) => {
      for (const playerId of this.#roster.connectedPlayers()) {
        placement.placePlayer(playerId, spawn);
      }
    });
  }

  #lobbySpawn(): Position {
    const height = this.#config.match.lobbyHeight;
    const fallback: Position = { x: 0, y: height, z: 0 };
    const provider = this.#spawnPoints;
    if (!provider) {
      return fallback;
    }

    try {
      const spawn = provider.getLobbySpawn();
      if (spawn) {
        return spawn;
      }
      const center = provider.getMapCenter();
      return { x: center.x, y: height, z: center.z };
    } catch (error) {
      this.#logger?.warn?.("Lobby spawn unavailable; using default", { error });
      return fallback;
    }
  }

  #useCollaborator<T>(name: string, collaborator: T | undefined, effect: (it: T) => void): void {
    if (collaborator === undefined) {
      this.#logger?.warn?.(`${name} unavailable; skipping`, { phase: this.#phase });
      return;
    }
    try {
      effect(collaborator);
    } catch (error) {
      this.#logger?.error?.(`${name} failed; continuing`, { phase: this.#phase, error });
    }
  }

  #currentModeConfig(): ModeConfig {
    const mode = this.#config.modes[this.#mode];
    if (!mode) {
      throw MatchConfigError.because([`mode "${this.#mode}" is not configured`]);
    }
    return mode;
  }

  async #broadcast(channel: string, event: MatchEvent): Promise<void> {
    try {
      await this.#bus.publish(channel, event);
    } catch (error) {
      this.#logger?.warn?.("Failed to broadcast event", { channel, type: event.type, error });
    }
  }
}
