/* eslint-disable functional/immutable-data */
import { createRandomSource, type RandomSource } from "../entities/Random.js";
import type { RosterView } from "../entities/Roster.js";
import {
  distanceToEdge,
  driftCenter,
  isInside,
  lerpCircle,
  planarDistance,
  type ZoneCircle,
} from "../entities/ZoneGeometry.js";
import { MATCH_CHANNEL, playerChannel, type MatchEvent } from "../events.js";
import type { ZoneConfig, ZonePhaseConfig } from "../MatchConfig.js";
import type { BroadcastChannel } from "../ports/BroadcastChannel.js";
import type { DamageSink } from "../ports/DamageSink.js";
import type { Logger } from "../ports/Logger.js";
import type { PlayerPositionSource } from "../ports/PlayerPositionSource.js";
import type { Scheduler, TimerHandle } from "../ports/Scheduler.js";
import type { SpawnPointProvider } from "../ports/SpawnPointProvider.js";
import type { Position, TimePoint } from "../typedefs.js";
import { startTicker, type Ticker } from "../scheduling/Ticker.js";

const SECOND_MS = 1_000;
const ORIGIN: Position = { x: 0, y: 0, z: 0 };

export interface ZoneState {
  readonly active: boolean;
  /** Index of the current zone phase, 1-based; 0 before the first phase */
  readonly phase: number;
  readonly currentRadius: number;
  readonly targetRadius: number;
  readonly currentCenter: Position;
  readonly targetCenter: Position;
  readonly damage: number;
  readonly inGracePeriod: boolean;
  readonly graceSecondsRemaining: number;
}

/** What the coordinator needs from the zone subsystem. */
export interface ZoneControl {
  start(): Promise<void>;
  stop(): void;
  reset(): void;
  getState(): ZoneState;
}

export interface ZoneControllerOptions {
  readonly config: ZoneConfig;
  readonly scheduler: Scheduler;
  readonly bus: BroadcastChannel;
  readonly roster: RosterView;
  readonly positions?: PlayerPositionSource | undefined;
  readonly damageSink?: DamageSink | undefined;
  readonly spawnPoints?: SpawnPointProvider | undefined;
  readonly random?: RandomSource | undefined;
  readonly logger?: Logger | undefined;
}

interface ShrinkWindow {
  readonly from: ZoneCircle;
  readonly startedAt: TimePoint;
  readonly durationMs: number;
}

/**
 * Shrinking safe zone. Two activities run while active: phase progression
 * (countdowns and interpolation, the only writer of the zone circle) and the
 * damage loop (reads the circle once per tick).
 */
export class ZoneController implements ZoneControl {
  readonly #config: ZoneConfig;
  readonly #scheduler: Scheduler;
  readonly #bus: BroadcastChannel;
  readonly #roster: RosterView;
  readonly #positions: PlayerPositionSource | undefined;
  readonly #damageSink: DamageSink | undefined;
  readonly #spawnPoints: SpawnPointProvider | undefined;
  readonly #random: RandomSource;
  readonly #logger: Logger | undefined;

  #active = false;
  #generation = 0;
  #phase = 0;
  #damage = 0;
  #circle: ZoneCircle;
  #target: ZoneCircle;
  #shrink: ShrinkWindow | undefined;
  #inGracePeriod = false;
  #graceRemainingMs = 0;
  #progressionHandle: TimerHandle | undefined;
  #damageTicker: Ticker | undefined;

  constructor(options: ZoneControllerOptions) {
    this.#config = options.config;
    this.#scheduler = options.scheduler;
    this.#bus = options.bus;
    this.#roster = options.roster;
    this.#positions = options.positions;
    this.#damageSink = options.damageSink;
    this.#spawnPoints = options.spawnPoints;
    this.#random = options.random ?? createRandomSource(options.config.randomSeed);
    this.#logger = options.logger;

    this.#circle = this.#initialCircle();
    this.#target = this.#circle;
  }

  async start(): Promise<void> {
    if (this.#active) {
      this.#logger?.warn?.("Zone already active; start ignored", { phase: this.#phase });
      return;
    }

    this.#generation += 1;
    const generation = this.#generation;
    this.#active = true;
    this.#phase = 0;
    this.#damage = 0;
    this.#shrink = undefined;
    this.#circle = this.#initialCircle();
    this.#target = this.#circle;

    const graceMs = this.#config.gracePeriodMs;
    this.#inGracePeriod = graceMs > 0;
    this.#graceRemainingMs = graceMs;

    this.#logger?.info?.("Zone started", {
      radius: this.#circle.radius,
      center: this.#circle.center,
      gracePeriodMs: graceMs,
    });

    if (graceMs <= 0) {
      await this.#beginProgression(generation);
      return;
    }

    await this.#broadcast(MATCH_CHANNEL, {
      type: "ZoneWarning",
      delaySeconds: toWholeSeconds(graceMs),
      upcomingPhase: 0,
      at: this.#scheduler.now(),
    });

    if (this.#isCurrent(generation)) {
      this.#scheduleStep(generation, Math.min(SECOND_MS, graceMs), (elapsed) =>
        this.#graceStep(generation, elapsed),
      );
    }
  }

  stop(): void {
    if (!this.#active) {
      return;
    }

    this.#active = false;
    this.#generation += 1;
    if (this.#progressionHandle !== undefined) {
      this.#scheduler.cancel(this.#progressionHandle);
      this.#progressionHandle = undefined;
    }
    this.#damageTicker?.stop();
    this.#damageTicker = undefined;

    this.#logger?.info?.("Zone stopped", {
      phase: this.#phase,
      radius: this.#circle.radius,
    });
  }

  /** Returns the zone to its pre-match state without recreating it. */
  reset(): void {
    this.stop();
    this.#phase = 0;
    this.#damage = 0;
    this.#shrink = undefined;
    this.#inGracePeriod = false;
    this.#graceRemainingMs = 0;
    this.#circle = this.#initialCircle();
    this.#target = this.#circle;
  }

  getState(): ZoneState {
    const circle = this.#circle;
    const target = this.#target;
    return {
      active: this.#active,
      phase: this.#phase,
      currentRadius: circle.radius,
      targetRadius: target.radius,
      currentCenter: circle.center,
      targetCenter: target.center,
      damage: this.#damage,
      inGracePeriod: this.#inGracePeriod,
      graceSecondsRemaining: toWholeSeconds(this.#graceRemainingMs),
    };
  }

  isInsideZone(position: Position): boolean {
    return isInside(this.#circle, position);
  }

  getDistanceToZone(position: Position): number {
    return distanceToEdge(this.#circle, position);
  }

  // ---------------------------------------------------------------------------
  //  Phase progression
  // ---------------------------------------------------------------------------

  async #graceStep(generation: number, elapsedMs: number): Promise<void> {
    if (!this.#isCurrent(generation)) return;

    this.#graceRemainingMs = Math.max(0, this.#graceRemainingMs - elapsedMs);

    if (this.#graceRemainingMs > 0) {
      const seconds = toWholeSeconds(this.#graceRemainingMs);
      if (seconds === 30 || seconds === 10 || seconds <= 5) {
        await this.#broadcast(MATCH_CHANNEL, {
          type: "ZoneWarning",
          delaySeconds: seconds,
          upcomingPhase: 0,
          at: this.#scheduler.now(),
        });
      }
      if (this.#isCurrent(generation)) {
        this.#scheduleStep(
          generation,
          Math.min(SECOND_MS, this.#graceRemainingMs),
          (elapsed) => this.#graceStep(generation, elapsed),
        );
      }
      return;
    }

    this.#inGracePeriod = false;
    this.#logger?.info?.("Zone grace period ended; damage now active");

    await this.#broadcast(MATCH_CHANNEL, {
      type: "ZoneUpdate",
      phase: 0,
      targetRadius: this.#circle.radius,
      targetCenter: this.#circle.center,
      damage: 0,
      at: this.#scheduler.now(),
    });

    if (this.#isCurrent(generation)) {
      await this.#beginProgression(generation);
    }
  }

  async #beginProgression(generation: number): Promise<void> {
    this.#damageTicker = startTicker(
      this.#scheduler,
      {
        name: "zone-damage",
        intervalMs: this.#config.damageIntervalMs,
        initialDelayMs: 0,
        logger: this.#logger,
      },
      () => this.#applyDamage(generation),
    );

    await this.#enterPhase(generation, 1);
  }

  async #enterPhase(generation: number, index: number): Promise<void> {
    const phaseConfig = this.#config.phases[index - 1];
    if (!phaseConfig) {
      this.#logger?.info?.("Zone progression complete", { phase: this.#phase });
      return;
    }

    this.#phase = index;
    this.#damage = phaseConfig.damage;

    await this.#broadcast(MATCH_CHANNEL, {
      type: "ZoneWarning",
      delaySeconds: toWholeSeconds(phaseConfig.delayMs),
      upcomingPhase: index,
      at: this.#scheduler.now(),
    });

    if (!this.#isCurrent(generation)) return;

    if (phaseConfig.delayMs <= 0) {
      await this.#beginShrink(generation, index, phaseConfig);
      return;
    }

    this.#countDownDelay(generation, index, phaseConfig, phaseConfig.delayMs);
  }

  #countDownDelay(
    generation: number,
    index: number,
    phaseConfig: ZonePhaseConfig,
    remainingMs: number,
  ): void {
    this.#scheduleStep(generation, Math.min(SECOND_MS, remainingMs), async (elapsed) => {
      if (!this.#isCurrent(generation)) return;

      const left = Math.max(0, remainingMs - elapsed);
      if (left <= 0) {
        await this.#beginShrink(generation, index, phaseConfig);
        return;
      }

      if (left <= this.#config.warningThresholdMs) {
        await this.#broadcast(MATCH_CHANNEL, {
          type: "ZoneWarning",
          delaySeconds: toWholeSeconds(left),
          upcomingPhase: index,
          at: this.#scheduler.now(),
        });
      }

      if (this.#isCurrent(generation)) {
        this.#countDownDelay(generation, index, phaseConfig, left);
      }
    });
  }

  async #beginShrink(
    generation: number,
    index: number,
    phaseConfig: ZonePhaseConfig,
  ): Promise<void> {
    const from = this.#circle;
    this.#target = {
      radius: phaseConfig.endRadius,
      center: driftCenter(
        from.center,
        from.radius,
        phaseConfig.centerOffsetFraction,
        this.#random,
      ),
    };
    this.#shrink = {
      from,
      startedAt: this.#scheduler.now(),
      durationMs: phaseConfig.shrinkDurationMs,
    };

    await this.#broadcast(MATCH_CHANNEL, {
      type: "ZoneUpdate",
      phase: index,
      targetRadius: this.#target.radius,
      targetCenter: this.#target.center,
      damage: phaseConfig.damage,
      at: this.#scheduler.now(),
    });

    this.#logger?.info?.("Zone phase shrinking", {
      phase: index,
      targetRadius: this.#target.radius,
      durationMs: phaseConfig.shrinkDurationMs,
    });

    if (!this.#isCurrent(generation)) return;

    if (phaseConfig.shrinkDurationMs <= 0) {
      await this.#finishShrink(generation, index);
      return;
    }

    this.#scheduleSample(generation, index);
  }

  #scheduleSample(generation: number, index: number): void {
    const shrink = this.#shrink;
    if (!shrink) return;

    const elapsed = this.#scheduler.now() - shrink.startedAt;
    const delay = Math.min(this.#config.interpolationIntervalMs, shrink.durationMs - elapsed);

    this.#scheduleStep(generation, Math.max(0, delay), async () => {
      if (!this.#isCurrent(generation)) return;

      const window = this.#shrink;
      if (!window) return;

      const sinceStart = this.#scheduler.now() - window.startedAt;
      if (sinceStart >= window.durationMs) {
        await this.#finishShrink(generation, index);
        return;
      }

      this.#circle = lerpCircle(window.from, this.#target, sinceStart / window.durationMs);
      this.#scheduleSample(generation, index);
    });
  }

  async #finishShrink(generation: number, index: number): Promise<void> {
    // exact snap; interpolation must not leave residue for the next phase
    this.#circle = this.#target;
    this.#shrink = undefined;
    await this.#enterPhase(generation, index + 1);
  }

  #scheduleStep(
    generation: number,
    delayMs: number,
    step: (elapsedMs: number) => Promise<void> | void,
  ): void {
    this.#progressionHandle = this.#scheduler.scheduleTimeout(delayMs, async () => {
      this.#progressionHandle = undefined;
      if (!this.#isCurrent(generation)) return;
      try {
        await step(delayMs);
      } catch (error) {
        this.#logger?.error?.("Zone progression step failed", { phase: this.#phase, error });
      }
    });
  }

  // ---------------------------------------------------------------------------
  //  Damage loop
  // ---------------------------------------------------------------------------

  async #applyDamage(generation: number): Promise<void> {
    if (!this.#isCurrent(generation) || this.#inGracePeriod) return;

    const damage = this.#damage;
    if (damage <= 0) return;

    const positions = this.#positions;
    const sink = this.#damageSink;
    if (!positions || !sink) {
      this.#logger?.debug?.("Zone damage skipped; no position source or damage sink");
      return;
    }

    const circle = this.#circle;
    const at = this.#scheduler.now();

    for (const playerId of this.#roster.livingPlayers()) {
      try {
        const position = positions.getPosition(playerId);
        if (!position) continue;
        if (planarDistance(position, circle.center) <= circle.radius) continue;

        sink.applyDamage(playerId, damage);
      } catch (error) {
        this.#logger?.error?.("Failed to apply zone damage", { playerId, error });
        continue;
      }

      await this.#broadcast(playerChannel(playerId), {
        type: "ZoneDamage",
        playerId,
        amount: damage,
        at,
      });
    }
  }

  // ---------------------------------------------------------------------------

  #isCurrent(generation: number): boolean {
    return this.#active && generation === this.#generation;
  }

  #initialCircle(): ZoneCircle {
    return { radius: this.#config.initialRadius, center: this.#mapCenter() };
  }

  #mapCenter(): Position {
    if (!this.#spawnPoints) {
      return ORIGIN;
    }
    try {
      return this.#spawnPoints.getMapCenter();
    } catch (error) {
      this.#logger?.warn?.("Map center unavailable; using origin", { error });
      return ORIGIN;
    }
  }

  async #broadcast(channel: string, event: MatchEvent): Promise<void> {
    try {
      await this.#bus.publish(channel, event);
    } catch (error) {
      this.#logger?.warn?.("Failed to broadcast zone event", { channel, type: event.type, error });
    }
  }
}

function toWholeSeconds(ms: number): number {
  return Math.ceil(ms / SECOND_MS);
}
