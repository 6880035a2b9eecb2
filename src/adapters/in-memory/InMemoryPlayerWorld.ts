/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { DamageSink } from "../../domain/ports/DamageSink.js";
import type { PlayerPlacement } from "../../domain/ports/PlayerPlacement.js";
import type { PlayerPositionSource } from "../../domain/ports/PlayerPositionSource.js";
import type { PlayerId, Position } from "../../domain/typedefs.js";

export interface PlayerBody {
  readonly health: number;
  readonly position: Position | undefined;
}

export interface InMemoryPlayerWorldOptions {
  readonly maxHealth?: number;
  /** Called once when a player's health first reaches zero. */
  readonly onDowned?: ((playerId: PlayerId) => void) | undefined;
}

/**
 * Player bodies kept in process. Positions are trusted as reported; placing a
 * player respawns the body at full health.
 */
export class InMemoryPlayerWorld implements PlayerPositionSource, DamageSink, PlayerPlacement {
  #bodies = new Map<PlayerId, PlayerBody>();
  readonly #maxHealth: number;
  readonly #onDowned: ((playerId: PlayerId) => void) | undefined;

  constructor(options: InMemoryPlayerWorldOptions = {}) {
    this.#maxHealth = options.maxHealth ?? 100;
    this.#onDowned = options.onDowned;
  }

  getPosition(playerId: PlayerId): Position | undefined {
    return this.#bodies.get(playerId)?.position;
  }

  getBody(playerId: PlayerId): PlayerBody | undefined {
    return this.#bodies.get(playerId);
  }

  reportPosition(playerId: PlayerId, position: Position): void {
    const body = this.#bodyOf(playerId);
    this.#bodies.set(playerId, { ...body, position: { ...position } });
  }

  placePlayer(playerId: PlayerId, position: Position): void {
    this.#bodies.set(playerId, { health: this.#maxHealth, position: { ...position } });
  }

  applyDamage(playerId: PlayerId, amount: number): void {
    const body = this.#bodyOf(playerId);
    if (body.health <= 0) {
      return;
    }

    const health = Math.max(0, body.health - amount);
    this.#bodies.set(playerId, { ...body, health });

    if (health === 0) {
      this.#onDowned?.(playerId);
    }
  }

  forget(playerId: PlayerId): void {
    this.#bodies.delete(playerId);
  }

  #bodyOf(playerId: PlayerId): PlayerBody {
    return this.#bodies.get(playerId) ?? { health: this.#maxHealth, position: undefined };
  }
}
