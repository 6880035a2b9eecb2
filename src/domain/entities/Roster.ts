/* eslint-disable functional/immutable-data */
import type { PlayerId } from "../typedefs.js";

export interface PlayerRecord {
  readonly id: PlayerId;
  readonly joinedAt: number;
  alive: boolean;
}

/** Read-only view handed to components that must not mutate alive state. */
export interface RosterView {
  connectedPlayers(): readonly PlayerId[];
  livingPlayers(): readonly PlayerId[];
  isAlive(playerId: PlayerId): boolean;
}

/**
 * Owns every PlayerRecord of one match instance. Records are kept in join
 * order, which is the order teams are packed in.
 */
export class Roster implements RosterView {
  readonly #records = new Map<PlayerId, PlayerRecord>();

  /** Returns false when the player is already present. */
  join(playerId: PlayerId, at: number): boolean {
    if (this.#records.has(playerId)) {
      return false;
    }
    this.#records.set(playerId, { id: playerId, joinedAt: at, alive: false });
    return true;
  }

  leave(playerId: PlayerId): boolean {
    return this.#records.delete(playerId);
  }

  has(playerId: PlayerId): boolean {
    return this.#records.has(playerId);
  }

  get size(): number {
    return this.#records.size;
  }

  connectedPlayers(): readonly PlayerId[] {
    return [...this.#records.keys()];
  }

  livingPlayers(): readonly PlayerId[] {
    return [...this.#records.values()]
      .filter((record) => record.alive)
      .map((record) => record.id);
  }

  isAlive(playerId: PlayerId): boolean {
    return this.#records.get(playerId)?.alive ?? false;
  }

  markAllAlive(): void {
    for (const record of this.#records.values()) {
      record.alive = true;
    }
  }

  /** Returns true only when the player was alive before the call. */
  markEliminated(playerId: PlayerId): boolean {
    const record = this.#records.get(playerId);
    if (!record || !record.alive) {
      return false;
    }
    record.alive = false;
    return true;
  }

  clearAlive(): void {
    for (const record of this.#records.values()) {
      record.alive = false;
    }
  }

  aliveMap(): ReadonlyMap<PlayerId, boolean> {
    return new Map([...this.#records.values()].map((record) => [record.id, record.alive]));
  }
}
