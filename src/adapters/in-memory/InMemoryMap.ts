import type { SpawnPointProvider } from "../../domain/ports/SpawnPointProvider.js";
import type { Position } from "../../domain/typedefs.js";

export interface InMemoryMapOptions {
  readonly center?: Position;
  readonly size?: number;
  readonly spawnPoints?: readonly Position[];
  readonly lobbySpawn?: Position;
}

/** Static map description for local play and tests. */
export class InMemoryMap implements SpawnPointProvider {
  readonly #center: Position;
  readonly #size: number;
  readonly #spawnPoints: readonly Position[];
  readonly #lobbySpawn: Position | undefined;

  constructor(options: InMemoryMapOptions = {}) {
    this.#center = options.center ?? { x: 0, y: 0, z: 0 };
    this.#size = options.size ?? 2048;
    this.#spawnPoints = options.spawnPoints ?? [];
    this.#lobbySpawn = options.lobbySpawn;
  }

  getPlayerSpawnPoints(): readonly Position[] {
    return this.#spawnPoints;
  }

  getMapCenter(): Position {
    return this.#center;
  }

  getMapSize(): number {
    return this.#size;
  }

  getLobbySpawn(): Position | undefined {
    return this.#lobbySpawn;
  }
}
