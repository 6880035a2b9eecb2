import type { Position } from "../typedefs.js";

export interface SpawnPointProvider {
  getPlayerSpawnPoints(): readonly Position[];
  getMapCenter(): Position;
  getMapSize(): number;
  getLobbySpawn(): Position | undefined;
}
