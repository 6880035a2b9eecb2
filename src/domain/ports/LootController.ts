export interface LootController {
  spawnAllLoot(): void;
  resetLoot(): void;
}
