/** Creature AI population, started and stopped at the Match and Ending boundaries. */
export interface CreatureSpawner {
  startSpawning(): void;
  stopSpawning(): void;
  despawnAll(): void;
}
