import type { PlayerId } from "../typedefs.js";

export interface DamageSink {
  applyDamage(playerId: PlayerId, amount: number): void;
}
