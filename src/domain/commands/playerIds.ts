import { MatchCommandInputError } from "../errors/MatchCommandInputError.js";
import type { PlayerId } from "../typedefs.js";

const WHITESPACE_PATTERN = /\s/;

export function isValidPlayerId(id: unknown): id is PlayerId {
  return typeof id === "string" && id.length > 0 && !WHITESPACE_PATTERN.test(id);
}

export function assertValidPlayerId(id: unknown, role = "Player"): asserts id is PlayerId {
  if (!isValidPlayerId(id)) {
    throw MatchCommandInputError.because([
      `${role} identifier must be a non-empty string without whitespace`,
    ]);
  }
}
