import type { MatchPhase } from "../typedefs.js";

/** The only phase `phase` may transition to. Cleanup wraps around to Lobby. */
export function nextPhase(phase: MatchPhase): MatchPhase {
  switch (phase) {
    case "Lobby":
      return "Starting";
    case "Starting":
      return "Dropping";
    case "Dropping":
      return "Match";
    case "Match":
      return "Ending";
    case "Ending":
      return "Cleanup";
    case "Cleanup":
      return "Lobby";
  }
}
