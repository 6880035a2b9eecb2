import {
  createMatchConfig,
  MatchConfigError,
  type MatchConfig,
  type MatchConfigOverrides,
  type MatchTimings,
} from "./core.js";

export type Environment = Readonly<Record<string, string | undefined>>;

export interface ServerConfig {
  readonly port: number;
  readonly match: MatchConfig;
}

const DEFAULT_PORT = 8787;

/** Reads server and match settings from the environment; unset variables keep their defaults. */
export function loadServerConfig(env: Environment = process.env): ServerConfig {
  const issues: string[] = [];

  const readInteger = (name: string): number | undefined => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") {
      return undefined;
    }
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      issues.push(`${name} must be an integer, got "${raw}"`);
      return undefined;
    }
    return value;
  };

  const port = readInteger("PORT") ?? DEFAULT_PORT;
  const minPlayersToStart = readInteger("MATCH_MIN_PLAYERS");
  const lobbyWaitMs = readInteger("MATCH_LOBBY_WAIT_MS");
  const matchMaxDurationMs = readInteger("MATCH_MAX_DURATION_MS");
  const gracePeriodMs = readInteger("ZONE_GRACE_MS");
  const randomSeed = readInteger("ZONE_SEED");

  if (issues.length > 0) {
    throw MatchConfigError.because(issues);
  }

  const match: Partial<MatchTimings> = {
    ...(minPlayersToStart !== undefined ? { minPlayersToStart } : {}),
    ...(lobbyWaitMs !== undefined ? { lobbyWaitMs } : {}),
    ...(matchMaxDurationMs !== undefined ? { matchMaxDurationMs } : {}),
  };

  const mode = env["MATCH_MODE"];
  const overrides: MatchConfigOverrides = {
    match,
    zone: {
      ...(gracePeriodMs !== undefined ? { gracePeriodMs } : {}),
      ...(randomSeed !== undefined ? { randomSeed } : {}),
    },
    practice: { enabled: isTruthy(env["MATCH_PRACTICE"]) },
    ...(mode !== undefined && mode !== "" ? { defaultMode: mode } : {}),
  };

  return { port, match: createMatchConfig(overrides) };
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ["1", "true", "yes", "on"].includes(value.toLowerCase());
}
