import { MatchConfigError } from "./errors/MatchConfigError.js";
import type { ModeId } from "./typedefs.js";

export interface ModeConfig {
  readonly name: string;
  readonly teamSize: number;
  readonly maxPlayers: number;
}

/** One stage of the zone's shrink schedule */
export interface ZonePhaseConfig {
  /** Wait before the shrink begins */
  readonly delayMs: number;
  /** Length of the linear shrink */
  readonly shrinkDurationMs: number;
  readonly endRadius: number;
  /** Bound on center drift, as a fraction of the radius at shrink start */
  readonly centerOffsetFraction: number;
  /** Damage applied per damage tick to players outside the zone */
  readonly damage: number;
}

export interface ZoneConfig {
  readonly initialRadius: number;
  readonly damageIntervalMs: number;
  /** Countdown warnings are broadcast once the remaining delay is at or below this */
  readonly warningThresholdMs: number;
  readonly interpolationIntervalMs: number;
  readonly gracePeriodMs: number;
  readonly phases: readonly ZonePhaseConfig[];
  /** Seed for center drift; when absent, Math.random is used */
  readonly randomSeed?: number;
}

export interface MatchTimings {
  readonly minPlayersToStart: number;
  readonly lobbyWaitMs: number;
  readonly countdownSeconds: number;
  readonly dropSettleMs: number;
  readonly matchMaxDurationMs: number;
  readonly resultsDisplayMs: number;
  readonly intermissionMs: number;
  readonly driverTickMs: number;
  readonly dropHeight: number;
  readonly lobbyHeight: number;
}

/**
 * Single-player exploration profile. Victory checks are skipped and the zone
 * is gentler, so one person can walk a full match cycle.
 */
export interface PracticeConfig {
  readonly enabled: boolean;
  readonly minPlayersToStart: number;
  readonly autoStartDelayMs: number;
  readonly zoneRadiusMultiplier: number;
  readonly gracePeriodMultiplier: number;
  readonly damageMultiplier: number;
}

export interface MatchConfig {
  readonly defaultMode: ModeId;
  readonly modes: Readonly<Record<ModeId, ModeConfig>>;
  readonly match: MatchTimings;
  readonly zone: ZoneConfig;
  readonly practice: PracticeConfig;
  readonly zoneEnabled: boolean;
  readonly creaturesEnabled: boolean;
}

export interface MatchConfigOverrides {
  readonly defaultMode?: ModeId;
  readonly modes?: Readonly<Record<ModeId, ModeConfig>>;
  readonly match?: Partial<MatchTimings>;
  readonly zone?: Partial<ZoneConfig>;
  readonly practice?: Partial<PracticeConfig>;
  readonly zoneEnabled?: boolean;
  readonly creaturesEnabled?: boolean;
}

export const DEFAULT_MODES: Readonly<Record<ModeId, ModeConfig>> = {
  solo: { name: "Solo", teamSize: 1, maxPlayers: 20 },
  duos: { name: "Duos", teamSize: 2, maxPlayers: 20 },
  trios: { name: "Trios", teamSize: 3, maxPlayers: 21 },
};

export const DEFAULT_ZONE_PHASES: readonly ZonePhaseConfig[] = [
  { delayMs: 30_000, shrinkDurationMs: 20_000, endRadius: 200, centerOffsetFraction: 0.1, damage: 1 },
  { delayMs: 20_000, shrinkDurationMs: 15_000, endRadius: 120, centerOffsetFraction: 0.15, damage: 2 },
  { delayMs: 15_000, shrinkDurationMs: 12_000, endRadius: 60, centerOffsetFraction: 0.2, damage: 4 },
  { delayMs: 10_000, shrinkDurationMs: 10_000, endRadius: 25, centerOffsetFraction: 0.15, damage: 8 },
  { delayMs: 5_000, shrinkDurationMs: 8_000, endRadius: 0, centerOffsetFraction: 0, damage: 16 },
];

export function createMatchConfig(overrides: MatchConfigOverrides = {}): MatchConfig {
  const zoneOverrides = overrides.zone ?? {};
  const zone: ZoneConfig = {
    initialRadius: zoneOverrides.initialRadius ?? 500,
    damageIntervalMs: zoneOverrides.damageIntervalMs ?? 1_000,
    warningThresholdMs: zoneOverrides.warningThresholdMs ?? 10_000,
    interpolationIntervalMs: zoneOverrides.interpolationIntervalMs ?? 50,
    gracePeriodMs: zoneOverrides.gracePeriodMs ?? 30_000,
    phases: zoneOverrides.phases ?? DEFAULT_ZONE_PHASES,
    ...(zoneOverrides.randomSeed !== undefined
      ? { randomSeed: zoneOverrides.randomSeed }
      : {}),
  };

  const config: MatchConfig = {
    defaultMode: overrides.defaultMode ?? "solo",
    modes: overrides.modes ?? DEFAULT_MODES,
    match: {
      minPlayersToStart: 4,
      lobbyWaitMs: 60_000,
      countdownSeconds: 5,
      dropSettleMs: 3_000,
      matchMaxDurationMs: 600_000,
      resultsDisplayMs: 10_000,
      intermissionMs: 15_000,
      driverTickMs: 100,
      dropHeight: 500,
      lobbyHeight: 10,
      ...overrides.match,
    },
    zone,
    practice: {
      enabled: false,
      minPlayersToStart: 1,
      autoStartDelayMs: 3_000,
      zoneRadiusMultiplier: 1.5,
      gracePeriodMultiplier: 2,
      damageMultiplier: 0.25,
      ...overrides.practice,
    },
    zoneEnabled: overrides.zoneEnabled ?? true,
    creaturesEnabled: overrides.creaturesEnabled ?? true,
  };

  const issues = validateMatchConfig(config);
  if (issues.length > 0) {
    throw MatchConfigError.because(issues);
  }

  return config;
}

export function validateMatchConfig(config: MatchConfig): readonly string[] {
  const issues: string[] = [];
  const { match, zone } = config;

  const modeIds = Object.keys(config.modes);
  if (modeIds.length === 0) {
    issues.push("at least one mode must be configured");
  }
  if (!isKnownMode(config, config.defaultMode)) {
    issues.push(`defaultMode "${config.defaultMode}" is not a configured mode`);
  }
  for (const [modeId, mode] of Object.entries(config.modes)) {
    if (!Number.isInteger(mode.teamSize) || mode.teamSize < 1) {
      issues.push(`mode "${modeId}" teamSize must be an integer greater than or equal to 1`);
    }
  }

  if (!Number.isInteger(match.minPlayersToStart) || match.minPlayersToStart < 1) {
    issues.push("minPlayersToStart must be an integer greater than or equal to 1");
  }
  if (!Number.isInteger(match.countdownSeconds) || match.countdownSeconds < 0) {
    issues.push("countdownSeconds must be a non-negative integer");
  }
  if (!isPositive(match.driverTickMs)) {
    issues.push("driverTickMs must be greater than 0");
  }
  for (const key of [
    "lobbyWaitMs",
    "dropSettleMs",
    "matchMaxDurationMs",
    "resultsDisplayMs",
    "intermissionMs",
  ] as const) {
    if (!isNonNegative(match[key])) {
      issues.push(`${key} must be a non-negative number`);
    }
  }

  if (!isPositive(zone.initialRadius)) {
    issues.push("zone initialRadius must be greater than 0");
  }
  if (!isPositive(zone.damageIntervalMs)) {
    issues.push("zone damageIntervalMs must be greater than 0");
  }
  if (!isPositive(zone.interpolationIntervalMs)) {
    issues.push("zone interpolationIntervalMs must be greater than 0");
  }
  if (!isNonNegative(zone.gracePeriodMs)) {
    issues.push("zone gracePeriodMs must be a non-negative number");
  }
  if (!isNonNegative(zone.warningThresholdMs)) {
    issues.push("zone warningThresholdMs must be a non-negative number");
  }

  zone.phases.forEach((phase, index) => {
    const label = `zone phase ${index + 1}`;
    if (!isNonNegative(phase.delayMs)) issues.push(`${label} delayMs must be non-negative`);
    if (!isNonNegative(phase.shrinkDurationMs))
      issues.push(`${label} shrinkDurationMs must be non-negative`);
    if (!isNonNegative(phase.endRadius)) issues.push(`${label} endRadius must be non-negative`);
    if (!isNonNegative(phase.damage)) issues.push(`${label} damage must be non-negative`);
    if (
      !Number.isFinite(phase.centerOffsetFraction) ||
      phase.centerOffsetFraction < 0 ||
      phase.centerOffsetFraction > 1
    ) {
      issues.push(`${label} centerOffsetFraction must be between 0 and 1`);
    }
  });

  return issues;
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

export interface LobbyRules {
  readonly minPlayersToStart: number;
  readonly waitMs: number;
}

export function lobbyRules(config: MatchConfig): LobbyRules {
  if (config.practice.enabled) {
    return {
      minPlayersToStart: config.practice.minPlayersToStart,
      waitMs: config.practice.autoStartDelayMs,
    };
  }
  return {
    minPlayersToStart: config.match.minPlayersToStart,
    waitMs: config.match.lobbyWaitMs,
  };
}

/** Zone settings after the practice profile has been applied. */
export function effectiveZoneConfig(config: MatchConfig): ZoneConfig {
  const { zone, practice } = config;
  if (!practice.enabled) {
    return zone;
  }
  return {
    ...zone,
    initialRadius: zone.initialRadius * practice.zoneRadiusMultiplier,
    gracePeriodMs: zone.gracePeriodMs * practice.gracePeriodMultiplier,
    phases: zone.phases.map((phase) => ({
      ...phase,
      damage: phase.damage * practice.damageMultiplier,
    })),
  };
}

export function isKnownMode(config: MatchConfig, mode: ModeId): boolean {
  return Object.hasOwn(config.modes, mode);
}
