/**
 * Engine configuration.
 *
 * Defaults, CORRIDOR_* environment variables, then explicit overrides.
 */

import { ConfigError } from "../errors";
import { isLogLevel, type LogLevel } from "../logging";

export type Flexibility = "high" | "medium" | "low";

export interface CorridorConfig {
  /** Bottleneck throughput, students per minute. */
  capacity: number;
  exitIntervalMinutes: number;

  proposeThreshold: number;
  maxProposalsPerEpisode: number;
  offerMinutesPerRatio: number;
  maxAdjustmentMinutes: number;
  flexibilityWeights: Record<Flexibility, number>;
  acceptTrustThreshold: number;

  neutralTrust: number;
  minTrust: number;
  maxTrust: number;
  violationPenalty: number;
  fulfillmentReward: number;
  strikeLimit: number;

  sessionDeadlineMs: number;
  maxConcurrentSessions: number;
  capabilityTimeoutMs: number;
  capabilityRetries: number;

  /** Episodes between a commitment's creation and its obligation point. */
  obligationHorizon: number;

  ledgerPath: string;
  seed: string;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: CorridorConfig = {
  capacity: 50,
  exitIntervalMinutes: 2,

  proposeThreshold: 1,
  maxProposalsPerEpisode: 1,
  offerMinutesPerRatio: 1,
  maxAdjustmentMinutes: 6,
  flexibilityWeights: { high: 1.5, medium: 1, low: 0.5 },
  acceptTrustThreshold: 0.4,

  neutralTrust: 0.5,
  minTrust: 0,
  maxTrust: 1,
  violationPenalty: 0.15,
  fulfillmentReward: 0.05,
  strikeLimit: 3,

  sessionDeadlineMs: 5_000,
  maxConcurrentSessions: 4,
  capabilityTimeoutMs: 2_000,
  capabilityRetries: 1,

  obligationHorizon: 1,

  ledgerPath: ".corridor/ledger.json",
  seed: "corridor",
  logLevel: "info",
};

type NumericKey = {
  [K in keyof CorridorConfig]: CorridorConfig[K] extends number ? K : never;
}[keyof CorridorConfig];

const NUMERIC_ENV: Array<[string, NumericKey, "int" | "number"]> = [
  ["CORRIDOR_CAPACITY", "capacity", "int"],
  ["CORRIDOR_EXIT_INTERVAL_MINUTES", "exitIntervalMinutes", "int"],
  ["CORRIDOR_PROPOSE_THRESHOLD", "proposeThreshold", "number"],
  ["CORRIDOR_MAX_PROPOSALS_PER_EPISODE", "maxProposalsPerEpisode", "int"],
  ["CORRIDOR_OFFER_MINUTES_PER_RATIO", "offerMinutesPerRatio", "number"],
  ["CORRIDOR_MAX_ADJUSTMENT_MINUTES", "maxAdjustmentMinutes", "int"],
  ["CORRIDOR_ACCEPT_TRUST_THRESHOLD", "acceptTrustThreshold", "number"],
  ["CORRIDOR_VIOLATION_PENALTY", "violationPenalty", "number"],
  ["CORRIDOR_FULFILLMENT_REWARD", "fulfillmentReward", "number"],
  ["CORRIDOR_STRIKE_LIMIT", "strikeLimit", "int"],
  ["CORRIDOR_SESSION_DEADLINE_MS", "sessionDeadlineMs", "int"],
  ["CORRIDOR_MAX_CONCURRENT_SESSIONS", "maxConcurrentSessions", "int"],
  ["CORRIDOR_CAPABILITY_TIMEOUT_MS", "capabilityTimeoutMs", "int"],
  ["CORRIDOR_CAPABILITY_RETRIES", "capabilityRetries", "int"],
  ["CORRIDOR_OBLIGATION_HORIZON", "obligationHorizon", "int"],
];

function parseNumber(key: string, raw: string, kind: "int" | "number"): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new ConfigError(key, `expected a number, got "${raw}"`);
  }
  if (kind === "int" && !Number.isInteger(value)) {
    throw new ConfigError(key, `expected an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Load configuration from the environment.
 * Unset variables keep their defaults; malformed ones throw ConfigError.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<CorridorConfig> = {}
): CorridorConfig {
  const config: CorridorConfig = {
    ...DEFAULT_CONFIG,
    flexibilityWeights: { ...DEFAULT_CONFIG.flexibilityWeights },
  };

  for (const [envKey, field, kind] of NUMERIC_ENV) {
    const raw = env[envKey];
    if (raw !== undefined) {
      config[field] = parseNumber(envKey, raw, kind);
    }
  }

  if (env.CORRIDOR_LEDGER_PATH) config.ledgerPath = env.CORRIDOR_LEDGER_PATH;
  if (env.CORRIDOR_SEED) config.seed = env.CORRIDOR_SEED;
  if (env.CORRIDOR_LOG_LEVEL) {
    const level = env.CORRIDOR_LOG_LEVEL.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError("CORRIDOR_LOG_LEVEL", `unknown level "${env.CORRIDOR_LOG_LEVEL}"`);
    }
    config.logLevel = level;
  }

  const merged: CorridorConfig = {
    ...config,
    ...overrides,
    flexibilityWeights: { ...config.flexibilityWeights, ...(overrides.flexibilityWeights ?? {}) },
  };
  validateConfig(merged);
  return merged;
}

export function validateConfig(config: CorridorConfig): void {
  const positiveInts: NumericKey[] = [
    "capacity",
    "exitIntervalMinutes",
    "maxProposalsPerEpisode",
    "maxAdjustmentMinutes",
    "strikeLimit",
    "sessionDeadlineMs",
    "maxConcurrentSessions",
    "capabilityTimeoutMs",
    "obligationHorizon",
  ];
  for (const key of positiveInts) {
    const value = config[key];
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigError(key, `must be a positive integer, got ${value}`);
    }
  }

  if (!Number.isInteger(config.capabilityRetries) || config.capabilityRetries < 0) {
    throw new ConfigError("capabilityRetries", "must be a non-negative integer");
  }
  if (!(config.minTrust < config.maxTrust)) {
    throw new ConfigError("minTrust", "must be below maxTrust");
  }
  if (config.neutralTrust < config.minTrust || config.neutralTrust > config.maxTrust) {
    throw new ConfigError("neutralTrust", "must lie within [minTrust, maxTrust]");
  }
  if (config.violationPenalty < 0 || config.fulfillmentReward < 0) {
    throw new ConfigError("violationPenalty", "trust adjustments must be non-negative");
  }
  if (config.offerMinutesPerRatio <= 0) {
    throw new ConfigError("offerMinutesPerRatio", "must be positive");
  }
  for (const [level, weight] of Object.entries(config.flexibilityWeights)) {
    if (!(weight > 0)) {
      throw new ConfigError(`flexibilityWeights.${level}`, "must be positive");
    }
  }
  const { high, medium, low } = config.flexibilityWeights;
  if (!(high >= medium && medium >= low)) {
    throw new ConfigError("flexibilityWeights", "must satisfy high >= medium >= low");
  }
}
