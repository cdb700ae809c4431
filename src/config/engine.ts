import { z } from "zod";

import { type EnvSource, readBool, readEnum, readInt, readNumber, readOptionalString } from "./env.js";
import type { LogLevel } from "../logger.js";

/** Absolute upper bound for the configurable depth ceiling. */
export const MAX_DEPTH_HARD_LIMIT = 12;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const engineConfigSchema = z
  .object({
    defaultDepth: z.number().int().min(1),
    depthCeiling: z.number().int().min(1).max(MAX_DEPTH_HARD_LIMIT),
    neighborCap: z.number().int().min(1),
    cacheTtlMs: z.number().int().min(1),
    cacheBucketMs: z.number().int().min(1),
    cacheCapacity: z.number().int().min(1),
    deadlineMs: z.number().int().min(1),
    singleFlight: z.boolean(),
    singleFlightWaitMs: z.number().int().min(0),
    storeRetries: z.number().int().min(1).max(10),
    weightHalfSaturation: z.number().positive(),
    eagerDepthThreshold: z.number().int().min(0),
    journalPath: z.string().min(1).nullable(),
    logFile: z.string().min(1).nullable(),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
  })
  .refine((config) => config.defaultDepth <= config.depthCeiling, {
    message: "default depth must not exceed the depth ceiling",
    path: ["defaultDepth"],
  });

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  defaultDepth: 3,
  depthCeiling: 6,
  neighborCap: 100,
  cacheTtlMs: 3_600_000,
  cacheBucketMs: 3_600_000,
  cacheCapacity: 1_024,
  deadlineMs: 2_000,
  singleFlight: true,
  singleFlightWaitMs: 250,
  storeRetries: 3,
  weightHalfSaturation: 10_000,
  eagerDepthThreshold: 1,
  journalPath: null,
  logFile: null,
  logLevel: "info",
};

/**
 * Builds the engine configuration from environment variables. Unparseable
 * values fall back to defaults; cross-field violations (a default depth
 * above the ceiling) throw so a misconfigured process fails at start-up.
 */
export function loadEngineConfig(env: EnvSource = process.env, overrides: Partial<EngineConfig> = {}): EngineConfig {
  const defaults = DEFAULT_ENGINE_CONFIG;
  const candidate: EngineConfig = {
    defaultDepth: readInt("NETWORK_DEFAULT_DEPTH", defaults.defaultDepth, { min: 1 }, env),
    depthCeiling: readInt("NETWORK_MAX_DEPTH_CEILING", defaults.depthCeiling, { min: 1, max: MAX_DEPTH_HARD_LIMIT }, env),
    neighborCap: readInt("NETWORK_NEIGHBOR_CAP", defaults.neighborCap, { min: 1 }, env),
    cacheTtlMs: readInt("NETWORK_CACHE_TTL_MS", defaults.cacheTtlMs, { min: 1 }, env),
    cacheBucketMs: readInt("NETWORK_CACHE_BUCKET_MS", defaults.cacheBucketMs, { min: 1 }, env),
    cacheCapacity: readInt("NETWORK_CACHE_CAPACITY", defaults.cacheCapacity, { min: 1 }, env),
    deadlineMs: readInt("NETWORK_DEADLINE_MS", defaults.deadlineMs, { min: 1 }, env),
    singleFlight: readBool("NETWORK_SINGLE_FLIGHT", defaults.singleFlight, env),
    singleFlightWaitMs: readInt("NETWORK_SINGLE_FLIGHT_WAIT_MS", defaults.singleFlightWaitMs, { min: 0 }, env),
    storeRetries: readInt("NETWORK_STORE_RETRIES", defaults.storeRetries, { min: 1, max: 10 }, env),
    weightHalfSaturation: readNumber("NETWORK_WEIGHT_HALF_SATURATION", defaults.weightHalfSaturation, { min: 1 }, env),
    eagerDepthThreshold: readInt("NETWORK_EAGER_DEPTH", defaults.eagerDepthThreshold, { min: 0 }, env),
    journalPath: readOptionalString("NETWORK_JOURNAL", env) ?? defaults.journalPath,
    logFile: readOptionalString("NETWORK_LOG_FILE", env) ?? defaults.logFile,
    logLevel: readEnum("NETWORK_LOG_LEVEL", LOG_LEVELS, defaults.logLevel, env),
    ...overrides,
  };
  return engineConfigSchema.parse(candidate);
}
