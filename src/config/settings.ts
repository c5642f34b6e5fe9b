import { z } from "zod";

import { type EnvSource, readBool, readEnum, readInt, readOptionalString } from "./env.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

/** Engine-wide settings resolved from the environment. */
export const EngineSettingsSchema = z
  .object({
    logLevel: z.enum(LOG_LEVELS),
    logFile: z.string().min(1).nullable(),
    logToStdout: z.boolean(),
    traceDirectory: z.string().min(1),
    terminableIntervalMs: z.number().int().min(1),
    cacheExpirationMs: z.number().int().min(1),
  })
  .strict();

export type EngineSettings = z.infer<typeof EngineSettingsSchema>;

export const DEFAULT_TERMINABLE_INTERVAL_MS = 100;
export const DEFAULT_CACHE_EXPIRATION_MS = 60 * 60 * 1000;

/**
 * Resolves the settings from `TREEFLOW_*` variables:
 *
 * - `TREEFLOW_LOG_LEVEL`: minimum level emitted by the default logger.
 * - `TREEFLOW_LOG_FILE`: optional file mirroring the JSON log lines.
 * - `TREEFLOW_LOG_STDOUT`: whether log lines are written to stdout.
 * - `TREEFLOW_TRACE_DIR`: directory used by the file trace storage.
 * - `TREEFLOW_TERMINABLE_INTERVAL_MS`: default polling interval of Terminable.
 * - `TREEFLOW_CACHE_EXPIRATION_MS`: default expiration of cached results.
 *
 * Malformed values fall back to the defaults rather than failing startup.
 */
export function loadEngineSettings(env: EnvSource = process.env): EngineSettings {
  return EngineSettingsSchema.parse({
    logLevel: readEnum("TREEFLOW_LOG_LEVEL", LOG_LEVELS, "info", env),
    logFile: readOptionalString("TREEFLOW_LOG_FILE", env) ?? null,
    logToStdout: readBool("TREEFLOW_LOG_STDOUT", true, env),
    traceDirectory: readOptionalString("TREEFLOW_TRACE_DIR", env) ?? ".traces",
    terminableIntervalMs: readInt("TREEFLOW_TERMINABLE_INTERVAL_MS", DEFAULT_TERMINABLE_INTERVAL_MS, { min: 1 }, env),
    cacheExpirationMs: readInt("TREEFLOW_CACHE_EXPIRATION_MS", DEFAULT_CACHE_EXPIRATION_MS, { min: 1 }, env),
  });
}
