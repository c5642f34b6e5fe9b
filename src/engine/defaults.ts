import { loadEngineSettings, type EngineSettings } from "../config/settings.js";
import type { LlmClient } from "../llm/types.js";
import { StructuredLogger } from "../logger.js";
import type { KeyValueStore } from "../store/keyValueStore.js";

/**
 * Process-wide defaults consulted when a node or a context is created without
 * an explicit collaborator. Configure them once at startup; tests take a
 * snapshot and restore it afterwards.
 */
export interface EngineDefaults {
  /** Store used by Cacher and Terminable nodes without an explicit store. */
  keyValueStore: KeyValueStore | null;
  /** Client used by LLM nodes without an explicit client. */
  llmClient: LlmClient | null;
  /** Resolves the API key of LLM nodes without an explicit key. */
  llmApiKeyFactory: ((blackboard: unknown) => string | undefined) | null;
  /** Logger attached to contexts created without one. */
  logger: StructuredLogger;
  settings: EngineSettings;
}

function createInitialDefaults(): EngineDefaults {
  const settings = loadEngineSettings();
  return {
    keyValueStore: null,
    llmClient: null,
    llmApiKeyFactory: null,
    logger: new StructuredLogger({
      minLevel: settings.logLevel,
      logFile: settings.logFile,
      stdout: settings.logToStdout,
    }),
    settings,
  };
}

let current: EngineDefaults = createInitialDefaults();

export function getDefaults(): Readonly<EngineDefaults> {
  return current;
}

export function configureDefaults(overrides: Partial<EngineDefaults>): void {
  current = { ...current, ...overrides };
}

/** Re-reads the settings from the environment and drops every override. */
export function resetDefaults(): void {
  current = createInitialDefaults();
}

export function snapshotDefaults(): EngineDefaults {
  return { ...current };
}

export function restoreDefaults(snapshot: EngineDefaults): void {
  current = { ...snapshot };
}
