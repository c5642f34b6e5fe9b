import { describeError } from "../utils/serialize.js";

import type { Context } from "./context.js";
import type { Result } from "./result.js";
import type { Tracer } from "./tracer.js";

/**
 * Callback invoked once per spawned child task (Parallel and Gather branches,
 * Terminable's primary branch) with the task's context, span and final result.
 */
export type SpawnedTaskFinishHook = (context: Context, tracer: Tracer, result: Result) => void | Promise<void>;

/** Process-wide registry. Register at startup; tests snapshot and restore it. */
const spawnedTaskFinishHooks: SpawnedTaskFinishHook[] = [];

/** Registers a hook and returns a function removing it again. */
export function registerSpawnedTaskFinishHook(hook: SpawnedTaskFinishHook): () => void {
  spawnedTaskFinishHooks.push(hook);
  return () => {
    const index = spawnedTaskFinishHooks.indexOf(hook);
    if (index >= 0) {
      spawnedTaskFinishHooks.splice(index, 1);
    }
  };
}

/** Copy of the registered hooks, in registration order. */
export function listSpawnedTaskFinishHooks(): SpawnedTaskFinishHook[] {
  return [...spawnedTaskFinishHooks];
}

export function clearSpawnedTaskFinishHooks(): void {
  spawnedTaskFinishHooks.length = 0;
}

/** Replaces the registry content with a snapshot taken by {@link listSpawnedTaskFinishHooks}. */
export function restoreSpawnedTaskFinishHooks(hooks: readonly SpawnedTaskFinishHook[]): void {
  spawnedTaskFinishHooks.length = 0;
  spawnedTaskFinishHooks.push(...hooks);
}

/**
 * Runs every registered hook. A throwing hook is logged on the context's
 * logger and does not prevent the remaining hooks from running.
 */
export async function runSpawnedTaskFinishHooks(context: Context, tracer: Tracer, result: Result): Promise<void> {
  for (const hook of listSpawnedTaskFinishHooks()) {
    try {
      await hook(context, tracer, result);
    } catch (error) {
      context.logger.warn("spawned_task_hook_failed", { node: tracer.name, error: describeError(error) });
    }
  }
}
