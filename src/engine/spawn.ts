import type { Context, ForkOptions } from "./context.js";
import { runSpawnedTaskFinishHooks } from "./hooks.js";
import type { Node } from "./node.js";
import { Result } from "./result.js";

/**
 * Runs {@link node} as an independent task on a forked context and fires the
 * spawned-task-finish hooks exactly once when it settles. Cancelled or errored
 * tasks report `FAIL(undefined)` to the hooks and still reject.
 */
export async function spawnTask(context: Context, node: Node, options: ForkOptions = {}): Promise<Result> {
  const taskContext = context.fork(options);
  let result = Result.FAIL();
  try {
    result = await node.execute(taskContext);
    return result;
  } finally {
    const span = taskContext.lastTracer;
    if (span) {
      await runSpawnedTaskFinishHooks(taskContext, span, result);
    }
  }
}
