export { Result, type ResultStatus } from "./engine/result.js";
export {
  TraceNotFoundError,
  TreeCancellationError,
  TreeProgrammingError,
  isCancellationError,
  toCancellationError,
} from "./engine/errors.js";
export { Tracer, type TraceNodeRecord, type TraceStatus } from "./engine/tracer.js";
export { Context, type ContextOptions, type ForkOptions } from "./engine/context.js";
export {
  CompositeNode,
  DecoratorNode,
  LeafNode,
  Node,
  type NodeOptions,
} from "./engine/node.js";
export { Tree, runTree, type TreeRun } from "./engine/tree.js";
export { spawnTask } from "./engine/spawn.js";
export {
  bindCallable,
  type BlackboardFunction,
  type BoundCallable,
  type CallShape,
  type TaskFunction,
} from "./engine/callable.js";
export type { BlackboardKey, BlackboardSetter } from "./engine/blackboard.js";
export {
  clearSpawnedTaskFinishHooks,
  listSpawnedTaskFinishHooks,
  registerSpawnedTaskFinishHook,
  restoreSpawnedTaskFinishHooks,
  type SpawnedTaskFinishHook,
} from "./engine/hooks.js";
export {
  configureDefaults,
  getDefaults,
  resetDefaults,
  restoreDefaults,
  snapshotDefaults,
  type EngineDefaults,
} from "./engine/defaults.js";
export * from "./engine/nodes/leaves.js";
export * from "./engine/nodes/composites.js";
export * from "./engine/nodes/decorators.js";
export * from "./engine/nodes/concurrency.js";
export * from "./engine/nodes/cacher.js";
export * from "./cache/protocol.js";
export { InMemoryKeyValueStore, type InMemoryKeyValueStoreOptions, type KeyValueStore } from "./store/keyValueStore.js";
export { RedisKeyValueStore, type RedisCommandClient } from "./store/redisStore.js";
export { TraceNodeRecordSchema, TRACE_ID_PATTERN, type TraceStorage } from "./tracing/storage.js";
export { FileTraceStorage, type FileTraceStorageOptions } from "./tracing/fileStorage.js";
export { LlmNode, type DeltaCallback, type LlmNodeOptions, type MessagesFactory } from "./llm/node.js";
export type { LlmChunk, LlmClient, LlmCompletion, LlmMessage, LlmRequest, LlmUsage } from "./llm/types.js";
export { StructuredLogger, type LogEntry, type LoggerOptions, type LogLevel } from "./logger.js";
export { loadEngineSettings, type EngineSettings } from "./config/settings.js";
export { createSeededRandom, weightedShuffle, type RandomSource } from "./utils/random.js";
export { sleep } from "./runtime/timers.js";
