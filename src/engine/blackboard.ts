import { TreeProgrammingError } from "./errors.js";

/** Property name of a blackboard object. */
export type BlackboardKey<B> = Extract<keyof B, string>;

/** Destination callback receiving the value a node writes to the blackboard. */
export type BlackboardSetter<B> = (blackboard: B, data: unknown) => void;

function requireObject(blackboard: unknown, key: string): object {
  if ((typeof blackboard !== "object" && typeof blackboard !== "function") || blackboard === null) {
    throw new TreeProgrammingError(`cannot access blackboard key ${key}: no object blackboard is bound`);
  }
  return blackboard;
}

export function readBlackboardKey(blackboard: unknown, key: string): unknown {
  return Reflect.get(requireObject(blackboard, key), key);
}

export function writeBlackboardKey(blackboard: unknown, key: string, value: unknown): void {
  if (!Reflect.set(requireObject(blackboard, key), key, value)) {
    throw new TreeProgrammingError(`blackboard key ${key} is not writable`);
  }
}
