import { z } from "zod";

import { deriveCacheKey, encodeCacheEntry, matchCacheEntry, type CacheLookup } from "../../cache/protocol.js";
import type { KeyValueStore } from "../../store/keyValueStore.js";
import { RedisKeyValueStore, type RedisCommandClient } from "../../store/redisStore.js";
import { describeError } from "../../utils/serialize.js";
import { type BoundCallable, bindCallable } from "../callable.js";
import type { Context } from "../context.js";
import { getDefaults } from "../defaults.js";
import { TreeProgrammingError, isCancellationError } from "../errors.js";
import { DecoratorNode } from "../node.js";
import { parseNodeOptions, positiveIntSchema } from "../options.js";
import { Result } from "../result.js";

export interface CacherOptions<B> {
  name?: string;
  /** Derives the cache key from the blackboard. */
  keyFunc: (blackboard: B) => string;
  /** Prepended to every key. */
  keyPrefix?: string;
  /** Derives a tag stored with the value; a different tag on read is a miss. */
  valueValidator?: (blackboard: B) => string;
  /** Lifetime of stored entries. Defaults to `TREEFLOW_CACHE_EXPIRATION_MS`. */
  expirationMs?: number;
  /** Defaults to the process-wide store. */
  store?: KeyValueStore;
}

const CacherOptionsSchema = z.object({
  name: z.string().optional(),
  keyPrefix: z.string().optional(),
  expirationMs: positiveIntSchema.optional(),
});

/**
 * Memoises the OK results of its child in a key-value store. A hit returns
 * the stored payload without running the child; a miss (absent, undecodable
 * or stale validator) runs the child and stores an OK result. Store failures
 * degrade to a miss on read and to an uncached result on write.
 */
export class CacherNode<B> extends DecoratorNode {
  readonly kind: string = "Cacher";
  private readonly keyFunc: BoundCallable<B>;
  private readonly validator: BoundCallable<B> | undefined;
  private readonly keyPrefix: string;
  private readonly expirationMs: number | undefined;
  private readonly store: KeyValueStore | undefined;

  constructor(options: CacherOptions<B>, store?: KeyValueStore) {
    const parsed = parseNodeOptions("Cacher", CacherOptionsSchema, {
      name: options.name,
      keyPrefix: options.keyPrefix,
      expirationMs: options.expirationMs,
    });
    super(parsed.name);
    this.keyFunc = bindCallable(options.keyFunc, { maxArity: 1, label: "Cacher key function" });
    this.validator = options.valueValidator
      ? bindCallable(options.valueValidator, { maxArity: 1, label: "Cacher value validator" })
      : undefined;
    this.keyPrefix = parsed.keyPrefix ?? "";
    this.expirationMs = parsed.expirationMs;
    this.store = store ?? options.store;
  }

  protected async evaluate(context: Context): Promise<Result> {
    const store = this.store ?? getDefaults().keyValueStore;
    if (!store) {
      throw new TreeProgrammingError(`${this.kind} node ${this.fullname} has no key-value store configured`);
    }
    const key = deriveCacheKey(this.keyPrefix, this.resolveString(this.keyFunc, context, "key"));
    const validator = this.validator ? this.resolveString(this.validator, context, "validator") : null;
    context.tracer.setAttribute("cache_key", key);

    const lookup = await this.lookup(context, store, key, validator);
    if (lookup.kind === "hit") {
      context.tracer.setAttribute("cache", "hit");
      return Result.OK(lookup.data);
    }
    context.tracer.setAttribute("cache", "miss");

    const result = await this.child.execute(context);
    if (result.isOk()) {
      const expirationMs = this.expirationMs ?? getDefaults().settings.cacheExpirationMs;
      try {
        await context.guard(store.set(key, encodeCacheEntry(result.data, validator), expirationMs));
      } catch (error) {
        if (isCancellationError(error)) {
          throw error;
        }
        context.logger.warn("cache_write_failed", { node: this.fullname, key, error: describeError(error) });
      }
    }
    return result;
  }

  private async lookup(context: Context, store: KeyValueStore, key: string, validator: string | null): Promise<CacheLookup> {
    let raw: string | null;
    try {
      raw = await context.guard(store.get(key));
    } catch (error) {
      if (isCancellationError(error)) {
        throw error;
      }
      context.logger.warn("cache_read_failed", { node: this.fullname, key, error: describeError(error) });
      return { kind: "miss", reason: "absent" };
    }
    return matchCacheEntry(raw, validator);
  }

  private resolveString(callable: BoundCallable<B>, context: Context, what: string): string {
    const value = callable.invoke(context.board<B>(), context.tracer);
    if (typeof value !== "string") {
      throw new TreeProgrammingError(`${this.kind} node ${this.fullname} ${what} function must return a string`);
    }
    return value;
  }
}

export interface RedisCacherOptions<B> extends Omit<CacherOptions<B>, "store"> {
  /** Connection the cache entries are read from and written to. */
  redisClient: RedisCommandClient;
}

/** {@link CacherNode} bound to a Redis connection. */
export class RedisCacherNode<B> extends CacherNode<B> {
  override readonly kind: string = "RedisCacher";

  constructor(options: RedisCacherOptions<B>) {
    super(options, new RedisKeyValueStore(options.redisClient));
  }
}
