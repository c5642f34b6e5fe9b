import type { KeyValueStore } from "./keyValueStore.js";

/**
 * Subset of Redis commands used by the engine, in the argument order of the
 * Redis protocol (`SET key value PX ttl`, `DEL key`, `EXISTS key`).
 */
export interface RedisCommandClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ...expiry: [] | ["PX", number]): Promise<unknown>;
  del(key: string): Promise<number>;
  exists(key: string): Promise<number>;
}

/** {@link KeyValueStore} backed by a Redis connection owned by the caller. */
export class RedisKeyValueStore implements KeyValueStore {
  constructor(
    private readonly client: RedisCommandClient,
    private readonly keyPrefix = "",
  ) {}

  async get(key: string): Promise<string | null> {
    return this.client.get(this.keyPrefix + key);
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    if (ttlMs !== undefined && ttlMs > 0) {
      await this.client.set(this.keyPrefix + key, value, "PX", Math.floor(ttlMs));
      return;
    }
    await this.client.set(this.keyPrefix + key, value);
  }

  async delete(key: string): Promise<boolean> {
    return (await this.client.del(this.keyPrefix + key)) > 0;
  }

  async exists(key: string): Promise<boolean> {
    return (await this.client.exists(this.keyPrefix + key)) > 0;
  }
}
