/**
 * Minimal key/value capability consumed by the Cacher decorator and by the
 * Terminable signal check. Values are strings so any remote store can hold
 * them verbatim.
 */
export interface KeyValueStore {
  /** Resolves with the stored value, or `null` when absent or expired. */
  get(key: string): Promise<string | null>;
  /** Stores {@link value}; a positive {@link ttlMs} makes the entry expire. */
  set(key: string, value: string, ttlMs?: number): Promise<void>;
  /** Removes the key. Resolves with `true` when an entry was deleted. */
  delete(key: string): Promise<boolean>;
  exists(key: string): Promise<boolean>;
}

export interface InMemoryKeyValueStoreOptions {
  /** Clock used for TTL computations. Defaults to {@link Date.now}. */
  now?: () => number;
}

interface StoredEntry {
  value: string;
  expiresAt: number | null;
}

/**
 * Process-local store with lazy TTL eviction. Used as a default store and as
 * the in-process stand-in for remote stores in tests.
 */
export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, StoredEntry>();
  private readonly now: () => number;

  constructor(options: InMemoryKeyValueStoreOptions = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  async get(key: string): Promise<string | null> {
    return this.read(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    const expiresAt = ttlMs !== undefined && ttlMs > 0 ? this.now() + Math.floor(ttlMs) : null;
    this.entries.set(key, { value, expiresAt });
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.read(key) !== undefined;
    this.entries.delete(key);
    return existed;
  }

  async exists(key: string): Promise<boolean> {
    return this.read(key) !== undefined;
  }

  /** Number of live entries, after evicting expired ones. */
  size(): number {
    for (const key of [...this.entries.keys()]) {
      this.read(key);
    }
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private read(key: string): StoredEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
