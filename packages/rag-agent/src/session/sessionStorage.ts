/**
 * Key-value storage behind the session manager. Values are serialised
 * session JSON; each write carries its own TTL.
 */
export interface SessionStorage {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

interface StoredEntry {
  value: string;
  expiresAt: number;
}

export interface InMemorySessionStorageOptions {
  /** Epoch milliseconds; defaults to Date.now */
  now?: () => number;
}

/**
 * Process-local storage for tests and single-instance deployments. Expired
 * entries are dropped lazily when read.
 */
export class InMemorySessionStorage implements SessionStorage {
  private entries = new Map<string, StoredEntry>();
  private readonly now: () => number;

  constructor(options: InMemorySessionStorageOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
