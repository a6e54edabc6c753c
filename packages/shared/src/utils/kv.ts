// ABOUTME: Minimal key/value store contract used for caching service responses.
// ABOUTME: MemoryKV keeps entries for the process lifetime; @albumsmith/db persists them.

export interface KVPutOptions {
  /** Seconds until the entry expires */
  expirationTtl?: number;
}

export interface KVStore {
  get(key: string): Promise<string | null>;
  get(key: string, type: 'json'): Promise<unknown>;
  put(key: string, value: string, options?: KVPutOptions): Promise<void>;
  delete(key: string): Promise<void>;
  list(prefix?: string): Promise<string[]>;
}

interface MemoryEntry {
  value: string;
  expiresAt: number | null;
}

export class MemoryKV implements KVStore {
  private store = new Map<string, MemoryEntry>();

  constructor(private now: () => number = Date.now) {}

  get(key: string): Promise<string | null>;
  get(key: string, type: 'json'): Promise<unknown>;
  async get(key: string, type?: 'json'): Promise<unknown> {
    const entry = this.read(key);
    if (!entry) return null;
    return type === 'json' ? JSON.parse(entry.value) : entry.value;
  }

  async put(key: string, value: string, options: KVPutOptions = {}): Promise<void> {
    const expiresAt =
      options.expirationTtl !== undefined ? this.now() + options.expirationTtl * 1000 : null;
    this.store.set(key, { value, expiresAt });
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  async list(prefix = ''): Promise<string[]> {
    return [...this.store.keys()].filter((key) => key.startsWith(prefix) && this.read(key));
  }

  private read(key: string): MemoryEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.store.delete(key);
      return null;
    }
    return entry;
  }
}
