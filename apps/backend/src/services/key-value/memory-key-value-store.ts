import type { IKeyValueStore } from '@tubepulse/types';

interface MemoryEntry {
  value: string;
  /** Epoch ms after which the entry is gone; undefined never expires. */
  expiresAt?: number;
}

/**
 * In-process key-value store.
 *
 * Used when no Redis URL is configured and by the test suite. Every operation
 * completes synchronously inside its promise, so a read-modify-write such as
 * `incrBy` cannot interleave with another call on the same key.
 */
export class MemoryKeyValueStore implements IKeyValueStore {
  private readonly entries = new Map<string, MemoryEntry>();

  /**
   * @param clock - Time source in epoch ms, injectable for tests
   */
  constructor(private readonly clock: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    return this.read(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    this.entries.set(key, {
      value,
      expiresAt: ttlMs !== undefined ? this.clock() + ttlMs : undefined
    });
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.read(key)) {
      return false;
    }
    this.entries.set(key, { value, expiresAt: this.clock() + ttlMs });
    return true;
  }

  async del(key: string): Promise<number> {
    const existed = this.read(key) !== null;
    this.entries.delete(key);
    return existed ? 1 : 0;
  }

  async incrBy(key: string, amount: number, ttlMs?: number): Promise<number> {
    const entry = this.read(key);
    const current = entry ? Number.parseInt(entry.value, 10) : 0;
    if (Number.isNaN(current)) {
      throw new Error(`Value at ${key} is not an integer`);
    }

    const next = current + amount;
    const expiresAt = ttlMs !== undefined ? this.clock() + ttlMs : entry?.expiresAt;

    this.entries.set(key, { value: String(next), expiresAt });
    return next;
  }

  async sweep(): Promise<number> {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== undefined && entry.expiresAt <= now) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  /**
   * Live entry for a key, dropping it first when expired.
   */
  private read(key: string): MemoryEntry | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt !== undefined && entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }
}
