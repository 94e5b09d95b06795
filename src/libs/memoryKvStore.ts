import type { KVStore } from "../types/kv";

interface Entry {
  value: string;
  expiresAt: number | null; // Unix timestamp (ms)
}

/**
 * インメモリ KV ストア
 * 期限切れのエントリは参照時に削除する
 */
export class MemoryKVStore implements KVStore {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (entry.expiresAt !== null && this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }

    return entry.value;
  }

  async put(
    key: string,
    value: string,
    options: { expirationTtl?: number } = {}
  ): Promise<void> {
    const expiresAt =
      options.expirationTtl === undefined
        ? null
        : this.now() + options.expirationTtl * 1000;

    this.entries.set(key, { value, expiresAt });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }
}
