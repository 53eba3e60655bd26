// src/common/memoryCache.ts
export type MemoryCacheOptions = {
  defaultTtlMs?: number;
  maxEntries?: number;
};

type Entry<V> = {
  value: V;
  expiresAt: number;
};

/**
 * 프로세스 안 TTL 캐시 (Map 삽입 순서로 오래된 것부터 밀어냄)
 */
export class MemoryCache<V> {
  private readonly store = new Map<string, Entry<V>>();

  private readonly defaultTtlMs: number;
  private readonly maxEntries: number;

  constructor(opts?: MemoryCacheOptions) {
    this.defaultTtlMs = opts?.defaultTtlMs ?? 1000 * 60 * 10; // 10분
    this.maxEntries = opts?.maxEntries ?? 2_000;
  }

  private now(): number {
    return Date.now();
  }

  private cleanupExpired(): void {
    const t = this.now();
    for (const [k, v] of this.store.entries()) {
      if (v.expiresAt <= t) this.store.delete(k);
    }
  }

  private ensureCapacity(): void {
    if (this.store.size <= this.maxEntries) return;

    const over = this.store.size - this.maxEntries;
    let i = 0;

    for (const k of this.store.keys()) {
      this.store.delete(k);
      i += 1;
      if (i >= over) break;
    }
  }

  get(key: string): V | undefined {
    const e = this.store.get(key);
    if (!e) return undefined;

    if (e.expiresAt <= this.now()) {
      this.store.delete(key);
      return undefined;
    }
    return e.value;
  }

  set(key: string, value: V, ttlMs?: number): void {
    this.cleanupExpired();

    // 같은 키를 다시 넣으면 가장 최근 항목이 되도록
    this.store.delete(key);
    this.store.set(key, {
      value,
      expiresAt: this.now() + Math.max(1, ttlMs ?? this.defaultTtlMs),
    });

    this.ensureCapacity();
  }
}
