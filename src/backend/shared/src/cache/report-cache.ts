/**
 * Report Cache
 *
 * Injected cache for comparison results, keyed by a hash of the evaluation
 * inputs. Entries expire by TTL and can be invalidated by key, by prefix or
 * all at once; bumping the cache version orphans every older entry. Writes
 * drop expired entries and evict the oldest ones beyond `maxEntries`.
 */

import { createHash } from 'node:crypto';

/**
 * Cache configuration options
 */
export interface ReportCacheConfig {
  /** Default TTL in seconds; 0 disables expiry */
  defaultTtlSeconds: number;
  /** Entries written under another version are treated as misses */
  version: string;
  /** Enable cache (can be disabled for testing) */
  enabled: boolean;
  /** Upper bound on stored entries; 0 means unbounded */
  maxEntries: number;
}

export const DEFAULT_REPORT_CACHE_CONFIG: ReportCacheConfig = {
  defaultTtlSeconds: 900,
  version: '1',
  enabled: true,
  maxEntries: 1000,
};

/**
 * Cache key prefixes
 */
export const CACHE_KEY_PREFIX = {
  EVALUATION: 'evaluation:',
} as const;

/**
 * Cache entry with metadata
 */
export interface CacheEntry<T> {
  data: T;
  cachedAt: Date;
  expiresAt: Date | null;
  version: string;
}

/**
 * Cache collaborator contract consumed by the evaluation service
 */
export interface ReportCache<T> {
  get(key: string): Promise<T | null>;
  set(key: string, value: T, ttlSeconds?: number): Promise<void>;
  invalidate(key: string): Promise<boolean>;
  invalidatePrefix(prefix: string): Promise<number>;
  invalidateAll(): Promise<void>;
  size(): Promise<number>;
}

/**
 * Serializes a value with object keys sorted, so equal inputs hash equally
 * regardless of property insertion order
 */
export function canonicalJson(value: unknown): string {
  if (value === undefined) {
    return 'null';
  }

  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);

  return `{${entries.join(',')}}`;
}

/**
 * Builds a cache key from the canonical hash of the given inputs
 */
export function computeCacheKey(prefix: string, inputs: unknown): string {
  const digest = createHash('sha256').update(canonicalJson(inputs)).digest('hex');
  return `${prefix}${digest}`;
}

/**
 * In-memory cache; values are held by reference, so callers store frozen data
 */
export class InMemoryReportCache<T> implements ReportCache<T> {
  private entries: Map<string, CacheEntry<T>> = new Map();
  private config: ReportCacheConfig;
  private now: () => number;

  constructor(config: Partial<ReportCacheConfig> = {}, now: () => number = Date.now) {
    this.config = { ...DEFAULT_REPORT_CACHE_CONFIG, ...config };
    this.now = now;
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  async get(key: string): Promise<T | null> {
    if (!this.config.enabled) return null;

    const entry = this.entries.get(key);
    if (!entry) return null;

    if (!this.isLive(entry, this.now())) {
      this.entries.delete(key);
      return null;
    }

    return entry.data;
  }

  async set(key: string, value: T, ttlSeconds?: number): Promise<void> {
    if (!this.config.enabled) return;

    const ttl = ttlSeconds ?? this.config.defaultTtlSeconds;
    const cachedAt = this.now();

    this.sweep(cachedAt);
    // Re-inserting moves the key to the end of the eviction order
    this.entries.delete(key);
    this.evictOldest(this.config.maxEntries - 1);

    this.entries.set(key, {
      data: value,
      cachedAt: new Date(cachedAt),
      expiresAt: ttl > 0 ? new Date(cachedAt + ttl * 1000) : null,
      version: this.config.version,
    });
  }

  private isLive(entry: CacheEntry<T>, at: number): boolean {
    if (entry.version !== this.config.version) return false;
    return !entry.expiresAt || at <= entry.expiresAt.getTime();
  }

  private sweep(at: number): void {
    for (const [key, entry] of this.entries) {
      if (!this.isLive(entry, at)) {
        this.entries.delete(key);
      }
    }
  }

  private evictOldest(limit: number): void {
    if (this.config.maxEntries <= 0) return;

    for (const key of this.entries.keys()) {
      if (this.entries.size <= limit) return;
      this.entries.delete(key);
    }
  }

  async invalidate(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async invalidatePrefix(prefix: string): Promise<number> {
    let count = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        count++;
      }
    }
    return count;
  }

  async invalidateAll(): Promise<void> {
    this.entries.clear();
  }

  /**
   * Changes the cache version; entries written under the old one become misses
   */
  setVersion(version: string): void {
    this.config = { ...this.config, version };
  }

  async size(): Promise<number> {
    return this.entries.size;
  }
}
