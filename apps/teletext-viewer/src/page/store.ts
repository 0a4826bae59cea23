import { pageKey } from '../protocol/pageId.js';
import type { PageId } from '../protocol/types.js';
import type { Page } from './types.js';

export const DEFAULT_CACHE_TTL_SECONDS = 300;
export const DEFAULT_MAX_CACHED_PAGES = 128;

export interface CacheEntry {
  readonly page: Page;
  readonly expiresAt: number;
}

/** Keyed page storage with expiry; what the cache needs from its backing map. */
export interface PageStore {
  get(id: PageId): Page | undefined;
  put(id: PageId, page: Page): void;
  invalidate(id: PageId): void;
  /** The stored page even when it has expired or been invalidated. */
  peek(id: PageId): Page | undefined;
  readonly size: number;
}

export interface LruPageStoreOptions {
  ttlSeconds?: number;
  maxEntries?: number;
  now?: () => number;
}

/**
 * Map-backed store. Map insertion order doubles as recency order: a read moves
 * the entry to the back, eviction drops from the front.
 */
export class LruPageStore implements PageStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: LruPageStoreOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS) * 1000;
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_CACHED_PAGES);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(id: PageId): Page | undefined {
    const key = pageKey(id);
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    this.touch(key, entry);
    if (this.now() >= entry.expiresAt) {
      return undefined;
    }
    return entry.page;
  }

  put(id: PageId, page: Page): void {
    const key = pageKey(id);
    this.entries.delete(key);
    this.entries.set(key, { page, expiresAt: this.now() + this.ttlMs });
    this.evict();
  }

  invalidate(id: PageId): void {
    const key = pageKey(id);
    const entry = this.entries.get(key);
    if (!entry) {
      return;
    }
    this.entries.set(key, { page: entry.page, expiresAt: Number.NEGATIVE_INFINITY });
  }

  peek(id: PageId): Page | undefined {
    return this.entries.get(pageKey(id))?.page;
  }

  private touch(key: string, entry: CacheEntry): void {
    this.entries.delete(key);
    this.entries.set(key, entry);
  }

  private evict(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        return;
      }
      this.entries.delete(oldest.value);
    }
  }
}
