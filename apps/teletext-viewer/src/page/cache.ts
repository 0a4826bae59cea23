import { silentLogger, type ViewerLogger } from '../lib/logger.js';
import { formatPageName, pageKey } from '../protocol/pageId.js';
import type { PageId } from '../protocol/types.js';
import { PromiseInFlightRegistry, type InFlightRegistry } from './inFlight.js';
import { LruPageStore, type PageStore } from './store.js';
import type { Page } from './types.js';

export type PageLoader = (id: PageId) => Promise<Page>;

export interface LoadOptions {
  bypassCache?: boolean;
}

interface PageCacheOptions {
  store?: PageStore;
  inFlight?: InFlightRegistry<Page>;
  logger?: ViewerLogger;
}

/**
 * Page cache in front of the fetch pipeline. At most one load per `PageId` runs
 * at a time; concurrent requests for the same id wait on the same promise.
 */
export class PageCache {
  private readonly store: PageStore;
  private readonly inFlight: InFlightRegistry<Page>;
  private readonly logger: ViewerLogger;

  constructor(options: PageCacheOptions = {}) {
    this.store = options.store ?? new LruPageStore();
    this.inFlight = options.inFlight ?? new PromiseInFlightRegistry<Page>();
    this.logger = options.logger ?? silentLogger;
  }

  get size(): number {
    return this.store.size;
  }

  get(id: PageId): Page | undefined {
    return this.store.get(id);
  }

  put(id: PageId, page: Page): void {
    this.store.put(id, page);
  }

  invalidate(id: PageId): void {
    this.store.invalidate(id);
  }

  peek(id: PageId): Page | undefined {
    return this.store.peek(id);
  }

  isLoading(id: PageId): boolean {
    return this.inFlight.has(pageKey(id));
  }

  load(id: PageId, loader: PageLoader, options: LoadOptions = {}): Promise<Page> {
    if (!options.bypassCache) {
      const cached = this.store.get(id);
      if (cached) {
        this.logger.debug('cache.hit', { page: formatPageName(id) });
        return Promise.resolve(cached);
      }
    }
    const key = pageKey(id);
    if (this.inFlight.has(key)) {
      this.logger.debug('cache.join_in_flight', { page: key });
    }
    return this.inFlight.run(key, async () => {
      this.logger.debug('cache.miss', { page: key, bypass: Boolean(options.bypassCache) });
      const page = await loader(id);
      this.store.put(id, page);
      return page;
    });
  }
}
