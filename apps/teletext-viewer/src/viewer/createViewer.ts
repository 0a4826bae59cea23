import { resolveViewerConfig, type ViewerConfig } from '../lib/config.js';
import { createConsoleLogger, type ViewerLogger } from '../lib/logger.js';
import { NavigationController } from '../navigation/controller.js';
import { PageCache } from '../page/cache.js';
import { createPageLoader } from '../page/loader.js';
import { LruPageStore } from '../page/store.js';
import { HttpPageTransport, type FetchFn, type PageTransport } from '../transport/pageTransport.js';

export interface ViewerOptions {
  config?: Partial<ViewerConfig>;
  /** Replaces the HTTP transport entirely, e.g. for a bundled page source. */
  transport?: PageTransport;
  fetch?: FetchFn;
  logger?: ViewerLogger;
  now?: () => number;
}

export interface Viewer {
  readonly config: ViewerConfig;
  readonly controller: NavigationController;
  readonly cache: PageCache;
}

export function createViewer(options: ViewerOptions = {}): Viewer {
  const config = resolveViewerConfig(options.config);
  const logger = options.logger ?? createConsoleLogger('viewer');
  const now = options.now ?? Date.now;
  const transport =
    options.transport ??
    new HttpPageTransport({
      urlTemplate: config.pageUrlTemplate,
      timeoutMs: config.requestTimeoutMs,
      retryCount: config.retryCount,
      fetch: options.fetch,
      logger,
    });
  const cache = new PageCache({
    store: new LruPageStore({ ttlSeconds: config.cacheTtlSeconds, maxEntries: config.maxCachedPages, now }),
    logger,
  });
  const controller = new NavigationController({
    cache,
    loadPage: createPageLoader({ transport, layout: { rows: config.rows, cols: config.cols }, now }),
    homePage: config.homePage,
    refreshIntervalSeconds: config.refreshIntervalSeconds,
    logger,
  });
  return { config, controller, cache };
}
