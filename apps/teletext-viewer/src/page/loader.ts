import { decodeMarkup } from '../protocol/markup.js';
import type { PageTransport } from '../transport/pageTransport.js';
import type { PageLoader } from './cache.js';
import { parsePage } from './parser.js';
import type { GridLayout } from './types.js';

interface PageLoaderOptions {
  transport: PageTransport;
  layout: GridLayout;
  now?: () => number;
}

/** Transport → decoder → parser, with errors passed through unchanged. */
export function createPageLoader(options: PageLoaderOptions): PageLoader {
  const now = options.now ?? Date.now;
  return async (id) => {
    const raw = await options.transport.fetchPage(id);
    const stream = decodeMarkup(raw, { pageNumber: id.number });
    return parsePage(stream, id, options.layout, now());
  };
}
