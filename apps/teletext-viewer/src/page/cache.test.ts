import { describe, expect, it, vi } from 'vitest';
import { ViewerError } from '../lib/errors.js';
import { createPageId } from '../protocol/pageId.js';
import type { PageId } from '../protocol/types.js';
import { PageCache, type PageLoader } from './cache.js';
import { parsePage } from './parser.js';
import { LruPageStore } from './store.js';
import type { Page } from './types.js';

function makePage(id: PageId, text = 'x'): Page {
  return parsePage(
    { header: { title: null, navigation: [], subpageCount: null, sections: [] }, tokens: [{ type: 'text', text }] },
    id,
    { rows: 1, cols: 4 },
  );
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (reason: unknown) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const PAGE_100 = createPageId(100);

describe('PageCache', () => {
  it('loads a missing page once and serves it from the store afterwards', async () => {
    const cache = new PageCache();
    const loader = vi.fn<PageLoader>(async (id) => makePage(id));

    const first = await cache.load(PAGE_100, loader);
    const second = await cache.load(PAGE_100, loader);

    expect(second).toBe(first);
    expect(loader).toHaveBeenCalledTimes(1);
    expect(cache.get(PAGE_100)).toBe(first);
  });

  it('runs at most one load per page for concurrent requests', async () => {
    const cache = new PageCache();
    const pending = deferred<Page>();
    const loader = vi.fn<PageLoader>(() => pending.promise);

    const first = cache.load(PAGE_100, loader);
    const second = cache.load(PAGE_100, loader);
    expect(cache.isLoading(PAGE_100)).toBe(true);

    const page = makePage(PAGE_100);
    pending.resolve(page);

    await expect(first).resolves.toBe(page);
    await expect(second).resolves.toBe(page);
    expect(loader).toHaveBeenCalledTimes(1);
    expect(cache.isLoading(PAGE_100)).toBe(false);
  });

  it('loads different pages concurrently', async () => {
    const cache = new PageCache();
    const loader = vi.fn<PageLoader>(async (id) => makePage(id));

    await Promise.all([cache.load(PAGE_100, loader), cache.load(createPageId(200), loader)]);

    expect(loader).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(2);
  });

  it('bypasses a fresh entry on request and stores the new page', async () => {
    const cache = new PageCache();
    const stale = makePage(PAGE_100, 'old');
    cache.put(PAGE_100, stale);
    const loader = vi.fn<PageLoader>(async (id) => makePage(id, 'new'));

    const page = await cache.load(PAGE_100, loader, { bypassCache: true });

    expect(loader).toHaveBeenCalledTimes(1);
    expect(page.grid[0][0].char).toBe('n');
    expect(cache.get(PAGE_100)).toBe(page);
  });

  it('does not cache failures', async () => {
    const cache = new PageCache();
    const loader = vi
      .fn<PageLoader>()
      .mockRejectedValueOnce(new ViewerError('server_error', 'busy', { status: 503 }))
      .mockImplementationOnce(async (id) => makePage(id));

    await expect(cache.load(PAGE_100, loader)).rejects.toMatchObject({ code: 'server_error' });
    expect(cache.peek(PAGE_100)).toBeUndefined();
    await expect(cache.load(PAGE_100, loader)).resolves.toMatchObject({ id: PAGE_100 });
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('reloads a page whose entry expired', async () => {
    let now = 0;
    const cache = new PageCache({ store: new LruPageStore({ ttlSeconds: 60, now: () => now }) });
    const loader = vi.fn<PageLoader>(async (id) => makePage(id));

    await cache.load(PAGE_100, loader);
    now = 59_000;
    await cache.load(PAGE_100, loader);
    expect(loader).toHaveBeenCalledTimes(1);

    now = 60_000;
    await cache.load(PAGE_100, loader);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('keeps an invalidated page visible to peek', async () => {
    const cache = new PageCache();
    const page = makePage(PAGE_100);
    cache.put(PAGE_100, page);
    cache.invalidate(PAGE_100);

    expect(cache.get(PAGE_100)).toBeUndefined();
    expect(cache.peek(PAGE_100)).toBe(page);
  });
});
