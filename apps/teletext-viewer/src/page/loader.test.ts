import { describe, expect, it } from 'vitest';
import { ViewerError } from '../lib/errors.js';
import { createPageId } from '../protocol/pageId.js';
import type { PageId } from '../protocol/types.js';
import type { PageTransport } from '../transport/pageTransport.js';
import { createPageLoader } from './loader.js';

function transportFor(html: string): PageTransport {
  return {
    async fetchPage(_id: PageId) {
      return new TextEncoder().encode(html);
    },
  };
}

describe('createPageLoader', () => {
  it('fetches, decodes and lays out a page', async () => {
    const html = [
      '<big>Index</big>',
      '<pre>\n<font color="yellow">Teletext</font>\nNews 102</pre>',
      '<p><a href="?P=100_0001">1</a> <a href="?P=100_0002">2</a></p>',
    ].join('');
    const loadPage = createPageLoader({ transport: transportFor(html), layout: { rows: 3, cols: 10 }, now: () => 42 });

    const page = await loadPage(createPageId(100));

    expect(page.title).toBe('Index');
    expect(page.subpageCount).toBe(2);
    expect(page.fetchedAt).toBe(42);
    expect(page.grid[0].map((cell) => cell.char).join('')).toBe('Teletext  ');
    expect(page.grid[0][0].fg).toBe('yellow');
    expect(page.grid[1][0].fg).toBe('white');
    expect(page.links).toEqual([{ target: { number: 102, subpage: 1 }, row: 1, colStart: 5, colEnd: 8, explicit: false }]);
  });

  it('passes decoder failures through unchanged', async () => {
    const loadPage = createPageLoader({ transport: transportFor('<pre>broken'), layout: { rows: 3, cols: 10 } });

    await expect(loadPage(createPageId(100))).rejects.toBeInstanceOf(ViewerError);
    await expect(loadPage(createPageId(100))).rejects.toMatchObject({ code: 'malformed_encoding' });
  });
});
