import { ViewerError } from '../lib/errors.js';
import { createPageId, formatPageName } from '../protocol/pageId.js';
import { DEFAULT_STYLE, type CellStyle, type DecodedStream, type HeaderLink, type PageId } from '../protocol/types.js';
import { detectPageReferences } from './links.js';
import type { Cell, GridLayout, Link, Page, PageNavigation } from './types.js';

const BLANK_CELL: Cell = Object.freeze({ char: ' ', ...DEFAULT_STYLE });

interface OpenLink {
  target: PageId;
  row: number;
  colStart: number;
}

/**
 * Lays a decoded stream out on a fixed rows×cols grid.
 *
 * Text wraps lazily: a full row only moves the cursor down when another
 * character arrives, so a line break right after a full row does not leave an
 * empty row behind. Content that needs a row past the grid is rejected.
 */
export function parsePage(stream: DecodedStream, id: PageId, layout: GridLayout, fetchedAt = Date.now()): Page {
  const { rows, cols } = layout;
  if (!stream.tokens.some((token) => token.type === 'text')) {
    throw new ViewerError('no_content', `page ${formatPageName(id)} has no text`);
  }

  const grid: Cell[][] = Array.from({ length: rows }, () => new Array<Cell>(cols).fill(BLANK_CELL));
  const explicitLinks: Link[] = [];
  let style: CellStyle = DEFAULT_STYLE;
  let row = 0;
  let col = 0;
  let openLink: OpenLink | null = null;

  const closeLinkSegment = () => {
    if (openLink && openLink.row === row && col > openLink.colStart) {
      explicitLinks.push({ target: openLink.target, row, colStart: openLink.colStart, colEnd: col, explicit: true });
    }
  };

  const nextRow = () => {
    closeLinkSegment();
    row += 1;
    col = 0;
    if (openLink) {
      openLink = { target: openLink.target, row, colStart: 0 };
    }
  };

  const writeChar = (char: string) => {
    if (col >= cols) {
      nextRow();
    }
    if (row >= rows) {
      throw new ViewerError('layout_overflow', `page ${formatPageName(id)} needs more than ${rows} rows`);
    }
    grid[row][col] = Object.freeze({ char: char === '\t' ? ' ' : char, fg: style.fg, bg: style.bg, flags: style.flags });
    col += 1;
  };

  for (const token of stream.tokens) {
    switch (token.type) {
      case 'text':
        for (const char of token.text) {
          writeChar(char);
        }
        break;
      case 'line_break':
        nextRow();
        break;
      case 'style':
        style = token.style;
        break;
      case 'link_start':
        closeLinkSegment();
        openLink = { target: token.target, row, colStart: col };
        break;
      case 'link_end':
        closeLinkSegment();
        openLink = null;
        break;
      default:
        break;
    }
  }
  closeLinkSegment();

  const links = [...explicitLinks, ...findImplicitLinks(grid, explicitLinks)].sort(
    (a, b) => a.row - b.row || a.colStart - b.colStart,
  );

  return Object.freeze({
    id,
    title: stream.header.title,
    rows,
    cols,
    grid: Object.freeze(grid.map((cells) => Object.freeze(cells))),
    subpageCount: Math.max(1, stream.header.subpageCount ?? 1),
    links: Object.freeze(links.map((link) => Object.freeze(link))),
    navigation: Object.freeze(deriveNavigation(id, stream.header.navigation)),
    sections: Object.freeze(stream.header.sections.map((section) => Object.freeze({ ...section }))),
    fetchedAt,
  });
}

function findImplicitLinks(grid: Cell[][], explicitLinks: Link[]): Link[] {
  const links: Link[] = [];
  grid.forEach((cells, row) => {
    const text = cells.map((cell) => cell.char).join('');
    for (const reference of detectPageReferences(text)) {
      const overlaps = explicitLinks.some(
        (link) => link.row === row && link.colStart < reference.end && reference.start < link.colEnd,
      );
      if (overlaps) {
        continue;
      }
      links.push({
        target: createPageId(reference.number, 1),
        row,
        colStart: reference.start,
        colEnd: reference.end,
        explicit: false,
      });
    }
  });
  return links;
}

function deriveNavigation(id: PageId, items: HeaderLink[]): PageNavigation {
  let previousPage: PageId | null = null;
  let nextPage: PageId | null = null;
  let previousSubpage: PageId | null = null;
  let nextSubpage: PageId | null = null;

  for (const { target } of items) {
    if (target.number < id.number) {
      if (!previousPage || target.number > previousPage.number) {
        previousPage = target;
      }
    } else if (target.number > id.number) {
      if (!nextPage || target.number < nextPage.number) {
        nextPage = target;
      }
    } else if (target.subpage < id.subpage) {
      if (!previousSubpage || target.subpage > previousSubpage.subpage) {
        previousSubpage = target;
      }
    } else if (target.subpage > id.subpage) {
      if (!nextSubpage || target.subpage < nextSubpage.subpage) {
        nextSubpage = target;
      }
    }
  }

  return { previousPage, nextPage, previousSubpage, nextSubpage };
}
