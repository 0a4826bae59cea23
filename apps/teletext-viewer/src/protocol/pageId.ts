import { ViewerError } from '../lib/errors.js';
import { MAX_PAGE_NUMBER, MIN_PAGE_NUMBER, type PageId } from './types.js';

const PAGE_NAME_PATTERN = /^(\d{3})_(\d{4})$/;
const PAGE_HREF_PATTERN = /P=(\d{3})_(\d{4})/;

export function isValidPageNumber(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_PAGE_NUMBER && value <= MAX_PAGE_NUMBER;
}

export function createPageId(number: number, subpage = 1): PageId {
  if (!isValidPageNumber(number)) {
    throw new ViewerError('invalid_page_id', `page number must be an integer in ${MIN_PAGE_NUMBER}..${MAX_PAGE_NUMBER}, got ${number}`);
  }
  if (!Number.isInteger(subpage) || subpage < 1) {
    throw new ViewerError('invalid_page_id', `subpage must be a positive integer, got ${subpage}`);
  }
  return Object.freeze({ number, subpage });
}

export function samePageId(a: PageId | null | undefined, b: PageId | null | undefined): boolean {
  if (!a || !b) {
    return false;
  }
  return a.number === b.number && a.subpage === b.subpage;
}

/** `100_0001` form used for cache keys and upstream URLs. */
export function formatPageName(id: PageId): string {
  return `${id.number}_${String(id.subpage).padStart(4, '0')}`;
}

export function pageKey(id: PageId): string {
  return formatPageName(id);
}

export function parsePageName(name: string): PageId {
  const match = PAGE_NAME_PATTERN.exec(name.trim());
  if (!match) {
    throw new ViewerError('invalid_page_id', `invalid page name: ${name}`);
  }
  return createPageId(Number.parseInt(match[1], 10), Number.parseInt(match[2], 10));
}

/** Reads a page reference out of an anchor href such as `?P=102_0001`; null when it is not one. */
export function parsePageHref(href: string): PageId | null {
  const match = PAGE_HREF_PATTERN.exec(href);
  if (!match) {
    return null;
  }
  const number = Number.parseInt(match[1], 10);
  const subpage = Number.parseInt(match[2], 10);
  if (!isValidPageNumber(number) || subpage < 1) {
    return null;
  }
  return createPageId(number, subpage);
}

export function formatPageLabel(id: PageId): string {
  return id.subpage === 1 ? `P${id.number}` : `P${id.number}/${id.subpage}`;
}
