import { isValidPageNumber } from '../protocol/pageId.js';

export interface PageReference {
  number: number;
  start: number;
  end: number;
}

const REFERENCE_PATTERN = /\d+/g;

/**
 * Finds bare 3-digit page numbers in a row of text. A run of digits counts only
 * when it is exactly three long, so `1000` or `12` never match. Offsets index
 * code points (grid columns), not UTF-16 units.
 */
export function detectPageReferences(text: string): PageReference[] {
  const columns = Array.from(text);
  const joined = columns.map((char) => (char.length === 1 ? char : '\u0000')).join('');
  const references: PageReference[] = [];
  for (const match of joined.matchAll(REFERENCE_PATTERN)) {
    if (match[0].length !== 3 || match.index === undefined) {
      continue;
    }
    const number = Number.parseInt(match[0], 10);
    if (!isValidPageNumber(number)) {
      continue;
    }
    references.push({ number, start: match.index, end: match.index + 3 });
  }
  return references;
}
