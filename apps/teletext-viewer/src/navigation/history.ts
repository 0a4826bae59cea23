import { samePageId } from '../protocol/pageId.js';
import type { PageId } from '../protocol/types.js';

export const EMPTY_CURSOR = -1;

/** Visited pages; `entries[cursor]` is the current one, `-1` means nothing visited yet. */
export interface HistoryStack {
  readonly entries: ReadonlyArray<PageId>;
  readonly cursor: number;
}

export const EMPTY_HISTORY: HistoryStack = Object.freeze({ entries: Object.freeze([]), cursor: EMPTY_CURSOR });

export function historyCurrent(history: HistoryStack): PageId | null {
  return history.cursor === EMPTY_CURSOR ? null : history.entries[history.cursor];
}

/** Drops forward entries and appends `id`, unless `id` is already the entry at the cursor. */
export function pushHistory(history: HistoryStack, id: PageId): HistoryStack {
  const kept = history.entries.slice(0, history.cursor + 1);
  if (samePageId(kept[kept.length - 1], id)) {
    return kept.length === history.entries.length ? history : freeze(kept, history.cursor);
  }
  return freeze([...kept, id], kept.length);
}

export function peekBack(history: HistoryStack): PageId | null {
  return history.cursor > 0 ? history.entries[history.cursor - 1] : null;
}

export function peekForward(history: HistoryStack): PageId | null {
  const next = history.cursor + 1;
  return history.cursor !== EMPTY_CURSOR && next < history.entries.length ? history.entries[next] : null;
}

export function moveCursor(history: HistoryStack, delta: -1 | 1): HistoryStack {
  const cursor = history.cursor + delta;
  if (history.cursor === EMPTY_CURSOR || cursor < 0 || cursor >= history.entries.length) {
    return history;
  }
  return freeze([...history.entries], cursor);
}

function freeze(entries: PageId[], cursor: number): HistoryStack {
  return Object.freeze({ entries: Object.freeze(entries), cursor });
}
