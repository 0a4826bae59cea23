import type { ViewerError } from '../lib/errors.js';
import { samePageId } from '../protocol/pageId.js';
import type { PageId } from '../protocol/types.js';
import type { Page } from '../page/types.js';
import { EMPTY_HISTORY, moveCursor, pushHistory, type HistoryStack } from './history.js';

/**
 * How a completed load changes history: `push` records a visit, `back` and
 * `forward` move the cursor, `subpage` and `refresh` leave history alone.
 */
export type NavigationMode = 'push' | 'back' | 'forward' | 'subpage' | 'refresh';

export type ViewStatus =
  | {
      kind: 'idle';
    }
  | {
      kind: 'loading';
      target: PageId;
    }
  | {
      kind: 'displaying';
      page: Page;
    }
  | {
      kind: 'failed';
      target: PageId;
      mode: NavigationMode;
      error: ViewerError;
    };

export interface PendingNavigation {
  readonly requestId: number;
  readonly target: PageId;
  readonly mode: NavigationMode;
}

export interface NavigationState {
  readonly status: ViewStatus;
  readonly current: PageId | null;
  readonly history: HistoryStack;
  readonly pending: PendingNavigation | null;
}

export type NavigationEvent =
  | {
      type: 'navigate';
      requestId: number;
      target: PageId;
      mode: NavigationMode;
    }
  | {
      type: 'fetch_succeeded';
      requestId: number;
      target: PageId;
      page: Page;
    }
  | {
      type: 'fetch_failed';
      requestId: number;
      target: PageId;
      error: ViewerError;
    };

export const INITIAL_NAVIGATION_STATE: NavigationState = Object.freeze({
  status: Object.freeze({ kind: 'idle' }),
  current: null,
  history: EMPTY_HISTORY,
  pending: null,
});

/** A completion applies only to the navigation that is still pending. */
export function isCurrentRequest(state: NavigationState, requestId: number, target: PageId): boolean {
  return state.pending !== null && state.pending.requestId === requestId && samePageId(state.pending.target, target);
}

export function reduceNavigation(state: NavigationState, event: NavigationEvent): NavigationState {
  switch (event.type) {
    case 'navigate':
      return {
        ...state,
        status: { kind: 'loading', target: event.target },
        pending: { requestId: event.requestId, target: event.target, mode: event.mode },
      };
    case 'fetch_succeeded': {
      if (!state.pending || !isCurrentRequest(state, event.requestId, event.target)) {
        return state;
      }
      return {
        status: { kind: 'displaying', page: event.page },
        current: event.target,
        history: applyMode(state.history, state.pending.mode, event.target),
        pending: null,
      };
    }
    case 'fetch_failed': {
      if (!state.pending || !isCurrentRequest(state, event.requestId, event.target)) {
        return state;
      }
      return {
        ...state,
        status: { kind: 'failed', target: event.target, mode: state.pending.mode, error: event.error },
        pending: null,
      };
    }
    default:
      return state;
  }
}

function applyMode(history: HistoryStack, mode: NavigationMode, target: PageId): HistoryStack {
  switch (mode) {
    case 'push':
      return pushHistory(history, target);
    case 'back':
      return moveCursor(history, -1);
    case 'forward':
      return moveCursor(history, 1);
    case 'subpage':
    case 'refresh':
      return history;
    default:
      return history;
  }
}
