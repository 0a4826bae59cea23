import { ViewerError, describeError, toViewerError } from '../lib/errors.js';
import { silentLogger, type ViewerLogger } from '../lib/logger.js';
import { createPageId, formatPageName, isValidPageNumber, samePageId } from '../protocol/pageId.js';
import type { PageId } from '../protocol/types.js';
import type { PageCache, PageLoader } from '../page/cache.js';
import type { Link, Page } from '../page/types.js';
import { peekBack, peekForward } from './history.js';
import { PageNumberInput } from './pageNumberInput.js';
import {
  INITIAL_NAVIGATION_STATE,
  isCurrentRequest,
  reduceNavigation,
  type NavigationEvent,
  type NavigationMode,
  type NavigationState,
} from './state.js';

export const MIN_REFRESH_INTERVAL_SECONDS = 30;
export const MAX_REFRESH_INTERVAL_SECONDS = 1_800;

export type NavigationResult =
  | { type: 'displayed'; page: Page }
  | { type: 'failed'; error: ViewerError }
  | { type: 'superseded' }
  | { type: 'no_history' }
  | { type: 'unchanged'; page: Page | null };

export interface NavigationSnapshot extends NavigationState {
  /** Page number being typed, e.g. `P12-`. */
  readonly entry: string | null;
}

export interface NavigationControllerOptions {
  cache: PageCache;
  loadPage: PageLoader;
  homePage?: PageId;
  refreshIntervalSeconds?: number | null;
  logger?: ViewerLogger;
}

type CompletionEvent = Exclude<NavigationEvent, { type: 'navigate' }>;

interface ActiveLoad {
  requestId: number;
  target: PageId;
  mode: NavigationMode;
  promise: Promise<NavigationResult>;
}

/**
 * Owns the current page and history for one viewer. State only changes through
 * `reduceNavigation`; loads run through the cache and report back as events,
 * and a result that is no longer the pending navigation is dropped.
 *
 * Hosts read state with `getSnapshot`/`subscribe` (compatible with
 * `useSyncExternalStore`). Operations never reject.
 */
export class NavigationController {
  private readonly cache: PageCache;
  private readonly loadPage: PageLoader;
  private readonly homePage: PageId;
  private readonly logger: ViewerLogger;
  private readonly listeners = new Set<() => void>();
  private readonly input = new PageNumberInput();
  private state: NavigationState = INITIAL_NAVIGATION_STATE;
  private snapshotCache: NavigationSnapshot | null = null;
  private nextRequestId = 1;
  private active: ActiveLoad | null = null;
  private refreshTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: NavigationControllerOptions) {
    this.cache = options.cache;
    this.loadPage = options.loadPage;
    this.homePage = options.homePage ?? createPageId(100, 1);
    this.logger = options.logger ?? silentLogger;
    if (options.refreshIntervalSeconds) {
      this.setRefreshInterval(options.refreshIntervalSeconds);
    }
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  getSnapshot(): NavigationSnapshot {
    if (this.snapshotCache) {
      return this.snapshotCache;
    }
    const snapshot: NavigationSnapshot = { ...this.state, entry: this.input.display };
    this.snapshotCache = snapshot;
    return snapshot;
  }

  get displayedPage(): Page | null {
    return this.state.status.kind === 'displaying' ? this.state.status.page : null;
  }

  goto(id: PageId): Promise<NavigationResult> {
    let target: PageId;
    try {
      target = createPageId(id.number, id.subpage);
    } catch (error) {
      const failure = toViewerError(error);
      this.logger.warn('navigation.rejected', { error: describeError(failure) });
      return Promise.resolve({ type: 'failed', error: failure });
    }
    const displayed = this.displayedPage;
    if (displayed && samePageId(this.state.current, target)) {
      return Promise.resolve({ type: 'unchanged', page: displayed });
    }
    if (this.active && this.active.mode === 'push' && samePageId(this.active.target, target)) {
      return this.active.promise;
    }
    return this.navigate(target, 'push', false);
  }

  home(): Promise<NavigationResult> {
    return this.goto(this.homePage);
  }

  followLink(link: Link): Promise<NavigationResult> {
    return this.goto(link.target);
  }

  linkAt(row: number, col: number): Link | null {
    const page = this.displayedPage;
    if (!page) {
      return null;
    }
    return page.links.find((link) => link.row === row && col >= link.colStart && col < link.colEnd) ?? null;
  }

  back(): Promise<NavigationResult> {
    const target = peekBack(this.state.history);
    if (!target) {
      return Promise.resolve({ type: 'no_history' });
    }
    return this.navigate(target, 'back', false);
  }

  forward(): Promise<NavigationResult> {
    const target = peekForward(this.state.history);
    if (!target) {
      return Promise.resolve({ type: 'no_history' });
    }
    return this.navigate(target, 'forward', false);
  }

  nextSubpage(): Promise<NavigationResult> {
    return this.stepSubpage(1);
  }

  previousSubpage(): Promise<NavigationResult> {
    return this.stepSubpage(-1);
  }

  nextPage(): Promise<NavigationResult> {
    return this.stepPage(1);
  }

  previousPage(): Promise<NavigationResult> {
    return this.stepPage(-1);
  }

  /** Bypasses the cache; from a failed state it retries the failed navigation. */
  reload(): Promise<NavigationResult> {
    const { status, pending } = this.state;
    let target: PageId | null = null;
    let mode: NavigationMode = 'refresh';
    if (status.kind === 'displaying') {
      target = status.page.id;
    } else if (status.kind === 'failed') {
      target = status.target;
      mode = status.mode;
    } else if (pending) {
      target = pending.target;
      mode = pending.mode;
    }
    if (!target) {
      return Promise.resolve({ type: 'unchanged', page: null });
    }
    this.cache.invalidate(target);
    return this.navigate(target, mode, true);
  }

  enterDigit(digit: number): Promise<NavigationResult> {
    const result = this.input.pushDigit(digit);
    this.invalidate();
    this.notify();
    if (result.type === 'complete') {
      return this.goto(createPageId(result.number, 1));
    }
    return Promise.resolve({ type: 'unchanged', page: this.displayedPage });
  }

  clearEntry(): void {
    if (this.input.display === null) {
      return;
    }
    this.input.clear();
    this.invalidate();
    this.notify();
  }

  /** Periodically reloads the displayed page; `null`, `0` or a non-finite value stops it. */
  setRefreshInterval(seconds: number | null): void {
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
    }
    if (seconds === null || !Number.isFinite(seconds) || seconds <= 0) {
      return;
    }
    const clamped = Math.min(MAX_REFRESH_INTERVAL_SECONDS, Math.max(MIN_REFRESH_INTERVAL_SECONDS, seconds));
    this.refreshTimer = setInterval(() => {
      if (this.state.status.kind !== 'displaying') {
        return;
      }
      void this.reload();
    }, clamped * 1000);
    this.logger.debug('navigation.refresh_interval', { seconds: clamped });
  }

  dispose(): void {
    this.setRefreshInterval(null);
    this.listeners.clear();
    this.active = null;
  }

  private stepSubpage(delta: 1 | -1): Promise<NavigationResult> {
    const page = this.displayedPage;
    if (!page) {
      return Promise.resolve({ type: 'unchanged', page: null });
    }
    const count = page.subpageCount;
    const index = (((page.id.subpage - 1 + delta) % count) + count) % count;
    const subpage = index + 1;
    if (subpage === page.id.subpage) {
      return Promise.resolve({ type: 'unchanged', page });
    }
    return this.navigate(createPageId(page.id.number, subpage), 'subpage', false);
  }

  private stepPage(delta: 1 | -1): Promise<NavigationResult> {
    const page = this.displayedPage;
    if (!page) {
      return Promise.resolve({ type: 'unchanged', page: null });
    }
    const linked = delta > 0 ? page.navigation.nextPage : page.navigation.previousPage;
    const number = page.id.number + delta;
    const target = linked ?? (isValidPageNumber(number) ? createPageId(number, 1) : null);
    if (!target) {
      return Promise.resolve({ type: 'unchanged', page });
    }
    return this.goto(target);
  }

  private navigate(target: PageId, mode: NavigationMode, bypassCache: boolean): Promise<NavigationResult> {
    const requestId = this.nextRequestId++;
    this.dispatch({ type: 'navigate', requestId, target, mode });
    this.logger.info('navigation.start', { page: formatPageName(target), mode, requestId, bypassCache });
    const promise = this.run(requestId, target, bypassCache);
    this.active = { requestId, target, mode, promise };
    return promise;
  }

  private async run(requestId: number, target: PageId, bypassCache: boolean): Promise<NavigationResult> {
    let page: Page;
    try {
      page = await this.cache.load(target, this.loadPage, { bypassCache });
    } catch (error) {
      const failure = toViewerError(error);
      const previous = failure.contentFault ? this.cache.peek(target) : undefined;
      if (!previous) {
        return this.complete({ type: 'fetch_failed', requestId, target, error: failure }, { type: 'failed', error: failure });
      }
      this.logger.warn('navigation.kept_previous_page', {
        page: formatPageName(target),
        error: describeError(failure),
      });
      page = previous;
    }
    return this.complete({ type: 'fetch_succeeded', requestId, target, page }, { type: 'displayed', page });
  }

  private complete(event: CompletionEvent, result: NavigationResult): NavigationResult {
    if (this.active?.requestId === event.requestId) {
      this.active = null;
    }
    if (!isCurrentRequest(this.state, event.requestId, event.target)) {
      this.logger.debug('navigation.superseded', { page: formatPageName(event.target), requestId: event.requestId });
      return { type: 'superseded' };
    }
    this.dispatch(event);
    if (event.type === 'fetch_failed') {
      this.logger.warn('navigation.failed', { page: formatPageName(event.target), error: describeError(event.error) });
    } else {
      this.logger.info('navigation.displayed', { page: formatPageName(event.target) });
    }
    return result;
  }

  private dispatch(event: NavigationEvent): void {
    const next = reduceNavigation(this.state, event);
    if (next === this.state) {
      return;
    }
    this.state = next;
    this.invalidate();
    this.notify();
  }

  private notify(): void {
    if (this.listeners.size === 0) {
      return;
    }
    for (const listener of this.listeners) {
      listener();
    }
  }

  private invalidate(): void {
    this.snapshotCache = null;
  }
}
