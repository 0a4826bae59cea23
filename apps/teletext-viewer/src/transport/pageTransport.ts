import { ViewerError, describeError } from '../lib/errors.js';
import { silentLogger, type ViewerLogger } from '../lib/logger.js';
import { formatPageName } from '../protocol/pageId.js';
import type { PageId } from '../protocol/types.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 5_000;
export const DEFAULT_RETRY_COUNT = 2;

export interface PageTransport {
  fetchPage(id: PageId): Promise<Uint8Array>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpPageTransportOptions {
  urlTemplate: string;
  timeoutMs?: number;
  retryCount?: number;
  fetch?: FetchFn;
  logger?: ViewerLogger;
}

export function buildPageUrl(template: string, id: PageId): string {
  const [number, subpage] = formatPageName(id).split('_');
  return template.replaceAll('{page}', number).replaceAll('{subpage}', subpage);
}

/**
 * Stateless HTTP GET transport. Every attempt is bounded by the timeout;
 * network failures and timeouts are retried, everything else is returned to
 * the caller on the first occurrence.
 */
export class HttpPageTransport implements PageTransport {
  private readonly urlTemplate: string;
  private readonly timeoutMs: number;
  private readonly retryCount: number;
  private readonly fetchImpl: FetchFn;
  private readonly logger: ViewerLogger;

  constructor(options: HttpPageTransportOptions) {
    this.urlTemplate = options.urlTemplate;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.retryCount = Math.max(0, options.retryCount ?? DEFAULT_RETRY_COUNT);
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  async fetchPage(id: PageId): Promise<Uint8Array> {
    const url = buildPageUrl(this.urlTemplate, id);
    let attempt = 0;
    for (;;) {
      attempt += 1;
      try {
        const body = await this.attempt(url);
        this.logger.debug('transport.fetched', { page: formatPageName(id), attempt, bytes: body.byteLength });
        return body;
      } catch (error) {
        const failure = error instanceof ViewerError ? error : new ViewerError('network', describeError(error), { cause: error });
        if (!failure.transient || attempt > this.retryCount) {
          this.logger.warn('transport.failed', { page: formatPageName(id), attempt, error: describeError(failure) });
          throw failure;
        }
        this.logger.debug('transport.retry', { page: formatPageName(id), attempt, error: describeError(failure) });
      }
    }
  }

  private async attempt(url: string): Promise<Uint8Array> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, { method: 'GET', signal: controller.signal });
      if (response.status === 404) {
        throw new ViewerError('not_found', `page not found: ${url}`, { status: 404 });
      }
      if (!response.ok) {
        throw new ViewerError('server_error', `request failed: ${response.status} ${response.statusText}`, {
          status: response.status,
        });
      }
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof ViewerError) {
        throw error;
      }
      if (timedOut) {
        throw new ViewerError('timeout', `request timed out after ${this.timeoutMs}ms: ${url}`, { cause: error });
      }
      throw new ViewerError('network', `request failed: ${describeError(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }
}
