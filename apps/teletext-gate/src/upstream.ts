export interface PageRequest {
  /** Three-digit page number, e.g. `100`. */
  page: string;
  /** Four-digit subpage, e.g. `0001`. */
  subpage: string;
}

export type UpstreamResult =
  | { kind: 'ok'; body: Buffer; contentType: string }
  | { kind: 'not_found' }
  | { kind: 'bad_status'; status: number }
  | { kind: 'timeout' }
  | { kind: 'unreachable'; message: string };

export interface UpstreamClient {
  fetchPage(request: PageRequest): Promise<UpstreamResult>;
}

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

interface UpstreamClientOptions {
  urlTemplate: string;
  timeoutMs: number;
  fetch?: FetchFn;
}

const DEFAULT_CONTENT_TYPE = 'text/html; charset=utf-8';

export function buildUpstreamUrl(template: string, request: PageRequest): string {
  return template.replaceAll('{page}', request.page).replaceAll('{subpage}', request.subpage);
}

export function createUpstreamClient(options: UpstreamClientOptions): UpstreamClient {
  const fetchImpl: FetchFn = options.fetch ?? ((input, init) => fetch(input, init));

  return {
    async fetchPage(request) {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), options.timeoutMs);
      try {
        const response = await fetchImpl(buildUpstreamUrl(options.urlTemplate, request), {
          method: 'GET',
          signal: controller.signal,
        });
        if (response.status === 404) {
          return { kind: 'not_found' };
        }
        if (!response.ok) {
          return { kind: 'bad_status', status: response.status };
        }
        return {
          kind: 'ok',
          body: Buffer.from(await response.arrayBuffer()),
          contentType: response.headers.get('content-type') ?? DEFAULT_CONTENT_TYPE,
        };
      } catch (error) {
        if (controller.signal.aborted) {
          return { kind: 'timeout' };
        }
        return { kind: 'unreachable', message: error instanceof Error ? error.message : String(error) };
      } finally {
        clearTimeout(timer);
      }
    },
  };
}
