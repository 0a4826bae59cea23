export type ViewerErrorCode =
  | 'network'
  | 'timeout'
  | 'not_found'
  | 'server_error'
  | 'malformed_encoding'
  | 'layout_overflow'
  | 'no_content'
  | 'invalid_page_id';

const TRANSIENT_CODES: ReadonlySet<ViewerErrorCode> = new Set(['network', 'timeout']);
const CONTENT_CODES: ReadonlySet<ViewerErrorCode> = new Set(['malformed_encoding', 'layout_overflow']);

interface ViewerErrorOptions {
  status?: number;
  cause?: unknown;
}

export class ViewerError extends Error {
  readonly code: ViewerErrorCode;
  readonly status: number | null;

  constructor(code: ViewerErrorCode, message: string, options: ViewerErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ViewerError';
    this.code = code;
    this.status = options.status ?? null;
  }

  /** Failures the transport may retry. */
  get transient(): boolean {
    return TRANSIENT_CODES.has(this.code);
  }

  /** Failures caused by the page payload rather than by reaching it. */
  get contentFault(): boolean {
    return CONTENT_CODES.has(this.code);
  }
}

export function isViewerError(value: unknown): value is ViewerError {
  return value instanceof ViewerError;
}

export function toViewerError(error: unknown): ViewerError {
  if (error instanceof ViewerError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ViewerError('network', message, { cause: error });
}

export function describeError(error: unknown): string {
  if (error instanceof ViewerError) {
    return error.status === null ? `${error.code}: ${error.message}` : `${error.code}(${error.status}): ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
