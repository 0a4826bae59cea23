const LOG_PREFIX = '[teletext]';
const TRACE_ENV = 'TELETEXT_TRACE';

export type ViewerLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ViewerLogDetail = Record<string, unknown> | null | undefined;

export interface ViewerLogger {
  debug(step: string, detail?: ViewerLogDetail): void;
  info(step: string, detail?: ViewerLogDetail): void;
  warn(step: string, detail?: ViewerLogDetail): void;
  error(step: string, detail?: ViewerLogDetail): void;
}

declare global {
  // eslint-disable-next-line no-var
  var __TELETEXT_TRACE: boolean | undefined;
}

export function isTraceEnabled(): boolean {
  if (globalThis.__TELETEXT_TRACE) {
    return true;
  }
  return typeof process !== 'undefined' && process.env?.[TRACE_ENV] === '1';
}

function sanitizeDetail(detail: ViewerLogDetail): Record<string, unknown> | undefined {
  if (!detail) {
    return undefined;
  }
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(detail)) {
    if (value === undefined) {
      continue;
    }
    if (value instanceof Error) {
      normalized[key] = { name: value.name, message: value.message };
      continue;
    }
    normalized[key] = value;
  }
  return normalized;
}

function safeSerialize(payload: Record<string, unknown>): string {
  try {
    return JSON.stringify(payload);
  } catch {
    return '[unserializable]';
  }
}

export function formatLogLine(scope: string, step: string, detail?: ViewerLogDetail): string {
  const normalized = sanitizeDetail(detail);
  const head = `${LOG_PREFIX}[${scope}] ${step}`;
  return normalized ? `${head} ${safeSerialize(normalized)}` : head;
}

export function createConsoleLogger(scope: string): ViewerLogger {
  return {
    debug(step, detail) {
      if (!isTraceEnabled()) {
        return;
      }
      // eslint-disable-next-line no-console
      console.debug(formatLogLine(scope, step, detail));
    },
    info(step, detail) {
      // eslint-disable-next-line no-console
      console.info(formatLogLine(scope, step, detail));
    },
    warn(step, detail) {
      // eslint-disable-next-line no-console
      console.warn(formatLogLine(scope, step, detail));
    },
    error(step, detail) {
      // eslint-disable-next-line no-console
      console.error(formatLogLine(scope, step, detail));
    },
  };
}

export const silentLogger: ViewerLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
