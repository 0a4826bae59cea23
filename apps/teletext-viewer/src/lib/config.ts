import { createPageId, parsePageName } from '../protocol/pageId.js';
import type { PageId } from '../protocol/types.js';

export interface ViewerConfig {
  requestTimeoutMs: number;
  retryCount: number;
  cacheTtlSeconds: number;
  maxCachedPages: number;
  rows: number;
  cols: number;
  /** `{page}` and `{subpage}` are replaced with `100` and `0001`. */
  pageUrlTemplate: string;
  refreshIntervalSeconds: number | null;
  homePage: PageId;
}

type EnvSource = Record<string, string | undefined>;

export const DEFAULT_PAGE_URL_TEMPLATE = 'http://127.0.0.1:4180/pages/{page}_{subpage}';

export const DEFAULT_VIEWER_CONFIG: Readonly<ViewerConfig> = Object.freeze({
  requestTimeoutMs: 5_000,
  retryCount: 2,
  cacheTtlSeconds: 300,
  maxCachedPages: 128,
  rows: 24,
  cols: 40,
  pageUrlTemplate: DEFAULT_PAGE_URL_TEMPLATE,
  refreshIntervalSeconds: null,
  homePage: createPageId(100, 1),
});

function readInteger(env: EnvSource, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || String(value) !== raw.trim() || value < min) {
    throw new Error(`Invalid ${name}: expected an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readHomePage(raw: string | undefined): PageId {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_VIEWER_CONFIG.homePage;
  }
  const trimmed = raw.trim();
  try {
    return parsePageName(/^\d{3}$/.test(trimmed) ? `${trimmed}_0001` : trimmed);
  } catch (error) {
    throw new Error(`Invalid TELETEXT_HOME_PAGE: expected 100-999 or NNN_SSSS, got "${raw}"`, { cause: error });
  }
}

function checkTemplate(template: string): string {
  if (!template.includes('{page}') || !template.includes('{subpage}')) {
    throw new Error(`Invalid page URL template "${template}": it must contain {page} and {subpage}`);
  }
  return template;
}

export function loadViewerConfig(env: EnvSource = process.env): ViewerConfig {
  const refresh = readInteger(env, 'TELETEXT_REFRESH_INTERVAL_SECONDS', 0, 0);
  return {
    requestTimeoutMs: readInteger(env, 'TELETEXT_REQUEST_TIMEOUT_MS', DEFAULT_VIEWER_CONFIG.requestTimeoutMs, 1),
    retryCount: readInteger(env, 'TELETEXT_RETRY_COUNT', DEFAULT_VIEWER_CONFIG.retryCount, 0),
    cacheTtlSeconds: readInteger(env, 'TELETEXT_CACHE_TTL_SECONDS', DEFAULT_VIEWER_CONFIG.cacheTtlSeconds, 0),
    maxCachedPages: readInteger(env, 'TELETEXT_MAX_CACHED_PAGES', DEFAULT_VIEWER_CONFIG.maxCachedPages, 1),
    rows: readInteger(env, 'TELETEXT_GRID_ROWS', DEFAULT_VIEWER_CONFIG.rows, 1),
    cols: readInteger(env, 'TELETEXT_GRID_COLS', DEFAULT_VIEWER_CONFIG.cols, 1),
    pageUrlTemplate: checkTemplate(env.TELETEXT_PAGE_URL_TEMPLATE ?? DEFAULT_PAGE_URL_TEMPLATE),
    refreshIntervalSeconds: refresh === 0 ? null : refresh,
    homePage: readHomePage(env.TELETEXT_HOME_PAGE),
  };
}

/** Defaults merged with `overrides`, for hosts that do not read the environment. */
export function resolveViewerConfig(overrides: Partial<ViewerConfig> = {}): ViewerConfig {
  const config: ViewerConfig = { ...DEFAULT_VIEWER_CONFIG, ...overrides };
  for (const key of ['rows', 'cols', 'maxCachedPages', 'requestTimeoutMs'] as const) {
    if (!Number.isInteger(config[key]) || config[key] < 1) {
      throw new Error(`Invalid ${key}: expected a positive integer, got ${config[key]}`);
    }
  }
  if (!Number.isInteger(config.retryCount) || config.retryCount < 0) {
    throw new Error(`Invalid retryCount: expected a non-negative integer, got ${config.retryCount}`);
  }
  checkTemplate(config.pageUrlTemplate);
  return config;
}
