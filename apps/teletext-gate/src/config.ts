export interface TeletextGateConfig {
  port: number;
  host: string;
  /** Upstream page URL with `{page}` and `{subpage}` placeholders. */
  upstreamUrl: string;
  requestTimeoutMs: number;
  allowedOrigin: string;
  cacheMaxAgeSeconds: number;
}

function parseInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid ${name}: expected a non-negative integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env = process.env): TeletextGateConfig {
  const upstreamUrl = env.TELETEXT_GATE_UPSTREAM_URL;
  if (!upstreamUrl) {
    throw new Error('TELETEXT_GATE_UPSTREAM_URL is required');
  }
  if (!upstreamUrl.includes('{page}') || !upstreamUrl.includes('{subpage}')) {
    throw new Error('TELETEXT_GATE_UPSTREAM_URL must contain {page} and {subpage}');
  }

  return {
    port: parseInteger('TELETEXT_GATE_PORT', env.TELETEXT_GATE_PORT, 4180),
    host: env.TELETEXT_GATE_HOST ?? '0.0.0.0',
    upstreamUrl,
    requestTimeoutMs: parseInteger('TELETEXT_GATE_TIMEOUT_MS', env.TELETEXT_GATE_TIMEOUT_MS, 5_000),
    allowedOrigin: env.TELETEXT_GATE_ALLOWED_ORIGIN ?? '*',
    cacheMaxAgeSeconds: parseInteger('TELETEXT_GATE_CACHE_MAX_AGE', env.TELETEXT_GATE_CACHE_MAX_AGE, 30),
  };
}
