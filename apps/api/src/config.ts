import type { Env } from './env.js';
import { createFetchTransport } from './http/transport.js';
import type { SearchConfig } from './types.js';

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  'X-DeviceOS': '0',
  'Cache-Control': 'no-cache',
  Pragma: 'no-cache'
});

type SearchConfigOverrides = Partial<Omit<SearchConfig, 'thresholds'>> & {
  thresholds?: Partial<SearchConfig['thresholds']>;
};

/** Builds the immutable configuration value every search call receives. */
export function createSearchConfig(env: Env, overrides: SearchConfigOverrides = {}): SearchConfig {
  const { thresholds, ...rest } = overrides;

  return Object.freeze({
    apiBaseUrl: env.WALLAPOP_API_BASE_URL,
    webBaseUrl: env.WALLAPOP_WEB_BASE_URL,
    geo: Object.freeze({ latitude: env.SEARCH_LATITUDE, longitude: env.SEARCH_LONGITUDE }),
    headers: DEFAULT_HEADERS,
    transport: createFetchTransport({
      timeoutMs: env.HTTP_TIMEOUT_MS,
      maxRetries: env.HTTP_MAX_RETRIES,
      backoffMs: env.HTTP_BACKOFF_MS
    }),
    ...rest,
    thresholds: Object.freeze({
      title: env.FUZZY_TITLE_THRESHOLD,
      description: env.FUZZY_DESCRIPTION_THRESHOLD,
      excluded: env.FUZZY_EXCLUDED_THRESHOLD,
      ...thresholds
    })
  });
}
