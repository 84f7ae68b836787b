export { searchListings, parseSearchCriteria, searchParamsSchema, DEFAULT_MAX_ITEMS } from './search/searchListings.js';
export type { SearchParams } from './search/searchListings.js';
export { evaluateListing, DEFAULT_THRESHOLDS, partialRatio } from './search/filter.js';
export type { FilterCriteria, SimilarityScorer } from './search/filter.js';
export { createSearchConfig, DEFAULT_HEADERS } from './config.js';
export { getEnv } from './env.js';
export type { Env } from './env.js';
export { createFetchTransport } from './http/transport.js';
export type { Transport, TransportResponse, FetchTransportOptions } from './http/transport.js';
export * from './errors.js';
export type * from './types.js';
export { ORDER_BY_VALUES } from './types.js';
