import { ORDER_BY_VALUES, type GeoPoint, type OrderBy, type SearchCriteria } from '../../types.js';

export function cleanText(value: string): string {
  return value.replace(/\s+/g, ' ').trim().toLowerCase();
}

function isOrderBy(value: string): value is OrderBy {
  return ORDER_BY_VALUES.some((order) => order === value);
}

/**
 * Initial search URL for a set of criteria. Cursor pages are derived from this one by
 * `withCursor`.
 *
 * The marketplace only takes whole-unit prices, so bounds are truncated. An unknown
 * `orderBy` is not rejected: the query falls back to `newest`.
 */
export function buildInitialUrl(criteria: SearchCriteria, geo: GeoPoint, baseUrl: string): string {
  const params: [string, string][] = [
    ['source', 'search_box'],
    ['keywords', cleanText(criteria.productName)],
    ['latitude', String(geo.latitude)],
    ['longitude', String(geo.longitude)]
  ];

  if (criteria.minPrice !== undefined) params.push(['min_sale_price', String(Math.trunc(criteria.minPrice))]);
  if (criteria.maxPrice !== undefined) params.push(['max_sale_price', String(Math.trunc(criteria.maxPrice))]);

  if (isOrderBy(criteria.orderBy)) {
    params.push(['order_by', criteria.orderBy]);
  } else {
    console.warn('[query] unknown order_by, using newest', { orderBy: criteria.orderBy });
    params.push(['order_by', 'newest']);
  }

  if (criteria.timeFilter) params.push(['time_filter', criteria.timeFilter]);

  const query = params.map(([key, value]) => `${key}=${encodeURIComponent(value)}`).join('&');
  const url = `${baseUrl.replace(/\/+$/, '')}?${query}`;
  console.debug('[query] initial url', { url });
  return url;
}
