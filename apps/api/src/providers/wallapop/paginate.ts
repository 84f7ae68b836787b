import { ok, type Result } from '../../errors.js';
import type { Transport } from '../../http/transport.js';
import { fetchPage } from './page.js';
import type { RawListing } from './schema.js';

export type PaginationState = 'FETCHING' | 'BUDGET_REACHED' | 'EXHAUSTED' | 'FAILED';

export interface PaginationOptions {
  headers: Readonly<Record<string, string>>;
  transport: Transport;
  /** Maximum number of raw listings to collect; also caps the number of requests. */
  budget: number;
}

export interface PaginationOutcome {
  listings: RawListing[];
  pages: number;
  state: Extract<PaginationState, 'BUDGET_REACHED' | 'EXHAUSTED'>;
}

const STALE_PAGINATION_PARAMS = ['since', 'next_page'];

export function withCursor(url: string, cursor: string): string {
  const next = new URL(url);
  for (const param of STALE_PAGINATION_PARAMS) next.searchParams.delete(param);
  next.searchParams.set('start_cursor', cursor);
  return next.toString();
}

/**
 * Walks the cursor chain one page at a time until the budget is filled or the marketplace
 * runs out of results. The first failing page aborts the walk.
 */
export async function paginate(initialUrl: string, opts: PaginationOptions): Promise<Result<PaginationOutcome>> {
  const { headers, transport, budget } = opts;
  const listings: RawListing[] = [];
  let url = initialUrl;
  let pages = 0;
  let state: PaginationState = budget > 0 ? 'FETCHING' : 'BUDGET_REACHED';

  while (state === 'FETCHING') {
    pages += 1;
    console.debug('[paginate] fetching page', { page: pages, collected: listings.length, budget });

    const page = await fetchPage(url, headers, transport);
    if (!page.ok) {
      state = 'FAILED';
      console.error('[paginate] page failed', { page: pages, kind: page.error.kind, error: page.error.message });
      return page;
    }

    const { listings: pageListings, nextCursor } = page.value;
    if (pageListings.length === 0) {
      console.info('[paginate] empty page, stopping', { page: pages });
      state = 'EXHAUSTED';
      break;
    }

    listings.push(...pageListings.slice(0, budget - listings.length));

    if (listings.length >= budget) {
      console.info('[paginate] item budget reached', { budget, pages });
      state = 'BUDGET_REACHED';
    } else if (nextCursor) {
      url = withCursor(url, nextCursor);
    } else {
      console.info('[paginate] no next_page cursor, assuming end of results', { page: pages });
      state = 'EXHAUSTED';
    }
  }

  const terminal = state === 'BUDGET_REACHED' ? 'BUDGET_REACHED' : 'EXHAUSTED';
  console.info('[paginate] finished', { collected: listings.length, pages, state: terminal });
  return ok({ listings, pages, state: terminal });
}
