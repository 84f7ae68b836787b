import { vi } from 'vitest';
import { err, ok, RequestError } from '../src/errors.js';
import type { Transport, TransportResponse } from '../src/http/transport.js';
import type { NormalizedListing } from '../src/types.js';

export function rawItem(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'A1',
    title: 'PS5 console bundle',
    description: 'Like new',
    web_slug: 'ps5-console-bundle-a1',
    price: { amount: 150, currency: 'EUR' },
    user_id: 'u1',
    location: { city: 'Rome' },
    flags: { reserved: false },
    created_at: 1700000000000,
    ...overrides
  };
}

export function listing(overrides: Partial<NormalizedListing> = {}): NormalizedListing {
  return {
    platform: 'wallapop',
    id: 'A1',
    title: 'PS5 console bundle',
    description: 'Like new',
    price: { amount: 150, currency: 'EUR' },
    location: 'Rome',
    sellerId: 'u1',
    sellerLink: 'https://it.wallapop.com/user/u1',
    reserved: false,
    images: [],
    link: 'https://it.wallapop.com/item/ps5-console-bundle-a1',
    ...overrides
  };
}

export function pageBody(items: unknown, nextPage?: string): string {
  return JSON.stringify({
    data: { section: { payload: { items } } },
    meta: nextPage ? { next_page: nextPage } : {}
  });
}

export function respond(body: string, statusCode = 200): TransportResponse {
  return { statusCode, body };
}

/** Transport answering each request with the next queued response. */
export function fakeTransport(...responses: Array<TransportResponse | RequestError>) {
  const queue = [...responses];
  return vi.fn<Transport>(async () => {
    const next = queue.shift();
    if (next === undefined) throw new Error('no response queued for request');
    return next instanceof RequestError ? err(next) : ok(next);
  });
}
