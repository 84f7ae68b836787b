import { Router } from 'express';
import { z } from 'zod';
import type { SearchErrorKind } from '../errors.js';
import { searchListings } from '../search/searchListings.js';
import type { ListingMatch, SearchConfig } from '../types.js';

const ERROR_RESPONSES: Record<SearchErrorKind, { status: number; error: string }> = {
  configuration: { status: 400, error: 'VALIDATION_ERROR' },
  request: { status: 502, error: 'UPSTREAM_REQUEST_FAILED' },
  parsing: { status: 502, error: 'UPSTREAM_PARSE_FAILED' },
  unexpected: { status: 500, error: 'SEARCH_FAILED' }
};

// Shape only; value rules (non-empty name, price bounds, budget) are checked by searchListings.
const searchBodySchema = z.object({
  productName: z.string(),
  keywords: z.array(z.string()).optional(),
  excludedKeywords: z.array(z.string()).optional(),
  minPrice: z.number().nullish(),
  maxPrice: z.number().nullish(),
  maxItems: z.number().optional(),
  orderBy: z.string().optional(),
  timeFilter: z.string().nullish()
});

function toJson(listing: ListingMatch) {
  return {
    ...listing,
    createdAt: listing.createdAt?.toISOString()
  };
}

export function createSearchRouter(config: SearchConfig) {
  const router = Router();

  router.post('/v1/search', async (req, res) => {
    const parsed = searchBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    const result = await searchListings(parsed.data, config);
    if (!result.ok) {
      const { status, error } = ERROR_RESPONSES[result.error.kind];
      return res.status(status).json({ error, message: result.error.message });
    }

    const { listings, stats } = result.value;
    return res.json({ listings: listings.map(toJson), stats });
  });

  return router;
}
