import { z } from 'zod';
import { ConfigurationError, err, errorMessage, ok, SearchError, UnexpectedSearchError, type Result } from '../errors.js';
import { listingId, normalizeListing } from '../providers/wallapop/normalize.js';
import { paginate } from '../providers/wallapop/paginate.js';
import { buildInitialUrl, cleanText } from '../providers/wallapop/query.js';
import type { ListingMatch, SearchConfig, SearchCriteria, SearchReport, SearchStats } from '../types.js';
import { evaluateListing } from './filter.js';

export const DEFAULT_MAX_ITEMS = 100;

const price = z.number().finite().nonnegative().nullish();

export const searchParamsSchema = z
  .object({
    productName: z.string(),
    keywords: z.array(z.string()).optional(),
    excludedKeywords: z.array(z.string()).optional(),
    minPrice: price,
    maxPrice: price,
    maxItems: z.number().int().positive().default(DEFAULT_MAX_ITEMS),
    orderBy: z.string().default('newest'),
    timeFilter: z.string().nullish()
  })
  .superRefine((value, ctx) => {
    if (cleanText(value.productName).length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['productName'], message: 'Product name cannot be empty' });
    }
    if (value.minPrice != null && value.maxPrice != null && value.minPrice > value.maxPrice) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minPrice'],
        message: `minPrice (${value.minPrice}) cannot be greater than maxPrice (${value.maxPrice})`
      });
    }
  });

export type SearchParams = z.input<typeof searchParamsSchema>;

function cleanTerms(terms: readonly string[] | undefined): string[] {
  return (terms ?? []).map(cleanText).filter((term) => term.length > 0);
}

export function parseSearchCriteria(params: unknown): Result<SearchCriteria, ConfigurationError> {
  const parsed = searchParamsSchema.safeParse(params);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return err(new ConfigurationError(`Invalid search parameters: ${message}`, { cause: parsed.error }));
  }

  const data = parsed.data;
  return ok(
    Object.freeze({
      productName: data.productName,
      keywords: Object.freeze(cleanTerms(data.keywords)),
      excludedKeywords: Object.freeze(cleanTerms(data.excludedKeywords)),
      minPrice: data.minPrice ?? undefined,
      maxPrice: data.maxPrice ?? undefined,
      maxItems: data.maxItems,
      orderBy: data.orderBy,
      timeFilter: data.timeFilter ?? undefined
    })
  );
}

async function runSearch(params: SearchParams, config: SearchConfig): Promise<Result<SearchReport>> {
  const parsed = parseSearchCriteria(params);
  if (!parsed.ok) {
    console.error('[search] invalid configuration', { error: parsed.error.message });
    return parsed;
  }
  const criteria = parsed.value;
  console.info(`[search] starting search for '${criteria.productName}'`, {
    keywords: criteria.keywords,
    excluded: criteria.excludedKeywords,
    minPrice: criteria.minPrice ?? null,
    maxPrice: criteria.maxPrice ?? null,
    maxItems: criteria.maxItems,
    orderBy: criteria.orderBy,
    timeFilter: criteria.timeFilter ?? null
  });

  const initialUrl = buildInitialUrl(criteria, config.geo, config.apiBaseUrl);
  const fetched = await paginate(initialUrl, {
    headers: config.headers,
    transport: config.transport,
    budget: criteria.maxItems
  });
  if (!fetched.ok) return fetched;

  const { listings: rawListings, pages } = fetched.value;
  const stats: SearchStats = { fetched: rawListings.length, pages, accepted: 0, duplicates: 0, rejected: 0, faults: 0 };
  const accepted = new Set<string>();
  const listings: ListingMatch[] = [];

  for (const raw of rawListings) {
    const id = listingId(raw);
    if (id !== undefined && accepted.has(id)) {
      console.debug('[search] duplicate listing, skipping', { id });
      stats.duplicates += 1;
      continue;
    }

    try {
      const listing = normalizeListing(raw, { webBaseUrl: config.webBaseUrl });
      if (!listing) {
        stats.rejected += 1;
        continue;
      }

      const decision = evaluateListing(listing, criteria, config.thresholds);
      if (!decision.pass) {
        stats.rejected += 1;
        continue;
      }

      accepted.add(listing.id);
      listings.push({
        ...listing,
        searchTerm: criteria.productName,
        matchScore: decision.score,
        matchedInDescription: decision.matchedInDescription
      });
    } catch (e) {
      stats.faults += 1;
      console.error('[search] failed to process listing', { id: id ?? 'UNKNOWN_ID', error: errorMessage(e) });
    }
  }

  stats.accepted = listings.length;
  console.info('[search] processing complete', stats);
  return ok({ listings, stats });
}

/**
 * Searches the marketplace for listings matching `params` and returns those that survive
 * normalization and filtering, in fetch order, one per listing id.
 *
 * Never throws: invalid parameters, failed or unreadable pages and unexpected defects come
 * back as the error side of the result.
 */
export async function searchListings(params: SearchParams, config: SearchConfig): Promise<Result<SearchReport>> {
  try {
    return await runSearch(params, config);
  } catch (e) {
    if (e instanceof SearchError) return err(e);
    console.error('[search] unexpected failure', { error: errorMessage(e) });
    return err(new UnexpectedSearchError(`Unexpected error during search: ${errorMessage(e)}`, { cause: e }));
  }
}
