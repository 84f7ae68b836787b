import { partial_ratio } from 'fuzzball';
import { cleanText } from '../providers/wallapop/query.js';
import type { FilterDecision, FuzzyThresholds, NormalizedListing } from '../types.js';

/** 0–100 similarity tolerant of one string appearing inside the other. */
export type SimilarityScorer = (needle: string, haystack: string) => number;

export const DEFAULT_THRESHOLDS: Readonly<FuzzyThresholds> = Object.freeze({
  title: 75,
  description: 65,
  excluded: 85
});

export const partialRatio: SimilarityScorer = (needle, haystack) => partial_ratio(needle, haystack);

export interface FilterCriteria {
  keywords: readonly string[];
  excludedKeywords: readonly string[];
  minPrice?: number;
  maxPrice?: number;
}

function reject(reason: FilterDecision['reason'], score = 0, matchedInDescription = false): FilterDecision {
  return { pass: false, score, matchedInDescription, reason };
}

/**
 * Decides whether a listing belongs in the results. Rules run in a fixed order: reserved,
 * excluded terms, keywords, price. Keyword and excluded terms are expected to be cleaned
 * already (see `cleanText`).
 */
export function evaluateListing(
  listing: NormalizedListing,
  criteria: FilterCriteria,
  thresholds: Readonly<FuzzyThresholds> = DEFAULT_THRESHOLDS,
  similarity: SimilarityScorer = partialRatio
): FilterDecision {
  if (listing.reserved) {
    console.debug('[filter] reserved', { id: listing.id });
    return reject('reserved');
  }

  const fullText = cleanText(`${listing.title} ${listing.description}`);
  const excludedHit = criteria.excludedKeywords.find((term) => similarity(term, fullText) >= thresholds.excluded);
  if (excludedHit !== undefined) {
    console.debug('[filter] excluded term matched', { id: listing.id, term: excludedHit });
    return reject('excluded');
  }

  let score = 0;
  let matchedInDescription = false;

  if (criteria.keywords.length > 0) {
    const title = cleanText(listing.title);
    const description = cleanText(listing.description);
    let matched = false;
    let bestSeen = 0;

    for (const keyword of criteria.keywords) {
      const titleScore = similarity(keyword, title);
      const descriptionScore = similarity(keyword, description);
      bestSeen = Math.max(bestSeen, titleScore, descriptionScore);

      if (titleScore > thresholds.title && titleScore >= score) {
        // title wins ties with an earlier description match
        matched = true;
        score = titleScore;
        matchedInDescription = false;
      }
      if (descriptionScore > thresholds.description && descriptionScore > score) {
        matched = true;
        score = descriptionScore;
        matchedInDescription = true;
      }
    }

    if (!matched) {
      console.debug('[filter] no keyword above threshold', { id: listing.id, bestScore: bestSeen });
      return reject('keywords');
    }
  }

  const { amount } = listing.price;
  if (
    (criteria.minPrice !== undefined && amount < criteria.minPrice) ||
    (criteria.maxPrice !== undefined && amount > criteria.maxPrice)
  ) {
    console.debug('[filter] price out of range', {
      id: listing.id,
      price: amount,
      minPrice: criteria.minPrice ?? null,
      maxPrice: criteria.maxPrice ?? null
    });
    return reject('price', score, matchedInDescription);
  }

  return { pass: true, score, matchedInDescription };
}
