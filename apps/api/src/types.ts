import type { Transport } from './http/transport.js';

export const ORDER_BY_VALUES = ['newest', 'price_low_to_high', 'price_high_to_low'] as const;

export type OrderBy = (typeof ORDER_BY_VALUES)[number];

export type ListingPlatform = 'wallapop';

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface FuzzyThresholds {
  title: number;
  description: number;
  excluded: number;
}

export interface SearchCriteria {
  readonly productName: string;
  readonly keywords: readonly string[];
  readonly excludedKeywords: readonly string[];
  readonly minPrice?: number;
  readonly maxPrice?: number;
  readonly maxItems: number;
  // Kept as given; the query builder falls back to 'newest' for unknown values.
  readonly orderBy: string;
  readonly timeFilter?: string;
}

export interface SearchConfig {
  readonly apiBaseUrl: string;
  readonly webBaseUrl: string;
  readonly geo: Readonly<GeoPoint>;
  readonly headers: Readonly<Record<string, string>>;
  readonly thresholds: Readonly<FuzzyThresholds>;
  readonly transport: Transport;
}

export interface ListingPrice {
  amount: number;
  currency?: string;
}

export interface NormalizedListing {
  platform: ListingPlatform;
  id: string;
  title: string;
  description: string;
  price: ListingPrice;
  location: string;
  createdAt?: Date;
  sellerId: string;
  sellerLink: string;
  reserved: boolean;
  mainImage?: string;
  images: string[];
  link: string;
}

export type FilterRejection = 'reserved' | 'excluded' | 'keywords' | 'price';

export interface FilterDecision {
  pass: boolean;
  score: number;
  matchedInDescription: boolean;
  reason?: FilterRejection;
}

export interface ListingMatch extends NormalizedListing {
  searchTerm: string;
  matchScore: number;
  matchedInDescription: boolean;
}

export interface SearchStats {
  fetched: number;
  pages: number;
  accepted: number;
  duplicates: number;
  rejected: number;
  faults: number;
}

export interface SearchReport {
  listings: ListingMatch[];
  stats: SearchStats;
}
