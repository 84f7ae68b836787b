import type { NormalizedListing } from '../../types.js';
import { imageListSchema, type RawListing } from './schema.js';

export interface ListingLinks {
  webBaseUrl: string;
}

const IMAGE_SIZE_PRIORITY = ['big', 'medium', 'original', 'small'] as const;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function idString(value: string | number | undefined): string | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : undefined;
  return nonEmpty(value);
}

/** Listing identity as used for de-duplication; `undefined` when the item has none. */
export function listingId(raw: RawListing): string | undefined {
  return idString(raw.id);
}

function extractLocation(raw: RawListing): string | undefined {
  const location = raw.location;
  if (!location) return undefined;
  return nonEmpty(location.city) ?? nonEmpty(location.region) ?? nonEmpty(location.country_code);
}

function parseCreatedAt(id: string, value: string | number | undefined): Date | undefined {
  const text = typeof value === 'string' ? value.trim() : value;
  if (text === undefined || text === '') {
    console.warn('[normalize] missing creation date', { id });
    return undefined;
  }

  const ms = typeof text === 'number' ? text : Number(text);
  const date = new Date(ms);
  if (!Number.isFinite(ms) || Number.isNaN(date.getTime())) {
    console.warn('[normalize] invalid creation timestamp', { id, value });
    return undefined;
  }
  return date;
}

function extractImages(id: string, images: unknown): { mainImage?: string; images: string[] } {
  if (images === undefined || images === null) return { images: [] };

  const parsed = imageListSchema.safeParse(images);
  if (!parsed.success) {
    console.warn('[normalize] unreadable images, dropping them', { id, error: parsed.error.message });
    return { images: [] };
  }

  const picks = parsed.data.map((image) => {
    const urls = image.urls;
    if (!urls) return undefined;
    for (const size of IMAGE_SIZE_PRIORITY) {
      const url = nonEmpty(urls[size]);
      if (url) return url;
    }
    return undefined;
  });

  return {
    mainImage: picks[0],
    images: picks.filter((url): url is string => url !== undefined)
  };
}

/**
 * Projects a raw marketplace item onto a `NormalizedListing`. Returns `undefined` for items
 * missing any of id, title, description, price, location or seller; such items are routine
 * noise in search responses.
 */
export function normalizeListing(raw: RawListing, links: ListingLinks): NormalizedListing | undefined {
  const id = idString(raw.id);
  const title = nonEmpty(raw.title);
  const description = nonEmpty(raw.description);
  const amount = raw.price?.amount;
  const sellerId = idString(raw.user_id);
  const location = extractLocation(raw);

  if (!id || !title || !description || amount === undefined || !Number.isFinite(amount) || !sellerId || !location) {
    console.debug('[normalize] missing essential data, skipping', {
      id: id ?? null,
      title: Boolean(title),
      description: Boolean(description),
      price: amount !== undefined,
      seller: Boolean(sellerId),
      location: Boolean(location)
    });
    return undefined;
  }

  const webBaseUrl = links.webBaseUrl.replace(/\/+$/, '');
  const slug = nonEmpty(raw.web_slug) ?? id;
  const { mainImage, images } = extractImages(id, raw.images);

  return {
    platform: 'wallapop',
    id,
    title,
    description,
    price: { amount, currency: nonEmpty(raw.price?.currency) },
    location,
    createdAt: parseCreatedAt(id, raw.created_at),
    sellerId,
    sellerLink: `${webBaseUrl}/user/${encodeURIComponent(sellerId)}`,
    reserved: raw.flags?.reserved ?? false,
    mainImage,
    images,
    link: `${webBaseUrl}/item/${encodeURIComponent(slug)}`
  };
}
