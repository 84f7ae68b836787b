import { describe, expect, it } from 'vitest';
import { listingId, normalizeListing } from '../src/providers/wallapop/normalize.js';
import { rawListingSchema } from '../src/providers/wallapop/schema.js';
import { rawItem } from './fixtures.js';

const links = { webBaseUrl: 'https://it.wallapop.com/' };

function normalize(item: unknown) {
  return normalizeListing(rawListingSchema.parse(item), links);
}

describe('normalizeListing', () => {
  it('projects a complete item', () => {
    expect(normalize(rawItem())).toEqual({
      platform: 'wallapop',
      id: 'A1',
      title: 'PS5 console bundle',
      description: 'Like new',
      price: { amount: 150, currency: 'EUR' },
      location: 'Rome',
      createdAt: new Date('2023-11-14T22:13:20.000Z'),
      sellerId: 'u1',
      sellerLink: 'https://it.wallapop.com/user/u1',
      reserved: false,
      mainImage: undefined,
      images: [],
      link: 'https://it.wallapop.com/item/ps5-console-bundle-a1'
    });
  });

  it.each([
    ['id', { id: '' }],
    ['title', { title: undefined }],
    ['description', { description: '   ' }],
    ['price', { price: { currency: 'EUR' } }],
    ['seller', { user_id: undefined }],
    ['location', { location: { city: '', region: '' } }]
  ])('skips an item without %s', (_field, overrides) => {
    expect(normalize(rawItem(overrides))).toBeUndefined();
  });

  it('returns undefined for a non-object item', () => {
    expect(normalize('junk')).toBeUndefined();
  });

  it('falls back from city to region to country code', () => {
    expect(normalize(rawItem({ location: { city: '', region: 'Lazio' } }))?.location).toBe('Lazio');
    expect(normalize(rawItem({ location: { country_code: 'IT' } }))?.location).toBe('IT');
  });

  it('accepts numeric ids and a missing currency', () => {
    const result = normalize(rawItem({ id: 12345, user_id: 77, price: { amount: 0 } }));
    expect(result?.id).toBe('12345');
    expect(result?.sellerId).toBe('77');
    expect(result?.price).toEqual({ amount: 0, currency: undefined });
  });

  it('keeps the listing when the timestamp is missing or unreadable', () => {
    const missing = normalize(rawItem({ created_at: undefined }));
    const unreadable = normalize(rawItem({ created_at: 'yesterday' }));
    const blank = normalize(rawItem({ created_at: '   ' }));

    expect(missing?.id).toBe('A1');
    expect(missing?.createdAt).toBeUndefined();
    expect(unreadable?.id).toBe('A1');
    expect(unreadable?.createdAt).toBeUndefined();
    expect(blank?.id).toBe('A1');
    expect(blank?.createdAt).toBeUndefined();
  });

  it('parses a numeric-string timestamp', () => {
    expect(normalize(rawItem({ created_at: '1700000000000' }))?.createdAt?.toISOString()).toBe(
      '2023-11-14T22:13:20.000Z'
    );
  });

  it('picks image urls by size priority', () => {
    const result = normalize(
      rawItem({
        images: [
          { urls: { small: 'https://img.test/1-s.jpg', medium: 'https://img.test/1-m.jpg' } },
          { urls: {} },
          { urls: { original: 'https://img.test/3-o.jpg', small: 'https://img.test/3-s.jpg' } },
          { urls: { big: 'https://img.test/4-b.jpg', medium: 'https://img.test/4-m.jpg' } }
        ]
      })
    );

    expect(result?.mainImage).toBe('https://img.test/1-m.jpg');
    expect(result?.images).toEqual(['https://img.test/1-m.jpg', 'https://img.test/3-o.jpg', 'https://img.test/4-b.jpg']);
  });

  it('has no main image when the first entry has no urls', () => {
    const result = normalize(rawItem({ images: [{}, { urls: { big: 'https://img.test/2-b.jpg' } }] }));

    expect(result?.mainImage).toBeUndefined();
    expect(result?.images).toEqual(['https://img.test/2-b.jpg']);
  });

  it('drops all images when the image list is malformed', () => {
    for (const images of ['https://img.test/1.jpg', [null], [{ urls: 'https://img.test/1.jpg' }]]) {
      const result = normalize(rawItem({ images }));
      expect(result?.id).toBe('A1');
      expect(result?.images).toEqual([]);
      expect(result?.mainImage).toBeUndefined();
    }
  });

  it('reads the reserved flag and builds the item link from the id without a slug', () => {
    const result = normalize(rawItem({ flags: { reserved: true }, web_slug: undefined }));

    expect(result?.reserved).toBe(true);
    expect(result?.link).toBe('https://it.wallapop.com/item/A1');
  });
});

describe('listingId', () => {
  it('reads string and numeric ids', () => {
    expect(listingId(rawListingSchema.parse({ id: ' A1 ' }))).toBe('A1');
    expect(listingId(rawListingSchema.parse({ id: 7 }))).toBe('7');
    expect(listingId(rawListingSchema.parse({}))).toBeUndefined();
  });
});
