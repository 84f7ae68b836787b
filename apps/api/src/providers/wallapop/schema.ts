import { z } from 'zod';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Each field degrades to absent when the marketplace sends the wrong type; the normalizer
// decides which absences disqualify a listing.
const optionalString = z.string().optional().catch(undefined);
const optionalId = z.union([z.string(), z.number()]).optional().catch(undefined);

export const rawListingSchema = z.preprocess(
  (value) => (isRecord(value) ? value : {}),
  z.object({
    id: optionalId,
    title: optionalString,
    description: optionalString,
    web_slug: optionalString,
    user_id: optionalId,
    price: z
      .object({
        amount: z.number().optional().catch(undefined),
        currency: optionalString
      })
      .optional()
      .catch(undefined),
    location: z
      .object({
        city: optionalString,
        region: optionalString,
        country_code: optionalString
      })
      .optional()
      .catch(undefined),
    flags: z
      .object({ reserved: z.boolean().optional().catch(undefined) })
      .optional()
      .catch(undefined),
    created_at: z.union([z.number(), z.string()]).optional().catch(undefined),
    images: z.unknown().optional()
  })
);

export type RawListing = z.infer<typeof rawListingSchema>;

export const imageListSchema = z.array(
  z.object({
    urls: z
      .object({
        big: z.string().optional(),
        medium: z.string().optional(),
        original: z.string().optional(),
        small: z.string().optional()
      })
      .optional()
  })
);

// Only the path down to `items` and the `meta` section are structural; a missing level
// means an empty page, a level of the wrong type means the body is not a search response.
export const searchEnvelopeSchema = z.object({
  data: z
    .object({
      section: z
        .object({
          payload: z.object({ items: z.unknown().optional() }).passthrough().optional()
        })
        .passthrough()
        .optional()
    })
    .passthrough()
    .optional(),
  meta: z.object({ next_page: z.unknown().optional() }).passthrough().optional()
});
