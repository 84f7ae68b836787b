import { err, ok, ParsingError, RequestError, type Result } from '../../errors.js';
import type { Transport } from '../../http/transport.js';
import { rawListingSchema, searchEnvelopeSchema, type RawListing } from './schema.js';

export interface ListingPage {
  listings: RawListing[];
  nextCursor?: string;
}

const BODY_PREVIEW_LENGTH = 500;

function shorten(url: string): string {
  return url.length > 120 ? `${url.slice(0, 120)}...` : url;
}

/** Fetches a single search page and splits it into raw listings and the next-page cursor. */
export async function fetchPage(
  url: string,
  headers: Readonly<Record<string, string>>,
  transport: Transport
): Promise<Result<ListingPage>> {
  const response = await transport(url, headers);
  if (!response.ok) return response;

  const { statusCode, body } = response.value;
  if (statusCode < 200 || statusCode >= 300) {
    console.error('[page] request failed', {
      url: shorten(url),
      statusCode,
      body: body.slice(0, BODY_PREVIEW_LENGTH)
    });
    return err(
      new RequestError(`Search request failed (${statusCode}) for ${shorten(url)}`, { statusCode })
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (e) {
    return err(
      new ParsingError(`Response from ${shorten(url)} is not valid JSON: ${body.slice(0, BODY_PREVIEW_LENGTH)}`, {
        cause: e
      })
    );
  }

  const envelope = searchEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    return err(
      new ParsingError(`Unexpected response structure from ${shorten(url)}: ${envelope.error.message}`, {
        cause: envelope.error
      })
    );
  }

  const items = envelope.data.data?.section?.payload?.items;
  let listings: RawListing[] = [];
  if (Array.isArray(items)) {
    listings = items.map((item) => rawListingSchema.parse(item));
  } else if (items !== undefined) {
    console.warn('[page] items is not a list, treating page as empty', {
      url: shorten(url),
      type: items === null ? 'null' : typeof items
    });
  }

  const cursor = envelope.data.meta?.next_page;
  const nextCursor = typeof cursor === 'string' && cursor.length > 0 ? cursor : undefined;

  return ok({ listings, nextCursor });
}
