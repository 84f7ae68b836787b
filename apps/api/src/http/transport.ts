import { err, errorMessage, ok, RequestError, type Result } from '../errors.js';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export interface TransportResponse {
  statusCode: number;
  body: string;
}

/**
 * One GET with the given headers. Retries are the transport's business: callers see either
 * a response (any status) or a definitive `RequestError`.
 */
export type Transport = (
  url: string,
  headers: Readonly<Record<string, string>>
) => Promise<Result<TransportResponse, RequestError>>;

export interface FetchTransportOptions {
  /** Per-attempt timeout in ms. */
  timeoutMs?: number;
  /** Retries after the first attempt. */
  maxRetries?: number;
  /** Base delay for exponential backoff; jitter of up to the same amount is added. */
  backoffMs?: number;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createFetchTransport(opts: FetchTransportOptions = {}): Transport {
  const { timeoutMs = 15000, maxRetries = 3, backoffMs = 500 } = opts;

  return async (url, headers) => {
    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        const backoff = backoffMs * Math.pow(2, attempt - 1) + Math.random() * backoffMs;
        console.info(`[transport] Retry ${attempt}/${maxRetries}`, { url, waitMs: Math.round(backoff) });
        await sleep(backoff);
      }

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const res = await fetch(url, {
          method: 'GET',
          signal: controller.signal,
          headers: {
            'User-Agent': USER_AGENT,
            Accept: 'application/json, text/plain, */*',
            ...headers
          }
        });
        const body = await res.text();

        if (isRetryableStatus(res.status) && attempt < maxRetries) {
          console.warn('[transport] retryable status', { url, status: res.status, attempt: attempt + 1 });
          continue;
        }

        return ok({ statusCode: res.status, body });
      } catch (e) {
        lastError = e;
        const timedOut = e instanceof Error && e.name === 'AbortError';
        console.warn('[transport] attempt failed', {
          url,
          attempt: attempt + 1,
          error: timedOut ? `timeout after ${timeoutMs}ms` : errorMessage(e)
        });
      } finally {
        clearTimeout(timeout);
      }
    }

    return err(
      new RequestError(`All ${maxRetries + 1} attempts failed for ${url}: ${errorMessage(lastError)}`, {
        cause: lastError
      })
    );
  };
}
