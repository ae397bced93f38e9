import { z } from 'zod';
import { CircuitBreaker } from '../circuit-breaker/index.js';
import { ContentFetchError, toError } from '../errors.js';
import type { Quote } from '../types.js';

const QUOTE_TIMEOUT_MS = 10_000;

// ZenQuotes answers with a one-element array: [{ q: quote, a: author, h: html }]
const quoteResponseSchema = z
  .array(
    z.object({
      q: z.string().trim().min(1),
      a: z.string().trim().min(1),
    })
  )
  .min(1);

const quoteCircuit = new CircuitBreaker({
  serviceName: 'quotes',
  failureThreshold: 3,
  resetTimeoutMs: 5 * 60_000,
  successThreshold: 1,
});

export async function fetchRandomQuote(
  url: string,
  fetchImpl: typeof fetch = fetch,
  breaker: CircuitBreaker = quoteCircuit
): Promise<Quote> {
  return breaker.execute(async () => {
    let body: unknown;

    try {
      const response = await fetchImpl(url, { signal: AbortSignal.timeout(QUOTE_TIMEOUT_MS) });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      console.error('Quote fetch error:', error);
      throw new ContentFetchError(`Could not fetch a quote: ${toError(error).message}`, { cause: error });
    }

    const parsed = quoteResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ContentFetchError('Quote service returned an unexpected response');
    }

    const [first] = parsed.data;
    return { text: first.q, author: first.a };
  });
}
