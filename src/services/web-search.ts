import { z } from 'zod';
import { env } from '../env.js';

const BravePayloadSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().optional(),
            url: z.string().optional(),
            description: z.string().optional(),
          }),
        )
        .optional(),
    })
    .optional(),
});

export interface WebSearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface WebSearchResult {
  query: string;
  hits: WebSearchHit[];
}

function normalizeText(value: unknown): string {
  return String(value ?? '').trim();
}

/**
 * Brave Search lookup. Returns null when search is disabled or unkeyed.
 */
export async function searchWeb(
  query: string,
  count = 5,
  signal?: AbortSignal,
): Promise<WebSearchResult | null> {
  if (!env.WEB_SEARCH_ENABLED) return null;
  if (!env.BRAVE_SEARCH_API_KEY) return null;

  const q = normalizeText(query);
  if (!q) return null;

  const endpoint = new URL('https://api.search.brave.com/res/v1/web/search');
  endpoint.searchParams.set('q', q);
  endpoint.searchParams.set('count', String(Math.max(1, Math.min(count, 10))));

  const response = await fetch(endpoint.toString(), {
    method: 'GET',
    headers: {
      Accept: 'application/json',
      'X-Subscription-Token': env.BRAVE_SEARCH_API_KEY,
    },
    signal,
  });

  if (!response.ok) {
    throw new Error(`Brave Search error (${response.status})`);
  }

  const payload = BravePayloadSchema.safeParse(await response.json());
  if (!payload.success) {
    throw new Error('Brave Search returned an unexpected payload');
  }

  const hits = (payload.data.web?.results || [])
    .map((item) => ({
      title: normalizeText(item.title),
      url: normalizeText(item.url),
      snippet: normalizeText(item.description),
    }))
    .filter((item) => item.title && item.url)
    .slice(0, Math.max(1, Math.min(count, 10)));

  return {
    query: q,
    hits,
  };
}
