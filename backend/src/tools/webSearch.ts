import { z } from 'zod';
import type { AppConfig } from '../config/app.js';
import { config } from '../config/app.js';
import { ProviderError } from '../utils/errors.js';
import { withRetry } from '../utils/resilience.js';

export interface SearchRequest {
  query: string;
  maxResults: number;
  recencyDays?: number;
}

export interface SearchDocument {
  title: string;
  url: string;
  content: string;
  publishedAt?: string;
}

export interface SearchProvider {
  readonly name: string;
  search(request: SearchRequest, signal?: AbortSignal): Promise<SearchDocument[]>;
}

type SearchConfig = Pick<
  AppConfig,
  | 'SEARCH_PROVIDER'
  | 'TAVILY_API_KEY'
  | 'TAVILY_ENDPOINT'
  | 'GOOGLE_SEARCH_API_KEY'
  | 'GOOGLE_SEARCH_ENGINE_ID'
  | 'GOOGLE_SEARCH_ENDPOINT'
  | 'WEB_SEARCH_TIMEOUT_MS'
>;

const retryableSearchErrors = ['429', '500', '502', '503', 'ECONNRESET', 'ETIMEDOUT'];

async function providerFailure(provider: string, response: Response): Promise<ProviderError> {
  const detail = await response.text().catch(() => '');
  const snippet = detail.slice(0, 200);
  return new ProviderError(provider, `${provider} search failed: ${response.status} ${response.statusText}${snippet ? ` - ${snippet}` : ''}`, {
    status: response.status,
    code: String(response.status)
  });
}

function parseBody<T>(provider: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ProviderError(provider, `${provider} returned an unexpected response shape`);
  }
  return parsed.data;
}

const tavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string(),
        content: z.string().nullish(),
        raw_content: z.string().nullish(),
        published_date: z.string().nullish()
      })
    )
    .default([])
});

export class TavilySearchProvider implements SearchProvider {
  readonly name = 'tavily';
  private readonly settings: SearchConfig;

  constructor(settings: SearchConfig = config) {
    this.settings = settings;
  }

  async search(request: SearchRequest, signal?: AbortSignal): Promise<SearchDocument[]> {
    const apiKey = this.settings.TAVILY_API_KEY;
    if (!apiKey) {
      throw new ProviderError(this.name, 'Tavily API key not configured. Set TAVILY_API_KEY.');
    }

    const body = {
      query: request.query,
      max_results: request.maxResults,
      include_raw_content: true,
      topic: request.recencyDays ? 'news' : 'general',
      ...(request.recencyDays ? { days: request.recencyDays } : {})
    };

    const data = await withRetry(
      'tavily-search',
      async (attemptSignal) => {
        const response = await fetch(this.settings.TAVILY_ENDPOINT, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${apiKey}` },
          body: JSON.stringify(body),
          signal: attemptSignal
        });
        if (!response.ok) {
          throw await providerFailure(this.name, response);
        }
        return parseBody(this.name, tavilyResponseSchema, await response.json());
      },
      { maxRetries: 1, timeoutMs: this.settings.WEB_SEARCH_TIMEOUT_MS, retryableErrors: retryableSearchErrors, signal }
    );

    return data.results.slice(0, request.maxResults).map((item) => ({
      title: item.title ?? item.url,
      url: item.url,
      content: item.raw_content?.trim() ? item.raw_content : item.content ?? '',
      ...(item.published_date ? { publishedAt: item.published_date } : {})
    }));
  }
}

const googleResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().nullish(),
        link: z.string(),
        snippet: z.string().nullish()
      })
    )
    .default([])
});

export class GoogleSearchProvider implements SearchProvider {
  readonly name = 'google';
  private readonly settings: SearchConfig;

  constructor(settings: SearchConfig = config) {
    this.settings = settings;
  }

  async search(request: SearchRequest, signal?: AbortSignal): Promise<SearchDocument[]> {
    const { GOOGLE_SEARCH_API_KEY: apiKey, GOOGLE_SEARCH_ENGINE_ID: engineId } = this.settings;
    if (!apiKey) {
      throw new ProviderError(this.name, 'Google Search API key not configured. Set GOOGLE_SEARCH_API_KEY.');
    }
    if (!engineId) {
      throw new ProviderError(this.name, 'Google Search Engine ID not configured. Set GOOGLE_SEARCH_ENGINE_ID.');
    }

    const url = new URL(this.settings.GOOGLE_SEARCH_ENDPOINT);
    url.searchParams.set('key', apiKey);
    url.searchParams.set('cx', engineId);
    url.searchParams.set('q', request.query);
    // Google max is 10 per request
    url.searchParams.set('num', Math.min(request.maxResults, 10).toString());
    if (request.recencyDays) {
      url.searchParams.set('dateRestrict', `d${request.recencyDays}`);
    }

    const data = await withRetry(
      'google-search',
      async (attemptSignal) => {
        const response = await fetch(url.toString(), { method: 'GET', signal: attemptSignal });
        if (!response.ok) {
          throw await providerFailure(this.name, response);
        }
        return parseBody(this.name, googleResponseSchema, await response.json());
      },
      { maxRetries: 1, timeoutMs: this.settings.WEB_SEARCH_TIMEOUT_MS, retryableErrors: retryableSearchErrors, signal }
    );

    return data.items.slice(0, request.maxResults).map((item) => ({
      title: item.title ?? item.link,
      url: item.link,
      content: item.snippet ?? ''
    }));
  }
}

export function createSearchProvider(settings: SearchConfig = config): SearchProvider {
  return settings.SEARCH_PROVIDER === 'google' ? new GoogleSearchProvider(settings) : new TavilySearchProvider(settings);
}
