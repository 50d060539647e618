import { z } from 'zod';
import { SearchRequestError } from '../curation/errors';
import { defaultLogger, describeError, type CurationLogger } from '../logging';
import type { FetchFn } from '../http';

const searchResponseSchema = z.object({
  results: z
    .array(
      z
        .object({
          title: z.string().default(''),
          content: z.string().nullish(),
          url: z.string().nullish(),
        })
        .passthrough(),
    )
    .default([]),
});

export interface SearchHit {
  title: string;
  snippet: string;
  url: string | null;
}

export interface SearchOptions {
  categories?: string[];
  engines?: string[];
  language?: string;
  page?: number;
}

interface SearxngClientOptions {
  baseUrl: string;
  apiKey?: string | null;
  timeoutMs?: number;
  fetch?: FetchFn;
}

const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_LANGUAGE = 'zh-CN';

export class SearxngClient {
  private readonly baseUrl: string;

  private readonly apiKey: string | null;

  private readonly timeoutMs: number;

  private readonly fetchImpl: FetchFn;

  constructor(options: SearxngClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey ?? null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? globalThis.fetch.bind(globalThis);
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchHit[]> {
    const params = new URLSearchParams({
      q: query,
      format: 'json',
      language: options.language ?? DEFAULT_LANGUAGE,
      pageno: String(options.page ?? 1),
    });
    if (options.categories?.length) {
      params.set('categories', options.categories.join(','));
    }
    if (options.engines?.length) {
      params.set('engines', options.engines.join(','));
    }

    const url = `${this.baseUrl}/search?${params.toString()}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs).unref?.();
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    try {
      const response = await this.fetchImpl(url, { headers, signal: controller.signal });
      if (!response.ok) {
        throw new SearchRequestError(`Search request failed (status ${response.status})`, {
          details: { status: response.status },
        });
      }
      const data: unknown = await response.json();
      const parsed = searchResponseSchema.parse(data);
      return parsed.results.map((result) => ({
        title: result.title,
        snippet: result.content ?? '',
        url: result.url ?? null,
      }));
    } catch (error) {
      if (error instanceof SearchRequestError) {
        throw error;
      }
      throw new SearchRequestError(error instanceof Error ? error.message : String(error), {
        details: { query },
        cause: error,
      });
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }
}

export interface SearchProvider {
  search(query: string, options?: SearchOptions): Promise<SearchHit[]>;
}

interface SearchAugmenterOptions {
  provider: SearchProvider;
  maxRetries?: number;
  resultLimit?: number;
  logger?: CurationLogger;
}

const QUERY_LENGTH = 100;

export function buildSearchQuery(seed: string): string {
  return seed
    .replace(/[*_~`#]/g, '')
    .replace(/[\r\n]+/g, '')
    .trim()
    .slice(0, QUERY_LENGTH);
}

/**
 * Best-effort web context for model prompts. Errors are retried up to
 * `maxRetries` times and then degrade to no results.
 */
export class SearchAugmenter {
  private readonly provider: SearchProvider;

  private readonly maxRetries: number;

  private readonly resultLimit: number;

  private readonly logger: CurationLogger;

  constructor(options: SearchAugmenterOptions) {
    this.provider = options.provider;
    this.maxRetries = options.maxRetries ?? 2;
    this.resultLimit = options.resultLimit ?? 5;
    this.logger = options.logger ?? defaultLogger;
  }

  async lookup(seed: string): Promise<SearchHit[]> {
    const query = buildSearchQuery(seed);
    if (!query) {
      return [];
    }

    for (let attempt = 0; attempt <= this.maxRetries; attempt += 1) {
      try {
        const hits = await this.provider.search(query, { categories: ['general'] });
        return hits.slice(0, this.resultLimit);
      } catch (error) {
        this.logger.warn('search.request.failed', {
          code: error instanceof SearchRequestError ? error.code : 'SEARCH_REQUEST_FAILED',
          attempt,
          query,
          ...describeError(error),
        });
      }
    }

    this.logger.error('search.request.exhausted', { query, attempts: this.maxRetries + 1 });
    return [];
  }
}

export function formatSearchHits(hits: readonly SearchHit[]): string {
  return hits.map((hit, index) => `${index + 1}. ${hit.title}\n${hit.snippet}`).join('\n');
}
