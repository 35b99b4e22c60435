/**
 * Brave Search Client
 *
 * Web and image search through the Brave Search API. Returns typed results
 * wrapped in a Result so the dispatcher can feed failures back to the model
 * instead of aborting the run. The API key comes from BRAVE_SEARCH_API_KEY or
 * research_settings.yaml (resolved into ResearchConfig at startup).
 *
 * Dependencies:
 * - zod: validates the API response shape
 */
import { z } from 'zod';
import { ToolError, errorMessage } from '../utils/errors.js';
import { toolLogger, type Logger } from '../utils/logger.js';
import { err, ok, type Result } from '../utils/result.js';

const WEB_SEARCH_URL = 'https://api.search.brave.com/res/v1/web/search';
const IMAGE_SEARCH_URL = 'https://api.search.brave.com/res/v1/images/search';

export interface SearchResult {
  title: string;
  url: string;
  description: string;
}

export interface ImageSearchHit {
  title: string;
  imageUrl: string;
  sourceUrl: string;
  width: number;
  height: number;
}

const WebSearchResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().optional(),
            url: z.string().optional(),
            description: z.string().optional(),
          })
        )
        .default([]),
    })
    .optional(),
});

const ImageSearchResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().optional(),
        url: z.string().optional(),
        properties: z
          .object({
            url: z.string().optional(),
            width: z.number().optional(),
            height: z.number().optional(),
          })
          .optional(),
      })
    )
    .default([]),
});

export interface BraveSearchOptions {
  apiKey: string | undefined;
  resultsPerQuery: number;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

/** Full-width spaces are common in CJK queries; the API expects ASCII ones. */
export function normalizeQuery(query: string): string {
  return query.replace(/\u3000/g, ' ').trim();
}

export class BraveSearchClient {
  private readonly options: BraveSearchOptions;
  private readonly fetch: typeof fetch;
  private readonly logger: Logger;

  constructor(options: BraveSearchOptions) {
    this.options = options;
    this.fetch = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.logger = options.logger ?? toolLogger;
  }

  async search(query: string): Promise<Result<SearchResult[], ToolError>> {
    const response = await this.request('search', WEB_SEARCH_URL, {
      q: normalizeQuery(query),
      offset: '0',
      count: String(this.options.resultsPerQuery),
    });
    if (!response.ok) {
      return response;
    }

    const parsed = WebSearchResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(new ToolError('search', 'Search API returned an unexpected response'));
    }

    const results: SearchResult[] = [];
    for (const result of parsed.data.web?.results ?? []) {
      if (!result.title || !result.url) {
        continue;
      }
      results.push({ title: result.title, url: result.url, description: result.description ?? '' });
    }

    this.logger.info({ query, results: results.length }, 'Web search completed');
    return ok(results);
  }

  async imageSearch(query: string, count: number): Promise<Result<ImageSearchHit[], ToolError>> {
    const response = await this.request('image_search', IMAGE_SEARCH_URL, {
      q: normalizeQuery(query),
      offset: '0',
      count: String(count),
    });
    if (!response.ok) {
      return response;
    }

    const parsed = ImageSearchResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(new ToolError('image_search', 'Image search API returned an unexpected response'));
    }

    const hits: ImageSearchHit[] = [];
    for (const result of parsed.data.results) {
      const imageUrl = result.properties?.url;
      if (!imageUrl) {
        continue;
      }
      hits.push({
        title: result.title ?? '',
        imageUrl,
        sourceUrl: result.url ?? '',
        width: result.properties?.width ?? 0,
        height: result.properties?.height ?? 0,
      });
    }

    this.logger.info({ query, hits: hits.length }, 'Image search completed');
    return ok(hits);
  }

  private async request(
    tool: string,
    endpoint: string,
    params: Record<string, string>
  ): Promise<Result<unknown, ToolError>> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      return err(
        new ToolError(tool, 'BRAVE_SEARCH_API_KEY not found in environment variables or research_settings.yaml')
      );
    }

    const url = new URL(endpoint);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    try {
      const response = await this.fetch(url.toString(), {
        headers: {
          Accept: 'application/json',
          'Accept-Encoding': 'gzip',
          'X-Subscription-Token': apiKey,
        },
        signal: this.options.timeoutMs ? AbortSignal.timeout(this.options.timeoutMs) : undefined,
      });

      if (response.status >= 300) {
        this.logger.warn({ tool, status: response.status }, 'Search API error');
        return err(new ToolError(tool, `Search API returned ${response.status}`));
      }

      const data: unknown = await response.json();
      return ok(data);
    } catch (error) {
      this.logger.warn({ tool, error: errorMessage(error) }, 'Search request failed');
      return err(new ToolError(tool, `Search request failed: ${errorMessage(error)}`, { cause: error }));
    }
  }
}
