import { Effect, Either, pipe, type Schema } from 'effect';
import type { Dispatcher } from 'undici';
import type { ConfluenceConfig } from '../config.js';
import type { ServiceError } from '../errors.js';
import { runPromiseOrThrow } from '../run-effect.js';
import { buildAuthHeader, createDispatcher, getJsonEffect } from './http.js';
import { allOf, anyOf, dedupeById, inAllowlist } from './query-language.js';
import {
  type ConfluenceContent,
  ConfluenceSearchResponseSchema,
  ConfluenceUserSchema,
  type ConnectionTestResult,
  type NormalizedResult,
  type SearchFilters,
  type SearchOutcome,
  type SearchService,
} from './types.js';

export interface ConfluenceClientOptions {
  config: ConfluenceConfig;
  timeoutSeconds: number;
}

/**
 * Build the CQL for an OR-search over terms, limited to pages and optionally to spaces
 */
export function buildCql(terms: readonly string[], spaces: readonly string[] = []): string {
  const pages = `(${anyOf('text', '~', terms)}) AND type = page`;
  return allOf([pages, anyOf('space', '=', spaces)]);
}

/**
 * Map a Confluence content entry to the shared result shape
 */
export function normalizeConfluencePage(page: ConfluenceContent, baseUrl: string): NormalizedResult {
  return {
    source: 'page',
    id: page.id,
    title: page.title ?? '',
    url: `${baseUrl}${page._links?.webui ?? ''}`,
    extra: {
      spaceKey: page.space?.key ?? '',
      spaceName: page.space?.name ?? '',
      lastModified: page.version?.when ?? '',
      lastModifiedBy: page.version?.by?.displayName ?? '',
      breadcrumb: page.ancestors.map((ancestor) => ancestor.title ?? '').join(' > '),
    },
  };
}

/**
 * Confluence REST API v1 client
 * Server/Data Center URLs are used as-is; Cloud URLs must include the /wiki context path
 */
export class ConfluenceClient implements SearchService {
  readonly name = 'confluence';
  readonly label = 'Confluence';
  readonly source = 'page' as const;

  private config: ConfluenceConfig;
  readonly configured: boolean;

  private baseUrl: string;
  private authHeader: string | undefined;
  private timeoutMs: number;
  private dispatcher: Dispatcher | undefined;

  constructor(options: ConfluenceClientOptions) {
    this.config = options.config;
    this.baseUrl = options.config.url ?? '';
    this.configured = this.baseUrl.length > 0;
    this.authHeader = buildAuthHeader(options.config.auth);
    this.timeoutMs = options.timeoutSeconds * 1000;
    this.dispatcher = createDispatcher(options.config);
  }

  /** Authenticated GET below /rest/api */
  private get<T, I>(path: string, schema: Schema.Schema<T, I>): Effect.Effect<T, ServiceError> {
    return getJsonEffect({
      service: this.name,
      url: `${this.baseUrl}/rest/api${path}`,
      schema,
      authHeader: this.authHeader,
      timeoutMs: this.timeoutMs,
      dispatcher: this.dispatcher,
    });
  }

  /** Search pages matching any term (Effect version) */
  searchEffect(terms: readonly string[], filters: SearchFilters): Effect.Effect<SearchOutcome, ServiceError> {
    const usable = terms.filter((term) => term.length > 0);
    if (!this.configured || usable.length === 0) return Effect.succeed({ results: [], total: 0 });

    const params = new URLSearchParams({
      cql: buildCql(usable, filters.allowlist),
      limit: String(filters.maxResults),
      expand: 'space,version,ancestors',
    });

    return pipe(
      this.get(`/content/search?${params}`, ConfluenceSearchResponseSchema),
      Effect.map((response) => ({
        results: dedupeById(
          response.results
            .filter((page) => inAllowlist(filters.allowlist, [page.space?.key, page.space?.name]))
            .map((page) => normalizeConfluencePage(page, this.baseUrl)),
        ).slice(0, filters.maxResults),
        total: response.totalSize ?? response.size ?? response.results.length,
      })),
    );
  }

  /** Search pages matching any term (async version) */
  async search(terms: readonly string[], filters: SearchFilters): Promise<SearchOutcome> {
    return runPromiseOrThrow(this.searchEffect(terms, filters));
  }

  /** Verify URL and credentials against /user/current */
  async testConnection(): Promise<ConnectionTestResult> {
    if (!this.configured) {
      return { ok: false, detail: 'Confluence URL not configured' };
    }
    if (!this.authHeader) {
      return { ok: false, detail: 'Confluence credentials not configured (need token or username/password)' };
    }

    const result = await Effect.runPromise(Effect.either(this.get('/user/current', ConfluenceUserSchema)));
    if (Either.isLeft(result)) {
      return { ok: false, detail: result.left.message };
    }
    return { ok: true, detail: `Connected as ${result.right.displayName ?? result.right.username ?? 'Unknown'}` };
  }

  signature(): string {
    return JSON.stringify({ url: this.config.url });
  }
}
