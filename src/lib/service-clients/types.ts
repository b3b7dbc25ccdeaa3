import { Schema } from 'effect';
import type { Effect } from 'effect';
import type { ServiceError } from '../errors.js';

/**
 * Issue tracker results are issues, content service results are pages
 */
export type ResultSource = 'issue' | 'page';

/**
 * Service-independent search result
 */
export interface NormalizedResult {
  source: ResultSource;
  id: string;
  title: string;
  url: string;
  extra: Record<string, string>;
}

export interface SearchFilters {
  /** Project or space keys; empty means unrestricted */
  allowlist: readonly string[];
  /** Hard cap on returned results */
  maxResults: number;
}

/**
 * One page of search results plus the number of matches the service reported
 */
export interface SearchOutcome {
  results: NormalizedResult[];
  /** Upstream match count before the allowlist and maxResults cap */
  total: number;
}

export interface ConnectionTestResult {
  ok: boolean;
  detail: string;
}

/**
 * Anything that can run an OR-search and return normalized records
 */
export interface SearchService {
  readonly name: string;
  readonly label: string;
  readonly source: ResultSource;
  /** False when the service has no URL; such services are never searched */
  readonly configured: boolean;

  /** Search for records matching any of the terms */
  searchEffect(terms: readonly string[], filters: SearchFilters): Effect.Effect<SearchOutcome, ServiceError>;

  search(terms: readonly string[], filters: SearchFilters): Promise<SearchOutcome>;

  testConnection(): Promise<ConnectionTestResult>;

  /** Client-side configuration that must be part of any cache key */
  signature(): string;
}

// ================== Jira REST API v2 ==================

const NamedSchema = Schema.Struct({
  name: Schema.optional(Schema.String),
  iconUrl: Schema.optional(Schema.String),
});

/**
 * Issue as returned by /rest/api/2/search with the requested field list
 */
export const JiraIssueSchema = Schema.Struct({
  id: Schema.optional(Schema.String),
  key: Schema.String,
  fields: Schema.optional(
    Schema.Struct({
      summary: Schema.optional(Schema.NullOr(Schema.String)),
      status: Schema.optional(
        Schema.NullOr(
          Schema.Struct({
            name: Schema.optional(Schema.String),
            statusCategory: Schema.optional(Schema.Struct({ key: Schema.optional(Schema.String) })),
          }),
        ),
      ),
      issuetype: Schema.optional(Schema.NullOr(NamedSchema)),
      priority: Schema.optional(Schema.NullOr(NamedSchema)),
      assignee: Schema.optional(Schema.NullOr(Schema.Struct({ displayName: Schema.optional(Schema.String) }))),
      created: Schema.optional(Schema.NullOr(Schema.String)),
      updated: Schema.optional(Schema.NullOr(Schema.String)),
      project: Schema.optional(
        Schema.NullOr(
          Schema.Struct({
            key: Schema.optional(Schema.String),
            name: Schema.optional(Schema.String),
          }),
        ),
      ),
    }),
  ),
});
export type JiraIssue = Schema.Schema.Type<typeof JiraIssueSchema>;

export const JiraSearchResponseSchema = Schema.Struct({
  issues: Schema.optionalWith(Schema.Array(JiraIssueSchema), { default: () => [] }),
  total: Schema.optional(Schema.Number),
});
export type JiraSearchResponse = Schema.Schema.Type<typeof JiraSearchResponseSchema>;

export const JiraUserSchema = Schema.Struct({
  name: Schema.optional(Schema.String),
  displayName: Schema.optional(Schema.String),
});
export type JiraUser = Schema.Schema.Type<typeof JiraUserSchema>;

// ================== Confluence REST API v1 ==================

/**
 * Content entry from /rest/api/content/search with space,version,ancestors expanded
 */
export const ConfluenceContentSchema = Schema.Struct({
  id: Schema.String,
  type: Schema.optional(Schema.String),
  title: Schema.optional(Schema.String),
  space: Schema.optional(
    Schema.Struct({
      key: Schema.optional(Schema.String),
      name: Schema.optional(Schema.String),
    }),
  ),
  version: Schema.optional(
    Schema.Struct({
      when: Schema.optional(Schema.String),
      by: Schema.optional(Schema.Struct({ displayName: Schema.optional(Schema.String) })),
    }),
  ),
  ancestors: Schema.optionalWith(Schema.Array(Schema.Struct({ title: Schema.optional(Schema.String) })), {
    default: () => [],
  }),
  _links: Schema.optional(
    Schema.Struct({
      webui: Schema.optional(Schema.String),
    }),
  ),
});
export type ConfluenceContent = Schema.Schema.Type<typeof ConfluenceContentSchema>;

export const ConfluenceSearchResponseSchema = Schema.Struct({
  results: Schema.optionalWith(Schema.Array(ConfluenceContentSchema), { default: () => [] }),
  size: Schema.optional(Schema.Number),
  totalSize: Schema.optional(Schema.Number),
});
export type ConfluenceSearchResponse = Schema.Schema.Type<typeof ConfluenceSearchResponseSchema>;

export const ConfluenceUserSchema = Schema.Struct({
  username: Schema.optional(Schema.String),
  displayName: Schema.optional(Schema.String),
});
export type ConfluenceUser = Schema.Schema.Type<typeof ConfluenceUserSchema>;
