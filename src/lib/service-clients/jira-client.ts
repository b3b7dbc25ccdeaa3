import { Effect, Either, pipe, type Schema } from 'effect';
import type { Dispatcher } from 'undici';
import type { JiraConfig } from '../config.js';
import type { ServiceError } from '../errors.js';
import { runPromiseOrThrow } from '../run-effect.js';
import { buildAuthHeader, createDispatcher, getJsonEffect } from './http.js';
import { allOf, anyOf, dedupeById, inAllowlist } from './query-language.js';
import {
  type ConnectionTestResult,
  type JiraIssue,
  JiraSearchResponseSchema,
  JiraUserSchema,
  type NormalizedResult,
  type SearchFilters,
  type SearchOutcome,
  type SearchService,
} from './types.js';

const SEARCH_FIELDS = 'summary,status,issuetype,priority,assignee,created,updated,project';

export interface JiraClientOptions {
  config: JiraConfig;
  timeoutSeconds: number;
}

/**
 * Build the JQL for an OR-search over terms, restricted to projects and issue types
 */
export function buildJql(
  terms: readonly string[],
  projects: readonly string[] = [],
  issueTypes: readonly string[] = [],
): string {
  const jql = allOf([anyOf('text', '~', terms), anyOf('project', '=', projects), anyOf('issuetype', '=', issueTypes)]);
  return `${jql} ORDER BY updated DESC`;
}

/**
 * Map a Jira issue to the shared result shape
 */
export function normalizeJiraIssue(issue: JiraIssue, baseUrl: string): NormalizedResult {
  const fields = issue.fields;
  return {
    source: 'issue',
    id: issue.key,
    title: fields?.summary ?? '',
    url: `${baseUrl}/browse/${issue.key}`,
    extra: {
      status: fields?.status?.name ?? '',
      statusCategory: fields?.status?.statusCategory?.key ?? '',
      type: fields?.issuetype?.name ?? '',
      typeIcon: fields?.issuetype?.iconUrl ?? '',
      priority: fields?.priority?.name ?? '',
      priorityIcon: fields?.priority?.iconUrl ?? '',
      assignee: fields?.assignee?.displayName ?? 'Unassigned',
      created: fields?.created ?? '',
      updated: fields?.updated ?? '',
      project: fields?.project?.name ?? '',
      projectKey: fields?.project?.key ?? '',
    },
  };
}

/**
 * Jira REST API v2 client (Server/Data Center and Cloud)
 */
export class JiraClient implements SearchService {
  readonly name = 'jira';
  readonly label = 'Jira';
  readonly source = 'issue' as const;

  private config: JiraConfig;
  readonly configured: boolean;

  private baseUrl: string;
  private authHeader: string | undefined;
  private timeoutMs: number;
  private dispatcher: Dispatcher | undefined;

  constructor(options: JiraClientOptions) {
    this.config = options.config;
    this.baseUrl = options.config.url ?? '';
    this.configured = this.baseUrl.length > 0;
    this.authHeader = buildAuthHeader(options.config.auth);
    this.timeoutMs = options.timeoutSeconds * 1000;
    this.dispatcher = createDispatcher(options.config);
  }

  /** Authenticated GET below /rest/api/2 */
  private get<T, I>(path: string, schema: Schema.Schema<T, I>): Effect.Effect<T, ServiceError> {
    return getJsonEffect({
      service: this.name,
      url: `${this.baseUrl}/rest/api/2${path}`,
      schema,
      authHeader: this.authHeader,
      timeoutMs: this.timeoutMs,
      dispatcher: this.dispatcher,
    });
  }

  /** Search issues matching any term (Effect version) */
  searchEffect(terms: readonly string[], filters: SearchFilters): Effect.Effect<SearchOutcome, ServiceError> {
    const usable = terms.filter((term) => term.length > 0);
    if (!this.configured || usable.length === 0) return Effect.succeed({ results: [], total: 0 });

    const params = new URLSearchParams({
      jql: buildJql(usable, filters.allowlist, this.config.issueTypes),
      maxResults: String(filters.maxResults),
      fields: SEARCH_FIELDS,
    });

    return pipe(
      this.get(`/search?${params}`, JiraSearchResponseSchema),
      Effect.map((response) => ({
        results: dedupeById(
          response.issues
            .filter((issue) => {
              const project = issue.fields?.project;
              return inAllowlist(filters.allowlist, [project?.key, project?.name]);
            })
            .map((issue) => normalizeJiraIssue(issue, this.baseUrl)),
        ).slice(0, filters.maxResults),
        total: response.total ?? response.issues.length,
      })),
    );
  }

  /** Search issues matching any term (async version) */
  async search(terms: readonly string[], filters: SearchFilters): Promise<SearchOutcome> {
    return runPromiseOrThrow(this.searchEffect(terms, filters));
  }

  /** Verify URL and credentials against /myself */
  async testConnection(): Promise<ConnectionTestResult> {
    if (!this.configured) {
      return { ok: false, detail: 'Jira URL not configured' };
    }
    if (!this.authHeader) {
      return { ok: false, detail: 'Jira credentials not configured (need token or username/password)' };
    }

    const result = await Effect.runPromise(Effect.either(this.get('/myself', JiraUserSchema)));
    if (Either.isLeft(result)) {
      return { ok: false, detail: result.left.message };
    }
    return { ok: true, detail: `Connected as ${result.right.displayName ?? result.right.name ?? 'Unknown'}` };
  }

  signature(): string {
    const { url, issueTypes } = this.config;
    return JSON.stringify({ url, issueTypes });
  }
}
