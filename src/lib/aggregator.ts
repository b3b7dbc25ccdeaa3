import { Effect, pipe } from 'effect';
import {
  type Config,
  emptyConfluenceConfig,
  emptyJiraConfig,
  fieldsForRecordType,
  type SearchFieldConfig,
} from './config.js';
import type { ServiceError } from './errors.js';
import { debug } from './logger.js';
import { buildTerms, fieldSetSignature, type ResolvedTerm, termValues } from './query-builder.js';
import type { InventoryRecord } from './records.js';
import { buildCacheKey, ResultCache } from './result-cache.js';
import { ConfluenceClient } from './service-clients/confluence-client.js';
import { JiraClient } from './service-clients/jira-client.js';
import type {
  NormalizedResult,
  ResultSource,
  SearchFilters,
  SearchOutcome,
  SearchService,
} from './service-clients/types.js';

/**
 * A search service together with the filters it is queried with
 */
export interface ServiceEntry {
  service: SearchService;
  filters: SearchFilters;
}

export interface ServiceFailure {
  service: string;
  label: string;
  source: ResultSource;
  error: ServiceError;
}

/**
 * Per-service outcome of one aggregation
 */
export interface ServiceSummary {
  service: string;
  label: string;
  source: ResultSource;
  configured: boolean;
  /** Matches the service reported; 0 when not searched or failed */
  total: number;
  /** Results kept after the allowlist and maxResults cap */
  returned: number;
  cached: boolean;
}

/**
 * Combined results for presentation; issues and pages are independent lists
 */
export interface AggregatedResults {
  issues: NormalizedResult[];
  pages: NormalizedResult[];
  terms: ResolvedTerm[];
  failures: ServiceFailure[];
  services: ServiceSummary[];
}

export interface AggregatorOptions {
  services: readonly ServiceEntry[];
  /** Cache TTL in seconds; 0 disables caching */
  cacheTtlSeconds: number;
  cache?: ResultCache<SearchOutcome>;
}

interface ServiceOutcome {
  results: NormalizedResult[];
  summary: ServiceSummary;
  failure?: ServiceFailure;
}

function summarize(service: SearchService, fields: Partial<ServiceSummary> = {}): ServiceSummary {
  return {
    service: service.name,
    label: service.label,
    source: service.source,
    configured: service.configured,
    total: 0,
    returned: 0,
    cached: false,
    ...fields,
  };
}

/**
 * Resolve terms for a record, fan out to every configured service and merge the results
 */
export class Aggregator {
  private services: readonly ServiceEntry[];
  private cacheTtlSeconds: number;
  private cache: ResultCache<SearchOutcome>;

  constructor(options: AggregatorOptions) {
    this.services = options.services;
    this.cacheTtlSeconds = options.cacheTtlSeconds;
    this.cache = options.cache ?? new ResultCache<SearchOutcome>();
  }

  get serviceEntries(): readonly ServiceEntry[] {
    return this.services;
  }

  get hasConfiguredServices(): boolean {
    return this.services.some((entry) => entry.service.configured);
  }

  private searchService(
    entry: ServiceEntry,
    record: InventoryRecord,
    fields: readonly SearchFieldConfig[],
    terms: readonly string[],
  ): Effect.Effect<ServiceOutcome> {
    const { service, filters } = entry;
    if (!service.configured) {
      return Effect.succeed({ results: [], summary: summarize(service) });
    }

    const key = buildCacheKey({
      service: service.name,
      recordType: record.type,
      recordId: record.id,
      fieldSignature: fieldSetSignature(fields),
      serviceSignature: JSON.stringify([service.signature(), filters.allowlist, filters.maxResults]),
      terms,
    });

    return pipe(
      this.cache.getOrFetchEffect(key, this.cacheTtlSeconds, service.searchEffect(terms, filters)),
      Effect.map(({ value, cached }): ServiceOutcome => {
        const results = value.results.slice(0, filters.maxResults);
        return { results, summary: summarize(service, { total: value.total, returned: results.length, cached }) };
      }),
      Effect.catchAll((error) =>
        Effect.sync((): ServiceOutcome => {
          debug(`${service.name}: search failed for ${record.type} ${record.id}: ${error.message}`);
          return {
            results: [],
            summary: summarize(service),
            failure: { service: service.name, label: service.label, source: service.source, error },
          };
        }),
      ),
    );
  }

  /**
   * Aggregate results for a record (Effect version); never fails
   */
  aggregateEffect(record: InventoryRecord, fields: readonly SearchFieldConfig[]): Effect.Effect<AggregatedResults> {
    const terms = buildTerms(record.attributes, fields);
    if (terms.length === 0) {
      debug(`No search terms for ${record.type} ${record.id}; skipping services`);
      return Effect.succeed({
        issues: [],
        pages: [],
        terms: [],
        failures: [],
        services: this.services.map((entry) => summarize(entry.service)),
      });
    }

    const values = termValues(terms);
    return pipe(
      Effect.all(
        this.services.map((entry) => this.searchService(entry, record, fields, values)),
        { concurrency: 'unbounded' },
      ),
      Effect.map((outcomes) => {
        const aggregated: AggregatedResults = { issues: [], pages: [], terms, failures: [], services: [] };
        for (const outcome of outcomes) {
          const target = outcome.summary.source === 'issue' ? aggregated.issues : aggregated.pages;
          target.push(...outcome.results);
          aggregated.services.push(outcome.summary);
          if (outcome.failure) aggregated.failures.push(outcome.failure);
        }
        return aggregated;
      }),
    );
  }

  /**
   * Aggregate results for a record (async version)
   */
  async aggregate(record: InventoryRecord, fields: readonly SearchFieldConfig[]): Promise<AggregatedResults> {
    return Effect.runPromise(this.aggregateEffect(record, fields));
  }
}

/**
 * Build the Jira and Confluence service entries; a service without a URL is kept but unconfigured
 */
export function createServiceEntries(config: Config): ServiceEntry[] {
  const jira = config.jira ?? emptyJiraConfig();
  const confluence = config.confluence ?? emptyConfluenceConfig();
  return [
    {
      service: new JiraClient({ config: jira, timeoutSeconds: config.timeout }),
      filters: { allowlist: jira.projects, maxResults: jira.maxResults },
    },
    {
      service: new ConfluenceClient({ config: confluence, timeoutSeconds: config.timeout }),
      filters: { allowlist: confluence.spaces, maxResults: confluence.maxResults },
    },
  ];
}

export function createAggregator(config: Config, cache?: ResultCache<SearchOutcome>): Aggregator {
  return new Aggregator({ services: createServiceEntries(config), cacheTtlSeconds: config.cacheTimeout, cache });
}

/**
 * Aggregate using the field set configured for the record's type
 */
export async function aggregateRecord(
  aggregator: Aggregator,
  record: InventoryRecord,
  config: Config,
): Promise<AggregatedResults> {
  return aggregator.aggregate(record, fieldsForRecordType(config, record.type));
}
