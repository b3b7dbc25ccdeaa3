import { Effect } from 'effect';
import { describe, expect, test } from 'vitest';
import { Aggregator, createServiceEntries } from '../lib/aggregator.js';
import { parseConfig, type SearchFieldConfig } from '../lib/config.js';
import { type ServiceError, ServiceTimeoutError } from '../lib/errors.js';
import type { InventoryRecord } from '../lib/records.js';
import { ResultCache } from '../lib/result-cache.js';
import type {
  ConnectionTestResult,
  NormalizedResult,
  ResultSource,
  SearchFilters,
  SearchOutcome,
  SearchService,
} from '../lib/service-clients/types.js';

/**
 * In-process search service recording every call
 */
class FakeService implements SearchService {
  readonly label: string;
  configured = true;
  calls: { terms: readonly string[]; filters: SearchFilters }[] = [];

  constructor(
    readonly name: string,
    readonly source: ResultSource,
    private respond: (terms: readonly string[]) => Effect.Effect<SearchOutcome, ServiceError>,
  ) {
    this.label = name;
  }

  searchEffect(terms: readonly string[], filters: SearchFilters): Effect.Effect<SearchOutcome, ServiceError> {
    return Effect.suspend(() => {
      this.calls.push({ terms, filters });
      return this.respond(terms);
    });
  }

  async search(terms: readonly string[], filters: SearchFilters): Promise<SearchOutcome> {
    return Effect.runPromise(this.searchEffect(terms, filters));
  }

  async testConnection(): Promise<ConnectionTestResult> {
    return { ok: true, detail: 'fake' };
  }

  signature(): string {
    return this.name;
  }
}

function found(results: NormalizedResult[], total = results.length): Effect.Effect<SearchOutcome> {
  return Effect.succeed({ results, total });
}

function result(source: ResultSource, id: string, title = id): NormalizedResult {
  return { source, id, title, url: `https://example.test/${id}`, extra: {} };
}

const fields: SearchFieldConfig[] = [
  { name: 'Hostname', attribute: 'name', enabled: true },
  { name: 'Serial', attribute: 'serial', enabled: true },
  { name: 'Role', attribute: 'role.name', enabled: false },
];

const router: InventoryRecord = {
  type: 'device',
  id: '1',
  attributes: { id: 1, name: 'router-01', serial: 'SN999', role: { name: 'core' } },
};

function clock() {
  let now = 0;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

function filters(maxResults = 10): SearchFilters {
  return { allowlist: [], maxResults };
}

describe('Aggregator', () => {
  test('finds the issue that mentions a record', async () => {
    const issue = result('issue', 'NET-7', 'Replace fan in router-01');
    const jira = new FakeService('jira', 'issue', () => found([issue]));
    const confluence = new FakeService('confluence', 'page', () => found([]));
    const aggregator = new Aggregator({
      services: [
        { service: jira, filters: filters() },
        { service: confluence, filters: filters() },
      ],
      cacheTtlSeconds: 300,
    });

    const results = await aggregator.aggregate(router, fields);

    expect(results.terms).toEqual([
      { fieldName: 'Hostname', value: 'router-01' },
      { fieldName: 'Serial', value: 'SN999' },
    ]);
    expect(jira.calls[0].terms).toEqual(['router-01', 'SN999']);
    expect(results.issues).toEqual([issue]);
    expect(results.pages).toEqual([]);
    expect(results.failures).toEqual([]);
  });

  test('calls no service when no term resolves', async () => {
    const jira = new FakeService('jira', 'issue', () => found([result('issue', 'NET-1')]));
    const aggregator = new Aggregator({ services: [{ service: jira, filters: filters() }], cacheTtlSeconds: 300 });
    const record: InventoryRecord = { type: 'device', id: '2', attributes: { id: 2, name: null } };

    const results = await aggregator.aggregate(record, fields);

    expect(results).toEqual({
      issues: [],
      pages: [],
      terms: [],
      failures: [],
      services: [
        { service: 'jira', label: 'jira', source: 'issue', configured: true, total: 0, returned: 0, cached: false },
      ],
    });
    expect(jira.calls).toHaveLength(0);
  });

  test('keeps page results when the issue tracker times out', async () => {
    const timeout = new ServiceTimeoutError('jira', 30000);
    const jira = new FakeService('jira', 'issue', () => Effect.fail(timeout));
    const page = result('page', '98765', 'router-01 runbook');
    const confluence = new FakeService('confluence', 'page', () => found([page]));
    const aggregator = new Aggregator({
      services: [
        { service: jira, filters: filters() },
        { service: confluence, filters: filters() },
      ],
      cacheTtlSeconds: 300,
    });

    const results = await aggregator.aggregate(router, fields);

    expect(results.issues).toEqual([]);
    expect(results.pages).toEqual([page]);
    expect(results.failures).toEqual([{ service: 'jira', label: 'jira', source: 'issue', error: timeout }]);
  });

  test('caps each service at its maxResults', async () => {
    const many = ['1', '2', '3', '4', '5'].map((id) => result('page', id));
    const confluence = new FakeService('confluence', 'page', () => found(many));
    const aggregator = new Aggregator({
      services: [{ service: confluence, filters: filters(2) }],
      cacheTtlSeconds: 300,
    });

    const results = await aggregator.aggregate(router, fields);

    expect(results.pages.map((page) => page.id)).toEqual(['1', '2']);
  });

  test('does not merge results across services', async () => {
    const jira = new FakeService('jira', 'issue', () => found([result('issue', 'X-1')]));
    const confluence = new FakeService('confluence', 'page', () => found([result('page', 'X-1')]));
    const aggregator = new Aggregator({
      services: [
        { service: jira, filters: filters() },
        { service: confluence, filters: filters() },
      ],
      cacheTtlSeconds: 300,
    });

    const results = await aggregator.aggregate(router, fields);

    expect(results.issues.map((issue) => issue.id)).toEqual(['X-1']);
    expect(results.pages.map((page) => page.id)).toEqual(['X-1']);
  });

  describe('service summaries', () => {
    test('reports the upstream total next to the capped result count', async () => {
      const pages = ['1', '2', '3'].map((id) => result('page', id));
      const confluence = new FakeService('confluence', 'page', () => found(pages, 42));
      const aggregator = new Aggregator({
        services: [{ service: confluence, filters: filters(2) }],
        cacheTtlSeconds: 300,
      });

      const results = await aggregator.aggregate(router, fields);

      expect(results.services).toEqual([
        {
          service: 'confluence',
          label: 'confluence',
          source: 'page',
          configured: true,
          total: 42,
          returned: 2,
          cached: false,
        },
      ]);
    });

    test('marks a repeated search as cached', async () => {
      const jira = new FakeService('jira', 'issue', () => found([result('issue', 'NET-1')], 7));
      const aggregator = new Aggregator({ services: [{ service: jira, filters: filters() }], cacheTtlSeconds: 300 });

      const first = await aggregator.aggregate(router, fields);
      const second = await aggregator.aggregate(router, fields);

      expect(first.services[0].cached).toBe(false);
      expect(second.services[0]).toEqual({
        service: 'jira',
        label: 'jira',
        source: 'issue',
        configured: true,
        total: 7,
        returned: 1,
        cached: true,
      });
      expect(second.issues.map((issue) => issue.id)).toEqual(['NET-1']);
    });

    test('skips unconfigured services and reports them', async () => {
      const jira = new FakeService('jira', 'issue', () => found([result('issue', 'NET-1')]));
      jira.configured = false;
      const confluence = new FakeService('confluence', 'page', () => found([result('page', '5')]));
      const aggregator = new Aggregator({
        services: [
          { service: jira, filters: filters() },
          { service: confluence, filters: filters() },
        ],
        cacheTtlSeconds: 300,
      });

      const results = await aggregator.aggregate(router, fields);

      expect(jira.calls).toHaveLength(0);
      expect(results.issues).toEqual([]);
      expect(results.failures).toEqual([]);
      expect(results.services.map((summary) => [summary.service, summary.configured, summary.total])).toEqual([
        ['jira', false, 0],
        ['confluence', true, 1],
      ]);
      expect(aggregator.hasConfiguredServices).toBe(true);
    });

    test('gives a failed service a zero total', async () => {
      const jira = new FakeService('jira', 'issue', () => Effect.fail(new ServiceTimeoutError('jira', 30000)));
      const aggregator = new Aggregator({ services: [{ service: jira, filters: filters() }], cacheTtlSeconds: 300 });

      const results = await aggregator.aggregate(router, fields);

      expect(results.services).toEqual([
        { service: 'jira', label: 'jira', source: 'issue', configured: true, total: 0, returned: 0, cached: false },
      ]);
    });
  });

  describe('caching', () => {
    test('fetches once within the TTL and again after it', async () => {
      const time = clock();
      const jira = new FakeService('jira', 'issue', () => found([result('issue', 'NET-1')]));
      const aggregator = new Aggregator({
        services: [{ service: jira, filters: filters() }],
        cacheTtlSeconds: 60,
        cache: new ResultCache<SearchOutcome>({ now: time.now }),
      });

      await aggregator.aggregate(router, fields);
      time.advance(59_000);
      await aggregator.aggregate(router, fields);
      expect(jira.calls).toHaveLength(1);

      time.advance(1_000);
      await aggregator.aggregate(router, fields);
      expect(jira.calls).toHaveLength(2);
    });

    test('does not cache failures', async () => {
      let failing = true;
      const jira = new FakeService('jira', 'issue', () =>
        failing ? Effect.fail(new ServiceTimeoutError('jira', 5000)) : found([result('issue', 'NET-1')]),
      );
      const aggregator = new Aggregator({ services: [{ service: jira, filters: filters() }], cacheTtlSeconds: 300 });

      const first = await aggregator.aggregate(router, fields);
      failing = false;
      const second = await aggregator.aggregate(router, fields);

      expect(first.failures).toHaveLength(1);
      expect(second.issues.map((issue) => issue.id)).toEqual(['NET-1']);
      expect(jira.calls).toHaveLength(2);
    });

    test('uses a new key when the field set changes', async () => {
      const jira = new FakeService('jira', 'issue', () => found([]));
      const aggregator = new Aggregator({ services: [{ service: jira, filters: filters() }], cacheTtlSeconds: 300 });

      await aggregator.aggregate(router, fields);
      await aggregator.aggregate(
        router,
        fields.map((field) => ({ ...field, enabled: true })),
      );

      expect(jira.calls).toHaveLength(2);
      expect(jira.calls[1].terms).toEqual(['router-01', 'SN999', 'core']);
    });

    test('always fetches with a TTL of zero', async () => {
      const jira = new FakeService('jira', 'issue', () => found([]));
      const aggregator = new Aggregator({ services: [{ service: jira, filters: filters() }], cacheTtlSeconds: 0 });

      await aggregator.aggregate(router, fields);
      await aggregator.aggregate(router, fields);

      expect(jira.calls).toHaveLength(2);
    });
  });
});

describe('createServiceEntries', () => {
  test('keeps a service without a URL as unconfigured', () => {
    const entries = createServiceEntries(
      parseConfig({ confluence: { url: 'https://wiki.example.com', spaces: ['OPS'], maxResults: 5 } }),
    );
    expect(entries.map((entry) => [entry.service.name, entry.service.configured])).toEqual([
      ['jira', false],
      ['confluence', true],
    ]);
    expect(entries[1].filters).toEqual({ allowlist: ['OPS'], maxResults: 5 });
  });

  test('treats an empty URL as unconfigured', () => {
    const entries = createServiceEntries(parseConfig({ jira: { url: '' } }));
    expect(entries.map((entry) => entry.service.configured)).toEqual([false, false]);
    expect(new Aggregator({ services: entries, cacheTtlSeconds: 0 }).hasConfiguredServices).toBe(false);
  });

  test('uses project allowlist and maxResults for Jira', () => {
    const entries = createServiceEntries(
      parseConfig({
        jira: { url: 'https://jira.example.com', projects: ['NET', 'OPS'] },
        confluence: { url: 'https://wiki.example.com' },
      }),
    );
    expect(entries.map((entry) => entry.service.name)).toEqual(['jira', 'confluence']);
    expect(entries[0].filters).toEqual({ allowlist: ['NET', 'OPS'], maxResults: 10 });
  });
});
