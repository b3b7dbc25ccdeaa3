import { createHash } from 'node:crypto';
import { Effect, pipe } from 'effect';
import { runPromiseOrThrow } from './run-effect.js';

export interface CacheEntry<A> {
  key: string;
  value: A;
  createdAt: number;
  ttlSeconds: number;
}

/**
 * A value together with whether it came from the cache
 */
export interface CacheLookup<A> {
  value: A;
  cached: boolean;
}

export interface ResultCacheOptions {
  /** Clock in epoch milliseconds */
  now?: () => number;
}

/**
 * Time-bounded memoization of fetch results.
 *
 * Entries expire after their TTL and are replaced lazily on the next lookup.
 * Only successful fetches are stored; concurrent misses for one key may both fetch.
 */
export class ResultCache<A> {
  private entries = new Map<string, CacheEntry<A>>();
  private now: () => number;

  constructor(options: ResultCacheOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Return the live value for a key, or undefined when absent or expired
   */
  lookup(key: string): A | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.createdAt < entry.ttlSeconds * 1000) return entry.value;
    return undefined;
  }

  store(key: string, value: A, ttlSeconds: number): void {
    if (ttlSeconds <= 0) return;
    this.entries.set(key, { key, value, createdAt: this.now(), ttlSeconds });
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Cached value for key, or run fetch and store its result (Effect version).
   * `cached` is true only when the value was served from a live entry.
   * A ttl of zero or less disables caching.
   */
  getOrFetchEffect<E>(key: string, ttlSeconds: number, fetch: Effect.Effect<A, E>): Effect.Effect<CacheLookup<A>, E> {
    return Effect.suspend((): Effect.Effect<CacheLookup<A>, E> => {
      const cached = ttlSeconds > 0 ? this.lookup(key) : undefined;
      if (cached !== undefined) return Effect.succeed({ value: cached, cached: true });
      return pipe(
        fetch,
        Effect.tap((value) => Effect.sync(() => this.store(key, value, ttlSeconds))),
        Effect.map((value) => ({ value, cached: false })),
      );
    });
  }

  /**
   * Cached value for key, or call fetchFn and store its result (async version)
   */
  async getOrFetch(key: string, ttlSeconds: number, fetchFn: () => Promise<A>): Promise<A> {
    const lookup = await runPromiseOrThrow(
      this.getOrFetchEffect(
        key,
        ttlSeconds,
        Effect.tryPromise({ try: fetchFn, catch: (error) => error }),
      ),
    );
    return lookup.value;
  }
}

export interface CacheKeyParts {
  service: string;
  recordType: string;
  recordId: string;
  fieldSignature: string;
  serviceSignature: string;
  terms: readonly string[];
}

/**
 * Deterministic cache key; any change in fields, service filters or terms yields a new key
 */
export function buildCacheKey(parts: CacheKeyParts): string {
  const digest = createHash('sha256')
    .update(JSON.stringify([parts.fieldSignature, parts.serviceSignature, parts.terms]))
    .digest('hex')
    .slice(0, 16);
  return `ixr:${parts.service}:${parts.recordType}:${parts.recordId}:${digest}`;
}
