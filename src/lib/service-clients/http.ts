import { constants } from 'node:crypto';
import { Effect, pipe, Schema } from 'effect';
import { Agent, type Dispatcher } from 'undici';
import type { AuthConfig } from '../config.js';
import {
  type ServiceError,
  ServiceAuthError,
  ServiceResponseError,
  ServiceTimeoutError,
  ServiceUnreachableError,
} from '../errors.js';
import { debug } from '../logger.js';

export interface TlsOptions {
  verifySsl: boolean;
  legacySsl: boolean;
}

/**
 * Build the Authorization header for the configured credential, if any
 */
export function buildAuthHeader(auth: AuthConfig | undefined): string | undefined {
  if (!auth) return undefined;
  switch (auth.type) {
    case 'token':
      return `Bearer ${auth.token}`;
    case 'basic':
      return `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString('base64')}`;
  }
}

/**
 * Dispatcher carrying per-service TLS settings.
 * Returns undefined for the defaults so the shared global dispatcher is used.
 */
export function createDispatcher(tls: TlsOptions): Dispatcher | undefined {
  if (tls.verifySsl && !tls.legacySsl) return undefined;

  return new Agent({
    connect: {
      rejectUnauthorized: tls.verifySsl,
      // Legacy renegotiation for servers without RFC 5746 support
      ...(tls.legacySsl ? { secureOptions: constants.SSL_OP_LEGACY_SERVER_CONNECT } : {}),
    },
  });
}

/**
 * Map a thrown fetch error to a service error
 */
export function toServiceError(service: string, timeoutMs: number, error: unknown): ServiceError {
  if (
    error instanceof ServiceAuthError ||
    error instanceof ServiceResponseError ||
    error instanceof ServiceTimeoutError ||
    error instanceof ServiceUnreachableError
  ) {
    return error;
  }
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new ServiceTimeoutError(service, timeoutMs);
  }
  const cause = error instanceof Error && error.cause instanceof Error ? `: ${error.cause.message}` : '';
  const message = error instanceof Error ? error.message : String(error);
  return new ServiceUnreachableError(service, `Failed to connect to ${service}: ${message}${cause}`);
}

export interface JsonRequest<T, I> {
  service: string;
  url: string;
  schema: Schema.Schema<T, I>;
  authHeader?: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

/**
 * GET a JSON document and decode it against a schema
 */
export function getJsonEffect<T, I>(request: JsonRequest<T, I>): Effect.Effect<T, ServiceError> {
  const { service, url, schema, authHeader, timeoutMs, dispatcher } = request;

  const makeRequest = Effect.tryPromise({
    try: async () => {
      debug(`${service}: GET ${url}`);
      const headers: Record<string, string> = { Accept: 'application/json' };
      if (authHeader) headers.Authorization = authHeader;

      const response = await fetch(url, {
        headers,
        signal: AbortSignal.timeout(timeoutMs),
        ...(dispatcher ? { dispatcher } : {}),
      });

      if (response.status === 401) {
        throw new ServiceAuthError(service, `${service} rejected the credentials (401)`, 401);
      }
      if (response.status === 403) {
        throw new ServiceAuthError(service, `${service} denied access (403)`, 403);
      }
      if (!response.ok) {
        const errorText = await response.text();
        throw new ServiceResponseError(
          service,
          `${service} request failed: ${response.status} ${errorText}`.trim(),
          response.status,
        );
      }

      const body = await response.text();
      try {
        const data: unknown = JSON.parse(body);
        return data;
      } catch {
        throw new ServiceResponseError(service, `${service} returned a non-JSON response`, response.status);
      }
    },
    catch: (error) => toServiceError(service, timeoutMs, error),
  });

  return pipe(
    makeRequest,
    Effect.flatMap((data) =>
      Schema.decodeUnknown(schema)(data).pipe(
        Effect.mapError((e) => new ServiceResponseError(service, `Invalid ${service} response: ${e}`, 200)),
      ),
    ),
  );
}
