/**
 * ApiClient: authenticated, rate-limited access to the tenant's REST API.
 *
 * Every module call goes through `call`, which applies the shared token
 * bucket and in-flight gate, retries per `planRetry`, and re-authenticates
 * once on a 401. Modules never see the client itself; they get a
 * `TenantApi` scope bound to their cancellation signal (and read-only
 * during dry runs).
 */

import { randomUUID } from 'node:crypto';
import { createLogger, type Logger } from '../logger.js';
import { isRecord } from '../redactor.js';
import {
  AuthError,
  DryRunViolationError,
  NetworkError,
  RateLimitedError,
  RemoteError,
  isSimError,
  type SimError,
} from '../sim-error.js';
import { ConcurrencyGate } from './concurrency-gate.js';
import { parseNextCursor } from './link-header.js';
import { DEFAULT_RATE_LIMIT, RateLimiter, type RateLimiterConfig } from './rate-limiter.js';
import { DEFAULT_RETRY_POLICY, planRetry, retryHintMs, type RetryPolicy } from './retry-policy.js';
import { sleep as defaultSleep, throwIfAborted, type SleepFn } from './sleep.js';
import {
  NodeHttpTransport,
  type HttpMethod,
  type HttpResponse,
  type HttpTransport,
} from './transport.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Credentials =
  | { kind: 'api-token'; token: string }
  | { kind: 'password'; username: string; password: string };

export interface Principal {
  id: string;
  login: string;
}

export interface Session {
  kind: Credentials['kind'];
  principal: Principal;
  authenticatedAt: string;
}

export type QueryValue = string | number | boolean | undefined;

export interface CallOptions {
  query?: Record<string, QueryValue>;
  body?: unknown;
  signal?: AbortSignal;
}

export interface ApiResponse<T> {
  status: number;
  headers: Record<string, string>;
  body: T;
}

export interface PaginateOptions {
  query?: Record<string, QueryValue>;
  /** Resume from a cursor a previous page reported. */
  cursor?: string | null;
  pageSize?: number;
  signal?: AbortSignal;
}

export interface ApiPage<T> {
  items: T[];
  /** Cursor this page was fetched with (null for the first page). */
  cursor: string | null;
  /** Cursor of the following page, null on the last one. */
  nextCursor: string | null;
  index: number;
}

/** The surface modules use to reach the tenant. */
export interface TenantApi {
  call<T = unknown>(method: HttpMethod, path: string, options?: CallOptions): Promise<ApiResponse<T>>;
  paginate<T = unknown>(path: string, options?: PaginateOptions): AsyncGenerator<ApiPage<T>>;
  list<T = unknown>(path: string, options?: PaginateOptions): Promise<T[]>;
}

export interface ScopeOptions {
  signal?: AbortSignal;
  /** Refuse every non-GET call with DryRunViolationError. */
  readOnly?: boolean;
}

export interface ApiClientOptions {
  /** Tenant base URL, e.g. `https://acme.example.com`. */
  orgUrl: string;
  credentials: Credentials;
  transport?: HttpTransport;
  retry?: RetryPolicy;
  rateLimit?: RateLimiterConfig;
  /** Calls allowed on the wire at once (default 4). */
  maxInFlight?: number;
  requestTimeoutMs?: number;
  logger?: Logger;
  sleep?: SleepFn;
  now?: () => number;
}

const API_PREFIX = '/api/v1';
const USER_AGENT = 'tinman/0.1.0';
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_IN_FLIGHT = 4;

// ---------------------------------------------------------------------------
// ApiClient
// ---------------------------------------------------------------------------

export class ApiClient implements TenantApi {
  readonly baseUrl: string;
  private credentials: Credentials;
  private readonly transport: HttpTransport;
  private readonly retry: RetryPolicy;
  private readonly limiter: RateLimiter;
  private readonly gate: ConcurrencyGate;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  private session: Session | undefined;
  private cookie: string | undefined;
  private pendingAuth: Promise<Session> | undefined;
  /** Bumped on every successful authentication. */
  private authGeneration = 0;

  constructor(options: ApiClientOptions) {
    this.baseUrl = apiBaseUrl(options.orgUrl);
    this.credentials = options.credentials;
    this.transport = options.transport ?? new NodeHttpTransport();
    this.retry = options.retry ?? { ...DEFAULT_RETRY_POLICY };
    this.now = options.now ?? Date.now;
    this.limiter = new RateLimiter(options.rateLimit ?? { ...DEFAULT_RATE_LIMIT }, this.now);
    this.gate = new ConcurrencyGate(options.maxInFlight ?? DEFAULT_MAX_IN_FLIGHT);
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger('api-client');
    this.sleep = options.sleep ?? defaultSleep;
  }

  get currentSession(): Session | undefined {
    return this.session;
  }

  /** Highest number of calls that were on the wire at once. */
  get peakInFlight(): number {
    return this.gate.peak;
  }

  // -----------------------------------------------------------------------
  // Authentication
  // -----------------------------------------------------------------------

  /**
   * Establish (or re-establish) the session. Concurrent callers share one
   * authentication attempt.
   */
  authenticate(credentials?: Credentials): Promise<Session> {
    if (credentials) {
      this.credentials = credentials;
    }
    if (!this.pendingAuth) {
      this.pendingAuth = this.performAuthentication().finally(() => {
        this.pendingAuth = undefined;
      });
    }
    return this.pendingAuth;
  }

  private async performAuthentication(): Promise<Session> {
    const credentials = this.credentials;
    this.cookie = undefined;

    try {
      if (credentials.kind === 'password') {
        this.cookie = await this.openSession(credentials.username, credentials.password);
      }

      const me = await this.execute<unknown>('GET', '/users/me', {}, false);
      const principal = toPrincipal(me.body);
      if (!principal) {
        throw new AuthError('Identity lookup returned no user');
      }

      this.session = {
        kind: credentials.kind,
        principal,
        authenticatedAt: new Date(this.now()).toISOString(),
      };
      this.authGeneration += 1;
      this.logger.info('authenticated', { principal: principal.login, kind: credentials.kind });
      return this.session;
    } catch (err) {
      this.session = undefined;
      if (err instanceof RemoteError && (err.status === 401 || err.status === 403)) {
        throw new AuthError(`Authentication failed: ${err.message}`, err.status);
      }
      throw err;
    }
  }

  private async openSession(username: string, password: string): Promise<string> {
    const authn = await this.execute<unknown>(
      'POST',
      '/authn',
      { body: { username, password } },
      false,
    );
    const status = isRecord(authn.body) ? authn.body['status'] : undefined;
    const sessionToken = isRecord(authn.body) ? authn.body['sessionToken'] : undefined;
    if (status !== 'SUCCESS' || typeof sessionToken !== 'string') {
      throw new AuthError(`Primary authentication ended in status ${String(status ?? 'unknown')}`);
    }

    const created = await this.execute<unknown>('POST', '/sessions', { body: { sessionToken } }, false);
    const sessionId = isRecord(created.body) ? created.body['id'] : undefined;
    if (typeof sessionId !== 'string') {
      throw new AuthError('Session exchange returned no session id');
    }
    return `sid=${sessionId}`;
  }

  // -----------------------------------------------------------------------
  // Calls
  // -----------------------------------------------------------------------

  call<T = unknown>(
    method: HttpMethod,
    path: string,
    options: CallOptions = {},
  ): Promise<ApiResponse<T>> {
    return this.execute<T>(method, path, options, true);
  }

  async *paginate<T = unknown>(
    path: string,
    options: PaginateOptions = {},
  ): AsyncGenerator<ApiPage<T>> {
    let cursor = options.cursor ?? null;
    let index = 0;

    for (;;) {
      const query: Record<string, QueryValue> = { ...options.query };
      if (options.pageSize !== undefined) query['limit'] = options.pageSize;
      if (cursor !== null) query['after'] = cursor;

      const response = await this.call<T[]>('GET', path, { query, signal: options.signal });
      const items = Array.isArray(response.body) ? response.body : [];
      const nextCursor = parseNextCursor(response.headers['link']);

      yield { items, cursor, nextCursor, index };

      if (nextCursor === null || nextCursor === cursor) return;
      cursor = nextCursor;
      index += 1;
    }
  }

  async list<T = unknown>(path: string, options: PaginateOptions = {}): Promise<T[]> {
    const items: T[] = [];
    for await (const page of this.paginate<T>(path, options)) {
      items.push(...page.items);
    }
    return items;
  }

  /** A view of this client bound to a signal, optionally read-only. */
  scope(options: ScopeOptions): TenantApi {
    return new ScopedTenantApi(this, options);
  }

  close(): void {
    this.transport.close?.();
    this.session = undefined;
    this.cookie = undefined;
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  private async execute<T>(
    method: HttpMethod,
    path: string,
    options: CallOptions,
    allowReauth: boolean,
  ): Promise<ApiResponse<T>> {
    const { signal } = options;
    const url = this.buildUrl(path, options.query);
    const started = this.now();
    let attempt = 0;
    let reauthenticated = false;

    for (;;) {
      throwIfAborted(signal);
      attempt += 1;
      const generation = this.authGeneration;

      let response: HttpResponse;
      try {
        response = await this.send(method, path, url, options);
      } catch (err) {
        if (isSimError(err)) throw err;
        const failure = new NetworkError(`${method} ${path} failed: ${errorMessage(err)}`, err);
        await this.backoff(failure, attempt, started, signal);
        continue;
      }

      if (response.status >= 200 && response.status < 300) {
        const body = parseBody(method, path, response) as T;
        return { status: response.status, headers: response.headers, body };
      }

      if (response.status === 401 && allowReauth && !reauthenticated) {
        reauthenticated = true;
        attempt -= 1;
        // Another caller already re-authenticated while this one was in flight.
        if (generation === this.authGeneration) {
          this.logger.warn('credentials rejected, re-authenticating', { method, path });
          await this.authenticate();
        }
        continue;
      }

      if (response.status === 401) {
        throw new AuthError(`${method} ${path} was rejected as unauthenticated`, 401);
      }

      const failure = toRemoteError(method, path, response, this.now());
      await this.backoff(failure, attempt, started, signal, retryHintMs(response.headers, this.now()));
    }
  }

  /** Sleep before the next attempt, or rethrow the failure if none is due. */
  private async backoff(
    failure: SimError,
    attempt: number,
    started: number,
    signal: AbortSignal | undefined,
    hintMs?: number,
  ): Promise<void> {
    const decision = planRetry(this.retry, {
      attempt,
      elapsedMs: this.now() - started,
      retriable: failure.retriable,
      hintMs,
    });

    if (decision.action === 'fail') {
      if (decision.reason !== 'not-retriable') {
        this.logger.warn('giving up on API call', {
          reason: decision.reason,
          attempts: attempt,
          error_code: failure.code,
        });
      }
      throw failure;
    }

    this.logger.debug('retrying API call', {
      attempt,
      delay_ms: decision.delayMs,
      error_code: failure.code,
    });
    await this.sleep(decision.delayMs, signal);
  }

  private async send(
    method: HttpMethod,
    path: string,
    url: string,
    options: CallOptions,
  ): Promise<HttpResponse> {
    await this.limiter.acquire(this.sleep, options.signal);

    return this.gate.run(async () => {
      throwIfAborted(options.signal);
      const started = this.now();
      const response = await this.transport.send({
        method,
        url,
        headers: this.buildHeaders(options.body !== undefined),
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        timeoutMs: this.requestTimeoutMs,
      });
      this.logger.debug('api call', {
        method,
        path,
        status: response.status,
        duration_ms: this.now() - started,
      });
      return response;
    });
  }

  private buildUrl(path: string, query?: Record<string, QueryValue>): string {
    if (!path.startsWith('/')) {
      throw new Error(`API path must start with "/": ${path}`);
    }
    const url = new URL(this.baseUrl + path);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private buildHeaders(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
      'X-Request-ID': randomUUID(),
    };
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.credentials.kind === 'api-token') {
      headers['Authorization'] = `SSWS ${this.credentials.token}`;
    } else if (this.cookie) {
      headers['Cookie'] = this.cookie;
    }
    return headers;
  }
}

// ---------------------------------------------------------------------------
// ScopedTenantApi
// ---------------------------------------------------------------------------

class ScopedTenantApi implements TenantApi {
  private readonly client: ApiClient;
  private readonly options: ScopeOptions;

  constructor(client: ApiClient, options: ScopeOptions) {
    this.client = client;
    this.options = options;
  }

  call<T = unknown>(
    method: HttpMethod,
    path: string,
    options: CallOptions = {},
  ): Promise<ApiResponse<T>> {
    if (this.options.readOnly && method !== 'GET') {
      return Promise.reject(new DryRunViolationError(`Mutating call ${method} ${path}`));
    }
    return this.client.call<T>(method, path, { ...options, signal: options.signal ?? this.options.signal });
  }

  paginate<T = unknown>(path: string, options: PaginateOptions = {}): AsyncGenerator<ApiPage<T>> {
    return this.client.paginate<T>(path, { ...options, signal: options.signal ?? this.options.signal });
  }

  list<T = unknown>(path: string, options: PaginateOptions = {}): Promise<T[]> {
    return this.client.list<T>(path, { ...options, signal: options.signal ?? this.options.signal });
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Normalize an org URL to its `/api/v1` base. */
export function apiBaseUrl(orgUrl: string): string {
  let parsed: URL;
  try {
    parsed = new URL(orgUrl);
  } catch {
    throw new Error(`Invalid org URL: ${orgUrl}`);
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new Error(`Invalid org URL (expected http or https): ${orgUrl}`);
  }
  const trimmed = `${parsed.origin}${parsed.pathname}`.replace(/\/+$/, '');
  return trimmed.endsWith(API_PREFIX) ? trimmed : trimmed + API_PREFIX;
}

function parseBody(method: HttpMethod, path: string, response: HttpResponse): unknown {
  if (response.body.trim().length === 0) return null;
  try {
    return JSON.parse(response.body);
  } catch {
    throw new RemoteError(`${method} ${path} returned a body that is not JSON`, response.status);
  }
}

function toPrincipal(body: unknown): Principal | undefined {
  if (!isRecord(body) || typeof body['id'] !== 'string') return undefined;
  const profile = body['profile'];
  const login = isRecord(profile) && typeof profile['login'] === 'string' ? profile['login'] : body['id'];
  return { id: body['id'], login };
}

/**
 * Map a non-2xx response to its error kind. Provider error bodies look like
 * `{ errorCode, errorSummary, errorCauses: [{ errorSummary }] }`.
 */
export function toRemoteError(
  method: HttpMethod,
  path: string,
  response: HttpResponse,
  nowMs: number,
): SimError {
  let remoteCode: string | undefined;
  let summary: string | undefined;

  const parsed = tryParseJson(response.body);
  if (isRecord(parsed)) {
    if (typeof parsed['errorCode'] === 'string') remoteCode = parsed['errorCode'];
    if (typeof parsed['errorSummary'] === 'string') summary = parsed['errorSummary'];
    const causes = Array.isArray(parsed['errorCauses']) ? parsed['errorCauses'] : [];
    const causeSummaries = causes
      .map((cause) => (isRecord(cause) ? cause['errorSummary'] : undefined))
      .filter((text): text is string => typeof text === 'string');
    if (summary !== undefined && causeSummaries.length > 0) {
      summary = `${summary} (${causeSummaries.join('; ')})`;
    }
  }

  const detail = summary ?? (response.body.trim().slice(0, 200) || 'no response body');
  const message = `${method} ${path} failed with ${response.status}: ${detail}`;

  if (response.status === 429) {
    return new RateLimitedError(message, retryHintMs(response.headers, nowMs));
  }
  return new RemoteError(message, response.status, remoteCode);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
