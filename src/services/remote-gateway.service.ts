/**
 * Remote Gateway Service
 *
 * HTTP client for the sync backend. Every call is a single attempt: retry,
 * backoff and token refresh are decided by the dispatcher and the refresh
 * coordinator from the RemoteGatewayError this client throws.
 *
 * Endpoints:
 * - POST /records                     create (Idempotency-Key header)
 * - PUT  /records/{backendID}          update in place
 * - GET  /records?entityType&from&to   remote refresh source
 * - POST {refreshPath}                 rotate the token pair
 *
 * @module services/remote-gateway
 * @security API-004: Authentication via Bearer token
 * @security API-003: Centralized error handling with sanitized responses
 * @security LM-001: Tokens never logged
 */

import { z } from 'zod';
import { createLogger, errorMessage } from '../utils/logger';
import type { TokenPair } from '../shared/types/sync.types';

// ============================================================================
// Types
// ============================================================================

export interface RemoteRecordRequest {
  entityType: string;
  payload: Record<string, unknown> | null;
  value: number;
  valueTimestamp: string;
  subDayTime?: string;
  idempotencyKey: string;
}

export interface RemoteWriteResult {
  backendID: string;
  status: number;
}

export interface RemoteRecordQuery {
  entityType: string;
  from: string;
  to: string;
}

/**
 * Operations the engine consumes. The HTTP implementation is the default;
 * tests substitute an in-process fake.
 */
export interface RemoteGateway {
  createRecord(request: RemoteRecordRequest, accessToken: string, signal?: AbortSignal): Promise<RemoteWriteResult>;
  updateRecord(
    backendID: string,
    request: RemoteRecordRequest,
    accessToken: string,
    signal?: AbortSignal
  ): Promise<RemoteWriteResult>;
  listRecords(query: RemoteRecordQuery, accessToken: string, signal?: AbortSignal): Promise<RemoteRecord[]>;
  refreshTokens(refreshToken: string, signal?: AbortSignal): Promise<TokenPair>;
}

export interface HttpRemoteGatewayOptions {
  apiUrl: string;
  requestTimeoutMs: number;
  refreshPath: string;
  /** Injectable for tests */
  fetchImpl?: typeof fetch;
}

// ============================================================================
// Response Schemas
// ============================================================================

const WriteResponseSchema = z.object({
  backendID: z.string().min(1),
});

const UpdateResponseSchema = z.object({
  backendID: z.string().min(1).optional(),
});

export const RemoteRecordSchema = z.object({
  backendID: z.string().min(1),
  entityType: z.string().min(1),
  value: z.number().finite(),
  valueTimestamp: z.string().datetime({ offset: true }),
  subDayTime: z.string().optional(),
  payload: z.record(z.unknown()).optional(),
});

export type RemoteRecord = z.infer<typeof RemoteRecordSchema>;

const ListResponseSchema = z.object({
  records: z.array(RemoteRecordSchema),
});

const RefreshResponseSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
  /** Seconds until the access token expires */
  expiresIn: z.number().int().positive().optional(),
});

// ============================================================================
// Errors
// ============================================================================

/**
 * Non-2xx response, network failure or timeout
 *
 * `status` is null when no response was received.
 */
export class RemoteGatewayError extends Error {
  readonly status: number | null;
  readonly body: string | null;
  /** Raw Retry-After header, when present */
  readonly retryAfter: string | null;

  constructor(message: string, status: number | null, body: string | null = null, retryAfter: string | null = null) {
    super(message);
    this.name = 'RemoteGatewayError';
    this.status = status;
    this.body = body;
    this.retryAfter = retryAfter;
    Object.setPrototypeOf(this, RemoteGatewayError.prototype);
  }

  get isAuthError(): boolean {
    return this.status === 401;
  }
}

// ============================================================================
// Constants
// ============================================================================

const CLIENT_VERSION = process.env.npm_package_version || '0.0.0';

/** API-003: Stored/logged response bodies are truncated */
const MAX_BODY_LENGTH = 500;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('remote-gateway');

// ============================================================================
// HTTP Remote Gateway
// ============================================================================

export class HttpRemoteGateway implements RemoteGateway {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly refreshPath: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpRemoteGatewayOptions) {
    this.baseUrl = options.apiUrl.replace(/\/+$/, '');
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.refreshPath = options.refreshPath;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async createRecord(
    request: RemoteRecordRequest,
    accessToken: string,
    signal?: AbortSignal
  ): Promise<RemoteWriteResult> {
    const { status, body } = await this.request('POST', '/records', {
      body: request,
      accessToken,
      headers: { 'Idempotency-Key': request.idempotencyKey },
      signal,
    });
    const parsed = WriteResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RemoteGatewayError('Create response missing backendID', status, JSON.stringify(body));
    }
    return { backendID: parsed.data.backendID, status };
  }

  async updateRecord(
    backendID: string,
    request: RemoteRecordRequest,
    accessToken: string,
    signal?: AbortSignal
  ): Promise<RemoteWriteResult> {
    const { status, body } = await this.request('PUT', `/records/${encodeURIComponent(backendID)}`, {
      body: request,
      accessToken,
      headers: { 'Idempotency-Key': request.idempotencyKey },
      signal,
    });
    const parsed = UpdateResponseSchema.safeParse(body ?? {});
    return {
      backendID: parsed.success && parsed.data.backendID ? parsed.data.backendID : backendID,
      status,
    };
  }

  async listRecords(
    query: RemoteRecordQuery,
    accessToken: string,
    signal?: AbortSignal
  ): Promise<RemoteRecord[]> {
    const params = new URLSearchParams({
      entityType: query.entityType,
      from: query.from,
      to: query.to,
    });
    const { status, body } = await this.request('GET', `/records?${params.toString()}`, {
      accessToken,
      signal,
    });
    const parsed = ListResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RemoteGatewayError('Malformed record list response', status, JSON.stringify(body));
    }
    return parsed.data.records;
  }

  async refreshTokens(refreshToken: string, signal?: AbortSignal): Promise<TokenPair> {
    const { status, body } = await this.request('POST', this.refreshPath, {
      body: { refreshToken },
      signal,
    });
    const parsed = RefreshResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RemoteGatewayError('Malformed refresh response', status);
    }
    return {
      accessToken: parsed.data.accessToken,
      refreshToken: parsed.data.refreshToken,
      accessTokenExpiresAt:
        parsed.data.expiresIn !== undefined
          ? new Date(Date.now() + parsed.data.expiresIn * 1000).toISOString()
          : undefined,
    };
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private async request(
    method: 'GET' | 'POST' | 'PUT',
    path: string,
    options: {
      body?: unknown;
      accessToken?: string;
      headers?: Record<string, string>;
      signal?: AbortSignal;
    }
  ): Promise<{ status: number; body: unknown }> {
    const url = `${this.baseUrl}${path}`;

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'X-Client-Version': CLIENT_VERSION,
      ...options.headers,
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    // API-004: Bearer authentication
    if (options.accessToken) {
      headers.Authorization = `Bearer ${options.accessToken}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    const onExternalAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    if (options.signal?.aborted) {
      controller.abort();
    }

    // Timer and abort listener stay armed until the body has been read
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });
      text = await readBody(response, controller.signal);
    } catch (error) {
      const timedOut = controller.signal.aborted && !options.signal?.aborted;
      const message = timedOut
        ? `Request timed out after ${this.requestTimeoutMs}ms`
        : options.signal?.aborted
          ? 'Request aborted'
          : `Network error: ${errorMessage(error)}`;
      log.warn('Remote request failed without response', { method, path: stripQuery(path), error: message });
      throw new RemoteGatewayError(message, null);
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onExternalAbort);
    }

    if (!response.ok) {
      const truncated = text.substring(0, MAX_BODY_LENGTH);
      log.warn('Remote request returned error status', {
        method,
        path: stripQuery(path),
        status: response.status,
      });
      throw new RemoteGatewayError(
        `${method} ${stripQuery(path)} failed with HTTP ${response.status}`,
        response.status,
        truncated,
        response.headers.get('Retry-After')
      );
    }

    log.debug('Remote request succeeded', { method, path: stripQuery(path), status: response.status });

    return { status: response.status, body: parseJson(text) };
  }
}

/**
 * Response body as text; rejects as soon as the signal aborts, even when the
 * body stream itself ignores the signal
 */
function readBody(response: Response, signal: AbortSignal): Promise<string> {
  if (signal.aborted) {
    return Promise.reject(new Error('Body read aborted'));
  }
  return new Promise<string>((resolve, reject) => {
    const onAbort = (): void => reject(new Error('Body read aborted'));
    signal.addEventListener('abort', onAbort, { once: true });
    void response.text().then(
      (text) => {
        signal.removeEventListener('abort', onAbort);
        resolve(text);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function stripQuery(path: string): string {
  const index = path.indexOf('?');
  return index === -1 ? path : path.substring(0, index);
}

function parseJson(text: string): unknown {
  if (text.trim() === '') {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return null;
  }
}
