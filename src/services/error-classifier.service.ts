/**
 * Error Classification Service
 *
 * Classifies dispatch errors to determine routing:
 * - Retry with backoff (transient errors)
 * - Fail permanently (other 4xx, malformed payloads)
 * - Refresh credentials (401)
 *
 * @module services/error-classifier
 * @security API-003: Error messages sanitized before classification
 * @compliance ERR-007: Error retry logic with proper categorization
 */

import { createLogger } from '../utils/logger';
import type { ErrorCategory } from '../shared/types/sync.types';

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('error-classifier');

// ============================================================================
// HTTP Status Code Classification
// ============================================================================

/**
 * 4xx codes worth retrying; every 5xx is retried as well
 */
const TRANSIENT_CLIENT_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests (rate limit)
]);

const AUTH_HTTP_CODE = 401;

// ============================================================================
// Error Pattern Classification
// ============================================================================

/**
 * Payload problems that will never succeed regardless of retries
 */
const STRUCTURAL_ERROR_PATTERNS = [
  /validation failed/i,
  /invalid payload/i,
  /schema validation/i,
  /missing required field/i,
  /malformed/i,
  /invalid json/i,
];

const TRANSIENT_ERROR_PATTERNS = [
  /ECONNREFUSED/i,
  /ECONNRESET/i,
  /ETIMEDOUT/i,
  /ENOTFOUND/i,
  /EAI_AGAIN/i,
  /network error/i,
  /fetch failed/i,
  /socket hang up/i,
  /timeout/i,
  /timed out/i,
  /aborted/i,
  /temporarily unavailable/i,
  /rate limit/i,
];

// ============================================================================
// Error Classification Interface
// ============================================================================

export interface ErrorClassificationResult {
  category: ErrorCategory;
  action: 'RETRY' | 'FAIL' | 'REFRESH_AUTH';
  /** Whether to use extended backoff */
  extendedBackoff: boolean;
  /** Earliest retry time (ISO) from a Retry-After header */
  retryAfter?: string;
}

// ============================================================================
// Error Classification Functions
// ============================================================================

/**
 * Parse a Retry-After header (delta seconds or HTTP date)
 *
 * @returns ISO timestamp, or undefined when absent or unparseable
 */
export function parseRetryAfter(header: string | null | undefined, now: number = Date.now()): string | undefined {
  if (!header) {
    return undefined;
  }
  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return new Date(now + parseInt(trimmed, 10) * 1000).toISOString();
  }
  const date = new Date(trimmed);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

/**
 * Classify an error based on HTTP status code and error message
 *
 * - 401: AUTH, handled by the token refresh coordinator
 * - 408 / 429 / 5xx: TRANSIENT, retried with backoff (429 honours Retry-After)
 * - other 4xx: PERMANENT, no retry
 * - no status: message patterns; unrecognised errors are UNKNOWN and retried
 */
export function classifyError(
  httpStatus?: number | null,
  errorMessage?: string | null,
  retryAfterHeader?: string | null
): ErrorClassificationResult {
  const message = errorMessage || '';

  if (httpStatus) {
    if (httpStatus === AUTH_HTTP_CODE) {
      return { category: 'AUTH', action: 'REFRESH_AUTH', extendedBackoff: false };
    }

    if (httpStatus === 429) {
      return {
        category: 'TRANSIENT',
        action: 'RETRY',
        extendedBackoff: true,
        retryAfter: parseRetryAfter(retryAfterHeader),
      };
    }

    if (TRANSIENT_CLIENT_CODES.has(httpStatus) || httpStatus >= 500) {
      log.debug('Error classified as TRANSIENT (HTTP status)', { httpStatus });
      return {
        category: 'TRANSIENT',
        action: 'RETRY',
        extendedBackoff: httpStatus === 503,
        retryAfter: httpStatus === 503 ? parseRetryAfter(retryAfterHeader) : undefined,
      };
    }

    if (httpStatus >= 400) {
      log.debug('Error classified as PERMANENT (HTTP status)', { httpStatus });
      return { category: 'PERMANENT', action: 'FAIL', extendedBackoff: false };
    }
  }

  for (const pattern of STRUCTURAL_ERROR_PATTERNS) {
    if (pattern.test(message)) {
      log.debug('Error classified as PERMANENT (structural)', { pattern: pattern.source });
      return { category: 'PERMANENT', action: 'FAIL', extendedBackoff: false };
    }
  }

  for (const pattern of TRANSIENT_ERROR_PATTERNS) {
    if (pattern.test(message)) {
      log.debug('Error classified as TRANSIENT (message pattern)', { pattern: pattern.source });
      return { category: 'TRANSIENT', action: 'RETRY', extendedBackoff: false };
    }
  }

  log.debug('Error classified as UNKNOWN', { httpStatus, message });
  return { category: 'UNKNOWN', action: 'RETRY', extendedBackoff: true };
}
