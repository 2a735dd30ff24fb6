/**
 * Retry Strategy Service
 *
 * Jittered exponential backoff for outbox dispatch.
 *
 * - Jittered exponential backoff (prevents thundering herd)
 * - Error category-aware retry policies
 * - Rate limit (429) Retry-After header support
 *
 * @module services/retry-strategy
 * @security ERR-007: Error retry logic with proper categorization
 * @security API-002: Rate limiting awareness
 */

import { createLogger } from '../utils/logger';
import type { ErrorCategory } from '../shared/types/sync.types';

// ============================================================================
// Types
// ============================================================================

export interface RetryConfig {
  /** Base delay in milliseconds (default: 1000 = 1s) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 600000 = 10min) */
  maxDelayMs: number;
  /** Jitter factor (0-1, default: 0.3 = ±30% jitter) */
  jitterFactor: number;
  /** Exponential multiplier (default: 2) */
  multiplier: number;
}

export interface RetryDecision {
  shouldRetry: boolean;
  /** Delay before retry in milliseconds */
  delayMs: number;
  reason: string;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 600_000,
  jitterFactor: 0.3,
  multiplier: 2,
};

/** Unknown errors wait longer than recognised transient ones */
const UNKNOWN_CATEGORY_MULTIPLIER = 1.5;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('retry-strategy');

// ============================================================================
// Retry Strategy Service
// ============================================================================

export class RetryStrategyService {
  private readonly retryConfig: RetryConfig;
  private readonly random: () => number;

  /**
   * @param random - Source of jitter in [0, 1); injectable for deterministic tests
   */
  constructor(retryConfig?: Partial<RetryConfig>, random: () => number = Math.random) {
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...retryConfig };
    this.random = random;
  }

  // ==========================================================================
  // Backoff Calculation
  // ==========================================================================

  /**
   * Calculate jittered exponential backoff delay
   *
   * Formula: min(min(baseDelay * multiplier^attempt, maxDelay) * (1 ± jitter), maxDelay)
   *
   * Example with defaults (baseDelay=1000, multiplier=2, jitter=0.3):
   * - Attempt 0: 700-1300ms
   * - Attempt 1: 1400-2600ms
   * - Attempt 2: 2800-5200ms
   * - Attempt 3: 5600-10400ms
   *
   * @param attempt - Retry number (0-based)
   */
  calculateBackoffDelay(attempt: number, errorCategory?: ErrorCategory | null): number {
    const exponentialDelay =
      this.retryConfig.baseDelayMs * Math.pow(this.retryConfig.multiplier, attempt);

    const cappedDelay = Math.min(exponentialDelay, this.retryConfig.maxDelayMs);

    const jitterRange = this.retryConfig.jitterFactor;
    const jitterMultiplier = 1 - jitterRange + this.random() * 2 * jitterRange;

    const categoryMultiplier = errorCategory === 'UNKNOWN' ? UNKNOWN_CATEGORY_MULTIPLIER : 1;

    const finalDelay = Math.min(
      Math.round(cappedDelay * jitterMultiplier * categoryMultiplier),
      this.retryConfig.maxDelayMs
    );

    log.debug('Calculated backoff delay', {
      attempt,
      errorCategory,
      cappedDelay,
      jitterMultiplier: jitterMultiplier.toFixed(2),
      finalDelay,
    });

    return finalDelay;
  }

  // ==========================================================================
  // Retry Decision
  // ==========================================================================

  /**
   * Decide what happens after a failed attempt
   *
   * - PERMANENT / AUTH: never retried here
   * - TRANSIENT / UNKNOWN: retried while attemptCount < maxAttempts
   *
   * @param attemptCount - Attempts consumed, including the one that just failed
   * @param retryAfter - Server-specified earliest retry time (ISO)
   */
  makeRetryDecision(
    attemptCount: number,
    maxAttempts: number,
    errorCategory: ErrorCategory,
    retryAfter?: string | null,
    now: number = Date.now()
  ): RetryDecision {
    if (errorCategory === 'PERMANENT' || errorCategory === 'AUTH') {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `${errorCategory} error is not retried`,
      };
    }

    if (attemptCount >= maxAttempts) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `Max attempts exceeded (${attemptCount}/${maxAttempts}) for ${errorCategory} error`,
      };
    }

    if (retryAfter) {
      const retryTime = new Date(retryAfter).getTime();
      if (retryTime > now) {
        return {
          shouldRetry: true,
          delayMs: retryTime - now,
          reason: `Server-specified Retry-After: ${retryAfter}`,
        };
      }
    }

    const backoff = this.calculateBackoffDelay(attemptCount - 1, errorCategory);
    return {
      shouldRetry: true,
      delayMs: backoff,
      reason: `Jittered backoff: ${backoff}ms (attempt ${attemptCount}/${maxAttempts})`,
    };
  }

  getConfig(): RetryConfig {
    return { ...this.retryConfig };
  }
}
