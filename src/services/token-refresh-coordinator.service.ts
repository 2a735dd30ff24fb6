/**
 * Token Refresh Coordinator
 *
 * Single-flight access token refresh for one session. Refresh tokens rotate,
 * so two concurrent refresh calls would race each other into a revoked
 * token; every caller that sees a 401 joins the one refresh in flight.
 *
 * A failed refresh is terminal. Credentials are cleared, every waiter is
 * rejected with SessionExpiredError and the owning session is told to log
 * out. Nothing is retried.
 *
 * @module services/token-refresh-coordinator
 * @security LM-001: Tokens are never logged
 * @security API-004: Credentials scoped to the session user
 */

import { createLogger, errorMessage } from '../utils/logger';
import { authCredentialsDAL, type AuthCredentialsDAL } from '../dal/auth-credentials.dal';
import type { SessionTerminationReason } from '../utils/event-bus';
import type { RemoteGateway } from './remote-gateway.service';
import type { TokenPair } from '../shared/types/sync.types';

// ============================================================================
// Errors
// ============================================================================

export class SessionExpiredError extends Error {
  readonly reason: SessionTerminationReason | 'LOGGED_OUT';

  constructor(message: string, reason: SessionTerminationReason | 'LOGGED_OUT') {
    super(message);
    this.name = 'SessionExpiredError';
    this.reason = reason;
    Object.setPrototypeOf(this, SessionExpiredError.prototype);
  }
}

// ============================================================================
// Types
// ============================================================================

export interface TokenRefreshCoordinatorOptions {
  userID: string;
  gateway: RemoteGateway;
  /** Refresh proactively when the access token expires within this window */
  refreshSkewMs: number;
  onTerminalFailure?: (reason: SessionTerminationReason) => void;
  credentialsDAL?: AuthCredentialsDAL;
  now?: () => number;
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('token-refresh');

// ============================================================================
// Token Refresh Coordinator
// ============================================================================

export class TokenRefreshCoordinator {
  private readonly userID: string;
  private readonly gateway: RemoteGateway;
  private readonly refreshSkewMs: number;
  private readonly onTerminalFailure?: (reason: SessionTerminationReason) => void;
  private readonly credentialsDAL: AuthCredentialsDAL;
  private readonly now: () => number;

  private inFlight: Promise<string> | null = null;
  private readonly abortController = new AbortController();
  private terminated: SessionTerminationReason | null = null;
  private disposed = false;
  private refreshCount = 0;

  constructor(options: TokenRefreshCoordinatorOptions) {
    this.userID = options.userID;
    this.gateway = options.gateway;
    this.refreshSkewMs = options.refreshSkewMs;
    this.onTerminalFailure = options.onTerminalFailure;
    this.credentialsDAL = options.credentialsDAL ?? authCredentialsDAL;
    this.now = options.now ?? Date.now;
  }

  /**
   * Current access token. Joins a refresh in flight, and refreshes first
   * when the stored expiry falls within the skew window.
   *
   * @throws SessionExpiredError when the session can no longer authenticate
   */
  async getAccessToken(): Promise<string> {
    this.assertActive();

    if (this.inFlight) {
      return this.inFlight;
    }

    const current = this.requireCredentials();
    if (current.accessTokenExpiresAt) {
      const expiresAt = new Date(current.accessTokenExpiresAt).getTime();
      if (expiresAt - this.now() <= this.refreshSkewMs) {
        log.debug('Access token near expiry, refreshing proactively', { userId: this.userID });
        return this.getValidAccessToken(current.accessToken);
      }
    }
    return current.accessToken;
  }

  /**
   * A valid token after `rejectedToken` was refused with a 401
   *
   * - refresh in flight: join it
   * - rejected token already replaced: return the replacement
   * - otherwise: start the one refresh every concurrent caller will share
   */
  getValidAccessToken(rejectedToken: string): Promise<string> {
    try {
      this.assertActive();
    } catch (error) {
      return Promise.reject(error);
    }

    if (this.inFlight) {
      return this.inFlight;
    }

    const current = this.credentialsDAL.get(this.userID);
    if (!current) {
      return Promise.reject(new SessionExpiredError('No credentials for session', 'REFRESH_REJECTED'));
    }
    if (current.accessToken !== rejectedToken) {
      return Promise.resolve(current.accessToken);
    }

    const flight = this.refresh(current.refreshToken);
    this.inFlight = flight;
    return flight;
  }

  /**
   * Tear the session down from outside the refresh path, e.g. a 401 that
   * survives a successful refresh
   */
  invalidate(reason: SessionTerminationReason): void {
    if (this.terminated || this.disposed) {
      return;
    }
    this.terminate(reason);
  }

  /**
   * Stop using this coordinator: aborts a refresh in flight without
   * touching stored credentials
   */
  dispose(): void {
    this.disposed = true;
    this.abortController.abort();
  }

  isTerminated(): boolean {
    return this.terminated !== null;
  }

  /** Number of refresh calls made by this coordinator */
  getRefreshCount(): number {
    return this.refreshCount;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async refresh(refreshToken: string): Promise<string> {
    this.refreshCount++;
    log.info('Refreshing access token', { userId: this.userID });

    try {
      const pair = await this.gateway.refreshTokens(refreshToken, this.abortController.signal);
      if (this.disposed) {
        throw new SessionExpiredError('Session closed during token refresh', 'LOGGED_OUT');
      }
      this.credentialsDAL.save(this.userID, pair);
      log.info('Access token refreshed', { userId: this.userID });
      return pair.accessToken;
    } catch (error) {
      if (this.disposed) {
        throw error instanceof SessionExpiredError
          ? error
          : new SessionExpiredError('Session closed during token refresh', 'LOGGED_OUT');
      }
      log.error('Token refresh failed, ending session', {
        userId: this.userID,
        error: errorMessage(error),
      });
      this.terminate('REFRESH_REJECTED');
      throw new SessionExpiredError(`Token refresh failed: ${errorMessage(error)}`, 'REFRESH_REJECTED');
    } finally {
      this.inFlight = null;
    }
  }

  private terminate(reason: SessionTerminationReason): void {
    this.terminated = reason;
    this.credentialsDAL.clear(this.userID);
    log.warn('Session terminated', { userId: this.userID, reason });
    this.onTerminalFailure?.(reason);
  }

  private assertActive(): void {
    if (this.terminated) {
      throw new SessionExpiredError('Session has expired', this.terminated);
    }
    if (this.disposed) {
      throw new SessionExpiredError('Session has been closed', 'LOGGED_OUT');
    }
  }

  private requireCredentials(): TokenPair {
    const current = this.credentialsDAL.get(this.userID);
    if (!current) {
      throw new SessionExpiredError('No credentials for session', 'REFRESH_REJECTED');
    }
    return current;
  }
}
