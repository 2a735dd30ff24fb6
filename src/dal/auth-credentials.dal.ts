/**
 * Auth Credentials Data Access Layer
 *
 * One token pair per user. Refresh tokens rotate on every refresh, so the
 * stored pair is replaced as a whole.
 *
 * @module dal/auth-credentials
 * @security SEC-006: All queries use prepared statements
 * @security LM-001: Tokens are never logged
 */

import { UserBasedDAL } from './base.dal';
import { createLogger } from '../utils/logger';
import type { TokenPair } from '../shared/types/sync.types';

// ============================================================================
// Types
// ============================================================================

export interface AuthCredentialsRow {
  user_id: string;
  access_token: string;
  refresh_token: string;
  access_token_expires_at: string | null;
  updated_at: string;
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('auth-credentials-dal');

// ============================================================================
// Auth Credentials DAL
// ============================================================================

export class AuthCredentialsDAL extends UserBasedDAL<AuthCredentialsRow> {
  protected readonly tableName = 'auth_credentials';
  protected readonly primaryKey = 'user_id';

  get(userId: string): TokenPair | undefined {
    const row = this.findRowById(userId);
    if (!row) {
      return undefined;
    }
    return {
      accessToken: row.access_token,
      refreshToken: row.refresh_token,
      accessTokenExpiresAt: row.access_token_expires_at ?? undefined,
    };
  }

  save(userId: string, pair: TokenPair): void {
    this.db
      .prepare(
        `INSERT INTO auth_credentials (user_id, access_token, refresh_token, access_token_expires_at, updated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (user_id) DO UPDATE SET
           access_token = excluded.access_token,
           refresh_token = excluded.refresh_token,
           access_token_expires_at = excluded.access_token_expires_at,
           updated_at = excluded.updated_at`
      )
      .run(userId, pair.accessToken, pair.refreshToken, pair.accessTokenExpiresAt ?? null, this.now());

    log.debug('Credentials stored', { userId, hasExpiry: pair.accessTokenExpiresAt !== undefined });
  }

  clear(userId: string): boolean {
    const cleared = this.deleteForUser(userId, userId);
    log.info('Credentials cleared', { userId, cleared });
    return cleared;
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

export const authCredentialsDAL = new AuthCredentialsDAL();
