/**
 * Token Refresh Coordinator Unit Tests
 *
 * Single-flight refresh, proactive refresh near expiry and terminal
 * failure handling, against the real credentials table.
 *
 * @security LM-001: Tokens never logged
 * @security API-004: Credentials scoped to the session user
 *
 * @module tests/unit/services/token-refresh-coordinator.service.spec
 */

// Using vitest globals (configured in vitest.config.ts)

import {
  SessionExpiredError,
  TokenRefreshCoordinator,
} from '../../../src/services/token-refresh-coordinator.service';
import { authCredentialsDAL } from '../../../src/dal/auth-credentials.dal';
import type { SessionTerminationReason } from '../../../src/utils/event-bus';
import { createTestDatabase, FakeRemoteGateway, type TestDatabaseContext } from '../../helpers';
import { TEST_TOKENS, TEST_USER_ID } from '../../fixtures/record-factories';

const NOW = Date.parse('2024-03-10T12:00:00.000Z');

async function captureExpired(promise: Promise<unknown>): Promise<SessionExpiredError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof SessionExpiredError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected SessionExpiredError');
}

describe('TokenRefreshCoordinator', () => {
  let database: TestDatabaseContext;
  let gateway: FakeRemoteGateway;
  let terminations: SessionTerminationReason[];
  let coordinator: TokenRefreshCoordinator;

  beforeEach(() => {
    database = createTestDatabase();
    gateway = new FakeRemoteGateway();
    terminations = [];
    authCredentialsDAL.save(TEST_USER_ID, TEST_TOKENS);
    coordinator = new TokenRefreshCoordinator({
      userID: TEST_USER_ID,
      gateway,
      refreshSkewMs: 60_000,
      onTerminalFailure: (reason) => terminations.push(reason),
      now: () => NOW,
    });
  });

  afterEach(() => {
    coordinator.dispose();
    database.cleanup();
  });

  describe('getAccessToken', () => {
    it('should return the stored token without refreshing', async () => {
      await expect(coordinator.getAccessToken()).resolves.toBe('access-0');
      expect(gateway.refreshCalls).toEqual([]);
    });

    it('should refresh proactively when the token expires within the skew window', async () => {
      authCredentialsDAL.save(TEST_USER_ID, {
        ...TEST_TOKENS,
        accessTokenExpiresAt: '2024-03-10T12:00:30.000Z',
      });

      await expect(coordinator.getAccessToken()).resolves.toBe('access-1');
      expect(gateway.refreshCalls).toEqual(['refresh-0']);
      expect(authCredentialsDAL.get(TEST_USER_ID)).toEqual({
        accessToken: 'access-1',
        refreshToken: 'refresh-1',
      });
    });

    it('should not refresh a token that expires after the skew window', async () => {
      authCredentialsDAL.save(TEST_USER_ID, {
        ...TEST_TOKENS,
        accessTokenExpiresAt: '2024-03-10T12:05:00.000Z',
      });

      await expect(coordinator.getAccessToken()).resolves.toBe('access-0');
      expect(gateway.refreshCalls).toEqual([]);
    });

    it('should fail when no credentials are stored', async () => {
      authCredentialsDAL.clear(TEST_USER_ID);

      const error = await captureExpired(coordinator.getAccessToken());

      expect(error.reason).toBe('REFRESH_REJECTED');
    });
  });

  describe('getValidAccessToken', () => {
    it('should share one refresh among concurrent callers', async () => {
      gateway.expireAccessToken();

      const tokens = await Promise.all(
        Array.from({ length: 10 }, () => coordinator.getValidAccessToken('access-0'))
      );

      expect(tokens).toEqual(Array.from({ length: 10 }, () => 'access-1'));
      expect(gateway.refreshCalls).toEqual(['refresh-0']);
      expect(coordinator.getRefreshCount()).toBe(1);
    });

    it('should hand out the replacement for an already-rotated token', async () => {
      await coordinator.getValidAccessToken('access-0');

      await expect(coordinator.getValidAccessToken('access-0')).resolves.toBe('access-1');
      expect(gateway.refreshCalls).toHaveLength(1);
    });

    it('should let callers arriving during a refresh join it', async () => {
      gateway.refreshDelayMs = 20;

      const first = coordinator.getValidAccessToken('access-0');
      const joined = coordinator.getAccessToken();

      await expect(Promise.all([first, joined])).resolves.toEqual(['access-1', 'access-1']);
      expect(gateway.refreshCalls).toHaveLength(1);
    });
  });

  describe('terminal failure', () => {
    it('should reject every waiter and clear credentials when the refresh is refused', async () => {
      gateway.revokeRefreshToken();

      const results = await Promise.allSettled(
        Array.from({ length: 5 }, () => coordinator.getValidAccessToken('access-0'))
      );

      expect(results.every((r) => r.status === 'rejected' && r.reason instanceof SessionExpiredError)).toBe(true);
      expect(gateway.refreshCalls).toHaveLength(1);
      expect(terminations).toEqual(['REFRESH_REJECTED']);
      expect(authCredentialsDAL.get(TEST_USER_ID)).toBeUndefined();
      expect(coordinator.isTerminated()).toBe(true);
    });

    it('should refuse further requests after termination', async () => {
      gateway.revokeRefreshToken();
      await captureExpired(coordinator.getValidAccessToken('access-0'));

      const error = await captureExpired(coordinator.getAccessToken());

      expect(error.reason).toBe('REFRESH_REJECTED');
      expect(gateway.refreshCalls).toHaveLength(1);
    });

    it('should terminate on invalidate', () => {
      coordinator.invalidate('AUTH_REJECTED_AFTER_REFRESH');
      coordinator.invalidate('AUTH_REJECTED_AFTER_REFRESH');

      expect(terminations).toEqual(['AUTH_REJECTED_AFTER_REFRESH']);
      expect(authCredentialsDAL.get(TEST_USER_ID)).toBeUndefined();
    });
  });

  describe('dispose', () => {
    it('should end a refresh in flight without touching credentials', async () => {
      gateway.refreshDelayMs = 20;
      const pending = coordinator.getValidAccessToken('access-0');

      coordinator.dispose();
      const error = await captureExpired(pending);

      expect(error.reason).toBe('LOGGED_OUT');
      expect(terminations).toEqual([]);
      expect(authCredentialsDAL.get(TEST_USER_ID)).toEqual(TEST_TOKENS);
    });

    it('should refuse requests once disposed', async () => {
      coordinator.dispose();

      const error = await captureExpired(coordinator.getAccessToken());

      expect(error.reason).toBe('LOGGED_OUT');
    });
  });
});
