/**
 * Sync Engine Lifecycle Integration Tests
 *
 * Login builds a session, logout tears it down, and an unrecoverable
 * authentication failure ends the session without a retry storm.
 *
 * @module tests/integration/sync-engine.integration.spec
 * @security API-004: Credentials scoped to the session user
 */

// Using vitest globals (configured in vitest.config.ts)

import { ZodError } from 'zod';
import { SyncEngine } from '../../src/services/sync-session.service';
import { ConfigValidationError } from '../../src/services/config.service';
import { closeDatabase, isDatabaseInitialized } from '../../src/services/database.service';
import { SessionExpiredError } from '../../src/services/token-refresh-coordinator.service';
import { authCredentialsDAL } from '../../src/dal/auth-credentials.dal';
import { outboxEventsDAL } from '../../src/dal/outbox-events.dal';
import { EngineEvents, type EngineEventPayloads } from '../../src/utils/event-bus';
import { FakeRemoteGateway } from '../helpers';
import { OTHER_USER_ID, TEST_DAY, TEST_TOKENS, TEST_USER_ID } from '../fixtures/record-factories';

type Terminated = EngineEventPayloads[typeof EngineEvents.SESSION_TERMINATED];

describe('SyncEngine', () => {
  let gateway: FakeRemoteGateway;
  let engine: SyncEngine;

  const createEngine = (autoStartDispatcher = false): SyncEngine =>
    new SyncEngine({
      config: {
        dbPath: ':memory:',
        logLevel: 'error',
        dispatcher: { minCallSpacingMs: 0, pollIntervalMs: 3_600_000 },
      },
      env: {},
      gateway,
      autoStartDispatcher,
    });

  beforeEach(() => {
    closeDatabase();
    gateway = new FakeRemoteGateway(TEST_TOKENS);
    engine = createEngine();
  });

  afterEach(async () => {
    await engine.shutdown();
  });

  describe('configuration', () => {
    it('should reject an invalid configuration at construction', () => {
      expect(
        () => new SyncEngine({ config: { apiUrl: 'http://api.example.com' }, env: {}, gateway })
      ).toThrow(ConfigValidationError);
    });
  });

  describe('login', () => {
    it('should open the database, store credentials and announce the session', async () => {
      const started: string[] = [];
      engine.events.on(EngineEvents.SESSION_STARTED, ({ userId }) => started.push(userId));

      const session = await engine.onLogin(TEST_USER_ID, TEST_TOKENS);

      expect(isDatabaseInitialized()).toBe(true);
      expect(engine.getSession()).toBe(session);
      expect(session.userID).toBe(TEST_USER_ID);
      expect(authCredentialsDAL.get(TEST_USER_ID)).toEqual({ accessToken: 'access-0', refreshToken: 'refresh-0' });
      expect(started).toEqual([TEST_USER_ID]);
      expect(session.dispatcher.isRunning()).toBe(false);
    });

    it('should reject an empty token pair', async () => {
      await expect(engine.onLogin(TEST_USER_ID, { accessToken: '', refreshToken: 'refresh-0' })).rejects.toThrow(
        ZodError
      );
      expect(engine.getSession()).toBeNull();
    });

    it('should close the previous session when another user logs in', async () => {
      const ended: string[] = [];
      engine.events.on(EngineEvents.SESSION_ENDED, ({ userId }) => ended.push(userId));
      const first = await engine.onLogin(TEST_USER_ID, TEST_TOKENS);

      const second = await engine.onLogin(OTHER_USER_ID, TEST_TOKENS);

      expect(first.isClosed()).toBe(true);
      expect(engine.getSession()).toBe(second);
      expect(ended).toEqual([TEST_USER_ID]);
      expect(authCredentialsDAL.get(TEST_USER_ID)).toBeUndefined();
    });

    it('should start the dispatcher by default', async () => {
      await engine.shutdown();
      engine = createEngine(true);

      const session = await engine.onLogin(TEST_USER_ID, TEST_TOKENS);
      const { localID } = session.write('water_liters', 0.5, `${TEST_DAY}T08:00:00.000Z`);

      await vi.waitFor(() => {
        expect(session.store.findByLocalId(TEST_USER_ID, localID)?.syncStatus).toBe('synced');
      });
    });
  });

  describe('logout', () => {
    it('should forget credentials and keep queued work', async () => {
      const ended: string[] = [];
      engine.events.on(EngineEvents.SESSION_ENDED, ({ userId }) => ended.push(userId));
      const session = await engine.onLogin(TEST_USER_ID, TEST_TOKENS);
      const { localID } = session.write('water_liters', 0.5, `${TEST_DAY}T08:00:00.000Z`);

      await engine.onLogout();

      expect(session.isClosed()).toBe(true);
      expect(engine.getSession()).toBeNull();
      expect(authCredentialsDAL.get(TEST_USER_ID)).toBeUndefined();
      expect(outboxEventsDAL.findByRecord(localID)).toEqual([expect.objectContaining({ status: 'pending' })]);
      expect(ended).toEqual([TEST_USER_ID]);
    });

    it('should deliver queued work after the next login', async () => {
      const first = await engine.onLogin(TEST_USER_ID, TEST_TOKENS);
      const { localID } = first.write('water_liters', 0.5, `${TEST_DAY}T08:00:00.000Z`);
      await engine.onLogout();

      const second = await engine.onLogin(TEST_USER_ID, TEST_TOKENS);
      await second.processDueEvents();

      expect(second.store.findByLocalId(TEST_USER_ID, localID)?.syncStatus).toBe('synced');
    });

    it('should be a no-op without a session', async () => {
      await expect(engine.onLogout()).resolves.toBeUndefined();
    });

    it('should close the database on shutdown', async () => {
      await engine.onLogin(TEST_USER_ID, TEST_TOKENS);

      await engine.shutdown();

      expect(isDatabaseInitialized()).toBe(false);
      expect(engine.getSession()).toBeNull();
    });
  });

  describe('revoked refresh token', () => {
    it('should fail every waiter, end the session and refresh only once', async () => {
      const terminated: Terminated[] = [];
      engine.events.on(EngineEvents.SESSION_TERMINATED, (payload) => terminated.push(payload));
      const session = await engine.onLogin(TEST_USER_ID, TEST_TOKENS);
      gateway.revokeRefreshToken();
      gateway.expireAccessToken();

      const waiters = Array.from({ length: 5 }, () => session.tokens.getValidAccessToken('access-0'));
      const results = await Promise.allSettled(waiters);

      expect(results.map((r) => r.status)).toEqual(Array.from({ length: 5 }, () => 'rejected'));
      for (const result of results) {
        if (result.status === 'rejected') {
          expect(result.reason).toBeInstanceOf(SessionExpiredError);
          expect(result.reason).toMatchObject({ reason: 'REFRESH_REJECTED' });
        }
      }
      expect(gateway.refreshCalls).toEqual(['refresh-0']);
      expect(terminated).toEqual([{ userId: TEST_USER_ID, reason: 'REFRESH_REJECTED' }]);
      expect(engine.getSession()).toBeNull();
      expect(authCredentialsDAL.get(TEST_USER_ID)).toBeUndefined();

      await engine.whenClosed();
      expect(session.isClosed()).toBe(true);
      await expect(session.tokens.getAccessToken()).rejects.toThrow(SessionExpiredError);
      expect(gateway.refreshCalls).toHaveLength(1);
    });

    it('should release queued work and halt dispatch', async () => {
      const session = await engine.onLogin(TEST_USER_ID, TEST_TOKENS);
      const { localID } = session.write('water_liters', 0.5, `${TEST_DAY}T08:00:00.000Z`);
      gateway.revokeRefreshToken();
      gateway.expireAccessToken();

      const summary = await session.processDueEvents();

      expect(summary).toEqual({ processed: 1, succeeded: 0, retried: 0, failed: 0 });
      expect(session.dispatcher.isHalted()).toBe(true);
      expect(gateway.createCalls).toHaveLength(1);
      expect(gateway.refreshCalls).toHaveLength(1);
      expect(outboxEventsDAL.findByRecord(localID)).toEqual([
        expect.objectContaining({ status: 'pending', attemptCount: 0 }),
      ]);
      expect(engine.getSession()).toBeNull();
    });

    it('should end the session when a refreshed token is rejected again', async () => {
      const terminated: Terminated[] = [];
      engine.events.on(EngineEvents.SESSION_TERMINATED, (payload) => terminated.push(payload));
      const session = await engine.onLogin(TEST_USER_ID, TEST_TOKENS);
      session.write('water_liters', 0.5, `${TEST_DAY}T08:00:00.000Z`);
      gateway.rejectAllAccess = true;

      await session.processDueEvents();

      expect(terminated).toEqual([{ userId: TEST_USER_ID, reason: 'AUTH_REJECTED_AFTER_REFRESH' }]);
      expect(authCredentialsDAL.get(TEST_USER_ID)).toBeUndefined();
    });
  });
});
