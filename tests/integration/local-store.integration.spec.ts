/**
 * Local Store Integration Tests
 *
 * Dedup-aware writes committed with their outbox event, notified after
 * commit, against the migrated schema.
 *
 * @module tests/integration/local-store.integration.spec
 * @security SEC-014: Candidate validation before any write
 * @security DB-006: User-scoped writes
 */

// Using vitest globals (configured in vitest.config.ts)

import { RecordValidationError } from '../../src/services/local-store.service';
import { outboxEventsDAL } from '../../src/dal/outbox-events.dal';
import { syncRecordsDAL } from '../../src/dal/sync-records.dal';
import type { RecordChangedEvent, SyncableRecord } from '../../src/shared/types/sync.types';
import { createSessionTestContext, type SessionTestContext } from '../helpers';
import { buildCandidate, buildRecord, TEST_DAY, TEST_USER_ID } from '../fixtures/record-factories';

describe('LocalStore', () => {
  let ctx: SessionTestContext;
  let changes: RecordChangedEvent[];

  beforeEach(() => {
    ctx = createSessionTestContext();
    changes = [];
    ctx.session.subscribe((event) => {
      changes.push(event);
    });
  });

  afterEach(async () => {
    await ctx.cleanup();
  });

  describe('save', () => {
    it('should store a pending record with one outbox event', () => {
      const result = ctx.session.store.save(TEST_USER_ID, buildCandidate());

      expect(result.outcome).toBe('created');
      expect(result.record).toMatchObject({
        userID: TEST_USER_ID,
        entityType: 'water_liters',
        value: 0.5,
        valueDate: TEST_DAY,
        subDayTime: null,
        syncStatus: 'pending',
        backendID: null,
      });
      expect(outboxEventsDAL.findByRecord(result.localID)).toEqual([
        expect.objectContaining({ status: 'pending', isNewRecord: true }),
      ]);
      expect(changes).toEqual([
        {
          userID: TEST_USER_ID,
          localID: result.localID,
          entityType: 'water_liters',
          change: 'created',
          syncStatus: 'pending',
          updatedAt: result.record.updatedAt,
        },
      ]);
    });

    it('should keep a caller-assigned localID', () => {
      const result = ctx.session.store.save(TEST_USER_ID, buildCandidate({ localID: 'client-1' }));

      expect(result.localID).toBe('client-1');
    });

    it('should fold a same-day contribution into the existing record', () => {
      const first = ctx.session.store.save(TEST_USER_ID, buildCandidate({ value: 0.5 }));
      const second = ctx.session.store.save(
        TEST_USER_ID,
        buildCandidate({ value: 0.25, valueTimestamp: `${TEST_DAY}T17:30:00.000Z` })
      );

      expect(second.outcome).toBe('updated');
      expect(second.localID).toBe(first.localID);
      expect(second.record.value).toBe(0.75);
      expect(outboxEventsDAL.findByRecord(first.localID)).toHaveLength(1);
      expect(changes.map((c) => c.change)).toEqual(['created', 'updated']);
    });

    it('should skip an identical time-granular sample without notifying', () => {
      const candidate = buildCandidate({ entityType: 'steps', value: 120, subDayTime: '06:00' });
      ctx.session.store.save(TEST_USER_ID, candidate);

      const again = ctx.session.store.save(TEST_USER_ID, candidate);

      expect(again.outcome).toBe('skipped');
      expect(syncRecordsDAL.countByUser(TEST_USER_ID)).toBe(1);
      expect(changes).toHaveLength(1);
    });

    it('should announce a change only after it is readable', () => {
      const seen: Array<SyncableRecord | undefined> = [];
      ctx.session.subscribe((event) => {
        seen.push(ctx.session.store.findByLocalId(TEST_USER_ID, event.localID));
      });

      const result = ctx.session.store.save(TEST_USER_ID, buildCandidate());

      expect(seen).toEqual([result.record]);
    });

    it('should reject an invalid candidate and write nothing', () => {
      let caught: unknown;
      try {
        ctx.session.store.save(TEST_USER_ID, buildCandidate({ entityType: 'steps', subDayTime: '25:00' }));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(RecordValidationError);
      expect(caught instanceof RecordValidationError ? caught.issues : []).toEqual([
        '0.subDayTime: subDayTime must be HH:mm',
      ]);
      expect(syncRecordsDAL.countByUser(TEST_USER_ID)).toBe(0);
      expect(changes).toEqual([]);
    });
  });

  describe('saveBatch', () => {
    it('should write nothing when any candidate is invalid', () => {
      expect(() =>
        ctx.session.store.saveBatch(TEST_USER_ID, [
          buildCandidate(),
          buildCandidate({ valueTimestamp: 'yesterday' }),
        ])
      ).toThrow(RecordValidationError);

      expect(syncRecordsDAL.countByUser(TEST_USER_ID)).toBe(0);
      expect(outboxEventsDAL.count()).toBe(0);
    });

    it('should deduplicate candidates against each other', () => {
      const result = ctx.session.store.saveBatch(TEST_USER_ID, [
        buildCandidate({ value: 0.5 }),
        buildCandidate({ value: 0.3, valueTimestamp: `${TEST_DAY}T12:00:00.000Z` }),
      ]);

      expect(result.created).toBe(1);
      expect(result.updated).toBe(1);
      expect(result.records[0].localID).toBe(result.records[1].localID);
      expect(result.records[0].value).toBeCloseTo(0.8, 10);
      expect(syncRecordsDAL.countByUser(TEST_USER_ID)).toBe(1);
    });

    it('should store remote-confirmed samples as synced without enqueueing', () => {
      const result = ctx.session.store.saveBatch(TEST_USER_ID, [buildCandidate({ backendID: 'remote-5' })]);

      expect(result.records[0]).toMatchObject({ backendID: 'remote-5', syncStatus: 'synced' });
      expect(outboxEventsDAL.findByRecord(result.records[0].localID)).toEqual([]);
    });
  });

  describe('merge without upsert', () => {
    it('should drop the backendID of a synced record and bump its generation', async () => {
      await ctx.cleanup();
      ctx = createSessionTestContext({ config: { remote: { supportsUpsert: false } } });
      syncRecordsDAL.insert(
        buildRecord({ localID: 'local-1', backendID: 'remote-1', syncStatus: 'synced', value: 0.5 })
      );

      const result = ctx.session.store.save(TEST_USER_ID, buildCandidate({ value: 0.5 }));

      expect(result.record).toMatchObject({
        localID: 'local-1',
        value: 1,
        backendID: null,
        remoteGeneration: 1,
        syncStatus: 'pending',
      });
      expect(outboxEventsDAL.findActiveByRecord('local-1')?.isNewRecord).toBe(true);
    });
  });

  describe('delete', () => {
    it('should remove the record and its events', () => {
      const { localID } = ctx.session.store.save(TEST_USER_ID, buildCandidate());

      expect(ctx.session.store.delete(TEST_USER_ID, localID)).toBe(true);
      expect(ctx.session.store.findByLocalId(TEST_USER_ID, localID)).toBeUndefined();
      expect(outboxEventsDAL.findByRecord(localID)).toEqual([]);
      expect(changes.map((c) => c.change)).toEqual(['created', 'deleted']);
    });

    it('should report a missing record', () => {
      expect(ctx.session.store.delete(TEST_USER_ID, 'absent')).toBe(false);
    });
  });

  describe('fetch', () => {
    it('should return records in an offset-aware range', () => {
      ctx.session.store.save(TEST_USER_ID, buildCandidate({ valueTimestamp: `${TEST_DAY}T08:00:00.000Z` }));

      const inRange = ctx.session.store.fetch(TEST_USER_ID, 'water_liters', {
        from: `${TEST_DAY}T09:30:00+02:00`,
        to: `${TEST_DAY}T10:30:00+02:00`,
      });
      const outOfRange = ctx.session.store.fetch(TEST_USER_ID, 'water_liters', {
        from: `${TEST_DAY}T09:00:00.000Z`,
        to: `${TEST_DAY}T10:00:00.000Z`,
      });

      expect(inRange).toHaveLength(1);
      expect(outOfRange).toEqual([]);
    });
  });

  describe('sync status summary', () => {
    it('should count records awaiting delivery', () => {
      ctx.session.store.save(TEST_USER_ID, buildCandidate());
      ctx.session.store.save(TEST_USER_ID, buildCandidate({ entityType: 'weight', value: 70 }));

      expect(ctx.session.syncStatusSummary()).toEqual({
        pendingCount: 2,
        failedCount: 0,
        lastSyncedAt: null,
      });
    });
  });
});
