/**
 * Deduplication Service Unit Tests
 *
 * Key construction, candidate normalization and the decision table for
 * interactive and remote-confirmed candidates.
 *
 * @module tests/unit/services/deduplication.service.spec
 */

// Using vitest globals (configured in vitest.config.ts)

vi.mock('../../../src/utils/logger', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { DeduplicationService } from '../../../src/services/deduplication.service';
import { DEFAULT_CONFIG, DEFAULT_ENTITY_TYPES } from '../../../src/shared/types/config.types';
import { buildCandidate, buildRecord, TEST_USER_ID, OTHER_USER_ID } from '../../fixtures/record-factories';

function createService(timeZone = 'UTC', subDayBucketMinutes = 1): DeduplicationService {
  return new DeduplicationService({
    dedup: { ...DEFAULT_CONFIG.dedup, subDayBucketMinutes },
    entityTypes: DEFAULT_ENTITY_TYPES,
    timeZone,
  });
}

describe('DeduplicationService', () => {
  describe('classify', () => {
    it('should use the declared definition', () => {
      const service = createService();

      expect(service.classify('steps')).toEqual({ hasSubDayTime: true, merge: 'sum' });
      expect(service.classify('weight')).toEqual({ hasSubDayTime: false, merge: 'replace' });
    });

    it('should treat undeclared types as time-granular only with a subDayTime', () => {
      const service = createService();

      expect(service.classify('cadence', '07:15')).toEqual({ hasSubDayTime: true, merge: 'sum' });
      expect(service.classify('cadence')).toEqual({ hasSubDayTime: false, merge: 'sum' });
    });
  });

  describe('normalize', () => {
    it('should derive day and time of day from the timestamp', () => {
      const normalized = createService().normalize(
        buildCandidate({ entityType: 'steps', value: 120, valueTimestamp: '2024-03-10T07:14:30+02:00' })
      );

      expect(normalized.valueTimestamp).toBe('2024-03-10T05:14:30.000Z');
      expect(normalized.valueDate).toBe('2024-03-10');
      expect(normalized.subDayTime).toBe('05:14');
    });

    it('should drop subDayTime for date-granular types', () => {
      const normalized = createService().normalize(buildCandidate({ subDayTime: '08:00' }));

      expect(normalized.subDayTime).toBeNull();
    });

    it('should bucket the time of day', () => {
      const normalized = createService('UTC', 15).normalize(
        buildCandidate({ entityType: 'steps', subDayTime: '07:14' })
      );

      expect(normalized.subDayTime).toBe('07:00');
    });

    it('should evaluate the calendar day in the configured time zone', () => {
      const normalized = createService('America/New_York').normalize(
        buildCandidate({ valueTimestamp: '2024-03-10T03:30:00.000Z' })
      );

      expect(normalized.valueDate).toBe('2024-03-09');
    });
  });

  describe('resolve - interactive candidates', () => {
    const service = createService();

    it('should insert when no record shares the key', () => {
      const index = service.createIndex([]);

      expect(service.resolve(TEST_USER_ID, service.normalize(buildCandidate()), index)).toEqual({
        kind: 'insert',
      });
    });

    it('should skip a time-granular candidate within tolerance', () => {
      const existing = buildRecord({ entityType: 'steps', value: 100, subDayTime: '06:00' });
      const index = service.createIndex([existing]);
      const candidate = service.normalize(
        buildCandidate({ entityType: 'steps', value: 100.005, valueTimestamp: '2024-03-10T06:00:00.000Z' })
      );

      expect(service.resolve(TEST_USER_ID, candidate, index)).toEqual({ kind: 'duplicate', existing });
    });

    it('should take the new value for a different time-granular reading', () => {
      const existing = buildRecord({ entityType: 'steps', value: 100, subDayTime: '06:00' });
      const index = service.createIndex([existing]);
      const candidate = service.normalize(
        buildCandidate({ entityType: 'steps', value: 140, valueTimestamp: '2024-03-10T06:00:00.000Z' })
      );

      expect(service.resolve(TEST_USER_ID, candidate, index)).toEqual({ kind: 'merge', existing, value: 140 });
    });

    it('should add date-granular sum values', () => {
      const existing = buildRecord({ value: 0.5 });
      const index = service.createIndex([existing]);
      const candidate = service.normalize(buildCandidate({ value: 0.25, valueTimestamp: '2024-03-10T18:00:00.000Z' }));

      expect(service.resolve(TEST_USER_ID, candidate, index)).toEqual({ kind: 'merge', existing, value: 0.75 });
    });

    it('should replace date-granular replace values', () => {
      const existing = buildRecord({ entityType: 'weight', value: 70.2 });
      const index = service.createIndex([existing]);

      const same = service.normalize(buildCandidate({ entityType: 'weight', value: 70.2 }));
      const changed = service.normalize(buildCandidate({ entityType: 'weight', value: 69.8 }));

      expect(service.resolve(TEST_USER_ID, same, index).kind).toBe('duplicate');
      expect(service.resolve(TEST_USER_ID, changed, index)).toEqual({ kind: 'merge', existing, value: 69.8 });
    });

    it('should not match records of another user', () => {
      const index = service.createIndex([buildRecord({ userID: OTHER_USER_ID })]);

      expect(service.resolve(TEST_USER_ID, service.normalize(buildCandidate()), index).kind).toBe('insert');
    });

    it('should deduplicate against records added to the index during a batch', () => {
      const index = service.createIndex([]);
      index.add(buildRecord({ entityType: 'steps', value: 100, subDayTime: '06:00' }));
      const candidate = service.normalize(
        buildCandidate({ entityType: 'steps', value: 100, valueTimestamp: '2024-03-10T06:00:00.000Z' })
      );

      expect(service.resolve(TEST_USER_ID, candidate, index).kind).toBe('duplicate');
    });
  });

  describe('resolve - remote-confirmed candidates', () => {
    const service = createService();

    it('should overwrite a synced copy with newer backend state', () => {
      const existing = buildRecord({ backendID: 'remote-1', syncStatus: 'synced', value: 0.5 });
      const index = service.createIndex([existing]);
      const candidate = service.normalize(buildCandidate({ backendID: 'remote-1', value: 1.5 }));

      expect(service.resolve(TEST_USER_ID, candidate, index)).toEqual({ kind: 'remote_overwrite', existing });
    });

    it('should keep a local copy that is not yet synced', () => {
      const existing = buildRecord({ backendID: 'remote-1', syncStatus: 'pending', value: 0.5 });
      const index = service.createIndex([existing]);
      const candidate = service.normalize(buildCandidate({ backendID: 'remote-1', value: 1.5 }));

      expect(service.resolve(TEST_USER_ID, candidate, index)).toEqual({ kind: 'duplicate', existing });
    });

    it('should skip an unchanged synced copy', () => {
      const existing = buildRecord({ backendID: 'remote-1', syncStatus: 'synced', value: 0.5 });
      const index = service.createIndex([existing]);
      const candidate = service.normalize(buildCandidate({ backendID: 'remote-1', value: 0.5 }));

      expect(service.resolve(TEST_USER_ID, candidate, index).kind).toBe('duplicate');
    });

    it('should fall back to the dedup key', () => {
      const existing = buildRecord({ value: 0.5 });
      const index = service.createIndex([existing]);
      const candidate = service.normalize(buildCandidate({ backendID: 'remote-9', value: 2 }));

      expect(service.resolve(TEST_USER_ID, candidate, index)).toEqual({ kind: 'duplicate', existing });
    });

    it('should insert an unknown backend record', () => {
      const candidate = service.normalize(buildCandidate({ backendID: 'remote-9' }));

      expect(service.resolve(TEST_USER_ID, candidate, service.createIndex([])).kind).toBe('insert');
    });
  });

  describe('windowFor', () => {
    it('should cover every candidate day and entity type', () => {
      const service = createService();
      const window = service.windowFor([
        service.normalize(buildCandidate({ valueTimestamp: '2024-03-12T08:00:00.000Z' })),
        service.normalize(buildCandidate({ entityType: 'steps', valueTimestamp: '2024-03-09T08:00:00.000Z' })),
        service.normalize(buildCandidate({ valueTimestamp: '2024-03-10T08:00:00.000Z' })),
      ]);

      expect(window).toEqual({
        entityTypes: ['water_liters', 'steps'],
        fromDate: '2024-03-09',
        toDate: '2024-03-12',
      });
    });

    it('should return null for an empty batch', () => {
      expect(createService().windowFor([])).toBeNull();
    });
  });
});
