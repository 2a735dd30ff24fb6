/**
 * Refresh Markers DAL Unit Tests
 *
 * @module tests/unit/dal/refresh-markers.dal.spec
 */

// Using vitest globals (configured in vitest.config.ts)

import { refreshMarkersDAL } from '../../../src/dal/refresh-markers.dal';
import { createTestDatabase, type TestDatabaseContext } from '../../helpers';
import { OTHER_USER_ID, TEST_USER_ID } from '../../fixtures/record-factories';

describe('RefreshMarkersDAL', () => {
  let database: TestDatabaseContext;

  beforeEach(() => {
    database = createTestDatabase();
  });

  afterEach(() => {
    database.cleanup();
  });

  it('should return null before the first refresh', () => {
    expect(refreshMarkersDAL.getLastRefresh(TEST_USER_ID, 'steps')).toBeNull();
  });

  it('should keep one marker per user and entity type', () => {
    refreshMarkersDAL.markRefreshed(TEST_USER_ID, 'steps', '2024-03-10T08:00:00.000Z');
    refreshMarkersDAL.markRefreshed(TEST_USER_ID, 'steps', '2024-03-10T09:00:00.000Z');
    refreshMarkersDAL.markRefreshed(TEST_USER_ID, 'weight', '2024-03-10T07:00:00.000Z');
    refreshMarkersDAL.markRefreshed(OTHER_USER_ID, 'steps', '2024-03-10T06:00:00.000Z');

    expect(refreshMarkersDAL.getLastRefresh(TEST_USER_ID, 'steps')).toBe('2024-03-10T09:00:00.000Z');
    expect(refreshMarkersDAL.getLastRefresh(TEST_USER_ID, 'weight')).toBe('2024-03-10T07:00:00.000Z');
    expect(refreshMarkersDAL.getLastRefresh(OTHER_USER_ID, 'steps')).toBe('2024-03-10T06:00:00.000Z');
  });

  it('should default the marker time to now', () => {
    const before = Date.now();

    refreshMarkersDAL.markRefreshed(TEST_USER_ID, 'steps');

    const at = refreshMarkersDAL.getLastRefresh(TEST_USER_ID, 'steps');
    expect(at).not.toBeNull();
    expect(Date.parse(at ?? '')).toBeGreaterThanOrEqual(before - 1);
  });
});
