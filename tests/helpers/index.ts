/**
 * Test Helpers Index
 *
 * @module tests/helpers
 */

export { createTestDatabase, listTables, type TestDatabaseContext, type TestDatabaseOptions } from './test-database';
export { FakeRemoteGateway, type RecordedWrite, type ScriptedFailure } from './fake-remote-gateway';
export {
  createSessionTestContext,
  type SessionTestContext,
  type SessionTestContextOptions,
} from './test-context';
