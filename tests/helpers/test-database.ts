/**
 * Test Database Factory
 *
 * Opens the shared database handle on a fresh in-memory SQLite database and
 * applies the bundled migrations, so DALs and services under test run
 * against the production schema.
 *
 * @module tests/helpers/test-database
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  closeDatabase,
  initializeDatabase,
  type DatabaseInstance,
} from '../../src/services/database.service';
import { runMigrations, type MigrationSummary } from '../../src/services/migration.service';

// ============================================================================
// Types
// ============================================================================

export interface TestDatabaseContext {
  db: DatabaseInstance;
  /** ':memory:' unless a file database was requested */
  dbPath: string;
  migrations: MigrationSummary;
  /** Call in afterEach */
  cleanup: () => void;
}

export interface TestDatabaseOptions {
  /** Use a temp file instead of memory (default: false) */
  onDisk?: boolean;
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Usage:
 * ```typescript
 * let ctx: TestDatabaseContext;
 *
 * beforeEach(() => {
 *   ctx = createTestDatabase();
 * });
 *
 * afterEach(() => {
 *   ctx.cleanup();
 * });
 * ```
 */
export function createTestDatabase(options: TestDatabaseOptions = {}): TestDatabaseContext {
  // A handle left open by an earlier test would be reused
  closeDatabase();

  let testDir: string | null = null;
  let dbPath = ':memory:';
  if (options.onDisk) {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vitals-sync-test-'));
    dbPath = path.join(testDir, 'test.db');
  }

  const db = initializeDatabase({ dbPath });
  const migrations = runMigrations();

  const cleanup = (): void => {
    closeDatabase();
    if (testDir) {
      fs.rmSync(testDir, { recursive: true, force: true });
    }
  };

  return { db, dbPath, migrations, cleanup };
}

/**
 * Table names in the schema, for structure assertions
 */
export function listTables(db: DatabaseInstance): string[] {
  return db
    .prepare<[], string>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .pluck()
    .all();
}
