/**
 * Migration Service Unit Tests
 *
 * Tests for schema versioning and migration management, run against an
 * in-memory database.
 *
 * @module tests/unit/migration.service.spec
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { closeDatabase, getDatabase, initializeDatabase } from '../../src/services/database.service';
import {
  getAppliedMigrations,
  getCurrentSchemaVersion,
  loadMigrationsFromDirectory,
  runMigrations,
  runMigrationsFromArray,
} from '../../src/services/migration.service';
import { listTables } from '../helpers';

describe('MigrationService', () => {
  let tempDir: string;

  beforeEach(() => {
    closeDatabase();
    initializeDatabase({ dbPath: ':memory:' });
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vitals-sync-migrations-'));
  });

  afterEach(() => {
    closeDatabase();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('runMigrations', () => {
    it('should create the bundled schema', () => {
      const summary = runMigrations();

      expect(summary.applied.map((m) => m.version)).toEqual([1]);
      expect(summary.failed).toBeNull();
      expect(listTables(getDatabase())).toEqual([
        'auth_credentials',
        'outbox_events',
        'refresh_markers',
        'schema_migrations',
        'sync_records',
      ]);
    });

    it('should skip migrations already applied', () => {
      runMigrations();

      const second = runMigrations();

      expect(second.applied).toEqual([]);
      expect(second.skipped).toEqual([1]);
      expect(getCurrentSchemaVersion()).toBe(1);
    });

    it('should stop at a failing migration and roll it back', () => {
      fs.writeFileSync(path.join(tempDir, 'v001_first.sql'), 'CREATE TABLE first_table (id TEXT);');
      fs.writeFileSync(
        path.join(tempDir, 'v002_broken.sql'),
        'CREATE TABLE second_table (id TEXT); INSERT INTO missing_table VALUES (1);'
      );

      expect(() => runMigrations(tempDir)).toThrow(/^Migration v2 \(broken\) failed: /);
      expect(getAppliedMigrations()).toEqual([1]);
      expect(listTables(getDatabase())).toEqual(['first_table', 'schema_migrations']);
    });
  });

  describe('runMigrationsFromArray', () => {
    it('should apply migrations in version order', () => {
      const summary = runMigrationsFromArray([
        { version: 2, name: 'second', sql: 'ALTER TABLE t ADD COLUMN extra TEXT;' },
        { version: 1, name: 'first', sql: 'CREATE TABLE t (id TEXT);' },
      ]);

      expect(summary.applied.map((m) => m.name)).toEqual(['first', 'second']);
      expect(getAppliedMigrations()).toEqual([1, 2]);
    });

    it('should report the failure without throwing', () => {
      const summary = runMigrationsFromArray([{ version: 1, name: 'bad', sql: 'NOT SQL' }]);

      expect(summary.failed?.version).toBe(1);
      expect(summary.failed?.success).toBe(false);
      expect(getCurrentSchemaVersion()).toBe(0);
    });
  });

  describe('loadMigrationsFromDirectory', () => {
    it('should load versioned files sorted, ignoring everything else', () => {
      fs.writeFileSync(path.join(tempDir, 'v002_add_markers.sql'), 'SELECT 2;');
      fs.writeFileSync(path.join(tempDir, 'v001_initial_schema.sql'), 'SELECT 1;');
      fs.writeFileSync(path.join(tempDir, 'README.md'), '# notes');

      const migrations = loadMigrationsFromDirectory(tempDir);

      expect(migrations).toEqual([
        { version: 1, name: 'initial schema', sql: 'SELECT 1;' },
        { version: 2, name: 'add markers', sql: 'SELECT 2;' },
      ]);
    });

    it('should return nothing for a missing directory', () => {
      expect(loadMigrationsFromDirectory(path.join(tempDir, 'absent'))).toEqual([]);
    });
  });
});
