/**
 * Migration Service
 *
 * Schema versioning for the sync database. Each vNNN_name.sql file is applied
 * inside its own transaction and recorded in schema_migrations.
 *
 * @module services/migration
 * @security SEC-006: All SQL via parameterized queries
 */

import { createHash } from 'crypto';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { getDatabase } from './database.service';
import { createLogger, errorMessage } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface Migration {
  /** Unique version number (must be sequential) */
  version: number;
  name: string;
  sql: string;
}

export interface MigrationResult {
  success: boolean;
  version: number;
  name: string;
  error?: string;
  durationMs: number;
}

export interface MigrationSummary {
  applied: MigrationResult[];
  skipped: number[];
  failed: MigrationResult | null;
  totalDurationMs: number;
}

// ============================================================================
// Constants
// ============================================================================

const MIGRATION_TABLE = 'schema_migrations';

/** Bundled migrations shipped beside the services directory */
export const DEFAULT_MIGRATIONS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../migrations'
);

const MIGRATION_FILE_PATTERN = /^v(\d{3})_(.+)\.sql$/;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('migration');

// ============================================================================
// Migration Table Management
// ============================================================================

export function initializeMigrationTable(): void {
  const db = getDatabase();

  db.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now')),
      checksum TEXT
    )
  `);

  log.debug('Migration table initialized');
}

export function getAppliedMigrations(): number[] {
  const db = getDatabase();

  // SEC-006: Prepared statement with no parameters
  const rows = db
    .prepare(`SELECT version FROM ${MIGRATION_TABLE} ORDER BY version ASC`)
    .pluck()
    .all();

  return rows.filter((value): value is number => typeof value === 'number');
}

/**
 * @returns Latest applied migration version, or 0 if none applied
 */
export function getCurrentSchemaVersion(): number {
  const applied = getAppliedMigrations();
  return applied.length > 0 ? applied[applied.length - 1] : 0;
}

// ============================================================================
// Migration Execution
// ============================================================================

function calculateChecksum(sql: string): string {
  return createHash('sha256').update(sql).digest('hex').substring(0, 16);
}

/**
 * Apply a single migration within a transaction
 * DB-001: Transactional migration with automatic rollback
 */
export function applyMigration(migration: Migration): MigrationResult {
  const db = getDatabase();
  const startTime = Date.now();

  log.info('Applying migration', { version: migration.version, name: migration.name });

  try {
    const checksum = calculateChecksum(migration.sql);

    db.transaction(() => {
      db.exec(migration.sql);

      // SEC-006: Parameterized insert
      db.prepare(`INSERT INTO ${MIGRATION_TABLE} (version, name, checksum) VALUES (?, ?, ?)`).run(
        migration.version,
        migration.name,
        checksum
      );
    })();

    const durationMs = Date.now() - startTime;
    log.info('Migration applied successfully', {
      version: migration.version,
      name: migration.name,
      durationMs,
    });

    return { success: true, version: migration.version, name: migration.name, durationMs };
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const message = errorMessage(error);

    log.error('Migration failed', {
      version: migration.version,
      name: migration.name,
      error: message,
      durationMs,
    });

    return {
      success: false,
      version: migration.version,
      name: migration.name,
      error: message,
      durationMs,
    };
  }
}

// ============================================================================
// Migration Loading
// ============================================================================

/**
 * Load migrations from SQL files in a directory
 * Files must be named: v###_name.sql (e.g., v001_initial_schema.sql)
 */
export function loadMigrationsFromDirectory(migrationsDir: string): Migration[] {
  if (!fs.existsSync(migrationsDir)) {
    log.warn('Migrations directory does not exist', { path: migrationsDir });
    return [];
  }

  const migrations: Migration[] = [];

  for (const file of fs.readdirSync(migrationsDir)) {
    const match = MIGRATION_FILE_PATTERN.exec(file);
    if (!match) {
      continue;
    }

    migrations.push({
      version: parseInt(match[1], 10),
      name: match[2].replace(/_/g, ' '),
      sql: fs.readFileSync(path.join(migrationsDir, file), 'utf-8'),
    });
  }

  migrations.sort((a, b) => a.version - b.version);

  for (let i = 0; i < migrations.length; i++) {
    if (migrations[i].version !== i + 1) {
      log.warn('Non-sequential migration version detected', {
        expected: i + 1,
        actual: migrations[i].version,
      });
    }
  }

  return migrations;
}

// ============================================================================
// Migration Runner
// ============================================================================

/**
 * Apply every pending migration in version order, stopping at the first failure
 */
export function runMigrationsFromArray(migrations: Migration[]): MigrationSummary {
  const startTime = Date.now();

  initializeMigrationTable();
  const appliedSet = new Set(getAppliedMigrations());

  const summary: MigrationSummary = {
    applied: [],
    skipped: [],
    failed: null,
    totalDurationMs: 0,
  };

  for (const migration of [...migrations].sort((a, b) => a.version - b.version)) {
    if (appliedSet.has(migration.version)) {
      summary.skipped.push(migration.version);
      continue;
    }

    const result = applyMigration(migration);
    if (!result.success) {
      summary.failed = result;
      break;
    }
    summary.applied.push(result);
  }

  summary.totalDurationMs = Date.now() - startTime;

  log.info('Migration run completed', {
    applied: summary.applied.length,
    skipped: summary.skipped.length,
    failed: summary.failed !== null,
    totalDurationMs: summary.totalDurationMs,
  });

  return summary;
}

/**
 * Run all pending migrations from a directory
 *
 * @throws Error when a migration fails; the failing migration is rolled back
 */
export function runMigrations(migrationsDir: string = DEFAULT_MIGRATIONS_DIR): MigrationSummary {
  log.info('Starting migration run', { migrationsDir });

  const summary = runMigrationsFromArray(loadMigrationsFromDirectory(migrationsDir));
  if (summary.failed) {
    throw new Error(
      `Migration v${summary.failed.version} (${summary.failed.name}) failed: ${summary.failed.error}`
    );
  }
  return summary;
}
