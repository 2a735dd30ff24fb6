/**
 * Database Service
 *
 * SQLite database management for the sync engine. One handle per process,
 * shared by every DAL, so a write and the notification that follows it
 * always observe the same committed state.
 *
 * @module services/database
 * @security SEC-006: Prepared statements for all queries
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { createLogger, errorMessage } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

/**
 * Database instance type exported for DAL usage
 */
export type DatabaseInstance = Database.Database;

/**
 * Database configuration options
 */
export interface DatabaseOptions {
  /** Path to database file, or ':memory:' */
  dbPath?: string;
  /** Enable verbose SQL logging (debug only) */
  verbose?: boolean;
  /** Memory limit for SQLite in KB (default: 64MB) */
  memoryLimit?: number;
}

export interface DatabaseHealth {
  isOpen: boolean;
  inMemory: boolean;
  tableCount: number;
  path: string;
}

// ============================================================================
// Constants
// ============================================================================

const IN_MEMORY = ':memory:';
const DEFAULT_MEMORY_LIMIT_KB = 64 * 1024;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('database');

// ============================================================================
// Singleton State
// ============================================================================

let dbInstance: Database.Database | null = null;
let dbPath: string | null = null;

// ============================================================================
// Database Initialization
// ============================================================================

/**
 * Open the SQLite database and apply pragmas
 *
 * Returns the existing handle when already open.
 *
 * @throws Error if the file cannot be opened or read
 */
export function initializeDatabase(options: DatabaseOptions = {}): Database.Database {
  if (dbInstance) {
    log.debug('Returning existing database instance');
    return dbInstance;
  }

  const finalDbPath = options.dbPath || IN_MEMORY;

  if (finalDbPath !== IN_MEMORY) {
    const dbDir = path.dirname(finalDbPath);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
      log.debug('Database directory created', { path: dbDir });
    }
  }

  let opened: Database.Database;
  try {
    opened = new Database(finalDbPath, {
      verbose: options.verbose
        ? (message?: unknown) =>
            log.debug('SQL executed', { sql: String(message).substring(0, 200) })
        : undefined,
    });
  } catch (error) {
    log.error('Failed to open database file', { path: finalDbPath, error: errorMessage(error) });
    throw new Error(`Failed to open database: ${errorMessage(error)}`);
  }

  try {
    opened.exec('SELECT count(*) FROM sqlite_master');
  } catch (error) {
    opened.close();
    log.error('Database access verification failed', { error: errorMessage(error) });
    throw new Error('Database access verification failed. The database may be corrupted.');
  }

  applyPerformancePragmas(opened, finalDbPath, options);

  dbInstance = opened;
  dbPath = finalDbPath;

  log.info('Database initialized successfully', { path: finalDbPath });

  return dbInstance;
}

function applyPerformancePragmas(
  db: Database.Database,
  filePath: string,
  options: DatabaseOptions
): void {
  // WAL is not available for in-memory databases
  if (filePath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }

  db.pragma('synchronous = NORMAL');

  const memoryLimit = options.memoryLimit || DEFAULT_MEMORY_LIMIT_KB;
  db.pragma(`cache_size = -${memoryLimit}`);

  // Outbox rows cascade with their record
  db.pragma('foreign_keys = ON');

  db.pragma('temp_store = MEMORY');

  log.debug('Performance pragmas applied', { memoryLimitKB: memoryLimit });
}

// ============================================================================
// Database Access
// ============================================================================

/**
 * Get the database instance
 *
 * @throws Error if database not initialized
 */
export function getDatabase(): Database.Database {
  if (!dbInstance) {
    throw new Error('Database not initialized. Call initializeDatabase() first.');
  }
  return dbInstance;
}

export function isDatabaseInitialized(): boolean {
  return dbInstance !== null;
}

export function getDatabaseHealth(): DatabaseHealth {
  const db = getDatabase();
  const row = db
    .prepare("SELECT COUNT(*) as count FROM sqlite_master WHERE type = 'table'")
    .get();
  const tableCount =
    row !== null && typeof row === 'object' && 'count' in row && typeof row.count === 'number'
      ? row.count
      : 0;

  return {
    isOpen: db.open,
    inMemory: db.memory,
    tableCount,
    path: dbPath ?? IN_MEMORY,
  };
}

// ============================================================================
// Database Lifecycle
// ============================================================================

/**
 * Close the database connection
 * Call this during application shutdown
 */
export function closeDatabase(): void {
  if (dbInstance) {
    try {
      if (!dbInstance.memory) {
        dbInstance.pragma('wal_checkpoint(TRUNCATE)');
      }
      dbInstance.close();
      log.info('Database closed successfully');
    } catch (error) {
      log.error('Error closing database', { error: errorMessage(error) });
    } finally {
      dbInstance = null;
      dbPath = null;
    }
  }
}

/**
 * Execute a function within a database transaction
 * Automatically commits on success, rolls back on error
 */
export function withTransaction<T>(fn: () => T): T {
  const db = getDatabase();
  return db.transaction(fn)();
}
