/**
 * Base Data Access Layer
 *
 * Abstract base class providing common operations over the shared SQLite
 * handle. All queries use parameterized statements.
 *
 * @module dal/base
 * @security SEC-006: All queries use prepared statements with parameter binding
 * @security DB-006: Tenant isolation via user_id scoping
 */

import { randomUUID } from 'crypto';
import { getDatabase, isDatabaseInitialized, type DatabaseInstance } from '../services/database.service';

// ============================================================================
// Types
// ============================================================================

/**
 * User-scoped row
 * DB-006: Every synced entity carries user_id
 */
export interface UserRow {
  user_id: string;
}

export interface CountRow {
  count: number;
}

// ============================================================================
// Base DAL Class
// ============================================================================

/**
 * @template TRow - Row shape as stored in SQLite
 */
export abstract class BaseDAL<TRow> {
  /** Table name (must match schema exactly) */
  protected abstract readonly tableName: string;

  /** Primary key column name */
  protected abstract readonly primaryKey: string;

  /**
   * @throws Error if database is not initialized
   */
  protected get db(): DatabaseInstance {
    if (!isDatabaseInitialized()) {
      throw new Error(
        `Database not initialized. Cannot perform ${this.tableName} operations. ` +
          'Ensure initializeDatabase() completes before accessing DAL.'
      );
    }
    return getDatabase();
  }

  protected generateId(): string {
    return randomUUID();
  }

  protected now(): string {
    return new Date().toISOString();
  }

  // ==========================================================================
  // Read Operations (SEC-006: Parameterized queries)
  // ==========================================================================

  protected findRowById(id: string): TRow | undefined {
    // SEC-006: Parameterized query
    return this.db
      .prepare<[string], TRow>(`SELECT * FROM ${this.tableName} WHERE ${this.primaryKey} = ?`)
      .get(id);
  }

  count(): number {
    const row = this.db
      .prepare<[], CountRow>(`SELECT COUNT(*) as count FROM ${this.tableName}`)
      .get();
    return row?.count ?? 0;
  }

  // ==========================================================================
  // Transaction Helpers
  // ==========================================================================

  /**
   * Execute function within a database transaction
   * Automatically commits on success, rolls back on error
   */
  protected withTransaction<R>(fn: () => R): R {
    return this.db.transaction(fn)();
  }
}

// ============================================================================
// User-Scoped Base DAL
// ============================================================================

/**
 * Base DAL for user-scoped tables
 * DB-006: Enforces tenant isolation via user_id on all queries
 */
export abstract class UserBasedDAL<TRow extends UserRow> extends BaseDAL<TRow> {
  /**
   * Find row by ID with user validation
   * DB-006: Ensures the row belongs to the user
   */
  protected findRowByIdForUser(userId: string, id: string): TRow | undefined {
    return this.db
      .prepare<[string, string], TRow>(
        `SELECT * FROM ${this.tableName} WHERE ${this.primaryKey} = ? AND user_id = ?`
      )
      .get(id, userId);
  }

  countByUser(userId: string): number {
    const row = this.db
      .prepare<[string], CountRow>(
        `SELECT COUNT(*) as count FROM ${this.tableName} WHERE user_id = ?`
      )
      .get(userId);
    return row?.count ?? 0;
  }

  /**
   * Delete row with user validation
   * DB-006: Ensures the row belongs to the user before deletion
   */
  deleteForUser(userId: string, id: string): boolean {
    const result = this.db
      .prepare(`DELETE FROM ${this.tableName} WHERE ${this.primaryKey} = ? AND user_id = ?`)
      .run(id, userId);
    return result.changes > 0;
  }
}
