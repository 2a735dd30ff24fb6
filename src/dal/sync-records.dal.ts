/**
 * Sync Records Data Access Layer
 *
 * Persistence for SyncableRecord rows. Rows are snake_case as stored; every
 * public method speaks the camelCase domain type.
 *
 * @module dal/sync-records
 * @security SEC-006: All queries use prepared statements
 * @security DB-006: User-scoped for tenant isolation
 */

import { UserBasedDAL, type CountRow } from './base.dal';
import { createLogger } from '../utils/logger';
import {
  RecordPayloadSchema,
  type RecordPayload,
  type SyncableRecord,
  type SyncStatus,
  type SyncStatusSummary,
} from '../shared/types/sync.types';

// ============================================================================
// Types
// ============================================================================

export interface SyncRecordRow {
  local_id: string;
  backend_id: string | null;
  user_id: string;
  entity_type: string;
  value: number;
  payload: string | null;
  value_timestamp: string;
  value_date: string;
  sub_day_time: string | null;
  sync_status: SyncStatus;
  remote_generation: number;
  last_sync_error: string | null;
  synced_at: string | null;
  created_at: string;
  updated_at: string;
}

interface SummaryRow {
  pending_count: number | null;
  failed_count: number | null;
  last_synced_at: string | null;
}

interface LatestRow {
  latest: string | null;
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('sync-records-dal');

// ============================================================================
// Row Mapping
// ============================================================================

function parsePayload(raw: string | null): RecordPayload | null {
  if (raw === null) {
    return null;
  }
  try {
    const parsed = RecordPayloadSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    log.warn('Stored payload is not valid JSON, returning null');
    return null;
  }
}

export function toSyncableRecord(row: SyncRecordRow): SyncableRecord {
  return {
    localID: row.local_id,
    backendID: row.backend_id,
    userID: row.user_id,
    entityType: row.entity_type,
    value: row.value,
    payload: parsePayload(row.payload),
    valueTimestamp: row.value_timestamp,
    valueDate: row.value_date,
    subDayTime: row.sub_day_time,
    syncStatus: row.sync_status,
    remoteGeneration: row.remote_generation,
    lastSyncError: row.last_sync_error,
    syncedAt: row.synced_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

// ============================================================================
// Sync Records DAL
// ============================================================================

export class SyncRecordsDAL extends UserBasedDAL<SyncRecordRow> {
  protected readonly tableName = 'sync_records';
  protected readonly primaryKey = 'local_id';

  // ==========================================================================
  // Reads
  // ==========================================================================

  findByLocalId(userId: string, localId: string): SyncableRecord | undefined {
    const row = this.findRowByIdForUser(userId, localId);
    return row ? toSyncableRecord(row) : undefined;
  }

  findByBackendId(userId: string, backendId: string): SyncableRecord | undefined {
    const row = this.db
      .prepare<[string, string], SyncRecordRow>(
        `SELECT * FROM sync_records WHERE user_id = ? AND backend_id = ?
         ORDER BY created_at ASC LIMIT 1`
      )
      .get(userId, backendId);
    return row ? toSyncableRecord(row) : undefined;
  }

  /**
   * Records whose value timestamp falls in [from, to], oldest first
   */
  findByRange(userId: string, entityType: string, from: string, to: string): SyncableRecord[] {
    const rows = this.db
      .prepare<[string, string, string, string], SyncRecordRow>(
        `SELECT * FROM sync_records
         WHERE user_id = ? AND entity_type = ? AND value_timestamp >= ? AND value_timestamp <= ?
         ORDER BY value_timestamp ASC, created_at ASC`
      )
      .all(userId, entityType, from, to);
    return rows.map(toSyncableRecord);
  }

  /**
   * Every record of the given entity types whose calendar day falls in
   * [fromDate, toDate]. Used as the single existing-records fetch of a
   * dedup batch.
   */
  findForDedupWindow(
    userId: string,
    entityTypes: string[],
    fromDate: string,
    toDate: string
  ): SyncableRecord[] {
    if (entityTypes.length === 0) {
      return [];
    }

    // SEC-006: Parameterized IN clause using placeholders
    const placeholders = entityTypes.map(() => '?').join(', ');
    const rows = this.db
      .prepare<string[], SyncRecordRow>(
        `SELECT * FROM sync_records
         WHERE user_id = ? AND entity_type IN (${placeholders})
           AND value_date >= ? AND value_date <= ?
         ORDER BY created_at ASC`
      )
      .all(userId, ...entityTypes, fromDate, toDate);

    log.debug('Dedup window fetched', {
      entityTypes: entityTypes.length,
      fromDate,
      toDate,
      rows: rows.length,
    });

    return rows.map(toSyncableRecord);
  }

  /**
   * Records referenced by any of the given backend IDs
   */
  findByBackendIds(userId: string, backendIds: string[]): SyncableRecord[] {
    if (backendIds.length === 0) {
      return [];
    }
    const placeholders = backendIds.map(() => '?').join(', ');
    const rows = this.db
      .prepare<string[], SyncRecordRow>(
        `SELECT * FROM sync_records WHERE user_id = ? AND backend_id IN (${placeholders})`
      )
      .all(userId, ...backendIds);
    return rows.map(toSyncableRecord);
  }

  /**
   * Most recent updated_at for (user, entity type), or null when none exist
   */
  getLatestUpdatedAt(userId: string, entityType: string): string | null {
    const row = this.db
      .prepare<[string, string], LatestRow>(
        'SELECT MAX(updated_at) as latest FROM sync_records WHERE user_id = ? AND entity_type = ?'
      )
      .get(userId, entityType);
    return row?.latest ?? null;
  }

  getSummary(userId: string): SyncStatusSummary {
    const row = this.db
      .prepare<[string], SummaryRow>(
        `SELECT
           SUM(CASE WHEN sync_status IN ('pending', 'syncing') THEN 1 ELSE 0 END) as pending_count,
           SUM(CASE WHEN sync_status = 'failed' THEN 1 ELSE 0 END) as failed_count,
           MAX(synced_at) as last_synced_at
         FROM sync_records WHERE user_id = ?`
      )
      .get(userId);

    return {
      pendingCount: row?.pending_count ?? 0,
      failedCount: row?.failed_count ?? 0,
      lastSyncedAt: row?.last_synced_at ?? null,
    };
  }

  countByStatus(userId: string, status: SyncStatus): number {
    const row = this.db
      .prepare<[string, SyncStatus], CountRow>(
        'SELECT COUNT(*) as count FROM sync_records WHERE user_id = ? AND sync_status = ?'
      )
      .get(userId, status);
    return row?.count ?? 0;
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  insert(record: SyncableRecord): void {
    this.db
      .prepare(
        `INSERT INTO sync_records (
           local_id, backend_id, user_id, entity_type, value, payload,
           value_timestamp, value_date, sub_day_time, sync_status, remote_generation,
           last_sync_error, synced_at, created_at, updated_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        record.localID,
        record.backendID,
        record.userID,
        record.entityType,
        record.value,
        record.payload === null ? null : JSON.stringify(record.payload),
        record.valueTimestamp,
        record.valueDate,
        record.subDayTime,
        record.syncStatus,
        record.remoteGeneration,
        record.lastSyncError,
        record.syncedAt,
        record.createdAt,
        record.updatedAt
      );
  }

  /**
   * Overwrite every mutable column; identity columns never change
   */
  update(record: SyncableRecord): void {
    this.db
      .prepare(
        `UPDATE sync_records SET
           backend_id = ?, value = ?, payload = ?, sub_day_time = ?, sync_status = ?,
           remote_generation = ?, last_sync_error = ?, synced_at = ?, updated_at = ?
         WHERE local_id = ? AND user_id = ?`
      )
      .run(
        record.backendID,
        record.value,
        record.payload === null ? null : JSON.stringify(record.payload),
        record.subDayTime,
        record.syncStatus,
        record.remoteGeneration,
        record.lastSyncError,
        record.syncedAt,
        record.updatedAt,
        record.localID,
        record.userID
      );
  }

  markSyncing(localId: string): string {
    const now = this.now();
    this.db
      .prepare("UPDATE sync_records SET sync_status = 'syncing', updated_at = ? WHERE local_id = ?")
      .run(now, localId);
    return now;
  }

  markSynced(localId: string, backendId: string): string {
    const now = this.now();
    this.db
      .prepare(
        `UPDATE sync_records
         SET sync_status = 'synced', backend_id = ?, last_sync_error = NULL,
             synced_at = ?, updated_at = ?
         WHERE local_id = ?`
      )
      .run(backendId, now, now, localId);
    return now;
  }

  /**
   * A dispatch succeeded but the record changed meanwhile: keep it pending.
   * With upsert the acknowledged backend ID is kept for the follow-up PUT;
   * without it the ID is dropped and the generation bumped so the follow-up
   * create carries a fresh idempotency key.
   */
  markAcknowledgedPending(localId: string, backendId: string, keepBackendId: boolean): string {
    const now = this.now();
    if (keepBackendId) {
      this.db
        .prepare(
          `UPDATE sync_records SET sync_status = 'pending', backend_id = ?, last_sync_error = NULL,
             updated_at = ?
           WHERE local_id = ?`
        )
        .run(backendId, now, localId);
    } else {
      this.db
        .prepare(
          `UPDATE sync_records SET sync_status = 'pending', backend_id = NULL,
             remote_generation = remote_generation + 1, last_sync_error = NULL, updated_at = ?
           WHERE local_id = ?`
        )
        .run(now, localId);
    }
    return now;
  }

  /**
   * Back to pending, optionally recording the error that caused a retry
   */
  markPending(localId: string, error: string | null = null): string {
    const now = this.now();
    this.db
      .prepare(
        `UPDATE sync_records SET sync_status = 'pending', last_sync_error = ?, updated_at = ?
         WHERE local_id = ?`
      )
      .run(error, now, localId);
    return now;
  }

  /**
   * A dispatch was rejected but the record changed meanwhile: the newer
   * state goes back to pending. A record never created remotely moves to
   * the next generation so its create carries a fresh idempotency key.
   */
  markRejectedPending(localId: string, error: string): string {
    const now = this.now();
    this.db
      .prepare(
        `UPDATE sync_records
         SET sync_status = 'pending', last_sync_error = ?, updated_at = ?,
             remote_generation = remote_generation + (CASE WHEN backend_id IS NULL THEN 1 ELSE 0 END)
         WHERE local_id = ?`
      )
      .run(error, now, localId);
    return now;
  }

  markFailed(localId: string, error: string): string {
    const now = this.now();
    this.db
      .prepare(
        `UPDATE sync_records SET sync_status = 'failed', last_sync_error = ?, updated_at = ?
         WHERE local_id = ?`
      )
      .run(error, now, localId);
    return now;
  }

  /**
   * Records left in syncing by an interrupted dispatcher go back to pending
   *
   * @returns number of records released
   */
  releaseSyncing(localIds: string[]): number {
    if (localIds.length === 0) {
      return 0;
    }
    const placeholders = localIds.map(() => '?').join(', ');
    const result = this.db
      .prepare(
        `UPDATE sync_records SET sync_status = 'pending', updated_at = ?
         WHERE sync_status = 'syncing' AND local_id IN (${placeholders})`
      )
      .run(this.now(), ...localIds);
    return result.changes;
  }

  /**
   * Failed records of a user go back to pending
   */
  resetFailed(userId: string): string[] {
    const ids = this.db
      .prepare<[string], string>(
        "SELECT local_id FROM sync_records WHERE user_id = ? AND sync_status = 'failed'"
      )
      .pluck()
      .all(userId);

    if (ids.length > 0) {
      this.db
        .prepare(
          `UPDATE sync_records SET sync_status = 'pending', last_sync_error = NULL, updated_at = ?
           WHERE user_id = ? AND sync_status = 'failed'`
        )
        .run(this.now(), userId);
    }
    return ids;
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

export const syncRecordsDAL = new SyncRecordsDAL();
