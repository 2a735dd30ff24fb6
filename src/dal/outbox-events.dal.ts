/**
 * Outbox Events Data Access Layer
 *
 * Durable queue of intents to push a local record to the backend.
 *
 * Invariant: at most one pending/processing event per local record, enforced
 * by the idx_outbox_events_active_record partial unique index. A write that
 * lands while its event is processing sets `dirty` so the event is re-armed
 * after the in-flight attempt instead of completing.
 *
 * @module dal/outbox-events
 * @security SEC-006: All queries use prepared statements
 * @security DB-006: User-scoped for tenant isolation
 */

import { UserBasedDAL } from './base.dal';
import { createLogger } from '../utils/logger';
import type {
  ErrorCategory,
  OutboxEvent,
  OutboxStatistics,
  OutboxStatus,
} from '../shared/types/sync.types';

// ============================================================================
// Types
// ============================================================================

export interface OutboxEventRow {
  event_id: string;
  entity_type: string;
  local_record_id: string;
  user_id: string;
  is_new_record: number; // SQLite boolean
  status: OutboxStatus;
  attempt_count: number;
  max_attempts: number;
  next_attempt_at: string;
  dirty: number; // SQLite boolean
  error_category: ErrorCategory | null;
  last_error: string | null;
  http_status: number | null;
  last_attempt_at: string | null;
  completed_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface CreateOutboxEventData {
  entityType: string;
  localRecordID: string;
  userID: string;
  isNewRecord: boolean;
  maxAttempts: number;
}

export interface OutboxFailureDetails {
  category: ErrorCategory;
  message: string;
  httpStatus: number | null;
}

interface StatisticsRow {
  pending: number | null;
  processing: number | null;
  completed: number | null;
  failed_permanent: number | null;
  stale_processing: number | null;
  oldest_pending_at: string | null;
  newest_completed_at: string | null;
}

/**
 * Result of completing an event
 * - completed: terminal
 * - rearmed: the record changed mid-flight; the same event is pending again
 */
export type CompletionOutcome = 'completed' | 'rearmed';

/**
 * Result of failing an event
 * - failed: failed_permanent until retryFailed or the record is deleted
 * - rearmed: the record changed mid-flight; the newer state gets a fresh budget
 */
export type FailureOutcome = 'failed' | 'rearmed';

// ============================================================================
// Constants
// ============================================================================

/** Maximum batch size to prevent memory issues */
const MAX_BATCH_SIZE = 500;

/** API-008: Stored error messages are truncated */
const MAX_ERROR_LENGTH = 500;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('outbox-events-dal');

// ============================================================================
// Row Mapping
// ============================================================================

export function toOutboxEvent(row: OutboxEventRow): OutboxEvent {
  return {
    eventID: row.event_id,
    entityType: row.entity_type,
    localRecordID: row.local_record_id,
    userID: row.user_id,
    isNewRecord: row.is_new_record === 1,
    status: row.status,
    attemptCount: row.attempt_count,
    maxAttempts: row.max_attempts,
    nextAttemptAt: row.next_attempt_at,
    dirty: row.dirty === 1,
    errorCategory: row.error_category,
    lastError: row.last_error,
    httpStatus: row.http_status,
    lastAttemptAt: row.last_attempt_at,
    completedAt: row.completed_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

// ============================================================================
// Outbox Events DAL
// ============================================================================

export class OutboxEventsDAL extends UserBasedDAL<OutboxEventRow> {
  protected readonly tableName = 'outbox_events';
  protected readonly primaryKey = 'event_id';

  // ==========================================================================
  // Reads
  // ==========================================================================

  findById(eventId: string): OutboxEvent | undefined {
    const row = this.findRowById(eventId);
    return row ? toOutboxEvent(row) : undefined;
  }

  /**
   * The pending or processing event of a record, if any
   */
  findActiveByRecord(localRecordId: string): OutboxEvent | undefined {
    const row = this.db
      .prepare<[string], OutboxEventRow>(
        `SELECT * FROM outbox_events
         WHERE local_record_id = ? AND status IN ('pending', 'processing')`
      )
      .get(localRecordId);
    return row ? toOutboxEvent(row) : undefined;
  }

  findByRecord(localRecordId: string): OutboxEvent[] {
    return this.db
      .prepare<[string], OutboxEventRow>(
        'SELECT * FROM outbox_events WHERE local_record_id = ? ORDER BY created_at ASC'
      )
      .all(localRecordId)
      .map(toOutboxEvent);
  }

  /**
   * Pending events whose next attempt is due, in next_attempt_at then
   * creation order
   */
  getDue(userId: string, now: string, limit: number): OutboxEvent[] {
    const safeLimit = Math.min(limit, MAX_BATCH_SIZE);
    return this.db
      .prepare<[string, string, number], OutboxEventRow>(
        `SELECT * FROM outbox_events
         WHERE user_id = ? AND status = 'pending' AND next_attempt_at <= ?
         ORDER BY next_attempt_at ASC, created_at ASC
         LIMIT ?`
      )
      .all(userId, now, safeLimit)
      .map(toOutboxEvent);
  }

  /**
   * Earliest next_attempt_at among pending events, used to schedule the
   * next wake-up
   */
  getNextAttemptAt(userId: string): string | null {
    const row = this.db
      .prepare<[string], { next: string | null }>(
        "SELECT MIN(next_attempt_at) as next FROM outbox_events WHERE user_id = ? AND status = 'pending'"
      )
      .get(userId);
    return row?.next ?? null;
  }

  getStatistics(userId: string, staleBefore: string): OutboxStatistics {
    const row = this.db
      .prepare<[string, string], StatisticsRow>(
        `SELECT
           SUM(CASE WHEN status = 'pending' THEN 1 ELSE 0 END) as pending,
           SUM(CASE WHEN status = 'processing' THEN 1 ELSE 0 END) as processing,
           SUM(CASE WHEN status = 'completed' THEN 1 ELSE 0 END) as completed,
           SUM(CASE WHEN status = 'failed_permanent' THEN 1 ELSE 0 END) as failed_permanent,
           SUM(CASE WHEN status = 'processing' AND updated_at < ? THEN 1 ELSE 0 END) as stale_processing,
           MIN(CASE WHEN status = 'pending' THEN created_at END) as oldest_pending_at,
           MAX(CASE WHEN status = 'completed' THEN completed_at END) as newest_completed_at
         FROM outbox_events WHERE user_id = ?`
      )
      .get(staleBefore, userId);

    return {
      pending: row?.pending ?? 0,
      processing: row?.processing ?? 0,
      completed: row?.completed ?? 0,
      failedPermanent: row?.failed_permanent ?? 0,
      staleProcessing: row?.stale_processing ?? 0,
      oldestPendingAt: row?.oldest_pending_at ?? null,
      newestCompletedAt: row?.newest_completed_at ?? null,
    };
  }

  // ==========================================================================
  // Enqueue
  // ==========================================================================

  insert(data: CreateOutboxEventData): OutboxEvent {
    const eventId = this.generateId();
    const now = this.now();

    this.db
      .prepare(
        `INSERT INTO outbox_events (
           event_id, entity_type, local_record_id, user_id, is_new_record, status,
           attempt_count, max_attempts, next_attempt_at, dirty, created_at, updated_at
         ) VALUES (?, ?, ?, ?, ?, 'pending', 0, ?, ?, 0, ?, ?)`
      )
      .run(
        eventId,
        data.entityType,
        data.localRecordID,
        data.userID,
        data.isNewRecord ? 1 : 0,
        data.maxAttempts,
        now,
        now,
        now
      );

    log.debug('Outbox event enqueued', {
      eventId,
      entityType: data.entityType,
      localRecordId: data.localRecordID,
    });

    const created = this.findById(eventId);
    if (!created) {
      throw new Error(`Failed to retrieve created outbox event: ${eventId}`);
    }
    return created;
  }

  /**
   * Fold a new write into an existing active event
   * - processing: flag dirty so the newer state is sent after this attempt
   * - pending: keep the schedule; refresh is_new_record from the record
   */
  coalesce(event: OutboxEvent, isNewRecord: boolean): OutboxEvent {
    const now = this.now();
    if (event.status === 'processing') {
      this.db
        .prepare('UPDATE outbox_events SET dirty = 1, updated_at = ? WHERE event_id = ?')
        .run(now, event.eventID);
    } else {
      this.db
        .prepare('UPDATE outbox_events SET is_new_record = ?, updated_at = ? WHERE event_id = ?')
        .run(isNewRecord ? 1 : 0, now, event.eventID);
    }

    log.debug('Write coalesced into active outbox event', {
      eventId: event.eventID,
      status: event.status,
    });

    const updated = this.findById(event.eventID);
    if (!updated) {
      throw new Error(`Outbox event disappeared during coalesce: ${event.eventID}`);
    }
    return updated;
  }

  // ==========================================================================
  // Dispatch State Transitions
  // ==========================================================================

  /**
   * pending → processing
   *
   * @returns false when the event was no longer pending
   */
  claim(eventId: string): boolean {
    const now = this.now();
    const result = this.db
      .prepare(
        `UPDATE outbox_events SET status = 'processing', last_attempt_at = ?, updated_at = ?
         WHERE event_id = ? AND status = 'pending'`
      )
      .run(now, now, eventId);
    return result.changes > 0;
  }

  /**
   * processing → completed, or back to pending when dirty
   */
  complete(eventId: string, httpStatus: number, isNewRecordAfter: boolean): CompletionOutcome {
    const now = this.now();
    const rearmed = this.db
      .prepare(
        `UPDATE outbox_events
         SET status = 'pending', dirty = 0, attempt_count = 0, is_new_record = ?,
             next_attempt_at = ?, http_status = ?, error_category = NULL, last_error = NULL,
             updated_at = ?
         WHERE event_id = ? AND dirty = 1`
      )
      .run(isNewRecordAfter ? 1 : 0, now, httpStatus, now, eventId);

    if (rearmed.changes > 0) {
      log.debug('Dirty outbox event re-armed', { eventId });
      return 'rearmed';
    }

    this.db
      .prepare(
        `UPDATE outbox_events
         SET status = 'completed', completed_at = ?, http_status = ?,
             error_category = NULL, last_error = NULL, updated_at = ?
         WHERE event_id = ?`
      )
      .run(now, httpStatus, now, eventId);
    return 'completed';
  }

  /**
   * processing → pending with a later next_attempt_at and one more attempt
   */
  reschedule(
    eventId: string,
    attemptCount: number,
    nextAttemptAt: string,
    failure: OutboxFailureDetails
  ): void {
    this.db
      .prepare(
        `UPDATE outbox_events
         SET status = 'pending', attempt_count = ?, next_attempt_at = ?, dirty = 0,
             error_category = ?, last_error = ?, http_status = ?, updated_at = ?
         WHERE event_id = ?`
      )
      .run(
        attemptCount,
        nextAttemptAt,
        failure.category,
        failure.message.substring(0, MAX_ERROR_LENGTH),
        failure.httpStatus,
        this.now(),
        eventId
      );
  }

  /**
   * processing → failed_permanent, or back to pending when dirty: the
   * rejection applies to the older state, not to the write made meanwhile
   */
  markFailedPermanent(
    eventId: string,
    attemptCount: number,
    failure: OutboxFailureDetails
  ): FailureOutcome {
    const now = this.now();
    const message = failure.message.substring(0, MAX_ERROR_LENGTH);

    const rearmed = this.db
      .prepare(
        `UPDATE outbox_events
         SET status = 'pending', dirty = 0, attempt_count = 0, next_attempt_at = ?,
             error_category = ?, last_error = ?, http_status = ?, updated_at = ?
         WHERE event_id = ? AND dirty = 1`
      )
      .run(now, failure.category, message, failure.httpStatus, now, eventId);

    if (rearmed.changes > 0) {
      log.debug('Dirty outbox event re-armed after failure', { eventId });
      return 'rearmed';
    }

    this.db
      .prepare(
        `UPDATE outbox_events
         SET status = 'failed_permanent', attempt_count = ?, dirty = 0,
             error_category = ?, last_error = ?, http_status = ?, updated_at = ?
         WHERE event_id = ?`
      )
      .run(attemptCount, failure.category, message, failure.httpStatus, now, eventId);
    return 'failed';
  }

  /**
   * processing → pending without consuming an attempt
   */
  release(eventId: string): void {
    this.db
      .prepare(
        `UPDATE outbox_events SET status = 'pending', updated_at = ?
         WHERE event_id = ? AND status = 'processing'`
      )
      .run(this.now(), eventId);
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  /**
   * Release processing events last touched before `olderThan`
   *
   * @returns local record IDs of the released events
   */
  releaseProcessing(userId: string, olderThan: string): string[] {
    const recordIds = this.db
      .prepare<[string, string], string>(
        `SELECT local_record_id FROM outbox_events
         WHERE user_id = ? AND status = 'processing' AND updated_at <= ?`
      )
      .pluck()
      .all(userId, olderThan);

    if (recordIds.length > 0) {
      this.db
        .prepare(
          `UPDATE outbox_events SET status = 'pending', updated_at = ?
           WHERE user_id = ? AND status = 'processing' AND updated_at <= ?`
        )
        .run(this.now(), userId, olderThan);
    }
    return recordIds;
  }

  /**
   * Revive failed_permanent events of a user
   *
   * A failed event whose record has since received a newer active event is
   * superseded and removed instead.
   *
   * @returns number of events revived
   */
  retryFailed(userId: string): number {
    const now = this.now();

    const superseded = this.db
      .prepare(
        `DELETE FROM outbox_events
         WHERE user_id = ? AND status = 'failed_permanent'
           AND local_record_id IN (
             SELECT local_record_id FROM outbox_events
             WHERE status IN ('pending', 'processing')
           )`
      )
      .run(userId);

    const revived = this.db
      .prepare(
        `UPDATE outbox_events
         SET status = 'pending', attempt_count = 0, next_attempt_at = ?, dirty = 0,
             error_category = NULL, last_error = NULL, updated_at = ?
         WHERE user_id = ? AND status = 'failed_permanent'`
      )
      .run(now, now, userId);

    log.info('Failed outbox events revived', {
      revived: revived.changes,
      superseded: superseded.changes,
    });

    return revived.changes;
  }

  /**
   * Delete completed events finished before `olderThan`
   */
  pruneCompleted(olderThan: string): number {
    const result = this.db
      .prepare("DELETE FROM outbox_events WHERE status = 'completed' AND completed_at < ?")
      .run(olderThan);

    if (result.changes > 0) {
      log.info('Completed outbox events pruned', { count: result.changes, olderThan });
    }
    return result.changes;
  }

  deleteByRecord(localRecordId: string): number {
    return this.db
      .prepare('DELETE FROM outbox_events WHERE local_record_id = ?')
      .run(localRecordId).changes;
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

export const outboxEventsDAL = new OutboxEventsDAL();
