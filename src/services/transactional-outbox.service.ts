/**
 * Transactional Outbox Service
 *
 * Atomic record-write + enqueue. The record mutation and its outbox event are
 * committed in the same SQLite transaction; if either fails, both roll back.
 *
 * @module services/transactional-outbox
 * @security MQ-001: Idempotent message consumers via idempotency keys
 * @security SEC-006: All queries use parameterized statements
 * @security DB-006: User-scoped tenant isolation
 */

import { createHash } from 'crypto';
import { getDatabase, isDatabaseInitialized, type DatabaseInstance } from './database.service';
import { createLogger } from '../utils/logger';
import { outboxEventsDAL, type OutboxEventsDAL } from '../dal/outbox-events.dal';
import { syncRecordsDAL, type SyncRecordsDAL } from '../dal/sync-records.dal';
import type { OutboxEvent, OutboxStatistics } from '../shared/types/sync.types';

// ============================================================================
// Types
// ============================================================================

export type RemoteOperation = 'CREATE' | 'UPDATE';

/**
 * Parameters for generating an idempotency key
 * MQ-001: Deterministic key generation for deduplication
 */
export interface IdempotencyKeyParams {
  entityType: string;
  localRecordID: string;
  operation: RemoteOperation;
  /** Distinguishes otherwise identical operations (remote generation, revision) */
  discriminator?: string;
}

export interface OutboxEnqueueData {
  userID: string;
  entityType: string;
  localRecordID: string;
  /** No backendID yet: the dispatcher will create rather than update */
  isNewRecord: boolean;
}

/**
 * Result of an atomic operation with enqueue
 */
export interface AtomicOperationResult<T> {
  result: T;
  /** Active event per enqueue request, in request order */
  events: OutboxEvent[];
  /** Requests folded into an already active event */
  deduplicatedCount: number;
}

export type OutboxDataBuilder<T> = (result: T) => OutboxEnqueueData[];

export interface RetryFailedResult {
  revived: number;
  /** Records moved from failed back to pending */
  recordIDs: string[];
}

export interface TransactionalOutboxOptions {
  maxAttempts: number;
  outboxDAL?: OutboxEventsDAL;
  recordsDAL?: SyncRecordsDAL;
}

// ============================================================================
// Constants
// ============================================================================

const HASH_ALGORITHM = 'sha256';

/** Idempotency key length (truncated for storage efficiency) */
const IDEMPOTENCY_KEY_LENGTH = 32;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('transactional-outbox');

// ============================================================================
// Idempotency Key Generation
// ============================================================================

/**
 * Generate a deterministic idempotency key from operation parameters
 *
 * MQ-001: Same operation with same parameters produces same key, so a
 * redelivered create is recognised by the backend.
 *
 * @returns 32 hex chars
 */
export function generateIdempotencyKey(params: IdempotencyKeyParams): string {
  const input = [
    params.entityType,
    params.localRecordID,
    params.operation,
    params.discriminator || '',
  ].join(':');

  return createHash(HASH_ALGORITHM).update(input).digest('hex').substring(0, IDEMPOTENCY_KEY_LENGTH);
}

// ============================================================================
// Transactional Outbox Service
// ============================================================================

/**
 * @example
 * ```typescript
 * const { result } = outbox.withOutboxEnqueue(
 *   () => {
 *     syncRecordsDAL.insert(record);
 *     return record;
 *   },
 *   (saved) => [{ userID, entityType: saved.entityType, localRecordID: saved.localID, isNewRecord: true }]
 * );
 * ```
 */
export class TransactionalOutboxService {
  private readonly maxAttempts: number;
  private readonly outboxDAL: OutboxEventsDAL;
  private readonly recordsDAL: SyncRecordsDAL;

  constructor(options: TransactionalOutboxOptions) {
    this.maxAttempts = options.maxAttempts;
    this.outboxDAL = options.outboxDAL ?? outboxEventsDAL;
    this.recordsDAL = options.recordsDAL ?? syncRecordsDAL;
  }

  /**
   * @throws Error if database is not initialized
   */
  private get db(): DatabaseInstance {
    if (!isDatabaseInitialized()) {
      throw new Error('Database not initialized. Cannot perform transactional outbox operations.');
    }
    return getDatabase();
  }

  /**
   * Execute a record write and enqueue its events atomically
   *
   * The transaction has committed when this returns, so callers may notify
   * listeners immediately afterwards.
   */
  withOutboxEnqueue<T>(
    businessOperation: () => T,
    outboxDataBuilder: OutboxDataBuilder<T>
  ): AtomicOperationResult<T> {
    return this.db.transaction(() => {
      const result = businessOperation();

      const events: OutboxEvent[] = [];
      let deduplicatedCount = 0;

      for (const data of outboxDataBuilder(result)) {
        const { event, deduplicated } = this.enqueueWithDedupe(data);
        events.push(event);
        if (deduplicated) {
          deduplicatedCount++;
        }
      }

      return { result, events, deduplicatedCount };
    })();
  }

  /**
   * Enqueue unless the record already has an active event, in which case
   * the write is folded into it
   *
   * Must run inside a transaction when paired with a record write.
   */
  enqueueWithDedupe(data: OutboxEnqueueData): { event: OutboxEvent; deduplicated: boolean } {
    const active = this.outboxDAL.findActiveByRecord(data.localRecordID);

    if (active) {
      return { event: this.outboxDAL.coalesce(active, data.isNewRecord), deduplicated: true };
    }

    const event = this.outboxDAL.insert({
      entityType: data.entityType,
      localRecordID: data.localRecordID,
      userID: data.userID,
      isNewRecord: data.isNewRecord,
      maxAttempts: this.maxAttempts,
    });
    return { event, deduplicated: false };
  }

  // ==========================================================================
  // Queue Operations
  // ==========================================================================

  getStatistics(userID: string, staleProcessingMs: number): OutboxStatistics {
    const staleBefore = new Date(Date.now() - staleProcessingMs).toISOString();
    return this.outboxDAL.getStatistics(userID, staleBefore);
  }

  /**
   * Give failed_permanent events a fresh attempt budget and move their
   * failed records back to pending
   */
  retryFailed(userID: string): RetryFailedResult {
    return this.db.transaction(() => {
      const revived = this.outboxDAL.retryFailed(userID);
      const recordIDs = this.recordsDAL.resetFailed(userID);
      return { revived, recordIDs };
    })();
  }

  /**
   * Release events stuck in processing (crash or cancelled dispatch) along
   * with their syncing records
   *
   * @returns number of events released
   */
  recoverStaleProcessing(userID: string, olderThan: Date): number {
    return this.db.transaction(() => {
      const recordIDs = this.outboxDAL.releaseProcessing(userID, olderThan.toISOString());
      this.recordsDAL.releaseSyncing(recordIDs);

      if (recordIDs.length > 0) {
        log.warn('Recovered stale processing events', { userId: userID, count: recordIDs.length });
      }
      return recordIDs.length;
    })();
  }

  pruneCompleted(olderThan: Date): number {
    return this.outboxDAL.pruneCompleted(olderThan.toISOString());
  }
}
