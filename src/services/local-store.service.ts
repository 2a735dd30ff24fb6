/**
 * Local Store
 *
 * Source of truth for synced records on the device. Every write is resolved
 * through the DeduplicationService first, then committed together with its
 * outbox event in one SQLite transaction, then announced through the
 * ChangeNotifier. Storage errors are thrown synchronously and leave nothing
 * behind.
 *
 * @module services/local-store
 * @security SEC-014: Candidates validated with Zod before any write
 * @security DB-006: Every operation scoped by user ID
 */

import { randomUUID } from 'crypto';
import { createLogger } from '../utils/logger';
import { normalizeTimestamp } from '../utils/calendar';
import { syncRecordsDAL, type SyncRecordsDAL } from '../dal/sync-records.dal';
import { outboxEventsDAL, type OutboxEventsDAL } from '../dal/outbox-events.dal';
import { withTransaction } from './database.service';
import type { ChangeNotifier } from './change-notifier.service';
import type {
  DeduplicationService,
  DedupIndex,
  NormalizedCandidate,
} from './deduplication.service';
import type {
  OutboxEnqueueData,
  RetryFailedResult,
  TransactionalOutboxService,
} from './transactional-outbox.service';
import {
  RecordCandidateSchema,
  type BatchSaveResult,
  type DateRange,
  type RecordCandidate,
  type RecordChangedEvent,
  type SaveOutcome,
  type SaveResult,
  type SyncableRecord,
  type SyncStatusSummary,
} from '../shared/types/sync.types';

// ============================================================================
// Errors
// ============================================================================

export class RecordValidationError extends Error {
  /** `index.path: message` entries */
  readonly issues: string[];

  constructor(issues: string[]) {
    super('Invalid record candidate: ' + issues.join(', '));
    this.name = 'RecordValidationError';
    this.issues = issues;
    Object.setPrototypeOf(this, RecordValidationError.prototype);
  }
}

// ============================================================================
// Types
// ============================================================================

export interface LocalStoreOptions {
  dedup: DeduplicationService;
  outbox: TransactionalOutboxService;
  notifier: ChangeNotifier;
  /** Backend updates by ID; when false, changed records are re-created */
  supportsUpsert: boolean;
  recordsDAL?: SyncRecordsDAL;
  outboxDAL?: OutboxEventsDAL;
}

interface CommitPlan {
  records: SyncableRecord[];
  outcomes: SaveOutcome[];
  changes: RecordChangedEvent[];
  enqueue: OutboxEnqueueData[];
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('local-store');

// ============================================================================
// Local Store
// ============================================================================

export class LocalStore {
  private readonly dedup: DeduplicationService;
  private readonly outbox: TransactionalOutboxService;
  private readonly notifier: ChangeNotifier;
  private readonly supportsUpsert: boolean;
  private readonly recordsDAL: SyncRecordsDAL;
  private readonly outboxDAL: OutboxEventsDAL;

  constructor(options: LocalStoreOptions) {
    this.dedup = options.dedup;
    this.outbox = options.outbox;
    this.notifier = options.notifier;
    this.supportsUpsert = options.supportsUpsert;
    this.recordsDAL = options.recordsDAL ?? syncRecordsDAL;
    this.outboxDAL = options.outboxDAL ?? outboxEventsDAL;
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Save one candidate. A dedup match updates the existing record in place
   * and keeps its localID.
   *
   * @throws RecordValidationError for an invalid candidate
   */
  save(userID: string, candidate: RecordCandidate): SaveResult {
    const batch = this.commit(userID, [candidate]);
    const record = batch.records[0];
    return { localID: record.localID, outcome: batch.outcomes[0], record };
  }

  /**
   * Save many candidates with a single existing-records fetch and a single
   * transaction.
   *
   * @returns the current record for every candidate, existing or new
   * @throws RecordValidationError if any candidate is invalid; nothing is written
   */
  saveBatch(userID: string, candidates: RecordCandidate[]): BatchSaveResult {
    const { records, outcomes } = this.commit(userID, candidates);
    return {
      records,
      created: outcomes.filter((o) => o === 'created').length,
      updated: outcomes.filter((o) => o === 'updated').length,
      skipped: outcomes.filter((o) => o === 'skipped').length,
    };
  }

  /**
   * Hard delete a record and every outbox event pointing at it
   */
  delete(userID: string, localID: string): boolean {
    const existing = this.recordsDAL.findByLocalId(userID, localID);
    if (!existing) {
      return false;
    }

    withTransaction(() => {
      this.outboxDAL.deleteByRecord(localID);
      this.recordsDAL.deleteForUser(userID, localID);
    });

    log.info('Record deleted', { userId: userID, localId: localID });

    this.notifier.publish({
      userID,
      localID,
      entityType: existing.entityType,
      change: 'deleted',
      syncStatus: existing.syncStatus,
      updatedAt: new Date().toISOString(),
    });
    return true;
  }

  /**
   * Move failed records and their events back into the queue
   */
  retryFailed(userID: string): RetryFailedResult {
    const result = this.outbox.retryFailed(userID);

    for (const localID of result.recordIDs) {
      const record = this.recordsDAL.findByLocalId(userID, localID);
      if (record) {
        this.notifier.publish(this.changeFor(record, 'updated'));
      }
    }
    return result;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * Records whose value timestamp lies in the inclusive range, oldest first
   */
  fetch(userID: string, entityType: string, range: DateRange): SyncableRecord[] {
    return this.recordsDAL.findByRange(
      userID,
      entityType,
      normalizeTimestamp(range.from),
      normalizeTimestamp(range.to)
    );
  }

  findByLocalId(userID: string, localID: string): SyncableRecord | undefined {
    return this.recordsDAL.findByLocalId(userID, localID);
  }

  getLatestUpdatedAt(userID: string, entityType: string): string | null {
    return this.recordsDAL.getLatestUpdatedAt(userID, entityType);
  }

  getSyncStatusSummary(userID: string): SyncStatusSummary {
    return this.recordsDAL.getSummary(userID);
  }

  // ==========================================================================
  // Commit Pipeline
  // ==========================================================================

  private commit(userID: string, candidates: RecordCandidate[]): CommitPlan {
    const normalized = this.validate(candidates).map((c) => this.dedup.normalize(c));
    const index = this.loadIndex(userID, normalized);

    const { result: plan } = this.outbox.withOutboxEnqueue(
      () => this.apply(userID, normalized, index),
      (p) => p.enqueue
    );

    // Committed: safe to announce
    this.notifier.publishAll(plan.changes);

    log.debug('Candidates committed', {
      userId: userID,
      candidates: candidates.length,
      changes: plan.changes.length,
      enqueued: plan.enqueue.length,
    });

    return plan;
  }

  private validate(candidates: RecordCandidate[]): RecordCandidate[] {
    const valid: RecordCandidate[] = [];
    const issues: string[] = [];

    candidates.forEach((candidate, i) => {
      const parsed = RecordCandidateSchema.safeParse(candidate);
      if (parsed.success) {
        valid.push(parsed.data);
      } else {
        for (const issue of parsed.error.issues) {
          issues.push(`${i}.${issue.path.join('.')}: ${issue.message}`);
        }
      }
    });

    if (issues.length > 0) {
      log.warn('Record candidates rejected', { count: issues.length });
      throw new RecordValidationError(issues);
    }
    return valid;
  }

  /**
   * The single existing-records fetch for a batch, plus a backend-ID lookup
   * when remote-confirmed candidates are present
   */
  private loadIndex(userID: string, candidates: NormalizedCandidate[]): DedupIndex {
    const window = this.dedup.windowFor(candidates);
    const existing = window
      ? this.recordsDAL.findForDedupWindow(userID, window.entityTypes, window.fromDate, window.toDate)
      : [];

    const backendIDs = candidates
      .map((c) => c.backendID)
      .filter((id): id is string => id !== null);
    if (backendIDs.length > 0) {
      const known = new Set(existing.map((r) => r.localID));
      for (const record of this.recordsDAL.findByBackendIds(userID, backendIDs)) {
        if (!known.has(record.localID)) {
          existing.push(record);
        }
      }
    }

    return this.dedup.createIndex(existing);
  }

  /**
   * Runs inside the outbox transaction
   */
  private apply(userID: string, candidates: NormalizedCandidate[], index: DedupIndex): CommitPlan {
    const plan: CommitPlan = { records: [], outcomes: [], changes: [], enqueue: [] };

    for (const candidate of candidates) {
      const decision = this.dedup.resolve(userID, candidate, index);
      const now = new Date().toISOString();

      switch (decision.kind) {
        case 'insert': {
          const remote = candidate.backendID !== null;
          const record: SyncableRecord = {
            localID: candidate.localID ?? randomUUID(),
            backendID: candidate.backendID,
            userID,
            entityType: candidate.entityType,
            value: candidate.value,
            payload: candidate.payload,
            valueTimestamp: candidate.valueTimestamp,
            valueDate: candidate.valueDate,
            subDayTime: candidate.subDayTime,
            syncStatus: remote ? 'synced' : 'pending',
            remoteGeneration: 0,
            lastSyncError: null,
            syncedAt: remote ? now : null,
            createdAt: now,
            updatedAt: now,
          };
          this.recordsDAL.insert(record);
          this.record(plan, index, record, 'created');
          if (!remote) {
            plan.enqueue.push(this.enqueueFor(record));
          }
          break;
        }

        case 'duplicate':
          plan.records.push(decision.existing);
          plan.outcomes.push('skipped');
          break;

        case 'merge': {
          const { existing } = decision;
          const dropBackendId = !this.supportsUpsert && existing.backendID !== null;
          const record: SyncableRecord = {
            ...existing,
            value: decision.value,
            payload: candidate.payload ?? existing.payload,
            syncStatus: 'pending',
            lastSyncError: null,
            backendID: dropBackendId ? null : existing.backendID,
            remoteGeneration: dropBackendId ? existing.remoteGeneration + 1 : existing.remoteGeneration,
            updatedAt: now,
          };
          this.recordsDAL.update(record);
          this.record(plan, index, record, 'updated');
          plan.enqueue.push(this.enqueueFor(record));
          break;
        }

        case 'remote_overwrite': {
          const record: SyncableRecord = {
            ...decision.existing,
            value: candidate.value,
            payload: candidate.payload ?? decision.existing.payload,
            syncStatus: 'synced',
            syncedAt: now,
            updatedAt: now,
          };
          this.recordsDAL.update(record);
          this.record(plan, index, record, 'updated');
          break;
        }
      }
    }

    // A record touched twice in one batch is reported in its final state
    const latest = new Map(plan.records.map((r) => [r.localID, r]));
    plan.records = plan.records.map((r) => latest.get(r.localID) ?? r);

    return plan;
  }

  private record(
    plan: CommitPlan,
    index: DedupIndex,
    record: SyncableRecord,
    change: 'created' | 'updated'
  ): void {
    index.add(record);
    plan.records.push(record);
    plan.outcomes.push(change);
    plan.changes.push(this.changeFor(record, change));
  }

  private enqueueFor(record: SyncableRecord): OutboxEnqueueData {
    return {
      userID: record.userID,
      entityType: record.entityType,
      localRecordID: record.localID,
      isNewRecord: record.backendID === null,
    };
  }

  private changeFor(record: SyncableRecord, change: RecordChangedEvent['change']): RecordChangedEvent {
    return {
      userID: record.userID,
      localID: record.localID,
      entityType: record.entityType,
      change,
      syncStatus: record.syncStatus,
      updatedAt: record.updatedAt,
    };
  }
}
