/**
 * Sync Dispatcher
 *
 * One background worker per session that drains the outbox to the remote
 * gateway. Events are sent one at a time in due order with a minimum spacing
 * between calls. The worker wakes on local change notifications, on a poll
 * interval and when the earliest scheduled retry falls due.
 *
 * Per event: claim → record syncing → POST or PUT with an idempotency key →
 * interpret the outcome (synced, rescheduled, failed, or refresh-and-retry
 * once on 401).
 *
 * @module services/sync-dispatcher
 * @security MQ-001: Idempotency keys on every remote write
 * @security API-002: Minimum spacing between gateway calls
 * @security ERR-007: Classified retry with jittered backoff
 */

import { createLogger, errorMessage } from '../utils/logger';
import { syncRecordsDAL, type SyncRecordsDAL } from '../dal/sync-records.dal';
import { outboxEventsDAL, type OutboxEventsDAL, type OutboxFailureDetails } from '../dal/outbox-events.dal';
import { withTransaction } from './database.service';
import { classifyError } from './error-classifier.service';
import { RetryStrategyService } from './retry-strategy.service';
import { RemoteGatewayError, type RemoteGateway, type RemoteRecordRequest, type RemoteWriteResult } from './remote-gateway.service';
import { SessionExpiredError, type TokenRefreshCoordinator } from './token-refresh-coordinator.service';
import { generateIdempotencyKey, type TransactionalOutboxService } from './transactional-outbox.service';
import type { ChangeNotifier } from './change-notifier.service';
import type { DispatcherConfig } from '../shared/types/config.types';
import type { OutboxEvent, RecordChangedEvent, SyncableRecord } from '../shared/types/sync.types';

// ============================================================================
// Types
// ============================================================================

export interface DispatchSummary {
  processed: number;
  succeeded: number;
  retried: number;
  failed: number;
}

type DispatchOutcome = 'succeeded' | 'retried' | 'failed' | 'released' | 'skipped';

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SyncDispatcherOptions {
  userID: string;
  gateway: RemoteGateway;
  tokens: TokenRefreshCoordinator;
  notifier: ChangeNotifier;
  outbox: TransactionalOutboxService;
  config: DispatcherConfig;
  /** Backend updates by ID; when false, re-sent records are re-created */
  supportsUpsert: boolean;
  retryStrategy?: RetryStrategyService;
  recordsDAL?: SyncRecordsDAL;
  outboxDAL?: OutboxEventsDAL;
  /** Injectable for tests; resolves early when the signal aborts */
  sleep?: SleepFn;
  now?: () => number;
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('sync-dispatcher');

// ============================================================================
// Helpers
// ============================================================================

export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (ms <= 0 || signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });

function emptySummary(): DispatchSummary {
  return { processed: 0, succeeded: 0, retried: 0, failed: 0 };
}

// ============================================================================
// Sync Dispatcher
// ============================================================================

export class SyncDispatcher {
  private readonly userID: string;
  private readonly gateway: RemoteGateway;
  private readonly tokens: TokenRefreshCoordinator;
  private readonly notifier: ChangeNotifier;
  private readonly outbox: TransactionalOutboxService;
  private readonly config: DispatcherConfig;
  private readonly supportsUpsert: boolean;
  private readonly retryStrategy: RetryStrategyService;
  private readonly recordsDAL: SyncRecordsDAL;
  private readonly outboxDAL: OutboxEventsDAL;
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  private abortController = new AbortController();
  private currentPass: Promise<DispatchSummary> | null = null;
  private started = false;
  private halted = false;
  private rerunRequested = false;
  private lastCallAt = 0;

  private pollIntervalId: ReturnType<typeof setInterval> | null = null;
  private maintenanceIntervalId: ReturnType<typeof setInterval> | null = null;
  private nextDueTimeoutId: ReturnType<typeof setTimeout> | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(options: SyncDispatcherOptions) {
    this.userID = options.userID;
    this.gateway = options.gateway;
    this.tokens = options.tokens;
    this.notifier = options.notifier;
    this.outbox = options.outbox;
    this.config = options.config;
    this.supportsUpsert = options.supportsUpsert;
    this.retryStrategy =
      options.retryStrategy ??
      new RetryStrategyService({
        baseDelayMs: options.config.baseDelayMs,
        maxDelayMs: options.config.maxDelayMs,
        jitterFactor: options.config.jitterFactor,
        multiplier: options.config.multiplier,
      });
    this.recordsDAL = options.recordsDAL ?? syncRecordsDAL;
    this.outboxDAL = options.outboxDAL ?? outboxEventsDAL;
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? Date.now;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Recover interrupted work, then drain immediately and on every wake-up
   */
  start(): void {
    if (this.started) {
      log.debug('Dispatcher already started', { userId: this.userID });
      return;
    }

    this.started = true;
    this.halted = false;
    this.abortController = new AbortController();

    // Events left processing by a previous run belong to nobody now
    this.outbox.recoverStaleProcessing(this.userID, new Date(this.now()));

    this.unsubscribe = this.notifier.subscribe(
      (event) => this.onRecordChanged(event),
      { userID: this.userID }
    );

    this.pollIntervalId = setInterval(() => this.wake(), this.config.pollIntervalMs);
    this.maintenanceIntervalId = setInterval(
      () => this.runMaintenance(),
      this.config.maintenanceIntervalMs
    );

    log.info('Dispatcher started', {
      userId: this.userID,
      pollIntervalMs: this.config.pollIntervalMs,
    });

    this.wake();
  }

  /**
   * Stop the worker and wait for the pass in progress to settle. An
   * interrupted gateway call releases its event without consuming an
   * attempt.
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    this.abortController.abort();

    this.unsubscribe?.();
    this.unsubscribe = null;
    if (this.pollIntervalId) {
      clearInterval(this.pollIntervalId);
      this.pollIntervalId = null;
    }
    if (this.maintenanceIntervalId) {
      clearInterval(this.maintenanceIntervalId);
      this.maintenanceIntervalId = null;
    }
    this.clearNextDue();

    if (this.currentPass) {
      await this.currentPass;
    }
    log.info('Dispatcher stopped', { userId: this.userID });
  }

  isRunning(): boolean {
    return this.started;
  }

  /** True once an unrecoverable authentication failure stopped dispatch */
  isHalted(): boolean {
    return this.halted;
  }

  /**
   * Schedule a drain pass. Coalesces with a pass already running.
   */
  wake(): void {
    if (!this.started || this.halted) {
      return;
    }
    if (this.currentPass) {
      this.rerunRequested = true;
      return;
    }
    setImmediate(() => this.runCycle());
  }

  // ==========================================================================
  // Drain
  // ==========================================================================

  /**
   * One drain pass: dispatch every event due now, in order, until none is
   * left or dispatch is halted
   */
  processDueEvents(): Promise<DispatchSummary> {
    if (this.currentPass) {
      return this.currentPass;
    }

    const pass = this.drain().finally(() => {
      this.currentPass = null;
      // Wake-ups that arrived during this pass, whoever started it
      if (this.rerunRequested) {
        this.rerunRequested = false;
        this.wake();
      }
    });
    this.currentPass = pass;
    return pass;
  }

  private async drain(): Promise<DispatchSummary> {
    const summary = emptySummary();
    if (this.halted) {
      return summary;
    }

    for (;;) {
      const due = this.outboxDAL.getDue(
        this.userID,
        new Date(this.now()).toISOString(),
        this.config.batchSize
      );
      if (due.length === 0) {
        break;
      }

      for (const event of due) {
        if (this.halted || this.abortController.signal.aborted) {
          return this.logPass(summary);
        }

        const outcome = await this.dispatch(event);
        if (outcome === 'skipped') {
          continue;
        }
        summary.processed++;
        if (outcome === 'succeeded') summary.succeeded++;
        if (outcome === 'retried') summary.retried++;
        if (outcome === 'failed') summary.failed++;
      }

      if (this.halted || this.abortController.signal.aborted) {
        break;
      }
    }

    return this.logPass(summary);
  }

  private logPass(summary: DispatchSummary): DispatchSummary {
    if (summary.processed > 0) {
      log.info('Dispatch pass completed', { userId: this.userID, ...summary });
    }
    return summary;
  }

  private async dispatch(event: OutboxEvent): Promise<DispatchOutcome> {
    if (!this.outboxDAL.claim(event.eventID)) {
      return 'skipped';
    }

    const record = this.recordsDAL.findByLocalId(this.userID, event.localRecordID);
    if (!record) {
      this.outboxDAL.markFailedPermanent(event.eventID, event.attemptCount, {
        category: 'PERMANENT',
        message: 'Record no longer exists',
        httpStatus: null,
      });
      return 'failed';
    }

    this.recordsDAL.markSyncing(record.localID);

    let result: RemoteWriteResult;
    try {
      result = await this.sendWithAuth(record);
    } catch (error) {
      if (error instanceof SessionExpiredError || this.abortController.signal.aborted) {
        this.release(event, record);
        if (error instanceof SessionExpiredError) {
          this.halt(errorMessage(error));
        }
        return 'released';
      }
      if (error instanceof RemoteGatewayError && error.status === 401) {
        // Rejected again right after a successful refresh
        this.release(event, record);
        this.tokens.invalidate('AUTH_REJECTED_AFTER_REFRESH');
        this.halt('Request rejected after token refresh');
        return 'released';
      }
      return this.handleFailure(event, record, error);
    }

    return this.handleSuccess(event, record, result);
  }

  /**
   * Send with the current token; on 401 refresh once and resend
   */
  private async sendWithAuth(record: SyncableRecord): Promise<RemoteWriteResult> {
    const token = await this.tokens.getAccessToken();
    try {
      return await this.send(record, token);
    } catch (error) {
      if (!(error instanceof RemoteGatewayError) || error.status !== 401) {
        throw error;
      }
      log.info('Access token rejected, refreshing', { userId: this.userID, localId: record.localID });
      const refreshed = await this.tokens.getValidAccessToken(token);
      return this.send(record, refreshed);
    }
  }

  private async send(record: SyncableRecord, accessToken: string): Promise<RemoteWriteResult> {
    await this.awaitSpacing();

    const signal = this.abortController.signal;
    const request = this.buildRequest(record);

    if (record.backendID) {
      return this.gateway.updateRecord(record.backendID, request, accessToken, signal);
    }
    return this.gateway.createRecord(request, accessToken, signal);
  }

  /**
   * The request mirrors the record as it is now, not as it was enqueued
   */
  private buildRequest(record: SyncableRecord): RemoteRecordRequest {
    const content = {
      entityType: record.entityType,
      payload: record.payload,
      value: record.value,
      valueTimestamp: record.valueTimestamp,
      ...(record.subDayTime !== null ? { subDayTime: record.subDayTime } : {}),
    };

    const idempotencyKey = record.backendID
      ? generateIdempotencyKey({
          entityType: record.entityType,
          localRecordID: record.localID,
          operation: 'UPDATE',
          discriminator: `${record.remoteGeneration}:${JSON.stringify(content)}`,
        })
      : generateIdempotencyKey({
          entityType: record.entityType,
          localRecordID: record.localID,
          operation: 'CREATE',
          discriminator: String(record.remoteGeneration),
        });

    return { ...content, idempotencyKey };
  }

  private async awaitSpacing(): Promise<void> {
    const wait = this.lastCallAt + this.config.minCallSpacingMs - this.now();
    if (wait > 0) {
      await this.sleep(wait, this.abortController.signal);
    }
    this.lastCallAt = this.now();
  }

  // ==========================================================================
  // Outcomes
  // ==========================================================================

  private handleSuccess(
    event: OutboxEvent,
    record: SyncableRecord,
    result: RemoteWriteResult
  ): DispatchOutcome {
    const keepBackendId = this.supportsUpsert;

    const { outcome, updatedAt } = withTransaction(() => {
      const completion = this.outboxDAL.complete(event.eventID, result.status, !keepBackendId);
      const at =
        completion === 'rearmed'
          ? this.recordsDAL.markAcknowledgedPending(record.localID, result.backendID, keepBackendId)
          : this.recordsDAL.markSynced(record.localID, result.backendID);
      return { outcome: completion, updatedAt: at };
    });

    log.info('Record delivered', {
      userId: this.userID,
      localId: record.localID,
      backendId: result.backendID,
      status: result.status,
      rearmed: outcome === 'rearmed',
    });

    this.publish(record, outcome === 'rearmed' ? 'updated' : 'synced', updatedAt);
    return 'succeeded';
  }

  private handleFailure(event: OutboxEvent, record: SyncableRecord, error: unknown): DispatchOutcome {
    const status = error instanceof RemoteGatewayError ? error.status : null;
    const retryAfterHeader = error instanceof RemoteGatewayError ? error.retryAfter : null;
    const message = errorMessage(error);

    const classification = classifyError(status, message, retryAfterHeader);
    const attemptCount = event.attemptCount + 1;
    const failure: OutboxFailureDetails = {
      category: classification.category,
      message,
      httpStatus: status,
    };

    const decision = this.retryStrategy.makeRetryDecision(
      attemptCount,
      event.maxAttempts,
      classification.category,
      classification.retryAfter,
      this.now()
    );

    if (decision.shouldRetry) {
      const nextAttemptAt = new Date(this.now() + decision.delayMs).toISOString();
      withTransaction(() => {
        this.outboxDAL.reschedule(event.eventID, attemptCount, nextAttemptAt, failure);
        this.recordsDAL.markPending(record.localID, message);
      });

      log.warn('Dispatch failed, rescheduled', {
        userId: this.userID,
        localId: record.localID,
        category: classification.category,
        httpStatus: status,
        attemptCount,
        nextAttemptAt,
        reason: decision.reason,
      });
      return 'retried';
    }

    const { outcome, updatedAt } = withTransaction(() => {
      const failed = this.outboxDAL.markFailedPermanent(event.eventID, attemptCount, failure);
      const at =
        failed === 'rearmed'
          ? this.recordsDAL.markRejectedPending(record.localID, message)
          : this.recordsDAL.markFailed(record.localID, message);
      return { outcome: failed, updatedAt: at };
    });

    if (outcome === 'rearmed') {
      log.warn('Dispatch rejected, newer local state requeued', {
        userId: this.userID,
        localId: record.localID,
        category: classification.category,
        httpStatus: status,
        attemptCount,
      });
      this.publish(record, 'updated', updatedAt);
      return 'failed';
    }

    log.error('Dispatch failed permanently', {
      userId: this.userID,
      localId: record.localID,
      category: classification.category,
      httpStatus: status,
      attemptCount,
      reason: decision.reason,
    });

    this.publish(record, 'failed', updatedAt, 'failed');
    return 'failed';
  }

  /**
   * Put the event and record back without consuming an attempt
   */
  private release(event: OutboxEvent, record: SyncableRecord): void {
    withTransaction(() => {
      this.outboxDAL.release(event.eventID);
      this.recordsDAL.releaseSyncing([record.localID]);
    });
    log.debug('Outbox event released', { eventId: event.eventID, localId: record.localID });
  }

  private halt(reason: string): void {
    if (this.halted) {
      return;
    }
    this.halted = true;
    this.clearNextDue();
    log.warn('Dispatch halted', { userId: this.userID, reason });
  }

  private publish(
    record: SyncableRecord,
    change: RecordChangedEvent['change'],
    updatedAt: string,
    syncStatus?: RecordChangedEvent['syncStatus']
  ): void {
    const current = this.recordsDAL.findByLocalId(this.userID, record.localID);
    this.notifier.publish({
      userID: this.userID,
      localID: record.localID,
      entityType: record.entityType,
      change,
      syncStatus: syncStatus ?? current?.syncStatus ?? record.syncStatus,
      updatedAt: current?.updatedAt ?? updatedAt,
    });
  }

  // ==========================================================================
  // Scheduling
  // ==========================================================================

  private onRecordChanged(event: RecordChangedEvent): void {
    if (event.syncStatus === 'pending' && (event.change === 'created' || event.change === 'updated')) {
      this.wake();
    }
  }

  private runCycle(): void {
    if (!this.started || this.halted || this.currentPass) {
      return;
    }
    this.rerunRequested = false;
    this.clearNextDue();

    this.processDueEvents()
      .then(() => this.scheduleNextDue())
      .catch((error: unknown) => {
        log.error('Dispatch pass failed', { userId: this.userID, error: errorMessage(error) });
      });
  }

  /**
   * Wake for the earliest retry if it falls before the next poll
   */
  private scheduleNextDue(): void {
    if (!this.started || this.halted) {
      return;
    }
    const next = this.outboxDAL.getNextAttemptAt(this.userID);
    if (!next) {
      return;
    }
    const delay = new Date(next).getTime() - this.now();
    if (delay >= this.config.pollIntervalMs) {
      return;
    }
    this.clearNextDue();
    this.nextDueTimeoutId = setTimeout(() => {
      this.nextDueTimeoutId = null;
      this.wake();
    }, Math.max(delay, 0));
  }

  private clearNextDue(): void {
    if (this.nextDueTimeoutId) {
      clearTimeout(this.nextDueTimeoutId);
      this.nextDueTimeoutId = null;
    }
  }

  private runMaintenance(): void {
    try {
      const now = this.now();
      this.outbox.pruneCompleted(new Date(now - this.config.completedRetentionMs));
      this.outbox.recoverStaleProcessing(this.userID, new Date(now - this.config.staleProcessingMs));
    } catch (error) {
      log.error('Outbox maintenance failed', { userId: this.userID, error: errorMessage(error) });
    }
  }
}
