/**
 * Sync Session
 *
 * Everything that belongs to one logged-in user lives in a SyncSession:
 * change notifier, local store, outbox, token refresh coordinator,
 * dispatcher and read path. Nothing is process-global except the database
 * handle, so logging out drops the whole graph and logging in builds a
 * fresh one.
 *
 * SyncEngine owns the lifecycle: onLogin starts a session and its
 * dispatcher, onLogout stops it, and an unrecoverable authentication
 * failure tears it down and reports SESSION_TERMINATED on the event bus.
 *
 * @module services/sync-session
 * @security DB-006: Every session operation is scoped to the session user
 */

import { createLogger, errorMessage } from '../utils/logger';
import { EngineEventBus, EngineEvents, type SessionTerminationReason } from '../utils/event-bus';
import { authCredentialsDAL } from '../dal/auth-credentials.dal';
import { closeDatabase, initializeDatabase, isDatabaseInitialized } from './database.service';
import { runMigrations } from './migration.service';
import { ConfigService } from './config.service';
import { ChangeNotifier, type ChangeFilter, type RecordChangeListener } from './change-notifier.service';
import { DeduplicationService } from './deduplication.service';
import { TransactionalOutboxService, type RetryFailedResult } from './transactional-outbox.service';
import { LocalStore } from './local-store.service';
import { TokenRefreshCoordinator } from './token-refresh-coordinator.service';
import { HttpRemoteGateway, type RemoteGateway } from './remote-gateway.service';
import { SyncDispatcher, type DispatchSummary, type SleepFn } from './sync-dispatcher.service';
import { LocalFirstReadService, RemoteRefreshSource, type RefreshSource } from './local-first-read.service';
import type { SyncEngineConfig, SyncEngineConfigOverrides } from '../shared/types/config.types';
import {
  TokenPairSchema,
  type BatchSaveResult,
  type DateRange,
  type OutboxStatistics,
  type RecordPayload,
  type Sample,
  type SaveResult,
  type SyncableRecord,
  type SyncStatusSummary,
  type TokenPair,
} from '../shared/types/sync.types';

// ============================================================================
// Types
// ============================================================================

export interface WriteOptions {
  subDayTime?: string;
  payload?: RecordPayload;
  /** Caller-assigned identity; generated when absent */
  localID?: string;
}

export interface SyncSessionOptions {
  userID: string;
  config: SyncEngineConfig;
  gateway: RemoteGateway;
  /** Entity type → origin adapter; the backend is the default source */
  refreshSources?: Record<string, RefreshSource>;
  onTerminated?: (reason: SessionTerminationReason) => void;
  sleep?: SleepFn;
  now?: () => number;
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('sync-session');

// ============================================================================
// Sync Session
// ============================================================================

export class SyncSession {
  readonly userID: string;
  readonly notifier: ChangeNotifier;
  readonly store: LocalStore;
  readonly outbox: TransactionalOutboxService;
  readonly tokens: TokenRefreshCoordinator;
  readonly dispatcher: SyncDispatcher;
  readonly reads: LocalFirstReadService;

  private readonly config: SyncEngineConfig;
  private closed = false;

  constructor(options: SyncSessionOptions) {
    const { userID, config, gateway } = options;
    this.userID = userID;
    this.config = config;

    this.notifier = new ChangeNotifier();
    this.outbox = new TransactionalOutboxService({ maxAttempts: config.dispatcher.maxAttempts });
    this.store = new LocalStore({
      dedup: new DeduplicationService({
        dedup: config.dedup,
        entityTypes: config.entityTypes,
        timeZone: config.timeZone,
      }),
      outbox: this.outbox,
      notifier: this.notifier,
      supportsUpsert: config.remote.supportsUpsert,
    });
    this.tokens = new TokenRefreshCoordinator({
      userID,
      gateway,
      refreshSkewMs: config.auth.refreshSkewMs,
      onTerminalFailure: options.onTerminated,
      now: options.now,
    });
    this.dispatcher = new SyncDispatcher({
      userID,
      gateway,
      tokens: this.tokens,
      notifier: this.notifier,
      outbox: this.outbox,
      config: config.dispatcher,
      supportsUpsert: config.remote.supportsUpsert,
      sleep: options.sleep,
      now: options.now,
    });
    this.reads = new LocalFirstReadService({
      store: this.store,
      stalenessThresholdMs: config.readPath.stalenessThresholdMs,
      defaultSource: new RemoteRefreshSource(gateway, this.tokens),
      sources: options.refreshSources,
      now: options.now,
    });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  start(): void {
    this.dispatcher.start();
  }

  /**
   * Stop background work. Outbox events and stored records stay for the
   * next login.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.reads.cancelAll();
    this.tokens.dispose();
    await this.dispatcher.stop();
    await this.reads.whenIdle();
    this.notifier.clear();
    log.info('Session closed', { userId: this.userID });
  }

  isClosed(): boolean {
    return this.closed;
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Record one fact. Returns once it is durable locally; delivery happens
   * in the background.
   */
  write(entityType: string, value: number, valueTimestamp: string, options: WriteOptions = {}): SaveResult {
    return this.store.save(this.userID, {
      entityType,
      value,
      valueTimestamp,
      subDayTime: options.subDayTime,
      payload: options.payload,
      localID: options.localID,
    });
  }

  /**
   * Batch ingestion from an origin adapter
   */
  ingest(samples: Sample[]): BatchSaveResult {
    return this.store.saveBatch(this.userID, samples);
  }

  deleteRecord(localID: string): boolean {
    return this.store.delete(this.userID, localID);
  }

  retryFailed(): RetryFailedResult {
    const result = this.store.retryFailed(this.userID);
    if (result.revived > 0) {
      this.dispatcher.wake();
    }
    return result;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  read(entityType: string, range: DateRange): SyncableRecord[] {
    return this.reads.read(this.userID, entityType, range);
  }

  syncStatusSummary(): SyncStatusSummary {
    return this.store.getSyncStatusSummary(this.userID);
  }

  outboxStatistics(): OutboxStatistics {
    return this.outbox.getStatistics(this.userID, this.config.dispatcher.staleProcessingMs);
  }

  /**
   * Changes of this session's user only
   */
  subscribe(listener: RecordChangeListener, filter: Omit<ChangeFilter, 'userID'> = {}): () => void {
    return this.notifier.subscribe(listener, { ...filter, userID: this.userID });
  }

  registerRefreshSource(entityType: string, source: RefreshSource): void {
    this.reads.registerSource(entityType, source);
  }

  /**
   * Run one drain pass now instead of waiting for the next wake-up
   */
  processDueEvents(): Promise<DispatchSummary> {
    return this.dispatcher.processDueEvents();
  }

  /**
   * Resolves when no background refresh is in flight
   */
  whenIdle(): Promise<void> {
    return this.reads.whenIdle();
  }
}

// ============================================================================
// Sync Engine
// ============================================================================

export interface SyncEngineOptions {
  config?: SyncEngineConfigOverrides;
  env?: Record<string, string | undefined>;
  /** Defaults to the HTTP gateway built from the configuration */
  gateway?: RemoteGateway;
  refreshSources?: Record<string, RefreshSource>;
  /** Start the background dispatcher at login (default true) */
  autoStartDispatcher?: boolean;
  sleep?: SleepFn;
  now?: () => number;
}

export class SyncEngine {
  readonly events = new EngineEventBus();

  private readonly config: SyncEngineConfig;
  private readonly gateway: RemoteGateway;
  private readonly options: SyncEngineOptions;
  private session: SyncSession | null = null;
  private closing: Promise<void> = Promise.resolve();

  /**
   * @throws ConfigValidationError for an invalid configuration
   */
  constructor(options: SyncEngineOptions = {}) {
    this.options = options;
    this.config = new ConfigService(options.config, options.env).getConfig();
    this.gateway =
      options.gateway ??
      new HttpRemoteGateway({
        apiUrl: this.config.apiUrl,
        requestTimeoutMs: this.config.dispatcher.requestTimeoutMs,
        refreshPath: this.config.auth.refreshPath,
      });
  }

  /**
   * Open the database and bring its schema up to date. Reuses a database
   * that is already open.
   */
  initialize(): void {
    if (!isDatabaseInitialized()) {
      initializeDatabase({ dbPath: this.config.dbPath });
    }
    runMigrations();
  }

  getConfig(): SyncEngineConfig {
    return this.config;
  }

  getSession(): SyncSession | null {
    return this.session;
  }

  /**
   * Store the token pair and start a session for the user. An existing
   * session is closed first.
   */
  async onLogin(userID: string, tokenPair: TokenPair): Promise<SyncSession> {
    const pair = TokenPairSchema.parse(tokenPair);

    if (this.session) {
      await this.onLogout();
    }
    await this.closing;

    this.initialize();
    authCredentialsDAL.save(userID, pair);

    const session = new SyncSession({
      userID,
      config: this.config,
      gateway: this.gateway,
      refreshSources: this.options.refreshSources,
      onTerminated: (reason) => this.terminate(session, reason),
      sleep: this.options.sleep,
      now: this.options.now,
    });
    this.session = session;

    if (this.options.autoStartDispatcher ?? true) {
      session.start();
    }

    log.info('Session started', { userId: userID });
    this.events.emit(EngineEvents.SESSION_STARTED, { userId: userID });
    return session;
  }

  /**
   * Stop the session and forget its credentials. Queued outbox events stay.
   */
  async onLogout(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = null;

    await session.close();
    authCredentialsDAL.clear(session.userID);

    log.info('Session ended', { userId: session.userID });
    this.events.emit(EngineEvents.SESSION_ENDED, { userId: session.userID });
  }

  /**
   * Wait for a terminated session to finish shutting down
   */
  whenClosed(): Promise<void> {
    return this.closing;
  }

  /**
   * Log out and close the database
   */
  async shutdown(): Promise<void> {
    await this.onLogout();
    await this.closing;
    if (isDatabaseInitialized()) {
      closeDatabase();
    }
  }

  private terminate(session: SyncSession, reason: SessionTerminationReason): void {
    if (this.session !== session) {
      return;
    }
    this.session = null;

    log.warn('Session terminated', { userId: session.userID, reason });
    this.events.emit(EngineEvents.SESSION_TERMINATED, { userId: session.userID, reason });

    this.closing = session.close().catch((error: unknown) => {
      log.error('Failed to close terminated session', {
        userId: session.userID,
        error: errorMessage(error),
      });
    });
  }
}
