/**
 * Vitals Sync Engine
 *
 * Local-first persistence and background synchronization of health and
 * fitness records.
 *
 * @example
 * ```typescript
 * const engine = new SyncEngine({ config: { apiUrl: 'https://api.example.com', dbPath: './vitals.db' } });
 * const session = await engine.onLogin('user-1', { accessToken, refreshToken });
 *
 * session.write('water_liters', 0.5, new Date().toISOString());
 * session.subscribe((event) => render(event));
 * const today = session.read('water_liters', { from, to });
 * ```
 */

// Session lifecycle and consumer facade
export { SyncEngine, SyncSession } from './services/sync-session.service';
export type { SyncEngineOptions, SyncSessionOptions, WriteOptions } from './services/sync-session.service';

// Components
export { LocalStore, RecordValidationError } from './services/local-store.service';
export type { LocalStoreOptions } from './services/local-store.service';
export { DeduplicationService, DedupIndex } from './services/deduplication.service';
export type { DedupDecision, DeduplicationOptions } from './services/deduplication.service';
export {
  TransactionalOutboxService,
  generateIdempotencyKey,
} from './services/transactional-outbox.service';
export type { IdempotencyKeyParams, RetryFailedResult } from './services/transactional-outbox.service';
export { ChangeNotifier, createIdempotentListener } from './services/change-notifier.service';
export type { ChangeFilter, RecordChangeListener } from './services/change-notifier.service';
export { SyncDispatcher, abortableSleep } from './services/sync-dispatcher.service';
export type { DispatchSummary, SleepFn, SyncDispatcherOptions } from './services/sync-dispatcher.service';
export { TokenRefreshCoordinator, SessionExpiredError } from './services/token-refresh-coordinator.service';
export type { TokenRefreshCoordinatorOptions } from './services/token-refresh-coordinator.service';
export { HttpRemoteGateway, RemoteGatewayError } from './services/remote-gateway.service';
export type {
  HttpRemoteGatewayOptions,
  RemoteGateway,
  RemoteRecord,
  RemoteRecordQuery,
  RemoteRecordRequest,
  RemoteWriteResult,
} from './services/remote-gateway.service';
export { LocalFirstReadService, RemoteRefreshSource } from './services/local-first-read.service';
export type { LocalFirstReadOptions, RefreshSource } from './services/local-first-read.service';
export { classifyError, parseRetryAfter } from './services/error-classifier.service';
export type { ErrorClassificationResult } from './services/error-classifier.service';
export { RetryStrategyService, DEFAULT_RETRY_CONFIG } from './services/retry-strategy.service';
export type { RetryConfig, RetryDecision } from './services/retry-strategy.service';

// Configuration and persistence
export { ConfigService, ConfigValidationError } from './services/config.service';
export {
  DEFAULT_CONFIG,
  DEFAULT_ENTITY_TYPES,
  SyncEngineConfigSchema,
  validateConfig,
} from './shared/types/config.types';
export type {
  SyncEngineConfig,
  SyncEngineConfigOverrides,
  EntityTypeDefinition,
  MergeMode,
} from './shared/types/config.types';
export { initializeDatabase, closeDatabase, getDatabase } from './services/database.service';
export { runMigrations } from './services/migration.service';

// Events and logging
export { EngineEventBus, EngineEvents } from './utils/event-bus';
export type { SessionTerminationReason } from './utils/event-bus';
export { logger, createLogger } from './utils/logger';

// Domain types
export * from './shared/types/sync.types';
