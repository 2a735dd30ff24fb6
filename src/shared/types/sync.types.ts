/**
 * Sync Types
 *
 * Domain types shared by the store, outbox, dispatcher and read path.
 *
 * @module shared/types/sync.types
 */

import { z } from 'zod';
import { EntityTypeNameSchema } from './config.types';

// ============================================================================
// Status Types
// ============================================================================

export type SyncStatus = 'pending' | 'syncing' | 'synced' | 'failed';

export type OutboxStatus = 'pending' | 'processing' | 'completed' | 'failed_permanent';

/**
 * Error category, used by the classifier and persisted on outbox events
 * - TRANSIENT: network, timeout, 408, 429, 5xx
 * - PERMANENT: other 4xx, validation
 * - AUTH: 401 (handled by the refresh coordinator, never retried as a failure)
 * - UNKNOWN: unclassified, retried like transient
 */
export type ErrorCategory = 'TRANSIENT' | 'PERMANENT' | 'AUTH' | 'UNKNOWN';

// ============================================================================
// Records
// ============================================================================

export type RecordPayload = Record<string, unknown>;

export interface SyncableRecord {
  localID: string;
  backendID: string | null;
  userID: string;
  entityType: string;
  value: number;
  payload: RecordPayload | null;
  /** ISO 8601 instant the fact occurred */
  valueTimestamp: string;
  /** Calendar day (YYYY-MM-DD) in the configured time zone */
  valueDate: string;
  /** HH:mm bucket for time-granular types */
  subDayTime: string | null;
  syncStatus: SyncStatus;
  /** Bumped whenever backendID is cleared so replacement creates get a new key */
  remoteGeneration: number;
  lastSyncError: string | null;
  syncedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

const SUB_DAY_TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

export const RecordPayloadSchema = z.record(z.unknown());

/**
 * Input accepted by LocalStore.save / saveBatch
 *
 * Candidates with a backendID are remote-confirmed: they are stored as synced
 * and never enqueued.
 */
export const RecordCandidateSchema = z.object({
  localID: z.string().min(1).max(128).optional(),
  entityType: EntityTypeNameSchema,
  value: z.number().finite(),
  valueTimestamp: z.string().datetime({ offset: true }),
  subDayTime: z.string().regex(SUB_DAY_TIME_PATTERN, 'subDayTime must be HH:mm').optional(),
  payload: RecordPayloadSchema.optional(),
  backendID: z.string().min(1).max(256).optional(),
});

export type RecordCandidate = z.infer<typeof RecordCandidateSchema>;

/**
 * Sample produced by an origin adapter or the remote refresh source
 */
export type Sample = RecordCandidate;

export type SaveOutcome = 'created' | 'updated' | 'skipped';

export interface SaveResult {
  localID: string;
  outcome: SaveOutcome;
  record: SyncableRecord;
}

export interface BatchSaveResult {
  /** Current record for every candidate, in input order */
  records: SyncableRecord[];
  created: number;
  updated: number;
  skipped: number;
}

/**
 * Inclusive range of value timestamps (ISO 8601 instants)
 */
export interface DateRange {
  from: string;
  to: string;
}

export interface SyncStatusSummary {
  /** Records waiting for (or currently in) dispatch */
  pendingCount: number;
  failedCount: number;
  lastSyncedAt: string | null;
}

// ============================================================================
// Outbox
// ============================================================================

export interface OutboxEvent {
  eventID: string;
  entityType: string;
  localRecordID: string;
  userID: string;
  isNewRecord: boolean;
  status: OutboxStatus;
  attemptCount: number;
  maxAttempts: number;
  nextAttemptAt: string;
  /** Record changed while this event was processing */
  dirty: boolean;
  errorCategory: ErrorCategory | null;
  lastError: string | null;
  httpStatus: number | null;
  lastAttemptAt: string | null;
  completedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface OutboxStatistics {
  pending: number;
  processing: number;
  completed: number;
  failedPermanent: number;
  /** Processing events older than the stale threshold */
  staleProcessing: number;
  oldestPendingAt: string | null;
  newestCompletedAt: string | null;
}

// ============================================================================
// Change Notifications
// ============================================================================

export type RecordChangeKind = 'created' | 'updated' | 'synced' | 'failed' | 'deleted';

export interface RecordChangedEvent {
  userID: string;
  localID: string;
  entityType: string;
  change: RecordChangeKind;
  syncStatus: SyncStatus;
  updatedAt: string;
}

// ============================================================================
// Auth
// ============================================================================

export interface TokenPair {
  accessToken: string;
  /** Single use: every refresh rotates it */
  refreshToken: string;
  /** ISO 8601 expiry of the access token, when the backend reports one */
  accessTokenExpiresAt?: string;
}

export const TokenPairSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
  accessTokenExpiresAt: z.string().datetime({ offset: true }).optional(),
});
