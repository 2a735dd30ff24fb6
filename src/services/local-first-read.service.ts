/**
 * Local-First Read Path
 *
 * Reads are answered from the local store synchronously, with no network
 * involved. When the local data for (user, entity type) is older than the
 * staleness threshold, a background refresh is scheduled through the
 * RefreshSource registered for that entity type; its samples are merged
 * with LocalStore.saveBatch and the resulting change events reach
 * subscribers the usual way.
 *
 * Refresh failures are logged and never reach the reader.
 *
 * @module services/local-first-read
 * @security DB-006: Reads scoped by user ID
 */

import { createLogger, errorMessage } from '../utils/logger';
import { normalizeSubDayTime, normalizeTimestamp } from '../utils/calendar';
import { refreshMarkersDAL, type RefreshMarkersDAL } from '../dal/refresh-markers.dal';
import { RemoteGatewayError, type RemoteGateway, type RemoteRecord } from './remote-gateway.service';
import type { LocalStore } from './local-store.service';
import type { TokenRefreshCoordinator } from './token-refresh-coordinator.service';
import type { DateRange, Sample, SyncableRecord } from '../shared/types/sync.types';

// ============================================================================
// Types
// ============================================================================

/**
 * Origin of fresh samples for an entity type (backend, device health store, ...)
 */
export interface RefreshSource {
  pull(userID: string, entityType: string, range: DateRange, signal: AbortSignal): Promise<Sample[]>;
}

export interface LocalFirstReadOptions {
  store: LocalStore;
  stalenessThresholdMs: number;
  /** Used for entity types without a source of their own */
  defaultSource?: RefreshSource;
  sources?: Record<string, RefreshSource>;
  markersDAL?: RefreshMarkersDAL;
  now?: () => number;
}

interface InFlightRefresh {
  controller: AbortController;
  promise: Promise<void>;
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('local-first-read');

// ============================================================================
// Remote Refresh Source
// ============================================================================

/**
 * Pulls backend records through the gateway. Every sample carries its
 * backendID, so merging it goes through the remote-confirmed dedup path.
 */
export class RemoteRefreshSource implements RefreshSource {
  constructor(
    private readonly gateway: RemoteGateway,
    private readonly tokens: TokenRefreshCoordinator
  ) {}

  async pull(_userID: string, entityType: string, range: DateRange, signal: AbortSignal): Promise<Sample[]> {
    const query = { entityType, from: range.from, to: range.to };
    const token = await this.tokens.getAccessToken();

    let records: RemoteRecord[];
    try {
      records = await this.gateway.listRecords(query, token, signal);
    } catch (error) {
      if (!(error instanceof RemoteGatewayError) || error.status !== 401) {
        throw error;
      }
      const refreshed = await this.tokens.getValidAccessToken(token);
      records = await this.gateway.listRecords(query, refreshed, signal);
    }

    return records.map((record) => ({
      entityType: record.entityType,
      value: record.value,
      valueTimestamp: record.valueTimestamp,
      subDayTime: normalizeSubDayTime(record.subDayTime),
      payload: record.payload,
      backendID: record.backendID,
    }));
  }
}

// ============================================================================
// Local-First Read Service
// ============================================================================

export class LocalFirstReadService {
  private readonly store: LocalStore;
  private readonly stalenessThresholdMs: number;
  private readonly defaultSource?: RefreshSource;
  private readonly sources = new Map<string, RefreshSource>();
  private readonly markersDAL: RefreshMarkersDAL;
  private readonly now: () => number;

  private readonly inFlight = new Map<string, InFlightRefresh>();
  private refreshesStarted = 0;

  constructor(options: LocalFirstReadOptions) {
    this.store = options.store;
    this.stalenessThresholdMs = options.stalenessThresholdMs;
    this.defaultSource = options.defaultSource;
    this.markersDAL = options.markersDAL ?? refreshMarkersDAL;
    this.now = options.now ?? Date.now;

    for (const [entityType, source] of Object.entries(options.sources ?? {})) {
      this.sources.set(entityType, source);
    }
  }

  registerSource(entityType: string, source: RefreshSource): void {
    this.sources.set(entityType, source);
  }

  /**
   * Local records in the range, returned immediately. Schedules a
   * background refresh when the local data is stale.
   */
  read(userID: string, entityType: string, range: DateRange): SyncableRecord[] {
    const records = this.store.fetch(userID, entityType, range);

    if (this.isStale(userID, entityType)) {
      this.scheduleRefresh(userID, entityType, range);
    }
    return records;
  }

  /**
   * Stale when neither a local write nor a completed refresh happened
   * within the threshold
   */
  isStale(userID: string, entityType: string): boolean {
    const latestWrite = this.store.getLatestUpdatedAt(userID, entityType);
    const lastRefresh = this.markersDAL.getLastRefresh(userID, entityType);

    const newest = [latestWrite, lastRefresh]
      .filter((t): t is string => t !== null)
      .map((t) => new Date(t).getTime())
      .reduce((a, b) => Math.max(a, b), Number.NEGATIVE_INFINITY);

    return this.now() - newest > this.stalenessThresholdMs;
  }

  /**
   * Resolves once every refresh in flight has settled
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight.values()].map((r) => r.promise));
    }
  }

  /**
   * Abort every refresh in flight; their results are discarded
   */
  cancelAll(): void {
    for (const [key, refresh] of this.inFlight) {
      refresh.controller.abort();
      log.debug('Background refresh cancelled', { key });
    }
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Background refreshes started since construction */
  getRefreshCount(): number {
    return this.refreshesStarted;
  }

  // ==========================================================================
  // Background Refresh
  // ==========================================================================

  private scheduleRefresh(userID: string, entityType: string, range: DateRange): void {
    const key = `${userID}|${entityType}`;
    if (this.inFlight.has(key)) {
      return;
    }

    const source = this.sources.get(entityType) ?? this.defaultSource;
    if (!source) {
      log.debug('No refresh source for entity type', { entityType });
      return;
    }

    const controller = new AbortController();
    const normalizedRange: DateRange = {
      from: normalizeTimestamp(range.from),
      to: normalizeTimestamp(range.to),
    };

    this.refreshesStarted++;
    const promise = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.refresh(source, userID, entityType, normalizedRange, controller.signal))
      .catch((error: unknown) => {
        log.warn('Background refresh failed', {
          userId: userID,
          entityType,
          error: errorMessage(error),
        });
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, { controller, promise });
    log.debug('Background refresh scheduled', { userId: userID, entityType });
  }

  private async refresh(
    source: RefreshSource,
    userID: string,
    entityType: string,
    range: DateRange,
    signal: AbortSignal
  ): Promise<void> {
    if (signal.aborted) {
      return;
    }

    const samples = await source.pull(userID, entityType, range, signal);
    if (signal.aborted) {
      return;
    }

    const result = samples.length > 0 ? this.store.saveBatch(userID, samples) : null;
    this.markersDAL.markRefreshed(userID, entityType, new Date(this.now()).toISOString());

    log.info('Background refresh merged', {
      userId: userID,
      entityType,
      samples: samples.length,
      created: result?.created ?? 0,
      updated: result?.updated ?? 0,
      skipped: result?.skipped ?? 0,
    });
  }
}
