/**
 * Deduplication Service
 *
 * Decides, before anything is written, whether a candidate is a new fact,
 * a duplicate of a stored record, or a change to one.
 *
 * Keys:
 * - time-granular types: (user, entity type, calendar day, HH:mm bucket)
 * - date-granular types: (user, entity type, calendar day)
 *
 * Calendar day and time of day are evaluated in the configured time zone.
 * Resolution works against a DedupIndex built from one window fetch, so a
 * batch costs a single query however many candidates it holds.
 *
 * @module services/deduplication
 */

import { createLogger } from '../utils/logger';
import { bucketSubDayTime, calendarDay, localTimeOfDay, normalizeTimestamp } from '../utils/calendar';
import type {
  DedupConfig,
  EntityTypeDefinition,
  MergeMode,
} from '../shared/types/config.types';
import type { RecordCandidate, RecordPayload, SyncableRecord } from '../shared/types/sync.types';

// ============================================================================
// Types
// ============================================================================

export interface DeduplicationOptions {
  dedup: DedupConfig;
  entityTypes: EntityTypeDefinition[];
  timeZone: string;
}

export interface EntityClassification {
  hasSubDayTime: boolean;
  merge: MergeMode;
}

/**
 * Candidate with its dedup coordinates resolved
 */
export interface NormalizedCandidate {
  localID: string | undefined;
  entityType: string;
  value: number;
  valueTimestamp: string;
  valueDate: string;
  subDayTime: string | null;
  payload: RecordPayload | null;
  backendID: string | null;
  classification: EntityClassification;
}

/**
 * Outcome of resolving one candidate
 * - insert: no stored record shares the key
 * - duplicate: stored record already reflects the candidate
 * - merge: stored record takes `value` (sum or replace) and goes back to pending
 * - remote_overwrite: synced copy replaced by newer backend state
 */
export type DedupDecision =
  | { kind: 'insert' }
  | { kind: 'duplicate'; existing: SyncableRecord }
  | { kind: 'merge'; existing: SyncableRecord; value: number }
  | { kind: 'remote_overwrite'; existing: SyncableRecord };

export interface DedupWindow {
  entityTypes: string[];
  fromDate: string;
  toDate: string;
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('deduplication');

// ============================================================================
// Dedup Index
// ============================================================================

/**
 * In-memory view of the records a batch may collide with. Resolved records
 * are fed back in so candidates of the same batch deduplicate against each
 * other.
 */
export class DedupIndex {
  private readonly byKey = new Map<string, SyncableRecord>();
  private readonly byBackendId = new Map<string, SyncableRecord>();

  constructor(
    private readonly keyOf: (record: SyncableRecord) => string,
    records: SyncableRecord[] = []
  ) {
    for (const record of records) {
      this.add(record);
    }
  }

  add(record: SyncableRecord): void {
    const key = this.keyOf(record);
    // Oldest record wins a key; later rows are leftovers of a missed duplicate
    const current = this.byKey.get(key);
    if (!current || current.localID === record.localID) {
      this.byKey.set(key, record);
    }
    if (record.backendID !== null) {
      this.byBackendId.set(record.backendID, record);
    }
  }

  findByKey(key: string): SyncableRecord | undefined {
    return this.byKey.get(key);
  }

  findByBackendId(backendID: string): SyncableRecord | undefined {
    return this.byBackendId.get(backendID);
  }
}

// ============================================================================
// Deduplication Service
// ============================================================================

export class DeduplicationService {
  private readonly definitions: Map<string, EntityTypeDefinition>;

  constructor(private readonly options: DeduplicationOptions) {
    this.definitions = new Map(options.entityTypes.map((d) => [d.name, d]));
  }

  /**
   * Declared types use their definition. Unknown types are time-granular
   * exactly when the candidate carries a subDayTime, and always sum.
   */
  classify(entityType: string, candidateSubDayTime?: string | null): EntityClassification {
    const definition = this.definitions.get(entityType);
    if (definition) {
      return { hasSubDayTime: definition.hasSubDayTime, merge: definition.merge };
    }
    return {
      hasSubDayTime: candidateSubDayTime !== undefined && candidateSubDayTime !== null,
      merge: 'sum',
    };
  }

  normalize(candidate: RecordCandidate): NormalizedCandidate {
    const classification = this.classify(candidate.entityType, candidate.subDayTime);
    const valueTimestamp = normalizeTimestamp(candidate.valueTimestamp);

    let subDayTime: string | null = null;
    if (classification.hasSubDayTime) {
      const raw = candidate.subDayTime ?? localTimeOfDay(valueTimestamp, this.options.timeZone);
      subDayTime = bucketSubDayTime(raw, this.options.dedup.subDayBucketMinutes);
    }

    return {
      localID: candidate.localID,
      entityType: candidate.entityType,
      value: candidate.value,
      valueTimestamp,
      valueDate: calendarDay(valueTimestamp, this.options.timeZone),
      subDayTime,
      payload: candidate.payload ?? null,
      backendID: candidate.backendID ?? null,
      classification,
    };
  }

  /**
   * Dedup key of a stored record, using its stored classification columns
   */
  keyOfRecord = (record: SyncableRecord): string => {
    const { hasSubDayTime } = this.classify(record.entityType, record.subDayTime);
    return this.buildKey(
      record.userID,
      record.entityType,
      record.valueDate,
      hasSubDayTime ? record.subDayTime : null
    );
  };

  keyOfCandidate(userID: string, candidate: NormalizedCandidate): string {
    return this.buildKey(userID, candidate.entityType, candidate.valueDate, candidate.subDayTime);
  }

  /**
   * Smallest window covering every candidate, for the single existing-records fetch
   */
  windowFor(candidates: NormalizedCandidate[]): DedupWindow | null {
    if (candidates.length === 0) {
      return null;
    }
    let fromDate = candidates[0].valueDate;
    let toDate = candidates[0].valueDate;
    const entityTypes = new Set<string>();

    for (const candidate of candidates) {
      entityTypes.add(candidate.entityType);
      if (candidate.valueDate < fromDate) fromDate = candidate.valueDate;
      if (candidate.valueDate > toDate) toDate = candidate.valueDate;
    }

    return { entityTypes: [...entityTypes], fromDate, toDate };
  }

  createIndex(records: SyncableRecord[]): DedupIndex {
    return new DedupIndex(this.keyOfRecord, records);
  }

  /**
   * Resolve one candidate against the index
   */
  resolve(userID: string, candidate: NormalizedCandidate, index: DedupIndex): DedupDecision {
    const byKey = index.findByKey(this.keyOfCandidate(userID, candidate));

    if (candidate.backendID !== null) {
      return this.resolveRemoteConfirmed(candidate, index.findByBackendId(candidate.backendID), byKey);
    }

    if (!byKey) {
      return { kind: 'insert' };
    }

    const withinTolerance = this.withinTolerance(byKey.value, candidate.value);
    const { hasSubDayTime, merge } = candidate.classification;

    if (hasSubDayTime || merge === 'replace') {
      if (withinTolerance) {
        log.debug('Duplicate candidate skipped', {
          entityType: candidate.entityType,
          localId: byKey.localID,
        });
        return { kind: 'duplicate', existing: byKey };
      }
      return { kind: 'merge', existing: byKey, value: candidate.value };
    }

    return { kind: 'merge', existing: byKey, value: byKey.value + candidate.value };
  }

  withinTolerance(a: number, b: number): boolean {
    return Math.abs(a - b) <= this.options.dedup.valueTolerance;
  }

  /**
   * Backend-confirmed samples: backendID match first, then dedup key.
   * A local copy that is not yet synced always wins.
   */
  private resolveRemoteConfirmed(
    candidate: NormalizedCandidate,
    byBackendId: SyncableRecord | undefined,
    byKey: SyncableRecord | undefined
  ): DedupDecision {
    if (byBackendId) {
      if (byBackendId.syncStatus !== 'synced') {
        return { kind: 'duplicate', existing: byBackendId };
      }
      if (this.withinTolerance(byBackendId.value, candidate.value)) {
        return { kind: 'duplicate', existing: byBackendId };
      }
      return { kind: 'remote_overwrite', existing: byBackendId };
    }

    if (byKey) {
      return { kind: 'duplicate', existing: byKey };
    }

    return { kind: 'insert' };
  }

  private buildKey(
    userID: string,
    entityType: string,
    valueDate: string,
    subDayTime: string | null
  ): string {
    return subDayTime === null
      ? `${userID}|${entityType}|${valueDate}`
      : `${userID}|${entityType}|${valueDate}|${subDayTime}`;
  }
}
