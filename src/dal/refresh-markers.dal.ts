/**
 * Refresh Markers Data Access Layer
 *
 * Last completed background refresh per (user, entity type). Consulted by the
 * read path so an empty or unchanged remote does not trigger a refresh on
 * every read.
 *
 * @module dal/refresh-markers
 * @security SEC-006: All queries use prepared statements
 */

import { UserBasedDAL } from './base.dal';

// ============================================================================
// Types
// ============================================================================

export interface RefreshMarkerRow {
  user_id: string;
  entity_type: string;
  refreshed_at: string;
}

// ============================================================================
// Refresh Markers DAL
// ============================================================================

export class RefreshMarkersDAL extends UserBasedDAL<RefreshMarkerRow> {
  protected readonly tableName = 'refresh_markers';
  protected readonly primaryKey = 'user_id';

  getLastRefresh(userId: string, entityType: string): string | null {
    const row = this.db
      .prepare<[string, string], RefreshMarkerRow>(
        'SELECT * FROM refresh_markers WHERE user_id = ? AND entity_type = ?'
      )
      .get(userId, entityType);
    return row?.refreshed_at ?? null;
  }

  markRefreshed(userId: string, entityType: string, at: string = this.now()): void {
    this.db
      .prepare(
        `INSERT INTO refresh_markers (user_id, entity_type, refreshed_at) VALUES (?, ?, ?)
         ON CONFLICT (user_id, entity_type) DO UPDATE SET refreshed_at = excluded.refreshed_at`
      )
      .run(userId, entityType, at);
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

export const refreshMarkersDAL = new RefreshMarkersDAL();
