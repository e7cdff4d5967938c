import type { EngagementState } from '../engagement/state.js';
import type { Snapshot } from '../scrapers/types.js';

/**
 * Persistence collaborator. Snapshots are stored as scraped; engagement state
 * is read at the start of a run and written once at its end.
 */
export interface Storage {
  saveSnapshot(snapshot: Snapshot): Promise<void>;
  /** Newest first. */
  loadRecentSnapshots(limit: number): Promise<LoadedSnapshots>;
  loadEngagementState(): Promise<EngagementState | null>;
  saveEngagementState(state: EngagementState): Promise<void>;
}

export interface LoadedSnapshots {
  snapshots: Snapshot[];
  /** Stored records that failed re-validation and were skipped. */
  errors: string[];
}
