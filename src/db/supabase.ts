import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { fromPersisted, toPersisted, type EngagementState } from '../engagement/state.js';
import { parseStoredSnapshot } from '../scrapers/records.js';
import type { Snapshot } from '../scrapers/types.js';
import type { LoadedSnapshots, Storage } from './types.js';

let client: SupabaseClient | null = null;

export function getClient(url = process.env.SUPABASE_URL, key = process.env.SUPABASE_ANON_KEY): SupabaseClient {
  if (client) return client;

  if (!url || !key) {
    throw new Error('Missing SUPABASE_URL or SUPABASE_ANON_KEY in environment');
  }

  client = createClient(url, key);
  return client;
}

// engagement_state holds a single row
const STATE_ROW_ID = 1;

/**
 * Tables:
 *   snapshots(captured_at timestamptz primary key, label text, records jsonb)
 *   engagement_state(id int primary key, state jsonb, updated_at timestamptz)
 */
export class SupabaseStore implements Storage {
  constructor(private readonly db: SupabaseClient = getClient()) {}

  async saveSnapshot(snapshot: Snapshot): Promise<void> {
    const { error } = await this.db
      .from('snapshots')
      .upsert(
        { captured_at: snapshot.captured_at, label: snapshot.label, records: snapshot.records },
        { onConflict: 'captured_at' },
      );

    if (error) throw new Error(`Failed to save snapshot ${snapshot.captured_at}: ${error.message}`);
  }

  async loadRecentSnapshots(limit: number): Promise<LoadedSnapshots> {
    const { data, error } = await this.db
      .from('snapshots')
      .select('captured_at, label, records')
      .order('captured_at', { ascending: false })
      .limit(limit);

    if (error) throw new Error(`Failed to fetch snapshots: ${error.message}`);

    const snapshots: Snapshot[] = [];
    const errors: string[] = [];
    for (const row of data ?? []) {
      const parsed = parseStoredSnapshot(row);
      snapshots.push(parsed.snapshot);
      errors.push(...parsed.errors.map((e) => `snapshot ${parsed.snapshot.captured_at}: ${e.message}`));
    }
    return { snapshots, errors };
  }

  async loadEngagementState(): Promise<EngagementState | null> {
    const { data, error } = await this.db
      .from('engagement_state')
      .select('state')
      .eq('id', STATE_ROW_ID)
      .limit(1);

    if (error) throw new Error(`Failed to fetch engagement state: ${error.message}`);
    if (!data?.length) return null;
    return fromPersisted(data[0].state);
  }

  async saveEngagementState(state: EngagementState): Promise<void> {
    const { error } = await this.db
      .from('engagement_state')
      .upsert(
        { id: STATE_ROW_ID, state: toPersisted(state), updated_at: new Date().toISOString() },
        { onConflict: 'id' },
      );

    if (error) throw new Error(`Failed to save engagement state: ${error.message}`);
  }
}
