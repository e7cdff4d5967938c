import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { deserializeState, serializeState, type EngagementState } from '../engagement/state.js';
import { parseStoredSnapshot } from '../scrapers/records.js';
import type { Snapshot } from '../scrapers/types.js';
import type { LoadedSnapshots, Storage } from './types.js';

const SNAPSHOT_DIR = 'snapshots';
const STATE_FILE = 'engagement-state.json';

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/** `2026-02-15T12:00:00.000Z` -> `snapshot_2026-02-15T12-00-00-000Z.json`, which sorts by time. */
export function snapshotFileName(capturedAt: string): string {
  return `snapshot_${capturedAt.replace(/[:.]/g, '-')}.json`;
}

/**
 * JSON files under a data directory. Writes go to a temp file first and are
 * renamed into place, so a run abandoned midway leaves the old file intact.
 */
export class FileStore implements Storage {
  constructor(private readonly dataDir: string, private readonly retention = 20) {}

  async saveSnapshot(snapshot: Snapshot): Promise<void> {
    const dir = join(this.dataDir, SNAPSHOT_DIR);
    await mkdir(dir, { recursive: true });
    await this.writeAtomic(join(dir, snapshotFileName(snapshot.captured_at)), JSON.stringify(snapshot, null, 2));

    const files = await this.snapshotFiles();
    for (const stale of files.slice(this.retention)) {
      await rm(join(dir, stale), { force: true });
    }
  }

  async loadRecentSnapshots(limit: number): Promise<LoadedSnapshots> {
    const dir = join(this.dataDir, SNAPSHOT_DIR);
    const files = (await this.snapshotFiles()).slice(0, limit);

    const snapshots: Snapshot[] = [];
    const errors: string[] = [];
    for (const file of files) {
      const raw = await readFile(join(dir, file), 'utf-8');
      const parsed = parseStoredSnapshot(JSON.parse(raw));
      snapshots.push(parsed.snapshot);
      errors.push(...parsed.errors.map((e) => `${file}: ${e.message}`));
    }
    return { snapshots, errors };
  }

  async loadEngagementState(): Promise<EngagementState | null> {
    try {
      const raw = await readFile(join(this.dataDir, STATE_FILE), 'utf-8');
      return deserializeState(raw);
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async saveEngagementState(state: EngagementState): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    await this.writeAtomic(join(this.dataDir, STATE_FILE), serializeState(state));
  }

  private async snapshotFiles(): Promise<string[]> {
    try {
      const entries = await readdir(join(this.dataDir, SNAPSHOT_DIR));
      return entries.filter((f) => f.startsWith('snapshot_') && f.endsWith('.json')).sort().reverse();
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
  }

  private async writeAtomic(path: string, content: string): Promise<void> {
    const tmp = `${path}.${process.pid}.tmp`;
    await writeFile(tmp, content, 'utf-8');
    try {
      await rename(tmp, path);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
  }
}
