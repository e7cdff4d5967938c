import { z } from 'zod';
import { InputError } from '../errors.js';
import type { FeedRecord, Snapshot, WindowLabel } from './types.js';

const count = z.number().int().nonnegative();

const recordSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  kind: z.enum(['post', 'comment']).default('post'),
  body: z.string(),
  author: z.string().default('unknown'),
  submolt: z.string().default('general'),
  upvotes: count.default(0),
  comment_count: count.default(0),
  created_at: z
    .string()
    .refine((s) => !Number.isNaN(Date.parse(s)), 'not a valid timestamp')
    .transform((s) => new Date(s).toISOString()),
});

function recordIdOf(raw: unknown): string | undefined {
  if (typeof raw === 'object' && raw !== null && 'id' in raw) {
    const { id } = raw;
    if (typeof id === 'string' || typeof id === 'number') return String(id);
  }
  return undefined;
}

/**
 * Validate one raw record. Throws InputError on a malformed record.
 */
export function parseRecord(raw: unknown): FeedRecord {
  const result = recordSchema.safeParse(raw);
  if (!result.success) {
    const id = recordIdOf(raw);
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'record'}: ${i.message}`);
    throw new InputError(`Malformed record${id ? ` ${id}` : ''}: ${issues.join(', ')}`, id);
  }
  return result.data;
}

/**
 * Build a Snapshot from raw records. Malformed records are skipped and
 * reported; later duplicates of an id are dropped (first occurrence wins).
 */
export function toSnapshot(
  label: WindowLabel,
  capturedAt: Date | string,
  rawRecords: readonly unknown[],
): { snapshot: Snapshot; errors: InputError[] } {
  const errors: InputError[] = [];
  const seen = new Set<string>();
  const records: FeedRecord[] = [];

  for (const raw of rawRecords) {
    let record: FeedRecord;
    try {
      record = parseRecord(raw);
    } catch (err) {
      if (err instanceof InputError) {
        errors.push(err);
        continue;
      }
      throw err;
    }

    if (seen.has(record.id)) continue;
    seen.add(record.id);
    records.push(record);
  }

  const captured_at = typeof capturedAt === 'string' ? new Date(capturedAt).toISOString() : capturedAt.toISOString();
  return { snapshot: { label, captured_at, records }, errors };
}

/** Re-tag a stored snapshot for the window it plays in a comparison. */
export function withLabel(snapshot: Snapshot, label: WindowLabel): Snapshot {
  return snapshot.label === label ? snapshot : { ...snapshot, label };
}

const storedSnapshotSchema = z.object({
  label: z.enum(['current', 'previous']),
  captured_at: z.string().refine((s) => !Number.isNaN(Date.parse(s)), 'not a valid timestamp'),
  records: z.array(z.unknown()),
});

/**
 * Read back a snapshot from storage. Records are re-validated; the shell
 * itself must be well-formed or this throws.
 */
export function parseStoredSnapshot(data: unknown): { snapshot: Snapshot; errors: InputError[] } {
  const shell = storedSnapshotSchema.parse(data);
  return toSnapshot(shell.label, shell.captured_at, shell.records);
}
