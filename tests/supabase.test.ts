import { describe, it, expect, vi, beforeEach } from 'vitest';
import { emptyState } from '../src/engagement/state.js';
import { makeRecord, makeSnapshot } from './helpers.js';

// Mock Supabase client
const mockUpsert = vi.fn();
const mockSelect = vi.fn();
const mockOrder = vi.fn();
const mockEq = vi.fn();
const mockLimit = vi.fn();
const mockFrom = vi.fn(() => ({ select: mockSelect, upsert: mockUpsert }));

vi.mock('@supabase/supabase-js', () => ({
  createClient: vi.fn(() => ({
    from: mockFrom,
  })),
}));

beforeEach(() => {
  vi.clearAllMocks();
  // Reset the chain
  mockFrom.mockReturnValue({ select: mockSelect, upsert: mockUpsert });
  mockSelect.mockReturnValue({ order: mockOrder, eq: mockEq });
  mockOrder.mockReturnValue({ limit: mockLimit });
  mockEq.mockReturnValue({ limit: mockLimit });
  mockUpsert.mockResolvedValue({ error: null });
});

async function store() {
  const { SupabaseStore, getClient } = await import('../src/db/supabase.js');
  return new SupabaseStore(getClient('https://supabase.test', 'test-key'));
}

describe('SupabaseStore', () => {
  it('upserts snapshots keyed by capture time', async () => {
    const snapshot = makeSnapshot([makeRecord({ id: 'p1' })]);
    await (await store()).saveSnapshot(snapshot);

    expect(mockFrom).toHaveBeenCalledWith('snapshots');
    expect(mockUpsert).toHaveBeenCalledWith(
      { captured_at: snapshot.captured_at, label: 'current', records: snapshot.records },
      { onConflict: 'captured_at' },
    );
  });

  it('loads recent snapshots newest first', async () => {
    mockLimit.mockResolvedValueOnce({
      data: [
        { captured_at: '2026-02-15T12:00:00.000Z', label: 'current', records: [makeRecord({ id: 'p2' })] },
        { captured_at: '2026-02-15T08:00:00.000Z', label: 'current', records: [makeRecord({ id: 'p1' })] },
      ],
      error: null,
    });

    const { snapshots, errors } = await (await store()).loadRecentSnapshots(2);

    expect(mockOrder).toHaveBeenCalledWith('captured_at', { ascending: false });
    expect(mockLimit).toHaveBeenCalledWith(2);
    expect(snapshots.map((s) => s.records[0].id)).toEqual(['p2', 'p1']);
    expect(errors).toEqual([]);
  });

  it('reports stored records that no longer validate', async () => {
    mockLimit.mockResolvedValueOnce({
      data: [
        {
          captured_at: '2026-02-15T12:00:00.000Z',
          label: 'current',
          records: [makeRecord({ id: 'p2' }), { id: 'bad', body: 'missing its timestamp' }],
        },
      ],
      error: null,
    });

    const { snapshots, errors } = await (await store()).loadRecentSnapshots(2);

    expect(snapshots[0].records.map((r) => r.id)).toEqual(['p2']);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^snapshot 2026-02-15T12:00:00\.000Z: Malformed record bad: created_at/);
  });

  it('throws when the query fails', async () => {
    mockLimit.mockResolvedValueOnce({ data: null, error: { message: 'permission denied' } });
    await expect((await store()).loadRecentSnapshots(2)).rejects.toThrow('Failed to fetch snapshots: permission denied');
  });

  it('returns null when no engagement state row exists', async () => {
    mockLimit.mockResolvedValueOnce({ data: [], error: null });

    expect(await (await store()).loadEngagementState()).toBeNull();
    expect(mockFrom).toHaveBeenCalledWith('engagement_state');
    expect(mockEq).toHaveBeenCalledWith('id', 1);
  });

  it('restores stored engagement state', async () => {
    mockLimit.mockResolvedValueOnce({
      data: [{ state: { version: 1, signatures: { abc: '2026-02-15T12:00:00.000Z' }, budgets: {} } }],
      error: null,
    });

    const state = await (await store()).loadEngagementState();
    expect(state?.history.get('abc')).toBe('2026-02-15T12:00:00.000Z');
  });

  it('saves engagement state to the single state row', async () => {
    await (await store()).saveEngagementState(emptyState());

    expect(mockUpsert).toHaveBeenCalledWith(
      expect.objectContaining({ id: 1, state: { version: 1, signatures: {}, budgets: {}, engaged: {}, own_posts: [] } }),
      { onConflict: 'id' },
    );
  });

  it('surfaces save errors', async () => {
    mockUpsert.mockResolvedValueOnce({ error: { message: 'conflict' } });
    await expect((await store()).saveEngagementState(emptyState())).rejects.toThrow('Failed to save engagement state: conflict');
  });
});
