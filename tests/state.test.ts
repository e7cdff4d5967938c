import { describe, it, expect } from 'vitest';
import {
  addOwnPost,
  deserializeState,
  emptyState,
  OWN_POST_LIMIT,
  serializeState,
  toPersisted,
  type EngagementState,
} from '../src/engagement/state.js';

const state: EngagementState = {
  history: new Map([
    ['bbbb', '2026-02-14T09:00:00.000Z'],
    ['aaaa', '2026-02-15T10:00:00.000Z'],
  ]),
  budgets: {
    comment: { window_start: 1_771_156_800_000, calls_made: 3, max_calls: 50, window_duration_ms: 86_400_000 },
  },
  engaged: new Map([['comment-c9', '2026-02-15T11:00:00.000Z']]),
  ownPosts: ['r1', 'r2'],
};

describe('engagement state persistence', () => {
  it('round-trips through JSON', () => {
    const restored = deserializeState(serializeState(state));

    expect([...restored.history.entries()]).toEqual([
      ['aaaa', '2026-02-15T10:00:00.000Z'],
      ['bbbb', '2026-02-14T09:00:00.000Z'],
    ]);
    expect(restored.budgets).toEqual(state.budgets);
    expect([...restored.engaged.entries()]).toEqual([['comment-c9', '2026-02-15T11:00:00.000Z']]);
    expect(restored.ownPosts).toEqual(['r1', 'r2']);
  });

  it('reads state saved before engaged targets were tracked', () => {
    const restored = deserializeState(JSON.stringify({ version: 1, signatures: { abc: '2026-02-15T10:00:00.000Z' }, budgets: {} }));

    expect(restored.engaged.size).toBe(0);
    expect(restored.ownPosts).toEqual([]);
  });

  it('writes signatures in sorted order', () => {
    expect(Object.keys(toPersisted(state).signatures)).toEqual(['aaaa', 'bbbb']);
  });

  it('serializes an empty state', () => {
    expect(toPersisted(emptyState())).toEqual({ version: 1, signatures: {}, budgets: {}, engaged: {}, own_posts: [] });
  });

  it('rejects an unknown version', () => {
    expect(() => deserializeState(JSON.stringify({ version: 2, signatures: {}, budgets: {} }))).toThrow();
  });

  it('rejects a budget with negative calls', () => {
    const bad = { version: 1, signatures: {}, budgets: { api: { window_start: 0, calls_made: -1, max_calls: 60, window_duration_ms: 3_600_000 } } };
    expect(() => deserializeState(JSON.stringify(bad))).toThrow();
  });
});

describe('addOwnPost', () => {
  it('appends new ids once', () => {
    const once = addOwnPost(emptyState(), 'r1');
    expect(addOwnPost(once, 'r1').ownPosts).toEqual(['r1']);
    expect(addOwnPost(once, 'r2').ownPosts).toEqual(['r1', 'r2']);
  });

  it('keeps only the newest ids', () => {
    let state = emptyState();
    for (let i = 0; i <= OWN_POST_LIMIT; i++) state = addOwnPost(state, `r${i}`);

    expect(state.ownPosts).toHaveLength(OWN_POST_LIMIT);
    expect(state.ownPosts[0]).toBe('r1');
    expect(state.ownPosts[OWN_POST_LIMIT - 1]).toBe(`r${OWN_POST_LIMIT}`);
  });
});
