import { z } from 'zod';
import { compareStrings } from '../utils/text.js';
import type { SignatureHistory } from './dedup.js';
import type { RateBudget } from './rate-limiter.js';

export type ActionKind = 'comment' | 'post' | 'api';

export const ACTION_KINDS: readonly ActionKind[] = ['comment', 'post', 'api'];

/** Own report posts remembered for reply checks. */
export const OWN_POST_LIMIT = 50;

/**
 * Everything the engagement gate carries between scheduled runs.
 */
export interface EngagementState {
  history: SignatureHistory;
  budgets: Partial<Record<ActionKind, RateBudget>>;
  /** post or comment id -> ISO time we commented on or replied to it */
  engaged: ReadonlyMap<string, string>;
  /** ids of our published report posts, oldest first */
  ownPosts: readonly string[];
}

const budgetSchema = z.object({
  window_start: z.number().int(),
  calls_made: z.number().int().nonnegative(),
  max_calls: z.number().int().positive(),
  window_duration_ms: z.number().int().positive(),
});

export const persistedStateSchema = z.object({
  version: z.literal(1),
  signatures: z.record(z.string(), z.string()),
  budgets: z.object({
    comment: budgetSchema.optional(),
    post: budgetSchema.optional(),
    api: budgetSchema.optional(),
  }),
  engaged: z.record(z.string(), z.string()).default({}),
  own_posts: z.array(z.string()).default([]),
});

export type PersistedState = z.infer<typeof persistedStateSchema>;

export function emptyState(): EngagementState {
  return { history: new Map(), budgets: {}, engaged: new Map(), ownPosts: [] };
}

function sortedRecord(map: ReadonlyMap<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of [...map.keys()].sort(compareStrings)) {
    const value = map.get(key);
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/** Plain JSON shape, map keys sorted so equal states serialize identically. */
export function toPersisted(state: EngagementState): PersistedState {
  const budgets: PersistedState['budgets'] = {};
  for (const kind of ACTION_KINDS) {
    const budget = state.budgets[kind];
    if (budget) budgets[kind] = { ...budget };
  }

  return {
    version: 1,
    signatures: sortedRecord(state.history),
    budgets,
    engaged: sortedRecord(state.engaged),
    own_posts: [...state.ownPosts],
  };
}

export function fromPersisted(data: unknown): EngagementState {
  const parsed = persistedStateSchema.parse(data);
  const budgets: EngagementState['budgets'] = {};
  for (const kind of ACTION_KINDS) {
    const budget = parsed.budgets[kind];
    if (budget) budgets[kind] = budget;
  }
  return {
    history: new Map(Object.entries(parsed.signatures)),
    budgets,
    engaged: new Map(Object.entries(parsed.engaged)),
    ownPosts: parsed.own_posts,
  };
}

export function serializeState(state: EngagementState): string {
  return `${JSON.stringify(toPersisted(state), null, 2)}\n`;
}

export function deserializeState(json: string): EngagementState {
  return fromPersisted(JSON.parse(json));
}

/** Remember a published report post, keeping the newest OWN_POST_LIMIT. */
export function addOwnPost(state: EngagementState, postId: string): EngagementState {
  if (state.ownPosts.includes(postId)) return state;
  return { ...state, ownPosts: [...state.ownPosts, postId].slice(-OWN_POST_LIMIT) };
}
