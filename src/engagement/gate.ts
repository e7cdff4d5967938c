import { type DedupGuard, pruneHistory, recordPublished, type SuppressReason } from './dedup.js';
import { createBudget, exhaustUntil, tryAcquire, type RateBudget } from './rate-limiter.js';
import type { ActionKind, EngagementState } from './state.js';

export interface RateLimit {
  maxCalls: number;
  windowMs: number;
}

export type GateVerdict =
  | { action: 'allow'; signature: string }
  | { action: 'suppress'; signature: string; reason: SuppressReason; pattern?: string }
  | { action: 'defer'; signature: string; retry_after_ms: number };

/** The stored budget with the configured limit applied, or a fresh one. */
export function budgetWithLimit(budget: RateBudget | undefined, limit: RateLimit, now: Date): RateBudget {
  if (!budget) return createBudget(limit.maxCalls, limit.windowMs, now);
  return { ...budget, max_calls: limit.maxCalls, window_duration_ms: limit.windowMs };
}

/**
 * Routes a candidate through the dedup guard, then the rate budget for its
 * action kind. State goes in and comes out; nothing is kept here.
 */
export class EngagementGate {
  constructor(
    private readonly guard: DedupGuard,
    private readonly limits: Record<ActionKind, RateLimit>,
    private readonly retentionDays: number,
  ) {}

  evaluate(text: string, kind: ActionKind, state: EngagementState, now: Date): { verdict: GateVerdict; state: EngagementState } {
    const dedup = this.guard.mayPublish(text, state.history);
    if (dedup.action === 'suppress') {
      // suppressed candidates spend no budget
      return { verdict: dedup, state };
    }

    const attempt = tryAcquire(this.budgetFor(state, kind, now), now);
    const next = this.withBudget(state, kind, attempt.budget);

    if (!attempt.decision.allowed) {
      return { verdict: { action: 'defer', signature: dedup.signature, retry_after_ms: attempt.decision.retry_after_ms }, state: next };
    }
    return { verdict: { action: 'allow', signature: dedup.signature }, state: next };
  }

  budgetFor(state: EngagementState, kind: ActionKind, now: Date): RateBudget {
    return budgetWithLimit(state.budgets[kind], this.limits[kind], now);
  }

  withBudget(state: EngagementState, kind: ActionKind, budget: RateBudget): EngagementState {
    return { ...state, budgets: { ...state.budgets, [kind]: budget } };
  }

  /**
   * Record a confirmed publish: the signature, and the post or comment it
   * answered when there is one.
   */
  commit(state: EngagementState, signature: string, now: Date, targetId?: string): EngagementState {
    const next = { ...state, history: recordPublished(state.history, signature, now) };
    if (targetId === undefined) return next;
    return { ...next, engaged: recordPublished(state.engaged, targetId, now) };
  }

  /** The platform asked us to wait: deny this kind until `now + retryAfterMs`. */
  backoff(state: EngagementState, kind: ActionKind, now: Date, retryAfterMs: number): EngagementState {
    return this.withBudget(state, kind, exhaustUntil(this.budgetFor(state, kind, now), now, retryAfterMs));
  }

  /** Drop expired signatures and engaged targets; run when state is loaded. */
  prune(state: EngagementState, now: Date): EngagementState {
    return {
      ...state,
      history: pruneHistory(state.history, now, this.retentionDays),
      engaged: pruneHistory(state.engaged, now, this.retentionDays),
    };
  }
}
