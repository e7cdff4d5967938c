export interface RateBudget {
  window_start: number; // epoch ms
  calls_made: number;
  max_calls: number;
  window_duration_ms: number;
}

export type RateDecision = { allowed: true } | { allowed: false; retry_after_ms: number };

export function createBudget(maxCalls: number, windowDurationMs: number, now: Date): RateBudget {
  return {
    window_start: now.getTime(),
    calls_made: 0,
    max_calls: maxCalls,
    window_duration_ms: windowDurationMs,
  };
}

/**
 * Try to spend one call from the budget. Pure: the caller supplies `now` and
 * keeps the returned budget. A denied attempt leaves the counters unchanged.
 */
export function tryAcquire(budget: RateBudget, now: Date): { decision: RateDecision; budget: RateBudget } {
  const t = now.getTime();
  let current = budget;

  if (t >= budget.window_start + budget.window_duration_ms) {
    current = { ...budget, window_start: t, calls_made: 0 };
  }

  if (current.calls_made < current.max_calls) {
    return {
      decision: { allowed: true },
      budget: { ...current, calls_made: current.calls_made + 1 },
    };
  }

  return {
    decision: { allowed: false, retry_after_ms: current.window_start + current.window_duration_ms - t },
    budget: current,
  };
}

/**
 * Use up the rest of the budget so that `tryAcquire` denies until
 * `now + retryAfterMs`. Applied when the platform itself answers 429.
 */
export function exhaustUntil(budget: RateBudget, now: Date, retryAfterMs: number): RateBudget {
  const until = now.getTime() + Math.max(0, retryAfterMs);
  const currentEnd = budget.window_start + budget.window_duration_ms;
  const blockedUntil = budget.calls_made >= budget.max_calls && currentEnd > until ? currentEnd : until;
  return {
    ...budget,
    window_start: blockedUntil - budget.window_duration_ms,
    calls_made: budget.max_calls,
  };
}

export function formatRetryAfter(ms: number): string {
  const minutes = Math.ceil(ms / 60_000);
  if (minutes < 60) return `${minutes}m`;
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return rest === 0 ? `${hours}h` : `${hours}h${rest}m`;
}
