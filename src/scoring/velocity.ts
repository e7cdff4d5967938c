import type { TrendDelta, TrendDirection } from '../analysis/types.js';
import { compareStrings, round } from '../utils/text.js';

export const DEFAULT_STABLE_THRESHOLD = 0.1;

function directionOf(current: number, previous: number, stableThreshold: number): TrendDirection {
  if (previous === 0) return current > 0 ? 'up' : 'stable';
  const relative = (current - previous) / previous;
  if (Math.abs(relative) < stableThreshold) return 'stable';
  return relative > 0 ? 'up' : 'down';
}

/**
 * Compare term counts between the current window and the previous one.
 * Every term present in either window gets an entry; a term missing from a
 * window counts as 0 there.
 *
 * @param stableThreshold Relative change below which a term is "stable" (0.1 = 10%)
 */
export function computeDeltas(
  currentCounts: ReadonlyMap<string, number>,
  previousCounts: ReadonlyMap<string, number>,
  stableThreshold = DEFAULT_STABLE_THRESHOLD,
): TrendDelta[] {
  const allTerms = new Set([...currentCounts.keys(), ...previousCounts.keys()]);

  const deltas: TrendDelta[] = [];
  for (const term of allTerms) {
    const current = currentCounts.get(term) ?? 0;
    const previous = previousCounts.get(term) ?? 0;

    if (current === 0 && previous === 0) continue;

    let changePct: number;
    if (previous === 0) {
      // New term: treat as a 100% increase
      changePct = 100;
    } else {
      changePct = ((current - previous) / previous) * 100;
    }

    deltas.push({
      term,
      current_count: current,
      previous_count: previous,
      change_pct: round(changePct, 1),
      direction: directionOf(current, previous, stableThreshold),
    });
  }

  deltas.sort((a, b) => b.change_pct - a.change_pct || b.current_count - a.current_count || compareStrings(a.term, b.term));

  return deltas;
}

/**
 * One line per rising term, for the report and the short post draft.
 */
export function formatRisingTerms(deltas: readonly TrendDelta[], limit = 5): string[] {
  return deltas
    .filter((d) => d.direction === 'up')
    .slice(0, limit)
    .map((d) => `"${d.term}" +${d.change_pct}% (${d.previous_count} → ${d.current_count})`);
}

export function formatFallingTerms(deltas: readonly TrendDelta[], limit = 5): string[] {
  return deltas
    .filter((d) => d.direction === 'down')
    .sort((a, b) => a.change_pct - b.change_pct || compareStrings(a.term, b.term))
    .slice(0, limit)
    .map((d) => `"${d.term}" ${d.change_pct}% (${d.previous_count} → ${d.current_count})`);
}
