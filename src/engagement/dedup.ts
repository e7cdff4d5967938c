import { createHash } from 'node:crypto';
import { normalize, type TokenizerOptions } from '../analysis/tokenizer.js';
import { ConfigError } from '../errors.js';

/** signature -> ISO time of the confirmed publish */
export type SignatureHistory = ReadonlyMap<string, string>;

export type SuppressReason = 'duplicate' | 'denylisted' | 'empty';

export type DedupDecision =
  | { action: 'allow'; signature: string }
  | { action: 'suppress'; signature: string; reason: SuppressReason; pattern?: string };

export const DEFAULT_RETENTION_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

export function compileDenylist(patterns: readonly string[]): RegExp[] {
  const compiled: RegExp[] = [];
  const issues: string[] = [];
  for (const pattern of patterns) {
    try {
      compiled.push(new RegExp(pattern, 'i'));
    } catch (err) {
      issues.push(`${pattern}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  if (issues.length > 0) throw new ConfigError('Invalid denylist pattern', issues);
  return compiled;
}

/**
 * Gatekeeper for outbound text. The signature is a hash of the sorted token
 * multiset: candidates differing only in word order, punctuation, casing or
 * whitespace share one.
 */
export class DedupGuard {
  private readonly denylist: RegExp[];

  constructor(
    private readonly tokenizer: TokenizerOptions,
    denylist: readonly string[] = [],
  ) {
    this.denylist = compileDenylist(denylist);
  }

  signatureOf(text: string): string {
    const tokens = normalize(text, this.tokenizer).sort();
    return createHash('sha256').update(tokens.join(' ')).digest('hex').slice(0, 32);
  }

  /** Pure: same text and same history give the same decision. */
  mayPublish(text: string, history: SignatureHistory): DedupDecision {
    const signature = this.signatureOf(text);

    for (const pattern of this.denylist) {
      if (pattern.test(text)) {
        return { action: 'suppress', signature, reason: 'denylisted', pattern: pattern.source };
      }
    }

    if (normalize(text, this.tokenizer).length === 0) {
      return { action: 'suppress', signature, reason: 'empty' };
    }

    if (history.has(signature)) {
      return { action: 'suppress', signature, reason: 'duplicate' };
    }

    return { action: 'allow', signature };
  }
}

/** Call only after the publisher confirmed the post went out. */
export function recordPublished(history: SignatureHistory, signature: string, now: Date): SignatureHistory {
  const next = new Map(history);
  if (!next.has(signature)) next.set(signature, now.toISOString());
  return next;
}

/** Drop signatures published more than `retentionDays` before `now`. */
export function pruneHistory(history: SignatureHistory, now: Date, retentionDays = DEFAULT_RETENTION_DAYS): SignatureHistory {
  const cutoff = now.getTime() - retentionDays * DAY_MS;
  const next = new Map<string, string>();
  for (const [signature, publishedAt] of history) {
    const at = Date.parse(publishedAt);
    // unparseable timestamps are kept
    if (Number.isNaN(at) || at >= cutoff) next.set(signature, publishedAt);
  }
  return next;
}
