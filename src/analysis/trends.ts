import type { FeedRecord, Snapshot } from '../scrapers/types.js';
import { computeDeltas, DEFAULT_STABLE_THRESHOLD } from '../scoring/velocity.js';
import { byCountThenTerm, compareStrings, excerpt, round } from '../utils/text.js';
import type { SentimentScorer } from './sentiment.js';
import { bigrams, normalize, type TokenizerOptions } from './tokenizer.js';
import type { AuthorActivity, Conversation, RankedTerm, SubmoltActivity, TrendReport } from './types.js';

export interface TrendOptions {
  /** Relative change below which a delta is "stable". */
  stableThreshold: number;
  /** Only records this recent (relative to the snapshot's capture time) rank as conversations. */
  recencyWindowHours: number;
  conversationLimit: number;
  topAuthorLimit: number;
}

export const DEFAULT_TREND_OPTIONS: TrendOptions = {
  stableThreshold: DEFAULT_STABLE_THRESHOLD,
  recencyWindowHours: 6,
  conversationLimit: 10,
  topAuthorLimit: 10,
};

interface TermFrequency {
  unigrams: Map<string, number>;
  bigrams: Map<string, number>;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function rank(counts: ReadonlyMap<string, number>): RankedTerm[] {
  let total = 0;
  for (const count of counts.values()) total += count;

  return [...counts.entries()]
    .map(([term, count]) => ({ term, count, frequency: round(count / total, 4) }))
    .sort(byCountThenTerm);
}

/** Conversation score: discussion counts double. */
export function conversationScore(record: Pick<FeedRecord, 'upvotes' | 'comment_count'>): number {
  return record.upvotes + 2 * record.comment_count;
}

function emptyAuthors(): AuthorActivity {
  return {
    unique_authors: 0,
    average_records_per_author: 0,
    prolific_authors: 0,
    one_time_authors: 0,
    top_authors: [],
  };
}

export class TrendAnalyzer {
  private readonly options: TrendOptions;

  constructor(
    private readonly tokenizer: TokenizerOptions,
    private readonly sentiment: SentimentScorer,
    options: Partial<TrendOptions> = {},
  ) {
    this.options = { ...DEFAULT_TREND_OPTIONS, ...options };
  }

  /**
   * Build the trend report for `current`, compared against `previous` when
   * one is given. Output depends only on the two snapshots, never on the
   * wall clock or input order beyond what the ranking tie-breaks fix.
   */
  analyze(current: Snapshot, previous?: Snapshot | null): TrendReport {
    if (current.records.length === 0) {
      return this.emptyReport(current, previous != null);
    }

    const currentTf = this.termFrequency(current.records);
    const previousTf = this.termFrequency(previous?.records ?? []);

    return {
      generated_at: current.captured_at,
      record_count: current.records.length,
      unigrams: rank(currentTf.unigrams),
      bigrams: rank(currentTf.bigrams),
      has_previous: previous != null,
      deltas: computeDeltas(merge(currentTf), merge(previousTf), this.options.stableThreshold),
      submolts: this.submoltActivity(current.records),
      conversations: this.topConversations(current),
      authors: this.authorActivity(current.records),
      sentiment: this.sentiment.summarize(current.records),
    };
  }

  termFrequency(records: readonly FeedRecord[]): TermFrequency {
    const tf: TermFrequency = { unigrams: new Map(), bigrams: new Map() };
    for (const record of records) {
      const tokens = normalize(record.body, this.tokenizer);
      for (const token of tokens) increment(tf.unigrams, token);
      for (const pair of bigrams(tokens)) increment(tf.bigrams, pair);
    }
    return tf;
  }

  submoltActivity(records: readonly FeedRecord[]): SubmoltActivity[] {
    const bySubmolt = new Map<string, SubmoltActivity>();
    for (const record of records) {
      const entry = bySubmolt.get(record.submolt) ?? {
        submolt: record.submolt,
        record_count: 0,
        total_upvotes: 0,
        total_comments: 0,
        engagement_score: 0,
      };
      entry.record_count++;
      entry.total_upvotes += record.upvotes;
      entry.total_comments += record.comment_count;
      entry.engagement_score += conversationScore(record);
      bySubmolt.set(record.submolt, entry);
    }

    return [...bySubmolt.values()].sort(
      (a, b) => b.record_count - a.record_count || compareStrings(a.submolt, b.submolt),
    );
  }

  topConversations(snapshot: Snapshot): Conversation[] {
    const cutoff = Date.parse(snapshot.captured_at) - this.options.recencyWindowHours * 60 * 60 * 1000;

    return snapshot.records
      .filter((r) => Date.parse(r.created_at) >= cutoff)
      .map((r) => ({
        id: r.id,
        kind: r.kind,
        submolt: r.submolt,
        author: r.author,
        excerpt: excerpt(r.body),
        upvotes: r.upvotes,
        comment_count: r.comment_count,
        score: conversationScore(r),
      }))
      .sort((a, b) => b.score - a.score || compareStrings(a.id, b.id))
      .slice(0, this.options.conversationLimit);
  }

  authorActivity(records: readonly FeedRecord[]): AuthorActivity {
    if (records.length === 0) return emptyAuthors();

    const byAuthor = new Map<string, { records: number; upvotes: number }>();
    for (const record of records) {
      const entry = byAuthor.get(record.author) ?? { records: 0, upvotes: 0 };
      entry.records++;
      entry.upvotes += record.upvotes;
      byAuthor.set(record.author, entry);
    }

    const counts = [...byAuthor.values()].map((a) => a.records);
    return {
      unique_authors: byAuthor.size,
      average_records_per_author: round(records.length / byAuthor.size, 2),
      prolific_authors: counts.filter((c) => c >= 3).length,
      one_time_authors: counts.filter((c) => c === 1).length,
      top_authors: [...byAuthor.entries()]
        .map(([author, stats]) => ({ author, ...stats }))
        .sort((a, b) => b.records - a.records || b.upvotes - a.upvotes || compareStrings(a.author, b.author))
        .slice(0, this.options.topAuthorLimit),
    };
  }

  private emptyReport(current: Snapshot, hasPrevious: boolean): TrendReport {
    return {
      generated_at: current.captured_at,
      record_count: 0,
      unigrams: [],
      bigrams: [],
      has_previous: hasPrevious,
      deltas: [],
      submolts: [],
      conversations: [],
      authors: emptyAuthors(),
      sentiment: this.sentiment.summarize([]),
    };
  }
}

function merge(tf: TermFrequency): Map<string, number> {
  return new Map([...tf.unigrams, ...tf.bigrams]);
}
