import type { FeedRecord } from '../scrapers/types.js';
import { byCountThenTerm, compareStrings, excerpt, round } from '../utils/text.js';
import type { Lexicon } from './lexicon.js';
import { normalize, type TokenizerOptions } from './tokenizer.js';
import type { ScoredRecord, SentimentLabel, SentimentResult, SentimentSummary, TermCount } from './types.js';

export interface SentimentThresholds {
  positive: number;
  negative: number;
}

export const DEFAULT_THRESHOLDS: SentimentThresholds = { positive: 0.05, negative: -0.05 };

const TOP_RECORDS = 5;
const TOP_TERMS = 10;

export class SentimentScorer {
  constructor(
    private readonly lexicon: Lexicon,
    private readonly tokenizer: TokenizerOptions,
    private readonly thresholds: SentimentThresholds = DEFAULT_THRESHOLDS,
  ) {}

  /**
   * Sum of lexicon weights divided by token count. Unknown terms weigh 0, so
   * a sequence with no lexicon terms is neutral with score 0.
   */
  score(tokens: readonly string[]): SentimentResult {
    if (tokens.length === 0) return { label: 'neutral', score: 0 };

    let sum = 0;
    for (const token of tokens) {
      sum += this.lexicon.get(token) ?? 0;
    }

    // label from the raw mean; only the reported score is rounded
    const raw = sum / tokens.length;
    const score = round(raw, 3);
    return { label: this.classify(raw), score: score === 0 ? 0 : score };
  }

  scoreText(text: string): SentimentResult {
    return this.score(normalize(text, this.tokenizer));
  }

  classify(score: number): SentimentLabel {
    if (score > this.thresholds.positive) return 'positive';
    if (score < this.thresholds.negative) return 'negative';
    return 'neutral';
  }

  /**
   * Distribution over a batch. Every record counts once, whatever its
   * engagement.
   */
  summarize(records: readonly FeedRecord[]): SentimentSummary {
    const distribution: Record<SentimentLabel, number> = { positive: 0, neutral: 0, negative: 0 };
    const scored: ScoredRecord[] = [];
    const positiveTerms = new Map<string, number>();
    const negativeTerms = new Map<string, number>();
    let total = 0;

    for (const record of records) {
      const tokens = normalize(record.body, this.tokenizer);
      const result = this.score(tokens);
      distribution[result.label]++;
      total += result.score;
      scored.push({ id: record.id, excerpt: excerpt(record.body), ...result });

      for (const token of tokens) {
        const weight = this.lexicon.get(token) ?? 0;
        if (weight > 0) positiveTerms.set(token, (positiveTerms.get(token) ?? 0) + 1);
        else if (weight < 0) negativeTerms.set(token, (negativeTerms.get(token) ?? 0) + 1);
      }
    }

    const n = records.length;
    const pct = (count: number): number => (n === 0 ? 0 : round((count / n) * 100, 1));

    return {
      total: n,
      distribution,
      percentages: {
        positive: pct(distribution.positive),
        neutral: pct(distribution.neutral),
        negative: pct(distribution.negative),
      },
      average_score: n === 0 ? 0 : round(total / n, 3),
      top_positive: scored
        .filter((r) => r.score > 0)
        .sort((a, b) => b.score - a.score || compareStrings(a.id, b.id))
        .slice(0, TOP_RECORDS),
      top_negative: scored
        .filter((r) => r.score < 0)
        .sort((a, b) => a.score - b.score || compareStrings(a.id, b.id))
        .slice(0, TOP_RECORDS),
      positive_terms: rankCounts(positiveTerms).slice(0, TOP_TERMS),
      negative_terms: rankCounts(negativeTerms).slice(0, TOP_TERMS),
    };
  }
}

function rankCounts(counts: ReadonlyMap<string, number>): TermCount[] {
  return [...counts.entries()].map(([term, count]) => ({ term, count })).sort(byCountThenTerm);
}
