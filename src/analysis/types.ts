export type SentimentLabel = 'positive' | 'neutral' | 'negative';

export interface SentimentResult {
  label: SentimentLabel;
  score: number; // roughly -1..1
}

export interface ScoredRecord extends SentimentResult {
  id: string;
  excerpt: string;
}

export interface TermCount {
  term: string;
  count: number;
}

export interface SentimentSummary {
  total: number;
  distribution: Record<SentimentLabel, number>;
  percentages: Record<SentimentLabel, number>;
  average_score: number;
  top_positive: ScoredRecord[];
  top_negative: ScoredRecord[];
  positive_terms: TermCount[];
  negative_terms: TermCount[];
}

export interface RankedTerm extends TermCount {
  frequency: number; // share of all terms of the same arity, 0-1
}

export type TrendDirection = 'up' | 'down' | 'stable';

export interface TrendDelta {
  term: string;
  current_count: number;
  previous_count: number;
  change_pct: number; // percentage, -100 to +Infinity
  direction: TrendDirection;
}

export interface SubmoltActivity {
  submolt: string;
  record_count: number;
  total_upvotes: number;
  total_comments: number;
  engagement_score: number;
}

export interface Conversation {
  id: string;
  kind: 'post' | 'comment';
  submolt: string;
  author: string;
  excerpt: string;
  upvotes: number;
  comment_count: number;
  score: number;
}

export interface AuthorActivity {
  unique_authors: number;
  average_records_per_author: number;
  prolific_authors: number; // 3+ records
  one_time_authors: number;
  top_authors: Array<{ author: string; records: number; upvotes: number }>;
}

export interface TrendReport {
  generated_at: string;
  record_count: number;
  unigrams: RankedTerm[];
  bigrams: RankedTerm[];
  has_previous: boolean;
  deltas: TrendDelta[];
  submolts: SubmoltActivity[];
  conversations: Conversation[];
  authors: AuthorActivity;
  sentiment: SentimentSummary;
}
