import type { RateBudget } from '../engagement/rate-limiter.js';

export type RecordKind = 'post' | 'comment';

export interface FeedRecord {
  id: string;
  kind: RecordKind;
  body: string;
  author: string;
  submolt: string;
  upvotes: number;
  comment_count: number;
  created_at: string; // ISO 8601, UTC
}

export type WindowLabel = 'current' | 'previous';

export interface Snapshot {
  label: WindowLabel;
  captured_at: string; // ISO 8601, UTC
  records: FeedRecord[];
}

/** Comments fetched for one post. */
export interface CommentThread {
  postId: string;
  comments: FeedRecord[];
}

export interface ScraperResult {
  source: 'moltbook';
  snapshot: Snapshot;
  errors: string[];
  /** The API budget after this run's requests, when one was given. */
  apiBudget?: RateBudget;
}
