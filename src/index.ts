export { normalize, bigrams, createTokenizerOptions, DEFAULT_MIN_TOKEN_LENGTH } from './analysis/tokenizer.js';
export type { TokenizerOptions } from './analysis/tokenizer.js';
export { createLexicon, loadLexicon } from './analysis/lexicon.js';
export type { Lexicon } from './analysis/lexicon.js';
export { SentimentScorer, DEFAULT_THRESHOLDS } from './analysis/sentiment.js';
export type { SentimentThresholds } from './analysis/sentiment.js';
export { TrendAnalyzer, DEFAULT_TREND_OPTIONS, conversationScore } from './analysis/trends.js';
export type { TrendOptions } from './analysis/trends.js';
export type * from './analysis/types.js';
export { computeDeltas, DEFAULT_STABLE_THRESHOLD } from './scoring/velocity.js';
export { DedupGuard, recordPublished, pruneHistory, DEFAULT_RETENTION_DAYS } from './engagement/dedup.js';
export type { DedupDecision, SignatureHistory, SuppressReason } from './engagement/dedup.js';
export { tryAcquire, createBudget, exhaustUntil, formatRetryAfter } from './engagement/rate-limiter.js';
export type { RateBudget, RateDecision } from './engagement/rate-limiter.js';
export { EngagementGate, budgetWithLimit } from './engagement/gate.js';
export type { GateVerdict, RateLimit } from './engagement/gate.js';
export { emptyState, serializeState, deserializeState, addOwnPost, ACTION_KINDS, OWN_POST_LIMIT } from './engagement/state.js';
export type { ActionKind, EngagementState } from './engagement/state.js';
export { createTemplates, loadTemplates, fillTemplate, templateValues, detectTopic, matchReply } from './engagement/templates.js';
export type { Templates, TemplateValues, ReplyPattern } from './engagement/templates.js';
export { CandidatePlanner } from './engagement/candidates.js';
export type { Candidate } from './engagement/candidates.js';
export { toSnapshot, parseRecord } from './scrapers/records.js';
export type { CommentThread, FeedRecord, Snapshot, WindowLabel } from './scrapers/types.js';
export type { LoadedSnapshots, Storage } from './db/types.js';
export { buildConfig, loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { InputError, ConfigError } from './errors.js';
