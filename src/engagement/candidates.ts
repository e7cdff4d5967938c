import type { TokenizerOptions } from '../analysis/tokenizer.js';
import { conversationScore } from '../analysis/trends.js';
import type { TrendReport } from '../analysis/types.js';
import type { CommentThread, FeedRecord, Snapshot } from '../scrapers/types.js';
import { compareStrings } from '../utils/text.js';
import type { DedupGuard } from './dedup.js';
import type { EngagementState } from './state.js';
import { detectTopic, DEFAULT_TOPIC, fillTemplate, matchReply, postKeywords, templateValues, type Templates } from './templates.js';

export type Candidate =
  | { action: 'comment'; postId: string; text: string; targetId?: string }
  | { action: 'post'; submolt: string; title: string; text: string };

const MIN_BODY_LENGTH = 20;

/**
 * Builds template comments for trending posts and template replies for
 * comments left on our own posts. Nothing is published here; candidates go
 * through the engagement gate like any other.
 */
export class CandidatePlanner {
  constructor(
    private readonly templates: Templates,
    private readonly guard: DedupGuard,
    private readonly tokenizer: TokenizerOptions,
    private readonly agentName?: string,
  ) {}

  comments(report: TrendReport, snapshot: Snapshot, state: EngagementState, max: number): Candidate[] {
    const values = templateValues(report);
    const posts = snapshot.records
      .filter((r) => r.kind === 'post' && this.mayComment(r, state))
      .sort((a, b) => conversationScore(b) - conversationScore(a) || compareStrings(a.id, b.id));

    const planned = new Set<string>();
    const candidates: Candidate[] = [];
    for (const post of posts) {
      if (candidates.length >= max) break;
      const topic = detectTopic(this.templates, post);
      const pool = this.templates.comments[topic] ?? this.templates.comments[DEFAULT_TOPIC];

      for (const template of pool) {
        const text = this.withPostContext(fillTemplate(template, values), post.body);
        if (!this.isFresh(text, state, planned)) continue;
        candidates.push({ action: 'comment', postId: post.id, targetId: post.id, text });
        break;
      }
    }
    return candidates;
  }

  replies(threads: readonly CommentThread[], state: EngagementState, max: number): Candidate[] {
    const planned = new Set<string>();
    const candidates: Candidate[] = [];

    for (const thread of threads) {
      const usedPatterns = new Set<string>();
      const repliedAuthors = new Set<string>();

      for (const comment of thread.comments) {
        if (candidates.length >= max) return candidates;
        if (!this.mayReply(comment, state)) continue;

        const author = comment.author.toLowerCase();
        const match = matchReply(this.templates, comment.body);
        if (repliedAuthors.has(author) || usedPatterns.has(match.name)) continue;

        for (const reply of match.replies) {
          const text = `@${comment.author} ${reply}`;
          if (!this.isFresh(text, state, planned)) continue;
          candidates.push({ action: 'comment', postId: thread.postId, targetId: comment.id, text });
          usedPatterns.add(match.name);
          repliedAuthors.add(author);
          break;
        }
      }
    }
    return candidates;
  }

  /** Mention up to two of the post's own terms unless the comment already does. */
  withPostContext(text: string, postBody: string): string {
    const keywords = postKeywords(postBody, this.tokenizer, 2);
    const lower = text.toLowerCase();
    if (keywords.length === 0 || keywords.some((k) => lower.includes(k))) return text;
    return `${text} Noting themes like ${keywords.join(', ')} in this post.`;
  }

  private isFresh(text: string, state: EngagementState, planned: Set<string>): boolean {
    const decision = this.guard.mayPublish(text, state.history);
    if (decision.action !== 'allow' || planned.has(decision.signature)) return false;
    planned.add(decision.signature);
    return true;
  }

  private isOwn(author: string): boolean {
    return this.agentName !== undefined && author.toLowerCase() === this.agentName.toLowerCase();
  }

  private mayComment(post: FeedRecord, state: EngagementState): boolean {
    if (state.engaged.has(post.id) || state.ownPosts.includes(post.id) || this.isOwn(post.author)) return false;
    if (post.upvotes < 1 && post.comment_count < 1) return false;
    return post.body.trim().length >= MIN_BODY_LENGTH;
  }

  private mayReply(comment: FeedRecord, state: EngagementState): boolean {
    if (state.engaged.has(comment.id) || this.isOwn(comment.author)) return false;
    if (comment.author.toLowerCase().includes('bot')) return false;
    const body = comment.body.trim();
    if (body.length < MIN_BODY_LENGTH) return false;
    return !/^(https?:\/\/|!)/i.test(body);
  }
}
