import { z } from 'zod';
import type { MoltbookConfig } from '../config.js';
import { formatRetryAfter, tryAcquire, type RateBudget } from '../engagement/rate-limiter.js';
import { errorMessage, InputError } from '../errors.js';
import { parseRecord, toSnapshot } from './records.js';
import type { CommentThread, FeedRecord, ScraperResult } from './types.js';

const nameField = z.union([
  z.string(),
  z.object({ name: z.string().optional(), display_name: z.string().optional() }).passthrough(),
]);

const moltbookPostSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    title: z.string().nullish(),
    content: z.string().nullish(),
    submolt: nameField.nullish(),
    author: nameField.nullish(),
    upvotes: z.number().nullish(),
    score: z.number().nullish(),
    comment_count: z.number().nullish(),
    created_at: z.string().nullish(),
  })
  .passthrough();

const moltbookCommentSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    content: z.string().nullish(),
    author: nameField.nullish(),
    upvotes: z.number().nullish(),
    score: z.number().nullish(),
    reply_count: z.number().nullish(),
    created_at: z.string().nullish(),
  })
  .passthrough();

type MoltbookPost = z.infer<typeof moltbookPostSchema>;
type MoltbookComment = z.infer<typeof moltbookCommentSchema>;

export interface ScrapeOptions {
  /** Pause between comment requests; the API allows ~100 req/min. */
  delayMs?: number;
  now?: Date;
  /** Every GET spends one call; once denied, no further requests are made. */
  apiBudget?: RateBudget;
}

export interface CommentThreadResult {
  threads: CommentThread[];
  errors: string[];
  apiBudget?: RateBudget;
}

function nameOf(value: z.infer<typeof nameField> | null | undefined): string | undefined {
  if (!value) return undefined;
  if (typeof value === 'string') return value || undefined;
  return value.name || value.display_name || undefined;
}

function votesOf(item: { upvotes?: number | null; score?: number | null }): number {
  return Math.max(0, Math.trunc(item.upvotes ?? item.score ?? 0));
}

/** Lists come back either bare or wrapped as `{ posts: [...] }` / `{ comments: [...] }`. */
function unwrapList(body: unknown, key: 'posts' | 'comments'): unknown[] {
  if (Array.isArray(body)) return body;
  if (typeof body === 'object' && body !== null && key in body) {
    const inner: unknown = Reflect.get(body, key);
    if (Array.isArray(inner)) return inner;
  }
  return [];
}

function parseItems<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, items: unknown[], errors: string[], what: string): T[] {
  const parsed: T[] = [];
  for (const item of items) {
    const result = schema.safeParse(item);
    if (result.success) parsed.push(result.data);
    else errors.push(`Moltbook ${what}: skipped malformed item (${result.error.issues[0]?.message ?? 'invalid'})`);
  }
  return parsed;
}

/** Authenticated GETs against one API budget. */
class ApiSession {
  private exhausted = false;

  constructor(
    private readonly config: MoltbookConfig,
    private readonly apiKey: string,
    private readonly errors: string[],
    private readonly now: Date,
    public budget: RateBudget | undefined,
  ) {}

  /** Spend one call; false once the budget is used up. */
  acquire(): boolean {
    if (!this.budget) return true;
    const attempt = tryAcquire(this.budget, this.now);
    this.budget = attempt.budget;
    if (attempt.decision.allowed) return true;

    if (!this.exhausted) {
      this.exhausted = true;
      this.errors.push(`Moltbook API budget exhausted; retry in ${formatRetryAfter(attempt.decision.retry_after_ms)}`);
    }
    return false;
  }

  async getJson(path: string): Promise<unknown> {
    const res = await fetch(`${this.config.apiUrl}${path}`, {
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
    });

    if (!res.ok) {
      throw new Error(`Moltbook GET ${path.split('?')[0]} returned ${res.status}`);
    }

    return res.json();
  }
}

const MISSING_KEY = 'Missing MOLTBOOK_API_KEY in environment. Register at POST https://www.moltbook.com/api/v1/agents/register';

function pause(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function postRecord(post: MoltbookPost, submoltHint?: string): Record<string, unknown> {
  return {
    id: String(post.id),
    kind: 'post',
    body: [post.title, post.content].filter(Boolean).join('\n\n'),
    author: nameOf(post.author) ?? 'unknown',
    submolt: nameOf(post.submolt) ?? submoltHint ?? 'general',
    upvotes: votesOf(post),
    comment_count: Math.max(0, Math.trunc(post.comment_count ?? 0)),
    created_at: post.created_at,
  };
}

function commentRecord(comment: MoltbookComment, submolt: string): Record<string, unknown> {
  return {
    id: `comment-${comment.id}`,
    kind: 'comment',
    body: comment.content,
    author: nameOf(comment.author) ?? 'unknown',
    submolt,
    upvotes: votesOf(comment),
    comment_count: Math.max(0, Math.trunc(comment.reply_count ?? 0)),
    created_at: comment.created_at,
  };
}

/**
 * Pull hot/new/top posts, the target submolt feeds and top comments of
 * well-voted posts into one `current` snapshot. Request failures are
 * collected in `errors`; whatever was fetched is still returned.
 */
export async function scrapeMoltbook(config: MoltbookConfig, options: ScrapeOptions = {}): Promise<ScraperResult> {
  const errors: string[] = [];
  const raw: Record<string, unknown>[] = [];
  const capturedAt = options.now ?? new Date();
  const delayMs = options.delayMs ?? 700;

  const apiKey = config.apiKey;
  if (!apiKey) {
    errors.push(MISSING_KEY);
    return { source: 'moltbook', snapshot: toSnapshot('current', capturedAt, []).snapshot, errors };
  }

  const api = new ApiSession(config, apiKey, errors, capturedAt, options.apiBudget);
  const posts: Array<{ post: MoltbookPost; submolt?: string }> = [];
  const limits = config.scrapeLimits;

  for (const sort of ['hot', 'new', 'top'] as const) {
    if (limits[sort] === 0 || !api.acquire()) continue;
    try {
      const body = await api.getJson(`/posts?sort=${sort}&limit=${limits[sort]}`);
      for (const post of parseItems(moltbookPostSchema, unwrapList(body, 'posts'), errors, `${sort} posts`)) {
        posts.push({ post });
      }
    } catch (err) {
      errors.push(`Moltbook ${sort} posts: ${errorMessage(err)}`);
    }
  }

  for (const submolt of config.targetSubmolts) {
    if (limits.submoltPosts === 0) break;
    if (!api.acquire()) continue;
    try {
      const body = await api.getJson(`/submolts/${encodeURIComponent(submolt)}/feed?sort=hot&limit=${limits.submoltPosts}`);
      for (const post of parseItems(moltbookPostSchema, unwrapList(body, 'posts'), errors, `m/${submolt} feed`)) {
        posts.push({ post, submolt });
      }
    } catch (err) {
      errors.push(`Moltbook m/${submolt} feed: ${errorMessage(err)}`);
    }
  }

  const commentsFetched = new Set<string>();
  for (const { post, submolt } of posts) {
    const record = postRecord(post, submolt);
    raw.push(record);

    const postId = String(post.id);
    if (limits.comments === 0 || votesOf(post) < config.minVotesForComments || commentsFetched.has(postId)) continue;
    commentsFetched.add(postId);
    if (!api.acquire()) continue;

    try {
      const body = await api.getJson(`/posts/${encodeURIComponent(postId)}/comments?sort=top`);
      const comments = parseItems(moltbookCommentSchema, unwrapList(body, 'comments'), errors, `comments for post ${postId}`);
      for (const comment of comments.slice(0, limits.comments)) {
        raw.push(commentRecord(comment, String(record.submolt)));
      }
      if (delayMs > 0) await pause(delayMs);
    } catch (err) {
      errors.push(`Moltbook comments for post ${postId}: ${errorMessage(err)}`);
    }
  }

  const { snapshot, errors: inputErrors } = toSnapshot('current', capturedAt, raw);
  errors.push(...inputErrors.map((e) => e.message));

  return { source: 'moltbook', snapshot, errors, apiBudget: api.budget };
}

/**
 * Newest comments on the given posts, for replying on our own threads.
 * Shares the API budget rules of `scrapeMoltbook`.
 */
export async function scrapeComments(
  config: MoltbookConfig,
  postIds: readonly string[],
  options: ScrapeOptions = {},
): Promise<CommentThreadResult> {
  const errors: string[] = [];
  const threads: CommentThreadResult['threads'] = [];
  const now = options.now ?? new Date();
  const delayMs = options.delayMs ?? 700;

  const apiKey = config.apiKey;
  if (!apiKey) {
    errors.push(MISSING_KEY);
    return { threads, errors };
  }

  const api = new ApiSession(config, apiKey, errors, now, options.apiBudget);
  for (const postId of postIds) {
    if (!api.acquire()) continue;
    try {
      const body = await api.getJson(`/posts/${encodeURIComponent(postId)}/comments?sort=new`);
      const comments: FeedRecord[] = [];
      for (const comment of parseItems(moltbookCommentSchema, unwrapList(body, 'comments'), errors, `comments for post ${postId}`)) {
        try {
          comments.push(parseRecord(commentRecord(comment, config.reportSubmolt)));
        } catch (err) {
          if (!(err instanceof InputError)) throw err;
          errors.push(err.message);
        }
      }
      threads.push({ postId, comments });
      if (delayMs > 0) await pause(delayMs);
    } catch (err) {
      errors.push(`Moltbook comments for post ${postId}: ${errorMessage(err)}`);
    }
  }

  return { threads, errors, apiBudget: api.budget };
}
