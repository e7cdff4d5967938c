import { z } from 'zod';
import type { MoltbookConfig } from '../config.js';
import { errorMessage } from '../errors.js';

export type PublishOutcome =
  | { ok: true; status: number; id?: string }
  | { ok: false; status: number; error: string; retry_after_ms?: number };

export interface Publisher {
  createComment(postId: string, content: string): Promise<PublishOutcome>;
  createPost(submolt: string, title: string, content: string): Promise<PublishOutcome>;
}

const itemId = z.object({ id: z.union([z.string(), z.number()]) });

const createdIdSchema = z.union([z.object({ post: itemId }), z.object({ comment: itemId }), itemId]);

function retryAfterMs(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const at = Date.parse(header);
  return Number.isNaN(at) ? undefined : Math.max(0, at - Date.now());
}

/** Id of the created item, when the response names one. */
async function createdId(res: Response): Promise<string | undefined> {
  let body: unknown;
  try {
    body = await res.json();
  } catch {
    return undefined;
  }
  const parsed = createdIdSchema.safeParse(body);
  if (!parsed.success) return undefined;
  const data = parsed.data;
  if ('post' in data) return String(data.post.id);
  if ('comment' in data) return String(data.comment.id);
  return String(data.id);
}

/**
 * Comments go out through `POST /posts/{id}/comments`, posts through
 * `POST /posts`. A 2xx response is the only thing that counts as a confirmed
 * publish.
 */
export class MoltbookPublisher implements Publisher {
  constructor(private readonly config: MoltbookConfig) {}

  createComment(postId: string, content: string): Promise<PublishOutcome> {
    return this.send(`/posts/${encodeURIComponent(postId)}/comments`, { content }, 'comment');
  }

  createPost(submolt: string, title: string, content: string): Promise<PublishOutcome> {
    return this.send('/posts', { submolt, title, content }, 'post');
  }

  private async send(path: string, body: Record<string, string>, what: string): Promise<PublishOutcome> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      return { ok: false, status: 0, error: 'Missing MOLTBOOK_API_KEY in environment' };
    }

    try {
      const res = await fetch(`${this.config.apiUrl}${path}`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
      });

      if (res.ok) {
        const id = await createdId(res);
        return id === undefined ? { ok: true, status: res.status } : { ok: true, status: res.status, id };
      }

      const detail = (await res.text()).slice(0, 200);
      const retry = retryAfterMs(res.headers.get('retry-after'));
      return {
        ok: false,
        status: res.status,
        error: `Moltbook POST ${path} returned ${res.status}${detail ? `: ${detail}` : ''}`,
        ...(retry !== undefined ? { retry_after_ms: retry } : {}),
      };
    } catch (err) {
      return { ok: false, status: 0, error: `Moltbook ${what} failed: ${errorMessage(err)}` };
    }
  }
}
