import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { normalize, type TokenizerOptions } from '../analysis/tokenizer.js';
import type { TrendReport } from '../analysis/types.js';
import { ConfigError, errorMessage } from '../errors.js';
import type { FeedRecord } from '../scrapers/types.js';
import { byCountThenTerm } from '../utils/text.js';

const replyPatternSchema = z.object({
  name: z.string().min(1),
  triggers: z.array(z.string().min(1)).min(1),
  replies: z.array(z.string().min(1)).min(1),
});

const templatesSchema = z.object({
  comments: z
    .record(z.string(), z.array(z.string().min(1)))
    .refine((c) => (c['default'] ?? []).length > 0, 'needs a non-empty "default" list'),
  topicKeywords: z.record(z.string(), z.array(z.string().min(1))).default({}),
  submoltTopics: z.record(z.string(), z.string()).default({}),
  replyPatterns: z.array(replyPatternSchema).default([]),
  defaultReplies: z.array(z.string().min(1)).min(1),
});

export type Templates = z.infer<typeof templatesSchema>;
export type ReplyPattern = z.infer<typeof replyPatternSchema>;
export type TemplateValues = Record<string, string | number>;

export const DEFAULT_TOPIC = 'default';

const PLACEHOLDER = /\{([a-z_]+)\}/g;

export function createTemplates(data: unknown): Templates {
  const parsed = templatesSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid engagement templates',
      parsed.error.issues.map((i) => `${i.path.join('.') || 'templates'}: ${i.message}`),
    );
  }
  return parsed.data;
}

export async function loadTemplates(path: string): Promise<Templates> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read templates at ${path}: ${errorMessage(err)}`);
  }

  try {
    return createTemplates(JSON.parse(raw));
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`Templates at ${path} are not valid JSON: ${errorMessage(err)}`);
  }
}

/** Placeholder values drawn from a trend report. */
export function templateValues(report: TrendReport): TemplateValues {
  const { positive, negative, neutral } = report.sentiment.percentages;
  const top = report.unigrams.length > 0 ? report.unigrams[0].term : 'emerging topics';

  let sentimentLabel = 'balanced';
  if (positive > negative) sentimentLabel = 'optimistic';
  else if (negative > positive) sentimentLabel = 'cautious';

  return {
    top_kw: top,
    post_count: report.record_count,
    agent_count: report.authors.unique_authors,
    sentiment_label: sentimentLabel,
    pos_pct: positive,
    neg_pct: negative,
    neu_pct: neutral,
  };
}

/**
 * Replace `{name}` placeholders. Unknown names stay as written, which the
 * denylist then catches.
 */
export function fillTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER, (match: string, key: string) => (key in values ? String(values[key]) : match));
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function countHits(text: string, keywords: readonly string[]): number {
  let hits = 0;
  for (const keyword of keywords) {
    if (new RegExp(`\\b${escapeRegExp(keyword)}\\b`).test(text)) hits++;
  }
  return hits;
}

/**
 * Topic of a post by keyword hits. Title hits and a matching submolt count
 * double; no hits at all gives DEFAULT_TOPIC.
 */
export function detectTopic(templates: Templates, post: Pick<FeedRecord, 'body' | 'submolt'>): string {
  const [title, ...rest] = post.body.toLowerCase().split('\n\n');
  const content = rest.join(' ');
  const submoltTopic = templates.submoltTopics[post.submolt.toLowerCase()];

  let best = DEFAULT_TOPIC;
  let bestScore = 0;
  for (const [topic, keywords] of Object.entries(templates.topicKeywords)) {
    let score = countHits(content, keywords) + 2 * countHits(title, keywords);
    if (submoltTopic === topic) score += 2;
    if (score > bestScore) {
      best = topic;
      bestScore = score;
    }
  }
  return best;
}

/** Most frequent terms of a post, ties broken by term. */
export function postKeywords(body: string, tokenizer: TokenizerOptions, limit = 2): string[] {
  const counts = new Map<string, number>();
  for (const token of normalize(body, tokenizer)) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([term, count]) => ({ term, count }))
    .sort(byCountThenTerm)
    .slice(0, limit)
    .map((t) => t.term);
}

/** The reply pattern with the most trigger hits, or the default replies. */
export function matchReply(templates: Templates, text: string): { name: string; replies: string[] } {
  const lower = text.toLowerCase();
  let best: ReplyPattern | null = null;
  let bestScore = 0;
  for (const pattern of templates.replyPatterns) {
    const score = pattern.triggers.filter((t) => lower.includes(t.toLowerCase())).length;
    if (score > bestScore) {
      best = pattern;
      bestScore = score;
    }
  }
  return best ? { name: best.name, replies: best.replies } : { name: DEFAULT_TOPIC, replies: templates.defaultReplies };
}
