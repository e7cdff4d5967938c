import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { createTokenizerOptions, type TokenizerOptions } from './analysis/tokenizer.js';
import type { SentimentThresholds } from './analysis/sentiment.js';
import type { RateLimit } from './engagement/gate.js';
import type { ActionKind } from './engagement/state.js';
import { ConfigError, errorMessage } from './errors.js';

const DEFAULT_API_URL = 'https://www.moltbook.com/api/v1';

const rateLimitSchema = z.object({
  maxCalls: z.number().int().positive(),
  windowMinutes: z.number().positive(),
});

const settingsSchema = z.object({
  tokenizer: z.object({
    minTokenLength: z.number().int().min(1).default(3),
    stopWords: z.array(z.string()).default([]),
  }),
  sentiment: z
    .object({
      positiveThreshold: z.number().min(0).max(1).default(0.05),
      negativeThreshold: z.number().min(-1).max(0).default(-0.05),
    })
    .default({}),
  trends: z
    .object({
      stableThreshold: z.number().min(0).lt(1).default(0.1),
      recencyWindowHours: z.number().positive().default(6),
      snapshotRetention: z.number().int().min(2).default(20),
    })
    .default({}),
  engagement: z.object({
    retentionDays: z.number().positive().default(30),
    maxCommentsPerRun: z.number().int().nonnegative().default(3),
    maxRepliesPerRun: z.number().int().nonnegative().default(5),
    denylist: z.array(z.string().min(1)).default([]),
    rateLimits: z.object({
      comment: rateLimitSchema,
      post: rateLimitSchema,
      api: rateLimitSchema,
    }),
  }),
  moltbook: z
    .object({
      scrapeLimits: z
        .object({
          hot: z.number().int().nonnegative().default(25),
          new: z.number().int().nonnegative().default(25),
          top: z.number().int().nonnegative().default(25),
          comments: z.number().int().nonnegative().default(10),
          submoltPosts: z.number().int().nonnegative().default(15),
        })
        .default({}),
      targetSubmolts: z.array(z.string().min(1)).default([]),
      minVotesForComments: z.number().int().nonnegative().default(5),
      reportSubmolt: z.string().min(1).default('general'),
    })
    .default({}),
});

export type Settings = z.infer<typeof settingsSchema>;

export interface MoltbookConfig {
  apiUrl: string;
  apiKey: string | undefined;
  scrapeLimits: Settings['moltbook']['scrapeLimits'];
  targetSubmolts: string[];
  minVotesForComments: number;
  reportSubmolt: string;
  /** Our own agent name; its posts and comments are never engaged. */
  agentName: string | undefined;
}

export interface StorageConfig {
  dataDir: string;
  supabase: { url: string; key: string } | null;
}

export interface AppConfig {
  tokenizer: TokenizerOptions;
  sentiment: SentimentThresholds;
  trends: Settings['trends'];
  engagement: {
    retentionDays: number;
    maxCommentsPerRun: number;
    maxRepliesPerRun: number;
    denylist: string[];
    rateLimits: Record<ActionKind, RateLimit>;
  };
  moltbook: MoltbookConfig;
  storage: StorageConfig;
  lexiconPath: string;
  templatesPath: string;
}

export type Env = Record<string, string | undefined>;

function toRateLimit(limit: z.infer<typeof rateLimitSchema>): RateLimit {
  return { maxCalls: limit.maxCalls, windowMs: Math.round(limit.windowMinutes * 60_000) };
}

/**
 * Validate settings and combine them with the environment. Throws ConfigError
 * on any invalid value, so a bad threshold stops the run before analysis.
 */
export function buildConfig(settings: unknown, env: Env = process.env): AppConfig {
  const parsed = settingsSchema.safeParse(settings);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid settings',
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    );
  }
  const s = parsed.data;

  if (s.sentiment.negativeThreshold >= s.sentiment.positiveThreshold) {
    throw new ConfigError('Invalid settings', ['sentiment: negativeThreshold must be below positiveThreshold']);
  }

  const supabaseUrl = env.SUPABASE_URL;
  const supabaseKey = env.SUPABASE_ANON_KEY;
  if (Boolean(supabaseUrl) !== Boolean(supabaseKey)) {
    throw new ConfigError('Set both SUPABASE_URL and SUPABASE_ANON_KEY, or neither');
  }

  return {
    tokenizer: createTokenizerOptions(s.tokenizer.stopWords, s.tokenizer.minTokenLength),
    sentiment: { positive: s.sentiment.positiveThreshold, negative: s.sentiment.negativeThreshold },
    trends: s.trends,
    engagement: {
      retentionDays: s.engagement.retentionDays,
      maxCommentsPerRun: s.engagement.maxCommentsPerRun,
      maxRepliesPerRun: s.engagement.maxRepliesPerRun,
      denylist: s.engagement.denylist,
      rateLimits: {
        comment: toRateLimit(s.engagement.rateLimits.comment),
        post: toRateLimit(s.engagement.rateLimits.post),
        api: toRateLimit(s.engagement.rateLimits.api),
      },
    },
    moltbook: {
      apiUrl: env.MOLTBOOK_API_URL || DEFAULT_API_URL,
      apiKey: env.MOLTBOOK_API_KEY || undefined,
      scrapeLimits: s.moltbook.scrapeLimits,
      targetSubmolts: s.moltbook.targetSubmolts,
      minVotesForComments: s.moltbook.minVotesForComments,
      reportSubmolt: s.moltbook.reportSubmolt,
      agentName: env.MOLTBOOK_AGENT_NAME || undefined,
    },
    storage: {
      dataDir: resolve(env.MOLTTREND_DATA_DIR || 'data'),
      supabase: supabaseUrl && supabaseKey ? { url: supabaseUrl, key: supabaseKey } : null,
    },
    lexiconPath: resolve(env.MOLTTREND_LEXICON || 'config/lexicon.json'),
    templatesPath: resolve(env.MOLTTREND_TEMPLATES || 'config/templates.json'),
  };
}

export async function loadConfig(env: Env = process.env): Promise<AppConfig> {
  const path = resolve(env.MOLTTREND_SETTINGS || 'config/settings.json');

  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read settings at ${path}: ${errorMessage(err)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Settings at ${path} are not valid JSON: ${errorMessage(err)}`);
  }

  return buildConfig(data, env);
}
