import { readFileSync } from 'node:fs';
import { createLexicon } from '../src/analysis/lexicon.js';
import { buildConfig } from '../src/config.js';
import { createTemplates } from '../src/engagement/templates.js';
import type { FeedRecord, Snapshot, WindowLabel } from '../src/scrapers/types.js';

export const settings: unknown = JSON.parse(readFileSync('config/settings.json', 'utf-8'));
export const config = buildConfig(settings, {});
export const lexicon = createLexicon(JSON.parse(readFileSync('config/lexicon.json', 'utf-8')));
export const tokenizer = config.tokenizer;

export const CAPTURED_AT = '2026-02-15T12:00:00.000Z';

export const makeRecord = (overrides: Partial<FeedRecord> & { id: string }): FeedRecord => ({
  kind: 'post',
  body: 'placeholder body',
  author: 'tester',
  submolt: 'general',
  upvotes: 0,
  comment_count: 0,
  created_at: '2026-02-15T11:00:00.000Z',
  ...overrides,
});

export const makeSnapshot = (records: FeedRecord[], label: WindowLabel = 'current', captured_at = CAPTURED_AT): Snapshot => ({
  label,
  captured_at,
  records,
});

export const templates = createTemplates(JSON.parse(readFileSync('config/templates.json', 'utf-8')));
