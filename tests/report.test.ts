import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { TrendReport } from '../src/analysis/types.js';
import { generateMarkdownReport, generatePostDraft, generateRssFeed, publishReport } from '../src/publisher/report.js';

const testDate = new Date('2026-02-15T12:00:00Z');

const testReport: TrendReport = {
  generated_at: '2026-02-15T12:00:00.000Z',
  record_count: 3,
  unigrams: [
    { term: 'memory', count: 3, frequency: 0.5 },
    { term: 'agents', count: 2, frequency: 0.3333 },
    { term: 'tools', count: 1, frequency: 0.1667 },
  ],
  bigrams: [{ term: 'agent memory', count: 2, frequency: 1 }],
  has_previous: true,
  deltas: [
    { term: 'memory', current_count: 3, previous_count: 1, change_pct: 200, direction: 'up' },
    { term: 'tools', current_count: 1, previous_count: 1, change_pct: 0, direction: 'stable' },
    { term: 'agents', current_count: 2, previous_count: 4, change_pct: -50, direction: 'down' },
  ],
  submolts: [{ submolt: 'agents', record_count: 2, total_upvotes: 12, total_comments: 3, engagement_score: 18 }],
  conversations: [
    {
      id: 'p1',
      kind: 'post',
      submolt: 'agents',
      author: 'alpha-bot',
      excerpt: 'Memory tools',
      upvotes: 10,
      comment_count: 2,
      score: 14,
    },
  ],
  authors: {
    unique_authors: 2,
    average_records_per_author: 1.5,
    prolific_authors: 0,
    one_time_authors: 1,
    top_authors: [
      { author: 'alpha-bot', records: 2, upvotes: 11 },
      { author: 'beta-bot', records: 1, upvotes: 1 },
    ],
  },
  sentiment: {
    total: 3,
    distribution: { positive: 1, neutral: 2, negative: 0 },
    percentages: { positive: 33.3, neutral: 66.7, negative: 0 },
    average_score: 0.111,
    top_positive: [],
    top_negative: [],
    positive_terms: [{ term: 'great', count: 1 }],
    negative_terms: [],
  },
};

describe('Markdown report', () => {
  it('renders every section', () => {
    const md = generateMarkdownReport(testReport, testDate);

    expect(md).toContain('# Moltbook Trend Report — 2026-02-15');
    expect(md).toContain('> Generated 12:00 UTC from 3 posts and comments.');
    expect(md).toContain('1. **memory** — 3 mentions (50.0%)\n');
    expect(md).toContain('- **agent memory** (2x)\n');
    expect(md).toContain('**Rising:**\n- "memory" +200% (1 → 3)\n');
    expect(md).toContain('**Falling:**\n- "agents" -50% (4 → 2)\n');
    expect(md).toContain('| m/agents | 2 | 12 | 3 | 18 |\n');
    expect(md).toContain('- Positive: **33.3%**\n');
    expect(md).toContain('**Most used positive words:** great (1x)');
    expect(md).toContain('- m/agents @alpha-bot: "Memory tools" — 10 upvotes, 2 comments (score 14)\n');
    expect(md).toContain('**Most active:** @alpha-bot (2), @beta-bot (1)\n');
  });

  it('starts with frontmatter', () => {
    const md = generateMarkdownReport(testReport, testDate);
    expect(md.startsWith('---\ndate: 2026-02-15\nrecords_analyzed: 3\ncompared_with_previous: true\n---\n')).toBe(true);
  });

  it('omits the comparison section without a previous window', () => {
    const md = generateMarkdownReport({ ...testReport, has_previous: false }, testDate);
    expect(md).not.toContain('## Changes vs Previous Scan');
  });

  it('says so when the window is empty', () => {
    const md = generateMarkdownReport({ ...testReport, record_count: 0 }, testDate);

    expect(md.endsWith('No records in this window.\n')).toBe(true);
    expect(md).not.toContain('## Trending Terms');
  });
});

describe('Post draft', () => {
  it('summarizes topics, sentiment, submolts and risers', () => {
    const draft = generatePostDraft(testReport, testDate);

    expect(draft.title).toBe('Moltbook Trend Report — Feb 15');
    expect(draft.content).toBe(
      [
        '**Top topics:** memory, agents, tools',
        '',
        '**Sentiment:** 33.3% positive | 66.7% neutral | 0% negative',
        '',
        '**Records analyzed:** 3 from 2 agents',
        '',
        '**Active submolts:** m/agents (2)',
        '',
        '**Rising:**',
        '- "memory" +200% (1 → 3)',
      ].join('\n'),
    );
  });
});

describe('RSS feed', () => {
  it('produces an RSS 2.0 document with the draft as its item', () => {
    const xml = generateRssFeed(testReport, testDate);

    expect(xml).toContain('<rss version="2.0"');
    expect(xml).toContain('Moltbook Trend Report — Feb 15');
    expect(xml).toContain('/reports/2026-02-15.md');
  });
});

describe('publishReport', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'molttrend-report-'));
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it('writes markdown, JSON and the feed', async () => {
    const { files, errors } = await publishReport(testReport, outputDir, testDate);

    expect(errors).toEqual([]);
    expect(files).toEqual([
      join(outputDir, 'reports', '2026-02-15_1200.md'),
      join(outputDir, 'reports', '2026-02-15_1200.json'),
      join(outputDir, 'feed.xml'),
    ]);

    const json: unknown = JSON.parse(await readFile(files[1], 'utf-8'));
    expect(json).toEqual(testReport);
  });
});
