import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { MoltbookConfig } from '../src/config.js';
import { createBudget } from '../src/engagement/rate-limiter.js';
import { scrapeComments, scrapeMoltbook } from '../src/scrapers/moltbook.js';

// Mock fetch globally
const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
});

const now = new Date('2026-02-15T12:00:00Z');
const HOUR = 60 * 60 * 1000;

function moltbookConfig(overrides: Partial<MoltbookConfig> = {}): MoltbookConfig {
  return {
    apiUrl: 'https://moltbook.test/api/v1',
    apiKey: 'test-key',
    scrapeLimits: { hot: 2, new: 0, top: 0, comments: 2, submoltPosts: 0 },
    targetSubmolts: [],
    minVotesForComments: 5,
    reportSubmolt: 'agentintelligence',
    agentName: 'molttrend',
    ...overrides,
  };
}

const jsonResponse = (body: unknown) => ({ ok: true, status: 200, json: () => Promise.resolve(body) });

const hotPosts = {
  posts: [
    {
      id: 'p1',
      title: 'Memory tooling',
      content: 'Agents share memory tools',
      submolt: { name: 'agents' },
      author: { name: 'alpha-bot' },
      upvotes: 10,
      comment_count: 4,
      created_at: '2026-02-15T10:00:00Z',
    },
    {
      id: 'p2',
      title: 'Quiet thread',
      content: null,
      submolt: 'builds',
      author: 'beta-bot',
      score: 1,
      created_at: '2026-02-15T11:00:00Z',
    },
  ],
};

const p1Comments = {
  comments: [
    { id: 'c1', content: 'Great tools', author: { name: 'gamma' }, upvotes: 3, created_at: '2026-02-15T10:30:00Z' },
    { id: 'c2', content: 'Agreed', author: 'delta', score: 1, created_at: '2026-02-15T10:40:00Z' },
    { id: 'c3', content: 'Past the limit', author: 'eps', created_at: '2026-02-15T10:50:00Z' },
  ],
};

describe('Moltbook scraper', () => {
  it('collects posts and top comments of well-voted posts into one snapshot', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(hotPosts)).mockResolvedValueOnce(jsonResponse(p1Comments));

    const result = await scrapeMoltbook(moltbookConfig(), { delayMs: 0, now });

    expect(result.source).toBe('moltbook');
    expect(result.errors).toEqual([]);
    expect(result.snapshot.label).toBe('current');
    expect(result.snapshot.captured_at).toBe('2026-02-15T12:00:00.000Z');
    expect(result.snapshot.records.map((r) => r.id)).toEqual(['p1', 'comment-c1', 'comment-c2', 'p2']);

    const [p1, c1, , p2] = result.snapshot.records;
    expect(p1).toEqual({
      id: 'p1',
      kind: 'post',
      body: 'Memory tooling\n\nAgents share memory tools',
      author: 'alpha-bot',
      submolt: 'agents',
      upvotes: 10,
      comment_count: 4,
      created_at: '2026-02-15T10:00:00.000Z',
    });
    expect(c1).toMatchObject({ kind: 'comment', submolt: 'agents', author: 'gamma', body: 'Great tools' });
    expect(p2).toMatchObject({ body: 'Quiet thread', submolt: 'builds', author: 'beta-bot', upvotes: 1 });
  });

  it('calls the API with bearer auth', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse([]));

    await scrapeMoltbook(moltbookConfig(), { delayMs: 0, now });

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://moltbook.test/api/v1/posts?sort=hot&limit=2');
    expect(init.headers.Authorization).toBe('Bearer test-key');
  });

  it('tags posts from a submolt feed with that submolt', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ posts: [{ id: 9, title: 'Feed post', upvotes: 0, created_at: '2026-02-15T09:00:00Z' }] }),
    );

    const result = await scrapeMoltbook(
      moltbookConfig({
        targetSubmolts: ['philosophy'],
        scrapeLimits: { hot: 0, new: 0, top: 0, comments: 2, submoltPosts: 3 },
      }),
      { delayMs: 0, now },
    );

    expect(mockFetch.mock.calls[0][0]).toBe('https://moltbook.test/api/v1/submolts/philosophy/feed?sort=hot&limit=3');
    expect(result.snapshot.records).toHaveLength(1);
    expect(result.snapshot.records[0]).toMatchObject({ id: '9', submolt: 'philosophy' });
  });

  it('reports HTTP failures and keeps what it could fetch', async () => {
    mockFetch
      .mockResolvedValueOnce({ ok: false, status: 429 })
      .mockResolvedValueOnce(jsonResponse({ posts: [{ id: 'n1', title: 'New one', created_at: '2026-02-15T11:30:00Z' }] }));

    const result = await scrapeMoltbook(
      moltbookConfig({ scrapeLimits: { hot: 2, new: 2, top: 0, comments: 0, submoltPosts: 0 } }),
      { delayMs: 0, now },
    );

    expect(result.errors).toEqual(['Moltbook hot posts: Moltbook GET /posts returned 429']);
    expect(result.snapshot.records.map((r) => r.id)).toEqual(['n1']);
  });

  it('skips records that fail validation', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        posts: [
          { id: 'ok', title: 'Fine', created_at: '2026-02-15T11:00:00Z' },
          { id: 'undated', title: 'No timestamp' },
          { title: 'No id at all', created_at: '2026-02-15T11:00:00Z' },
        ],
      }),
    );

    const result = await scrapeMoltbook(moltbookConfig(), { delayMs: 0, now });

    expect(result.snapshot.records.map((r) => r.id)).toEqual(['ok']);
    expect(result.errors).toHaveLength(2);
    expect(result.errors[0]).toMatch(/^Moltbook hot posts: skipped malformed item/);
    expect(result.errors[1]).toMatch(/^Malformed record undated: created_at/);
  });

  it('returns an empty snapshot without calling the API when no key is set', async () => {
    const result = await scrapeMoltbook(moltbookConfig({ apiKey: undefined }), { now });

    expect(mockFetch).not.toHaveBeenCalled();
    expect(result.snapshot.records).toEqual([]);
    expect(result.errors[0]).toContain('MOLTBOOK_API_KEY');
  });

  it('stops requesting once the API budget is spent', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(hotPosts)).mockResolvedValueOnce(jsonResponse([]));

    const result = await scrapeMoltbook(
      moltbookConfig({ scrapeLimits: { hot: 2, new: 2, top: 0, comments: 2, submoltPosts: 0 } }),
      { delayMs: 0, now, apiBudget: createBudget(2, HOUR, now) },
    );

    // hot and new were fetched; the comments of p1 were not
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(result.errors).toEqual(['Moltbook API budget exhausted; retry in 1h']);
    expect(result.snapshot.records.map((r) => r.id)).toEqual(['p1', 'p2']);
    expect(result.apiBudget).toEqual({ window_start: now.getTime(), calls_made: 2, max_calls: 2, window_duration_ms: HOUR });
  });

  it('makes no request when the budget is already used up', async () => {
    const spent = { ...createBudget(5, HOUR, now), calls_made: 5, window_start: now.getTime() - 30 * 60 * 1000 };

    const result = await scrapeMoltbook(moltbookConfig(), { delayMs: 0, now, apiBudget: spent });

    expect(mockFetch).not.toHaveBeenCalled();
    expect(result.errors).toEqual(['Moltbook API budget exhausted; retry in 30m']);
    expect(result.snapshot.records).toEqual([]);
  });
});

describe('Moltbook comment threads', () => {
  it('fetches newest comments for each post', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(p1Comments)).mockResolvedValueOnce(jsonResponse({ comments: [] }));

    const result = await scrapeComments(moltbookConfig(), ['p1', 'p9'], { delayMs: 0, now });

    expect(mockFetch.mock.calls[0][0]).toBe('https://moltbook.test/api/v1/posts/p1/comments?sort=new');
    expect(result.errors).toEqual([]);
    expect(result.threads.map((t) => [t.postId, t.comments.map((c) => c.id)])).toEqual([
      ['p1', ['comment-c1', 'comment-c2', 'comment-c3']],
      ['p9', []],
    ]);
    expect(result.threads[0].comments[0]).toMatchObject({ kind: 'comment', author: 'gamma', submolt: 'agentintelligence' });
  });

  it('reports undated comments and keeps the rest', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse([
        { id: 'c1', content: 'Dated', author: 'gamma', created_at: '2026-02-15T10:30:00Z' },
        { id: 'c2', content: 'Undated', author: 'delta' },
      ]),
    );

    const result = await scrapeComments(moltbookConfig(), ['p1'], { delayMs: 0, now });

    expect(result.threads[0].comments.map((c) => c.id)).toEqual(['comment-c1']);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^Malformed record comment-c2: created_at/);
  });

  it('spends one budget call per post', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse([]));

    const result = await scrapeComments(moltbookConfig(), ['p1', 'p2'], {
      delayMs: 0,
      now,
      apiBudget: createBudget(1, HOUR, now),
    });

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(result.threads).toEqual([{ postId: 'p1', comments: [] }]);
    expect(result.errors).toEqual(['Moltbook API budget exhausted; retry in 1h']);
  });
});
