import { loadLexicon, type Lexicon } from './analysis/lexicon.js';
import { SentimentScorer } from './analysis/sentiment.js';
import { TrendAnalyzer } from './analysis/trends.js';
import type { TrendReport } from './analysis/types.js';
import type { AppConfig } from './config.js';
import { FileStore } from './db/file-store.js';
import { SupabaseStore, getClient } from './db/supabase.js';
import type { Storage } from './db/types.js';
import { CandidatePlanner, type Candidate } from './engagement/candidates.js';
import { DedupGuard } from './engagement/dedup.js';
import { budgetWithLimit, EngagementGate, type GateVerdict } from './engagement/gate.js';
import { formatRetryAfter } from './engagement/rate-limiter.js';
import { addOwnPost, emptyState, type EngagementState } from './engagement/state.js';
import { loadTemplates, type Templates } from './engagement/templates.js';
import type { Publisher } from './publisher/moltbook.js';
import { generatePostDraft } from './publisher/report.js';
import { withLabel } from './scrapers/records.js';
import { scrapeComments, scrapeMoltbook, type ScrapeOptions } from './scrapers/moltbook.js';
import type { Snapshot } from './scrapers/types.js';
import { errorMessage } from './errors.js';
import { truncate } from './utils/text.js';

export type { Candidate } from './engagement/candidates.js';

/** How many of our newest report posts are checked for replies. */
export const REPLY_POST_WINDOW = 10;

export interface Engine {
  analyzer: TrendAnalyzer;
  scorer: SentimentScorer;
  guard: DedupGuard;
  gate: EngagementGate;
  planner: CandidatePlanner;
}

export function createEngine(config: AppConfig, lexicon: Lexicon, templates: Templates): Engine {
  const scorer = new SentimentScorer(lexicon, config.tokenizer, config.sentiment);
  const analyzer = new TrendAnalyzer(config.tokenizer, scorer, {
    stableThreshold: config.trends.stableThreshold,
    recencyWindowHours: config.trends.recencyWindowHours,
  });
  const guard = new DedupGuard(config.tokenizer, config.engagement.denylist);
  const gate = new EngagementGate(guard, config.engagement.rateLimits, config.engagement.retentionDays);
  const planner = new CandidatePlanner(templates, guard, config.tokenizer, config.moltbook.agentName);
  return { analyzer, scorer, guard, gate, planner };
}

export async function loadEngine(config: AppConfig): Promise<Engine> {
  const [lexicon, templates] = await Promise.all([loadLexicon(config.lexiconPath), loadTemplates(config.templatesPath)]);
  return createEngine(config, lexicon, templates);
}

export function createStorage(config: AppConfig): Storage {
  const { supabase } = config.storage;
  if (supabase) return new SupabaseStore(getClient(supabase.url, supabase.key));
  return new FileStore(config.storage.dataDir, config.trends.snapshotRetention);
}

/**
 * Scrape one snapshot and store it. Requests spend the persisted `api`
 * budget, which is saved back with the rest of the engagement state.
 */
export async function runScrape(
  config: AppConfig,
  storage: Storage,
  options: ScrapeOptions = {},
): Promise<{ snapshot: Snapshot; stored: boolean; errors: string[] }> {
  const now = options.now ?? new Date();
  const state = (await storage.loadEngagementState()) ?? emptyState();
  const apiBudget = budgetWithLimit(state.budgets.api, config.engagement.rateLimits.api, now);

  const result = await scrapeMoltbook(config.moltbook, { ...options, now, apiBudget });
  const errors = [...result.errors];

  if (result.apiBudget) {
    try {
      await storage.saveEngagementState({ ...state, budgets: { ...state.budgets, api: result.apiBudget } });
    } catch (err) {
      errors.push(`Engagement state save failed: ${errorMessage(err)}`);
    }
  }

  if (result.snapshot.records.length === 0) {
    return { snapshot: result.snapshot, stored: false, errors };
  }

  try {
    await storage.saveSnapshot(result.snapshot);
    return { snapshot: result.snapshot, stored: true, errors };
  } catch (err) {
    errors.push(`Snapshot save failed: ${errorMessage(err)}`);
    return { snapshot: result.snapshot, stored: false, errors };
  }
}

/**
 * Analyze the newest stored snapshot against the one before it. Stored
 * records that no longer validate are skipped and reported in `errors`.
 */
export async function runAnalysis(
  engine: Engine,
  storage: Storage,
): Promise<{ report: TrendReport | null; snapshot: Snapshot | null; errors: string[] }> {
  const { snapshots, errors } = await storage.loadRecentSnapshots(2);
  const [latest, prior] = snapshots;

  if (!latest) {
    console.log('No snapshots stored yet. Run `molttrend scrape` first.');
    return { report: null, snapshot: null, errors };
  }

  const current = withLabel(latest, 'current');
  const previous = prior ? withLabel(prior, 'previous') : null;

  console.log(
    `Analyzing ${current.records.length} records captured ${current.captured_at}` +
      (previous ? ` against ${previous.records.length} from ${previous.captured_at}...` : ' (no previous window)...'),
  );

  const report = engine.analyzer.analyze(current, previous);
  const moving = report.deltas.filter((d) => d.direction !== 'stable').length;
  console.log(`  ${report.unigrams.length} terms, ${report.bigrams.length} phrases, ${moving} moving vs previous window`);
  console.log(
    `  Sentiment: ${report.sentiment.percentages.positive}% pos | ${report.sentiment.percentages.neutral}% neutral | ${report.sentiment.percentages.negative}% neg`,
  );

  return { report, snapshot: current, errors };
}

/** The report post for a submolt, ready for the gate. */
export function reportCandidate(report: TrendReport, submolt: string, date: Date): Candidate {
  const draft = generatePostDraft(report, date);
  return { action: 'post', submolt, title: draft.title, text: draft.content };
}

export type CandidateOutcome =
  | { target: string; status: 'published' | 'would-publish'; signature: string }
  | { target: string; status: 'suppressed'; verdict: Extract<GateVerdict, { action: 'suppress' }> }
  | { target: string; status: 'deferred'; retry_after_ms: number }
  | { target: string; status: 'failed'; error: string };

export interface EngageOptions {
  dryRun?: boolean;
  now?: () => Date;
}

interface EngageRun {
  state: EngagementState;
  outcomes: CandidateOutcome[];
  errors: string[];
}

function targetOf(candidate: Candidate): string {
  return candidate.action === 'post' ? `m/${candidate.submolt}` : candidate.postId;
}

/** The text the gate signs: a post's title counts as part of it. */
function gateText(candidate: Candidate): string {
  return candidate.action === 'post' ? `${candidate.title}\n\n${candidate.text}` : candidate.text;
}

async function loadState(engine: Engine, storage: Storage, now: Date): Promise<EngagementState> {
  const state = engine.gate.prune((await storage.loadEngagementState()) ?? emptyState(), now);
  console.log(`Engagement state: ${state.history.size} signatures, ${state.ownPosts.length} own posts on record`);
  return state;
}

/** Thread `state` through the gate for every candidate and publish what it allows. */
async function engageWith(
  engine: Engine,
  publisher: Publisher,
  initial: EngagementState,
  candidates: readonly Candidate[],
  options: EngageOptions,
): Promise<EngageRun> {
  const clock = options.now ?? (() => new Date());
  const errors: string[] = [];
  const outcomes: CandidateOutcome[] = [];
  let state = initial;

  for (const candidate of candidates) {
    const kind = candidate.action;
    const target = targetOf(candidate);
    const evaluated = engine.gate.evaluate(gateText(candidate), kind, state, clock());
    state = evaluated.state;
    const { verdict } = evaluated;

    if (verdict.action === 'suppress') {
      console.log(`  Suppressed (${verdict.reason}${verdict.pattern ? `: /${verdict.pattern}/` : ''}) for ${target}`);
      outcomes.push({ target, status: 'suppressed', verdict });
      continue;
    }

    if (verdict.action === 'defer') {
      console.log(`  Rate budget for ${kind} exhausted; retry in ${formatRetryAfter(verdict.retry_after_ms)}`);
      outcomes.push({ target, status: 'deferred', retry_after_ms: verdict.retry_after_ms });
      continue;
    }

    if (options.dryRun) {
      console.log(`  [DRY RUN] Would ${kind} on ${target}: "${truncate(candidate.text, 60)}"`);
      outcomes.push({ target, status: 'would-publish', signature: verdict.signature });
      continue;
    }

    const result =
      candidate.action === 'post'
        ? await publisher.createPost(candidate.submolt, candidate.title, candidate.text)
        : await publisher.createComment(candidate.postId, candidate.text);

    if (result.ok) {
      if (candidate.action === 'post') {
        state = engine.gate.commit(state, verdict.signature, clock());
        if (result.id !== undefined) state = addOwnPost(state, result.id);
        console.log(`  Posted to ${target}${result.id !== undefined ? ` as ${result.id}` : ''}`);
      } else {
        state = engine.gate.commit(state, verdict.signature, clock(), candidate.targetId ?? candidate.postId);
        console.log(`  Commented on ${target}`);
      }
      outcomes.push({ target, status: 'published', signature: verdict.signature });
      continue;
    }

    if (result.retry_after_ms !== undefined) {
      state = engine.gate.backoff(state, kind, clock(), result.retry_after_ms);
      console.log(`  Moltbook asked us to wait ${formatRetryAfter(result.retry_after_ms)} before the next ${kind}`);
    }
    errors.push(result.error);
    outcomes.push({ target, status: 'failed', error: result.error });
  }

  return { state, outcomes, errors };
}

/**
 * Route candidates through the gate and publish the ones it allows. State is
 * loaded once, pruned, threaded through every decision and saved once at the
 * end; a dry run saves nothing.
 */
export async function runEngagement(
  engine: Engine,
  storage: Storage,
  publisher: Publisher,
  candidates: readonly Candidate[],
  options: EngageOptions = {},
): Promise<{ outcomes: CandidateOutcome[]; errors: string[] }> {
  const clock = options.now ?? (() => new Date());
  const state = await loadState(engine, storage, clock());

  const run = await engageWith(engine, publisher, state, candidates, options);

  if (!options.dryRun) {
    await storage.saveEngagementState(run.state);
  }
  return { outcomes: run.outcomes, errors: run.errors };
}

/** Template comments on the most active posts of the newest snapshot. */
export async function runProactiveComments(
  engine: Engine,
  storage: Storage,
  publisher: Publisher,
  options: EngageOptions & { max: number },
): Promise<{ outcomes: CandidateOutcome[]; errors: string[] }> {
  const analysis = await runAnalysis(engine, storage);
  if (!analysis.report || !analysis.snapshot) return { outcomes: [], errors: analysis.errors };

  const clock = options.now ?? (() => new Date());
  const state = await loadState(engine, storage, clock());
  const candidates = engine.planner.comments(analysis.report, analysis.snapshot, state, options.max);
  console.log(`Planned ${candidates.length} comment(s) on trending posts`);

  const run = await engageWith(engine, publisher, state, candidates, options);
  if (!options.dryRun) {
    await storage.saveEngagementState(run.state);
  }
  return { outcomes: run.outcomes, errors: [...analysis.errors, ...run.errors] };
}

/**
 * Template replies to comments on our own report posts. Fetching the
 * comments spends the `api` budget.
 */
export async function runAutoReplies(
  engine: Engine,
  config: AppConfig,
  storage: Storage,
  publisher: Publisher,
  options: EngageOptions & { max: number; delayMs?: number },
): Promise<{ outcomes: CandidateOutcome[]; errors: string[] }> {
  const clock = options.now ?? (() => new Date());
  let state = await loadState(engine, storage, clock());

  if (state.ownPosts.length === 0) {
    console.log('No published reports on record; nothing to reply to.');
    return { outcomes: [], errors: [] };
  }

  const postIds = state.ownPosts.slice(-REPLY_POST_WINDOW).reverse();
  const fetched = await scrapeComments(config.moltbook, postIds, {
    delayMs: options.delayMs,
    now: clock(),
    apiBudget: engine.gate.budgetFor(state, 'api', clock()),
  });
  if (fetched.apiBudget) state = engine.gate.withBudget(state, 'api', fetched.apiBudget);

  const candidates = engine.planner.replies(fetched.threads, state, options.max);
  console.log(`Planned ${candidates.length} repl${candidates.length === 1 ? 'y' : 'ies'} on ${fetched.threads.length} post(s)`);

  const run = await engageWith(engine, publisher, state, candidates, options);
  if (!options.dryRun) {
    await storage.saveEngagementState(run.state);
  }
  return { outcomes: run.outcomes, errors: [...fetched.errors, ...run.errors] };
}
