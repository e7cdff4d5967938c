#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'node:path';
import { loadConfig, type AppConfig } from './config.js';
import { formatRetryAfter } from './engagement/rate-limiter.js';
import { ACTION_KINDS } from './engagement/state.js';
import { ConfigError } from './errors.js';
import {
  createStorage,
  loadEngine,
  reportCandidate,
  runAnalysis,
  runAutoReplies,
  runEngagement,
  runProactiveComments,
  runScrape,
  type CandidateOutcome,
} from './pipeline.js';
import { MoltbookPublisher } from './publisher/moltbook.js';
import { generatePostDraft, publishReport } from './publisher/report.js';

const program = new Command();

let configPromise: Promise<AppConfig> | null = null;
function config(): Promise<AppConfig> {
  configPromise ??= loadConfig();
  return configPromise;
}

function printErrors(errors: string[]): void {
  if (errors.length === 0) return;
  console.error('\nErrors:');
  for (const err of errors) {
    console.error(`  ${err}`);
  }
}

function printOutcomes(outcomes: CandidateOutcome[]): void {
  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'published':
      case 'would-publish':
        console.log(`${outcome.status}: ${outcome.target} (signature ${outcome.signature.slice(0, 12)})`);
        break;
      case 'suppressed':
        console.log(`suppressed: ${outcome.target} (${outcome.verdict.reason})`);
        break;
      case 'deferred':
        console.log(`deferred: ${outcome.target}, retry in ${formatRetryAfter(outcome.retry_after_ms)}`);
        break;
      case 'failed':
        console.log(`failed: ${outcome.target}`);
        break;
    }
  }
}

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Expected a whole number.');
  return n;
}

program
  .name('molttrend')
  .description('Moltbook trend intelligence: windowed keyword trends, lexicon sentiment, guarded engagement')
  .version('0.1.0');

program
  .command('scrape')
  .description('Scrape Moltbook and store a snapshot of the current window')
  .action(async () => {
    const cfg = await config();
    console.log('Starting scrape...');
    const start = Date.now();

    const { snapshot, stored, errors } = await runScrape(cfg, createStorage(cfg));

    const elapsed = ((Date.now() - start) / 1000).toFixed(1);
    const submolts = new Set(snapshot.records.map((r) => r.submolt)).size;
    console.log(`\nDone in ${elapsed}s: ${snapshot.records.length} records across ${submolts} submolts${stored ? ', snapshot stored' : ''}`);
    printErrors(errors);

    // fail only when nothing came back; records plus errors exit 0
    if (snapshot.records.length === 0 && errors.length > 0) {
      process.exit(1);
    }
  });

program
  .command('analyze')
  .description('Compare the latest snapshot with the previous one and write a report')
  .option('--output <dir>', 'Output directory', 'reports')
  .option('--draft', 'Print the short post draft as well')
  .option('--publish', 'Post the draft to the report submolt through the engagement gate')
  .option('--dry-run', 'With --publish: decide but do not post or save state')
  .action(async (opts: { output: string; draft?: boolean; publish?: boolean; dryRun?: boolean }) => {
    const cfg = await config();
    const engine = await loadEngine(cfg);
    const start = Date.now();

    const storage = createStorage(cfg);
    const { report, errors } = await runAnalysis(engine, storage);
    if (!report) {
      printErrors(errors);
      return;
    }

    const date = new Date(report.generated_at);
    const published = await publishReport(report, resolve(opts.output), date);
    errors.push(...published.errors);

    const elapsed = ((Date.now() - start) / 1000).toFixed(1);
    console.log(`\nDone in ${elapsed}s:`);
    for (const f of published.files) {
      console.log(`  ${f}`);
    }

    if (report.unigrams.length > 0) {
      console.log('\nTop terms:');
      for (const term of report.unigrams.slice(0, 5)) {
        console.log(`  ${term.term} (${term.count})`);
      }
    }

    if (opts.draft) {
      const draft = generatePostDraft(report, date);
      console.log(`\n${draft.title}\n\n${draft.content}`);
    }

    if (opts.publish) {
      console.log(`\nPublishing report to m/${cfg.moltbook.reportSubmolt}...`);
      const run = await runEngagement(
        engine,
        storage,
        new MoltbookPublisher(cfg.moltbook),
        [reportCandidate(report, cfg.moltbook.reportSubmolt, date)],
        { dryRun: opts.dryRun },
      );
      printOutcomes(run.outcomes);
      errors.push(...run.errors);
    }

    if (errors.length > 0) {
      printErrors(errors);
      process.exit(1);
    }
  });

program
  .command('engage')
  .description('Check a candidate comment against dedup and rate limits, then publish it')
  .requiredOption('--post <id>', 'Moltbook post to comment on')
  .requiredOption('--text <text>', 'Comment text')
  .option('--dry-run', 'Decide but do not publish or save state')
  .action(async (opts: { post: string; text: string; dryRun?: boolean }) => {
    const cfg = await config();
    const engine = await loadEngine(cfg);

    const { outcomes, errors } = await runEngagement(
      engine,
      createStorage(cfg),
      new MoltbookPublisher(cfg.moltbook),
      [{ action: 'comment', postId: opts.post, text: opts.text }],
      { dryRun: opts.dryRun },
    );

    printOutcomes(outcomes);
    if (errors.length > 0) {
      printErrors(errors);
      process.exit(1);
    }
  });

program
  .command('comment')
  .description('Leave template comments on the busiest posts of the latest snapshot')
  .option('--max <n>', 'Most comments to attempt this run', parseCount)
  .option('--dry-run', 'Decide but do not publish or save state')
  .action(async (opts: { max?: number; dryRun?: boolean }) => {
    const cfg = await config();
    const engine = await loadEngine(cfg);

    const { outcomes, errors } = await runProactiveComments(engine, createStorage(cfg), new MoltbookPublisher(cfg.moltbook), {
      max: opts.max ?? cfg.engagement.maxCommentsPerRun,
      dryRun: opts.dryRun,
    });

    printOutcomes(outcomes);
    if (errors.length > 0) {
      printErrors(errors);
      process.exit(1);
    }
  });

program
  .command('reply')
  .description('Reply to new comments on our own report posts')
  .option('--max <n>', 'Most replies to attempt this run', parseCount)
  .option('--dry-run', 'Decide but do not publish or save state')
  .action(async (opts: { max?: number; dryRun?: boolean }) => {
    const cfg = await config();
    const engine = await loadEngine(cfg);

    const { outcomes, errors } = await runAutoReplies(engine, cfg, createStorage(cfg), new MoltbookPublisher(cfg.moltbook), {
      max: opts.max ?? cfg.engagement.maxRepliesPerRun,
      dryRun: opts.dryRun,
    });

    printOutcomes(outcomes);
    if (errors.length > 0) {
      printErrors(errors);
      process.exit(1);
    }
  });

program
  .command('status')
  .description('Show stored snapshots and engagement state')
  .action(async () => {
    const cfg = await config();
    const storage = createStorage(cfg);

    const { snapshots } = await storage.loadRecentSnapshots(cfg.trends.snapshotRetention);
    const state = await storage.loadEngagementState();

    console.log('molttrend status:');
    console.log(`  Storage: ${cfg.storage.supabase ? 'supabase' : cfg.storage.dataDir}`);
    console.log(`  Snapshots: ${snapshots.length}`);
    console.log(`  Last scrape: ${snapshots[0]?.captured_at ?? 'never'}`);
    console.log(`  Published signatures: ${state?.history.size ?? 0}`);
    console.log(`  Engaged posts and comments: ${state?.engaged.size ?? 0}`);
    console.log(`  Own report posts: ${state?.ownPosts.length ?? 0}`);
    for (const kind of ACTION_KINDS) {
      const budget = state?.budgets[kind];
      if (budget) {
        console.log(`  ${kind} budget: ${budget.calls_made}/${budget.max_calls} since ${new Date(budget.window_start).toISOString()}`);
      }
    }
  });

program.parseAsync().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(`Configuration error: ${err.message}`);
  } else {
    console.error(err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
});
