import { Feed } from 'feed';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { TrendReport } from '../analysis/types.js';
import { formatFallingTerms, formatRisingTerms } from '../scoring/velocity.js';

const SITE_TITLE = 'molttrend — Moltbook Trend Report';
const SITE_DESCRIPTION = 'What Moltbook agents are talking about, how it moved since the last scan, and how it feels.';
const SITE_URL = 'https://molttrend.example'; // placeholder, configurable later

export interface PublishResult {
  files: string[];
  errors: string[];
}

function formatDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

function formatTime(date: Date): string {
  return `${date.toISOString().slice(11, 16)} UTC`;
}

export function generateMarkdownReport(report: TrendReport, date: Date): string {
  const dateStr = formatDate(date);
  const { sentiment } = report;

  let md = `---
date: ${dateStr}
records_analyzed: ${report.record_count}
compared_with_previous: ${report.has_previous}
---

# Moltbook Trend Report — ${dateStr}

> Generated ${formatTime(date)} from ${report.record_count} posts and comments.

`;

  if (report.record_count === 0) {
    md += 'No records in this window.\n';
    return md;
  }

  md += '## Trending Terms\n\n';
  for (const [i, term] of report.unigrams.slice(0, 10).entries()) {
    md += `${i + 1}. **${term.term}** — ${term.count} mentions (${(term.frequency * 100).toFixed(1)}%)\n`;
  }
  md += '\n';

  const bigrams = report.bigrams.slice(0, 8);
  if (bigrams.length > 0) {
    md += '## Related Phrases\n\n';
    for (const bg of bigrams) {
      md += `- **${bg.term}** (${bg.count}x)\n`;
    }
    md += '\n';
  }

  if (report.has_previous) {
    const rising = formatRisingTerms(report.deltas);
    const falling = formatFallingTerms(report.deltas);
    md += '## Changes vs Previous Scan\n\n';
    if (rising.length > 0) md += `**Rising:**\n${rising.map((l) => `- ${l}`).join('\n')}\n\n`;
    if (falling.length > 0) md += `**Falling:**\n${falling.map((l) => `- ${l}`).join('\n')}\n\n`;
    if (rising.length === 0 && falling.length === 0) md += 'No significant movement.\n\n';
  }

  md += '## Most Active Submolts\n\n';
  md += '| Submolt | Records | Upvotes | Comments | Engagement |\n';
  md += '|---------|---------|---------|----------|------------|\n';
  for (const s of report.submolts.slice(0, 6)) {
    md += `| m/${s.submolt} | ${s.record_count} | ${s.total_upvotes} | ${s.total_comments} | ${s.engagement_score} |\n`;
  }
  md += '\n';

  md += '## Sentiment\n\n';
  md += `- Positive: **${sentiment.percentages.positive}%**\n`;
  md += `- Neutral: **${sentiment.percentages.neutral}%**\n`;
  md += `- Negative: **${sentiment.percentages.negative}%**\n`;
  md += `- Average score: **${sentiment.average_score}**\n\n`;

  if (sentiment.positive_terms.length > 0) {
    md += `**Most used positive words:** ${sentiment.positive_terms.slice(0, 5).map((t) => `${t.term} (${t.count}x)`).join(', ')}\n\n`;
  }
  if (sentiment.negative_terms.length > 0) {
    md += `**Most used negative words:** ${sentiment.negative_terms.slice(0, 5).map((t) => `${t.term} (${t.count}x)`).join(', ')}\n\n`;
  }

  if (report.conversations.length > 0) {
    md += '## Top Conversations\n\n';
    for (const c of report.conversations.slice(0, 5)) {
      md += `- m/${c.submolt} @${c.author}: "${c.excerpt}" — ${c.upvotes} upvotes, ${c.comment_count} comments (score ${c.score})\n`;
    }
    md += '\n';
  }

  const { authors } = report;
  md += '## Agent Activity\n\n';
  md += `- Unique agents: **${authors.unique_authors}**\n`;
  md += `- Records per agent: **${authors.average_records_per_author}**\n`;
  md += `- Agents with 3+ records: **${authors.prolific_authors}**\n`;
  md += `- One-time posters: **${authors.one_time_authors}**\n`;
  if (authors.top_authors.length > 0) {
    md += `\n**Most active:** ${authors.top_authors.slice(0, 5).map((a) => `@${a.author} (${a.records})`).join(', ')}\n`;
  }

  return md;
}

/**
 * Short title and body suitable for posting the report back to Moltbook.
 */
export function generatePostDraft(report: TrendReport, date: Date): { title: string; content: string } {
  const month = date.toLocaleString('en-US', { month: 'short', timeZone: 'UTC' });
  const title = `Moltbook Trend Report — ${month} ${date.getUTCDate()}`;

  const pct = report.sentiment.percentages;
  let content = `**Top topics:** ${report.unigrams.slice(0, 5).map((t) => t.term).join(', ') || 'none'}\n\n`;
  content += `**Sentiment:** ${pct.positive}% positive | ${pct.neutral}% neutral | ${pct.negative}% negative\n\n`;
  content += `**Records analyzed:** ${report.record_count} from ${report.authors.unique_authors} agents\n\n`;

  const submolts = report.submolts.slice(0, 3);
  if (submolts.length > 0) {
    content += `**Active submolts:** ${submolts.map((s) => `m/${s.submolt} (${s.record_count})`).join(', ')}\n\n`;
  }

  const rising = formatRisingTerms(report.deltas, 3);
  if (report.has_previous && rising.length > 0) {
    content += `**Rising:**\n${rising.map((l) => `- ${l}`).join('\n')}\n`;
  }

  return { title, content: content.trimEnd() };
}

export function generateRssFeed(report: TrendReport, date: Date): string {
  const dateStr = formatDate(date);
  const feed = new Feed({
    title: SITE_TITLE,
    description: SITE_DESCRIPTION,
    id: SITE_URL,
    link: SITE_URL,
    language: 'en',
    updated: date,
    generator: 'molttrend',
    copyright: '',
    feedLinks: {
      rss: `${SITE_URL}/feed.xml`,
    },
  });

  const draft = generatePostDraft(report, date);
  feed.addItem({
    title: draft.title,
    id: `${SITE_URL}/reports/${dateStr}`,
    link: `${SITE_URL}/reports/${dateStr}.md`,
    description: draft.content,
    date,
  });

  return feed.rss2();
}

export async function publishReport(report: TrendReport, outputDir: string, date?: Date): Promise<PublishResult> {
  const now = date ?? new Date(report.generated_at);
  const dateStr = formatDate(now);
  const stamp = now.toISOString().slice(11, 16).replace(':', '');
  const files: string[] = [];
  const errors: string[] = [];

  try {
    await mkdir(join(outputDir, 'reports'), { recursive: true });

    const mdPath = join(outputDir, 'reports', `${dateStr}_${stamp}.md`);
    await writeFile(mdPath, generateMarkdownReport(report, now), 'utf-8');
    files.push(mdPath);

    const jsonPath = join(outputDir, 'reports', `${dateStr}_${stamp}.json`);
    await writeFile(jsonPath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
    files.push(jsonPath);

    const rssPath = join(outputDir, 'feed.xml');
    await writeFile(rssPath, generateRssFeed(report, now), 'utf-8');
    files.push(rssPath);
  } catch (err) {
    errors.push(`Publish failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  return { files, errors };
}
