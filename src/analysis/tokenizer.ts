export interface TokenizerOptions {
  stopWords: ReadonlySet<string>;
  minLength: number;
}

export const DEFAULT_MIN_TOKEN_LENGTH = 3;

const URL_PATTERN = /(?:https?:\/\/|www\.)\S+/g;
const FENCED_CODE = /```[\s\S]*?```/g;
const INLINE_CODE = /`[^`]*`/g;
const NON_WORD = /[^a-z0-9\s-]+/g;
const EDGE_HYPHENS = /^-+|-+$/g;
const DIGITS_ONLY = /^[0-9-]+$/;

/**
 * Turn free text into an ordered sequence of normalized tokens.
 *
 * Lowercases, drops URLs and code, replaces markdown and other punctuation
 * with whitespace, keeps internal hyphens (`agent-to-agent`) and filters
 * stop words, short tokens and bare numbers. Never throws: odd input just
 * yields fewer tokens.
 */
export function normalize(text: string, options: TokenizerOptions): string[] {
  if (typeof text !== 'string' || text.length === 0) return [];

  const cleaned = text
    .toLowerCase()
    .replace(FENCED_CODE, ' ')
    .replace(INLINE_CODE, ' ')
    .replace(URL_PATTERN, ' ')
    .replace(NON_WORD, ' ');

  const tokens: string[] = [];
  for (const raw of cleaned.split(/\s+/)) {
    const token = raw.replace(EDGE_HYPHENS, '');
    if (token.length < options.minLength) continue;
    if (DIGITS_ONLY.test(token)) continue;
    if (options.stopWords.has(token)) continue;
    tokens.push(token);
  }
  return tokens;
}

/** Adjacent token pairs, joined by a single space. */
export function bigrams(tokens: readonly string[]): string[] {
  const pairs: string[] = [];
  for (let i = 0; i < tokens.length - 1; i++) {
    pairs.push(`${tokens[i]} ${tokens[i + 1]}`);
  }
  return pairs;
}

export function createTokenizerOptions(stopWords: Iterable<string>, minLength = DEFAULT_MIN_TOKEN_LENGTH): TokenizerOptions {
  return {
    stopWords: new Set([...stopWords].map((w) => w.toLowerCase())),
    minLength,
  };
}
