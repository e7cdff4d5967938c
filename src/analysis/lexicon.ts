import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';

/** term -> polarity weight. Read-only once built. */
export type Lexicon = ReadonlyMap<string, number>;

const lexiconSchema = z.record(z.string().min(1), z.number().min(-1).max(1));

export function createLexicon(entries: Record<string, number>): Lexicon {
  const parsed = lexiconSchema.safeParse(entries);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid sentiment lexicon',
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    );
  }

  const map = new Map<string, number>();
  for (const [term, weight] of Object.entries(parsed.data)) {
    map.set(term.toLowerCase(), weight);
  }
  return map;
}

export async function loadLexicon(path: string): Promise<Lexicon> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read lexicon at ${path}: ${errorMessage(err)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Lexicon at ${path} is not valid JSON: ${errorMessage(err)}`);
  }

  const shape = lexiconSchema.safeParse(data);
  if (!shape.success) {
    throw new ConfigError(`Invalid sentiment lexicon at ${path}`, shape.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  return createLexicon(shape.data);
}
