import { readFileSync } from 'node:fs';
import { z } from 'zod';

const MIN_TOKEN_LENGTH = 3;
const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

const StopwordsSchema = z.array(z.string().min(1));

let stopwords: ReadonlySet<string> | undefined;

/** Stop words shipped in `data/stopwords.json`, loaded once. */
export function loadStopwords(): ReadonlySet<string> {
  if (!stopwords) {
    const file = new URL('../../data/stopwords.json', import.meta.url);
    const words = StopwordsSchema.parse(JSON.parse(readFileSync(file, 'utf8')));
    stopwords = new Set(words.map(word => word.toLowerCase()));
  }
  return stopwords;
}

export function tokenize(text: string): string[] {
  const skip = loadStopwords();
  const words = text.toLowerCase().match(WORD_PATTERN) ?? [];
  return words.filter(word => word.length >= MIN_TOKEN_LENGTH && !skip.has(word));
}
