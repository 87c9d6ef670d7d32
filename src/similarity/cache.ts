import { tokenize } from './tokenizer.js';

export type TermVector = ReadonlyMap<string, number>;

interface DocumentTerms {
  tokens: string[];
  counts: Map<string, number>;
}

/**
 * TF-IDF state for one corpus revision: document frequencies, per-document
 * vectors and a pair memo keyed by the unordered id pair.
 *
 * The owner compares {@link revision} against the store's content revision
 * and throws the cache away when they differ; nothing here is updated in
 * place.
 */
export class SimilarityCache {
  private terms = new Map<string, DocumentTerms>();
  private documentFrequency = new Map<string, number>();
  private vectors = new Map<string, { vector: TermVector; norm: number }>();
  private pairs = new Map<string, number>();

  hits = 0;
  misses = 0;

  constructor(
    readonly revision: number,
    documents: Iterable<{ id: string; content: string }>
  ) {
    for (const doc of documents) {
      const tokens = tokenize(doc.content);
      const counts = new Map<string, number>();
      for (const token of tokens) {
        counts.set(token, (counts.get(token) ?? 0) + 1);
      }
      this.terms.set(doc.id, { tokens, counts });
      for (const token of counts.keys()) {
        this.documentFrequency.set(token, (this.documentFrequency.get(token) ?? 0) + 1);
      }
    }
  }

  get corpusSize(): number {
    return this.terms.size;
  }

  get uniqueTerms(): number {
    return this.documentFrequency.size;
  }

  get cachedVectors(): number {
    return this.vectors.size;
  }

  get cachedPairs(): number {
    return this.pairs.size;
  }

  has(id: string): boolean {
    return this.terms.has(id);
  }

  /** Smoothed IDF, always >= 1 for terms in the corpus. */
  idf(term: string): number {
    const df = this.documentFrequency.get(term) ?? 0;
    return Math.log((1 + this.corpusSize) / (1 + df)) + 1;
  }

  tokens(id: string): readonly string[] {
    return this.terms.get(id)?.tokens ?? [];
  }

  vector(id: string): { vector: TermVector; norm: number } {
    const cached = this.vectors.get(id);
    if (cached) return cached;

    const entry = this.terms.get(id);
    const vector = new Map<string, number>();
    let sumSquares = 0;
    if (entry && entry.tokens.length > 0) {
      for (const [term, count] of entry.counts) {
        const weight = (count / entry.tokens.length) * this.idf(term);
        vector.set(term, weight);
        sumSquares += weight * weight;
      }
    }

    const result = { vector, norm: Math.sqrt(sumSquares) };
    this.vectors.set(id, result);
    return result;
  }

  /** Memoized pair score; `compute` always receives the ids in canonical order. */
  pair(a: string, b: string, compute: (first: string, second: string) => number): number {
    const [first, second] = a <= b ? [a, b] : [b, a];
    const key = `${first}\u0000${second}`;

    const cached = this.pairs.get(key);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const value = compute(first, second);
    this.pairs.set(key, value);
    return value;
  }
}
