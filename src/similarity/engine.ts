import { InvalidArgumentError, NotFoundError } from '../errors.js';
import type { GraphDB } from '../storage/database.js';
import type { TraversalEngine } from '../graph/traversal.js';
import type {
  AttentionEntry,
  AttentionResult,
  ReachableDocument,
  SimilarityResult,
  SimilarityStats,
} from '../types/index.js';
import { SimilarityCache } from './cache.js';

export interface TermStat {
  term: string;
  weight: number;     // Sum of TF-IDF weights over the requested documents
  mentions: number;   // Raw occurrences over the requested documents
}

const round = (value: number, digits = 6): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/**
 * TF-IDF cosine similarity over document content, plus bidirectional
 * attention along reachable documents.
 */
export class SimilarityEngine {
  private cache: SimilarityCache | undefined;
  private rebuilds = 0;

  constructor(
    private db: GraphDB,
    private traversal: TraversalEngine
  ) {}

  private current(): SimilarityCache {
    if (!this.cache || this.cache.revision !== this.db.contentRevision) {
      this.cache = new SimilarityCache(this.db.contentRevision, this.db.listDocuments());
      this.rebuilds++;
    }
    return this.cache;
  }

  private requireDocument(cache: SimilarityCache, id: string): void {
    if (!cache.has(id)) {
      throw new NotFoundError(id);
    }
  }

  /** Cosine similarity in [0, 1]; symmetric, and 1 for a document with itself. */
  similarity(a: string, b: string): number {
    const cache = this.current();
    this.requireDocument(cache, a);
    this.requireDocument(cache, b);

    if (a === b) {
      return cache.vector(a).norm > 0 ? 1 : 0;
    }

    return cache.pair(a, b, (first, second) => {
      const left = cache.vector(first);
      const right = cache.vector(second);
      if (left.norm === 0 || right.norm === 0) return 0;

      let dot = 0;
      for (const [term, weight] of left.vector) {
        const other = right.vector.get(term);
        if (other !== undefined) dot += weight * other;
      }
      return Math.min(1, Math.max(0, dot / (left.norm * right.norm)));
    });
  }

  /** Corpus-wide ranking of documents sharing weighted terms with `id`. */
  findSimilar(id: string, limit = 10): SimilarityResult[] {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidArgumentError(`limit must be a positive integer, got ${limit}`);
    }
    const source = this.db.getDocument(id);

    const results: SimilarityResult[] = [];
    for (const doc of this.db.listDocuments()) {
      if (doc.id === id) continue;
      const similarity = this.similarity(id, doc.id);
      if (similarity <= 0) continue;
      results.push({
        id: doc.id,
        similarity,
        distanceDays: round(Math.abs(doc.timestamp.daysSince(source.timestamp)), 4),
      });
    }

    results.sort((a, b) => b.similarity - a.similarity || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return results.slice(0, limit);
  }

  /**
   * Rank forward and backward reachable documents by similarity to `id`.
   * Ties go to the temporally closer document, then to the smaller id.
   */
  computeAttention(id: string, maxPerDirection = 10): AttentionResult {
    if (!Number.isInteger(maxPerDirection) || maxPerDirection < 0) {
      throw new InvalidArgumentError(`maxPerDirection must be a non-negative integer, got ${maxPerDirection}`);
    }

    // Untruncated: ranking sees every reachable document
    const everything = { maxResults: Number.MAX_SAFE_INTEGER };
    const forward = this.rank(id, this.traversal.forwardReachable(id, everything).reachable, maxPerDirection);
    const backward = this.rank(id, this.traversal.backwardReachable(id, everything).reachable, maxPerDirection);

    const totalForwardWeight = round(forward.reduce((sum, entry) => sum + entry.score, 0));
    const totalBackwardWeight = round(backward.reduce((sum, entry) => sum + entry.score, 0));

    return {
      documentId: id,
      forward,
      backward,
      summary: {
        totalForwardWeight,
        totalBackwardWeight,
        attentionBalance: round(totalForwardWeight / Math.max(0.001, totalBackwardWeight)),
        ...(forward[0] && { mostAttendedForward: forward[0] }),
        ...(backward[0] && { mostAttendedBackward: backward[0] }),
      },
    };
  }

  private rank(id: string, reachable: ReachableDocument[], limit: number): AttentionEntry[] {
    const source = this.db.getDocument(id);
    const entries = reachable.map(({ document }) => ({
      id: document.id,
      score: this.similarity(id, document.id),
      distanceDays: Math.abs(document.timestamp.daysSince(source.timestamp)),
    }));

    entries.sort(
      (a, b) =>
        b.score - a.score ||
        a.distanceDays - b.distanceDays ||
        (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
    );

    return entries.slice(0, limit).map(entry => ({
      ...entry,
      distanceDays: round(entry.distanceDays, 4),
    }));
  }

  /**
   * Aggregate term weights over a set of documents, heaviest first (ties by
   * term). Terms mentioned fewer than `minMentions` times are dropped.
   */
  topTerms(ids: Iterable<string>, limit: number, minMentions = 1): TermStat[] {
    const cache = this.current();
    const stats = new Map<string, TermStat>();

    for (const id of ids) {
      this.requireDocument(cache, id);
      const { vector } = cache.vector(id);
      for (const token of cache.tokens(id)) {
        const stat = stats.get(token) ?? { term: token, weight: 0, mentions: 0 };
        stat.mentions++;
        stats.set(token, stat);
      }
      for (const [term, weight] of vector) {
        const stat = stats.get(term);
        if (stat) stat.weight += weight;
      }
    }

    return [...stats.values()]
      .filter(stat => stat.mentions >= minMentions)
      .sort((a, b) => b.weight - a.weight || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0))
      .slice(0, limit)
      .map(stat => ({ ...stat, weight: round(stat.weight) }));
  }

  getStatistics(): SimilarityStats {
    const cache = this.current();
    return {
      corpusSize: cache.corpusSize,
      uniqueTerms: cache.uniqueTerms,
      cachedVectors: cache.cachedVectors,
      cachedPairs: cache.cachedPairs,
      cacheHits: cache.hits,
      cacheMisses: cache.misses,
      rebuilds: this.rebuilds,
    };
  }
}
