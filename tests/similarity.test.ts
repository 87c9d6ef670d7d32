import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { GraphDB } from '../src/storage/database.js';
import { TraversalEngine } from '../src/graph/traversal.js';
import { SimilarityEngine } from '../src/similarity/engine.js';
import { tokenize } from '../src/similarity/tokenizer.js';
import { InvalidArgumentError, NotFoundError } from '../src/errors.js';
import { MS_PER_DAY } from '../src/temporal/timestamp.js';

describe('Tokenizer', () => {
  test('lower-cases and drops stop words and short tokens', () => {
    expect(tokenize('The Contract, the BREACH; it is 2024 ok!')).toEqual(['contract', 'breach', '2024']);
  });

  test('keeps non-ASCII letters together', () => {
    expect(tokenize('Übergabe der Akten')).toEqual(['übergabe', 'der', 'akten']);
  });
});

describe('SimilarityEngine', () => {
  let db: GraphDB;
  let engine: SimilarityEngine;

  const add = (id: string, content: string, timestamp: string): void => {
    db.addDocument({ id, content, timestamp });
  };

  beforeEach(() => {
    db = new GraphDB();
    engine = new SimilarityEngine(db, new TraversalEngine(db));
  });

  afterEach(() => {
    db.close();
  });

  describe('similarity', () => {
    test('computes smoothed TF-IDF cosine', () => {
      add('a', 'alpha beta', '2024-01-01');
      add('b', 'alpha gamma', '2024-01-02');

      expect(engine.similarity('a', 'b')).toBeCloseTo(0.336097, 6);
    });

    test('is 1 for a document with itself and 0 for blank content', () => {
      add('a', 'alpha beta', '2024-01-01');
      add('blank', '   ', '2024-01-02');
      add('stop', 'the and it', '2024-01-03');

      expect(engine.similarity('a', 'a')).toBe(1);
      expect(engine.similarity('blank', 'blank')).toBe(0);
      expect(engine.similarity('stop', 'stop')).toBe(0);
      expect(engine.similarity('a', 'blank')).toBe(0);
    });

    test('is symmetric to the last bit', () => {
      add('a', 'supplier reports contract breach', '2024-01-01');
      add('b', 'supplier disputes breach claim in court', '2024-01-02');
      add('c', 'court schedules hearing about contract', '2024-01-03');

      for (const [x, y] of [['a', 'b'], ['a', 'c'], ['b', 'c']] as const) {
        expect(engine.similarity(x, y)).toBe(engine.similarity(y, x));
      }
    });

    test('is 0 without shared terms', () => {
      add('a', 'contract breach', '2024-01-01');
      add('b', 'weather forecast', '2024-01-02');
      expect(engine.similarity('a', 'b')).toBe(0);
    });

    test('throws NotFound for unknown ids', () => {
      add('a', 'alpha', '2024-01-01');
      expect(() => engine.similarity('a', 'ghost')).toThrow(NotFoundError);
    });
  });

  describe('cache', () => {
    test('memoizes pairs regardless of argument order', () => {
      add('a', 'alpha beta', '2024-01-01');
      add('b', 'alpha gamma', '2024-01-02');

      engine.similarity('a', 'b');
      engine.similarity('b', 'a');

      const stats = engine.getStatistics();
      expect(stats.cacheMisses).toBe(1);
      expect(stats.cacheHits).toBe(1);
      expect(stats.cachedPairs).toBe(1);
      expect(stats.corpusSize).toBe(2);
      expect(stats.uniqueTerms).toBe(3);
      expect(stats.rebuilds).toBe(1);
    });

    test('is rebuilt after the corpus changes', () => {
      add('a', 'alpha beta', '2024-01-01');
      add('b', 'alpha gamma', '2024-01-02');
      const before = engine.similarity('a', 'b');

      add('c', 'beta gamma delta', '2024-01-03');
      const after = engine.similarity('a', 'b');

      expect(after).not.toBe(before);
      const stats = engine.getStatistics();
      expect(stats.rebuilds).toBe(2);
      expect(stats.corpusSize).toBe(3);
      expect(stats.cacheMisses).toBe(1);
    });

    test('is not rebuilt by metadata updates', () => {
      add('a', 'alpha beta', '2024-01-01');
      engine.similarity('a', 'a');
      db.updateMetadata('a', { reviewed: true });
      engine.similarity('a', 'a');
      expect(engine.getStatistics().rebuilds).toBe(1);
    });
  });

  describe('findSimilar', () => {
    test('ranks the whole corpus and skips unrelated documents', () => {
      add('q', 'acme merger negotiation', '2024-01-01');
      add('close', 'acme merger negotiation stalls', '2024-01-11');
      add('far', 'acme picnic', '2024-03-01');
      add('none', 'weather report', '2024-01-02');

      const results = engine.findSimilar('q');
      expect(results.map(r => r.id)).toEqual(['close', 'far']);
      expect(results[0]?.distanceDays).toBe(10);
      expect(engine.findSimilar('q', 1).map(r => r.id)).toEqual(['close']);
    });

    test('rejects a non-positive limit', () => {
      add('q', 'acme', '2024-01-01');
      expect(() => engine.findSimilar('q', 0)).toThrow(InvalidArgumentError);
    });
  });

  describe('computeAttention', () => {
    beforeEach(() => {
      add('root', 'merger talks begin between acme and globex', '2024-01-01');
      add('f1', 'acme globex merger agreement drafted', '2024-01-05');
      add('f2', 'office party planning', '2024-01-03');
      add('b1', 'acme quarterly earnings', '2023-12-20');
      db.addRelationship({ from: 'root', to: 'f1' });
      db.addRelationship({ from: 'root', to: 'f2' });
      db.addRelationship({ from: 'b1', to: 'root' });
    });

    test('ranks reachable documents by similarity in both directions', () => {
      const result = engine.computeAttention('root');

      expect(result.documentId).toBe('root');
      expect(result.forward.map(e => e.id)).toEqual(['f1', 'f2']);
      expect(result.forward[1]).toEqual({ id: 'f2', score: 0, distanceDays: 2 });
      expect(result.forward[0]?.distanceDays).toBe(4);
      expect(result.backward.map(e => e.id)).toEqual(['b1']);
      expect(result.backward[0]?.distanceDays).toBe(12);
      expect(result.summary.mostAttendedForward?.id).toBe('f1');
      expect(result.summary.mostAttendedBackward?.id).toBe('b1');
      expect(result.summary.totalForwardWeight).toBeGreaterThan(result.summary.totalBackwardWeight);
    });

    test('caps each direction', () => {
      const result = engine.computeAttention('root', 1);
      expect(result.forward.map(e => e.id)).toEqual(['f1']);
    });

    test('reports balance against an empty direction', () => {
      const result = engine.computeAttention('b1');
      expect(result.backward).toEqual([]);
      expect(result.summary.mostAttendedBackward).toBeUndefined();
      expect(result.summary.attentionBalance).toBeCloseTo(result.summary.totalForwardWeight / 0.001, 3);
    });

    test('ranks every reachable document, not just the earliest ones', () => {
      const base = Date.UTC(2024, 1, 1);
      db.addDocument({ id: 'hub', content: 'pipeline rupture inspection', timestamp: base });
      for (let i = 0; i < 60; i++) {
        const id = `n${String(i).padStart(2, '0')}`;
        db.addDocument({ id, content: 'routine memo', timestamp: base + (i + 1) * MS_PER_DAY });
        db.addRelationship({ from: 'hub', to: id });
      }
      db.addDocument({ id: 'twin', content: 'pipeline rupture inspection', timestamp: base + 90 * MS_PER_DAY });
      db.addRelationship({ from: 'hub', to: 'twin' });

      const [top] = engine.computeAttention('hub', 1).forward;
      expect(top?.id).toBe('twin');
      expect(top?.score).toBeCloseTo(1, 6);
      expect(top?.distanceDays).toBe(90);
    });
  });

  describe('topTerms', () => {
    test('sums weights and counts mentions across documents', () => {
      add('a', 'merger merger delay', '2024-01-01');
      add('b', 'merger approved', '2024-01-02');

      const terms = engine.topTerms(['a', 'b'], 10, 2);
      expect(terms.map(t => [t.term, t.mentions])).toEqual([['merger', 3]]);
    });
  });
});
