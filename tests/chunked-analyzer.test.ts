import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { GraphAPI } from '../src/api/graph-api.js';
import { DEFAULT_CAPACITIES, DEFAULT_WEIGHTS } from '../src/config.js';
import { InvalidArgumentError, NotFoundError } from '../src/errors.js';
import { MS_PER_DAY, normalizeTimestamp } from '../src/temporal/timestamp.js';
import { estimateUnwindowedMs } from '../src/analysis/chunked-analyzer.js';
import { carryoverSize, emptyCarryover } from '../src/analysis/carryover.js';
import { attentionScores, reachableInSet } from '../src/analysis/scoring.js';
import { GraphDB } from '../src/storage/database.js';
import { TraversalEngine } from '../src/graph/traversal.js';
import { SimilarityEngine } from '../src/similarity/engine.js';
import type { ChunkResult } from '../src/analysis/types.js';

const TOPICS = ['merger', 'audit', 'lawsuit', 'patent', 'hiring', 'budget', 'recall'];
const PARTIES = ['acme', 'globex', 'initech', 'umbrella', 'hooli'];

const docId = (i: number): string => `d${String(i).padStart(5, '0')}`;

/** `n` documents spread over 1800 days, in causal runs with some long-range links. */
function seedCorpus(api: GraphAPI, n: number): void {
  const base = normalizeTimestamp('2020-01-01').epochMs;
  const stepMs = Math.floor((1800 * MS_PER_DAY) / n);

  for (let i = 0; i < n; i++) {
    const content = `${PARTIES[i % 5]} ${TOPICS[i % 7]} update on ${TOPICS[(i * 3) % 7]} filing`;
    api.addDocument(docId(i), content, base + i * stepMs);
    if (i === 0) continue;
    api.addRelationship(docId(i - 1), docId(i), 'sequential');
    if (i % 4 !== 0) {
      api.addRelationship(docId(i - 1), docId(i), 'causal');
    }
  }
  for (let i = 0; i + 60 < n; i += 37) {
    api.addRelationship(docId(i), docId(i + 60), 'causal');
  }
}

describe('ChunkedAnalyzer', () => {
  let api: GraphAPI;

  beforeEach(() => {
    api = new GraphAPI();
  });

  afterEach(() => {
    api.close();
  });

  describe.each([50, 500, 5000])('carryover bounds with %i documents', n => {
    test('every carryover stays within its capacities', () => {
      seedCorpus(api, n);
      const chunks: ChunkResult[] = [];

      const result = api.analyzeLongChain({ startDocumentId: docId(0), onChunk: chunk => chunks.push(chunk) });

      expect(chunks.length).toBe(result.windowCount);
      for (const chunk of chunks) {
        const { carryover } = chunk;
        expect(carryover.criticalEvents.length).toBeLessThanOrEqual(DEFAULT_CAPACITIES.maxEvents);
        expect(carryover.keyEntities.length).toBeLessThanOrEqual(DEFAULT_CAPACITIES.maxEntities);
        expect(carryover.causalChains.length).toBeLessThanOrEqual(DEFAULT_CAPACITIES.maxChains);
        expect(carryover.attentionScores.length).toBeLessThanOrEqual(DEFAULT_CAPACITIES.maxAttention);
        expect(carryover.openQuestions.length).toBeLessThanOrEqual(DEFAULT_CAPACITIES.maxOpenQuestions);
        for (const chain of carryover.causalChains) {
          expect(chain.length).toBeLessThanOrEqual(DEFAULT_CAPACITIES.maxChainLength);
        }
        expect(carryoverSize(carryover)).toBeLessThanOrEqual(10 + 15 + 20 + 20 + 10);
        expect(chunk.carriedDocumentIds.length).toBeLessThanOrEqual(10 + 10 + 20);
        expect(chunk.workingSetSize).toBe(chunk.newDocumentIds.length + chunk.carriedDocumentIds.length);
      }

      const seen = chunks.flatMap(chunk => chunk.newDocumentIds);
      expect(new Set(seen).size).toBe(n);
      expect(result.finalCarryover.documentCount).toBe(n);
      expect(result.metrics.documentsProcessed).toBe(n);
      expect(result.metrics.peakWorkingSet).toBe(Math.max(...chunks.map(c => c.workingSetSize)));
      expect(result.metrics.estimatedUnwindowedMs).toBe(estimateUnwindowedMs(n));
    });
  });

  describe('Dispute chain', () => {
    beforeEach(() => {
      api.addDocument('c', 'Supply contract signed with acme', '2024-01-01');
      api.addDocument('claim', 'Acme files breach claim over late supply', '2024-03-01');
      api.addDocument('resp', 'Response to acme breach claim', '2024-04-01');
      api.addDocument('settle', 'Settlement reached with acme on breach', '2024-05-01');
      api.addRelationship('c', 'claim', 'causal');
      api.addRelationship('claim', 'resp', 'causal');
      api.addRelationship('resp', 'settle', 'causal');
    });

    test('follows a causal chain across windows', () => {
      const result = api.analyzeLongChain({ startDocumentId: 'c', endDocumentId: 'settle', chunkSizeDays: 45 });

      expect(result.windowCount).toBe(3);
      expect(result.span.days).toBe(121);
      expect(result.chunks.map(chunk => chunk.newDocumentIds)).toEqual([['c'], ['claim'], ['resp', 'settle']]);
      expect(result.chunks[1]?.carriedDocumentIds).toEqual(['c']);
      expect(result.causalChains).toEqual([['c', 'claim', 'resp', 'settle']]);
      expect(result.criticalEvents.map(e => e.documentId).sort()).toEqual(['c', 'claim', 'resp', 'settle']);
    });

    test('raises open questions and resolves them when the awaited document arrives', () => {
      const result = api.analyzeLongChain({ startDocumentId: 'c', endDocumentId: 'settle', chunkSizeDays: 45 });
      const [first, second, third] = result.chunks;

      expect(first?.openQuestions.map(q => q.awaiting)).toEqual([['claim']]);
      expect(second?.resolvedQuestions.map(q => q.awaiting)).toEqual([['claim']]);
      expect(second?.openQuestions.map(q => q.chain)).toEqual([['c', 'claim']]);
      expect(third?.resolvedQuestions.map(q => q.awaiting)).toEqual([['resp']]);
      expect(third?.openQuestions).toEqual([]);
    });

    test('validates its inputs', () => {
      expect(() => api.analyzeLongChain({ startDocumentId: 'ghost' })).toThrow(NotFoundError);
      expect(() => api.analyzeLongChain({ startDocumentId: 'c', endDocumentId: 'ghost' })).toThrow(NotFoundError);
      expect(() => api.analyzeLongChain({ startDocumentId: 'settle', endDocumentId: 'c' })).toThrow(
        InvalidArgumentError
      );
      expect(() => api.analyzeLongChain({ startDocumentId: 'c', maxDays: 0 })).toThrow(InvalidArgumentError);
      expect(() => api.analyzeLongChain({ startDocumentId: 'c', chunkSizeDays: -1 })).toThrow(InvalidArgumentError);
    });
  });

  test('cancellation keeps completed windows', () => {
    seedCorpus(api, 200);
    const controller = new AbortController();
    let seen = 0;

    const result = api.analyzeLongChain({
      startDocumentId: docId(0),
      signal: controller.signal,
      onChunk: () => {
        seen++;
        if (seen === 2) controller.abort('enough');
      },
    });

    expect(result.windowCount).toBeGreaterThan(2);
    expect(result.chunks).toHaveLength(2);
    expect(result.cancelled).toEqual({ kind: 'Cancelled', stage: 'window', completed: 2, reason: 'enough' });
    expect(result.finalCarryover).toBe(result.chunks[1]?.carryover);
  });

  test('importance weights are configurable', () => {
    const recencyOnly = new GraphAPI({ weights: { connectivity: 0, attention: 0, recency: 1 } });
    recencyOnly.addDocument('a', 'first note', '2024-01-01');
    recencyOnly.addDocument('b', 'second note', '2024-01-10');
    recencyOnly.addDocument('c', 'third note', '2024-01-20');

    const result = recencyOnly.analyzeLongChain({ startDocumentId: 'a', endDocumentId: 'c' });
    expect(result.windowCount).toBe(1);
    expect(result.criticalEvents.map(e => [e.documentId, e.importance])).toEqual([
      ['c', 1],
      ['b', 0.473684],
      ['a', 0],
    ]);
    recencyOnly.close();
  });

  test('event summaries are cut at 100 characters', () => {
    const long = 'x'.repeat(150);
    api.addDocument('long', long, '2024-01-01');
    const result = api.analyzeLongChain({ startDocumentId: 'long', maxDays: 10 });
    expect(result.criticalEvents[0]?.summary).toBe(`${'x'.repeat(100)}...`);
  });

  test('the unwindowed cost model switches at 50 documents', () => {
    expect(estimateUnwindowedMs(10)).toBe(100);
    expect(estimateUnwindowedMs(100)).toBe(110);
  });

  describe('Attention inheritance', () => {
    let db: GraphDB;

    beforeEach(() => {
      db = new GraphDB();
      const base = normalizeTimestamp('2024-01-01').epochMs;
      db.addDocument({ id: 'hub', content: 'pipeline inspection', timestamp: base });
      for (let i = 0; i < 60; i++) {
        const id = `c${String(i).padStart(2, '0')}`;
        db.addDocument({ id, content: 'routine memo', timestamp: base + (i + 1) * MS_PER_DAY });
        db.addRelationship({ from: 'hub', to: id });
      }
      db.addDocument({ id: 'late', content: 'valve replaced', timestamp: base + 90 * MS_PER_DAY });
      db.addDocument({ id: 'outsider', content: 'unrelated', timestamp: base + 91 * MS_PER_DAY });
      db.addDocument({ id: 'late2', content: 'pressure test', timestamp: base + 95 * MS_PER_DAY });
      db.addRelationship({ from: 'hub', to: 'late' });
      db.addRelationship({ from: 'hub', to: 'outsider' });
      db.addRelationship({ from: 'outsider', to: 'late2' });
    });

    afterEach(() => {
      db.close();
    });

    test('walks only working-set members, past any number of other successors', () => {
      expect([...reachableInSet(db, 'hub', new Set(['hub', 'late', 'late2']), 3)]).toEqual([['late', 1]]);
    });

    test('window documents inherit decayed attention from a carried hub', () => {
      const ctx = { db, similarity: new SimilarityEngine(db, new TraversalEngine(db)), weights: DEFAULT_WEIGHTS };
      const workingSet = ['hub', 'late', 'late2'].map(id => db.getDocument(id));
      const carryover = { ...emptyCarryover(), attentionScores: [{ documentId: 'hub', score: 1 }] };

      const scores = attentionScores(ctx, workingSet, new Set(['late', 'late2']), carryover);

      expect(Object.fromEntries(scores)).toEqual({ hub: 1, late: 0.8, late2: 0 });
    });
  });
});
