import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { GraphDB } from '../src/storage/database.js';
import {
  DuplicateDocumentError,
  InvalidArgumentError,
  NotFoundError,
  UnknownDocumentError,
} from '../src/errors.js';
import { MS_PER_DAY, normalizeTimestamp } from '../src/temporal/timestamp.js';

describe('GraphDB', () => {
  let db: GraphDB;

  beforeEach(() => {
    db = new GraphDB();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  describe('Documents', () => {
    test('should add a document with its weekly layer', () => {
      const doc = db.addDocument({
        id: 'doc1',
        content: 'Contract signed',
        timestamp: '2024-01-01',
        metadata: { author: 'alice' },
      });

      expect(doc.layer).toBe(2817);
      expect(doc.timestamp.toISOString()).toBe('2024-01-01T00:00:00.000Z');

      const stored = db.getDocument('doc1');
      expect(stored.content).toBe('Contract signed');
      expect(stored.metadata).toEqual({ author: 'alice' });
      expect(stored.layer).toBe(2817);
    });

    test('should reject duplicate ids and keep the original', () => {
      db.addDocument({ id: 'doc1', content: 'first', timestamp: '2024-01-01' });

      expect(() => db.addDocument({ id: 'doc1', content: 'second', timestamp: '2024-02-01' })).toThrow(
        DuplicateDocumentError
      );
      expect(db.getDocument('doc1').content).toBe('first');
      expect(db.getLayer(2817)).toEqual(['doc1']);
      expect(db.contentRevision).toBe(1);
    });

    test('should reject empty ids and oversized content', () => {
      expect(() => db.addDocument({ id: '  ', content: 'x', timestamp: 0 })).toThrow(InvalidArgumentError);
      expect(() =>
        db.addDocument({ id: 'big', content: 'x'.repeat(2 * 1024 * 1024 + 1), timestamp: 0 })
      ).toThrow('Content exceeds 2MB limit');
      expect(db.hasDocument('big')).toBe(false);
    });

    test('should throw NotFound for unknown ids', () => {
      expect(() => db.getDocument('missing')).toThrow(NotFoundError);
      expect(db.hasDocument('missing')).toBe(false);
    });

    test('should merge or replace metadata without touching the content revision', () => {
      db.addDocument({ id: 'doc1', content: 'text', timestamp: 0, metadata: { a: 1, b: 2 } });

      expect(db.updateMetadata('doc1', { b: 3, c: 4 }).metadata).toEqual({ a: 1, b: 3, c: 4 });
      expect(db.updateMetadata('doc1', { z: true }, false).metadata).toEqual({ z: true });
      expect(db.getDocument('doc1').metadata).toEqual({ z: true });
      expect(db.contentRevision).toBe(1);
    });

    test('should list documents in time order', () => {
      db.addDocument({ id: 'b', content: '', timestamp: '2024-01-02' });
      db.addDocument({ id: 'c', content: '', timestamp: '2024-01-01' });
      db.addDocument({ id: 'a', content: '', timestamp: '2024-01-02' });

      expect(db.listDocuments().map(d => d.id)).toEqual(['c', 'a', 'b']);
      expect(db.listDocuments(2).map(d => d.id)).toEqual(['c', 'a']);
    });
  });

  describe('Range queries', () => {
    beforeEach(() => {
      db.addDocument({ id: 'jan', content: '', timestamp: '2024-01-15' });
      db.addDocument({ id: 'feb', content: '', timestamp: '2024-02-01' });
      db.addDocument({ id: 'feb-b', content: '', timestamp: '2024-02-01' });
      db.addDocument({ id: 'mar', content: '', timestamp: '2024-03-01' });
    });

    test('should include the end instant by default', () => {
      const docs = db.getDocumentsInRange('2024-01-15', '2024-02-01');
      expect(docs.map(d => d.id)).toEqual(['jan', 'feb', 'feb-b']);
    });

    test('should exclude the end instant when asked', () => {
      const docs = db.getDocumentsInRange('2024-01-15', '2024-02-01', { inclusiveEnd: false });
      expect(docs.map(d => d.id)).toEqual(['jan']);
    });

    test('should return nothing when start is after end', () => {
      expect(db.getDocumentsInRange('2024-03-01', '2024-01-01')).toEqual([]);
    });

    test('should match a linear scan', () => {
      const scanDb = new GraphDB({ layerDurationDays: 3 });
      let seed = 42;
      const within = (days: number): number => {
        seed = (seed * 16807) % 2147483647;
        return Math.floor((seed / 2147483647) * days * MS_PER_DAY);
      };
      const base = normalizeTimestamp('2023-06-01').epochMs;
      for (let i = 0; i < 200; i++) {
        scanDb.addDocument({ id: `d${i}`, content: '', timestamp: base + within(400) });
      }

      const all = scanDb.listDocuments();
      for (let q = 0; q < 25; q++) {
        const a = base + within(400);
        const b = a + within(60);
        const expected = all.filter(d => d.timestamp.epochMs >= a && d.timestamp.epochMs <= b).map(d => d.id);
        expect(scanDb.getDocumentsInRange(a, b).map(d => d.id)).toEqual(expected);
      }
      expect(scanDb.verifyLayerIndex()).toEqual([]);
      scanDb.close();
    });
  });

  describe('Layer index', () => {
    test('should place every document in exactly one bucket', () => {
      db.addDocument({ id: 'a', content: '', timestamp: '1970-01-01' });
      db.addDocument({ id: 'b', content: '', timestamp: '1970-01-07T23:59:59Z' });
      db.addDocument({ id: 'c', content: '', timestamp: '1970-01-08' });

      expect(db.getLayer(0)).toEqual(['a', 'b']);
      expect(db.getLayer(1)).toEqual(['c']);
      expect(db.listLayers()).toEqual([0, 1]);
      expect(db.verifyLayerIndex()).toEqual([]);
    });
  });

  describe('Relationships', () => {
    beforeEach(() => {
      db.addDocument({ id: 'early', content: '', timestamp: '2024-01-01' });
      db.addDocument({ id: 'late', content: '', timestamp: '2024-02-01' });
    });

    test('should create a forward edge without a warning', () => {
      const rel = db.addRelationship({ from: 'early', to: 'late', kind: 'causal' });

      expect(rel.kind).toBe('causal');
      expect(rel.weight).toBe(1);
      expect(rel.warning).toBeUndefined();
      expect(db.getTemporalWarnings()).toEqual([]);
    });

    test('should default to a sequential edge', () => {
      expect(db.addRelationship({ from: 'early', to: 'late' }).kind).toBe('sequential');
    });

    test('should attach a warning to a backward causal edge', () => {
      const rel = db.addRelationship({ from: 'late', to: 'early', kind: 'causal' });

      expect(rel.warning).toEqual({
        kind: 'TemporalOrderWarning',
        relation: 'causal',
        fromTimestamp: '2024-02-01T00:00:00.000Z',
        toTimestamp: '2024-01-01T00:00:00.000Z',
        message:
          'Temporal order warning: causal edge late → early goes backward in time ' +
          '(2024-02-01T00:00:00.000Z > 2024-01-01T00:00:00.000Z)',
      });
      expect(console.warn).toHaveBeenCalledTimes(1);

      const warnings = db.getTemporalWarnings();
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.from).toBe('late');
      expect(db.getRelationships('late', 'early')[0]?.warning?.relation).toBe('causal');
    });

    test('should not warn for non-ordering kinds', () => {
      expect(db.addRelationship({ from: 'late', to: 'early', kind: 'concurrent' }).warning).toBeUndefined();
      expect(db.addRelationship({ from: 'late', to: 'early', kind: 'merge' }).warning).toBeUndefined();
    });

    test('should reject missing endpoints', () => {
      expect(() => db.addRelationship({ from: 'early', to: 'ghost' })).toThrow(UnknownDocumentError);
      try {
        db.addRelationship({ from: 'ghost', to: 'early' });
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownDocumentError);
        expect(error instanceof UnknownDocumentError && error.endpoint).toBe('from');
      }
    });

    test('should reject unknown kinds and bad weights', () => {
      expect(() => db.addRelationship({ from: 'early', to: 'late', kind: 'related' })).toThrow(InvalidArgumentError);
      expect(() => db.addRelationship({ from: 'early', to: 'late', weight: Number.NaN })).toThrow(InvalidArgumentError);
    });

    test('should upsert on the same (from, to, kind)', () => {
      const first = db.addRelationship({ from: 'early', to: 'late', kind: 'causal', weight: 1 });
      const second = db.addRelationship({ from: 'early', to: 'late', kind: 'causal', weight: 2.5 });
      db.addRelationship({ from: 'early', to: 'late', kind: 'sequential' });

      expect(second.id).toBe(first.id);
      const edges = db.getRelationships('early', 'late');
      expect(edges.map(e => [e.kind, e.weight])).toEqual([
        ['causal', 2.5],
        ['sequential', 1],
      ]);
    });

    test('should re-evaluate the warning on upsert', () => {
      db.addRelationship({ from: 'late', to: 'early', kind: 'causal' });
      expect(db.getTemporalWarnings()).toHaveLength(1);

      db.addRelationship({ from: 'late', to: 'early', kind: 'causal', weight: 3 });
      expect(db.getTemporalWarnings()).toHaveLength(1);
      expect(db.getTemporalWarnings()[0]?.weight).toBe(3);
    });

    test('should order neighbours by timestamp then id', () => {
      db.addDocument({ id: 'z-mid', content: '', timestamp: '2024-01-15' });
      db.addDocument({ id: 'a-mid', content: '', timestamp: '2024-01-15' });
      db.addRelationship({ from: 'early', to: 'late' });
      db.addRelationship({ from: 'early', to: 'z-mid' });
      db.addRelationship({ from: 'early', to: 'a-mid' });

      expect(db.getOutgoing('early').map(l => l.neighborId)).toEqual(['a-mid', 'z-mid', 'late']);
      expect(db.getIncoming('late').map(l => l.neighborId)).toEqual(['early']);
      expect(db.getDegree('early')).toEqual({ in: 0, out: 3 });
    });
  });

  describe('Statistics and export', () => {
    test('should report counts and averages', () => {
      db.addDocument({ id: 'a', content: '', timestamp: '2024-01-01' });
      db.addDocument({ id: 'b', content: '', timestamp: '2024-01-02' });
      db.addDocument({ id: 'c', content: '', timestamp: '2024-01-11' });
      db.addRelationship({ from: 'a', to: 'b', kind: 'causal' });
      db.addRelationship({ from: 'c', to: 'b', kind: 'sequential' });

      const stats = db.getStats();
      expect(stats.nodeCount).toBe(3);
      expect(stats.edgeCount).toBe(2);
      expect(stats.avgDegree).toBe(1.33);
      expect(stats.layerCount).toBe(2);
      expect(stats.avgLayerSize).toBe(1.5);
      expect(stats.warningCount).toBe(1);
      expect(stats.edgesByKind).toEqual({ sequential: 1, causal: 1, concurrent: 0, branch: 0, merge: 0 });
      expect(stats.firstTimestamp).toBe('2024-01-01T00:00:00.000Z');
      expect(stats.lastTimestamp).toBe('2024-01-11T00:00:00.000Z');
      expect(stats.timeSpanDays).toBe(10);
    });

    test('should report an empty graph', () => {
      const stats = db.getStats();
      expect(stats.nodeCount).toBe(0);
      expect(stats.avgDegree).toBe(0);
      expect(stats.firstTimestamp).toBeUndefined();
      expect(stats.timeSpanDays).toBe(0);
    });

    test('should export every node and edge', () => {
      db.addDocument({ id: 'a', content: 'x', timestamp: '2024-01-01' });
      db.addDocument({ id: 'b', content: 'y', timestamp: '2024-01-02' });
      db.addRelationship({ from: 'a', to: 'b', metadata: { note: 'follows' } });

      const dump = db.exportGraph();
      expect(dump.documents.map(d => d.id)).toEqual(['a', 'b']);
      expect(dump.relationships).toHaveLength(1);
      expect(dump.relationships[0]?.metadata).toEqual({ note: 'follows' });
    });
  });
});
