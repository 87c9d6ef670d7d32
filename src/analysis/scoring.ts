import type { ImportanceWeights } from '../config.js';
import type { SimilarityEngine } from '../similarity/engine.js';
import type { GraphDB } from '../storage/database.js';
import type { Document } from '../types/index.js';
import { CARRY_DECAY, byId } from './carryover.js';
import type { Carryover, Window } from './types.js';

const INHERIT_HOPS = 3;

export interface ScoringContext {
  db: GraphDB;
  similarity: SimilarityEngine;
  weights: ImportanceWeights;
}

export interface ScoredDocument {
  document: Document;
  isNew: boolean;
  connectivity: number;
  attention: number;
  recency: number;
  importance: number;
}

/**
 * Hop distance to every working-set member reachable from `sourceId` along
 * outgoing edges within `maxHops`, never earlier than the source.
 */
export function reachableInSet(
  db: GraphDB,
  sourceId: string,
  members: ReadonlySet<string>,
  maxHops: number
): Map<string, number> {
  const source = db.getDocument(sourceId);
  const hopsTo = new Map<string, number>([[sourceId, 0]]);
  let frontier = [sourceId];

  for (let hop = 1; hop <= maxHops && frontier.length > 0; hop++) {
    const next: string[] = [];
    for (const current of frontier) {
      for (const link of db.getOutgoing(current)) {
        if (hopsTo.has(link.neighborId) || !members.has(link.neighborId)) continue;
        if (link.neighborTimestamp.isBefore(source.timestamp)) continue;
        hopsTo.set(link.neighborId, hop);
        next.push(link.neighborId);
      }
    }
    frontier = next;
  }

  hopsTo.delete(sourceId);
  return hopsTo;
}

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));
const round = (value: number): number => Math.round(value * 1e6) / 1e6;

/**
 * Attention per working-set document: the highest of its carried score, the
 * decayed score it inherits by being reachable from a carried document, and
 * its similarity to a carried critical event scaled by that event's
 * attention.
 */
export function attentionScores(
  ctx: ScoringContext,
  workingSet: readonly Document[],
  windowIds: ReadonlySet<string>,
  carryover: Carryover
): Map<string, number> {
  const carried = new Map(carryover.attentionScores.map(entry => [entry.documentId, entry.score] as const));
  const scores = new Map<string, number>();
  const raise = (id: string, score: number): void => {
    scores.set(id, Math.max(scores.get(id) ?? 0, clamp01(score)));
  };

  for (const doc of workingSet) {
    raise(doc.id, carried.get(doc.id) ?? 0);
  }

  const members = new Set(workingSet.map(doc => doc.id));
  for (const [sourceId, score] of carried) {
    if (!members.has(sourceId)) continue;
    for (const [id, hops] of reachableInSet(ctx.db, sourceId, members, INHERIT_HOPS)) {
      if (windowIds.has(id)) {
        raise(id, score * CARRY_DECAY ** hops);
      }
    }
  }

  for (const event of carryover.criticalEvents) {
    const eventAttention = carried.get(event.documentId) ?? event.importance;
    for (const doc of workingSet) {
      if (!windowIds.has(doc.id)) continue;
      raise(doc.id, ctx.similarity.similarity(doc.id, event.documentId) * eventAttention);
    }
  }

  return scores;
}

/** Degree inside the working set, divided by the largest such degree. */
export function connectivityScores(ctx: ScoringContext, workingSet: readonly Document[]): Map<string, number> {
  const members = new Set(workingSet.map(doc => doc.id));
  const degrees = new Map<string, number>();

  for (const doc of workingSet) {
    const links = [...ctx.db.getOutgoing(doc.id), ...ctx.db.getIncoming(doc.id)];
    degrees.set(doc.id, links.filter(link => members.has(link.neighborId)).length);
  }

  let max = 0;
  for (const degree of degrees.values()) max = Math.max(max, degree);
  return new Map([...degrees].map(([id, degree]) => [id, max > 0 ? degree / max : 0] as const));
}

/** Position within the window: 0 at its start, 1 at its end. Carried documents score 0. */
export function recencyScore(window: Window, doc: Document, isNew: boolean): number {
  if (!isNew) return 0;
  const spanMs = window.end.epochMs - window.start.epochMs;
  if (spanMs <= 0) return 1;
  return clamp01((doc.timestamp.epochMs - window.start.epochMs) / spanMs);
}

/**
 * Weighted importance per working-set document, sorted by importance
 * descending then id. Weights are normalized so scores stay in [0, 1].
 */
export function scoreWorkingSet(
  ctx: ScoringContext,
  window: Window,
  workingSet: readonly Document[],
  windowIds: ReadonlySet<string>,
  carryover: Carryover
): ScoredDocument[] {
  const attention = attentionScores(ctx, workingSet, windowIds, carryover);
  const connectivity = connectivityScores(ctx, workingSet);
  const { connectivity: wC, attention: wA, recency: wR } = ctx.weights;
  const total = wC + wA + wR;

  return workingSet
    .map(document => {
      const isNew = windowIds.has(document.id);
      const c = connectivity.get(document.id) ?? 0;
      const a = attention.get(document.id) ?? 0;
      const r = recencyScore(window, document, isNew);
      return {
        document,
        isNew,
        connectivity: round(c),
        attention: round(a),
        recency: round(r),
        importance: round((wC * c + wA * a + wR * r) / total),
      };
    })
    .sort((x, y) => y.importance - x.importance || byId(x.document.id, y.document.id));
}
