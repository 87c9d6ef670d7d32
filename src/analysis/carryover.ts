import type { CarryoverCapacities } from '../config.js';
import { Instant } from '../temporal/timestamp.js';
import type {
  AttentionScore,
  Carryover,
  CriticalEvent,
  EntityStat,
  OpenQuestion,
  TimeRange,
} from './types.js';

// Per-window decay of carried attention and carried event importance
export const CARRY_DECAY = 0.8;

export function emptyCarryover(): Carryover {
  return {
    chunkIndex: -1,
    documentCount: 0,
    criticalEvents: [],
    keyEntities: [],
    causalChains: [],
    attentionScores: [],
    openQuestions: [],
  };
}

export const byId = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export function rankEvents(events: Iterable<CriticalEvent>): CriticalEvent[] {
  const best = new Map<string, CriticalEvent>();
  for (const event of events) {
    const seen = best.get(event.documentId);
    if (!seen || event.importance > seen.importance) {
      best.set(event.documentId, event);
    }
  }
  return [...best.values()].sort((a, b) => b.importance - a.importance || byId(a.documentId, b.documentId));
}

/** Merge entity tallies by token: mentions and weights add, first/last seen widen. */
export function mergeEntities(...groups: EntityStat[][]): EntityStat[] {
  const merged = new Map<string, EntityStat>();
  for (const group of groups) {
    for (const entity of group) {
      const seen = merged.get(entity.token);
      merged.set(
        entity.token,
        seen
          ? {
              token: entity.token,
              mentions: seen.mentions + entity.mentions,
              weight: seen.weight + entity.weight,
              firstSeen: Instant.min(seen.firstSeen, entity.firstSeen),
              lastSeen: Instant.max(seen.lastSeen, entity.lastSeen),
            }
          : { ...entity }
      );
    }
  }
  return [...merged.values()].sort((a, b) => b.weight - a.weight || byId(a.token, b.token));
}

const chainKey = (chain: readonly string[]): string => chain.join('\u0000');

function isPrefix(short: readonly string[], long: readonly string[]): boolean {
  return short.length < long.length && short.every((id, i) => long[i] === id);
}

/** Drop duplicate chains and chains that are a strict prefix of another. */
export function dedupeChains(chains: Iterable<string[]>): string[][] {
  const unique = new Map<string, string[]>();
  for (const chain of chains) {
    if (chain.length > 0) unique.set(chainKey(chain), chain);
  }
  const all = [...unique.values()];
  return all.filter(chain => !all.some(other => isPrefix(chain, other)));
}

export interface CarryoverParts {
  chunkIndex: number;
  documentCount: number;
  timeRange: TimeRange;
  criticalEvents: CriticalEvent[];
  keyEntities: EntityStat[];
  causalChains: string[][];
  chainTailTime: (chain: string[]) => number;
  attentionScores: Map<string, number>;
  openQuestions: OpenQuestion[];
}

/** Apply every capacity; the result is what the next window may read. */
export function boundCarryover(parts: CarryoverParts, caps: CarryoverCapacities): Carryover {
  const attentionScores: AttentionScore[] = [...parts.attentionScores]
    .map(([documentId, score]) => ({ documentId, score }))
    .sort((a, b) => b.score - a.score || byId(a.documentId, b.documentId))
    .slice(0, caps.maxAttention);

  // Most recently active chains first
  const causalChains = dedupeChains(parts.causalChains)
    .sort((a, b) => parts.chainTailTime(b) - parts.chainTailTime(a) || byId(chainKey(a), chainKey(b)))
    .slice(0, caps.maxChains);

  const openQuestions = [...parts.openQuestions]
    .sort((a, b) => b.raisedInChunk - a.raisedInChunk || byId(a.text, b.text))
    .slice(0, caps.maxOpenQuestions);

  return {
    chunkIndex: parts.chunkIndex,
    documentCount: parts.documentCount,
    timeRange: parts.timeRange,
    criticalEvents: rankEvents(parts.criticalEvents).slice(0, caps.maxEvents),
    keyEntities: mergeEntities(parts.keyEntities).slice(0, caps.maxEntities),
    causalChains,
    attentionScores,
    openQuestions,
  };
}

/**
 * Documents the next window pulls in as context: critical events, tails of
 * open chains and attention holders, in that order, without repeats.
 */
export function carriedDocumentIds(carryover: Carryover): string[] {
  const ids = new Set<string>();
  for (const event of carryover.criticalEvents) ids.add(event.documentId);
  for (const question of carryover.openQuestions) {
    const tail = question.chain[question.chain.length - 1];
    if (tail !== undefined) ids.add(tail);
  }
  for (const entry of carryover.attentionScores) ids.add(entry.documentId);
  return [...ids];
}

export function carryoverSize(carryover: Carryover): number {
  return (
    carryover.criticalEvents.length +
    carryover.keyEntities.length +
    carryover.causalChains.length +
    carryover.attentionScores.length +
    carryover.openQuestions.length
  );
}
