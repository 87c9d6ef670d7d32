// Core types for the temporal graph engine

import type { Instant, TimestampInput } from '../temporal/timestamp.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type Metadata = Record<string, JsonValue>;

export const RELATION_KINDS = ['sequential', 'causal', 'concurrent', 'branch', 'merge'] as const;

export type RelationKind = (typeof RELATION_KINDS)[number];

export function isRelationKind(value: string): value is RelationKind {
  return RELATION_KINDS.some(kind => kind === value);
}

export interface Document {
  id: string;
  content: string;
  timestamp: Instant;
  metadata: Metadata;
  layer: number;        // Weekly bucket, computed once on insert
}

/**
 * Attached to a `sequential` or `causal` edge whose source is later than its
 * target. Never thrown.
 */
export interface TemporalOrderWarning {
  kind: 'TemporalOrderWarning';
  relation: RelationKind;
  fromTimestamp: string;
  toTimestamp: string;
  message: string;
}

export interface Relationship {
  id: number;
  from: string;
  to: string;
  kind: RelationKind;
  weight: number;
  metadata?: Metadata;
  warning?: TemporalOrderWarning;
}

export interface AddDocumentInput {
  id: string;
  content: string;
  timestamp: TimestampInput;
  metadata?: Metadata;
}

export interface AddRelationshipInput {
  from: string;
  to: string;
  kind?: string;          // One of RELATION_KINDS; anything else is rejected
  weight?: number;
  metadata?: Metadata;
}

export interface RangeOptions {
  inclusiveEnd?: boolean;   // Default true: [start, end]
}

export interface GraphStats {
  nodeCount: number;
  edgeCount: number;
  avgDegree: number;
  layerCount: number;
  avgLayerSize: number;
  warningCount: number;
  edgesByKind: Record<RelationKind, number>;
  firstTimestamp?: string;
  lastTimestamp?: string;
  timeSpanDays: number;
}

export interface LayerIndexIssue {
  documentId: string;
  expectedLayer: number;
  indexedLayers: number[];
}

// ==================== TRAVERSAL ====================

/** Returned alongside partial results when a cancellation signal fires. */
export interface CancelledMarker {
  kind: 'Cancelled';
  stage: 'hop' | 'window';
  completed: number;        // Hops or windows finished before the signal
  reason?: string;
}

export interface ReachabilityOptions {
  timeWindowDays?: number;  // Unbounded when omitted
  maxHops?: number;
  maxResults?: number;
  signal?: AbortSignal;
}

export interface ReachableDocument {
  document: Document;
  hops: number;
}

export interface ReachabilityResult {
  sourceId: string;
  direction: 'forward' | 'backward';
  reachable: ReachableDocument[];
  truncated: boolean;
  cancelled?: CancelledMarker;
}

export interface PathOptions {
  maxHops?: number;
  signal?: AbortSignal;
}

export type PathResult =
  | { found: true; path: string[]; hops: number }
  | { found: false; cancelled: CancelledMarker; explored: number };

// ==================== SIMILARITY ====================

export interface SimilarityResult {
  id: string;
  similarity: number;
  distanceDays: number;
}

export interface AttentionEntry {
  id: string;
  score: number;
  distanceDays: number;
}

export interface AttentionResult {
  documentId: string;
  forward: AttentionEntry[];
  backward: AttentionEntry[];
  summary: {
    totalForwardWeight: number;
    totalBackwardWeight: number;
    attentionBalance: number;
    mostAttendedForward?: AttentionEntry;
    mostAttendedBackward?: AttentionEntry;
  };
}

export interface SimilarityStats {
  corpusSize: number;
  uniqueTerms: number;
  cachedVectors: number;
  cachedPairs: number;
  cacheHits: number;
  cacheMisses: number;
  rebuilds: number;
}
