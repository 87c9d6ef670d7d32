// Plain-JSON views of engine values. Every timestamp is YYYY-MM-DDTHH:mm:ss.sssZ.

import type {
  AnalysisMetrics,
  AnalysisResult,
  Carryover,
  ChunkResult,
  CriticalEvent,
  EntityStat,
  OpenQuestion,
  TemporalSummaryWindow,
} from '../analysis/types.js';
import { formatTimestamp } from '../temporal/timestamp.js';
import type {
  CancelledMarker,
  Document,
  Metadata,
  ReachabilityResult,
  RelationKind,
  Relationship,
  TemporalOrderWarning,
} from '../types/index.js';

export interface SerializedDocument {
  id: string;
  content: string;
  timestamp: string;
  metadata: Metadata;
  layer: number;
}

export interface SerializedRelationship {
  id: number;
  from: string;
  to: string;
  kind: RelationKind;
  weight: number;
  metadata?: Metadata;
  warning?: TemporalOrderWarning;
}

export interface SerializedCriticalEvent {
  documentId: string;
  importance: number;
  timestamp: string;
  summary: string;
}

export interface SerializedEntity {
  token: string;
  mentions: number;
  weight: number;
  firstSeen: string;
  lastSeen: string;
}

export interface SerializedCarryover {
  chunkIndex: number;
  documentCount: number;
  timeRange?: { start: string; end: string };
  criticalEvents: SerializedCriticalEvent[];
  keyEntities: SerializedEntity[];
  causalChains: string[][];
  attentionScores: Array<{ documentId: string; score: number }>;
  openQuestions: OpenQuestion[];
}

export interface SerializedChunkResult {
  index: number;
  start: string;
  end: string;
  newDocumentIds: string[];
  carriedDocumentIds: string[];
  criticalEvents: SerializedCriticalEvent[];
  entities: SerializedEntity[];
  causalChains: string[][];
  causalLinkCount: number;
  openQuestions: OpenQuestion[];
  resolvedQuestions: OpenQuestion[];
  carryover: SerializedCarryover;
  workingSetSize: number;
  processingMs: number;
}

export interface SerializedAnalysisResult {
  startDocumentId: string;
  endDocumentId?: string;
  span: { start: string; end: string; days: number; ms: number };
  windowCount: number;
  chunks: SerializedChunkResult[];
  criticalEvents: SerializedCriticalEvent[];
  entities: SerializedEntity[];
  causalChains: string[][];
  finalCarryover: SerializedCarryover;
  metrics: AnalysisMetrics;
  cancelled?: CancelledMarker;
}

export interface SerializedSummaryWindow {
  index: number;
  start: string;
  end: string;
  period: string;
  newDocumentIds: string[];
  documentCount: number;
  keyEvents: SerializedCriticalEvent[];
  causalLinkCount: number;
  topEntities: SerializedEntity[];
}

export interface SerializedReachability {
  sourceId: string;
  direction: 'forward' | 'backward';
  reachable: Array<SerializedDocument & { hops: number }>;
  truncated: boolean;
  cancelled?: CancelledMarker;
}

export function serializeDocument(doc: Document): SerializedDocument {
  return {
    id: doc.id,
    content: doc.content,
    timestamp: formatTimestamp(doc.timestamp),
    metadata: doc.metadata,
    layer: doc.layer,
  };
}

export function serializeRelationship(rel: Relationship): SerializedRelationship {
  return {
    id: rel.id,
    from: rel.from,
    to: rel.to,
    kind: rel.kind,
    weight: rel.weight,
    ...(rel.metadata && { metadata: rel.metadata }),
    ...(rel.warning && { warning: rel.warning }),
  };
}

export function serializeReachability(result: ReachabilityResult): SerializedReachability {
  return {
    sourceId: result.sourceId,
    direction: result.direction,
    reachable: result.reachable.map(({ document, hops }) => ({ ...serializeDocument(document), hops })),
    truncated: result.truncated,
    ...(result.cancelled && { cancelled: result.cancelled }),
  };
}

function serializeEvent(event: CriticalEvent): SerializedCriticalEvent {
  return {
    documentId: event.documentId,
    importance: event.importance,
    timestamp: formatTimestamp(event.timestamp),
    summary: event.summary,
  };
}

function serializeEntity(entity: EntityStat): SerializedEntity {
  return {
    token: entity.token,
    mentions: entity.mentions,
    weight: entity.weight,
    firstSeen: formatTimestamp(entity.firstSeen),
    lastSeen: formatTimestamp(entity.lastSeen),
  };
}

export function serializeCarryover(carryover: Carryover): SerializedCarryover {
  return {
    chunkIndex: carryover.chunkIndex,
    documentCount: carryover.documentCount,
    ...(carryover.timeRange && {
      timeRange: {
        start: formatTimestamp(carryover.timeRange.start),
        end: formatTimestamp(carryover.timeRange.end),
      },
    }),
    criticalEvents: carryover.criticalEvents.map(serializeEvent),
    keyEntities: carryover.keyEntities.map(serializeEntity),
    causalChains: carryover.causalChains.map(chain => [...chain]),
    attentionScores: carryover.attentionScores.map(entry => ({ ...entry })),
    openQuestions: carryover.openQuestions.map(question => ({ ...question })),
  };
}

export function serializeChunkResult(chunk: ChunkResult): SerializedChunkResult {
  return {
    index: chunk.index,
    start: formatTimestamp(chunk.start),
    end: formatTimestamp(chunk.end),
    newDocumentIds: chunk.newDocumentIds,
    carriedDocumentIds: chunk.carriedDocumentIds,
    criticalEvents: chunk.criticalEvents.map(serializeEvent),
    entities: chunk.entities.map(serializeEntity),
    causalChains: chunk.causalChains,
    causalLinkCount: chunk.causalLinkCount,
    openQuestions: chunk.openQuestions,
    resolvedQuestions: chunk.resolvedQuestions,
    carryover: serializeCarryover(chunk.carryover),
    workingSetSize: chunk.workingSetSize,
    processingMs: chunk.processingMs,
  };
}

export function serializeAnalysisResult(result: AnalysisResult): SerializedAnalysisResult {
  return {
    startDocumentId: result.startDocumentId,
    ...(result.endDocumentId !== undefined && { endDocumentId: result.endDocumentId }),
    span: {
      start: formatTimestamp(result.span.start),
      end: formatTimestamp(result.span.end),
      days: result.span.days,
      ms: result.span.ms,
    },
    windowCount: result.windowCount,
    chunks: result.chunks.map(serializeChunkResult),
    criticalEvents: result.criticalEvents.map(serializeEvent),
    entities: result.entities.map(serializeEntity),
    causalChains: result.causalChains,
    finalCarryover: serializeCarryover(result.finalCarryover),
    metrics: result.metrics,
    ...(result.cancelled && { cancelled: result.cancelled }),
  };
}

export function serializeSummaryWindow(window: TemporalSummaryWindow): SerializedSummaryWindow {
  return {
    index: window.index,
    start: formatTimestamp(window.start),
    end: formatTimestamp(window.end),
    period: window.period,
    newDocumentIds: window.newDocumentIds,
    documentCount: window.documentCount,
    keyEvents: window.keyEvents.map(serializeEvent),
    causalLinkCount: window.causalLinkCount,
    topEntities: window.topEntities.map(serializeEntity),
  };
}
