import type { Instant } from '../temporal/timestamp.js';
import type { CancelledMarker } from '../types/index.js';

export interface CriticalEvent {
  documentId: string;
  importance: number;
  timestamp: Instant;
  summary: string;
}

export interface EntityStat {
  token: string;
  mentions: number;
  weight: number;
  firstSeen: Instant;
  lastSeen: Instant;
}

export interface AttentionScore {
  documentId: string;
  score: number;
}

/** A causal chain whose tail points past the window it was seen in. */
export interface OpenQuestion {
  text: string;
  chain: string[];
  awaiting: string[];
  raisedInChunk: number;
}

export interface TimeRange {
  start: Instant;
  end: Instant;
}

/**
 * Everything one window hands to the next. Every list is capped by
 * {@link CarryoverCapacities}, so its size does not grow with the corpus.
 */
export interface Carryover {
  chunkIndex: number;
  documentCount: number;
  timeRange?: TimeRange;
  criticalEvents: CriticalEvent[];
  keyEntities: EntityStat[];
  causalChains: string[][];
  attentionScores: AttentionScore[];
  openQuestions: OpenQuestion[];
}

export interface Window {
  index: number;
  start: Instant;
  end: Instant;
  closed: boolean;    // Last window includes its end instant
}

export interface ChunkResult {
  index: number;
  start: Instant;
  end: Instant;
  newDocumentIds: string[];
  carriedDocumentIds: string[];
  criticalEvents: CriticalEvent[];
  entities: EntityStat[];
  causalChains: string[][];
  causalLinkCount: number;
  openQuestions: OpenQuestion[];
  resolvedQuestions: OpenQuestion[];
  carryover: Carryover;
  workingSetSize: number;
  processingMs: number;
}

export interface AnalysisMetrics {
  totalProcessingMs: number;
  documentsProcessed: number;
  avgChunkMs: number;
  avgChunkSize: number;
  peakWorkingSet: number;
  estimatedUnwindowedMs: number;
  speedup: number;
}

export interface AnalysisResult {
  startDocumentId: string;
  endDocumentId?: string;
  span: TimeRange & { days: number; ms: number };
  windowCount: number;
  chunks: ChunkResult[];
  criticalEvents: CriticalEvent[];
  entities: EntityStat[];
  causalChains: string[][];
  finalCarryover: Carryover;
  metrics: AnalysisMetrics;
  cancelled?: CancelledMarker;
}

export interface AnalyzeOptions {
  startDocumentId: string;
  endDocumentId?: string;
  maxDays?: number;
  chunkSizeDays?: number;
  signal?: AbortSignal;
  onChunk?: (chunk: ChunkResult) => void;
}

export interface TemporalSummaryWindow {
  index: number;
  start: Instant;
  end: Instant;
  period: string;
  newDocumentIds: string[];
  documentCount: number;
  keyEvents: CriticalEvent[];
  causalLinkCount: number;
  topEntities: EntityStat[];
}
