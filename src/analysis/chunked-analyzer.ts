import type { EngineConfig } from '../config.js';
import { InvalidArgumentError } from '../errors.js';
import type { SimilarityEngine } from '../similarity/engine.js';
import { tokenize } from '../similarity/tokenizer.js';
import type { GraphDB } from '../storage/database.js';
import { Instant, MS_PER_DAY } from '../temporal/timestamp.js';
import type { CancelledMarker, Document } from '../types/index.js';
import {
  CARRY_DECAY,
  boundCarryover,
  carriedDocumentIds,
  dedupeChains,
  emptyCarryover,
  mergeEntities,
  rankEvents,
} from './carryover.js';
import { buildChains, causalSuccessors, raiseQuestions, resolveQuestions } from './chains.js';
import { scoreWorkingSet, type ScoredDocument, type ScoringContext } from './scoring.js';
import type {
  AnalysisMetrics,
  AnalysisResult,
  AnalyzeOptions,
  Carryover,
  ChunkResult,
  CriticalEvent,
  EntityStat,
  OpenQuestion,
  TemporalSummaryWindow,
  Window,
} from './types.js';
import { evenWindows, fixedWindows, periodLabel } from './windows.js';

const DEFAULT_MAX_DAYS = 1825;
const RECENT_ATTENTION_DOCS = 10;
const RECENT_ATTENTION = 0.8;
const EVENT_ATTENTION = 1.0;
const SUMMARY_LENGTH = 100;
const SUMMARY_EVENTS = 3;
const SUMMARY_ENTITIES = 5;

const round = (value: number, digits: number): number => Math.round(value * 10 ** digits) / 10 ** digits;

function byTime(a: Document, b: Document): number {
  return a.timestamp.epochMs - b.timestamp.epochMs || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

function toEvent(scored: ScoredDocument): CriticalEvent {
  const { content } = scored.document;
  return {
    documentId: scored.document.id,
    importance: scored.importance,
    timestamp: scored.document.timestamp,
    summary: content.length > SUMMARY_LENGTH ? `${content.slice(0, SUMMARY_LENGTH)}...` : content,
  };
}

/**
 * Cost model for analysing every document against every other in one pass,
 * in milliseconds: fixed per-document overhead on small inputs, quadratic
 * attention cost beyond that.
 */
export function estimateUnwindowedMs(documents: number): number {
  if (documents < 50) return 10 * documents;
  return 0.1 * documents + 0.01 * documents * documents;
}

/**
 * Walks a long span of the graph one time window at a time. Only the
 * window's own documents and a bounded carryover from the previous window
 * are ever held together.
 */
export class ChunkedAnalyzer {
  private scoring: ScoringContext;

  constructor(
    private db: GraphDB,
    private similarity: SimilarityEngine,
    private config: EngineConfig
  ) {
    this.scoring = { db, similarity, weights: config.weights };
  }

  analyzeLongChain(options: AnalyzeOptions): AnalysisResult {
    const startedAt = performance.now();
    const maxDays = options.maxDays ?? DEFAULT_MAX_DAYS;
    if (!(maxDays > 0) || !Number.isFinite(maxDays)) {
      throw new InvalidArgumentError(`maxDays must be a positive number, got ${maxDays}`);
    }

    const start = this.db.getDocument(options.startDocumentId);
    let spanEnd = start.timestamp.plusDays(maxDays);
    if (options.endDocumentId !== undefined) {
      const end = this.db.getDocument(options.endDocumentId);
      if (end.timestamp.isBefore(start.timestamp)) {
        throw new InvalidArgumentError(
          `End document "${end.id}" (${end.timestamp.toISOString()}) precedes start document "${start.id}" (${start.timestamp.toISOString()})`
        );
      }
      spanEnd = end.timestamp;
    }

    const windows = fixedWindows(start.timestamp, spanEnd, options.chunkSizeDays ?? this.config.chunkSizeDays);
    this.log(`📊 Analyzing ${start.id} over ${windows.length} window(s)`);

    const chunks: ChunkResult[] = [];
    let carryover = emptyCarryover();
    let cancelled: CancelledMarker | undefined;

    for (const window of windows) {
      if (options.signal?.aborted) {
        const reason: unknown = options.signal.reason;
        cancelled = {
          kind: 'Cancelled',
          stage: 'window',
          completed: chunks.length,
          ...(reason instanceof Error ? { reason: reason.message } : typeof reason === 'string' ? { reason } : {}),
        };
        this.log(`⚠️  Analysis cancelled after ${chunks.length} window(s)`);
        break;
      }

      const chunk = this.processWindow(window, carryover);
      chunks.push(chunk);
      carryover = chunk.carryover;
      this.log(
        `   Window ${window.index + 1}/${windows.length}: ${chunk.newDocumentIds.length} new, ` +
          `${chunk.carriedDocumentIds.length} carried, ${chunk.criticalEvents.length} events`
      );
      options.onChunk?.(chunk);
    }

    const totalProcessingMs = performance.now() - startedAt;
    const spanMs = spanEnd.epochMs - start.timestamp.epochMs;

    return {
      startDocumentId: start.id,
      ...(options.endDocumentId !== undefined && { endDocumentId: options.endDocumentId }),
      span: { start: start.timestamp, end: spanEnd, days: round(spanMs / MS_PER_DAY, 4), ms: spanMs },
      windowCount: windows.length,
      chunks,
      criticalEvents: rankEvents(chunks.flatMap(chunk => chunk.criticalEvents)),
      entities: mergeEntities(...chunks.map(chunk => chunk.entities)),
      causalChains: dedupeChains([...chunks.flatMap(chunk => chunk.causalChains), ...carryover.causalChains]),
      finalCarryover: carryover,
      metrics: this.metrics(chunks, totalProcessingMs),
      ...(cancelled && { cancelled }),
    };
  }

  /**
   * Split `[start, end]` into `numChunks` equal windows and describe each on
   * its own. Nothing is carried between windows.
   */
  getTemporalSummary(startDocumentId: string, endDocumentId: string, numChunks = 10): TemporalSummaryWindow[] {
    const start = this.db.getDocument(startDocumentId);
    const end = this.db.getDocument(endDocumentId);
    if (end.timestamp.isBefore(start.timestamp)) {
      throw new InvalidArgumentError(`End document "${end.id}" precedes start document "${start.id}"`);
    }

    return evenWindows(start.timestamp, end.timestamp, numChunks).map(window => {
      const chunk = this.processWindow(window, emptyCarryover());
      return {
        index: window.index,
        start: window.start,
        end: window.end,
        period: periodLabel(window),
        newDocumentIds: chunk.newDocumentIds,
        documentCount: chunk.newDocumentIds.length,
        keyEvents: chunk.criticalEvents.slice(0, SUMMARY_EVENTS),
        causalLinkCount: chunk.causalLinkCount,
        topEntities: chunk.entities.slice(0, SUMMARY_ENTITIES),
      };
    });
  }

  private processWindow(window: Window, previous: Carryover): ChunkResult {
    const startedAt = performance.now();
    const { capacities } = this.config;

    const windowDocs = this.db.getDocumentsInRange(window.start, window.end, { inclusiveEnd: window.closed });
    const windowIds = new Set(windowDocs.map(doc => doc.id));
    const carriedDocs = carriedDocumentIds(previous)
      .filter(id => !windowIds.has(id) && this.db.hasDocument(id))
      .map(id => this.db.getDocument(id));

    const workingSet = [...carriedDocs, ...windowDocs].sort(byTime);
    const members = new Set(workingSet.map(doc => doc.id));
    const times = new Map(workingSet.map(doc => [doc.id, doc.timestamp.epochMs] as const));

    const scored = scoreWorkingSet(this.scoring, window, workingSet, windowIds, previous);
    const criticalEvents = scored.filter(s => s.isNew).slice(0, capacities.maxEvents).map(toEvent);
    const entities = this.extractEntities(windowDocs);

    const order = workingSet.map(doc => doc.id);
    const chains = buildChains(
      causalSuccessors(this.db, order),
      order,
      previous.causalChains,
      windowIds,
      capacities.maxChainLength
    );

    const { resolved, pending } = resolveQuestions(previous.openQuestions, members);
    const pendingTexts = new Set(pending.map(q => q.text));
    const chained = new Set(chains.chains.flat());
    const candidates = [...chains.chains, ...windowDocs.filter(doc => !chained.has(doc.id)).map(doc => [doc.id])];
    const openQuestions: OpenQuestion[] = [
      ...pending,
      ...raiseQuestions(this.db, candidates, window, members, window.index).filter(q => !pendingTexts.has(q.text)),
    ];

    const attention = new Map<string, number>();
    for (const s of scored) {
      const score = s.isNew ? s.attention : s.attention * CARRY_DECAY;
      if (score > 0) attention.set(s.document.id, round(score, 6));
    }
    for (const doc of windowDocs.slice(-RECENT_ATTENTION_DOCS)) {
      attention.set(doc.id, Math.max(attention.get(doc.id) ?? 0, RECENT_ATTENTION));
    }
    for (const event of criticalEvents) {
      attention.set(event.documentId, EVENT_ATTENTION);
    }

    const carryover = boundCarryover(
      {
        chunkIndex: window.index,
        documentCount: previous.documentCount + windowDocs.length,
        timeRange: { start: previous.timeRange?.start ?? window.start, end: window.end },
        criticalEvents: [
          ...previous.criticalEvents.map(event => ({ ...event, importance: round(event.importance * CARRY_DECAY, 6) })),
          ...criticalEvents,
        ],
        keyEntities: mergeEntities(previous.keyEntities, entities),
        causalChains: chains.chains,
        chainTailTime: chain => this.tailTime(chain, times),
        attentionScores: attention,
        openQuestions,
      },
      capacities
    );

    return {
      index: window.index,
      start: window.start,
      end: window.end,
      newDocumentIds: windowDocs.map(doc => doc.id),
      carriedDocumentIds: carriedDocs.map(doc => doc.id),
      criticalEvents,
      entities,
      causalChains: chains.local,
      causalLinkCount: chains.linkCount,
      openQuestions: carryover.openQuestions,
      resolvedQuestions: resolved,
      carryover,
      workingSetSize: workingSet.length,
      processingMs: round(performance.now() - startedAt, 3),
    };
  }

  /** Weighted tokens mentioned at least twice across the window's documents. */
  private extractEntities(windowDocs: readonly Document[]): EntityStat[] {
    if (windowDocs.length === 0) return [];

    const terms = this.similarity.topTerms(
      windowDocs.map(doc => doc.id),
      this.config.capacities.maxEntities,
      2
    );
    const seen = new Map<string, { first: Instant; last: Instant }>();
    const wanted = new Set(terms.map(term => term.term));

    for (const doc of windowDocs) {
      for (const token of new Set(tokenize(doc.content))) {
        if (!wanted.has(token)) continue;
        const span = seen.get(token);
        seen.set(token, span ? { first: span.first, last: doc.timestamp } : { first: doc.timestamp, last: doc.timestamp });
      }
    }

    return terms.flatMap(term => {
      const span = seen.get(term.term);
      return span
        ? [{ token: term.term, mentions: term.mentions, weight: term.weight, firstSeen: span.first, lastSeen: span.last }]
        : [];
    });
  }

  private tailTime(chain: string[], times: ReadonlyMap<string, number>): number {
    const tail = chain[chain.length - 1];
    if (tail === undefined) return 0;
    return times.get(tail) ?? (this.db.hasDocument(tail) ? this.db.getDocument(tail).timestamp.epochMs : 0);
  }

  private metrics(chunks: ChunkResult[], totalProcessingMs: number): AnalysisMetrics {
    const documentsProcessed = chunks.reduce((sum, chunk) => sum + chunk.newDocumentIds.length, 0);
    const estimatedUnwindowedMs = estimateUnwindowedMs(documentsProcessed);
    const count = Math.max(1, chunks.length);

    return {
      totalProcessingMs: round(totalProcessingMs, 3),
      documentsProcessed,
      avgChunkMs: round(chunks.reduce((sum, chunk) => sum + chunk.processingMs, 0) / count, 3),
      avgChunkSize: round(documentsProcessed / count, 2),
      peakWorkingSet: chunks.reduce((peak, chunk) => Math.max(peak, chunk.workingSetSize), 0),
      estimatedUnwindowedMs: round(estimatedUnwindowedMs, 3),
      speedup: round(estimatedUnwindowedMs / Math.max(totalProcessingMs, 0.001), 2),
    };
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.error(message);
    }
  }
}
