import { ChunkedAnalyzer } from '../analysis/chunked-analyzer.js';
import type { AnalysisResult, AnalyzeOptions, TemporalSummaryWindow } from '../analysis/types.js';
import { resolveConfig, type EngineConfig } from '../config.js';
import { TraversalEngine } from '../graph/traversal.js';
import { SimilarityEngine, type TermStat } from '../similarity/engine.js';
import { GraphDB, type GraphExport, type NeighborLink } from '../storage/database.js';
import type { TimestampInput } from '../temporal/timestamp.js';
import type {
  AttentionResult,
  Document,
  GraphStats,
  LayerIndexIssue,
  Metadata,
  PathOptions,
  PathResult,
  RangeOptions,
  ReachabilityOptions,
  ReachabilityResult,
  RelationKind,
  Relationship,
  SimilarityResult,
  SimilarityStats,
} from '../types/index.js';
import {
  serializeDocument,
  serializeRelationship,
  type SerializedDocument,
  type SerializedRelationship,
} from './serialization.js';

export interface GraphStatistics {
  graph: GraphStats;
  similarity: SimilarityStats;
}

export interface SerializedGraphExport {
  documents: SerializedDocument[];
  relationships: SerializedRelationship[];
}

/**
 * Single entry point over the store, traversal, similarity and analyzer.
 * Errors from the components surface unchanged.
 */
export class GraphAPI {
  private db: GraphDB;
  private traversal: TraversalEngine;
  private similarityEngine: SimilarityEngine;
  private analyzer: ChunkedAnalyzer;
  readonly config: EngineConfig;

  constructor(config: Partial<EngineConfig> = {}) {
    this.config = resolveConfig(config);
    this.db = new GraphDB({
      layerDurationDays: this.config.layerDurationDays,
      verbose: this.config.verbose,
    });
    this.traversal = new TraversalEngine(this.db);
    this.similarityEngine = new SimilarityEngine(this.db, this.traversal);
    this.analyzer = new ChunkedAnalyzer(this.db, this.similarityEngine, this.config);
  }

  // ==================== DOCUMENTS ====================

  addDocument(id: string, content: string, timestamp: TimestampInput, metadata?: Metadata): Document {
    return this.db.addDocument({ id, content, timestamp, ...(metadata && { metadata }) });
  }

  getDocument(id: string): Document {
    return this.db.getDocument(id);
  }

  hasDocument(id: string): boolean {
    return this.db.hasDocument(id);
  }

  listDocuments(limit?: number): Document[] {
    return this.db.listDocuments(limit);
  }

  updateMetadata(id: string, metadata: Metadata, merge = true): Document {
    return this.db.updateMetadata(id, metadata, merge);
  }

  getDocumentsInRange(start: TimestampInput, end: TimestampInput, options?: RangeOptions): Document[] {
    return this.db.getDocumentsInRange(start, end, options);
  }

  getLayer(layer: number): string[] {
    return this.db.getLayer(layer);
  }

  verifyLayerIndex(): LayerIndexIssue[] {
    return this.db.verifyLayerIndex();
  }

  // ==================== RELATIONSHIPS ====================

  addRelationship(
    from: string,
    to: string,
    kind: RelationKind = 'sequential',
    weight = 1.0,
    metadata?: Metadata
  ): Relationship {
    return this.db.addRelationship({ from, to, kind, weight, ...(metadata && { metadata }) });
  }

  getRelationships(from: string, to: string): Relationship[] {
    return this.db.getRelationships(from, to);
  }

  getTemporalWarnings(): Relationship[] {
    return this.db.getTemporalWarnings();
  }

  getOutgoing(id: string): NeighborLink[] {
    return this.db.getOutgoing(id);
  }

  getIncoming(id: string): NeighborLink[] {
    return this.db.getIncoming(id);
  }

  getDegree(id: string): { in: number; out: number } {
    return this.db.getDegree(id);
  }

  // ==================== TRAVERSAL ====================

  forwardReachable(id: string, options?: ReachabilityOptions): ReachabilityResult {
    return this.traversal.forwardReachable(id, options);
  }

  backwardReachable(id: string, options?: ReachabilityOptions): ReachabilityResult {
    return this.traversal.backwardReachable(id, options);
  }

  findPath(from: string, to: string, options?: PathOptions): PathResult {
    return this.traversal.findPath(from, to, options);
  }

  hasPath(from: string, to: string, maxHops?: number): boolean {
    return this.traversal.hasPath(from, to, maxHops);
  }

  // ==================== SIMILARITY ====================

  similarity(a: string, b: string): number {
    return this.similarityEngine.similarity(a, b);
  }

  findSimilar(id: string, limit?: number): SimilarityResult[] {
    return this.similarityEngine.findSimilar(id, limit);
  }

  computeAttention(id: string, maxPerDirection?: number): AttentionResult {
    return this.similarityEngine.computeAttention(id, maxPerDirection);
  }

  topTerms(ids: Iterable<string>, limit = 10): TermStat[] {
    return this.similarityEngine.topTerms(ids, limit);
  }

  // ==================== ANALYSIS ====================

  analyzeLongChain(options: AnalyzeOptions): AnalysisResult {
    return this.analyzer.analyzeLongChain(options);
  }

  getTemporalSummary(startId: string, endId: string, numChunks?: number): TemporalSummaryWindow[] {
    return this.analyzer.getTemporalSummary(startId, endId, numChunks);
  }

  // ==================== STATISTICS & EXPORT ====================

  getStatistics(): GraphStatistics {
    return {
      graph: this.db.getStats(),
      similarity: this.similarityEngine.getStatistics(),
    };
  }

  exportGraph(): SerializedGraphExport {
    const { documents, relationships }: GraphExport = this.db.exportGraph();
    return {
      documents: documents.map(serializeDocument),
      relationships: relationships.map(serializeRelationship),
    };
  }

  close(): void {
    this.db.close();
  }
}
