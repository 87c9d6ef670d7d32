import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { GraphAPI } from '../api/graph-api.js';
import {
  serializeAnalysisResult,
  serializeDocument,
  serializeReachability,
  serializeRelationship,
  serializeSummaryWindow,
} from '../api/serialization.js';
import type { EngineConfig } from '../config.js';
import { isTemporalGraphError } from '../errors.js';
import {
  AddDocumentSchema,
  AddRelationshipSchema,
  AnalyzeChainSchema,
  ComputeAttentionSchema,
  DocumentsInRangeSchema,
  FindPathSchema,
  FindSimilarSchema,
  GetDocumentSchema,
  ReachableSchema,
  SimilaritySchema,
  TemporalSummarySchema,
  tools,
} from './tools.js';

function textResult(payload: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    ...(isError && { isError }),
  };
}

export class TempochainServer {
  private server: Server;
  readonly api: GraphAPI;

  constructor(config: Partial<EngineConfig> = {}) {
    this.api = new GraphAPI(config);
    this.server = new Server(
      {
        name: 'tempochain',
        version: '0.1.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools,
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async request =>
      this.callTool(request.params.name, request.params.arguments ?? {})
    );
  }

  /** Dispatch one tool call; failures come back as error results, never as throws. */
  callTool(name: string, args: unknown): CallToolResult {
    try {
      switch (name) {
        case 'tempochain_add_document':
          return this.handleAddDocument(args);
        case 'tempochain_add_relationship':
          return this.handleAddRelationship(args);
        case 'tempochain_get_document':
          return this.handleGetDocument(args);
        case 'tempochain_documents_in_range':
          return this.handleDocumentsInRange(args);
        case 'tempochain_forward_reachable':
          return this.handleReachable(args, 'forward');
        case 'tempochain_backward_reachable':
          return this.handleReachable(args, 'backward');
        case 'tempochain_find_path':
          return this.handleFindPath(args);
        case 'tempochain_similarity':
          return this.handleSimilarity(args);
        case 'tempochain_find_similar':
          return this.handleFindSimilar(args);
        case 'tempochain_compute_attention':
          return this.handleComputeAttention(args);
        case 'tempochain_analyze_chain':
          return this.handleAnalyzeChain(args);
        case 'tempochain_temporal_summary':
          return this.handleTemporalSummary(args);
        case 'tempochain_stats':
          return textResult(this.api.getStatistics());
        case 'tempochain_export':
          return textResult(this.api.exportGraph());
        default:
          return textResult({ error: { kind: 'InvalidArgument', message: `Unknown tool: ${name}` } }, true);
      }
    } catch (error) {
      return this.errorResult(name, error);
    }
  }

  private errorResult(name: string, error: unknown): CallToolResult {
    if (isTemporalGraphError(error)) {
      return textResult({ error: { kind: error.kind, message: error.message } }, true);
    }
    if (error instanceof ZodError) {
      const message = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
      return textResult({ error: { kind: 'InvalidArgument', message } }, true);
    }
    console.error(`❌ Tool ${name} error:`, error);
    const message = error instanceof Error ? error.message : String(error);
    return textResult({ error: { kind: 'Internal', message } }, true);
  }

  private handleAddDocument(args: unknown): CallToolResult {
    const { id, content, timestamp, metadata } = AddDocumentSchema.parse(args);
    const doc = this.api.addDocument(id, content, timestamp, metadata);
    return textResult({
      success: true,
      document: serializeDocument(doc),
      message: `Document "${id}" added`,
    });
  }

  private handleAddRelationship(args: unknown): CallToolResult {
    const { from, to, kind, weight, metadata } = AddRelationshipSchema.parse(args);
    const relationship = this.api.addRelationship(from, to, kind, weight, metadata);
    return textResult({
      success: true,
      relationship: serializeRelationship(relationship),
      message: relationship.warning
        ? relationship.warning.message
        : `Created ${kind} relationship: ${from} → ${to}`,
    });
  }

  private handleGetDocument(args: unknown): CallToolResult {
    const { id } = GetDocumentSchema.parse(args);
    const doc = this.api.getDocument(id);
    return textResult({
      document: serializeDocument(doc),
      degree: this.api.getDegree(id),
    });
  }

  private handleDocumentsInRange(args: unknown): CallToolResult {
    const { start, end, inclusive_end } = DocumentsInRangeSchema.parse(args);
    const documents = this.api.getDocumentsInRange(start, end, { inclusiveEnd: inclusive_end });
    return textResult({
      count: documents.length,
      documents: documents.map(serializeDocument),
    });
  }

  private handleReachable(args: unknown, direction: 'forward' | 'backward'): CallToolResult {
    const { id, time_window_days, max_hops, max_results } = ReachableSchema.parse(args);
    const options = {
      maxHops: max_hops,
      maxResults: max_results,
      ...(time_window_days !== undefined && { timeWindowDays: time_window_days }),
    };
    const result = direction === 'forward'
      ? this.api.forwardReachable(id, options)
      : this.api.backwardReachable(id, options);
    return textResult(serializeReachability(result));
  }

  private handleFindPath(args: unknown): CallToolResult {
    const { from, to, max_hops } = FindPathSchema.parse(args);
    return textResult(this.api.findPath(from, to, { maxHops: max_hops }));
  }

  private handleSimilarity(args: unknown): CallToolResult {
    const { a, b } = SimilaritySchema.parse(args);
    return textResult({ a, b, similarity: this.api.similarity(a, b) });
  }

  private handleFindSimilar(args: unknown): CallToolResult {
    const { id, limit } = FindSimilarSchema.parse(args);
    const results = this.api.findSimilar(id, limit);
    return textResult({ query_id: id, count: results.length, results });
  }

  private handleComputeAttention(args: unknown): CallToolResult {
    const { id, max_per_direction } = ComputeAttentionSchema.parse(args);
    return textResult(this.api.computeAttention(id, max_per_direction));
  }

  private handleAnalyzeChain(args: unknown): CallToolResult {
    const { start_id, end_id, max_days, chunk_size_days, detailed } = AnalyzeChainSchema.parse(args);
    const result = serializeAnalysisResult(
      this.api.analyzeLongChain({
        startDocumentId: start_id,
        maxDays: max_days,
        ...(end_id !== undefined && { endDocumentId: end_id }),
        ...(chunk_size_days !== undefined && { chunkSizeDays: chunk_size_days }),
      })
    );
    if (detailed) {
      return textResult(result);
    }
    const { chunks, ...overview } = result;
    return textResult({ ...overview, chunkCount: chunks.length });
  }

  private handleTemporalSummary(args: unknown): CallToolResult {
    const { start_id, end_id, num_chunks } = TemporalSummarySchema.parse(args);
    const windows = this.api.getTemporalSummary(start_id, end_id, num_chunks);
    return textResult({ windows: windows.map(serializeSummaryWindow) });
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    console.error('Tempochain MCP server running on stdio');
  }

  async close(): Promise<void> {
    await this.server.close();
    this.api.close();
  }
}
