import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { MetadataSchema, RelationKindSchema } from '../types/schemas.js';

const TimestampArg = z.union([z.string(), z.number()]);

// Tool schemas
export const AddDocumentSchema = z.object({
  id: z.string().min(1).describe('Unique document identifier'),
  content: z.string().describe('Document text (indexed for TF-IDF similarity)'),
  timestamp: TimestampArg.describe('ISO-8601 string or epoch milliseconds'),
  metadata: MetadataSchema.optional().describe('Optional metadata'),
});

export const AddRelationshipSchema = z.object({
  from: z.string().describe('Source document ID'),
  to: z.string().describe('Target document ID'),
  kind: RelationKindSchema.default('sequential'),
  weight: z.number().finite().default(1.0),
  metadata: MetadataSchema.optional(),
});

export const GetDocumentSchema = z.object({
  id: z.string().describe('Document identifier'),
});

export const DocumentsInRangeSchema = z.object({
  start: TimestampArg,
  end: TimestampArg,
  inclusive_end: z.boolean().default(true),
});

export const ReachableSchema = z.object({
  id: z.string(),
  time_window_days: z.number().nonnegative().optional(),
  max_hops: z.number().int().nonnegative().default(5),
  max_results: z.number().int().nonnegative().default(50),
});

export const FindPathSchema = z.object({
  from: z.string(),
  to: z.string(),
  max_hops: z.number().int().nonnegative().default(10),
});

export const SimilaritySchema = z.object({
  a: z.string(),
  b: z.string(),
});

export const FindSimilarSchema = z.object({
  id: z.string(),
  limit: z.number().int().positive().default(10),
});

export const ComputeAttentionSchema = z.object({
  id: z.string(),
  max_per_direction: z.number().int().nonnegative().default(10),
});

export const AnalyzeChainSchema = z.object({
  start_id: z.string(),
  end_id: z.string().optional(),
  max_days: z.number().positive().default(1825),
  chunk_size_days: z.number().positive().optional(),
  detailed: z.boolean().default(false),
});

export const TemporalSummarySchema = z.object({
  start_id: z.string(),
  end_id: z.string(),
  num_chunks: z.number().int().positive().default(10),
});

const timestampProperty = {
  oneOf: [{ type: 'string' }, { type: 'number' }],
  description: 'ISO-8601 timestamp (offset optional, naive values read as UTC) or epoch milliseconds',
};

const relationKinds = RelationKindSchema.options;

// Tool definitions
export const tools: Tool[] = [
  {
    name: 'tempochain_add_document',
    description: 'Add a timestamped document to the temporal graph. Fails if the id already exists.',
    inputSchema: {
      type: 'object',
      properties: {
        id: { type: 'string', description: 'Unique document identifier' },
        content: { type: 'string', description: 'Document text' },
        timestamp: timestampProperty,
        metadata: { type: 'object', description: 'Optional metadata' },
      },
      required: ['id', 'content', 'timestamp'],
    },
  },
  {
    name: 'tempochain_add_relationship',
    description:
      'Create (or update) a typed edge between two documents. Sequential and causal edges that go backward in time are kept but carry a warning.',
    inputSchema: {
      type: 'object',
      properties: {
        from: { type: 'string', description: 'Source document ID' },
        to: { type: 'string', description: 'Target document ID' },
        kind: { type: 'string', enum: [...relationKinds], description: 'Relation kind (default: sequential)' },
        weight: { type: 'number', description: 'Edge weight (default: 1.0)' },
        metadata: { type: 'object', description: 'Optional edge metadata' },
      },
      required: ['from', 'to'],
    },
  },
  {
    name: 'tempochain_get_document',
    description: 'Retrieve a document with its timestamp, layer and metadata',
    inputSchema: {
      type: 'object',
      properties: { id: { type: 'string', description: 'Document identifier' } },
      required: ['id'],
    },
  },
  {
    name: 'tempochain_documents_in_range',
    description: 'Documents whose timestamp lies in [start, end] (or [start, end) when inclusive_end is false), oldest first',
    inputSchema: {
      type: 'object',
      properties: {
        start: timestampProperty,
        end: timestampProperty,
        inclusive_end: { type: 'boolean', description: 'Include the end instant (default: true)' },
      },
      required: ['start', 'end'],
    },
  },
  {
    name: 'tempochain_forward_reachable',
    description: 'Documents reachable along outgoing edges, not earlier than the source, within an optional time window',
    inputSchema: {
      type: 'object',
      properties: {
        id: { type: 'string', description: 'Source document ID' },
        time_window_days: { type: 'number', description: 'Only documents at most this many days after the source' },
        max_hops: { type: 'number', description: 'Maximum hops (default: 5)' },
        max_results: { type: 'number', description: 'Maximum results (default: 50)' },
      },
      required: ['id'],
    },
  },
  {
    name: 'tempochain_backward_reachable',
    description: 'Documents reachable along incoming edges, not later than the source, nearest first',
    inputSchema: {
      type: 'object',
      properties: {
        id: { type: 'string', description: 'Source document ID' },
        time_window_days: { type: 'number', description: 'Only documents at most this many days before the source' },
        max_hops: { type: 'number', description: 'Maximum hops (default: 5)' },
        max_results: { type: 'number', description: 'Maximum results (default: 50)' },
      },
      required: ['id'],
    },
  },
  {
    name: 'tempochain_find_path',
    description: 'Shortest path (by hop count) between two documents along outgoing edges',
    inputSchema: {
      type: 'object',
      properties: {
        from: { type: 'string', description: 'Starting document ID' },
        to: { type: 'string', description: 'Target document ID' },
        max_hops: { type: 'number', description: 'Maximum path length (default: 10)' },
      },
      required: ['from', 'to'],
    },
  },
  {
    name: 'tempochain_similarity',
    description: 'TF-IDF cosine similarity between two documents, in [0, 1]',
    inputSchema: {
      type: 'object',
      properties: {
        a: { type: 'string', description: 'First document ID' },
        b: { type: 'string', description: 'Second document ID' },
      },
      required: ['a', 'b'],
    },
  },
  {
    name: 'tempochain_find_similar',
    description: 'Documents most similar to the given one across the whole corpus',
    inputSchema: {
      type: 'object',
      properties: {
        id: { type: 'string', description: 'Document ID' },
        limit: { type: 'number', description: 'Maximum results (default: 10)' },
      },
      required: ['id'],
    },
  },
  {
    name: 'tempochain_compute_attention',
    description: 'Rank forward and backward reachable documents by similarity to a document',
    inputSchema: {
      type: 'object',
      properties: {
        id: { type: 'string', description: 'Document ID' },
        max_per_direction: { type: 'number', description: 'Entries per direction (default: 10)' },
      },
      required: ['id'],
    },
  },
  {
    name: 'tempochain_analyze_chain',
    description:
      'Analyze a long span of documents in fixed time windows, carrying a bounded summary between windows',
    inputSchema: {
      type: 'object',
      properties: {
        start_id: { type: 'string', description: 'Document that opens the span' },
        end_id: { type: 'string', description: 'Document that closes the span (optional)' },
        max_days: { type: 'number', description: 'Span length when end_id is omitted (default: 1825)' },
        chunk_size_days: { type: 'number', description: 'Window length in days (default: configured value)' },
        detailed: { type: 'boolean', description: 'Include per-window results (default: false)' },
      },
      required: ['start_id'],
    },
  },
  {
    name: 'tempochain_temporal_summary',
    description: 'Split the span between two documents into equal windows and summarize each',
    inputSchema: {
      type: 'object',
      properties: {
        start_id: { type: 'string', description: 'Start document ID' },
        end_id: { type: 'string', description: 'End document ID' },
        num_chunks: { type: 'number', description: 'Number of windows (default: 10)' },
      },
      required: ['start_id', 'end_id'],
    },
  },
  {
    name: 'tempochain_stats',
    description: 'Graph and similarity-cache statistics',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'tempochain_export',
    description: 'Dump every document and relationship',
    inputSchema: { type: 'object', properties: {} },
  },
];
