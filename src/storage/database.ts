import Database from 'better-sqlite3';
import {
  DuplicateDocumentError,
  InvalidArgumentError,
  NotFoundError,
  UnknownDocumentError,
} from '../errors.js';
import {
  Instant,
  formatTimestamp,
  layerOf,
  normalizeTimestamp,
  type TimestampInput,
} from '../temporal/timestamp.js';
import { MetadataSchema, TemporalOrderWarningSchema } from '../types/schemas.js';
import {
  RELATION_KINDS,
  isRelationKind,
  type AddDocumentInput,
  type AddRelationshipInput,
  type Document,
  type GraphStats,
  type LayerIndexIssue,
  type Metadata,
  type RangeOptions,
  type RelationKind,
  type Relationship,
  type TemporalOrderWarning,
} from '../types/index.js';

const MAX_CONTENT_BYTES = 2 * 1024 * 1024;

const SCHEMA_SQL = `
-- Documents (nodes)
CREATE TABLE IF NOT EXISTS documents (
    id TEXT PRIMARY KEY,
    content TEXT NOT NULL,
    timestamp INTEGER NOT NULL,      -- canonical UTC epoch ms
    layer INTEGER NOT NULL,
    metadata JSON
);

-- Typed temporal relationships
CREATE TABLE IF NOT EXISTS relationships (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    from_node TEXT NOT NULL,
    to_node TEXT NOT NULL,
    kind TEXT NOT NULL CHECK (kind IN ('sequential', 'causal', 'concurrent', 'branch', 'merge')),
    weight REAL NOT NULL DEFAULT 1.0,
    metadata JSON,
    warning JSON,
    UNIQUE (from_node, to_node, kind)
);

-- Layer index: one row per document, keyed by time bucket
CREATE TABLE IF NOT EXISTS temporal_layers (
    layer INTEGER NOT NULL,
    document_id TEXT NOT NULL,
    PRIMARY KEY (layer, document_id)
);

CREATE INDEX IF NOT EXISTS idx_documents_timestamp ON documents(timestamp, id);
CREATE INDEX IF NOT EXISTS idx_relationships_from ON relationships(from_node);
CREATE INDEX IF NOT EXISTS idx_relationships_to ON relationships(to_node);
CREATE INDEX IF NOT EXISTS idx_relationships_kind ON relationships(kind);
`;

interface DocumentRow {
  id: string;
  content: string;
  timestamp: number;
  layer: number;
  metadata: string | null;
}

interface RelationshipRow {
  id: number;
  from_node: string;
  to_node: string;
  kind: string;
  weight: number;
  metadata: string | null;
  warning: string | null;
}

interface NeighborRow extends RelationshipRow {
  neighbor_timestamp: number;
}

export interface NeighborLink {
  relationship: Relationship;
  neighborId: string;
  neighborTimestamp: Instant;
}

export type NeighborDirection = 'outgoing' | 'incoming';

export interface GraphDBOptions {
  layerDurationDays?: number;
  verbose?: boolean;
}

export interface GraphExport {
  documents: Document[];
  relationships: Relationship[];
}

type RelationshipParams = [string, string, string, number, string | null, string | null];

interface Statements {
  insertDocument: Database.Statement<[string, string, number, number, string | null]>;
  insertLayer: Database.Statement<[number, string]>;
  getDocument: Database.Statement<[string], DocumentRow>;
  upsertRelationship: Database.Statement<RelationshipParams, { id: number }>;
  getRelationship: Database.Statement<[number], RelationshipRow>;
  outgoing: Database.Statement<[string], NeighborRow>;
  incoming: Database.Statement<[string], NeighborRow>;
  rangeInclusive: Database.Statement<[number, number, number, number], DocumentRow>;
  rangeExclusive: Database.Statement<[number, number, number, number], DocumentRow>;
}

/**
 * Temporal graph store over an in-memory SQLite database.
 *
 * Writes run in a transaction, so the layer index is never observed half
 * updated; on Node's single thread no read can interleave with a write.
 */
export class GraphDB {
  private db: Database.Database;
  private statements: Statements;
  private revision = 0;
  readonly layerDurationDays: number;
  private verbose: boolean;

  constructor(options: GraphDBOptions = {}) {
    this.layerDurationDays = options.layerDurationDays ?? 7;
    if (!Number.isInteger(this.layerDurationDays) || this.layerDurationDays < 1) {
      throw new InvalidArgumentError(`layerDurationDays must be a positive integer, got ${this.layerDurationDays}`);
    }
    this.verbose = options.verbose ?? false;

    this.db = new Database(':memory:');
    this.db.pragma('foreign_keys = OFF');
    this.db.exec(SCHEMA_SQL);
    this.statements = this.prepareStatements();
  }

  private prepareStatements(): Statements {
    return {
      insertDocument: this.db.prepare(`
        INSERT INTO documents (id, content, timestamp, layer, metadata)
        VALUES (?, ?, ?, ?, ?)
      `),
      insertLayer: this.db.prepare('INSERT INTO temporal_layers (layer, document_id) VALUES (?, ?)'),
      getDocument: this.db.prepare('SELECT * FROM documents WHERE id = ?'),
      upsertRelationship: this.db.prepare(`
        INSERT INTO relationships (from_node, to_node, kind, weight, metadata, warning)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(from_node, to_node, kind) DO UPDATE SET
          weight = excluded.weight,
          metadata = excluded.metadata,
          warning = excluded.warning
        RETURNING id
      `),
      getRelationship: this.db.prepare('SELECT * FROM relationships WHERE id = ?'),
      outgoing: this.db.prepare(`
        SELECT r.*, d.timestamp AS neighbor_timestamp
        FROM relationships r
        JOIN documents d ON d.id = r.to_node
        WHERE r.from_node = ?
        ORDER BY d.timestamp, d.id, r.id
      `),
      incoming: this.db.prepare(`
        SELECT r.*, d.timestamp AS neighbor_timestamp
        FROM relationships r
        JOIN documents d ON d.id = r.from_node
        WHERE r.to_node = ?
        ORDER BY d.timestamp, d.id, r.id
      `),
      rangeInclusive: this.db.prepare(`
        SELECT d.*
        FROM temporal_layers l
        JOIN documents d ON d.id = l.document_id
        WHERE l.layer BETWEEN ? AND ?
          AND d.timestamp >= ? AND d.timestamp <= ?
        ORDER BY d.timestamp, d.id
      `),
      rangeExclusive: this.db.prepare(`
        SELECT d.*
        FROM temporal_layers l
        JOIN documents d ON d.id = l.document_id
        WHERE l.layer BETWEEN ? AND ?
          AND d.timestamp >= ? AND d.timestamp < ?
        ORDER BY d.timestamp, d.id
      `),
    };
  }

  private transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /** Incremented by every successful {@link addDocument}; content never changes otherwise. */
  get contentRevision(): number {
    return this.revision;
  }

  // ==================== DOCUMENTS ====================

  addDocument(input: AddDocumentInput): Document {
    const { id, content, metadata = {} } = input;

    if (id.trim() === '') {
      throw new InvalidArgumentError('Document id must not be empty');
    }
    if (Buffer.byteLength(content, 'utf8') > MAX_CONTENT_BYTES) {
      throw new InvalidArgumentError('Content exceeds 2MB limit');
    }

    const timestamp = normalizeTimestamp(input.timestamp);
    const layer = layerOf(timestamp, this.layerDurationDays);

    this.transaction(() => {
      if (this.statements.getDocument.get(id)) {
        throw new DuplicateDocumentError(id);
      }
      this.statements.insertDocument.run(id, content, timestamp.epochMs, layer, JSON.stringify(metadata));
      this.statements.insertLayer.run(layer, id);
    });
    this.revision++;

    if (this.verbose) {
      console.error(`✨ Added document: ${id} @ ${formatTimestamp(timestamp)} (layer ${layer})`);
    }

    return { id, content, timestamp, metadata, layer };
  }

  getDocument(id: string): Document {
    const row = this.statements.getDocument.get(id);
    if (!row) {
      throw new NotFoundError(id);
    }
    return this.rowToDocument(row);
  }

  hasDocument(id: string): boolean {
    return this.statements.getDocument.get(id) !== undefined;
  }

  listDocuments(limit?: number): Document[] {
    const rows = limit === undefined
      ? this.db.prepare<[], DocumentRow>('SELECT * FROM documents ORDER BY timestamp, id').all()
      : this.db.prepare<[number], DocumentRow>('SELECT * FROM documents ORDER BY timestamp, id LIMIT ?').all(limit);
    return rows.map(row => this.rowToDocument(row));
  }

  /**
   * Replace or merge a document's metadata. Content and timestamp stay
   * immutable, so this does not touch the content revision.
   */
  updateMetadata(id: string, metadata: Metadata, merge = true): Document {
    return this.transaction(() => {
      const current = this.getDocument(id);
      const next: Metadata = merge ? { ...current.metadata, ...metadata } : { ...metadata };
      this.db
        .prepare<[string, string]>('UPDATE documents SET metadata = ? WHERE id = ?')
        .run(JSON.stringify(next), id);
      return { ...current, metadata: next };
    });
  }

  /**
   * Documents with `start <= timestamp <= end` (or `< end`), ordered by
   * timestamp then id. Buckets outside the range are never read.
   */
  getDocumentsInRange(start: TimestampInput, end: TimestampInput, options: RangeOptions = {}): Document[] {
    const from = normalizeTimestamp(start);
    const to = normalizeTimestamp(end);
    const inclusiveEnd = options.inclusiveEnd ?? true;

    if (from.isAfter(to)) {
      return [];
    }

    const firstLayer = layerOf(from, this.layerDurationDays);
    const lastLayer = layerOf(to, this.layerDurationDays);
    const stmt = inclusiveEnd ? this.statements.rangeInclusive : this.statements.rangeExclusive;

    return stmt
      .all(firstLayer, lastLayer, from.epochMs, to.epochMs)
      .map(row => this.rowToDocument(row));
  }

  // ==================== LAYER INDEX ====================

  getLayer(layer: number): string[] {
    return this.db
      .prepare<[number], { document_id: string }>(
        'SELECT document_id FROM temporal_layers WHERE layer = ? ORDER BY document_id'
      )
      .all(layer)
      .map(row => row.document_id);
  }

  listLayers(): number[] {
    return this.db
      .prepare<[], { layer: number }>('SELECT DISTINCT layer FROM temporal_layers ORDER BY layer')
      .all()
      .map(row => row.layer);
  }

  /** Every document must sit in exactly one bucket, the one its timestamp maps to. */
  verifyLayerIndex(): LayerIndexIssue[] {
    const indexed = new Map<string, number[]>();
    const layerRows = this.db
      .prepare<[], { layer: number; document_id: string }>('SELECT layer, document_id FROM temporal_layers')
      .all();
    for (const row of layerRows) {
      const layers = indexed.get(row.document_id) ?? [];
      layers.push(row.layer);
      indexed.set(row.document_id, layers);
    }

    const issues: LayerIndexIssue[] = [];
    for (const doc of this.listDocuments()) {
      const expectedLayer = layerOf(doc.timestamp, this.layerDurationDays);
      const indexedLayers = indexed.get(doc.id) ?? [];
      if (indexedLayers.length !== 1 || indexedLayers[0] !== expectedLayer || doc.layer !== expectedLayer) {
        issues.push({ documentId: doc.id, expectedLayer, indexedLayers });
      }
      indexed.delete(doc.id);
    }

    // Index rows pointing at documents that do not exist
    for (const [documentId, indexedLayers] of indexed) {
      issues.push({ documentId, expectedLayer: Number.NaN, indexedLayers });
    }

    return issues;
  }

  // ==================== RELATIONSHIPS ====================

  addRelationship(input: AddRelationshipInput): Relationship {
    const kind = input.kind ?? 'sequential';
    const weight = input.weight ?? 1.0;

    if (!isRelationKind(kind)) {
      throw new InvalidArgumentError(
        `Invalid relation kind: ${String(kind)}. Use one of: ${RELATION_KINDS.join(', ')}`
      );
    }
    if (!Number.isFinite(weight)) {
      throw new InvalidArgumentError(`Relationship weight must be a finite number, got ${weight}`);
    }

    return this.transaction(() => {
      const fromRow = this.statements.getDocument.get(input.from);
      if (!fromRow) {
        throw new UnknownDocumentError(input.from, 'from');
      }
      const toRow = this.statements.getDocument.get(input.to);
      if (!toRow) {
        throw new UnknownDocumentError(input.to, 'to');
      }

      const warning = this.checkTemporalOrder(kind, fromRow, toRow);

      const { id } = this.upsert([
        input.from,
        input.to,
        kind,
        weight,
        input.metadata ? JSON.stringify(input.metadata) : null,
        warning ? JSON.stringify(warning) : null,
      ]);

      if (warning) {
        console.warn(`⚠️  ${warning.message}`);
      } else if (this.verbose) {
        console.error(`🔗 Created ${kind} edge: ${input.from} → ${input.to}`);
      }

      return {
        id,
        from: input.from,
        to: input.to,
        kind,
        weight,
        ...(input.metadata && { metadata: input.metadata }),
        ...(warning && { warning }),
      };
    });
  }

  private upsert(params: RelationshipParams): { id: number } {
    const row = this.statements.upsertRelationship.get(...params);
    if (!row) {
      throw new Error(`Relationship upsert returned no row: ${params[0]} → ${params[1]}`);
    }
    return row;
  }

  private checkTemporalOrder(
    kind: RelationKind,
    fromRow: DocumentRow,
    toRow: DocumentRow
  ): TemporalOrderWarning | undefined {
    if (kind !== 'sequential' && kind !== 'causal') {
      return undefined;
    }

    const fromTime = Instant.fromEpochMs(fromRow.timestamp);
    const toTime = Instant.fromEpochMs(toRow.timestamp);
    if (!fromTime.isAfter(toTime)) {
      return undefined;
    }

    return {
      kind: 'TemporalOrderWarning',
      relation: kind,
      fromTimestamp: formatTimestamp(fromTime),
      toTimestamp: formatTimestamp(toTime),
      message:
        `Temporal order warning: ${kind} edge ${fromRow.id} → ${toRow.id} goes backward in time ` +
        `(${formatTimestamp(fromTime)} > ${formatTimestamp(toTime)})`,
    };
  }

  getRelationship(id: number): Relationship {
    const row = this.statements.getRelationship.get(id);
    if (!row) {
      throw new InvalidArgumentError(`Relationship not found: ${id}`);
    }
    return this.rowToRelationship(row);
  }

  /** All edges between an ordered pair, one per kind. */
  getRelationships(from: string, to: string): Relationship[] {
    return this.db
      .prepare<[string, string], RelationshipRow>(
        'SELECT * FROM relationships WHERE from_node = ? AND to_node = ? ORDER BY id'
      )
      .all(from, to)
      .map(row => this.rowToRelationship(row));
  }

  listRelationships(): Relationship[] {
    return this.db
      .prepare<[], RelationshipRow>('SELECT * FROM relationships ORDER BY id')
      .all()
      .map(row => this.rowToRelationship(row));
  }

  /** Edges flagged with a TemporalOrderWarning, in creation order. */
  getTemporalWarnings(): Relationship[] {
    return this.db
      .prepare<[], RelationshipRow>('SELECT * FROM relationships WHERE warning IS NOT NULL ORDER BY id')
      .all()
      .map(row => this.rowToRelationship(row));
  }

  /**
   * Direct neighbours along outgoing or incoming edges, ordered by the
   * neighbour's timestamp, then id. A pair linked by several kinds appears
   * once per edge.
   */
  getNeighbors(id: string, direction: NeighborDirection): NeighborLink[] {
    const stmt = direction === 'outgoing' ? this.statements.outgoing : this.statements.incoming;
    return stmt.all(id).map(row => ({
      relationship: this.rowToRelationship(row),
      neighborId: direction === 'outgoing' ? row.to_node : row.from_node,
      neighborTimestamp: Instant.fromEpochMs(row.neighbor_timestamp),
    }));
  }

  getOutgoing(id: string): NeighborLink[] {
    return this.getNeighbors(id, 'outgoing');
  }

  getIncoming(id: string): NeighborLink[] {
    return this.getNeighbors(id, 'incoming');
  }

  getDegree(id: string): { in: number; out: number } {
    const row = this.db
      .prepare<[string, string], { out_degree: number; in_degree: number }>(`
        SELECT
          (SELECT COUNT(*) FROM relationships WHERE from_node = ?) AS out_degree,
          (SELECT COUNT(*) FROM relationships WHERE to_node = ?) AS in_degree
      `)
      .get(id, id);
    return { in: row?.in_degree ?? 0, out: row?.out_degree ?? 0 };
  }

  // ==================== STATISTICS & EXPORT ====================

  getStats(): GraphStats {
    const counts = this.db
      .prepare<[], { node_count: number; edge_count: number; warning_count: number; layer_count: number; first_ts: number | null; last_ts: number | null }>(`
        SELECT
          (SELECT COUNT(*) FROM documents) AS node_count,
          (SELECT COUNT(*) FROM relationships) AS edge_count,
          (SELECT COUNT(*) FROM relationships WHERE warning IS NOT NULL) AS warning_count,
          (SELECT COUNT(DISTINCT layer) FROM temporal_layers) AS layer_count,
          (SELECT MIN(timestamp) FROM documents) AS first_ts,
          (SELECT MAX(timestamp) FROM documents) AS last_ts
      `)
      .get();

    const nodeCount = counts?.node_count ?? 0;
    const edgeCount = counts?.edge_count ?? 0;
    const layerCount = counts?.layer_count ?? 0;

    const edgesByKind: Record<RelationKind, number> = {
      sequential: 0,
      causal: 0,
      concurrent: 0,
      branch: 0,
      merge: 0,
    };
    const kindRows = this.db
      .prepare<[], { kind: string; count: number }>('SELECT kind, COUNT(*) AS count FROM relationships GROUP BY kind')
      .all();
    for (const row of kindRows) {
      if (isRelationKind(row.kind)) {
        edgesByKind[row.kind] = row.count;
      }
    }

    const avgDegree = nodeCount > 0 ? (edgeCount * 2) / nodeCount : 0;
    const avgLayerSize = layerCount > 0 ? nodeCount / layerCount : 0;
    const firstTs = counts?.first_ts ?? null;
    const lastTs = counts?.last_ts ?? null;

    return {
      nodeCount,
      edgeCount,
      avgDegree: Math.round(avgDegree * 100) / 100,
      layerCount,
      avgLayerSize: Math.round(avgLayerSize * 100) / 100,
      warningCount: counts?.warning_count ?? 0,
      edgesByKind,
      ...(firstTs !== null && { firstTimestamp: formatTimestamp(Instant.fromEpochMs(firstTs)) }),
      ...(lastTs !== null && { lastTimestamp: formatTimestamp(Instant.fromEpochMs(lastTs)) }),
      timeSpanDays: firstTs !== null && lastTs !== null
        ? Math.round(Instant.fromEpochMs(lastTs).daysSince(Instant.fromEpochMs(firstTs)) * 100) / 100
        : 0,
    };
  }

  exportGraph(): GraphExport {
    return {
      documents: this.listDocuments(),
      relationships: this.listRelationships(),
    };
  }

  close(): void {
    this.db.close();
  }

  // ==================== ROW MAPPING ====================

  private rowToDocument(row: DocumentRow): Document {
    return {
      id: row.id,
      content: row.content,
      timestamp: Instant.fromEpochMs(row.timestamp),
      metadata: this.parseMetadata(row.metadata),
      layer: row.layer,
    };
  }

  private rowToRelationship(row: RelationshipRow): Relationship {
    if (!isRelationKind(row.kind)) {
      throw new Error(`Corrupt relationship row ${row.id}: unknown kind ${row.kind}`);
    }

    const relationship: Relationship = {
      id: row.id,
      from: row.from_node,
      to: row.to_node,
      kind: row.kind,
      weight: row.weight,
    };
    if (row.metadata !== null) {
      relationship.metadata = this.parseMetadata(row.metadata);
    }
    if (row.warning !== null) {
      relationship.warning = TemporalOrderWarningSchema.parse(JSON.parse(row.warning));
    }
    return relationship;
  }

  private parseMetadata(raw: string | null): Metadata {
    if (raw === null) {
      return {};
    }
    const parsed = MetadataSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      console.error('Error parsing metadata:', parsed.error.message, 'Raw metadata:', raw);
      return {};
    }
    return parsed.data;
  }
}
