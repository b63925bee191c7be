import pg from "pg";
import { DimensionMismatch } from "../../domain/errors.js";
import {
  EntryMetadata,
  IndexEntry,
  IndexStats,
  IndexedDocument,
  MetadataFilter,
  SearchHit,
  SimilarityMetric,
  StoredChunk,
} from "../../domain/types.js";
import { VectorIndex } from "../../domain/vectorIndex.js";

interface PgChunkRow {
  chunk_id: string;
  document_id: string;
  content: string;
  metadata: EntryMetadata;
}

interface PgSearchRow extends PgChunkRow {
  seq: string | number;
  score: number;
}

interface PgDocumentRow {
  document_id: string;
  metadata: EntryMetadata;
  chunk_count: number;
}

const OPERATORS: Record<SimilarityMetric, { distance: string; opclass: string; score: string }> = {
  cosine: {
    distance: "<=>",
    opclass: "vector_cosine_ops",
    score: "1 - (embedding <=> $1::vector)",
  },
  inner_product: {
    distance: "<#>",
    opclass: "vector_ip_ops",
    score: "-(embedding <#> $1::vector)",
  },
};

export interface PgQueryable {
  query<R extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<pg.QueryResult<R>>;
}

export interface PgSessionClient extends PgQueryable {
  release(): void;
}

/** The slice of `pg.Pool` the index uses. */
export interface PgPool extends PgQueryable {
  connect(): Promise<PgSessionClient>;
  end(): Promise<void>;
}

// pgvector's default candidate list size and its upper bound.
const DEFAULT_EF_SEARCH = 40;
const MAX_EF_SEARCH = 1000;

/**
 * pgvector-backed index with an HNSW graph for approximate nearest-neighbour
 * search over large corpora. Dimension and metric are pinned in
 * `index_meta` the first time the schema is created.
 */
export class PgVectorIndex implements VectorIndex {
  private initialized = false;

  private iterativeScan = false;

  constructor(
    private readonly pool: PgPool,
    readonly dimension: number,
    readonly metric: SimilarityMetric = "cosine",
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS index_meta (
        id BOOLEAN PRIMARY KEY DEFAULT TRUE CHECK (id),
        dimension INTEGER NOT NULL,
        metric TEXT NOT NULL
      )
    `);
    await this.pool.query(
      `INSERT INTO index_meta (id, dimension, metric) VALUES (TRUE, $1, $2) ON CONFLICT (id) DO NOTHING`,
      [this.dimension, this.metric],
    );

    const meta = await this.pool.query<{ dimension: number; metric: string }>(
      `SELECT dimension, metric FROM index_meta WHERE id`,
    );
    const stored = meta.rows[0];
    if (stored && stored.dimension !== this.dimension) {
      throw new DimensionMismatch(this.dimension, stored.dimension, "stored index");
    }
    if (stored && stored.metric !== this.metric) {
      throw new Error(
        `Stored index uses ${stored.metric} similarity but ${this.metric} is configured.`,
      );
    }

    const extension = await this.pool.query<{ extversion: string }>(
      `SELECT extversion FROM pg_extension WHERE extname = 'vector'`,
    );
    this.iterativeScan = supportsIterativeScan(extension.rows[0]?.extversion);

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS chunks (
        id TEXT PRIMARY KEY,
        seq BIGSERIAL NOT NULL,
        document_id TEXT NOT NULL,
        content TEXT NOT NULL,
        metadata JSONB NOT NULL,
        embedding VECTOR(${this.dimension}) NOT NULL
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_chunks_document_id ON chunks(document_id)`,
    );
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_chunks_metadata ON chunks USING gin (metadata)`,
    );
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_chunks_embedding
      ON chunks USING hnsw (embedding ${OPERATORS[this.metric].opclass})
    `);

    this.initialized = true;
  }

  async upsert(entries: IndexEntry[]): Promise<void> {
    for (const entry of entries) {
      if (entry.vector.length !== this.dimension) {
        throw new DimensionMismatch(this.dimension, entry.vector.length, entry.chunkId);
      }
    }
    if (entries.length === 0) {
      return;
    }

    await this.initialize();
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      for (const entry of entries) {
        await client.query(
          `
            INSERT INTO chunks (id, document_id, content, metadata, embedding)
            VALUES ($1, $2, $3, $4::jsonb, $5::vector)
            ON CONFLICT (id) DO UPDATE SET
              seq = nextval(pg_get_serial_sequence('chunks', 'seq')),
              document_id = EXCLUDED.document_id,
              content = EXCLUDED.content,
              metadata = EXCLUDED.metadata,
              embedding = EXCLUDED.embedding
          `,
          [
            entry.chunkId,
            entry.documentId,
            entry.text,
            JSON.stringify(entry.metadata),
            toVectorLiteral(entry.vector),
          ],
        );
      }
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async search(
    queryVector: number[],
    k: number,
    filter?: MetadataFilter,
  ): Promise<SearchHit[]> {
    if (queryVector.length !== this.dimension) {
      throw new DimensionMismatch(this.dimension, queryVector.length, "query");
    }
    if (k <= 0) {
      return [];
    }

    await this.initialize();
    const limit = Math.floor(k);
    const operators = OPERATORS[this.metric];
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      // HNSW filters after the graph scan, so the candidate list must cover `limit`.
      await client.query(`SELECT set_config('hnsw.ef_search', $1, true)`, [
        String(Math.min(MAX_EF_SEARCH, Math.max(DEFAULT_EF_SEARCH, limit))),
      ]);
      if (this.iterativeScan) {
        await client.query(`SELECT set_config('hnsw.iterative_scan', 'relaxed_order', true)`);
      }
      const result = await client.query<PgSearchRow>(
        `
          SELECT
            id AS chunk_id,
            seq,
            document_id,
            content,
            metadata,
            ${operators.score} AS score
          FROM chunks
          WHERE ($2::jsonb IS NULL OR metadata @> $2::jsonb)
          ORDER BY embedding ${operators.distance} $1::vector
          LIMIT $3
        `,
        [
          toVectorLiteral(queryVector),
          filter && Object.keys(filter).length > 0 ? JSON.stringify(filter) : null,
          limit,
        ],
      );
      await client.query("COMMIT");

      return result.rows
        .map((row) => ({ seq: Number(row.seq), hit: { ...toStoredChunk(row), score: Number(row.score) } }))
        .sort((a, b) => b.hit.score - a.hit.score || a.seq - b.seq)
        .map(({ hit }) => hit);
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async delete(documentId: string): Promise<number> {
    await this.initialize();
    const result = await this.pool.query(`DELETE FROM chunks WHERE document_id = $1`, [
      documentId,
    ]);
    return result.rowCount ?? 0;
  }

  async listDocuments(): Promise<IndexedDocument[]> {
    await this.initialize();
    const result = await this.pool.query<PgDocumentRow>(`
      SELECT DISTINCT ON (document_id)
        document_id,
        metadata,
        COUNT(*) OVER (PARTITION BY document_id)::int AS chunk_count
      FROM chunks
      ORDER BY document_id, (metadata->>'ordinal')::int ASC
    `);

    return result.rows
      .map((row) => ({
        id: row.document_id,
        metadata: {
          title: row.metadata.title,
          sourceType: row.metadata.sourceType,
          ingestedAt: row.metadata.ingestedAt,
        },
        chunkCount: row.chunk_count,
      }))
      .sort(
        (a, b) =>
          a.metadata.ingestedAt.localeCompare(b.metadata.ingestedAt) || a.id.localeCompare(b.id),
      );
  }

  async getDocumentChunks(documentId: string): Promise<StoredChunk[]> {
    await this.initialize();
    const result = await this.pool.query<PgChunkRow>(
      `
        SELECT id AS chunk_id, document_id, content, metadata
        FROM chunks
        WHERE document_id = $1
        ORDER BY (metadata->>'ordinal')::int ASC
      `,
      [documentId],
    );
    return result.rows.map(toStoredChunk);
  }

  async stats(): Promise<IndexStats> {
    await this.initialize();
    const result = await this.pool.query<{ documents: number; entries: number }>(
      `SELECT COUNT(DISTINCT document_id)::int AS documents, COUNT(*)::int AS entries FROM chunks`,
    );
    return {
      documentCount: result.rows[0]?.documents ?? 0,
      entryCount: result.rows[0]?.entries ?? 0,
      dimension: this.dimension,
      metric: this.metric,
    };
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

function toStoredChunk(row: PgChunkRow): StoredChunk {
  return {
    chunkId: row.chunk_id,
    documentId: row.document_id,
    text: row.content,
    metadata: row.metadata,
  };
}

/** Iterative index scans arrived in pgvector 0.8. */
export function supportsIterativeScan(version: string | undefined): boolean {
  const [major = 0, minor = 0] = (version ?? "").split(".").map((part) => Number.parseInt(part, 10) || 0);
  return major > 0 || minor >= 8;
}

function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}
