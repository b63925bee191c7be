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
import { dot, l2Norm } from "../../utils/vector.js";

export interface StoredEntry {
  seq: number;
  chunkId: string;
  documentId: string;
  text: string;
  vector: number[];
  metadata: EntryMetadata;
}

interface IndexedEntry extends StoredEntry {
  norm: number;
}

interface Segment {
  documentId: string;
  entries: readonly IndexedEntry[];
}

type SegmentMap = ReadonlyMap<string, Segment>;

export interface InMemoryVectorIndexSnapshot {
  dimension: number;
  metric: SimilarityMetric;
  nextSeq: number;
  entries: StoredEntry[];
}

/**
 * Exact-scan index over per-document segments.
 *
 * Writers build a new segment map and swap it in with a single assignment,
 * so a search always runs against one complete snapshot and never sees a
 * half-applied upsert or delete.
 */
export class InMemoryVectorIndex implements VectorIndex {
  protected segments: SegmentMap = new Map();

  protected nextSeq = 0;

  constructor(
    readonly dimension: number,
    readonly metric: SimilarityMetric = "cosine",
  ) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Index dimension must be a positive integer, got ${dimension}.`);
    }
  }

  async upsert(entries: IndexEntry[]): Promise<void> {
    for (const entry of entries) {
      this.assertDimension(entry.vector, entry.chunkId);
    }
    if (entries.length === 0) {
      return;
    }

    const grouped = new Map<string, Map<string, IndexEntry>>();
    for (const entry of entries) {
      const group = grouped.get(entry.documentId) ?? new Map<string, IndexEntry>();
      group.set(entry.chunkId, entry);
      grouped.set(entry.documentId, group);
    }

    const next = new Map(this.segments);
    for (const [documentId, group] of grouped) {
      const kept = (next.get(documentId)?.entries ?? []).filter(
        (existing) => !group.has(existing.chunkId),
      );
      const added = [...group.values()].map((entry) => this.toIndexed(entry));
      next.set(documentId, { documentId, entries: Object.freeze([...kept, ...added]) });
    }

    this.segments = next;
  }

  async search(
    queryVector: number[],
    k: number,
    filter?: MetadataFilter,
  ): Promise<SearchHit[]> {
    this.assertDimension(queryVector, "query");
    if (k <= 0) {
      return [];
    }

    const segments = this.segments;
    const queryNorm = l2Norm(queryVector);
    const scored: Array<{ entry: IndexedEntry; score: number }> = [];

    for (const segment of segments.values()) {
      for (const entry of segment.entries) {
        if (filter && !matchesFilter(entry.metadata, filter)) {
          continue;
        }
        scored.push({ entry, score: this.score(queryVector, queryNorm, entry) });
      }
    }

    return scored
      .sort((a, b) => b.score - a.score || a.entry.seq - b.entry.seq)
      .slice(0, Math.floor(k))
      .map(({ entry, score }) => ({ ...toStoredChunk(entry), score }));
  }

  async delete(documentId: string): Promise<number> {
    const segment = this.segments.get(documentId);
    if (!segment) {
      return 0;
    }

    const next = new Map(this.segments);
    next.delete(documentId);
    this.segments = next;
    return segment.entries.length;
  }

  async listDocuments(): Promise<IndexedDocument[]> {
    const documents: IndexedDocument[] = [];
    for (const segment of this.segments.values()) {
      const first = segment.entries[0];
      if (!first) {
        continue;
      }
      documents.push({
        id: segment.documentId,
        metadata: {
          title: first.metadata.title,
          sourceType: first.metadata.sourceType,
          ingestedAt: first.metadata.ingestedAt,
        },
        chunkCount: segment.entries.length,
      });
    }
    return documents.sort(
      (a, b) => a.metadata.ingestedAt.localeCompare(b.metadata.ingestedAt) || a.id.localeCompare(b.id),
    );
  }

  async getDocumentChunks(documentId: string): Promise<StoredChunk[]> {
    const entries = this.segments.get(documentId)?.entries ?? [];
    return [...entries]
      .sort((a, b) => a.metadata.ordinal - b.metadata.ordinal)
      .map(toStoredChunk);
  }

  async stats(): Promise<IndexStats> {
    let entryCount = 0;
    for (const segment of this.segments.values()) {
      entryCount += segment.entries.length;
    }
    return {
      documentCount: this.segments.size,
      entryCount,
      dimension: this.dimension,
      metric: this.metric,
    };
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}

  protected exportSnapshot(): InMemoryVectorIndexSnapshot {
    const entries: StoredEntry[] = [];
    for (const segment of this.segments.values()) {
      for (const { norm: _norm, ...entry } of segment.entries) {
        entries.push(entry);
      }
    }
    entries.sort((a, b) => a.seq - b.seq);

    return {
      dimension: this.dimension,
      metric: this.metric,
      nextSeq: this.nextSeq,
      entries,
    };
  }

  protected importSnapshot(snapshot: InMemoryVectorIndexSnapshot): void {
    if (snapshot.dimension !== this.dimension) {
      throw new DimensionMismatch(this.dimension, snapshot.dimension, "stored index");
    }
    if (snapshot.metric !== this.metric) {
      throw new Error(
        `Stored index uses ${snapshot.metric} similarity but ${this.metric} is configured.`,
      );
    }

    const grouped = new Map<string, IndexedEntry[]>();
    let maxSeq = -1;
    for (const entry of snapshot.entries) {
      this.assertDimension(entry.vector, entry.chunkId);
      const list = grouped.get(entry.documentId) ?? [];
      list.push({ ...entry, norm: l2Norm(entry.vector) });
      grouped.set(entry.documentId, list);
      maxSeq = Math.max(maxSeq, entry.seq);
    }

    const next = new Map<string, Segment>();
    for (const [documentId, entries] of grouped) {
      next.set(documentId, { documentId, entries: Object.freeze(entries) });
    }

    this.segments = next;
    this.nextSeq = Math.max(snapshot.nextSeq, maxSeq + 1);
  }

  private toIndexed(entry: IndexEntry): IndexedEntry {
    const vector = [...entry.vector];
    const seq = this.nextSeq;
    this.nextSeq += 1;
    return {
      seq,
      chunkId: entry.chunkId,
      documentId: entry.documentId,
      text: entry.text,
      vector,
      norm: l2Norm(vector),
      metadata: { ...entry.metadata },
    };
  }

  private score(query: number[], queryNorm: number, entry: IndexedEntry): number {
    const product = dot(query, entry.vector);
    if (this.metric === "inner_product") {
      return product;
    }
    const denominator = queryNorm * entry.norm;
    return denominator === 0 ? 0 : product / denominator;
  }

  private assertDimension(vector: number[], context: string): void {
    if (vector.length !== this.dimension) {
      throw new DimensionMismatch(this.dimension, vector.length, context);
    }
  }
}

export function matchesFilter(metadata: EntryMetadata, filter: MetadataFilter): boolean {
  const values: Record<string, unknown> = { ...metadata };
  return Object.entries(filter).every(([key, expected]) => values[key] === expected);
}

function toStoredChunk(entry: StoredEntry): StoredChunk {
  return {
    chunkId: entry.chunkId,
    documentId: entry.documentId,
    text: entry.text,
    metadata: { ...entry.metadata },
  };
}
