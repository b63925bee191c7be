import {
  IndexEntry,
  IndexStats,
  IndexedDocument,
  MetadataFilter,
  SearchHit,
  SimilarityMetric,
  StoredChunk,
} from "./types.js";

/**
 * Nearest-neighbour store for chunk embeddings.
 *
 * Implementations must reject the whole `upsert` call with `DimensionMismatch`
 * when any vector has the wrong length, order ties by insertion (earlier
 * first) and never return entries of a deleted document.
 */
export interface VectorIndex {
  readonly dimension: number;
  readonly metric: SimilarityMetric;
  upsert(entries: IndexEntry[]): Promise<void>;
  search(queryVector: number[], k: number, filter?: MetadataFilter): Promise<SearchHit[]>;
  delete(documentId: string): Promise<number>;
  listDocuments(): Promise<IndexedDocument[]>;
  getDocumentChunks(documentId: string): Promise<StoredChunk[]>;
  stats(): Promise<IndexStats>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
