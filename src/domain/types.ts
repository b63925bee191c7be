export type SimilarityMetric = "cosine" | "inner_product";

export interface DocumentMetadata {
  title: string;
  sourceType: string;
  ingestedAt: string;
}

export interface DocumentRecord {
  id: string;
  text: string;
  metadata: DocumentMetadata;
}

export interface Chunk {
  id: string;
  documentId: string;
  ordinal: number;
  text: string;
  /** Offset of the first character in the parent document text. */
  start: number;
  /** Offset one past the last character. */
  end: number;
  section: string | null;
}

export interface EntryMetadata extends DocumentMetadata {
  documentId: string;
  ordinal: number;
  start: number;
  end: number;
  section: string | null;
}

export interface IndexEntry {
  chunkId: string;
  documentId: string;
  text: string;
  vector: number[];
  metadata: EntryMetadata;
}

export interface StoredChunk {
  chunkId: string;
  documentId: string;
  text: string;
  metadata: EntryMetadata;
}

export interface SearchHit extends StoredChunk {
  score: number;
}

export type MetadataFilter = Record<string, string | number | boolean>;

export interface IndexedDocument {
  id: string;
  metadata: DocumentMetadata;
  chunkCount: number;
}

export interface IndexStats {
  documentCount: number;
  entryCount: number;
  dimension: number;
  metric: SimilarityMetric;
}

export interface SourceDocument {
  id: string;
  metadata: DocumentMetadata;
}

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}

export interface Answer {
  text: string;
  confidence: number;
  sources: SourceDocument[];
}
