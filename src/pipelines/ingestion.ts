import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { DocumentMetadata, IndexEntry } from "../domain/types.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { describeError } from "../infra/ai/retry.js";
import { EmbeddingGateway } from "../infra/ai/embeddingGateway.js";
import { childLogger } from "../utils/logger.js";
import { chunkDocument } from "./chunking.js";

export interface IngestionOptions {
  chunkSize: number;
  overlap: number;
  boundaryTolerance: number;
  upsertBatchSize: number;
}

export interface IngestRequest {
  text: string;
  title: string;
  sourceType: string;
}

export interface IngestResult {
  documentId: string;
  chunkCount: number;
}

export class IngestionPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly index: VectorIndex,
    private readonly gateway: EmbeddingGateway,
    private readonly options: IngestionOptions,
    logger?: Logger,
  ) {
    this.logger = childLogger("ingestion", logger);
  }

  /**
   * Chunks, embeds and indexes one document. Either every chunk ends up in
   * the index or, after a partial write, the document is deleted again
   * before the error propagates.
   */
  async ingest({ text, title, sourceType }: IngestRequest): Promise<IngestResult> {
    const documentId = randomUUID();
    const chunks = chunkDocument(documentId, text, this.options);
    const metadata: DocumentMetadata = {
      title,
      sourceType,
      ingestedAt: new Date().toISOString(),
    };

    const batchSize = Math.max(1, this.options.upsertBatchSize);
    let written = false;

    try {
      for (let offset = 0; offset < chunks.length; offset += batchSize) {
        const batch = chunks.slice(offset, offset + batchSize);
        const vectors = await this.gateway.embed(batch.map((chunk) => chunk.text));

        const entries: IndexEntry[] = batch.map((chunk, i) => ({
          chunkId: chunk.id,
          documentId,
          text: chunk.text,
          vector: vectors[i] ?? [],
          metadata: {
            ...metadata,
            documentId,
            ordinal: chunk.ordinal,
            start: chunk.start,
            end: chunk.end,
            section: chunk.section,
          },
        }));

        written = true;
        await this.index.upsert(entries);
      }
    } catch (error) {
      if (written) {
        await this.rollback(documentId, error);
      }
      throw error;
    }

    this.logger.info(
      { documentId, title, sourceType, chunks: chunks.length },
      "Ingested document",
    );
    return { documentId, chunkCount: chunks.length };
  }

  private async rollback(documentId: string, cause: unknown): Promise<void> {
    try {
      const removed = await this.index.delete(documentId);
      this.logger.warn(
        { documentId, removed, error: describeError(cause) },
        "Rolled back partially ingested document",
      );
    } catch (rollbackError) {
      this.logger.error(
        { documentId, error: describeError(rollbackError), cause: describeError(cause) },
        "Rollback of partially ingested document failed",
      );
    }
  }
}
