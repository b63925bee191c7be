import type { Logger } from "pino";
import { DocumentNotFound, LegalQaError, NoResultsFound } from "../domain/errors.js";
import {
  ChatMessage,
  DocumentMetadata,
  IndexStats,
  IndexedDocument,
  MetadataFilter,
  SearchHit,
  SourceDocument,
} from "../domain/types.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { describeError } from "../infra/ai/retry.js";
import { EmbeddingGateway } from "../infra/ai/embeddingGateway.js";
import {
  loadDocumentFile,
  loadDocumentTextFromBuffer,
  titleFromFileName,
} from "../infra/parsers/documentLoader.js";
import { AnswerSynthesizer } from "../pipelines/answering.js";
import { reconstructText } from "../pipelines/chunking.js";
import { assembleContext } from "../pipelines/contextAssembly.js";
import { IngestResult, IngestionPipeline } from "../pipelines/ingestion.js";
import { Retriever } from "../pipelines/retrieval.js";
import { childLogger } from "../utils/logger.js";
import { normalizeText } from "../utils/text.js";
import { MonitoringService, ServiceMetrics } from "./monitoringService.js";

export const APOLOGY_RESPONSE =
  "I'm sorry, I could not answer your question right now. Please try again in a moment.";

export const INSUFFICIENT_INFORMATION_RESPONSE =
  "The indexed legal documents do not contain enough information to answer this question.";

const DEFAULT_SOURCE_TYPE = "document";

export interface LegalQaServiceDeps {
  index: VectorIndex;
  gateway: EmbeddingGateway;
  retriever: Retriever;
  synthesizer: AnswerSynthesizer;
  ingestion: IngestionPipeline;
  monitoring: MonitoringService;
}

export interface LegalQaServiceOptions {
  topK: number;
  contextBudget: number;
  answerWithoutContext: boolean;
}

export interface ChatRequest {
  message: string;
  history?: ChatMessage[];
  topK?: number;
  filter?: MetadataFilter;
}

export interface ChatResponse {
  response: string;
  confidence: number;
  sources: SourceDocument[];
}

export interface TextIngestRequest {
  title: string;
  content: string;
  sourceType?: string;
}

export interface UploadIngestRequest {
  fileName: string;
  data: Buffer;
  title?: string;
  sourceType?: string;
}

export interface DocumentDetails {
  id: string;
  metadata: DocumentMetadata;
  chunk_count: number;
  text: string;
}

export type CheckStatus = "ok" | "error";

export interface HealthReport {
  status: "healthy" | "error";
  checks: {
    vector_index: CheckStatus;
    embedding_gateway: CheckStatus;
  };
}

export interface MetricsReport extends ServiceMetrics {
  index: IndexStats;
}

export class LegalQaService {
  private readonly logger: Logger;

  constructor(
    private readonly deps: LegalQaServiceDeps,
    private readonly options: LegalQaServiceOptions,
    logger?: Logger,
  ) {
    this.logger = childLogger("legal-qa-service", logger);
  }

  /**
   * Answers a question from the indexed corpus. Never throws: any failure
   * is logged and turned into an apology with zero confidence.
   */
  async chat(request: ChatRequest): Promise<ChatResponse> {
    const k = request.topK ?? this.options.topK;
    try {
      const passages = await this.findPassages(request.message, k, request.filter);
      if (passages.length === 0 && !this.options.answerWithoutContext) {
        return { response: INSUFFICIENT_INFORMATION_RESPONSE, confidence: 0, sources: [] };
      }

      const context = assembleContext(passages, { budget: this.options.contextBudget });
      const answer = await this.deps.synthesizer.synthesize({
        question: request.message,
        context,
        requestedK: k,
        history: request.history,
      });

      return { response: answer.text, confidence: answer.confidence, sources: answer.sources };
    } catch (error) {
      this.deps.monitoring.trackError(error);
      this.logger.error(
        { error: describeError(error), code: error instanceof LegalQaError ? error.code : null },
        "Chat request degraded",
      );
      return { response: APOLOGY_RESPONSE, confidence: 0, sources: [] };
    }
  }

  async searchPassages(query: string, k?: number, filter?: MetadataFilter): Promise<SearchHit[]> {
    return this.findPassages(query, k ?? this.options.topK, filter);
  }

  async ingestText({ title, content, sourceType }: TextIngestRequest): Promise<IngestResult> {
    return this.ingest(title, normalizeText(content), sourceType);
  }

  async ingestUpload({ fileName, data, title, sourceType }: UploadIngestRequest): Promise<IngestResult> {
    const text = await loadDocumentTextFromBuffer(fileName, data);
    return this.ingest(title?.trim() || titleFromFileName(fileName), text, sourceType);
  }

  async ingestFile(filePath: string, sourceType?: string): Promise<IngestResult> {
    const loaded = await loadDocumentFile(filePath, sourceType ?? DEFAULT_SOURCE_TYPE);
    return this.ingest(loaded.title, loaded.text, loaded.sourceType);
  }

  async listDocuments(): Promise<IndexedDocument[]> {
    return this.deps.index.listDocuments();
  }

  async getDocument(documentId: string): Promise<DocumentDetails> {
    const chunks = await this.deps.index.getDocumentChunks(documentId);
    const first = chunks[0];
    if (!first) {
      throw new DocumentNotFound(documentId);
    }

    return {
      id: documentId,
      metadata: {
        title: first.metadata.title,
        sourceType: first.metadata.sourceType,
        ingestedAt: first.metadata.ingestedAt,
      },
      chunk_count: chunks.length,
      text: reconstructText(
        chunks.map((chunk) => ({
          text: chunk.text,
          start: chunk.metadata.start,
          end: chunk.metadata.end,
        })),
      ),
    };
  }

  async deleteDocument(documentId: string): Promise<number> {
    const removed = await this.deps.index.delete(documentId);
    if (removed === 0) {
      throw new DocumentNotFound(documentId);
    }
    this.logger.info({ documentId, removed }, "Deleted document");
    return removed;
  }

  async health(): Promise<HealthReport> {
    const [indexReachable, embeddingReachable] = await Promise.all([
      this.pingIndex(),
      this.deps.gateway.ping(),
    ]);

    return {
      status: indexReachable && embeddingReachable ? "healthy" : "error",
      checks: {
        vector_index: indexReachable ? "ok" : "error",
        embedding_gateway: embeddingReachable ? "ok" : "error",
      },
    };
  }

  async metrics(): Promise<MetricsReport> {
    return {
      ...this.deps.monitoring.getMetrics(),
      index: await this.deps.index.stats(),
    };
  }

  private async ingest(title: string, text: string, sourceType?: string): Promise<IngestResult> {
    try {
      return await this.deps.ingestion.ingest({
        text,
        title,
        sourceType: sourceType?.trim() || DEFAULT_SOURCE_TYPE,
      });
    } catch (error) {
      this.deps.monitoring.trackError(error);
      throw error;
    }
  }

  private async findPassages(
    query: string,
    k: number,
    filter?: MetadataFilter,
  ): Promise<SearchHit[]> {
    try {
      return await this.deps.retriever.retrieve({ query, k, filter });
    } catch (error) {
      if (error instanceof NoResultsFound) {
        this.logger.info({ reason: error.reason }, "No passages found for query");
        return [];
      }
      throw error;
    }
  }

  private async pingIndex(): Promise<boolean> {
    try {
      await this.deps.index.ping();
      return true;
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, "Vector index ping failed");
      return false;
    }
  }
}
