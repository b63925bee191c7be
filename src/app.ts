import type { Logger } from "pino";
import { AppConfig } from "./config/env.js";
import { VectorIndex } from "./domain/vectorIndex.js";
import { AiBackends, createAiBackends } from "./infra/ai/createAiBackends.js";
import { EmbeddingGateway } from "./infra/ai/embeddingGateway.js";
import { createVectorIndex } from "./infra/store/createVectorIndex.js";
import { AnswerSynthesizer } from "./pipelines/answering.js";
import { IngestionPipeline } from "./pipelines/ingestion.js";
import { Retriever } from "./pipelines/retrieval.js";
import { LegalQaService } from "./services/legalQaService.js";
import { MonitoringService } from "./services/monitoringService.js";

export interface Application {
  service: LegalQaService;
  monitoring: MonitoringService;
  index: VectorIndex;
  close: () => Promise<void>;
}

/** Wires the pipelines around an already opened index and model backends. */
export function assembleApplication(
  config: AppConfig,
  index: VectorIndex,
  backends: AiBackends,
  logger?: Logger,
): Application {
  const monitoring = new MonitoringService();
  const gateway = new EmbeddingGateway(backends.embedding, config.embedding, logger);
  const retriever = new Retriever(
    index,
    gateway,
    {
      overFetchFactor: config.retrieval.overFetchFactor,
      maxChunksPerDocument: config.retrieval.maxChunksPerDocument,
      minSimilarity: config.retrieval.minSimilarity,
    },
    logger,
  );
  const synthesizer = new AnswerSynthesizer(backends.generation, config.generation, logger);
  const ingestion = new IngestionPipeline(index, gateway, config.chunking, logger);

  const service = new LegalQaService(
    { index, gateway, retriever, synthesizer, ingestion, monitoring },
    {
      topK: config.retrieval.topK,
      contextBudget: config.retrieval.contextBudget,
      answerWithoutContext: config.retrieval.answerWithoutContext,
    },
    logger,
  );

  return {
    service,
    monitoring,
    index,
    close: () => index.close(),
  };
}

export async function createApplication(config: AppConfig, logger?: Logger): Promise<Application> {
  const backends = createAiBackends(config.ai);
  const index = await createVectorIndex(config.index, logger);
  return assembleApplication(config, index, backends, logger);
}
