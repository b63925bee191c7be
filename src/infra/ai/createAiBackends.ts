import { AppConfig } from "../../config/env.js";
import { OllamaEmbeddingModel, OllamaGenerationModel } from "./ollamaClient.js";
import { OpenAiEmbeddingModel, OpenAiGenerationModel } from "./openAiClient.js";
import { EmbeddingModel, GenerationModel } from "./types.js";

export interface AiBackends {
  embedding: EmbeddingModel;
  generation: GenerationModel;
}

export function createAiBackends(config: AppConfig["ai"]): AiBackends {
  const ollama = {
    baseUrl: config.ollamaBaseUrl,
    chatModel: config.ollamaChatModel,
    embeddingModel: config.ollamaEmbeddingModel,
  };

  return {
    embedding:
      config.embeddingProvider === "openai"
        ? new OpenAiEmbeddingModel(openAiOptions(config))
        : new OllamaEmbeddingModel(ollama),
    generation:
      config.generationProvider === "openai"
        ? new OpenAiGenerationModel(openAiOptions(config))
        : new OllamaGenerationModel(ollama),
  };
}

function openAiOptions(config: AppConfig["ai"]) {
  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required for OpenAI operations.");
  }
  return {
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    embeddingModel: config.openaiEmbeddingModel,
    chatModel: config.openaiChatModel,
  };
}
