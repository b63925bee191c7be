import { ChatMessage } from "../../domain/types.js";

/**
 * Narrow capability contracts for the external model backends. Every call
 * receives an abort signal carrying the per-call timeout; retries belong to
 * the gateway that wraps the model, not to the model itself.
 */
export interface EmbeddingModel {
  readonly name: string;
  embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]>;
  ping(signal: AbortSignal): Promise<void>;
}

export interface GenerationRequest {
  system: string;
  messages: ChatMessage[];
}

export interface GenerationResult {
  text: string;
  /** Model-native confidence in [0, 1], when the backend exposes one. */
  confidence: number | null;
}

export interface GenerationModel {
  readonly name: string;
  generate(request: GenerationRequest, signal: AbortSignal): Promise<GenerationResult>;
}
