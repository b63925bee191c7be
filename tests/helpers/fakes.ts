import pino from "pino";
import { AppConfig, loadConfig } from "../../src/config/env.js";
import { IndexEntry } from "../../src/domain/types.js";
import { ProviderRequestError } from "../../src/infra/ai/retry.js";
import {
  EmbeddingModel,
  GenerationModel,
  GenerationRequest,
  GenerationResult,
} from "../../src/infra/ai/types.js";

export const VOCABULARY = [
  "tenant",
  "landlord",
  "deposit",
  "privacy",
  "speech",
  "contract",
  "employment",
  "tax",
] as const;

export const silentLogger = pino({ level: "silent" });

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    VECTOR_STORE: "memory",
    VECTOR_DIMENSION: String(VOCABULARY.length),
    RETRY_ATTEMPTS: "2",
    RETRY_MIN_DELAY_MS: "0",
    RETRY_MAX_DELAY_MS: "0",
    EMBEDDING_TIMEOUT_MS: "1000",
    GENERATION_TIMEOUT_MS: "1000",
    ...overrides,
  });
}

/** Bag-of-words vector over `VOCABULARY`: one dimension per term, holding its count. */
export function keywordVector(text: string): number[] {
  const tokens = text.toLowerCase().split(/[^a-z]+/);
  return VOCABULARY.map((term) => tokens.filter((token) => token === term).length);
}

export class KeywordEmbeddingModel implements EmbeddingModel {
  readonly name = "fake:keywords";

  calls = 0;

  pingFails = false;

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls += 1;
    return texts.map(keywordVector);
  }

  async ping(): Promise<void> {
    if (this.pingFails) {
      throw new Error("embedding backend unreachable");
    }
  }
}

/** Always answers with a 503, the way an overloaded backend does. */
export class UnavailableEmbeddingModel implements EmbeddingModel {
  readonly name = "fake:unavailable";

  calls = 0;

  async embedBatch(): Promise<number[][]> {
    this.calls += 1;
    throw ProviderRequestError.fromStatus("Fake", 503, "overloaded");
  }

  async ping(): Promise<void> {
    throw ProviderRequestError.fromStatus("Fake", 503, "overloaded");
  }
}

export class ScriptedGenerationModel implements GenerationModel {
  readonly name = "fake:scripted";

  readonly requests: GenerationRequest[] = [];

  constructor(
    private readonly text = "The tenant pays the deposit to the landlord [1].",
    private readonly confidence: number | null = null,
  ) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    this.requests.push(request);
    return { text: this.text, confidence: this.confidence };
  }
}

export class FailingGenerationModel implements GenerationModel {
  readonly name = "fake:failing";

  calls = 0;

  constructor(private readonly status = 400) {}

  async generate(): Promise<GenerationResult> {
    this.calls += 1;
    throw ProviderRequestError.fromStatus("Fake", this.status, "rejected");
  }
}

export function makeEntry(
  documentId: string,
  ordinal: number,
  vector: number[],
  overrides: {
    title?: string;
    sourceType?: string;
    ingestedAt?: string;
    section?: string | null;
    text?: string;
  } = {},
): IndexEntry {
  return {
    chunkId: `${documentId}:${ordinal}`,
    documentId,
    text: overrides.text ?? `${documentId} passage ${ordinal}`,
    vector,
    metadata: {
      title: overrides.title ?? `Title of ${documentId}`,
      sourceType: overrides.sourceType ?? "statute",
      ingestedAt: overrides.ingestedAt ?? "2024-01-01T00:00:00.000Z",
      documentId,
      ordinal,
      start: ordinal * 10,
      end: ordinal * 10 + 12,
      section: overrides.section ?? null,
    },
  };
}
