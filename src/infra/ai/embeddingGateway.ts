import pLimit from "p-limit";
import type { Logger } from "pino";
import type { RetryPolicy } from "../../config/env.js";
import { EmbeddingUnavailable } from "../../domain/errors.js";
import { childLogger } from "../../utils/logger.js";
import { isFiniteVector } from "../../utils/vector.js";
import { callWithRetry, describeError, ProviderRequestError } from "./retry.js";
import { EmbeddingModel } from "./types.js";

export interface EmbeddingGatewayOptions {
  batchSize: number;
  concurrency: number;
  retry: RetryPolicy;
}

/**
 * Order-preserving batch embedding with bounded concurrency, per-call
 * timeouts and retry of transient failures.
 */
export class EmbeddingGateway {
  private readonly logger: Logger;

  constructor(
    private readonly model: EmbeddingModel,
    private readonly options: EmbeddingGatewayOptions,
    logger?: Logger,
  ) {
    this.logger = childLogger("embedding-gateway", logger);
  }

  get modelName(): string {
    return this.model.name;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const batches = toBatches(texts, Math.max(1, this.options.batchSize));
    const limit = pLimit(Math.max(1, this.options.concurrency));

    try {
      const results = await Promise.all(
        batches.map((batch, idx) =>
          limit(async () => ({ idx, vectors: await this.embedBatch(batch, idx) })),
        ),
      );
      return results.sort((a, b) => a.idx - b.idx).flatMap((entry) => entry.vectors);
    } catch (error) {
      this.logger.error(
        { error: describeError(error), texts: texts.length, batches: batches.length },
        "Embedding request failed",
      );
      throw new EmbeddingUnavailable(
        `Embedding model ${this.model.name} is unavailable: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embed([text]);
    if (!vector) {
      throw new EmbeddingUnavailable(`Embedding model ${this.model.name} returned no vector.`);
    }
    return vector;
  }

  async ping(): Promise<boolean> {
    try {
      await this.model.ping(AbortSignal.timeout(this.options.retry.timeoutMs));
      return true;
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, "Embedding model ping failed");
      return false;
    }
  }

  private async embedBatch(batch: string[], idx: number): Promise<number[][]> {
    return callWithRetry(
      async (signal) => {
        const vectors = await this.model.embedBatch(batch, signal);
        assertBatchShape(batch, vectors);
        return vectors;
      },
      this.options.retry,
      { label: `${this.model.name}:embed[${idx}]`, logger: this.logger },
    );
  }
}

function assertBatchShape(batch: string[], vectors: number[][]): void {
  if (vectors.length !== batch.length) {
    throw new ProviderRequestError(
      `Embedding count mismatch: sent ${batch.length} texts, received ${vectors.length} vectors.`,
      null,
      false,
    );
  }
  const dimension = vectors[0]?.length ?? 0;
  for (const vector of vectors) {
    if (!isFiniteVector(vector) || vector.length !== dimension) {
      throw new ProviderRequestError("Embedding response contains a malformed vector.", null, false);
    }
  }
}

function toBatches<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
