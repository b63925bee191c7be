import type { Logger } from "pino";
import { NoResultsFound } from "../domain/errors.js";
import { MetadataFilter, SearchHit } from "../domain/types.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { EmbeddingGateway } from "../infra/ai/embeddingGateway.js";
import { childLogger } from "../utils/logger.js";

export interface RetrieverOptions {
  overFetchFactor: number;
  maxChunksPerDocument: number;
  minSimilarity: number;
}

export interface RetrievalQuery {
  query: string;
  k: number;
  filter?: MetadataFilter;
}

export class Retriever {
  private readonly logger: Logger;

  constructor(
    private readonly index: VectorIndex,
    private readonly gateway: EmbeddingGateway,
    private readonly options: RetrieverOptions,
    logger?: Logger,
  ) {
    this.logger = childLogger("retriever", logger);
  }

  /**
   * Top `k` passages by similarity, at most `maxChunksPerDocument` per
   * document. Throws `NoResultsFound` when nothing usable comes back.
   */
  async retrieve({ query, k, filter }: RetrievalQuery): Promise<SearchHit[]> {
    const queryVector = await this.gateway.embedQuery(query);
    const candidates = await this.index.search(
      queryVector,
      k * Math.max(1, this.options.overFetchFactor),
      filter,
    );

    if (candidates.length === 0) {
      const { entryCount } = await this.index.stats();
      throw new NoResultsFound(entryCount > 0 ? "no_match" : "empty_index");
    }

    const relevant = candidates.filter((hit) => hit.score >= this.options.minSimilarity);
    if (relevant.length === 0) {
      this.logger.debug(
        { candidates: candidates.length, best: candidates[0]?.score },
        "No candidate cleared the similarity threshold",
      );
      throw new NoResultsFound("below_threshold");
    }

    const passages = capPerDocument(relevant, this.options.maxChunksPerDocument).slice(0, k);
    this.logger.debug(
      { candidates: candidates.length, relevant: relevant.length, returned: passages.length },
      "Retrieved passages",
    );
    return passages;
  }
}

/** Keeps input order; drops hits once a document reached its quota. */
export function capPerDocument(hits: SearchHit[], maxPerDocument: number): SearchHit[] {
  const counts = new Map<string, number>();
  const kept: SearchHit[] = [];

  for (const hit of hits) {
    const count = counts.get(hit.documentId) ?? 0;
    if (count >= maxPerDocument) {
      continue;
    }
    counts.set(hit.documentId, count + 1);
    kept.push(hit);
  }

  return kept;
}
