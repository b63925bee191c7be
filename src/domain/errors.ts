export type LegalQaErrorCode =
  | "CHUNKING_ERROR"
  | "DIMENSION_MISMATCH"
  | "EMBEDDING_UNAVAILABLE"
  | "GENERATION_UNAVAILABLE"
  | "NO_RESULTS_FOUND"
  | "DOCUMENT_NOT_FOUND"
  | "UNSUPPORTED_DOCUMENT";

export abstract class LegalQaError extends Error {
  abstract readonly code: LegalQaErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ChunkingError extends LegalQaError {
  readonly code = "CHUNKING_ERROR";
}

export class DimensionMismatch extends LegalQaError {
  readonly code = "DIMENSION_MISMATCH";

  constructor(
    readonly expected: number,
    readonly actual: number,
    context?: string,
  ) {
    super(
      `Vector dimension ${actual} does not match index dimension ${expected}${context ? ` (${context})` : ""}.`,
    );
  }
}

export class EmbeddingUnavailable extends LegalQaError {
  readonly code = "EMBEDDING_UNAVAILABLE";
}

export class GenerationUnavailable extends LegalQaError {
  readonly code = "GENERATION_UNAVAILABLE";
}

export type NoResultsReason = "empty_index" | "no_match" | "below_threshold";

const NO_RESULTS_MESSAGES: Record<NoResultsReason, string> = {
  empty_index: "The index returned no candidate passages.",
  no_match: "No indexed passage matched the metadata filter.",
  below_threshold: "No passage cleared the minimum similarity threshold.",
};

export class NoResultsFound extends LegalQaError {
  readonly code = "NO_RESULTS_FOUND";

  constructor(readonly reason: NoResultsReason) {
    super(NO_RESULTS_MESSAGES[reason]);
  }
}

export class DocumentNotFound extends LegalQaError {
  readonly code = "DOCUMENT_NOT_FOUND";

  constructor(readonly documentId: string) {
    super(`Document not found: ${documentId}`);
  }
}

export class UnsupportedDocument extends LegalQaError {
  readonly code = "UNSUPPORTED_DOCUMENT";
}
