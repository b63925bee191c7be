import type { Logger } from "pino";
import type { RetryPolicy } from "../config/env.js";
import { GenerationUnavailable } from "../domain/errors.js";
import { Answer, ChatMessage } from "../domain/types.js";
import { callWithRetry, describeError } from "../infra/ai/retry.js";
import { GenerationModel, GenerationRequest, GenerationResult } from "../infra/ai/types.js";
import { childLogger } from "../utils/logger.js";
import { clamp01 } from "../utils/vector.js";
import { AssembledContext } from "./contextAssembly.js";

const SYSTEM_PROMPT = [
  "You are a legal research assistant.",
  "Answer using the numbered context passages and cite them inline as [n].",
  "If the context does not contain the answer, say that the indexed documents are insufficient.",
  "Do not invent statutes, articles, case names or citations.",
  "Format the answer in Markdown.",
].join("\n");

const NO_CONTEXT_SYSTEM_PROMPT = [
  "You are a legal research assistant.",
  "No indexed legal document matched the question.",
  "Say so first, then give a brief general answer and recommend consulting the primary sources.",
  "Do not cite specific documents.",
].join("\n");

export interface AnswerSynthesizerOptions {
  retry: RetryPolicy;
  maxHistoryMessages: number;
  thinEvidencePenalty: number;
}

export interface SynthesisInput {
  question: string;
  context: AssembledContext;
  requestedK: number;
  history?: ChatMessage[];
}

export class AnswerSynthesizer {
  private readonly logger: Logger;

  constructor(
    private readonly model: GenerationModel,
    private readonly options: AnswerSynthesizerOptions,
    logger?: Logger,
  ) {
    this.logger = childLogger("answer-synthesizer", logger);
  }

  async synthesize(input: SynthesisInput): Promise<Answer> {
    const request = buildGenerationRequest(input, this.options.maxHistoryMessages);

    const result = await this.generate(request);
    const text = result.text.trim();
    if (!text) {
      throw new GenerationUnavailable(`Generation model ${this.model.name} returned no text.`);
    }

    return {
      text,
      confidence:
        input.context.passages.length === 0
          ? 0
          : result.confidence !== null
            ? clamp01(result.confidence)
            : estimateConfidence(
                input.context.passages.map((passage) => passage.hit.score),
                input.requestedK,
                this.options.thinEvidencePenalty,
              ),
      sources: input.context.documents,
    };
  }

  private async generate(request: GenerationRequest): Promise<GenerationResult> {
    try {
      return await callWithRetry(
        (signal) => this.model.generate(request, signal),
        this.options.retry,
        { label: `${this.model.name}:generate`, logger: this.logger },
      );
    } catch (error) {
      this.logger.error({ error: describeError(error) }, "Generation request failed");
      throw new GenerationUnavailable(
        `Generation model ${this.model.name} is unavailable: ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}

export function buildGenerationRequest(
  { question, context, history = [] }: SynthesisInput,
  maxHistoryMessages: number,
): GenerationRequest {
  const recent = maxHistoryMessages > 0 ? history.slice(-maxHistoryMessages) : [];
  const prompt = context.text
    ? `Context:\n${context.text}\n\nQuestion: ${question}`
    : `Question: ${question}`;

  return {
    system: context.text ? SYSTEM_PROMPT : NO_CONTEXT_SYSTEM_PROMPT,
    messages: [...recent, { role: "user", content: prompt }],
  };
}

/**
 * Mean of the clamped similarity scores, scaled down by `penalty` when
 * fewer than `requestedK` passages made it into the context.
 */
export function estimateConfidence(
  scores: number[],
  requestedK: number,
  penalty: number,
): number {
  if (scores.length === 0) {
    return 0;
  }
  const mean = scores.reduce((sum, score) => sum + clamp01(score), 0) / scores.length;
  return clamp01(scores.length < requestedK ? mean * penalty : mean);
}
