import { ProviderRequestError } from "./retry.js";
import {
  EmbeddingModel,
  GenerationModel,
  GenerationRequest,
  GenerationResult,
} from "./types.js";

interface OpenAiClientOptions {
  apiKey: string;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
}

interface EmbeddingResponse {
  data: Array<{
    embedding: number[];
    index: number;
  }>;
}

interface ChatResponse {
  choices: Array<{
    message: {
      content: string | null;
    };
    logprobs?: {
      content?: Array<{ logprob: number }> | null;
    } | null;
  }>;
}

export class OpenAiEmbeddingModel implements EmbeddingModel {
  readonly name: string;

  constructor(private readonly options: OpenAiClientOptions) {
    this.name = `openai:${options.embeddingModel}`;
  }

  async embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const data = await request<EmbeddingResponse>(this.options, "/embeddings", signal, {
      model: this.options.embeddingModel,
      input: texts,
    });

    return [...data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async ping(signal: AbortSignal): Promise<void> {
    await request<unknown>(this.options, `/models/${this.options.embeddingModel}`, signal);
  }
}

export class OpenAiGenerationModel implements GenerationModel {
  readonly name: string;

  constructor(private readonly options: OpenAiClientOptions) {
    this.name = `openai:${options.chatModel}`;
  }

  async generate(input: GenerationRequest, signal: AbortSignal): Promise<GenerationResult> {
    const data = await request<ChatResponse>(this.options, "/chat/completions", signal, {
      model: this.options.chatModel,
      temperature: 0.2,
      logprobs: true,
      messages: [{ role: "system", content: input.system }, ...input.messages],
    });

    const choice = data.choices[0];
    return {
      text: choice?.message?.content?.trim() ?? "",
      confidence: confidenceFromLogprobs(choice?.logprobs?.content ?? null),
    };
  }
}

/**
 * Geometric-mean token probability of the completion.
 */
export function confidenceFromLogprobs(tokens: Array<{ logprob: number }> | null): number | null {
  if (!tokens || tokens.length === 0) {
    return null;
  }
  const mean = tokens.reduce((sum, token) => sum + token.logprob, 0) / tokens.length;
  if (Number.isNaN(mean)) {
    return null;
  }
  return Math.min(1, Math.max(0, Math.exp(mean)));
}

async function request<T>(
  options: OpenAiClientOptions,
  path: string,
  signal: AbortSignal,
  body?: unknown,
): Promise<T> {
  const response = await fetch(`${options.baseUrl}${path}`, {
    method: body === undefined ? "GET" : "POST",
    headers: {
      Authorization: `Bearer ${options.apiKey}`,
      "Content-Type": "application/json",
    },
    body: body === undefined ? undefined : JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    throw ProviderRequestError.fromStatus("OpenAI", response.status, await response.text());
  }

  return (await response.json()) as T;
}
