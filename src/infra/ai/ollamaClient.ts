import { ProviderRequestError } from "./retry.js";
import {
  EmbeddingModel,
  GenerationModel,
  GenerationRequest,
  GenerationResult,
} from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
}

interface OllamaEmbedResponse {
  embeddings?: number[][];
}

interface OllamaChatResponse {
  message?: {
    content?: string;
  };
}

export class OllamaEmbeddingModel implements EmbeddingModel {
  readonly name: string;

  constructor(private readonly options: OllamaClientOptions) {
    this.name = `ollama:${options.embeddingModel}`;
  }

  async embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const data = await postJson<OllamaEmbedResponse>(
      `${this.options.baseUrl}/api/embed`,
      { model: this.options.embeddingModel, input: texts },
      signal,
    );

    if (!data.embeddings) {
      throw new ProviderRequestError("Ollama embed response has no embeddings.", null, false);
    }
    return data.embeddings;
  }

  async ping(signal: AbortSignal): Promise<void> {
    await pingOllama(this.options.baseUrl, signal);
  }
}

export class OllamaGenerationModel implements GenerationModel {
  readonly name: string;

  constructor(private readonly options: OllamaClientOptions) {
    this.name = `ollama:${options.chatModel}`;
  }

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<GenerationResult> {
    const data = await postJson<OllamaChatResponse>(
      `${this.options.baseUrl}/api/chat`,
      {
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: 0.1,
          top_p: 0.9,
        },
        messages: [{ role: "system", content: request.system }, ...request.messages],
      },
      signal,
    );

    return {
      text: data.message?.content?.trim() ?? "",
      confidence: null,
    };
  }
}

async function pingOllama(baseUrl: string, signal: AbortSignal): Promise<void> {
  const response = await fetch(`${baseUrl}/api/tags`, { signal });
  if (!response.ok) {
    throw ProviderRequestError.fromStatus("Ollama", response.status, await response.text());
  }
}

async function postJson<T>(url: string, body: unknown, signal: AbortSignal): Promise<T> {
  const response = await fetch(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
    },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    throw ProviderRequestError.fromStatus("Ollama", response.status, await response.text());
  }

  return (await response.json()) as T;
}
