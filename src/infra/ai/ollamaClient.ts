import {
  ChatProviderError,
  EmbeddingProviderError,
  RequestAbortedError,
  describeError,
} from "../../domain/errors.js";
import { isAbortError, readLines } from "./lineStream.js";
import { AiClient, ChatMessage, CompletionOptions } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  temperature: number;
  maxTokens: number;
}

interface OllamaEmbedResponse {
  embeddings?: number[][];
}

interface OllamaChatResponse {
  message?: {
    content?: string;
  };
  done?: boolean;
  error?: string;
}

export class OllamaClient implements AiClient {
  constructor(private readonly options: OllamaClientOptions) {}

  get embeddingModel(): string {
    return this.options.embeddingModel;
  }

  get chatModel(): string {
    return this.options.chatModel;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    let response: Response;
    try {
      response = await fetch(`${this.options.baseUrl}/api/embed`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.options.embeddingModel,
          input: texts,
        }),
      });
    } catch (error) {
      throw new EmbeddingProviderError(`Ollama embeddings request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new EmbeddingProviderError(
        `Ollama embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as OllamaEmbedResponse;
    if (!data.embeddings || data.embeddings.length === 0) {
      throw new EmbeddingProviderError("Ollama embeddings returned no vectors.");
    }
    return data.embeddings;
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedTexts([query]);
    if (!embedding || embedding.length === 0) {
      throw new EmbeddingProviderError("Ollama embeddings returned empty vector.");
    }
    return embedding;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const response = await this.postChat(messages, false, options);
    let data: OllamaChatResponse;
    try {
      data = (await response.json()) as OllamaChatResponse;
    } catch (error) {
      if (options.signal?.aborted || isAbortError(error)) {
        throw new RequestAbortedError();
      }
      throw new ChatProviderError(`Ollama chat response unreadable: ${describeError(error)}`, {
        cause: error,
      });
    }
    return data.message?.content?.trim() ?? "";
  }

  async streamCompletion(
    messages: ChatMessage[],
    onToken: (token: string) => void,
    options: CompletionOptions = {},
  ): Promise<string> {
    const response = await this.postChat(messages, true, options);
    if (!response.body) {
      throw new ChatProviderError("Ollama chat stream returned empty body.");
    }

    let collected = "";
    try {
      await readLines(
        response.body,
        (line) => {
          const data = JSON.parse(line) as OllamaChatResponse;
          if (data.error) {
            throw new Error(data.error);
          }
          const token = data.message?.content ?? "";
          if (token) {
            collected += token;
            onToken(token);
          }
        },
        options.signal,
      );
    } catch (error) {
      if (error instanceof RequestAbortedError) {
        throw error;
      }
      throw new ChatProviderError(`Ollama chat stream failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    return collected;
  }

  private async postChat(
    messages: ChatMessage[],
    stream: boolean,
    options: CompletionOptions,
  ): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(`${this.options.baseUrl}/api/chat`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        signal: options.signal,
        body: JSON.stringify({
          model: this.options.chatModel,
          stream,
          keep_alive: "30m",
          options: {
            temperature: options.temperature ?? this.options.temperature,
            num_predict: options.maxTokens ?? this.options.maxTokens,
          },
          messages,
        }),
      });
    } catch (error) {
      if (options.signal?.aborted || isAbortError(error)) {
        throw new RequestAbortedError();
      }
      throw new ChatProviderError(`Ollama chat request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new ChatProviderError(
        `Ollama chat failed (${response.status}): ${await response.text()}`,
      );
    }
    return response;
  }
}
