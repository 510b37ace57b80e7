import {
  ChatProviderError,
  ConfigurationError,
  EmbeddingProviderError,
  RequestAbortedError,
  describeError,
} from "../../domain/errors.js";
import { isAbortError, readLines } from "./lineStream.js";
import { AiClient, ChatMessage, CompletionOptions } from "./types.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  /** Any OpenAI-compatible endpoint, e.g. https://api.groq.com/openai/v1. */
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
  temperature: number;
  maxTokens: number;
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
  }>;
}

interface ChatStreamChunk {
  choices?: Array<{
    delta?: {
      content?: string | null;
    };
  }>;
}

export class OpenAiClient implements AiClient {
  constructor(private readonly options: OpenAiClientOptions) {}

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
      response = await fetch(`${this.options.baseUrl}/embeddings`, {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify({
          model: this.options.embeddingModel,
          input: texts,
        }),
      });
    } catch (error) {
      throw new EmbeddingProviderError(`OpenAI embeddings request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new EmbeddingProviderError(
        `OpenAI embeddings failed (${response.status}): ${await response.text()}`,
        { retryable: isRetryableStatus(response.status) },
      );
    }

    const data = (await response.json()) as EmbeddingResponse;
    return data.data
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedTexts([query]);
    if (!embedding) {
      throw new EmbeddingProviderError("OpenAI embeddings returned no vector for the query.");
    }
    return embedding;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const response = await this.postChat(messages, false, options);
    let data: ChatResponse;
    try {
      data = (await response.json()) as ChatResponse;
    } catch (error) {
      if (options.signal?.aborted || isAbortError(error)) {
        throw new RequestAbortedError();
      }
      throw new ChatProviderError(`OpenAI chat response unreadable: ${describeError(error)}`, {
        cause: error,
      });
    }
    return data.choices[0]?.message?.content?.trim() ?? "";
  }

  async streamCompletion(
    messages: ChatMessage[],
    onToken: (token: string) => void,
    options: CompletionOptions = {},
  ): Promise<string> {
    const response = await this.postChat(messages, true, options);
    if (!response.body) {
      throw new ChatProviderError("OpenAI chat stream returned empty body.");
    }

    let collected = "";
    let finished = false;
    try {
      await readLines(
        response.body,
        (line) => {
          if (finished || !line.startsWith("data:")) {
            return;
          }
          const payload = line.slice("data:".length).trim();
          if (payload === "[DONE]") {
            finished = true;
            return;
          }
          const chunk = JSON.parse(payload) as ChatStreamChunk;
          const token = chunk.choices?.[0]?.delta?.content ?? "";
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
      throw new ChatProviderError(`OpenAI chat stream failed: ${describeError(error)}`, {
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
      response = await fetch(`${this.options.baseUrl}/chat/completions`, {
        method: "POST",
        headers: this.headers(),
        signal: options.signal,
        body: JSON.stringify({
          model: this.options.chatModel,
          temperature: options.temperature ?? this.options.temperature,
          max_tokens: options.maxTokens ?? this.options.maxTokens,
          stream,
          messages,
        }),
      });
    } catch (error) {
      if (options.signal?.aborted || isAbortError(error)) {
        throw new RequestAbortedError();
      }
      throw new ChatProviderError(`OpenAI chat request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new ChatProviderError(
        `OpenAI chat failed (${response.status}): ${await response.text()}`,
        { retryable: isRetryableStatus(response.status) },
      );
    }
    return response;
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.requireApiKey()}`,
      "Content-Type": "application/json",
    };
  }

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new ConfigurationError("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return this.options.apiKey;
  }
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}
