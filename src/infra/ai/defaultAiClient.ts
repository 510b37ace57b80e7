import { AppConfig } from "../../config/env.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { AiClient, ChatClient, ChatMessage, CompletionOptions, EmbeddingClient } from "./types.js";

/** Routes embeddings and chat to the providers chosen in config. */
export class DefaultAiClient implements AiClient {
  private readonly embeddings: EmbeddingClient;

  private readonly chat: ChatClient;

  constructor(config: AppConfig) {
    const openAi = new OpenAiClient({
      apiKey: config.openaiApiKey,
      baseUrl: config.openaiBaseUrl,
      embeddingModel: config.embeddingModel,
      chatModel: config.chatModel,
      temperature: config.chatTemperature,
      maxTokens: config.maxOutputTokens,
    });
    const ollama = new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
      temperature: config.chatTemperature,
      maxTokens: config.maxOutputTokens,
    });

    this.embeddings = config.embeddingProvider === "openai" ? openAi : ollama;
    this.chat = config.chatProvider === "openai" ? openAi : ollama;
  }

  get embeddingModel(): string {
    return this.embeddings.embeddingModel;
  }

  get chatModel(): string {
    return this.chat.chatModel;
  }

  embedTexts(texts: string[]): Promise<number[][]> {
    return this.embeddings.embedTexts(texts);
  }

  embedQuery(query: string): Promise<number[]> {
    return this.embeddings.embedQuery(query);
  }

  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string> {
    return this.chat.complete(messages, options);
  }

  streamCompletion(
    messages: ChatMessage[],
    onToken: (token: string) => void,
    options?: CompletionOptions,
  ): Promise<string> {
    return this.chat.streamCompletion(messages, onToken, options);
  }
}
