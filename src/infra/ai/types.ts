export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface EmbeddingClient {
  readonly embeddingModel: string;
  embedTexts(texts: string[]): Promise<number[][]>;
  embedQuery(query: string): Promise<number[]>;
}

export interface ChatClient {
  readonly chatModel: string;
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
  /** Forwards tokens in generation order and resolves to the full text. */
  streamCompletion(
    messages: ChatMessage[],
    onToken: (token: string) => void,
    options?: CompletionOptions,
  ): Promise<string>;
}

export interface AiClient extends EmbeddingClient, ChatClient {}
