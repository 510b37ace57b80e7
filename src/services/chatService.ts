import {
  ChatProviderError,
  InputError,
  RequestAbortedError,
  describeError,
  isAppError,
} from "../domain/errors.js";
import { ConversationMessage, QueryTurn, SearchHit } from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import { ChatClient } from "../infra/ai/types.js";
import { BatchEmbedder } from "../pipelines/embedding.js";
import {
  buildAnswerMessages,
  buildFollowUpMessages,
  extractFollowUpQuestions,
} from "../pipelines/prompting.js";
import { createLogger } from "../utils/logger.js";
import { truncate } from "../utils/text.js";
import { CollectionManager } from "./collectionManager.js";

const logger = createLogger("chat");

export const MAX_QUESTION_LENGTH = 4000;

export interface ChatServiceDeps {
  collectionName: string;
  store: VectorStore;
  collections: CollectionManager;
  embedder: BatchEmbedder;
  chat: ChatClient;
  topK: number;
  followUps: { enabled: boolean; maxQuestions: number };
}

export interface StreamAnswerOptions {
  history?: ConversationMessage[];
  onToken?: (token: string) => void;
  signal?: AbortSignal;
}

export interface AskOptions {
  topK?: number;
  history?: ConversationMessage[];
  signal?: AbortSignal;
}

export class ChatService {
  constructor(private readonly deps: ChatServiceDeps) {}

  async retrieve(question: string, options: { topK?: number } = {}): Promise<SearchHit[]> {
    const normalized = validateQuestion(question);
    const topK = options.topK ?? this.deps.topK;
    if (!Number.isInteger(topK) || topK < 1) {
      throw new InputError("INVALID_QUERY", `top_k must be a positive integer, got ${topK}.`);
    }

    await this.deps.collections.requireCollection(this.deps.collectionName);
    const vector = await this.deps.embedder.embedQuery(normalized);
    const hits = await this.deps.store.search(this.deps.collectionName, vector, topK);

    logger.debug("Retrieved context", {
      question: truncate(normalized, 120),
      topK,
      hits: hits.length,
    });
    return hits;
  }

  async streamAnswer(
    question: string,
    hits: SearchHit[],
    options: StreamAnswerOptions = {},
  ): Promise<string> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new RequestAbortedError();
    }

    const messages = buildAnswerMessages(question.trim(), hits, options.history);
    const forward = (token: string) => {
      if (!signal?.aborted) {
        options.onToken?.(token);
      }
    };

    try {
      const answer = await this.deps.chat.streamCompletion(messages, forward, { signal });
      if (signal?.aborted) {
        throw new RequestAbortedError();
      }
      return answer;
    } catch (error) {
      if (isAppError(error)) {
        throw error;
      }
      throw new ChatProviderError(`Answer generation failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  /** Best effort: a failure is logged and yields no suggestions. */
  async suggestFollowUps(
    question: string,
    answer: string,
    options: { signal?: AbortSignal } = {},
  ): Promise<string[]> {
    const { enabled, maxQuestions } = this.deps.followUps;
    if (!enabled || !answer.trim()) {
      return [];
    }

    try {
      const raw = await this.deps.chat.complete(
        buildFollowUpMessages(question.trim(), answer, maxQuestions),
        { signal: options.signal },
      );
      return extractFollowUpQuestions(raw, maxQuestions);
    } catch (error) {
      if (error instanceof RequestAbortedError) {
        throw error;
      }
      logger.warn("Follow-up question generation failed", { reason: describeError(error) });
      return [];
    }
  }

  async ask(question: string, options: AskOptions = {}): Promise<QueryTurn> {
    const hits = await this.retrieve(question, { topK: options.topK });
    const answer = await this.streamAnswer(question, hits, {
      history: options.history,
      signal: options.signal,
    });
    const followUpQuestions = await this.suggestFollowUps(question, answer, {
      signal: options.signal,
    });
    return { question: question.trim(), hits, answer, followUpQuestions };
  }
}

function validateQuestion(question: string): string {
  const normalized = question.trim();
  if (!normalized) {
    throw new InputError("INVALID_QUERY", "Question must not be empty.");
  }
  if (normalized.length > MAX_QUESTION_LENGTH) {
    throw new InputError(
      "INVALID_QUERY",
      `Question is too long (${normalized.length} > ${MAX_QUESTION_LENGTH} characters).`,
    );
  }
  return normalized;
}
