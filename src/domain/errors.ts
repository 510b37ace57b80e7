export type ErrorCategory = "configuration" | "input" | "dependency" | "data" | "internal";

export interface AppErrorOptions {
  detail?: unknown;
  retryable?: boolean;
  cause?: unknown;
}

export interface ErrorPayload {
  code: string;
  message: string;
  category: ErrorCategory;
  retryable: boolean;
}

const DEFAULT_UNKNOWN_MESSAGE = "An unexpected error occurred";

export class AppError extends Error {
  readonly detail?: unknown;

  readonly retryable: boolean;

  constructor(
    readonly code: string,
    message: string,
    readonly category: ErrorCategory,
    options: AppErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.detail = options.detail;
    this.retryable = options.retryable ?? false;
  }

  get httpStatus(): number {
    switch (this.category) {
      case "input":
        return 400;
      case "data":
        return this.code === "COLLECTION_NOT_FOUND" ? 404 : 422;
      case "dependency":
        return 502;
      default:
        return 500;
    }
  }

  toPayload(): ErrorPayload {
    return {
      code: this.code,
      message: this.message,
      category: this.category,
      retryable: this.retryable,
    };
  }
}

/** Missing or invalid settings; fatal at startup. */
export class ConfigurationError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super("INVALID_CONFIGURATION", message, "configuration", options);
  }
}

export class InputError extends AppError {
  constructor(code: string, message: string, options?: AppErrorOptions) {
    super(code, message, "input", options);
  }
}

/** An upstream service (embeddings, chat model, vector store) failed. */
export class DependencyError extends AppError {
  constructor(code: string, message: string, options?: AppErrorOptions) {
    super(code, message, "dependency", { retryable: true, ...options });
  }
}

export class EmbeddingProviderError extends DependencyError {
  constructor(message: string, options?: AppErrorOptions) {
    super("EMBEDDING_FAILED", message, options);
  }
}

export class ChatProviderError extends DependencyError {
  constructor(message: string, options?: AppErrorOptions) {
    super("CHAT_COMPLETION_FAILED", message, options);
  }
}

export class VectorStoreError extends DependencyError {
  constructor(message: string, options?: AppErrorOptions) {
    super("VECTOR_STORE_FAILED", message, options);
  }
}

export class DataError extends AppError {
  constructor(code: string, message: string, options?: AppErrorOptions) {
    super(code, message, "data", options);
  }
}

export class CollectionNotFoundError extends DataError {
  constructor(readonly collection: string) {
    super(
      "COLLECTION_NOT_FOUND",
      `Collection '${collection}' not found. Create it first with \`npm run collection -- create\`.`,
      { detail: { collection } },
    );
  }
}

export class DimensionMismatchError extends DataError {
  constructor(
    readonly expected: number,
    readonly actual: number,
    context: string,
  ) {
    super(
      "DIMENSION_MISMATCH",
      `Vector dimension mismatch (${context}): expected ${expected}, got ${actual}.`,
      { detail: { expected, actual } },
    );
  }
}

export class RequestAbortedError extends AppError {
  constructor() {
    super("REQUEST_ABORTED", "Request was aborted by the client.", "input");
  }
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}

export function toAppError(input: unknown): AppError {
  if (isAppError(input)) {
    return input;
  }

  const message =
    input instanceof Error
      ? input.message
      : typeof input === "string"
        ? input
        : DEFAULT_UNKNOWN_MESSAGE;

  return new AppError("INTERNAL_ERROR", message || DEFAULT_UNKNOWN_MESSAGE, "internal", {
    cause: input,
  });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
