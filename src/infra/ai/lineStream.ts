import { RequestAbortedError } from "../../domain/errors.js";

/**
 * Reads a streamed response body line by line (NDJSON or SSE framing) and
 * hands every non-empty line to `onLine`, including a trailing line without
 * a newline.
 */
export async function readLines(
  body: ReadableStream<Uint8Array>,
  onLine: (line: string) => void,
  signal?: AbortSignal,
): Promise<void> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";

  try {
    while (true) {
      if (signal?.aborted) {
        throw new RequestAbortedError();
      }
      const { value, done } = await reader.read();
      if (done) {
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        const trimmed = line.trim();
        if (trimmed) {
          onLine(trimmed);
        }
      }
    }

    buffer += decoder.decode();
    const finalLine = buffer.trim();
    if (finalLine) {
      onLine(finalLine);
    }
  } catch (error) {
    await reader.cancel().catch(() => undefined);
    if (signal?.aborted || isAbortError(error)) {
      throw new RequestAbortedError();
    }
    throw error;
  } finally {
    reader.releaseLock();
  }
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof RequestAbortedError ||
    (error instanceof Error && error.name === "AbortError")
  );
}
