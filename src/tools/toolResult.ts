import { toAppError } from "../domain/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("mcp");

export function jsonResult(value: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

/** Failures come back as tool errors so the calling model can read the reason. */
export async function runTool<T>(name: string, work: () => Promise<T>) {
  try {
    return jsonResult(await work());
  } catch (error) {
    const appError = toAppError(error);
    logger.error(`Tool ${name} failed`, appError);
    return { ...jsonResult({ error: appError.toPayload() }), isError: true };
  }
}
