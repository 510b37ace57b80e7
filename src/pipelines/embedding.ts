import {
  DimensionMismatchError,
  EmbeddingProviderError,
  RequestAbortedError,
  describeError,
  isAppError,
} from "../domain/errors.js";
import { EmbeddingClient } from "../infra/ai/types.js";

export interface BatchEmbedderOptions {
  batchSize: number;
  dimension: number;
}

export interface EmbeddedBatch {
  batchNumber: number;
  totalBatches: number;
  /** Offset of the first text of this batch in the input. */
  offset: number;
  vectors: number[][];
}

/**
 * Embeds texts in bounded batches, one provider call per batch, preserving
 * input order. Vectors are checked against the collection dimension.
 */
export class BatchEmbedder {
  constructor(
    private readonly client: EmbeddingClient,
    private readonly options: BatchEmbedderOptions,
  ) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new RangeError(`Embedding batch size must be a positive integer, got ${options.batchSize}.`);
    }
  }

  get dimension(): number {
    return this.options.dimension;
  }

  async embedAll(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for await (const batch of this.embedBatches(texts)) {
      vectors.push(...batch.vectors);
    }
    return vectors;
  }

  async *embedBatches(texts: string[]): AsyncGenerator<EmbeddedBatch> {
    const { batchSize } = this.options;
    const totalBatches = Math.ceil(texts.length / batchSize);

    for (let offset = 0; offset < texts.length; offset += batchSize) {
      const batchNumber = offset / batchSize + 1;
      const batch = texts.slice(offset, offset + batchSize);
      const vectors = await this.embedBatch(batch, batchNumber, totalBatches);
      yield { batchNumber, totalBatches, offset, vectors };
    }
  }

  async embedQuery(query: string): Promise<number[]> {
    let vector: number[];
    try {
      vector = await this.client.embedQuery(query);
    } catch (error) {
      throw wrapProviderError(error, "query");
    }
    this.assertDimension(vector, "query embedding");
    return vector;
  }

  private async embedBatch(
    batch: string[],
    batchNumber: number,
    totalBatches: number,
  ): Promise<number[][]> {
    const label = `batch ${batchNumber}/${totalBatches}`;
    let vectors: number[][];
    try {
      vectors = await this.client.embedTexts(batch);
    } catch (error) {
      throw wrapProviderError(error, label);
    }

    if (vectors.length !== batch.length) {
      throw new EmbeddingProviderError(
        `Embedding provider returned ${vectors.length} vectors for ${batch.length} texts (${label}).`,
        { retryable: false },
      );
    }
    for (const vector of vectors) {
      this.assertDimension(vector, label);
    }
    return vectors;
  }

  private assertDimension(vector: number[], context: string) {
    if (vector.length !== this.options.dimension) {
      throw new DimensionMismatchError(this.options.dimension, vector.length, context);
    }
  }
}

function wrapProviderError(error: unknown, label: string): Error {
  if (error instanceof RequestAbortedError) {
    return error;
  }
  if (isAppError(error) && error.category !== "dependency") {
    return error;
  }
  return new EmbeddingProviderError(`Embedding ${label} failed: ${describeError(error)}`, {
    cause: error,
    retryable: isAppError(error) ? error.retryable : true,
  });
}
