import { DistanceMetric } from "../domain/types.js";

export function dotProduct(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dotProduct(a, b) / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function euclideanDistance(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/**
 * Similarity score where higher means closer, matching the scores the
 * pgvector store reports for the same metric.
 */
export function similarityScore(metric: DistanceMetric, a: number[], b: number[]): number {
  switch (metric) {
    case "cosine":
      return cosineSimilarity(a, b);
    case "dot":
      return dotProduct(a, b);
    case "euclidean":
      return -euclideanDistance(a, b);
  }
}

export function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}
