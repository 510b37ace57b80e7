import { z } from "zod";

export const chunkMetadataSchema = z.object({
  source: z.string(),
  page: z.number().int().nullable(),
  fileType: z.enum(["pdf", "docx"]),
  chunkId: z.number().int().nonnegative(),
  chunkSize: z.number().int().nonnegative(),
  startOffset: z.number().int().nonnegative(),
  sourceLabel: z.string().nullable(),
  indexedAt: z.string(),
});

export const collectionConfigSchema = z.object({
  dimension: z.number().int().positive(),
  distance: z.enum(["cosine", "euclidean", "dot"]),
});
