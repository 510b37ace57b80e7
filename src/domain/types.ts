export type DocumentFileType = "pdf" | "docx";

export type DistanceMetric = "cosine" | "euclidean" | "dot";

export interface DocumentSection {
  /** 1-based page number for PDFs, null when the format has no pages. */
  page: number | null;
  text: string;
}

export interface LoadedDocument {
  path: string;
  fileType: DocumentFileType;
  sections: DocumentSection[];
}

export interface ChunkMetadata {
  source: string;
  page: number | null;
  fileType: DocumentFileType;
  chunkId: number;
  chunkSize: number;
  startOffset: number;
  sourceLabel: string | null;
  indexedAt: string;
}

export interface EmbeddingRecord {
  id: string;
  vector: number[];
  content: string;
  metadata: ChunkMetadata;
}

export interface CollectionConfig {
  dimension: number;
  distance: DistanceMetric;
}

export interface CollectionStatus {
  name: string;
  exists: boolean;
  vectorCount: number;
  config: CollectionConfig | null;
}

export interface SearchHit {
  id: string;
  score: number;
  content: string;
  metadata: ChunkMetadata;
}

export interface ConversationMessage {
  role: "user" | "assistant";
  content: string;
}

export interface QueryTurn {
  question: string;
  hits: SearchHit[];
  answer: string;
  followUpQuestions: string[];
}
