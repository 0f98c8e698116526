export type EmbeddingVector = number[];

export interface Document {
  id: string;
  sourceName: string;
  rawText: string;
}

export interface Chunk {
  documentId: string;
  sourceName: string;
  sequenceIndex: number;
  text: string;
  /** Inclusive offset into the document's raw text. */
  charStart: number;
  /** Exclusive offset into the document's raw text. */
  charEnd: number;
}

export interface Question {
  text: string;
  expectedAnswer: string;
}

export interface RetrievalMatch {
  chunkText: string;
  sourceName: string;
  /** Ordering score; raw cosine for the local backend, normalised for the remote one. */
  score: number;
  /** 1-based. */
  rank: number;
}
