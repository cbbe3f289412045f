/**
 * Retrieval types: document chunks, vector store and similarity matches.
 */

export interface ChunkMetadata {
  filename: string;
  [key: string]: unknown;
}

export interface DocumentChunk {
  content: string;
  metadata: ChunkMetadata;
  embedding: number[];
}

export interface ChunkMatch {
  content: string;
  metadata: Record<string, unknown>;
  /** Cosine similarity in [-1, 1]. */
  similarity: number;
}

export interface IVectorStore {
  insert(chunk: DocumentChunk): Promise<void>;
  /** Matches with similarity above `threshold`, best first, at most `count`. */
  match(embedding: number[], threshold: number, count: number): Promise<ChunkMatch[]>;
}

export interface IngestResult {
  filename: string;
  chunks_processed: number;
  message: string;
}
