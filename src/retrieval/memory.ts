/**
 * In-process vector store: brute-force cosine similarity over every stored chunk.
 */

import type { ChunkMatch, DocumentChunk, IVectorStore } from "./types";

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class InMemoryVectorStore implements IVectorStore {
  private readonly chunks: DocumentChunk[] = [];

  async insert(chunk: DocumentChunk): Promise<void> {
    this.chunks.push({ ...chunk, metadata: { ...chunk.metadata }, embedding: [...chunk.embedding] });
  }

  async match(embedding: number[], threshold: number, count: number): Promise<ChunkMatch[]> {
    return this.chunks
      .map((c) => ({ content: c.content, metadata: { ...c.metadata }, similarity: cosineSimilarity(embedding, c.embedding) }))
      .filter((m) => m.similarity > threshold)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, count);
  }

  get size(): number {
    return this.chunks.length;
  }
}
