/**
 * Knowledge base: ingest documents (chunk -> embed -> store) and look up passages by vector similarity.
 * Not part of the per-turn flow unless the router is given query() as its context provider.
 */

import type { IEmbedder } from "../adapters/embeddings";
import type { ChunkMatch, IngestResult, IVectorStore } from "./types";
import { chunkText, DEFAULT_CHUNK_SIZE } from "./chunker";
import { EmptyDocumentError, describeError } from "../errors";
import { logger } from "../logging";

export const INGEST_MESSAGE = "Document successfully ingested into Knowledge Base.";
export const CONTEXT_SEPARATOR = "\n---\n";

export interface KnowledgeBaseOptions {
  matchThreshold?: number;
  matchCount?: number;
  chunkSize?: number;
}

export class KnowledgeBase {
  private readonly matchThreshold: number;
  private readonly matchCount: number;
  private readonly chunkSize: number;

  constructor(
    private readonly embedder: IEmbedder,
    private readonly vectors: IVectorStore,
    opts: KnowledgeBaseOptions = {}
  ) {
    this.matchThreshold = opts.matchThreshold ?? 0.1;
    this.matchCount = opts.matchCount ?? 3;
    this.chunkSize = opts.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  /**
   * Chunk, embed and store a text document. A chunk that fails to store is skipped and not counted.
   * Throws EmptyDocumentError for blank content; embedding failures propagate.
   */
  async ingest(filename: string, content: string): Promise<IngestResult> {
    if (!content.trim()) throw new EmptyDocumentError(filename);

    const chunks = chunkText(content, this.chunkSize);
    const embeddings = await this.embedder.embed(chunks);
    let stored = 0;
    for (let i = 0; i < chunks.length; i++) {
      try {
        await this.vectors.insert({ content: chunks[i], metadata: { filename }, embedding: embeddings[i] });
        stored++;
      } catch (err) {
        logger.warn({ event: "CHUNK_STORE_FAILED", filename, chunk: i, err: describeError(err) }, "Failed to store chunk");
      }
    }
    logger.info({ event: "DOCUMENT_INGESTED", filename, contentLength: content.length, chunks: chunks.length, stored }, "Document ingested");
    return { filename, chunks_processed: stored, message: INGEST_MESSAGE };
  }

  /** Best matches for the query; rejects when embedding or search fails. */
  async search(query: string): Promise<ChunkMatch[]> {
    const [embedding] = await this.embedder.embed([query]);
    if (!embedding) return [];
    return this.vectors.match(embedding, this.matchThreshold, this.matchCount);
  }

  /** Matches joined as context text; "" when nothing matched or the lookup failed. */
  async query(query: string): Promise<string> {
    try {
      const matches = await this.search(query);
      return renderContext(matches);
    } catch (err) {
      logger.warn({ event: "VECTOR_SEARCH_FAILED", err: describeError(err) }, "Vector search failed");
      return "";
    }
  }
}

export function renderContext(matches: ChunkMatch[]): string {
  return matches.map((m) => `${m.content}${CONTEXT_SEPARATOR}`).join("");
}
