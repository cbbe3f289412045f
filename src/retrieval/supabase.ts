/**
 * Supabase vector store: `documents` table (pgvector) and the `match_documents` SQL function.
 * See sql/schema.sql.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { StoreError } from "../errors";
import type { ChunkMatch, DocumentChunk, IVectorStore } from "./types";

export const DOCUMENTS_TABLE = "documents";
export const MATCH_FUNCTION = "match_documents";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Narrow one match_documents row; null when content is missing. */
export function toChunkMatch(row: unknown): ChunkMatch | null {
  if (!isRecord(row) || typeof row.content !== "string") return null;
  return {
    content: row.content,
    metadata: isRecord(row.metadata) ? row.metadata : {},
    similarity: typeof row.similarity === "number" ? row.similarity : 0,
  };
}

export class SupabaseVectorStore implements IVectorStore {
  constructor(private readonly client: SupabaseClient) {}

  async insert(chunk: DocumentChunk): Promise<void> {
    const { error } = await this.client.from(DOCUMENTS_TABLE).insert({
      content: chunk.content,
      metadata: chunk.metadata,
      embedding: chunk.embedding,
    });
    if (error) throw new StoreError("insert_document", error.message, error.code);
  }

  async match(embedding: number[], threshold: number, count: number): Promise<ChunkMatch[]> {
    const { data, error } = await this.client.rpc(MATCH_FUNCTION, {
      query_embedding: embedding,
      match_threshold: threshold,
      match_count: count,
    });
    if (error) throw new StoreError("match_documents", error.message, error.code);
    const rows: unknown[] = Array.isArray(data) ? data : [];
    const matches: ChunkMatch[] = [];
    for (const row of rows) {
      const match = toChunkMatch(row);
      if (match) matches.push(match);
    }
    return matches;
  }
}
