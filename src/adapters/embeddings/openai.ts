/**
 * OpenAI embeddings adapter.
 * text-embedding-3-* models are asked for `dimensions` so vectors fit the documents table.
 */

import OpenAI from "openai";
import type { IEmbedder } from "./types";

export interface OpenAIEmbedderConfig {
  apiKey: string;
  model: string;
  dimensions: number;
  baseURL?: string;
}

export class OpenAIEmbedder implements IEmbedder {
  private client: OpenAI;

  constructor(private readonly cfg: OpenAIEmbedderConfig) {
    this.client = new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseURL });
  }

  get dimensions(): number {
    return this.cfg.dimensions;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const request: { model: string; input: string[]; dimensions?: number } = {
      model: this.cfg.model,
      input: texts,
    };
    if (this.cfg.model.startsWith("text-embedding-3-")) {
      request.dimensions = this.cfg.dimensions;
    }
    const response = await this.client.embeddings.create(request);
    return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }
}
