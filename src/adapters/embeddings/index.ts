/**
 * Embedding adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { IEmbedder } from "./types";
import { OpenAIEmbedder } from "./openai";
import { StubEmbedder } from "./stub";

export type { IEmbedder } from "./types";
export { OpenAIEmbedder } from "./openai";
export { StubEmbedder } from "./stub";

export function createEmbedder(config: AppConfig): IEmbedder {
  const { provider, openaiApiKey, embeddingModel, embeddingDimensions } = config.retrieval;
  if (provider === "openai" && openaiApiKey) {
    return new OpenAIEmbedder({
      apiKey: openaiApiKey,
      model: embeddingModel,
      dimensions: embeddingDimensions,
    });
  }
  return new StubEmbedder(embeddingDimensions);
}
