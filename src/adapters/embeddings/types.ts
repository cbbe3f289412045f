/**
 * Embedding adapter types.
 */

/** Text -> fixed-length vectors, one per input, in input order. */
export interface IEmbedder {
  readonly dimensions: number;
  embed(texts: string[]): Promise<number[][]>;
}
