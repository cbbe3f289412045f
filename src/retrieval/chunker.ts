/**
 * Word-based chunking: a chunk closes once its running length (word length + 1 per word) reaches chunkSize.
 */

export const DEFAULT_CHUNK_SIZE = 500;

export function chunkText(text: string, chunkSize = DEFAULT_CHUNK_SIZE): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const chunks: string[] = [];
  let current: string[] = [];
  let length = 0;

  for (const word of words) {
    length += word.length + 1;
    current.push(word);
    if (length >= chunkSize) {
      chunks.push(current.join(" "));
      current = [];
      length = 0;
    }
  }
  if (current.length > 0) chunks.push(current.join(" "));
  return chunks;
}
