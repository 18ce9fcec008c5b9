export interface ChunkOptions {
  chunkSize: number;
  minChunkSize: number;
}

const PARAGRAPH_BREAK = /\n\s*\n/;
const SENTENCE_BREAK = /(?<=[.!?])\s+/;

/** Length in code points, so astral characters count once. */
function charLength(s: string): number {
  return [...s].length;
}

/**
 * Splits text into chunks of at most `chunkSize` code points along paragraph
 * boundaries, falling back to sentence boundaries for oversized paragraphs.
 * A single sentence longer than `chunkSize` is kept whole. Chunks shorter
 * than `minChunkSize` are dropped.
 */
export function chunkText(text: string, options: ChunkOptions): string[] {
  const { chunkSize, minChunkSize } = options;
  const chunks: string[] = [];
  let current = '';

  const append = (piece: string, separator: string): void => {
    if (charLength(current) + charLength(piece) + 2 <= chunkSize) {
      current = `${current}${separator}${piece}`.trim();
    } else {
      if (current) chunks.push(current);
      current = piece;
    }
  };

  for (const raw of text.split(PARAGRAPH_BREAK)) {
    const paragraph = raw.trim();
    if (!paragraph) continue;

    if (charLength(paragraph) > chunkSize) {
      for (const sentence of paragraph.split(SENTENCE_BREAK)) {
        append(sentence, ' ');
      }
    } else {
      append(paragraph, '\n\n');
    }
  }

  if (current) chunks.push(current);

  return chunks.filter((c) => charLength(c) >= minChunkSize);
}
