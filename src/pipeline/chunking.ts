/**
 * Document Chunking
 *
 * Splits extracted paper text into bounded, ordered, non-overlapping
 * segments for the map phase. Output depends only on the text and the bound.
 */

const PARAGRAPH_BREAK = /\n\s*\n/;
const SENTENCE_BREAK = /(?<=[.!?])\s+/;

/**
 * Chunk text at paragraph boundaries, falling back to sentences and then to
 * hard character cuts so every chunk fits within `maxChunkChars`.
 */
export function splitText(text: string, maxChunkChars: number): string[] {
  if (!Number.isInteger(maxChunkChars) || maxChunkChars < 1) {
    throw new RangeError(`maxChunkChars must be a positive integer, got ${maxChunkChars}`);
  }

  const normalized = text.replace(/\r\n?/g, '\n').trim();
  if (!normalized) return [];

  const paragraphs = normalized
    .split(PARAGRAPH_BREAK)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0)
    .flatMap((paragraph) =>
      paragraph.length <= maxChunkChars ? [paragraph] : splitParagraph(paragraph, maxChunkChars)
    );

  return pack(paragraphs, '\n\n', maxChunkChars);
}

function splitParagraph(paragraph: string, maxChunkChars: number): string[] {
  const sentences = paragraph
    .split(SENTENCE_BREAK)
    .filter((sentence) => sentence.length > 0)
    .flatMap((sentence) =>
      sentence.length <= maxChunkChars ? [sentence] : hardCut(sentence, maxChunkChars)
    );

  return pack(sentences, ' ', maxChunkChars);
}

function hardCut(text: string, size: number): string[] {
  const pieces: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    pieces.push(text.slice(i, i + size));
  }
  return pieces;
}

/**
 * Greedily join pieces with `separator` while the result fits.
 * Every piece is already within the bound.
 */
function pack(pieces: string[], separator: string, maxChunkChars: number): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const piece of pieces) {
    const candidate = current ? current + separator + piece : piece;
    if (candidate.length <= maxChunkChars) {
      current = candidate;
    } else {
      if (current) chunks.push(current);
      current = piece;
    }
  }

  if (current) chunks.push(current);
  return chunks;
}
