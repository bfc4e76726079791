/**
 * Keyword retrieval over page text.
 *
 * Long referral packages do not fit in one prompt. The text context sent to
 * the model is the head of the document followed by the chunks that best
 * match each field's label and description.
 */

import type { FieldDescriptor, PageContent } from "@shared/schema";

export interface TextChunk {
  id: number;
  text: string;
  pageNumber: number;
  start: number;
  end: number;
}

interface IndexedChunk extends TextChunk {
  words: Set<string>;
}

/**
 * Splits text into overlapping chunks of about `chunkSize` characters,
 * breaking at a paragraph or sentence boundary when one falls in the second
 * half of the window.
 */
export function chunkText(
  text: string,
  chunkSize: number,
  chunkOverlap: number,
  pageNumber = 0
): TextChunk[] {
  const chunks: TextChunk[] = [];
  if (!text) return chunks;

  const overlap = Math.min(chunkOverlap, Math.floor(chunkSize / 2));
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);

    if (end < text.length) {
      const half = start + Math.floor(chunkSize / 2);
      const paragraphBreak = text.lastIndexOf("\n\n", end);
      if (paragraphBreak > half) {
        end = paragraphBreak + 2;
      } else {
        const sentenceBreak = Math.max(
          text.lastIndexOf(". ", end),
          text.lastIndexOf("! ", end),
          text.lastIndexOf("? ", end)
        );
        if (sentenceBreak > half) {
          end = sentenceBreak + 2;
        }
      }
    }

    const piece = text.slice(start, end).trim();
    if (piece) {
      chunks.push({ id: chunks.length, text: piece, pageNumber, start, end });
    }

    if (end >= text.length) break;
    start = end - overlap;
  }

  return chunks;
}

export function chunkPages(pages: PageContent[], chunkSize: number, chunkOverlap: number): TextChunk[] {
  return pages
    .flatMap(page => chunkText(page.text, chunkSize, chunkOverlap, page.pageNumber))
    .map((chunk, id) => ({ ...chunk, id }));
}

function words(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/[^a-z0-9]+/).filter(w => w.length > 1));
}

export class ChunkRetriever {
  private readonly chunks: IndexedChunk[];

  constructor(chunks: TextChunk[]) {
    this.chunks = chunks.map(chunk => ({ ...chunk, words: words(chunk.text) }));
  }

  /**
   * Top `topK` chunks by share of query words present. Ties keep document order.
   */
  retrieve(query: string, topK: number): TextChunk[] {
    const queryWords = words(query);
    if (queryWords.size === 0) return [];

    const scored: Array<{ score: number; chunk: IndexedChunk }> = [];
    for (const chunk of this.chunks) {
      let overlap = 0;
      for (const w of queryWords) {
        if (chunk.words.has(w)) overlap++;
      }
      if (overlap > 0) {
        scored.push({ score: overlap / queryWords.size, chunk });
      }
    }

    return scored
      .sort((a, b) => b.score - a.score || a.chunk.id - b.chunk.id)
      .slice(0, topK)
      .map(({ chunk: { words: _words, ...chunk } }) => chunk);
  }

  retrieveForFields(fields: readonly FieldDescriptor[], topK: number): Map<string, TextChunk[]> {
    const result = new Map<string, TextChunk[]>();
    for (const field of fields) {
      const query = `${field.name.replace(/_/g, " ")} ${field.label} ${field.description}`;
      result.set(field.name, this.retrieve(query, topK));
    }
    return result;
  }
}

/**
 * Document head plus relevant chunks, deduplicated, capped at `maxChars`.
 */
export function buildTextContext(
  pages: PageContent[],
  fields: readonly FieldDescriptor[],
  options: { maxChars: number; chunkSize: number; chunkOverlap: number; headChars?: number }
): string {
  const fullText = pages.map(p => p.text).filter(t => t.trim().length > 0).join("\n\n");
  if (fullText.length <= options.maxChars) return fullText;

  const headChars = options.headChars ?? Math.floor(options.maxChars / 2);
  const parts = [fullText.slice(0, headChars)];
  let size = parts[0].length;

  const retriever = new ChunkRetriever(chunkPages(pages, options.chunkSize, options.chunkOverlap));
  const seen = new Set<number>();

  for (const chunks of retriever.retrieveForFields(fields, 3).values()) {
    for (const chunk of chunks) {
      if (seen.has(chunk.id)) continue;
      seen.add(chunk.id);
      if (size + chunk.text.length > options.maxChars) continue;
      parts.push(`[page ${chunk.pageNumber}] ${chunk.text}`);
      size += chunk.text.length;
    }
  }

  return parts.join("\n\n---\n\n");
}
