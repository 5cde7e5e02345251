import { logger } from '../utils/logger';

export class TextChunker {
  constructor(
    private readonly chunkSize: number,
    private readonly overlap: number
  ) {
    if (chunkSize <= 0) {
      throw new RangeError('Chunk size must be positive');
    }
    if (overlap < 0 || overlap >= chunkSize) {
      throw new RangeError('Overlap size must be less than chunk size');
    }
  }

  /**
   * Split text into overlapping chunks along sentence boundaries
   */
  chunkText(text: string): string[] {
    const chunks: string[] = [];
    const sentences = this.splitIntoSentences(text);

    let currentChunk = '';

    for (const sentence of sentences) {
      // If adding this sentence would exceed chunk size
      if (currentChunk.length + sentence.length > this.chunkSize && currentChunk.trim()) {
        chunks.push(currentChunk.trim());
        // Start new chunk with overlap from previous chunk
        currentChunk = this.getOverlapText(currentChunk);
      }

      currentChunk += sentence;
    }

    // Add remaining chunk
    if (currentChunk.trim()) {
      chunks.push(currentChunk.trim());
    }

    logger.debug(`Text chunked: ${chunks.length} chunks from ${text.length} characters`);
    return chunks;
  }

  private splitIntoSentences(text: string): string[] {
    // Split on sentence endings, but keep the punctuation
    return text
      .split(/(?<=[.!?])\s+/)
      .filter(sentence => sentence.trim().length > 0)
      .map(sentence => sentence.trim() + ' ');
  }

  /**
   * Tail of a chunk carried into the next one, starting at a word boundary when one is near
   */
  private getOverlapText(chunk: string): string {
    if (this.overlap === 0) {
      return '';
    }
    if (chunk.length <= this.overlap) {
      return chunk;
    }

    const start = chunk.length - this.overlap;
    const space = chunk.indexOf(' ', start);
    if (space !== -1 && space - start < 50) {
      return chunk.slice(space + 1);
    }
    return chunk.slice(start);
  }
}
