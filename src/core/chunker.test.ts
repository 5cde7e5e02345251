import { describe, expect, it } from 'vitest';
import { TextChunker } from './chunker';

describe('TextChunker', () => {
  it('keeps short text in one chunk', () => {
    expect(new TextChunker(1000, 200).chunkText('First sentence.  Second one!')).toEqual([
      'First sentence. Second one!'
    ]);
  });

  it('splits on sentence boundaries and carries an overlap', () => {
    const chunker = new TextChunker(40, 10);

    expect(chunker.chunkText('One two three. Four five six. Seven eight nine. Ten.')).toEqual([
      'One two three. Four five six.',
      'six. Seven eight nine. Ten.'
    ]);
  });

  it('returns nothing for blank text', () => {
    expect(new TextChunker(100, 10).chunkText('   \n ')).toEqual([]);
  });

  it('rejects an overlap as large as the chunk', () => {
    expect(() => new TextChunker(100, 100)).toThrow(RangeError);
  });
});
