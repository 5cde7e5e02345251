import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DocumentLoader } from './document-loader';
import { TextChunker } from './chunker';
import { NotFoundError } from '../types/api';
import { makeTempDir } from '../test-utils/fakes';

describe('DocumentLoader', () => {
  let dir: string;
  const loader = new DocumentLoader(new TextChunker(1000, 200));

  beforeEach(() => {
    dir = makeTempDir();
    fs.mkdirSync(path.join(dir, 'sub'));
    fs.writeFileSync(path.join(dir, 'a.txt'), 'Alpha text.');
    fs.writeFileSync(path.join(dir, 'sub', 'b.md'), 'Beta one. Beta two.');
    fs.writeFileSync(path.join(dir, 'empty.txt'), '  \n');
    fs.writeFileSync(path.join(dir, 'notes.json'), '{"ignored": true}');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads text files recursively with relative sources', async () => {
    expect(await loader.loadDirectory(dir)).toEqual({
      texts: ['Alpha text.', 'Beta one. Beta two.'],
      sources: ['a.txt', 'sub/b.md'],
      files: ['a.txt', 'empty.txt', 'sub/b.md']
    });
  });

  it('gives every chunk of a file the same source', async () => {
    const small = new DocumentLoader(new TextChunker(12, 2));
    fs.writeFileSync(path.join(dir, 'a.txt'), 'First part. Second part.');

    const loaded = await small.loadDirectory(dir);

    expect(loaded.texts.slice(0, 2)).toEqual(['First part.', 'Second part.']);
    expect(loaded.sources.slice(0, 2)).toEqual(['a.txt', 'a.txt']);
  });

  it('fails for a missing directory', async () => {
    await expect(loader.loadDirectory(path.join(dir, 'missing'))).rejects.toBeInstanceOf(NotFoundError);
  });
});
