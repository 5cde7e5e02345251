import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PersistentVectorIndex } from './vector-db';
import { DimensionMismatchError, IndexNotLoadedError, LengthMismatchError } from '../types/api';
import { makeTempDir } from '../test-utils/fakes';
import type { DistanceMetric } from '../types';

describe('PersistentVectorIndex', () => {
  let dir: string;

  const open = (metric: DistanceMetric = 'l2') =>
    new PersistentVectorIndex({
      vectorsPath: path.join(dir, 'index.vec'),
      metadataPath: path.join(dir, 'metadata.json'),
      metric
    });

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('starts without an index', () => {
    expect(open().stats()).toEqual({ recordCount: 0, dimension: null, isLoaded: false });
  });

  it('returns an empty result for an empty index', () => {
    const index = open();
    expect(index.search([1, 0], 3)).toEqual([]);
    index.create(2);
    expect(index.search([1, 0], 3)).toEqual([]);
  });

  it('rejects add before create', () => {
    expect(() => open().add(['a'], [[1]], ['a.txt'])).toThrow(IndexNotLoadedError);
  });

  it('rejects a non-positive dimension', () => {
    expect(() => open().create(0)).toThrow(RangeError);
  });

  it('finds an added vector first when searching with it', () => {
    const index = open();
    index.create(3);
    index.add(
      ['alpha', 'beta', 'gamma'],
      [[1, 0, 0], [0, 1, 0], [0, 0, 1]],
      ['a.txt', 'b.txt', 'c.txt']
    );

    const hits = index.search([0, 1, 0], 1);
    expect(hits).toHaveLength(1);
    expect(hits[0]).toEqual({ position: 1, text: 'beta', source: 'b.txt', distance: 0 });
  });

  it('returns every record best-first when k exceeds the count', () => {
    const index = open();
    index.create(1);
    index.add(['far', 'near', 'middle'], [[10], [1], [4]], ['f', 'n', 'm']);

    const hits = index.search([0], 10);
    expect(hits.map(hit => hit.text)).toEqual(['near', 'middle', 'far']);
    expect(hits.map(hit => hit.distance)).toEqual([1, 16, 100]);
  });

  it('breaks ties by insertion order', () => {
    const index = open();
    index.create(2);
    index.add(['first', 'second', 'third'], [[1, 0], [0, 1], [1, 0]], ['1', '2', '3']);

    expect(index.search([1, 0], 3).map(hit => hit.text)).toEqual(['first', 'third', 'second']);
  });

  it('appends batches after existing records', () => {
    const index = open();
    index.create(1);
    index.add(['a'], [[1]], ['a']);
    index.add(['b', 'c'], [[2], [3]], ['b', 'c']);

    expect(index.stats().recordCount).toBe(3);
    expect(index.search([2], 1)[0].position).toBe(1);
  });

  it('fails with LengthMismatch and leaves the index unchanged', () => {
    const index = open();
    index.create(2);
    index.add(['kept'], [[1, 1]], ['kept.txt']);
    const before = index.stats().recordCount;

    expect(() => index.add(['a', 'b'], [[1, 0], [0, 1], [1, 1]], ['a', 'b'])).toThrow(LengthMismatchError);
    expect(index.stats().recordCount).toBe(before);
  });

  it('fails with DimensionMismatch without appending any record of the batch', () => {
    const index = open();
    index.create(2);

    expect(() => index.add(['ok', 'bad'], [[1, 0], [1, 0, 0]], ['ok', 'bad'])).toThrow(DimensionMismatchError);
    expect(index.stats().recordCount).toBe(0);
  });

  it('rejects a query vector of the wrong dimension', () => {
    const index = open();
    index.create(2);
    index.add(['a'], [[1, 0]], ['a']);

    expect(() => index.search([1, 0, 0], 1)).toThrow(DimensionMismatchError);
  });

  it('create replaces the in-memory index', () => {
    const index = open();
    index.create(2);
    index.add(['a'], [[1, 0]], ['a']);
    index.create(4);

    expect(index.stats()).toEqual({ recordCount: 0, dimension: 4, isLoaded: true });
  });

  it('ranks by cosine distance when configured', () => {
    const index = open('cosine');
    index.create(2);
    index.add(['long', 'diagonal'], [[10, 0], [1, 1]], ['l', 'd']);

    const hits = index.search([1, 0], 2);
    expect(hits.map(hit => hit.text)).toEqual(['long', 'diagonal']);
    expect(hits[0].distance).toBe(0);
  });

  describe('persistence', () => {
    it('reports not loaded when nothing was saved', async () => {
      expect(await open().load()).toBe(false);
    });

    it('restores stats and search results after save', async () => {
      const original = open();
      original.create(3);
      original.add(
        ['one', 'two', 'three'],
        [[0.1, 0.2, 0.3], [0.3, 0.2, 0.1], [0.5, 0.5, 0.5]],
        ['1.md', '2.md', '3.md']
      );
      await original.save();

      const restored = open();
      expect(await restored.load()).toBe(true);
      expect(restored.stats()).toEqual(original.stats());

      const query = [0.2, 0.2, 0.25];
      expect(restored.search(query, 3)).toEqual(original.search(query, 3));
    });

    it('leaves no temporary files behind', async () => {
      const index = open();
      index.create(1);
      index.add(['a'], [[1]], ['a']);
      await index.save();

      expect(fs.readdirSync(dir).sort()).toEqual(['index.vec', 'metadata.json']);
    });

    it('treats a missing sidecar as no index', async () => {
      const index = open();
      index.create(1);
      index.add(['a'], [[1]], ['a']);
      await index.save();
      fs.rmSync(path.join(dir, 'metadata.json'));

      expect(await open().load()).toBe(false);
    });

    it('refuses a vector file and sidecar from different saves', async () => {
      const first = open();
      first.create(1);
      first.add(['a'], [[1]], ['a']);
      await first.save();
      const oldSidecar = fs.readFileSync(path.join(dir, 'metadata.json'));

      const second = open();
      second.create(1);
      second.add(['b'], [[2]], ['b']);
      await second.save();
      fs.writeFileSync(path.join(dir, 'metadata.json'), oldSidecar);

      const reader = open();
      expect(await reader.load()).toBe(false);
      expect(reader.stats().isLoaded).toBe(false);
    });

    it('refuses a truncated vector file', async () => {
      const index = open();
      index.create(2);
      index.add(['a', 'b'], [[1, 2], [3, 4]], ['a', 'b']);
      await index.save();
      const vectorsPath = path.join(dir, 'index.vec');
      const bytes = fs.readFileSync(vectorsPath);
      fs.writeFileSync(vectorsPath, bytes.subarray(0, bytes.length - 4));

      expect(await open().load()).toBe(false);
    });

    it('refuses a corrupted sidecar', async () => {
      const index = open();
      index.create(1);
      index.add(['a'], [[1]], ['a']);
      await index.save();
      fs.writeFileSync(path.join(dir, 'metadata.json'), '{not json');

      expect(await open().load()).toBe(false);
    });
  });
});
