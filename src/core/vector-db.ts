import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { DimensionMismatchError, IndexNotLoadedError, LengthMismatchError, errorMessage } from '../types/api';
import type { IndexConfig, IndexStats, SearchHit } from '../types';

// Binary vector file layout (little-endian):
//   magic "RVEC" | version u32 | dimension u32 | count u32 | index id (36 ascii bytes) | count * dimension f32
const MAGIC = 'RVEC';
const FORMAT_VERSION = 1;
const ID_BYTES = 36;
const HEADER_BYTES = 4 + 4 + 4 + 4 + ID_BYTES;

interface StoredRecord {
  text: string;
  source: string;
  vector: Float32Array;
}

// Swapped as a whole on every mutation, so a search holds a consistent view
interface IndexSnapshot {
  readonly id: string;
  readonly dimension: number;
  readonly records: readonly StoredRecord[];
}

const metadataSchema = z.object({
  version: z.literal(FORMAT_VERSION),
  indexId: z.string().length(ID_BYTES),
  dimension: z.number().int().positive(),
  count: z.number().int().nonnegative(),
  metric: z.enum(['l2', 'cosine']),
  createdAt: z.string(),
  records: z.array(z.object({ text: z.string(), source: z.string() }))
});

type IndexMetadata = z.infer<typeof metadataSchema>;

export class PersistentVectorIndex {
  private snapshot: IndexSnapshot | null = null;

  constructor(private readonly options: IndexConfig) {}

  /**
   * Replace the in-memory index with an empty one. Files on disk are untouched until save().
   */
  create(dimension: number): void {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new RangeError(`Index dimension must be a positive integer, got ${dimension}`);
    }
    this.snapshot = { id: uuidv4(), dimension, records: [] };
    logger.info(`Created empty vector index (dimension ${dimension}, metric ${this.options.metric})`);
  }

  /**
   * Append records in order. Either every record is appended or none is.
   */
  add(texts: string[], vectors: number[][], sources: string[]): void {
    const current = this.requireSnapshot();

    if (texts.length !== vectors.length || texts.length !== sources.length) {
      throw new LengthMismatchError({ texts: texts.length, vectors: vectors.length, sources: sources.length });
    }
    for (const vector of vectors) {
      if (vector.length !== current.dimension) {
        throw new DimensionMismatchError(current.dimension, vector.length);
      }
    }

    const appended = texts.map((text, i) => ({
      text,
      source: sources[i],
      vector: Float32Array.from(vectors[i])
    }));
    this.snapshot = { ...current, records: [...current.records, ...appended] };
    logger.debug(`Added ${appended.length} records, index now holds ${this.snapshot.records.length}`);
  }

  /**
   * Exact nearest-neighbour search. Results are best first; equal distances
   * keep insertion order.
   */
  search(queryVector: number[], k: number): SearchHit[] {
    const current = this.snapshot;
    if (!current || current.records.length === 0 || k <= 0) {
      return [];
    }
    if (queryVector.length !== current.dimension) {
      throw new DimensionMismatchError(current.dimension, queryVector.length);
    }

    const startTime = Date.now();
    const query = Float32Array.from(queryVector);
    const scored = current.records.map((record, position) => ({
      position,
      distance: this.distance(query, record.vector)
    }));
    scored.sort((a, b) => a.distance - b.distance || a.position - b.position);

    const hits = scored.slice(0, k).map(({ position, distance }) => ({
      position,
      distance,
      text: current.records[position].text,
      source: current.records[position].source
    }));

    logger.performance('Vector index search', Date.now() - startTime, {
      records: current.records.length,
      results: hits.length
    });
    return hits;
  }

  /**
   * Write both artifacts to temporary files, then rename them into place.
   * Between the two renames a reader can see the new vector file next to the
   * old sidecar; load() detects the mismatched index ids and reports "not loaded".
   */
  async save(): Promise<void> {
    const current = this.requireSnapshot();
    const { vectorsPath, metadataPath } = this.options;

    await fs.promises.mkdir(path.dirname(vectorsPath), { recursive: true });
    await fs.promises.mkdir(path.dirname(metadataPath), { recursive: true });

    const metadata: IndexMetadata = {
      version: FORMAT_VERSION,
      indexId: current.id,
      dimension: current.dimension,
      count: current.records.length,
      metric: this.options.metric,
      createdAt: new Date().toISOString(),
      records: current.records.map(({ text, source }) => ({ text, source }))
    };

    const vectorsTmp = `${vectorsPath}.${current.id}.tmp`;
    const metadataTmp = `${metadataPath}.${current.id}.tmp`;
    try {
      await fs.promises.writeFile(vectorsTmp, encodeVectors(current));
      await fs.promises.writeFile(metadataTmp, JSON.stringify(metadata, null, 2), 'utf-8');
      await fs.promises.rename(vectorsTmp, vectorsPath);
      await fs.promises.rename(metadataTmp, metadataPath);
    } catch (error) {
      await Promise.all([removeIfPresent(vectorsTmp), removeIfPresent(metadataTmp)]);
      throw error;
    }

    logger.info(`Saved vector index ${current.id} (${current.records.length} records)`, {
      vectorsPath,
      metadataPath
    });
  }

  /**
   * Restore a previously saved index. Returns false when either artifact is
   * missing or the pair does not describe the same index.
   */
  async load(): Promise<boolean> {
    const { vectorsPath, metadataPath } = this.options;
    if (!fs.existsSync(vectorsPath) || !fs.existsSync(metadataPath)) {
      logger.info('No saved vector index found');
      return false;
    }

    try {
      const [buffer, rawMetadata] = await Promise.all([
        fs.promises.readFile(vectorsPath),
        fs.promises.readFile(metadataPath, 'utf-8')
      ]);

      const parsed = metadataSchema.safeParse(JSON.parse(rawMetadata));
      if (!parsed.success) {
        logger.warn('Vector index metadata is invalid', { issue: parsed.error.issues[0]?.message });
        return false;
      }
      const metadata = parsed.data;

      const snapshot = decodeVectors(buffer, metadata);
      if (typeof snapshot === 'string') {
        logger.warn(`Vector index files do not match: ${snapshot}`);
        return false;
      }
      if (metadata.metric !== this.options.metric) {
        logger.warn(`Saved index was built for metric ${metadata.metric}, searching with ${this.options.metric}`);
      }

      this.snapshot = snapshot;
      logger.info(`Loaded vector index ${snapshot.id} (${snapshot.records.length} records, dimension ${snapshot.dimension})`);
      return true;
    } catch (error) {
      logger.error('Failed to load vector index', error);
      return false;
    }
  }

  stats(): IndexStats {
    return {
      recordCount: this.snapshot ? this.snapshot.records.length : 0,
      dimension: this.snapshot ? this.snapshot.dimension : null,
      isLoaded: this.snapshot !== null
    };
  }

  private requireSnapshot(): IndexSnapshot {
    if (!this.snapshot) {
      throw new IndexNotLoadedError('Vector index has not been created or loaded');
    }
    return this.snapshot;
  }

  private distance(a: Float32Array, b: Float32Array): number {
    return this.options.metric === 'cosine' ? cosineDistance(a, b) : squaredL2(a, b);
  }
}

function squaredL2(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return sum;
}

function cosineDistance(a: Float32Array, b: Float32Array): number {
  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 1;

  return 1 - dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

function encodeVectors(snapshot: IndexSnapshot): Buffer {
  const count = snapshot.records.length;
  const buffer = Buffer.alloc(HEADER_BYTES + count * snapshot.dimension * 4);

  buffer.write(MAGIC, 0, 'ascii');
  buffer.writeUInt32LE(FORMAT_VERSION, 4);
  buffer.writeUInt32LE(snapshot.dimension, 8);
  buffer.writeUInt32LE(count, 12);
  buffer.write(snapshot.id, 16, ID_BYTES, 'ascii');

  let offset = HEADER_BYTES;
  for (const record of snapshot.records) {
    for (const value of record.vector) {
      buffer.writeFloatLE(value, offset);
      offset += 4;
    }
  }
  return buffer;
}

/**
 * Rebuild a snapshot from the vector file and its sidecar; a string result
 * describes why the two do not belong together.
 */
function decodeVectors(buffer: Buffer, metadata: IndexMetadata): IndexSnapshot | string {
  if (buffer.length < HEADER_BYTES || buffer.toString('ascii', 0, 4) !== MAGIC) {
    return 'vector file header is not recognized';
  }
  const version = buffer.readUInt32LE(4);
  const dimension = buffer.readUInt32LE(8);
  const count = buffer.readUInt32LE(12);
  const id = buffer.toString('ascii', 16, HEADER_BYTES);

  if (version !== FORMAT_VERSION) return `unsupported vector file version ${version}`;
  if (id !== metadata.indexId) return `index id ${id} != sidecar ${metadata.indexId}`;
  if (dimension !== metadata.dimension) return `dimension ${dimension} != sidecar ${metadata.dimension}`;
  if (count !== metadata.count || count !== metadata.records.length) {
    return `record count ${count} != sidecar ${metadata.count}/${metadata.records.length}`;
  }
  if (buffer.length !== HEADER_BYTES + count * dimension * 4) {
    return `vector file is ${buffer.length} bytes, expected ${HEADER_BYTES + count * dimension * 4}`;
  }

  const records: StoredRecord[] = metadata.records.map((entry, i) => {
    const vector = new Float32Array(dimension);
    const start = HEADER_BYTES + i * dimension * 4;
    for (let j = 0; j < dimension; j++) {
      vector[j] = buffer.readFloatLE(start + j * 4);
    }
    return { text: entry.text, source: entry.source, vector };
  });

  return { id, dimension, records };
}

async function removeIfPresent(filePath: string): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (error) {
    logger.warn(`Could not remove temporary file ${filePath}`, { error: errorMessage(error) });
  }
}
