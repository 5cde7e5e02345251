import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../utils/logger';
import { NotFoundError } from '../types/api';
import { TextChunker } from './chunker';
import type { LoadedDocuments } from '../types';

const SUPPORTED_EXTENSIONS = new Set(['.txt', '.md']);

export class DocumentLoader {
  constructor(private readonly chunker: TextChunker) {}

  /**
   * Read every text file under `dirPath` and split it into chunks. Sources are
   * paths relative to `dirPath` with forward slashes.
   */
  async loadDirectory(dirPath: string): Promise<LoadedDocuments> {
    if (!fs.existsSync(dirPath) || !fs.statSync(dirPath).isDirectory()) {
      throw new NotFoundError(`Documents directory '${dirPath}'`);
    }

    const files = (await this.findFiles(dirPath))
      .map(file => path.relative(dirPath, file).split(path.sep).join('/'))
      .sort();

    const texts: string[] = [];
    const sources: string[] = [];

    for (const relativePath of files) {
      const content = await fs.promises.readFile(path.join(dirPath, relativePath), 'utf-8');
      const chunks = this.chunker.chunkText(content);
      if (chunks.length === 0) {
        logger.warn(`Skipping empty document: ${relativePath}`);
        continue;
      }
      texts.push(...chunks);
      sources.push(...chunks.map(() => relativePath));
    }

    logger.info(`Loaded ${files.length} documents as ${texts.length} chunks from ${dirPath}`);
    return { texts, sources, files };
  }

  private async findFiles(dirPath: string): Promise<string[]> {
    const files: string[] = [];
    const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.findFiles(fullPath)));
      } else if (entry.isFile() && SUPPORTED_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) {
        files.push(fullPath);
      }
    }
    return files;
  }
}
