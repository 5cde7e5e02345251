#!/usr/bin/env node

import 'dotenv/config';
import { Config } from './config';
import { logger } from './utils/logger';
import { EmbeddingCache } from './utils/cache';
import { YandexEmbeddingService } from './core/embeddings';
import { YandexCompletionService } from './core/completion';
import { RAGPipeline } from './core/rag-pipeline';
import { TextChunker } from './core/chunker';
import { DocumentLoader } from './core/document-loader';
import { RAGServer } from './server';

async function main() {
  try {
    const config = Config.fromEnv();
    config.validate();

    logger.info('Starting RAG question answering service');
    logger.info(`Chat model: ${config.yandex.chatModel}, embedding model: ${config.yandex.embedModel}`);

    const cache = new EmbeddingCache(config.rag.embeddingCacheTtl);
    const embedder = new YandexEmbeddingService(config.yandex, cache);
    const llm = new YandexCompletionService(config.yandex);
    const pipeline = new RAGPipeline({ config, embedder, llm });
    const loader = new DocumentLoader(new TextChunker(config.rag.chunkSize, config.rag.chunkOverlap));

    await pipeline.initialize();
    if (!(await embedder.testConnection())) {
      logger.warn('Embedding service is not reachable; queries will fail until it is');
    }

    const server = new RAGServer(config, pipeline, loader);
    await server.start();

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully...`);
      cache.close();
      server.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Shutdown failed', error);
          process.exit(1);
        }
      );
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

  } catch (error) {
    logger.error('Failed to start RAG service', error);
    process.exit(1);
  }
}

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection', reason);
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error('Main function failed', error);
  process.exit(1);
});
