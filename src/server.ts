import express from 'express';
import cors from 'cors';
import * as http from 'http';
import { z } from 'zod';
import { logger } from './utils/logger';
import type { RAGPipeline } from './core/rag-pipeline';
import type { DocumentLoader } from './core/document-loader';
import { RagError, ValidationError } from './types/api';
import type { ApiImageRequest, ApiIndexRequest, ApiQueryRequest, ApiResponse } from './types/api';
import type { AppConfig } from './types';

const queryRequestSchema: z.ZodType<ApiQueryRequest, z.ZodTypeDef, unknown> = z.object({
  question: z.string().trim().min(1, 'Question is required'),
  history: z
    .array(
      z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string()
      })
    )
    .optional(),
  topK: z.number().int().positive().max(100).optional()
});

const indexRequestSchema: z.ZodType<ApiIndexRequest, z.ZodTypeDef, unknown> = z.object({
  documents: z.array(z.string()),
  sources: z.array(z.string())
});

const imageRequestSchema: z.ZodType<ApiImageRequest, z.ZodTypeDef, unknown> = z.object({
  imageUrl: z.string().url(),
  question: z.string().optional()
});

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ValidationError(`${field}${issue ? issue.message : 'Invalid request body'}`);
  }
  return parsed.data;
}

function ok<T>(data: T): ApiResponse<T> {
  return { success: true, data, timestamp: new Date().toISOString() };
}

type AsyncHandler = (req: express.Request, res: express.Response) => Promise<void>;

function route(handler: AsyncHandler): express.RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export class RAGServer {
  private app: express.Application;
  private server: http.Server | null = null;

  constructor(
    private readonly config: Pick<AppConfig, 'server' | 'rag'>,
    private readonly pipeline: RAGPipeline,
    private readonly loader: DocumentLoader
  ) {
    this.app = express();

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  /**
   * Setup middleware
   */
  private setupMiddleware(): void {
    this.app.use(cors({
      origin: this.config.server.corsOrigin,
      credentials: true
    }));

    this.app.use(express.json({ limit: '10mb' }));

    // Request logging
    this.app.use((req, _res, next) => {
      logger.info(`${req.method} ${req.path}`, {
        ip: req.ip,
        userAgent: req.get('User-Agent')
      });
      next();
    });
  }

  /**
   * Setup API routes
   */
  private setupRoutes(): void {
    this.app.get('/health', (_req, res) => {
      res.json({
        status: 'healthy',
        indexLoaded: this.pipeline.isLoaded,
        timestamp: new Date().toISOString()
      });
    });

    this.app.get('/api/stats', (_req, res) => {
      res.json(ok(this.pipeline.stats()));
    });

    this.app.post('/api/query', route(async (req, res) => {
      const { question, history, topK } = parseBody(queryRequestSchema, req.body);
      logger.info(`Query request: "${question}"`, { historyLength: history?.length ?? 0 });

      const result = await this.pipeline.queryWithHistory(question, history ?? [], topK);
      res.json(ok(result));
    }));

    this.app.post('/api/index', route(async (req, res) => {
      const { documents, sources } = parseBody(indexRequestSchema, req.body);
      if (documents.length !== sources.length) {
        throw new ValidationError('documents and sources must have the same length');
      }
      if (documents.length === 0) {
        throw new ValidationError('At least one document is required');
      }

      const indexed = await this.pipeline.indexDocuments(documents, sources);
      res.status(indexed ? 200 : 500).json({
        success: indexed,
        data: { indexed, count: documents.length },
        timestamp: new Date().toISOString()
      });
    }));

    this.app.post('/api/ingest', route(async (_req, res) => {
      const loaded = await this.loader.loadDirectory(this.config.rag.documentsPath);
      if (loaded.texts.length === 0) {
        throw new ValidationError(`No documents found in ${this.config.rag.documentsPath}`);
      }

      const indexed = await this.pipeline.indexDocuments(loaded.texts, loaded.sources);
      res.status(indexed ? 200 : 500).json({
        success: indexed,
        data: { indexed, files: loaded.files.length, chunks: loaded.texts.length },
        timestamp: new Date().toISOString()
      });
    }));

    this.app.post('/api/image', route(async (req, res) => {
      const { imageUrl, question } = parseBody(imageRequestSchema, req.body);
      const result = await this.pipeline.processImage(imageUrl, question);
      res.status(501).json({
        success: false,
        data: result,
        error: result.message,
        timestamp: new Date().toISOString()
      });
    }));
  }

  /**
   * Setup error handling
   */
  private setupErrorHandling(): void {
    // 404 handler
    this.app.use((_req, res) => {
      res.status(404).json({
        success: false,
        error: 'Endpoint not found',
        timestamp: new Date().toISOString()
      });
    });

    // Global error handler
    this.app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
      if (error instanceof RagError) {
        logger.warn(`${req.method} ${req.path} failed: ${error.message}`, { code: error.code });
        res.status(error.statusCode).json({
          success: false,
          error: error.message,
          timestamp: new Date().toISOString()
        });
        return;
      }

      // express.json() reports malformed bodies with a status of 400
      if (error instanceof SyntaxError) {
        res.status(400).json({
          success: false,
          error: 'Malformed JSON body',
          timestamp: new Date().toISOString()
        });
        return;
      }

      logger.error('Unhandled error', error);
      res.status(500).json({
        success: false,
        error: 'Internal server error',
        timestamp: new Date().toISOString()
      });
    });
  }

  /**
   * Start listening; resolves with the bound address once the server is up
   */
  async start(port: number = this.config.server.port, host: string = this.config.server.host): Promise<http.Server> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host);
      server.once('listening', () => {
        this.server = server;
        logger.info(`RAG Server running on http://${host}:${port}`);
        logger.info(`CORS enabled for: ${this.config.server.corsOrigin}`);
        resolve(server);
      });
      server.once('error', reject);
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });
    logger.info('RAG Server stopped');
  }
}
