import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import { z } from 'zod';
import type { IngestionJob } from '../../core/entities/Job.js';
import type { CatalogVideo } from '../../core/entities/Video.js';
import type { QueryResultItem, SearchResponse } from '../../core/entities/SearchResult.js';
import { SubmissionError, errorMessage } from '../../core/errors.js';
import type { CostTracker } from '../../application/services/CostTracker.js';
import type { IngestionService, JobUpdate } from '../../application/services/IngestionService.js';
import type { SearchService } from '../../application/services/SearchService.js';
import type { CircuitStats } from '../../utils/retry.js';
import { resolveInside } from '../../utils/videoFiles.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { toErrorResponse } from './errorResponses.js';

const confidence = z.enum(['high', 'medium', 'low']);

const SearchBodySchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  max_results: z.number().int().min(1).max(50).optional(),
  min_confidence: confidence.optional(),
});

const ImageSearchBodySchema = z.union([
  z.object({
    image_url: z.string().url(),
    max_results: z.number().int().min(1).max(50).optional(),
    min_confidence: confidence.optional(),
  }),
  z.object({
    image_base64: z.string().min(1),
    filename: z.string().min(1).default('query.jpg'),
    max_results: z.number().int().min(1).max(50).optional(),
    min_confidence: confidence.optional(),
  }),
]);

const IngestBodySchema = z.union([
  z.object({ filename: z.string().min(1) }),
  z.object({ video_url: z.string().url() }),
]);

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

export interface WebServerDependencies {
  ingestion: IngestionService;
  search: SearchService;
  costs: CostTracker;
  videoDir: string;
  /** Circuit breaker state of the provider client, reported on /health */
  providerStats?: () => CircuitStats;
  logger?: Logger;
}

/**
 * REST API over the ingestion and search services, plus a WebSocket feed of job updates
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private backgroundJobs: Set<Promise<void>> = new Set();
  private shutdown = new AbortController();
  private logger: Logger;

  constructor(
    private deps: WebServerDependencies,
    private port: number = 8000
  ) {
    this.logger = deps.logger ?? silentLogger;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();

    this.deps.ingestion.onJobUpdate((update) => this.notifyJobUpdate(update));
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: '10mb' }));
  }

  private setupRoutes(): void {
    this.app.get('/', (_req: Request, res: Response) => {
      res.json({ message: 'Semantic Video Search API', status: 'running' });
    });

    this.app.get('/health', (_req: Request, res: Response) => {
      const index = this.deps.ingestion.getActiveIndex();
      const provider = this.deps.providerStats ? { provider: serializeCircuit(this.deps.providerStats()) } : {};
      if (index) {
        res.json({ status: 'healthy', index_id: index.id, ...provider });
      } else {
        res.json({ status: 'no_index', message: 'Run video ingestion first', ...provider });
      }
    });

    // API: Text search
    this.app.post(
      '/search',
      this.handle(async (req, res) => {
        const body = SearchBodySchema.parse(req.body);
        const response = await this.deps.search.searchText(body.query, {
          maxResults: body.max_results,
          minConfidence: body.min_confidence,
        });
        res.json({ success: true, data: serializeSearch(response) });
      })
    );

    // API: Image search
    this.app.post(
      '/search/image',
      this.handle(async (req, res) => {
        const body = ImageSearchBodySchema.parse(req.body);
        const options = { maxResults: body.max_results, minConfidence: body.min_confidence };
        const response =
          'image_url' in body
            ? await this.deps.search.searchImage({ imageUrl: body.image_url }, options)
            : await this.deps.search.searchImage(
                { image: Buffer.from(body.image_base64, 'base64'), filename: body.filename },
                options
              );
        res.json({ success: true, data: serializeSearch(response) });
      })
    );

    // API: Catalogued videos
    this.app.get('/videos', (_req: Request, res: Response) => {
      const videos = this.deps.ingestion.listVideos().map(serializeVideo);
      res.json({ success: true, data: { videos, total: videos.length } });
    });

    // API: Submit a video; completion is tracked in the background
    this.app.post(
      '/ingest',
      this.handle(async (req, res) => {
        const body = IngestBodySchema.parse(req.body);
        let source: { filePath: string } | { videoUrl: string };
        if ('filename' in body) {
          const filePath = resolveInside(this.deps.videoDir, body.filename);
          if (!filePath) {
            throw new SubmissionError(`filename must name a file inside the video directory`);
          }
          source = { filePath };
        } else {
          source = { videoUrl: body.video_url };
        }

        const job = await this.deps.ingestion.startIngestion(source);
        this.trackInBackground(job.handle);
        res.status(202).json({ success: true, data: serializeJob(job) });
      })
    );

    // API: Get all jobs
    this.app.get('/jobs', (_req: Request, res: Response) => {
      res.json({ success: true, data: this.deps.ingestion.listJobs().map(serializeJob) });
    });

    // API: Get job by handle
    this.app.get('/jobs/:handle', (req: Request, res: Response) => {
      const job = this.deps.ingestion.getJob(req.params.handle);
      if (!job) {
        res.status(404).json({ success: false, error: 'Job not found', kind: 'not_found' });
        return;
      }
      res.json({ success: true, data: serializeJob(job) });
    });

    // API: One follow-up status check
    this.app.post(
      '/jobs/:handle/refresh',
      this.handle(async (req, res) => {
        const job = await this.deps.ingestion.refreshJob(req.params.handle);
        res.json({ success: true, data: serializeJob(job) });
      })
    );

    // API: Cost summary
    this.app.get('/costs', (_req: Request, res: Response) => {
      res.json({
        success: true,
        data: {
          ...this.deps.costs.getSummary(),
          recent: this.deps.costs.recentUsage(10).map((entry) => ({
            timestamp: entry.timestamp.toISOString(),
            kind: entry.kind,
            quantity: entry.quantity,
            cost: entry.cost,
          })),
        },
      });
    });

    this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const { status, body } = toErrorResponse(err);
      if (status >= 500) {
        this.logger.error(`Request failed (${status}): ${body.error}`);
      }
      res.status(status).json(body);
    });
  }

  /**
   * Routes async handler rejections into the error middleware
   */
  private handle(fn: AsyncHandler) {
    return (req: Request, res: Response, next: NextFunction) => {
      fn(req, res).catch(next);
    };
  }

  private trackInBackground(handle: string): void {
    const tracking = this.deps.ingestion
      .trackIngestion(handle, { signal: this.shutdown.signal })
      .then(() => undefined)
      .catch((error: unknown) => {
        this.logger.warn(`Background tracking of ${handle} ended: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.backgroundJobs.delete(tracking);
      });
    this.backgroundJobs.add(tracking);
  }

  /**
   * Resolves once every background tracking loop has settled
   */
  async drain(): Promise<void> {
    await Promise.all([...this.backgroundJobs]);
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      this.logger.debug('New WebSocket client connected');
      this.clients.add(ws);

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        this.logger.error(`WebSocket error: ${error.message}`);
        this.clients.delete(ws);
      });

      ws.send(JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() }));
    });
  }

  public broadcast(message: Record<string, unknown>): void {
    const payload = JSON.stringify(message);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  public notifyJobUpdate(update: JobUpdate): void {
    this.broadcast({
      type: 'job_updated',
      ...update,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Port actually bound (differs from the requested one when that was 0)
   */
  public getPort(): number {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : this.port;
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        this.logger.info(`API available at http://localhost:${this.getPort()}`);
        this.setupWebSocket();
        resolve();
      });
      server.on('error', (error) => {
        this.logger.error(`Server error: ${error.message}`);
        reject(error);
      });
      this.httpServer = server;
    });
  }

  /**
   * Stops accepting requests and abandons background waits; the remote jobs keep running
   */
  public stop(): Promise<void> {
    this.shutdown.abort();
    return new Promise((resolve) => {
      this.clients.forEach((client) => {
        client.close();
      });
      this.clients.clear();

      if (this.wss) {
        this.wss.close();
        this.wss = null;
      }

      if (this.httpServer) {
        this.httpServer.close(() => {
          this.logger.info('HTTP server closed');
          resolve();
        });
        this.httpServer = null;
      } else {
        resolve();
      }
    });
  }
}

function serializeSearch(response: SearchResponse) {
  return {
    query: response.query,
    results: response.results.map(serializeResult),
    total_results: response.totalResults,
  };
}

function serializeResult(item: QueryResultItem) {
  return {
    video_id: item.videoId,
    filename: item.filename,
    video_filepath: item.filePath ?? 'unknown',
    confidence: item.confidence,
    score: item.score,
    start: item.interval.start,
    end: item.interval.end,
    clip_text: item.clipText ?? '',
    thumbnail_url: item.thumbnailUrl ?? null,
  };
}

function serializeVideo(video: CatalogVideo) {
  return {
    video_id: video.videoId,
    index_id: video.indexId,
    task_id: video.taskHandle,
    filename: video.filename,
    filepath: video.filePath,
    duration: video.durationSec ?? null,
    ingested_at: video.ingestedAt.toISOString(),
  };
}

function serializeJob(job: IngestionJob) {
  return {
    handle: job.handle,
    index_id: job.indexId,
    source: job.source,
    filename: job.filename,
    status: job.status,
    video_id: job.videoId ?? null,
    error: job.error ?? null,
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
  };
}

function serializeCircuit(stats: CircuitStats) {
  return {
    circuit: stats.state,
    failure_count: stats.failureCount,
    last_failure: stats.lastFailureTime ? stats.lastFailureTime.toISOString() : null,
  };
}
