import fs from 'fs';
import os from 'os';
import path from 'path';
import fetch from 'node-fetch';
import WebSocket from 'ws';
import { CostTracker } from '../src/application/services/CostTracker.js';
import { IngestionService } from '../src/application/services/IngestionService.js';
import { JobTracker } from '../src/application/services/JobTracker.js';
import { SearchService } from '../src/application/services/SearchService.js';
import type { IndexedVideo } from '../src/core/entities/Video.js';
import { TransientCommunicationError } from '../src/core/errors.js';
import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { CatalogRepository } from '../src/infrastructure/database/repositories/CatalogRepository.js';
import { IngestionJobRepository } from '../src/infrastructure/database/repositories/IngestionJobRepository.js';
import { UsageRepository } from '../src/infrastructure/database/repositories/UsageRepository.js';
import { WebServer } from '../src/infrastructure/web/WebServer.js';
import type { CircuitStats } from '../src/utils/retry.js';
import { FakeClock, ScriptedVideoProvider } from './helpers/fakes.js';

describe('WebServer', () => {
  let connection: DatabaseConnection;
  let providerStats: CircuitStats;
  let provider: ScriptedVideoProvider;
  let catalog: CatalogRepository;
  let server: WebServer;
  let videoDir: string;

  async function call(method: 'GET' | 'POST', route: string, body?: unknown): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`http://127.0.0.1:${server.getPort()}${route}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const parsed: unknown = await res.json();
    return { status: res.status, body: parsed };
  }

  function addCatalogVideo() {
    catalog.setActiveIndex({ id: 'idx_1', name: 'test_index' });
    catalog.saveVideo({
      videoId: 'vid_1',
      indexId: 'idx_1',
      taskHandle: 'task_0',
      filename: 'beach.mp4',
      filePath: '/videos/beach.mp4',
      durationSec: 60,
      ingestedAt: new Date('2024-05-01T10:00:00.000Z'),
    });
  }

  beforeEach(async () => {
    connection = new DatabaseConnection(':memory:');
    provider = new ScriptedVideoProvider();
    catalog = new CatalogRepository(connection.getDatabase());
    videoDir = fs.mkdtempSync(path.join(os.tmpdir(), 'video-api-'));
    providerStats = { state: 'closed', failureCount: 0, lastFailureTime: null };

    const costs = new CostTracker(new UsageRepository(connection.getDatabase()), {
      videoCostPerMinute: 0.5,
      searchCostPerQuery: 0.25,
      budget: 100,
    });
    const tracker = new JobTracker<IndexedVideo>(
      provider,
      { pollIntervalMs: 1000, maxWaitMs: 5000, transientRetryLimit: 3 },
      new FakeClock()
    );
    const ingestion = new IngestionService(
      provider,
      tracker,
      catalog,
      new IngestionJobRepository(connection.getDatabase()),
      costs,
      'test_index'
    );
    const search = new SearchService(provider, catalog, costs, {
      maxResults: 5,
      threshold: 'medium',
      adjustConfidenceLevel: 0.5,
      retry: { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 1, multiplier: 1 },
    });

    server = new WebServer({ ingestion, search, costs, videoDir, providerStats: () => providerStats }, 0);
    await server.start();
  });

  afterEach(async () => {
    await server.stop();
    await server.drain();
    connection.close();
    fs.rmSync(videoDir, { recursive: true, force: true });
  });

  describe('Status', () => {
    test('should describe the api at the root', async () => {
      const res = await call('GET', '/');

      expect(res).toEqual({ status: 200, body: { message: 'Semantic Video Search API', status: 'running' } });
    });

    test('should report a missing index on health', async () => {
      const res = await call('GET', '/health');

      expect(res.body).toEqual({
        status: 'no_index',
        message: 'Run video ingestion first',
        provider: { circuit: 'closed', failure_count: 0, last_failure: null },
      });
    });

    test('should report the active index on health', async () => {
      addCatalogVideo();

      const res = await call('GET', '/health');

      expect(res.body).toEqual({
        status: 'healthy',
        index_id: 'idx_1',
        provider: { circuit: 'closed', failure_count: 0, last_failure: null },
      });
    });

    test('should report an open provider circuit on health', async () => {
      addCatalogVideo();
      providerStats = { state: 'open', failureCount: 5, lastFailureTime: new Date('2024-05-01T12:00:00.000Z') };

      const res = await call('GET', '/health');

      expect(res.body).toEqual({
        status: 'healthy',
        index_id: 'idx_1',
        provider: { circuit: 'open', failure_count: 5, last_failure: '2024-05-01T12:00:00.000Z' },
      });
    });
  });

  describe('Search', () => {
    test('should return serialized results', async () => {
      addCatalogVideo();
      provider.searchHits = [
        { videoId: 'vid_1', confidence: 'high', score: 88, interval: { start: 10, end: 20 } },
      ];

      const res = await call('POST', '/search', { query: 'waves' });

      expect(res).toEqual({
        status: 200,
        body: {
          success: true,
          data: {
            query: 'waves',
            results: [
              {
                video_id: 'vid_1',
                filename: 'beach.mp4',
                video_filepath: '/videos/beach.mp4',
                confidence: 'high',
                score: 88,
                start: 10,
                end: 20,
                clip_text: '',
                thumbnail_url: null,
              },
            ],
            total_results: 1,
          },
        },
      });
    });

    test('should reject an empty query', async () => {
      const res = await call('POST', '/search', { query: '   ' });

      expect(res).toEqual({
        status: 400,
        body: { success: false, error: 'query: query must not be empty', kind: 'validation' },
      });
    });

    test('should reject malformed json', async () => {
      const res = await fetch(`http://127.0.0.1:${server.getPort()}/search`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"query":',
      });

      expect(res.status).toBe(400);
    });

    test('should answer 409 before any ingestion', async () => {
      const res = await call('POST', '/search', { query: 'waves' });

      expect(res).toEqual({
        status: 409,
        body: { success: false, error: 'No index found. Run video ingestion first.', kind: 'no_index' },
      });
    });

    test('should answer 503 when the provider stays unavailable', async () => {
      addCatalogVideo();
      provider.searchFailures = [
        new TransientCommunicationError('HTTP 503'),
        new TransientCommunicationError('HTTP 503'),
        new TransientCommunicationError('HTTP 503'),
      ];

      const res = await call('POST', '/search', { query: 'waves' });

      expect(res).toEqual({ status: 503, body: { success: false, error: 'HTTP 503', kind: 'try_again' } });
    });

    test('should search by image url', async () => {
      addCatalogVideo();

      const res = await call('POST', '/search/image', { image_url: 'https://media.test/cat.jpg', min_confidence: 'high' });

      expect(res.status).toBe(200);
      expect(provider.searchRequests[0].query).toEqual({ kind: 'image', imageUrl: 'https://media.test/cat.jpg' });
    });
  });

  describe('Videos', () => {
    test('should list catalogued videos', async () => {
      addCatalogVideo();

      const res = await call('GET', '/videos');

      expect(res.body).toEqual({
        success: true,
        data: {
          videos: [
            {
              video_id: 'vid_1',
              index_id: 'idx_1',
              task_id: 'task_0',
              filename: 'beach.mp4',
              filepath: '/videos/beach.mp4',
              duration: 60,
              ingested_at: '2024-05-01T10:00:00.000Z',
            },
          ],
          total: 1,
        },
      });
    });
  });

  describe('Ingestion jobs', () => {
    test('should accept a video url and finish tracking in the background', async () => {
      provider.script('task_1', ['processing', 'ready']);

      const accepted = await call('POST', '/ingest', { video_url: 'https://media.test/clips/dog.mp4' });

      expect(accepted.status).toBe(202);
      expect(accepted.body).toMatchObject({
        success: true,
        data: {
          handle: 'task_1',
          index_id: 'index_1',
          source: 'https://media.test/clips/dog.mp4',
          filename: 'dog.mp4',
          status: 'pending',
          video_id: null,
          error: null,
        },
      });

      await server.drain();
      const job = await call('GET', '/jobs/task_1');
      expect(job.body).toMatchObject({ success: true, data: { status: 'ready', video_id: 'video_task_1' } });

      const jobs = await call('GET', '/jobs');
      expect(jobs.body).toMatchObject({ success: true, data: [{ handle: 'task_1' }] });
    });

    test('should ingest a file from the video directory', async () => {
      fs.writeFileSync(path.join(videoDir, 'clip.mp4'), 'placeholder');
      provider.script('task_1', ['ready']);

      const res = await call('POST', '/ingest', { filename: 'clip.mp4' });

      expect(res.status).toBe(202);
      expect(provider.submitted).toEqual([{ indexId: 'index_1', filePath: path.join(path.resolve(videoDir), 'clip.mp4') }]);
    });

    test('should refuse a filename outside the video directory', async () => {
      const res = await call('POST', '/ingest', { filename: '../secrets.mp4' });

      expect(res).toEqual({
        status: 422,
        body: {
          success: false,
          error: 'filename must name a file inside the video directory',
          kind: 'submission_rejected',
        },
      });
      expect(provider.submitted).toEqual([]);
    });

    test('should answer 404 for an unknown job', async () => {
      const res = await call('GET', '/jobs/task_404');

      expect(res).toEqual({ status: 404, body: { success: false, error: 'Job not found', kind: 'not_found' } });
    });

    test('should answer 404 when refreshing an unknown job', async () => {
      const res = await call('POST', '/jobs/task_404/refresh');

      expect(res).toEqual({
        status: 404,
        body: { success: false, error: 'No ingestion job with handle task_404', kind: 'not_found', handle: 'task_404' },
      });
    });
  });

  describe('Costs', () => {
    test('should report spend after a search', async () => {
      addCatalogVideo();
      await call('POST', '/search', { query: 'waves' });

      const res = await call('GET', '/costs');

      expect(res.body).toMatchObject({ success: true, data: { totalCost: 0.25, searchQueries: 0.25, budget: 100 } });
    });
  });

  describe('WebSocket', () => {
    test('should push job updates to connected clients', async () => {
      const messages: Array<{ type?: unknown; status?: unknown }> = [];
      const socket = new WebSocket(`ws://127.0.0.1:${server.getPort()}`);
      socket.on('message', (data) => {
        messages.push(JSON.parse(data.toString()));
      });
      await new Promise<void>((resolve) => socket.on('open', () => resolve()));
      await waitFor(() => messages.some((m) => m.type === 'connected'));

      provider.script('task_1', ['ready']);
      await call('POST', '/ingest', { video_url: 'https://media.test/clips/dog.mp4' });
      await server.drain();
      await waitFor(() => messages.some((m) => m.type === 'job_updated' && m.status === 'ready'));

      expect(messages.filter((m) => m.type === 'job_updated').map((m) => m.status)).toEqual(['pending', 'ready']);
      socket.close();
    });
  });
});

async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}
