import { CostTracker } from '../src/application/services/CostTracker.js';
import { SearchService, clampInterval } from '../src/application/services/SearchService.js';
import type { SearchHit } from '../src/core/entities/SearchResult.js';
import { IndexNotFoundError, ProviderRequestError, TransientCommunicationError } from '../src/core/errors.js';
import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { CatalogRepository } from '../src/infrastructure/database/repositories/CatalogRepository.js';
import { UsageRepository } from '../src/infrastructure/database/repositories/UsageRepository.js';
import { ScriptedVideoProvider } from './helpers/fakes.js';

function hit(videoId: string, confidence: SearchHit['confidence'], start: number, end: number): SearchHit {
  return { videoId, confidence, score: 50, interval: { start, end } };
}

describe('SearchService', () => {
  let connection: DatabaseConnection;
  let provider: ScriptedVideoProvider;
  let catalog: CatalogRepository;
  let costs: CostTracker;
  let search: SearchService;

  beforeEach(() => {
    connection = new DatabaseConnection(':memory:');
    provider = new ScriptedVideoProvider();
    catalog = new CatalogRepository(connection.getDatabase());
    costs = new CostTracker(new UsageRepository(connection.getDatabase()), {
      videoCostPerMinute: 0.5,
      searchCostPerQuery: 0.25,
      budget: 100,
    });
    search = new SearchService(provider, catalog, costs, {
      maxResults: 5,
      threshold: 'medium',
      adjustConfidenceLevel: 0.5,
      retry: { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 1, multiplier: 1 },
    });

    catalog.setActiveIndex({ id: 'idx_1', name: 'test_index' });
    catalog.saveVideo({
      videoId: 'vid_1',
      indexId: 'idx_1',
      taskHandle: 'task_1',
      filename: 'beach.mp4',
      filePath: '/videos/beach.mp4',
      durationSec: 100,
      ingestedAt: new Date('2024-05-01T10:00:00.000Z'),
    });
  });

  afterEach(() => {
    connection.close();
  });

  test('should require an index', async () => {
    connection.getDatabase().exec('DELETE FROM catalog_meta');

    await expect(search.searchText('dogs')).rejects.toBeInstanceOf(IndexNotFoundError);
    expect(provider.searchRequests).toEqual([]);
  });

  test('should search the active index with text settings', async () => {
    provider.searchHits = [hit('vid_1', 'high', 10, 20)];

    const response = await search.searchText('dogs on the beach');

    expect(provider.searchRequests).toEqual([
      {
        indexId: 'idx_1',
        query: { kind: 'text', text: 'dogs on the beach' },
        pageLimit: 5,
        threshold: 'medium',
        searchOptions: ['visual', 'audio'],
        adjustConfidenceLevel: 0.5,
        groupByVideo: true,
      },
    ]);
    expect(response).toEqual({
      query: 'dogs on the beach',
      results: [
        {
          videoId: 'vid_1',
          confidence: 'high',
          score: 50,
          interval: { start: 10, end: 20 },
          filename: 'beach.mp4',
          filePath: '/videos/beach.mp4',
        },
      ],
      totalResults: 1,
    });
    expect(costs.getSummary().searchQueries).toBe(0.25);
  });

  test('should label videos missing from the catalog as unknown', async () => {
    provider.searchHits = [hit('vid_elsewhere', 'medium', 1, 2)];

    const response = await search.searchText('dogs');

    expect(response.results[0].filename).toBe('unknown');
    expect(response.results[0].filePath).toBeUndefined();
  });

  test('should drop matches below the minimum confidence', async () => {
    provider.searchHits = [hit('vid_1', 'low', 0, 1), hit('vid_1', 'high', 2, 3), hit('vid_1', 'medium', 4, 5)];

    const response = await search.searchText('dogs', { minConfidence: 'medium' });

    expect(response.results.map((r) => r.confidence)).toEqual(['high', 'medium']);
  });

  test('should cap the results at maxResults', async () => {
    provider.searchHits = [hit('vid_1', 'high', 0, 1), hit('vid_1', 'high', 2, 3), hit('vid_1', 'high', 4, 5)];

    const response = await search.searchText('dogs', { maxResults: 2 });

    expect(provider.searchRequests[0].pageLimit).toBe(2);
    expect(response.totalResults).toBe(2);
  });

  test('should clamp intervals to the video and drop inverted ones', async () => {
    provider.searchHits = [hit('vid_1', 'high', -2, 5), hit('vid_1', 'high', 95, 120), hit('vid_1', 'high', 10, 4)];

    const response = await search.searchText('dogs');

    expect(response.results.map((r) => r.interval)).toEqual([
      { start: 0, end: 5 },
      { start: 95, end: 100 },
    ]);
  });

  test('should retry a transient provider failure', async () => {
    provider.searchFailures = [new TransientCommunicationError('HTTP 503')];
    provider.searchHits = [hit('vid_1', 'high', 0, 1)];

    const response = await search.searchText('dogs');

    expect(provider.searchRequests).toHaveLength(2);
    expect(response.totalResults).toBe(1);
  });

  test('should not retry other provider failures', async () => {
    provider.searchFailures = [new ProviderRequestError('HTTP 401: unauthorized', 401)];

    await expect(search.searchText('dogs')).rejects.toBeInstanceOf(ProviderRequestError);
    expect(provider.searchRequests).toHaveLength(1);
    expect(costs.getSummary().searchQueries).toBe(0);
  });

  test('should search by image url with visual options only', async () => {
    const response = await search.searchImage({ imageUrl: 'https://media.test/cat.jpg' });

    expect(provider.searchRequests[0].query).toEqual({ kind: 'image', imageUrl: 'https://media.test/cat.jpg' });
    expect(provider.searchRequests[0].searchOptions).toEqual(['visual']);
    expect(response.query).toBe('https://media.test/cat.jpg');
  });

  test('should label an uploaded image query by its filename', async () => {
    const response = await search.searchImage({ image: Buffer.from('fake-image'), filename: 'cat.jpg' });

    expect(response.query).toBe('image:cat.jpg');
  });
});

describe('clampInterval', () => {
  test('should clamp to zero and to the duration', () => {
    expect(clampInterval({ start: -1, end: 50 }, 30)).toEqual({ start: 0, end: 30 });
  });

  test('should leave the upper bound open when the duration is unknown', () => {
    expect(clampInterval({ start: 5, end: 5000 })).toEqual({ start: 5, end: 5000 });
  });

  test('should return null for an inverted interval', () => {
    expect(clampInterval({ start: 8, end: 3 }, 30)).toBeNull();
  });
});
