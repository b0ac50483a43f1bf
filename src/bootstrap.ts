import type { Config } from './config.js';
import type { IndexedVideo } from './core/entities/Video.js';
import { CostTracker } from './application/services/CostTracker.js';
import { IngestionService } from './application/services/IngestionService.js';
import { JobTracker } from './application/services/JobTracker.js';
import { SearchService } from './application/services/SearchService.js';
import { DatabaseConnection } from './infrastructure/database/DatabaseConnection.js';
import { CatalogRepository } from './infrastructure/database/repositories/CatalogRepository.js';
import { IngestionJobRepository } from './infrastructure/database/repositories/IngestionJobRepository.js';
import { UsageRepository } from './infrastructure/database/repositories/UsageRepository.js';
import { TwelveLabsClient } from './infrastructure/http/TwelveLabsClient.js';
import { systemClock } from './utils/clock.js';
import { createLogger } from './utils/logger.js';
import { DEFAULT_RETRY_CONFIG } from './utils/retry.js';

export interface Services {
  db: DatabaseConnection;
  client: TwelveLabsClient;
  tracker: JobTracker<IndexedVideo>;
  ingestion: IngestionService;
  search: SearchService;
  costs: CostTracker;
}

/**
 * Wire every component from one validated configuration
 */
export function createServices(config: Config): Services {
  const debug = config.server.debug;

  const db = new DatabaseConnection(config.storage.databasePath);
  const catalog = new CatalogRepository(db.getDatabase());
  const jobRepo = new IngestionJobRepository(db.getDatabase());
  const usageRepo = new UsageRepository(db.getDatabase());

  const client = new TwelveLabsClient({
    apiUrl: config.twelveLabs.apiUrl,
    apiKey: config.twelveLabs.apiKey,
    requestTimeoutMs: config.twelveLabs.requestTimeoutMs,
    logger: createLogger('TwelveLabs', debug),
  });

  const tracker = new JobTracker<IndexedVideo>(client, config.tracker, systemClock, createLogger('JobTracker', debug));
  const costs = new CostTracker(usageRepo, config.costs, createLogger('Costs', debug));

  const ingestion = new IngestionService(
    client,
    tracker,
    catalog,
    jobRepo,
    costs,
    config.twelveLabs.indexName,
    createLogger('Ingestion', debug)
  );

  const search = new SearchService(
    client,
    catalog,
    costs,
    {
      maxResults: config.search.maxResults,
      threshold: config.search.threshold,
      adjustConfidenceLevel: config.search.adjustConfidenceLevel,
      retry: { ...DEFAULT_RETRY_CONFIG, maxAttempts: 3 },
    },
    createLogger('Search', debug)
  );

  return { db, client, tracker, ingestion, search, costs };
}
