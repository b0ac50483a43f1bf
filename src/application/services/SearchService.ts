import {
  compareConfidence,
  type ConfidenceTier,
  type QueryResultItem,
  type SearchHit,
  type SearchQuery,
  type SearchResponse,
  type TimeInterval,
} from '../../core/entities/SearchResult.js';
import { IndexNotFoundError, isTransientError } from '../../core/errors.js';
import type { ICatalogRepository } from '../../core/interfaces/ICatalogRepository.js';
import type { IVideoSearchProvider } from '../../core/interfaces/IVideoSearchProvider.js';
import { withRetry, type RetryConfig } from '../../utils/retry.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { CostTracker } from './CostTracker.js';

export interface SearchSettings {
  maxResults: number;
  threshold: ConfidenceTier;
  adjustConfidenceLevel: number;
  retry: RetryConfig;
}

export interface SearchOptions {
  maxResults?: number;
  minConfidence?: ConfidenceTier;
}

/**
 * Text and image search against the active index. Matching happens entirely
 * on the provider; this joins catalog metadata and enforces interval bounds.
 */
export class SearchService {
  constructor(
    private provider: IVideoSearchProvider,
    private catalog: ICatalogRepository,
    private costs: CostTracker,
    private settings: SearchSettings,
    private logger: Logger = silentLogger
  ) {}

  async searchText(text: string, options: SearchOptions = {}): Promise<SearchResponse> {
    return this.run({ kind: 'text', text }, text, options);
  }

  async searchImage(
    image: { imageUrl: string } | { image: Buffer; filename: string },
    options: SearchOptions = {}
  ): Promise<SearchResponse> {
    const label = 'imageUrl' in image ? image.imageUrl : `image:${image.filename}`;
    return this.run({ kind: 'image', ...image }, label, options);
  }

  private async run(query: SearchQuery, label: string, options: SearchOptions): Promise<SearchResponse> {
    const index = this.catalog.getActiveIndex();
    if (!index) {
      throw new IndexNotFoundError();
    }

    const maxResults = options.maxResults ?? this.settings.maxResults;
    this.logger.info(`Searching index ${index.id} for '${label}' (max ${maxResults})`);

    const hits = await withRetry(
      () =>
        this.provider.search({
          indexId: index.id,
          query,
          pageLimit: maxResults,
          threshold: this.settings.threshold,
          searchOptions: query.kind === 'text' ? ['visual', 'audio'] : ['visual'],
          adjustConfidenceLevel: this.settings.adjustConfidenceLevel,
          groupByVideo: true,
        }),
      this.settings.retry,
      {
        shouldRetry: isTransientError,
        onLog: (log) => {
          if (!log.success) this.logger.warn(`Search attempt ${log.attempt} failed: ${log.error}`);
        },
      }
    );
    this.costs.logSearchQuery();

    const results = hits
      .filter((hit) => !options.minConfidence || compareConfidence(hit.confidence, options.minConfidence) >= 0)
      .map((hit) => this.enrich(hit))
      .filter((item): item is QueryResultItem => item !== null)
      .slice(0, maxResults);

    this.logger.info(`Returning ${results.length} search results`);
    return { query: label, results, totalResults: results.length };
  }

  private enrich(hit: SearchHit): QueryResultItem | null {
    const video = this.catalog.getVideo(hit.videoId);
    const interval = clampInterval(hit.interval, video?.durationSec);
    if (!interval) {
      this.logger.warn(`Dropping match in ${hit.videoId}: invalid interval ${hit.interval.start}-${hit.interval.end}`);
      return null;
    }

    return {
      ...hit,
      interval,
      filename: video?.filename ?? 'unknown',
      filePath: video?.filePath,
    };
  }
}

/**
 * Clamp into [0, duration] (upper bound only when known). Null if still inverted.
 */
export function clampInterval(interval: TimeInterval, durationSec?: number): TimeInterval | null {
  const upper = durationSec ?? Number.POSITIVE_INFINITY;
  const clamp = (value: number) => Math.min(Math.max(value, 0), upper);
  const start = clamp(interval.start);
  const end = clamp(interval.end);
  return start <= end ? { start, end } : null;
}
