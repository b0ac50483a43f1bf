import type { IndexedVideo, VideoDetails, VideoIndex } from '../entities/Video.js';
import type { ProviderSearchRequest, SearchHit } from '../entities/SearchResult.js';
import type { IJobProcessor } from './IJobProcessor.js';

/**
 * Multimodal embedding and search provider
 */
export interface IVideoSearchProvider extends IJobProcessor<IndexedVideo> {
  search(request: ProviderSearchRequest): Promise<SearchHit[]>;

  listIndexes(): Promise<VideoIndex[]>;

  createIndex(name: string): Promise<VideoIndex>;

  getVideo(indexId: string, videoId: string): Promise<VideoDetails>;
}
