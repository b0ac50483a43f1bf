import type { CatalogVideo, VideoIndex } from '../entities/Video.js';

/**
 * Interface for the local video catalog
 */
export interface ICatalogRepository {
  getActiveIndex(): VideoIndex | null;

  setActiveIndex(index: VideoIndex): void;

  saveVideo(video: CatalogVideo): void;

  getVideo(videoId: string): CatalogVideo | null;

  findByFilePath(filePath: string): CatalogVideo | null;

  listVideos(): CatalogVideo[];
}
