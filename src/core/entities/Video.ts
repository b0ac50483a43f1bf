/**
 * Payload of a ready ingestion job
 */
export interface IndexedVideo {
  videoId: string;
  indexId?: string;
}

export interface VideoIndex {
  id: string;
  name: string;
}

export interface VideoDetails {
  videoId: string;
  filename?: string;
  durationSec?: number;
}

/**
 * Catalog entry for a video that finished ingestion
 */
export interface CatalogVideo {
  videoId: string;
  indexId: string;
  taskHandle: string;
  filename: string;
  filePath: string;
  durationSec?: number;
  ingestedAt: Date;
}
