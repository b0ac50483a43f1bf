import { z } from 'zod';
import type { JobStatus } from '../../core/entities/Job.js';
import { isConfidenceTier, type ConfidenceTier, type SearchHit } from '../../core/entities/SearchResult.js';

/**
 * Wire schemas for the Twelve Labs v1.3 responses this service reads.
 * Unknown fields are ignored.
 */
export const IndexSchema = z.object({
  _id: z.string(),
  index_name: z.string(),
});

export const IndexListSchema = z.object({
  data: z.array(IndexSchema).default([]),
});

export const CreatedSchema = z.object({
  _id: z.string(),
});

export const TaskSchema = z.object({
  _id: z.string(),
  index_id: z.string().optional(),
  video_id: z.string().nullish(),
  status: z.string(),
  error: z.string().nullish(),
  message: z.string().nullish(),
});

const ClipSchema = z.object({
  video_id: z.string().default(''),
  score: z.number().default(0),
  start: z.number().default(0),
  end: z.number().default(0),
  confidence: z.string().default('low'),
  thumbnail_url: z.string().nullish(),
  transcription: z.string().nullish(),
});

const GroupSchema = z.object({
  id: z.string(),
  clips: z.array(ClipSchema),
});

export const SearchResponseSchema = z.object({
  data: z.array(z.union([GroupSchema, ClipSchema])).default([]),
});

export const VideoSchema = z.object({
  _id: z.string(),
  system_metadata: z
    .object({
      filename: z.string().nullish(),
      duration: z.number().nullish(),
    })
    .nullish(),
});

export const ErrorBodySchema = z.object({
  code: z.string().optional(),
  message: z.string(),
});

export type WireClip = z.infer<typeof ClipSchema>;

/**
 * Map provider task vocabulary onto the closed status set.
 * Anything unrecognised counts as still processing.
 */
export function normalizeTaskStatus(raw: string): JobStatus {
  switch (raw.toLowerCase()) {
    case 'validating':
    case 'pending':
    case 'queued':
      return 'pending';
    case 'indexing':
    case 'processing':
      return 'processing';
    case 'ready':
      return 'ready';
    case 'failed':
      return 'failed';
    default:
      return 'processing';
  }
}

/**
 * Provider tiers outside high/medium/low (e.g. "none") rank as low
 */
export function normalizeConfidence(raw: string): ConfidenceTier {
  const lower = raw.toLowerCase();
  return isConfidenceTier(lower) ? lower : 'low';
}

export function toSearchHit(clip: WireClip): SearchHit {
  return {
    videoId: clip.video_id,
    confidence: normalizeConfidence(clip.confidence),
    score: clip.score,
    interval: { start: clip.start, end: clip.end },
    clipText: clip.transcription ?? undefined,
    thumbnailUrl: clip.thumbnail_url ?? undefined,
  };
}

/**
 * Grouped results (group_by=video) are flattened into their clips, keeping provider order
 */
export function flattenSearchResults(body: z.infer<typeof SearchResponseSchema>): SearchHit[] {
  return body.data.flatMap((item) => ('clips' in item ? item.clips : [item])).map(toSearchHit);
}
