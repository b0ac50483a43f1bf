export type ConfidenceTier = 'high' | 'medium' | 'low';

export const CONFIDENCE_TIERS: readonly ConfidenceTier[] = ['high', 'medium', 'low'];

const TIER_RANK: Record<ConfidenceTier, number> = { high: 3, medium: 2, low: 1 };

/**
 * Positive when `a` ranks above `b`
 */
export function compareConfidence(a: ConfidenceTier, b: ConfidenceTier): number {
  return TIER_RANK[a] - TIER_RANK[b];
}

export function isConfidenceTier(value: unknown): value is ConfidenceTier {
  return CONFIDENCE_TIERS.some((tier) => tier === value);
}

/** Seconds from the start of the video */
export interface TimeInterval {
  start: number;
  end: number;
}

/**
 * One match as returned by the provider, before catalog enrichment
 */
export interface SearchHit {
  videoId: string;
  confidence: ConfidenceTier;
  score: number;
  interval: TimeInterval;
  clipText?: string;
  thumbnailUrl?: string;
}

export interface QueryResultItem extends SearchHit {
  filename: string;
  filePath?: string;
}

export type SearchQuery =
  | { kind: 'text'; text: string }
  | { kind: 'image'; imageUrl: string }
  | { kind: 'image'; image: Buffer; filename: string };

export interface ProviderSearchRequest {
  indexId: string;
  query: SearchQuery;
  pageLimit: number;
  threshold: ConfidenceTier;
  searchOptions: Array<'visual' | 'audio'>;
  adjustConfidenceLevel?: number;
  groupByVideo?: boolean;
}

export interface SearchResponse {
  query: string;
  results: QueryResultItem[];
  totalResults: number;
}
