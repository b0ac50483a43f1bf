export type UsageKind = 'video_processing' | 'search_queries';

export interface UsageEntry {
  timestamp: Date;
  kind: UsageKind;
  quantity: number;
  unitCost: number;
  cost: number;
}

export interface UsageTotals {
  videoProcessing: number;
  searchQueries: number;
  entryCount: number;
}

/**
 * Interface for provider spend bookkeeping
 */
export interface IUsageRepository {
  record(entry: UsageEntry): void;

  getTotals(): UsageTotals;

  listEntries(limit?: number): UsageEntry[];
}
