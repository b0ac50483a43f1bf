import type { IUsageRepository, UsageEntry, UsageKind } from '../../core/interfaces/IUsageRepository.js';
import { silentLogger, type Logger } from '../../utils/logger.js';

export interface CostRates {
  videoCostPerMinute: number;
  searchCostPerQuery: number;
  budget: number;
}

export type BudgetStatus = 'within' | 'approaching' | 'exceeded';

export interface CostSummary {
  totalCost: number;
  videoProcessing: number;
  searchQueries: number;
  budget: number;
  budgetRemaining: number;
  budgetUsedPercent: number;
  budgetStatus: BudgetStatus;
  sessionCount: number;
}

export interface CostEstimate {
  videoCost: number;
  searchCost: number;
  total: number;
  safetyMargin: number;
}

/** Share of the budget after which the summary warns */
const APPROACHING_RATIO = 0.8;

/**
 * Estimated provider spend, recorded per ingestion and per search
 */
export class CostTracker {
  constructor(
    private usageRepo: IUsageRepository,
    private rates: CostRates,
    private logger: Logger = silentLogger
  ) {}

  logVideoProcessing(durationMinutes: number): number {
    return this.record('video_processing', durationMinutes, this.rates.videoCostPerMinute);
  }

  logSearchQuery(queryCount: number = 1): number {
    return this.record('search_queries', queryCount, this.rates.searchCostPerQuery);
  }

  getSummary(): CostSummary {
    const totals = this.usageRepo.getTotals();
    const totalCost = totals.videoProcessing + totals.searchQueries;
    const { budget } = this.rates;

    return {
      totalCost,
      videoProcessing: totals.videoProcessing,
      searchQueries: totals.searchQueries,
      budget,
      budgetRemaining: budget - totalCost,
      budgetUsedPercent: (totalCost / budget) * 100,
      budgetStatus: budgetStatus(totalCost, budget),
      sessionCount: totals.entryCount,
    };
  }

  recentUsage(limit: number = 10): UsageEntry[] {
    return this.usageRepo.listEntries(limit);
  }

  /**
   * Projected spend for a batch of videos plus a number of searches
   */
  estimate(videoCount: number, secondsPerVideo: number, queryCount: number): CostEstimate {
    const videoCost = ((videoCount * secondsPerVideo) / 60) * this.rates.videoCostPerMinute;
    const searchCost = queryCount * this.rates.searchCostPerQuery;
    const total = videoCost + searchCost;
    return { videoCost, searchCost, total, safetyMargin: this.rates.budget - total };
  }

  private record(kind: UsageKind, quantity: number, unitCost: number): number {
    const cost = quantity * unitCost;
    this.usageRepo.record({ timestamp: new Date(), kind, quantity, unitCost, cost });

    const summary = this.getSummary();
    this.logger.debug(`${kind}: $${cost.toFixed(4)} (total $${summary.totalCost.toFixed(4)})`);
    if (summary.budgetStatus === 'exceeded') {
      this.logger.warn(`Budget exceeded: $${summary.totalCost.toFixed(2)} of $${summary.budget.toFixed(2)}`);
    } else if (summary.budgetStatus === 'approaching') {
      this.logger.warn(`Approaching budget limit: $${summary.totalCost.toFixed(2)} of $${summary.budget.toFixed(2)}`);
    }
    return cost;
  }
}

export function budgetStatus(totalCost: number, budget: number): BudgetStatus {
  if (totalCost > budget) return 'exceeded';
  if (totalCost > budget * APPROACHING_RATIO) return 'approaching';
  return 'within';
}
