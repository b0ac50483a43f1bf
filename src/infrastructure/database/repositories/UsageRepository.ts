import type Database from 'better-sqlite3';
import { z } from 'zod';
import type {
  IUsageRepository,
  UsageEntry,
  UsageTotals,
} from '../../../core/interfaces/IUsageRepository.js';

const EntryRowSchema = z.object({
  timestamp: z.string(),
  kind: z.enum(['video_processing', 'search_queries']),
  quantity: z.number(),
  unit_cost: z.number(),
  cost: z.number(),
});

const TotalsRowSchema = z.object({
  video_processing: z.number().nullable(),
  search_queries: z.number().nullable(),
  entry_count: z.number(),
});

/**
 * SQLite implementation of usage bookkeeping
 */
export class UsageRepository implements IUsageRepository {
  constructor(private db: Database.Database) {}

  record(entry: UsageEntry): void {
    this.db
      .prepare('INSERT INTO usage_log (timestamp, kind, quantity, unit_cost, cost) VALUES (?, ?, ?, ?, ?)')
      .run(entry.timestamp.toISOString(), entry.kind, entry.quantity, entry.unitCost, entry.cost);
  }

  getTotals(): UsageTotals {
    const row = TotalsRowSchema.parse(
      this.db
        .prepare(
          `SELECT
             SUM(CASE WHEN kind = 'video_processing' THEN cost END) AS video_processing,
             SUM(CASE WHEN kind = 'search_queries' THEN cost END) AS search_queries,
             COUNT(*) AS entry_count
           FROM usage_log`
        )
        .get()
    );

    return {
      videoProcessing: row.video_processing ?? 0,
      searchQueries: row.search_queries ?? 0,
      entryCount: row.entry_count,
    };
  }

  listEntries(limit: number = 100): UsageEntry[] {
    return this.db
      .prepare('SELECT * FROM usage_log ORDER BY id DESC LIMIT ?')
      .all(limit)
      .map((row) => {
        const r = EntryRowSchema.parse(row);
        return {
          timestamp: new Date(r.timestamp),
          kind: r.kind,
          quantity: r.quantity,
          unitCost: r.unit_cost,
          cost: r.cost,
        };
      });
  }
}
