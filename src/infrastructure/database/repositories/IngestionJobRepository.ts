import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { IngestionJob, JobHandle, JobStatus } from '../../../core/entities/Job.js';
import type { IIngestionJobRepository } from '../../../core/interfaces/IIngestionJobRepository.js';

const JobRowSchema = z.object({
  handle: z.string(),
  index_id: z.string(),
  source: z.string(),
  filename: z.string(),
  status: z.enum(['pending', 'processing', 'ready', 'failed']),
  video_id: z.string().nullable(),
  error: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

function toJob(row: unknown): IngestionJob {
  const r = JobRowSchema.parse(row);
  return {
    handle: r.handle,
    indexId: r.index_id,
    source: r.source,
    filename: r.filename,
    status: r.status,
    videoId: r.video_id ?? undefined,
    error: r.error ?? undefined,
    createdAt: new Date(r.created_at),
    updatedAt: new Date(r.updated_at),
  };
}

/**
 * SQLite implementation of ingestion job repository
 */
export class IngestionJobRepository implements IIngestionJobRepository {
  constructor(private db: Database.Database) {}

  saveJob(job: IngestionJob): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO ingestion_jobs (handle, index_id, source, filename, status, video_id, error, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      job.handle,
      job.indexId,
      job.source,
      job.filename,
      job.status,
      job.videoId ?? null,
      job.error ?? null,
      job.createdAt.toISOString(),
      job.updatedAt.toISOString()
    );
  }

  getJob(handle: JobHandle): IngestionJob | null {
    const row = this.db.prepare('SELECT * FROM ingestion_jobs WHERE handle = ?').get(handle);
    return row ? toJob(row) : null;
  }

  getAllJobs(): IngestionJob[] {
    return this.db.prepare('SELECT * FROM ingestion_jobs ORDER BY created_at DESC').all().map(toJob);
  }

  updateJobStatus(
    handle: JobHandle,
    status: JobStatus,
    details: { videoId?: string; error?: string } = {}
  ): void {
    this.db
      .prepare(
        `UPDATE ingestion_jobs
         SET status = ?, video_id = COALESCE(?, video_id), error = ?, updated_at = ?
         WHERE handle = ?`
      )
      .run(status, details.videoId ?? null, details.error ?? null, new Date().toISOString(), handle);
  }
}
