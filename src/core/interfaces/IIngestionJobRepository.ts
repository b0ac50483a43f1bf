import type { IngestionJob, JobHandle, JobStatus } from '../entities/Job.js';

/**
 * Interface for ingestion job persistence
 */
export interface IIngestionJobRepository {
  saveJob(job: IngestionJob): void;

  getJob(handle: JobHandle): IngestionJob | null;

  getAllJobs(): IngestionJob[];

  updateJobStatus(
    handle: JobHandle,
    status: JobStatus,
    details?: { videoId?: string; error?: string }
  ): void;
}
