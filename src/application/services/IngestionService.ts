import path from 'path';
import {
  TERMINAL_STATUSES,
  describeSource,
  type ContentReference,
  type IngestionJob,
  type JobHandle,
  type JobStatus,
} from '../../core/entities/Job.js';
import type { CatalogVideo, IndexedVideo, VideoIndex } from '../../core/entities/Video.js';
import {
  JobFailedError,
  SubmissionError,
  TimeoutError,
  UnknownJobError,
  errorMessage,
} from '../../core/errors.js';
import type { ICatalogRepository } from '../../core/interfaces/ICatalogRepository.js';
import type { IIngestionJobRepository } from '../../core/interfaces/IIngestionJobRepository.js';
import type { IVideoSearchProvider } from '../../core/interfaces/IVideoSearchProvider.js';
import { listVideoFiles } from '../../utils/videoFiles.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { CostTracker } from './CostTracker.js';
import type { JobTracker } from './JobTracker.js';

export interface JobUpdate {
  handle: JobHandle;
  status: JobStatus;
  videoId?: string;
  error?: string;
}

export interface DirectoryIngestionSummary {
  ingested: CatalogVideo[];
  skipped: string[];
  failed: Array<{ filePath: string; error: string }>;
}

/**
 * Gets videos into the provider index and keeps the local catalog in step
 */
export class IngestionService {
  private jobUpdateCallbacks: Array<(update: JobUpdate) => void> = [];

  constructor(
    private provider: IVideoSearchProvider,
    private tracker: JobTracker<IndexedVideo>,
    private catalog: ICatalogRepository,
    private jobRepo: IIngestionJobRepository,
    private costs: CostTracker,
    private indexName: string,
    private logger: Logger = silentLogger
  ) {}

  /**
   * Attach job update callback
   */
  onJobUpdate(callback: (update: JobUpdate) => void): void {
    this.jobUpdateCallbacks.push(callback);
  }

  /**
   * Reuse the catalog's index, else one on the provider with the configured name, else create it
   */
  async ensureIndex(): Promise<VideoIndex> {
    const active = this.catalog.getActiveIndex();
    if (active) {
      return active;
    }

    this.logger.info(`Looking for existing index named '${this.indexName}'...`);
    const existing = (await this.provider.listIndexes()).find((index) => index.name === this.indexName);
    if (existing) {
      this.logger.info(`✅ Found existing index: ${existing.id}`);
      this.catalog.setActiveIndex(existing);
      return existing;
    }

    this.logger.info(`Creating new index '${this.indexName}'...`);
    const created = await this.provider.createIndex(this.indexName);
    this.logger.info(`✅ Index created: ${created.id}`);
    this.catalog.setActiveIndex(created);
    return created;
  }

  /**
   * Submit one video and record the job. Submission errors propagate untouched.
   */
  async startIngestion(source: { filePath: string } | { videoUrl: string }): Promise<IngestionJob> {
    const index = await this.ensureIndex();
    const content: ContentReference =
      'filePath' in source
        ? { indexId: index.id, filePath: path.resolve(source.filePath) }
        : { indexId: index.id, videoUrl: source.videoUrl };
    const filename = filenameOf(content);
    const handle = await this.tracker.submit(content);

    const now = new Date();
    const job: IngestionJob = {
      handle,
      indexId: index.id,
      source: describeSource(content),
      filename,
      status: 'pending',
      createdAt: now,
      updatedAt: now,
    };
    this.jobRepo.saveJob(job);
    this.notify({ handle, status: 'pending' });
    return job;
  }

  /**
   * Wait for a submitted job and catalog the video once ready.
   * JobFailedError and TimeoutError are recorded, then rethrown.
   */
  async trackIngestion(handle: JobHandle, options: { signal?: AbortSignal; maxWaitMs?: number } = {}): Promise<CatalogVideo> {
    const job = this.requireJob(handle);
    let lastStatus: JobStatus = job.status;

    try {
      const outcome = await this.tracker.awaitCompletion(handle, {
        signal: options.signal,
        maxWaitMs: options.maxWaitMs,
        onStatus: (report) => {
          if (report.status !== lastStatus && report.status !== 'ready' && report.status !== 'failed') {
            lastStatus = report.status;
            this.jobRepo.updateJobStatus(handle, report.status);
            this.notify({ handle, status: report.status });
          }
        },
      });
      return await this.recordReady(job, outcome.result);
    } catch (error) {
      if (error instanceof JobFailedError) {
        this.jobRepo.updateJobStatus(handle, 'failed', { error: error.detail });
        this.notify({ handle, status: 'failed', error: error.detail });
      } else if (error instanceof TimeoutError) {
        this.logger.warn(`${error.message}. Re-check it later with its handle.`);
      }
      throw error;
    }
  }

  /**
   * Submit and wait: the whole upload-and-wait flow for one video
   */
  async ingest(source: { filePath: string } | { videoUrl: string }): Promise<CatalogVideo> {
    const job = await this.startIngestion(source);
    this.logger.info(`Waiting for processing of ${job.filename} (task ${job.handle})...`);
    return this.trackIngestion(job.handle);
  }

  /**
   * Ingest every video file in `dir` one after another. A failed video is
   * recorded and skipped; the rest continue.
   */
  async ingestDirectory(dir: string, options: { force?: boolean } = {}): Promise<DirectoryIngestionSummary> {
    const files = listVideoFiles(dir);
    const summary: DirectoryIngestionSummary = { ingested: [], skipped: [], failed: [] };

    if (files.length === 0) {
      this.logger.warn(`No video files found in ${dir}`);
      return summary;
    }

    this.logger.info(`Found ${files.length} video files`);
    await this.ensureIndex();

    for (const filePath of files) {
      if (!options.force && this.catalog.findByFilePath(filePath)) {
        this.logger.info(`Skipping ${path.basename(filePath)}: already ingested`);
        summary.skipped.push(filePath);
        continue;
      }

      this.logger.info(`Processing ${path.basename(filePath)}...`);
      try {
        summary.ingested.push(await this.ingest({ filePath }));
      } catch (error) {
        this.logger.error(`❌ Skipping ${path.basename(filePath)}: ${errorMessage(error)}`);
        summary.failed.push({ filePath, error: errorMessage(error) });
      }
    }

    return summary;
  }

  /**
   * One follow-up status check for a job, e.g. after a local timeout.
   * Catalogs the video if it has become ready since. A failed check
   * (TransientCommunicationError) propagates.
   */
  async refreshJob(handle: JobHandle): Promise<IngestionJob> {
    const job = this.requireJob(handle);
    if (TERMINAL_STATUSES.includes(job.status)) {
      return job;
    }

    try {
      await this.trackIngestion(handle, { maxWaitMs: 0 });
    } catch (error) {
      if (!(error instanceof TimeoutError) && !(error instanceof JobFailedError)) {
        throw error;
      }
    }
    return this.requireJob(handle);
  }

  getActiveIndex(): VideoIndex | null {
    return this.catalog.getActiveIndex();
  }

  getJob(handle: JobHandle): IngestionJob | null {
    return this.jobRepo.getJob(handle);
  }

  listJobs(): IngestionJob[] {
    return this.jobRepo.getAllJobs();
  }

  listVideos(): CatalogVideo[] {
    return this.catalog.listVideos();
  }

  private async recordReady(job: IngestionJob, result: Readonly<IndexedVideo>): Promise<CatalogVideo> {
    const indexId = result.indexId ?? job.indexId;
    const details = await this.provider.getVideo(indexId, result.videoId).catch((error: unknown) => {
      this.logger.warn(`Could not read details of video ${result.videoId}: ${errorMessage(error)}`);
      return null;
    });

    // Another wait on the same handle may have recorded it during the await above
    const current = this.requireJob(job.handle);
    const recorded = current.status === 'ready' && current.videoId ? this.catalog.getVideo(current.videoId) : null;
    if (recorded) {
      return recorded;
    }

    const video: CatalogVideo = {
      videoId: result.videoId,
      indexId,
      taskHandle: job.handle,
      filename: job.filename,
      filePath: job.source,
      durationSec: details?.durationSec,
      ingestedAt: new Date(),
    };
    this.catalog.saveVideo(video);
    this.jobRepo.updateJobStatus(job.handle, 'ready', { videoId: video.videoId });
    this.notify({ handle: job.handle, status: 'ready', videoId: video.videoId });

    if (video.durationSec !== undefined) {
      this.costs.logVideoProcessing(video.durationSec / 60);
    }

    this.logger.info(`✅ Video processing completed. Video ID: ${video.videoId}`);
    return video;
  }

  private requireJob(handle: JobHandle): IngestionJob {
    const job = this.jobRepo.getJob(handle);
    if (!job) {
      throw new UnknownJobError(handle);
    }
    return job;
  }

  private notify(update: JobUpdate): void {
    for (const callback of this.jobUpdateCallbacks) {
      try {
        callback(update);
      } catch (error) {
        this.logger.error(`Job update listener failed: ${errorMessage(error)}`);
      }
    }
  }
}

function filenameOf(content: ContentReference): string {
  if ('filePath' in content) {
    return path.basename(content.filePath);
  }
  if (!URL.canParse(content.videoUrl)) {
    throw new SubmissionError(`Invalid video URL: ${content.videoUrl}`);
  }
  const { pathname } = new URL(content.videoUrl);
  return path.posix.basename(pathname) || content.videoUrl;
}
