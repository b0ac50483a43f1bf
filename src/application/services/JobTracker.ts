import type {
  AwaitOptions,
  ContentReference,
  JobHandle,
  JobOutcome,
  JobStatus,
  JobStatusReport,
} from '../../core/entities/Job.js';
import { JobFailedError, TimeoutError, TransientCommunicationError } from '../../core/errors.js';
import type { IJobProcessor } from '../../core/interfaces/IJobProcessor.js';
import { systemClock, type Clock } from '../../utils/clock.js';
import { silentLogger, type Logger } from '../../utils/logger.js';

export interface JobTrackerConfig {
  pollIntervalMs: number;
  maxWaitMs: number;
  /** Consecutive transient poll failures tolerated before escalating */
  transientRetryLimit: number;
}

/**
 * Submits work to an external processor and waits for it to finish.
 *
 * Every `awaitCompletion` call owns its own polling loop, so concurrent waits
 * (even on the same handle) never share state. Abandoning a wait, by timeout
 * or by aborting its signal, leaves the remote job running.
 */
export class JobTracker<TResult> {
  constructor(
    private processor: IJobProcessor<TResult>,
    private config: JobTrackerConfig,
    private clock: Clock = systemClock,
    private logger: Logger = silentLogger
  ) {}

  /**
   * Submission errors surface immediately; a submit is never repeated.
   */
  async submit(content: ContentReference): Promise<JobHandle> {
    const handle = await this.processor.submit(content);
    this.logger.info(`Submitted job ${handle}`);
    return handle;
  }

  /**
   * Poll at a fixed interval until the job is ready (resolves), failed
   * (JobFailedError), or the next sleep would pass `maxWaitMs` (TimeoutError,
   * or the transient error itself when the final check failed).
   */
  async awaitCompletion(
    handle: JobHandle,
    options: AwaitOptions<TResult> = {}
  ): Promise<JobOutcome<TResult>> {
    const pollIntervalMs = options.pollIntervalMs ?? this.config.pollIntervalMs;
    const maxWaitMs = options.maxWaitMs ?? this.config.maxWaitMs;
    const { signal, onStatus } = options;

    const startedAt = this.clock.now();
    let polls = 0;
    let consecutiveFailures = 0;
    let lastFailure: TransientCommunicationError | null = null;
    let lastStatus: JobStatus = 'pending';

    for (;;) {
      signal?.throwIfAborted();

      let report: JobStatusReport<TResult> | null = null;
      polls++;
      try {
        report = await this.processor.getStatus(handle);
        consecutiveFailures = 0;
        lastFailure = null;
      } catch (error) {
        if (!(error instanceof TransientCommunicationError)) {
          throw error;
        }
        consecutiveFailures++;
        lastFailure = error;
        if (consecutiveFailures >= this.config.transientRetryLimit) {
          throw new TransientCommunicationError(
            `Status check for job ${handle} failed ${consecutiveFailures} times in a row: ${error.message}`,
            consecutiveFailures,
            { cause: error }
          );
        }
        this.logger.warn(
          `Status check for job ${handle} failed (${consecutiveFailures}/${this.config.transientRetryLimit}): ${error.message}`
        );
      }

      if (report) {
        if (report.status !== lastStatus) {
          this.logger.debug(`Job ${handle}: ${lastStatus} -> ${report.status} (${report.rawStatus})`);
        }
        lastStatus = report.status;
        onStatus?.(report);

        if (report.status === 'ready') {
          if (report.result === undefined) {
            throw new JobFailedError(handle, 'Processor reported ready without a result');
          }
          return {
            handle,
            status: 'ready',
            result: Object.freeze(report.result),
            polls,
            elapsedMs: this.clock.now() - startedAt,
          };
        }

        if (report.status === 'failed') {
          throw new JobFailedError(handle, report.error ?? `Processor reported status ${report.rawStatus}`);
        }
      }

      const elapsedMs = this.clock.now() - startedAt;
      if (elapsedMs + pollIntervalMs > maxWaitMs) {
        // the last check never reached the processor, so its status is unknown
        if (lastFailure) {
          throw lastFailure;
        }
        throw new TimeoutError(handle, lastStatus, elapsedMs, polls);
      }

      await this.clock.sleep(pollIntervalMs, signal);
    }
  }
}
