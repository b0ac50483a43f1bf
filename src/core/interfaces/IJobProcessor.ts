import type { ContentReference, JobHandle, JobStatusReport } from '../entities/Job.js';

/**
 * External asynchronous processor: accepts work, reports its status
 */
export interface IJobProcessor<TResult> {
  /**
   * Throws SubmissionError when the processor rejects the content
   */
  submit(content: ContentReference): Promise<JobHandle>;

  /**
   * One status check. Throws TransientCommunicationError on network/5xx/429.
   */
  getStatus(handle: JobHandle): Promise<JobStatusReport<TResult>>;
}
