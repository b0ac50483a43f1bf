/**
 * Ingestion job domain types
 */

/** Normalized job status. `ready` and `failed` are the only server-side terminal states. */
export type JobStatus = 'pending' | 'processing' | 'ready' | 'failed';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['ready', 'failed'];

/** Opaque identifier assigned by the external processor at submission. */
export type JobHandle = string;

/**
 * Content already reachable by the processor: a local file it will receive
 * as an upload, or a public URL it fetches itself.
 */
export type ContentReference =
  | { indexId: string; filePath: string }
  | { indexId: string; videoUrl: string };

export interface JobStatusReport<TResult> {
  handle: JobHandle;
  status: JobStatus;
  /** Present only when status is `ready` */
  result?: TResult;
  /** Present only when status is `failed` */
  error?: string;
  /** Provider status before normalization */
  rawStatus: string;
}

export interface JobOutcome<TResult> {
  handle: JobHandle;
  status: 'ready';
  result: Readonly<TResult>;
  polls: number;
  elapsedMs: number;
}

export interface AwaitOptions<TResult> {
  pollIntervalMs?: number;
  maxWaitMs?: number;
  signal?: AbortSignal;
  onStatus?: (report: JobStatusReport<TResult>) => void;
}

/**
 * Persisted record of a submitted ingestion job
 */
export interface IngestionJob {
  handle: JobHandle;
  indexId: string;
  source: string;
  filename: string;
  status: JobStatus;
  videoId?: string;
  error?: string;
  createdAt: Date;
  updatedAt: Date;
}

export function describeSource(content: ContentReference): string {
  return 'filePath' in content ? content.filePath : content.videoUrl;
}
