import fs from 'fs';
import path from 'path';
import fetch, { type RequestInit, type Response } from 'node-fetch';
import FormData from 'form-data';
import type { z } from 'zod';
import type { ContentReference, JobHandle, JobStatusReport } from '../../core/entities/Job.js';
import type { ProviderSearchRequest, SearchHit } from '../../core/entities/SearchResult.js';
import type { IndexedVideo, VideoDetails, VideoIndex } from '../../core/entities/Video.js';
import {
  ProviderRequestError,
  SubmissionError,
  TransientCommunicationError,
  errorMessage,
  isTransientError,
} from '../../core/errors.js';
import type { IVideoSearchProvider } from '../../core/interfaces/IVideoSearchProvider.js';
import { CircuitBreaker, CircuitOpenError, type CircuitStats } from '../../utils/retry.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import {
  CreatedSchema,
  ErrorBodySchema,
  IndexListSchema,
  SearchResponseSchema,
  TaskSchema,
  VideoSchema,
  flattenSearchResults,
  normalizeTaskStatus,
} from './responseMapping.js';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface TwelveLabsClientOptions {
  apiUrl: string;
  apiKey: string;
  requestTimeoutMs: number;
  circuitBreaker?: CircuitBreaker;
  fetchImpl?: FetchFn;
  logger?: Logger;
}

/** Models every new index is created with */
export const INDEX_MODELS = [
  { model_name: 'marengo2.7', model_options: ['visual', 'audio'] },
  { model_name: 'pegasus1.2', model_options: ['visual', 'audio'] },
];

type RequestKind = 'submit' | 'read';

/**
 * Twelve Labs v1.3 REST client.
 *
 * Failures are classified on the way out: 408/429/5xx, network errors and an
 * open circuit become TransientCommunicationError; other 4xx responses become
 * SubmissionError for submissions and ProviderRequestError otherwise. Nothing
 * is retried here; callers own their retry policy.
 */
export class TwelveLabsClient implements IVideoSearchProvider {
  private apiUrl: string;
  private apiKey: string;
  private requestTimeoutMs: number;
  private circuitBreaker: CircuitBreaker;
  private fetchImpl: FetchFn;
  private logger: Logger;

  constructor(options: TwelveLabsClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.circuitBreaker = options.circuitBreaker || new CircuitBreaker(5, 60000, isTransientError);
    this.fetchImpl = options.fetchImpl || fetch;
    this.logger = options.logger || silentLogger;
  }

  async listIndexes(): Promise<VideoIndex[]> {
    const body = await this.request('GET', '/indexes?page_limit=50', IndexListSchema);
    return body.data.map((index) => ({ id: index._id, name: index.index_name }));
  }

  async createIndex(name: string): Promise<VideoIndex> {
    const body = await this.request('POST', '/indexes', CreatedSchema, {
      json: { index_name: name, models: INDEX_MODELS },
      kind: 'submit',
    });
    return { id: body._id, name };
  }

  async submit(content: ContentReference): Promise<JobHandle> {
    const form = new FormData();
    form.append('index_id', content.indexId);
    if ('filePath' in content) {
      if (!fs.existsSync(content.filePath)) {
        throw new SubmissionError(`Video file not found: ${content.filePath}`);
      }
      form.append('video_file', fs.createReadStream(content.filePath), {
        filename: path.basename(content.filePath),
      });
    } else {
      form.append('video_url', content.videoUrl);
    }

    const body = await this.request('POST', '/tasks', CreatedSchema, { form, kind: 'submit' });
    this.logger.info(`Upload accepted, task ID ${body._id}`);
    return body._id;
  }

  async getStatus(handle: JobHandle): Promise<JobStatusReport<IndexedVideo>> {
    const task = await this.request('GET', `/tasks/${encodeURIComponent(handle)}`, TaskSchema);
    const status = normalizeTaskStatus(task.status);

    const report: JobStatusReport<IndexedVideo> = { handle, status, rawStatus: task.status };
    if (status === 'ready' && task.video_id) {
      report.result = { videoId: task.video_id, indexId: task.index_id };
    }
    if (status === 'failed') {
      report.error = task.error ?? task.message ?? `Indexing failed with status ${task.status}`;
    }
    return report;
  }

  async search(request: ProviderSearchRequest): Promise<SearchHit[]> {
    const form = new FormData();
    form.append('index_id', request.indexId);
    for (const option of request.searchOptions) {
      form.append('search_options', option);
    }

    const { query } = request;
    if (query.kind === 'text') {
      form.append('query_text', query.text);
    } else {
      form.append('query_media_type', 'image');
      if ('imageUrl' in query) {
        form.append('query_media_url', query.imageUrl);
      } else {
        form.append('query_media_file', query.image, { filename: query.filename });
      }
    }

    form.append('threshold', request.threshold);
    form.append('operator', 'or');
    form.append('page_limit', String(request.pageLimit));
    if (request.adjustConfidenceLevel !== undefined) {
      form.append('adjust_confidence_level', String(request.adjustConfidenceLevel));
    }
    if (request.groupByVideo) {
      form.append('group_by', 'video');
    }

    const body = await this.request('POST', '/search', SearchResponseSchema, { form });
    const hits = flattenSearchResults(body);
    this.logger.debug(`Search returned ${hits.length} hits`);
    return hits;
  }

  async getVideo(indexId: string, videoId: string): Promise<VideoDetails> {
    const video = await this.request(
      'GET',
      `/indexes/${encodeURIComponent(indexId)}/videos/${encodeURIComponent(videoId)}`,
      VideoSchema
    );
    return {
      videoId: video._id,
      filename: video.system_metadata?.filename ?? undefined,
      durationSec: video.system_metadata?.duration ?? undefined,
    };
  }

  getCircuitBreakerStats(): CircuitStats {
    return this.circuitBreaker.getStats();
  }

  private async request<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST',
    route: string,
    schema: S,
    options: { json?: unknown; form?: FormData; kind?: RequestKind } = {}
  ): Promise<z.output<S>> {
    const kind = options.kind ?? 'read';
    const url = `${this.apiUrl}${route}`;

    const headers: Record<string, string> = { 'x-api-key': this.apiKey };
    let body: RequestInit['body'];
    if (options.form) {
      Object.assign(headers, options.form.getHeaders());
      body = options.form;
    } else if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    this.logger.debug(`${method} ${url}`);

    let res: Response;
    try {
      res = await this.circuitBreaker.execute(async () => {
        let response: Response;
        try {
          response = await this.fetchImpl(url, { method, headers, body, timeout: this.requestTimeoutMs });
        } catch (error) {
          throw new TransientCommunicationError(`${method} ${route} failed: ${errorMessage(error)}`, 1, {
            cause: error,
          });
        }
        if (isTransientStatus(response.status)) {
          throw new TransientCommunicationError(
            `${method} ${route} returned HTTP ${response.status}: ${await readErrorMessage(response)}`
          );
        }
        return response;
      });
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        throw new TransientCommunicationError(error.message, 1, { cause: error });
      }
      throw error;
    }

    if (!res.ok) {
      const message = `${method} ${route} returned HTTP ${res.status}: ${await readErrorMessage(res)}`;
      throw kind === 'submit'
        ? new SubmissionError(message, res.status)
        : new ProviderRequestError(message, res.status);
    }

    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ProviderRequestError(
        `Unexpected response from ${method} ${route}: ${parsed.error.errors[0]?.message ?? 'invalid body'}`,
        res.status
      );
    }
    return parsed.data;
  }
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

async function readErrorMessage(res: Response): Promise<string> {
  const text = await res.text();
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return text || res.statusText;
  }
  const parsed = ErrorBodySchema.safeParse(body);
  if (parsed.success) {
    return parsed.data.code ? `${parsed.data.code}: ${parsed.data.message}` : parsed.data.message;
  }
  return text || res.statusText;
}
