import { ZodError } from 'zod';
import {
  IndexNotFoundError,
  JobFailedError,
  ProviderRequestError,
  SubmissionError,
  TimeoutError,
  TransientCommunicationError,
  UnknownJobError,
} from '../../core/errors.js';

export interface ErrorResponse {
  status: number;
  body: {
    success: false;
    error: string;
    kind: string;
    handle?: string;
  };
}

/**
 * HTTP status and envelope for an error raised while serving a request
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  const fail = (status: number, kind: string, message: string, handle?: string): ErrorResponse => ({
    status,
    body: { success: false, error: message, kind, ...(handle ? { handle } : {}) },
  });

  if (error instanceof ZodError) {
    return fail(400, 'validation', error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join('; '));
  }
  if (error instanceof SyntaxError) {
    return fail(400, 'validation', 'Malformed JSON body');
  }
  if (error instanceof IndexNotFoundError) {
    return fail(409, 'no_index', error.message);
  }
  if (error instanceof UnknownJobError) {
    return fail(404, 'not_found', error.message, error.handle);
  }
  if (error instanceof SubmissionError) {
    return fail(422, 'submission_rejected', error.message);
  }
  if (error instanceof TransientCommunicationError) {
    return fail(503, 'try_again', error.message);
  }
  if (error instanceof TimeoutError) {
    return fail(504, 'check_back_later', error.message, error.handle);
  }
  if (error instanceof JobFailedError) {
    return fail(502, 'failed_permanently', error.message, error.handle);
  }
  if (error instanceof ProviderRequestError) {
    return fail(502, 'provider_error', error.message);
  }
  return fail(500, 'internal', error instanceof Error ? error.message : 'Unknown error');
}
