/**
 * Retry bookkeeping for the upload client.
 *
 * Whether an attempt is retried is decided here from the attempt's
 * classification alone, so the whole policy can be exercised without I/O.
 */

import { UploadOutcome } from '../types/index.js';
import type { AttemptResult } from '../models/Upload.js';
import { errorMessage } from './errors.js';

export type RetryDecision = 'done' | 'retry' | 'give_up';

export interface RetryState {
  /** Attempts made so far, including the one just classified */
  attempt: number;
  maxAttempts: number;
  shuttingDown: boolean;
}

const RETRY_TABLE: Record<UploadOutcome, (state: RetryState) => RetryDecision> = {
  [UploadOutcome.SUCCESS]: () => 'done',
  [UploadOutcome.DUPLICATE]: () => 'done',
  [UploadOutcome.FATAL_FAILURE]: () => 'give_up',
  [UploadOutcome.RETRYABLE_FAILURE]: ({ attempt, maxAttempts, shuttingDown }) =>
    attempt < maxAttempts && !shuttingDown ? 'retry' : 'give_up',
};

export function nextStep(outcome: UploadOutcome, state: RetryState): RetryDecision {
  return RETRY_TABLE[outcome](state);
}

/**
 * Delay before the retry that follows `attempt`: base, 2x base, 4x base...
 */
export function backoffDelay(attempt: number, baseDelay: number): number {
  return baseDelay * Math.pow(2, Math.max(0, attempt - 1));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function readStringField(body: unknown, field: 'id' | 'status' | 'message'): string | null {
  if (typeof body !== 'object' || body === null || !(field in body)) {
    return null;
  }
  const value: unknown = Reflect.get(body, field);
  return typeof value === 'string' ? value : null;
}

/**
 * Classify an HTTP response from the asset endpoint
 * @param status HTTP status code
 * @param body Parsed JSON body, or the raw text when it was not JSON
 */
export function classifyResponse(status: number, body: unknown): AttemptResult {
  const assetId = readStringField(body, 'id');

  if (status >= 200 && status < 300) {
    if (readStringField(body, 'status') === 'duplicate') {
      return { outcome: UploadOutcome.DUPLICATE, assetId };
    }
    // Some server versions answer without an id; the upload still landed
    return { outcome: UploadOutcome.SUCCESS, assetId };
  }

  if (status === 409) {
    return { outcome: UploadOutcome.DUPLICATE, assetId };
  }

  const detail = readStringField(body, 'message') ?? (typeof body === 'string' && body !== '' ? body : null);
  const reason = detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}`;

  if (status === 413) {
    return { outcome: UploadOutcome.FATAL_FAILURE, reason: `Payload too large (${reason})`, status };
  }

  if (status === 408 || status === 429 || status >= 500) {
    return { outcome: UploadOutcome.RETRYABLE_FAILURE, reason, status };
  }

  return { outcome: UploadOutcome.FATAL_FAILURE, reason, status };
}

/**
 * Classify an exception thrown while sending the request.
 * Timeouts and connection failures are always retryable.
 */
export function classifyError(error: unknown): AttemptResult {
  const name = typeof error === 'object' && error !== null && 'name' in error ? error.name : null;
  if (name === 'TimeoutError' || name === 'AbortError') {
    return { outcome: UploadOutcome.RETRYABLE_FAILURE, reason: `Request timed out: ${errorMessage(error)}` };
  }
  return { outcome: UploadOutcome.RETRYABLE_FAILURE, reason: `Network error: ${errorMessage(error)}` };
}
