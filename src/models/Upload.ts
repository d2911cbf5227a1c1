import { UploadOutcome } from '../types/index.js';

export interface UploadRequest {
  /** Local file path */
  path: string;

  /** File name sent with the multipart part */
  fileName: string;

  /** MIME type */
  contentType: string;

  /** Stable per physical file, derived from path and mtime */
  deviceAssetId: string;

  /** Constant per installation */
  deviceId: string;

  /** ISO-8601 */
  fileCreatedAt: string;

  /** ISO-8601 */
  fileModifiedAt: string;
}

export type UploadResult =
  | { outcome: UploadOutcome.SUCCESS; assetId: string | null; attempts: number }
  | { outcome: UploadOutcome.DUPLICATE; assetId: string | null; attempts: number }
  | { outcome: UploadOutcome.RETRYABLE_FAILURE; reason: string; status?: number; attempts: number }
  | { outcome: UploadOutcome.FATAL_FAILURE; reason: string; status?: number; attempts: number };

/** Result of a single HTTP attempt, before retry bookkeeping */
export type AttemptResult =
  | { outcome: UploadOutcome.SUCCESS; assetId: string | null }
  | { outcome: UploadOutcome.DUPLICATE; assetId: string | null }
  | { outcome: UploadOutcome.RETRYABLE_FAILURE; reason: string; status?: number }
  | { outcome: UploadOutcome.FATAL_FAILURE; reason: string; status?: number };

export function withAttempts(result: AttemptResult, attempts: number): UploadResult {
  return { ...result, attempts };
}
