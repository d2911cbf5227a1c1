import { openAsBlob } from 'fs';
import { basename } from 'path';
import { lookup } from 'mime-types';
import type { ServerConfig } from '../types/index.js';
import { UploadOutcome } from '../types/index.js';
import type { CandidateFile } from '../models/CandidateFile.js';
import type { AttemptResult, UploadRequest, UploadResult } from '../models/Upload.js';
import { withAttempts } from '../models/Upload.js';
import { deriveDeviceAssetId } from '../lib/checksum.js';
import { backoffDelay, classifyError, classifyResponse, nextStep, sleep as defaultSleep } from '../lib/retry.js';
import { errorMessage } from '../lib/errors.js';
import { getLogger, createChildLogger } from '../lib/logger.js';

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Base backoff in ms */
  retryDelay: number;
}

export interface UploadClientOptions {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

const USER_AGENT = 'media-drop-uploader/1.0';

export class UploadClient {
  private config: ServerConfig;
  private retry: RetryPolicy;
  private fetchImpl: typeof fetch;
  private sleep: (ms: number) => Promise<void>;
  private logger = getLogger();

  constructor(config: ServerConfig, retry: RetryPolicy, options: UploadClientOptions = {}) {
    this.config = config;
    this.retry = retry;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;

    this.logger.info({ serverUrl: config.url, deviceId: config.deviceId }, 'UploadClient initialized');
  }

  /**
   * Upload a validated candidate, retrying transient failures with
   * exponential backoff.
   * @param shutdown Once aborted, no new retry round is started; the attempt
   * already in flight is left to finish
   */
  async upload(candidate: CandidateFile, shutdown?: AbortSignal): Promise<UploadResult> {
    const logger = createChildLogger({ filePath: candidate.path });

    if (candidate.modifiedAt === null) {
      return { outcome: UploadOutcome.FATAL_FAILURE, reason: 'File was not validated before upload', attempts: 0 };
    }

    const request = this.buildRequest(candidate, candidate.modifiedAt, candidate.createdAt ?? candidate.modifiedAt);

    // Backed by the file on disk; the bytes are read while the request streams
    let asset: Blob;
    try {
      asset = await openAsBlob(candidate.path, { type: request.contentType });
    } catch (error) {
      return { outcome: UploadOutcome.FATAL_FAILURE, reason: `Cannot read file: ${errorMessage(error)}`, attempts: 0 };
    }

    const maxAttempts = this.retry.maxRetries + 1;
    logger.info(
      { contentType: request.contentType, size: asset.size, deviceAssetId: request.deviceAssetId },
      'Starting upload'
    );

    for (let attempt = 1; ; attempt++) {
      const result = await this.attempt(request, asset);
      const decision = nextStep(result.outcome, {
        attempt,
        maxAttempts,
        shuttingDown: shutdown?.aborted ?? false,
      });

      if (result.outcome !== UploadOutcome.RETRYABLE_FAILURE) {
        return withAttempts(result, attempt);
      }

      if (decision !== 'retry') {
        logger.error({ attempt, maxAttempts, reason: result.reason }, 'Upload failed, giving up');
        return withAttempts(result, attempt);
      }

      const delay = backoffDelay(attempt, this.retry.retryDelay);
      logger.warn({ attempt, maxAttempts, delay, reason: result.reason }, 'Upload attempt failed, retrying after delay');
      await this.sleep(delay);

      if (shutdown?.aborted) {
        logger.warn({ attempt }, 'Shutdown requested, not starting another upload attempt');
        return withAttempts(result, attempt);
      }
    }
  }

  /**
   * Check that the server is reachable and accepts the API key
   */
  async ping(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.config.url}/server/ping`, {
        headers: this.headers(),
        signal: AbortSignal.timeout(10000),
      });

      if (!response.ok) {
        this.logger.warn({ status: response.status }, 'Server ping failed');
        return false;
      }

      this.logger.info('Connected to server');
      return true;
    } catch (error) {
      this.logger.warn({ error }, 'Server is not reachable');
      return false;
    }
  }

  buildRequest(candidate: CandidateFile, modifiedAt: Date, createdAt: Date): UploadRequest {
    return {
      path: candidate.path,
      fileName: basename(candidate.path),
      contentType: this.detectContentType(candidate.path),
      deviceAssetId: deriveDeviceAssetId(candidate.path, modifiedAt),
      deviceId: this.config.deviceId,
      fileCreatedAt: createdAt.toISOString(),
      fileModifiedAt: modifiedAt.toISOString(),
    };
  }

  private async attempt(request: UploadRequest, asset: Blob): Promise<AttemptResult> {
    const form = new FormData();
    form.append('assetData', asset, request.fileName);
    form.append('deviceAssetId', request.deviceAssetId);
    form.append('deviceId', request.deviceId);
    form.append('fileCreatedAt', request.fileCreatedAt);
    form.append('fileModifiedAt', request.fileModifiedAt);
    form.append('isFavorite', 'false');

    try {
      const response = await this.fetchImpl(`${this.config.url}/assets`, {
        method: 'POST',
        headers: this.headers(),
        body: form,
        signal: AbortSignal.timeout(this.config.requestTimeout),
      });

      const body = await this.readBody(response);
      return classifyResponse(response.status, body);
    } catch (error) {
      return classifyError(error);
    }
  }

  private async readBody(response: Response): Promise<unknown> {
    const text = await response.text();
    if (text === '') {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      return text;
    }
  }

  private headers(): Record<string, string> {
    return {
      'x-api-key': this.config.apiKey,
      'Accept': 'application/json',
      'User-Agent': USER_AGENT,
    };
  }

  /**
   * Detect content type from file path
   * @param filePath File path
   * @returns MIME type
   */
  private detectContentType(filePath: string): string {
    const mimeType = lookup(filePath);
    return mimeType || 'application/octet-stream';
  }
}
