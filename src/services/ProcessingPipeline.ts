import { stat } from 'fs/promises';
import type { Stats } from 'fs';
import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import type { ProcessingConfig } from '../types/index.js';
import { FailureKind, FileState, UploadOutcome } from '../types/index.js';
import type { CandidateFile } from '../models/CandidateFile.js';
import { isTerminal, markArchived, markFailed, markRejected, transition } from '../models/CandidateFile.js';
import type { UploadResult } from '../models/Upload.js';
import { BoundedChannel } from '../lib/channel.js';
import {
  ArchiveMoveError,
  FatalRequestError,
  RetryExhaustedError,
  ValidationRejection,
  errorMessage,
  hasErrorCode,
} from '../lib/errors.js';
import { getLogger, createChildLogger } from '../lib/logger.js';
import type { Archiver } from './Archiver.js';
import type { DedupTracker } from './DedupTracker.js';
import type { ProcessingStats } from './ProcessingStats.js';

/** What the pipeline needs from the upload client */
export interface AssetUploader {
  upload(candidate: CandidateFile, shutdown?: AbortSignal): Promise<UploadResult>;
}

export interface ProcessingPipelineEvents {
  uploading: (candidate: CandidateFile) => void;
  outcome: (candidate: CandidateFile) => void;
}

export declare interface ProcessingPipeline {
  on<U extends keyof ProcessingPipelineEvents>(
    event: U,
    listener: ProcessingPipelineEvents[U]
  ): this;
  emit<U extends keyof ProcessingPipelineEvents>(
    event: U,
    ...args: Parameters<ProcessingPipelineEvents[U]>
  ): boolean;
}

/**
 * Fixed-size worker pool draining a bounded channel of stable candidates.
 * Each candidate is validated, uploaded and archived, and always ends in
 * archived, rejected or failed with its dedup slot released.
 */
export class ProcessingPipeline extends EventEmitter {
  private config: ProcessingConfig;
  private uploader: AssetUploader;
  private archiver: Archiver;
  private tracker: DedupTracker;
  private stats: ProcessingStats;
  private logger = getLogger();

  private channel: BoundedChannel<CandidateFile> | null = null;
  private workers: Promise<void>[] = [];
  private shutdown = new AbortController();
  private active: Set<CandidateFile> = new Set();

  constructor(
    config: ProcessingConfig,
    uploader: AssetUploader,
    archiver: Archiver,
    tracker: DedupTracker,
    stats: ProcessingStats
  ) {
    super();
    this.config = config;
    this.uploader = uploader;
    this.archiver = archiver;
    this.tracker = tracker;
    this.stats = stats;
  }

  /**
   * Launch the workers
   */
  start(): void {
    if (this.channel) {
      throw new Error('Processing pipeline is already running');
    }

    this.channel = new BoundedChannel<CandidateFile>(this.config.queueCapacity);
    this.shutdown = new AbortController();

    for (let id = 0; id < this.config.maxConcurrency; id++) {
      this.workers.push(this.runWorker(id));
    }

    this.logger.info(
      { workers: this.config.maxConcurrency, queueCapacity: this.config.queueCapacity },
      'Processing pipeline started'
    );
  }

  /**
   * Queue a stable candidate whose dedup slot the caller holds. Waits while
   * the queue is full. When the pipeline is stopped the slot is released and
   * false is returned.
   */
  async submit(candidate: CandidateFile): Promise<boolean> {
    const accepted = this.channel ? await this.channel.send(candidate) : false;

    if (!accepted) {
      this.tracker.release(candidate.path);
      this.logger.warn({ filePath: candidate.path }, 'Pipeline is not accepting files, dropping candidate');
      return false;
    }

    this.stats.increment('discovered');
    this.logger.debug({ filePath: candidate.path, queued: this.channel?.size }, 'Added file to processing queue');
    return true;
  }

  /**
   * Stop taking work, let files already being processed finish their
   * current upload attempt and archive move, then resolve.
   */
  async stop(): Promise<void> {
    if (!this.channel) {
      return;
    }

    this.logger.info({ active: this.active.size }, 'Stopping processing pipeline');
    this.shutdown.abort();

    const dropped = this.channel.close();
    for (const candidate of dropped) {
      this.tracker.release(candidate.path);
      this.logger.info({ filePath: candidate.path }, 'Shutdown before processing started, file left in place');
    }

    await Promise.all(this.workers);
    this.workers = [];
    this.channel = null;

    this.logger.info(this.stats.summary());
  }

  getActiveCount(): number {
    return this.active.size;
  }

  getQueuedCount(): number {
    return this.channel?.size ?? 0;
  }

  /**
   * Take one candidate from stable to a terminal state. Never throws.
   */
  async processCandidate(candidate: CandidateFile): Promise<void> {
    const logger = createChildLogger({ filePath: candidate.path, relativePath: candidate.relativePath });
    this.active.add(candidate);

    try {
      await this.runSteps(candidate, logger);
    } catch (error) {
      if (!isTerminal(candidate.state)) {
        const cause = error instanceof Error ? error : new Error(errorMessage(error));
        this.fail(candidate, FailureKind.UNEXPECTED, cause, logger);
      } else {
        logger.error({ error }, 'Error after file reached a terminal state');
      }
    } finally {
      this.active.delete(candidate);
    }
  }

  private async runWorker(id: number): Promise<void> {
    const logger = this.logger.child({ worker: id });
    logger.debug('Worker started');

    for (;;) {
      const candidate = this.channel ? await this.channel.receive() : undefined;
      if (candidate === undefined) {
        break;
      }
      await this.processCandidate(candidate);
    }

    logger.debug('Worker stopped');
  }

  private async runSteps(candidate: CandidateFile, logger: Logger): Promise<void> {
    logger.info('Processing file');

    // Step 1: validation
    const rejection = await this.validate(candidate);
    if (rejection) {
      this.reject(candidate, rejection, logger);
      return;
    }
    transition(candidate, FileState.VALIDATED);

    // Step 2: upload
    transition(candidate, FileState.UPLOADING);
    this.emit('uploading', candidate);
    const result = await this.uploader.upload(candidate, this.shutdown.signal);

    switch (result.outcome) {
      case UploadOutcome.SUCCESS:
        this.stats.increment('uploaded');
        logger.info({ assetId: result.assetId, attempts: result.attempts }, 'Upload successful');
        break;

      case UploadOutcome.DUPLICATE:
        this.stats.increment('duplicates');
        logger.info({ assetId: result.assetId, attempts: result.attempts }, 'Server already has this asset');
        break;

      case UploadOutcome.RETRYABLE_FAILURE: {
        const kind = this.shutdown.signal.aborted ? FailureKind.SHUTDOWN : FailureKind.RETRY_EXHAUSTED;
        const error = new RetryExhaustedError(`${result.reason} (after ${result.attempts} attempts)`, result.attempts);
        this.fail(candidate, kind, error, logger);
        return;
      }

      case UploadOutcome.FATAL_FAILURE:
        this.fail(candidate, FailureKind.FATAL_REQUEST, new FatalRequestError(result.reason, result.status), logger);
        return;
    }
    transition(candidate, FileState.UPLOADED);

    // Step 3: archive
    try {
      const destination = await this.archiver.archive(candidate);
      markArchived(candidate, destination);
    } catch (error) {
      if (error instanceof ArchiveMoveError) {
        this.fail(candidate, FailureKind.ARCHIVE_MOVE_FAILURE, error, logger);
        return;
      }
      throw error;
    }

    this.stats.increment('archived');
    this.tracker.release(candidate.path);
    logger.info({ archivePath: candidate.archivePath }, 'File archived');
    this.emit('outcome', candidate);
  }

  /**
   * @returns Why the file cannot be uploaded, or null if it can
   */
  private async validate(candidate: CandidateFile): Promise<ValidationRejection | null> {
    let stats: Stats;
    try {
      stats = await stat(candidate.path);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
        return new ValidationRejection('File no longer exists');
      }
      throw error;
    }

    if (!stats.isFile()) {
      return new ValidationRejection('Path is not a regular file');
    }

    candidate.size = stats.size;
    candidate.modifiedAt = stats.mtime;
    // birthtime is 0 on filesystems that do not record it
    candidate.createdAt = stats.birthtimeMs > 0 ? stats.birthtime : stats.mtime;

    if (stats.size === 0) {
      return new ValidationRejection('File is empty');
    }

    if (stats.size > this.config.maxFileSizeBytes) {
      return new ValidationRejection(
        `File too large (${stats.size} bytes, limit ${this.config.maxFileSizeBytes} bytes)`
      );
    }

    return null;
  }

  private reject(candidate: CandidateFile, rejection: ValidationRejection, logger: Logger): void {
    markRejected(candidate, rejection.message);
    this.stats.increment('rejected');
    this.tracker.release(candidate.path);
    logger.warn({ reason: rejection.message }, 'File rejected, left in place');
    this.emit('outcome', candidate);
  }

  private fail(candidate: CandidateFile, kind: FailureKind, error: Error, logger: Logger): void {
    markFailed(candidate, kind, error.message);
    this.stats.increment('failed');
    this.tracker.release(candidate.path);
    logger.error({ kind, error }, 'File processing failed, left in place');
    this.emit('outcome', candidate);
  }
}
