import { stat } from 'fs/promises';
import type { StabilityConfig } from '../types/index.js';
import { FileState, StabilityResult, isVideoFile } from '../types/index.js';
import type { CandidateFile } from '../models/CandidateFile.js';
import { recordSizeSample, transition } from '../models/CandidateFile.js';
import { hasErrorCode } from '../lib/errors.js';
import { sleep as defaultSleep } from '../lib/retry.js';
import { createChildLogger } from '../lib/logger.js';

/** Current size of a regular file, or null when it no longer exists */
export type SizeReader = (path: string) => Promise<number | null>;

export interface StabilityDetectorOptions {
  readSize?: SizeReader;
  sleep?: (ms: number) => Promise<void>;
}

export interface SamplingOptions {
  /** Called with every size observed, first sample included */
  onSample?: (size: number) => void;
  /** Stops sampling early; the result is then StillChanging */
  signal?: AbortSignal;
}

export const statFileSize: SizeReader = async (path) => {
  try {
    const stats = await stat(path);
    return stats.isFile() ? stats.size : null;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
};

export class StabilityDetector {
  private config: StabilityConfig;
  private readSize: SizeReader;
  private sleep: (ms: number) => Promise<void>;

  constructor(config: StabilityConfig, options: StabilityDetectorOptions = {}) {
    this.config = config;
    this.readSize = options.readSize ?? statFileSize;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Sample the size of `path` every `pollIntervalSeconds` for up to
   * `waitSeconds`. Two equal consecutive samples mean the file is stable.
   */
  async isStable(
    path: string,
    waitSeconds: number,
    pollIntervalSeconds: number,
    options: SamplingOptions = {}
  ): Promise<StabilityResult> {
    const first = await this.readSize(path);
    if (first === null) {
      return StabilityResult.GONE;
    }
    options.onSample?.(first);

    return this.sampleUntilSettled(path, first, waitSeconds, pollIntervalSeconds, options);
  }

  /**
   * Run one stability round for a candidate, recording its size samples.
   * Large videos get the extended window.
   */
  async check(candidate: CandidateFile, signal?: AbortSignal): Promise<StabilityResult> {
    const logger = createChildLogger({ filePath: candidate.path });
    transition(candidate, FileState.STABILIZING);

    const first = await this.readSize(candidate.path);
    if (first === null) {
      logger.debug('File disappeared before stability check');
      return StabilityResult.GONE;
    }
    recordSizeSample(candidate, first);

    const waitSeconds = this.windowFor(candidate.path, first);
    logger.debug({ size: first, waitSeconds }, 'Checking file stability');

    const result = await this.sampleUntilSettled(
      candidate.path,
      first,
      waitSeconds,
      this.config.pollIntervalSeconds,
      { onSample: (size) => recordSizeSample(candidate, size), signal }
    );

    if (result === StabilityResult.STABLE) {
      transition(candidate, FileState.STABLE);
    }

    logger.debug({ result, samples: candidate.sizeSamples.length }, 'Stability round finished');
    return result;
  }

  /**
   * Stability window in seconds for a file of the given size
   */
  windowFor(path: string, size: number): number {
    if (isVideoFile(path) && size >= this.config.minExtendedWaitSizeBytes) {
      return this.config.videoWaitSeconds;
    }
    return this.config.waitSeconds;
  }

  private async sampleUntilSettled(
    path: string,
    firstSize: number,
    waitSeconds: number,
    pollIntervalSeconds: number,
    options: SamplingOptions
  ): Promise<StabilityResult> {
    const rounds = Math.max(1, Math.floor(waitSeconds / pollIntervalSeconds + 1e-9));
    let previous = firstSize;

    for (let round = 0; round < rounds; round++) {
      await this.sleep(pollIntervalSeconds * 1000);

      if (options.signal?.aborted) {
        return StabilityResult.STILL_CHANGING;
      }

      const current = await this.readSize(path);
      if (current === null) {
        return StabilityResult.GONE;
      }
      options.onSample?.(current);

      if (current === previous) {
        return StabilityResult.STABLE;
      }
      previous = current;
    }

    return StabilityResult.STILL_CHANGING;
  }
}
