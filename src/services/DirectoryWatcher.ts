import { access, stat } from 'fs/promises';
import { constants } from 'fs';
import { relative, resolve } from 'path';
import { EventEmitter } from 'events';
import type { MonitoringConfig } from '../types/index.js';
import { StabilityResult, isHiddenOrTemporary, isSupportedFile } from '../types/index.js';
import type { CandidateFile } from '../models/CandidateFile.js';
import { createCandidateFile } from '../models/CandidateFile.js';
import type { ChangeEvent, ChangeSource } from './ChangeSource.js';
import { ChokidarChangeSource } from './ChangeSource.js';
import type { DedupTracker } from './DedupTracker.js';
import type { StabilityDetector } from './StabilityDetector.js';
import { ProcessFatalError, TransientIOError, errorMessage, hasErrorCode } from '../lib/errors.js';
import { findWatchRoot, isInsideDirectory } from '../lib/paths.js';
import { getLogger, createChildLogger } from '../lib/logger.js';

export type CandidateHandler = (candidate: CandidateFile) => void | Promise<void>;

export type RejectReason = 'archive' | 'extension' | 'outside_roots' | 'hidden' | 'in_flight';

export interface DirectoryWatcherEvents {
  candidate: (candidate: CandidateFile) => void;
  warning: (error: TransientIOError) => void;
  rejected: (path: string, reason: RejectReason) => void;
}

export declare interface DirectoryWatcher {
  on<U extends keyof DirectoryWatcherEvents>(
    event: U,
    listener: DirectoryWatcherEvents[U]
  ): this;
  emit<U extends keyof DirectoryWatcherEvents>(
    event: U,
    ...args: Parameters<DirectoryWatcherEvents[U]>
  ): boolean;
}

export class DirectoryWatcher extends EventEmitter {
  private config: MonitoringConfig;
  private tracker: DedupTracker;
  private detector: StabilityDetector;
  private source: ChangeSource;
  private logger = getLogger();

  private roots: string[] = [];
  private running = false;
  private onCandidate: CandidateHandler | null = null;
  private abortController = new AbortController();
  private stabilityTasks: Set<Promise<void>> = new Set();

  constructor(
    config: MonitoringConfig,
    tracker: DedupTracker,
    detector: StabilityDetector,
    source?: ChangeSource
  ) {
    super();
    this.config = config;
    this.tracker = tracker;
    this.detector = detector;
    this.source = source ?? new ChokidarChangeSource({
      archiveDirectory: config.archiveDirectory,
      usePolling: config.usePolling,
      ignoreInitial: config.ignoreInitial,
    });
  }

  /**
   * Start watching. Roots that cannot be read are skipped with a warning;
   * if none is left a ProcessFatalError is thrown.
   */
  async start(directories: string[], recursive: boolean, onCandidate: CandidateHandler): Promise<void> {
    if (this.running) {
      throw new Error('Directory watcher is already running');
    }

    this.logger.info({ directories, recursive }, 'Starting directory watcher');

    const roots: string[] = [];
    for (const directory of directories) {
      const root = resolve(directory);
      const problem = await this.checkRoot(root);
      if (problem) {
        this.warn(problem, root);
        continue;
      }
      roots.push(root);
    }

    if (roots.length === 0) {
      throw new ProcessFatalError(`None of the watch directories can be observed: ${directories.join(', ')}`);
    }

    this.roots = roots;
    this.onCandidate = onCandidate;
    this.abortController = new AbortController();
    this.running = true;

    this.source.subscribe(roots, recursive, (event) => this.handleEvent(event));

    this.logger.info({ roots }, 'Directory watcher started');
  }

  /**
   * Stop accepting events, cancel pending stability checks and wait for them
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.logger.info('Stopping directory watcher');
    this.running = false;
    this.abortController.abort();

    await this.source.close();
    await Promise.all(this.stabilityTasks);

    this.logger.info('Directory watcher stopped');
  }

  get watchedRoots(): readonly string[] {
    return this.roots;
  }

  get pendingStabilityChecks(): number {
    return this.stabilityTasks.size;
  }

  /**
   * Apply the filter chain to a path, acquiring its dedup slot if it passes
   * @returns The watch root of the path, or the reason it was rejected
   */
  accept(path: string): { root: string } | { reason: RejectReason } {
    if (isInsideDirectory(this.config.archiveDirectory, path)) {
      return { reason: 'archive' };
    }

    if (!isSupportedFile(path, this.config.supportedExtensions)) {
      return { reason: 'extension' };
    }

    const root = findWatchRoot(this.roots, path);
    if (root === null) {
      return { reason: 'outside_roots' };
    }

    if (isHiddenOrTemporary(relative(root, path))) {
      return { reason: 'hidden' };
    }

    if (!this.tracker.tryAcquire(path)) {
      return { reason: 'in_flight' };
    }

    return { root };
  }

  private handleEvent(event: ChangeEvent): void {
    if (!this.running) {
      return;
    }

    switch (event.type) {
      case 'add':
      case 'change':
        this.handlePath(resolve(event.path));
        break;

      case 'unlinkDir':
        if (this.roots.includes(resolve(event.path))) {
          this.warn('Watch directory disappeared; other directories are still monitored', resolve(event.path));
        }
        break;

      case 'error':
        this.warn(`Watch error: ${event.error.message}`, undefined, event.error);
        break;
    }
  }

  private handlePath(path: string): void {
    const verdict = this.accept(path);

    if ('reason' in verdict) {
      this.logger.debug({ filePath: path, reason: verdict.reason }, 'Ignoring path');
      this.emit('rejected', path, verdict.reason);
      return;
    }

    const candidate = createCandidateFile(path, verdict.root);
    const task: Promise<void> = this.stabilize(candidate).finally(() => {
      this.stabilityTasks.delete(task);
    });
    this.stabilityTasks.add(task);
  }

  /**
   * Repeat stability rounds until the file settles or disappears. Resolves
   * once the candidate has been handed over or its slot released.
   */
  private async stabilize(candidate: CandidateFile): Promise<void> {
    const logger = createChildLogger({ filePath: candidate.path });
    logger.debug('File detected');

    try {
      for (;;) {
        const result = await this.detector.check(candidate, this.abortController.signal);

        if (!this.running) {
          this.tracker.release(candidate.path);
          return;
        }

        if (result === StabilityResult.GONE) {
          logger.debug('File disappeared while waiting for it to settle');
          this.tracker.release(candidate.path);
          return;
        }

        if (result === StabilityResult.STILL_CHANGING) {
          logger.info({ samples: candidate.sizeSamples.length }, 'File is still being written, starting another round');
          continue;
        }

        logger.info({ relativePath: candidate.relativePath }, 'File ready for processing');
        this.emit('candidate', candidate);
        if (this.onCandidate) {
          await this.onCandidate(candidate);
        }
        return;
      }
    } catch (error) {
      this.tracker.release(candidate.path);
      this.warn(`Stability check failed: ${errorMessage(error)}`, candidate.path, error);
    }
  }

  private async checkRoot(root: string): Promise<string | null> {
    try {
      const stats = await stat(root);
      if (!stats.isDirectory()) {
        return 'Watch path is not a directory';
      }
      await access(root, constants.R_OK);
      return null;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return 'Watch directory does not exist';
      }
      if (hasErrorCode(error, 'EACCES', 'EPERM')) {
        return 'Watch directory is not readable';
      }
      return `Cannot access watch directory: ${errorMessage(error)}`;
    }
  }

  private warn(message: string, path?: string, cause?: unknown): void {
    const warning = new TransientIOError(message, path, cause);
    this.logger.warn({ path, error: cause }, message);
    this.emit('warning', warning);
  }
}
