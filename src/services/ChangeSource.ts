import { watch, type FSWatcher, type WatchOptions } from 'chokidar';
import { isInsideDirectory } from '../lib/paths.js';
import { getLogger } from '../lib/logger.js';

export type ChangeEvent =
  | { type: 'add' | 'change'; path: string }
  | { type: 'unlinkDir'; path: string }
  | { type: 'error'; error: Error };

export type ChangeListener = (event: ChangeEvent) => void;

/**
 * Producer of filesystem change events. Events may be coalesced or dropped
 * by the underlying mechanism; consumers re-stat paths themselves.
 */
export interface ChangeSource {
  subscribe(roots: string[], recursive: boolean, listener: ChangeListener): void;
  close(): Promise<void>;
}

export interface ChokidarSourceOptions {
  /** Never reported, and not descended into */
  archiveDirectory: string;
  usePolling: boolean;
  ignoreInitial: boolean;
  /** Polling interval in ms when usePolling is set */
  pollInterval?: number;
}

/**
 * Change source backed by chokidar: native events by default, stat polling
 * for network shares and containers where events do not arrive.
 */
export class ChokidarChangeSource implements ChangeSource {
  private watcher: FSWatcher | null = null;
  private options: ChokidarSourceOptions;
  private logger = getLogger();

  constructor(options: ChokidarSourceOptions) {
    this.options = options;
  }

  subscribe(roots: string[], recursive: boolean, listener: ChangeListener): void {
    if (this.watcher) {
      throw new Error('Change source is already subscribed');
    }

    const watchOptions: WatchOptions = {
      ignored: (path: string) => isInsideDirectory(this.options.archiveDirectory, path),
      persistent: true,
      ignoreInitial: this.options.ignoreInitial,
      usePolling: this.options.usePolling,
      interval: this.options.pollInterval ?? 1000,
      binaryInterval: this.options.pollInterval ?? 1000,
      ignorePermissionErrors: false,
    };

    // depth 0 keeps chokidar to the files directly inside each root
    if (!recursive) {
      watchOptions.depth = 0;
    }

    this.watcher = watch(roots, watchOptions);

    this.watcher
      .on('add', (path) => listener({ type: 'add', path }))
      .on('change', (path) => listener({ type: 'change', path }))
      .on('unlinkDir', (path) => listener({ type: 'unlinkDir', path }))
      .on('error', (error) => listener({ type: 'error', error }))
      .on('ready', () => {
        this.logger.info({ roots, recursive, usePolling: this.options.usePolling }, 'Change source ready');
      });
  }

  async close(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
  }
}
