import notifier from 'node-notifier';
import type { NotificationConfig } from '../types/index.js';
import { FileState } from '../types/index.js';
import { errorMessage } from '../lib/errors.js';
import { getLogger } from '../lib/logger.js';
import type { ProcessingPipeline } from './ProcessingPipeline.js';

const TITLE = 'Media Drop Uploader';

export type NotificationSender = (title: string, message: string) => Promise<void>;

/**
 * Show a desktop notification through the platform notifier
 */
export function desktopNotification(title: string, message: string): Promise<void> {
  return new Promise((resolve, reject) => {
    notifier.notify({ title, message }, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

/**
 * Desktop notifications for upload activity. The first upload of a session
 * announces itself; archived files are then counted and reported in one
 * summary once the batch fills or the batch timeout passes.
 */
export class Notifier {
  private config: NotificationConfig;
  private sender: NotificationSender;
  private logger = getLogger();

  private pending = 0;
  private sessionStarted = false;
  private timer: NodeJS.Timeout | null = null;
  private sending: Set<Promise<void>> = new Set();

  constructor(config: NotificationConfig, sender: NotificationSender = desktopNotification) {
    this.config = config;
    this.sender = sender;
  }

  /**
   * Follow a pipeline's upload starts and archived files
   */
  attach(pipeline: ProcessingPipeline): void {
    if (!this.config.enabled) {
      return;
    }

    pipeline.on('uploading', () => this.notifyUploadStart());
    pipeline.on('outcome', (candidate) => {
      if (candidate.state === FileState.ARCHIVED) {
        this.notifyUploaded();
      }
    });
  }

  notifyUploadStart(): void {
    if (!this.config.enabled || this.sessionStarted) {
      return;
    }
    this.sessionStarted = true;
    this.send('Uploading assets...');
  }

  notifyUploaded(): void {
    if (!this.config.enabled) {
      return;
    }

    this.pending++;
    if (this.pending >= this.config.batchSize) {
      this.sendSummary();
      return;
    }

    if (!this.timer) {
      this.timer = setTimeout(() => this.sendSummary(), this.config.batchTimeoutSeconds * 1000);
      this.timer.unref();
    }
  }

  getPendingCount(): number {
    return this.pending;
  }

  /**
   * Report anything still pending and wait for notifications in flight
   */
  async flush(): Promise<void> {
    this.sendSummary();
    await Promise.all([...this.sending]);
  }

  private sendSummary(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.pending === 0) {
      return;
    }

    const count = this.pending;
    this.pending = 0;
    // The next upload after a summary starts a new session
    this.sessionStarted = false;
    this.send(count === 1 ? '1 file uploaded' : `${count} files uploaded`);
  }

  private send(message: string): void {
    const sent = this.sender(TITLE, message)
      .then(() => {
        this.logger.debug({ message }, 'Sent notification');
      })
      .catch((error: unknown) => {
        this.logger.debug({ message, reason: errorMessage(error) }, 'Failed to send notification');
      })
      .finally(() => {
        this.sending.delete(sent);
      });
    this.sending.add(sent);
  }
}
