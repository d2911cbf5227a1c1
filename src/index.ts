#!/usr/bin/env node
import { getConfig, describeConfig } from './config/config.js';
import { initLogger, getLogger } from './lib/logger.js';
import { ConfigError, ProcessFatalError } from './lib/errors.js';
import { DedupTracker } from './services/DedupTracker.js';
import { ProcessingStats } from './services/ProcessingStats.js';
import { StabilityDetector } from './services/StabilityDetector.js';
import { DirectoryWatcher } from './services/DirectoryWatcher.js';
import { UploadClient } from './services/UploadClient.js';
import { Archiver } from './services/Archiver.js';
import { ProcessingPipeline } from './services/ProcessingPipeline.js';
import { Notifier } from './services/Notifier.js';

let directoryWatcher: DirectoryWatcher | null = null;
let pipeline: ProcessingPipeline | null = null;
let notifier: Notifier | null = null;
let statsTimer: NodeJS.Timeout | null = null;
let shuttingDown = false;

async function main() {
  // Load configuration
  const config = getConfig();

  // Initialize logger
  initLogger(config.logging);
  const logger = getLogger();

  logger.info('Media drop uploader starting...');
  logger.info({ config: describeConfig(config) }, 'Configuration loaded');

  // Shared state, owned here for the lifetime of the process
  const tracker = new DedupTracker();
  const stats = new ProcessingStats();

  const uploadClient = new UploadClient(config.server, {
    maxRetries: config.processing.maxRetries,
    retryDelay: config.processing.retryDelay,
  });

  if (!(await uploadClient.ping())) {
    logger.warn({ serverUrl: config.server.url }, 'Server not reachable yet; uploads will be retried per file');
  }

  const archiver = new Archiver(config.monitoring.archiveDirectory);
  try {
    await archiver.prepare();
    logger.info({ archiveDirectory: config.monitoring.archiveDirectory }, 'Archive directory ready');
  } catch (error) {
    logger.warn({ error }, 'Archive directory is not ready; archiving will be retried per file');
  }

  pipeline = new ProcessingPipeline(config.processing, uploadClient, archiver, tracker, stats);
  notifier = new Notifier(config.notifications);
  notifier.attach(pipeline);
  pipeline.start();

  directoryWatcher = new DirectoryWatcher(
    config.monitoring,
    tracker,
    new StabilityDetector(config.stability)
  );

  const activePipeline = pipeline;
  await directoryWatcher.start(
    config.monitoring.watchDirectories,
    config.monitoring.recursive,
    async (candidate) => {
      await activePipeline.submit(candidate);
    }
  );

  if (config.processing.statsInterval > 0) {
    statsTimer = setInterval(() => {
      logger.info(stats.summary());
    }, config.processing.statsInterval * 1000);
  }

  logger.info('Media drop uploader running - watching for files...');
}

// Graceful shutdown
async function shutdown(signal: string) {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  const logger = getLogger();
  logger.info({ signal }, 'Shutting down gracefully...');

  try {
    if (statsTimer) {
      clearInterval(statsTimer);
    }

    // The watcher stops taking events first; the pipeline then refuses new
    // files, which also unblocks any stability task waiting on a full queue.
    await Promise.all([
      directoryWatcher?.stop(),
      pipeline?.stop(),
    ]);
    await notifier?.flush();

    logger.info('Shutdown complete');
    process.exit(0);

  } catch (error) {
    logger.error({ error }, 'Error during shutdown');
    process.exit(1);
  }
}

// Handle signals
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  getLogger().fatal({ error }, 'Uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  getLogger().fatal({ reason }, 'Unhandled rejection');
  process.exit(1);
});

// Start application
main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
  } else if (error instanceof ProcessFatalError) {
    getLogger().fatal({ error }, 'Cannot watch any directory');
  } else {
    getLogger().fatal({ error }, 'Failed to start application');
  }
  process.exit(1);
});
