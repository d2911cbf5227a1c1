import { resolve } from 'path';
import { homedir } from 'os';
import dotenv from 'dotenv';
import type { AppConfig, LoggingConfig } from '../types/index.js';
import { DEFAULT_SUPPORTED_EXTENSIONS, normalizeExtension } from '../types/index.js';
import { ConfigError } from '../lib/errors.js';

const MB = 1024 * 1024;
const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigError(`Missing required environment variable: ${key}`, key);
  }
  return value.trim();
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw new ConfigError(`Environment variable ${key} must be a number, got: ${value}`, key);
  }
  return num;
}

function getEnvInteger(key: string, defaultValue: number): number {
  const num = getEnvNumber(key, defaultValue);
  if (!Number.isInteger(num)) {
    throw new ConfigError(`Environment variable ${key} must be an integer, got: ${process.env[key]}`, key);
  }
  return num;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function getEnvList(key: string, defaultValue?: readonly string[]): string[] {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    if (defaultValue !== undefined) {
      return [...defaultValue];
    }
    throw new ConfigError(`Missing required environment variable: ${key}`, key);
  }

  const items = value.split(',').map(item => item.trim()).filter(item => item !== '');
  if (items.length === 0) {
    throw new ConfigError(`Environment variable ${key} cannot be empty`, key);
  }
  return items;
}

function expandPath(path: string): string {
  return resolve(path.replace(/^~(?=$|\/)/, homedir()));
}

function requireAtLeast(key: string, value: number, min: number): void {
  if (value < min) {
    throw new ConfigError(`${key} must be at least ${min}, got: ${value}`, key);
  }
}

function isLogLevel(level: string): level is LoggingConfig['level'] {
  return LOG_LEVELS.some(valid => valid === level);
}

export function loadConfig(): AppConfig {
  // Server Configuration
  const url = getEnv('SERVER_URL').replace(/\/+$/, '');
  if (!/^https?:\/\//.test(url)) {
    throw new ConfigError('SERVER_URL must start with http:// or https://', 'SERVER_URL');
  }

  const server = {
    url,
    apiKey: getEnv('API_KEY'),
    deviceId: getEnv('DEVICE_ID', 'media-drop-uploader'),
    requestTimeout: getEnvNumber('REQUEST_TIMEOUT', 60000),
  };
  requireAtLeast('REQUEST_TIMEOUT', server.requestTimeout, 1000);

  // Monitoring Configuration. Watch roots are checked by the watcher, which
  // only fails when none of them can be observed.
  const monitoring = {
    watchDirectories: getEnvList('WATCH_DIRECTORIES').map(expandPath),
    archiveDirectory: expandPath(getEnv('ARCHIVE_DIRECTORY')),
    recursive: getEnvBoolean('WATCH_RECURSIVE', true),
    supportedExtensions: getEnvList('SUPPORTED_EXTENSIONS', DEFAULT_SUPPORTED_EXTENSIONS)
      .map(normalizeExtension),
    usePolling: getEnvBoolean('USE_POLLING', false),
    ignoreInitial: getEnvBoolean('IGNORE_INITIAL', false),
  };

  // Stability Configuration
  const stability = {
    waitSeconds: getEnvNumber('STABILITY_WAIT_SECONDS', 5),
    pollIntervalSeconds: getEnvNumber('STABILITY_POLL_INTERVAL_SECONDS', 1),
    videoWaitSeconds: getEnvNumber('STABILITY_WAIT_SECONDS_VIDEO', 30),
    minExtendedWaitSizeBytes: getEnvNumber('MIN_EXTENDED_WAIT_SIZE_MB', 100) * MB,
  };

  requireAtLeast('STABILITY_WAIT_SECONDS', stability.waitSeconds, 1);
  requireAtLeast('STABILITY_POLL_INTERVAL_SECONDS', stability.pollIntervalSeconds, 0.1);
  requireAtLeast('MIN_EXTENDED_WAIT_SIZE_MB', stability.minExtendedWaitSizeBytes, 0);
  if (stability.pollIntervalSeconds > stability.waitSeconds) {
    throw new ConfigError(
      'STABILITY_POLL_INTERVAL_SECONDS must not exceed STABILITY_WAIT_SECONDS',
      'STABILITY_POLL_INTERVAL_SECONDS'
    );
  }
  if (stability.videoWaitSeconds < stability.waitSeconds) {
    throw new ConfigError(
      'STABILITY_WAIT_SECONDS_VIDEO must be at least STABILITY_WAIT_SECONDS',
      'STABILITY_WAIT_SECONDS_VIDEO'
    );
  }

  // Processing Configuration
  const processing = {
    maxConcurrency: getEnvInteger('MAX_CONCURRENCY', 2),
    queueCapacity: getEnvInteger('QUEUE_CAPACITY', 100),
    maxFileSizeBytes: getEnvNumber('MAX_FILE_SIZE_MB', 1000) * MB,
    maxRetries: getEnvInteger('MAX_RETRIES', 3),
    retryDelay: getEnvNumber('RETRY_DELAY', 1000),
    statsInterval: getEnvNumber('STATS_INTERVAL', 300),
  };

  requireAtLeast('MAX_CONCURRENCY', processing.maxConcurrency, 1);
  if (processing.maxConcurrency > 32) {
    throw new ConfigError('MAX_CONCURRENCY must be at most 32', 'MAX_CONCURRENCY');
  }
  requireAtLeast('QUEUE_CAPACITY', processing.queueCapacity, 1);
  requireAtLeast('MAX_FILE_SIZE_MB', processing.maxFileSizeBytes, MB);
  requireAtLeast('MAX_RETRIES', processing.maxRetries, 0);
  requireAtLeast('RETRY_DELAY', processing.retryDelay, 0);
  requireAtLeast('STATS_INTERVAL', processing.statsInterval, 0);

  // Notification Configuration
  const notifications = {
    enabled: getEnvBoolean('ENABLE_NOTIFICATIONS', true),
    batchSize: getEnvInteger('NOTIFICATION_BATCH_SIZE', 999999),
    batchTimeoutSeconds: getEnvNumber('NOTIFICATION_BATCH_TIMEOUT', 30),
  };

  requireAtLeast('NOTIFICATION_BATCH_SIZE', notifications.batchSize, 1);
  requireAtLeast('NOTIFICATION_BATCH_TIMEOUT', notifications.batchTimeoutSeconds, 1);

  // Logging Configuration
  const level = getEnv('LOG_LEVEL', 'info').toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(`Invalid LOG_LEVEL: ${level}. Must be one of: ${LOG_LEVELS.join(', ')}`, 'LOG_LEVEL');
  }

  const logging = {
    level,
    pretty: getEnvBoolean('LOG_PRETTY', process.env.NODE_ENV !== 'production'),
  };

  return {
    server,
    monitoring,
    stability,
    processing,
    notifications,
    logging,
  };
}

/**
 * Configuration as it is safe to log: the API key is cut to its first characters
 */
export function describeConfig(config: AppConfig): Record<string, unknown> {
  return {
    serverUrl: config.server.url,
    apiKey: `${config.server.apiKey.slice(0, 4)}${'*'.repeat(12)}`,
    deviceId: config.server.deviceId,
    watchDirectories: config.monitoring.watchDirectories,
    archiveDirectory: config.monitoring.archiveDirectory,
    recursive: config.monitoring.recursive,
    supportedExtensions: config.monitoring.supportedExtensions.join(','),
    usePolling: config.monitoring.usePolling,
    maxFileSizeMb: config.processing.maxFileSizeBytes / MB,
    stabilityWaitSeconds: config.stability.waitSeconds,
    stabilityPollIntervalSeconds: config.stability.pollIntervalSeconds,
    maxConcurrency: config.processing.maxConcurrency,
    maxRetries: config.processing.maxRetries,
    notifications: config.notifications.enabled,
  };
}

// Export singleton config instance
let config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!config) {
    dotenv.config();
    config = loadConfig();
  }
  return config;
}

// For testing: reset config
export function resetConfig(): void {
  config = null;
}
