import { basename, extname, sep } from 'path';

// ============================================================================
// Enums
// ============================================================================

export enum FileState {
  DISCOVERED = 'discovered',
  STABILIZING = 'stabilizing',
  STABLE = 'stable',
  VALIDATED = 'validated',
  UPLOADING = 'uploading',
  UPLOADED = 'uploaded',
  ARCHIVED = 'archived',
  REJECTED = 'rejected',
  FAILED = 'failed'
}

export enum StabilityResult {
  STABLE = 'stable',
  STILL_CHANGING = 'still_changing',
  GONE = 'gone'
}

export enum UploadOutcome {
  SUCCESS = 'success',
  DUPLICATE = 'duplicate',
  RETRYABLE_FAILURE = 'retryable_failure',
  FATAL_FAILURE = 'fatal_failure'
}

export enum FailureKind {
  VALIDATION_REJECTION = 'validation_rejection',
  RETRY_EXHAUSTED = 'retry_exhausted',
  FATAL_REQUEST = 'fatal_request',
  ARCHIVE_MOVE_FAILURE = 'archive_move_failure',
  SHUTDOWN = 'shutdown',
  UNEXPECTED = 'unexpected'
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface ServerConfig {
  url: string;
  apiKey: string;
  deviceId: string;
  requestTimeout: number;
}

export interface MonitoringConfig {
  watchDirectories: string[];
  archiveDirectory: string;
  recursive: boolean;
  supportedExtensions: string[];
  usePolling: boolean;
  ignoreInitial: boolean;
}

export interface StabilityConfig {
  /** Seconds */
  waitSeconds: number;
  /** Seconds */
  pollIntervalSeconds: number;
  /** Seconds, used for large videos */
  videoWaitSeconds: number;
  minExtendedWaitSizeBytes: number;
}

export interface ProcessingConfig {
  maxConcurrency: number;
  queueCapacity: number;
  maxFileSizeBytes: number;
  maxRetries: number;
  retryDelay: number;
  /** Seconds between stats summaries, 0 disables */
  statsInterval: number;
}

export interface NotificationConfig {
  enabled: boolean;
  /** Uploads collected before a summary is shown */
  batchSize: number;
  /** Seconds after the last upload before a summary is shown */
  batchTimeoutSeconds: number;
}

export interface LoggingConfig {
  level: 'debug' | 'info' | 'warn' | 'error';
  pretty: boolean;
}

export interface AppConfig {
  server: ServerConfig;
  monitoring: MonitoringConfig;
  stability: StabilityConfig;
  processing: ProcessingConfig;
  notifications: NotificationConfig;
  logging: LoggingConfig;
}

// ============================================================================
// Extension Mappings
// ============================================================================

export const DEFAULT_SUPPORTED_EXTENSIONS = [
  'jpg',
  'jpeg',
  'png',
  'gif',
  'bmp',
  'tiff',
  'webp',
  'heic',
  'mp4',
  'mov',
  'avi',
  'mkv',
  'wmv',
  'flv',
  'm4v',
  '3gp'
] as const;

export const VIDEO_EXTENSIONS = [
  'mp4',
  'mov',
  'avi',
  'mkv',
  'wmv',
  'flv',
  'm4v',
  '3gp'
] as const;

// Partial downloads and editor/office scratch files
export const TEMPORARY_SUFFIXES = [
  '.part',
  '.partial',
  '.crdownload',
  '.download',
  '.tmp',
  '.temp',
  '~'
] as const;

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Lower-case extension without the leading dot ('' when there is none)
 */
export function getExtension(filename: string): string {
  return extname(filename).slice(1).toLowerCase();
}

export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\.+/, '').toLowerCase();
}

export function isSupportedFile(filename: string, supported: readonly string[]): boolean {
  const extension = getExtension(filename);
  return extension !== '' && supported.some(ext => normalizeExtension(ext) === extension);
}

export function isVideoFile(filename: string): boolean {
  const extension = getExtension(filename);
  return VIDEO_EXTENSIONS.some(ext => ext === extension);
}

/**
 * True for dotfiles, files inside dot-directories and in-progress downloads.
 * @param relativePath Path relative to its watch root
 */
export function isHiddenOrTemporary(relativePath: string): boolean {
  if (relativePath.split(sep).some(segment => segment.startsWith('.'))) {
    return true;
  }

  const name = basename(relativePath).toLowerCase();
  if (name.startsWith('~$')) {
    return true;
  }

  return TEMPORARY_SUFFIXES.some(suffix => name.endsWith(suffix));
}
