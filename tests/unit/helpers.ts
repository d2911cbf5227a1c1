import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { jest } from '@jest/globals';
import type { ChangeEvent, ChangeListener, ChangeSource } from '../../src/services/ChangeSource.js';
import type { AppConfig, ProcessingConfig, StabilityConfig } from '../../src/types/index.js';
import { DEFAULT_SUPPORTED_EXTENSIONS, FileState } from '../../src/types/index.js';
import type { CandidateFile } from '../../src/models/CandidateFile.js';
import { createCandidateFile, transition } from '../../src/models/CandidateFile.js';

/**
 * Create a fresh directory under the system temp dir
 */
export function makeTempDir(prefix: string = 'media-drop-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a file, creating its parent directories
 */
export function writeMediaFile(filePath: string, content: string | Buffer = 'test image bytes'): string {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
  return filePath;
}

/**
 * A candidate that has already passed the stability check
 */
export function stableCandidate(filePath: string, watchRoot: string): CandidateFile {
  const candidate = createCandidateFile(filePath, watchRoot);
  transition(candidate, FileState.STABLE);
  return candidate;
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * Sleep stand-in that records the requested delays and resolves at once
 */
export function immediateSleep() {
  return jest.fn<(ms: number) => Promise<void>>(async () => undefined);
}

export function stabilityConfig(overrides: Partial<StabilityConfig> = {}): StabilityConfig {
  return {
    waitSeconds: 1,
    pollIntervalSeconds: 1,
    videoWaitSeconds: 3,
    minExtendedWaitSizeBytes: 100,
    ...overrides,
  };
}

export function processingConfig(overrides: Partial<ProcessingConfig> = {}): ProcessingConfig {
  return {
    maxConcurrency: 2,
    queueCapacity: 10,
    maxFileSizeBytes: 1024 * 1024,
    maxRetries: 3,
    retryDelay: 100,
    statsInterval: 0,
    ...overrides,
  };
}

export function monitoringConfig(
  archiveDirectory: string,
  overrides: Partial<AppConfig['monitoring']> = {}
): AppConfig['monitoring'] {
  return {
    watchDirectories: [],
    archiveDirectory,
    recursive: true,
    supportedExtensions: [...DEFAULT_SUPPORTED_EXTENSIONS],
    usePolling: false,
    ignoreInitial: false,
    ...overrides,
  };
}

/**
 * In-process change source: tests push events by hand
 */
export class FakeChangeSource implements ChangeSource {
  roots: string[] = [];
  recursive: boolean | null = null;
  closed = false;
  private listener: ChangeListener | null = null;

  subscribe(roots: string[], recursive: boolean, listener: ChangeListener): void {
    this.roots = roots;
    this.recursive = recursive;
    this.listener = listener;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  push(event: ChangeEvent): void {
    this.listener?.(event);
  }
}

/**
 * Wait for a condition to be true
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeoutMs: number = 5000,
  intervalMs: number = 10
): Promise<void> {
  const startTime = Date.now();

  while (Date.now() - startTime < timeoutMs) {
    const result = await Promise.resolve(condition());
    if (result) {
      return;
    }
    await sleep(intervalMs);
  }

  throw new Error(`Condition not met within ${timeoutMs}ms`);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function errnoError(code: string, message: string = code): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}
