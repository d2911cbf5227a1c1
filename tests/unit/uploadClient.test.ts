import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { truncateSync } from 'fs';
import { join } from 'path';
import { FileState, UploadOutcome } from '../../src/types/index.js';
import type { ServerConfig } from '../../src/types/index.js';
import { transition } from '../../src/models/CandidateFile.js';
import type { CandidateFile } from '../../src/models/CandidateFile.js';
import { deriveDeviceAssetId } from '../../src/lib/checksum.js';
import { UploadClient } from '../../src/services/UploadClient.js';
import { immediateSleep, jsonResponse, makeTempDir, removeDir, stableCandidate, writeMediaFile } from './helpers.js';

const serverConfig: ServerConfig = {
  url: 'http://photos.test/api',
  apiKey: 'test-api-key',
  deviceId: 'test-device',
  requestTimeout: 5000,
};

const retryPolicy = { maxRetries: 3, retryDelay: 100 };

const modifiedAt = new Date('2026-02-03T04:05:06.000Z');
const createdAt = new Date('2026-02-01T00:00:00.000Z');

describe('UploadClient', () => {
  let dir: string;
  let candidate: CandidateFile;

  beforeEach(() => {
    dir = makeTempDir();
    const path = writeMediaFile(join(dir, 'IMG_0001.jpg'), 'jpeg bytes');
    candidate = stableCandidate(path, dir);
    transition(candidate, FileState.VALIDATED);
    transition(candidate, FileState.UPLOADING);
    candidate.modifiedAt = modifiedAt;
    candidate.createdAt = createdAt;
  });

  afterEach(() => {
    removeDir(dir);
  });

  /**
   * fetch stand-in answering from a list of responses; a function entry throws
   */
  function scriptedFetch(...replies: Array<() => Response>) {
    let index = 0;
    return jest.fn<typeof fetch>(async () => {
      const reply = replies[Math.min(index, replies.length - 1)];
      index++;
      return reply();
    });
  }

  describe('upload', () => {
    it('should upload a file accepted on the first attempt', async () => {
      const fetchMock = scriptedFetch(() => jsonResponse(201, { id: 'asset-1', status: 'created' }));
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep: immediateSleep() });

      const result = await client.upload(candidate);

      expect(result).toEqual({ outcome: UploadOutcome.SUCCESS, assetId: 'asset-1', attempts: 1 });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should retry server errors with exponential backoff', async () => {
      const sleep = immediateSleep();
      const fetchMock = scriptedFetch(
        () => jsonResponse(500, { message: 'boom' }),
        () => jsonResponse(500, { message: 'boom' }),
        () => jsonResponse(500, { message: 'boom' }),
        () => jsonResponse(201, { id: 'asset-2' })
      );
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep });

      const result = await client.upload(candidate);

      expect(result).toEqual({ outcome: UploadOutcome.SUCCESS, assetId: 'asset-2', attempts: 4 });
      expect(sleep.mock.calls).toEqual([[100], [200], [400]]);
    });

    it('should give up once the retries are used up', async () => {
      const sleep = immediateSleep();
      const fetchMock = scriptedFetch(() => jsonResponse(503, {}));
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep });

      const result = await client.upload(candidate);

      expect(result).toEqual({
        outcome: UploadOutcome.RETRYABLE_FAILURE,
        reason: 'HTTP 503',
        status: 503,
        attempts: 4,
      });
      expect(fetchMock).toHaveBeenCalledTimes(4);
      expect(sleep).toHaveBeenCalledTimes(3);
    });

    it('should not retry a rejected request', async () => {
      const sleep = immediateSleep();
      const fetchMock = scriptedFetch(() => jsonResponse(400, { message: 'Invalid file' }));
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep });

      const result = await client.upload(candidate);

      expect(result).toEqual({
        outcome: UploadOutcome.FATAL_FAILURE,
        reason: 'HTTP 400: Invalid file',
        status: 400,
        attempts: 1,
      });
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should not retry a payload that is too large', async () => {
      const fetchMock = scriptedFetch(() => new Response('', { status: 413 }));
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep: immediateSleep() });

      const result = await client.upload(candidate);

      expect(result.outcome).toBe(UploadOutcome.FATAL_FAILURE);
      expect(result.attempts).toBe(1);
    });

    it('should report a duplicate from the response body', async () => {
      const fetchMock = scriptedFetch(() => jsonResponse(200, { id: 'asset-1', status: 'duplicate' }));
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep: immediateSleep() });

      expect(await client.upload(candidate))
        .toEqual({ outcome: UploadOutcome.DUPLICATE, assetId: 'asset-1', attempts: 1 });
    });

    it('should report a conflict as a duplicate', async () => {
      const fetchMock = scriptedFetch(() => jsonResponse(409, { message: 'exists' }));
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep: immediateSleep() });

      expect(await client.upload(candidate))
        .toEqual({ outcome: UploadOutcome.DUPLICATE, assetId: null, attempts: 1 });
    });

    it('should retry network errors', async () => {
      const fetchMock = scriptedFetch(
        () => {
          throw new TypeError('fetch failed');
        },
        () => jsonResponse(201, { id: 'asset-3' })
      );
      const sleep = immediateSleep();
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep });

      const result = await client.upload(candidate);

      expect(result).toEqual({ outcome: UploadOutcome.SUCCESS, assetId: 'asset-3', attempts: 2 });
      expect(sleep.mock.calls).toEqual([[100]]);
    });

    it('should stop retrying when shutdown is requested during the backoff', async () => {
      const controller = new AbortController();
      const sleep = jest.fn<(ms: number) => Promise<void>>(async () => {
        controller.abort();
      });
      const fetchMock = scriptedFetch(() => jsonResponse(502, {}));
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep });

      const result = await client.upload(candidate, controller.signal);

      expect(result).toEqual({
        outcome: UploadOutcome.RETRYABLE_FAILURE,
        reason: 'HTTP 502',
        status: 502,
        attempts: 1,
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should make one attempt and no retry when already shutting down', async () => {
      const controller = new AbortController();
      controller.abort();
      const sleep = immediateSleep();
      const fetchMock = scriptedFetch(() => jsonResponse(500, {}));
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep });

      const result = await client.upload(candidate, controller.signal);

      expect(result.outcome).toBe(UploadOutcome.RETRYABLE_FAILURE);
      expect(result.attempts).toBe(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should refuse a candidate that was never validated', async () => {
      const fetchMock = scriptedFetch(() => jsonResponse(201, { id: 'asset-1' }));
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep: immediateSleep() });
      candidate.modifiedAt = null;

      expect(await client.upload(candidate)).toEqual({
        outcome: UploadOutcome.FATAL_FAILURE,
        reason: 'File was not validated before upload',
        attempts: 0,
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should fail without a request when the file cannot be read', async () => {
      const fetchMock = scriptedFetch(() => jsonResponse(201, { id: 'asset-1' }));
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep: immediateSleep() });
      removeDir(dir);

      const result = await client.upload(candidate);

      expect(result.outcome).toBe(UploadOutcome.FATAL_FAILURE);
      expect(result.attempts).toBe(0);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should accept a created response that carries no asset id', async () => {
      const fetchMock = scriptedFetch(() => jsonResponse(201, { status: 'created' }));
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep: immediateSleep() });

      expect(await client.upload(candidate))
        .toEqual({ outcome: UploadOutcome.SUCCESS, assetId: null, attempts: 1 });
    });

    it('should send files larger than a single buffer without reading them up front', async () => {
      const size = 3 * 1024 ** 3;
      const path = join(dir, 'long-take.mp4');
      writeMediaFile(path, '');
      truncateSync(path, size);
      const large = stableCandidate(path, dir);
      transition(large, FileState.VALIDATED);
      transition(large, FileState.UPLOADING);
      large.modifiedAt = modifiedAt;
      large.createdAt = createdAt;
      const fetchMock = scriptedFetch(() => jsonResponse(201, { id: 'asset-9' }));
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep: immediateSleep() });

      const result = await client.upload(large);

      expect(result).toEqual({ outcome: UploadOutcome.SUCCESS, assetId: 'asset-9', attempts: 1 });
      const form = fetchMock.mock.calls[0][1]?.body;
      expect(form).toBeInstanceOf(FormData);
      if (!(form instanceof FormData)) {
        return;
      }
      const asset = form.get('assetData');
      expect(asset).toBeInstanceOf(Blob);
      if (!(asset instanceof Blob)) {
        return;
      }
      expect(asset.size).toBe(size);
      expect(asset.type).toBe('video/mp4');
    });

    it('should send the file as multipart form data', async () => {
      const fetchMock = scriptedFetch(() => jsonResponse(201, { id: 'asset-1' }));
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock, sleep: immediateSleep() });

      await client.upload(candidate);

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('http://photos.test/api/assets');
      expect(init?.method).toBe('POST');
      expect(new Headers(init?.headers).get('x-api-key')).toBe('test-api-key');

      const form = init?.body;
      expect(form).toBeInstanceOf(FormData);
      if (!(form instanceof FormData)) {
        return;
      }
      expect(form.get('deviceId')).toBe('test-device');
      expect(form.get('deviceAssetId')).toBe(deriveDeviceAssetId(candidate.path, modifiedAt));
      expect(form.get('fileCreatedAt')).toBe('2026-02-01T00:00:00.000Z');
      expect(form.get('fileModifiedAt')).toBe('2026-02-03T04:05:06.000Z');
      expect(form.get('isFavorite')).toBe('false');

      const asset = form.get('assetData');
      expect(asset).toBeInstanceOf(Blob);
      if (!(asset instanceof Blob)) {
        return;
      }
      expect(asset.type).toBe('image/jpeg');
      expect(await asset.text()).toBe('jpeg bytes');
    });
  });

  describe('buildRequest', () => {
    it('should fall back to a generic content type for unknown extensions', () => {
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: scriptedFetch(() => jsonResponse(200, {})) });
      const other = stableCandidate(join(dir, 'scan.unknownext'), dir);

      const request = client.buildRequest(other, modifiedAt, createdAt);

      expect(request.contentType).toBe('application/octet-stream');
      expect(request.fileName).toBe('scan.unknownext');
    });

    it('should detect video content types', () => {
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: scriptedFetch(() => jsonResponse(200, {})) });

      expect(client.buildRequest(stableCandidate(join(dir, 'clip.mp4'), dir), modifiedAt, createdAt).contentType)
        .toBe('video/mp4');
    });
  });

  describe('ping', () => {
    it('should report a reachable server', async () => {
      const fetchMock = scriptedFetch(() => jsonResponse(200, { res: 'pong' }));
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock });

      expect(await client.ping()).toBe(true);
      expect(fetchMock.mock.calls[0][0]).toBe('http://photos.test/api/server/ping');
    });

    it('should report an unreachable server', async () => {
      const fetchMock = scriptedFetch(() => {
        throw new TypeError('fetch failed');
      });
      const client = new UploadClient(serverConfig, retryPolicy, { fetch: fetchMock });

      expect(await client.ping()).toBe(false);
    });

    it('should report a server that rejects the key', async () => {
      const client = new UploadClient(serverConfig, retryPolicy, {
        fetch: scriptedFetch(() => jsonResponse(401, { message: 'Invalid API key' })),
      });

      expect(await client.ping()).toBe(false);
    });
  });
});
