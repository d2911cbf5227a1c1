import { createHash } from 'crypto';
import { basename } from 'path';

/**
 * Calculate SHA1 checksum from a buffer
 * @param buffer Buffer to hash
 * @returns Hex-encoded checksum
 */
export function calculateBufferChecksum(buffer: Buffer | string): string {
  const hash = createHash('sha1');
  hash.update(buffer);
  return hash.digest('hex');
}

/**
 * Derive the device-scoped asset id for a file. The same path with the same
 * modification time always yields the same id, so the server can recognize
 * a re-upload of an unchanged file as a duplicate.
 * @param filePath Absolute file path
 * @param modifiedAt File modification time
 */
export function deriveDeviceAssetId(filePath: string, modifiedAt: Date): string {
  const name = basename(filePath).replace(/\s+/g, '');
  const digest = calculateBufferChecksum(`${filePath}:${modifiedAt.getTime()}`);
  return `${name}-${digest}`;
}
