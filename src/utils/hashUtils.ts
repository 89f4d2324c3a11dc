/**
 * @fileoverview Content fingerprint utilities
 *
 * FORMAT: sha256 over the raw bytes (no line-ending or BOM normalization:
 * a synced file must be byte-identical on both sides)
 * USED BY: TreeScanner (checksum mode) | LocalTransfer
 */
import { promises as fs } from 'fs';
import { createHash } from 'crypto';

/**
 * Compute SHA-256 checksum for content
 *
 * @returns 64-character lowercase hex string
 */
export function computeContentChecksum(content: Buffer | string): string {
  return createHash('sha256')
    .update(content)
    .digest('hex');
}

/**
 * Read a file and compute its SHA-256 checksum
 */
export async function computeFileChecksum(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath);
  return computeContentChecksum(content);
}

/**
 * Fingerprint from size and modification time, for the cheap comparison mode
 */
export function sizeMtimeFingerprint(size: number, mtimeMs: number): string {
  return `${size}:${Math.trunc(mtimeMs)}`;
}
