import { createHash } from 'node:crypto';
import fs from 'node:fs';
import fsPromises from 'node:fs/promises';
import { ProbeError } from '../errors.js';

export interface ProbeResult {
  path: string;
  /** Modification time, whole seconds since the epoch */
  modified: number;
  /** Hex SHA-256 of the full file contents */
  checksum: string;
}

export interface ProbeOptions {
  /** Read block size in bytes (default 64 KiB) */
  blockSize?: number;
}

export const DEFAULT_BLOCK_SIZE = 64 * 1024;

function hashFile(filePath: string, blockSize: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    const stream = fs.createReadStream(filePath, { highWaterMark: blockSize });
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('error', reject);
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * Fingerprint a locale file. A failure anywhere, including halfway through
 * the read, is raised as a ProbeError and never retried.
 */
export async function probeLocaleFile(filePath: string, options: ProbeOptions = {}): Promise<ProbeResult> {
  const blockSize = options.blockSize ?? DEFAULT_BLOCK_SIZE;
  try {
    const stat = await fsPromises.stat(filePath);
    const checksum = await hashFile(filePath, blockSize);
    return Object.freeze({
      path: filePath,
      modified: Math.floor(stat.mtimeMs / 1000),
      checksum,
    });
  } catch (error) {
    throw new ProbeError(filePath, error);
  }
}
