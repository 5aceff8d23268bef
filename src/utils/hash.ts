import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { isErrnoException } from './errors.js';

/**
 * Calculate SHA-256 hash of a buffer or string
 */
export function calculateHash(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Calculate SHA-256 hash of a file, or `null` when it does not exist
 */
export async function calculateFileHash(filePath: string): Promise<string | null> {
  try {
    return calculateHash(await readFile(filePath));
  }
  catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
