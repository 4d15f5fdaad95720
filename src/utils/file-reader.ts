/**
 * File reading utilities
 */
import fs from 'fs/promises';

/**
 * Thrown when a file is larger than the caller allows
 */
export class FileSizeError extends Error {
  readonly size: number;
  readonly maxSize: number;

  constructor(size: number, maxSize: number) {
    super(`File size (${size}) exceeds maximum allowed size (${maxSize})`);
    this.name = 'FileSizeError';
    this.size = size;
    this.maxSize = maxSize;
  }
}

/**
 * Read file as buffer. The size limit is checked before any byte is read.
 */
export async function readFileAsBuffer(filePath: string, maxSize?: number): Promise<Buffer> {
  const stats = await fs.stat(filePath);

  if (maxSize !== undefined && stats.size > maxSize) {
    throw new FileSizeError(stats.size, maxSize);
  }

  return fs.readFile(filePath);
}

/**
 * Convert buffer to hex string
 */
export function bufferToHex(buffer: Uint8Array, maxBytes: number = 16): string {
  return Buffer.from(buffer.subarray(0, maxBytes)).toString('hex').toUpperCase();
}
