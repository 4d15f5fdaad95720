/**
 * PDF header validation
 */
import { ErrInvalidStructure, type PdfCheckError } from '../errors.js';

export const PDF_MAGIC = '%PDF-';

/** Bytes searched for the magic marker. Some producers prepend garbage before it */
export const HEADER_WINDOW = 1024;

const MAGIC_BYTES = Buffer.from(PDF_MAGIC, 'latin1');
const VERSION = /^(\d+\.\d+)/;

function headerOffset(buffer: Uint8Array): number {
  const limit = Math.min(HEADER_WINDOW, buffer.length);
  return Buffer.from(buffer.buffer, buffer.byteOffset, limit).indexOf(MAGIC_BYTES);
}

/**
 * Require a non-empty buffer with %PDF- inside the header window
 */
export function validateStructure(buffer: Uint8Array): PdfCheckError | null {
  if (buffer.length === 0) return ErrInvalidStructure;
  if (headerOffset(buffer) === -1) return ErrInvalidStructure;
  return null;
}

/**
 * Locate the header and read the version it declares. Informational only.
 */
export function describeHeader(buffer: Uint8Array): { offset: number; version?: string } | null {
  const offset = headerOffset(buffer);
  if (offset === -1) return null;

  const start = offset + PDF_MAGIC.length;
  const tail = Buffer.from(buffer.buffer, buffer.byteOffset + start, Math.min(8, buffer.length - start));
  const match = VERSION.exec(tail.toString('latin1'));

  return match?.[1] !== undefined ? { offset, version: match[1] } : { offset };
}
