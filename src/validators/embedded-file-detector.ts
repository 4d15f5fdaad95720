/**
 * Embedded file detection
 */
import { ErrEmbeddedFileDetected, type PdfCheckError } from '../errors.js';
import { DEFAULT_SIGNATURES, firstMatch, type SignatureSet } from '../signatures.js';

export function detectEmbeddedFiles(
  rawText: string,
  signatures: SignatureSet = DEFAULT_SIGNATURES
): PdfCheckError | null {
  return firstMatch(signatures.embeddedFiles, rawText) ? ErrEmbeddedFileDetected : null;
}
