/**
 * Interactive form detection
 */
import { ErrFormDetected, type PdfCheckError } from '../errors.js';
import { DEFAULT_SIGNATURES, firstMatch, type SignatureSet } from '../signatures.js';

/**
 * Detect AcroForm/XFA dictionaries, widgets and field subtypes in the raw text
 */
export function detectForms(
  rawText: string,
  signatures: SignatureSet = DEFAULT_SIGNATURES
): PdfCheckError | null {
  return firstMatch(signatures.forms, rawText) ? ErrFormDetected : null;
}
