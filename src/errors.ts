/**
 * Error taxonomy
 */
import { ThreatType, type CheckErrorKind } from './types.js';

/**
 * Verdict reported by a failed check. Compare against the exported sentinels
 * by identity, never by message.
 */
export class PdfCheckError extends Error {
  readonly kind: CheckErrorKind;

  constructor(kind: CheckErrorKind, message: string) {
    super(message);
    this.name = 'PdfCheckError';
    this.kind = kind;
  }
}

function sentinel(kind: CheckErrorKind, message: string): PdfCheckError {
  return Object.freeze(new PdfCheckError(kind, message));
}

export const ErrInvalidStructure = sentinel(ThreatType.INVALID_STRUCTURE, 'invalid PDF structure');
export const ErrScriptDetected = sentinel(ThreatType.SCRIPT_DETECTED, 'JavaScript detected in PDF');
export const ErrFormDetected = sentinel(ThreatType.FORM_DETECTED, 'interactive forms detected in PDF');
export const ErrExternalRefDetected = sentinel(
  ThreatType.EXTERNAL_REF_DETECTED,
  'external references detected in PDF'
);
export const ErrEmbeddedFileDetected = sentinel(
  ThreatType.EMBEDDED_FILE_DETECTED,
  'embedded files detected in PDF'
);

/**
 * Thrown when scan options fail validation
 */
export class ScanConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid scan options: ${issues.join('; ')}`);
    this.name = 'ScanConfigError';
    this.issues = issues;
  }
}

/**
 * Thrown when a custom signature is rejected before compilation
 */
export class SignatureCompileError extends Error {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super(`Signature rejected (${reason}): ${pattern}`);
    this.name = 'SignatureCompileError';
    this.pattern = pattern;
  }
}
