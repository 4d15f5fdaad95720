/**
 * PDF content gate
 */
import type { PdfCheckError } from '../errors.js';
import { DEFAULT_SIGNATURES, type SignatureSet } from '../signatures.js';
import { decodeText } from '../utils/normalize.js';
import { detectEmbeddedFiles } from './embedded-file-detector.js';
import { detectExternalRefs } from './external-ref-detector.js';
import { detectForms } from './form-detector.js';
import { detectScript } from './script-detector.js';
import { validateStructure } from './structure-validator.js';

/**
 * Outcome of a check, with the checks that ran before it stopped
 */
export interface Inspection {
  error: PdfCheckError | null;
  checksPerformed: string[];
}

export interface PdfChecker {
  /** Run every check in order; the first violation is returned, `null` when the buffer passes */
  check(buffer: Uint8Array): PdfCheckError | null;
  inspect(buffer: Uint8Array): Inspection;
}

type TextCheck = {
  name: string;
  run: (text: string, signatures: SignatureSet) => PdfCheckError | null;
};

// Scripts first: they are the most severe signal, and callers rely on this order
const TEXT_CHECKS: readonly TextCheck[] = [
  { name: 'JavaScriptDetection', run: detectScript },
  { name: 'FormDetection', run: detectForms },
  { name: 'ExternalReferenceDetection', run: detectExternalRefs },
  { name: 'EmbeddedFileDetection', run: detectEmbeddedFiles },
];

/**
 * Bind the checks to a signature set
 */
export function createPdfChecker(signatures: SignatureSet = DEFAULT_SIGNATURES): PdfChecker {
  function inspect(buffer: Uint8Array): Inspection {
    const checksPerformed = ['StructureValidation'];

    const structureError = validateStructure(buffer);
    if (structureError) return { error: structureError, checksPerformed };

    const text = decodeText(buffer);
    for (const { name, run } of TEXT_CHECKS) {
      checksPerformed.push(name);
      const error = run(text, signatures);
      if (error) return { error, checksPerformed };
    }

    return { error: null, checksPerformed };
  }

  return {
    check: (buffer) => inspect(buffer).error,
    inspect,
  };
}

const defaultChecker = createPdfChecker();

/**
 * Check a PDF buffer against the default signatures
 */
export function checkPDF(buffer: Uint8Array): PdfCheckError | null {
  return defaultChecker.check(buffer);
}
