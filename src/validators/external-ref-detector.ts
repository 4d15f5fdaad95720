/**
 * External reference detection
 */
import { ErrExternalRefDetected, type PdfCheckError } from '../errors.js';
import { DEFAULT_SIGNATURES, firstMatch, type SignatureSet } from '../signatures.js';
import { collapseWhitespace } from '../utils/normalize.js';

/**
 * Detect remote go-to, launch, import, submit and URI actions, and any
 * http(s), file or ftp URL. Streams are not excluded here.
 *
 * A plain hyperlink fails the same way an exfiltration target does;
 * telling them apart is left to the caller.
 */
export function detectExternalRefs(
  text: string,
  signatures: SignatureSet = DEFAULT_SIGNATURES
): PdfCheckError | null {
  return firstMatch(signatures.externalRefs, collapseWhitespace(text)) ? ErrExternalRefDetected : null;
}
