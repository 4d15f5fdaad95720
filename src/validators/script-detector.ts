/**
 * Embedded script detection
 */
import { ErrScriptDetected, type PdfCheckError } from '../errors.js';
import { DEFAULT_SIGNATURES, firstMatch, type SignatureSet } from '../signatures.js';
import { collapseWhitespace, stripStreams } from '../utils/normalize.js';

/** Characters before a hex run searched for script vocabulary */
export const HEX_CONTEXT_WINDOW = 80;

/**
 * Detect scripting markers, scripting API calls and hex-obfuscated payloads.
 *
 * Stream bodies are excluded before matching: compressed payloads produce
 * accidental hits, and a filter decoder is out of scope. Any co-occurrence of
 * script vocabulary and hex data fails the check, even when the hex would not
 * decode to a script.
 */
export function detectScript(
  rawText: string,
  signatures: SignatureSet = DEFAULT_SIGNATURES
): PdfCheckError | null {
  const withoutStreams = stripStreams(rawText);
  const normalized = collapseWhitespace(withoutStreams);

  if (firstMatch(signatures.script, normalized)) {
    return ErrScriptDetected;
  }

  for (const run of withoutStreams.matchAll(signatures.hexEscapeRun)) {
    const start = run.index ?? 0;
    const context = withoutStreams.slice(Math.max(0, start - HEX_CONTEXT_WINDOW), start);
    if (signatures.scriptToken.test(context)) {
      return ErrScriptDetected;
    }
  }

  if (signatures.angleHexString.test(withoutStreams) && signatures.scriptToken.test(withoutStreams)) {
    return ErrScriptDetected;
  }

  return null;
}
