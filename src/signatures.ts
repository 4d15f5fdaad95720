/**
 * Compiled signature sets used by the detectors
 */
import { SignatureCompileError } from './errors.js';
import type { SignatureOverrides, SignaturePattern } from './types.js';

/**
 * Read-only set of matchers, one ordered list per detector category plus the
 * fixed matchers behind the hex-obfuscation heuristics.
 */
export interface SignatureSet {
  readonly script: readonly RegExp[];
  readonly forms: readonly RegExp[];
  readonly externalRefs: readonly RegExp[];
  readonly embeddedFiles: readonly RegExp[];
  /** `#xx` escape runs of four or more byte pairs */
  readonly hexEscapeRun: RegExp;
  /** `<...>` hex strings of four or more digits */
  readonly angleHexString: RegExp;
  /** Vocabulary that marks nearby hex data as a script payload */
  readonly scriptToken: RegExp;
}

const MAX_PATTERN_LEN = 400;

/**
 * Reject patterns that tend to backtrack badly on attacker-controlled input.
 * Heuristic: it catches the obvious shapes, not every one.
 */
function guardPattern(source: string): void {
  if (source.length > MAX_PATTERN_LEN) {
    throw new SignatureCompileError(source, `longer than ${MAX_PATTERN_LEN} characters`);
  }

  if (/\\[1-9]/.test(source)) {
    throw new SignatureCompileError(source, 'backreferences are not allowed');
  }

  // ( ... + )+ , ((a*))* , ( ... {2,} )+ and the like
  if (/\([^)]*(?:[*+]|\{\d+,\d*\})[^)]*\)(?:\s*\))*\s*(?:[*+]|\{\d+,\d*\})/.test(source)) {
    throw new SignatureCompileError(source, 'nested quantifier');
  }
}

/**
 * Drop the stateful flags so `test()` stays pure across calls, and force case-insensitivity
 */
function normalizeFlags(flags: string): string {
  const kept = flags.split('').filter((ch) => 'imsu'.includes(ch));
  return Array.from(new Set([...kept, 'i'])).sort().join('');
}

/**
 * Compile one caller-supplied pattern
 */
export function compileSignature(pattern: SignaturePattern): RegExp {
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  const flags = typeof pattern === 'string' ? 'i' : normalizeFlags(pattern.flags);

  guardPattern(source);

  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new SignatureCompileError(source, error instanceof Error ? error.message : String(error));
  }
}

function compileList(patterns: readonly SignaturePattern[]): readonly RegExp[] {
  return Object.freeze(patterns.map(compileSignature));
}

// PDF whitespace only: vertical tab and no-break space do not separate tokens
const SCRIPT_PATTERNS: readonly SignaturePattern[] = [
  /\/[\t\n\f\r ]*JavaScript/i,
  /\/[\t\n\f\r ]*JS/i,
  /\/[\t\n\f\r ]*OpenAction/i,
  /app[\t\n\f\r ]*\./i,
  /eval[\t\n\f\r ]*\(/i,
  /document[\t\n\f\r ]*\./i,
  /this[\t\n\f\r ]*\./i,
  /getField[\t\n\f\r ]*\(/i,
  /submitForm[\t\n\f\r ]*\(/i,
  /importDataObject[\t\n\f\r ]*\(/i,
  // hex payload passed straight to a JS( call
  /JS\([\t\n\f\r ]*#[0-9A-F]{2}/i,
];

const FORM_PATTERNS: readonly SignaturePattern[] = [
  /\/[\t\n\f\r ]*AcroForm/i,
  /\/[\t\n\f\r ]*XFA/i,
  /\/[\t\n\f\r ]*Widget/i,
  /\/[\t\n\f\r ]*FT[\t\n\f\r ]*\/[\t\n\f\r ]*Tx/i,
  /\/[\t\n\f\r ]*FT[\t\n\f\r ]*\/[\t\n\f\r ]*Ch/i,
  /\/[\t\n\f\r ]*FT[\t\n\f\r ]*\/[\t\n\f\r ]*Btn/i,
  /\/[\t\n\f\r ]*FT[\t\n\f\r ]*\/[\t\n\f\r ]*Sig/i,
];

const EXTERNAL_REF_PATTERNS: readonly SignaturePattern[] = [
  /\/[\t\n\f\r ]*GoToR/i,
  /\/[\t\n\f\r ]*Launch/i,
  /\/[\t\n\f\r ]*ImportData/i,
  /\/[\t\n\f\r ]*SubmitForm/i,
  /\/[\t\n\f\r ]*URI\b/i,
  /URI[\t\n\f\r ]*\(/i,
  /\bhttps?:\/\//i,
  /\bfile:\/\//i,
  /\bftp:\/\//i,
];

const EMBEDDED_FILE_PATTERNS: readonly SignaturePattern[] = [
  /\/[\t\n\f\r ]*EmbeddedFile/i,
  /\/[\t\n\f\r ]*FileAttachment/i,
  /\/[\t\n\f\r ]*Filespec/i,
];

/**
 * Build a frozen signature set, replacing the lists named in `overrides`
 */
export function createSignatureSet(overrides: SignatureOverrides = {}): SignatureSet {
  return Object.freeze({
    script: compileList(overrides.script ?? SCRIPT_PATTERNS),
    forms: compileList(overrides.forms ?? FORM_PATTERNS),
    externalRefs: compileList(overrides.externalRefs ?? EXTERNAL_REF_PATTERNS),
    embeddedFiles: compileList(overrides.embeddedFiles ?? EMBEDDED_FILE_PATTERNS),
    // Global: only ever consumed through matchAll(), which works on a copy
    hexEscapeRun: /#(?:[0-9A-F]{2}){4,}/gi,
    angleHexString: /<[0-9A-F]{4,}>/i,
    scriptToken: /javascript|js/i,
  });
}

export const DEFAULT_SIGNATURES: SignatureSet = createSignatureSet();

/**
 * First pattern in `patterns` that matches `text`, if any
 */
export function firstMatch(patterns: readonly RegExp[], text: string): RegExp | undefined {
  return patterns.find((pattern) => pattern.test(text));
}
