/**
 * Scan option validation
 */
import { z } from 'zod';
import { ScanConfigError } from './errors.js';
import type { ScanOptions } from './types.js';

/** 500MB default */
export const DEFAULT_MAX_FILE_SIZE = 500 * 1024 * 1024;

const signaturePatternSchema = z.union([z.string().min(1), z.instanceof(RegExp)]);

const signatureOverridesSchema = z
  .object({
    script: z.array(signaturePatternSchema).optional(),
    forms: z.array(signaturePatternSchema).optional(),
    externalRefs: z.array(signaturePatternSchema).optional(),
    embeddedFiles: z.array(signaturePatternSchema).optional(),
  })
  .strict();

export const scanOptionsSchema = z
  .object({
    fileName: z.string().min(1).optional(),
    maxFileSize: z.number().int().positive().default(DEFAULT_MAX_FILE_SIZE),
    signatures: signatureOverridesSchema.optional(),
  })
  .strict();

export type ResolvedScanOptions = z.output<typeof scanOptionsSchema>;

/**
 * Validate options and fill in defaults. The logger is not part of the schema.
 */
export function resolveScanOptions(options: ScanOptions = {}): ResolvedScanOptions {
  const { logger: _logger, ...rest } = options;
  const parsed = scanOptionsSchema.safeParse(rest);

  if (!parsed.success) {
    throw new ScanConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  return parsed.data;
}
