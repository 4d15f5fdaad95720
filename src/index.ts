/**
 * pdf-gate - Reject PDF buffers that carry scripts, forms, external actions or embedded files
 * @packageDocumentation
 */

import path from 'path';
import { fileTypeFromBuffer } from 'file-type';
import { resolveScanOptions } from './config.js';
import type { PdfCheckError } from './errors.js';
import { DEFAULT_SIGNATURES, createSignatureSet } from './signatures.js';
import { bufferToHex, FileSizeError, readFileAsBuffer } from './utils/file-reader.js';
import { silentLogger } from './utils/logger.js';
import { createPdfChecker } from './validators/pdf-validator.js';
import { describeHeader } from './validators/structure-validator.js';
import { ThreatType, type ScanOptions, type ScanResult, type Threat } from './types.js';

const SEVERITY: Record<PdfCheckError['kind'], Threat['severity']> = {
  [ThreatType.INVALID_STRUCTURE]: 'high',
  [ThreatType.SCRIPT_DETECTED]: 'critical',
  [ThreatType.FORM_DETECTED]: 'medium',
  [ThreatType.EXTERNAL_REF_DETECTED]: 'high',
  [ThreatType.EMBEDDED_FILE_DETECTED]: 'high',
};

const PDF_MIME = 'application/pdf';

const defaultChecker = createPdfChecker(DEFAULT_SIGNATURES);

/**
 * Scans a buffer and reports the first dangerous feature found
 * @param buffer - File buffer to scan
 * @param options - Scanning options
 * @returns Promise resolving to scan results
 */
export async function scanFile(buffer: Uint8Array, options: ScanOptions = {}): Promise<ScanResult> {
  const { fileName = 'buffer', maxFileSize, signatures } = resolveScanOptions(options);
  const logger = (options.logger ?? silentLogger).child({ fileName });
  const checker = signatures ? createPdfChecker(createSignatureSet(signatures)) : defaultChecker;

  const result: ScanResult = {
    fileName,
    isClean: true,
    threats: [],
    scannedAt: new Date(),
    fileSize: buffer.length,
    metadata: {
      signatureValid: false,
      checksPerformed: [],
      warnings: [],
    },
  };

  if (buffer.length > maxFileSize) {
    result.threats.push({
      type: ThreatType.EXCESSIVE_SIZE,
      severity: 'high',
      description: `File exceeds maximum size (${buffer.length} > ${maxFileSize} bytes)`,
    });
    result.isClean = false;
    logger.warn({ fileSize: buffer.length, maxFileSize }, 'scan skipped: file too large');
    return result;
  }

  try {
    const detectedType = await fileTypeFromBuffer(buffer);
    if (detectedType) {
      result.fileType = { ext: detectedType.ext, mime: detectedType.mime };
      if (detectedType.mime !== PDF_MIME) {
        result.metadata.warnings.push(`Content sniffed as ${detectedType.mime}`);
      }
    } else {
      result.metadata.warnings.push('Unable to determine file type');
    }

    const header = describeHeader(buffer);
    result.metadata.magicBytes = bufferToHex(buffer, 8);
    result.metadata.signatureValid = header !== null;
    if (header) {
      result.metadata.headerOffset = header.offset;
      if (header.version !== undefined) result.metadata.version = header.version;
      if (header.offset > 0) {
        result.metadata.warnings.push(`Header found at offset ${header.offset}`);
      }
      if (header.version === undefined || !/^[12]\.\d$/.test(header.version)) {
        result.metadata.warnings.push(`Unusual PDF version: ${header.version ?? 'missing'}`);
      }
      if (!Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength).includes('%%EOF')) {
        result.metadata.warnings.push('Missing %%EOF terminator');
      }
    }

    const { error, checksPerformed } = checker.inspect(buffer);
    result.metadata.checksPerformed = checksPerformed;

    if (error) {
      result.threats.push({
        type: error.kind,
        severity: SEVERITY[error.kind],
        description: error.message,
        location: checksPerformed[checksPerformed.length - 1],
      });
    }
  } catch (error) {
    logger.error({ err: error }, 'scan failed');
    result.threats.push({
      type: ThreatType.INVALID_STRUCTURE,
      severity: 'critical',
      description: `Error scanning file: ${error instanceof Error ? error.message : String(error)}`,
    });
  }

  result.isClean = result.threats.length === 0;

  if (result.isClean) {
    logger.debug({ checksPerformed: result.metadata.checksPerformed }, 'scan passed');
  } else {
    logger.warn({ threat: result.threats[0]?.type }, 'scan rejected file');
  }

  return result;
}

/**
 * Reads a file from disk and scans it. The size limit applies before the file is read.
 */
export async function scanPath(filePath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const { maxFileSize } = resolveScanOptions(options);
  const fileName = options.fileName ?? path.basename(filePath);

  try {
    const buffer = await readFileAsBuffer(filePath, maxFileSize);
    return await scanFile(buffer, { ...options, fileName });
  } catch (error) {
    if (!(error instanceof FileSizeError)) throw error;

    (options.logger ?? silentLogger)
      .child({ fileName })
      .warn({ fileSize: error.size, maxFileSize }, 'scan skipped: file too large');
    return {
      fileName,
      isClean: false,
      threats: [
        {
          type: ThreatType.EXCESSIVE_SIZE,
          severity: 'high',
          description: `File exceeds maximum size (${error.size} > ${maxFileSize} bytes)`,
        },
      ],
      scannedAt: new Date(),
      fileSize: error.size,
      metadata: {
        signatureValid: false,
        checksPerformed: [],
        warnings: [],
      },
    };
  }
}

export { checkPDF, checkPDF as check, createPdfChecker } from './validators/pdf-validator.js';
export type { Inspection, PdfChecker } from './validators/pdf-validator.js';
export { validateStructure, describeHeader, HEADER_WINDOW, PDF_MAGIC } from './validators/structure-validator.js';
export { detectScript, HEX_CONTEXT_WINDOW } from './validators/script-detector.js';
export { detectForms } from './validators/form-detector.js';
export { detectExternalRefs } from './validators/external-ref-detector.js';
export { detectEmbeddedFiles } from './validators/embedded-file-detector.js';
export { stripStreams, collapseWhitespace, decodeText } from './utils/normalize.js';
export { createSignatureSet, compileSignature, DEFAULT_SIGNATURES } from './signatures.js';
export type { SignatureSet } from './signatures.js';
export { DEFAULT_MAX_FILE_SIZE, resolveScanOptions } from './config.js';
export { createLogger } from './utils/logger.js';
export type { Logger, LoggingConfig } from './utils/logger.js';
export { FileSizeError } from './utils/file-reader.js';
export * from './errors.js';

// Re-export types
export * from './types.js';

export default {
  scanFile,
  scanPath,
};
