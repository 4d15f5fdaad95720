/**
 * Type definitions for pdf-gate
 * @packageDocumentation
 */
import type { Logger } from './utils/logger.js';

/**
 * Result of a PDF scan
 */
export interface ScanResult {
  /** Name of the file (optional) */
  fileName: string;
  /** Whether the file passed every check */
  isClean: boolean;
  /** Detected threats. The gate stops at the first one, so this holds at most one entry */
  threats: Threat[];
  /** Timestamp of when the scan was performed */
  scannedAt: Date;
  /** Sniffed file type, when the content could be identified */
  fileType?: FileTypeInfo;
  /** File size in bytes */
  fileSize: number;
  /** Additional metadata */
  metadata: FileMetadata;
}

/**
 * Represents a detected threat
 */
export interface Threat {
  /** Type of threat detected */
  type: ThreatType;
  /** Severity level */
  severity: 'low' | 'medium' | 'high' | 'critical';
  /** Description of the threat */
  description: string;
  /** Check that reported the threat */
  location?: string;
  /** Additional context */
  details?: Record<string, unknown>;
}

/**
 * File type information as sniffed from the content
 */
export interface FileTypeInfo {
  /** File extension */
  ext: string;
  /** MIME type */
  mime: string;
}

/**
 * File metadata
 */
export interface FileMetadata {
  /** First bytes of the buffer, hex encoded */
  magicBytes?: string;
  /** Whether the %PDF- marker was found inside the header window */
  signatureValid: boolean;
  /** Byte offset of the %PDF- marker */
  headerOffset?: number;
  /** Version declared by the header, e.g. "1.7" */
  version?: string;
  /** Checks that ran, in order, up to the first violation */
  checksPerformed: string[];
  /** Warnings (non-blocking issues) */
  warnings: string[];
}

/**
 * Threat type enumeration
 */
export enum ThreatType {
  INVALID_STRUCTURE = 'InvalidStructure',
  SCRIPT_DETECTED = 'ScriptDetected',
  FORM_DETECTED = 'FormDetected',
  EXTERNAL_REF_DETECTED = 'ExternalRefDetected',
  EMBEDDED_FILE_DETECTED = 'EmbeddedFileDetected',

  // Raised by the scanning wrapper before any check runs
  EXCESSIVE_SIZE = 'ExcessiveSize',
}

/**
 * Kinds a check can report. Closed set, one per detector category.
 */
export type CheckErrorKind = Exclude<ThreatType, ThreatType.EXCESSIVE_SIZE>;

/**
 * Pattern given by a caller: strings compile case-insensitively,
 * RegExps keep their own flags minus `g` and `y`.
 */
export type SignaturePattern = string | RegExp;

/**
 * Replacement lists for the detector categories. A list that is left out keeps its default.
 */
export interface SignatureOverrides {
  script?: SignaturePattern[];
  forms?: SignaturePattern[];
  externalRefs?: SignaturePattern[];
  embeddedFiles?: SignaturePattern[];
}

/**
 * Scanner options
 */
export interface ScanOptions {
  /** Optional file name for reference */
  fileName?: string;
  /** Maximum file size to scan (in bytes) */
  maxFileSize?: number;
  /** Custom signature lists */
  signatures?: SignatureOverrides;
  /** Logger receiving scan verdicts. Silent when omitted */
  logger?: Logger;
}
