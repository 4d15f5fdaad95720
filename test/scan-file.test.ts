import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { scanFile, scanPath } from '../src/index.js';
import { ScanConfigError } from '../src/errors.js';
import { ThreatType } from '../src/types.js';
import { memoryLogger } from './helpers/logger.js';
import { pdf, pdfWithObject } from './helpers/pdf.js';

describe('scanFile', () => {
  it('reports a clean document', async () => {
    const result = await scanFile(pdf());

    expect(result.isClean).toBe(true);
    expect(result.threats).toEqual([]);
    expect(result.fileName).toBe('buffer');
    expect(result.fileSize).toBe(pdf().length);
    expect(result.fileType).toEqual({ ext: 'pdf', mime: 'application/pdf' });
    expect(result.metadata).toEqual({
      magicBytes: '255044462D312E34',
      signatureValid: true,
      headerOffset: 0,
      version: '1.4',
      checksPerformed: [
        'StructureValidation',
        'JavaScriptDetection',
        'FormDetection',
        'ExternalReferenceDetection',
        'EmbeddedFileDetection',
      ],
      warnings: [],
    });
  });

  it('reports the first violation as a single threat', async () => {
    const result = await scanFile(pdfWithObject('<</S/JavaScript/AcroForm 6 0 R>>'), { fileName: 'doc.pdf' });

    expect(result.isClean).toBe(false);
    expect(result.fileName).toBe('doc.pdf');
    expect(result.threats).toEqual([
      {
        type: ThreatType.SCRIPT_DETECTED,
        severity: 'critical',
        description: 'JavaScript detected in PDF',
        location: 'JavaScriptDetection',
      },
    ]);
  });

  it('reports a missing header', async () => {
    const result = await scanFile(Buffer.from('hello world'));

    expect(result.isClean).toBe(false);
    expect(result.metadata.signatureValid).toBe(false);
    expect(result.metadata.checksPerformed).toEqual(['StructureValidation']);
    expect(result.threats[0]?.type).toBe(ThreatType.INVALID_STRUCTURE);
  });

  it('records a header after leading garbage', async () => {
    const result = await scanFile(Buffer.concat([Buffer.from('garbage\n'), pdf()]));

    expect(result.isClean).toBe(true);
    expect(result.metadata.headerOffset).toBe(8);
    expect(result.metadata.warnings).toContain('Header found at offset 8');
  });

  it('warns about a missing EOF marker', async () => {
    const result = await scanFile(Buffer.from('%PDF-1.4\n1 0 obj\n<< /Type /Catalog >>\nendobj\n'));

    expect(result.isClean).toBe(true);
    expect(result.metadata.warnings).toContain('Missing %%EOF terminator');
  });

  it('skips oversized buffers', async () => {
    const result = await scanFile(pdf(), { maxFileSize: 10 });

    expect(result.isClean).toBe(false);
    expect(result.metadata.checksPerformed).toEqual([]);
    expect(result.threats).toEqual([
      {
        type: ThreatType.EXCESSIVE_SIZE,
        severity: 'high',
        description: `File exceeds maximum size (${pdf().length} > 10 bytes)`,
      },
    ]);
  });

  it('applies custom signatures', async () => {
    const buffer = pdfWithObject('<</AcroForm 6 0 R>>');

    expect((await scanFile(buffer)).threats[0]?.type).toBe(ThreatType.FORM_DETECTED);
    expect((await scanFile(buffer, { signatures: { forms: [] } })).isClean).toBe(true);
  });

  it.each([
    ['a negative size limit', { maxFileSize: -1 }],
    ['a fractional size limit', { maxFileSize: 1.5 }],
    ['an empty file name', { fileName: '' }],
  ])('rejects %s', async (_name, options) => {
    await expect(scanFile(pdf(), options)).rejects.toBeInstanceOf(ScanConfigError);
  });

  it('rejects an unknown signature list', async () => {
    const options = { signatures: { forms: [], macros: ['x'] } };
    await expect(scanFile(pdf(), options)).rejects.toThrow('signatures: Unrecognized key(s) in object');
  });

  it('logs a rejected file', async () => {
    const { logger, lines } = memoryLogger();
    await scanFile(pdfWithObject('<</S/Launch>>'), { fileName: 'doc.pdf', logger });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 40,
      fileName: 'doc.pdf',
      threat: ThreatType.EXTERNAL_REF_DETECTED,
      msg: 'scan rejected file',
    });
  });

  it('logs a clean file at debug level', async () => {
    const { logger, lines } = memoryLogger();
    await scanFile(pdf(), { logger });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 20, fileName: 'buffer', msg: 'scan passed' });
  });
});

describe('scanPath', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pdf-gate-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('scans a file from disk under its base name', async () => {
    const file = path.join(dir, 'sample.pdf');
    await fs.writeFile(file, pdf());

    const result = await scanPath(file);
    expect(result.fileName).toBe('sample.pdf');
    expect(result.isClean).toBe(true);
  });

  it('refuses to read a file over the size limit', async () => {
    const file = path.join(dir, 'large.pdf');
    await fs.writeFile(file, pdf());

    const result = await scanPath(file, { maxFileSize: 5 });
    expect(result.isClean).toBe(false);
    expect(result.fileSize).toBe(pdf().length);
    expect(result.threats[0]?.type).toBe(ThreatType.EXCESSIVE_SIZE);
  });

  it('propagates other read errors', async () => {
    await expect(scanPath(path.join(dir, 'missing.pdf'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
