import { describe, it, expect, vi } from 'vitest';
import { scanFile } from '../src/index.js';
import { ThreatType } from '../src/types.js';
import { memoryLogger } from './helpers/logger.js';
import { pdf } from './helpers/pdf.js';

vi.mock('file-type', () => ({
  fileTypeFromBuffer: vi.fn(async () => {
    throw new Error('sniff failed');
  }),
}));

describe('scanFile when scanning throws', () => {
  it('turns the failure into a critical threat', async () => {
    const result = await scanFile(pdf());

    expect(result.isClean).toBe(false);
    expect(result.threats).toEqual([
      {
        type: ThreatType.INVALID_STRUCTURE,
        severity: 'critical',
        description: 'Error scanning file: sniff failed',
      },
    ]);
    expect(result.metadata.checksPerformed).toEqual([]);
  });

  it('logs the error before the rejection', async () => {
    const { logger, lines } = memoryLogger();
    await scanFile(pdf(), { fileName: 'doc.pdf', logger });

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({ level: 50, fileName: 'doc.pdf', msg: 'scan failed' });
    expect(lines[0]?.err).toMatchObject({ message: 'sniff failed' });
    expect(lines[1]).toMatchObject({
      level: 40,
      fileName: 'doc.pdf',
      threat: ThreatType.INVALID_STRUCTURE,
      msg: 'scan rejected file',
    });
  });
});
