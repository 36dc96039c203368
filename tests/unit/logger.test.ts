import { describe, it, expect, afterEach } from '@jest/globals';
import { createLogger, createJobLogger, initLogger } from '../../src/lib/logger.js';
import { createInputFile } from '../../src/models/InputFile.js';
import { createProcessingJob } from '../../src/models/ProcessingJob.js';

function captureLines(): { lines: Record<string, unknown>[]; write: (msg: string) => void } {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    write: (msg: string) => {
      lines.push(JSON.parse(msg));
    },
  };
}

describe('Logger', () => {
  afterEach(() => {
    initLogger({ level: 'error', pretty: false });
  });

  it('should write named lines with string level labels', () => {
    const output = captureLines();
    const logger = createLogger({ level: 'info', pretty: false }, output);

    logger.info({ outputPath: '/data/a.txt.metadata.json' }, 'Writing metadata file');
    logger.debug('hidden');

    expect(output.lines).toHaveLength(1);
    expect(output.lines[0]).toMatchObject({
      level: 'info',
      name: 'archive-metadata',
      outputPath: '/data/a.txt.metadata.json',
      msg: 'Writing metadata file',
    });
  });

  it('should serialize errors logged under the error key', () => {
    const output = captureLines();
    const logger = createLogger({ level: 'error', pretty: false }, output);

    logger.error({ error: new Error('disk full') }, 'Write failed');

    expect(output.lines[0]?.error).toMatchObject({ type: 'Error', message: 'disk full' });
  });

  it('should tag job lines with the job id and file', () => {
    const output = captureLines();
    initLogger({ level: 'info', pretty: false }, output);
    const job = createProcessingJob(createInputFile('/data/S1.bam'));

    createJobLogger(job).info('Starting metadata generation');

    expect(output.lines[0]).toMatchObject({ jobId: job.id, filePath: '/data/S1.bam' });
  });
});
