import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { createHash } from 'crypto';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { calculateFileChecksum } from '../../src/lib/checksum.js';
import { UnreadableInputError } from '../../src/lib/errors.js';

describe('Checksum utilities', () => {
  let workDir: string;

  beforeAll(() => {
    workDir = mkdtempSync(join(tmpdir(), 'checksum-'));
  });

  afterAll(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  describe('calculateFileChecksum', () => {
    it('should hash an empty file', async () => {
      const filePath = join(workDir, 'empty.txt');
      writeFileSync(filePath, '');

      await expect(calculateFileChecksum(filePath)).resolves.toBe('d41d8cd98f00b204e9800998ecf8427e');
    });

    it('should match the MD5 of the file contents', async () => {
      const filePath = join(workDir, 'fox.txt');
      writeFileSync(filePath, 'The quick brown fox jumps over the lazy dog');

      await expect(calculateFileChecksum(filePath)).resolves.toBe('9e107d9d372bb6826bd81d3542a419d6');
    });

    it('should not depend on the chunk size', async () => {
      const content = Buffer.alloc(200 * 1024 + 17);
      for (let i = 0; i < content.length; i++) {
        content[i] = (i * 31) % 251;
      }
      const filePath = join(workDir, 'large.bin');
      writeFileSync(filePath, content);
      const expected = createHash('md5').update(content).digest('hex');

      await expect(calculateFileChecksum(filePath)).resolves.toBe(expected);
      await expect(calculateFileChecksum(filePath, 1000)).resolves.toBe(expected);
      await expect(calculateFileChecksum(filePath, 7)).resolves.toBe(expected);
    });

    it('should reject with UnreadableInputError for a missing file', async () => {
      const filePath = join(workDir, 'missing.txt');

      await expect(calculateFileChecksum(filePath)).rejects.toBeInstanceOf(UnreadableInputError);
      await expect(calculateFileChecksum(filePath)).rejects.toMatchObject({ path: filePath });
    });
  });
});
