import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { getLogger } from './logger.js';
import { UnreadableInputError } from './errors.js';

/** MD5 is the checksum attribute the archive expects */
export const CHECKSUM_ALGORITHM = 'md5';

export const CHECKSUM_CHUNK_SIZE = 64 * 1024;

/**
 * Calculate MD5 checksum from a file path, reading it in fixed-size chunks
 * @param filePath Path to file
 * @param chunkSize Bytes per read
 * @returns Promise that resolves with hex-encoded checksum
 */
export async function calculateFileChecksum(
  filePath: string,
  chunkSize: number = CHECKSUM_CHUNK_SIZE
): Promise<string> {
  const logger = getLogger();
  const hash = createHash(CHECKSUM_ALGORITHM);
  const stream = createReadStream(filePath, { highWaterMark: chunkSize });

  return new Promise((resolve, reject) => {
    stream.on('data', (chunk) => {
      hash.update(chunk);
    });

    stream.on('end', () => {
      const checksum = hash.digest('hex');
      logger.debug({ filePath, checksum }, 'File checksum calculated');
      resolve(checksum);
    });

    stream.on('error', (error) => {
      logger.error({ filePath, error }, 'Error calculating file checksum');
      reject(new UnreadableInputError(filePath, error));
    });
  });
}

