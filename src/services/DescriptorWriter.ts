import { writeFile } from 'fs/promises';
import { resolve } from 'path';
import type { MetadataRecord } from '../models/MetadataRecord.js';
import { DescriptorWriteError } from '../lib/errors.js';
import { getLogger } from '../lib/logger.js';

export const DESCRIPTOR_SUFFIX = '.metadata.json';

const INDENT = 4;

export interface Descriptor {
  metadataEntries: MetadataRecord;
}

/**
 * Descriptor location for an input: its absolute path plus the suffix.
 */
export function getDescriptorPath(inputPath: string): string {
  return `${resolve(inputPath)}${DESCRIPTOR_SUFFIX}`;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries.map(([key, child]) => [key, sortKeys(child)]));
  }
  return value;
}

function escapeNonAscii(json: string): string {
  return json.replace(
    /[\u0080-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

/**
 * Deterministic text form: sorted keys, four-space indentation, ASCII only.
 */
export function serializeDescriptor(record: MetadataRecord): string {
  const descriptor: Descriptor = { metadataEntries: record };
  return escapeNonAscii(JSON.stringify(sortKeys(descriptor), null, INDENT));
}

export class DescriptorWriter {
  private logger = getLogger();

  /**
   * Overwrite outputPath with the serialized record
   */
  async write(record: MetadataRecord, outputPath: string): Promise<void> {
    this.logger.info({ outputPath }, `Writing metadata file: ${outputPath}`);

    try {
      await writeFile(outputPath, serializeDescriptor(record), 'utf8');
    } catch (error) {
      throw new DescriptorWriteError(outputPath, error);
    }
  }
}
