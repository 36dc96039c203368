import { mkdtempSync, readFileSync, rmSync, writeFileSync, mkdirSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { Descriptor } from '../src/services/DescriptorWriter.js';

export const ANALYSIS_ID = '26071405f2f1c3a6f71d4141edb208e2';
export const DESTINATION = '/Archive/Project_1234/Analysis';

/** MD5 of "ACGT\n" */
export const ACGT_MD5 = '58ce66d7df0a1cf9b360cabf43da3ea5';

/**
 * Create an empty scratch directory
 */
export function createWorkspace(prefix = 'archive-metadata-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeWorkspace(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a fixture file, creating parent directories as needed
 */
export function writeFixture(dir: string, name: string, content: string | Buffer = 'ACGT\n'): string {
  const filePath = join(dir, name);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
  return filePath;
}

export function readDescriptor(descriptorPath: string): Descriptor {
  return JSON.parse(readFileSync(descriptorPath, 'utf8'));
}

export function attributeNames(descriptor: Descriptor): string[] {
  return descriptor.metadataEntries.map(entry => entry.attribute);
}
