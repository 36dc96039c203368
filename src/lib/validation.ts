/**
 * Precondition checks run before any metadata is generated
 */

import { access, stat } from 'fs/promises';
import { constants } from 'fs';
import { ValidationError } from './errors.js';

/**
 * Every input must exist, be a regular file and be readable.
 * Inputs are checked in order and the first failing path is reported.
 */
export async function validateInputFiles(paths: string[]): Promise<void> {
  if (paths.length === 0) {
    throw new ValidationError('At least one input file is required');
  }

  for (const path of paths) {
    await validateInputFile(path);
  }
}

export async function validateInputFile(path: string): Promise<void> {
  let isFile: boolean;
  try {
    isFile = (await stat(path)).isFile();
  } catch {
    throw new ValidationError(`Input file does not exist: ${path}`, path);
  }

  if (!isFile) {
    throw new ValidationError(`Input path is not a file: ${path}`, path);
  }

  try {
    await access(path, constants.R_OK);
  } catch {
    throw new ValidationError(`Input file is not readable: ${path}`, path);
  }
}

/**
 * The destination collection is opaque; only its presence is checked.
 */
export function validateDestination(destination: string): void {
  if (destination.trim() === '') {
    throw new ValidationError('Destination collection path must not be empty');
  }
}
