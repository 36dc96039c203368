import { basename, resolve } from 'path';
import { getExtension } from '../types/index.js';

export interface InputFile {
  /** Path as given on the command line */
  path: string;

  /** Absolute path, symlinks left in place */
  absolutePath: string;

  /** File name without directories */
  basename: string;

  /** Lowercased extension without the dot (e.g. 'gz', 'tsv') */
  extension: string;
}

export function createInputFile(path: string): InputFile {
  const name = basename(path);
  return {
    path,
    absolutePath: resolve(path),
    basename: name,
    extension: getExtension(name),
  };
}
