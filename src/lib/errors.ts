/**
 * Custom error classes for metadata generation
 */

export class MetadataError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised before processing starts when an input or flag is unusable
 */
export class ValidationError extends MetadataError {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(message);
    this.path = path;
  }
}

/**
 * An input file could not be read while its metadata was being derived
 */
export class UnreadableInputError extends MetadataError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Unable to read input file ${path}: ${describeCause(cause)}`, { cause });
    this.path = path;
  }
}

export class DescriptorWriteError extends MetadataError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Unable to write metadata file ${path}: ${describeCause(cause)}`, { cause });
    this.path = path;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
