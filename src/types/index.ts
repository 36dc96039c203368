import { basename, extname } from 'path';

// ============================================================================
// Enums
// ============================================================================

export enum CompressionStatus {
  COMPRESSED = 'Compressed',
  NOT_COMPRESSED = 'Not Compressed'
}

export enum ProcessingStatus {
  PENDING = 'pending',
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  FAILED = 'failed'
}

export enum ProcessingStep {
  TYPE_DETECTION = 'type_detection',
  CHECKSUM_CALCULATION = 'checksum_calculation',
  RECORD_ASSEMBLY = 'record_assembly',
  DESCRIPTOR_WRITE = 'descriptor_write'
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface ProcessingConfig {
  maxConcurrency: number;
}

export interface LoggingConfig {
  level: 'debug' | 'info' | 'warn' | 'error';
  pretty: boolean;
}

export interface AppConfig {
  processing: ProcessingConfig;
  logging: LoggingConfig;
}

// ============================================================================
// Upload Modes
// ============================================================================

export interface SampleUploadMode {
  kind: 'sample';
  sampleName?: string;
  analysisId?: string;
  /** Analysis collection path in the archive */
  analysisCollection?: string;
}

export interface CombinedUploadMode {
  kind: 'combined';
  analysisId?: string;
}

export type UploadMode = SampleUploadMode | CombinedUploadMode;

// ============================================================================
// Controlled Vocabularies
// ============================================================================

export const COMPRESSED_EXTENSIONS: ReadonlySet<string> = new Set([
  'bz2',
  'gz',
  'bam',
  'xz',
  'rar',
  'tar',
  'tbz2',
  'tgz',
  'zip',
  '7z'
]);

/** Types never replaced by the name-based overrides */
const OVERRIDE_EXEMPT_TYPES = ['MD5', 'JSON'] as const;

const FILE_TYPE_OVERRIDES = [
  { pattern: 'counts', type: 'COUNTS' },
  { pattern: 'fastq', type: 'FASTQ' }
] as const;

const GZIP_STRIP_CHARS = new Set(['.', 'g', 'z']);

// ============================================================================
// Classification
// ============================================================================

/**
 * Lowercased final extension of a file name, without the dot.
 */
export function getExtension(filename: string): string {
  return extname(basename(filename)).slice(1).toLowerCase();
}

export function getCompressionStatus(extension: string): CompressionStatus {
  return COMPRESSED_EXTENSIONS.has(extension)
    ? CompressionStatus.COMPRESSED
    : CompressionStatus.NOT_COMPRESSED;
}

/**
 * Drop a trailing gzip suffix by stripping every trailing '.', 'g' or 'z',
 * so "reads.gz.gz" becomes "reads", "x.tsv.gzg" becomes "x.tsv" and
 * "x.log" becomes "x.lo".
 */
export function stripGzipSuffix(filename: string): string {
  let end = filename.length;
  while (end > 0 && GZIP_STRIP_CHARS.has(filename[end - 1] ?? '')) {
    end--;
  }
  return filename.slice(0, end);
}

/**
 * Infer the archive file type from a file name.
 *
 * The default is the uppercased last dot segment once any gzip suffix is
 * removed. Names containing "counts" (checked first) or "fastq" are forced to
 * COUNTS or FASTQ unless the default is MD5 or JSON.
 */
export function getFileType(filename: string): string {
  const stripped = stripGzipSuffix(filename);
  const segments = stripped.split('.');
  const fileType = (segments[segments.length - 1] ?? '').toUpperCase();

  if (OVERRIDE_EXEMPT_TYPES.some(exempt => exempt === fileType)) {
    return fileType;
  }

  const lowerName = stripped.toLowerCase();
  const override = FILE_TYPE_OVERRIDES.find(({ pattern }) => lowerName.includes(pattern));
  return override ? override.type : fileType;
}
