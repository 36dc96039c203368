import { realpath } from 'fs/promises';
import { posix } from 'path';
import type { UploadMode, CompressionStatus } from '../types/index.js';
import { getCompressionStatus, getFileType } from '../types/index.js';
import type { InputFile } from '../models/InputFile.js';
import {
  ANALYSIS_TEAM,
  Attribute,
  UNSPECIFIED,
  appendAttribute,
  appendOptionalAttribute,
  type MetadataRecord,
} from '../models/MetadataRecord.js';
import { calculateFileChecksum } from '../lib/checksum.js';
import { deriveSerialForm } from '../lib/identifier.js';
import { UnreadableInputError } from '../lib/errors.js';

/** Facts taken from the file name alone */
export interface NameFacts {
  fileType: string;
  compressionStatus: CompressionStatus;
}

/** Facts that need the file on disk */
export interface ContentFacts {
  /** Canonical path with symlinks resolved */
  alias: string;
  checksum: string;
}

export type FileFacts = NameFacts & ContentFacts;

export class RecordAssembler {
  classify(file: InputFile): NameFacts {
    return {
      fileType: getFileType(file.basename),
      compressionStatus: getCompressionStatus(file.extension),
    };
  }

  async readContentFacts(file: InputFile): Promise<ContentFacts> {
    let alias: string;
    try {
      alias = await realpath(file.path);
    } catch (error) {
      throw new UnreadableInputError(file.path, error);
    }

    const checksum = await calculateFileChecksum(file.path);
    return { alias, checksum };
  }

  /**
   * Core attributes in their fixed order, followed by the attributes the
   * upload mode allows.
   */
  buildRecord(
    file: InputFile,
    facts: FileFacts,
    destination: string,
    mode: UploadMode
  ): MetadataRecord {
    const record: MetadataRecord = [];

    appendAttribute(record, Attribute.PHI_CONTENT, UNSPECIFIED);
    appendAttribute(record, Attribute.PII_CONTENT, UNSPECIFIED);
    appendAttribute(record, Attribute.DATA_ENCRYPTION_STATUS, UNSPECIFIED);
    appendAttribute(record, Attribute.ANALYSIS_TEAM, ANALYSIS_TEAM);
    appendAttribute(record, Attribute.OBJECT_NAME, posix.join(destination, file.basename));
    appendAttribute(record, Attribute.ALIAS, facts.alias);
    appendAttribute(record, Attribute.FILE_TYPE, facts.fileType);
    appendAttribute(record, Attribute.DATA_COMPRESSION_STATUS, facts.compressionStatus);
    appendAttribute(record, Attribute.MD5_CHECKSUM, facts.checksum);

    this.appendModeAttributes(record, mode);
    return record;
  }

  private appendModeAttributes(record: MetadataRecord, mode: UploadMode): void {
    switch (mode.kind) {
      case 'sample':
        appendOptionalAttribute(record, Attribute.SAMPLE_NAME, mode.sampleName);
        this.appendAnalysisId(record, mode.analysisId);
        appendOptionalAttribute(record, Attribute.ANALYSIS_COLLECTION, mode.analysisCollection);
        return;

      case 'combined':
        this.appendAnalysisId(record, mode.analysisId);
        return;

      default: {
        const unhandled: never = mode;
        throw new Error(`Unhandled upload mode: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private appendAnalysisId(record: MetadataRecord, analysisId: string | undefined): void {
    if (!analysisId) {
      return;
    }
    appendAttribute(record, Attribute.MD5_ALL_INPUTS, analysisId);
    appendOptionalAttribute(record, Attribute.MD5_ALL_INPUTS_SERIAL, deriveSerialForm(analysisId));
  }
}
