export interface AttributeEntry {
  attribute: string;
  value: string;
}

/**
 * Ordered attribute entries for one file. Entries are appended, never merged,
 * so an attribute name may repeat.
 */
export type MetadataRecord = AttributeEntry[];

export const UNSPECIFIED = 'Unspecified';

export const ANALYSIS_TEAM = 'CCBR';

export const Attribute = {
  PHI_CONTENT: 'phi_content',
  PII_CONTENT: 'pii_content',
  DATA_ENCRYPTION_STATUS: 'data_encryption_status',
  ANALYSIS_TEAM: 'analysis_team',
  OBJECT_NAME: 'object_name',
  ALIAS: 'alias',
  FILE_TYPE: 'file_type',
  DATA_COMPRESSION_STATUS: 'data_compression_status',
  MD5_CHECKSUM: 'md5_checksum',
  SAMPLE_NAME: 'sample_name',
  MD5_ALL_INPUTS: 'md5_all_inputs',
  MD5_ALL_INPUTS_SERIAL: 'md5_all_inputs_serial',
  ANALYSIS_COLLECTION: 'analysis_collection',
} as const;

export type AttributeName = (typeof Attribute)[keyof typeof Attribute];

export function appendAttribute(
  record: MetadataRecord,
  attribute: AttributeName,
  value: string
): void {
  record.push({ attribute, value });
}

/**
 * Append only when a value was supplied; empty strings count as absent.
 */
export function appendOptionalAttribute(
  record: MetadataRecord,
  attribute: AttributeName,
  value: string | null | undefined
): void {
  if (value) {
    appendAttribute(record, attribute, value);
  }
}
