/**
 * DocumentMetadata - the fixed-schema record produced per extracted document
 *
 * Fields are never omitted. Categorical fields fall back to UNKNOWN, optional
 * fields to null, and the summary to ''.
 */

/** Sentinel for categorical fields that could not be determined */
export const UNKNOWN = 'Unknown';

/**
 * Column order of the tabular artifact. Also the key order of DocumentMetadata.
 */
export const METADATA_COLUMNS = [
  'type',
  'source',
  'region',
  'country',
  'model',
  'xev',
  'year1',
  'year2',
  'language',
  'version',
  'updated_at',
  'file_format',
  'content_summary',
] as const;

export type MetadataColumn = (typeof METADATA_COLUMNS)[number];

export interface DocumentMetadata {
  /** Document type (brochure, spec sheet, press release, ...) */
  readonly type: string;
  /** Publishing source or channel */
  readonly source: string;
  readonly region: string;
  readonly country: string;
  /** Vehicle model name */
  readonly model: string;
  /** Electrified powertrain code (EV, HEV, PHEV); null for combustion or unknown */
  readonly xev: string | null;
  /** Start of the model-year range */
  readonly year1: number | null;
  /** End of the model-year range */
  readonly year2: number | null;
  readonly language: string;
  readonly version: string | null;
  /** Content date as written in the source (free text) */
  readonly updated_at: string | null;
  /** PDF, PPT, DOC, video, ... */
  readonly file_format: string;
  readonly content_summary: string;
}

/**
 * The record every failure degrades to
 */
export function defaultMetadata(fileFormat: string = UNKNOWN): DocumentMetadata {
  return Object.freeze({
    type: UNKNOWN,
    source: UNKNOWN,
    region: UNKNOWN,
    country: UNKNOWN,
    model: UNKNOWN,
    xev: null,
    year1: null,
    year2: null,
    language: UNKNOWN,
    version: null,
    updated_at: null,
    file_format: fileFormat,
    content_summary: '',
  });
}

/**
 * Freeze a record so it cannot change after creation
 */
export function freezeMetadata(metadata: DocumentMetadata): DocumentMetadata {
  return Object.freeze({ ...metadata });
}
