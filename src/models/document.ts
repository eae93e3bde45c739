/**
 * Source and extraction interfaces
 *
 * A source is one stored object addressed by (bucket, key). Extraction turns it
 * into an ExtractedDocument whose shape is the same whichever path produced it.
 */

/**
 * File extensions accepted by the source filter (compared lowercase)
 */
export const SUPPORTED_FILE_TYPES = ['pptx', 'ppt', 'pdf', 'docx', 'doc'] as const;

export type SupportedFileType = (typeof SUPPORTED_FILE_TYPES)[number];

/**
 * Reference to one stored object. Immutable once resolved.
 */
export interface SourceLocator {
  /** Bucket (container) name */
  readonly bucket: string;

  /** Object key inside the bucket, no leading slash */
  readonly key: string;
}

/**
 * One page of recovered text
 */
export interface ExtractedPage {
  /** Page number as emitted by the extraction service (1-based) */
  pageNumber: number;

  /** Text sliced out of the owning full text; '' when the slice could not be resolved */
  text: string;
}

/**
 * Entity recognised by the extraction service
 */
export interface ExtractedEntity {
  type: string;
  mentionText: string;
  /** Confidence in [0, 1] */
  confidence: number;
}

/**
 * Which extraction path produced a document
 */
export type ExtractionPath = 'sync' | 'async' | 'video';

/**
 * Canonical extraction result shared by the sync path, the async path and the
 * video adapter. Page text is always a slice of the full text of the shard
 * (or response) it came from.
 */
export interface ExtractedDocument {
  /** Entire recovered text in reading order */
  fullText: string;

  /** Pages in emitted order; numbers are not renumbered across shards */
  pages: ExtractedPage[];

  /** Entities, unordered, not de-duplicated */
  entities: ExtractedEntity[];

  /** Where the document came from (gs:// URI or a video URL) */
  sourceUri: string;

  /** MIME type the document was processed as */
  mimeType: string;
}
