/**
 * Metadata extractor contract
 */

import type { ExtractedDocument } from '../../models/document.js';
import type { DocumentMetadata } from '../../models/metadata.js';

export type MetadataExtractorKind = 'rules' | 'ai';

export const METADATA_EXTRACTOR_KINDS: readonly MetadataExtractorKind[] = ['rules', 'ai'];

/**
 * Extraction outcome. `defaulted` is true when the record is the fallback
 * default rather than derived data.
 */
export interface MetadataOutcome {
  metadata: DocumentMetadata;
  defaulted: boolean;
  /** Why the record was defaulted */
  reason?: string;
}

/**
 * ExtractedDocument in, DocumentMetadata out. Implementations never reject.
 */
export interface MetadataExtractor {
  readonly kind: MetadataExtractorKind;
  extract(document: ExtractedDocument): Promise<MetadataOutcome>;
}
