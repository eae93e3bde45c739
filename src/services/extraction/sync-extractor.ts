/**
 * Synchronous extraction: one blocking Document AI call per document.
 *
 * @module services/extraction/sync-extractor
 */

import type { ExtractedDocument, SourceLocator } from '../../models/document.js';
import type { Logger } from '../../utils/logger.js';
import { formatGcsUri } from '../storage/locator.js';
import type { DocumentUnderstandingService } from './document-ai.js';
import { SyncExtractionError } from './errors.js';
import { inferMimeType } from './mime.js';
import { normalizeDocument, type DocumentLike } from './normalize.js';

/**
 * Anything that turns a locator into a canonical document
 */
export interface DocumentExtractor {
  extract(locator: SourceLocator, signal?: AbortSignal): Promise<ExtractedDocument>;
}

export class SyncExtractor implements DocumentExtractor {
  constructor(
    private readonly service: DocumentUnderstandingService,
    private readonly logger: Logger
  ) {}

  async extract(locator: SourceLocator): Promise<ExtractedDocument> {
    const uri = formatGcsUri(locator);
    const mimeType = inferMimeType(locator.key);
    this.logger.debug(`Processing ${uri} as ${mimeType}`);

    let raw: DocumentLike;
    try {
      raw = await this.service.process({ gcsUri: uri, mimeType });
    } catch (error) {
      throw new SyncExtractionError(
        `Document AI processing failed for ${uri}: ${error instanceof Error ? error.message : String(error)}`,
        uri,
        mimeType,
        error
      );
    }

    const document = normalizeDocument(raw, uri, mimeType);
    this.logger.debug(`Extracted ${document.fullText.length} chars, ${document.pages.length} pages from ${uri}`);
    return document;
  }
}
