/**
 * Extraction Router
 *
 * Picks the sync or async path by object size. Size equal to the threshold
 * stays on the sync path. When the size lookup fails the router logs
 * SIZE_UNKNOWN and tries the sync path; if that also fails, the size error is
 * attached to the error it throws.
 *
 * @module services/extraction/router
 */

import { describeError, PipelineError } from '../../core/errors.js';
import type { ExtractedDocument, ExtractionPath, SourceLocator } from '../../models/document.js';
import type { Logger } from '../../utils/logger.js';
import type { ObjectStore } from '../storage/object-store.js';
import { formatGcsUri } from '../storage/locator.js';
import type { DocumentExtractor } from './sync-extractor.js';

/** 20 MiB, the Document AI online-processing ceiling */
export const DEFAULT_MAX_SYNC_BYTES = 20 * 1024 * 1024;

export interface RouteDecision {
  path: Extract<ExtractionPath, 'sync' | 'async'>;
  /** null when the size lookup failed */
  sizeBytes: number | null;
  sizeError: PipelineError | null;
}

export interface ExtractionOutcome {
  document: ExtractedDocument;
  path: ExtractionPath;
  sizeBytes: number | null;
}

export function selectPath(sizeBytes: number, maxSyncBytes: number): 'sync' | 'async' {
  return sizeBytes > maxSyncBytes ? 'async' : 'sync';
}

export class ExtractionRouter {
  constructor(
    private readonly store: ObjectStore,
    private readonly extractors: { sync: DocumentExtractor; async: DocumentExtractor },
    private readonly options: { maxSyncBytes: number },
    private readonly logger: Logger
  ) {}

  async decide(locator: SourceLocator): Promise<RouteDecision> {
    try {
      const sizeBytes = await this.store.size(locator);
      return { path: selectPath(sizeBytes, this.options.maxSyncBytes), sizeBytes, sizeError: null };
    } catch (error) {
      const cause = PipelineError.fromUnknown(error);
      const sizeError = new PipelineError(
        'SIZE_UNKNOWN',
        `Size lookup failed for ${formatGcsUri(locator)}: ${cause.message}`,
        { uri: formatGcsUri(locator), sizeLookupCategory: cause.category },
        { cause: error }
      );
      this.logger.warn(`${sizeError.message}; assuming small and using the sync path`);
      return { path: 'sync', sizeBytes: null, sizeError };
    }
  }

  async extract(locator: SourceLocator, signal?: AbortSignal): Promise<ExtractionOutcome> {
    const decision = await this.decide(locator);
    const uri = formatGcsUri(locator);
    this.logger.info(
      `${uri}: ${decision.sizeBytes === null ? 'size unknown' : `${decision.sizeBytes} bytes`} -> ${decision.path} path`
    );

    const extractor = decision.path === 'async' ? this.extractors.async : this.extractors.sync;
    try {
      const document = await extractor.extract(locator, signal);
      return { document, path: decision.path, sizeBytes: decision.sizeBytes };
    } catch (error) {
      if (decision.sizeError === null) throw error;
      const failure = PipelineError.fromUnknown(error);
      throw new PipelineError(
        failure.category,
        failure.message,
        { ...failure.details, sizeLookupError: describeError(decision.sizeError) },
        { cause: failure }
      );
    }
  }
}
