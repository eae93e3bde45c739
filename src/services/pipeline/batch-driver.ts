/**
 * Batch Driver
 *
 * Processes locators one at a time in input order. A failing item is
 * recorded in the audit log and skipped; the batch fails only when nothing
 * succeeded. One attempt per item. An aborted signal stops the loop.
 *
 * @module services/pipeline/batch-driver
 */

import { describeError, PipelineError, type ErrorCategory } from '../../core/errors.js';
import type { ExtractionPath, SourceLocator } from '../../models/document.js';
import type { DocumentMetadata } from '../../models/metadata.js';
import { OperationCancelledError } from '../../utils/deadline.js';
import type { Logger } from '../../utils/logger.js';
import type { AuditEntry, AuditLog } from '../audit.js';
import type { ExtractionOutcome } from '../extraction/router.js';
import type { MetadataExtractor } from '../metadata/types.js';
import { formatGcsUri } from '../storage/locator.js';

/**
 * What the driver needs from the router
 */
export interface LocatorExtractor {
  extract(locator: SourceLocator, signal?: AbortSignal): Promise<ExtractionOutcome>;
}

export interface ItemOutcome {
  uri: string;
  status: 'succeeded' | 'failed';
  path: ExtractionPath | null;
  durationMs: number;
  /** Metadata is the fallback default record */
  defaulted: boolean;
  category: ErrorCategory | null;
  error: string | null;
}

export interface ProcessedItem {
  metadata: DocumentMetadata;
  path: ExtractionPath;
  defaulted: boolean;
}

export interface BatchResult {
  /** One record per successful locator, in input order */
  records: DocumentMetadata[];
  items: ItemOutcome[];
  processed: number;
  failed: number;
  audit: readonly AuditEntry[];
}

export interface BatchDriverDeps {
  extractor: LocatorExtractor;
  metadata: MetadataExtractor;
  audit: AuditLog;
  logger: Logger;
  clock?: () => number;
}

export class BatchDriver {
  private readonly clock: () => number;

  constructor(private readonly deps: BatchDriverDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * Extract and derive metadata for one locator. Errors propagate.
   */
  async processOne(locator: SourceLocator, signal?: AbortSignal): Promise<ProcessedItem> {
    const outcome = await this.deps.extractor.extract(locator, signal);
    const { metadata, defaulted, reason } = await this.deps.metadata.extract(outcome.document);
    if (defaulted) {
      this.deps.audit.record({
        action: 'metadata_defaulted',
        subject: formatGcsUri(locator),
        category: 'METADATA_GENERATION_FAILED',
        message: reason ?? 'metadata extractor returned the default record',
      });
    }
    return { metadata, path: outcome.path, defaulted };
  }

  async run(locators: readonly SourceLocator[], signal?: AbortSignal): Promise<BatchResult> {
    const { logger, audit } = this.deps;
    const records: DocumentMetadata[] = [];
    const items: ItemOutcome[] = [];

    for (const [index, locator] of locators.entries()) {
      if (signal?.aborted) {
        throw new OperationCancelledError(signal.reason);
      }
      const uri = formatGcsUri(locator);
      const started = this.clock();
      logger.info(`[${index + 1}/${locators.length}] ${uri}`);

      try {
        const processed = await this.processOne(locator, signal);
        records.push(processed.metadata);
        audit.record({
          action: 'item_succeeded',
          subject: uri,
          message: `extracted via ${processed.path} path`,
          details: { path: processed.path, defaulted: processed.defaulted },
        });
        items.push({
          uri,
          status: 'succeeded',
          path: processed.path,
          durationMs: this.clock() - started,
          defaulted: processed.defaulted,
          category: null,
          error: null,
        });
      } catch (error) {
        const failure = PipelineError.fromUnknown(error);
        audit.record({
          action: 'item_failed',
          subject: uri,
          category: failure.category,
          message: failure.message,
          details: failure.details ?? {},
        });
        items.push({
          uri,
          status: 'failed',
          path: null,
          durationMs: this.clock() - started,
          defaulted: false,
          category: failure.category,
          error: describeError(failure),
        });
      }
    }

    const failed = items.filter((i) => i.status === 'failed').length;
    logger.info(`Batch finished: ${records.length} succeeded, ${failed} failed of ${locators.length}`);

    if (records.length === 0) {
      throw new PipelineError(
        'BATCH_FAILED',
        locators.length === 0 ? 'No input files to process' : `All ${locators.length} item(s) failed`,
        { failed, uris: items.map((i) => i.uri) }
      );
    }

    return { records, items, processed: records.length, failed, audit: audit.entries() };
  }
}
