/**
 * Asynchronous (batch) extraction
 *
 * Submitted -> Polling -> Completed -> Assembling -> Done, with Failed
 * reachable from Submitted, Polling and Assembling. The wait is bounded by
 * withDeadline; a timeout cancels the job and fails the item. Nothing here
 * retries.
 *
 * Shards are every `.json` object under the job's output prefix, read in
 * lexicographic key order. Their text, pages and entities are concatenated in
 * that order; page numbers are kept as emitted.
 *
 * @module services/extraction/batch-extractor
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import type { ExtractedDocument, SourceLocator } from '../../models/document.js';
import { DeadlineExceededError, OperationCancelledError, withDeadline } from '../../utils/deadline.js';
import type { Logger } from '../../utils/logger.js';
import { validateInput } from '../../utils/validation.js';
import type { ObjectStore } from '../storage/object-store.js';
import { asPrefix, fileStem, formatGcsUri, joinKey } from '../storage/locator.js';
import type { BatchJob, DocumentUnderstandingService } from './document-ai.js';
import { AsyncJobError, type AsyncJobStep } from './errors.js';
import { inferMimeType } from './mime.js';
import { normalizeDocument } from './normalize.js';
import type { DocumentExtractor } from './sync-extractor.js';

// ═══════════════════════════════════════════════════════════════════════════════
// STATE MACHINE
// ═══════════════════════════════════════════════════════════════════════════════

export enum BatchJobState {
  SUBMITTED = 'Submitted',
  POLLING = 'Polling',
  COMPLETED = 'Completed',
  ASSEMBLING = 'Assembling',
  DONE = 'Done',
  FAILED = 'Failed',
}

const ALLOWED_TRANSITIONS: Record<BatchJobState, readonly BatchJobState[]> = {
  [BatchJobState.SUBMITTED]: [BatchJobState.POLLING, BatchJobState.FAILED],
  [BatchJobState.POLLING]: [BatchJobState.COMPLETED, BatchJobState.FAILED],
  [BatchJobState.COMPLETED]: [BatchJobState.ASSEMBLING],
  [BatchJobState.ASSEMBLING]: [BatchJobState.DONE, BatchJobState.FAILED],
  [BatchJobState.DONE]: [],
  [BatchJobState.FAILED]: [],
};

export interface StateTransition {
  from: BatchJobState | null;
  to: BatchJobState;
  uri: string;
  jobId: string | null;
  outputPrefix: string;
}

export const SHARD_SUFFIX = '.json';

export interface BatchExtractorOptions {
  /** gs:// root under which each job gets its own prefix */
  outputRoot: SourceLocator;
  /** Total wait ceiling for one job */
  timeoutMs: number;
  /** Observer for every state change */
  onTransition?: (transition: StateTransition) => void;
  /** Clock for output prefix timestamps */
  now?: () => Date;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARD SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const IndexSchema = z.union([z.number(), z.string()]).nullish();

const ShardSchema = z.object({
  text: z.string().nullish(),
  pages: z
    .array(
      z.object({
        pageNumber: z.number().int().nullish(),
        paragraphs: z
          .array(
            z.object({
              layout: z
                .object({
                  textAnchor: z
                    .object({
                      textSegments: z
                        .array(z.object({ startIndex: IndexSchema, endIndex: IndexSchema }))
                        .nullish(),
                    })
                    .nullish(),
                })
                .nullish(),
            })
          )
          .nullish(),
      })
    )
    .nullish(),
  entities: z
    .array(
      z.object({
        type: z.string().nullish(),
        mentionText: z.string().nullish(),
        confidence: z.number().nullish(),
      })
    )
    .nullish(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// ASSEMBLY
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Merge per-shard documents, already in shard order, into one document
 */
export function assembleShards(shards: ExtractedDocument[], sourceUri: string, mimeType: string): ExtractedDocument {
  return {
    fullText: shards.map((s) => s.fullText).join(''),
    pages: shards.flatMap((s) => s.pages),
    entities: shards.flatMap((s) => s.entities),
    sourceUri,
    mimeType,
  };
}

function timestampSegment(date: Date): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}_` +
    pad(date.getUTCMilliseconds(), 3)
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTOR
// ═══════════════════════════════════════════════════════════════════════════════

class JobRun {
  state: BatchJobState | null = null;
  jobId: string | null = null;

  constructor(
    readonly uri: string,
    readonly outputPrefix: SourceLocator,
    private readonly logger: Logger,
    private readonly onTransition?: (transition: StateTransition) => void
  ) {}

  get outputUri(): string {
    return formatGcsUri(this.outputPrefix);
  }

  moveTo(next: BatchJobState): void {
    if (this.state !== null && !ALLOWED_TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal batch job transition ${this.state} -> ${next}`);
    }
    const transition: StateTransition = {
      from: this.state,
      to: next,
      uri: this.uri,
      jobId: this.jobId,
      outputPrefix: this.outputUri,
    };
    this.state = next;
    this.logger.debug(`${transition.from ?? 'start'} -> ${next} (job=${this.jobId ?? 'n/a'}, ${this.uri})`);
    this.onTransition?.(transition);
  }

  fail(
    category: 'ASYNC_JOB_FAILED' | 'TIMEOUT' | 'NO_OUTPUT_PRODUCED',
    step: AsyncJobStep,
    message: string,
    cause?: unknown,
    shard?: string
  ): AsyncJobError {
    this.moveTo(BatchJobState.FAILED);
    const error = new AsyncJobError(
      category,
      `${message} (job=${this.jobId ?? 'n/a'}, output=${this.outputUri}, step=${step})`,
      { uri: this.uri, jobId: this.jobId, outputPrefix: this.outputUri, step, ...(shard ? { shard } : {}) },
      cause
    );
    this.logger.error(error.message);
    return error;
  }
}

export class BatchExtractor implements DocumentExtractor {
  private readonly now: () => Date;

  constructor(
    private readonly service: DocumentUnderstandingService,
    private readonly store: ObjectStore,
    private readonly options: BatchExtractorOptions,
    private readonly logger: Logger
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Output prefix unique per invocation: <root>/<timestamp>-<id>/<file stem>/
   */
  buildOutputPrefix(locator: SourceLocator): SourceLocator {
    const run = `${timestampSegment(this.now())}-${uuidv4().slice(0, 8)}`;
    return {
      bucket: this.options.outputRoot.bucket,
      key: asPrefix(joinKey(this.options.outputRoot.key, run, fileStem(locator.key))),
    };
  }

  async extract(locator: SourceLocator, signal?: AbortSignal): Promise<ExtractedDocument> {
    const uri = formatGcsUri(locator);
    const mimeType = inferMimeType(locator.key);
    const run = new JobRun(uri, this.buildOutputPrefix(locator), this.logger, this.options.onTransition);

    // Submitted
    run.moveTo(BatchJobState.SUBMITTED);
    let job: BatchJob;
    try {
      job = await this.service.submitBatch({ gcsUri: uri, mimeType, outputUri: run.outputUri });
    } catch (error) {
      throw run.fail('ASYNC_JOB_FAILED', 'submit', `Batch job submission failed: ${messageOf(error)}`, error);
    }
    run.jobId = job.name;
    this.logger.info(`Submitted batch job ${job.name} for ${uri} -> ${run.outputUri}`);

    // Polling
    run.moveTo(BatchJobState.POLLING);
    try {
      await withDeadline(() => job.waitForCompletion(), this.options.timeoutMs, {
        signal,
        onLateRejection: (late) => this.logger.debug(`Job ${job.name} settled after the wait ended: ${messageOf(late)}`),
      });
    } catch (error) {
      if (error instanceof DeadlineExceededError || error instanceof OperationCancelledError) {
        await this.cancelJob(job);
        if (error instanceof DeadlineExceededError) {
          throw run.fail('TIMEOUT', 'poll', `Batch job did not finish within ${this.options.timeoutMs}ms`, error);
        }
        throw run.fail('ASYNC_JOB_FAILED', 'poll', 'Batch job wait was cancelled', error);
      }
      throw run.fail('ASYNC_JOB_FAILED', 'poll', `Batch job failed: ${messageOf(error)}`, error);
    }

    // Completed -> Assembling
    run.moveTo(BatchJobState.COMPLETED);
    run.moveTo(BatchJobState.ASSEMBLING);

    let shardKeys: string[];
    try {
      const keys = await this.store.list(run.outputPrefix.bucket, run.outputPrefix.key);
      shardKeys = keys.filter((k) => k.endsWith(SHARD_SUFFIX)).sort();
    } catch (error) {
      throw run.fail('ASYNC_JOB_FAILED', 'list', `Listing batch output failed: ${messageOf(error)}`, error);
    }
    if (shardKeys.length === 0) {
      throw run.fail('NO_OUTPUT_PRODUCED', 'list', 'Batch job reported success but produced no output shards');
    }
    this.logger.debug(`Assembling ${shardKeys.length} shard(s) for ${uri}`);

    const shards: ExtractedDocument[] = [];
    for (const key of shardKeys) {
      const shardLocator = { bucket: run.outputPrefix.bucket, key };
      let content: Buffer;
      try {
        content = await this.store.read(shardLocator);
      } catch (error) {
        throw run.fail('ASYNC_JOB_FAILED', 'read', `Reading shard failed: ${messageOf(error)}`, error, key);
      }
      try {
        const parsed = validateInput(ShardSchema, JSON.parse(content.toString('utf8')), `shard ${key}`);
        shards.push(normalizeDocument(parsed, uri, mimeType));
      } catch (error) {
        throw run.fail('ASYNC_JOB_FAILED', 'parse', `Parsing shard failed: ${messageOf(error)}`, error, key);
      }
    }

    const document = assembleShards(shards, uri, mimeType);
    run.moveTo(BatchJobState.DONE);
    this.logger.info(
      `Batch job ${job.name} done: ${shards.length} shard(s), ${document.pages.length} pages, ${document.fullText.length} chars`
    );
    return document;
  }

  private async cancelJob(job: BatchJob): Promise<void> {
    try {
      await job.cancel();
    } catch (error) {
      this.logger.warn(`Cancelling batch job ${job.name} failed: ${messageOf(error)}`);
    }
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
