/**
 * Metadata Pipeline
 *
 * Runs one of the three modes end to end: a single document, a batch of
 * documents, or a YouTube video. Each mode produces metadata records and
 * hands them to the output compiler.
 *
 * @module services/pipeline/pipeline
 */

import { describeError, PipelineError, sourceNotFoundError } from '../../core/errors.js';
import type { SourceLocator } from '../../models/document.js';
import type { DocumentMetadata } from '../../models/metadata.js';
import type { Logger } from '../../utils/logger.js';
import type { AuditEntry, AuditLog } from '../audit.js';
import type { MetadataExtractor } from '../metadata/types.js';
import type { CompileMode, CompileResult, OutputCompiler } from '../output/compiler.js';
import { fileStem, formatGcsUri, joinKey, parseGcsUri } from '../storage/locator.js';
import type { ObjectStore } from '../storage/object-store.js';
import type { LoadedVideo } from '../video/youtube.js';
import { BatchDriver, type ItemOutcome, type LocatorExtractor } from './batch-driver.js';
import { listSources, type SourceSpec } from './source-filter.js';

export const TRANSCRIPT_CONTENT_TYPE = 'text/plain; charset=utf-8';
const UTF8_BOM = '\uFEFF';

export type PipelineMode = 'single' | 'batch' | 'video';

/**
 * What the pipeline needs from the video adapter
 */
export interface VideoLoader {
  load(url: string, signal?: AbortSignal): Promise<LoadedVideo>;
}

export interface PipelineDeps {
  store: ObjectStore;
  /** Required for single and batch modes */
  extractor?: LocatorExtractor;
  metadata: MetadataExtractor;
  compiler: OutputCompiler;
  audit: AuditLog;
  logger: Logger;
  /** Required for video mode only */
  video?: VideoLoader;
  now?: () => Date;
}

export interface PipelineOptions {
  outputBucket: string;
  outputPath: string;
  /** Existing artifact to append to; null writes a fresh artifact */
  appendTarget: SourceLocator | null;
}

export interface RunResult {
  mode: PipelineMode;
  records: DocumentMetadata[];
  items: ItemOutcome[];
  processed: number;
  failed: number;
  compile: CompileResult;
  audit: readonly AuditEntry[];
}

export interface VideoRunOptions {
  /** gs:// URI to save the video's full text to */
  saveTranscriptTo?: string;
}

/** Local time as YYYYMMDD_HHMMSS */
export function runStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class MetadataPipeline {
  private batchDriver: BatchDriver | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: PipelineOptions
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  private get driver(): BatchDriver {
    if (!this.batchDriver) {
      const { extractor, metadata, audit, logger } = this.deps;
      if (!extractor) {
        throw new PipelineError('INTERNAL_ERROR', 'MetadataPipeline was created without a document extractor');
      }
      this.batchDriver = new BatchDriver({ extractor, metadata, audit, logger: logger.child('Batch') });
    }
    return this.batchDriver;
  }

  /**
   * Process one explicit locator. Any failure is fatal.
   */
  async runSingle(inputUri: string, signal?: AbortSignal): Promise<RunResult> {
    const { store, logger } = this.deps;
    const locator = parseGcsUri(inputUri);
    const uri = formatGcsUri(locator);

    if (!(await store.exists(locator))) {
      throw sourceNotFoundError(uri);
    }

    logger.info(`Processing single file: ${uri}`);
    const started = Date.now();
    const processed = await this.driver.processOne(locator, signal);

    const item: ItemOutcome = {
      uri,
      status: 'succeeded',
      path: processed.path,
      durationMs: Date.now() - started,
      defaulted: processed.defaulted,
      category: null,
      error: null,
    };
    const compile = await this.compile([processed.metadata], `${fileStem(locator.key)}_metadata.csv`);
    return this.result('single', [processed.metadata], [item], compile);
  }

  /**
   * Process every supported object the source spec resolves to
   */
  async runBatch(spec: SourceSpec, signal?: AbortSignal): Promise<RunResult> {
    const { store, logger } = this.deps;
    const locators = await listSources(store, spec, logger.child('Sources'));
    const batch = await this.driver.run(locators, signal);
    const compile = await this.compile(batch.records, `batch_metadata_${runStamp(this.now())}.csv`);
    return this.result('batch', batch.records, batch.items, compile);
  }

  /**
   * Derive metadata from a video's transcript (or description)
   */
  async runVideo(url: string, options: VideoRunOptions = {}, signal?: AbortSignal): Promise<RunResult> {
    const { video, metadata, audit } = this.deps;
    if (!video) {
      throw new PipelineError('INTERNAL_ERROR', 'MetadataPipeline was created without a video loader');
    }

    const started = Date.now();
    const loaded = await video.load(url, signal);
    if (options.saveTranscriptTo) {
      await this.saveTranscript(options.saveTranscriptTo, loaded.document.fullText);
    }

    const outcome = await metadata.extract(loaded.document);
    if (outcome.defaulted) {
      audit.record({
        action: 'metadata_defaulted',
        subject: url,
        category: 'METADATA_GENERATION_FAILED',
        message: outcome.reason ?? 'metadata extractor returned the default record',
      });
    }

    const item: ItemOutcome = {
      uri: loaded.document.sourceUri,
      status: 'succeeded',
      path: 'video',
      durationMs: Date.now() - started,
      defaulted: outcome.defaulted,
      category: null,
      error: null,
    };
    const compile = await this.compile([outcome.metadata], `video_${loaded.info.videoId}_metadata.csv`);
    return this.result('video', [outcome.metadata], [item], compile);
  }

  private async compile(records: DocumentMetadata[], fileName: string): Promise<CompileResult> {
    const { appendTarget, outputBucket, outputPath } = this.options;
    const destination: SourceLocator = appendTarget ?? { bucket: outputBucket, key: joinKey(outputPath, fileName) };
    const mode: CompileMode = appendTarget ? 'append' : 'fresh';

    const result = await this.deps.compiler.compile({ records, destination, mode });
    this.deps.audit.record({
      action: 'artifact_written',
      subject: formatGcsUri(result.artifact),
      message: `${result.mode} write of ${result.rowCount} row(s) (${result.newRowCount} new)`,
      details: { mode: result.mode, rowCount: result.rowCount, newRowCount: result.newRowCount },
    });
    return result;
  }

  private async saveTranscript(uri: string, fullText: string): Promise<void> {
    const { store, logger } = this.deps;
    logger.info(`Saving transcript to ${uri}`);
    try {
      await store.write(parseGcsUri(uri), `${UTF8_BOM}${fullText}`, TRANSCRIPT_CONTENT_TYPE);
    } catch (error) {
      logger.error(`Failed to save transcript: ${describeError(error)}`);
    }
  }

  private result(mode: PipelineMode, records: DocumentMetadata[], items: ItemOutcome[], compile: CompileResult): RunResult {
    return {
      mode,
      records,
      items,
      processed: records.length,
      failed: items.filter((i) => i.status === 'failed').length,
      compile,
      audit: this.deps.audit.entries(),
    };
  }
}
