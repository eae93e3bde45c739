/**
 * Library surface: the pipeline pieces for use without the CLI.
 *
 * @module lib
 */

export * from './models/index.js';
export * from './core/errors.js';
export {
  batchOutputRoot,
  loadSettings,
  SettingsSchema,
  validateSettings,
  type RunMode,
  type Settings,
  type SettingsOverrides,
} from './core/config.js';
export { runCli, parseCliArgs, type CliIo, type CliOptions } from './cli.js';

export { AuditLog, type AuditAction, type AuditEntry } from './services/audit.js';
export * from './services/storage/index.js';
export {
  BatchExtractor,
  BatchJobState,
  assembleShards,
  type BatchExtractorOptions,
  type StateTransition,
} from './services/extraction/batch-extractor.js';
export {
  GoogleDocumentAiService,
  type BatchJob,
  type DocumentUnderstandingService,
} from './services/extraction/document-ai.js';
export { AsyncJobError, SyncExtractionError } from './services/extraction/errors.js';
export { inferMimeType } from './services/extraction/mime.js';
export { normalizeDocument, type DocumentLike } from './services/extraction/normalize.js';
export {
  DEFAULT_MAX_SYNC_BYTES,
  ExtractionRouter,
  selectPath,
  type ExtractionOutcome,
} from './services/extraction/router.js';
export { SyncExtractor, type DocumentExtractor } from './services/extraction/sync-extractor.js';
export { GeminiClient, type StructuredExtractionService } from './services/gemini/index.js';
export * from './services/metadata/index.js';
export * from './services/output/index.js';
export { BatchDriver, type BatchResult, type ItemOutcome } from './services/pipeline/batch-driver.js';
export { createPipeline } from './services/pipeline/factory.js';
export { MetadataPipeline, type RunResult, type VideoLoader } from './services/pipeline/pipeline.js';
export { listSources, resolveSourceSpec, type SourceSpec } from './services/pipeline/source-filter.js';
export { extractVideoId, YouTubeSource, type LoadedVideo, type VideoInfo } from './services/video/youtube.js';
export { createLogger, type Logger } from './utils/logger.js';
export { Err, Ok, type Result } from './utils/result.js';
