/**
 * Pipeline wiring
 *
 * Builds the Google-backed collaborators from Settings. Only what the run
 * mode needs is constructed: video mode creates no Document AI client and
 * the rules extractor creates no Gemini client.
 *
 * @module services/pipeline/factory
 */

import { batchOutputRoot, type RunMode, type Settings } from '../../core/config.js';
import type { Logger } from '../../utils/logger.js';
import { AuditLog } from '../audit.js';
import { BatchExtractor, type StateTransition } from '../extraction/batch-extractor.js';
import { GoogleDocumentAiService } from '../extraction/document-ai.js';
import { ExtractionRouter } from '../extraction/router.js';
import { SyncExtractor } from '../extraction/sync-extractor.js';
import { GeminiClient } from '../gemini/client.js';
import { createMetadataExtractor } from '../metadata/index.js';
import { OutputCompiler } from '../output/compiler.js';
import { parseGcsUri } from '../storage/locator.js';
import { GcsObjectStore, type ObjectStore } from '../storage/object-store.js';
import { YouTubeSource } from '../video/youtube.js';
import { MetadataPipeline } from './pipeline.js';

export interface PipelineOverrides {
  /** Replaces the Cloud Storage client */
  store?: ObjectStore;
  onTransition?: (transition: StateTransition) => void;
}

export function createPipeline(
  settings: Settings,
  mode: RunMode,
  logger: Logger,
  overrides: PipelineOverrides = {}
): MetadataPipeline {
  const projectId = settings.gcp.projectId ?? '';
  const keyFilename = settings.gcp.credentialsPath ?? null;
  const store = overrides.store ?? new GcsObjectStore({ projectId, keyFilename });

  const extractor =
    mode === 'video'
      ? undefined
      : (() => {
          const service = new GoogleDocumentAiService({
            projectId,
            location: settings.documentAi.location,
            processorId: settings.documentAi.processorId ?? '',
            keyFilename,
          });
          const sync = new SyncExtractor(service, logger.child('SyncExtractor'));
          const async = new BatchExtractor(
            service,
            store,
            {
              outputRoot: batchOutputRoot(settings),
              timeoutMs: settings.documentAi.batchTimeoutMs,
              onTransition: overrides.onTransition,
            },
            logger.child('BatchJob')
          );
          return new ExtractionRouter(
            store,
            { sync, async },
            { maxSyncBytes: settings.documentAi.maxSyncBytes },
            logger.child('Router')
          );
        })();

  const kind = settings.metadata.extractor;
  const metadata = createMetadataExtractor(kind, {
    logger: logger.child('Metadata'),
    service: kind === 'ai' ? new GeminiClient(settings.gemini, { logger: logger.child('Gemini') }) : undefined,
  });

  const video =
    mode === 'video'
      ? new YouTubeSource(
          { apiKey: settings.youtube.apiKey ?? '', languages: settings.youtube.languages },
          logger.child('YouTube')
        )
      : undefined;

  const compiler = new OutputCompiler(store, logger.child('Compiler'), {
    localBackupDir: settings.output.localDir ?? null,
  });

  return new MetadataPipeline(
    { store, extractor, metadata, compiler, video, audit: new AuditLog(), logger: logger.child('Pipeline') },
    {
      outputBucket: settings.output.bucket ?? '',
      outputPath: settings.output.path,
      appendTarget: settings.output.appendTarget ? parseGcsUri(settings.output.appendTarget) : null,
    }
  );
}
