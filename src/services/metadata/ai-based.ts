/**
 * AI metadata extractor
 *
 * Sends the fixed instruction and the first 10,000 characters of the text to
 * the structured-extraction service. requestMetadata() returns a Result; only
 * extract() turns an Err into the default record, so callers can tell real
 * data from a fallback.
 *
 * @module services/metadata/ai-based
 */

import { PipelineError } from '../../core/errors.js';
import type { ExtractedDocument } from '../../models/document.js';
import { defaultMetadata, type DocumentMetadata } from '../../models/metadata.js';
import type { Logger } from '../../utils/logger.js';
import { Err, Ok, tryCatchAsync, type Result } from '../../utils/result.js';
import { formatZodIssues } from '../../utils/validation.js';
import type { StructuredExtractionService } from '../gemini/client.js';
import { fileFormatOf } from './file-format.js';
import { buildMetadataInstruction } from './prompts.js';
import { AiMetadataSchema, parseJsonObject, toDocumentMetadata } from './schema.js';
import type { MetadataExtractor, MetadataOutcome } from './types.js';

/** Characters of full text sent to the service */
export const AI_INPUT_LIMIT = 10_000;

export type MetadataFailureStage = 'service' | 'parse' | 'schema';

export class MetadataGenerationError extends PipelineError {
  constructor(
    message: string,
    public readonly stage: MetadataFailureStage,
    sourceUri: string,
    cause?: unknown
  ) {
    super('METADATA_GENERATION_FAILED', message, { stage, sourceUri }, { cause });
    this.name = 'MetadataGenerationError';
  }
}

export interface AiRequest {
  instruction: string;
  text: string;
  fileFormat: string;
}

/** First `limit` characters (code points) of the text */
export function truncateInput(text: string, limit: number = AI_INPUT_LIMIT): string {
  if (text.length <= limit) return text;
  const chars = [...text];
  return chars.length <= limit ? text : chars.slice(0, limit).join('');
}

export class AiMetadataExtractor implements MetadataExtractor {
  readonly kind = 'ai' as const;

  constructor(
    private readonly service: StructuredExtractionService,
    private readonly logger: Logger
  ) {}

  buildRequest(document: ExtractedDocument): AiRequest {
    const fileFormat = fileFormatOf(document);
    return {
      instruction: buildMetadataInstruction(fileFormat),
      text: truncateInput(document.fullText),
      fileFormat,
    };
  }

  /**
   * Service-adapter boundary: never throws
   */
  async requestMetadata(document: ExtractedDocument): Promise<Result<DocumentMetadata, MetadataGenerationError>> {
    const request = this.buildRequest(document);
    const uri = document.sourceUri;

    const response = await tryCatchAsync(
      () => this.service.infer(request.instruction, request.text),
      (error) =>
        new MetadataGenerationError(
          `Structured extraction failed for ${uri}: ${error instanceof Error ? error.message : String(error)}`,
          'service',
          uri,
          error
        )
    );
    if (!response.ok) return response;

    let parsed: unknown;
    try {
      parsed = parseJsonObject(response.value);
    } catch (error) {
      return Err(new MetadataGenerationError(`Response for ${uri} is not JSON`, 'parse', uri, error));
    }

    const validated = AiMetadataSchema.safeParse(parsed);
    if (!validated.success) {
      return Err(
        new MetadataGenerationError(
          `Response for ${uri} does not match the metadata schema: ${formatZodIssues(validated.error).join('; ')}`,
          'schema',
          uri,
          validated.error
        )
      );
    }

    return Ok(toDocumentMetadata(validated.data, request.fileFormat));
  }

  async extract(document: ExtractedDocument): Promise<MetadataOutcome> {
    const result = await this.requestMetadata(document);
    if (result.ok) {
      return { metadata: result.value, defaulted: false };
    }
    this.logger.warn(`${result.error.message}; using the default record`);
    return { metadata: defaultMetadata(), defaulted: true, reason: result.error.message };
  }
}
