/**
 * Unit tests for the AI metadata extractor
 */

import { describe, it, expect } from 'vitest';
import type { ExtractedDocument } from '../../../src/models/document.js';
import { defaultMetadata } from '../../../src/models/metadata.js';
import {
  AI_INPUT_LIMIT,
  AiMetadataExtractor,
  MetadataGenerationError,
  truncateInput,
} from '../../../src/services/metadata/ai-based.js';
import { createMetadataExtractor } from '../../../src/services/metadata/index.js';
import { ScriptedExtractionService } from '../../helpers/fake-llm.js';
import { captureLogger } from '../../helpers/logger.js';

function documentFor(fullText: string, sourceUri = 'gs://docs/deck.pptx', mimeType = 'application/pdf'): ExtractedDocument {
  return { fullText, pages: [], entities: [], sourceUri, mimeType };
}

const FULL_RESPONSE = JSON.stringify({
  type: 'Brochure',
  source: 'HQ',
  region: 'Europe',
  country: 'Germany',
  model: 'EV9',
  xev: 'ev',
  year1: 2024,
  year2: '2025',
  language: 'en',
  version: 'v2',
  updated_at: '2024-05-01',
  file_format: null,
  content_summary: 'Launch brochure for the EV9.',
});

describe('truncateInput', () => {
  it('keeps the first 10,000 characters', () => {
    expect(AI_INPUT_LIMIT).toBe(10_000);
    expect(truncateInput('a'.repeat(12_000))).toHaveLength(10_000);
    expect(truncateInput('short')).toBe('short');
  });

  it('counts astral characters once', () => {
    expect(truncateInput('😀😀😀', 2)).toBe('😀😀');
  });
});

describe('AiMetadataExtractor', () => {
  it('sends at most 10,000 characters and the pre-computed format', async () => {
    const service = new ScriptedExtractionService([FULL_RESPONSE]);
    const extractor = new AiMetadataExtractor(service, captureLogger().logger);

    await extractor.extract(documentFor(`${'b'.repeat(10_000)}TAIL`));

    expect(service.calls).toHaveLength(1);
    expect(service.calls[0]?.text).toBe('b'.repeat(10_000));
    expect(service.calls[0]?.instruction).toContain('The file format inferred from the file name is "PPT".');
  });

  it('maps the response onto the fixed schema', async () => {
    const extractor = new AiMetadataExtractor(new ScriptedExtractionService([FULL_RESPONSE]), captureLogger().logger);

    const { metadata, defaulted } = await extractor.extract(documentFor('EV9 brochure text'));

    expect(defaulted).toBe(false);
    expect(metadata).toEqual({
      type: 'Brochure',
      source: 'HQ',
      region: 'Europe',
      country: 'Germany',
      model: 'EV9',
      xev: 'EV',
      year1: 2024,
      year2: 2025,
      language: 'EN',
      version: 'v2',
      updated_at: '2024-05-01',
      file_format: 'PPT',
      content_summary: 'Launch brochure for the EV9.',
    });
  });

  it("lets the service's file_format override the guess", async () => {
    const response = JSON.stringify({ file_format: 'PDF', model: 'K5' });
    const extractor = new AiMetadataExtractor(new ScriptedExtractionService([response]), captureLogger().logger);

    const { metadata } = await extractor.extract(documentFor('text'));

    expect(metadata.file_format).toBe('PDF');
    expect(metadata.model).toBe('K5');
    expect(metadata.type).toBe('Unknown');
  });

  it('uses "video" as the guess for video sources', async () => {
    const service = new ScriptedExtractionService(['{}']);
    const extractor = new AiMetadataExtractor(service, captureLogger().logger);

    const { metadata } = await extractor.extract(
      documentFor('[Video Title] x', 'https://www.youtube.com/watch?v=abcdefghijk', 'video/youtube')
    );

    expect(metadata.file_format).toBe('video');
    expect(service.calls[0]?.instruction).toContain('inferred from the file name is "video"');
  });

  it('returns the default record when the service fails', async () => {
    const { logger, lines } = captureLogger('Metadata');
    const extractor = new AiMetadataExtractor(new ScriptedExtractionService([new Error('503 unavailable')]), logger);

    const outcome = await extractor.extract(documentFor('text'));

    expect(outcome.defaulted).toBe(true);
    expect(outcome.metadata).toEqual(defaultMetadata());
    expect(outcome.reason).toBe('Structured extraction failed for gs://docs/deck.pptx: 503 unavailable');
    expect(lines).toEqual([
      '[Metadata] WARNING: Structured extraction failed for gs://docs/deck.pptx: 503 unavailable; using the default record',
    ]);
  });

  it('reports parse and schema failures as Err from requestMetadata', async () => {
    const notJson = new AiMetadataExtractor(new ScriptedExtractionService(['no json here']), captureLogger().logger);
    const wrongShape = new AiMetadataExtractor(
      new ScriptedExtractionService(['{"model": ["EV9"]}']),
      captureLogger().logger
    );

    const parseResult = await notJson.requestMetadata(documentFor('text'));
    const schemaResult = await wrongShape.requestMetadata(documentFor('text'));

    expect(parseResult.ok).toBe(false);
    if (!parseResult.ok) {
      expect(parseResult.error).toBeInstanceOf(MetadataGenerationError);
      expect(parseResult.error.stage).toBe('parse');
      expect(parseResult.error.category).toBe('METADATA_GENERATION_FAILED');
    }
    expect(schemaResult.ok).toBe(false);
    if (!schemaResult.ok) {
      expect(schemaResult.error.stage).toBe('schema');
    }
  });

  it('is built by the factory only with a service', () => {
    const { logger } = captureLogger();
    expect(createMetadataExtractor('rules', { logger }).kind).toBe('rules');
    expect(createMetadataExtractor('ai', { logger, service: new ScriptedExtractionService(['{}']) }).kind).toBe('ai');
    expect(() => createMetadataExtractor('ai', { logger })).toThrow(/structured-extraction service/);
  });
});
