/**
 * Unit tests for the synchronous extractor
 */

import { describe, it, expect } from 'vitest';
import { SyncExtractor } from '../../../src/services/extraction/sync-extractor.js';
import { SyncExtractionError } from '../../../src/services/extraction/errors.js';
import { documentOf, FakeDocumentAi } from '../../helpers/fake-document-ai.js';
import { captureLogger } from '../../helpers/logger.js';

describe('SyncExtractor', () => {
  it('sends the gs:// URI and inferred MIME type and normalizes the response', async () => {
    const service = new FakeDocumentAi();
    service.onProcess = async () => documentOf(['Page one. ', 'Page two.']);
    const extractor = new SyncExtractor(service, captureLogger().logger);

    const doc = await extractor.extract({ bucket: 'docs', key: 'in/spec.pdf' });

    expect(service.processCalls).toEqual([{ gcsUri: 'gs://docs/in/spec.pdf', mimeType: 'application/pdf' }]);
    expect(doc.fullText).toBe('Page one. Page two.');
    expect(doc.pages).toEqual([
      { pageNumber: 1, text: 'Page one.' },
      { pageNumber: 2, text: 'Page two.' },
    ]);
    expect(doc.sourceUri).toBe('gs://docs/in/spec.pdf');
  });

  it('wraps service failures as EXTRACTION_FAILED', async () => {
    const service = new FakeDocumentAi();
    const cause = new Error('INVALID_ARGUMENT: unsupported file');
    service.onProcess = async () => {
      throw cause;
    };
    const extractor = new SyncExtractor(service, captureLogger().logger);

    const error = await extractor.extract({ bucket: 'docs', key: 'deck.pptx' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SyncExtractionError);
    if (!(error instanceof SyncExtractionError)) return;
    expect(error.category).toBe('EXTRACTION_FAILED');
    expect(error.message).toBe('Document AI processing failed for gs://docs/deck.pptx: INVALID_ARGUMENT: unsupported file');
    expect(error.uri).toBe('gs://docs/deck.pptx');
    expect(error.mimeType).toBe('application/vnd.openxmlformats-officedocument.presentationml.presentation');
    expect(error.cause).toBe(cause);
  });
});
