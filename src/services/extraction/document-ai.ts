/**
 * Document AI service adapter
 *
 * DocumentUnderstandingService is what the extractors depend on; the Google
 * implementation wraps DocumentProcessorServiceClient. Both calls read the
 * input straight from Cloud Storage.
 *
 * @module services/extraction/document-ai
 */

import { DocumentProcessorServiceClient } from '@google-cloud/documentai';

import type { DocumentLike } from './normalize.js';

export interface ProcessRequest {
  gcsUri: string;
  mimeType: string;
}

export interface BatchRequest extends ProcessRequest {
  /** gs:// prefix the job writes its JSON shards under */
  outputUri: string;
}

/**
 * Handle on a submitted long-running batch job
 */
export interface BatchJob {
  readonly name: string;
  /** Resolves when the job succeeds; rejects with the job's error */
  waitForCompletion(): Promise<void>;
  cancel(): Promise<void>;
}

export interface DocumentUnderstandingService {
  process(request: ProcessRequest): Promise<DocumentLike>;
  submitBatch(request: BatchRequest): Promise<BatchJob>;
}

export interface DocumentAiOptions {
  projectId: string;
  location: string;
  processorId: string;
  keyFilename?: string | null;
}

export class GoogleDocumentAiService implements DocumentUnderstandingService {
  private readonly client: DocumentProcessorServiceClient;
  private readonly processorName: string;

  constructor(options: DocumentAiOptions, client?: DocumentProcessorServiceClient) {
    this.client =
      client ??
      new DocumentProcessorServiceClient({
        apiEndpoint: `${options.location}-documentai.googleapis.com`,
        projectId: options.projectId,
        ...(options.keyFilename ? { keyFilename: options.keyFilename } : {}),
      });
    this.processorName = this.client.processorPath(options.projectId, options.location, options.processorId);
  }

  async process(request: ProcessRequest): Promise<DocumentLike> {
    const [result] = await this.client.processDocument({
      name: this.processorName,
      gcsDocument: { gcsUri: request.gcsUri, mimeType: request.mimeType },
    });
    if (!result.document) {
      throw new Error(`Document AI returned no document for ${request.gcsUri}`);
    }
    return result.document;
  }

  async submitBatch(request: BatchRequest): Promise<BatchJob> {
    const [operation] = await this.client.batchProcessDocuments({
      name: this.processorName,
      inputDocuments: {
        gcsDocuments: { documents: [{ gcsUri: request.gcsUri, mimeType: request.mimeType }] },
      },
      documentOutputConfig: { gcsOutputConfig: { gcsUri: request.outputUri } },
    });

    return {
      name: operation.name ?? 'unknown-operation',
      waitForCompletion: async () => {
        await operation.promise();
      },
      cancel: async () => {
        await operation.cancel();
      },
    };
  }
}
