/**
 * Extraction Error Classes
 *
 * FAIL-FAST: no retry at this layer. Async job errors carry the job id, the
 * output prefix and the step that failed.
 */

import { PipelineError, type ErrorCategory } from '../../core/errors.js';

export class SyncExtractionError extends PipelineError {
  constructor(
    message: string,
    public readonly uri: string,
    public readonly mimeType: string,
    cause?: unknown
  ) {
    super('EXTRACTION_FAILED', message, { uri, mimeType }, { cause });
    this.name = 'SyncExtractionError';
  }
}

export type AsyncJobStep = 'submit' | 'poll' | 'list' | 'read' | 'parse';

type AsyncJobCategory = Extract<ErrorCategory, 'ASYNC_JOB_FAILED' | 'TIMEOUT' | 'NO_OUTPUT_PRODUCED'>;

export class AsyncJobError extends PipelineError {
  constructor(
    category: AsyncJobCategory,
    message: string,
    public readonly context: {
      uri: string;
      jobId: string | null;
      outputPrefix: string;
      step: AsyncJobStep;
      shard?: string;
    },
    cause?: unknown
  ) {
    super(category, message, { ...context }, { cause });
    this.name = 'AsyncJobError';
  }

  get jobId(): string | null {
    return this.context.jobId;
  }

  get outputPrefix(): string {
    return this.context.outputPrefix;
  }

  get step(): AsyncJobStep {
    return this.context.step;
  }
}
