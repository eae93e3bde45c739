/**
 * Pipeline Error Handling
 *
 * FAIL FAST: errors carry a category, a message and the context an operator
 * needs (locator, job id, output prefix, step). Batch mode isolates them per
 * item; everywhere else they propagate.
 *
 * @module core/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for pipeline failures
 */
export type ErrorCategory =
  // Pre-flight
  | 'CONFIGURATION_INVALID'

  // Per-item source errors
  | 'SOURCE_NOT_FOUND'
  | 'SIZE_UNKNOWN'
  | 'PERMISSION_DENIED'
  | 'STORAGE_ERROR'

  // Extraction
  | 'EXTRACTION_FAILED'
  | 'ASYNC_JOB_FAILED'
  | 'TIMEOUT'
  | 'NO_OUTPUT_PRODUCED'

  // Metadata (AI variant only; degrades to the default record)
  | 'METADATA_GENERATION_FAILED'

  // Video adapter
  | 'VIDEO_SOURCE_FAILED'

  // Output
  | 'ARTIFACT_WRITE_FAILED'
  | 'BATCH_FAILED'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * PipelineError - Structured error class for all pipeline failures
 *
 * Component errors (StorageError, SyncExtractionError, AsyncJobError, ...)
 * extend it so callers can branch on `category` without knowing the class.
 */
export class PipelineError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(
    category: ErrorCategory,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): PipelineError {
    if (error instanceof PipelineError) {
      return error;
    }

    if (error instanceof Error) {
      return new PipelineError(
        defaultCategory,
        error.message,
        { originalName: error.name },
        { cause: error }
      );
    }

    return new PipelineError(defaultCategory, String(error), { originalValue: error });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

const RECOVERY_HINTS: Record<ErrorCategory, string> = {
  CONFIGURATION_INVALID: 'Check the environment variables listed above (see .env.example)',
  SOURCE_NOT_FOUND: 'Verify the gs:// path; object keys are case-sensitive',
  SIZE_UNKNOWN: 'Check storage read access; the object was processed as a small file',
  PERMISSION_DENIED: 'Grant the service account the role named in the message',
  STORAGE_ERROR: 'Retry the run; storage returned an unexpected error',
  EXTRACTION_FAILED: 'Check the Document AI processor id, location and quota',
  ASYNC_JOB_FAILED: 'Inspect the batch operation in the Document AI console',
  TIMEOUT: 'Raise DOCUMENTAI_BATCH_TIMEOUT_MS or split the document',
  NO_OUTPUT_PRODUCED: 'Inspect the output prefix; the job reported success but wrote no shards',
  METADATA_GENERATION_FAILED: 'Check GEMINI_API_KEY and the model id',
  VIDEO_SOURCE_FAILED: 'Check YOUTUBE_API_KEY and that the video is public',
  ARTIFACT_WRITE_FAILED: 'Check write access to GCS_OUTPUT_BUCKET',
  BATCH_FAILED: 'Every item failed; see the [Audit] lines for each cause',
  INTERNAL_ERROR: 'Re-run with --verbose and report the stack trace',
};

/**
 * Get the recovery hint for an error category
 */
export function getRecoveryHint(category: ErrorCategory): string {
  return RECOVERY_HINTS[category];
}

/**
 * One-line description of any caught value, for log lines
 */
export function describeError(error: unknown): string {
  if (error instanceof PipelineError) {
    return `[${error.category}] ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create configuration error listing every problem found
 */
export function configurationError(problems: string[]): PipelineError {
  return new PipelineError(
    'CONFIGURATION_INVALID',
    `Configuration invalid:\n${problems.map((p) => `  - ${p}`).join('\n')}`,
    { problems }
  );
}

/**
 * Create source not found error
 */
export function sourceNotFoundError(uri: string): PipelineError {
  return new PipelineError('SOURCE_NOT_FOUND', `Source not found: ${uri}`, { uri });
}

/**
 * Create artifact write error
 */
export function artifactWriteError(message: string, details?: Record<string, unknown>, cause?: unknown): PipelineError {
  return new PipelineError('ARTIFACT_WRITE_FAILED', message, details, { cause });
}
