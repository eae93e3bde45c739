/**
 * Storage Error Classes
 *
 * Cloud Storage failures are sorted into not-found, permission-denied,
 * transient and unknown. Permission failures carry the IAM role and the exact
 * bucket/prefix to grant it on.
 */

import { PipelineError, type ErrorCategory } from '../../core/errors.js';
import type { SourceLocator } from '../../models/document.js';
import { formatGcsUri } from './locator.js';

export type StorageFailureReason = 'NOT_FOUND' | 'PERMISSION_DENIED' | 'TRANSIENT' | 'UNKNOWN';

export type StorageOperation = 'list' | 'read' | 'write' | 'size' | 'exists';

const REASON_TO_CATEGORY: Record<StorageFailureReason, ErrorCategory> = {
  NOT_FOUND: 'SOURCE_NOT_FOUND',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  TRANSIENT: 'STORAGE_ERROR',
  UNKNOWN: 'STORAGE_ERROR',
};

const REQUIRED_PERMISSION: Record<StorageOperation, { role: string; permission: string }> = {
  list: { role: 'roles/storage.objectViewer', permission: 'storage.objects.list' },
  read: { role: 'roles/storage.objectViewer', permission: 'storage.objects.get' },
  size: { role: 'roles/storage.objectViewer', permission: 'storage.objects.get' },
  exists: { role: 'roles/storage.objectViewer', permission: 'storage.objects.get' },
  write: {
    role: 'roles/storage.objectAdmin',
    permission: 'storage.objects.create (and storage.objects.delete to overwrite)',
  },
};

export class StorageError extends PipelineError {
  constructor(
    message: string,
    public readonly reason: StorageFailureReason,
    public readonly operation: StorageOperation,
    public readonly uri: string,
    cause?: unknown
  ) {
    super(REASON_TO_CATEGORY[reason], message, { reason, operation, uri }, { cause });
    this.name = 'StorageError';
  }
}

function numericCode(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) return null;
  const code = error.code;
  if (typeof code === 'number') return code;
  if (typeof code === 'string' && /^\d+$/.test(code)) return parseInt(code, 10);
  return null;
}

/**
 * Sort a client error by HTTP status (ApiError.code) or network error code
 */
export function classifyStorageFailure(error: unknown): StorageFailureReason {
  const code = numericCode(error);
  if (code === 404) return 'NOT_FOUND';
  if (code === 401 || code === 403) return 'PERMISSION_DENIED';
  if (code !== null && (code === 408 || code === 429 || code >= 500)) return 'TRANSIENT';

  const message = error instanceof Error ? error.message : String(error);
  if (/ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|socket hang up|EAI_AGAIN/i.test(message)) {
    return 'TRANSIENT';
  }
  return 'UNKNOWN';
}

/**
 * Remediation text for a permission failure
 */
export function permissionGuidance(operation: StorageOperation, locator: SourceLocator): string {
  const { role, permission } = REQUIRED_PERMISSION[operation];
  const scope = locator.key ? ` (object or prefix "${locator.key}")` : '';
  return (
    `Grant the service account ${role} (${permission}) on bucket "${locator.bucket}"${scope}. ` +
    `Check GCP_CREDENTIALS_PATH points at the intended service account.`
  );
}

/**
 * Convert a caught storage client error into a StorageError
 */
export function mapStorageError(error: unknown, operation: StorageOperation, locator: SourceLocator): StorageError {
  if (error instanceof StorageError) return error;

  const uri = formatGcsUri(locator);
  const reason = classifyStorageFailure(error);
  const detail = error instanceof Error ? error.message : String(error);

  switch (reason) {
    case 'NOT_FOUND':
      return new StorageError(`Object not found on ${operation}: ${uri}`, reason, operation, uri, error);
    case 'PERMISSION_DENIED':
      return new StorageError(
        `Permission denied on ${operation} of ${uri}. ${permissionGuidance(operation, locator)}`,
        reason,
        operation,
        uri,
        error
      );
    case 'TRANSIENT':
      return new StorageError(
        `Transient storage failure on ${operation} of ${uri}: ${detail}`,
        reason,
        operation,
        uri,
        error
      );
    default:
      return new StorageError(`Storage ${operation} failed for ${uri}: ${detail}`, reason, operation, uri, error);
  }
}
