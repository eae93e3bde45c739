/**
 * Storage Service Module
 *
 * Object storage access, gs:// locator helpers and storage error mapping.
 */

export { GcsObjectStore, type GcsStoreOptions, type ObjectStore } from './object-store.js';

export {
  classifyStorageFailure,
  mapStorageError,
  permissionGuidance,
  StorageError,
  type StorageFailureReason,
  type StorageOperation,
} from './errors.js';

export {
  asPrefix,
  baseName,
  extensionOf,
  fileStem,
  formatGcsUri,
  joinKey,
  parseGcsUri,
  siblingLocator,
} from './locator.js';
