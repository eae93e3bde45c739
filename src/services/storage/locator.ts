/**
 * gs:// locator helpers
 *
 * @module services/storage/locator
 */

import type { SourceLocator } from '../../models/document.js';
import { ValidationError } from '../../utils/validation.js';

const GCS_SCHEME = 'gs://';

/**
 * Parse `gs://bucket/key` (key may be empty or end in '/').
 * @throws ValidationError for anything that is not a gs:// URI with a bucket
 */
export function parseGcsUri(uri: string): SourceLocator {
  const trimmed = uri.trim();
  if (!trimmed.startsWith(GCS_SCHEME)) {
    throw new ValidationError(`Not a gs:// URI: "${uri}"`);
  }
  const rest = trimmed.slice(GCS_SCHEME.length);
  const slash = rest.indexOf('/');
  const bucket = slash === -1 ? rest : rest.slice(0, slash);
  const key = slash === -1 ? '' : rest.slice(slash + 1);
  if (!bucket) {
    throw new ValidationError(`gs:// URI has no bucket: "${uri}"`);
  }
  return Object.freeze({ bucket, key });
}

export function formatGcsUri(locator: SourceLocator): string {
  return `${GCS_SCHEME}${locator.bucket}/${locator.key}`;
}

/** Last path segment of a key */
export function baseName(key: string): string {
  const trimmed = key.endsWith('/') ? key.slice(0, -1) : key;
  return trimmed.slice(trimmed.lastIndexOf('/') + 1);
}

/** Lowercase extension without the dot; '' when there is none */
export function extensionOf(key: string): string {
  const name = baseName(key);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : '';
}

/** File name without its extension */
export function fileStem(key: string): string {
  const name = baseName(key);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(0, dot) : name;
}

/**
 * Join key segments with single slashes. A trailing slash on the last
 * segment is kept.
 */
export function joinKey(...parts: string[]): string {
  const nonEmpty = parts.filter((p) => p.length > 0);
  return nonEmpty
    .map((p, i) => {
      let s = i > 0 ? p.replace(/^\/+/, '') : p;
      if (i < nonEmpty.length - 1) s = s.replace(/\/+$/, '');
      return s;
    })
    .join('/');
}

/** Ensure a non-empty prefix ends with '/' */
export function asPrefix(key: string): string {
  return key === '' || key.endsWith('/') ? key : `${key}/`;
}

/** Locator of a sibling object in the same "directory" */
export function siblingLocator(locator: SourceLocator, name: string): SourceLocator {
  const dir = locator.key.slice(0, locator.key.lastIndexOf('/') + 1);
  return Object.freeze({ bucket: locator.bucket, key: `${dir}${name}` });
}
