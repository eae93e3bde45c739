/**
 * Locator & Filter
 *
 * Resolves the configured input into a de-duplicated, sorted list of
 * supported objects. Precedence: explicit path, then prefix (folder style,
 * then bucket + prefix), then a wildcard path, then the whole bucket.
 * Directory markers are skipped and extensions compared case-insensitively.
 * An empty result is not an error here.
 *
 * @module services/pipeline/source-filter
 */

import { configurationError } from '../../core/errors.js';
import { SUPPORTED_FILE_TYPES, type SourceLocator } from '../../models/document.js';
import type { Logger } from '../../utils/logger.js';
import type { ObjectStore } from '../storage/object-store.js';
import { asPrefix, extensionOf, parseGcsUri } from '../storage/locator.js';

export interface SourceSpec {
  /** gs://bucket/key, gs://bucket/prefix/ or a wildcard pattern */
  inputPath?: string | null;
  /** gs://bucket/prefix/ (old style) */
  inputFolder?: string | null;
  inputBucket?: string | null;
  inputPrefix?: string | null;
}

export type ResolvedSource =
  | { kind: 'explicit'; locator: SourceLocator }
  | { kind: 'prefix'; bucket: string; prefix: string }
  | { kind: 'wildcard'; bucket: string; prefix: string; pattern: RegExp }
  | { kind: 'bucket'; bucket: string };

const WILDCARD = /[*?[]/;

export function isSupportedKey(key: string): boolean {
  if (key.endsWith('/')) return false;
  const ext = extensionOf(key);
  return SUPPORTED_FILE_TYPES.some((t) => t === ext);
}

/**
 * Glob to RegExp: `*` and `?` stay within one path segment, `**` crosses
 * segments, `[...]` is a character class.
 */
export function globToRegExp(glob: string): RegExp {
  let source = '';
  for (let i = 0; i < glob.length; i++) {
    const ch = glob.charAt(i);
    if (ch === '*') {
      if (glob.charAt(i + 1) === '*') {
        source += '.*';
        i++;
      } else {
        source += '[^/]*';
      }
    } else if (ch === '?') {
      source += '[^/]';
    } else if (ch === '[') {
      const close = glob.indexOf(']', i + 1);
      if (close === -1) {
        source += '\\[';
      } else {
        const body = glob.slice(i + 1, close).replace(/^!/, '^').replace(/\\/g, '\\\\');
        source += `[${body}]`;
        i = close;
      }
    } else {
      source += ch.replace(/[.+^${}()|\\\]]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

export function resolveSourceSpec(spec: SourceSpec): ResolvedSource {
  const path = spec.inputPath?.trim() || null;
  const folder = spec.inputFolder?.trim() || null;
  const bucket = spec.inputBucket?.trim() || null;
  const prefix = spec.inputPrefix?.trim() || '';

  if (path && !WILDCARD.test(path)) {
    const locator = parseGcsUri(path);
    if (locator.key === '' || locator.key.endsWith('/')) {
      return { kind: 'prefix', bucket: locator.bucket, prefix: locator.key };
    }
    return { kind: 'explicit', locator };
  }
  if (folder) {
    const locator = parseGcsUri(folder);
    return { kind: 'prefix', bucket: locator.bucket, prefix: asPrefix(locator.key) };
  }
  if (bucket && prefix) {
    return { kind: 'prefix', bucket, prefix: asPrefix(prefix.replace(/^\/+/, '')) };
  }
  if (path) {
    const locator = parseGcsUri(path);
    const firstWildcard = locator.key.search(WILDCARD);
    return {
      kind: 'wildcard',
      bucket: locator.bucket,
      prefix: locator.key.slice(0, firstWildcard === -1 ? locator.key.length : firstWildcard),
      pattern: globToRegExp(locator.key),
    };
  }
  if (bucket) {
    return { kind: 'bucket', bucket };
  }
  throw configurationError(['No input source: set GCS_INPUT_PATH, GCS_INPUT_FOLDER or GCS_INPUT_BUCKET']);
}

export async function listSources(store: ObjectStore, spec: SourceSpec, logger: Logger): Promise<SourceLocator[]> {
  const source = resolveSourceSpec(spec);

  let candidates: SourceLocator[];
  switch (source.kind) {
    case 'explicit':
      candidates = [source.locator];
      break;
    case 'prefix':
      candidates = (await store.list(source.bucket, source.prefix)).map((key) => ({ bucket: source.bucket, key }));
      break;
    case 'wildcard':
      candidates = (await store.list(source.bucket, source.prefix))
        .filter((key) => source.pattern.test(key))
        .map((key) => ({ bucket: source.bucket, key }));
      break;
    case 'bucket':
      candidates = (await store.list(source.bucket, '')).map((key) => ({ bucket: source.bucket, key }));
      break;
  }

  const seen = new Set<string>();
  const locators: SourceLocator[] = [];
  for (const candidate of candidates) {
    if (!isSupportedKey(candidate.key)) continue;
    const id = `${candidate.bucket}/${candidate.key}`;
    if (seen.has(id)) continue;
    seen.add(id);
    locators.push(Object.freeze({ bucket: candidate.bucket, key: candidate.key }));
  }
  locators.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));

  logger.info(
    `Resolved ${source.kind} source to ${locators.length} supported file(s) (${candidates.length} object(s) listed)`
  );
  return locators;
}
