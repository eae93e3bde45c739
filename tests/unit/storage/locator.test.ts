/**
 * Unit tests for gs:// locator helpers
 */

import { describe, it, expect } from 'vitest';
import {
  asPrefix,
  baseName,
  extensionOf,
  fileStem,
  formatGcsUri,
  joinKey,
  parseGcsUri,
  siblingLocator,
} from '../../../src/services/storage/locator.js';
import { ValidationError } from '../../../src/utils/validation.js';

describe('parseGcsUri', () => {
  it('splits bucket and key', () => {
    expect(parseGcsUri('gs://docs/brochures/ev9.pdf')).toEqual({ bucket: 'docs', key: 'brochures/ev9.pdf' });
  });

  it('accepts a bare bucket and a trailing-slash prefix', () => {
    expect(parseGcsUri('gs://docs')).toEqual({ bucket: 'docs', key: '' });
    expect(parseGcsUri('gs://docs/in/')).toEqual({ bucket: 'docs', key: 'in/' });
  });

  it('rejects non-gs URIs and missing buckets', () => {
    expect(() => parseGcsUri('s3://docs/a.pdf')).toThrow(ValidationError);
    expect(() => parseGcsUri('gs:///a.pdf')).toThrow('gs:// URI has no bucket');
  });

  it('returns a frozen locator', () => {
    expect(Object.isFrozen(parseGcsUri('gs://docs/a.pdf'))).toBe(true);
  });
});

describe('key helpers', () => {
  it('formats a locator back to a URI', () => {
    expect(formatGcsUri({ bucket: 'docs', key: 'a/b.pdf' })).toBe('gs://docs/a/b.pdf');
  });

  it('derives base name, extension and stem', () => {
    expect(baseName('a/b/Deck.PPTX')).toBe('Deck.PPTX');
    expect(extensionOf('a/b/Deck.PPTX')).toBe('pptx');
    expect(extensionOf('a/b/README')).toBe('');
    expect(extensionOf('a/.hidden')).toBe('');
    expect(fileStem('a/b/spec.sheet.pdf')).toBe('spec.sheet');
  });

  it('joins keys with single slashes', () => {
    expect(joinKey('output/metadata/', '/file.csv')).toBe('output/metadata/file.csv');
    expect(joinKey('', 'file.csv')).toBe('file.csv');
    expect(joinKey('root', 'run', 'stem/')).toBe('root/run/stem/');
  });

  it('adds a trailing slash to non-empty prefixes only', () => {
    expect(asPrefix('in')).toBe('in/');
    expect(asPrefix('in/')).toBe('in/');
    expect(asPrefix('')).toBe('');
  });

  it('builds sibling locators in the same directory', () => {
    expect(siblingLocator({ bucket: 'b', key: 'out/x.csv' }, 'x_report.txt')).toEqual({
      bucket: 'b',
      key: 'out/x_report.txt',
    });
    expect(siblingLocator({ bucket: 'b', key: 'x.csv' }, 'y.txt')).toEqual({ bucket: 'b', key: 'y.txt' });
  });
});
