/**
 * Unit tests for Document AI response normalization
 */

import { describe, it, expect } from 'vitest';
import { normalizeDocument, resolvePageText } from '../../../src/services/extraction/normalize.js';
import { inferMimeType } from '../../../src/services/extraction/mime.js';

const TEXT = 'Hello world\nSecond line';

function page(segments: { startIndex?: number | string | null; endIndex?: number | string | null }[][]) {
  return {
    paragraphs: segments.map((textSegments) => ({ layout: { textAnchor: { textSegments } } })),
  };
}

describe('resolvePageText', () => {
  it('joins segments within a paragraph and paragraphs with newlines', () => {
    const p = page([
      [
        { startIndex: 0, endIndex: 5 },
        { startIndex: 5, endIndex: 11 },
      ],
      [{ startIndex: 12, endIndex: 23 }],
    ]);
    expect(resolvePageText(TEXT, p)).toBe('Hello world\nSecond line');
  });

  it('treats a missing start as 0 and a missing end as the text length', () => {
    expect(resolvePageText(TEXT, page([[{ endIndex: 5 }]]))).toBe('Hello');
    expect(resolvePageText(TEXT, page([[{ startIndex: '12' }]]))).toBe('Second line');
  });

  it('treats an end index of 0 as unset', () => {
    expect(resolvePageText(TEXT, page([[{ startIndex: 6, endIndex: 0 }]]))).toBe('world\nSecond line');
  });

  it('trims outer whitespace', () => {
    expect(resolvePageText('  padded  ', page([[{ startIndex: 0, endIndex: 10 }]]))).toBe('padded');
  });

  it('gives an empty page when a span is out of range', () => {
    expect(resolvePageText(TEXT, page([[{ startIndex: 0, endIndex: 5 }], [{ startIndex: 20, endIndex: 99 }]]))).toBe('');
    expect(resolvePageText(TEXT, page([[{ startIndex: 9, endIndex: 3 }]]))).toBe('');
    expect(resolvePageText(TEXT, page([[{ startIndex: 'abc', endIndex: 3 }]]))).toBe('');
  });

  it('gives an empty page when there are no paragraphs', () => {
    expect(resolvePageText(TEXT, {})).toBe('');
  });
});

describe('normalizeDocument', () => {
  it('keeps page numbers and defaults missing ones to position', () => {
    const doc = normalizeDocument(
      {
        text: TEXT,
        pages: [{ pageNumber: 7, ...page([[{ endIndex: 11 }]]) }, page([[{ startIndex: 12 }]])],
        entities: [
          { type: 'model', mentionText: 'EV9', confidence: 1.4 },
          { type: null, mentionText: null, confidence: -0.2 },
        ],
      },
      'gs://docs/a.pdf',
      'application/pdf'
    );

    expect(doc.fullText).toBe(TEXT);
    expect(doc.pages).toEqual([
      { pageNumber: 7, text: 'Hello world' },
      { pageNumber: 2, text: 'Second line' },
    ]);
    expect(doc.entities).toEqual([
      { type: 'model', mentionText: 'EV9', confidence: 1 },
      { type: '', mentionText: '', confidence: 0 },
    ]);
    expect(doc.sourceUri).toBe('gs://docs/a.pdf');
    expect(doc.mimeType).toBe('application/pdf');
  });

  it('counts anchor offsets in code points past astral characters', () => {
    const doc = normalizeDocument(
      {
        text: '🚗 EV9\nPage two body',
        pages: [page([[{ startIndex: 0, endIndex: 5 }]]), page([[{ startIndex: 6, endIndex: 19 }]])],
      },
      'gs://docs/a.pdf',
      'application/pdf'
    );

    expect(doc.pages.map((p) => p.text)).toEqual(['🚗 EV9', 'Page two body']);
  });

  it('rejects an end past the code point length', () => {
    expect(resolvePageText('🚗 EV9', page([[{ startIndex: 0, endIndex: 6 }]]))).toBe('');
  });

  it('handles an empty response', () => {
    expect(normalizeDocument({}, 'gs://docs/a.pdf', 'application/pdf')).toEqual({
      fullText: '',
      pages: [],
      entities: [],
      sourceUri: 'gs://docs/a.pdf',
      mimeType: 'application/pdf',
    });
  });
});

describe('inferMimeType', () => {
  it('maps known extensions case-insensitively', () => {
    expect(inferMimeType('a/B.PDF')).toBe('application/pdf');
    expect(inferMimeType('deck.pptx')).toBe(
      'application/vnd.openxmlformats-officedocument.presentationml.presentation'
    );
    expect(inferMimeType('memo.docx')).toBe(
      'application/vnd.openxmlformats-officedocument.wordprocessingml.document'
    );
  });

  it('falls back to PDF', () => {
    expect(inferMimeType('legacy.ppt')).toBe('application/pdf');
  });
});
