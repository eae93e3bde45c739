/**
 * Document AI response normalization
 *
 * Turns a Document AI `Document` (SDK object or a batch output shard parsed
 * from JSON) into an ExtractedDocument. Page text is rebuilt from the
 * paragraph text anchors of that page against the document's own text.
 * Anchor offsets count code points, so slicing works on the code point array.
 *
 * @module services/extraction/normalize
 */

import type { ExtractedDocument, ExtractedEntity, ExtractedPage } from '../../models/document.js';

/** int64 fields arrive as number, decimal string or Long */
type IndexLike = number | string | { toString(): string } | null | undefined;

export interface TextSegmentLike {
  startIndex?: IndexLike;
  endIndex?: IndexLike;
}

export interface LayoutLike {
  textAnchor?: { textSegments?: TextSegmentLike[] | null } | null;
}

export interface PageLike {
  pageNumber?: number | null;
  paragraphs?: { layout?: LayoutLike | null }[] | null;
}

export interface EntityLike {
  type?: string | null;
  mentionText?: string | null;
  confidence?: number | null;
}

/**
 * Structural view of a Document AI document. The SDK's IDocument and the
 * zod-parsed shard JSON both satisfy it.
 */
export interface DocumentLike {
  text?: string | null;
  pages?: PageLike[] | null;
  entities?: EntityLike[] | null;
}

class SpanResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SpanResolutionError';
  }
}

function parseIndex(value: IndexLike, fallback: number): number {
  // Unset int64 fields are omitted or zero
  if (value === null || value === undefined || value === '' || value === 0) return fallback;
  const text = typeof value === 'number' ? String(value) : value.toString();
  if (!/^\d+$/.test(text)) {
    throw new SpanResolutionError(`Invalid text index "${text}"`);
  }
  return parseInt(text, 10);
}

function sliceSegment(chars: readonly string[], segment: TextSegmentLike): string {
  const start = parseIndex(segment.startIndex, 0);
  const end = parseIndex(segment.endIndex, chars.length);
  if (start > end || end > chars.length) {
    throw new SpanResolutionError(`Segment [${start}, ${end}) outside text of length ${chars.length}`);
  }
  return chars.slice(start, end).join('');
}

function layoutText(chars: readonly string[], layout: LayoutLike | null | undefined): string {
  const segments = layout?.textAnchor?.textSegments ?? [];
  return segments.map((s) => sliceSegment(chars, s)).join('');
}

/**
 * Text of one page: each paragraph's segments concatenated, paragraphs joined
 * by newlines, outer whitespace trimmed. Any unresolvable span makes the whole
 * page ''.
 */
export function resolvePageText(fullText: string | readonly string[], page: PageLike): string {
  const chars = typeof fullText === 'string' ? Array.from(fullText) : fullText;
  try {
    const paragraphs = (page.paragraphs ?? []).map((p) => layoutText(chars, p.layout));
    return paragraphs.join('\n').trim();
  } catch (error) {
    if (error instanceof SpanResolutionError) return '';
    throw error;
  }
}

function normalizeEntity(entity: EntityLike): ExtractedEntity {
  const confidence = entity.confidence ?? 0;
  return {
    type: entity.type ?? '',
    mentionText: entity.mentionText ?? '',
    confidence: Math.min(1, Math.max(0, confidence)),
  };
}

export function normalizeDocument(doc: DocumentLike, sourceUri: string, mimeType: string): ExtractedDocument {
  const fullText = doc.text ?? '';
  const chars = Array.from(fullText);
  const pages: ExtractedPage[] = (doc.pages ?? []).map((page, index) => ({
    pageNumber: page.pageNumber ?? index + 1,
    text: resolvePageText(chars, page),
  }));

  return {
    fullText,
    pages,
    entities: (doc.entities ?? []).map(normalizeEntity),
    sourceUri,
    mimeType,
  };
}
