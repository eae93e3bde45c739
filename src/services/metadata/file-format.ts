/**
 * File format column values
 */

import type { ExtractedDocument } from '../../models/document.js';
import { UNKNOWN } from '../../models/metadata.js';
import { extensionOf } from '../storage/locator.js';

export const VIDEO_FORMAT = 'video';

const FILE_FORMATS: Record<string, string> = {
  pdf: 'PDF',
  pptx: 'PPT',
  ppt: 'PPT',
  docx: 'DOC',
  doc: 'DOC',
};

/**
 * Format from a key or URI's extension. Unmapped extensions are upper-cased;
 * no extension gives UNKNOWN.
 */
export function fileFormatFromName(name: string): string {
  const ext = extensionOf(name.split(/[?#]/)[0] ?? name);
  if (!ext) return UNKNOWN;
  return FILE_FORMATS[ext] ?? ext.toUpperCase();
}

/** Video sources are always "video" */
export function fileFormatOf(document: ExtractedDocument): string {
  if (document.mimeType.startsWith('video/')) return VIDEO_FORMAT;
  return fileFormatFromName(document.sourceUri);
}
