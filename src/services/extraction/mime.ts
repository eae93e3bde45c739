/**
 * Extension to MIME type mapping for Document AI requests
 */

import { extensionOf } from '../storage/locator.js';

const MIME_TYPES: Record<string, string> = {
  pdf: 'application/pdf',
  pptx: 'application/vnd.openxmlformats-officedocument.presentationml.presentation',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
};

/** Best guess for extensions not in the table */
export const DEFAULT_MIME_TYPE = 'application/pdf';

export function inferMimeType(key: string): string {
  return MIME_TYPES[extensionOf(key)] ?? DEFAULT_MIME_TYPE;
}
