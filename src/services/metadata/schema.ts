/**
 * AI response parsing
 *
 * The response should be a bare JSON object; code fences and leading or
 * trailing prose are tolerated.
 */

import { z } from 'zod';

import { freezeMetadata, UNKNOWN, type DocumentMetadata } from '../../models/metadata.js';

const looseString = z.union([z.string(), z.number()]).nullish();

export const AiMetadataSchema = z.object({
  type: looseString,
  source: looseString,
  region: looseString,
  country: looseString,
  model: looseString,
  xev: looseString,
  year1: looseString,
  year2: looseString,
  language: looseString,
  version: looseString,
  updated_at: looseString,
  file_format: looseString,
  content_summary: looseString,
});

export type AiMetadata = z.infer<typeof AiMetadataSchema>;

const EMPTY_MARKERS = new Set(['', 'null', 'none', 'unknown', 'n/a', 'na', '-']);

/**
 * Parse JSON text into an object.
 * @throws SyntaxError when no JSON object can be recovered
 */
export function parseJsonObject(text: string): unknown {
  let clean = text.trim();
  if (clean.startsWith('```')) {
    clean = clean.replace(/^```(?:json)?\s*/i, '').replace(/\s*```\s*$/, '');
  }

  try {
    return JSON.parse(clean);
  } catch (error) {
    const start = clean.indexOf('{');
    const end = clean.lastIndexOf('}');
    if (start === -1 || end <= start) throw error;
    return JSON.parse(clean.slice(start, end + 1));
  }
}

function presentText(value: AiMetadata[keyof AiMetadata]): string | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  return EMPTY_MARKERS.has(text.toLowerCase()) ? null : text;
}

function year(value: AiMetadata[keyof AiMetadata]): number | null {
  const text = presentText(value);
  if (text === null || !/^\d{4}$/.test(text)) return null;
  const parsed = parseInt(text, 10);
  return parsed >= 1900 && parsed <= 2100 ? parsed : null;
}

/**
 * Map a validated response onto the fixed schema. The service's file_format
 * wins over the pre-computed one when it reports one.
 */
export function toDocumentMetadata(response: AiMetadata, precomputedFormat: string): DocumentMetadata {
  const categorical = (value: AiMetadata[keyof AiMetadata]) => presentText(value) ?? UNKNOWN;
  return freezeMetadata({
    type: categorical(response.type),
    source: categorical(response.source),
    region: categorical(response.region),
    country: categorical(response.country),
    model: categorical(response.model),
    xev: presentText(response.xev)?.toUpperCase() ?? null,
    year1: year(response.year1),
    year2: year(response.year2),
    language: presentText(response.language)?.toUpperCase() ?? UNKNOWN,
    version: presentText(response.version),
    updated_at: presentText(response.updated_at),
    file_format: presentText(response.file_format) ?? precomputedFormat,
    content_summary: presentText(response.content_summary) ?? '',
  });
}
