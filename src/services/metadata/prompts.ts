/**
 * Instruction for the AI metadata extractor
 */

import { METADATA_COLUMNS } from '../../models/metadata.js';

const FIELD_GUIDE = `
- type: document type (e.g. "Brochure", "Spec Sheet", "Price List", "Press Release", "Manual", "Video")
- source: publisher or channel (e.g. "HQ", "Dealer", "Press", "YouTube")
- region: market region (e.g. "Korea", "North America", "Europe")
- country: ISO country name of the market
- model: vehicle model name as written (e.g. "EV9", "Sportage")
- xev: electrified powertrain code, one of "EV", "HEV", "PHEV", "FCEV"; null for combustion-only
- year1: first model year covered (integer) or null
- year2: last model year covered (integer) or null
- language: ISO 639-1 code in upper case (e.g. "KO", "EN")
- version: document version or edition string, or null
- updated_at: content date as written in the document (YYYY-MM-DD when possible), or null
- file_format: "PDF", "PPT", "DOC" or "video"
- content_summary: one or two sentences, at most 200 characters, in the document's language`.trim();

/**
 * Fixed instruction; only the pre-computed file format varies.
 */
export function buildMetadataInstruction(fileFormat: string): string {
  return [
    'You extract catalogue metadata from automotive marketing and technical documents.',
    'Return exactly one JSON object with these keys and nothing else:',
    METADATA_COLUMNS.join(', '),
    '',
    FIELD_GUIDE,
    '',
    'Use "Unknown" for a categorical field you cannot determine and null for an optional one. Do not guess.',
    `The file format inferred from the file name is "${fileFormat}". Report a different file_format only if the content clearly shows it.`,
  ].join('\n');
}
