/**
 * Tabular artifact codec: UTF-8 CSV with a BOM, fixed column order, one
 * header row. Rows stay as strings so existing rows round-trip unchanged.
 *
 * @module services/output/csv
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';

import { METADATA_COLUMNS, type DocumentMetadata, type MetadataColumn } from '../../models/metadata.js';

export type CsvRow = Record<MetadataColumn, string>;

export const CSV_CONTENT_TYPE = 'text/csv; charset=utf-8';

const ParsedRowsSchema = z.array(z.record(z.string(), z.string()));

function buildRow(cell: (column: MetadataColumn) => string): CsvRow {
  return {
    type: cell('type'),
    source: cell('source'),
    region: cell('region'),
    country: cell('country'),
    model: cell('model'),
    xev: cell('xev'),
    year1: cell('year1'),
    year2: cell('year2'),
    language: cell('language'),
    version: cell('version'),
    updated_at: cell('updated_at'),
    file_format: cell('file_format'),
    content_summary: cell('content_summary'),
  };
}

/** null becomes '' */
export function metadataToRow(metadata: DocumentMetadata): CsvRow {
  return buildRow((column) => {
    const value = metadata[column];
    return value === null ? '' : String(value);
  });
}

export function serializeRows(rows: readonly CsvRow[]): string {
  return stringify([...rows], {
    header: true,
    bom: true,
    columns: [...METADATA_COLUMNS],
  });
}

export interface ParsedArtifact {
  rows: CsvRow[];
  /** Header names outside the fixed columns, in file order */
  droppedColumns: string[];
}

const KNOWN_COLUMNS: ReadonlySet<string> = new Set(METADATA_COLUMNS);

/**
 * Parse an artifact and project every row onto the fixed columns. Columns the
 * file lacks become ''; extra columns are dropped and reported.
 */
export function inspectArtifact(content: Buffer | string): ParsedArtifact {
  let header: string[] = [];
  const records: unknown = parse(content, {
    bom: true,
    columns: (names: string[]) => {
      header = names;
      return names;
    },
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return {
    rows: ParsedRowsSchema.parse(records).map((record) => buildRow((column) => record[column] ?? '')),
    droppedColumns: header.filter((name) => !KNOWN_COLUMNS.has(name)),
  };
}

export function parseArtifact(content: Buffer | string): CsvRow[] {
  return inspectArtifact(content).rows;
}
