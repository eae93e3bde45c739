/**
 * Plain-text distribution report for a tabular artifact
 *
 * @module services/output/report
 */

import type { MetadataColumn } from '../../models/metadata.js';
import type { CsvRow } from './csv.js';

export const REPORT_RULE = '='.repeat(60);
export const REPORT_TITLE = 'METADATA GENERATION REPORT';
export const NULL_XEV_LABEL = 'NULL (Non-Hybrid)';
export const TOP_MODELS = 10;

interface Breakdown {
  column: MetadataColumn;
  heading: string;
  limit?: number;
  /** Label for empty cells; empty cells are skipped when absent */
  emptyLabel?: string;
}

const BREAKDOWNS: readonly Breakdown[] = [
  { column: 'type', heading: 'Document Type Distribution' },
  { column: 'source', heading: 'Source Distribution' },
  { column: 'region', heading: 'Region Distribution' },
  { column: 'model', heading: 'Model Distribution', limit: TOP_MODELS },
  { column: 'xev', heading: 'XEV Type Distribution', emptyLabel: NULL_XEV_LABEL },
  { column: 'language', heading: 'Language Distribution' },
  { column: 'file_format', heading: 'File Format Distribution' },
];

/**
 * Value frequencies, most frequent first; ties keep first-appearance order
 */
export function valueCounts(values: readonly string[], emptyLabel?: string): [string, number][] {
  const counts = new Map<string, number>();
  for (const raw of values) {
    const value = raw.trim();
    const label = value === '' ? emptyLabel : value;
    if (label === undefined) continue;
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

/** Local time as YYYY-MM-DD HH:MM:SS */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function generateReport(rows: readonly CsvRow[], generatedAt: Date): string {
  if (rows.length === 0) {
    return 'No data available for report';
  }

  const lines: string[] = [
    REPORT_RULE,
    REPORT_TITLE,
    REPORT_RULE,
    '',
    `Total Documents Processed: ${rows.length}`,
    `Generation Date: ${formatTimestamp(generatedAt)}`,
  ];

  for (const breakdown of BREAKDOWNS) {
    const counts = valueCounts(
      rows.map((row) => row[breakdown.column]),
      breakdown.emptyLabel
    );
    lines.push('', '', `${breakdown.heading}:`);
    for (const [value, count] of counts.slice(0, breakdown.limit ?? counts.length)) {
      lines.push(`  - ${value}: ${count}`);
    }
  }

  lines.push('', REPORT_RULE);
  return lines.join('\n');
}
