/**
 * Unit tests for the CSV codec
 */

import { describe, it, expect } from 'vitest';
import { inspectArtifact, metadataToRow, parseArtifact, serializeRows } from '../../../src/services/output/csv.js';
import { record } from '../../helpers/records.js';

const HEADER =
  'type,source,region,country,model,xev,year1,year2,language,version,updated_at,file_format,content_summary';

const EV9 = record({
  type: 'Brochure',
  source: 'HQ',
  region: 'Korea',
  country: 'South Korea',
  model: 'EV9',
  xev: 'EV',
  year1: 2024,
  year2: 2025,
  language: 'KO',
  content_summary: 'Flagship, three rows',
});

describe('metadataToRow', () => {
  it('writes nulls as empty cells and numbers as text', () => {
    const row = metadataToRow(EV9);
    expect(row.year1).toBe('2024');
    expect(row.version).toBe('');
    expect(row.updated_at).toBe('');
    expect(Object.keys(row)).toEqual(HEADER.split(','));
  });
});

describe('serializeRows', () => {
  it('writes a BOM, the fixed header and quoted cells', () => {
    const csv = serializeRows([metadataToRow(EV9)]);

    expect(csv.split('\n')).toEqual([
      `\uFEFF${HEADER}`,
      'Brochure,HQ,Korea,South Korea,EV9,EV,2024,2025,KO,,,PDF,"Flagship, three rows"',
      '',
    ]);
  });
});

describe('parseArtifact', () => {
  it('reads back what serializeRows wrote', () => {
    const row = metadataToRow(record({ model: 'K5', content_summary: 'Says "hello"\nover two lines' }));
    expect(parseArtifact(serializeRows([row]))).toEqual([row]);
  });

  it('projects foreign layouts onto the fixed columns', () => {
    const rows = parseArtifact(Buffer.from('\uFEFFmodel,type,extra\nEV6,Brochure,x\n', 'utf-8'));

    expect(rows).toHaveLength(1);
    expect(rows[0]?.model).toBe('EV6');
    expect(rows[0]?.type).toBe('Brochure');
    expect(rows[0]?.xev).toBe('');
    expect(rows[0]).not.toHaveProperty('extra');
  });

  it('reports the header names it drops', () => {
    const parsed = inspectArtifact('\uFEFFmodel,notes,type,owner\nEV6,keep,Brochure,kim\n');

    expect(parsed.droppedColumns).toEqual(['notes', 'owner']);
    expect(parsed.rows[0]?.model).toBe('EV6');
    expect(inspectArtifact(serializeRows([metadataToRow(EV9)])).droppedColumns).toEqual([]);
  });

  it('skips blank lines', () => {
    expect(parseArtifact(`${HEADER}\n\n`)).toEqual([]);
  });
});
