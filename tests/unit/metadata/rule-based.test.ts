/**
 * Unit tests for the rule-based metadata extractor
 */

import { describe, it, expect } from 'vitest';
import type { ExtractedDocument } from '../../../src/models/document.js';
import { METADATA_COLUMNS } from '../../../src/models/metadata.js';
import {
  detectLanguage,
  extractYearRange,
  RuleBasedExtractor,
} from '../../../src/services/metadata/rule-based.js';
import { compileRuleTables, loadRuleTables } from '../../../src/services/metadata/rule-tables.js';

function documentFor(fullText: string, sourceUri = 'gs://docs/brochure.pdf'): ExtractedDocument {
  return { fullText, pages: [{ pageNumber: 1, text: fullText }], entities: [], sourceUri, mimeType: 'application/pdf' };
}

describe('rule tables', () => {
  it('loads the bundled tables', () => {
    const tables = loadRuleTables();
    expect(tables.models[0]).toBe('EV6');
    expect(tables.propulsion[0]).toEqual({ name: 'Plug-in Hybrid', xev: 'PHEV' });
    expect(tables.stopWords.has('the')).toBe(true);
  });

  it('returns the cached instance on repeated loads', () => {
    expect(loadRuleTables()).toBe(loadRuleTables());
  });
});

describe('RuleBasedExtractor.toMetadata', () => {
  const extractor = new RuleBasedExtractor();

  it('fills every column', async () => {
    const { metadata, defaulted } = await extractor.extract(
      documentFor('The 2025 EV9 is a Battery Electric SUV for 2024 and 2026 buyers.')
    );

    expect(defaulted).toBe(false);
    expect(Object.keys(metadata)).toEqual([...METADATA_COLUMNS]);
    expect(metadata).toEqual({
      type: 'Unknown',
      source: 'Unknown',
      region: 'Unknown',
      country: 'Unknown',
      model: 'EV9',
      xev: 'EV',
      year1: 2024,
      year2: 2026,
      language: 'EN',
      version: null,
      updated_at: null,
      file_format: 'PDF',
      content_summary: 'The 2025 EV9 is a Battery Electric SUV for 2024 and 2026 buyers.',
    });
    expect(Object.isFrozen(metadata)).toBe(true);
  });

  it('leaves the model Unknown when no vocabulary entry occurs', async () => {
    const { metadata } = await extractor.extract(documentFor('Model CT details'));
    expect(metadata.model).toBe('Unknown');
    expect(metadata.xev).toBeNull();
    expect(metadata.year1).toBeNull();
  });

  it('matches vocabulary case-insensitively in table order', () => {
    // Sportage precedes Sorento in the table, whatever the text order
    expect(extractor.analyze('sorento and SPORTAGE').model).toBe('Sportage');
  });

  it('prefers Plug-in Hybrid over Hybrid', () => {
    const analysis = extractor.analyze('Sorento Plug-in Hybrid');
    expect(analysis.propulsion).toBe('Plug-in Hybrid');
    expect(analysis.xev).toBe('PHEV');
  });

  it('maps combustion propulsion to a null xev', () => {
    const analysis = extractor.analyze('Carnival Diesel 2.2');
    expect(analysis.propulsion).toBe('Diesel');
    expect(analysis.xev).toBeNull();
  });
});

describe('RuleBasedExtractor.analyze', () => {
  const extractor = new RuleBasedExtractor();

  it('takes the first matching price pattern', () => {
    expect(extractor.extractPrice('가격 5,200 만원부터')).toBe('5,200 만원');
    expect(extractor.extractPrice('Starting at $ 54,900 MSRP')).toBe('$ 54,900');
    expect(extractor.extractPrice('No price listed')).toBeNull();
  });

  it('collects short sentences with feature keywords, capped at five', () => {
    const text = [
      'Smart cruise',
      'Plain sentence',
      'Advanced lighting',
      'Safety first',
      'Design award',
      'Technology pack',
      'Performance tires',
    ].join('. ');
    expect(extractor.extractFeatures(text)).toBe(
      'Smart cruise | Advanced lighting | Safety first | Design award | Technology pack'
    );
  });

  it('skips sentences of 200 characters or more', () => {
    expect(extractor.extractFeatures(`${'Smart '.repeat(40)}. Short`)).toBeNull();
  });

  it('ranks keywords by count, dropping stop words and single occurrences', () => {
    expect(extractor.extractKeywords('battery the the battery range battery range once')).toBe('battery, range');
    expect(extractor.extractKeywords('unique words only')).toBeNull();
  });

  it('does not count letters glued to digits as keywords', () => {
    expect(extractor.extractKeywords('EV9 EV9 kWh kWh')).toBe('kWh');
  });

  it('summarizes with the first line longer than 50 characters', () => {
    const long = 'x'.repeat(60);
    expect(extractor.summarize(`Title\n  ${long}  \nMore`)).toBe(long);
    expect(extractor.summarize(`Title\n${'y'.repeat(250)}`)).toBe(`${'y'.repeat(200)}...`);
  });

  it('falls back to the raw text when no line qualifies', () => {
    expect(extractor.summarize('short\nlines')).toBe('short\nlines');
  });

  it('extracts labeled specifications', () => {
    expect(extractor.extractSpecifications('배터리: 99.8kWh\nMotor : dual 283kW\nPower: 380 hp')).toBe(
      '99.8kWh | dual 283kW | 380 hp'
    );
  });

  it('uses custom tables when given', () => {
    const custom = new RuleBasedExtractor(
      compileRuleTables({
        models: ['Tasman'],
        bodyStyles: ['Pickup'],
        propulsion: [{ name: 'Turbo', xev: null }],
        pricePatterns: [],
        featureKeywords: [],
        stopWords: [],
        specPatterns: [],
      })
    );
    const analysis = custom.analyze('New TASMAN pickup');
    expect(analysis.model).toBe('Tasman');
    expect(analysis.bodyStyle).toBe('Pickup');
    expect(analysis.propulsion).toBeNull();
  });
});

describe('detectLanguage', () => {
  it('detects Korean, English and neither', () => {
    expect(detectLanguage('기아 EV9 카탈로그')).toBe('KO');
    expect(detectLanguage('EV9 catalogue')).toBe('EN');
    expect(detectLanguage('2024 / 123')).toBe('Unknown');
  });
});

describe('extractYearRange', () => {
  it('returns the earliest and latest year between 1980 and 2099', () => {
    expect(extractYearRange('MY2025 launched in 2024, updated 2026; 1979 and 2100 ignored')).toEqual([2024, 2026]);
    expect(extractYearRange('no years')).toBeNull();
  });

  it('accepts years followed by Hangul suffixes', () => {
    expect(extractYearRange('2025년형 EV9, 2023년 출시')).toEqual([2023, 2025]);
    expect(extractYearRange('코드 20245 및 A2024')).toBeNull();
  });
});
