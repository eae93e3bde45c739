/**
 * Rule-based metadata extractor
 *
 * Deterministic scans of the full text against the rule tables. Vocabulary
 * matches are case-insensitive substring searches in table order; feature
 * keyword matches are case-sensitive.
 *
 * @module services/metadata/rule-based
 */

import type { ExtractedDocument } from '../../models/document.js';
import { freezeMetadata, UNKNOWN, type DocumentMetadata } from '../../models/metadata.js';
import { fileFormatOf } from './file-format.js';
import { loadRuleTables, type RuleTables } from './rule-tables.js';
import type { MetadataExtractor, MetadataOutcome } from './types.js';

export const FEATURE_SENTENCE_WINDOW = 20;
export const FEATURE_MAX_SENTENCE_LENGTH = 200;
export const MAX_FEATURES = 5;
export const TOP_KEYWORDS = 10;
export const MIN_KEYWORD_COUNT = 2;
export const SUMMARY_MIN_PARAGRAPH_LENGTH = 50;
export const SUMMARY_MAX_LENGTH = 200;
export const MAX_SPECS = 5;
export const LIST_SEPARATOR = ' | ';

/** 2+ Hangul/Latin letters not touching other letters, digits or '_' */
const KEYWORD_PATTERN = /(?<![\p{L}\p{N}_])[가-힣a-zA-Z]{2,}(?![\p{L}\p{N}_])/gu;
/** Only ASCII letters, digits and '_' bound a year, so 2024년 and 2025년형 count */
const YEAR_PATTERN = /(?<![A-Za-z0-9_])(19[89]\d|20\d{2})(?![A-Za-z0-9_])/g;
const HANGUL = /[가-힣]/;
const LATIN = /[A-Za-z]/;

/**
 * Everything the rules find. Missing values are null.
 */
export interface RuleAnalysis {
  model: string | null;
  bodyStyle: string | null;
  propulsion: string | null;
  xev: string | null;
  price: string | null;
  /** Up to 5 sentences joined with ' | ' */
  features: string | null;
  /** Up to 10 keywords joined with ', ' */
  keywords: string | null;
  summary: string;
  /** Up to 5 spec values joined with ' | ' */
  specifications: string | null;
  language: string;
  yearRange: [number, number] | null;
}

function length(text: string): number {
  return [...text].length;
}

function truncate(text: string, max: number): string {
  const chars = [...text];
  return chars.length > max ? `${chars.slice(0, max).join('')}...` : text;
}

function firstVocabularyHit<T>(text: string, table: readonly T[], nameOf: (entry: T) => string): T | null {
  const upper = text.toUpperCase();
  return table.find((entry) => upper.includes(nameOf(entry).toUpperCase())) ?? null;
}

export class RuleBasedExtractor implements MetadataExtractor {
  readonly kind = 'rules' as const;

  constructor(private readonly tables: RuleTables = loadRuleTables()) {}

  async extract(document: ExtractedDocument): Promise<MetadataOutcome> {
    return { metadata: this.toMetadata(document), defaulted: false };
  }

  toMetadata(document: ExtractedDocument): DocumentMetadata {
    const analysis = this.analyze(document.fullText);
    return freezeMetadata({
      type: UNKNOWN,
      source: UNKNOWN,
      region: UNKNOWN,
      country: UNKNOWN,
      model: analysis.model ?? UNKNOWN,
      xev: analysis.xev,
      year1: analysis.yearRange?.[0] ?? null,
      year2: analysis.yearRange?.[1] ?? null,
      language: analysis.language,
      version: null,
      updated_at: null,
      file_format: fileFormatOf(document),
      content_summary: analysis.summary,
    });
  }

  analyze(text: string): RuleAnalysis {
    const propulsion = firstVocabularyHit(text, this.tables.propulsion, (p) => p.name);
    return {
      model: firstVocabularyHit(text, this.tables.models, (m) => m),
      bodyStyle: firstVocabularyHit(text, this.tables.bodyStyles, (b) => b),
      propulsion: propulsion?.name ?? null,
      xev: propulsion?.xev ?? null,
      price: this.extractPrice(text),
      features: this.extractFeatures(text),
      keywords: this.extractKeywords(text),
      summary: this.summarize(text),
      specifications: this.extractSpecifications(text),
      language: detectLanguage(text),
      yearRange: extractYearRange(text),
    };
  }

  extractPrice(text: string): string | null {
    for (const pattern of this.tables.pricePatterns) {
      const match = pattern.exec(text);
      if (match) return match[0];
    }
    return null;
  }

  extractFeatures(text: string): string | null {
    const found: string[] = [];
    for (const sentence of text.split('.').slice(0, FEATURE_SENTENCE_WINDOW)) {
      if (length(sentence) >= FEATURE_MAX_SENTENCE_LENGTH) continue;
      if (this.tables.featureKeywords.some((k) => sentence.includes(k))) {
        found.push(sentence.trim());
      }
    }
    return found.length > 0 ? found.slice(0, MAX_FEATURES).join(LIST_SEPARATOR) : null;
  }

  extractKeywords(text: string, topN: number = TOP_KEYWORDS): string | null {
    const counts = new Map<string, number>();
    for (const [word] of text.matchAll(KEYWORD_PATTERN)) {
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
    const top = [...counts.entries()]
      .filter(([word, count]) => count >= MIN_KEYWORD_COUNT && !this.tables.stopWords.has(word.toLowerCase()))
      .sort((a, b) => b[1] - a[1])
      .slice(0, topN)
      .map(([word]) => word);
    return top.length > 0 ? top.join(', ') : null;
  }

  /**
   * First line longer than 50 characters, cut to 200 with '...'; otherwise
   * the text itself cut the same way.
   */
  summarize(text: string): string {
    for (const line of text.split('\n')) {
      const paragraph = line.trim();
      if (length(paragraph) > SUMMARY_MIN_PARAGRAPH_LENGTH) {
        return truncate(paragraph, SUMMARY_MAX_LENGTH);
      }
    }
    return truncate(text, SUMMARY_MAX_LENGTH);
  }

  extractSpecifications(text: string): string | null {
    const specs: string[] = [];
    for (const { pattern } of this.tables.specPatterns) {
      for (const match of text.matchAll(pattern)) {
        if (match[1] !== undefined) specs.push(match[1]);
      }
    }
    return specs.length > 0 ? specs.slice(0, MAX_SPECS).join(LIST_SEPARATOR) : null;
  }
}

/** KO when Hangul is present, EN when Latin letters are, UNKNOWN otherwise */
export function detectLanguage(text: string): string {
  if (HANGUL.test(text)) return 'KO';
  if (LATIN.test(text)) return 'EN';
  return UNKNOWN;
}

/** Earliest and latest year 1980-2099 mentioned */
export function extractYearRange(text: string): [number, number] | null {
  const years = [...text.matchAll(YEAR_PATTERN)].map((m) => parseInt(m[1] ?? m[0], 10));
  if (years.length === 0) return null;
  return [Math.min(...years), Math.max(...years)];
}
