/**
 * Rule tables for the rule-based extractor, read from data/rule-tables.json.
 *
 * Every table is an ordered list; scans evaluate entries in declared order
 * and the first hit wins.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

import { validateInput } from '../../utils/validation.js';

const RuleTablesSchema = z.object({
  models: z.array(z.string().min(1)),
  bodyStyles: z.array(z.string().min(1)),
  propulsion: z.array(z.object({ name: z.string().min(1), xev: z.string().nullable() })),
  pricePatterns: z.array(z.string().min(1)),
  featureKeywords: z.array(z.string().min(1)),
  stopWords: z.array(z.string()),
  specPatterns: z.array(z.object({ label: z.string(), pattern: z.string().min(1) })),
});

export type RuleTablesFile = z.infer<typeof RuleTablesSchema>;

export interface RuleTables {
  models: readonly string[];
  bodyStyles: readonly string[];
  propulsion: readonly { name: string; xev: string | null }[];
  pricePatterns: readonly RegExp[];
  featureKeywords: readonly string[];
  /** Lowercased */
  stopWords: ReadonlySet<string>;
  specPatterns: readonly { label: string; pattern: RegExp }[];
}

export const DEFAULT_RULE_TABLES_PATH = fileURLToPath(new URL('../../../data/rule-tables.json', import.meta.url));

export function compileRuleTables(file: RuleTablesFile): RuleTables {
  return {
    models: file.models,
    bodyStyles: file.bodyStyles,
    propulsion: file.propulsion,
    pricePatterns: file.pricePatterns.map((p) => new RegExp(p, 'u')),
    featureKeywords: file.featureKeywords,
    stopWords: new Set(file.stopWords.map((w) => w.toLowerCase())),
    specPatterns: file.specPatterns.map((s) => ({ label: s.label, pattern: new RegExp(s.pattern, 'giu') })),
  };
}

const cache = new Map<string, RuleTables>();

export function loadRuleTables(path: string = DEFAULT_RULE_TABLES_PATH): RuleTables {
  const cached = cache.get(path);
  if (cached) return cached;
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const tables = compileRuleTables(validateInput(RuleTablesSchema, raw, `rule tables (${path})`));
  cache.set(path, tables);
  return tables;
}
