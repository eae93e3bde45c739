/**
 * Metadata extractor selection
 */

import type { Logger } from '../../utils/logger.js';
import type { StructuredExtractionService } from '../gemini/client.js';
import { AiMetadataExtractor } from './ai-based.js';
import { RuleBasedExtractor } from './rule-based.js';
import type { RuleTables } from './rule-tables.js';
import type { MetadataExtractor, MetadataExtractorKind } from './types.js';

export interface MetadataExtractorDeps {
  logger: Logger;
  /** Required for 'ai' */
  service?: StructuredExtractionService;
  ruleTables?: RuleTables;
}

export function createMetadataExtractor(kind: MetadataExtractorKind, deps: MetadataExtractorDeps): MetadataExtractor {
  switch (kind) {
    case 'rules':
      return new RuleBasedExtractor(deps.ruleTables);
    case 'ai':
      if (!deps.service) {
        throw new Error('The ai metadata extractor needs a structured-extraction service');
      }
      return new AiMetadataExtractor(deps.service, deps.logger);
  }
}

export { AI_INPUT_LIMIT, AiMetadataExtractor, MetadataGenerationError, truncateInput } from './ai-based.js';
export { fileFormatFromName, fileFormatOf, VIDEO_FORMAT } from './file-format.js';
export { detectLanguage, extractYearRange, RuleBasedExtractor, type RuleAnalysis } from './rule-based.js';
export { loadRuleTables, type RuleTables } from './rule-tables.js';
export type { MetadataExtractor, MetadataExtractorKind, MetadataOutcome } from './types.js';
