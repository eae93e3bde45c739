/**
 * Pipeline configuration
 *
 * One immutable Settings object, parsed from an environment record with zod
 * and passed to every component. Nothing below the CLI reads process.env.
 *
 * @module core/config
 */

import { existsSync } from 'fs';
import { z } from 'zod';

import type { SourceLocator } from '../models/document.js';
import { GeminiConfigSchema, geminiConfigFromEnv, parseBoolEnv, parseIntEnv, type EnvRecord } from '../services/gemini/config.js';
import { DEFAULT_MAX_SYNC_BYTES } from '../services/extraction/router.js';
import type { MetadataExtractorKind } from '../services/metadata/types.js';
import { asPrefix, parseGcsUri } from '../services/storage/locator.js';
import { DEFAULT_TRANSCRIPT_LANGUAGES } from '../services/video/youtube.js';
import { formatZodIssues, ValidationError } from '../utils/validation.js';
import { configurationError } from './errors.js';

export const DEFAULT_BATCH_TIMEOUT_MS = 600_000;
export const DEFAULT_OUTPUT_PATH = 'output/metadata/';

const optionalText = z.string().trim().min(1).optional();

export const SettingsSchema = z.object({
  gcp: z.object({
    projectId: optionalText,
    credentialsPath: optionalText,
  }),
  documentAi: z.object({
    processorId: optionalText,
    location: z.string().trim().min(1).default('us'),
    maxSyncBytes: z.number().int().positive().default(DEFAULT_MAX_SYNC_BYTES),
    batchTimeoutMs: z.number().int().positive().default(DEFAULT_BATCH_TIMEOUT_MS),
    batchOutputUri: optionalText,
  }),
  input: z.object({
    path: optionalText,
    folder: optionalText,
    bucket: optionalText,
    prefix: optionalText,
  }),
  output: z.object({
    bucket: optionalText,
    path: z.string().trim().default(DEFAULT_OUTPUT_PATH),
    appendTarget: optionalText,
    localDir: optionalText,
  }),
  metadata: z.object({
    extractor: z.enum(['rules', 'ai']).default('rules'),
  }),
  gemini: GeminiConfigSchema,
  youtube: z.object({
    apiKey: optionalText,
    languages: z.array(z.string().trim().min(1)).min(1).default([...DEFAULT_TRANSCRIPT_LANGUAGES]),
  }),
  verbose: z.boolean().default(false),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;

export type RunMode = 'single' | 'batch' | 'video';

export interface SettingsOverrides {
  verbose?: boolean;
  extractor?: MetadataExtractorKind;
  appendTarget?: string;
}

function isExtractorKind(value: string): value is MetadataExtractorKind {
  return value === 'rules' || value === 'ai';
}

function settingsInputFromEnv(env: EnvRecord): SettingsInput {
  const text = (name: string) => env[name] || undefined;
  const languages = env.YOUTUBE_TRANSCRIPT_LANGUAGES?.split(',')
    .map((l) => l.trim())
    .filter((l) => l.length > 0);

  return {
    gcp: {
      projectId: text('GCP_PROJECT_ID'),
      credentialsPath: text('GCP_CREDENTIALS_PATH') ?? text('GOOGLE_APPLICATION_CREDENTIALS'),
    },
    documentAi: {
      processorId: text('DOCUMENTAI_PROCESSOR_ID'),
      location: text('DOCUMENTAI_LOCATION'),
      maxSyncBytes: parseIntEnv(env, 'DOCUMENTAI_MAX_SYNC_BYTES', DEFAULT_MAX_SYNC_BYTES),
      batchTimeoutMs: parseIntEnv(env, 'DOCUMENTAI_BATCH_TIMEOUT_MS', DEFAULT_BATCH_TIMEOUT_MS),
      batchOutputUri: text('DOCUMENTAI_BATCH_OUTPUT_URI'),
    },
    input: {
      path: text('GCS_INPUT_PATH'),
      folder: text('GCS_INPUT_FOLDER'),
      bucket: text('GCS_INPUT_BUCKET'),
      prefix: text('GCS_INPUT_PREFIX'),
    },
    output: {
      bucket: text('GCS_OUTPUT_BUCKET'),
      path: text('GCS_OUTPUT_PATH'),
      appendTarget: text('GCS_APPEND_TARGET'),
      localDir: text('LOCAL_OUTPUT_DIR'),
    },
    metadata: {},
    gemini: geminiConfigFromEnv(env),
    youtube: {
      apiKey: text('YOUTUBE_API_KEY') ?? text('GOOGLE_API_KEY'),
      languages: languages && languages.length > 0 ? languages : undefined,
    },
    verbose: parseBoolEnv(env, 'DOCMETA_VERBOSE', false),
  };
}

/**
 * Parse settings from an environment record.
 * @throws PipelineError CONFIGURATION_INVALID for malformed values
 */
export function loadSettings(env: EnvRecord, overrides: SettingsOverrides = {}): Settings {
  let input: SettingsInput;
  try {
    input = settingsInputFromEnv(env);
  } catch (error) {
    throw configurationError([error instanceof Error ? error.message : String(error)]);
  }

  const extractor = env.METADATA_EXTRACTOR?.trim() || undefined;
  if (extractor !== undefined && !isExtractorKind(extractor)) {
    throw configurationError([`METADATA_EXTRACTOR must be "rules" or "ai" (got "${extractor}")`]);
  }

  const result = SettingsSchema.safeParse({
    ...input,
    output: { ...input.output, appendTarget: overrides.appendTarget ?? input.output.appendTarget },
    metadata: { extractor: overrides.extractor ?? extractor },
    verbose: overrides.verbose ?? input.verbose,
  });
  if (!result.success) {
    throw configurationError(formatZodIssues(result.error));
  }
  return Object.freeze(result.data);
}

function checkGcsUri(name: string, value: string | undefined, problems: string[]): void {
  if (value === undefined) return;
  try {
    parseGcsUri(value);
  } catch (error) {
    problems.push(`${name}: ${error instanceof ValidationError ? error.message : String(error)}`);
  }
}

/**
 * Pre-flight check for a run mode. Collects every problem before failing.
 * @throws PipelineError CONFIGURATION_INVALID listing all problems
 */
export function validateSettings(
  settings: Settings,
  mode: RunMode,
  fileExists: (path: string) => boolean = existsSync
): void {
  const problems: string[] = [];

  if (!settings.gcp.projectId) problems.push('GCP_PROJECT_ID is required');
  if (settings.gcp.credentialsPath && !fileExists(settings.gcp.credentialsPath)) {
    problems.push(`GCP_CREDENTIALS_PATH does not exist: ${settings.gcp.credentialsPath}`);
  }
  if (!settings.output.bucket) problems.push('GCS_OUTPUT_BUCKET is required');

  if (mode !== 'video' && !settings.documentAi.processorId) {
    problems.push('DOCUMENTAI_PROCESSOR_ID is required');
  }

  if (mode === 'single') {
    if (!settings.input.path) {
      problems.push('GCS_INPUT_PATH is required in single-file mode');
    } else if (/[*?[]/.test(settings.input.path)) {
      problems.push('GCS_INPUT_PATH must name one file in single-file mode (wildcards need --batch)');
    } else {
      checkGcsUri('GCS_INPUT_PATH', settings.input.path, problems);
    }
  }
  if (mode === 'batch') {
    if (!settings.input.path && !settings.input.folder && !settings.input.bucket) {
      problems.push('Batch mode needs GCS_INPUT_PATH, GCS_INPUT_FOLDER or GCS_INPUT_BUCKET');
    }
    checkGcsUri('GCS_INPUT_PATH', settings.input.path, problems);
    checkGcsUri('GCS_INPUT_FOLDER', settings.input.folder, problems);
  }
  if (mode === 'video' && !settings.youtube.apiKey) {
    problems.push('YOUTUBE_API_KEY (or GOOGLE_API_KEY) is required in video mode');
  }

  if (settings.metadata.extractor === 'ai' && !settings.gemini.useVertex && !settings.gemini.apiKey) {
    problems.push('METADATA_EXTRACTOR=ai needs GEMINI_API_KEY (or GEMINI_USE_VERTEX=true)');
  }

  checkGcsUri('GCS_APPEND_TARGET', settings.output.appendTarget, problems);
  checkGcsUri('DOCUMENTAI_BATCH_OUTPUT_URI', settings.documentAi.batchOutputUri, problems);

  if (problems.length > 0) {
    throw configurationError(problems);
  }
}

/**
 * Root under which async jobs write their output
 */
export function batchOutputRoot(settings: Settings): SourceLocator {
  if (settings.documentAi.batchOutputUri) {
    const locator = parseGcsUri(settings.documentAi.batchOutputUri);
    return { bucket: locator.bucket, key: asPrefix(locator.key) };
  }
  return { bucket: settings.output.bucket ?? '', key: 'docai-batch/' };
}
