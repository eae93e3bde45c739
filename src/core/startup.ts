/**
 * Startup checks
 *
 * Prints non-fatal warnings and a settings summary to stderr before a run.
 * Fatal problems are raised by validateSettings instead.
 *
 * @module core/startup
 */

import type { Logger } from '../utils/logger.js';
import type { RunMode, Settings } from './config.js';

const ONE_MINUTE_MS = 60_000;

/** `****` plus the last four characters of long secrets */
export function maskSecret(value: string | undefined): string {
  if (!value) return '(not set)';
  return value.length > 8 ? `****${value.slice(-4)}` : '****';
}

/**
 * Conditions that degrade a run without stopping it
 */
export function startupWarnings(settings: Settings, mode: RunMode): string[] {
  const warnings: string[] = [];

  if (!settings.gcp.credentialsPath) {
    warnings.push('GCP_CREDENTIALS_PATH is not set. Application default credentials will be used.');
  }
  if (mode !== 'video' && settings.documentAi.batchTimeoutMs < ONE_MINUTE_MS) {
    warnings.push(
      `DOCUMENTAI_BATCH_TIMEOUT_MS=${settings.documentAi.batchTimeoutMs} is under a minute. Large documents will time out.`
    );
  }
  if (mode === 'video' && settings.metadata.extractor === 'rules') {
    warnings.push('Video mode with METADATA_EXTRACTOR=rules derives metadata from transcript keywords only.');
  }
  if (settings.output.appendTarget && settings.output.localDir) {
    warnings.push('LOCAL_OUTPUT_DIR receives the full appended artifact, not only this run.');
  }

  return warnings;
}

export function settingsSummary(settings: Settings, mode: RunMode): string[] {
  const lines = [
    `mode=${mode} extractor=${settings.metadata.extractor}`,
    `project=${settings.gcp.projectId ?? '(not set)'} credentials=${settings.gcp.credentialsPath ?? '(default)'}`,
    `output=gs://${settings.output.bucket ?? '(not set)'}/${settings.output.path}` +
      (settings.output.appendTarget ? ` append=${settings.output.appendTarget}` : ''),
  ];
  if (mode !== 'video') {
    lines.push(
      `documentai=${settings.documentAi.location}/${settings.documentAi.processorId ?? '(not set)'} ` +
        `maxSyncBytes=${settings.documentAi.maxSyncBytes} batchTimeoutMs=${settings.documentAi.batchTimeoutMs}`
    );
  }
  if (settings.metadata.extractor === 'ai') {
    lines.push(
      settings.gemini.useVertex
        ? `gemini=${settings.gemini.model} vertex=${settings.gemini.location}`
        : `gemini=${settings.gemini.model} apiKey=${maskSecret(settings.gemini.apiKey)}`
    );
  }
  if (mode === 'video') {
    lines.push(`youtube apiKey=${maskSecret(settings.youtube.apiKey)} languages=${settings.youtube.languages.join(',')}`);
  }
  return lines;
}

export function reportStartup(settings: Settings, mode: RunMode, logger: Logger): void {
  const warnings = startupWarnings(settings, mode);
  if (warnings.length > 0) {
    logger.warn('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      logger.warn(`  - ${w}`);
    }
  }
  for (const line of settingsSummary(settings, mode)) {
    logger.info(line);
  }
}
