/**
 * Command-line runner
 *
 * Parses arguments, loads and validates settings, runs one pipeline mode and
 * prints the report. Returns the process exit code; src/index.ts owns the
 * process itself.
 *
 * @module cli
 */

import { parseArgs } from 'util';

import { loadSettings, validateSettings, type RunMode, type Settings } from './core/config.js';
import { configurationError, describeError, getRecoveryHint, PipelineError } from './core/errors.js';
import { reportStartup } from './core/startup.js';
import type { MetadataExtractorKind } from './services/metadata/types.js';
import { formatGcsUri } from './services/storage/locator.js';
import type { EnvRecord } from './services/gemini/config.js';
import { createPipeline } from './services/pipeline/factory.js';
import type { MetadataPipeline, RunResult } from './services/pipeline/pipeline.js';
import { createLogger, type Logger } from './utils/logger.js';

export const USAGE = `Usage: docmeta [--batch | --video <url>] [options]

Modes:
  (default)                 process the single file named by GCS_INPUT_PATH
  --batch                   process every supported file under the configured input
  --video <url>             process a YouTube video's transcript

Options:
  --append <gs://...>       append rows to an existing CSV instead of writing a new one
  --extractor <rules|ai>    metadata extractor (default: METADATA_EXTRACTOR or rules)
  --save-transcript <gs://...>
                            also save the video's text (video mode only)
  -v, --verbose             debug logging
  -h, --help                show this help`;

export interface CliOptions {
  mode: RunMode;
  videoUrl: string | null;
  append: string | undefined;
  extractor: MetadataExtractorKind | undefined;
  saveTranscript: string | undefined;
  verbose: boolean;
  help: boolean;
}

export interface CliIo {
  /** Receives the report and help text */
  stdout: (text: string) => void;
  /** Receives log lines */
  stderr: (line: string) => void;
  signal?: AbortSignal;
  fileExists?: (path: string) => boolean;
  createPipeline?: (settings: Settings, mode: RunMode, logger: Logger) => MetadataPipeline;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        batch: { type: 'boolean', default: false },
        video: { type: 'string' },
        append: { type: 'string' },
        extractor: { type: 'string' },
        'save-transcript': { type: 'string' },
        verbose: { type: 'boolean', short: 'v', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: false,
    });
  } catch (error) {
    throw configurationError([error instanceof Error ? error.message : String(error)]);
  }
}

/**
 * @throws PipelineError CONFIGURATION_INVALID on bad usage
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = readArgs(argv);

  const problems: string[] = [];
  if (values.batch && values.video !== undefined) {
    problems.push('--batch and --video cannot be combined');
  }
  if (values['save-transcript'] !== undefined && values.video === undefined) {
    problems.push('--save-transcript requires --video');
  }
  const extractor = values.extractor;
  if (extractor !== undefined && extractor !== 'rules' && extractor !== 'ai') {
    problems.push(`--extractor must be "rules" or "ai" (got "${extractor}")`);
  }
  if (problems.length > 0) {
    throw configurationError(problems);
  }

  return {
    mode: values.video !== undefined ? 'video' : values.batch ? 'batch' : 'single',
    videoUrl: values.video ?? null,
    append: values.append,
    extractor: extractor === 'rules' || extractor === 'ai' ? extractor : undefined,
    saveTranscript: values['save-transcript'],
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

function execute(pipeline: MetadataPipeline, settings: Settings, options: CliOptions, signal?: AbortSignal): Promise<RunResult> {
  switch (options.mode) {
    case 'single':
      return pipeline.runSingle(settings.input.path ?? '', signal);
    case 'batch':
      return pipeline.runBatch(
        {
          inputPath: settings.input.path,
          inputFolder: settings.input.folder,
          inputBucket: settings.input.bucket,
          inputPrefix: settings.input.prefix,
        },
        signal
      );
    case 'video':
      return pipeline.runVideo(options.videoUrl ?? '', { saveTranscriptTo: options.saveTranscript }, signal);
  }
}

function logSummary(result: RunResult, logger: Logger): void {
  const { compile } = result;
  logger.info(`Artifact: ${formatGcsUri(compile.artifact)} (${compile.mode}, ${compile.rowCount} row(s))`);
  if (compile.reportLocator) logger.info(`Report: ${formatGcsUri(compile.reportLocator)}`);
  if (compile.localBackupPath) logger.info(`Local backup: ${compile.localBackupPath}`);
  logger.info(`Processed ${result.processed}, failed ${result.failed}`);
  for (const item of result.items.filter((i) => i.status === 'failed')) {
    logger.warn(`Failed: ${item.uri} ${item.error ?? ''}`);
  }
}

function reportFailure(error: unknown, logger: Logger): number {
  const failure = PipelineError.fromUnknown(error);
  logger.error(describeError(failure));
  logger.error(`Hint: ${getRecoveryHint(failure.category)}`);
  return 1;
}

/**
 * Run the CLI. Resolves to the exit code: 0 on success, 1 otherwise.
 */
export async function runCli(argv: string[], env: EnvRecord, io: CliIo): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    io.stderr(describeError(error));
    io.stderr(USAGE);
    return 1;
  }
  if (options.help) {
    io.stdout(USAGE);
    return 0;
  }

  let settings: Settings;
  try {
    settings = loadSettings(env, {
      verbose: options.verbose || undefined,
      extractor: options.extractor,
      appendTarget: options.append,
    });
  } catch (error) {
    return reportFailure(error, createLogger('Config', { verbose: options.verbose, sink: io.stderr }));
  }

  const logger = createLogger('Main', { verbose: settings.verbose, sink: io.stderr });
  try {
    validateSettings(settings, options.mode, io.fileExists);
    reportStartup(settings, options.mode, logger.child('Config'));

    const pipeline = (io.createPipeline ?? createPipeline)(settings, options.mode, logger);
    const result = await execute(pipeline, settings, options, io.signal);

    io.stdout(result.compile.report);
    logSummary(result, logger);
    return 0;
  } catch (error) {
    return reportFailure(error, logger);
  }
}
