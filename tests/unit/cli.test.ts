/**
 * Unit tests for the command-line runner
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { parseCliArgs, runCli, USAGE, type CliIo } from '../../src/cli.js';
import type { RunMode, Settings } from '../../src/core/config.js';
import { PipelineError } from '../../src/core/errors.js';
import { AuditLog } from '../../src/services/audit.js';
import { RuleBasedExtractor } from '../../src/services/metadata/rule-based.js';
import { OutputCompiler } from '../../src/services/output/compiler.js';
import { parseArtifact } from '../../src/services/output/csv.js';
import { MetadataPipeline } from '../../src/services/pipeline/pipeline.js';
import { MemoryObjectStore } from '../helpers/memory-store.js';
import { FakeVideoLoader, StoreBackedExtractor } from '../helpers/store-extractor.js';

const ENV = {
  GCP_PROJECT_ID: 'test-project',
  DOCUMENTAI_PROCESSOR_ID: 'test-processor',
  GCS_OUTPUT_BUCKET: 'out',
  GCS_INPUT_PATH: 'gs://in/docs/ev9.pdf',
};

describe('parseCliArgs', () => {
  it('defaults to single-file mode', () => {
    expect(parseCliArgs([])).toEqual({
      mode: 'single',
      videoUrl: null,
      append: undefined,
      extractor: undefined,
      saveTranscript: undefined,
      verbose: false,
      help: false,
    });
  });

  it('reads modes and options', () => {
    expect(parseCliArgs(['--batch', '--append', 'gs://out/m.csv', '--extractor', 'ai', '-v'])).toMatchObject({
      mode: 'batch',
      append: 'gs://out/m.csv',
      extractor: 'ai',
      verbose: true,
    });
    expect(parseCliArgs(['--video', 'https://youtu.be/abcDEF12345', '--save-transcript', 'gs://out/t.txt'])).toMatchObject({
      mode: 'video',
      videoUrl: 'https://youtu.be/abcDEF12345',
      saveTranscript: 'gs://out/t.txt',
    });
  });

  it('lists every usage problem', () => {
    expect(() => parseCliArgs(['--batch', '--video', 'u', '--extractor', 'llm'])).toThrow(
      'Configuration invalid:\n  - --batch and --video cannot be combined\n  - --extractor must be "rules" or "ai" (got "llm")'
    );
    expect(() => parseCliArgs(['--save-transcript', 'gs://out/t.txt'])).toThrow('--save-transcript requires --video');
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--nope'])).toThrow(PipelineError);
    expect(() => parseCliArgs(['--nope'])).toThrow(/^Configuration invalid:\n  - Unknown option '--nope'/);
  });
});

describe('runCli', () => {
  let store: MemoryObjectStore;
  let stdout: string[];
  let stderr: string[];
  let created: { settings: Settings; mode: RunMode }[];
  let video: FakeVideoLoader;

  beforeEach(() => {
    store = new MemoryObjectStore()
      .put('gs://in/docs/ev9.pdf', 'The EV9 is a Battery Electric SUV.')
      .put('gs://in/docs/k5.pdf', 'K5 Hybrid sedan');
    stdout = [];
    stderr = [];
    created = [];
    video = new FakeVideoLoader();
  });

  function io(): CliIo {
    return {
      stdout: (text) => stdout.push(text),
      stderr: (line) => stderr.push(line),
      fileExists: () => true,
      createPipeline: (settings, mode, logger) => {
        created.push({ settings, mode });
        return new MetadataPipeline(
          {
            store,
            extractor: new StoreBackedExtractor(store),
            metadata: new RuleBasedExtractor(),
            compiler: new OutputCompiler(store, logger.child('Compiler')),
            audit: new AuditLog((line) => stderr.push(line)),
            logger: logger.child('Pipeline'),
            video,
          },
          {
            outputBucket: settings.output.bucket ?? '',
            outputPath: settings.output.path,
            appendTarget: null,
          }
        );
      },
    };
  }

  it('prints help', async () => {
    await expect(runCli(['--help'], {}, io())).resolves.toBe(0);
    expect(stdout).toEqual([USAGE]);
    expect(created).toEqual([]);
  });

  it('exits 1 with usage on bad arguments', async () => {
    await expect(runCli(['--save-transcript', 'gs://out/t.txt'], ENV, io())).resolves.toBe(1);
    expect(stderr).toEqual([
      '[CONFIGURATION_INVALID] Configuration invalid:\n  - --save-transcript requires --video',
      USAGE,
    ]);
  });

  it('exits 1 with a hint on invalid configuration', async () => {
    await expect(runCli([], { GCS_OUTPUT_BUCKET: 'out' }, io())).resolves.toBe(1);

    expect(stderr).toEqual([
      '[Main] ERROR: [CONFIGURATION_INVALID] Configuration invalid:\n' +
        '  - GCP_PROJECT_ID is required\n' +
        '  - DOCUMENTAI_PROCESSOR_ID is required\n' +
        '  - GCS_INPUT_PATH is required in single-file mode',
      '[Main] ERROR: Hint: Check the environment variables listed above (see .env.example)',
    ]);
    expect(created).toEqual([]);
  });

  it('reports malformed settings before logging starts', async () => {
    await expect(runCli([], { ...ENV, METADATA_EXTRACTOR: 'llm' }, io())).resolves.toBe(1);
    expect(stderr[0]).toBe(
      '[Config] ERROR: [CONFIGURATION_INVALID] Configuration invalid:\n  - METADATA_EXTRACTOR must be "rules" or "ai" (got "llm")'
    );
  });

  it('runs a single file and prints the report', async () => {
    await expect(runCli([], ENV, io())).resolves.toBe(0);

    expect(created.map((c) => c.mode)).toEqual(['single']);
    expect(stdout).toHaveLength(1);
    expect(stdout[0]).toContain('Total Documents Processed: 1');
    expect(parseArtifact(store.text('gs://out/output/metadata/ev9_metadata.csv'))[0]?.model).toBe('EV9');
    expect(stderr).toContain('[Main] Artifact: gs://out/output/metadata/ev9_metadata.csv (fresh, 1 row(s))');
    expect(stderr).toContain('[Main] Processed 1, failed 0');
  });

  it('passes command-line overrides into the settings', async () => {
    await runCli(['--batch', '--extractor', 'ai', '--append', 'gs://out/master.csv'], { ...ENV, GEMINI_API_KEY: 'test-key' }, io());

    expect(created).toHaveLength(1);
    expect(created[0]?.mode).toBe('batch');
    expect(created[0]?.settings.metadata.extractor).toBe('ai');
    expect(created[0]?.settings.output.appendTarget).toBe('gs://out/master.csv');
  });

  it('reports failed items but succeeds while anything succeeded', async () => {
    store.put('gs://in/docs/bad.pdf', 'FAIL');

    await expect(runCli(['--batch'], { ...ENV, GCS_INPUT_PATH: 'gs://in/docs/' }, io())).resolves.toBe(0);

    expect(stderr).toContain('[Main] Processed 2, failed 1');
    expect(stderr).toContain(
      '[Main] WARNING: Failed: gs://in/docs/bad.pdf [EXTRACTION_FAILED] Extraction failed for gs://in/docs/bad.pdf'
    );
    expect(stderr).toContain(
      '[Audit] item_failed gs://in/docs/bad.pdf category=EXTRACTION_FAILED: Extraction failed for gs://in/docs/bad.pdf'
    );
  });

  it('exits 1 when every item fails', async () => {
    store.put('gs://in/fail/a.pdf', 'FAIL').put('gs://in/fail/b.pdf', 'FAIL');

    await expect(runCli(['--batch'], { ...ENV, GCS_INPUT_PATH: 'gs://in/fail/' }, io())).resolves.toBe(1);

    expect(stderr).toContain('[Main] ERROR: [BATCH_FAILED] All 2 item(s) failed');
    expect(stderr).toContain('[Main] ERROR: Hint: Every item failed; see the [Audit] lines for each cause');
    expect(stdout).toEqual([]);
  });

  it('runs video mode', async () => {
    const env = { GCP_PROJECT_ID: 'test-project', GCS_OUTPUT_BUCKET: 'out', YOUTUBE_API_KEY: 'test-key' };

    await expect(
      runCli(['--video', 'https://youtu.be/abcDEF12345', '--save-transcript', 'gs://out/t.txt'], env, io())
    ).resolves.toBe(0);

    expect(video.urls).toEqual(['https://youtu.be/abcDEF12345']);
    expect(store.has('gs://out/t.txt')).toBe(true);
    expect(store.has('gs://out/output/metadata/video_abcDEF12345_metadata.csv')).toBe(true);
  });
});
