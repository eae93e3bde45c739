/**
 * Unit tests for the output compiler
 */

import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { PipelineError } from '../../../src/core/errors.js';
import { OutputCompiler, reportLocatorFor } from '../../../src/services/output/compiler.js';
import { metadataToRow, parseArtifact, serializeRows } from '../../../src/services/output/csv.js';
import { captureLogger } from '../../helpers/logger.js';
import { MemoryObjectStore } from '../../helpers/memory-store.js';
import { record } from '../../helpers/records.js';

const ARTIFACT = 'gs://out/metadata/run_metadata.csv';
const REPORT = 'gs://out/metadata/run_metadata_report.txt';
const destination = { bucket: 'out', key: 'metadata/run_metadata.csv' };

const existing = ['X1', 'X2', 'X3'].map((model) => record({ model, type: 'Old' }));
const incoming = [record({ model: 'EV9', xev: 'EV' }), record({ model: 'EV6' })];

describe('OutputCompiler', () => {
  let store: MemoryObjectStore;
  let capture: ReturnType<typeof captureLogger>;
  let compiler: OutputCompiler;

  beforeEach(() => {
    store = new MemoryObjectStore();
    capture = captureLogger('Compiler');
    compiler = new OutputCompiler(store, capture.logger, { now: () => new Date(2025, 5, 1, 12, 0, 0) });
  });

  it('places the report beside the artifact', () => {
    expect(reportLocatorFor(destination)).toEqual({ bucket: 'out', key: 'metadata/run_metadata_report.txt' });
  });

  it('writes a fresh artifact and its report', async () => {
    const result = await compiler.compile({ records: incoming, destination, mode: 'fresh' });

    expect(store.text(ARTIFACT).startsWith('\uFEFFtype,source,')).toBe(true);
    expect(parseArtifact(store.text(ARTIFACT)).map((row) => row.model)).toEqual(['EV9', 'EV6']);
    expect(store.writes).toEqual([
      { uri: ARTIFACT, contentType: 'text/csv; charset=utf-8' },
      { uri: REPORT, contentType: 'text/plain; charset=utf-8' },
    ]);
    expect(store.text(REPORT)).toBe(result.report);
    expect(result).toMatchObject({
      mode: 'fresh',
      existingRowCount: 0,
      newRowCount: 2,
      rowCount: 2,
      reportLocator: { bucket: 'out', key: 'metadata/run_metadata_report.txt' },
      localBackupPath: null,
    });
    expect(capture.lines).toContain(`[Compiler] Wrote 2 row(s) to ${ARTIFACT}`);
  });

  it('appends after the existing rows without de-duplicating', async () => {
    store.put(ARTIFACT, serializeRows(existing.map(metadataToRow)));

    const result = await compiler.compile({ records: [...incoming, existing[0] ?? record()], destination, mode: 'append' });

    expect(parseArtifact(store.text(ARTIFACT)).map((row) => row.model)).toEqual(['X1', 'X2', 'X3', 'EV9', 'EV6', 'X1']);
    expect(result).toMatchObject({ mode: 'append', existingRowCount: 3, newRowCount: 3, rowCount: 6 });
    expect(result.report).toContain('Total Documents Processed: 6');
    expect(capture.lines).toContain(`[Compiler] Appended 3 row(s) to 3 existing in ${ARTIFACT}`);
  });

  it('warns about existing columns outside the metadata layout', async () => {
    store.put(ARTIFACT, '\uFEFFmodel,reviewer,type\nX1,lee,Old\n');

    const result = await compiler.compile({ records: incoming, destination, mode: 'append' });

    expect(result.existingRowCount).toBe(1);
    expect(capture.lines).toContain(
      `[Compiler] WARNING: Dropping column(s) not in the metadata layout from ${ARTIFACT}: reviewer`
    );
  });

  it('keeps existing rows byte-for-byte in their cells', async () => {
    const odd = { ...metadataToRow(record({ model: 'X1' })), year1: 'MY24', content_summary: 'a, "b"' };
    store.put(ARTIFACT, serializeRows([odd]));

    await compiler.compile({ records: incoming, destination, mode: 'append' });

    expect(parseArtifact(store.text(ARTIFACT))[0]).toEqual(odd);
  });

  it('writes fresh when appending to a missing artifact', async () => {
    const result = await compiler.compile({ records: incoming, destination, mode: 'append' });

    expect(result.mode).toBe('fresh');
    expect(result.rowCount).toBe(2);
    expect(capture.lines).toContain(`[Compiler] No artifact at ${ARTIFACT}; creating it`);
  });

  it('fails without writing when the existing artifact cannot be read', async () => {
    store.put(ARTIFACT, serializeRows(existing.map(metadataToRow)));
    store.failOn('read', ARTIFACT, new Error('403 Forbidden'));

    const failure = compiler.compile({ records: incoming, destination, mode: 'append' });

    await expect(failure).rejects.toBeInstanceOf(PipelineError);
    await expect(failure).rejects.toMatchObject({
      category: 'ARTIFACT_WRITE_FAILED',
      message: `Cannot append to ${ARTIFACT}: reading the existing artifact failed: 403 Forbidden`,
    });
    expect(store.writes).toEqual([]);
  });

  it('fails when the artifact write fails', async () => {
    store.failOn('write', ARTIFACT, new Error('bucket is read-only'));

    await expect(compiler.compile({ records: incoming, destination, mode: 'fresh' })).rejects.toMatchObject({
      category: 'ARTIFACT_WRITE_FAILED',
      message: `Writing ${ARTIFACT} failed: bucket is read-only`,
    });
  });

  it('refuses to write an empty artifact', async () => {
    await expect(compiler.compile({ records: [], destination, mode: 'fresh' })).rejects.toMatchObject({
      category: 'ARTIFACT_WRITE_FAILED',
    });
    expect(store.writes).toEqual([]);
  });

  it('only warns when the report cannot be stored', async () => {
    store.failOn('write', REPORT, new Error('quota exceeded'));

    const result = await compiler.compile({ records: incoming, destination, mode: 'fresh' });

    expect(result.reportLocator).toBeNull();
    expect(store.has(ARTIFACT)).toBe(true);
    expect(capture.lines).toContain(`[Compiler] WARNING: Report not saved to ${REPORT}: quota exceeded`);
  });

  describe('local backup', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'docmeta-compiler-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('saves the same bytes locally', async () => {
      const local = new OutputCompiler(store, capture.logger, { localBackupDir: path.join(dir, 'nested') });

      const result = await local.compile({ records: incoming, destination, mode: 'fresh' });

      expect(result.localBackupPath).toBe(path.join(dir, 'nested', 'run_metadata.csv'));
      expect(await readFile(path.join(dir, 'nested', 'run_metadata.csv'), 'utf-8')).toBe(store.text(ARTIFACT));
    });
  });
});
