/**
 * Output Compiler
 *
 * Builds the tabular artifact from a batch of records. In append mode an
 * existing artifact is read, its rows kept first and the new rows added after
 * them, and the whole file written back in one write. No de-duplication.
 * The report describes the artifact as written and is saved beside it.
 *
 * @module services/output/compiler
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';

import { artifactWriteError, describeError } from '../../core/errors.js';
import type { SourceLocator } from '../../models/document.js';
import type { DocumentMetadata } from '../../models/metadata.js';
import type { Logger } from '../../utils/logger.js';
import type { ObjectStore } from '../storage/object-store.js';
import { baseName, fileStem, formatGcsUri, siblingLocator } from '../storage/locator.js';
import { CSV_CONTENT_TYPE, inspectArtifact, metadataToRow, serializeRows, type CsvRow } from './csv.js';
import { generateReport } from './report.js';

export type CompileMode = 'fresh' | 'append';

export interface CompileRequest {
  records: readonly DocumentMetadata[];
  destination: SourceLocator;
  mode: CompileMode;
}

export interface CompileResult {
  artifact: SourceLocator;
  /** null when the report could not be stored */
  reportLocator: SourceLocator | null;
  /** What actually happened: append on a missing artifact writes fresh */
  mode: CompileMode;
  existingRowCount: number;
  newRowCount: number;
  rowCount: number;
  report: string;
  localBackupPath: string | null;
}

export interface OutputCompilerOptions {
  /** Also save the CSV bytes here */
  localBackupDir?: string | null;
  now?: () => Date;
}

export const REPORT_CONTENT_TYPE = 'text/plain; charset=utf-8';

export function reportLocatorFor(artifact: SourceLocator): SourceLocator {
  return siblingLocator(artifact, `${fileStem(artifact.key)}_report.txt`);
}

export class OutputCompiler {
  private readonly now: () => Date;

  constructor(
    private readonly store: ObjectStore,
    private readonly logger: Logger,
    private readonly options: OutputCompilerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async compile(request: CompileRequest): Promise<CompileResult> {
    const uri = formatGcsUri(request.destination);
    if (request.records.length === 0) {
      throw artifactWriteError(`No records to write to ${uri}`, { uri });
    }

    const newRows = request.records.map(metadataToRow);
    const existingRows = request.mode === 'append' ? await this.loadExisting(request.destination) : null;
    const mode: CompileMode = existingRows === null ? 'fresh' : 'append';
    const rows: CsvRow[] = [...(existingRows ?? []), ...newRows];

    const content = serializeRows(rows);
    try {
      await this.store.write(request.destination, content, CSV_CONTENT_TYPE);
    } catch (error) {
      throw artifactWriteError(`Writing ${uri} failed: ${describeError(error)}`, { uri, rowCount: rows.length }, error);
    }
    this.logger.info(
      mode === 'append'
        ? `Appended ${newRows.length} row(s) to ${existingRows?.length ?? 0} existing in ${uri}`
        : `Wrote ${rows.length} row(s) to ${uri}`
    );

    const report = generateReport(rows, this.now());
    const reportLocator = await this.writeReport(request.destination, report);
    const localBackupPath = await this.writeLocalBackup(request.destination, content);

    return {
      artifact: request.destination,
      reportLocator,
      mode,
      existingRowCount: existingRows?.length ?? 0,
      newRowCount: newRows.length,
      rowCount: rows.length,
      report,
      localBackupPath,
    };
  }

  /**
   * Rows of the artifact at the destination, or null when there is none
   */
  private async loadExisting(destination: SourceLocator): Promise<CsvRow[] | null> {
    const uri = formatGcsUri(destination);
    try {
      if (!(await this.store.exists(destination))) {
        this.logger.info(`No artifact at ${uri}; creating it`);
        return null;
      }
      const { rows, droppedColumns } = inspectArtifact(await this.store.read(destination));
      if (droppedColumns.length > 0) {
        this.logger.warn(`Dropping column(s) not in the metadata layout from ${uri}: ${droppedColumns.join(', ')}`);
      }
      this.logger.debug(`Loaded ${rows.length} existing row(s) from ${uri}`);
      return rows;
    } catch (error) {
      throw artifactWriteError(
        `Cannot append to ${uri}: reading the existing artifact failed: ${describeError(error)}`,
        { uri, step: 'read-existing' },
        error
      );
    }
  }

  private async writeReport(artifact: SourceLocator, report: string): Promise<SourceLocator | null> {
    const locator = reportLocatorFor(artifact);
    try {
      await this.store.write(locator, report, REPORT_CONTENT_TYPE);
      return locator;
    } catch (error) {
      this.logger.warn(`Report not saved to ${formatGcsUri(locator)}: ${describeError(error)}`);
      return null;
    }
  }

  private async writeLocalBackup(artifact: SourceLocator, content: string): Promise<string | null> {
    const dir = this.options.localBackupDir;
    if (!dir) return null;
    const target = path.join(dir, baseName(artifact.key));
    try {
      await mkdir(dir, { recursive: true });
      await writeFile(target, content, 'utf-8');
      this.logger.info(`Local backup saved to ${target}`);
      return target;
    } catch (error) {
      this.logger.warn(`Local backup to ${target} failed: ${describeError(error)}`);
      return null;
    }
  }
}
