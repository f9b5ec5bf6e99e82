/**
 * @file DatasetWriter.ts
 * @module scraper/DatasetWriter
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Writes the basic and verbose dataset files, backing up the
 * previous verbose file first.
 */

import { copyFileSync, existsSync, mkdirSync, renameSync, writeFileSync } from 'node:fs';
import { datasetPaths, type DatasetPaths } from '../config.js';
import { serializeDataset } from '../dataset/codec.js';
import type { FieldRecord } from '../dataset/types.js';

/**
 * Outcome of a write.
 */
export interface WriteSummary {
  basicPath: string;
  verbosePath: string;
  /** Set when a previous verbose file was backed up */
  backupPath?: string;
  fieldCount: number;
  bytesWritten: number;
}

/**
 * Writes complete replacements of both dataset files.
 *
 * Each file is written to a temporary sibling and renamed into place, so a
 * failed run never leaves a truncated dataset behind.
 *
 * @example
 * ```typescript
 * const writer = new DatasetWriter('./data');
 * const summary = writer.write(records.values());
 * console.log(`Wrote ${summary.fieldCount} fields`);
 * ```
 */
export class DatasetWriter {
  private paths: DatasetPaths;
  private outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
    this.paths = datasetPaths(outputDir);
  }

  /**
   * Get the paths this writer produces.
   */
  getPaths(): DatasetPaths {
    return { ...this.paths };
  }

  /**
   * Back up the existing verbose file, then write both tiers.
   *
   * @param records - Every field of the new dataset
   * @returns Paths and sizes of what was written
   */
  write(records: Iterable<FieldRecord>): WriteSummary {
    const fields = [...records];

    if (!existsSync(this.outputDir)) {
      mkdirSync(this.outputDir, { recursive: true });
    }

    const backupPath = this.backupVerbose();

    let bytesWritten = this.writeFile(this.paths.verbose, serializeDataset(fields, 'verbose'));
    bytesWritten += this.writeFile(this.paths.basic, serializeDataset(fields, 'basic'));

    return {
      basicPath: this.paths.basic,
      verbosePath: this.paths.verbose,
      backupPath,
      fieldCount: fields.length,
      bytesWritten,
    };
  }

  /**
   * Copy the current verbose file to its backup location.
   * @returns Backup path, or undefined if there was nothing to back up
   */
  private backupVerbose(): string | undefined {
    if (!existsSync(this.paths.verbose)) {
      return undefined;
    }
    copyFileSync(this.paths.verbose, this.paths.verboseBackup);
    return this.paths.verboseBackup;
  }

  private writeFile(filePath: string, content: string): number {
    const tempPath = `${filePath}.tmp`;
    writeFileSync(tempPath, content, 'utf-8');
    renameSync(tempPath, filePath);
    return Buffer.byteLength(content, 'utf-8');
  }
}
