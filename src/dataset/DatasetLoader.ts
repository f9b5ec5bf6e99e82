/**
 * @file DatasetLoader.ts
 * @module dataset/DatasetLoader
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Loads the basic and verbose dataset files from a data directory.
 */

import { existsSync, readFileSync } from 'node:fs';
import { datasetPaths, type DatasetPaths } from '../config.js';
import { DatasetUnavailableError, VerboseUnavailableError, errorMessage } from '../errors.js';
import { decodeDataset } from './codec.js';
import type { Dataset, DatasetTier } from './types.js';

/**
 * Dataset chosen for a query, plus the warning raised when verbose data had
 * to be replaced by basic data.
 */
export interface LoadedDataset {
  dataset: Dataset;
  warning?: VerboseUnavailableError;
}

/**
 * Reads dataset files once per invocation.
 *
 * @example
 * ```typescript
 * const loader = new DatasetLoader('./data');
 * const { dataset, warning } = loader.load(true);
 * if (warning) console.error(`Warning: ${warning.message}`);
 * ```
 */
export class DatasetLoader {
  private paths: DatasetPaths;

  /**
   * @param dataDir - Directory containing marc.json and marc-verbose.json
   */
  constructor(dataDir: string) {
    this.paths = datasetPaths(dataDir);
  }

  /**
   * Get the dataset file paths this loader reads.
   */
  getPaths(): DatasetPaths {
    return { ...this.paths };
  }

  /**
   * Load one tier.
   *
   * @throws DatasetUnavailableError if the file is missing or malformed
   */
  loadTier(tier: DatasetTier): Dataset {
    const filePath = tier === 'verbose' ? this.paths.verbose : this.paths.basic;

    if (!existsSync(filePath)) {
      throw new DatasetUnavailableError(filePath, 'file not found');
    }

    let json: unknown;
    try {
      json = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new DatasetUnavailableError(filePath, errorMessage(error));
    }

    try {
      return { tier, fields: decodeDataset(json, tier) };
    } catch (error) {
      throw new DatasetUnavailableError(filePath, errorMessage(error));
    }
  }

  /**
   * Load the dataset for a query.
   *
   * In verbose mode a missing or malformed verbose file degrades to the basic
   * tier with a warning. The basic tier itself must load.
   *
   * @param verbose - Whether verbose output was requested
   * @throws DatasetUnavailableError if the basic tier is needed and cannot be loaded
   */
  load(verbose: boolean): LoadedDataset {
    if (!verbose) {
      return { dataset: this.loadTier('basic') };
    }

    try {
      return { dataset: this.loadTier('verbose') };
    } catch (error) {
      if (!(error instanceof DatasetUnavailableError)) {
        throw error;
      }
      return {
        dataset: this.loadTier('basic'),
        warning: new VerboseUnavailableError(error),
      };
    }
  }
}
