/**
 * @file config.ts
 * @module config
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Dataset file names and data directory resolution.
 */

import { join, resolve } from 'node:path';

/** Basic-tier dataset file name */
export const BASIC_DATASET_FILE = 'marc.json';

/** Verbose-tier dataset file name */
export const VERBOSE_DATASET_FILE = 'marc-verbose.json';

/** Suffix appended to the verbose dataset when it is backed up */
export const BACKUP_SUFFIX = '.backup';

/** Environment variable overriding the data directory */
export const DATA_DIR_ENV = 'MARC_DATA_DIR';

/**
 * Default data directory: `data/` at the package root.
 * Resolves the same from `src/` (tests, tsx) and `dist/` (built binary).
 */
export function defaultDataDir(): string {
    return resolve(__dirname, '..', 'data');
}

/**
 * Resolve the data directory from an explicit option, then the environment,
 * then the package default.
 *
 * @param customDir - Value of `--data-dir`, if given
 * @param env - Environment to read `MARC_DATA_DIR` from
 */
export function resolveDataDir(customDir?: string, env: NodeJS.ProcessEnv = process.env): string {
    if (customDir) {
        return resolve(customDir);
    }
    const fromEnv = env[DATA_DIR_ENV]?.trim();
    if (fromEnv) {
        return resolve(fromEnv);
    }
    return defaultDataDir();
}

/**
 * Paths of the dataset files inside a data directory.
 */
export interface DatasetPaths {
    basic: string;
    verbose: string;
    verboseBackup: string;
}

export function datasetPaths(dataDir: string): DatasetPaths {
    const verbose = join(dataDir, VERBOSE_DATASET_FILE);
    return {
        basic: join(dataDir, BASIC_DATASET_FILE),
        verbose,
        verboseBackup: `${verbose}${BACKUP_SUFFIX}`,
    };
}
