/**
 * @file DatasetLoader.test.ts
 * @module tests/unit/dataset/DatasetLoader
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Unit tests for dataset loading and verbose fallback.
 */

import { copyFileSync, existsSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { DatasetLoader } from '../../../src/dataset/DatasetLoader.js';
import { DatasetUnavailableError, VerboseUnavailableError } from '../../../src/errors.js';
import { DATA_FIXTURE_DIR, makeTempDir } from '../../setup.js';

describe('DatasetLoader', () => {
  let testDataDir: string;

  beforeEach(() => {
    testDataDir = makeTempDir();
  });

  afterEach(() => {
    if (existsSync(testDataDir)) {
      rmSync(testDataDir, { recursive: true, force: true });
    }
  });

  function copyFixture(name: string): void {
    copyFileSync(join(DATA_FIXTURE_DIR, name), join(testDataDir, name));
  }

  describe('getPaths', () => {
    it('should name both tiers and the backup', () => {
      const loader = new DatasetLoader('/data');

      expect(loader.getPaths()).toEqual({
        basic: join('/data', 'marc.json'),
        verbose: join('/data', 'marc-verbose.json'),
        verboseBackup: join('/data', 'marc-verbose.json.backup'),
      });
    });
  });

  describe('loadTier', () => {
    it('should load the basic tier', () => {
      const dataset = new DatasetLoader(DATA_FIXTURE_DIR).loadTier('basic');

      expect(dataset.tier).toBe('basic');
      expect(dataset.fields.size).toBe(4);
    });

    it('should load the verbose tier', () => {
      const dataset = new DatasetLoader(DATA_FIXTURE_DIR).loadTier('verbose');

      expect(dataset.tier).toBe('verbose');
      expect(dataset.fields.get('245')?.examples).toHaveLength(2);
    });

    it('should report a missing file', () => {
      const loader = new DatasetLoader(testDataDir);

      expect(() => loader.loadTier('basic')).toThrow(DatasetUnavailableError);
      expect(() => loader.loadTier('basic')).toThrow(
        `Dataset unavailable at ${join(testDataDir, 'marc.json')}: file not found`
      );
    });

    it('should report invalid JSON', () => {
      writeFileSync(join(testDataDir, 'marc.json'), '{ "245": ', 'utf-8');

      expect(() => new DatasetLoader(testDataDir).loadTier('basic')).toThrow(DatasetUnavailableError);
    });

    it('should report a file with the wrong shape', () => {
      writeFileSync(join(testDataDir, 'marc.json'), '["245"]', 'utf-8');

      expect(() => new DatasetLoader(testDataDir).loadTier('basic')).toThrow(
        `Dataset unavailable at ${join(testDataDir, 'marc.json')}: dataset must be a JSON object`
      );
    });
  });

  describe('load', () => {
    it('should use the basic tier without verbose', () => {
      const { dataset, warning } = new DatasetLoader(DATA_FIXTURE_DIR).load(false);

      expect(dataset.tier).toBe('basic');
      expect(warning).toBeUndefined();
    });

    it('should use the verbose tier with verbose', () => {
      const { dataset, warning } = new DatasetLoader(DATA_FIXTURE_DIR).load(true);

      expect(dataset.tier).toBe('verbose');
      expect(warning).toBeUndefined();
    });

    it('should fall back to basic with a warning when the verbose file is missing', () => {
      copyFixture('marc.json');

      const { dataset, warning } = new DatasetLoader(testDataDir).load(true);

      expect(dataset.tier).toBe('basic');
      expect(warning).toBeInstanceOf(VerboseUnavailableError);
      expect(warning?.message).toBe('Verbose dataset unavailable (file not found); showing basic information');
      expect(warning?.exitCode).toBe(0);
    });

    it('should fall back to basic when the verbose file is malformed', () => {
      copyFixture('marc.json');
      writeFileSync(join(testDataDir, 'marc-verbose.json'), 'not json', 'utf-8');

      const { dataset, warning } = new DatasetLoader(testDataDir).load(true);

      expect(dataset.tier).toBe('basic');
      expect(warning?.source).toBeInstanceOf(DatasetUnavailableError);
    });

    it('should fail when the basic tier is needed and missing', () => {
      copyFixture('marc-verbose.json');
      const loader = new DatasetLoader(testDataDir);

      expect(() => loader.load(false)).toThrow(DatasetUnavailableError);
    });

    it('should fail when neither tier can be loaded', () => {
      expect(() => new DatasetLoader(testDataDir).load(true)).toThrow(DatasetUnavailableError);
    });
  });
});
