/**
 * @file DatasetWriter.test.ts
 * @module tests/unit/scraper/DatasetWriter
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Unit tests for writing both dataset tiers.
 */

import { existsSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { DatasetLoader } from '../../../src/dataset/DatasetLoader.js';
import type { FieldRecord } from '../../../src/dataset/types.js';
import { DatasetWriter } from '../../../src/scraper/DatasetWriter.js';
import { KEY_TITLE_FIELD } from '../../../src/scraper/sources.js';
import { makeTempDir } from '../../setup.js';

const CONTROL_NUMBER: FieldRecord = {
  code: '001',
  title: 'Control Number',
  repeatability: 'NR',
  description: 'Control number assigned by the organization creating the record.',
  indicators: [],
  subfields: {},
  examples: ['001 sample-0001'],
};

describe('DatasetWriter', () => {
  let testOutputDir: string;

  beforeEach(() => {
    testOutputDir = makeTempDir();
  });

  afterEach(() => {
    if (existsSync(testOutputDir)) {
      rmSync(testOutputDir, { recursive: true, force: true });
    }
  });

  it('should write both tiers', () => {
    const writer = new DatasetWriter(testOutputDir);

    const summary = writer.write([KEY_TITLE_FIELD, CONTROL_NUMBER]);

    expect(summary.fieldCount).toBe(2);
    expect(summary.backupPath).toBeUndefined();
    expect(existsSync(summary.basicPath)).toBe(true);
    expect(existsSync(summary.verbosePath)).toBe(true);
    expect(summary.bytesWritten).toBe(
      Buffer.byteLength(readFileSync(summary.basicPath, 'utf-8')) +
        Buffer.byteLength(readFileSync(summary.verbosePath, 'utf-8'))
    );
  });

  it('should create the output directory', () => {
    const nested = join(testOutputDir, 'nested', 'data');

    new DatasetWriter(nested).write([CONTROL_NUMBER]);

    expect(existsSync(join(nested, 'marc.json'))).toBe(true);
  });

  it('should leave no temporary files behind', () => {
    new DatasetWriter(testOutputDir).write([CONTROL_NUMBER]);

    expect(readdirSync(testOutputDir).sort()).toEqual(['marc-verbose.json', 'marc.json']);
  });

  it('should write files the loader reads back', () => {
    new DatasetWriter(testOutputDir).write([KEY_TITLE_FIELD, CONTROL_NUMBER]);
    const loader = new DatasetLoader(testOutputDir);

    expect(loader.loadTier('verbose').fields.get('222')).toEqual(KEY_TITLE_FIELD);
    expect([...loader.loadTier('basic').fields.keys()]).toEqual(['001', '222']);
  });

  it('should strip verbose-only details from the basic tier', () => {
    const summary = new DatasetWriter(testOutputDir).write([KEY_TITLE_FIELD]);
    const basic = JSON.parse(readFileSync(summary.basicPath, 'utf-8'));

    expect(basic['222'].indicators).toBeUndefined();
    expect(basic['222'].examples).toBeUndefined();
    expect(basic['222'].subfields.b).toEqual({
      label: 'Qualifying information',
      repeatability: 'NR',
      description: '',
    });
  });

  it('should back up the previous verbose file', () => {
    const writer = new DatasetWriter(testOutputDir);
    const previous = '{ "001": { "title": "Previous" } }\n';
    writeFileSync(writer.getPaths().verbose, previous, 'utf-8');

    const summary = writer.write([CONTROL_NUMBER]);

    expect(summary.backupPath).toBe(join(testOutputDir, 'marc-verbose.json.backup'));
    expect(readFileSync(join(testOutputDir, 'marc-verbose.json.backup'), 'utf-8')).toBe(previous);
    expect(readFileSync(summary.verbosePath, 'utf-8')).toContain('"Control Number"');
  });
});
