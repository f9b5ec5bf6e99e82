/**
 * @file scrape-and-lookup.test.ts
 * @module tests/integration/scrape-and-lookup
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Integration test: scrape fixture pages, write the dataset,
 * then query it through the lookup CLI.
 */

import { existsSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { runCli } from '../../src/cli/cli-core.js';
import { DatasetWriter } from '../../src/scraper/DatasetWriter.js';
import { FieldScraper } from '../../src/scraper/FieldScraper.js';
import { HttpStatusError, type PageFetcher } from '../../src/scraper/PageFetcher.js';
import { concisePageUrl, rangePageUrl } from '../../src/scraper/sources.js';
import { captureIO, makeTempDir, readPageFixture } from '../setup.js';

class FixturePageFetcher implements PageFetcher {
  private pages = new Map([
    [rangePageUrl('bd20x24x.html'), readPageFixture('bd20x24x.html')],
    [concisePageUrl('210'), readPageFixture('bd210.html')],
    [concisePageUrl('245'), readPageFixture('bd245.html')],
  ]);

  async fetchPage(url: string): Promise<string> {
    const html = this.pages.get(url);
    if (html === undefined) {
      throw new HttpStatusError(404, url);
    }
    return html;
  }
}

describe('Scrape and lookup', () => {
  let dataDir: string;

  beforeAll(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    dataDir = makeTempDir('marc-integration-');
    const scraper = new FieldScraper(new FixturePageFetcher(), { rangePages: ['bd20x24x.html'] });
    const result = await scraper.scrape();
    new DatasetWriter(dataDir).write(result.records.values());
  });

  afterAll(() => {
    jest.restoreAllMocks();
    if (existsSync(dataDir)) {
      rmSync(dataDir, { recursive: true, force: true });
    }
  });

  function query(...args: string[]) {
    const io = captureIO();
    const code = runCli([...args, '--data-dir', dataDir], io);
    return { code, stdout: io.stdout.join(''), stderr: io.stderr.join('') };
  }

  it('should look up a scraped subfield', () => {
    expect(query('245c')).toEqual({
      code: 0,
      stdout: '245 — Title Statement (NR)\n  245$c — Statement of responsibility, etc. (NR)\n',
      stderr: '',
    });
  });

  it('should show scraped indicators in verbose mode', () => {
    const { code, stdout } = query('-v', '245');

    expect(code).toBe(0);
    expect(stdout.split('\n')).toContain('    1-9 - Number of nonfiling characters');
  });

  it('should include the manually defined key title field', () => {
    expect(query('key', 'title').stdout).toBe(
      'Found 2 matches:\n\n222 — Key Title (R)\n222$a — Key title (NR)\n'
    );
  });

  it('should keep fields without a concise page', () => {
    expect(query('773').stdout).toBe('773 — Host Item Entry (R)\n');
  });

  it('should back up the verbose file when scraping again', async () => {
    const scraper = new FieldScraper(new FixturePageFetcher(), { rangePages: ['bd20x24x.html'] });
    const result = await scraper.scrape();

    const summary = new DatasetWriter(dataDir).write(result.records.values());

    expect(summary.backupPath).toBe(join(dataDir, 'marc-verbose.json.backup'));
    expect(query('245a').code).toBe(0);
  });
});
