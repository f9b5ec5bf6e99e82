/**
 * @file FieldScraper.ts
 * @module scraper/FieldScraper
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Scrapes MARC 21 field definitions from the Library of
 * Congress documentation into field records.
 */

import type { FieldRecord } from '../dataset/types.js';
import { FetchFailedError, ParseFailedError, errorMessage } from '../errors.js';
import { ConcisePageParser } from './ConcisePageParser.js';
import { parseIndexPage } from './IndexPageParser.js';
import { HttpStatusError, type PageFetcher } from './PageFetcher.js';
import {
  FIELD_RANGE_PAGES,
  LINKING_ENTRY_FIELDS,
  MANUAL_FIELDS,
  TITLE_OVERRIDES,
  concisePageUrl,
  rangePageUrl,
} from './sources.js';
import type {
  FieldListing,
  ScrapedFields,
  ScrapeFailure,
  ScrapeResult,
  ScraperOptions,
} from './types.js';

const DEFAULT_CONCURRENCY = 4;

/**
 * Builds field records from the range index pages and concise field pages.
 *
 * A page that cannot be fetched or parsed is logged and skipped; the scrape
 * finishes with whatever succeeded. Records are only collected in memory;
 * writing them is left to DatasetWriter.
 *
 * @example
 * ```typescript
 * const scraper = new FieldScraper(new HttpPageFetcher(), { concurrency: 4 });
 * const result = await scraper.scrape();
 * new DatasetWriter('./data').write(result.records.values());
 * ```
 */
export class FieldScraper {
  private fetcher: PageFetcher;
  private options: ScraperOptions;
  private parser: ConcisePageParser;

  constructor(fetcher: PageFetcher, options: ScraperOptions = {}) {
    this.fetcher = fetcher;
    this.options = options;
    this.parser = new ConcisePageParser();
  }

  /**
   * Run a full scrape.
   *
   * @returns Records and statistics
   */
  async scrape(): Promise<ScrapeResult> {
    const startTime = Date.now();
    const failures: ScrapeFailure[] = [];

    const listings = await this.collectListings(failures);
    const { records, titleOnly } = await this.scrapeFields(listings, failures);
    const scraped = records.size - titleOnly.length;

    for (const field of MANUAL_FIELDS) {
      records.set(field.code, field);
      this.logAdded(field);
    }

    const processed = listings.length + MANUAL_FIELDS.length;
    const fieldFailures = failures.filter(failure => /^\d{3}$/.test(failure.code)).length;

    return {
      records,
      processed,
      successful: records.size,
      scraped,
      titleOnly: titleOnly.length,
      failed: fieldFailures,
      failures,
      elapsedMs: Date.now() - startTime,
    };
  }

  /**
   * Read every range index page and list the fields to fetch.
   *
   * Duplicates and manually defined fields are dropped; linking entry fields
   * are appended.
   *
   * @param failures - Receives index pages that could not be read
   */
  async collectListings(failures: ScrapeFailure[] = []): Promise<FieldListing[]> {
    const listings: FieldListing[] = [];
    const seen = new Set<string>(MANUAL_FIELDS.map(field => field.code));

    const add = (listing: FieldListing): void => {
      if (seen.has(listing.code)) return;
      seen.add(listing.code);
      listings.push(listing);
    };

    for (const page of this.options.rangePages ?? FIELD_RANGE_PAGES) {
      const url = rangePageUrl(page);
      try {
        const found = parseIndexPage(await this.fetcher.fetchPage(url));
        if (this.options.verbose) {
          console.log(`${page}: found ${found.length} fields`);
        }
        found.forEach(add);
      } catch (error) {
        this.recordFailure(failures, {
          kind: 'FetchFailed',
          code: page,
          message: new FetchFailedError(page, url, errorMessage(error)).message,
        });
      }
    }

    LINKING_ENTRY_FIELDS.forEach(add);
    return listings;
  }

  /**
   * Fetch and parse concise pages through a bounded worker pool.
   *
   * @param listings - Fields to fetch
   * @param failures - Receives fields that were skipped
   * @returns Records of the fields that succeeded, and the codes kept with
   * their listed title only
   */
  async scrapeFields(
    listings: FieldListing[],
    failures: ScrapeFailure[] = []
  ): Promise<ScrapedFields> {
    const records = new Map<string, FieldRecord>();
    const titleOnly: string[] = [];
    const queue = [...listings];
    const total = listings.length;
    let completed = 0;

    const worker = async (): Promise<void> => {
      while (queue.length > 0) {
        const listing = queue.shift();
        if (!listing) break;

        const outcome = await this.scrapeField(listing, failures);
        if (outcome) {
          records.set(outcome.record.code, outcome.record);
          if (outcome.titleOnly) {
            titleOnly.push(outcome.record.code);
          }
          this.logAdded(outcome.record);
        }

        completed++;
        this.options.onProgress?.(completed, total, listing.code);
      }
    };

    const concurrency = Math.max(1, this.options.concurrency ?? DEFAULT_CONCURRENCY);
    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(concurrency, queue.length); i++) {
      workers.push(worker());
    }
    await Promise.all(workers);

    return { records, titleOnly };
  }

  /**
   * Build the record for one field.
   *
   * A missing concise page (404) keeps the field with its listed title only,
   * which is the case for several control fields.
   *
   * @returns The record, or null if the field was skipped
   */
  private async scrapeField(
    listing: FieldListing,
    failures: ScrapeFailure[]
  ): Promise<{ record: FieldRecord; titleOnly: boolean } | null> {
    const titled: FieldListing = {
      ...listing,
      title: TITLE_OVERRIDES[listing.code] ?? listing.title,
    };
    const url = concisePageUrl(listing.code);

    let html: string;
    try {
      html = await this.fetcher.fetchPage(url);
    } catch (error) {
      if (error instanceof HttpStatusError && error.status === 404) {
        if (this.options.verbose) {
          console.log(`  No concise page for field ${listing.code}; keeping title only`);
        }
        return {
          record: {
            code: titled.code,
            title: titled.title,
            repeatability: titled.repeatability,
            description: '',
            indicators: [],
            subfields: {},
            examples: [],
          },
          titleOnly: true,
        };
      }

      this.recordFailure(failures, {
        kind: 'FetchFailed',
        code: listing.code,
        message: new FetchFailedError(listing.code, url, errorMessage(error)).message,
      });
      return null;
    }

    try {
      return { record: this.parser.parse(html, titled), titleOnly: false };
    } catch (error) {
      const message =
        error instanceof ParseFailedError
          ? error.message
          : new ParseFailedError(listing.code, errorMessage(error)).message;
      this.recordFailure(failures, { kind: 'ParseFailed', code: listing.code, message });
      return null;
    }
  }

  private recordFailure(failures: ScrapeFailure[], failure: ScrapeFailure): void {
    failures.push(failure);
    console.error(`  -> ${failure.kind}: ${failure.message}`);
  }

  private logAdded(field: FieldRecord): void {
    if (this.options.verbose) {
      const subfieldCount = Object.keys(field.subfields).length;
      console.log(`  Added: ${field.code} - ${field.title} (${subfieldCount} subfields)`);
    }
  }
}
