/**
 * @file types.ts
 * @module scraper/types
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Types for the field scraper.
 */

import type { FieldRecord, Repeatability } from '../dataset/types.js';

/**
 * A field as listed on a range index page.
 */
export interface FieldListing {
  code: string;
  title: string;
  repeatability: Repeatability;
}

/**
 * Why a page or field was skipped.
 */
export interface ScrapeFailure {
  kind: 'FetchFailed' | 'ParseFailed';
  /** Field code, or the range page name for index pages */
  code: string;
  message: string;
}

/**
 * Progress callback, called after each field page is handled.
 */
export type ProgressCallback = (current: number, total: number, code: string) => void;

/**
 * Options for FieldScraper.
 */
export interface ScraperOptions {
  /** Maximum concurrent page requests (default: 4) */
  concurrency?: number;
  /** Log each added field */
  verbose?: boolean;
  /** Range index pages to read (default: FIELD_RANGE_PAGES) */
  rangePages?: string[];
  onProgress?: ProgressCallback;
}

/**
 * Result of a scrape, before anything is written.
 */
export interface ScrapeResult {
  /** Successfully built records, keyed by field code */
  records: Map<string, FieldRecord>;
  /** Fields attempted (listed fields plus manual fields) */
  processed: number;
  successful: number;
  /** Records built from a fetched concise page (excludes title-only and manual fields) */
  scraped: number;
  /** Records kept with their listed title only because the concise page was missing */
  titleOnly: number;
  failed: number;
  failures: ScrapeFailure[];
  elapsedMs: number;
}

/**
 * Fields built by FieldScraper.scrapeFields.
 */
export interface ScrapedFields {
  records: Map<string, FieldRecord>;
  /** Codes of records that carry their listed title only */
  titleOnly: string[];
}
