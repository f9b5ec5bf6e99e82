/**
 * @file ConcisePageParser.ts
 * @module scraper/ConcisePageParser
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Parses a field's concise documentation page into a field record.
 */

import * as cheerio from 'cheerio';
import type { FieldRecord, IndicatorSpec, Repeatability, SubfieldRecord } from '../dataset/types.js';
import { ParseFailedError, errorMessage } from '../errors.js';
import type { FieldListing } from './types.js';

/**
 * `$a - Title (NR)`
 */
const SUBFIELD_PATTERN = /\$([a-z0-9])\s*[-–]\s*([^()]+?)\s*\((R|NR)\)/i;

/**
 * `0 - No added entry`, `1-9 - Number of nonfiling characters`, `# - Undefined`
 */
const INDICATOR_VALUE_PATTERN = /^(\S+)\s+[-–]\s+(.+)$/;

/**
 * Collapse runs of whitespace and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Parses concise field pages.
 *
 * Reads the page sections by class:
 * - `div.definition p` - field description
 * - `div.indicators dt/dd` - indicator names and values
 * - `div.subfields dt/dd` - subfield codes, labels and extended notes
 * - `table.examples tr` - examples (cells after the tag cell)
 *
 * When no structured subfields are present, subfields are read from the
 * page text instead.
 *
 * @example
 * ```typescript
 * const parser = new ConcisePageParser();
 * const record = parser.parse(html, { code: '245', title: 'Title Statement', repeatability: 'NR' });
 * console.log(record.indicators, Object.keys(record.subfields));
 * ```
 */
export class ConcisePageParser {
  /**
   * Parse a concise page.
   *
   * @param html - Page HTML
   * @param listing - Field as listed on its range index page
   * @returns Verbose-tier field record
   * @throws ParseFailedError if the page has none of the expected sections
   */
  parse(html: string, listing: FieldListing): FieldRecord {
    let $: cheerio.CheerioAPI;
    try {
      $ = cheerio.load(html);
    } catch (error) {
      throw new ParseFailedError(listing.code, errorMessage(error));
    }

    const description = this.extractDescription($);
    const indicators = this.extractIndicators($);
    let subfields = this.extractSubfields($);
    const examples = this.extractExamples($);

    if (Object.keys(subfields).length === 0) {
      subfields = this.extractSubfieldsFromText($);
    }

    if (
      !description &&
      indicators.length === 0 &&
      Object.keys(subfields).length === 0 &&
      examples.length === 0
    ) {
      throw new ParseFailedError(listing.code, 'no definition, indicators, subfields or examples found');
    }

    return {
      code: listing.code,
      title: listing.title,
      repeatability: listing.repeatability,
      description,
      indicators,
      subfields,
      examples,
    };
  }

  /**
   * Extract the field definition paragraph.
   */
  private extractDescription($: cheerio.CheerioAPI): string {
    const paragraph = $('div.definition p').first();
    return paragraph.length ? collapseWhitespace(paragraph.text()) : '';
  }

  /**
   * Extract indicators. Each `dt` names an indicator; the `dd` elements up
   * to the next `dt` list its values.
   */
  private extractIndicators($: cheerio.CheerioAPI): IndicatorSpec[] {
    const indicators: IndicatorSpec[] = [];

    $('div.indicators dt').each((index, dt) => {
      const name = collapseWhitespace($(dt).text());
      const values: Record<string, string> = {};

      $(dt)
        .nextUntil('dt', 'dd')
        .each((_, dd) => {
          const match = collapseWhitespace($(dd).text()).match(INDICATOR_VALUE_PATTERN);
          if (match) {
            values[match[1]] = match[2];
          }
        });

      if (Object.keys(values).length === 0) {
        return;
      }

      indicators.push({
        position: indicatorPosition(name, index),
        label: indicatorLabel(name),
        values,
      });
    });

    return indicators;
  }

  /**
   * Extract subfields from `div.subfields`. The extended note is the text of
   * the `dd` elements following each `dt`.
   */
  private extractSubfields($: cheerio.CheerioAPI): Record<string, SubfieldRecord> {
    const subfields: Record<string, SubfieldRecord> = {};

    $('div.subfields dt').each((_, dt) => {
      const match = collapseWhitespace($(dt).text()).match(SUBFIELD_PATTERN);
      if (!match) return;

      const code = match[1].toLowerCase();
      if (subfields[code]) return;

      const extended = $(dt)
        .nextUntil('dt', 'dd')
        .map((__, dd) => collapseWhitespace($(dd).text()))
        .get()
        .filter(text => text.length > 0)
        .join(' ');

      subfields[code] = {
        code,
        label: match[2].trim(),
        repeatability: toRepeatability(match[3]),
        description: extended,
      };
    });

    return subfields;
  }

  /**
   * Fallback: find `$x - Label (R)` patterns anywhere in the page text.
   */
  private extractSubfieldsFromText($: cheerio.CheerioAPI): Record<string, SubfieldRecord> {
    const subfields: Record<string, SubfieldRecord> = {};
    const text = collapseWhitespace($('body').text());
    const pattern = new RegExp(SUBFIELD_PATTERN.source, 'gi');

    for (const match of text.matchAll(pattern)) {
      const code = match[1].toLowerCase();
      const label = match[2].trim();
      // Short labels are usually stray matches
      if (label.length < 3 || subfields[code]) continue;

      subfields[code] = {
        code,
        label,
        repeatability: toRepeatability(match[3]),
        description: '',
      };
    }

    return subfields;
  }

  /**
   * Extract examples from the examples table. The first cell of each row
   * holds the tag and is skipped.
   */
  private extractExamples($: cheerio.CheerioAPI): string[] {
    const examples: string[] = [];

    $('table.examples tr').each((_, tr) => {
      const cells = $(tr).find('td');
      if (cells.length < 2) return;

      const example = collapseWhitespace(
        cells
          .slice(1)
          .map((__, td) => $(td).text().trim())
          .get()
          .join(' ')
      );
      if (example) {
        examples.push(example);
      }
    });

    return examples;
  }
}

/**
 * Position of an indicator from its name ("First - ...", "Second - ..."),
 * falling back to its order on the page.
 */
function indicatorPosition(name: string, index: number): 1 | 2 {
  if (/^first\b/i.test(name)) return 1;
  if (/^second\b/i.test(name)) return 2;
  return index === 0 ? 1 : 2;
}

/**
 * Indicator label without its position prefix.
 */
function indicatorLabel(name: string): string {
  const match = name.match(/^\S+\s*[-–]\s*(.+)$/);
  return match ? match[1].trim() : name;
}

function toRepeatability(value: string): Repeatability {
  return value.toUpperCase() === 'R' ? 'R' : 'NR';
}
