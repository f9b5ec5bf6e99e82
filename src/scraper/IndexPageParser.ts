/**
 * @file IndexPageParser.ts
 * @module scraper/IndexPageParser
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Extracts field listings from a field range index page.
 */

import * as cheerio from 'cheerio';
import type { Repeatability } from '../dataset/types.js';
import type { FieldListing } from './types.js';

/**
 * `020 - International Standard Book Number (R)`
 */
const LISTING_PATTERN = /(\d{3})\s*[-–]\s*([^()]+?)\s*\((R|NR)\)/g;

/**
 * Extract the fields listed on a range index page.
 *
 * Obsolete fields are skipped, and only the first listing of each code is kept.
 *
 * @param html - Index page HTML
 * @returns Listings in page order
 */
export function parseIndexPage(html: string): FieldListing[] {
    const $ = cheerio.load(html);
    $('script, style, nav, header, footer').remove();

    const text = $('body').text().replace(/\s+/g, ' ');
    const listings: FieldListing[] = [];
    const seen = new Set<string>();

    for (const match of text.matchAll(LISTING_PATTERN)) {
        const [, code, rawTitle, repeatability] = match;
        const title = rawTitle.trim();

        if (/obsolete/i.test(title) || seen.has(code)) {
            continue;
        }
        seen.add(code);
        listings.push({ code, title, repeatability: toRepeatability(repeatability) });
    }

    return listings;
}

function toRepeatability(value: string): Repeatability {
    return value === 'R' ? 'R' : 'NR';
}
