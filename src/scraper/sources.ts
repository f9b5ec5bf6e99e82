/**
 * @file sources.ts
 * @module scraper/sources
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Library of Congress page locations and the field definitions
 * that cannot be scraped from them.
 */

import type { FieldRecord } from '../dataset/types.js';
import type { FieldListing } from './types.js';

/**
 * Root of the MARC 21 bibliographic documentation.
 */
export const BASE_URL = 'https://www.loc.gov/marc/bibliographic/';

/**
 * Field range index pages, in tag order.
 *
 * The linking entry page (bd76x78x.html) groups its fields and is covered by
 * LINKING_ENTRY_FIELDS instead.
 */
export const FIELD_RANGE_PAGES = [
    'bd00x.html', // Control fields (001-008)
    'bd01x09x.html', // Numbers and code fields (010-088)
    'bd1xx.html', // Main entry fields
    'bd20x24x.html', // Title and title-related fields (210-247)
    'bd25x28x.html', // Edition, imprint, etc. (250-270)
    'bd3xx.html', // Physical description, etc. (300-388)
    'bd4xx.html', // Series statement fields (400-490)
    'bd5xx.html', // Note fields (500-588)
    'bd6xx.html', // Subject access fields (600-688)
    'bd70x75x.html', // Added entry fields (700-758)
    'bd80x83x.html', // Series added entry fields (800-830)
    'bd84188x.html', // Holdings, location, etc. (841-887)
];

/**
 * Linking entry fields (760-788).
 */
export const LINKING_ENTRY_FIELDS: FieldListing[] = [
    { code: '760', title: 'Main Series Entry', repeatability: 'R' },
    { code: '762', title: 'Subseries Entry', repeatability: 'R' },
    { code: '765', title: 'Original Language Entry', repeatability: 'R' },
    { code: '767', title: 'Translation Entry', repeatability: 'R' },
    { code: '770', title: 'Supplement/Special Issue Entry', repeatability: 'R' },
    { code: '772', title: 'Supplement Parent Entry', repeatability: 'R' },
    { code: '773', title: 'Host Item Entry', repeatability: 'R' },
    { code: '774', title: 'Constituent Unit Entry', repeatability: 'R' },
    { code: '775', title: 'Other Edition Entry', repeatability: 'R' },
    { code: '776', title: 'Additional Physical Form Entry', repeatability: 'R' },
    { code: '777', title: 'Issued With Entry', repeatability: 'R' },
    { code: '780', title: 'Preceding Entry', repeatability: 'R' },
    { code: '785', title: 'Succeeding Entry', repeatability: 'R' },
    { code: '786', title: 'Data Source Entry', repeatability: 'R' },
    { code: '787', title: 'Other Relationship Entry', repeatability: 'R' },
    { code: '788', title: 'Parallel Description in Another Language of Cataloging', repeatability: 'R' },
];

/**
 * Titles replaced after scraping so that common keywords find them.
 */
export const TITLE_OVERRIDES: Record<string, string> = {
    '020': 'International Standard Book Number (ISBN)',
};

const CONTROL_SUBFIELD_NOTE = 'See description of this subfield in Appendix A: Control Subfields.';

/**
 * Field 222's concise page uses a layout the page parser does not read.
 */
export const KEY_TITLE_FIELD: FieldRecord = {
    code: '222',
    title: 'Key Title',
    repeatability: 'R',
    description:
        'Unique title for a continuing resource that is assigned in conjunction with an ISSN ' +
        'recorded in field 022 by national centers under the auspices of the ISSN Network.',
    indicators: [
        { position: 1, label: 'Undefined', values: { '#': 'Undefined' } },
        {
            position: 2,
            label: 'Nonfiling characters',
            values: { '0': 'No nonfiling characters', '1-9': 'Number of nonfiling characters' },
        },
    ],
    subfields: {
        a: { code: 'a', label: 'Key title', repeatability: 'NR', description: '' },
        b: {
            code: 'b',
            label: 'Qualifying information',
            repeatability: 'NR',
            description: 'Parenthetical information that qualifies the title to make it unique.',
        },
        '6': { code: '6', label: 'Linkage', repeatability: 'NR', description: CONTROL_SUBFIELD_NOTE },
        '8': {
            code: '8',
            label: 'Field link and sequence number',
            repeatability: 'R',
            description: CONTROL_SUBFIELD_NOTE,
        },
    },
    examples: [
        '#0$aViva$b(New York)',
        '#0$aCauses of death',
        '#4$aDer Öffentliche Dienst$b(Köln)',
        '#0$aJournal of polymer science. Part B. Polymer letters',
        '#0$aEconomic education bulletin$b(Great Barrington)',
    ],
};

/**
 * Fields written from the definitions above instead of being fetched.
 */
export const MANUAL_FIELDS: FieldRecord[] = [KEY_TITLE_FIELD];

/**
 * URL of a field range index page.
 */
export function rangePageUrl(page: string): string {
    return new URL(page, BASE_URL).toString();
}

/**
 * URL of a field's concise documentation page.
 */
export function concisePageUrl(code: string): string {
    return new URL(`concise/bd${code}.html`, BASE_URL).toString();
}
