/**
 * @file help.ts
 * @module cli/help
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Help text sections appended to the generated commander help.
 */

import { DATA_DIR_ENV } from '../config.js';

/**
 * QUERY SYNTAX section.
 */
export const QUERY_SYNTAX_SECTION = `QUERY SYNTAX
    Queries are case-insensitive.

    Field codes:
        NNN                 Look up a field and list its subfields
                                Example: 020
        NNNx, NNN$x         Look up one subfield of a field
                                Example: 245a or 245$a

    Keywords:
        <word> [words...]   Search field titles, subfield labels and
                            descriptions for the text
                                Example: isbn, "title statement"`;

/**
 * DATA section.
 */
export const DATA_SECTION = `DATA
    Definitions are read from marc.json (basic) and marc-verbose.json
    (verbose) in the data directory: --data-dir, then $${DATA_DIR_ENV},
    then the package's data/ directory. No dataset is installed with the
    package: run marc-scrape (npm run scrape) once to create both files.
    If marc-verbose.json is missing, --verbose falls back to basic output.`;

/**
 * EXIT CODES section.
 */
export const EXIT_CODES_SECTION = `EXIT CODES
    0   Success, including a keyword search with no matches
    1   Empty or invalid query, unknown field or subfield
    2   Dataset file missing or unreadable`;

/**
 * Example invocations.
 */
export const EXAMPLES = [
    'marc 020          Look up the ISBN field',
    'marc 245a         Look up the title subfield',
    'marc isbn         Search for ISBN-related fields',
    'marc -v 245       Show definition, indicators and examples for field 245',
    'marc --format json 650',
];

/**
 * Build the text appended after commander's generated help.
 *
 * @returns Help epilogue string
 */
export function buildHelpText(): string {
    return `
${QUERY_SYNTAX_SECTION}

EXAMPLES
${EXAMPLES.map(e => `    ${e}`).join('\n')}

${DATA_SECTION}

${EXIT_CODES_SECTION}
`;
}
