/**
 * @file SearchEngine.ts
 * @module search/SearchEngine
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Case-insensitive substring search over field and subfield text.
 */

import { compareFieldCodes, orderedSubfields } from '../dataset/ordering.js';
import type { Dataset, FieldRecord, SubfieldRecord } from '../dataset/types.js';
import { EmptyOrInvalidQueryError } from '../errors.js';

/**
 * A field whose title or description matched.
 */
export interface FieldHit {
    kind: 'field';
    field: FieldRecord;
}

/**
 * A subfield whose label or description matched.
 */
export interface SubfieldHit {
    kind: 'subfield';
    field: FieldRecord;
    subfield: SubfieldRecord;
}

export type SearchHit = FieldHit | SubfieldHit;

/**
 * Search a dataset for a keyword.
 *
 * A field produces a field hit when its title or description contains the
 * keyword, and one subfield hit per subfield whose label or description
 * contains it. Subfield hits never suppress the field hit.
 *
 * Hits are ordered by numeric field code; within a field the field hit comes
 * first, then subfield hits in MARC subfield order.
 *
 * @param dataset - Active dataset
 * @param keyword - Keyword, matched case-insensitively
 * @returns Ordered hits, possibly empty
 * @throws EmptyOrInvalidQueryError when the keyword is empty or blank
 */
export function search(dataset: Dataset, keyword: string): SearchHit[] {
    const needle = keyword.trim().toLowerCase();
    if (needle === '') {
        throw new EmptyOrInvalidQueryError(keyword);
    }

    const contains = (text: string): boolean => text.toLowerCase().includes(needle);
    const hits: SearchHit[] = [];
    const fields = [...dataset.fields.values()].sort((a, b) => compareFieldCodes(a.code, b.code));

    for (const field of fields) {
        if (contains(field.title) || contains(field.description)) {
            hits.push({ kind: 'field', field });
        }

        for (const subfield of orderedSubfields(field)) {
            if (contains(subfield.label) || contains(subfield.description)) {
                hits.push({ kind: 'subfield', field, subfield });
            }
        }
    }

    return hits;
}
