/**
 * @file QueryClassifier.ts
 * @module query/QueryClassifier
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Decides whether a raw query is a field-code lookup or a
 * keyword search.
 */

import { EmptyOrInvalidQueryError, InvalidFieldCodeError } from '../errors.js';

/**
 * Lookup of a field, optionally narrowed to one subfield.
 */
export interface FieldCodeQuery {
    kind: 'field';
    /** Three-digit field code */
    code: string;
    /** Lower-case subfield code */
    subfield?: string;
}

/**
 * Free-text search over field and subfield descriptions.
 */
export interface KeywordQuery {
    kind: 'keyword';
    /** Trimmed, lower-cased keyword */
    keyword: string;
}

export type Query = FieldCodeQuery | KeywordQuery;

/**
 * Classify a raw query string.
 *
 * - `245`, `245a`, `245$a` → field-code query
 * - `isbn`, `Title statement` → keyword query
 *
 * @param query - Query as typed by the user
 * @returns Classified query
 * @throws EmptyOrInvalidQueryError for empty input or input starting with neither a digit nor a letter
 * @throws InvalidFieldCodeError for a digit-leading query that is not `NNN` or `NNN[$]x`
 */
export function classify(query: string): Query {
    const normalized = query.trim().toLowerCase();
    const first = normalized.charAt(0);

    if (/[0-9]/.test(first)) {
        return classifyFieldCode(normalized);
    }

    // Unicode letters count, so keywords like "Öffentliche" classify as keywords
    if (/\p{L}/u.test(first)) {
        return { kind: 'keyword', keyword: normalized };
    }

    throw new EmptyOrInvalidQueryError(query);
}

function classifyFieldCode(normalized: string): FieldCodeQuery {
    const code = normalized.slice(0, 3);
    if (!/^[0-9]{3}$/.test(code)) {
        throw new InvalidFieldCodeError(normalized);
    }

    const rest = normalized.slice(3);
    if (rest === '') {
        return { kind: 'field', code };
    }

    const subfield = rest.startsWith('$') ? rest.slice(1) : rest;
    if (!/^[a-z0-9]$/.test(subfield)) {
        throw new InvalidFieldCodeError(
            normalized,
            'subfield code must be a single letter or digit'
        );
    }

    return { kind: 'field', code, subfield };
}
