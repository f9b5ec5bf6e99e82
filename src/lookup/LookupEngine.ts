/**
 * @file LookupEngine.ts
 * @module lookup/LookupEngine
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Resolves field and subfield codes against a dataset.
 */

import type { Dataset, FieldRecord, Repeatability, SubfieldRecord } from '../dataset/types.js';

/**
 * Minimal identifying information of a subfield's parent field.
 */
export interface ParentField {
    code: string;
    title: string;
    repeatability?: Repeatability;
}

export interface FieldResult {
    kind: 'field';
    field: FieldRecord;
}

export interface SubfieldResult {
    kind: 'subfield';
    field: ParentField;
    subfield: SubfieldRecord;
}

export interface NotFound {
    kind: 'not-found';
    /** Field code, or field code plus subfield code */
    code: string;
}

export type LookupResult = FieldResult | SubfieldResult | NotFound;

/**
 * Look up a field, or one of its subfields, by code.
 *
 * @param dataset - Active dataset
 * @param code - Three-digit field code
 * @param subfield - Optional subfield code (matched case-insensitively)
 * @returns The stored field record, the subfield paired with its parent, or NotFound
 */
export function lookup(dataset: Dataset, code: string, subfield?: string): LookupResult {
    const field = dataset.fields.get(code);
    if (!field) {
        return { kind: 'not-found', code };
    }

    if (subfield === undefined) {
        return { kind: 'field', field };
    }

    const subfieldCode = subfield.toLowerCase();
    if (!Object.hasOwn(field.subfields, subfieldCode)) {
        return { kind: 'not-found', code: `${code}${subfieldCode}` };
    }
    const match = field.subfields[subfieldCode];

    return {
        kind: 'subfield',
        field: { code: field.code, title: field.title, repeatability: field.repeatability },
        subfield: match,
    };
}
