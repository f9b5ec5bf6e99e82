/**
 * @file ordering.ts
 * @module dataset/ordering
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Sort orders used wherever fields, subfields or indicator
 * values are listed.
 */

import type { FieldRecord, SubfieldRecord } from './types.js';

/**
 * Compare two field codes by numeric value.
 */
export function compareFieldCodes(a: string, b: string): number {
    return parseInt(a, 10) - parseInt(b, 10) || a.localeCompare(b);
}

/**
 * Compare two subfield codes in MARC display order:
 * letters a-z first, then digits 0-9.
 */
export function compareSubfieldCodes(a: string, b: string): number {
    const aDigit = /[0-9]/.test(a);
    const bDigit = /[0-9]/.test(b);
    if (aDigit !== bDigit) {
        return aDigit ? 1 : -1;
    }
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * List a field's subfields in MARC display order.
 */
export function orderedSubfields(field: FieldRecord): SubfieldRecord[] {
    return Object.values(field.subfields).sort((a, b) => compareSubfieldCodes(a.code, b.code));
}

/**
 * List indicator values with the blank value ("#") first, then by code.
 *
 * Integer-like object keys lose their insertion order in JavaScript, so the
 * order is always recomputed here.
 */
export function orderedIndicatorValues(values: Record<string, string>): Array<[string, string]> {
    return Object.entries(values).sort(([a], [b]) => {
        if (a === '#' || b === '#') {
            return a === b ? 0 : a === '#' ? -1 : 1;
        }
        return a.localeCompare(b, 'en', { numeric: true });
    });
}
