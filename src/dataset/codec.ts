/**
 * @file codec.ts
 * @module dataset/codec
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Converts between persisted dataset JSON and in-memory
 * records. Decoding applies basic shape checks only.
 */

import { compareFieldCodes, compareSubfieldCodes } from './ordering.js';
import {
    FIELD_CODE_PATTERN,
    SUBFIELD_CODE_PATTERN,
    type DatasetTier,
    type FieldRecord,
    type IndicatorSpec,
    type Repeatability,
    type SubfieldRecord,
} from './types.js';

/**
 * Persisted subfield entry.
 */
export interface PersistedSubfield {
    label: string;
    repeatability?: Repeatability;
    description: string;
}

/**
 * Persisted field entry. `indicators` and `examples` appear in the verbose
 * file only.
 */
export interface PersistedField {
    title: string;
    repeatability?: Repeatability;
    description: string;
    subfields: Record<string, PersistedSubfield>;
    indicators?: IndicatorSpec[];
    examples?: string[];
}

/**
 * Raised by decodeDataset when the JSON does not have the expected shape.
 */
export class DatasetShapeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DatasetShapeError';
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, where: string): string {
    if (value === undefined || value === null) return '';
    if (typeof value !== 'string') {
        throw new DatasetShapeError(`${where} must be a string`);
    }
    return value;
}

function optionalRepeatability(value: unknown, where: string): Repeatability | undefined {
    if (value === undefined || value === null) return undefined;
    if (value === 'R' || value === 'NR') return value;
    throw new DatasetShapeError(`${where} must be "R" or "NR"`);
}

function decodeSubfields(value: unknown, fieldCode: string): Record<string, SubfieldRecord> {
    if (value === undefined) return {};
    if (!isRecord(value)) {
        throw new DatasetShapeError(`field ${fieldCode}: subfields must be an object`);
    }

    const subfields: Record<string, SubfieldRecord> = {};
    for (const [rawCode, entry] of Object.entries(value)) {
        const code = rawCode.toLowerCase();
        const where = `field ${fieldCode} subfield ${rawCode}`;
        if (!SUBFIELD_CODE_PATTERN.test(code)) {
            throw new DatasetShapeError(`${where}: invalid subfield code`);
        }
        if (Object.hasOwn(subfields, code)) {
            throw new DatasetShapeError(`${where}: duplicate subfield code "${code}"`);
        }
        if (!isRecord(entry) || typeof entry.label !== 'string') {
            throw new DatasetShapeError(`${where}: label must be a string`);
        }
        subfields[code] = {
            code,
            label: entry.label,
            repeatability: optionalRepeatability(entry.repeatability, `${where} repeatability`),
            description: optionalString(entry.description, `${where} description`),
        };
    }
    return subfields;
}

function decodeIndicators(value: unknown, fieldCode: string): IndicatorSpec[] {
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
        throw new DatasetShapeError(`field ${fieldCode}: indicators must be an array`);
    }

    return value.map((entry: unknown, index): IndicatorSpec => {
        const where = `field ${fieldCode} indicator ${index + 1}`;
        if (!isRecord(entry)) {
            throw new DatasetShapeError(`${where} must be an object`);
        }
        const { position, label, values } = entry;
        if (position !== 1 && position !== 2) {
            throw new DatasetShapeError(`${where}: position must be 1 or 2`);
        }
        if (typeof label !== 'string') {
            throw new DatasetShapeError(`${where}: label must be a string`);
        }
        if (!isRecord(values)) {
            throw new DatasetShapeError(`${where}: values must be an object`);
        }
        const decodedValues: Record<string, string> = {};
        for (const [code, meaning] of Object.entries(values)) {
            if (typeof meaning !== 'string') {
                throw new DatasetShapeError(`${where}: value ${code} must be a string`);
            }
            decodedValues[code] = meaning;
        }
        return { position, label, values: decodedValues };
    });
}

function decodeExamples(value: unknown, fieldCode: string): string[] {
    if (value === undefined) return [];
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
        throw new DatasetShapeError(`field ${fieldCode}: examples must be an array of strings`);
    }
    return value;
}

/**
 * Decode parsed dataset JSON into field records.
 *
 * Indicators and examples are dropped when decoding a basic-tier file so
 * that both tiers keep the same record shape.
 *
 * @param json - Result of JSON.parse on a dataset file
 * @param tier - Tier the file belongs to
 * @returns Field records keyed by code, in ascending code order
 * @throws DatasetShapeError when the shape is wrong
 */
export function decodeDataset(json: unknown, tier: DatasetTier): Map<string, FieldRecord> {
    if (!isRecord(json)) {
        throw new DatasetShapeError('dataset must be a JSON object');
    }

    const fields = new Map<string, FieldRecord>();
    const codes = Object.keys(json).sort(compareFieldCodes);

    for (const code of codes) {
        const entry = json[code];
        if (!FIELD_CODE_PATTERN.test(code)) {
            throw new DatasetShapeError(`invalid field code "${code}"`);
        }
        if (!isRecord(entry) || typeof entry.title !== 'string') {
            throw new DatasetShapeError(`field ${code}: title must be a string`);
        }

        fields.set(code, {
            code,
            title: entry.title,
            repeatability: optionalRepeatability(entry.repeatability, `field ${code} repeatability`),
            description: optionalString(entry.description, `field ${code} description`),
            indicators: tier === 'verbose' ? decodeIndicators(entry.indicators, code) : [],
            subfields: decodeSubfields(entry.subfields, code),
            examples: tier === 'verbose' ? decodeExamples(entry.examples, code) : [],
        });
    }

    return fields;
}

/**
 * Encode field records for persisting as the given tier.
 *
 * The basic tier keeps titles, field descriptions and subfield labels; it
 * drops indicators, examples and extended subfield descriptions.
 *
 * @param fields - Records to encode (any order)
 * @param tier - Target tier
 * @returns Persisted entries in ascending field-code order
 */
export function encodeDataset(
    fields: Iterable<FieldRecord>,
    tier: DatasetTier
): Array<[string, PersistedField]> {
    const sorted = [...fields].sort((a, b) => compareFieldCodes(a.code, b.code));
    const output: Array<[string, PersistedField]> = [];

    for (const field of sorted) {
        const subfields: Record<string, PersistedSubfield> = {};
        const subfieldList = Object.values(field.subfields).sort((a, b) =>
            compareSubfieldCodes(a.code, b.code)
        );
        for (const subfield of subfieldList) {
            subfields[subfield.code] = {
                label: subfield.label,
                repeatability: subfield.repeatability,
                description: tier === 'verbose' ? subfield.description : '',
            };
        }

        const persisted: PersistedField = {
            title: field.title,
            repeatability: field.repeatability,
            description: field.description,
            subfields,
        };
        if (tier === 'verbose') {
            persisted.indicators = field.indicators;
            persisted.examples = field.examples;
        }
        output.push([field.code, persisted]);
    }

    return output;
}

/**
 * Serialize field records as dataset file content.
 *
 * Field keys are written in ascending code order. A plain object cannot
 * hold that order, since integer-like keys such as "245" are enumerated
 * before "020", so the top level is assembled entry by entry.
 *
 * @param fields - Records to serialize (any order)
 * @param tier - Target tier
 * @returns JSON text with 2-space indentation and a trailing newline
 */
export function serializeDataset(fields: Iterable<FieldRecord>, tier: DatasetTier): string {
    const entries = encodeDataset(fields, tier).map(
        ([code, field]) => `  ${JSON.stringify(code)}: ${JSON.stringify(field, null, 2).replace(/\n/g, '\n  ')}`
    );
    return entries.length === 0 ? '{}\n' : `{\n${entries.join(',\n')}\n}\n`;
}
