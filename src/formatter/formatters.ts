/**
 * @file formatters.ts
 * @module formatter/formatters
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Output formatters for lookup results and search hits.
 */

import { orderedIndicatorValues, orderedSubfields } from '../dataset/ordering.js';
import type { DatasetTier, FieldRecord, IndicatorSpec, SubfieldRecord } from '../dataset/types.js';
import type { FieldResult, ParentField, SubfieldResult } from '../lookup/LookupEngine.js';
import type { SearchHit } from '../search/SearchEngine.js';

/**
 * Output format type.
 */
export type OutputFormat = 'simple' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['simple', 'json'];

/**
 * Hits of a keyword search.
 */
export interface SearchResults {
    kind: 'search';
    hits: SearchHit[];
}

/**
 * Anything the CLI prints on success.
 */
export type RenderableResult = FieldResult | SubfieldResult | SearchResults;

/**
 * Options for formatResult.
 */
export interface FormatOptions {
    format: OutputFormat;
    /** Tier of the dataset the result came from */
    tier: DatasetTier;
    /** Whether verbose output was requested */
    verbose: boolean;
    /** Original query, echoed in JSON output */
    query: string;
}

/** Maximum length of description snippets under search hits */
const SNIPPET_LENGTH = 100;

const INDICATOR_POSITION_NAMES: Record<IndicatorSpec['position'], string> = {
    1: 'First',
    2: 'Second',
};

/**
 * Format a result for output.
 *
 * @param result - Lookup result or search hits
 * @param options - Format, tier and verbosity
 * @returns Formatted string output
 */
export function formatResult(result: RenderableResult, options: FormatOptions): string {
    switch (options.format) {
        case 'json':
            return formatJson(result, options);
        case 'simple':
        default:
            return render(result, options.tier, options.verbose);
    }
}

/**
 * Render a result as text.
 *
 * Verbose details are shown only when verbose output was requested and the
 * result came from the verbose tier; otherwise the basic rendering is used.
 * Every line of the basic rendering also appears in the verbose rendering.
 *
 * @param result - Lookup result or search hits
 * @param tier - Tier of the dataset the result came from
 * @param verbose - Whether verbose output was requested
 */
export function render(result: RenderableResult, tier: DatasetTier, verbose: boolean): string {
    const detailed = verbose && tier === 'verbose';

    switch (result.kind) {
        case 'field':
            return detailed ? renderFieldVerbose(result.field) : renderFieldBasic(result.field);
        case 'subfield':
            return renderSubfield(result.field, result.subfield, detailed);
        case 'search':
            return renderSearchHits(result.hits, detailed);
    }
}

/**
 * Heading line for a field, e.g. `245 — Title Statement (NR)`.
 */
export function fieldHeading(field: ParentField): string {
    return `${field.code} — ${field.title}${repeatabilitySuffix(field.repeatability)}`;
}

/**
 * Line for a subfield, e.g. `245$a — Title (NR)`.
 */
export function subfieldLine(fieldCode: string, subfield: SubfieldRecord): string {
    return `${fieldCode}$${subfield.code} — ${subfield.label}${repeatabilitySuffix(subfield.repeatability)}`;
}

function repeatabilitySuffix(repeatability: string | undefined): string {
    return repeatability ? ` (${repeatability})` : '';
}

function renderFieldBasic(field: FieldRecord): string {
    const lines = [fieldHeading(field)];
    for (const subfield of orderedSubfields(field)) {
        lines.push(`  ${subfieldLine(field.code, subfield)}`);
    }
    return lines.join('\n');
}

function renderFieldVerbose(field: FieldRecord): string {
    const lines = [fieldHeading(field)];

    if (field.description) {
        lines.push('', 'Description:', `  ${field.description}`);
    }

    if (field.indicators.length > 0) {
        lines.push('', 'Indicators:');
        const indicators = [...field.indicators].sort((a, b) => a.position - b.position);
        for (const indicator of indicators) {
            lines.push(`  ${INDICATOR_POSITION_NAMES[indicator.position]} - ${indicator.label}`);
            for (const [code, meaning] of orderedIndicatorValues(indicator.values)) {
                lines.push(`    ${code} - ${meaning}`);
            }
        }
    }

    const subfields = orderedSubfields(field);
    if (subfields.length > 0) {
        lines.push('', 'Subfields:');
        for (const subfield of subfields) {
            lines.push(`  ${subfieldLine(field.code, subfield)}`);
            if (subfield.description) {
                lines.push(`      ${subfield.description}`);
            }
        }
    }

    if (field.examples.length > 0) {
        lines.push('', 'Examples:');
        field.examples.forEach((example, index) => {
            lines.push(`  ${index + 1}. ${example}`);
        });
    }

    return lines.join('\n');
}

function renderSubfield(parent: ParentField, subfield: SubfieldRecord, detailed: boolean): string {
    const lines = [fieldHeading(parent), `  ${subfieldLine(parent.code, subfield)}`];
    if (detailed && subfield.description) {
        lines.push(`      ${subfield.description}`);
    }
    return lines.join('\n');
}

function renderSearchHits(hits: SearchHit[], detailed: boolean): string {
    if (hits.length === 0) {
        return 'No matches found.';
    }

    const lines: string[] = [];
    if (hits.length > 1) {
        lines.push(`Found ${hits.length} matches:`, '');
    }

    for (const hit of hits) {
        if (hit.kind === 'field') {
            lines.push(fieldHeading(hit.field));
            continue;
        }

        lines.push(subfieldLine(hit.field.code, hit.subfield));
        if (detailed && hit.subfield.description) {
            lines.push(`    ${snippet(hit.subfield.description)}`);
        }
    }

    return lines.join('\n');
}

/**
 * Truncate a description for display under a search hit.
 */
export function snippet(text: string): string {
    return text.length > SNIPPET_LENGTH ? text.substring(0, SNIPPET_LENGTH) + '...' : text;
}

/**
 * Format a result as JSON.
 */
function formatJson(result: RenderableResult, options: FormatOptions): string {
    const detailed = options.verbose && options.tier === 'verbose';
    const output = {
        query: options.query,
        tier: options.tier,
        kind: result.kind,
        ...jsonBody(result, detailed),
    };
    return JSON.stringify(output, null, 2);
}

function jsonBody(result: RenderableResult, detailed: boolean): Record<string, unknown> {
    switch (result.kind) {
        case 'field':
            return { field: fieldToJson(result.field, detailed) };
        case 'subfield':
            return {
                field: result.field,
                subfield: subfieldToJson(result.subfield, detailed),
            };
        case 'search':
            return {
                total: result.hits.length,
                hits: result.hits.map(hit =>
                    hit.kind === 'field'
                        ? { field: hit.field.code, title: hit.field.title }
                        : {
                                field: hit.field.code,
                                subfield: hit.subfield.code,
                                label: hit.subfield.label,
                                ...(detailed && hit.subfield.description
                                    ? { description: hit.subfield.description }
                                    : {}),
                            }
                ),
            };
    }
}

function fieldToJson(field: FieldRecord, detailed: boolean): Record<string, unknown> {
    return {
        code: field.code,
        title: field.title,
        repeatability: field.repeatability,
        ...(detailed
            ? {
                    description: field.description,
                    indicators: field.indicators,
                }
            : {}),
        subfields: orderedSubfields(field).map(subfield => subfieldToJson(subfield, detailed)),
        ...(detailed ? { examples: field.examples } : {}),
    };
}

function subfieldToJson(subfield: SubfieldRecord, detailed: boolean): Record<string, unknown> {
    return {
        code: subfield.code,
        label: subfield.label,
        repeatability: subfield.repeatability,
        ...(detailed ? { description: subfield.description } : {}),
    };
}
