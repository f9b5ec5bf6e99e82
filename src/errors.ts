/**
 * @file errors.ts
 * @module errors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Error taxonomy for lookups and scraping. Each runtime error
 * carries the process exit code the CLI reports for it.
 */

/**
 * Kinds of failure the CLI can report.
 */
export type MarcErrorKind =
    | 'EmptyOrInvalidQuery'
    | 'InvalidFieldCode'
    | 'NotFound'
    | 'DatasetUnavailable'
    | 'VerboseUnavailable';

/**
 * Base class for errors that map to a user-facing message and exit code.
 */
export abstract class MarcError extends Error {
    abstract readonly kind: MarcErrorKind;
    abstract readonly exitCode: number;
}

/**
 * Thrown for an empty query or one starting with neither a digit nor a letter.
 */
export class EmptyOrInvalidQueryError extends MarcError {
    readonly kind = 'EmptyOrInvalidQuery';
    readonly exitCode = 1;

    constructor(readonly query: string) {
        super(
            query.trim() === ''
                ? 'Query is empty'
                : `Query must start with a field code or a keyword: ${query.trim()}`
        );
        this.name = 'EmptyOrInvalidQueryError';
    }
}

/**
 * Thrown when a digit-leading query is not a well-formed field or subfield code.
 */
export class InvalidFieldCodeError extends MarcError {
    readonly kind = 'InvalidFieldCode';
    readonly exitCode = 1;

    constructor(readonly query: string, reason = 'field code must be 3 digits') {
        super(`Invalid field code "${query}": ${reason}`);
        this.name = 'InvalidFieldCodeError';
    }
}

/**
 * Reported when a well-formed code is absent from the dataset.
 */
export class NotFoundError extends MarcError {
    readonly kind = 'NotFound';
    readonly exitCode = 1;

    constructor(readonly code: string) {
        super(code.length > 3 ? `No such subfield: ${code}` : `No such field: ${code}`);
        this.name = 'NotFoundError';
    }
}

/**
 * Thrown when a dataset file is missing or cannot be parsed.
 */
export class DatasetUnavailableError extends MarcError {
    readonly kind = 'DatasetUnavailable';
    readonly exitCode = 2;

    constructor(readonly filePath: string, readonly reason: string) {
        super(`Dataset unavailable at ${filePath}: ${reason}`);
        this.name = 'DatasetUnavailableError';
    }
}

/**
 * Raised as a warning when the verbose dataset cannot be loaded and the
 * basic dataset is used instead. Never fatal.
 */
export class VerboseUnavailableError extends MarcError {
    readonly kind = 'VerboseUnavailable';
    readonly exitCode = 0;

    constructor(readonly source: DatasetUnavailableError) {
        super(`Verbose dataset unavailable (${source.reason}); showing basic information`);
        this.name = 'VerboseUnavailableError';
    }
}

/**
 * A field page could not be fetched. Scraper only.
 */
export class FetchFailedError extends Error {
    constructor(readonly code: string, readonly url: string, reason: string) {
        super(`Failed to fetch ${url} for field ${code}: ${reason}`);
        this.name = 'FetchFailedError';
    }
}

/**
 * A fetched page could not be parsed into a field record. Scraper only.
 */
export class ParseFailedError extends Error {
    constructor(readonly code: string, reason: string) {
        super(`Failed to parse field ${code}: ${reason}`);
        this.name = 'ParseFailedError';
    }
}

/**
 * Describe an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
