/**
 * @file types.ts
 * @module dataset/types
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Field, subfield and indicator records shared by the lookup
 * runtime and the scraper.
 */

/**
 * Detail level of a dataset.
 * - basic: titles and subfield labels only
 * - verbose: adds descriptions, indicators and examples
 */
export type DatasetTier = 'basic' | 'verbose';

/**
 * Whether a field or subfield may occur more than once.
 */
export type Repeatability = 'R' | 'NR';

/**
 * A lettered (or numbered) component within a field.
 */
export interface SubfieldRecord {
  /** Subfield code, a single lower-case letter or digit */
  code: string;
  /** Short label, e.g. "Title" */
  label: string;
  repeatability?: Repeatability;
  /** Extended note (verbose tier); empty in the basic tier */
  description: string;
}

/**
 * One of the two positional indicators of a data field.
 */
export interface IndicatorSpec {
  position: 1 | 2;
  /** Indicator name, e.g. "Title added entry" */
  label: string;
  /** Value code ("#" for blank, "0", "1-9", ...) to meaning */
  values: Record<string, string>;
}

/**
 * A MARC 21 field definition.
 */
export interface FieldRecord {
  /** Three-digit tag */
  code: string;
  title: string;
  repeatability?: Repeatability;
  description: string;
  /** Empty in the basic tier */
  indicators: IndicatorSpec[];
  /** Keyed by subfield code */
  subfields: Record<string, SubfieldRecord>;
  /** Empty in the basic tier */
  examples: string[];
}

/**
 * A loaded dataset. Never mutated after loading.
 */
export interface Dataset {
  tier: DatasetTier;
  fields: ReadonlyMap<string, FieldRecord>;
}

/**
 * Pattern every field code must match.
 */
export const FIELD_CODE_PATTERN = /^[0-9]{3}$/;

/**
 * Pattern every subfield code must match.
 */
export const SUBFIELD_CODE_PATTERN = /^[a-z0-9]$/;
