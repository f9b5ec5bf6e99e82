/**
 * @file SearchEngine.test.ts
 * @module tests/unit/search/SearchEngine
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Unit tests for keyword search.
 */

import type { Dataset, FieldRecord } from '../../../src/dataset/types.js';
import { EmptyOrInvalidQueryError } from '../../../src/errors.js';
import { search, type SearchHit } from '../../../src/search/SearchEngine.js';
import { loadFixtureDataset } from '../../setup.js';

/**
 * Hits as `245` / `245$a` strings.
 */
function codes(hits: SearchHit[]): string[] {
  return hits.map(hit =>
    hit.kind === 'field' ? hit.field.code : `${hit.field.code}$${hit.subfield.code}`
  );
}

describe('search', () => {
  let basic: Dataset;
  let verbose: Dataset;

  beforeAll(() => {
    basic = loadFixtureDataset('basic');
    verbose = loadFixtureDataset('verbose');
  });

  it('should match field titles and subfield labels', () => {
    expect(codes(search(basic, 'isbn'))).toEqual(['020', '020$z']);
  });

  it('should match case-insensitively', () => {
    expect(search(basic, 'ISBN')).toEqual(search(basic, 'isbn'));
  });

  it('should also match subfield descriptions in the verbose tier', () => {
    expect(codes(search(verbose, 'isbn'))).toEqual(['020', '020$a', '020$q', '020$z']);
  });

  it('should keep the field hit alongside its subfield hits', () => {
    expect(codes(search(basic, 'title'))).toEqual(['245', '245$a', '245$b']);
  });

  it('should return subfield hits without a field hit', () => {
    expect(codes(search(basic, 'relator'))).toEqual(['100$e']);
  });

  it('should order hits by numeric field code', () => {
    expect(codes(search(basic, 'entry'))).toEqual(['100', '650', '650$a']);
  });

  it('should list digit subfields after letters', () => {
    expect(codes(search(verbose, 'appendix'))).toEqual(['020$6', '020$8', '245$6']);
  });

  it('should order subfields regardless of stored key order', () => {
    const field: FieldRecord = {
      code: '500',
      title: 'General Note',
      repeatability: 'R',
      description: '',
      indicators: [],
      subfields: {
        '5': { code: '5', label: 'Institution to which field applies', description: '' },
        b: { code: 'b', label: 'Institution note', description: '' },
        a: { code: 'a', label: 'General note', description: '' },
      },
      examples: [],
    };
    const dataset: Dataset = { tier: 'basic', fields: new Map([['500', field]]) };

    expect(codes(search(dataset, 'institution'))).toEqual(['500$b', '500$5']);
    expect(codes(search(dataset, 'note'))).toEqual(['500', '500$a', '500$b']);
  });

  it('should return an empty list when nothing matches', () => {
    expect(search(basic, 'xyzzy')).toEqual([]);
  });

  it('should reject an empty keyword', () => {
    expect(() => search(basic, '')).toThrow(EmptyOrInvalidQueryError);
    expect(() => search(basic, '   ')).toThrow(EmptyOrInvalidQueryError);
  });
});
