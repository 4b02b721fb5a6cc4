import { describe, expect, it } from 'vitest';
import { ExperimentError } from '../errors.js';
import { thrown } from '../testing.js';
import {
  buildLinkMatrix,
  elementsBySample,
  emptyLinkMatrix,
  linkCardinality,
  linkMatrixFromIndices,
  validateLinkMatrix,
} from './LinkMatrix.js';

describe('validateLinkMatrix', () => {
  it('accepts an empty matrix', () => {
    expect(() => validateLinkMatrix(emptyLinkMatrix(), 0, 0)).not.toThrow();
  });

  it('rejects values that are not a matrix of integers', () => {
    expect(() => validateLinkMatrix(3)).toThrow(/needs to be/);
    expect(() => validateLinkMatrix([['a', 'a'], ['a', 'a']])).toThrow(/needs to be/);
    expect(() => validateLinkMatrix([[1.5, 1]])).toThrow(/needs to be/);
    expect(thrown(() => validateLinkMatrix([[1, 'x']]))).toMatchObject({ code: 'MALFORMED_LINK' });
  });

  it('rejects matrices without exactly two columns', () => {
    const error = thrown(() => validateLinkMatrix([[1, 1, 1], [1, 1, 1]]));
    expect(error).toBeInstanceOf(ExperimentError);
    expect(error).toMatchObject({ code: 'MALFORMED_LINK' });
    expect(String(error)).toMatch(/2 columns/);
  });

  it('rejects sample indices above the sample count', () => {
    const error = thrown(() => validateLinkMatrix([[1, 1], [2, 1], [3, 1]], 1));
    expect(error).toMatchObject({ code: 'OUT_OF_RANGE_LINK', message: 'sample indices need to be <= 1' });
  });

  it('rejects element indices above the element count', () => {
    const error = thrown(() => validateLinkMatrix([[1, 4]], 2, 3));
    expect(error).toMatchObject({ code: 'OUT_OF_RANGE_LINK', message: 'element indices need to be <= 3' });
  });

  it('rejects indices smaller than 1', () => {
    expect(() => validateLinkMatrix([[1, -1], [2, -1], [3, -1]], 4)).toThrow(/smaller than 1/);
    expect(() => validateLinkMatrix([[0, 1]], 4)).toThrow(/smaller than 1/);
  });
});

describe('buildLinkMatrix', () => {
  it('links every equal pair of values ordered by from then to position', () => {
    expect(buildLinkMatrix(['a', 'a', 'b', 'd', 'b', 'c'], ['g', 'a', 'b', 'e'])).toEqual([
      [1, 2],
      [2, 2],
      [3, 3],
      [5, 3],
    ]);
  });

  it('expands ties on both sides into every matching pair', () => {
    const a = ['d', 'a', 'a', 'b', 'e', 'b', 'd', 'd'];
    const b = ['b', 'a', 'a', 'c', 'd', 'a'];
    expect(buildLinkMatrix(a, b)).toEqual([
      [1, 5], [2, 2], [2, 3], [2, 6], [3, 2], [3, 3], [3, 6], [4, 1], [6, 1], [7, 5], [8, 5],
    ]);
    expect(buildLinkMatrix(b, a)).toEqual([
      [1, 4], [1, 6], [2, 2], [2, 3], [3, 2], [3, 3], [5, 1], [5, 7], [5, 8], [6, 2], [6, 3],
    ]);
  });

  it('returns an empty matrix when nothing matches', () => {
    expect(buildLinkMatrix([], ['a'])).toEqual([]);
    expect(buildLinkMatrix(['x', 'y'], ['a', 'b'])).toEqual([]);
  });

  it('compares by value without coercion and never matches missing keys', () => {
    expect(buildLinkMatrix([1, '1', null, Number.NaN], ['1', 1, null, Number.NaN])).toEqual([
      [1, 2],
      [2, 1],
    ]);
  });
});

describe('linkMatrixFromIndices', () => {
  it('pairs sample and element indices position-wise', () => {
    expect(linkMatrixFromIndices([1, 2, 2], [3, 1, 2])).toEqual([[1, 3], [2, 1], [2, 2]]);
  });

  it('requires equal lengths', () => {
    expect(thrown(() => linkMatrixFromIndices([1, 2], [1]))).toMatchObject({ code: 'MALFORMED_LINK' });
  });
});

describe('elementsBySample', () => {
  it('groups element indices per sample in row order', () => {
    const grouped = elementsBySample([[2, 5], [1, 3], [2, 1]]);
    expect(grouped.get(1)).toEqual([3]);
    expect(grouped.get(2)).toEqual([5, 1]);
    expect(grouped.has(3)).toBe(false);
  });
});

describe('linkCardinality', () => {
  it('classifies relationship shapes', () => {
    expect(linkCardinality([[1, 1], [2, 2]])).toBe('1:1');
    expect(linkCardinality([[1, 1], [1, 2]])).toBe('1:n');
    expect(linkCardinality([[1, 1], [2, 1]])).toBe('n:1');
    expect(linkCardinality([[1, 1], [1, 2], [2, 1], [2, 3]])).toBe('n:m');
  });
});
