import { describe, expect, it } from 'vitest';
import { resolveSelector } from './selectors.js';
import { thrown } from './testing.js';

describe('resolveSelector', () => {
  it('keeps positive indices in order, repeats included', () => {
    expect(resolveSelector([3, 1, 1], 3)).toEqual([3, 1, 1]);
  });

  it('excludes samples by negative index', () => {
    expect(resolveSelector([-1], 3)).toEqual([2, 3]);
    expect(resolveSelector([-3, -1], 3)).toEqual([2]);
  });

  it('selects by logical mask', () => {
    expect(resolveSelector([true, false, true], 3)).toEqual([1, 3]);
  });

  it('resolves an empty selector to no samples', () => {
    expect(resolveSelector([], 3)).toEqual([]);
  });

  it('rejects invalid selectors', () => {
    const cases: Array<readonly number[] | readonly boolean[]> = [[true], [1, -1], [0], [4], [1.5]];
    for (const selector of cases) {
      expect(thrown(() => resolveSelector(selector, 3))).toMatchObject({ code: 'INVALID_SELECTION' });
    }
  });
});
