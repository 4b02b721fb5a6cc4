import { describe, expect, it } from 'vitest';
import { thrown } from '../testing.js';
import { LinkRegistry } from './LinkRegistry.js';

const bounds = { sampleCount: 2, elementCount: 3 };

describe('LinkRegistry', () => {
  it('starts empty and returns an empty matrix for unknown addresses', () => {
    const registry = LinkRegistry.empty();
    expect(registry.size).toBe(0);
    expect(registry.matrix('spectra')).toEqual([]);
    expect(registry.get('spectra')).toBeUndefined();
  });

  it('stores links with subsetBy 1 by default', () => {
    const registry = LinkRegistry.empty().with('metadata.a', [[1, 2], [2, 3]], bounds);
    expect(registry.addresses()).toEqual(['metadata.a']);
    expect(registry.get('metadata.a')).toEqual({ address: 'metadata.a', matrix: [[1, 2], [2, 3]], subsetBy: 1 });
  });

  it('replaces an existing entry and leaves the previous registry untouched', () => {
    const first = LinkRegistry.empty().with('metadata.a', [[1, 1]], bounds);
    const second = first.with('metadata.a', [[2, 3]], bounds, 2);
    expect(first.matrix('metadata.a')).toEqual([[1, 1]]);
    expect(second.get('metadata.a')).toMatchObject({ matrix: [[2, 3]], subsetBy: 2 });
    expect(second.size).toBe(1);
  });

  it('validates bounds and the subsetBy tag', () => {
    expect(thrown(() => LinkRegistry.empty().with('metadata.a', [[3, 1]], bounds))).toMatchObject({
      code: 'OUT_OF_RANGE_LINK',
    });
    expect(thrown(() => LinkRegistry.empty().with('metadata.a', [[1, 4]], bounds))).toMatchObject({
      code: 'OUT_OF_RANGE_LINK',
    });
    expect(thrown(() => LinkRegistry.empty().with('metadata.a', [[1, 1]], bounds, 3))).toMatchObject({
      code: 'MALFORMED_LINK',
    });
  });

  it('picks entries by address', () => {
    const registry = LinkRegistry.empty()
      .with('a', [[1, 1]], bounds)
      .with('b', [[1, 1], [2, 2]], bounds);
    expect(registry.pick(['b']).addresses()).toEqual(['b']);
    expect(registry.pick(['d']).size).toBe(0);
    expect(registry.pick().size).toBe(2);
    expect([...registry].map((entry) => entry.address)).toEqual(['a', 'b']);
  });
});
