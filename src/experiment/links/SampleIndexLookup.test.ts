import { describe, expect, it, vi } from 'vitest';
import { thrown } from '../testing.js';
import type { LinkDiagnostic } from './diagnostics.js';
import type { LinkMatrix } from './LinkMatrix.js';
import { allOwners, firstOwner } from './SampleIndexLookup.js';

const contiguous: LinkMatrix = [[1, 4], [1, 5], [1, 6], [1, 7], [2, 8], [2, 9], [2, 10], [2, 11]];
const overlapping: LinkMatrix = [[1, 4], [1, 5], [1, 6], [1, 7], [2, 8], [2, 9], [2, 10], [2, 5]];

describe('firstOwner', () => {
  it('returns null for every element of an empty link', () => {
    const owners = firstOwner([], 100);
    expect(owners).toHaveLength(100);
    expect(owners.every((owner) => owner === null)).toBe(true);
  });

  it('maps linked elements to their sample', () => {
    const owners = firstOwner(contiguous, 20);
    expect(owners).toEqual([
      null, null, null, 1, 1, 1, 1, 2, 2, 2, 2, null, null, null, null, null, null, null, null, null,
    ]);
  });

  it('reports duplicate mappings and keeps the first sample', () => {
    const diagnostics: LinkDiagnostic[] = [];
    const owners = firstOwner(overlapping, 20, { onDiagnostic: (d) => diagnostics.push(d) });
    expect(owners.slice(3, 10)).toEqual([1, 1, 1, 1, 2, 2, 2]);
    expect(owners.slice(10).every((owner) => owner === null)).toBe(true);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.code).toBe('AMBIGUOUS_MAPPING');
    expect(diagnostics[0]?.message).toMatch(/Found at least one element/);
    expect(diagnostics[0]?.details).toEqual({ elements: [5] });
  });

  it('warns through the console by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    firstOwner(overlapping, 20);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toMatch(/^\[AMBIGUOUS_MAPPING\]/);
    warn.mockRestore();
  });

  it('throws on duplicates when ambiguity is an error', () => {
    expect(thrown(() => firstOwner(overlapping, 20, { ambiguity: 'error' }))).toMatchObject({
      code: 'AMBIGUOUS_MAPPING',
    });
  });
});

describe('allOwners', () => {
  it('returns empty sets for an empty link', () => {
    const owners = allOwners([], 100);
    expect(owners).toHaveLength(100);
    expect(owners.every((owner) => owner.size === 0)).toBe(true);
  });

  it('collects every linked sample per element', () => {
    const owners = allOwners(overlapping, 20);
    expect(owners.slice(3, 10)).toEqual([
      new Set([1]),
      new Set([1, 2]),
      new Set([1]),
      new Set([1]),
      new Set([2]),
      new Set([2]),
      new Set([2]),
    ]);
    expect(owners.slice(10).every((owner) => owner.size === 0)).toBe(true);
  });
});
