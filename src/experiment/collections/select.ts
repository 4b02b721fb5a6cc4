import { ExperimentError } from '../errors.js';

/**
 * Pick `values` at the given 0-based offsets, repeats included.
 */
export function pickOffsets<T>(values: readonly T[], offsets: readonly number[], what = 'element'): T[] {
  return offsets.flatMap((offset) => {
    if (!Number.isInteger(offset) || offset < 0 || offset >= values.length) {
      throw new ExperimentError(
        'INVALID_SELECTION',
        `${what} offset ${offset} is out of range for length ${values.length}`,
      );
    }
    return values.slice(offset, offset + 1);
  });
}

/**
 * Make repeated names unique by suffixing `.1`, `.2`, ... to later copies.
 */
export function uniqueNames(names: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return names.map((name) => {
    const count = seen.get(name) ?? 0;
    seen.set(name, count + 1);
    return count === 0 ? name : `${name}.${count}`;
  });
}
