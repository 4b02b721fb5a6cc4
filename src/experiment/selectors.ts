import { ExperimentError } from './errors.js';

/**
 * Sample selector: positive 1-based indices, negative indices excluding
 * samples, or a boolean mask with one entry per sample.
 */
export type SampleSelector = readonly number[] | readonly boolean[];

/**
 * Resolve a selector against `sampleCount` samples to positive 1-based indices.
 */
export function resolveSelector(selector: SampleSelector, sampleCount: number): number[] {
  const values: readonly (number | boolean)[] = selector;
  if (values.length === 0) return [];
  const numbers = values.filter((value): value is number => typeof value === 'number');
  if (numbers.length === 0) {
    if (values.length !== sampleCount) {
      throw new ExperimentError(
        'INVALID_SELECTION',
        `logical selector has ${values.length} values but there are ${sampleCount} samples`,
      );
    }
    return values.flatMap((keep, i) => (keep === true ? [i + 1] : []));
  }
  if (numbers.length !== values.length) {
    throw new ExperimentError('INVALID_SELECTION', 'selector cannot mix numbers and booleans');
  }
  if (!numbers.every(Number.isInteger) || numbers.includes(0)) {
    throw new ExperimentError('INVALID_SELECTION', 'sample indices need to be non-zero integers');
  }
  const negative = numbers.filter((value) => value < 0);
  if (negative.length === 0) {
    const outOfRange = numbers.find((value) => value > sampleCount);
    if (outOfRange !== undefined) {
      throw new ExperimentError('INVALID_SELECTION', `sample index ${outOfRange} is out of range 1..${sampleCount}`);
    }
    return [...numbers];
  }
  if (negative.length !== numbers.length) {
    throw new ExperimentError('INVALID_SELECTION', 'selector cannot mix positive and negative indices');
  }
  const excluded = new Set(negative.map((value) => -value));
  return Array.from({ length: sampleCount }, (_, i) => i + 1).filter((index) => !excluded.has(index));
}
