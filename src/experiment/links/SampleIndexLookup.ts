/**
 * Reverse lookups from linked elements to the samples they belong to.
 */

import { ExperimentError } from '../errors.js';
import { consoleDiagnosticSink, type DiagnosticSink } from './diagnostics.js';
import type { LinkMatrix } from './LinkMatrix.js';

export type AmbiguityPolicy = 'warn' | 'error';

export interface FirstOwnerOptions {
  /** Receives the duplicate-mapping warning (default: console) */
  onDiagnostic?: DiagnosticSink;
  /** 'error' throws AMBIGUOUS_MAPPING instead of warning (default: 'warn') */
  ambiguity?: AmbiguityPolicy;
}

/**
 * Sample index of the first link row referencing each element, or null for
 * elements no sample links to.
 */
export function firstOwner(
  matrix: LinkMatrix,
  elementCount: number,
  options: FirstOwnerOptions = {},
): Array<number | null> {
  const owners: Array<number | null> = Array.from({ length: elementCount }, () => null);
  const duplicated = new Set<number>();
  for (const [sample, element] of matrix) {
    if (element < 1 || element > elementCount) continue;
    if (owners[element - 1] === null) {
      owners[element - 1] = sample;
    } else {
      duplicated.add(element);
    }
  }

  if (duplicated.size > 0) {
    const message =
      `Found at least one element assigned to more than one sample (${duplicated.size} element(s)); ` +
      'reporting the first sample for each';
    if (options.ambiguity === 'error') {
      throw new ExperimentError('AMBIGUOUS_MAPPING', message);
    }
    (options.onDiagnostic ?? consoleDiagnosticSink)({
      code: 'AMBIGUOUS_MAPPING',
      message,
      details: { elements: [...duplicated].sort((a, b) => a - b) },
    });
  }
  return owners;
}

/**
 * Every sample index linked to each element, as a possibly empty set.
 */
export function allOwners(matrix: LinkMatrix, elementCount: number): Array<Set<number>> {
  const owners = Array.from({ length: elementCount }, () => new Set<number>());
  for (const [sample, element] of matrix) {
    owners[element - 1]?.add(sample);
  }
  return owners;
}
