/**
 * Uniform access to anything that can sit on the element side of a link:
 * plain vectors and the collection kinds.
 */

import { ExperimentError } from '../errors.js';
import type { SubsetBy } from '../types.js';
import { DataTable } from './DataTable.js';
import { NumericMatrix } from './NumericMatrix.js';
import { QuantTable } from './QuantTable.js';
import { pickOffsets } from './select.js';
import { Spectra } from './Spectra.js';

export type Collection = DataTable | NumericMatrix | Spectra | QuantTable;

export type Linkable = readonly unknown[] | Collection;

export function isCollection(value: unknown): value is Collection {
  return (
    value instanceof DataTable ||
    value instanceof NumericMatrix ||
    value instanceof Spectra ||
    value instanceof QuantTable
  );
}

export function isLinkable(value: unknown): value is Linkable {
  return Array.isArray(value) || isCollection(value);
}

export function dimensionsOf(value: Linkable): SubsetBy {
  return isCollection(value) ? value.dimensions : 1;
}

export function defaultSubsetBy(value: Linkable): SubsetBy {
  return isCollection(value) ? value.defaultSubsetBy : 1;
}

/**
 * Number of elements along `dimension`.
 */
export function elementCount(value: Linkable, dimension: SubsetBy = 1): number {
  assertDimension(value, dimension);
  return isCollection(value) ? value.length(dimension) : value.length;
}

/**
 * Select elements at 0-based offsets along `dimension`, repeats included.
 */
export function selectElements(value: Linkable, offsets: readonly number[], dimension: SubsetBy = 1): Linkable {
  assertDimension(value, dimension);
  return isCollection(value) ? value.select(offsets, dimension) : pickOffsets(value, offsets);
}

function assertDimension(value: Linkable, dimension: SubsetBy): void {
  if (dimension > dimensionsOf(value)) {
    const kind = isCollection(value) ? value.kind : 'vector';
    throw new ExperimentError('MALFORMED_LINK', `a ${kind} can only be subset along dimension 1`);
  }
}
