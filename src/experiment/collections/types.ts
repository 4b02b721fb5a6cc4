import type { SubsetBy } from '../types.js';

export type CollectionKind = 'table' | 'matrix' | 'spectra' | 'quant';

/**
 * Read and write access to the named fields of a slot or collection.
 */
export interface FieldContainer<Self> {
  getField(name: string): unknown;
  withField(name: string, value: unknown): Self;
  fieldNames(): string[];
}

/**
 * Capability every linkable collection implements. Offsets passed to
 * `select` are 0-based and may repeat.
 */
export interface NamedCollection<Self> extends FieldContainer<Self> {
  readonly kind: CollectionKind;
  /** Number of dimensions the collection can be subset along. */
  readonly dimensions: SubsetBy;
  /** Subset dimension used when the collection is linked without an explicit one. */
  readonly defaultSubsetBy: SubsetBy;
  length(dimension?: SubsetBy): number;
  select(offsets: readonly number[], dimension?: SubsetBy): Self;
}
