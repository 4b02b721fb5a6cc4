/**
 * LinkRegistry: link matrices of an experiment keyed by element address.
 *
 * Immutable: every change returns a new registry. Matrices are validated
 * against the sample count and the linked element count on insertion.
 */

import { ExperimentError } from '../errors.js';
import { isSubsetBy, type SubsetBy } from '../types.js';
import { validateLinkMatrix, type LinkMatrix } from './LinkMatrix.js';

export interface LinkEntry {
  /** Element address, e.g. `spectra` or `experimentFiles.mzML_file` */
  readonly address: string;
  readonly matrix: LinkMatrix;
  /** 1 duplicates shared elements on subsetting, 2 selects columns */
  readonly subsetBy: SubsetBy;
}

export interface LinkBounds {
  sampleCount: number;
  elementCount: number;
}

export class LinkRegistry implements Iterable<LinkEntry> {
  private readonly entries: ReadonlyMap<string, LinkEntry>;

  private constructor(entries: ReadonlyMap<string, LinkEntry>) {
    this.entries = entries;
  }

  static empty(): LinkRegistry {
    return new LinkRegistry(new Map());
  }

  get size(): number {
    return this.entries.size;
  }

  addresses(): string[] {
    return [...this.entries.keys()];
  }

  has(address: string): boolean {
    return this.entries.has(address);
  }

  get(address: string): LinkEntry | undefined {
    return this.entries.get(address);
  }

  /**
   * Link matrix stored for `address`, or an empty matrix.
   */
  matrix(address: string): LinkMatrix {
    return this.entries.get(address)?.matrix ?? [];
  }

  /**
   * Store a link, replacing any previous entry for the same address.
   */
  with(address: string, matrix: unknown, bounds: LinkBounds, subsetBy: unknown = 1): LinkRegistry {
    if (!isSubsetBy(subsetBy)) {
      throw new ExperimentError('MALFORMED_LINK', `subsetBy needs to be 1 or 2, got ${String(subsetBy)}`);
    }
    validateLinkMatrix(matrix, bounds.sampleCount, bounds.elementCount);
    const entries = new Map(this.entries);
    entries.set(address, { address, matrix: matrix.map(([sample, element]) => [sample, element] as const), subsetBy });
    return new LinkRegistry(entries);
  }

  /**
   * Registry restricted to the given addresses; all entries when omitted.
   */
  pick(addresses?: readonly string[]): LinkRegistry {
    if (addresses === undefined) return this;
    return new LinkRegistry(new Map([...this.entries].filter(([address]) => addresses.includes(address))));
  }

  [Symbol.iterator](): Iterator<LinkEntry> {
    return this.entries.values();
  }
}
