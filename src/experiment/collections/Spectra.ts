/**
 * One-dimensional collection of spectra.
 *
 * Only the spectra variables are modelled; peak data, backends and filtering
 * belong to the spectral-data layer that feeds this collection. Variables are
 * the fields used as join keys (e.g. `dataOrigin`).
 */

import { ExperimentError } from '../errors.js';
import type { SubsetBy } from '../types.js';
import { DataTable, type DataRow } from './DataTable.js';
import type { NamedCollection } from './types.js';

export class Spectra implements NamedCollection<Spectra> {
  readonly kind = 'spectra';
  readonly dimensions = 1;
  readonly defaultSubsetBy: SubsetBy = 1;
  private readonly variables: DataTable;

  private constructor(variables: DataTable) {
    this.variables = variables;
  }

  static empty(): Spectra {
    return new Spectra(DataTable.empty());
  }

  static fromVariables(variables: Record<string, readonly unknown[]>): Spectra {
    return new Spectra(DataTable.fromColumns(variables));
  }

  static fromRecords(records: readonly DataRow[]): Spectra {
    return new Spectra(DataTable.fromRows(records));
  }

  length(dimension: SubsetBy = 1): number {
    if (dimension === 2) {
      throw new ExperimentError('MALFORMED_LINK', 'spectra can only be subset along dimension 1');
    }
    return this.variables.nrow;
  }

  fieldNames(): string[] {
    return this.variables.fieldNames();
  }

  getField(name: string): readonly unknown[] | undefined {
    return this.variables.getField(name);
  }

  withField(name: string, value: unknown): Spectra {
    return new Spectra(this.variables.withField(name, value));
  }

  select(offsets: readonly number[], dimension: SubsetBy = 1): Spectra {
    if (dimension === 2) {
      throw new ExperimentError('MALFORMED_LINK', 'spectra can only be subset along dimension 1');
    }
    return new Spectra(this.variables.select(offsets));
  }

  toVariables(): Record<string, unknown[]> {
    return this.variables.toColumns();
  }
}
