import { ExperimentError } from '../errors.js';
import type { SubsetBy } from '../types.js';
import { pickOffsets, uniqueNames } from './select.js';
import type { NamedCollection } from './types.js';

/**
 * Row-major numeric matrix with optional column names.
 */
export class NumericMatrix implements NamedCollection<NumericMatrix> {
  readonly kind = 'matrix';
  readonly dimensions = 2;
  readonly defaultSubsetBy: SubsetBy = 1;
  readonly colnames: readonly string[] | undefined;
  private readonly data: readonly (readonly number[])[];
  private readonly columnCount: number;

  constructor(rows: readonly (readonly number[])[], colnames?: readonly string[], ncol?: number) {
    const columnCount = rows[0]?.length ?? colnames?.length ?? ncol ?? 0;
    rows.forEach((row, i) => {
      if (row.length !== columnCount) {
        throw new ExperimentError('INVALID_VALUE', `matrix row ${i + 1} has ${row.length} values, expected ${columnCount}`);
      }
    });
    if (colnames !== undefined && colnames.length !== columnCount) {
      throw new ExperimentError('INVALID_VALUE', `matrix has ${columnCount} columns but ${colnames.length} column names`);
    }
    this.data = rows.map((row) => [...row]);
    this.colnames = colnames === undefined ? undefined : [...colnames];
    this.columnCount = columnCount;
  }

  get nrow(): number {
    return this.data.length;
  }

  get ncol(): number {
    return this.columnCount;
  }

  length(dimension: SubsetBy = 1): number {
    return dimension === 2 ? this.columnCount : this.data.length;
  }

  fieldNames(): string[] {
    return this.colnames === undefined ? [] : [...this.colnames];
  }

  getField(name: string): number[] | undefined {
    const index = this.colnames?.indexOf(name) ?? -1;
    return index < 0 ? undefined : this.column(index);
  }

  withField(name: string, value: unknown): NumericMatrix {
    const candidates: unknown[] = Array.isArray(value) ? [...value] : Array.from({ length: this.nrow }, () => value);
    const values = candidates.filter((v): v is number => typeof v === 'number');
    if (values.length !== candidates.length || values.length !== this.nrow) {
      throw new ExperimentError('INVALID_VALUE', `matrix column '${name}' needs ${this.nrow} numbers`);
    }
    const names = this.colnames ?? Array.from({ length: this.columnCount }, (_, i) => `V${i + 1}`);
    const index = names.indexOf(name);
    if (index < 0) {
      return new NumericMatrix(
        this.data.map((row, i) => [...row, values[i] ?? Number.NaN]),
        [...names, name],
      );
    }
    return new NumericMatrix(
      this.data.map((row, i) => row.map((cell, j) => (j === index ? values[i] ?? Number.NaN : cell))),
      names,
    );
  }

  column(index: number): number[] {
    return this.data.map((row) => row[index] ?? Number.NaN);
  }

  select(offsets: readonly number[], dimension: SubsetBy = 1): NumericMatrix {
    if (dimension === 2) {
      const columns = pickOffsets(Array.from({ length: this.columnCount }, (_, i) => i), offsets, 'column');
      const colnames = this.colnames === undefined
        ? undefined
        : uniqueNames(pickOffsets(this.colnames, columns, 'column'));
      return new NumericMatrix(
        this.data.map((row) => pickOffsets(row, columns, 'column')),
        colnames,
        columns.length,
      );
    }
    return new NumericMatrix(pickOffsets(this.data, offsets, 'row'), this.colnames, this.columnCount);
  }

  toRows(): number[][] {
    return this.data.map((row) => [...row]);
  }
}
