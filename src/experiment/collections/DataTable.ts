/**
 * Column-oriented table of heterogeneous fields.
 *
 * Used for the sample table and for free-form tables stored in list slots.
 * Rows are the elements along dimension 1, columns along dimension 2.
 */

import { ExperimentError } from '../errors.js';
import type { SubsetBy } from '../types.js';
import { pickOffsets, uniqueNames } from './select.js';
import type { NamedCollection } from './types.js';

export type DataRow = Record<string, unknown>;

export class DataTable implements NamedCollection<DataTable> {
  readonly kind = 'table';
  readonly dimensions = 2;
  readonly defaultSubsetBy: SubsetBy = 1;
  private readonly columns: ReadonlyMap<string, readonly unknown[]>;
  private readonly rowCount: number;

  private constructor(columns: ReadonlyMap<string, readonly unknown[]>, rowCount: number) {
    this.columns = columns;
    this.rowCount = rowCount;
  }

  static empty(): DataTable {
    return new DataTable(new Map(), 0);
  }

  /**
   * A table with `rowCount` rows and no columns yet.
   */
  static blank(rowCount: number): DataTable {
    return new DataTable(new Map(), rowCount);
  }

  /**
   * Build a table from named columns. All columns must have the same length.
   */
  static fromColumns(columns: Record<string, readonly unknown[]>): DataTable {
    const entries = Object.entries(columns);
    const rowCount = entries[0]?.[1].length ?? 0;
    for (const [name, values] of entries) {
      if (values.length !== rowCount) {
        throw new ExperimentError(
          'INVALID_VALUE',
          `column '${name}' has ${values.length} values, expected ${rowCount}`,
        );
      }
    }
    return new DataTable(new Map(entries.map(([name, values]): [string, unknown[]] => [name, [...values]])), rowCount);
  }

  /**
   * Build a table from row records. Fields missing in a row are filled with null.
   */
  static fromRows(rows: readonly DataRow[]): DataTable {
    const names: string[] = [];
    for (const row of rows) {
      for (const name of Object.keys(row)) {
        if (!names.includes(name)) names.push(name);
      }
    }
    const columns = new Map<string, unknown[]>();
    for (const name of names) {
      columns.set(name, rows.map((row) => (name in row ? row[name] : null)));
    }
    return new DataTable(columns, rows.length);
  }

  get nrow(): number {
    return this.rowCount;
  }

  get ncol(): number {
    return this.columns.size;
  }

  length(dimension: SubsetBy = 1): number {
    return dimension === 2 ? this.columns.size : this.rowCount;
  }

  fieldNames(): string[] {
    return [...this.columns.keys()];
  }

  getField(name: string): readonly unknown[] | undefined {
    return this.columns.get(name);
  }

  /**
   * Set or add a column. A non-array value is recycled to every row.
   */
  withField(name: string, value: unknown): DataTable {
    const values: unknown[] = Array.isArray(value) ? [...value] : Array.from({ length: this.rowCount }, () => value);
    const rowCount = this.columns.size === 0 && this.rowCount === 0 ? values.length : this.rowCount;
    if (values.length !== rowCount) {
      throw new ExperimentError(
        'INVALID_VALUE',
        `column '${name}' needs ${rowCount} values, got ${values.length}`,
      );
    }
    const columns = new Map(this.columns);
    columns.set(name, values);
    return new DataTable(columns, rowCount);
  }

  select(offsets: readonly number[], dimension: SubsetBy = 1): DataTable {
    if (dimension === 2) {
      const entries = pickOffsets([...this.columns.entries()], offsets, 'column');
      const names = uniqueNames(entries.map(([name]) => name));
      return new DataTable(
        new Map(entries.map(([, values], i): [string, readonly unknown[]] => [names[i] ?? `V${i + 1}`, values])),
        this.rowCount,
      );
    }
    const rowOffsets = pickOffsets(Array.from({ length: this.rowCount }, (_, i) => i), offsets, 'row');
    const columns = new Map<string, unknown[]>();
    for (const [name, values] of this.columns) {
      columns.set(name, pickOffsets(values, rowOffsets, 'row'));
    }
    return new DataTable(columns, rowOffsets.length);
  }

  rows(): DataRow[] {
    return Array.from({ length: this.rowCount }, (_, i) => {
      const row: DataRow = {};
      for (const [name, values] of this.columns) {
        row[name] = values[i];
      }
      return row;
    });
  }

  toColumns(): Record<string, unknown[]> {
    const result: Record<string, unknown[]> = {};
    for (const [name, values] of this.columns) {
      result[name] = [...values];
    }
    return result;
  }
}
