/**
 * QuantTable: quantification assay with per-sample columns.
 *
 * The assay holds features in rows and samples in columns; `colData` carries
 * one row per assay column and `rowData` one row per feature. Linked samples
 * map to columns, so the default subset dimension is 2. Fields read and
 * write `colData`.
 */

import { ExperimentError } from '../errors.js';
import type { SubsetBy } from '../types.js';
import { DataTable } from './DataTable.js';
import { NumericMatrix } from './NumericMatrix.js';
import type { NamedCollection } from './types.js';

export interface QuantTableInit {
  assay: NumericMatrix;
  colData?: DataTable;
  rowData?: DataTable;
}

export class QuantTable implements NamedCollection<QuantTable> {
  readonly kind = 'quant';
  readonly dimensions = 2;
  readonly defaultSubsetBy: SubsetBy = 2;
  readonly assay: NumericMatrix;
  readonly colData: DataTable;
  readonly rowData: DataTable;

  constructor(init: QuantTableInit) {
    const colData = init.colData ?? DataTable.blank(init.assay.ncol);
    const rowData = init.rowData ?? DataTable.blank(init.assay.nrow);
    if (colData.nrow !== init.assay.ncol) {
      throw new ExperimentError(
        'INVALID_VALUE',
        `colData has ${colData.nrow} rows but the assay has ${init.assay.ncol} columns`,
      );
    }
    if (rowData.nrow !== init.assay.nrow) {
      throw new ExperimentError(
        'INVALID_VALUE',
        `rowData has ${rowData.nrow} rows but the assay has ${init.assay.nrow} rows`,
      );
    }
    this.assay = init.assay;
    this.colData = colData;
    this.rowData = rowData;
  }

  length(dimension: SubsetBy = 2): number {
    return this.assay.length(dimension);
  }

  fieldNames(): string[] {
    return this.colData.fieldNames();
  }

  getField(name: string): readonly unknown[] | undefined {
    return this.colData.getField(name);
  }

  withField(name: string, value: unknown): QuantTable {
    return new QuantTable({ assay: this.assay, colData: this.colData.withField(name, value), rowData: this.rowData });
  }

  select(offsets: readonly number[], dimension: SubsetBy = 2): QuantTable {
    if (dimension === 1) {
      return new QuantTable({
        assay: this.assay.select(offsets, 1),
        colData: this.colData,
        rowData: this.rowData.select(offsets, 1),
      });
    }
    return new QuantTable({
      assay: this.assay.select(offsets, 2),
      colData: this.colData.select(offsets, 1),
      rowData: this.rowData,
    });
  }
}
