/**
 * JSON document form of an experiment.
 *
 * Tables and matrices inside list slots are tagged objects
 * (`{ type: 'table', columns }`, `{ type: 'matrix', rows }`); any other JSON
 * value is stored as is. Row counts travel beside the columns (`samples`,
 * a table's `nrow`) so tables without columns keep their rows. Links are
 * validated against the decoded content.
 */

import { z } from 'zod';
import { DataTable } from './collections/DataTable.js';
import { defaultSubsetBy, elementCount, isLinkable } from './collections/linkable.js';
import { NamedList } from './collections/NamedList.js';
import { NumericMatrix } from './collections/NumericMatrix.js';
import { QuantTable } from './collections/QuantTable.js';
import { Spectra } from './collections/Spectra.js';
import { getElement } from './ElementAddressing.js';
import { ExperimentError } from './errors.js';
import { Experiment, type FileList } from './Experiment.js';

const columnsSchema = z.record(z.string(), z.array(z.unknown()));

const matrixSchema = z.object({
  type: z.literal('matrix'),
  rows: z.array(z.array(z.number())),
  colnames: z.array(z.string()).optional(),
  ncol: z.number().int().nonnegative().optional(),
});

const tableSchema = z.object({
  type: z.literal('table'),
  columns: columnsSchema,
  nrow: z.number().int().nonnegative().optional(),
});

const spectraSchema = z.object({
  type: z.literal('spectra'),
  variables: columnsSchema,
});

const quantSchema = z.object({
  type: z.literal('quant'),
  assay: matrixSchema.omit({ type: true }),
  colData: columnsSchema.optional(),
  rowData: columnsSchema.optional(),
});

const taggedElementSchema = z.discriminatedUnion('type', [tableSchema, matrixSchema, spectraSchema, quantSchema]);

export const experimentDocumentSchema = z.object({
  samples: z.number().int().nonnegative().optional(),
  sampleData: columnsSchema.optional(),
  experimentFiles: z.record(z.string(), z.array(z.string())).optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
  otherData: z.record(z.string(), z.unknown()).optional(),
  qdata: quantSchema.omit({ type: true }).optional(),
  spectra: columnsSchema.optional(),
  links: z
    .array(
      z.object({
        address: z.string().min(1),
        pairs: z.array(z.tuple([z.number().int(), z.number().int()])),
        subsetBy: z.union([z.literal(1), z.literal(2)]).optional(),
      }),
    )
    .optional(),
});

export type ExperimentDocument = z.infer<typeof experimentDocumentSchema>;

type TaggedElement = z.infer<typeof taggedElementSchema>;
type QuantDocument = Omit<z.infer<typeof quantSchema>, 'type'>;

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function decodeExperiment(json: unknown): Experiment {
  const parsed = experimentDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new ExperimentError('INVALID_VALUE', `invalid experiment document: ${formatZodError(parsed.error)}`);
  }
  const document = parsed.data;

  let experiment = new Experiment({
    sampleData: decodeTable(document.sampleData ?? {}, document.samples),
    experimentFiles: NamedList.fromRecord<FileList>(document.experimentFiles ?? {}),
    metadata: decodeList(document.metadata ?? {}),
    otherData: decodeList(document.otherData ?? {}),
    qdata: document.qdata === undefined ? undefined : decodeQuant(document.qdata),
    spectra: Spectra.fromVariables(document.spectra ?? {}),
  });

  let links = experiment.links;
  for (const link of document.links ?? []) {
    const element = getElement(experiment, link.address);
    if (!isLinkable(element)) {
      throw new ExperimentError('UNSUPPORTED_TARGET', `link '${link.address}' does not address a vector or collection`);
    }
    const subsetBy = link.subsetBy ?? defaultSubsetBy(element);
    links = links.with(
      link.address,
      link.pairs,
      { sampleCount: experiment.length, elementCount: elementCount(element, subsetBy) },
      subsetBy,
    );
  }
  experiment = experiment.with({ links });
  return experiment;
}

export function encodeExperiment(experiment: Experiment): ExperimentDocument {
  return {
    samples: experiment.length,
    sampleData: experiment.sampleData.toColumns(),
    experimentFiles: Object.fromEntries(
      experiment.experimentFiles
        .fieldNames()
        .map((name): [string, string[]] => [name, [...(experiment.experimentFiles.getField(name) ?? [])]]),
    ),
    metadata: encodeList(experiment.metadata),
    otherData: encodeList(experiment.otherData),
    ...(experiment.qdata ? { qdata: encodeQuant(experiment.qdata) } : {}),
    spectra: experiment.spectra.toVariables(),
    links: [...experiment.links].map((entry) => ({
      address: entry.address,
      pairs: entry.matrix.map(([sample, element]): [number, number] => [sample, element]),
      subsetBy: entry.subsetBy,
    })),
  };
}

/**
 * Decode one list-slot value, turning tagged objects into collections.
 */
export function decodeElement(value: unknown): unknown {
  const tagged = taggedElementSchema.safeParse(value);
  if (!tagged.success) return value;
  return decodeTagged(tagged.data);
}

export function encodeElement(value: unknown): unknown {
  if (value instanceof DataTable) {
    return { type: 'table', columns: value.toColumns(), ...(value.ncol === 0 ? { nrow: value.nrow } : {}) };
  }
  if (value instanceof NumericMatrix) return { type: 'matrix', ...encodeMatrix(value) };
  if (value instanceof Spectra) return { type: 'spectra', variables: value.toVariables() };
  if (value instanceof QuantTable) return { type: 'quant', ...encodeQuant(value) };
  if (value instanceof NamedList) return encodeList(value);
  return value;
}

function decodeTagged(element: TaggedElement): unknown {
  switch (element.type) {
    case 'table':
      return decodeTable(element.columns, element.nrow);
    case 'matrix':
      return new NumericMatrix(element.rows, element.colnames, element.ncol);
    case 'spectra':
      return Spectra.fromVariables(element.variables);
    case 'quant':
      return decodeQuant(element);
  }
}

function decodeTable(columns: Record<string, unknown[]>, rowCount: number | undefined): DataTable {
  if (rowCount === undefined) return DataTable.fromColumns(columns);
  const table = Object.entries(columns).reduce(
    (result, [name, values]) => result.withField(name, values),
    DataTable.blank(rowCount),
  );
  if (table.nrow !== rowCount) {
    throw new ExperimentError('INVALID_VALUE', `table declares ${rowCount} rows but its columns hold ${table.nrow}`);
  }
  return table;
}

function decodeQuant(document: QuantDocument): QuantTable {
  const assay = new NumericMatrix(document.assay.rows, document.assay.colnames, document.assay.ncol);
  return new QuantTable({
    assay,
    ...(hasColumns(document.colData) ? { colData: DataTable.fromColumns(document.colData) } : {}),
    ...(hasColumns(document.rowData) ? { rowData: DataTable.fromColumns(document.rowData) } : {}),
  });
}

function hasColumns(columns: Record<string, unknown[]> | undefined): columns is Record<string, unknown[]> {
  return columns !== undefined && Object.keys(columns).length > 0;
}

function encodeMatrix(matrix: NumericMatrix): { rows: number[][]; colnames?: string[]; ncol: number } {
  return {
    rows: matrix.toRows(),
    ...(matrix.colnames ? { colnames: [...matrix.colnames] } : {}),
    ncol: matrix.ncol,
  };
}

function encodeQuant(quant: QuantTable): QuantDocument {
  return {
    assay: encodeMatrix(quant.assay),
    colData: quant.colData.toColumns(),
    rowData: quant.rowData.toColumns(),
  };
}

function decodeList(record: Record<string, unknown>): NamedList {
  return new NamedList(Object.entries(record).map(([name, value]): [string, unknown] => [name, decodeElement(value)]));
}

function encodeList(list: NamedList<unknown>): Record<string, unknown> {
  return Object.fromEntries(list.fieldNames().map((name): [string, unknown] => [name, encodeElement(list.getField(name))]));
}
