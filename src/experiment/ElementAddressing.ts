/**
 * Element addressing: resolve `slot` / `slot.field` strings against an experiment.
 *
 * Only the first dot separates the slot from the field, so field names may
 * contain dots themselves (`metadata.new_entry.dot`). Every slot kind has an
 * accessor in SLOT_ACCESSORS; an address naming anything else is an
 * UNKNOWN_SLOT error, while an unknown field simply resolves to undefined.
 */

import { DataTable } from './collections/DataTable.js';
import { NamedList } from './collections/NamedList.js';
import { QuantTable } from './collections/QuantTable.js';
import { Spectra } from './collections/Spectra.js';
import { ExperimentError } from './errors.js';
import type { Experiment, FileList } from './Experiment.js';
import { isSlotKind, SLOT_KINDS, type SlotKind } from './types.js';

export interface ElementAddress {
  slot: SlotKind;
  /** Field within the slot; undefined addresses the whole slot */
  field: string | undefined;
}

interface SlotAccessor {
  read(experiment: Experiment): unknown;
  write(experiment: Experiment, value: unknown): Experiment;
  readField(experiment: Experiment, name: string): unknown;
  writeField(experiment: Experiment, name: string, value: unknown): Experiment;
}

export function parseAddress(address: string): ElementAddress {
  const dot = address.indexOf('.');
  const slot = dot < 0 ? address : address.slice(0, dot);
  const field = dot < 0 ? '' : address.slice(dot + 1);
  if (!isSlotKind(slot)) {
    throw new ExperimentError(
      'UNKNOWN_SLOT',
      `No slot named '${slot}' in an experiment; available slots: ${SLOT_KINDS.join(', ')}`,
    );
  }
  return { slot, field: field.length > 0 ? field : undefined };
}

export function formatAddress(address: ElementAddress): string {
  return address.field === undefined ? address.slot : `${address.slot}.${address.field}`;
}

/**
 * Read the slot or field at `address`. Unknown fields yield undefined.
 */
export function getElement(experiment: Experiment, address: string): unknown {
  const { slot, field } = parseAddress(address);
  const accessor = SLOT_ACCESSORS[slot];
  return field === undefined ? accessor.read(experiment) : accessor.readField(experiment, field);
}

/**
 * Write `value` as the whole slot or as one of its fields, creating the
 * field when it does not exist yet.
 */
export function setElement(experiment: Experiment, address: string, value: unknown): Experiment {
  const { slot, field } = parseAddress(address);
  const accessor = SLOT_ACCESSORS[slot];
  return field === undefined ? accessor.write(experiment, value) : accessor.writeField(experiment, field, value);
}

function invalid(slot: SlotKind, expected: string): ExperimentError {
  return new ExperimentError('INVALID_VALUE', `'${slot}' needs to be ${expected}`);
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

function toFileList(value: unknown, name: string): FileList {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) {
    const entries: unknown[] = value;
    const paths = entries.filter((entry): entry is string => typeof entry === 'string');
    if (paths.length === entries.length) return paths;
  }
  throw new ExperimentError('INVALID_VALUE', `experimentFiles.${name} needs to be a list of file paths`);
}

function toNamedList(slot: SlotKind, value: unknown): NamedList {
  if (value instanceof NamedList) {
    const list = value;
    return new NamedList(list.fieldNames().map((name): [string, unknown] => [name, list.getField(name)]));
  }
  if (isPlainRecord(value)) return NamedList.fromRecord(value);
  throw invalid(slot, 'a named list');
}

/**
 * Links recorded so far have to stay valid against a replacement sample table.
 */
function assertLinksFit(experiment: Experiment, table: DataTable): void {
  for (const entry of experiment.links) {
    const elementCount = entry.address === 'sampleData' ? table.length(entry.subsetBy) : Infinity;
    for (const [sample, element] of entry.matrix) {
      if (sample > table.nrow || element > elementCount) {
        throw new ExperimentError(
          'OUT_OF_RANGE_LINK',
          `cannot replace the sample table: link for '${entry.address}' refers to sample ${sample} ` +
            `but the new table has ${table.nrow} rows`,
        );
      }
    }
  }
}

const SLOT_ACCESSORS: Record<SlotKind, SlotAccessor> = {
  sampleData: {
    read: (experiment) => experiment.sampleData,
    write: (experiment, value) => {
      if (!(value instanceof DataTable)) throw invalid('sampleData', 'a DataTable');
      assertLinksFit(experiment, value);
      return experiment.with({ sampleData: value });
    },
    readField: (experiment, name) => experiment.sampleData.getField(name),
    writeField: (experiment, name, value) =>
      experiment.with({ sampleData: experiment.sampleData.withField(name, value) }),
  },

  experimentFiles: {
    read: (experiment) => experiment.experimentFiles,
    write: (experiment, value) => {
      const list = toNamedList('experimentFiles', value);
      return experiment.with({
        experimentFiles: new NamedList(
          list.fieldNames().map((name): [string, FileList] => [name, toFileList(list.getField(name), name)]),
        ),
      });
    },
    readField: (experiment, name) => experiment.experimentFiles.getField(name),
    writeField: (experiment, name, value) =>
      experiment.with({ experimentFiles: experiment.experimentFiles.withField(name, toFileList(value, name)) }),
  },

  metadata: {
    read: (experiment) => experiment.metadata,
    write: (experiment, value) => experiment.with({ metadata: toNamedList('metadata', value) }),
    readField: (experiment, name) => experiment.metadata.getField(name),
    writeField: (experiment, name, value) => experiment.with({ metadata: experiment.metadata.withField(name, value) }),
  },

  otherData: {
    read: (experiment) => experiment.otherData,
    write: (experiment, value) => experiment.with({ otherData: toNamedList('otherData', value) }),
    readField: (experiment, name) => experiment.otherData.getField(name),
    writeField: (experiment, name, value) =>
      experiment.with({ otherData: experiment.otherData.withField(name, value) }),
  },

  qdata: {
    read: (experiment) => experiment.qdata,
    write: (experiment, value) => {
      if (value === undefined || value instanceof QuantTable) return experiment.with({ qdata: value });
      throw invalid('qdata', 'a QuantTable');
    },
    readField: (experiment, name) => experiment.qdata?.getField(name),
    writeField: (experiment, name, value) => {
      if (experiment.qdata === undefined) {
        throw new ExperimentError('INVALID_VALUE', `cannot set qdata.${name}: no quantification data attached`);
      }
      return experiment.with({ qdata: experiment.qdata.withField(name, value) });
    },
  },

  spectra: {
    read: (experiment) => experiment.spectra,
    write: (experiment, value) => {
      if (!(value instanceof Spectra)) throw invalid('spectra', 'a Spectra collection');
      return experiment.with({ spectra: value });
    },
    readField: (experiment, name) => experiment.spectra.getField(name),
    writeField: (experiment, name, value) => experiment.with({ spectra: experiment.spectra.withField(name, value) }),
  },
};
