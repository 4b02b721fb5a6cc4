import { describe, expect, it } from 'vitest';
import { DataTable } from './collections/DataTable.js';
import { NamedList } from './collections/NamedList.js';
import { formatAddress, getElement, parseAddress, setElement } from './ElementAddressing.js';
import { linkedQcExperiment, qcExperiment, thrown } from './testing.js';

describe('parseAddress', () => {
  it('splits on the first dot only', () => {
    expect(parseAddress('metadata.new_entry.dot')).toEqual({ slot: 'metadata', field: 'new_entry.dot' });
  });

  it('addresses a whole slot without a field', () => {
    expect(parseAddress('spectra')).toEqual({ slot: 'spectra', field: undefined });
  });

  it('rejects unknown slots and lists the available ones', () => {
    const error = thrown(() => parseAddress('other.x'));
    expect(error).toMatchObject({
      code: 'UNKNOWN_SLOT',
      message: "No slot named 'other' in an experiment; available slots: sampleData, experimentFiles, metadata, otherData, qdata, spectra",
    });
  });

  it('formats addresses back', () => {
    expect(formatAddress({ slot: 'metadata', field: 'a.b' })).toBe('metadata.a.b');
    expect(formatAddress({ slot: 'qdata', field: undefined })).toBe('qdata');
  });
});

describe('getElement', () => {
  const experiment = qcExperiment();

  it('reads slots and fields', () => {
    expect(getElement(experiment, 'sampleData.sample')).toEqual(['QC1', 'QC2']);
    expect(getElement(experiment, 'experimentFiles.annotations')).toEqual(['/data/annotations.txt']);
    expect(getElement(experiment, 'spectra.rtime')).toEqual([1.5, 2.5, 3.5, 4.5, 5.5]);
    expect(getElement(experiment, 'sampleData')).toBe(experiment.sampleData);
  });

  it('returns undefined for unknown fields', () => {
    expect(getElement(experiment, 'metadata.none')).toBeUndefined();
    expect(getElement(experiment, 'qdata.sample')).toBeUndefined();
    expect(getElement(experiment, 'qdata')).toBeUndefined();
  });
});

describe('setElement', () => {
  const experiment = qcExperiment();

  it('adds new fields without touching the original', () => {
    const result = setElement(experiment, 'metadata.new_entry.dot', 5);
    expect(getElement(result, 'metadata.new_entry.dot')).toBe(5);
    expect(getElement(experiment, 'metadata.new_entry.dot')).toBeUndefined();
  });

  it('recycles scalars over the sample table', () => {
    const result = setElement(experiment, 'sampleData.batch', 'b1');
    expect(getElement(result, 'sampleData.batch')).toEqual(['b1', 'b1']);
  });

  it('rejects sample table columns of the wrong length', () => {
    expect(thrown(() => setElement(experiment, 'sampleData.batch', [1, 2, 3]))).toMatchObject({
      code: 'INVALID_VALUE',
    });
  });

  it('stores file lists and wraps a single path', () => {
    const result = setElement(experiment, 'experimentFiles.fasta', '/data/db.fasta');
    expect(getElement(result, 'experimentFiles.fasta')).toEqual(['/data/db.fasta']);
    expect(thrown(() => setElement(experiment, 'experimentFiles.fasta', 5))).toMatchObject({
      code: 'INVALID_VALUE',
      message: 'experimentFiles.fasta needs to be a list of file paths',
    });
  });

  it('replaces list slots from plain records', () => {
    const result = setElement(experiment, 'metadata', { a: 1, b: ['x'] });
    expect(result.metadata).toBeInstanceOf(NamedList);
    expect(result.metadata.fieldNames()).toEqual(['a', 'b']);
    expect(getElement(result, 'metadata.b')).toEqual(['x']);
  });

  it('validates whole-slot replacements', () => {
    expect(thrown(() => setElement(experiment, 'sampleData', { sample: [] }))).toMatchObject({
      code: 'INVALID_VALUE',
      message: "'sampleData' needs to be a DataTable",
    });
    expect(thrown(() => setElement(experiment, 'spectra', []))).toMatchObject({ code: 'INVALID_VALUE' });
    expect(thrown(() => setElement(experiment, 'metadata', 'text'))).toMatchObject({ code: 'INVALID_VALUE' });
  });

  it('replaces the sample table', () => {
    const table = DataTable.fromColumns({ id: ['s1', 's2', 's3'] });
    expect(setElement(experiment, 'sampleData', table).length).toBe(3);
  });

  it('keeps links when the new sample table still covers them', () => {
    const linked = linkedQcExperiment();
    const table = DataTable.fromColumns({ id: ['s1', 's2', 's3'] });
    const result = setElement(linked, 'sampleData', table);
    expect(result.length).toBe(3);
    expect(result.links.matrix('spectra')).toEqual(linked.links.matrix('spectra'));
  });

  it('refuses a sample table that strands existing links', () => {
    const table = DataTable.fromColumns({ id: ['s1'] });
    expect(thrown(() => setElement(linkedQcExperiment(), 'sampleData', table))).toMatchObject({
      code: 'OUT_OF_RANGE_LINK',
    });
  });

  it('refuses quantification fields without quantification data', () => {
    expect(thrown(() => setElement(experiment, 'qdata.sample', ['a']))).toMatchObject({
      code: 'INVALID_VALUE',
      message: 'cannot set qdata.sample: no quantification data attached',
    });
  });
});
