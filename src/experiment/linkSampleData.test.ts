import { describe, expect, it, vi } from 'vitest';
import { setElement } from './ElementAddressing.js';
import type { LinkDiagnostic } from './links/diagnostics.js';
import { linkSampleData, sampleDataLinks } from './linkSampleData.js';
import { linkedQcExperiment, qcExperiment, thrown } from './testing.js';

describe('linkSampleData', () => {
  const experiment = qcExperiment();

  it('links by explicit indices', () => {
    const result = linkSampleData(experiment, {
      with: 'experimentFiles.annotations',
      sampleIndex: [1, 2],
      withIndex: [1, 1],
    });
    expect(result.links.get('experimentFiles.annotations')).toEqual({
      address: 'experimentFiles.annotations',
      matrix: [[1, 1], [2, 1]],
      subsetBy: 1,
    });
    expect(experiment.links.size).toBe(0);
  });

  it('pairs every sample in order when sampleIndex is omitted', () => {
    const result = linkSampleData(experiment, { with: 'experimentFiles.mzML_file', withIndex: [2, 1] });
    expect(result.links.matrix('experimentFiles.mzML_file')).toEqual([[1, 2], [2, 1]]);
  });

  it('links by join expression and stores the link under the collection slot', () => {
    const result = linkSampleData(experiment, { with: 'sampleData.mzML_file = spectra.dataOrigin' });
    expect(result.links.addresses()).toEqual(['spectra']);
    expect(result.links.matrix('spectra')).toEqual([[1, 1], [1, 2], [1, 3], [2, 4], [2, 5]]);
  });

  it('stores joins on list slots under the joined field', () => {
    const withNames = setElement(experiment, 'metadata.sample_names', ['QC2', 'QC1', 'QC2']);
    const result = linkSampleData(withNames, { with: 'sampleData.sample = metadata.sample_names' });
    expect(result.links.matrix('metadata.sample_names')).toEqual([[1, 2], [2, 1], [2, 3]]);
  });

  it('replaces an earlier link for the same address', () => {
    const first = linkSampleData(experiment, { with: 'experimentFiles.mzML_file', withIndex: [1, 2] });
    const second = linkSampleData(first, { with: 'experimentFiles.mzML_file', sampleIndex: [1], withIndex: [2] });
    expect(second.links.size).toBe(1);
    expect(second.links.matrix('experimentFiles.mzML_file')).toEqual([[1, 2]]);
  });

  it('returns the experiment unchanged when a join matches nothing', () => {
    const result = linkSampleData(experiment, { with: 'sampleData.sample = spectra.dataOrigin' });
    expect(result).toBe(experiment);
  });

  it('requires joins to start from the sample table', () => {
    const error = thrown(() => linkSampleData(experiment, { with: 'spectra.dataOrigin = sampleData.mzML_file' }));
    expect(error).toMatchObject({ code: 'UNSUPPORTED_JOIN_FORMAT' });
  });

  it('rejects malformed join expressions', () => {
    for (const join of ['sampleData.mzML_file == spectra.dataOrigin', 'sampleData = spectra.dataOrigin']) {
      expect(thrown(() => linkSampleData(experiment, { with: join }))).toMatchObject({
        code: 'UNSUPPORTED_JOIN_FORMAT',
      });
    }
  });

  it('rejects unknown slots', () => {
    expect(thrown(() => linkSampleData(experiment, { with: 'other.thing', withIndex: [1] }))).toMatchObject({
      code: 'UNKNOWN_SLOT',
    });
  });

  it('rejects missing and empty targets', () => {
    expect(thrown(() => linkSampleData(experiment, { with: 'metadata.nothing', withIndex: [1] }))).toMatchObject({
      code: 'EMPTY_TARGET',
    });
    const withEmpty = setElement(experiment, 'metadata.empty', []);
    expect(thrown(() => linkSampleData(withEmpty, { with: 'metadata.empty', withIndex: [1] }))).toMatchObject({
      code: 'EMPTY_TARGET',
    });
  });

  it('rejects targets that are neither vectors nor collections', () => {
    const withText = setElement(experiment, 'metadata.note', 'text');
    expect(thrown(() => linkSampleData(withText, { with: 'metadata.note', withIndex: [1] }))).toMatchObject({
      code: 'UNSUPPORTED_TARGET',
    });
  });

  it('rejects fields inside collection slots', () => {
    for (const address of ['spectra.rtime', 'sampleData.sample', 'qdata.sample']) {
      expect(
        thrown(() => linkSampleData(experiment, { with: address, sampleIndex: [1, 2], withIndex: [1, 1] })),
      ).toMatchObject({ code: 'UNSUPPORTED_TARGET' });
    }
    expect(experiment.links.size).toBe(0);
  });

  it('requires withIndex when linking by index', () => {
    expect(thrown(() => linkSampleData(experiment, { with: 'experimentFiles.mzML_file' }))).toMatchObject({
      code: 'MALFORMED_LINK',
    });
  });

  it('rejects indices beyond the samples or elements', () => {
    expect(
      thrown(() => linkSampleData(experiment, { with: 'experimentFiles.mzML_file', withIndex: [1, 3] })),
    ).toMatchObject({ code: 'OUT_OF_RANGE_LINK', message: 'element indices need to be <= 2' });
    expect(
      thrown(() =>
        linkSampleData(experiment, { with: 'experimentFiles.mzML_file', sampleIndex: [3], withIndex: [1] }),
      ),
    ).toMatchObject({ code: 'OUT_OF_RANGE_LINK', message: 'sample indices need to be <= 2' });
  });

  it('rejects column-wise links to one-dimensional elements', () => {
    expect(
      thrown(() =>
        linkSampleData(experiment, { with: 'experimentFiles.mzML_file', withIndex: [1, 2], subsetBy: 2 }),
      ),
    ).toMatchObject({ code: 'MALFORMED_LINK' });
  });

  it('reports column links that leave columns unlinked', () => {
    const diagnostics: LinkDiagnostic[] = [];
    const withTable = setElement(
      experiment,
      'otherData.table',
      setElement(qcExperiment(), 'sampleData.extra', 1).sampleData,
    );
    linkSampleData(withTable, {
      with: 'otherData.table',
      sampleIndex: [1],
      withIndex: [1],
      subsetBy: 2,
      onDiagnostic: (diagnostic) => diagnostics.push(diagnostic),
    });
    expect(diagnostics).toEqual([
      {
        code: 'UNALIGNED_COLUMN_LINK',
        message: "'otherData.table' has 3 columns but the link covers 1; unlinked columns are dropped on subsetting",
        details: { address: 'otherData.table', columns: 3, linkedColumns: 1 },
      },
    ]);
  });

  it('warns through the console by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    linkSampleData(setElement(experiment, 'otherData.table', experiment.sampleData), {
      with: 'otherData.table',
      withIndex: [1, 1],
      subsetBy: 2,
    });
    expect(warn).toHaveBeenCalledWith(
      "[UNALIGNED_COLUMN_LINK] 'otherData.table' has 2 columns but the link covers 1; unlinked columns are dropped on subsetting",
    );
    warn.mockRestore();
  });
});

describe('sampleDataLinks', () => {
  const experiment = linkedQcExperiment();

  it('returns every link by default', () => {
    expect(sampleDataLinks(experiment).addresses()).toEqual([
      'experimentFiles.annotations',
      'experimentFiles.mzML_file',
      'spectra',
      'metadata.multivals',
      'metadata.df',
    ]);
  });

  it('restricts the links to the requested addresses', () => {
    const links = sampleDataLinks(experiment, ['spectra', 'metadata.missing']);
    expect(links.addresses()).toEqual(['spectra']);
  });
});
