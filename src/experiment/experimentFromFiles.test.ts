import { describe, expect, it, vi } from 'vitest';
import { experimentFromFiles, RAW_FILES_ADDRESS } from './experimentFromFiles.js';
import { getElement } from './ElementAddressing.js';
import { extractSamples } from './SampleSubsetter.js';
import { thrown } from './testing.js';

describe('experimentFromFiles', () => {
  it('creates one sample per file linked 1:1', () => {
    const experiment = experimentFromFiles(['/data/a.mzML', '/data/b.mzML']);
    expect(experiment.sampleData.toColumns()).toEqual({ raw_file: ['/data/a.mzML', '/data/b.mzML'] });
    expect(getElement(experiment, RAW_FILES_ADDRESS)).toEqual(['/data/a.mzML', '/data/b.mzML']);
    expect(experiment.links.matrix(RAW_FILES_ADDRESS)).toEqual([[1, 1], [2, 2]]);
  });

  it('uses the given sample rows', () => {
    const experiment = experimentFromFiles(['a.mzML', 'b.mzML'], [{ sample: 'A', group: 'x' }, { sample: 'B' }]);
    expect(experiment.sampleData.toColumns()).toEqual({ sample: ['A', 'B'], group: ['x', null] });
    expect(getElement(extractSamples(experiment, [2]), RAW_FILES_ADDRESS)).toEqual(['b.mzML']);
  });

  it('requires one sample row per file', () => {
    expect(thrown(() => experimentFromFiles(['a.mzML', 'b.mzML'], [{ sample: 'A' }]))).toMatchObject({
      code: 'INVALID_VALUE',
      message: 'number of sample rows (1) has to match the number of files (2)',
    });
  });

  it('warns and returns an empty experiment without files', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const experiment = experimentFromFiles([]);
    expect(experiment.isEmpty()).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
