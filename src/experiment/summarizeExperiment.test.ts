import { describe, expect, it } from 'vitest';
import { Experiment } from './Experiment.js';
import { summarizeExperiment } from './summarizeExperiment.js';
import { linkedQcExperiment } from './testing.js';

describe('summarizeExperiment', () => {
  it('summarizes an empty experiment', () => {
    expect(summarizeExperiment(Experiment.empty())).toEqual({
      samples: 0,
      sampleFields: [],
      experimentFiles: {},
      spectra: 0,
      qdata: null,
      metadata: [],
      otherData: [],
      links: [],
    });
  });

  it('counts content and describes every link', () => {
    const summary = summarizeExperiment(linkedQcExperiment());
    expect(summary).toMatchObject({
      samples: 2,
      sampleFields: ['sample', 'mzML_file'],
      experimentFiles: { mzML_file: 2, annotations: 1 },
      spectra: 5,
      qdata: null,
      metadata: ['multivals', 'df', 'not_linked'],
    });
    expect(summary.links).toEqual([
      { address: 'experimentFiles.annotations', rows: 2, subsetBy: 1, cardinality: 'n:1' },
      { address: 'experimentFiles.mzML_file', rows: 2, subsetBy: 1, cardinality: '1:1' },
      { address: 'spectra', rows: 5, subsetBy: 1, cardinality: '1:n' },
      { address: 'metadata.multivals', rows: 4, subsetBy: 1, cardinality: 'n:m' },
      { address: 'metadata.df', rows: 2, subsetBy: 1, cardinality: '1:1' },
    ]);
  });
});
