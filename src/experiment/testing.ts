/**
 * Shared test helpers for the experiment module.
 */

import { DataTable } from './collections/DataTable.js';
import { NamedList } from './collections/NamedList.js';
import { Spectra } from './collections/Spectra.js';
import { setElement } from './ElementAddressing.js';
import { Experiment, type FileList } from './Experiment.js';
import { linkSampleData } from './linkSampleData.js';

/**
 * Run `fn` and return what it threw.
 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}

/**
 * Two QC samples, one raw file each, five spectra (three from QC1, two from
 * QC2) and a single annotation file shared by both samples. Nothing linked.
 */
export function qcExperiment(): Experiment {
  return new Experiment({
    sampleData: DataTable.fromColumns({
      sample: ['QC1', 'QC2'],
      mzML_file: ['qc1.mzML', 'qc2.mzML'],
    }),
    experimentFiles: new NamedList<FileList>([
      ['mzML_file', ['/data/qc1.mzML', '/data/qc2.mzML']],
      ['annotations', ['/data/annotations.txt']],
    ]),
    spectra: Spectra.fromVariables({
      dataOrigin: ['qc1.mzML', 'qc1.mzML', 'qc1.mzML', 'qc2.mzML', 'qc2.mzML'],
      rtime: [1.5, 2.5, 3.5, 4.5, 5.5],
    }),
  });
}

/**
 * The QC experiment with metadata entries and links of every shape:
 * the annotation file shared by both samples, one mzML file per sample,
 * spectra joined on their data origin, an n:m character vector and a table
 * linked by rows. `metadata.not_linked` stays unlinked.
 */
export function linkedQcExperiment(): Experiment {
  let experiment = qcExperiment();
  experiment = setElement(experiment, 'metadata.multivals', ['AB', 'A', 'B']);
  experiment = setElement(experiment, 'metadata.df', DataTable.fromColumns({ a: [1, 2, 3], b: [5, 6, 7] }));
  experiment = setElement(experiment, 'metadata.not_linked', 'not linked');

  experiment = linkSampleData(experiment, {
    with: 'experimentFiles.annotations',
    sampleIndex: [1, 2],
    withIndex: [1, 1],
  });
  experiment = linkSampleData(experiment, { with: 'experimentFiles.mzML_file', withIndex: [1, 2] });
  experiment = linkSampleData(experiment, { with: 'sampleData.mzML_file = spectra.dataOrigin' });
  experiment = linkSampleData(experiment, {
    with: 'metadata.multivals',
    sampleIndex: [1, 1, 2, 2],
    withIndex: [1, 2, 1, 3],
  });
  return linkSampleData(experiment, { with: 'metadata.df', sampleIndex: [1, 2], withIndex: [1, 2] });
}
