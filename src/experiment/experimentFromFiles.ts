import { DataTable, type DataRow } from './collections/DataTable.js';
import { NamedList } from './collections/NamedList.js';
import { ExperimentError } from './errors.js';
import { Experiment, type FileList } from './Experiment.js';
import { linkSampleData } from './linkSampleData.js';

export const RAW_FILES_ADDRESS = 'experimentFiles.raw_files';

/**
 * One sample per data file. The files are stored as `experimentFiles.raw_files`
 * and linked 1:1 to the samples; without explicit sample rows each sample
 * only records its file name.
 */
export function experimentFromFiles(files: readonly string[], sampleRows?: readonly DataRow[]): Experiment {
  if (files.length === 0) {
    console.warn('experimentFromFiles: no files provided, returning an empty experiment');
    return Experiment.empty();
  }
  if (sampleRows !== undefined && sampleRows.length !== files.length) {
    throw new ExperimentError(
      'INVALID_VALUE',
      `number of sample rows (${sampleRows.length}) has to match the number of files (${files.length})`,
    );
  }
  const sampleData = sampleRows === undefined
    ? DataTable.fromColumns({ raw_file: [...files] })
    : DataTable.fromRows(sampleRows);
  const experimentFiles = new NamedList<FileList>([['raw_files', [...files]]]);
  const experiment = new Experiment({ sampleData, experimentFiles });
  const index = files.map((_, i) => i + 1);
  return linkSampleData(experiment, { with: RAW_FILES_ADDRESS, sampleIndex: index, withIndex: index });
}
