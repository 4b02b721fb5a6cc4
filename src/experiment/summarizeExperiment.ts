import type { Experiment } from './Experiment.js';
import { linkCardinality, type LinkCardinality } from './links/LinkMatrix.js';
import type { SubsetBy } from './types.js';

export interface LinkSummary {
  address: string;
  rows: number;
  subsetBy: SubsetBy;
  cardinality: LinkCardinality;
}

export interface ExperimentSummary {
  samples: number;
  sampleFields: string[];
  experimentFiles: Record<string, number>;
  spectra: number;
  qdata: { features: number; samples: number } | null;
  metadata: string[];
  otherData: string[];
  links: LinkSummary[];
}

export function summarizeExperiment(experiment: Experiment): ExperimentSummary {
  const experimentFiles: Record<string, number> = {};
  for (const name of experiment.experimentFiles.fieldNames()) {
    experimentFiles[name] = experiment.experimentFiles.getField(name)?.length ?? 0;
  }
  return {
    samples: experiment.length,
    sampleFields: experiment.sampleData.fieldNames(),
    experimentFiles,
    spectra: experiment.spectra.length(),
    qdata: experiment.qdata === undefined
      ? null
      : { features: experiment.qdata.length(1), samples: experiment.qdata.length(2) },
    metadata: experiment.metadata.fieldNames(),
    otherData: experiment.otherData.fieldNames(),
    links: [...experiment.links].map((entry) => ({
      address: entry.address,
      rows: entry.matrix.length,
      subsetBy: entry.subsetBy,
      cardinality: linkCardinality(entry.matrix),
    })),
  };
}
