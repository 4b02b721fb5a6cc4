/**
 * Experiment: the container relating a sample table to its linked data.
 *
 * Experiments are values: every operation that changes one returns a new
 * instance and leaves the original untouched.
 */

import { DataTable } from './collections/DataTable.js';
import { NamedList } from './collections/NamedList.js';
import type { QuantTable } from './collections/QuantTable.js';
import { Spectra } from './collections/Spectra.js';
import { LinkRegistry } from './links/LinkRegistry.js';

export type FileList = readonly string[];

export interface ExperimentParts {
  /** One row per sample; row order defines sample indices 1..n */
  sampleData: DataTable;
  /** Named lists of file paths */
  experimentFiles: NamedList<FileList>;
  /** Free-form named entries */
  metadata: NamedList;
  /** Additional named data, e.g. chromatograms or annotations */
  otherData: NamedList;
  /** Quantification assay, when one is attached */
  qdata: QuantTable | undefined;
  spectra: Spectra;
  links: LinkRegistry;
}

export class Experiment {
  readonly sampleData: DataTable;
  readonly experimentFiles: NamedList<FileList>;
  readonly metadata: NamedList;
  readonly otherData: NamedList;
  readonly qdata: QuantTable | undefined;
  readonly spectra: Spectra;
  readonly links: LinkRegistry;

  constructor(parts: Partial<ExperimentParts> = {}) {
    this.sampleData = parts.sampleData ?? DataTable.empty();
    this.experimentFiles = parts.experimentFiles ?? new NamedList<FileList>();
    this.metadata = parts.metadata ?? new NamedList();
    this.otherData = parts.otherData ?? new NamedList();
    this.qdata = parts.qdata;
    this.spectra = parts.spectra ?? Spectra.empty();
    this.links = parts.links ?? LinkRegistry.empty();
  }

  static empty(): Experiment {
    return new Experiment();
  }

  /** Number of samples. */
  get length(): number {
    return this.sampleData.nrow;
  }

  isEmpty(): boolean {
    return (
      this.sampleData.nrow === 0 &&
      this.experimentFiles.size === 0 &&
      this.metadata.size === 0 &&
      this.otherData.size === 0 &&
      this.qdata === undefined &&
      this.spectra.length() === 0
    );
  }

  parts(): ExperimentParts {
    return {
      sampleData: this.sampleData,
      experimentFiles: this.experimentFiles,
      metadata: this.metadata,
      otherData: this.otherData,
      qdata: this.qdata,
      spectra: this.spectra,
      links: this.links,
    };
  }

  with(changes: Partial<ExperimentParts>): Experiment {
    return new Experiment({ ...this.parts(), ...changes });
  }
}
