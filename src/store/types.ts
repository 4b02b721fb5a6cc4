/**
 * Types for the Experiment Store.
 *
 * The store keeps experiments in memory under generated ids. It has no
 * linking logic of its own; experiments are immutable values and every
 * change is stored as a new version under the same id.
 */

import type { Experiment } from '../experiment/Experiment.js';

/**
 * A stored experiment.
 */
export interface ExperimentRecord {
  /** Store id, e.g. EXP-000001 */
  id: string;
  /** Optional display name */
  name?: string;
  /** Id of the experiment this one was derived from (subsetting) */
  derivedFrom?: string;
  experiment: Experiment;
  createdAt: string;
  updatedAt: string;
}

/**
 * Filter options for listing experiments.
 */
export interface ExperimentFilter {
  /** Maximum records to return */
  limit?: number;
  /** Offset for pagination */
  offset?: number;
}

/**
 * Options for creating an experiment record.
 */
export interface CreateExperimentOptions {
  experiment: Experiment;
  name?: string;
  derivedFrom?: string;
}

/**
 * ExperimentStore interface.
 */
export interface ExperimentStore {
  /**
   * Get an experiment by id.
   */
  get(id: string): Promise<ExperimentRecord | null>;

  /**
   * List experiments in creation order.
   */
  list(filter?: ExperimentFilter): Promise<ExperimentRecord[]>;

  /**
   * Store a new experiment under a fresh id.
   */
  create(options: CreateExperimentOptions): Promise<ExperimentRecord>;

  /**
   * Replace the experiment stored under `id`; null when there is none.
   */
  update(id: string, experiment: Experiment): Promise<ExperimentRecord | null>;

  /**
   * Delete an experiment. Returns whether it existed.
   */
  delete(id: string): Promise<boolean>;

  /**
   * Number of stored experiments.
   */
  count(): Promise<number>;
}

/**
 * Configuration for ExperimentStore.
 */
export interface ExperimentStoreConfig {
  /** Id prefix (default: 'EXP') */
  idPrefix?: string;
  /** Clock used for timestamps (default: current time) */
  now?: () => Date;
}
