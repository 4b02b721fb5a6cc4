/**
 * In-memory experiment store.
 *
 * Ids are sequential and zero-padded (EXP-000001, EXP-000002, ...) and are
 * never reused, even after a delete.
 */

import type {
  CreateExperimentOptions,
  ExperimentFilter,
  ExperimentRecord,
  ExperimentStore,
  ExperimentStoreConfig,
} from './types.js';
import type { Experiment } from '../experiment/Experiment.js';

const ID_DIGITS = 6;

export class ExperimentStoreImpl implements ExperimentStore {
  private readonly records = new Map<string, ExperimentRecord>();
  private readonly idPrefix: string;
  private readonly now: () => Date;
  private sequence = 0;

  constructor(config: ExperimentStoreConfig = {}) {
    this.idPrefix = config.idPrefix ?? 'EXP';
    this.now = config.now ?? (() => new Date());
  }

  async get(id: string): Promise<ExperimentRecord | null> {
    return this.records.get(id) ?? null;
  }

  async list(filter: ExperimentFilter = {}): Promise<ExperimentRecord[]> {
    const all = [...this.records.values()];
    const offset = filter.offset ?? 0;
    const end = filter.limit === undefined ? undefined : offset + filter.limit;
    return all.slice(offset, end);
  }

  async create(options: CreateExperimentOptions): Promise<ExperimentRecord> {
    this.sequence += 1;
    const id = `${this.idPrefix}-${String(this.sequence).padStart(ID_DIGITS, '0')}`;
    const timestamp = this.now().toISOString();
    const record: ExperimentRecord = {
      id,
      ...(options.name !== undefined ? { name: options.name } : {}),
      ...(options.derivedFrom !== undefined ? { derivedFrom: options.derivedFrom } : {}),
      experiment: options.experiment,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.records.set(id, record);
    return record;
  }

  async update(id: string, experiment: Experiment): Promise<ExperimentRecord | null> {
    const existing = this.records.get(id);
    if (existing === undefined) {
      return null;
    }
    const record: ExperimentRecord = { ...existing, experiment, updatedAt: this.now().toISOString() };
    this.records.set(id, record);
    return record;
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  async count(): Promise<number> {
    return this.records.size;
  }
}

/**
 * Create an ExperimentStore.
 */
export function createExperimentStore(config?: ExperimentStoreConfig): ExperimentStore {
  return new ExperimentStoreImpl(config);
}
