/**
 * Loading experiment documents from a directory at startup.
 */

import { readdir, readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { decodeExperiment } from '../experiment/ExperimentCodec.js';
import type { ExperimentRecord, ExperimentStore } from './types.js';

/**
 * Decode every `*.json` file in `dir` (sorted by name) and store it, named
 * after the file. A file that fails to parse or decode aborts the seeding
 * with an error naming it.
 */
export async function seedExperiments(store: ExperimentStore, dir: string): Promise<ExperimentRecord[]> {
  const entries = await readdir(dir);
  const files = entries.filter((entry) => extname(entry) === '.json').sort();
  const seeded: ExperimentRecord[] = [];
  for (const file of files) {
    const path = join(dir, file);
    try {
      const json: unknown = JSON.parse(await readFile(path, 'utf-8'));
      seeded.push(await store.create({ experiment: decodeExperiment(json), name: basename(file, '.json') }));
    } catch (err) {
      throw new Error(`Failed to load experiment from ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return seeded;
}
