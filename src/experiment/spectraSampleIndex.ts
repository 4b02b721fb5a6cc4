import type { Experiment } from './Experiment.js';
import { allOwners, firstOwner, type FirstOwnerOptions } from './links/SampleIndexLookup.js';

export type SampleIndexMode = 'first' | 'all';

export const SPECTRA_ADDRESS = 'spectra';

/**
 * Sample index of every spectrum according to the `spectra` link.
 *
 * In 'first' mode each spectrum gets the first linked sample or null; in
 * 'all' mode the set of every linked sample.
 */
export function spectraSampleIndex(
  experiment: Experiment,
  mode?: 'first',
  options?: FirstOwnerOptions,
): Array<number | null>;
export function spectraSampleIndex(
  experiment: Experiment,
  mode: 'all',
  options?: FirstOwnerOptions,
): Array<Set<number>>;
export function spectraSampleIndex(
  experiment: Experiment,
  mode: SampleIndexMode,
  options?: FirstOwnerOptions,
): Array<number | null> | Array<Set<number>>;
export function spectraSampleIndex(
  experiment: Experiment,
  mode: SampleIndexMode = 'first',
  options: FirstOwnerOptions = {},
): Array<number | null> | Array<Set<number>> {
  const matrix = experiment.links.matrix(SPECTRA_ADDRESS);
  const count = experiment.spectra.length();
  return mode === 'all' ? allOwners(matrix, count) : firstOwner(matrix, count, options);
}
