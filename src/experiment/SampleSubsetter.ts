/**
 * Sample subsetting.
 *
 * Selecting samples subsets the sample table and every linked element
 * together, rewriting each link so it refers to the new sample and element
 * order. Elements shared by several selected samples are duplicated (subsetBy
 * 1) or selected once (subsetBy 2); elements no selected sample links to are
 * dropped. Unlinked elements are carried over as they are.
 */

import { elementCount, isLinkable, selectElements, type Linkable } from './collections/linkable.js';
import { getElement, parseAddress, setElement } from './ElementAddressing.js';
import { ExperimentError } from './errors.js';
import type { Experiment } from './Experiment.js';
import { elementsBySample, type LinkMatrix, type LinkPair } from './links/LinkMatrix.js';
import { LinkRegistry, type LinkEntry } from './links/LinkRegistry.js';
import { resolveSelector, type SampleSelector } from './selectors.js';
import { isCollectionSlot, type SubsetBy } from './types.js';

interface SubsetPlan {
  /** 0-based offsets into the linked element */
  offsets: number[];
  matrix: LinkMatrix;
}

/**
 * Experiment restricted to the samples at `indices` (1-based, in that order,
 * repeats allowed).
 */
export function extractSamples(experiment: Experiment, indices: readonly number[]): Experiment {
  assertSampleIndices(indices, experiment.length);

  let result = experiment.with({ sampleData: experiment.sampleData.select(indices.map((index) => index - 1)) });
  let links = LinkRegistry.empty();
  for (const entry of experiment.links) {
    const element = linkedElement(experiment, entry);
    const plan = entry.subsetBy === 2 ? planByColumn(entry.matrix, indices) : planByConcatenation(entry.matrix, indices);
    const subset = selectElements(element, plan.offsets, entry.subsetBy);
    result = setElement(result, entry.address, subset);
    links = links.with(
      entry.address,
      plan.matrix,
      { sampleCount: indices.length, elementCount: elementCount(subset, entry.subsetBy) },
      entry.subsetBy,
    );
  }
  return result.with({ links });
}

/**
 * Positional sample selection: resolves negative indices and logical masks,
 * then extracts the selected samples.
 */
export function subsetSamples(experiment: Experiment, selector: SampleSelector): Experiment {
  return extractSamples(experiment, resolveSelector(selector, experiment.length));
}

/**
 * Subset a single linked element by its own 1-based indices (e.g. filtered
 * spectra) and rewrite its link. The sample table is left unchanged.
 */
export function selectLinkedElements(experiment: Experiment, address: string, indices: readonly number[]): Experiment {
  const { slot, field } = parseAddress(address);
  if (slot === 'sampleData' || (field !== undefined && isCollectionSlot(slot))) {
    throw new ExperimentError(
      'UNSUPPORTED_TARGET',
      `'${address}' cannot be subset on its own; select samples or the whole '${slot}' collection instead`,
    );
  }
  const entry = experiment.links.get(address);
  const element = getElement(experiment, address);
  if (!isLinkable(element)) {
    throw new ExperimentError('UNSUPPORTED_TARGET', `'${address}' is not a vector or collection`);
  }
  const subsetBy: SubsetBy = entry?.subsetBy ?? 1;
  const available = elementCount(element, subsetBy);
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 1 || index > available) {
      throw new ExperimentError('INVALID_SELECTION', `element index ${index} is out of range 1..${available}`);
    }
  }
  const subset = selectElements(element, indices.map((index) => index - 1), subsetBy);
  const updated = setElement(experiment, address, subset);
  if (entry === undefined) return updated;

  const positions = new Map<number, number[]>();
  indices.forEach((index, position) => {
    const bucket = positions.get(index);
    if (bucket) {
      bucket.push(position + 1);
    } else {
      positions.set(index, [position + 1]);
    }
  });
  const matrix: LinkPair[] = [];
  for (const [sample, previous] of entry.matrix) {
    for (const position of positions.get(previous) ?? []) {
      matrix.push([sample, position]);
    }
  }
  const links = experiment.links.with(
    address,
    matrix,
    { sampleCount: experiment.length, elementCount: indices.length },
    subsetBy,
  );
  return updated.with({ links });
}

/**
 * Subset the spectra and keep the spectra link consistent.
 */
export function filterSpectra(experiment: Experiment, indices: readonly number[]): Experiment {
  return selectLinkedElements(experiment, 'spectra', indices);
}

function assertSampleIndices(indices: readonly number[], sampleCount: number): void {
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 1 || index > sampleCount) {
      throw new ExperimentError('INVALID_SELECTION', `sample index ${index} is out of range 1..${sampleCount}`);
    }
  }
}

function linkedElement(experiment: Experiment, entry: LinkEntry): Linkable {
  const element = getElement(experiment, entry.address);
  if (!isLinkable(element)) {
    throw new ExperimentError('UNSUPPORTED_TARGET', `linked element '${entry.address}' is missing or not linkable`);
  }
  const available = elementCount(element, entry.subsetBy);
  for (const [, index] of entry.matrix) {
    if (index > available) {
      throw new ExperimentError(
        'OUT_OF_RANGE_LINK',
        `link for '${entry.address}' refers to element ${index} but only ${available} exist`,
      );
    }
  }
  return element;
}

/**
 * One copy of the referenced element per matching link row, sample by sample.
 */
function planByConcatenation(matrix: LinkMatrix, indices: readonly number[]): SubsetPlan {
  const bySample = elementsBySample(matrix);
  const offsets: number[] = [];
  const pairs: LinkPair[] = [];
  indices.forEach((sample, k) => {
    for (const element of bySample.get(sample) ?? []) {
      offsets.push(element - 1);
      pairs.push([k + 1, offsets.length]);
    }
  });
  return { offsets, matrix: pairs };
}

/**
 * Each referenced column once, in order of first reference.
 */
function planByColumn(matrix: LinkMatrix, indices: readonly number[]): SubsetPlan {
  const bySample = elementsBySample(matrix);
  const positions = new Map<number, number>();
  const pairs: LinkPair[] = [];
  indices.forEach((sample, k) => {
    for (const column of bySample.get(sample) ?? []) {
      let position = positions.get(column);
      if (position === undefined) {
        position = positions.size + 1;
        positions.set(column, position);
      }
      pairs.push([k + 1, position]);
    }
  });
  return { offsets: [...positions.keys()].map((column) => column - 1), matrix: pairs };
}
