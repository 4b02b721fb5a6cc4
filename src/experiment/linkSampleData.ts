/**
 * Linking samples to elements of the experiment.
 *
 * A link is given either by explicit index pairs (`sampleIndex[i]` links to
 * `withIndex[i]` of the element at the `with` address) or by a join
 * expression matching a sample table field against a field of another slot.
 */

import { defaultSubsetBy, elementCount, isLinkable } from './collections/linkable.js';
import { getElement, parseAddress } from './ElementAddressing.js';
import { ExperimentError } from './errors.js';
import type { Experiment } from './Experiment.js';
import { isJoinExpression, joinTarget, parseJoin, resolveJoin } from './JoinResolver.js';
import { consoleDiagnosticSink, type DiagnosticSink } from './links/diagnostics.js';
import { linkMatrixFromIndices, type LinkMatrix } from './links/LinkMatrix.js';
import type { LinkRegistry } from './links/LinkRegistry.js';
import { isCollectionSlot, type SubsetBy } from './types.js';

export interface LinkSampleDataOptions {
  /** Address of the linked element, or a join expression such as `sampleData.raw_file = spectra.dataOrigin` */
  with: string;
  /** Sample indices (1-based); defaults to every sample in order */
  sampleIndex?: readonly number[];
  /** Element indices (1-based), paired position-wise with `sampleIndex` */
  withIndex?: readonly number[];
  /** Subset dimension; defaults to the one the linked collection declares */
  subsetBy?: SubsetBy;
  onDiagnostic?: DiagnosticSink;
}

/**
 * Address a link given by `withExpression` is stored under: the address
 * itself, or the target of a join expression.
 */
export function linkAddress(withExpression: string): string {
  return isJoinExpression(withExpression) ? joinTarget(parseJoin(withExpression)) : withExpression;
}

/**
 * Record a link between the samples and the element at `options.with`,
 * replacing any earlier link for the same address. An empty link leaves the
 * experiment unchanged.
 */
export function linkSampleData(experiment: Experiment, options: LinkSampleDataOptions): Experiment {
  const join = isJoinExpression(options.with) ? parseJoin(options.with) : undefined;
  if (join !== undefined && join.from.slot !== 'sampleData') {
    throw new ExperimentError(
      'UNSUPPORTED_JOIN_FORMAT',
      "a join has to be defined between 'sampleData' and another element, e.g. " +
        '"sampleData.raw_file = spectra.dataOrigin"',
    );
  }
  const target = join === undefined ? options.with : joinTarget(join);
  const { slot, field } = parseAddress(target);
  if (field !== undefined && isCollectionSlot(slot)) {
    throw new ExperimentError(
      'UNSUPPORTED_TARGET',
      `cannot link to '${target}': link the '${slot}' collection itself, its fields follow its elements`,
    );
  }

  const element = getElement(experiment, target);
  if (element === undefined) {
    throw new ExperimentError('EMPTY_TARGET', `cannot link to '${target}': element is empty or missing`);
  }
  if (!isLinkable(element)) {
    throw new ExperimentError('UNSUPPORTED_TARGET', `cannot link to '${target}': not a vector or collection`);
  }
  const subsetBy = options.subsetBy ?? defaultSubsetBy(element);
  const count = elementCount(element, subsetBy);
  if (count === 0) {
    throw new ExperimentError('EMPTY_TARGET', `cannot link to '${target}': element is empty`);
  }

  let matrix: LinkMatrix;
  if (join !== undefined) {
    matrix = resolveJoin(experiment, join);
  } else {
    if (options.withIndex === undefined) {
      throw new ExperimentError('MALFORMED_LINK', 'withIndex is required when linking by index');
    }
    const sampleIndex = options.sampleIndex ?? Array.from({ length: experiment.length }, (_, i) => i + 1);
    matrix = linkMatrixFromIndices(sampleIndex, options.withIndex);
  }
  if (matrix.length === 0) return experiment;

  const links = experiment.links.with(target, matrix, { sampleCount: experiment.length, elementCount: count }, subsetBy);

  if (subsetBy === 2) {
    const linkedColumns = new Set(matrix.map(([, column]) => column)).size;
    if (linkedColumns !== count) {
      (options.onDiagnostic ?? consoleDiagnosticSink)({
        code: 'UNALIGNED_COLUMN_LINK',
        message:
          `'${target}' has ${count} columns but the link covers ${linkedColumns}; ` +
          'unlinked columns are dropped on subsetting',
        details: { address: target, columns: count, linkedColumns },
      });
    }
  }
  return experiment.with({ links });
}

/**
 * Links of the experiment, optionally restricted to some addresses.
 */
export function sampleDataLinks(experiment: Experiment, addresses?: readonly string[]): LinkRegistry {
  return experiment.links.pick(addresses);
}
