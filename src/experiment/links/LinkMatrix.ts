/**
 * Link matrices: ordered (sample index, element index) pairs recording one
 * relationship between the sample table and a linked collection.
 *
 * Both columns are 1-based. Duplicates in either column express 1:n, n:1
 * and n:m relationships; an empty matrix means nothing is linked.
 */

import { ExperimentError } from '../errors.js';

export type LinkPair = readonly [sample: number, element: number];

export type LinkMatrix = readonly LinkPair[];

export type LinkCardinality = '1:1' | '1:n' | 'n:1' | 'n:m';

const MALFORMED_MESSAGE = 'link matrix needs to be a two-column matrix of integers';

export function emptyLinkMatrix(): LinkMatrix {
  return [];
}

/**
 * Validate shape, content and bounds of a link matrix.
 *
 * @param maxFrom - number of samples; sample indices must not exceed it
 * @param maxTo - number of elements; element indices must not exceed it
 */
export function validateLinkMatrix(
  value: unknown,
  maxFrom = Number.POSITIVE_INFINITY,
  maxTo = Number.POSITIVE_INFINITY,
): asserts value is LinkMatrix {
  if (!Array.isArray(value)) {
    throw new ExperimentError('MALFORMED_LINK', MALFORMED_MESSAGE);
  }
  const rows: unknown[] = value;
  for (const row of rows) {
    if (!Array.isArray(row)) {
      throw new ExperimentError('MALFORMED_LINK', MALFORMED_MESSAGE);
    }
    const cells: unknown[] = row;
    if (!cells.every((cell) => typeof cell === 'number' && Number.isInteger(cell))) {
      throw new ExperimentError('MALFORMED_LINK', MALFORMED_MESSAGE);
    }
    if (cells.length !== 2) {
      throw new ExperimentError('MALFORMED_LINK', `link matrix needs to have exactly 2 columns, got ${cells.length}`);
    }
  }
  for (const row of rows) {
    if (!isLinkPair(row)) continue;
    const [sample, element] = row;
    if (sample < 1 || element < 1) {
      throw new ExperimentError('OUT_OF_RANGE_LINK', 'link indices must not be smaller than 1');
    }
    if (sample > maxFrom) {
      throw new ExperimentError('OUT_OF_RANGE_LINK', `sample indices need to be <= ${maxFrom}`);
    }
    if (element > maxTo) {
      throw new ExperimentError('OUT_OF_RANGE_LINK', `element indices need to be <= ${maxTo}`);
    }
  }
}

function isLinkPair(row: unknown): row is LinkPair {
  return Array.isArray(row) && row.length === 2 && typeof row[0] === 'number' && typeof row[1] === 'number';
}

/**
 * Combine sample and element indices column-wise, one row per position.
 */
export function linkMatrixFromIndices(sampleIndex: readonly number[], withIndex: readonly number[]): LinkMatrix {
  if (sampleIndex.length !== withIndex.length) {
    throw new ExperimentError(
      'MALFORMED_LINK',
      `sampleIndex and withIndex need to have the same length (${sampleIndex.length} vs ${withIndex.length})`,
    );
  }
  return sampleIndex.map((sample, i): LinkPair => [sample, withIndex[i] ?? Number.NaN]);
}

/**
 * Link every position of `fromKeys` to every position of `toKeys` holding an
 * equal value. Rows are ordered by `from` position, then by `to` position.
 * Missing keys (null, undefined, NaN) never match.
 */
export function buildLinkMatrix(fromKeys: readonly unknown[], toKeys: readonly unknown[]): LinkMatrix {
  const positions = new Map<string, number[]>();
  toKeys.forEach((value, j) => {
    const key = matchKey(value);
    if (key === undefined) return;
    const bucket = positions.get(key);
    if (bucket) {
      bucket.push(j + 1);
    } else {
      positions.set(key, [j + 1]);
    }
  });

  const pairs: LinkPair[] = [];
  fromKeys.forEach((value, i) => {
    const key = matchKey(value);
    if (key === undefined) return;
    for (const j of positions.get(key) ?? []) {
      pairs.push([i + 1, j]);
    }
  });
  return pairs;
}

function matchKey(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'number') return Number.isNaN(value) ? undefined : `n:${value}`;
  if (typeof value === 'string') return `s:${value}`;
  if (typeof value === 'boolean' || typeof value === 'bigint') return `${typeof value}:${String(value)}`;
  return `j:${JSON.stringify(value)}`;
}

/**
 * Element indices per sample index, in row order.
 */
export function elementsBySample(matrix: LinkMatrix): Map<number, number[]> {
  const grouped = new Map<number, number[]>();
  for (const [sample, element] of matrix) {
    const bucket = grouped.get(sample);
    if (bucket) {
      bucket.push(element);
    } else {
      grouped.set(sample, [element]);
    }
  }
  return grouped;
}

export function linkCardinality(matrix: LinkMatrix): LinkCardinality {
  const samples = new Set(matrix.map(([sample]) => sample));
  const elements = new Set(matrix.map(([, element]) => element));
  const samplesRepeat = samples.size < matrix.length;
  const elementsRepeat = elements.size < matrix.length;
  if (samplesRepeat && elementsRepeat) return 'n:m';
  if (samplesRepeat) return '1:n';
  if (elementsRepeat) return 'n:1';
  return '1:1';
}
