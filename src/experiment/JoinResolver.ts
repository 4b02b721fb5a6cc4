/**
 * Join expressions: `<slot>.<field> = <slot>.<field>`.
 *
 * Resolving a join matches the values of the two fields and links every
 * pair of positions holding equal values.
 */

import { isCollection } from './collections/linkable.js';
import { getElement } from './ElementAddressing.js';
import { ExperimentError } from './errors.js';
import type { Experiment } from './Experiment.js';
import { buildLinkMatrix, type LinkMatrix } from './links/LinkMatrix.js';
import { isCollectionSlot } from './types.js';

export interface JoinSide {
  slot: string;
  field: string;
}

export interface JoinExpression {
  from: JoinSide;
  to: JoinSide;
}

const JOIN_PATTERN = /^\s*([^\s=]+)\s*=\s*([^\s=]+)\s*$/;

export function parseJoin(expression: string): JoinExpression {
  const [, left, right] = JOIN_PATTERN.exec(expression) ?? [];
  const from = left === undefined ? undefined : splitSide(left);
  const to = right === undefined ? undefined : splitSide(right);
  if (from === undefined || to === undefined) {
    throw new ExperimentError(
      'UNSUPPORTED_JOIN_FORMAT',
      `unsupported format for join '${expression}'; expected "<slot>.<field> = <slot>.<field>"`,
    );
  }
  return { from, to };
}

function splitSide(side: string): JoinSide | undefined {
  const dot = side.indexOf('.');
  if (dot <= 0 || dot === side.length - 1) return undefined;
  return { slot: side.slice(0, dot), field: side.slice(dot + 1) };
}

export function isJoinExpression(value: string): boolean {
  return value.includes('=');
}

/**
 * Address the link resolved from `join` is stored under.
 */
export function joinTarget(join: JoinExpression): string {
  return isCollectionSlot(join.to.slot) ? join.to.slot : `${join.to.slot}.${join.to.field}`;
}

export function resolveJoin(experiment: Experiment, expression: string | JoinExpression): LinkMatrix {
  const join = typeof expression === 'string' ? parseJoin(expression) : expression;
  const fromKeys = joinValues(experiment, join.from);
  const toKeys = joinValues(experiment, join.to);
  return buildLinkMatrix(fromKeys, toKeys);
}

function joinValues(experiment: Experiment, side: JoinSide): readonly unknown[] {
  const address = `${side.slot}.${side.field}`;
  const value = getElement(experiment, address);
  if (value === undefined) return [];
  if (Array.isArray(value)) return value;
  const kind = isCollection(value) ? value.kind : typeof value;
  throw new ExperimentError('UNSUPPORTED_TARGET', `join field '${address}' needs to be a vector, got ${kind}`);
}
