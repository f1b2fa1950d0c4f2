/**
 * Field path construction and formatting
 */

import type { FieldPath, FieldPathSegment } from '../types/index.js';

/** Path token descending into the element schema of a collection, option or custom container */
export const each: unique symbol = Symbol('typedwire.each');

export type PathToken = string | typeof each;

export function toSegment(token: PathToken): FieldPathSegment {
  return typeof token === 'string' ? { kind: 'field', name: token } : { kind: 'each' };
}

export function fieldPath(...tokens: PathToken[]): FieldPath {
  return tokens.map(toSegment);
}

/** `['fruits', each, 'amount']` -> `fruits.each.amount` */
export function formatFieldPath(path: FieldPath): string {
  return path.map((s) => (s.kind === 'field' ? s.name : 'each')).join('.');
}
