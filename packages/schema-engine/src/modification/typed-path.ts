/**
 * Compile-time checked field paths
 *
 * `SchemaPath<T>` is the union of all paths into `T`, e.g. for
 * `Basket { fruits: FruitAmount[] }` it contains `['fruits']`,
 * `['fruits', typeof each]` and `['fruits', typeof each, 'amount']`.
 * Types are explored to a fixed depth, which keeps recursive types finite.
 */

import type { each, PathToken } from '@typedwire/core';

type Prev = [never, 0, 1, 2, 3, 4, 5, 6, 7];

/** Leaf types: they have properties but no fields on the wire */
type Opaque = Date | Uint8Array | RegExp | ((...args: never[]) => unknown);

/** Type that `each` descends into: the present value of an option, or a collection element */
export type ElementOf<T> = undefined extends T
  ? NonNullable<T>
  : null extends T
    ? NonNullable<T>
    : T extends string | Opaque
      ? never
      : T extends ReadonlyMap<unknown, infer V>
        ? V
        : T extends Iterable<infer E>
          ? E
          : T extends object
            ? string extends keyof T
              ? T[keyof T]
              : never
            : never;

/** Source field names `T` exposes as a product */
export type FieldKeys<T> = undefined extends T
  ? never
  : null extends T
    ? never
    : T extends Opaque | Iterable<unknown> | ReadonlyMap<unknown, unknown>
      ? never
      : T extends object
        ? string extends keyof T
          ? never
          : keyof T & string
        : never;

type EachPath<T, D extends number> = [ElementOf<T>] extends [never]
  ? never
  : [typeof each, ...SchemaPath<ElementOf<T>, Prev[D]>];

type FieldPaths<T, D extends number> = {
  [K in FieldKeys<T>]: K extends keyof T ? [K, ...SchemaPath<T[K], Prev[D]>] : never;
}[FieldKeys<T>];

export type SchemaPath<T, D extends number = 6> = unknown extends T
  ? PathToken[]
  : [D] extends [never]
    ? []
    : [] | EachPath<T, D> | FieldPaths<T, D>;

/** Type of the node a path points at */
export type AtPath<T, P> = P extends []
  ? T
  : P extends [typeof each, ...infer Rest]
    ? AtPath<ElementOf<T>, Rest>
    : P extends [infer K, ...infer Rest]
      ? K extends keyof T
        ? AtPath<T[K], Rest>
        : unknown
      : unknown;
