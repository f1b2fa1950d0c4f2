/**
 * Schema types describing the wire shape of a type
 */

import type { Validator } from './validator.js';

export type PrimitiveKind =
  | 'string'
  | 'integer'
  | 'number'
  | 'boolean'
  | 'binary'
  | 'date'
  | 'datetime'
  | 'uuid'
  | 'unknown';

export interface PrimitiveType {
  kind: 'primitive';
  primitive: PrimitiveKind;
}

export interface ArrayType {
  kind: 'array';
  element: Schema;
}

export interface OptionType {
  kind: 'option';
  element: Schema;
}

/** String-keyed open product; every value shares one schema */
export interface MapType {
  kind: 'map';
  value: Schema;
}

export interface ProductField {
  /** Field name on the in-memory type */
  readonly name: string;
  /** Field name on the wire */
  readonly encodedName: string;
  readonly schema: Schema;
}

export interface ProductType {
  kind: 'product';
  fields: readonly ProductField[];
}

export interface CoproductVariant {
  /** Value of the discriminator field identifying this variant, if any */
  readonly discriminatorValue?: string;
  readonly schema: Schema;
}

/** Maps an in-memory instance to the discriminator value of its variant */
export interface VariantMatcher {
  match(value: unknown): string | undefined;
}

export interface CoproductType {
  kind: 'coproduct';
  variants: readonly CoproductVariant[];
  /** Name of the field carrying the discriminator value */
  discriminator?: string;
  matcher?: VariantMatcher;
}

/** Placeholder pointing at a named schema elsewhere in the tree */
export interface RefType {
  kind: 'ref';
  name: string;
}

export type SchemaType =
  | PrimitiveType
  | ArrayType
  | OptionType
  | MapType
  | ProductType
  | CoproductType
  | RefType;

export type SchemaKind = SchemaType['kind'];

export interface SchemaDefault {
  value: unknown;
  /** Wire representation of the default, when it differs from `value` */
  encoded?: unknown;
}

export interface SchemaMetadata {
  /** Type identity; named products and coproducts can be referenced */
  readonly name?: string;
  readonly description?: string;
  readonly default?: SchemaDefault;
  readonly encodedExample?: unknown;
  readonly format?: string;
  readonly deprecated: boolean;
  /** Documentation collaborators omit hidden nodes */
  readonly hidden: boolean;
  readonly validators: readonly Validator[];
}

export interface Schema<T = unknown> extends SchemaMetadata {
  readonly type: SchemaType;
  /** Phantom marker for the modelled type; never present at run time */
  readonly _type?: T;
}
