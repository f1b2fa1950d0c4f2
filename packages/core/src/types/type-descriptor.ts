/**
 * Type descriptors
 *
 * Structural description of a type supplied by the caller. The derivation
 * engine reads these instead of reflecting over values.
 */

import type { Annotations } from './annotations.js';
import type { PrimitiveKind, SchemaDefault } from './schema.js';

interface DescriptorBase<T> {
  /** Type-level metadata overlaid on the derived schema */
  readonly annotations?: Annotations;
  /** Phantom marker for the described type; never present at run time */
  readonly _type?: T;
}

export interface PrimitiveDescriptor<T = unknown> extends DescriptorBase<T> {
  readonly kind: 'primitive';
  readonly primitive: PrimitiveKind;
  /** Named primitives (enumerations, branded strings) can be overridden in a registry */
  readonly name?: string;
}

export interface ArrayDescriptor<T = unknown> extends DescriptorBase<T> {
  readonly kind: 'array';
  readonly element: TypeDescriptor;
}

export interface OptionDescriptor<T = unknown> extends DescriptorBase<T> {
  readonly kind: 'option';
  readonly element: TypeDescriptor;
}

export interface MapDescriptor<T = unknown> extends DescriptorBase<T> {
  readonly kind: 'map';
  readonly value: TypeDescriptor;
}

export interface FieldDescriptor {
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly default?: SchemaDefault;
  readonly annotations?: Annotations;
}

export interface ProductDescriptor<T = unknown> extends DescriptorBase<T> {
  readonly kind: 'product';
  readonly name: string;
  readonly fields: readonly FieldDescriptor[];
}

export interface VariantDescriptor {
  /** Variant type name; the default discriminator value is derived from it */
  readonly label: string;
  readonly type: TypeDescriptor;
  /** Wire value identifying this variant, when it is fixed by the type itself */
  readonly discriminatorValue?: string;
}

export interface CoproductDescriptor<T = unknown> extends DescriptorBase<T> {
  readonly kind: 'coproduct';
  readonly name: string;
  readonly variants: readonly VariantDescriptor[];
  /** Discriminator field for this type; wins over the configured one */
  readonly discriminator?: string;
}

/** A type with no structural description; only a registered schema can stand for it */
export interface OpaqueDescriptor<T = unknown> extends DescriptorBase<T> {
  readonly kind: 'opaque';
  readonly name: string;
}

/** Deferred binding, used to describe self-referential types */
export interface LazyDescriptor<T = unknown> extends DescriptorBase<T> {
  readonly kind: 'lazy';
  readonly resolve: () => TypeDescriptor<T>;
}

export type TypeDescriptor<T = unknown> =
  | PrimitiveDescriptor<T>
  | ArrayDescriptor<T>
  | OptionDescriptor<T>
  | MapDescriptor<T>
  | ProductDescriptor<T>
  | CoproductDescriptor<T>
  | OpaqueDescriptor<T>
  | LazyDescriptor<T>;

export type DescriptorKind = TypeDescriptor['kind'];
