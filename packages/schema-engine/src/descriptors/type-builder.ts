/**
 * Type descriptor builder
 *
 * Describes types explicitly so the derivation engine never has to reflect
 * over values. Field maps are checked against the described type:
 *
 * @example
 * ```ts
 * interface FruitAmount { fruit: string; amount: number }
 * const FruitAmount = t.product<FruitAmount>('FruitAmount', {
 *   fruit: t.string(),
 *   amount: t.integer(),
 * });
 * ```
 */

import type {
  Annotations,
  ArrayDescriptor,
  CoproductDescriptor,
  EnumerationValue,
  FieldDescriptor,
  LazyDescriptor,
  MapDescriptor,
  OpaqueDescriptor,
  OptionDescriptor,
  PrimitiveDescriptor,
  PrimitiveKind,
  ProductDescriptor,
  TypeDescriptor,
  VariantDescriptor,
} from '@typedwire/core';
import { Validators } from '@typedwire/core';

/** Field declared with a default value or field-level annotations */
export interface FieldSpec<V> {
  type: TypeDescriptor<V>;
  default?: V;
  /** Wire form of the default, when it differs from `default` */
  encodedDefault?: unknown;
  annotations?: Annotations;
}

export type FieldInput<V> = TypeDescriptor<V> | FieldSpec<V>;

export type ProductFields<T> = { [K in keyof T]-?: FieldInput<T[K]> };

/** Descriptors that carry their own type name */
export type NamedDescriptor<T> = ProductDescriptor<T> | CoproductDescriptor<T> | OpaqueDescriptor<T>;

export interface LabelledVariant<T> {
  label: string;
  type: TypeDescriptor<T>;
  discriminatorValue?: string;
}

export type VariantInput<T> = NamedDescriptor<T> | LabelledVariant<T>;

function isFieldSpec<V>(input: FieldInput<V>): input is FieldSpec<V> {
  return !('kind' in input);
}

function toField(name: string, input: FieldInput<unknown>): FieldDescriptor {
  if (!isFieldSpec(input)) {
    return { name, type: input };
  }

  const field: FieldDescriptor = {
    name,
    type: input.type,
    ...(input.annotations ? { annotations: input.annotations } : {}),
  };
  if (input.default === undefined && input.encodedDefault === undefined) {
    return field;
  }
  return {
    ...field,
    default:
      input.encodedDefault === undefined
        ? { value: input.default }
        : { value: input.default, encoded: input.encodedDefault },
  };
}

function toVariant(input: VariantInput<unknown>): VariantDescriptor {
  if ('label' in input) {
    return input.discriminatorValue !== undefined
      ? { label: input.label, type: input.type, discriminatorValue: input.discriminatorValue }
      : { label: input.label, type: input.type };
  }
  return { label: input.name, type: input };
}

function primitiveOf<T>(primitive: PrimitiveKind): PrimitiveDescriptor<T> {
  return { kind: 'primitive', primitive };
}

function enumerationKind(values: readonly EnumerationValue[]): PrimitiveKind {
  if (values.length > 0 && values.every((v) => typeof v === 'boolean')) return 'boolean';
  if (values.length > 0 && values.every((v) => typeof v === 'number')) {
    return values.every((v) => Number.isInteger(v)) ? 'integer' : 'number';
  }
  return 'string';
}

export const t = {
  string: (): PrimitiveDescriptor<string> => primitiveOf('string'),
  integer: (): PrimitiveDescriptor<number> => primitiveOf('integer'),
  number: (): PrimitiveDescriptor<number> => primitiveOf('number'),
  boolean: (): PrimitiveDescriptor<boolean> => primitiveOf('boolean'),
  binary: (): PrimitiveDescriptor<Uint8Array> => primitiveOf('binary'),
  date: (): PrimitiveDescriptor<Date> => primitiveOf('date'),
  datetime: (): PrimitiveDescriptor<Date> => primitiveOf('datetime'),
  uuid: (): PrimitiveDescriptor<string> => primitiveOf('uuid'),
  unknown: (): PrimitiveDescriptor<unknown> => primitiveOf('unknown'),

  /**
   * Named primitive restricted to a fixed set of values
   */
  enumeration<V extends EnumerationValue>(name: string, values: readonly V[]): PrimitiveDescriptor<V> {
    return {
      kind: 'primitive',
      primitive: enumerationKind(values),
      name,
      annotations: { validator: Validators.enumeration(values) },
    };
  },

  array<E>(element: TypeDescriptor<E>): ArrayDescriptor<E[]> {
    return { kind: 'array', element };
  },

  optional<E>(element: TypeDescriptor<E>): OptionDescriptor<E | undefined> {
    return { kind: 'option', element };
  },

  map<V>(value: TypeDescriptor<V>): MapDescriptor<Record<string, V>> {
    return { kind: 'map', value };
  },

  product<T>(name: string, fields: ProductFields<T> & Record<string, FieldInput<unknown>>, annotations?: Annotations): ProductDescriptor<T> {
    return {
      kind: 'product',
      name,
      fields: Object.entries(fields).map(([fieldName, input]) => toField(fieldName, input)),
      ...(annotations ? { annotations } : {}),
    };
  },

  coproduct<T>(name: string, variants: ReadonlyArray<VariantInput<T>>, annotations?: Annotations): CoproductDescriptor<T> {
    return {
      kind: 'coproduct',
      name,
      variants: variants.map(toVariant),
      ...(annotations ? { annotations } : {}),
    };
  },

  /**
   * Type with no structural description. Derivation needs a registered schema for it.
   */
  opaque<T>(name: string): OpaqueDescriptor<T> {
    return { kind: 'opaque', name };
  },

  /**
   * Deferred binding for self-referential types
   *
   * @example
   * ```ts
   * interface TreeNode { children: TreeNode[] }
   * const TreeNode: TypeDescriptor<TreeNode> = t.product<TreeNode>('TreeNode', {
   *   children: t.array(t.lazy(() => TreeNode)),
   * });
   * ```
   */
  lazy<T>(resolve: () => TypeDescriptor<T>): LazyDescriptor<T> {
    return { kind: 'lazy', resolve };
  },

  field<V>(type: TypeDescriptor<V>, options: Omit<FieldSpec<V>, 'type'> = {}): FieldSpec<V> {
    return { ...options, type };
  },

  /**
   * Same descriptor with type-level annotations merged in
   */
  annotate<D extends TypeDescriptor<unknown>>(descriptor: D, annotations: Annotations): D {
    return { ...descriptor, annotations: { ...(descriptor.annotations ?? {}), ...annotations } };
  },
} as const;

/**
 * Name identifying a descriptor in a schema registry, if it has one
 */
export function descriptorName(descriptor: TypeDescriptor): string | undefined {
  switch (descriptor.kind) {
    case 'product':
    case 'coproduct':
    case 'opaque':
      return descriptor.name;
    case 'primitive':
      return descriptor.name;
    case 'array':
    case 'option':
    case 'map':
    case 'lazy':
      return undefined;
  }
}

/**
 * Re-type a descriptor assembled from untyped parts (adapters, generated descriptions)
 */
export function descriptorOf<T>(descriptor: TypeDescriptor): TypeDescriptor<T> {
  switch (descriptor.kind) {
    case 'primitive': {
      const { _type: _untyped, ...rest } = descriptor;
      return rest;
    }
    case 'array': {
      const { _type: _untyped, ...rest } = descriptor;
      return rest;
    }
    case 'option': {
      const { _type: _untyped, ...rest } = descriptor;
      return rest;
    }
    case 'map': {
      const { _type: _untyped, ...rest } = descriptor;
      return rest;
    }
    case 'product': {
      const { _type: _untyped, ...rest } = descriptor;
      return rest;
    }
    case 'coproduct': {
      const { _type: _untyped, ...rest } = descriptor;
      return rest;
    }
    case 'opaque': {
      const { _type: _untyped, ...rest } = descriptor;
      return rest;
    }
    case 'lazy': {
      const resolve = descriptor.resolve;
      return { kind: 'lazy', resolve: () => descriptorOf<T>(resolve()), ...(descriptor.annotations ? { annotations: descriptor.annotations } : {}) };
    }
  }
}
