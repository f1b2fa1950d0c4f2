/**
 * Schema constructors
 *
 * Every constructor returns a frozen value. Malformed input (duplicate field
 * names, duplicate discriminator values) fails immediately.
 */

import { SchemaConstructionError } from '../errors/index.js';
import type {
  CoproductVariant,
  PrimitiveKind,
  ProductField,
  Schema,
  SchemaMetadata,
  SchemaType,
  Validator,
  VariantMatcher,
} from '../types/index.js';

const NO_VALIDATORS: readonly Validator[] = Object.freeze([]);

/** Formats implied by a primitive kind */
const DEFAULT_FORMATS: Partial<Record<PrimitiveKind, string>> = {
  binary: 'binary',
  date: 'date',
  datetime: 'date-time',
  uuid: 'uuid',
};

export function createSchema<T = unknown>(type: SchemaType, metadata: Partial<SchemaMetadata> = {}): Schema<T> {
  return Object.freeze({
    deprecated: false,
    hidden: false,
    validators: NO_VALIDATORS,
    ...metadata,
    type: Object.freeze(type),
  });
}

export function primitive<T = unknown>(kind: PrimitiveKind): Schema<T> {
  const format = DEFAULT_FORMATS[kind];
  return createSchema({ kind: 'primitive', primitive: kind }, format ? { format } : {});
}

export function array<T = unknown>(element: Schema<T>): Schema<T[]> {
  return createSchema({ kind: 'array', element });
}

export function optional<T = unknown>(element: Schema<T>): Schema<T | undefined> {
  return createSchema({ kind: 'option', element });
}

export function map<T = unknown>(value: Schema<T>): Schema<Record<string, T>> {
  return createSchema({ kind: 'map', value });
}

export function ref<T = unknown>(name: string): Schema<T> {
  return createSchema({ kind: 'ref', name });
}

export interface ProductFieldInput {
  name: string;
  schema: Schema;
  /** Defaults to `name` */
  encodedName?: string;
}

export interface ProductOptions {
  name?: string;
}

export function field(name: string, schema: Schema, encodedName?: string): ProductField {
  return Object.freeze({ name, encodedName: encodedName ?? name, schema });
}

export function product<T = unknown>(fields: readonly ProductFieldInput[], options: ProductOptions = {}): Schema<T> {
  const normalized = fields.map((f) => field(f.name, f.schema, f.encodedName));
  assertUniqueFields(normalized, options.name);
  return createSchema(
    { kind: 'product', fields: Object.freeze(normalized) },
    options.name !== undefined ? { name: options.name } : {}
  );
}

export interface CoproductVariantInput {
  schema: Schema;
  discriminatorValue?: string;
}

export interface CoproductOptions {
  name?: string;
  /** Field carrying the discriminator value; every variant then needs a value */
  discriminator?: string;
  matcher?: VariantMatcher;
}

export function coproduct<T = unknown>(
  variants: readonly CoproductVariantInput[],
  options: CoproductOptions = {}
): Schema<T> {
  const normalized: CoproductVariant[] = variants.map((v) =>
    Object.freeze(
      v.discriminatorValue !== undefined
        ? { discriminatorValue: v.discriminatorValue, schema: v.schema }
        : { schema: v.schema }
    )
  );
  assertValidVariants(normalized, options);

  const type: SchemaType = {
    kind: 'coproduct',
    variants: Object.freeze(normalized),
    ...(options.discriminator !== undefined ? { discriminator: options.discriminator } : {}),
    ...(options.matcher ? { matcher: options.matcher } : {}),
  };
  return createSchema(type, options.name !== undefined ? { name: options.name } : {});
}

function assertUniqueFields(fields: readonly ProductField[], productName?: string): void {
  const names = new Set<string>();
  const encodedNames = new Set<string>();
  const owner = productName ? ` in product '${productName}'` : '';

  for (const f of fields) {
    if (names.has(f.name)) {
      throw new SchemaConstructionError(`Duplicate field name '${f.name}'${owner}`, {
        field: f.name,
        product: productName,
      });
    }
    if (encodedNames.has(f.encodedName)) {
      throw new SchemaConstructionError(
        `Duplicate encoded field name '${f.encodedName}'${owner}`,
        { field: f.name, encodedName: f.encodedName, product: productName },
        'Give the clashing fields distinct encodedName annotations or use another naming policy.'
      );
    }
    names.add(f.name);
    encodedNames.add(f.encodedName);
  }
}

function assertValidVariants(variants: readonly CoproductVariant[], options: CoproductOptions): void {
  const seen = new Set<string>();
  const owner = options.name ? ` in coproduct '${options.name}'` : '';

  for (const [i, variant] of variants.entries()) {
    const value = variant.discriminatorValue;
    if (value === undefined) {
      if (options.discriminator !== undefined) {
        throw new SchemaConstructionError(
          `Variant #${i}${owner} has no value for discriminator '${options.discriminator}'`,
          { variant: variant.schema.name ?? i, discriminator: options.discriminator }
        );
      }
      continue;
    }
    if (seen.has(value)) {
      throw new SchemaConstructionError(`Duplicate discriminator value '${value}'${owner}`, {
        discriminatorValue: value,
        coproduct: options.name,
      });
    }
    seen.add(value);
  }
}

export function stringSchema(): Schema<string> {
  return primitive('string');
}

export function integerSchema(): Schema<number> {
  return primitive('integer');
}

export function numberSchema(): Schema<number> {
  return primitive('number');
}

export function booleanSchema(): Schema<boolean> {
  return primitive('boolean');
}

export function binarySchema(): Schema<Uint8Array> {
  return primitive('binary');
}

export function dateSchema(): Schema<Date> {
  return primitive('date');
}

export function dateTimeSchema(): Schema<Date> {
  return primitive('datetime');
}

export function uuidSchema(): Schema<string> {
  return primitive('uuid');
}

export function unknownSchema(): Schema<unknown> {
  return primitive('unknown');
}
