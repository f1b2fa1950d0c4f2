/**
 * Discriminated coproduct construction
 */

import type { CoproductVariant, Schema, VariantMatcher } from '@typedwire/core';
import { coproduct, product, SchemaConstructionError, withType } from '@typedwire/core';

export interface OneOfOptions {
  /** Schema name of the coproduct */
  name?: string;
}

/**
 * Coproduct whose variants are told apart by the value of one field.
 *
 * Each `[value, schema]` pair of `mapping` becomes a variant identified by
 * `asString(value)`. The schema carries a matcher that maps an instance to
 * its discriminator value through `extractor`, so collaborators can pick the
 * variant of a concrete value.
 *
 * @example
 * ```ts
 * const shape = oneOfUsingField(
 *   'kind',
 *   (s: Shape) => s.kind,
 *   (k) => k.toLowerCase(),
 *   [['CIRCLE', circleSchema], ['SQUARE', squareSchema]]
 * );
 * ```
 */
export function oneOfUsingField<T, V>(
  fieldName: string,
  extractor: (instance: T) => V,
  asString: (value: V) => string,
  mapping: ReadonlyArray<readonly [V, Schema]>,
  options: OneOfOptions = {}
): Schema<T> {
  const matcher: VariantMatcher = {
    match: (instance: T) => asString(extractor(instance)),
  };

  return coproduct<T>(
    mapping.map(([value, schema]) => ({ schema, discriminatorValue: asString(value) })),
    { ...options, discriminator: fieldName, matcher }
  );
}

export interface WrappedVariant {
  /** Name of the single field wrapping the variant */
  label: string;
  schema: Schema;
}

export interface OneOfWrappedOptions extends OneOfOptions {
  matcher?: VariantMatcher;
}

/**
 * Coproduct using the wrapper-object encoding: every variant is a single-field
 * product `{ [label]: variant }`. The label doubles as the variant's value.
 */
export function oneOfWrapped<T>(variants: readonly WrappedVariant[], options: OneOfWrappedOptions = {}): Schema<T> {
  return coproduct<T>(
    variants.map((v) => ({
      schema: product([{ name: v.label, schema: v.schema }]),
      discriminatorValue: v.label,
    })),
    options
  );
}

/**
 * Attach a discriminator field to a coproduct that has none. Variant schemas,
 * the matcher and the coproduct's own metadata are kept as they are.
 *
 * @param mapping discriminator value -> variant schema name; when omitted each
 * variant's schema name is its value
 * @throws SchemaConstructionError for a non-coproduct, a coproduct that already
 * has a discriminator, or a mapping that does not cover the variants one to one
 */
export function addDiscriminatorField<T>(
  fieldName: string,
  schema: Schema<T>,
  mapping?: Readonly<Record<string, string>>
): Schema<T> {
  const type = schema.type;
  if (type.kind !== 'coproduct') {
    throw new SchemaConstructionError(`Cannot add discriminator '${fieldName}' to a ${type.kind} schema`, {
      discriminator: fieldName,
      kind: type.kind,
    });
  }
  if (type.discriminator !== undefined) {
    throw new SchemaConstructionError(
      `Coproduct${schema.name ? ` '${schema.name}'` : ''} already has discriminator '${type.discriminator}'`,
      { discriminator: fieldName, existing: type.discriminator },
      'Derive the coproduct without a configured discriminator, or keep the existing one.'
    );
  }

  const values = valuesByVariantName(type.variants, mapping ?? identityMapping(type.variants));
  const variants = type.variants.map((variant) => {
    const variantName = variant.schema.name ?? '';
    const value = values.get(variantName);
    if (value === undefined) {
      throw new SchemaConstructionError(
        `No discriminator value for variant '${variant.schema.name ?? '<unnamed>'}'`,
        { discriminator: fieldName, variant: variant.schema.name }
      );
    }
    return { schema: variant.schema, discriminatorValue: value };
  });

  // Rebuilt through the builder for its checks, then put back on the original node
  const rebuilt = coproduct(variants, {
    discriminator: fieldName,
    ...(type.matcher ? { matcher: type.matcher } : {}),
  });
  return withType(schema, rebuilt.type);
}

function identityMapping(variants: readonly CoproductVariant[]): Record<string, string> {
  const mapping: Record<string, string> = {};
  for (const [i, variant] of variants.entries()) {
    const name = variant.schema.name;
    if (name === undefined) {
      throw new SchemaConstructionError(
        `Variant #${i} has no schema name; pass an explicit mapping`,
        { variant: i }
      );
    }
    mapping[name] = name;
  }
  return mapping;
}

function valuesByVariantName(
  variants: readonly CoproductVariant[],
  mapping: Readonly<Record<string, string>>
): Map<string, string> {
  const known = new Set(variants.flatMap((v) => (v.schema.name !== undefined ? [v.schema.name] : [])));
  const values = new Map<string, string>();

  for (const [value, variantName] of Object.entries(mapping)) {
    if (!known.has(variantName)) {
      throw new SchemaConstructionError(`Unknown variant '${variantName}' for discriminator value '${value}'`, {
        value,
        variant: variantName,
        variants: Array.from(known),
      });
    }
    const previous = values.get(variantName);
    if (previous !== undefined) {
      throw new SchemaConstructionError(
        `Variant '${variantName}' is mapped by both '${previous}' and '${value}'`,
        { variant: variantName }
      );
    }
    values.set(variantName, value);
  }

  return values;
}
