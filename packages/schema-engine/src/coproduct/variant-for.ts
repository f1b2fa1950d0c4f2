import type { CoproductVariant, Schema } from '@typedwire/core';
import { SchemaConstructionError } from '@typedwire/core';

/**
 * The variant of a coproduct a value belongs to: through the schema's matcher
 * when it has one, otherwise through the value's discriminator field.
 * Undefined when neither identifies a known variant.
 */
export function variantFor(schema: Schema, instance: unknown): CoproductVariant | undefined {
  const type = schema.type;
  if (type.kind !== 'coproduct') {
    throw new SchemaConstructionError(`Expected a coproduct schema, found ${type.kind}`, { kind: type.kind });
  }

  const value = type.matcher ? type.matcher.match(instance) : discriminatorOf(instance, type.discriminator);
  if (value === undefined) return undefined;
  return type.variants.find((v) => v.discriminatorValue === value);
}

function discriminatorOf(instance: unknown, fieldName: string | undefined): string | undefined {
  if (fieldName === undefined || typeof instance !== 'object' || instance === null) return undefined;
  const value: unknown = Reflect.get(instance, fieldName);
  return typeof value === 'string' ? value : undefined;
}
